// ========================================
// Trust LB Testbed - Shared Types
// ========================================

/** Numeric node identifier, 1..N. */
export type NodeId = number;

export const FAULT_CLASSES = ['benign', 'crash', 'delay', 'error-500', 'lie-latency'] as const;

export type FaultClass = (typeof FAULT_CLASSES)[number];

export type RoutingMode = 'trust-weighted' | 'round-robin';

/**
 * Immutable baseline drawn once per node from its seeded generator.
 */
export interface NodeProfile {
    baseLatencyMs: number;      // 10-50
    baseCpuLoad: number;        // 0.20-0.50
    workloadVariation: number;  // 0.30-0.70
    jitterMs: number;           // 2-15
    packetLoss: number;         // 0.001-0.02
    stability: number;          // 0.7-1.0
}

export interface ProcessPayload {
    node: string;
    status: 'ok';
    processed_in: string;
    load_factor: string;
    request_num: number;
}

export interface ErrorPayload {
    node: string;
    status: 'error';
    error: string;
    request_num: number;
}

export type RequestOutcome =
    | {
        kind: 'success';
        status: 200;
        latencyMs: number;          // real, measured
        reportedLatencyMs: number;  // what the node claims
        loadFactor: number;
        misbehaved: boolean;
        payload: ProcessPayload;
    }
    | {
        kind: 'error';
        status: 500;
        latencyMs: number;
        loadFactor: number;
        misbehaved: true;
        payload: ErrorPayload;
    };

export interface HealthReport {
    node: string;
    status: 'healthy' | 'crashed';
    uptime_seconds: number;
    fault_type: FaultClass;
    total_requests: number;
}

export interface ResourceGauges {
    cpuPercent: number;
    memoryMb: number;
}

export const METRIC_NAMES = ['latency', 'errors', 'cpu', 'memory'] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/**
 * Windowed aggregate for one node. Missing metrics are already replaced by 0.
 */
export interface Observation {
    nodeId: NodeId;
    avgLatencySeconds: number;
    errorCount: number;
    cpuUsageRate: number;
    memoryMb: number;
    gaps: MetricName[];
    observedAt: number;
}

export type ClassProbabilities = Readonly<Record<string, number>>;

export interface TrustState {
    nodeId: NodeId;
    probabilities: ClassProbabilities | null;
    pFaulty: number | null;
    weight: number;
    updatedAt: number | null;
    error?: string;
}

export interface DispatchEvent {
    nodeId: NodeId;
    mode: RoutingMode;
    ok: boolean;
    status?: number;
    latencyMs: number;
    error?: string;
    timestamp: number;
}

export interface WeightBands {
    suspiciousAt: number;
    faultyAt: number;
    trustedWeight: number;
    suspiciousWeight: number;
    faultyWeight: number;
}

export function nodeLabel(id: NodeId): string {
    return `node-${id}`;
}

export function isFaultClass(value: string): value is FaultClass {
    return (FAULT_CLASSES as readonly string[]).includes(value);
}
