// ========================================
// Metrics Source - interface + safe extraction
// ========================================

import { errorMessage, withTimeout } from '../errors.js';
import { createLogger } from '../log.js';
import { METRIC_NAMES, nodeLabel } from '../types.js';
import type { MetricName, NodeId, Observation } from '../types.js';

const log = createLogger('Metrics');

/**
 * One logical query per metric per node. `undefined` means no data.
 *
 * latency: average seconds; errors: count of error-status responses;
 * cpu: usage rate in [0,1]; memory: megabytes.
 */
export interface MetricsSource {
    readonly name: string;
    query(nodeId: NodeId, metric: MetricName, windowSeconds: number): Promise<number | undefined>;
}

export interface CollectOptions {
    windowSeconds: number;
    timeoutMs: number;
    now?: () => number;
}

/**
 * Finite numbers only. Numeric strings ("0.25") are accepted, "NaN" and "+Inf" are not.
 */
export function sanitizeMetric(value: unknown): number | undefined {
    const n = typeof value === 'string' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isFinite(n)) return undefined;
    return n;
}

async function safeQuery(
    source: MetricsSource,
    nodeId: NodeId,
    metric: MetricName,
    options: CollectOptions
): Promise<number | undefined> {
    try {
        const raw = await withTimeout(
            source.query(nodeId, metric, options.windowSeconds),
            options.timeoutMs,
            `${metric} query for ${nodeLabel(nodeId)}`
        );
        return sanitizeMetric(raw);
    } catch (error: unknown) {
        log.debug(`${source.name}: ${metric} for ${nodeLabel(nodeId)} unavailable (${errorMessage(error)})`);
        return undefined;
    }
}

/**
 * Never throws. Each missing metric becomes 0 and is listed in `gaps`.
 */
export async function collectObservation(source: MetricsSource, nodeId: NodeId, options: CollectOptions): Promise<Observation> {
    const values = await Promise.all(METRIC_NAMES.map((metric) => safeQuery(source, nodeId, metric, options)));
    const byName = new Map<MetricName, number | undefined>(METRIC_NAMES.map((metric, i) => [metric, values[i]]));
    const gaps = METRIC_NAMES.filter((metric) => byName.get(metric) === undefined);

    return {
        nodeId,
        avgLatencySeconds: byName.get('latency') ?? 0,
        errorCount: byName.get('errors') ?? 0,
        cpuUsageRate: byName.get('cpu') ?? 0,
        memoryMb: byName.get('memory') ?? 0,
        gaps,
        observedAt: (options.now ?? Date.now)(),
    };
}
