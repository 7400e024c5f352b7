// ========================================
// Detection Report & Probe Summary
// ========================================

import { nodeLabel } from '../types.js';
import type { DispatchEvent, FaultClass, NodeId, TrustState, WeightBands } from '../types.js';
import { DEFAULT_BANDS } from './trust-engine.js';

export type Verdict = 'benign' | 'suspicious' | 'faulty';

export function verdictFor(pFaulty: number, bands: WeightBands = DEFAULT_BANDS): Verdict {
    if (pFaulty < bands.suspiciousAt) return 'benign';
    if (pFaulty < bands.faultyAt) return 'suspicious';
    return 'faulty';
}

export interface DetectionDetail {
    node: string;
    truth: FaultClass;
    predicted: Verdict;
    pFaulty: number;
    correct: boolean;
}

export interface DetectionReport {
    accuracy: number;
    evaluated: number;
    correct: number;
    details: DetectionDetail[];
}

/**
 * A faulty node counts as detected when flagged suspicious or faulty.
 * Nodes without a prediction are left out.
 */
export function detectionReport(
    states: readonly TrustState[],
    faultMap: ReadonlyMap<NodeId, FaultClass>,
    bands: WeightBands = DEFAULT_BANDS
): DetectionReport {
    const details: DetectionDetail[] = [];
    for (const state of states) {
        if (state.pFaulty === null) continue;
        const truth = faultMap.get(state.nodeId) ?? 'benign';
        const predicted = verdictFor(state.pFaulty, bands);
        const correct = truth === 'benign' ? predicted === 'benign' : predicted !== 'benign';
        details.push({ node: nodeLabel(state.nodeId), truth, predicted, pFaulty: state.pFaulty, correct });
    }
    const correct = details.filter((d) => d.correct).length;
    return {
        accuracy: details.length > 0 ? correct / details.length : 0,
        evaluated: details.length,
        correct,
        details,
    };
}

export interface ProbeSummary {
    node: string;
    total: number;
    successful: number;
    errors: number;
    failures: number;
    avgLatencyMs?: number;
    stdLatencyMs?: number;
    minLatencyMs?: number;
    maxLatencyMs?: number;
}

export function summarizeNode(nodeId: NodeId, events: readonly DispatchEvent[]): ProbeSummary {
    const own = events.filter((e) => e.nodeId === nodeId);
    const latencies = own.filter((e) => e.ok).map((e) => e.latencyMs);
    const summary: ProbeSummary = {
        node: nodeLabel(nodeId),
        total: own.length,
        successful: latencies.length,
        errors: own.filter((e) => e.status !== undefined && e.status >= 400).length,
        failures: own.filter((e) => e.status === undefined).length,
    };
    if (latencies.length === 0) return summary;

    const mean = latencies.reduce((a, b) => a + b, 0) / latencies.length;
    // sample standard deviation
    const variance = latencies.length > 1
        ? latencies.reduce((acc, l) => acc + (l - mean) ** 2, 0) / (latencies.length - 1)
        : 0;
    return {
        ...summary,
        avgLatencyMs: mean,
        stdLatencyMs: Math.sqrt(variance),
        minLatencyMs: Math.min(...latencies),
        maxLatencyMs: Math.max(...latencies),
    };
}

export function summarizeEvents(nodeIds: readonly NodeId[], events: readonly DispatchEvent[]): ProbeSummary[] {
    return nodeIds.map((id) => summarizeNode(id, events));
}
