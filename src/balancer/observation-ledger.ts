// ========================================
// Observation Ledger - in-process metrics source
// ========================================

import type { DispatchEvent, MetricName, NodeId, ResourceGauges } from '../types.js';
import type { OutcomeRecorder } from './dispatcher.js';
import type { MetricsSource } from './metrics-source.js';

export type GaugeProvider = (nodeId: NodeId) => ResourceGauges | undefined;

export interface LedgerOptions {
    retentionSeconds?: number;
    gauges?: GaugeProvider;
    now?: () => number;
}

function isError(event: DispatchEvent): boolean {
    return !event.ok && (event.status === undefined || event.status >= 500);
}

/**
 * Keeps recent dispatch events and answers metric queries from them.
 * A request that got no response counts as an error, with its wait as latency.
 */
export class ObservationLedger implements MetricsSource, OutcomeRecorder {
    readonly name = 'ledger';
    private readonly retentionMs: number;
    private readonly gauges?: GaugeProvider;
    private readonly now: () => number;
    private events: DispatchEvent[] = [];

    constructor(options: LedgerOptions = {}) {
        this.retentionMs = (options.retentionSeconds ?? 300) * 1000;
        this.gauges = options.gauges;
        this.now = options.now ?? Date.now;
    }

    record(event: DispatchEvent): void {
        this.events.push(event);
        const cutoff = this.now() - this.retentionMs;
        if (this.events.length > 0 && this.events[0].timestamp < cutoff) {
            this.events = this.events.filter((e) => e.timestamp >= cutoff);
        }
    }

    recent(windowSeconds?: number, nodeId?: NodeId): DispatchEvent[] {
        const cutoff = windowSeconds === undefined ? -Infinity : this.now() - windowSeconds * 1000;
        return this.events.filter((e) => e.timestamp >= cutoff && (nodeId === undefined || e.nodeId === nodeId));
    }

    async query(nodeId: NodeId, metric: MetricName, windowSeconds: number): Promise<number | undefined> {
        switch (metric) {
            case 'latency': {
                const events = this.recent(windowSeconds, nodeId);
                if (events.length === 0) return undefined;
                return events.reduce((sum, e) => sum + e.latencyMs, 0) / events.length / 1000;
            }
            case 'errors':
                return this.recent(windowSeconds, nodeId).filter(isError).length;
            case 'cpu': {
                const gauges = this.gauges?.(nodeId);
                return gauges ? gauges.cpuPercent / 100 : undefined;
            }
            case 'memory':
                return this.gauges?.(nodeId)?.memoryMb;
        }
    }
}
