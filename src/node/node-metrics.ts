// ========================================
// Node Metrics - Prometheus exposition
// ========================================

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { RequestOutcome, ResourceGauges } from '../types.js';

export const LATENCY_BUCKETS = [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 7.5, 10];

/**
 * One registry per node process; every series carries the node_id label.
 */
export class NodeMetrics {
    readonly registry: Registry;
    private readonly nodeId: string;
    private readonly requests: Counter<'node_id' | 'status'>;
    private readonly latency: Histogram<'node_id'>;
    private readonly cpu: Gauge<'node_id'>;
    private readonly memory: Gauge<'node_id'>;

    constructor(nodeId: string, options: { defaultMetrics?: boolean } = {}) {
        this.nodeId = nodeId;
        this.registry = new Registry();
        if (options.defaultMetrics ?? true) {
            collectDefaultMetrics({ register: this.registry });
        }

        this.requests = new Counter({
            name: 'http_requests_total',
            help: 'Total HTTP Requests',
            labelNames: ['node_id', 'status'],
            registers: [this.registry],
        });
        this.latency = new Histogram({
            name: 'request_latency_seconds',
            help: 'Request latency distribution',
            labelNames: ['node_id'],
            buckets: LATENCY_BUCKETS,
            registers: [this.registry],
        });
        this.cpu = new Gauge({
            name: 'node_cpu_usage_percent',
            help: 'Simulated CPU usage in percent',
            labelNames: ['node_id'],
            registers: [this.registry],
        });
        this.memory = new Gauge({
            name: 'node_memory_mb',
            help: 'Simulated memory usage in megabytes',
            labelNames: ['node_id'],
            registers: [this.registry],
        });
    }

    /** Real latency is observed, whatever the payload claims. */
    recordOutcome(outcome: RequestOutcome, gauges: ResourceGauges): void {
        this.requests.inc({ node_id: this.nodeId, status: String(outcome.status) });
        this.latency.observe({ node_id: this.nodeId }, outcome.latencyMs / 1000);
        this.recordGauges(gauges);
    }

    recordCrash(): void {
        this.requests.inc({ node_id: this.nodeId, status: 'error' });
    }

    recordGauges(gauges: ResourceGauges): void {
        this.cpu.set({ node_id: this.nodeId }, gauges.cpuPercent);
        this.memory.set({ node_id: this.nodeId }, gauges.memoryMb);
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    exposition(): Promise<string> {
        return this.registry.metrics();
    }
}
