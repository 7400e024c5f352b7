// ========================================
// Prometheus Metrics Source
// ========================================

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { nodeLabel } from '../types.js';
import type { MetricName, NodeId } from '../types.js';
import { sanitizeMetric } from './metrics-source.js';
import type { MetricsSource } from './metrics-source.js';

interface PromSample {
    metric: Record<string, string>;
    value: [number, string];
}

interface PromQueryResponse {
    status: 'success' | 'error';
    data?: {
        resultType: string;
        result: PromSample[];
    };
    error?: string;
}

/**
 * PromQL per metric, keyed by the node_id label the nodes export.
 */
export function buildQuery(metric: MetricName, nodeId: NodeId, windowSeconds: number): string {
    const label = `node_id="${nodeLabel(nodeId)}"`;
    const range = `[${windowSeconds}s]`;
    switch (metric) {
        case 'latency':
            return `sum(rate(request_latency_seconds_sum{${label}}${range})) / sum(rate(request_latency_seconds_count{${label}}${range}))`;
        case 'errors':
            return `sum(increase(http_requests_total{${label},status="500"}${range}))`;
        case 'cpu':
            return `avg_over_time(node_cpu_usage_percent{${label}}${range}) / 100`;
        case 'memory':
            return `avg_over_time(node_memory_mb{${label}}${range})`;
    }
}

export class PrometheusMetricsSource implements MetricsSource {
    readonly name = 'prometheus';
    private readonly http: AxiosInstance;

    constructor(baseUrl: string, timeoutMs = 2000) {
        this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
    }

    async query(nodeId: NodeId, metric: MetricName, windowSeconds: number): Promise<number | undefined> {
        const response = await this.http.get<PromQueryResponse>('/api/v1/query', {
            params: { query: buildQuery(metric, nodeId, windowSeconds) },
        });
        const body = response.data;
        if (body.status !== 'success' || !body.data) {
            throw new Error(`Prometheus query failed: ${body.error || 'unknown error'}`);
        }
        const first = body.data.result[0];
        return first ? sanitizeMetric(first.value[1]) : undefined;
    }
}
