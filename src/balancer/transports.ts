// ========================================
// Node Transports
// ========================================

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { nodeUrl } from '../config.js';
import { withTimeout } from '../errors.js';
import { nodeLabel } from '../types.js';
import type { NodeId } from '../types.js';
import type { NodeFaultEngine } from '../node/fault-engine.js';
import type { NodeResponse, NodeTransport } from './dispatcher.js';

/**
 * GET <node>/process over HTTP. Any status counts as a response;
 * refused connections and timeouts reject.
 */
export class HttpNodeTransport implements NodeTransport {
    private readonly http: AxiosInstance;

    constructor(
        private readonly urlTemplate: string,
        timeoutMs = 5000
    ) {
        this.http = axios.create({ timeout: timeoutMs, validateStatus: () => true });
    }

    async send(nodeId: NodeId): Promise<NodeResponse> {
        const started = Date.now();
        const response = await this.http.get<unknown>(`${nodeUrl(this.urlTemplate, nodeId)}/process`);
        return { status: response.status, body: response.data, latencyMs: Date.now() - started };
    }
}

/**
 * Calls engines in this process. Latency is what the engine measured.
 */
export class LocalNodeTransport implements NodeTransport {
    private readonly engines: ReadonlyMap<NodeId, NodeFaultEngine>;

    constructor(
        engines: Iterable<NodeFaultEngine>,
        private readonly timeoutMs = 5000
    ) {
        this.engines = new Map(Array.from(engines, (engine) => [engine.id, engine]));
    }

    async send(nodeId: NodeId): Promise<NodeResponse> {
        const engine = this.engines.get(nodeId);
        if (!engine) throw new Error(`Unknown node ${nodeLabel(nodeId)}`);
        const outcome = await withTimeout(engine.handleRequest(), this.timeoutMs, `request to ${engine.label}`);
        return { status: outcome.status, body: outcome.payload, latencyMs: outcome.latencyMs };
    }
}
