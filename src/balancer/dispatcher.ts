// ========================================
// Weighted Dispatcher
// ========================================

import { errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { Random } from '../random.js';
import { nodeLabel } from '../types.js';
import type { DispatchEvent, NodeId, RoutingMode } from '../types.js';
import { totalWeight, usableWeight } from './routing-table.js';
import type { RoutingTable, RoutingTableHandle } from './routing-table.js';

export interface NodeResponse {
    status: number;
    body: unknown;
    latencyMs: number;
}

/**
 * Reaches one node. Rejects when the node gives no response at all.
 */
export interface NodeTransport {
    send(nodeId: NodeId): Promise<NodeResponse>;
}

export interface OutcomeRecorder {
    record(event: DispatchEvent): void;
}

export interface Selection {
    nodeId: NodeId;
    mode: RoutingMode;
}

export interface DispatchResult {
    event: DispatchEvent;
    response?: NodeResponse;
}

export interface DispatcherOptions {
    nodeIds: readonly NodeId[];
    routing: RoutingTableHandle;
    transport: NodeTransport;
    recorder?: OutcomeRecorder;
    random?: Random;
    now?: () => number;
}

export class WeightedDispatcher {
    private readonly nodeIds: readonly NodeId[];
    private readonly routing: RoutingTableHandle;
    private readonly transport: NodeTransport;
    private readonly recorder?: OutcomeRecorder;
    private readonly random: Random;
    private readonly now: () => number;
    private readonly log = createLogger('Dispatcher');

    private cursor = 0;
    private timer?: NodeJS.Timeout;
    private readonly inFlight = new Set<Promise<void>>();
    private lastMode?: RoutingMode;

    constructor(options: DispatcherOptions) {
        if (options.nodeIds.length === 0) throw new Error('Dispatcher needs at least one node');
        this.nodeIds = [...options.nodeIds];
        this.routing = options.routing;
        this.transport = options.transport;
        this.recorder = options.recorder;
        this.random = options.random ?? Math.random;
        this.now = options.now ?? Date.now;
    }

    /**
     * Weighted draw over the current snapshot, or round-robin when the table
     * is degraded, empty, or carries no positive weight.
     */
    select(): Selection {
        const table = this.routing.current();
        const total = totalWeight(table, this.nodeIds);
        if (table.mode === 'round-robin' || table.weights.size === 0 || total <= 0) {
            return { nodeId: this.nextRoundRobin(), mode: 'round-robin' };
        }
        return { nodeId: this.weightedDraw(table, total), mode: 'trust-weighted' };
    }

    /**
     * No retry: a failure only shows up in the next refresh cycle.
     * Every call counts as in flight until it settles, whoever made it.
     */
    dispatch(): Promise<DispatchResult> {
        const work = this.route();
        this.track(work);
        return work;
    }

    private async route(): Promise<DispatchResult> {
        const { nodeId, mode } = this.select();
        this.noteMode(mode);
        const started = this.now();

        let result: DispatchResult;
        try {
            const response = await this.transport.send(nodeId);
            result = {
                response,
                event: {
                    nodeId,
                    mode,
                    ok: response.status < 400,
                    status: response.status,
                    latencyMs: response.latencyMs,
                    timestamp: started,
                },
            };
            this.log.debug(`ROUTE -> ${nodeLabel(nodeId)} (${mode}) | Status: ${response.status}`);
        } catch (error: unknown) {
            result = {
                event: {
                    nodeId,
                    mode,
                    ok: false,
                    latencyMs: this.now() - started,
                    error: errorMessage(error),
                    timestamp: started,
                },
            };
            this.log.debug(`ROUTE -> ${nodeLabel(nodeId)} (${mode}) | FAILURE: ${errorMessage(error)}`);
        }

        this.recorder?.record(result.event);
        return result;
    }

    start(intervalMs: number): void {
        if (this.timer) return;
        this.log.info(`Dispatching every ${intervalMs}ms across ${this.nodeIds.length} nodes`);
        this.timer = setInterval(() => {
            this.dispatch().catch((error: unknown) => this.log.error('Dispatch failed:', errorMessage(error)));
        }, intervalMs);
    }

    /**
     * Stop issuing new requests and wait for the ones in flight.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        await Promise.allSettled(Array.from(this.inFlight));
    }

    get pending(): number {
        return this.inFlight.size;
    }

    private track(work: Promise<DispatchResult>): void {
        // Rejections belong to whoever called dispatch(); this copy only tracks settling
        const settled: Promise<void> = work
            .then(
                () => undefined,
                () => undefined
            )
            .finally(() => {
                this.inFlight.delete(settled);
            });
        this.inFlight.add(settled);
    }

    private nextRoundRobin(): NodeId {
        const nodeId = this.nodeIds[this.cursor % this.nodeIds.length];
        this.cursor = (this.cursor + 1) % this.nodeIds.length;
        return nodeId;
    }

    private weightedDraw(table: RoutingTable, total: number): NodeId {
        let remaining = this.random() * total;
        let fallback = this.nodeIds[0];
        for (const id of this.nodeIds) {
            const weight = usableWeight(table, id);
            if (weight <= 0) continue;
            fallback = id;
            if (remaining < weight) return id;
            remaining -= weight;
        }
        // Floating point leftovers land on the last eligible node
        return fallback;
    }

    private noteMode(mode: RoutingMode): void {
        if (mode !== this.lastMode) {
            this.log.info(`Routing mode: ${mode}`);
            this.lastMode = mode;
        }
    }
}
