// ========================================
// Local Cluster - the whole loop in one process
// ========================================

import { WeightedDispatcher } from './balancer/dispatcher.js';
import type { DispatchResult } from './balancer/dispatcher.js';
import { NullClassifier } from './balancer/classifier.js';
import type { TrustClassifier } from './balancer/classifier.js';
import { ObservationLedger } from './balancer/observation-ledger.js';
import { LocalNodeTransport } from './balancer/transports.js';
import { DEFAULT_BANDS, TrustWeightEngine } from './balancer/trust-engine.js';
import type { MemoryModel } from './config.js';
import { NodeFaultEngine } from './node/fault-engine.js';
import type { Random } from './random.js';
import type { FaultClass, NodeId, WeightBands } from './types.js';

export interface LocalClusterOptions {
    nodeCount: number;
    faults?: ReadonlyMap<NodeId, FaultClass>;
    classifier?: TrustClassifier;
    bands?: WeightBands;
    primaryFaultClass?: string | null;
    windowSeconds?: number;
    queryTimeoutMs?: number;
    requestTimeoutMs?: number;
    /** Per-node request draws. */
    randomFor?: (nodeId: NodeId) => Random;
    /** Dispatcher's weighted draw. */
    random?: Random;
    workloadIterations?: number;
    rampWindowSeconds?: number;
    memory?: MemoryModel;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface LocalCluster {
    readonly engines: ReadonlyMap<NodeId, NodeFaultEngine>;
    readonly ledger: ObservationLedger;
    readonly trust: TrustWeightEngine;
    readonly dispatcher: WeightedDispatcher;
    /** Sequential dispatches, for scripted runs. */
    run(requests: number): Promise<DispatchResult[]>;
    start(refreshIntervalMs: number, dispatchIntervalMs: number): void;
    stop(): Promise<void>;
}

export function createLocalCluster(options: LocalClusterOptions): LocalCluster {
    const nodeIds = Array.from({ length: options.nodeCount }, (_, i) => i + 1);
    const engines = new Map<NodeId, NodeFaultEngine>(
        nodeIds.map((id) => [
            id,
            new NodeFaultEngine({
                id,
                faultClass: options.faults?.get(id) ?? 'benign',
                workloadIterations: options.workloadIterations,
                rampWindowSeconds: options.rampWindowSeconds,
                memory: options.memory,
                random: options.randomFor?.(id),
                now: options.now,
                sleep: options.sleep,
            }),
        ])
    );

    const ledger = new ObservationLedger({
        now: options.now,
        gauges: (id) => engines.get(id)?.getGauges(),
    });

    const trust = new TrustWeightEngine({
        nodeIds,
        metrics: ledger,
        classifier: options.classifier ?? new NullClassifier(),
        bands: options.bands ?? DEFAULT_BANDS,
        windowSeconds: options.windowSeconds,
        queryTimeoutMs: options.queryTimeoutMs,
        primaryFaultClass: options.primaryFaultClass,
        now: options.now,
    });

    const dispatcher = new WeightedDispatcher({
        nodeIds,
        routing: trust.routing,
        transport: new LocalNodeTransport(engines.values(), options.requestTimeoutMs),
        recorder: ledger,
        random: options.random,
        now: options.now,
    });

    return {
        engines,
        ledger,
        trust,
        dispatcher,
        async run(requests) {
            const results: DispatchResult[] = [];
            for (let i = 0; i < requests; i++) {
                results.push(await dispatcher.dispatch());
            }
            return results;
        },
        start(refreshIntervalMs, dispatchIntervalMs) {
            trust.start(refreshIntervalMs);
            dispatcher.start(dispatchIntervalMs);
        },
        async stop() {
            await dispatcher.stop();
            await trust.stop();
        },
    };
}
