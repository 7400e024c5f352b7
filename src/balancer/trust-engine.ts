// ========================================
// Trust Weight Engine
// ========================================

import { ClassifierError, errorMessage, withTimeout } from '../errors.js';
import { createLogger } from '../log.js';
import { nodeLabel } from '../types.js';
import type { NodeId, RoutingMode, TrustState, WeightBands } from '../types.js';
import { faultyProbability, featureVector } from './classifier.js';
import type { TrustClassifier } from './classifier.js';
import { collectObservation } from './metrics-source.js';
import type { MetricsSource } from './metrics-source.js';
import { RoutingTableHandle, createRoutingTable, uniformRoutingTable } from './routing-table.js';
import type { RoutingTable } from './routing-table.js';

export const DEFAULT_BANDS: WeightBands = Object.freeze({
    suspiciousAt: 0.2,
    faultyAt: 0.6,
    trustedWeight: 1.0,
    suspiciousWeight: 0.5,
    faultyWeight: 0.1,
});

/**
 * p < suspiciousAt -> trusted; p < faultyAt -> suspicious; otherwise faulty.
 */
export function bandWeight(pFaulty: number, bands: WeightBands = DEFAULT_BANDS): number {
    if (pFaulty < bands.suspiciousAt) return bands.trustedWeight;
    if (pFaulty < bands.faultyAt) return bands.suspiciousWeight;
    return bands.faultyWeight;
}

export interface TrustEngineOptions {
    nodeIds: readonly NodeId[];
    metrics: MetricsSource;
    classifier: TrustClassifier;
    bands?: WeightBands;
    windowSeconds?: number;
    queryTimeoutMs?: number;
    primaryFaultClass?: string | null;
    now?: () => number;
}

export class TrustWeightEngine {
    readonly routing: RoutingTableHandle;

    private readonly nodeIds: readonly NodeId[];
    private readonly metrics: MetricsSource;
    private readonly classifier: TrustClassifier;
    private readonly bands: WeightBands;
    private readonly windowSeconds: number;
    private readonly queryTimeoutMs: number;
    private readonly primaryFaultClass: string | null;
    private readonly now: () => number;
    private readonly log = createLogger('TrustEngine');

    private states: ReadonlyMap<NodeId, TrustState>;
    private timer?: NodeJS.Timeout;
    private inFlight: Promise<RoutingTable> | null = null;

    constructor(options: TrustEngineOptions) {
        this.nodeIds = [...options.nodeIds];
        this.metrics = options.metrics;
        this.classifier = options.classifier;
        this.bands = options.bands ?? DEFAULT_BANDS;
        this.windowSeconds = options.windowSeconds ?? 60;
        this.queryTimeoutMs = options.queryTimeoutMs ?? 2000;
        this.primaryFaultClass = options.primaryFaultClass ?? null;
        this.now = options.now ?? Date.now;

        // Fully trusted until the first refresh
        this.states = new Map(this.nodeIds.map((id) => [id, this.defaultState(id, null)]));
        this.routing = new RoutingTableHandle(
            uniformRoutingTable(this.nodeIds, this.bands.trustedWeight, 'round-robin', this.now())
        );

        if (!this.classifier.available) {
            const reason = this.classifier.reason ?? 'unavailable';
            this.log.warn(`⚠️ No trust classifier (${reason}): running in degraded round-robin mode`);
        }
    }

    get mode(): RoutingMode {
        return this.classifier.available ? 'trust-weighted' : 'round-robin';
    }

    snapshot(): TrustState[] {
        return this.nodeIds.map((id) => this.states.get(id) ?? this.defaultState(id, null));
    }

    /**
     * One refresh cycle. Concurrent callers share the cycle already running.
     */
    refresh(): Promise<RoutingTable> {
        if (!this.inFlight) {
            this.inFlight = this.runCycle().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    start(intervalMs: number): void {
        if (this.timer) return;
        this.log.info(`Refreshing weights every ${intervalMs}ms (${this.mode})`);
        this.tick();
        this.timer = setInterval(() => this.tick(), intervalMs);
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        if (this.inFlight) await this.inFlight;
    }

    private tick(): void {
        if (this.inFlight) {
            this.log.debug('Previous refresh still running, skipping tick');
            return;
        }
        this.refresh().catch((error: unknown) => {
            this.log.error('Refresh cycle failed:', errorMessage(error));
        });
    }

    private async runCycle(): Promise<RoutingTable> {
        const startedAt = this.now();
        const states = this.classifier.available
            ? await Promise.all(this.nodeIds.map((id) => this.assess(id, startedAt)))
            : this.nodeIds.map((id) => this.defaultState(id, startedAt));

        this.states = new Map(states.map((s) => [s.nodeId, s]));
        const table = createRoutingTable(
            states.map((s) => [s.nodeId, s.weight] as const),
            this.mode,
            startedAt
        );
        this.routing.publish(table);
        this.logCycle(states);
        return table;
    }

    private async assess(nodeId: NodeId, at: number): Promise<TrustState> {
        const label = nodeLabel(nodeId);
        try {
            const observation = await collectObservation(this.metrics, nodeId, {
                windowSeconds: this.windowSeconds,
                timeoutMs: this.queryTimeoutMs,
                now: this.now,
            });
            if (observation.gaps.length > 0) {
                this.log.debug(`${label}: substituted 0 for ${observation.gaps.join(', ')}`);
            }

            const probabilities = await withTimeout(
                this.classifier.predict(featureVector(observation)),
                this.queryTimeoutMs,
                `classifier for ${label}`
            );
            const pFaulty = faultyProbability(probabilities, this.primaryFaultClass);
            if (!Number.isFinite(pFaulty)) {
                throw new ClassifierError(`non-numeric p_faulty for ${label}`);
            }

            const weight = bandWeight(pFaulty, this.bands);
            this.log.debug(`PREDICT (${label}) P_Faulty=${pFaulty.toFixed(3)} -> weight ${weight}`);
            return { nodeId, probabilities, pFaulty, weight, updatedAt: at };
        } catch (error: unknown) {
            this.log.warn(`${label}: assessment failed, keeping full trust (${errorMessage(error)})`);
            return { ...this.defaultState(nodeId, at), error: errorMessage(error) };
        }
    }

    private defaultState(nodeId: NodeId, at: number | null): TrustState {
        return { nodeId, probabilities: null, pFaulty: null, weight: this.bands.trustedWeight, updatedAt: at };
    }

    private logCycle(states: readonly TrustState[]): void {
        const demoted = states
            .filter((s) => s.weight !== this.bands.trustedWeight)
            .map((s) => `${nodeLabel(s.nodeId)}=${s.weight}`);
        const summary = demoted.length > 0 ? demoted.join(', ') : `all nodes at ${this.bands.trustedWeight}`;
        this.log.info(`Weights refreshed (mode: ${this.mode}): ${summary}`);
    }
}
