// ========================================
// Node Fault Engine
// ========================================

import { NodeCrashedError, sleep as realSleep } from '../errors.js';
import { createLogger } from '../log.js';
import type { Logger } from '../log.js';
import { chance, clamp, gaussian, uniform } from '../random.js';
import type { Random } from '../random.js';
import { nodeLabel } from '../types.js';
import type {
    FaultClass,
    HealthReport,
    NodeId,
    NodeProfile,
    RequestOutcome,
    ResourceGauges,
} from '../types.js';
import type { MemoryModel } from '../config.js';
import { BASE_FAULT_PROBABILITY, FAULT_BEHAVIORS, FAULT_RAMP_CEILING } from './fault-behaviors.js';
import { drawProfile } from './profile.js';

export const SPIKE_PROBABILITY = 0.05;
export const SPIKE_MULTIPLIER = { min: 1.5, max: 3 } as const;
export const RETRANSMIT_PENALTY_MS = { min: 50, max: 150 } as const;
export const IO_WAIT_PROBABILITY = 0.3;
export const IO_WAIT_MS = { min: 5, max: 20 } as const;
export const CPU_NOISE_PERCENT = 10;
export const MEMORY_NOISE_MB = 2;

const DEFAULT_MEMORY: MemoryModel = { baseMb: 48, leakPerRequestMb: 0.05, resetWindow: 1000 };

export interface FaultEngineOptions {
    id: NodeId;
    faultClass: FaultClass;
    rampWindowSeconds?: number;
    oscillationPeriodSeconds?: number;
    workloadIterations?: number;
    memory?: MemoryModel;
    /** Per-request draws. Defaults to Math.random. */
    random?: Random;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Burns CPU proportional to `iterations`.
 */
export function burnCpu(iterations: number): number {
    let acc = 0;
    for (let i = 0; i < iterations; i++) {
        acc += i * i;
    }
    return acc;
}

export class NodeFaultEngine {
    readonly id: NodeId;
    readonly label: string;
    readonly faultClass: FaultClass;
    readonly profile: NodeProfile;
    readonly startedAt: number;

    private readonly rampWindowSeconds: number;
    private readonly oscillationPeriodSeconds: number;
    private readonly workloadIterations: number;
    private readonly memory: MemoryModel;
    private readonly random: Random;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly log: Logger;

    private requestCount = 0;
    private crashed = false;
    private gauges: ResourceGauges;

    constructor(options: FaultEngineOptions) {
        this.id = options.id;
        this.label = nodeLabel(options.id);
        this.faultClass = options.faultClass;
        this.profile = drawProfile(options.id);
        this.rampWindowSeconds = options.rampWindowSeconds ?? 300;
        this.oscillationPeriodSeconds = options.oscillationPeriodSeconds ?? 60;
        this.workloadIterations = options.workloadIterations ?? 200_000;
        this.memory = options.memory ?? DEFAULT_MEMORY;
        this.random = options.random ?? Math.random;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? realSleep;
        this.log = createLogger(`Node ${this.label}`);
        this.startedAt = this.now();
        this.gauges = {
            cpuPercent: this.profile.baseCpuLoad * 100,
            memoryMb: this.memory.baseMb,
        };
    }

    get totalRequests(): number {
        return this.requestCount;
    }

    get isCrashed(): boolean {
        return this.crashed;
    }

    getGauges(): ResourceGauges {
        return { ...this.gauges };
    }

    /**
     * Base probability ramped linearly up to 1.5x over the ramp window, then flat.
     */
    faultProbability(atMs: number = this.now()): number {
        const base = BASE_FAULT_PROBABILITY[this.faultClass];
        const elapsedSeconds = Math.max(0, (atMs - this.startedAt) / 1000);
        const ramp = Math.min(1, elapsedSeconds / this.rampWindowSeconds);
        return Math.min(1, base * (1 + (FAULT_RAMP_CEILING - 1) * ramp));
    }

    /**
     * Slow oscillation times an occasional spike. Draws once per call.
     */
    loadFactor(atMs: number = this.now()): number {
        const elapsedSeconds = (atMs - this.startedAt) / 1000;
        const amplitude = this.profile.workloadVariation / 2;
        const oscillation = 1 + amplitude * Math.sin((2 * Math.PI * elapsedSeconds) / this.oscillationPeriodSeconds + this.id);
        const spike = chance(this.random, SPIKE_PROBABILITY) ? uniform(this.random, SPIKE_MULTIPLIER.min, SPIKE_MULTIPLIER.max) : 1;
        return oscillation * spike;
    }

    networkDelayMs(loadFactor: number): number {
        const { baseLatencyMs, jitterMs, stability, packetLoss } = this.profile;
        const noise = gaussian(this.random, 0, jitterMs / stability);
        const retransmit = chance(this.random, packetLoss)
            ? uniform(this.random, RETRANSMIT_PENALTY_MS.min, RETRANSMIT_PENALTY_MS.max)
            : 0;
        return Math.max(0, baseLatencyMs * loadFactor + noise + retransmit);
    }

    async handleRequest(): Promise<RequestOutcome> {
        if (this.crashed) throw new NodeCrashedError(this.label);

        const requestNum = ++this.requestCount;
        const started = this.now();

        const loadFactor = this.loadFactor(started);
        const networkDelay = this.networkDelayMs(loadFactor);
        const misbehave = this.random() < this.faultProbability(started);
        const decision = FAULT_BEHAVIORS[this.faultClass]({ misbehave, rng: this.random, profile: this.profile });

        if (decision.kind === 'crash') {
            this.crashed = true;
            this.log.error(`CRASH fault triggered on request #${requestNum}`);
            throw new NodeCrashedError(this.label);
        }

        await this.sleep(networkDelay);

        if (decision.kind === 'error') {
            this.updateGauges(loadFactor);
            this.log.debug(`500-ERROR fault triggered on request #${requestNum}`);
            return {
                kind: 'error',
                status: 500,
                latencyMs: this.now() - started,
                loadFactor,
                misbehaved: true,
                payload: {
                    node: this.label,
                    status: 'error',
                    error: 'Internal Server Error (Byzantine Fault)',
                    request_num: requestNum,
                },
            };
        }

        if (decision.stallMs > 0) {
            this.log.debug(`${decision.lie ? 'LIE' : 'DELAY'} fault: stalling ${Math.round(decision.stallMs)}ms`);
            await this.sleep(decision.stallMs);
        }

        await this.runWorkload(loadFactor * decision.workloadMultiplier);
        this.updateGauges(loadFactor);

        const latencyMs = this.now() - started;
        const reportedLatencyMs = decision.lie ? this.profile.baseLatencyMs : latencyMs;

        return {
            kind: 'success',
            status: 200,
            latencyMs,
            reportedLatencyMs,
            loadFactor,
            misbehaved: decision.misbehaved,
            payload: {
                node: this.label,
                status: 'ok',
                processed_in: `${(reportedLatencyMs / 1000).toFixed(3)}s`,
                load_factor: loadFactor.toFixed(2),
                request_num: requestNum,
            },
        };
    }

    health(): HealthReport {
        return {
            node: this.label,
            status: this.crashed ? 'crashed' : 'healthy',
            uptime_seconds: Math.floor((this.now() - this.startedAt) / 1000),
            fault_type: this.faultClass,
            total_requests: this.requestCount,
        };
    }

    private async runWorkload(scale: number): Promise<void> {
        const variation = uniform(this.random, 0.8, 1.2);
        burnCpu(Math.round(this.workloadIterations * scale * variation));
        if (chance(this.random, IO_WAIT_PROBABILITY)) {
            await this.sleep(uniform(this.random, IO_WAIT_MS.min, IO_WAIT_MS.max));
        }
    }

    private updateGauges(loadFactor: number): void {
        const cpu = this.profile.baseCpuLoad * loadFactor * 100 + gaussian(this.random, 0, CPU_NOISE_PERCENT);
        const leaked = (this.requestCount % this.memory.resetWindow) * this.memory.leakPerRequestMb;
        const memory = this.memory.baseMb + leaked + gaussian(this.random, 0, MEMORY_NOISE_MB);
        this.gauges = {
            cpuPercent: clamp(cpu, 0, 100),
            memoryMb: Math.max(0, memory),
        };
    }
}
