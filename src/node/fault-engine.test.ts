import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NodeCrashedError } from '../errors.js';
import { mulberry32 } from '../random.js';
import type { Random } from '../random.js';
import type { FaultClass, RequestOutcome } from '../types.js';
import { NodeFaultEngine } from './fault-engine.js';

const START = 1_000_000;

/** Clock that only moves when the engine sleeps. */
function makeClock() {
    let now = START;
    return {
        now: () => now,
        advance: (ms: number) => {
            now += ms;
        },
        sleep: async (ms: number) => {
            now += ms;
        },
    };
}

function makeEngine(faultClass: FaultClass, random: Random, clock = makeClock()) {
    return new NodeFaultEngine({
        id: 2,
        faultClass,
        random,
        now: clock.now,
        sleep: clock.sleep,
        workloadIterations: 10,
    });
}

function expectSuccess(outcome: RequestOutcome) {
    if (outcome.kind !== 'success') throw new Error(`expected success, got ${outcome.status}`);
    return outcome;
}

beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('faultProbability', () => {
    it('ramps error-500 from 0.4 to 0.6 over the window and then holds', () => {
        const engine = makeEngine('error-500', mulberry32(1));
        expect(engine.faultProbability(START)).toBeCloseTo(0.4, 10);
        expect(engine.faultProbability(START + 150_000)).toBeCloseTo(0.5, 10);
        expect(engine.faultProbability(START + 300_000)).toBeCloseTo(0.6, 10);
        expect(engine.faultProbability(START + 900_000)).toBeCloseTo(0.6, 10);
    });

    it('never decreases over time', () => {
        const engine = makeEngine('delay', mulberry32(1));
        let previous = 0;
        for (let t = 0; t <= 400_000; t += 10_000) {
            const p = engine.faultProbability(START + t);
            expect(p).toBeGreaterThanOrEqual(previous);
            previous = p;
        }
    });

    it('caps lie-latency at 1', () => {
        const engine = makeEngine('lie-latency', mulberry32(1));
        expect(engine.faultProbability(START)).toBeCloseTo(0.7, 10);
        expect(engine.faultProbability(START + 300_000)).toBe(1);
    });

    it('is zero for benign nodes', () => {
        const engine = makeEngine('benign', mulberry32(1));
        expect(engine.faultProbability(START + 300_000)).toBe(0);
    });
});

describe('handleRequest', () => {
    it('benign nodes always answer 200', async () => {
        const engine = makeEngine('benign', mulberry32(11));
        for (let i = 0; i < 200; i++) {
            const outcome = expectSuccess(await engine.handleRequest());
            expect(outcome.misbehaved).toBe(false);
            expect(outcome.reportedLatencyMs).toBe(outcome.latencyMs);
        }
        expect(engine.totalRequests).toBe(200);
    });

    it('error-500 answers with the fault payload when it misbehaves', async () => {
        const engine = makeEngine('error-500', () => 0.01);
        const outcome = await engine.handleRequest();
        expect(outcome.status).toBe(500);
        expect(outcome.misbehaved).toBe(true);
        expect(outcome.payload).toEqual({
            node: 'node-2',
            status: 'error',
            error: 'Internal Server Error (Byzantine Fault)',
            request_num: 1,
        });
    });

    it('error-500 behaves normally when the draw misses', async () => {
        const engine = makeEngine('error-500', () => 0.99);
        const outcome = expectSuccess(await engine.handleRequest());
        expect(outcome.payload.status).toBe('ok');
        expect(outcome.payload.request_num).toBe(1);
    });

    it('error-500 fails close to its base rate with a frozen clock', async () => {
        const engine = new NodeFaultEngine({
            id: 5,
            faultClass: 'error-500',
            random: mulberry32(7),
            now: () => START,
            sleep: async () => {},
            workloadIterations: 10,
        });
        let errors = 0;
        for (let i = 0; i < 2000; i++) {
            if ((await engine.handleRequest()).status === 500) errors++;
        }
        expect(errors / 2000).toBeGreaterThan(0.35);
        expect(errors / 2000).toBeLessThan(0.45);
    });

    it('delay stalls for at least six seconds and reports it honestly', async () => {
        const engine = makeEngine('delay', () => 0.01);
        const outcome = expectSuccess(await engine.handleRequest());
        expect(outcome.misbehaved).toBe(true);
        expect(outcome.latencyMs).toBeGreaterThanOrEqual(6000);
        expect(outcome.reportedLatencyMs).toBe(outcome.latencyMs);
    });

    it('lie-latency is slow but reports its baseline', async () => {
        const engine = makeEngine('lie-latency', () => 0.01);
        const outcome = expectSuccess(await engine.handleRequest());
        expect(outcome.latencyMs).toBeGreaterThanOrEqual(3000);
        expect(outcome.reportedLatencyMs).toBe(engine.profile.baseLatencyMs);
        expect(outcome.payload.processed_in).toBe(`${(engine.profile.baseLatencyMs / 1000).toFixed(3)}s`);
    });

    it('crash is permanent', async () => {
        const engine = makeEngine('crash', () => 0.0001);
        await expect(engine.handleRequest()).rejects.toBeInstanceOf(NodeCrashedError);
        expect(engine.isCrashed).toBe(true);
        await expect(engine.handleRequest()).rejects.toThrow('node-2 crashed');
        expect(engine.totalRequests).toBe(1);
        expect(engine.health().status).toBe('crashed');
    });

    it('numbers concurrent requests without gaps or repeats', async () => {
        const engine = new NodeFaultEngine({
            id: 3,
            faultClass: 'benign',
            random: mulberry32(21),
            sleep: () => new Promise<void>((resolve) => setImmediate(resolve)),
            workloadIterations: 10,
        });
        const outcomes = await Promise.all(Array.from({ length: 50 }, () => engine.handleRequest()));

        expect(engine.totalRequests).toBe(50);
        const numbers = outcomes.map((o) => o.payload.request_num).sort((a, b) => a - b);
        expect(numbers).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    });

    it('keeps gauges in range', async () => {
        const engine = makeEngine('benign', mulberry32(4));
        for (let i = 0; i < 50; i++) {
            await engine.handleRequest();
            const { cpuPercent, memoryMb } = engine.getGauges();
            expect(cpuPercent).toBeGreaterThanOrEqual(0);
            expect(cpuPercent).toBeLessThanOrEqual(100);
            expect(memoryMb).toBeGreaterThanOrEqual(0);
        }
    });
});

describe('loadFactor and health', () => {
    it('oscillates within the profile variation when no spike is drawn', () => {
        const engine = makeEngine('benign', () => 0.99);
        const amplitude = engine.profile.workloadVariation / 2;
        for (let t = 0; t < 60_000; t += 5_000) {
            const lf = engine.loadFactor(START + t);
            expect(lf).toBeGreaterThanOrEqual(1 - amplitude);
            expect(lf).toBeLessThanOrEqual(1 + amplitude);
        }
    });

    it('reports uptime in whole seconds', () => {
        const clock = makeClock();
        const engine = makeEngine('delay', mulberry32(1), clock);
        clock.advance(12_750);
        expect(engine.health()).toEqual({
            node: 'node-2',
            status: 'healthy',
            uptime_seconds: 12,
            fault_type: 'delay',
            total_requests: 0,
        });
    });
});
