import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadClassifier } from './balancer/classifier.js';
import { createLocalCluster } from './cluster.js';
import type { LocalClusterOptions } from './cluster.js';
import { PROJECT_ROOT } from './config.js';
import { mulberry32 } from './random.js';
import type { FaultClass, NodeId } from './types.js';

const FAULTY: NodeId[] = [4, 9, 13];
const faults = new Map<NodeId, FaultClass>(FAULTY.map((id) => [id, 'error-500']));

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

function fifteenNodes(overrides: Partial<LocalClusterOptions> = {}) {
    return createLocalCluster({
        nodeCount: 15,
        faults,
        randomFor: (id) => mulberry32(id),
        workloadIterations: 10,
        sleep: async () => {},
        ...overrides,
    });
}

describe('local cluster without a classifier', () => {
    it('spreads 1500 requests evenly and keeps every weight at 1.0', async () => {
        const cluster = fifteenNodes();
        await cluster.trust.refresh();
        const results = await cluster.run(1500);

        const perNode = new Map<NodeId, number>();
        for (const { event } of results) {
            perNode.set(event.nodeId, (perNode.get(event.nodeId) ?? 0) + 1);
        }
        for (let id = 1; id <= 15; id++) {
            expect(perNode.get(id)).toBe(100);
        }

        expect(cluster.trust.mode).toBe('round-robin');
        expect(results.every(({ event }) => event.mode === 'round-robin')).toBe(true);
        expect(new Set(cluster.trust.routing.current().weights.values())).toEqual(new Set([1]));
    });

    it('only the faulty nodes return errors', async () => {
        const cluster = fifteenNodes();
        const results = await cluster.run(1500);
        const failing = new Set(results.filter(({ event }) => event.status === 500).map(({ event }) => event.nodeId));
        expect(Array.from(failing).sort((a, b) => a - b)).toEqual(FAULTY);
    });
});

describe('local cluster with a trained classifier', () => {
    it('demotes the error-500 nodes and routes around them', async () => {
        const classifier = await loadClassifier(path.join(PROJECT_ROOT, 'test-fixtures', 'artifacts'));
        const cluster = fifteenNodes({ classifier, random: mulberry32(99) });

        // Warm-up: round-robin until the first refresh lands
        await cluster.run(450);
        const table = await cluster.trust.refresh();

        expect(table.mode).toBe('trust-weighted');
        for (let id = 1; id <= 15; id++) {
            expect(table.weights.get(id)).toBe(FAULTY.includes(id) ? 0.1 : 1.0);
        }

        const results = await cluster.run(2000);
        const toFaulty = results.filter(({ event }) => FAULTY.includes(event.nodeId)).length;
        // 0.3 of 12.3 total weight
        expect(toFaulty / 2000).toBeLessThan(0.05);
        expect(results.every(({ event }) => event.mode === 'trust-weighted')).toBe(true);
    });
});

describe('background loops', () => {
    it('stop drains dispatches and refreshes', async () => {
        const cluster = fifteenNodes();
        cluster.start(50, 5);
        await vi.waitFor(() => expect(cluster.ledger.recent().length).toBeGreaterThan(10));
        await cluster.stop();
        expect(cluster.dispatcher.pending).toBe(0);
        const settled = cluster.ledger.recent().length;
        await new Promise((r) => setTimeout(r, 30));
        expect(cluster.ledger.recent()).toHaveLength(settled);
    });
});
