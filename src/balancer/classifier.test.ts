import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PROJECT_ROOT, parseFaultClass } from '../config.js';
import { ClassifierError } from '../errors.js';
import {
    ArtifactClassifier,
    NullClassifier,
    faultyProbability,
    featureVector,
    loadClassifier,
    normalizeEncoder,
    softmax,
} from './classifier.js';
import type { TrustClassifier } from './classifier.js';

const FIXTURES = path.join(PROJECT_ROOT, 'test-fixtures');

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('featureVector', () => {
    it('orders features and converts latency to milliseconds', () => {
        expect(
            featureVector({
                nodeId: 1,
                avgLatencySeconds: 0.08,
                errorCount: 2,
                cpuUsageRate: 0.3,
                memoryMb: 50,
                gaps: [],
                observedAt: 0,
            })
        ).toEqual([80, 2, 0.3, 50]);
    });
});

describe('softmax', () => {
    it('sums to one and keeps the ordering', () => {
        const out = softmax([2, 1.5, 0]);
        expect(out.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 12);
        expect(out[0]).toBeGreaterThan(out[1]);
        expect(out[1]).toBeGreaterThan(out[2]);
    });

    it('survives large logits', () => {
        expect(softmax([1000, 0])[0]).toBeCloseTo(1, 12);
    });
});

describe('loadClassifier', () => {
    let classifier: TrustClassifier;

    beforeEach(async () => {
        classifier = await loadClassifier(path.join(FIXTURES, 'artifacts'));
    });

    it('loads the three artifacts', () => {
        expect(classifier.available).toBe(true);
        expect(classifier.name).toBe('artifact');
    });

    it('predicts benign for a baseline observation', async () => {
        const probabilities = await classifier.predict([30, 0, 0.3, 50]);
        expect(Object.keys(probabilities)).toEqual(['benign', 'delay', 'error-500']);
        // logits [3, 0, 0]
        expect(probabilities.benign).toBeCloseTo(0.90944, 4);
        expect(faultyProbability(probabilities)).toBeCloseTo(0.09056, 4);
    });

    it('gives a moderately slow node a suspicious probability', async () => {
        // logits [2, 1.5, 0]
        const probabilities = await classifier.predict([80, 0, 0.3, 50]);
        expect(faultyProbability(probabilities)).toBeCloseTo(0.42591, 4);
        expect(faultyProbability(probabilities, 'delay')).toBeCloseTo(0.34821, 4);
    });

    it('flags a node with errors as faulty', async () => {
        const probabilities = await classifier.predict([30, 5, 0.3, 50]);
        expect(probabilities['error-500']).toBeGreaterThan(0.99);
    });

    it('falls back to the null classifier when artifacts are missing', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trust-lb-'));
        try {
            const fallback = await loadClassifier(dir);
            expect(fallback.available).toBe(false);
            expect(fallback).toBeInstanceOf(NullClassifier);
            await expect(fallback.predict([0, 0, 0, 0])).rejects.toBeInstanceOf(ClassifierError);
        } finally {
            await fs.remove(dir);
        }
    });

    it('falls back to the null classifier for a malformed model', async () => {
        const fallback = await loadClassifier(path.join(FIXTURES, 'malformed-artifacts'));
        expect(fallback.available).toBe(false);
        if (!(fallback instanceof NullClassifier)) throw new Error('expected NullClassifier');
        expect(fallback.reason).toBe('failed to load artifacts: Malformed artifact: model.json');
    });
});

describe('label encoder checks', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trust-lb-'));
        await fs.copy(path.join(FIXTURES, 'artifacts', 'model.json'), path.join(dir, 'model.json'));
        await fs.copy(path.join(FIXTURES, 'artifacts', 'feature_scaler.json'), path.join(dir, 'feature_scaler.json'));
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('maps aliased labels onto fault class names', async () => {
        expect(normalizeEncoder({ classes: ['benign', 'delay', '500-error'] })).toEqual({
            classes: ['benign', 'delay', 'error-500'],
        });

        await fs.writeJSON(path.join(dir, 'label_encoder.json'), { classes: ['benign', 'delay', '500-error'] });
        const classifier = await loadClassifier(dir, { primaryFaultClass: parseFaultClass('500-error') });
        expect(classifier.available).toBe(true);

        const probabilities = await classifier.predict([30, 5, 0.3, 50]);
        expect(faultyProbability(probabilities, parseFaultClass('500-error'))).toBeGreaterThan(0.99);
    });

    it('refuses an encoder without a benign class', async () => {
        await fs.writeJSON(path.join(dir, 'label_encoder.json'), { classes: ['healthy', 'delay', 'error-500'] });
        const classifier = await loadClassifier(dir);
        expect(classifier.available).toBe(false);
        expect(classifier.reason).toBe('failed to load artifacts: Label encoder has no "benign" class');
    });

    it('refuses an encoder that repeats a class once aliases are applied', async () => {
        await fs.writeJSON(path.join(dir, 'label_encoder.json'), { classes: ['benign', 'error-500', '500-error'] });
        const classifier = await loadClassifier(dir);
        expect(classifier.available).toBe(false);
        expect(classifier.reason).toBe(
            'failed to load artifacts: Label encoder repeats a class: benign, error-500, error-500'
        );
    });

    it('refuses a primary class the encoder does not know', async () => {
        await fs.copy(path.join(FIXTURES, 'artifacts', 'label_encoder.json'), path.join(dir, 'label_encoder.json'));
        const classifier = await loadClassifier(dir, { primaryFaultClass: 'crash' });
        expect(classifier.available).toBe(false);
        expect(classifier.reason).toBe('primary fault class "crash" is not one of benign, delay, error-500');
    });
});

describe('ArtifactClassifier', () => {
    it('rejects mismatched dimensions', () => {
        expect(
            () =>
                new ArtifactClassifier(
                    { type: 'multinomial-logistic', coefficients: [[1, 0, 0, 0]], intercepts: [0] },
                    { center: [0, 0, 0, 0], scale: [1, 1, 1, 1] },
                    { classes: ['benign', 'delay'] }
                )
        ).toThrow(ClassifierError);
    });

    it('treats a zero scale as one', async () => {
        const classifier = new ArtifactClassifier(
            { type: 'multinomial-logistic', coefficients: [[0, 0, 0, 0], [1, 0, 0, 0]], intercepts: [0, 0] },
            { center: [0, 0, 0, 0], scale: [0, 1, 1, 1] },
            { classes: ['benign', 'delay'] }
        );
        expect(classifier.scale([2, 0, 0, 0])).toEqual([2, 0, 0, 0]);
        const probabilities = await classifier.predict([0, 0, 0, 0]);
        expect(probabilities.benign).toBeCloseTo(0.5, 12);
    });
});

describe('faultyProbability', () => {
    it('sums every non-benign class unless a primary class is named', () => {
        const probabilities = { benign: 0.5, delay: 0.3, 'error-500': 0.2 };
        expect(faultyProbability(probabilities)).toBeCloseTo(0.5, 12);
        expect(faultyProbability(probabilities, 'error-500')).toBe(0.2);
        expect(faultyProbability(probabilities, 'crash')).toBe(0);
    });
});
