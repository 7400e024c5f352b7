// ========================================
// Trust Classifier - capability + implementations
// ========================================

import path from 'path';
import fs from 'fs-extra';
import { parseFaultClass } from '../config.js';
import { ClassifierError, errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type { ClassProbabilities, Observation } from '../types.js';

const log = createLogger('Classifier');

export const BENIGN_LABEL = 'benign';

export const FEATURE_ORDER = ['latency_ms', 'error_500_count', 'cpu_usage_rate', 'resident_mem_mb'] as const;

export const ARTIFACT_FILES = {
    model: 'model.json',
    scaler: 'feature_scaler.json',
    encoder: 'label_encoder.json',
} as const;

export function featureVector(observation: Observation): number[] {
    return [
        observation.avgLatencySeconds * 1000,
        observation.errorCount,
        observation.cpuUsageRate,
        observation.memoryMb,
    ];
}

export interface TrustClassifier {
    readonly name: string;
    /** False for the null classifier; the trust engine then runs degraded. */
    readonly available: boolean;
    /** Why an unavailable classifier is unavailable. */
    readonly reason?: string;
    predict(features: readonly number[]): Promise<ClassProbabilities>;
}

export class NullClassifier implements TrustClassifier {
    readonly name = 'none';
    readonly available = false;
    readonly reason: string;

    constructor(reason = 'no classifier configured') {
        this.reason = reason;
    }

    async predict(): Promise<ClassProbabilities> {
        throw new ClassifierError(`Classifier unavailable: ${this.reason}`);
    }
}

// ========================================
// Artifact-backed classifier
// ========================================

export interface ModelArtifact {
    type: 'multinomial-logistic';
    coefficients: number[][];
    intercepts: number[];
}

export interface ScalerArtifact {
    center: number[];
    scale: number[];
}

export interface LabelEncoderArtifact {
    classes: string[];
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

export function isModelArtifact(value: unknown): value is ModelArtifact {
    return (
        isRecord(value) &&
        value.type === 'multinomial-logistic' &&
        Array.isArray(value.coefficients) &&
        value.coefficients.every(isNumberArray) &&
        isNumberArray(value.intercepts)
    );
}

export function isScalerArtifact(value: unknown): value is ScalerArtifact {
    return isRecord(value) && isNumberArray(value.center) && isNumberArray(value.scale);
}

export function isLabelEncoderArtifact(value: unknown): value is LabelEncoderArtifact {
    return isRecord(value) && Array.isArray(value.classes) && value.classes.every((c) => typeof c === 'string');
}

export function softmax(logits: readonly number[]): number[] {
    const max = Math.max(...logits);
    const exps = logits.map((l) => Math.exp(l - max));
    const total = exps.reduce((a, b) => a + b, 0);
    return exps.map((e) => e / total);
}

/**
 * Scaled features -> linear logits per class -> softmax.
 */
export class ArtifactClassifier implements TrustClassifier {
    readonly name = 'artifact';
    readonly available = true;

    constructor(
        private readonly model: ModelArtifact,
        private readonly scaler: ScalerArtifact,
        private readonly encoder: LabelEncoderArtifact
    ) {
        const width = FEATURE_ORDER.length;
        const classes = encoder.classes.length;
        if (scaler.center.length !== width || scaler.scale.length !== width) {
            throw new ClassifierError(`Scaler expects ${width} features`);
        }
        if (model.coefficients.length !== classes || model.intercepts.length !== classes) {
            throw new ClassifierError(`Model has ${model.coefficients.length} rows for ${classes} classes`);
        }
        if (model.coefficients.some((row) => row.length !== width)) {
            throw new ClassifierError(`Model rows must have ${width} coefficients`);
        }
        if (!encoder.classes.includes(BENIGN_LABEL)) {
            throw new ClassifierError(`Label encoder has no "${BENIGN_LABEL}" class`);
        }
        if (new Set(encoder.classes).size !== classes) {
            throw new ClassifierError(`Label encoder repeats a class: ${encoder.classes.join(', ')}`);
        }
    }

    get classes(): readonly string[] {
        return this.encoder.classes;
    }

    scale(features: readonly number[]): number[] {
        return features.map((x, i) => {
            const s = this.scaler.scale[i];
            return (x - this.scaler.center[i]) / (s === 0 ? 1 : s);
        });
    }

    async predict(features: readonly number[]): Promise<ClassProbabilities> {
        if (features.length !== FEATURE_ORDER.length) {
            throw new ClassifierError(`Expected ${FEATURE_ORDER.length} features, got ${features.length}`);
        }
        const x = this.scale(features);
        const logits = this.model.coefficients.map(
            (row, k) => row.reduce((acc, w, i) => acc + w * x[i], this.model.intercepts[k])
        );
        const probs = softmax(logits);
        return Object.freeze(Object.fromEntries(this.encoder.classes.map((label, k) => [label, probs[k]])));
    }
}

async function readArtifact<T>(file: string, guard: (value: unknown) => value is T): Promise<T> {
    const raw: unknown = await fs.readJSON(file);
    if (!guard(raw)) throw new ClassifierError(`Malformed artifact: ${path.basename(file)}`);
    return raw;
}

/**
 * Encoder labels go through the same aliases as fault assignment, so `500-error` reads as `error-500`.
 */
export function normalizeEncoder(encoder: LabelEncoderArtifact): LabelEncoderArtifact {
    return { classes: encoder.classes.map((label) => parseFaultClass(label) ?? label) };
}

export interface LoadClassifierOptions {
    /** Must be one of the encoder's classes when set. */
    primaryFaultClass?: string | null;
}

/**
 * Missing, malformed or mislabelled artifacts are a valid condition: the null classifier
 * comes back with the reason and routing degrades to round-robin.
 */
export async function loadClassifier(dir: string, options: LoadClassifierOptions = {}): Promise<TrustClassifier> {
    const files = {
        model: path.join(dir, ARTIFACT_FILES.model),
        scaler: path.join(dir, ARTIFACT_FILES.scaler),
        encoder: path.join(dir, ARTIFACT_FILES.encoder),
    };

    const missing: string[] = [];
    for (const file of Object.values(files)) {
        if (!(await fs.pathExists(file))) missing.push(path.basename(file));
    }
    if (missing.length > 0) {
        return new NullClassifier(`missing artifacts in ${dir}: ${missing.join(', ')}`);
    }

    let classifier: ArtifactClassifier;
    try {
        classifier = new ArtifactClassifier(
            await readArtifact(files.model, isModelArtifact),
            await readArtifact(files.scaler, isScalerArtifact),
            normalizeEncoder(await readArtifact(files.encoder, isLabelEncoderArtifact))
        );
    } catch (error: unknown) {
        return new NullClassifier(`failed to load artifacts: ${errorMessage(error)}`);
    }

    const primary = options.primaryFaultClass;
    if (primary && !classifier.classes.includes(primary)) {
        return new NullClassifier(`primary fault class "${primary}" is not one of ${classifier.classes.join(', ')}`);
    }

    log.info(`✓ Loaded classifier from ${dir} (classes: ${classifier.classes.join(', ')})`);
    return classifier;
}

/**
 * Probability of misbehaving: the primary class if one is named, else all non-benign mass.
 */
export function faultyProbability(probabilities: ClassProbabilities, primaryClass: string | null = null): number {
    if (primaryClass) return probabilities[primaryClass] ?? 0;
    return Object.entries(probabilities)
        .filter(([label]) => label !== BENIGN_LABEL)
        .reduce((sum, [, p]) => sum + p, 0);
}
