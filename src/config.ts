// ========================================
// Trust LB Testbed - Configuration
// ========================================

import path from 'path';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors.js';
import { createLogger } from './log.js';
import { shuffle } from './random.js';
import type { Random } from './random.js';
import { isFaultClass } from './types.js';
import type { FaultClass, NodeId, WeightBands } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/ and dist/ both sit directly under the project root
export const PROJECT_ROOT = path.resolve(__dirname, '..');
export const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, 'config', 'default-config.json');

const log = createLogger('Config');

export type Env = Record<string, string | undefined>;

export interface MemoryModel {
    baseMb: number;
    leakPerRequestMb: number;
    resetWindow: number;
}

export interface NodeDefaults {
    port: number;
    rampWindowSeconds: number;
    oscillationPeriodSeconds: number;
    workloadIterations: number;
    memory: MemoryModel;
}

export interface BalancerDefaults {
    port: number;
    nodeCount: number;
    nodeUrlTemplate: string;
    prometheusUrl: string;
    artifactsDir: string;
    refreshIntervalMs: number;
    dispatchIntervalMs: number;
    requestTimeoutMs: number;
    queryTimeoutMs: number;
    windowSeconds: number;
    primaryFaultClass: FaultClass | null;
    bands: WeightBands;
}

export interface TestbedDefaults {
    node: NodeDefaults;
    balancer: BalancerDefaults;
}

export interface NodeConfig extends NodeDefaults {
    id: NodeId;
    faultClass: FaultClass;
}

export interface BalancerConfig extends BalancerDefaults {
    nodeIds: NodeId[];
    faultMap: Map<NodeId, FaultClass>;
}

// ========================================
// Parsing helpers
// ========================================

/**
 * Accepts `node-7` or `7`.
 */
export function parseNodeId(value: string): NodeId {
    const match = value.trim().match(/^(?:node-)?(\d+)$/);
    if (!match) throw new ConfigError(`Invalid node id: "${value}"`);
    const id = parseInt(match[1], 10);
    if (id < 1) throw new ConfigError(`Node ids start at 1: "${value}"`);
    return id;
}

const FAULT_ALIASES: Record<string, FaultClass> = {
    '500-error': 'error-500',
    'error500': 'error-500',
    'lie': 'lie-latency',
};

export function parseFaultClass(value: string): FaultClass | null {
    const normalized = value.trim().toLowerCase();
    if (isFaultClass(normalized)) return normalized;
    return FAULT_ALIASES[normalized] ?? null;
}

function positiveNumber(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive number, got "${raw}"`);
    }
    return value;
}

function requirePositive(name: string, value: unknown): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive number`);
    }
    return value;
}

function validateBands(bands: WeightBands): WeightBands {
    const { suspiciousAt, faultyAt } = bands;
    if (!(suspiciousAt > 0 && suspiciousAt < faultyAt && faultyAt <= 1)) {
        throw new ConfigError(`Band cut points must satisfy 0 < suspiciousAt < faultyAt <= 1`);
    }
    if (!(bands.trustedWeight >= bands.suspiciousWeight && bands.suspiciousWeight >= bands.faultyWeight && bands.faultyWeight >= 0)) {
        throw new ConfigError('Band weights must be non-increasing and non-negative');
    }
    return bands;
}

// ========================================
// Loading
// ========================================

export function readDefaults(configPath: string = DEFAULT_CONFIG_PATH): TestbedDefaults {
    const raw: TestbedDefaults = fs.readJSONSync(configPath);
    requirePositive('node.rampWindowSeconds', raw.node.rampWindowSeconds);
    requirePositive('node.workloadIterations', raw.node.workloadIterations);
    requirePositive('node.memory.resetWindow', raw.node.memory.resetWindow);
    requirePositive('balancer.refreshIntervalMs', raw.balancer.refreshIntervalMs);
    requirePositive('balancer.dispatchIntervalMs', raw.balancer.dispatchIntervalMs);
    validateBands(raw.balancer.bands);
    return raw;
}

/**
 * Reads `NODE_<n>_FAULT` entries. Unknown values fall back to benign.
 */
export function readFaultAssignments(env: Env): Map<NodeId, FaultClass> {
    const assignments = new Map<NodeId, FaultClass>();
    for (const [key, value] of Object.entries(env)) {
        const match = key.match(/^NODE_(\d+)_FAULT$/);
        if (!match || value === undefined) continue;
        const id = parseInt(match[1], 10);
        const faultClass = parseFaultClass(value);
        if (!faultClass) {
            log.warn(`Unknown fault class "${value}" for node-${id}, using benign`);
            assignments.set(id, 'benign');
            continue;
        }
        assignments.set(id, faultClass);
    }
    return assignments;
}

export function loadNodeConfig(env: Env = process.env, defaults: TestbedDefaults = readDefaults()): NodeConfig {
    const id = parseNodeId(env.NODE_ID || 'node-1');
    const faults = readFaultAssignments(env);
    return {
        ...defaults.node,
        id,
        port: positiveNumber('PORT', env.PORT, defaults.node.port),
        rampWindowSeconds: positiveNumber('RAMP_WINDOW_SECONDS', env.RAMP_WINDOW_SECONDS, defaults.node.rampWindowSeconds),
        workloadIterations: positiveNumber('WORKLOAD_ITERATIONS', env.WORKLOAD_ITERATIONS, defaults.node.workloadIterations),
        faultClass: faults.get(id) ?? 'benign',
    };
}

export function loadBalancerConfig(env: Env = process.env, defaults: TestbedDefaults = readDefaults()): BalancerConfig {
    const base = defaults.balancer;
    const nodeCount = positiveNumber('NODE_COUNT', env.NODE_COUNT, base.nodeCount);
    let primaryFaultClass = base.primaryFaultClass;
    if (env.TRUST_PRIMARY_CLASS) {
        primaryFaultClass = parseFaultClass(env.TRUST_PRIMARY_CLASS);
        if (!primaryFaultClass) throw new ConfigError(`Unknown TRUST_PRIMARY_CLASS "${env.TRUST_PRIMARY_CLASS}"`);
    }

    return {
        ...base,
        port: positiveNumber('PORT', env.PORT, base.port),
        nodeCount,
        nodeUrlTemplate: env.NODE_URL_TEMPLATE || base.nodeUrlTemplate,
        prometheusUrl: env.PROMETHEUS_URL || base.prometheusUrl,
        artifactsDir: path.resolve(PROJECT_ROOT, env.ARTIFACTS_DIR || base.artifactsDir),
        refreshIntervalMs: positiveNumber('REFRESH_INTERVAL_MS', env.REFRESH_INTERVAL_MS, base.refreshIntervalMs),
        dispatchIntervalMs: positiveNumber('DISPATCH_INTERVAL_MS', env.DISPATCH_INTERVAL_MS, base.dispatchIntervalMs),
        requestTimeoutMs: positiveNumber('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, base.requestTimeoutMs),
        queryTimeoutMs: positiveNumber('QUERY_TIMEOUT_MS', env.QUERY_TIMEOUT_MS, base.queryTimeoutMs),
        primaryFaultClass,
        bands: validateBands({ ...base.bands }),
        nodeIds: Array.from({ length: nodeCount }, (_, i) => i + 1),
        faultMap: readFaultAssignments(env),
    };
}

export function nodeUrl(template: string, id: NodeId): string {
    return template.replace('{id}', String(id));
}

// ========================================
// Random fault assignment
// ========================================

/**
 * Picks `faultyCount` of `total` nodes and gives each a class drawn from `classes`.
 * Every other node is benign.
 */
export function assignRandomFaults(
    total: number,
    faultyCount: number,
    classes: readonly FaultClass[],
    rng: Random
): Map<NodeId, FaultClass> {
    if (faultyCount > total) throw new ConfigError(`Cannot pick ${faultyCount} faulty nodes out of ${total}`);
    if (faultyCount > 0 && classes.length === 0) throw new ConfigError('No fault classes to assign');

    const ids = Array.from({ length: total }, (_, i) => i + 1);
    const assignments = new Map<NodeId, FaultClass>(ids.map((id) => [id, 'benign']));
    for (const id of shuffle(ids, rng).slice(0, faultyCount)) {
        assignments.set(id, classes[Math.floor(rng() * classes.length)]);
    }
    return assignments;
}

export function renderFaultEnv(assignments: Map<NodeId, FaultClass>): string {
    return Array.from(assignments.entries())
        .sort(([a], [b]) => a - b)
        .map(([id, faultClass]) => `NODE_${id}_FAULT=${faultClass}`)
        .join('\n');
}
