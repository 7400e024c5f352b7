// ========================================
// Fault Behaviors - one handler per fault class
// ========================================

import { gaussian, uniform } from '../random.js';
import type { Random } from '../random.js';
import type { FaultClass, NodeProfile } from '../types.js';

export type FaultDecision =
    | { kind: 'proceed'; stallMs: number; workloadMultiplier: number; lie: boolean; misbehaved: boolean }
    | { kind: 'error' }
    | { kind: 'crash' };

export interface FaultContext {
    misbehave: boolean;
    rng: Random;
    profile: NodeProfile;
}

export type FaultBehavior = (ctx: FaultContext) => FaultDecision;

export const BASE_FAULT_PROBABILITY: { readonly [K in FaultClass]: number } = {
    'benign': 0,
    'crash': 0.001,
    'delay': 0.5,
    'error-500': 0.4,
    'lie-latency': 0.7,
};

/** Upper bound of the time ramp, as a multiple of the base probability. */
export const FAULT_RAMP_CEILING = 1.5;

export const DELAY_STALL_MS = { min: 6000, max: 7000 } as const;
export const LIE_STALL_MS = { min: 3000, max: 4000 } as const;
export const LIE_WORKLOAD_MULTIPLIER = 5;

const PROCEED: FaultDecision = { kind: 'proceed', stallMs: 0, workloadMultiplier: 1, lie: false, misbehaved: false };

export const FAULT_BEHAVIORS: { readonly [K in FaultClass]: FaultBehavior } = {
    'benign': () => PROCEED,

    'error-500': ({ misbehave }) => (misbehave ? { kind: 'error' } : PROCEED),

    'delay': ({ misbehave, rng, profile }) => {
        if (!misbehave) return PROCEED;
        const jitter = Math.abs(gaussian(rng, 0, profile.jitterMs));
        return {
            kind: 'proceed',
            stallMs: uniform(rng, DELAY_STALL_MS.min, DELAY_STALL_MS.max) + jitter,
            workloadMultiplier: 1,
            lie: false,
            misbehaved: true,
        };
    },

    'crash': ({ misbehave }) => (misbehave ? { kind: 'crash' } : PROCEED),

    // Slow for real, reported as fast
    'lie-latency': ({ misbehave, rng }) => {
        if (!misbehave) return PROCEED;
        return {
            kind: 'proceed',
            stallMs: uniform(rng, LIE_STALL_MS.min, LIE_STALL_MS.max),
            workloadMultiplier: LIE_WORKLOAD_MULTIPLIER,
            lie: true,
            misbehaved: true,
        };
    },
};
