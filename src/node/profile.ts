// ========================================
// Node Profile - seeded per-node baseline
// ========================================

import { mulberry32, uniform } from '../random.js';
import type { Random } from '../random.js';
import type { NodeId, NodeProfile } from '../types.js';

export function profileSeed(id: NodeId): number {
    return id * 7919 + 1;
}

/**
 * Same id, same profile. The generator is private to this call.
 */
export function drawProfile(id: NodeId): NodeProfile {
    const rng: Random = mulberry32(profileSeed(id));
    return Object.freeze({
        baseLatencyMs: uniform(rng, 10, 50),
        baseCpuLoad: uniform(rng, 0.2, 0.5),
        workloadVariation: uniform(rng, 0.3, 0.7),
        jitterMs: uniform(rng, 2, 15),
        packetLoss: uniform(rng, 0.001, 0.02),
        stability: uniform(rng, 0.7, 1.0),
    });
}
