// ========================================
// Trust LB Testbed - Seeded Randomness
// ========================================

/** Returns a float in [0, 1). */
export type Random = () => number;

export function mulberry32(seed: number): Random {
    let t = seed >>> 0;
    return () => {
        t += 0x6d2b79f5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

export function uniform(rng: Random, min: number, max: number): number {
    return min + rng() * (max - min);
}

/**
 * Box-Muller transform.
 */
export function gaussian(rng: Random, mean: number, stdDev: number): number {
    let u = 0;
    while (u === 0) u = rng();
    const v = rng();
    const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    return mean + z * stdDev;
}

export function chance(rng: Random, probability: number): boolean {
    return rng() < probability;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

/**
 * Fisher-Yates over a copy.
 */
export function shuffle<T>(items: readonly T[], rng: Random): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
        const j = Math.floor(rng() * (i + 1));
        [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
}
