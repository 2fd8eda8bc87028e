export type RandomSource = () => number;

/**
 * Mulberry32 - small deterministic PRNG. Each call site owns its generator.
 */
export function mulberry32(seed: number): RandomSource {
    let state = seed >>> 0;
    return function () {
        let t = (state += 0x6d2b79f5);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Box-Muller transform for N(0,1)
 */
export function randn(rng: RandomSource): number {
    let u = 0, v = 0;
    while (u === 0) u = rng();
    while (v === 0) v = rng();
    return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
    const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
    return items[index];
}
