/**
 * Seeded random source for reproducible noisy demand.
 */
export interface Rng {
    /** Uniform in [0, 1). */
    next(): number;
    /** Normally distributed draw. */
    normal(mean?: number, stdDev?: number): number;
}

/** Mulberry32 stream; deterministic for a given seed, not for crypto. */
export function createRng(seed: number): Rng {
    let state = seed >>> 0;

    function next(): number {
        state += 0x6d2b79f5;
        let mixed = state;
        mixed = Math.imul(mixed ^ (mixed >>> 15), mixed | 1);
        mixed ^= mixed + Math.imul(mixed ^ (mixed >>> 7), mixed | 61);
        return ((mixed ^ (mixed >>> 14)) >>> 0) / 4294967296;
    }

    /** Box-Muller transform over two uniform draws. */
    function normal(mean = 0, stdDev = 1): number {
        const radius = Math.sqrt(-2 * Math.log(Math.max(next(), Number.EPSILON)));
        const angle = 2 * Math.PI * next();
        return mean + radius * Math.cos(angle) * stdDev;
    }

    return { next, normal };
}
