/**
 * @module core/random
 * @description Random sources for problem generation
 *
 * Anything that draws random numbers takes a {@link RandomSource}, so a run can
 * be replayed by passing a seeded generator instead of `Math.random`.
 */

// ==================== Types ====================

/**
 * Source of uniform floats in [0, 1)
 */
export interface RandomSource {
    random(): number;
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return uniform(this, min, max);
    }

    getState(): number {
        return this.state;
    }

    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

/**
 * Unseeded source backed by `Math.random`
 */
export const mathRandomSource: RandomSource = {
    random: () => Math.random(),
};

// ==================== Utility Functions ====================

/**
 * Draw a float in [min, max) from any source
 */
export function uniform(source: RandomSource, min: number, max: number): number {
    return source.random() * (max - min) + min;
}
