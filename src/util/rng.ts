import seedrandom from 'seedrandom';

/**
 * Source of uniformly distributed integers.
 * `below(bound)` returns an integer in [0, bound) for any integer bound >= 1.
 */
export interface UniformSource {
    below(bound: number): number;
}

/**
 * Seeded random number generator for reproducible sample streams.
 */
export class SeededRng implements UniformSource {
    private rng: seedrandom.PRNG;

    constructor(seed: number | string) {
        this.rng = seedrandom(String(seed));
    }

    /** Returns a random float in [0, 1). */
    random(): number {
        return this.rng.double();
    }

    /** Returns a random integer in [min, max] (inclusive). */
    int(min: number, max: number): number {
        return Math.floor(this.random() * (max - min + 1)) + min;
    }

    below(bound: number): number {
        if (!Number.isSafeInteger(bound) || bound < 1) {
            throw new RangeError(`Bound must be a positive integer, got ${bound}`);
        }
        return this.int(0, bound - 1);
    }
}
