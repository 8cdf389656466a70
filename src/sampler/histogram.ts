import { InvalidInputError } from './errors.js';
import type { UniformSource } from '../util/rng.js';

export interface Bin {
    readonly label: number;
    readonly count: number;
}

/** A bin as accepted by {@link HistogramSampler.fromBins}: a `[label, count]` pair or an object. */
export type BinInput = readonly [label: number, count: number] | Bin;

/** Half-open interval `[lo, hi)` of raw values. */
export interface BinRange {
    readonly lo: number;
    readonly hi: number;
}

/**
 * Range of raw values that round to `label` for the given bin width.
 *
 * Label 0 only covers `[0, floor(w/2))`, every other label covers exactly `w` values
 * starting at `label - floor(w/2)`.
 */
export function rangeFor(label: number, binWidth: number): BinRange {
    const half = Math.floor(binWidth / 2);
    if (label === 0) {
        return { lo: 0, hi: half };
    }
    const lo = label - half;
    return { lo, hi: lo + binWidth };
}

function toBin(entry: BinInput): Bin {
    const label = 'label' in entry ? entry.label : entry[0];
    const count = 'label' in entry ? entry.count : entry[1];
    if (!Number.isSafeInteger(label) || label < 0) {
        throw new InvalidInputError('entry', `Bin label must be a non-negative integer, got ${label}`);
    }
    if (!Number.isSafeInteger(count) || count < 0) {
        throw new InvalidInputError('entry', `Bin count must be a non-negative integer, got ${count} (label ${label})`);
    }
    return Object.freeze({ label, count });
}

/**
 * Samples integer values from a distribution approximated by a histogram.
 *
 * The histogram is a list of `(label, count)` bins where each original value was rounded to
 * the nearest multiple of the bin width before counting. Sampling first picks a bin with
 * probability proportional to its count, then a value uniformly within that bin's range.
 *
 * Bin 0 is narrower than the others (`[0, w/2)`). Histograms produced by rounding tend to
 * under-count it and over-count bin 1 by a few points at small widths; the supplied weights
 * are reproduced as given.
 *
 * Instances are immutable and keep no generator state; share one freely and pass a
 * {@link UniformSource} to every call.
 *
 * ```ts
 * const sampler = HistogramSampler.fromBins([[0, 100], [10, 80], [20, 40]], 10);
 * const rng = new SeededRng(42);
 * const votes = sampler.sampleMany(rng, 1000);
 * ```
 */
export class HistogramSampler {
    readonly bins: readonly Bin[];
    readonly binWidth: number;
    readonly totalWeight: number;
    /** Exclusive upper bound of every value this sampler can produce. */
    readonly upperBound: number;

    // cumulative[i] = sum of counts of bins[0..i]
    private readonly cumulative: readonly number[];

    private constructor(bins: readonly Bin[], binWidth: number, cumulative: readonly number[], upperBound: number) {
        this.bins = bins;
        this.binWidth = binWidth;
        this.cumulative = cumulative;
        this.totalWeight = cumulative[cumulative.length - 1];
        this.upperBound = upperBound;
        Object.freeze(this);
    }

    /**
     * Builds a sampler from histogram bins of width `binWidth`.
     *
     * Entries may come in any order. Labels must be unique multiples of `binWidth`; labels that
     * are missing between two present ones behave as bins with count 0.
     *
     * @throws {InvalidInputError} when the width is not a positive integer, there are no bins,
     * every count is 0, or a bin is malformed.
     */
    static fromBins(entries: Iterable<BinInput>, binWidth: number): HistogramSampler {
        if (!Number.isSafeInteger(binWidth) || binWidth <= 0) {
            throw new InvalidInputError('bin-width', `Bin width must be a positive integer, got ${binWidth}`);
        }

        const bins: Bin[] = [];
        for (const entry of entries) {
            bins.push(toBin(entry));
        }
        if (bins.length === 0) {
            throw new InvalidInputError('empty', 'Cannot build a sampler from an empty histogram');
        }
        bins.sort((a, b) => a.label - b.label);

        const cumulative: number[] = [];
        let total = 0;
        let upperBound = 0;
        for (let i = 0; i < bins.length; i++) {
            const bin = bins[i];
            if (i > 0 && bins[i - 1].label === bin.label) {
                throw new InvalidInputError('duplicate-label', `Duplicate bin label: ${bin.label}`);
            }
            if (bin.label % binWidth !== 0) {
                throw new InvalidInputError(
                    'label-spacing',
                    `Bin label ${bin.label} is not a multiple of bin width ${binWidth}`
                );
            }

            total += bin.count;
            if (!Number.isSafeInteger(total)) {
                throw new InvalidInputError('overflow', 'Total bin count exceeds the safe integer range');
            }
            cumulative.push(total);

            if (bin.count > 0) {
                const { lo, hi } = rangeFor(bin.label, binWidth);
                if (hi <= lo) {
                    throw new InvalidInputError(
                        'empty-range',
                        `Bin ${bin.label} has ${bin.count} observations but an empty range at width ${binWidth}`
                    );
                }
                if (!Number.isSafeInteger(hi)) {
                    throw new InvalidInputError('overflow', `Range of bin ${bin.label} exceeds the safe integer range`);
                }
                upperBound = hi;
            }
        }

        if (total === 0) {
            throw new InvalidInputError('zero-weight', 'Every bin has a count of 0');
        }

        return new HistogramSampler(Object.freeze(bins), binWidth, Object.freeze(cumulative), upperBound);
    }

    /** Range of raw values covered by `label` at this sampler's bin width. */
    rangeOf(label: number): BinRange {
        return rangeFor(label, this.binWidth);
    }

    /**
     * Stage 1: the bin owning selection point `r` in `[0, totalWeight)`.
     * Each bin owns a sub-range as wide as its count, in label order.
     */
    select(r: number): Bin {
        if (!Number.isInteger(r) || r < 0 || r >= this.totalWeight) {
            throw new RangeError(`Selection point must be an integer in [0, ${this.totalWeight}), got ${r}`);
        }

        // first index whose cumulative count exceeds r
        let lo = 0;
        let hi = this.cumulative.length - 1;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.cumulative[mid] > r) {
                hi = mid;
            } else {
                lo = mid + 1;
            }
        }
        return this.bins[lo];
    }

    /** Draws one value. Calls `rng.below` exactly twice. */
    sample(rng: UniformSource): number {
        const bin = this.select(rng.below(this.totalWeight));
        const { lo, hi } = this.rangeOf(bin.label);
        return lo + rng.below(hi - lo);
    }

    sampleMany(rng: UniformSource, n: number): number[] {
        if (!Number.isSafeInteger(n) || n < 0) {
            throw new RangeError(`Sample count must be a non-negative integer, got ${n}`);
        }
        const values = new Array<number>(n);
        for (let i = 0; i < n; i++) {
            values[i] = this.sample(rng);
        }
        return values;
    }

    /** Unbounded stream of samples. */
    *stream(rng: UniformSource): Generator<number, void, undefined> {
        while (true) {
            yield this.sample(rng);
        }
    }
}
