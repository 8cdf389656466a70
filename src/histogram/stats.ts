import type { Bin } from '../sampler/histogram.js';

export interface BinComparison {
    label: number;
    expected: number; // proportion in the supplied histogram
    observed: number; // proportion in the sampled values
    diff: number; // observed - expected
}

/**
 * Rounds a raw value to the nearest multiple of `binWidth`, halves rounding up.
 */
export function rebucket(value: number, binWidth: number): number {
    return binWidth * Math.floor((value + Math.floor(binWidth / 2)) / binWidth);
}

/**
 * Running re-bucketed count of values, for streams too long to keep in memory.
 */
export class Tally {
    private counts = new Map<number, number>();
    private total = 0;

    constructor(readonly binWidth: number) {}

    add(value: number): void {
        const label = rebucket(value, this.binWidth);
        this.counts.set(label, (this.counts.get(label) ?? 0) + 1);
        this.total++;
    }

    get size(): number {
        return this.total;
    }

    /** Counted bins, ordered by label. */
    bins(): Bin[] {
        return [...this.counts.entries()].sort(([a], [b]) => a - b).map(([label, count]) => ({ label, count }));
    }
}

/**
 * Builds a histogram of `values` re-bucketed at `binWidth`, ordered by label.
 */
export function histogramOf(values: Iterable<number>, binWidth: number): Bin[] {
    const tally = new Tally(binWidth);
    for (const value of values) {
        tally.add(value);
    }
    return tally.bins();
}

/**
 * Share of the total count held by each label.
 */
export function proportions(bins: readonly Bin[]): Map<number, number> {
    const total = bins.reduce((sum, b) => sum + b.count, 0);
    const result = new Map<number, number>();
    for (const bin of bins) {
        result.set(bin.label, total === 0 ? 0 : bin.count / total);
    }
    return result;
}

/**
 * Compares two histograms label by label. Labels present in only one side get 0 on the other.
 */
export function compareHistograms(expected: readonly Bin[], observed: readonly Bin[]): BinComparison[] {
    const expectedProps = proportions(expected);
    const observedProps = proportions(observed);
    const labels = [...new Set([...expectedProps.keys(), ...observedProps.keys()])].sort((a, b) => a - b);

    return labels.map((label) => {
        const e = expectedProps.get(label) ?? 0;
        const o = observedProps.get(label) ?? 0;
        return { label, expected: e, observed: o, diff: o - e };
    });
}
