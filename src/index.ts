export { HistogramSampler, rangeFor } from './sampler/histogram.js';
export type { Bin, BinInput, BinRange } from './sampler/histogram.js';
export { InvalidInputError } from './sampler/errors.js';
export type { InvalidInputCode } from './sampler/errors.js';
export { SeededRng } from './util/rng.js';
export type { UniformSource } from './util/rng.js';
export {
    parseHistogramText,
    parseHistogramJson,
    loadHistogram,
    inferBinWidth,
    HistogramParseError,
} from './histogram/parser.js';
export { rebucket, histogramOf, proportions, compareHistograms, Tally } from './histogram/stats.js';
export type { BinComparison } from './histogram/stats.js';
