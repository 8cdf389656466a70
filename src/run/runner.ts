import type { LoadedConfig } from '../config.js';
import { loadHistogram, inferBinWidth } from '../histogram/parser.js';
import { Tally, compareHistograms } from '../histogram/stats.js';
import { HistogramSampler } from '../sampler/histogram.js';
import { SeededRng, UniformSource } from '../util/rng.js';
import type { SampleSummary, RunPhase } from './summary.js';

import { createWriteStream } from 'node:fs';
import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

// values per sampleMany() call and per written chunk
const CHUNK_SIZE = 1024;

/**
 * Loads the histogram, builds the sampler and streams the configured number of samples.
 */
export class SampleRunner {
    private config: LoadedConfig;
    private version: string;

    constructor(config: LoadedConfig, version: string = 'unknown') {
        this.config = config;
        this.version = version;
    }

    /**
     * Runs the complete sampling process.
     *
     * Values go to `out` when given, otherwise to `output.path` or stdout. Every target but
     * stdout is ended once the samples are written. Failures are recorded in `fatalFailure`
     * with the phase they happened in; nothing is written when loading or building fails.
     */
    async run(out?: Writable): Promise<SampleSummary> {
        const summary: SampleSummary = {
            version: this.version,
            runId: this.config.runId,
            seed: this.config.seed,
            seedSource: this.config.seedSource,
            histogramPath: this.config.histogram,
            binWidth: null,
            totalWeight: null,
            upperBound: null,
            samplesRequested: this.config.samples,
            samplesWritten: 0,
            startTime: new Date().toISOString(),
            endTime: '',
            bins: [],
            fatalFailure: null,
        };

        let phase: RunPhase = 'load';
        const progress = { written: 0 };
        try {
            const bins = loadHistogram(this.config.histogram);
            console.error(`📊 Loaded ${bins.length} bins from ${this.config.histogram}`);

            let binWidth = this.config.binWidth;
            if (binWidth === undefined) {
                binWidth = inferBinWidth(bins);
                console.error(`   Inferred bin width: ${binWidth}`);
            }

            phase = 'build';
            const sampler = HistogramSampler.fromBins(bins, binWidth);
            summary.binWidth = sampler.binWidth;
            summary.totalWeight = sampler.totalWeight;
            summary.upperBound = sampler.upperBound;

            phase = 'sample';
            const tally = this.config.report ? new Tally(sampler.binWidth) : null;
            await this.writeSamples(sampler, new SeededRng(this.config.seed), tally, progress, out);
            summary.samplesWritten = progress.written;

            if (tally) {
                summary.bins = compareHistograms(sampler.bins, tally.bins());
            }
        } catch (error) {
            summary.samplesWritten = progress.written;
            summary.fatalFailure = {
                phase,
                error: error instanceof Error ? error.message : String(error),
            };
        }

        summary.endTime = new Date().toISOString();
        return summary;
    }

    private async writeSamples(
        sampler: HistogramSampler,
        rng: UniformSource,
        tally: Tally | null,
        progress: { written: number },
        out: Writable | undefined
    ): Promise<void> {
        const path = this.config.output.path;
        const target = out ?? (path !== undefined ? createWriteStream(path) : process.stdout);

        if (out === undefined && path !== undefined) {
            console.error(`📝 Writing ${this.config.samples} samples to: ${path}`);
        }

        // stdout stays open for whatever the process prints next
        await pipeline(Readable.from(this.chunks(sampler, rng, tally, progress)), target, { end: target !== process.stdout });
    }

    private *chunks(
        sampler: HistogramSampler,
        rng: UniformSource,
        tally: Tally | null,
        progress: { written: number }
    ): Generator<string> {
        const total = this.config.samples;
        const json = this.config.output.format === 'json';

        if (json) {
            yield '[';
        }
        for (let start = 0; start < total; start += CHUNK_SIZE) {
            const values = sampler.sampleMany(rng, Math.min(CHUNK_SIZE, total - start));
            if (tally) {
                for (const value of values) {
                    tally.add(value);
                }
            }
            progress.written += values.length;
            yield json ? `${start > 0 ? ',' : ''}${values.join(',')}` : `${values.join('\n')}\n`;
        }
        if (json) {
            yield ']\n';
        }
    }
}
