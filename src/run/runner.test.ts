import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SampleRunner } from './runner.js';
import type { LoadedConfig } from '../config.js';
import { HistogramSampler } from '../sampler/histogram.js';
import { SeededRng } from '../util/rng.js';
import { Writable } from 'node:stream';
import { mkdtempSync, writeFileSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const VOTES: Array<[number, number]> = [
    [0, 100],
    [10, 80],
    [20, 40],
    [30, 30],
];

function collector(): { stream: Writable; text: () => string } {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return { stream, text: () => chunks.join('') };
}

describe('SampleRunner', () => {
    let tempDir: string;
    let histogramPath: string;

    function makeConfig(overrides: Partial<LoadedConfig> = {}): LoadedConfig {
        return {
            histogram: histogramPath,
            binWidth: 10,
            samples: 2500,
            seed: 42,
            seedEnvVar: 'HISTOGRAM_SAMPLER_SEED',
            output: { format: 'lines' },
            report: false,
            seedSource: 'config',
            runId: 'test-run',
            ...overrides,
        };
    }

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        tempDir = mkdtempSync(join(tmpdir(), 'runner-test-'));
        histogramPath = join(tempDir, 'votes.dat');
        writeFileSync(histogramPath, VOTES.map(([label, count]) => `${label} ${count}`).join('\n'));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(tempDir, { recursive: true, force: true });
    });

    it('writes one value per line', async () => {
        const out = collector();
        const summary = await new SampleRunner(makeConfig()).run(out.stream);

        const lines = out.text().trimEnd().split('\n');
        expect(summary.fatalFailure).toBeNull();
        expect(summary.samplesWritten).toBe(2500);
        expect(lines).toHaveLength(2500);
        expect(lines.every((line) => /^\d+$/.test(line) && Number(line) < 35)).toBe(true);
    });

    it('writes the same sequence as the sampler with the same seed', async () => {
        const out = collector();
        await new SampleRunner(makeConfig()).run(out.stream);

        const expected = HistogramSampler.fromBins(VOTES, 10).sampleMany(new SeededRng(42), 2500);
        expect(out.text()).toBe(`${expected.join('\n')}\n`);
    });

    it('writes a JSON array', async () => {
        const out = collector();
        await new SampleRunner(makeConfig({ output: { format: 'json' } })).run(out.stream);

        const expected = HistogramSampler.fromBins(VOTES, 10).sampleMany(new SeededRng(42), 2500);
        expect(JSON.parse(out.text())).toEqual(expected);
    });

    it('counts the samples of each run separately', async () => {
        const runner = new SampleRunner(makeConfig({ samples: 100 }));
        const first = collector();
        const second = collector();

        const firstSummary = await runner.run(first.stream);
        const secondSummary = await runner.run(second.stream);

        expect(firstSummary.samplesWritten).toBe(100);
        expect(secondSummary.samplesWritten).toBe(100);
        expect(second.text()).toBe(first.text());
    });

    it('writes nothing for zero samples', async () => {
        const lines = collector();
        const json = collector();

        await new SampleRunner(makeConfig({ samples: 0 })).run(lines.stream);
        await new SampleRunner(makeConfig({ samples: 0, output: { format: 'json' } })).run(json.stream);

        expect(lines.text()).toBe('');
        expect(json.text()).toBe('[]\n');
    });

    it('writes to the configured output file', async () => {
        const outputPath = join(tempDir, 'values.txt');
        const summary = await new SampleRunner(makeConfig({ samples: 10, output: { format: 'lines', path: outputPath } })).run();

        expect(summary.fatalFailure).toBeNull();
        expect(readFileSync(outputPath, 'utf-8').trimEnd().split('\n')).toHaveLength(10);
    });

    it('fills in sampler details and the version', async () => {
        const summary = await new SampleRunner(makeConfig({ samples: 5 }), '1.2.3').run(collector().stream);

        expect(summary.version).toBe('1.2.3');
        expect(summary.runId).toBe('test-run');
        expect(summary.seed).toBe(42);
        expect(summary.binWidth).toBe(10);
        expect(summary.totalWeight).toBe(250);
        expect(summary.upperBound).toBe(35);
        expect(summary.bins).toEqual([]);
    });

    it('infers the bin width from the labels when not configured', async () => {
        const summary = await new SampleRunner(makeConfig({ binWidth: undefined, samples: 5 })).run(collector().stream);

        expect(summary.binWidth).toBe(10);
    });

    it('compares the sampled values with the histogram when reporting', async () => {
        const summary = await new SampleRunner(makeConfig({ samples: 20_000, report: true })).run(collector().stream);

        expect(summary.bins.map((b) => b.label)).toEqual([0, 10, 20, 30]);
        expect(summary.bins.map((b) => b.expected)).toEqual([0.4, 0.32, 0.16, 0.12]);
        const observedTotal = summary.bins.reduce((sum, b) => sum + b.observed, 0);
        expect(observedTotal).toBeCloseTo(1, 10);
        for (const bin of summary.bins) {
            expect(Math.abs(bin.diff)).toBeLessThan(0.05);
        }
    });

    it('records a load failure without writing anything', async () => {
        const out = collector();
        const summary = await new SampleRunner(makeConfig({ histogram: join(tempDir, 'missing.dat') })).run(out.stream);

        expect(summary.fatalFailure?.phase).toBe('load');
        expect(summary.fatalFailure?.error).toContain('Histogram file not found');
        expect(summary.samplesWritten).toBe(0);
        expect(out.text()).toBe('');
    });

    it('records a build failure without writing anything', async () => {
        writeFileSync(histogramPath, '0 0\n10 0\n');
        const out = collector();
        const summary = await new SampleRunner(makeConfig()).run(out.stream);

        expect(summary.fatalFailure).toEqual({ phase: 'build', error: 'Every bin has a count of 0' });
        expect(summary.binWidth).toBeNull();
        expect(out.text()).toBe('');
    });

    it('records a bin width that does not match the labels as a build failure', async () => {
        const summary = await new SampleRunner(makeConfig({ binWidth: 20 })).run(collector().stream);

        expect(summary.fatalFailure).toEqual({
            phase: 'build',
            error: 'Bin label 10 is not a multiple of bin width 20',
        });
    });
});
