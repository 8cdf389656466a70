import { writeFileSync } from 'node:fs';
import type { BinComparison } from '../histogram/stats.js';
import type { SeedSource } from '../config.js';

/** Stage of a run a fatal failure is attributed to. */
export type RunPhase = 'load' | 'build' | 'sample';

export interface SampleSummary {
    version: string;
    runId: string;
    seed: number | string;
    seedSource: SeedSource;
    histogramPath: string;
    binWidth: number | null;
    totalWeight: number | null;
    upperBound: number | null;
    samplesRequested: number;
    samplesWritten: number;
    startTime: string;
    endTime: string;
    bins: BinComparison[];
    fatalFailure: { phase: RunPhase; error: string } | null;
}

/**
 * Writes the run summary to a JSON file.
 */
export function writeSummary(summary: SampleSummary, outputPath: string): void {
    writeFileSync(outputPath, JSON.stringify(summary, null, 2));
}

function percent(fraction: number): string {
    return `${(100 * fraction).toFixed(1)}%`;
}

function signedPoints(fraction: number): string {
    const points = 100 * fraction;
    return `${points >= 0 ? '+' : ''}${points.toFixed(2)}`;
}

/**
 * Generates a markdown summary for console/file output.
 */
export function generateMarkdownSummary(summary: SampleSummary): string {
    const lines: string[] = [];

    lines.push(`# Sample Run Summary`);
    lines.push('');
    lines.push(`**Version:** ${summary.version}`);
    lines.push(`**Run ID:** ${summary.runId}`);
    lines.push(`**Seed:** ${summary.seed} (${summary.seedSource})`);
    lines.push(`**Histogram:** ${summary.histogramPath}`);
    lines.push(`**Started:** ${summary.startTime}`);
    lines.push(`**Ended:** ${summary.endTime}`);
    lines.push('');

    if (summary.fatalFailure) {
        lines.push(`## ⛔ Fatal Failure`);
        lines.push(`**Phase:** ${summary.fatalFailure.phase}`);
        lines.push(`**Error:** ${summary.fatalFailure.error}`);
        lines.push('');
    }

    lines.push(`## Statistics`);
    lines.push(`- **Bin Width:** ${summary.binWidth ?? 'N/A'}`);
    lines.push(`- **Total Weight:** ${summary.totalWeight ?? 'N/A'}`);
    lines.push(`- **Value Range:** ${summary.upperBound === null ? 'N/A' : `[0, ${summary.upperBound})`}`);
    lines.push(`- **Samples:** ${summary.samplesWritten} of ${summary.samplesRequested}`);
    lines.push('');

    if (summary.bins.length > 0) {
        // proportions in percent, diff in percentage points
        lines.push(`## Bin Comparison`);
        lines.push('| Bin | Expected | Observed | Diff (pp) |');
        lines.push('|---:|---:|---:|---:|');
        for (const bin of summary.bins) {
            lines.push(
                `| ${bin.label} | ${percent(bin.expected)} | ${percent(bin.observed)} | ${signedPoints(bin.diff)} |`
            );
        }
        lines.push('');
    }

    return lines.join('\n');
}

/**
 * Prints the summary to stderr, keeping stdout for sample data.
 */
export function printSummary(summary: SampleSummary): void {
    console.error(generateMarkdownSummary(summary));
}
