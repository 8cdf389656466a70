import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { resolve, extname } from 'node:path';
import type { Bin } from '../sampler/histogram.js';

export class HistogramParseError extends Error {
    /** `line <n>` for text input, the JSON path (or `(root)`) for JSON input. */
    readonly location: string;

    constructor(location: string, message: string) {
        super(`${location}: ${message}`);
        this.name = 'HistogramParseError';
        this.location = location;
    }
}

const CountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const BinEntrySchema = z.union([
    z.tuple([CountSchema, CountSchema]),
    z.object({
        label: CountSchema,
        count: CountSchema,
    }),
]);

export const HistogramJsonSchema = z.array(BinEntrySchema);
export type HistogramJson = z.infer<typeof HistogramJsonSchema>;

const INTEGER = /^\d+$/;

/**
 * Parses the `label count` text format, one bin per line.
 * Blank lines and lines starting with `#` are skipped.
 */
export function parseHistogramText(text: string): Bin[] {
    const bins: Bin[] = [];
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }

        const fields = line.split(/\s+/);
        if (fields.length !== 2 || !INTEGER.test(fields[0]) || !INTEGER.test(fields[1])) {
            throw new HistogramParseError(`line ${i + 1}`, `expected "<label> <count>", got "${line}"`);
        }

        const label = Number(fields[0]);
        const count = Number(fields[1]);
        if (!Number.isSafeInteger(label) || !Number.isSafeInteger(count)) {
            throw new HistogramParseError(`line ${i + 1}`, `value out of range in "${line}"`);
        }
        bins.push({ label, count });
    }

    return bins;
}

/**
 * Parses a JSON array of `[label, count]` tuples or `{ label, count }` objects.
 */
export function parseHistogramJson(text: string): Bin[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        throw new HistogramParseError('(root)', 'invalid JSON');
    }

    const result = HistogramJsonSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        throw new HistogramParseError(location, issue.message);
    }

    return result.data.map((entry) => (Array.isArray(entry) ? { label: entry[0], count: entry[1] } : entry));
}

/**
 * Loads a histogram file. `.json` files are read as JSON, anything else as text.
 */
export function loadHistogram(path: string): Bin[] {
    const absolutePath = resolve(path);
    if (!existsSync(absolutePath)) {
        throw new Error(`Histogram file not found: ${absolutePath}`);
    }

    const content = readFileSync(absolutePath, 'utf-8');
    return extname(absolutePath).toLowerCase() === '.json' ? parseHistogramJson(content) : parseHistogramText(content);
}

function gcd(a: number, b: number): number {
    while (b !== 0) {
        [a, b] = [b, a % b];
    }
    return a;
}

/**
 * Bin width implied by label spacing: the greatest common divisor of the positive labels.
 */
export function inferBinWidth(bins: readonly Bin[]): number {
    let width = 0;
    for (const bin of bins) {
        if (bin.label > 0) {
            width = gcd(bin.label, width);
        }
    }
    if (width === 0) {
        throw new Error('Cannot infer bin width without a positive label');
    }
    return width;
}
