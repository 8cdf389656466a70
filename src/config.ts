import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import 'dotenv/config';

export const OutputFormatSchema = z.enum(['lines', 'json']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const SeedSchema = z.union([z.number().int(), z.string().min(1)]);

const OutputSchema = z.object({
    format: OutputFormatSchema.default('lines'),
    path: z.string().min(1).optional(),
});

export const SamplerConfigSchema = z.object({
    histogram: z.string().min(1),
    binWidth: z.number().int().positive().optional(),
    samples: z.number().int().nonnegative().default(1000),
    seed: SeedSchema.optional(),
    seedEnvVar: z.string().min(1).default('HISTOGRAM_SAMPLER_SEED'),
    output: OutputSchema.default({}),
    report: z.boolean().default(false),
});

const PartialConfigSchema = SamplerConfigSchema.partial();

export type SamplerConfig = z.infer<typeof SamplerConfigSchema>;
type PartialConfig = z.infer<typeof PartialConfigSchema>;

export type SeedSource = 'cli' | 'config' | 'env' | 'generated';

/**
 * Values taken from the command line. Paths are relative to the working directory.
 */
export interface ConfigOverrides {
    histogram?: string;
    binWidth?: number;
    samples?: number;
    seed?: number | string;
    format?: OutputFormat;
    outputPath?: string;
    report?: boolean;
    runId?: string;
}

export interface LoadedConfig extends SamplerConfig {
    seed: number | string;
    seedSource: SeedSource;
    runId: string;
}

function readConfigFile(configPath: string): unknown {
    const absolutePath = resolve(configPath);
    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    const rawContent = readFileSync(absolutePath, 'utf-8');
    try {
        return JSON.parse(rawContent);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }
}

/**
 * Loads and validates the sampler configuration.
 *
 * With `configPath` null the config is built from `overrides` alone. Paths in the file are
 * resolved against the file's directory; CLI overrides win over file values and are resolved
 * against the working directory. The seed falls back to `seedEnvVar`, then to a random one.
 */
export function loadConfig(configPath: string | null, overrides: ConfigOverrides = {}): LoadedConfig {
    const baseDir = configPath ? dirname(resolve(configPath)) : process.cwd();
    const fromFile: PartialConfig = configPath ? PartialConfigSchema.parse(readConfigFile(configPath)) : {};

    const config = SamplerConfigSchema.parse({
        ...fromFile,
        histogram: overrides.histogram
            ? resolve(overrides.histogram)
            : fromFile.histogram && resolve(baseDir, fromFile.histogram),
        binWidth: overrides.binWidth ?? fromFile.binWidth,
        samples: overrides.samples ?? fromFile.samples,
        seed: overrides.seed ?? fromFile.seed,
        output: {
            format: overrides.format ?? fromFile.output?.format,
            path: overrides.outputPath
                ? resolve(overrides.outputPath)
                : fromFile.output?.path && resolve(baseDir, fromFile.output.path),
        },
        report: overrides.report || fromFile.report,
    });

    let seed: number | string;
    let seedSource: SeedSource;
    const envSeed = process.env[config.seedEnvVar];
    if (overrides.seed !== undefined) {
        seed = overrides.seed;
        seedSource = 'cli';
    } else if (config.seed !== undefined) {
        seed = config.seed;
        seedSource = 'config';
    } else if (envSeed) {
        seed = envSeed;
        seedSource = 'env';
    } else {
        seed = Math.floor(Math.random() * 2 ** 31);
        seedSource = 'generated';
    }

    const runId = overrides.runId ?? `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;

    return {
        ...config,
        seed,
        seedSource,
        runId,
    };
}
