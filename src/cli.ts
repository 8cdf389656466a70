#!/usr/bin/env node
import { parseArgs, UsageError } from './args.js';
import type { CliArgs } from './args.js';
import { loadConfig } from './config.js';
import { SampleRunner } from './run/runner.js';
import { writeSummary, printSummary, generateMarkdownSummary } from './run/summary.js';
import { writeFileSync, readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const DEFAULT_CONFIG = 'sampler.config.json';

function fail(message: string): never {
    console.error(`❌ ${message}`);
    process.exit(1);
}

function printHelp(): void {
    console.log(`
histogram-sampler - Generate synthetic values from a histogram summary

Usage:
  histogram-sampler [options]

Options:
  -c, --config <path>     Path to sampler.config.json (default: sampler.config.json, if present)
  -i, --input <path>      Histogram file (.dat "label count" lines, or .json pairs)
  -w, --bin-width <n>     Bin width the histogram was rounded with (default: inferred)
  -n, --samples <n>       Number of values to generate (default: 1000)
  -s, --seed <seed>       Seed for the random generator (default: generated)
  --run-id <id>           Override the auto-generated run ID
  -f, --format <fmt>      Output format: lines | json (default: lines)
  -o, --output <path>     Write values to a file instead of stdout
  -r, --report            Write a fidelity report comparing samples with the histogram
  --report-dir <dir>      Output directory for report files (default: .)
  -h, --help              Show this help message

Environment:
  HISTOGRAM_SAMPLER_SEED  Seed used when neither --seed nor the config sets one
                          (the variable name can be changed with seedEnvVar)

Examples:
  # 10 000 vote counts from a votes-per-story histogram
  histogram-sampler -i votes.dat -w 10 -n 10000 -s 42

  # Check how closely the samples follow the histogram
  histogram-sampler -c sampler.config.json -n 500000 -o /dev/null --report
`);
}

async function main(): Promise<void> {
    let args: CliArgs;
    try {
        args = parseArgs(process.argv.slice(2));
    } catch (error) {
        if (error instanceof UsageError) {
            fail(error.message);
        }
        throw error;
    }
    if (args.help) {
        printHelp();
        return;
    }

    // Load version from package.json
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = resolve(__dirname, '../package.json');
    let version = 'unknown';
    if (existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            version = pkg.version;
        }
    }

    console.error(`🎲 Histogram Sampler (v${version})\n`);

    const configPath = args.config ?? (existsSync(DEFAULT_CONFIG) ? DEFAULT_CONFIG : null);
    if (configPath) {
        console.error(`📄 Loading config from: ${configPath}`);
    }

    let config;
    try {
        config = loadConfig(configPath, {
            histogram: args.input,
            binWidth: args.binWidth,
            samples: args.samples,
            seed: args.seed,
            format: args.format,
            outputPath: args.output,
            report: args.report,
            runId: args.runId,
        });
    } catch (error) {
        fail(`Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
    }

    console.error(`   Histogram: ${config.histogram}`);
    console.error(`   Run ID: ${config.runId}`);
    console.error(`   Seed: ${config.seed} (${config.seedSource})`);
    console.error(`   Samples: ${config.samples}`);
    console.error('');

    const runner = new SampleRunner(config, version);
    const summary = await runner.run();

    if (config.report) {
        console.error('\n=== SAMPLE REPORT ===\n');
        printSummary(summary);

        const jsonPath = resolve(args.reportDir, `report-${config.runId}.json`);
        const mdPath = resolve(args.reportDir, `report-${config.runId}.md`);
        writeSummary(summary, jsonPath);
        writeFileSync(mdPath, generateMarkdownSummary(summary));

        console.error(`\n📝 Report written to:`);
        console.error(`   JSON: ${jsonPath}`);
        console.error(`   Markdown: ${mdPath}`);
    }

    if (summary.fatalFailure) {
        fail(`Sampling failed during ${summary.fatalFailure.phase}: ${summary.fatalFailure.error}`);
    }

    console.error(`\n✅ Generated ${summary.samplesWritten} samples`);
}

main().catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
});
