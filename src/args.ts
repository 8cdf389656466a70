import type { OutputFormat } from './config.js';

export interface CliArgs {
    config?: string;
    input?: string;
    binWidth?: number;
    samples?: number;
    seed?: number | string;
    runId?: string;
    format?: OutputFormat;
    output?: string;
    report: boolean;
    reportDir: string;
    help: boolean;
}

/** A command line that cannot be run. */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value === '' || value.startsWith('-')) {
        throw new UsageError(`Missing value for ${flag}.`);
    }
    return value;
}

function parseCount(flag: string, value: string | undefined, min: number): number {
    const parsed = Number(value);
    if (value === undefined || !/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
        throw new UsageError(`Invalid ${flag}. Expected an integer >= ${min}.`);
    }
    return parsed;
}

/**
 * Parses the arguments after the script name.
 *
 * @throws {UsageError} on an unknown option or a flag without a valid value.
 */
export function parseArgs(args: readonly string[]): CliArgs {
    const result: CliArgs = {
        report: false,
        reportDir: '.',
        help: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '--config':
            case '-c':
                result.config = requireValue('--config', args[++i]);
                break;
            case '--input':
            case '-i':
                result.input = requireValue('--input', args[++i]);
                break;
            case '--bin-width':
            case '-w':
                result.binWidth = parseCount('--bin-width', args[++i], 1);
                break;
            case '--samples':
            case '-n':
                result.samples = parseCount('--samples', args[++i], 0);
                break;
            case '--seed':
            case '-s': {
                const seed = args[++i];
                if (!seed) {
                    throw new UsageError('Missing value for --seed.');
                }
                // numeric seeds stay numbers so they match the same seed in a config file
                result.seed = /^-?\d+$/.test(seed) && Number.isSafeInteger(Number(seed)) ? Number(seed) : seed;
                break;
            }
            case '--run-id':
                result.runId = requireValue('--run-id', args[++i]);
                break;
            case '--format':
            case '-f': {
                const format = args[++i];
                if (format !== 'lines' && format !== 'json') {
                    throw new UsageError('Invalid --format. Expected lines or json.');
                }
                result.format = format;
                break;
            }
            case '--output':
            case '-o':
                result.output = requireValue('--output', args[++i]);
                break;
            case '--report':
            case '-r':
                result.report = true;
                break;
            case '--report-dir':
                result.reportDir = requireValue('--report-dir', args[++i]);
                break;
            case '--help':
            case '-h':
                result.help = true;
                break;
            default:
                throw new UsageError(`Unknown option: ${arg}`);
        }
    }

    return result;
}
