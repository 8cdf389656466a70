import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadConfig } from '../config.js';
import { SampleRunner } from '../run/runner.js';
import { Writable } from 'node:stream';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { dirname } from 'node:path';

const __dirname = dirname(fileURLToPath(import.meta.url));
const examplesDir = resolve(__dirname, '../../examples');

describe('bundled example', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('loads the example config and samples from its histogram', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const config = loadConfig(join(examplesDir, 'sampler.config.json'), { samples: 2000, report: true });

        let written = '';
        const out = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                written += chunk.toString();
                callback();
            },
        });
        const summary = await new SampleRunner(config).run(out);

        expect(config.histogram).toBe(join(examplesDir, 'votes-per-story.dat'));
        expect(summary.fatalFailure).toBeNull();
        expect(summary.totalWeight).toBe(10097);
        expect(summary.upperBound).toBe(135);
        expect(written.trimEnd().split('\n')).toHaveLength(2000);
        expect(summary.bins[0].label).toBe(0);
    });
});
