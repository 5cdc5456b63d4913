import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync } from 'node:fs';
import { decodeFile, reportRun } from '../src/commands/decode.js';
import { createPipelineState } from '../src/pipeline/runner.js';
import type { DecodeOptions } from '../src/types.js';

vi.mock('node:fs');

const options: DecodeOptions = {
    dryRun: true,
    force: false,
    yes: true,
    failFast: false,
    outDir: '/out',
    skipTags: [],
};

describe('Decode Command', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('should fail on a missing input file', async () => {
        vi.mocked(existsSync).mockReturnValue(false);
        expect(await decodeFile('/data/missing.pa2', {})).toBe(1);
        expect(console.error).toHaveBeenCalledWith('✖ Error: Input file not found: /data/missing.pa2');
    });

    it('should fail on invalid flags', async () => {
        expect(await decodeFile('/data/cme.pa2', { tag: ['ABC'] })).toBe(1);
        expect(existsSync).not.toHaveBeenCalled();
    });

    it('should exit 0 after a clean run', () => {
        const state = createPipelineState('/data/cme.pa2', options);
        state.recordCounts = { ExchangeHeader: 1 };
        expect(reportRun(state)).toBe(0);
        expect(console.log).toHaveBeenCalledWith('→ ExchangeHeader: 1');
    });

    it('should exit 1 after a fatal error', () => {
        const state = createPipelineState('/data/cme.pa2', options);
        state.errors.push({ step: 'load', message: 'Failed to read /data/cme.pa2: ENOENT', fatal: true });
        expect(reportRun(state)).toBe(1);
        expect(console.error).toHaveBeenCalledWith('✖ ERROR [load]: Failed to read /data/cme.pa2: ENOENT');
    });
});
