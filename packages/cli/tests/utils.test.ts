import { PassThrough } from 'node:stream';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { arrow, fail, info, step, success, warn } from '../src/utils/console.js';
import { contentDigest } from '../src/utils/hash.js';
import { confirmContinue, type PromptIo } from '../src/utils/prompt.js';

describe('console helpers', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('should mark progress and results on stdout', () => {
        success('Decoded 3 of 4 lines.');
        info('Rejected lines: 1');
        arrow('ExchangeHeader: 2');
        expect(vi.mocked(console.log).mock.calls).toEqual([
            ['✓ Decoded 3 of 4 lines.'],
            ['ℹ Rejected lines: 1'],
            ['→ ExchangeHeader: 2'],
        ]);
    });

    it('should send warnings and failures to stderr', () => {
        warn('Skipped 1 line(s)');
        fail('Stopping.');
        expect(vi.mocked(console.error).mock.calls).toEqual([['⚠ Skipped 1 line(s)'], ['✖ Stopping.']]);
        expect(console.log).not.toHaveBeenCalled();
    });

    it('should number pipeline steps', () => {
        step(2, 5, 'Load File');
        expect(console.log).toHaveBeenCalledWith('→ [2/5] Load File');
    });
});

describe('contentDigest', () => {
    const ABC = 'sha256:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

    it('should digest bytes and text alike', () => {
        expect(contentDigest(Buffer.from('abc', 'latin1'))).toBe(ABC);
        expect(contentDigest('abc')).toBe(ABC);
    });

    it('should match the manifest hash format', () => {
        expect(contentDigest(Buffer.alloc(0))).toMatch(/^sha256:[0-9a-f]{64}$/);
    });
});

describe('confirmContinue', () => {
    function io(interactive: boolean): PromptIo & { input: PassThrough } {
        return { input: new PassThrough(), output: new PassThrough(), interactive };
    }

    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('should accept without asking when --yes is set', async () => {
        const terminal = io(true);
        expect(await confirmContinue('Continue?', { yes: true }, terminal)).toBe(true);
    });

    it('should decline without a terminal', async () => {
        expect(await confirmContinue('Continue?', { yes: false }, io(false))).toBe(false);
        expect(console.error).toHaveBeenCalledWith('✖ No terminal to answer on. Pass --yes to keep the lines that did decode.');
    });

    it.each([
        ['y\n', true],
        ['Yes\n', true],
        ['n\n', false],
        ['\n', false],
    ])('should read %j from the terminal as %s', async (typed, expected) => {
        const terminal = io(true);
        const answer = confirmContinue('Continue?', { yes: false }, terminal);
        terminal.input.write(typed);
        expect(await answer).toBe(expected);
    });
});
