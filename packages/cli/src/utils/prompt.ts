import { createInterface } from 'node:readline/promises';
import type { DecodeOptions } from '../types.js';
import { fail } from './console.js';

const ACCEPT = new Set(['y', 'yes']);

export interface PromptIo {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    interactive: boolean;
}

const terminal = (): PromptIo => ({
    input: process.stdin,
    output: process.stdout,
    interactive: process.stdin.isTTY === true,
});

/**
 * Asks whether to keep going. `--yes` answers for the user; without a terminal the answer is no.
 */
export async function confirmContinue(
    question: string,
    options: Pick<DecodeOptions, 'yes'>,
    io: PromptIo = terminal()
): Promise<boolean> {
    if (options.yes) return true;

    if (!io.interactive) {
        fail('No terminal to answer on. Pass --yes to keep the lines that did decode.');
        return false;
    }

    const rl = createInterface({ input: io.input, output: io.output });
    try {
        const answer = await rl.question(`${question} [y/N] `);
        return ACCEPT.has(answer.trim().toLowerCase());
    } finally {
        rl.close();
    }
}
