import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { PipelineStep, SourceLine } from '../types.js';
import { contentDigest } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: Load
 * Reads the input file, hashes it and splits it into numbered lines.
 */
export const loadFile: PipelineStep = async (state) => {
    let content: Buffer;
    try {
        content = await readFile(state.inputPath);
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: `Failed to read ${state.inputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    state.file = {
        path: state.inputPath,
        filename: basename(state.inputPath),
        hash: contentDigest(content),
    };
    state.lines = splitLines(content.toString('latin1'));

    if (state.lines.length === 0) {
        state.warnings.push(`${state.file.filename} is empty.`);
    }

    return state;
};

/**
 * Splits text on LF, dropping a trailing CR and blank lines.
 * Line numbers count every physical line, blank ones included.
 */
export function splitLines(text: string): SourceLine[] {
    const lines: SourceLine[] = [];
    text.split('\n').forEach((raw, index) => {
        const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        if (line.length > 0) {
            lines.push({ number: index + 1, text: line });
        }
    });
    return lines;
}
