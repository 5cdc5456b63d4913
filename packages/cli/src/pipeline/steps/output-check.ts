import { existsSync } from 'node:fs';
import type { PipelineStep } from '../types.js';

/**
 * Step 1: Output Check
 * Prevents accidental overwrite of a decoded file's outputs unless --force is used.
 * Checks for any output file, not just the manifest.
 */
export const outputCheck: PipelineStep = async (state) => {
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const { workbook, manifest } = state.outputs;
    const existingFiles = [workbook, manifest].filter(f => existsSync(f));

    if (existingFiles.length > 0) {
        state.errors.push({
            step: 'output-check',
            message: `Output already exists (found: ${existingFiles.join(', ')}). Use --force to overwrite.`,
            fatal: true
        });
    }

    return state;
};
