import { existsSync } from 'node:fs';
import { DecodeFlagsSchema } from '@span-pa2/shared';
import { loadCliConfig, resolveConfigPath, resolveOptions } from '../config/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, fail, info } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import type { PipelineState } from '../pipeline/types.js';
import type { DecodeOptions } from '../types.js';

/**
 * `pa2 <file>`: decode a PA2 file and export its records.
 *
 * @param rawFlags - Options as parsed by the command line, validated here
 * @returns Process exit code
 */
export async function decodeFile(inputPath: string, rawFlags: unknown): Promise<number> {
    log(`\nspan-pa2 - Decoding ${inputPath}`);

    const parsedFlags = DecodeFlagsSchema.safeParse(rawFlags);
    if (!parsedFlags.success) {
        fail(`Error: ${parsedFlags.error.issues[0]?.message ?? 'Invalid options'}`);
        return 1;
    }
    const flags = parsedFlags.data;

    if (!existsSync(inputPath)) {
        fail(`Error: Input file not found: ${inputPath}`);
        return 1;
    }

    let options: DecodeOptions;
    try {
        const configPath = resolveConfigPath(inputPath, flags.config);
        const config = loadCliConfig(configPath, flags.config !== undefined);
        options = resolveOptions(inputPath, flags, config);
    } catch (err) {
        fail(`Error: Failed to load config. ${errorMessage(err)}`);
        return 1;
    }

    const state = await runPipeline(inputPath, options);
    return reportRun(state);
}

/**
 * Prints the processing summary and returns the exit code.
 */
export function reportRun(state: PipelineState): number {
    log('\n--- Decode Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        fail(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some(e => e.fatal)) {
        log('\n✖ Decoding failed with fatal errors.');
        return 1;
    }

    success(`Decoded ${state.records.length} of ${state.lines.length} lines.`);
    for (const [type, count] of Object.entries(state.recordCounts)) {
        arrow(`${type}: ${count}`);
    }
    if (state.failures.length > 0) {
        info(`Rejected lines: ${state.failures.length}`);
    }

    if (!state.options.dryRun) {
        arrow(`Outputs saved to: ${state.outputs.dir}`);
    } else {
        log('\n[DRY RUN] No files were written.');
    }
    return 0;
}
