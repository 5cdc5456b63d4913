import type { PipelineState, PipelineStep } from './types.js';
import { outputCheck } from './steps/output-check.js';
import { loadFile } from './steps/load.js';
import { decodeRecords } from './steps/decode.js';
import { summarizeRecords } from './steps/summarize.js';
import { exportResults } from './steps/export.js';
import { getOutputPaths } from '../config/paths.js';
import { fail, step as progress } from '../utils/console.js';
import type { DecodeOptions } from '../types.js';

/**
 * Empty pipeline state for one input file.
 */
export function createPipelineState(inputPath: string, options: DecodeOptions): PipelineState {
    return {
        inputPath,
        options,
        outputs: getOutputPaths(inputPath, options.outDir),
        lines: [],
        records: [],
        recordCounts: {},
        unknownTags: {},
        failures: [],
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the decode pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(inputPath: string, options: DecodeOptions): Promise<PipelineState> {
    let state = createPipelineState(inputPath, options);

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Output Check', fn: outputCheck },
        { name: 'Load', fn: loadFile },
        { name: 'Decode', fn: decodeRecords },
        { name: 'Summarize', fn: summarizeRecords },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        progress(i + 1, steps.length, step.name);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            fail(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
