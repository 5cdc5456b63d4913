import { mkdir, writeFile } from 'node:fs/promises';
import { CLI_DEFAULTS, RunManifestSchema, type RunManifest } from '@span-pa2/shared';
import type { InputFile, PipelineState, PipelineStep } from '../types.js';
import { generateRecordsExcel } from '../../excel/records.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 5: Export
 * Writes the record workbook and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    if (!state.file) {
        state.errors.push({ step: 'export', message: 'No input file was loaded.', fatal: true });
        return state;
    }

    const { dir, workbook, manifest } = state.outputs;

    try {
        await mkdir(dir, { recursive: true });

        const buffer = await generateRecordsExcel(state.records, state.file.filename).xlsx.writeBuffer();
        await writeFile(workbook, new Uint8Array(buffer));

        const runManifest = buildManifest(state, state.file, new Date());
        await writeFile(manifest, JSON.stringify(runManifest, null, 2));
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${dir}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};

/**
 * Run manifest for a decoded file, validated against RunManifestSchema.
 */
export function buildManifest(state: PipelineState, file: InputFile, runAt: Date): RunManifest {
    return RunManifestSchema.parse({
        source_file: file.filename,
        source_hash: file.hash,
        run_timestamp: runAt.toISOString(),
        line_count: state.lines.length,
        record_count: state.records.length,
        record_counts: state.recordCounts,
        unknown_tags: state.unknownTags,
        failed_lines: state.failures,
        version: CLI_DEFAULTS.VERSION,
    });
}
