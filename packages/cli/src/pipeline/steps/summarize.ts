import type { PipelineStep } from '../types.js';

/**
 * Step 4: Summarize
 * Counts decoded records per record type, in first-seen order.
 */
export const summarizeRecords: PipelineStep = async (state) => {
    const counts: Record<string, number> = {};
    for (const { record } of state.records) {
        counts[record.type] = (counts[record.type] ?? 0) + 1;
    }
    state.recordCounts = counts;

    if (state.records.length === 0 && state.errors.length === 0) {
        state.warnings.push('No records decoded.');
    }

    return state;
};
