import { DEFAULT_REGISTRY, RecordDecodeError, readTag, tryDecodeLine } from '@span-pa2/core';
import type { PipelineState, PipelineStep, SourceLine } from '../types.js';
import { confirmContinue } from '../../utils/prompt.js';

/**
 * Step 3: Decode
 * Decodes every line with the shipped layouts.
 *
 * Lines whose tag is skipped (or not among the requested tags) are never decoded.
 * Unknown tags are counted and reported once per tag. A rejected line is a
 * non-fatal error unless --fail-fast is set.
 */
export const decodeRecords: PipelineStep = async (state) => {
    const { tags, skipTags, failFast } = state.options;

    for (const tag of tags ?? []) {
        if (!DEFAULT_REGISTRY.has(tag)) {
            state.warnings.push(`Requested tag "${tag}" has no record layout.`);
        }
    }

    for (const line of state.lines) {
        const tag = readTag(line.text);
        if (skipTags.includes(tag) || (tags && !tags.includes(tag))) {
            continue;
        }

        const outcome = tryDecodeLine(line.text);
        if (outcome.ok) {
            state.records.push({ lineNumber: line.number, record: outcome.record });
            continue;
        }

        if (outcome.error instanceof RecordDecodeError) {
            recordFailure(state, line, outcome.error);
            if (failFast) {
                return state;
            }
        } else {
            state.unknownTags[tag] = (state.unknownTags[tag] ?? 0) + 1;
        }
    }

    for (const [tag, count] of Object.entries(state.unknownTags)) {
        state.warnings.push(`Skipped ${count} line(s) with unknown record tag "${tag}".`);
    }

    if (state.failures.length > 0) {
        const shouldContinue = await confirmContinue(
            `${state.failures.length} line(s) failed to decode and will be missing from the output. Continue?`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'decode',
                message: 'Aborted by user after decode errors.',
                fatal: true
            });
        }
    }

    return state;
};

function recordFailure(state: PipelineState, line: SourceLine, error: RecordDecodeError): void {
    state.failures.push({
        line_number: line.number,
        tag: error.tag,
        field: error.field,
        message: error.message,
    });
    state.errors.push({
        step: 'decode',
        message: `Line ${line.number}: ${error.message}`,
        fatal: state.options.failFast,
        error
    });
}
