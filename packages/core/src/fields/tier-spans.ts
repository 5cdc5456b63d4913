import type { FieldAccessor, TierSpan } from './types.js';
import { sliceField } from './slice.js';
import { TIER_SPAN } from '../types/index.js';
import { isAllDigits } from '../utils/numeric.js';

const { CHUNK_WIDTH, START_OFFSET, END_OFFSET, MONTH_WIDTH } = TIER_SPAN;

/**
 * Tier list: 14-character chunks holding a start and end month at +2 and +8.
 * Chunks that are not entirely digits are padding and are skipped.
 */
export const decodeTierSpans: FieldAccessor<'tier_spans'> = (line, spec) => {
    const text = sliceField(line, spec);
    const spans: TierSpan[] = [];

    for (let index = 0; index < text.length; index += CHUNK_WIDTH) {
        const chunk = text.slice(index, index + CHUNK_WIDTH);
        if (chunk.length !== CHUNK_WIDTH || !isAllDigits(chunk)) {
            continue;
        }
        spans.push([
            Number(chunk.slice(START_OFFSET, START_OFFSET + MONTH_WIDTH)),
            Number(chunk.slice(END_OFFSET, END_OFFSET + MONTH_WIDTH)),
        ]);
    }

    return spans;
};
