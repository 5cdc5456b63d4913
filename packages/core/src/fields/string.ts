/**
 * Text fields.
 *
 * Neither accessor throws: a range past the end of the line is clamped,
 * which lets short trailer fields (fillers, optional legs) decode as blank.
 */

import type { FieldAccessor } from './types.js';

/**
 * Slice and strip trailing whitespace. Leading whitespace is kept.
 */
export const decodeString: FieldAccessor<'string'> = (line, spec) => {
    return line.slice(spec.start, spec.stop).trimEnd();
};

/**
 * Split the range into `step`-wide chunks, right-trim each, drop the blank ones.
 */
export const decodeStringGroup: FieldAccessor<'string_group'> = (line, spec) => {
    const values: string[] = [];
    for (let index = spec.start; index < spec.stop; index += spec.step) {
        const value = line.slice(index, index + spec.step).trimEnd();
        if (value) {
            values.push(value);
        }
    }
    return values;
};
