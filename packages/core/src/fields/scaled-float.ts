/**
 * Scaled fixed-point fields.
 *
 * The digits are an integer; the real value is `integer * scale`.
 * A negative configured scale means the sign lives out of band: the character
 * right after the field (at `stop`) is '-' for negative values. Any other
 * character there, digits and spaces included, means non-negative.
 */

import type { FieldAccessor } from './types.js';
import { sliceField } from './slice.js';
import { parseInteger } from '../utils/numeric.js';

const SIGN_FLAG = '-';

export const decodeScaledFloat: FieldAccessor<'scaled_float'> = (line, spec) => {
    const value = parseInteger(sliceField(line, spec));
    if (value === null) {
        return NaN;
    }

    if (spec.scale > 0) {
        return value * spec.scale;
    }

    // Sign column is part of the footprint
    sliceField(line, spec, spec.stop + 1);
    return value * (line[spec.stop] === SIGN_FLAG ? spec.scale : Math.abs(spec.scale));
};
