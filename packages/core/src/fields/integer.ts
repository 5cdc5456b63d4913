import type { FieldAccessor } from './types.js';
import { sliceField } from './slice.js';
import { parseInteger } from '../utils/numeric.js';

/**
 * Base-10 signed integer. Unparseable text (blanks, letters) is absent: null, never 0.
 */
export const decodeInteger: FieldAccessor<'integer'> = (line, spec) => {
    return parseInteger(sliceField(line, spec));
};
