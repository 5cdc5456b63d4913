import type { FieldAccessor } from './types.js';
import { sliceField } from './slice.js';
import { MalformedFieldError } from '../errors.js';
import { parseCompactDate } from '../utils/date-parse.js';

/**
 * YYYYMMDD calendar date, returned as ISO YYYY-MM-DD.
 * Dates are always populated in a valid file, so anything else is fatal.
 */
export const decodeDate: FieldAccessor<'date'> = (line, spec) => {
    const text = sliceField(line, spec);
    const date = parseCompactDate(text);
    if (date === null) {
        throw new MalformedFieldError(spec, text, 'a YYYYMMDD date');
    }
    return date;
};
