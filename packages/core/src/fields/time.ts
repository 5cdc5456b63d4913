import type { FieldAccessor } from './types.js';
import { sliceField } from './slice.js';
import { MIDNIGHT } from '../types/index.js';
import { parseCompactTime } from '../utils/date-parse.js';

/**
 * HHMM time of day, returned as HH:MM.
 *
 * NOTE: a blank or invalid time decodes as midnight ('00:00'), not as an error
 * and not as null. A populated 0000 and a blank field are indistinguishable.
 */
export const decodeTime: FieldAccessor<'time'> = (line, spec) => {
    return parseCompactTime(sliceField(line, spec)) ?? MIDNIGHT;
};
