import type { FieldSpec } from '../types/index.js';
import { FieldRangeError } from '../errors.js';

/**
 * Slice `[start, stop)` of a line, failing if the line is too short.
 *
 * @param needed - Characters the field needs (defaults to `spec.stop`)
 */
export function sliceField(line: string, spec: FieldSpec, needed: number = spec.stop): string {
    if (needed > line.length) {
        throw new FieldRangeError(spec, needed, line.length);
    }
    return line.slice(spec.start, spec.stop);
}
