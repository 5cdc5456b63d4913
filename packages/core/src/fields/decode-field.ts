import type { FieldSpec } from '../types/index.js';
import type { DecodedField } from './types.js';
import { decodeString, decodeStringGroup } from './string.js';
import { decodeInteger } from './integer.js';
import { decodeScaledFloat } from './scaled-float.js';
import { decodeDate } from './date.js';
import { decodeTime } from './time.js';
import { decodeTierSpans } from './tier-spans.js';
import { decodeRiskArray } from './risk-array.js';

/**
 * Decode one field of a line with the accessor for its kind.
 *
 * @throws FieldDecodeError when the field is fatal (range, malformed date or risk array)
 */
export function decodeField(line: string, spec: FieldSpec): DecodedField {
    const { name } = spec;
    switch (spec.kind) {
        case 'string':
            return { name, kind: spec.kind, value: decodeString(line, spec) };
        case 'string_group':
            return { name, kind: spec.kind, value: decodeStringGroup(line, spec) };
        case 'integer':
            return { name, kind: spec.kind, value: decodeInteger(line, spec) };
        case 'scaled_float':
            return { name, kind: spec.kind, value: decodeScaledFloat(line, spec) };
        case 'date':
            return { name, kind: spec.kind, value: decodeDate(line, spec) };
        case 'time':
            return { name, kind: spec.kind, value: decodeTime(line, spec) };
        case 'tier_spans':
            return { name, kind: spec.kind, value: decodeTierSpans(line, spec) };
        case 'signed_magnitude_array':
            return { name, kind: spec.kind, value: decodeRiskArray(line, spec) };
    }
}
