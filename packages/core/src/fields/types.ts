import type { FieldKind, FieldSpecOf } from '../types/index.js';

/**
 * Start and end month (YYYYMM) of one margin tier.
 */
export type TierSpan = readonly [start: number, end: number];

/**
 * Decoded value type for each field kind.
 *
 * - integer: null when the slice is not an integer
 * - scaled_float: NaN when the slice is not an integer
 * - date: ISO YYYY-MM-DD
 * - time: HH:MM, '00:00' when the slice is not a valid time
 */
export interface FieldValueByKind {
    string: string;
    string_group: readonly string[];
    integer: number | null;
    scaled_float: number;
    date: string;
    time: string;
    tier_spans: readonly TierSpan[];
    signed_magnitude_array: readonly number[];
}

export type FieldValue = FieldValueByKind[FieldKind];

/**
 * A pure decode function for one kind of field.
 */
export type FieldAccessor<K extends FieldKind> = (line: string, spec: FieldSpecOf<K>) => FieldValueByKind[K];

/**
 * A decoded field tagged with its kind, so consumers can narrow on `kind`.
 */
export type DecodedField = {
    [K in FieldKind]: { name: string; kind: K; value: FieldValueByKind[K] };
}[FieldKind];
