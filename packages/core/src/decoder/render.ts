/**
 * Canonical debug rendering of decoded values.
 *
 * Format: strings single-quoted, null, numbers via String() (NaN included),
 * dates and times bare, lists in brackets.
 */

import type { DecodedField } from '../fields/index.js';

export function renderValue(field: DecodedField): string {
    switch (field.kind) {
        case 'string':
            return quote(field.value);
        case 'string_group':
            return `[${field.value.map(quote).join(', ')}]`;
        case 'integer':
            return field.value === null ? 'null' : String(field.value);
        case 'scaled_float':
            return String(field.value);
        case 'date':
        case 'time':
            return field.value;
        case 'tier_spans':
            return `[${field.value.map(([start, end]) => `[${start}, ${end}]`).join(', ')}]`;
        case 'signed_magnitude_array':
            return `[${field.value.map(String).join(', ')}]`;
    }
}

/**
 * `Type(a=..., b=...)` with field names in lexicographic order.
 */
export function renderRecord(type: string, fields: readonly DecodedField[]): string {
    const members = [...fields]
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
        .map((field) => `${field.name}=${renderValue(field)}`);
    return `${type}(${members.join(', ')})`;
}

function quote(value: string): string {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}
