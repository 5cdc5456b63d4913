/**
 * A decoded PA2 line.
 *
 * The record keeps the raw line next to its decoded fields rather than
 * being the line. Field values are computed once by the dispatcher and never
 * change; the field list comes from the layout, in layout order.
 */

import type { FieldKind, RecordLayout } from '../types/index.js';
import type { DecodedField, FieldValue, TierSpan } from '../fields/index.js';
import { renderRecord } from './render.js';

function freezeField(field: DecodedField): DecodedField {
    switch (field.kind) {
        case 'tier_spans':
            field.value.forEach((span) => Object.freeze(span));
            Object.freeze(field.value);
            break;
        case 'string_group':
        case 'signed_magnitude_array':
            Object.freeze(field.value);
            break;
    }
    return Object.freeze(field);
}

export class DecodedRecord {
    readonly raw: string;
    readonly layout: RecordLayout;
    private readonly decoded: ReadonlyMap<string, DecodedField>;

    constructor(raw: string, layout: RecordLayout, fields: readonly DecodedField[]) {
        this.raw = raw;
        this.layout = layout;
        this.decoded = new Map(fields.map((field): [string, DecodedField] => [field.name, freezeField(field)]));
        Object.freeze(this);
    }

    get tag(): string {
        return this.layout.tag;
    }

    /**
     * Record type name, e.g. "CurrencyConversion".
     */
    get type(): string {
        return this.layout.name;
    }

    get title(): string {
        return this.layout.title;
    }

    has(name: string): boolean {
        return this.decoded.has(name);
    }

    /**
     * Decoded field by name.
     *
     * @throws Error if the layout declares no such field
     */
    field(name: string): DecodedField {
        const field = this.decoded.get(name);
        if (!field) {
            throw new Error(`${this.type} has no field "${name}"`);
        }
        return field;
    }

    get(name: string): FieldValue {
        return this.field(name).value;
    }

    string(name: string): string {
        const field = this.field(name);
        if (field.kind === 'string') return field.value;
        throw this.kindMismatch(field, 'string');
    }

    strings(name: string): readonly string[] {
        const field = this.field(name);
        if (field.kind === 'string_group') return field.value;
        throw this.kindMismatch(field, 'string_group');
    }

    integer(name: string): number | null {
        const field = this.field(name);
        if (field.kind === 'integer') return field.value;
        throw this.kindMismatch(field, 'integer');
    }

    float(name: string): number {
        const field = this.field(name);
        if (field.kind === 'scaled_float') return field.value;
        throw this.kindMismatch(field, 'scaled_float');
    }

    date(name: string): string {
        const field = this.field(name);
        if (field.kind === 'date') return field.value;
        throw this.kindMismatch(field, 'date');
    }

    time(name: string): string {
        const field = this.field(name);
        if (field.kind === 'time') return field.value;
        throw this.kindMismatch(field, 'time');
    }

    tierSpans(name: string): readonly TierSpan[] {
        const field = this.field(name);
        if (field.kind === 'tier_spans') return field.value;
        throw this.kindMismatch(field, 'tier_spans');
    }

    riskArray(name: string): readonly number[] {
        const field = this.field(name);
        if (field.kind === 'signed_magnitude_array') return field.value;
        throw this.kindMismatch(field, 'signed_magnitude_array');
    }

    /**
     * All fields in layout order.
     */
    fields(): DecodedField[] {
        return [...this.decoded.values()];
    }

    /**
     * Plain name -> value object in layout order, for export and JSON.
     */
    toObject(): Record<string, FieldValue> {
        const result: Record<string, FieldValue> = {};
        for (const field of this.decoded.values()) {
            result[field.name] = field.value;
        }
        return result;
    }

    /**
     * Same raw line decoded with the same layout.
     */
    equals(other: DecodedRecord): boolean {
        return this.raw === other.raw && this.layout === other.layout;
    }

    toString(): string {
        return renderRecord(this.type, this.fields());
    }

    private kindMismatch(field: DecodedField, expected: FieldKind): Error {
        return new Error(`${this.type}.${field.name} is a ${field.kind} field, not ${expected}`);
    }
}
