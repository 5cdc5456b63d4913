/**
 * Decoding failures.
 *
 * Sentinel values (null integers, NaN floats, midnight times) are not errors.
 * These classes cover the cases that abort a whole line: an unregistered tag,
 * a field that runs past the end of the line, and malformed dates or risk arrays.
 */

import type { FieldKind, FieldSpec } from './types/index.js';

export class Pa2Error extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'Pa2Error';
    }
}

/**
 * The first two characters of a line name no registered layout.
 */
export class UnknownTagError extends Pa2Error {
    readonly tag: string;
    readonly line: string;

    constructor(tag: string, line: string) {
        super(`Unknown record tag "${tag}"`);
        this.name = 'UnknownTagError';
        this.tag = tag;
        this.line = line;
    }
}

/**
 * A single field could not be decoded.
 */
export class FieldDecodeError extends Pa2Error {
    readonly field: string;
    readonly kind: FieldKind;
    readonly start: number;
    readonly stop: number;

    constructor(spec: FieldSpec, message: string) {
        super(`${spec.name} [${spec.start}, ${spec.stop}): ${message}`);
        this.name = 'FieldDecodeError';
        this.field = spec.name;
        this.kind = spec.kind;
        this.start = spec.start;
        this.stop = spec.stop;
    }
}

/**
 * The field's footprint extends past the end of the line.
 */
export class FieldRangeError extends FieldDecodeError {
    readonly lineLength: number;

    constructor(spec: FieldSpec, needed: number, lineLength: number) {
        super(spec, `needs ${needed} characters, line has ${lineLength}`);
        this.name = 'FieldRangeError';
        this.lineLength = lineLength;
    }
}

/**
 * The field's content does not match its wire format.
 */
export class MalformedFieldError extends FieldDecodeError {
    readonly text: string;

    constructor(spec: FieldSpec, text: string, expected: string) {
        super(spec, `expected ${expected}, got "${text}"`);
        this.name = 'MalformedFieldError';
        this.text = text;
    }
}

/**
 * A line was rejected because one of its fields failed.
 * The field failure is attached as `cause` and `fieldError`.
 */
export class RecordDecodeError extends Pa2Error {
    readonly tag: string;
    readonly recordType: string;
    readonly field: string;
    readonly line: string;
    readonly fieldError: FieldDecodeError;

    constructor(tag: string, recordType: string, line: string, cause: FieldDecodeError) {
        super(`${recordType} ("${tag}"): ${cause.message}`, { cause });
        this.name = 'RecordDecodeError';
        this.tag = tag;
        this.recordType = recordType;
        this.field = cause.field;
        this.fieldError = cause;
        this.line = line;
    }
}
