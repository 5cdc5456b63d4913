/**
 * Dispatcher: raw line -> DecodedRecord.
 *
 * The tag (first two characters) selects the layout; every field of the layout
 * is decoded in order. The first fatal field aborts the line, so callers never
 * see a partially decoded record.
 */

import type { DecodedField } from '../fields/index.js';
import { decodeField } from '../fields/index.js';
import { RecordRegistry, DEFAULT_REGISTRY } from '../registry/index.js';
import { FieldDecodeError, RecordDecodeError, UnknownTagError } from '../errors.js';
import { TAG_LENGTH } from '../types/index.js';
import { DecodedRecord } from './record.js';

/**
 * Result of tryDecodeLine. Errors are returned as data.
 */
export type DecodeOutcome =
    | { ok: true; record: DecodedRecord }
    | { ok: false; error: UnknownTagError | RecordDecodeError };

/**
 * Tag of a raw line. Lines shorter than a tag yield a short tag, which no layout matches.
 */
export function readTag(line: string): string {
    return line.slice(0, TAG_LENGTH);
}

/**
 * Decode one full line.
 *
 * @param line - Raw fixed-width line, without its line terminator
 * @param registry - Layouts to dispatch on (defaults to the shipped PA2 table)
 * @throws UnknownTagError if the tag has no layout
 * @throws RecordDecodeError if a field is out of range or malformed
 */
export function decodeLine(line: string, registry: RecordRegistry = DEFAULT_REGISTRY): DecodedRecord {
    const tag = readTag(line);
    const layout = registry.get(tag);
    if (!layout) {
        throw new UnknownTagError(tag, line);
    }

    const fields: DecodedField[] = [];
    for (const spec of layout.fields) {
        try {
            fields.push(decodeField(line, spec));
        } catch (err) {
            if (err instanceof FieldDecodeError) {
                throw new RecordDecodeError(tag, layout.name, line, err);
            }
            throw err;
        }
    }

    return new DecodedRecord(line, layout, fields);
}

/**
 * Decode one line, returning decode failures instead of throwing them.
 * Unexpected errors still propagate.
 */
export function tryDecodeLine(line: string, registry: RecordRegistry = DEFAULT_REGISTRY): DecodeOutcome {
    try {
        return { ok: true, record: decodeLine(line, registry) };
    } catch (err) {
        if (err instanceof UnknownTagError || err instanceof RecordDecodeError) {
            return { ok: false, error: err };
        }
        throw err;
    }
}
