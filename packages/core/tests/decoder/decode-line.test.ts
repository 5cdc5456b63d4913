import { describe, it, expect } from 'vitest';
import { decodeLine, tryDecodeLine, readTag } from '../../src/decoder/index.js';
import { RecordRegistry } from '../../src/registry/index.js';
import { FieldRangeError, RecordDecodeError, UnknownTagError } from '../../src/errors.js';

const SPREAD_LINE = 'E 17    0000100002502509   010000A2512   020000B2603   010000A';

describe('readTag', () => {
    it('should return the first two characters', () => {
        expect(readTag('81CBT06')).toBe('81');
        expect(readTag('T CLP')).toBe('T ');
    });

    it('should return a short tag for a short line', () => {
        expect(readTag('T')).toBe('T');
        expect(readTag('')).toBe('');
    });
});

describe('decodeLine', () => {
    it('should decode a currency conversion record', () => {
        const record = decodeLine('T CLPCUSD$0000001063');
        expect(record.type).toBe('CurrencyConversion');
        expect(record.tag).toBe('T ');
        expect(record.toObject()).toEqual({
            from_iso: 'CLP',
            from_code: 'C',
            to_iso: 'USD',
            to_code: '$',
            rate: 0.001063,
        });
    });

    it('should decode an exchange header', () => {
        const record = decodeLine('1 CBT  01');
        expect(record.string('acronym')).toBe('CBT');
        expect(record.string('code')).toBe('01');
    });

    it('should throw on an unknown tag', () => {
        expect(() => decodeLine('Q ABC')).toThrow(UnknownTagError);
        expect(() => decodeLine('Q ABC')).toThrow('Unknown record tag "Q "');
    });

    it('should treat a tag that differs only by padding as unknown', () => {
        expect(() => decodeLine('T')).toThrow(UnknownTagError);
    });

    it('should wrap a failing field in a record error', () => {
        let caught: unknown;
        try {
            decodeLine(SPREAD_LINE);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(RecordDecodeError);
        if (caught instanceof RecordDecodeError) {
            expect(caught.message).toBe(
                'SeriesIntracommoditySpreads ("E "): leg4_month [62, 66): needs 66 characters, line has 62'
            );
            expect(caught.tag).toBe('E ');
            expect(caught.recordType).toBe('SeriesIntracommoditySpreads');
            expect(caught.field).toBe('leg4_month');
            expect(caught.line).toBe(SPREAD_LINE);
            expect(caught.fieldError).toBeInstanceOf(FieldRangeError);
            expect(caught.cause).toBe(caught.fieldError);
        }
    });

    it('should reject a header with a malformed business date', () => {
        expect(() => decodeLine('0 CME   2025XX20')).toThrow(
            'ExchangeComplexHeader ("0 "): business_date [8, 16): expected a YYYYMMDD date, got "2025XX20"'
        );
    });

    it('should dispatch on a custom registry', () => {
        const registry = RecordRegistry.fromLayouts([
            {
                tag: 'Q ',
                name: 'Quote',
                title: 'Quote',
                fields: [
                    { name: 'symbol', kind: 'string', start: 2, stop: 6 },
                    { name: 'price', kind: 'scaled_float', start: 6, stop: 10, scale: 0.01 },
                ],
            },
        ]);
        const record = decodeLine('Q ABC 0250', registry);
        expect(record.type).toBe('Quote');
        expect(record.string('symbol')).toBe('ABC');
        expect(record.float('price')).toBe(2.5);
        expect(() => decodeLine('T CLPCUSD$0000001063', registry)).toThrow(UnknownTagError);
    });
});

describe('tryDecodeLine', () => {
    it('should return the record on success', () => {
        const outcome = tryDecodeLine('1 CBT  01');
        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.record.type).toBe('ExchangeHeader');
        }
    });

    it('should return an unknown tag as data', () => {
        const outcome = tryDecodeLine('Q ABC');
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(UnknownTagError);
            expect(outcome.error.line).toBe('Q ABC');
        }
    });

    it('should return a record error as data', () => {
        const outcome = tryDecodeLine(SPREAD_LINE);
        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error).toBeInstanceOf(RecordDecodeError);
        }
    });
});
