import { describe, it, expect } from 'vitest';
import { decodeTierSpans, decodeRiskArray } from '../../src/fields/index.js';
import { FieldRangeError, MalformedFieldError } from '../../src/errors.js';
import type { FieldSpecOf } from '../../src/types/index.js';

describe('decodeTierSpans', () => {
    const tiers: FieldSpecOf<'tier_spans'> = { name: 'tiers', kind: 'tier_spans', start: 2, stop: 30 };

    it('should read start and end months from each chunk', () => {
        const line = '3 0120250720250702202508202510';
        expect(decodeTierSpans(line, tiers)).toEqual([
            [202507, 202507],
            [202508, 202510],
        ]);
    });

    it('should skip padding chunks', () => {
        const line = `3 ${' '.repeat(14)}02202508202510`;
        expect(decodeTierSpans(line, tiers)).toEqual([[202508, 202510]]);
    });

    it('should skip chunks that are only partly numeric', () => {
        const line = '3 01202507      02202508202510';
        expect(decodeTierSpans(line, tiers)).toEqual([[202508, 202510]]);
    });

    it('should throw a range error when the line is too short', () => {
        expect(() => decodeTierSpans('3 01202507202507', tiers)).toThrow(FieldRangeError);
    });
});

describe('decodeRiskArray', () => {
    const risk: FieldSpecOf<'signed_magnitude_array'> = { name: 'risk', kind: 'signed_magnitude_array', start: 2, stop: 20 };

    it('should decode signed magnitudes in units of 1e-4', () => {
        const values = decodeRiskArray('8100000+00567-01133+', risk);
        expect(values).toHaveLength(3);
        expect(values[0]).toBe(0);
        expect(values[1]).toBe(-0.0567);
        expect(values[2]).toBeCloseTo(0.1133, 10);
    });

    it('should treat any flag other than minus as positive', () => {
        expect(decodeRiskArray('8100100 00100X00100-', risk)).toEqual([0.01, 0.01, -0.01]);
    });

    it('should throw on a malformed magnitude', () => {
        expect(() => decodeRiskArray('8100000+     +00100+', risk)).toThrow(MalformedFieldError);
        expect(() => decodeRiskArray('8100000+     +00100+', risk)).toThrow(
            'risk [2, 20): expected a signed magnitude, got "     +"'
        );
    });

    it('should throw a range error when the line is too short', () => {
        expect(() => decodeRiskArray('8100000+', risk)).toThrow(FieldRangeError);
    });
});
