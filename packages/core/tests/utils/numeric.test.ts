import { describe, it, expect } from 'vitest';
import { parseInteger, isAllDigits } from '../../src/utils/numeric.js';

describe('parseInteger', () => {
    it('should parse zero-padded digits', () => {
        expect(parseInteger('000123')).toBe(123);
    });

    it('should ignore surrounding whitespace', () => {
        expect(parseInteger('  42 ')).toBe(42);
    });

    it('should accept a leading sign', () => {
        expect(parseInteger('-15')).toBe(-15);
        expect(parseInteger('+15')).toBe(15);
    });

    it('should fold negative zero into zero', () => {
        expect(Object.is(parseInteger('-000'), 0)).toBe(true);
    });

    it('should return null for blank or non-numeric text', () => {
        expect(parseInteger('')).toBeNull();
        expect(parseInteger('    ')).toBeNull();
        expect(parseInteger('12.5')).toBeNull();
        expect(parseInteger('1e3')).toBeNull();
        expect(parseInteger('- 5')).toBeNull();
    });
});

describe('isAllDigits', () => {
    it('should accept only ASCII digits', () => {
        expect(isAllDigits('01202507202507')).toBe(true);
        expect(isAllDigits('0120250 202507')).toBe(false);
        expect(isAllDigits('')).toBe(false);
    });
});
