import { describe, it, expect } from 'vitest';
import { decodeString, decodeStringGroup } from '../../src/fields/index.js';
import type { FieldSpecOf } from '../../src/types/index.js';

describe('decodeString', () => {
    const acronym: FieldSpecOf<'string'> = { name: 'acronym', kind: 'string', start: 2, stop: 8 };

    it('should strip trailing whitespace only', () => {
        expect(decodeString('1  CBT  01', acronym)).toBe(' CBT');
    });

    it('should return an empty string for a blank field', () => {
        expect(decodeString('1         ', acronym)).toBe('');
    });

    it('should clamp a range that runs past the end of the line', () => {
        expect(decodeString('1 CB', acronym)).toBe('CB');
        expect(decodeString('1 ', acronym)).toBe('');
    });
});

describe('decodeStringGroup', () => {
    const legs: FieldSpecOf<'string_group'> = { name: 'legs', kind: 'string_group', start: 2, stop: 23, step: 7 };

    it('should split the range into step-wide chunks', () => {
        expect(decodeStringGroup('C 011401A021502B031601A', legs)).toEqual(['011401A', '021502B', '031601A']);
    });

    it('should right-trim chunks and drop blank ones', () => {
        expect(decodeStringGroup('C 06            07', legs)).toEqual(['06', '07']);
    });

    it('should keep leading whitespace inside a chunk', () => {
        expect(decodeStringGroup('C   AB   ', legs)).toEqual(['  AB']);
    });

    it('should return an empty list for a line that ends before the range', () => {
        expect(decodeStringGroup('C', legs)).toEqual([]);
    });
});
