import { describe, it, expect } from 'vitest';
import { chunkText } from '../../../src/utils/chunking';

describe('chunkText', () => {
    it('should pack words greedily up to the bound', () => {
        expect(chunkText('alpha beta gamma delta', 11)).toEqual(['alpha beta', 'gamma delta']);
    });

    it('should collapse any run of whitespace to one space', () => {
        expect(chunkText('  one\n\ttwo   three  ', 100)).toEqual(['one two three']);
    });

    it('should cut a word longer than the bound into pieces', () => {
        expect(chunkText('ab abcdefgh cd', 3)).toEqual(['ab', 'abc', 'def', 'gh', 'cd']);
    });

    it('should not cut a long word inside a surrogate pair', () => {
        expect(chunkText('ab\u{1F600}cd', 3)).toEqual(['ab', '\u{1F600}c', 'd']);
    });

    it('should return no chunks for blank text', () => {
        expect(chunkText('', 10)).toEqual([]);
        expect(chunkText(' \n\t ', 10)).toEqual([]);
    });

    it('should never exceed the bound', () => {
        const text = 'the quick brown fox jumps over the lazy dog '.repeat(20);
        for (const chunk of chunkText(text, 17)) {
            expect(chunk.length).toBeLessThanOrEqual(17);
        }
    });

    it('should reject a non-positive bound', () => {
        expect(() => chunkText('text', 0)).toThrow(RangeError);
        expect(() => chunkText('text', 2.5)).toThrow('maxChars must be a positive integer, got 2.5');
    });
});
