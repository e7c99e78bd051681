import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { charLength, normalizeWhitespace, segmentText, splitSentences } from './textSegmenter';

const ALPHABET = ['a', 'b', 'Z', '1', '你', '好', '世', '界', '😀', ' ', '\n', '\t', '。', '！', '？', '.', '!', '?', '，', ',', '；', ';'];

const textArb = fc.array(fc.constantFrom(...ALPHABET), { maxLength: 300 }).map(chars => chars.join(''));

const stripWhitespace = (s: string) => s.replace(/\s/g, '');

describe('normalizeWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(normalizeWhitespace('  hello \n\t world ')).toBe('hello world');
  });
});

describe('splitSentences', () => {
  it('keeps terminators attached to the preceding sentence', () => {
    expect(splitSentences('你好。 再见！')).toEqual(['你好。', '再见！']);
  });

  it('keeps terminator runs together', () => {
    expect(splitSentences('真的吗？！好的。')).toEqual(['真的吗？！', '好的。']);
  });

  it('does not cut decimal numbers', () => {
    expect(splitSentences('Pi is 3.14 today. Yes.')).toEqual(['Pi is 3.14 today.', 'Yes.']);
  });
});

describe('segmentText', () => {
  it('returns no chunks for empty or whitespace-only input', () => {
    expect(segmentText('', 10)).toEqual([]);
    expect(segmentText(' \n\t ', 10)).toEqual([]);
  });

  it('returns short text as a single normalized chunk', () => {
    expect(segmentText('Hello   world.', 200)).toEqual(['Hello world.']);
  });

  it('packs whole sentences greedily', () => {
    expect(segmentText('第一句。第二句。第三句。', 8)).toEqual(['第一句。第二句。', '第三句。']);
  });

  it('keeps the source spacing between packed sentences', () => {
    expect(segmentText('One. Two. Three.', 9)).toEqual(['One. Two.', 'Three.']);
  });

  it('falls back to clause punctuation for an over-long sentence', () => {
    expect(segmentText('甲乙丙丁，戊己庚辛，壬癸。', 6)).toEqual(['甲乙丙丁，', '戊己庚辛，', '壬癸。']);
  });

  it('falls back to fixed-width slices when a clause is still too long', () => {
    expect(segmentText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('never splits a surrogate pair', () => {
    expect(segmentText('😀😀😀', 2)).toEqual(['😀😀', '😀']);
  });

  it('treats a maximum below 1 as 1', () => {
    expect(segmentText('ab', 0)).toEqual(['a', 'b']);
  });

  describe('properties', () => {
    it('every chunk is non-empty, trimmed and within the limit', () => {
      fc.assert(
        fc.property(textArb, fc.integer({ min: 1, max: 40 }), (text, max) => {
          for (const chunk of segmentText(text, max)) {
            expect(chunk.length).toBeGreaterThan(0);
            expect(chunk).toBe(chunk.trim());
            expect(charLength(chunk)).toBeLessThanOrEqual(max);
          }
        })
      );
    });

    it('chunks reconstruct the input apart from whitespace', () => {
      fc.assert(
        fc.property(textArb, fc.integer({ min: 1, max: 40 }), (text, max) => {
          expect(stripWhitespace(segmentText(text, max).join(''))).toBe(stripWhitespace(text));
        })
      );
    });

    it('is deterministic', () => {
      fc.assert(
        fc.property(textArb, fc.integer({ min: 1, max: 40 }), (text, max) => {
          expect(segmentText(text, max)).toEqual(segmentText(text, max));
        })
      );
    });
  });
});
