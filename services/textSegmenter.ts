/**
 * Text Segmenter
 *
 * Splits text into synthesis chunks no longer than `maxLength` characters,
 * cutting at sentence terminators first, then at clause punctuation, then at
 * fixed width. Lengths are counted in code points so CJK text and emoji are
 * never cut inside a character.
 *
 * @module services/textSegmenter
 */

/** Full-width and half-width sentence terminators (kept with their sentence) */
const SENTENCE_TERMINATORS = new Set(['。', '！', '？', '!', '?', '.', '…']);

/** Clause punctuation used when a single sentence is too long */
const CLAUSE_DELIMITERS = new Set(['，', ',', '；', ';', '、', '：', ':']);

const ASCII_ALNUM = /[A-Za-z0-9]/;

/**
 * A piece of normalized text plus the whitespace that preceded it,
 * so chunks keep the source spacing when pieces are packed back together.
 */
interface TextUnit {
  text: string;
  separator: string;
}

/**
 * Collapses whitespace runs to one space and trims.
 *
 * @example
 * normalizeWhitespace("  hello \n\t world ") // "hello world"
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Length in code points. */
export function charLength(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

function isCutPoint(chars: string[], i: number, delimiters: Set<string>): boolean {
  const ch = chars[i];
  if (ch === undefined || !delimiters.has(ch)) return false;

  const next = chars[i + 1];
  if (next === undefined) return true;
  // Keep runs like "?!" or "……" together
  if (delimiters.has(next)) return false;
  // "3.14", "v1.2", "e.g" are not sentence ends
  if ((ch === '.' || ch === ':' || ch === ',') && ASCII_ALNUM.test(next)) {
    const prev = chars[i - 1];
    return prev === undefined || !ASCII_ALNUM.test(prev);
  }
  return true;
}

function splitAtDelimiters(text: string, separator: string, delimiters: Set<string>): TextUnit[] {
  const chars = Array.from(text);
  const units: TextUnit[] = [];
  let buffer = '';

  const flush = () => {
    const trimmed = buffer.trim();
    if (trimmed) {
      const leading = /^\s/.test(buffer) ? ' ' : '';
      units.push({ text: trimmed, separator: units.length === 0 ? separator : leading });
    }
    buffer = '';
  };

  for (let i = 0; i < chars.length; i++) {
    buffer += chars[i];
    if (isCutPoint(chars, i, delimiters)) flush();
  }
  flush();

  return units;
}

/**
 * Splits normalized text into sentences, terminators attached.
 *
 * @example
 * splitSentences("你好。 再见！") // ["你好。", "再见！"]
 */
export function splitSentences(text: string): string[] {
  return splitAtDelimiters(normalizeWhitespace(text), '', SENTENCE_TERMINATORS).map(u => u.text);
}

function sliceFixedWidth(unit: TextUnit, maxLength: number): TextUnit[] {
  const chars = Array.from(unit.text);
  const slices: TextUnit[] = [];
  let carrySpace = false;

  for (let start = 0; start < chars.length; start += maxLength) {
    const raw = chars.slice(start, start + maxLength).join('');
    const trimmed = raw.trim();
    const separator = slices.length === 0 ? unit.separator : carrySpace || /^\s/.test(raw) ? ' ' : '';
    carrySpace = /\s$/.test(raw);
    if (trimmed) slices.push({ text: trimmed, separator });
  }

  return slices;
}

/**
 * Breaks a unit into atoms that each fit `maxLength`:
 * clause split first, fixed-width slicing for whatever still overflows.
 */
function toAtoms(sentence: TextUnit, maxLength: number): TextUnit[] {
  if (charLength(sentence.text) <= maxLength) return [sentence];

  const atoms: TextUnit[] = [];
  for (const clause of splitAtDelimiters(sentence.text, sentence.separator, CLAUSE_DELIMITERS)) {
    if (charLength(clause.text) <= maxLength) {
      atoms.push(clause);
    } else {
      atoms.push(...sliceFixedWidth(clause, maxLength));
    }
  }
  return atoms;
}

/**
 * Splits text into ordered, non-empty chunks of at most `maxLength`
 * code points. Sentences are packed greedily; a sentence longer than
 * `maxLength` is split at clause punctuation, then at fixed width.
 *
 * Empty or whitespace-only input yields `[]`. Removing whitespace from
 * `chunks.join('')` gives the input with whitespace removed.
 *
 * @param text - Raw text
 * @param maxLength - Maximum chunk length in characters (values below 1 act as 1)
 *
 * @example
 * segmentText("第一句。第二句。第三句。", 8) // ["第一句。第二句。", "第三句。"]
 */
export function segmentText(text: string, maxLength: number): string[] {
  const limit = Math.max(1, Math.floor(maxLength));
  const normalized = normalizeWhitespace(text);
  if (!normalized) return [];

  const atoms = splitAtDelimiters(normalized, '', SENTENCE_TERMINATORS).flatMap(s => toAtoms(s, limit));

  const chunks: string[] = [];
  let current = '';

  for (const atom of atoms) {
    if (!current) {
      current = atom.text;
      continue;
    }
    const candidate = current + atom.separator + atom.text;
    if (charLength(candidate) <= limit) {
      current = candidate;
    } else {
      chunks.push(current);
      current = atom.text;
    }
  }
  if (current) chunks.push(current);

  return chunks;
}
