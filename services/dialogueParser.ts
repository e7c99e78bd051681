/**
 * Dialogue Parser
 *
 * Splits a `Speaker：text` script into ordered, speaker-attributed segments.
 *
 * A label is the text before a standard or full-width colon, starting either
 * at the beginning of a line or right after a sentence terminator
 * (`A：hello。B：world。`). Labels never contain sentence terminators, so
 * `intro。A：hi。` yields a narrated `intro。` followed by speaker `A`; only a
 * line-start label may hold a dot followed by a space (`Dr. Smith:`).
 */

import type { DialogueSegment } from '../types/dialogue';
import { charLength, normalizeWhitespace } from './textSegmenter';

/** Speaker label given to unattributed leading text */
export const NARRATOR_LABEL = 'Narrator';

/** Labels found mid-line are capped to keep ordinary "word: value" text out */
const MAX_INLINE_LABEL_LENGTH = 24;

const LABEL_CHAR = String.raw`(?:[^：:\n\r。！？!?….]|\.(?!\s))`;

// At a line start a label may hold dots ("Dr. Smith") but no other terminator
const LINE_START_LABEL = /^[ \t]*([^：:\n\r。！？!?…]+?)[ \t]*[：:]/gm;

const INLINE_LABEL = new RegExp(
  String.raw`(?:(?<=[。！？!?…])|(?<=\.[ \t]))[ \t]*(${LABEL_CHAR}+?)[ \t]*[：:]`,
  'g'
);

interface LabelBoundary {
  /** Where the label token starts (end of the previous segment's text) */
  start: number;
  /** First character after the colon */
  contentStart: number;
  speaker: string;
}

function collect(script: string, pattern: RegExp, inline: boolean): LabelBoundary[] {
  const boundaries: LabelBoundary[] = [];
  for (const match of script.matchAll(pattern)) {
    const start = match.index ?? 0;
    const speaker = (match[1] ?? '').trim();
    if (!speaker) continue;
    if (inline && charLength(speaker) > MAX_INLINE_LABEL_LENGTH) continue;
    boundaries.push({ start, contentStart: start + match[0].length, speaker });
  }
  return boundaries;
}

function findLabels(script: string): LabelBoundary[] {
  const candidates = [...collect(script, LINE_START_LABEL, false), ...collect(script, INLINE_LABEL, true)].sort(
    (a, b) => a.start - b.start
  );

  // An inline candidate inside an accepted label ("Smith" in "Dr. Smith:") is dropped
  const boundaries: LabelBoundary[] = [];
  let consumedUntil = 0;
  for (const candidate of candidates) {
    if (candidate.start < consumedUntil) continue;
    boundaries.push(candidate);
    consumedUntil = candidate.contentStart;
  }
  return boundaries;
}

/**
 * Parses a dialogue script into segments indexed 0..N-1 in document order.
 *
 * - Text before the first label becomes a `Narrator` segment at index 0.
 * - Segments whose text is empty after trimming are dropped and take no index.
 * - A script without any label yields `[]`; callers report that as a parse failure.
 */
export function parseDialogue(script: string): DialogueSegment[] {
  const text = script.replace(/^\uFEFF/, '');
  const labels = findLabels(text);
  const first = labels[0];
  if (!first) return [];

  const units: Array<{ speaker: string; text: string }> = [];

  const intro = normalizeWhitespace(text.slice(0, first.start));
  if (intro) units.push({ speaker: NARRATOR_LABEL, text: intro });

  labels.forEach((label, i) => {
    const end = labels[i + 1]?.start ?? text.length;
    const body = normalizeWhitespace(text.slice(label.contentStart, end));
    if (body) units.push({ speaker: label.speaker, text: body });
  });

  return units.map((unit, index) => ({ index, speaker: unit.speaker, text: unit.text }));
}
