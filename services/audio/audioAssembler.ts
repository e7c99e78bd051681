/**
 * Audio Assembler
 *
 * Combines synthesized segments into one fragment in ascending index order,
 * inserting a silence whenever the speaker changes. Formats must already be
 * uniform: a mismatch raises FormatMismatchError before anything is built.
 */

import type { AudioFragment } from '../../types/audio';
import type { SynthesizedSegment } from '../../types/dialogue';
import { createLogger, type Logger } from '../logger';
import { assertUniformFormat, concatFragments, createSilence, durationMs } from './pcm';

export interface AssemblyPlanEntry {
  kind: 'segment' | 'pause';
  /** Segment index for `segment` entries; index of the following segment for `pause` */
  index: number;
}

/**
 * Ordered list of what the assembled track contains.
 */
export function planAssembly(segments: readonly SynthesizedSegment[]): AssemblyPlanEntry[] {
  const ordered = [...segments].sort((a, b) => a.index - b.index);
  const plan: AssemblyPlanEntry[] = [];
  let previousSpeaker: string | null = null;

  for (const segment of ordered) {
    if (previousSpeaker !== null && segment.speaker !== previousSpeaker) {
      plan.push({ kind: 'pause', index: segment.index });
    }
    plan.push({ kind: 'segment', index: segment.index });
    previousSpeaker = segment.speaker;
  }

  return plan;
}

/**
 * @param pauseMs - Silence inserted at each speaker change
 * @throws FormatMismatchError when fragments do not share one format
 * @throws AssemblyError when there is nothing to assemble
 */
export function assembleDialogue(
  segments: readonly SynthesizedSegment[],
  pauseMs: number,
  logger: Logger = createLogger('AudioAssembler')
): AudioFragment {
  const byIndex = new Map(segments.map(s => [s.index, s]));
  const reference = assertUniformFormat([...segments].sort((a, b) => a.index - b.index).map(s => s.audio));
  const pause = createSilence(reference, pauseMs);

  const parts: AudioFragment[] = [];
  let pauses = 0;
  for (const entry of planAssembly(segments)) {
    if (entry.kind === 'pause') {
      if (pause.data.length > 0) parts.push(pause);
      pauses++;
      continue;
    }
    const segment = byIndex.get(entry.index);
    if (segment) parts.push(segment.audio);
  }

  const combined = concatFragments(parts);
  logger.info(
    `Assembled ${segments.length} segments with ${pauses} pauses (${Math.round(durationMs(combined))}ms)`
  );
  return combined;
}
