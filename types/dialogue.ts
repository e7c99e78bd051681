/**
 * Dialogue Type Definitions
 *
 * Characters, voices and the segment lifecycle of a dialogue run.
 */

import type { AudioFragment } from './audio';
import type { SynthesisFailure, SynthesisTimeout } from '../services/errors';

/**
 * Parameter set identifying exactly one synthesizable voice.
 */
export interface VoiceProfile {
  /** Acoustic model id (e.g. fastspeech2_aishell3) */
  readonly acousticModel: string;
  /** Vocoder id (e.g. hifigan_aishell3) */
  readonly vocoder: string;
  /** Speaker id within a multi-speaker model */
  readonly speakerId: number;
  readonly gender: string;
  readonly description: string;
  /** Prebuilt voice name for engines that select voices by name */
  readonly voiceName?: string;
}

export interface Character {
  readonly name: string;
  /** Matched case-insensitively */
  readonly aliases: readonly string[];
  readonly gender: string;
  readonly voice: VoiceProfile;
  readonly description: string;
}

/**
 * One speaker-attributed unit of dialogue.
 * `index` is assigned at parse time and is the reassembly key.
 */
export interface DialogueSegment {
  readonly index: number;
  /** Raw label as it appeared in the script */
  readonly speaker: string;
  /** Trimmed, whitespace-normalized */
  readonly text: string;
}

export interface VoicedSegment extends DialogueSegment {
  readonly voice: VoiceProfile;
}

export interface SynthesizedSegment extends VoicedSegment {
  readonly audio: AudioFragment;
  readonly chunkCount: number;
}

/**
 * Segment state machine:
 * pending → chunking → dispatched → succeeded
 *                          ↓
 *                   failed | timed_out
 */
export type SegmentState =
  | 'pending'
  | 'chunking'
  | 'dispatched'
  | 'succeeded'
  | 'failed'
  | 'timed_out';

/**
 * Ephemeral unit of work: one synthesis call.
 */
export interface ChunkTask {
  /** `<segmentIndex>:<ordinal>` */
  readonly taskId: string;
  readonly segmentIndex: number;
  readonly ordinal: number;
  readonly text: string;
  readonly voice: VoiceProfile;
}

export type SynthesisResult =
  | { readonly task: ChunkTask; readonly success: true; readonly audio: AudioFragment; readonly durationMs: number }
  | { readonly task: ChunkTask; readonly success: false; readonly error: Error; readonly durationMs: number };

interface SegmentOutcomeBase {
  readonly index: number;
  readonly speaker: string;
  readonly chunkCount: number;
  /** Wall time from first dispatch to terminal state */
  readonly durationMs: number;
}

/**
 * Per-segment entry of the result log.
 */
export type SegmentOutcome =
  | (SegmentOutcomeBase & { readonly status: 'succeeded'; readonly audioDurationMs: number })
  | (SegmentOutcomeBase & { readonly status: 'failed'; readonly error: SynthesisFailure })
  | (SegmentOutcomeBase & { readonly status: 'timed_out'; readonly error: SynthesisTimeout });

export interface SynthesisProgress {
  totalSegments: number;
  pendingSegments: number;
  dispatchedSegments: number;
  succeededSegments: number;
  failedSegments: number;
  timedOutSegments: number;
  completedChunks: number;
  totalChunks: number;
}
