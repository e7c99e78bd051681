/**
 * Speech Synthesizer boundary
 *
 * An engine turns one chunk of text plus a voice into raw PCM.
 * Instances are not assumed to be safe for concurrent use: the orchestrator
 * gives every worker its own instance through a SynthesizerFactory.
 */

import type { AudioFragment } from '../../types/audio';
import type { VoiceProfile } from '../../types/dialogue';

export interface SynthesisCallOptions {
  /** Fires when the owning segment times out or fails */
  signal?: AbortSignal;
  /** `<segmentIndex>:<ordinal>`, used for temp file names and logs */
  taskId?: string;
}

export interface SpeechSynthesizer {
  synthesize(text: string, voice: VoiceProfile, options?: SynthesisCallOptions): Promise<AudioFragment>;
  /** Release engine resources held by this instance */
  dispose?(): Promise<void> | void;
}

export type SynthesizerFactory = (workerId: number) => SpeechSynthesizer | Promise<SpeechSynthesizer>;
