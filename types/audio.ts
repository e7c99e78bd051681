/**
 * Audio Types
 *
 * Raw PCM fragments exchanged between the synthesis adapters,
 * the orchestrator and the assembler.
 */

/**
 * Sample layout shared by every fragment combined in one run.
 */
export interface AudioFormat {
  /** Frames per second (e.g. 24000) */
  sampleRate: number;
  /** Interleaved channel count (1 = mono) */
  channels: number;
  /** Bits per sample: 8 (unsigned), 16, 24 or 32 (signed little-endian) */
  bitDepth: number;
}

/**
 * A buffer of interleaved little-endian PCM samples plus its format.
 */
export interface AudioFragment {
  format: AudioFormat;
  data: Buffer;
}
