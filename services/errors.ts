/**
 * Dialogue TTS Error Types
 *
 * Fatal errors (configuration, IO, format mismatch) abort a run.
 * Synthesis failures and timeouts are per-segment and travel inside
 * result variants rather than being thrown across task boundaries.
 */

import type { AudioFormat } from '../types/audio';

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PARSE_ERROR'
  | 'SYNTHESIS_FAILED'
  | 'SYNTHESIS_TIMEOUT'
  | 'ENGINE_ERROR'
  | 'FORMAT_MISMATCH'
  | 'IO_ERROR'
  | 'INVALID_AUDIO'
  | 'NOTHING_TO_ASSEMBLE';

export class DialogueTtsError extends Error {
  constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DialogueTtsError';
  }
}

export class ConfigurationError extends DialogueTtsError {
  constructor(message: string, public readonly issues: readonly string[] = [], options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

/** Reported, never fatal on its own. */
export class ParseError extends DialogueTtsError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class SynthesisFailure extends DialogueTtsError {
  constructor(
    message: string,
    public readonly segmentIndex: number,
    public readonly speaker: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'SYNTHESIS_FAILED', options);
    this.name = 'SynthesisFailure';
  }
}

export class SynthesisTimeout extends DialogueTtsError {
  constructor(
    public readonly segmentIndex: number,
    public readonly speaker: string,
    public readonly timeoutMs: number
  ) {
    super(`Segment ${segmentIndex} (${speaker}) not complete within ${timeoutMs}ms`, 'SYNTHESIS_TIMEOUT');
    this.name = 'SynthesisTimeout';
  }
}

/** Raised by a speech engine adapter for a single call. */
export class EngineError extends DialogueTtsError {
  constructor(message: string, public readonly engine: string, options?: { cause?: unknown }) {
    super(message, 'ENGINE_ERROR', options);
    this.name = 'EngineError';
  }
}

export class FormatMismatchError extends DialogueTtsError {
  constructor(
    public readonly expected: AudioFormat,
    public readonly actual: AudioFormat,
    public readonly position: number
  ) {
    super(
      `Audio format mismatch at fragment ${position}: expected ${describeFormat(expected)}, got ${describeFormat(actual)}`,
      'FORMAT_MISMATCH'
    );
    this.name = 'FormatMismatchError';
  }
}

export class FileIOError extends DialogueTtsError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, 'IO_ERROR', options);
    this.name = 'FileIOError';
  }
}

export class InvalidAudioError extends DialogueTtsError {
  constructor(message: string) {
    super(message, 'INVALID_AUDIO');
    this.name = 'InvalidAudioError';
  }
}

export class AssemblyError extends DialogueTtsError {
  constructor(message: string) {
    super(message, 'NOTHING_TO_ASSEMBLE');
    this.name = 'AssemblyError';
  }
}

export function describeFormat(format: AudioFormat): string {
  return `${format.sampleRate}Hz/${format.channels}ch/${format.bitDepth}bit`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
