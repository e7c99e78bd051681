/**
 * PCM fragment helpers: frame math, silence and concatenation.
 */

import type { AudioFormat, AudioFragment } from '../../types/audio';
import { AssemblyError, FormatMismatchError } from '../errors';

export const SUPPORTED_BIT_DEPTHS: readonly number[] = [8, 16, 24, 32];

export function bytesPerFrame(format: AudioFormat): number {
  return format.channels * (format.bitDepth / 8);
}

export function frameCount(fragment: AudioFragment): number {
  return Math.floor(fragment.data.length / bytesPerFrame(fragment.format));
}

export function durationMs(fragment: AudioFragment): number {
  return (frameCount(fragment) / fragment.format.sampleRate) * 1000;
}

export function formatsEqual(a: AudioFormat, b: AudioFormat): boolean {
  return a.sampleRate === b.sampleRate && a.channels === b.channels && a.bitDepth === b.bitDepth;
}

export function isSupportedFormat(format: AudioFormat): boolean {
  return (
    Number.isInteger(format.sampleRate) &&
    format.sampleRate > 0 &&
    Number.isInteger(format.channels) &&
    format.channels > 0 &&
    SUPPORTED_BIT_DEPTHS.includes(format.bitDepth)
  );
}

/**
 * Silence of `ms` milliseconds, rounded to the nearest whole frame.
 * 8-bit PCM is unsigned, so its silence is 0x80 rather than 0.
 */
export function createSilence(format: AudioFormat, ms: number): AudioFragment {
  const frames = Math.max(0, Math.round((format.sampleRate * ms) / 1000));
  const fill = format.bitDepth === 8 ? 0x80 : 0;
  return {
    format: { ...format },
    data: Buffer.alloc(frames * bytesPerFrame(format), fill),
  };
}

/**
 * Throws FormatMismatchError at the first fragment whose format differs
 * from the first fragment's.
 */
export function assertUniformFormat(fragments: readonly AudioFragment[]): AudioFormat {
  const reference = fragments[0]?.format;
  if (!reference) {
    throw new AssemblyError('No audio fragments to combine');
  }
  fragments.forEach((fragment, position) => {
    if (!formatsEqual(reference, fragment.format)) {
      throw new FormatMismatchError(reference, fragment.format, position);
    }
  });
  return reference;
}

/**
 * Raw sample append. No resampling or crossfade; inputs are not modified.
 */
export function concatFragments(fragments: readonly AudioFragment[]): AudioFragment {
  const format = assertUniformFormat(fragments);
  return {
    format: { ...format },
    data: Buffer.concat(fragments.map(f => f.data)),
  };
}
