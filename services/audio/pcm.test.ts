import { describe, it, expect } from 'vitest';
import { concatFragments, createSilence, durationMs, frameCount } from './pcm';
import { AssemblyError, FormatMismatchError } from '../errors';
import type { AudioFormat } from '../../types/audio';

const MONO_16: AudioFormat = { sampleRate: 24000, channels: 1, bitDepth: 16 };

describe('createSilence', () => {
  it('creates the exact number of zeroed frames', () => {
    const silence = createSilence(MONO_16, 300);
    expect(frameCount(silence)).toBe(7200);
    expect(silence.data.length).toBe(14400);
    expect(silence.data.every(b => b === 0)).toBe(true);
  });

  it('rounds to the nearest whole frame', () => {
    // 22050 * 0.0101 = 222.705 frames
    expect(frameCount(createSilence({ sampleRate: 22050, channels: 1, bitDepth: 16 }, 10.1))).toBe(223);
  });

  it('uses the unsigned midpoint for 8-bit audio', () => {
    const silence = createSilence({ sampleRate: 8000, channels: 2, bitDepth: 8 }, 1);
    expect(silence.data.length).toBe(16);
    expect(silence.data.every(b => b === 0x80)).toBe(true);
  });
});

describe('concatFragments', () => {
  it('appends raw samples in order', () => {
    const a = { format: MONO_16, data: Buffer.from([1, 0, 2, 0]) };
    const b = { format: MONO_16, data: Buffer.from([3, 0]) };
    const combined = concatFragments([a, b]);
    expect([...combined.data]).toEqual([1, 0, 2, 0, 3, 0]);
    expect(frameCount(combined)).toBe(3);
    expect(durationMs(combined)).toBe(0.125);
  });

  it('reports the position of the first mismatching fragment', () => {
    const a = { format: MONO_16, data: Buffer.alloc(2) };
    const b = { format: { ...MONO_16, channels: 2 }, data: Buffer.alloc(4) };
    let caught: unknown;
    try {
      concatFragments([a, a, b]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FormatMismatchError);
    expect(caught).toMatchObject({
      position: 2,
      message: 'Audio format mismatch at fragment 2: expected 24000Hz/1ch/16bit, got 24000Hz/2ch/16bit',
    });
  });

  it('refuses an empty list', () => {
    expect(() => concatFragments([])).toThrow(AssemblyError);
  });
});
