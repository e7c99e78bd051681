/**
 * WAV Codec
 *
 * Reads and writes RIFF/WAVE files holding integer PCM
 * (format tag 1, or WAVE_FORMAT_EXTENSIBLE with a PCM sub-format).
 */

import fs from 'fs/promises';
import path from 'path';
import type { AudioFormat, AudioFragment } from '../../types/audio';
import { FileIOError, InvalidAudioError, errorMessage } from '../errors';
import { bytesPerFrame, isSupportedFormat } from './pcm';

const WAV_HEADER_SIZE = 44;
const FORMAT_PCM = 1;
const FORMAT_EXTENSIBLE = 0xfffe;

/**
 * Create a canonical 44-byte WAV header for PCM data.
 */
export function createWavHeader(dataSize: number, format: AudioFormat): Buffer {
  const blockAlign = bytesPerFrame(format);
  const byteRate = format.sampleRate * blockAlign;
  const header = Buffer.alloc(WAV_HEADER_SIZE);

  // RIFF chunk descriptor
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8, 'ascii');

  // fmt sub-chunk
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  header.writeUInt16LE(FORMAT_PCM, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitDepth, 34);

  // data sub-chunk
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataSize, 40);

  return header;
}

export function encodeWav(fragment: AudioFragment): Buffer {
  return Buffer.concat([createWavHeader(fragment.data.length, fragment.format), fragment.data]);
}

function readFmtChunk(buffer: Buffer, offset: number, size: number): AudioFormat {
  if (size < 16) {
    throw new InvalidAudioError(`fmt chunk too short (${size} bytes)`);
  }
  let formatTag = buffer.readUInt16LE(offset);
  const channels = buffer.readUInt16LE(offset + 2);
  const sampleRate = buffer.readUInt32LE(offset + 4);
  const bitDepth = buffer.readUInt16LE(offset + 14);

  if (formatTag === FORMAT_EXTENSIBLE && size >= 40) {
    // First two bytes of the sub-format GUID carry the real format tag
    formatTag = buffer.readUInt16LE(offset + 24);
  }
  if (formatTag !== FORMAT_PCM) {
    throw new InvalidAudioError(`Unsupported WAV format tag 0x${formatTag.toString(16)} (only integer PCM)`);
  }

  const format = { sampleRate, channels, bitDepth };
  if (!isSupportedFormat(format)) {
    throw new InvalidAudioError(`Unsupported PCM layout ${sampleRate}Hz/${channels}ch/${bitDepth}bit`);
  }
  return format;
}

export function decodeWav(buffer: Buffer): AudioFragment {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new InvalidAudioError('Not a RIFF/WAVE file');
  }

  let format: AudioFormat | null = null;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const declaredSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;
    // Streaming writers leave 0 or 0xFFFFFFFF in size fields
    const size = Math.min(declaredSize, buffer.length - bodyStart);

    if (id === 'fmt ') {
      format = readFmtChunk(buffer, bodyStart, size);
    } else if (id === 'data') {
      if (!format) {
        throw new InvalidAudioError('data chunk before fmt chunk');
      }
      const usable = size - (size % bytesPerFrame(format));
      return {
        format,
        data: Buffer.from(buffer.subarray(bodyStart, bodyStart + usable)),
      };
    }

    offset = bodyStart + size + (size % 2);
  }

  throw new InvalidAudioError('WAV file has no data chunk');
}

export async function readWavFile(filePath: string): Promise<AudioFragment> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new FileIOError(`Cannot read audio file ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
  return decodeWav(buffer);
}

export async function writeWavFile(filePath: string, fragment: AudioFragment): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, encodeWav(fragment));
  } catch (error) {
    throw new FileIOError(`Cannot write audio file ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}
