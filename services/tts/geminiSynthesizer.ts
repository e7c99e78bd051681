/**
 * Gemini Synthesizer
 *
 * Speech through the Gemini TTS models (`@google/genai`). Gemini returns raw
 * L16 PCM, mono 16-bit, with the sample rate in the mime type.
 */

import { GoogleGenAI } from '@google/genai';
import type { AudioFragment } from '../../types/audio';
import type { VoiceProfile } from '../../types/dialogue';
import { EngineError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logger';
import type { SpeechSynthesizer, SynthesisCallOptions } from './speechSynthesizer';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash-preview-tts';

/**
 * Prebuilt Gemini voices, indexed by speaker id when a profile names none.
 */
export const PREBUILT_VOICES = [
  'Kore',    // Warm, friendly female voice
  'Charon',  // Deep, authoritative male voice
  'Puck',    // Energetic, youthful voice
  'Fenrir',  // Strong, dramatic voice
  'Aoede',   // Calm, soothing female voice
  'Leda',    // Professional, clear female voice
  'Orus',    // Balanced, neutral male voice
  'Zephyr',  // Light, airy voice
] as const;

const DEFAULT_SAMPLE_RATE = 24000;

export function pickPrebuiltVoice(voice: VoiceProfile): string {
  if (voice.voiceName) return voice.voiceName;
  const index = Math.abs(Math.trunc(voice.speakerId)) % PREBUILT_VOICES.length;
  return PREBUILT_VOICES[index] ?? PREBUILT_VOICES[0];
}

/**
 * @example
 * parseSampleRate('audio/L16;codec=pcm;rate=24000') // 24000
 */
export function parseSampleRate(mimeType: string | undefined): number {
  const match = mimeType?.match(/rate=(\d+)/);
  const rate = match?.[1] ? Number.parseInt(match[1], 10) : NaN;
  return Number.isFinite(rate) && rate > 0 ? rate : DEFAULT_SAMPLE_RATE;
}

export interface GeminiSynthesizerOptions {
  apiKey: string;
  model?: string;
  logger?: Logger;
}

export class GeminiSynthesizer implements SpeechSynthesizer {
  private readonly client: GoogleGenAI;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: GeminiSynthesizerOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.logger = options.logger ?? createLogger('GeminiSynthesizer');
  }

  async synthesize(text: string, voice: VoiceProfile, options: SynthesisCallOptions = {}): Promise<AudioFragment> {
    const voiceName = pickPrebuiltVoice(voice);
    this.logger.debug(`Synthesizing "${text.substring(0, 50)}" with voice ${voiceName}`);

    const response = await this.client.models
      .generateContent({
        model: this.model,
        contents: [{ role: 'user', parts: [{ text }] }],
        config: {
          responseModalities: ['AUDIO'],
          speechConfig: {
            voiceConfig: {
              prebuiltVoiceConfig: { voiceName },
            },
          },
          abortSignal: options.signal,
        },
      })
      .catch((error: unknown) => {
        throw new EngineError(`Speech synthesis failed: ${errorMessage(error)}`, 'gemini', { cause: error });
      });

    const audioData = response.candidates?.[0]?.content?.parts?.[0]?.inlineData;
    if (!audioData?.data) {
      throw new EngineError('No audio data in response', 'gemini');
    }

    const pcm = Buffer.from(audioData.data, 'base64');
    // Whole 16-bit frames only
    const data = pcm.subarray(0, pcm.length - (pcm.length % 2));
    this.logger.debug(`Received ${data.length} bytes of PCM audio`);

    return {
      format: { sampleRate: parseSampleRate(audioData.mimeType), channels: 1, bitDepth: 16 },
      data,
    };
  }
}
