import { describe, it, expect } from 'vitest';
import { createSynthesizerFactory, CommandSynthesizer, GeminiSynthesizer, DEFAULT_COMMAND_ARGS } from './index';
import { ConfigurationError } from '../errors';

describe('createSynthesizerFactory', () => {
  it('creates a fresh command synthesizer per call', () => {
    const factory = createSynthesizerFactory(
      { type: 'command', command: 'paddlespeech', args: DEFAULT_COMMAND_ARGS, lang: 'zh' },
      { tempDir: '/tmp/segments', keepTempFiles: false }
    );
    const first = factory(0);
    const second = factory(1);
    expect(first).toBeInstanceOf(CommandSynthesizer);
    expect(second).not.toBe(first);
  });

  it('reads the Gemini key from the named variable', () => {
    const factory = createSynthesizerFactory(
      { type: 'gemini', model: 'gemini-2.5-flash-preview-tts', apiKeyEnv: 'TTS_KEY' },
      { tempDir: '/tmp/segments', keepTempFiles: false, env: { TTS_KEY: 'test-secret' } }
    );
    expect(factory(0)).toBeInstanceOf(GeminiSynthesizer);
  });

  it('refuses a Gemini engine without a key', () => {
    expect(() =>
      createSynthesizerFactory(
        { type: 'gemini', model: 'gemini-2.5-flash-preview-tts', apiKeyEnv: 'TTS_KEY' },
        { tempDir: '/tmp/segments', keepTempFiles: false, env: {} }
      )
    ).toThrow(ConfigurationError);
  });
});
