/**
 * Builds the per-worker synthesizer factory for the configured engine.
 */

import type { EngineConfig } from '../../types/config';
import { ConfigurationError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { CommandSynthesizer } from './commandSynthesizer';
import { GeminiSynthesizer } from './geminiSynthesizer';
import type { SynthesizerFactory } from './speechSynthesizer';

export type { SpeechSynthesizer, SynthesizerFactory, SynthesisCallOptions } from './speechSynthesizer';
export { CommandSynthesizer, DEFAULT_COMMAND, DEFAULT_COMMAND_ARGS } from './commandSynthesizer';
export { GeminiSynthesizer, DEFAULT_GEMINI_MODEL, PREBUILT_VOICES } from './geminiSynthesizer';

export interface SynthesizerFactoryOptions {
  tempDir: string;
  keepTempFiles: boolean;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * @throws ConfigurationError when the engine's credentials are missing
 */
export function createSynthesizerFactory(engine: EngineConfig, options: SynthesizerFactoryOptions): SynthesizerFactory {
  const logger = options.logger ?? createLogger('Synthesizer');

  switch (engine.type) {
    case 'command':
      return (workerId) =>
        new CommandSynthesizer({
          engine,
          workerId,
          tempDir: options.tempDir,
          keepTempFiles: options.keepTempFiles,
          logger: logger.child(`worker-${workerId}`),
        });

    case 'gemini': {
      const apiKey = (options.env ?? process.env)[engine.apiKeyEnv];
      if (!apiKey) {
        throw new ConfigurationError(`Gemini engine needs an API key in ${engine.apiKeyEnv}`, [
          `engine.api_key_env: ${engine.apiKeyEnv} is not set`,
        ]);
      }
      return (workerId) =>
        new GeminiSynthesizer({ apiKey, model: engine.model, logger: logger.child(`worker-${workerId}`) });
    }
  }
}
