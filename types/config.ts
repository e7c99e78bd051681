/**
 * Run Configuration Types
 *
 * Immutable, camelCase form of the JSON character configuration.
 * Built once by `loadRunConfig` and passed down to each component.
 */

import type { Character } from './dialogue';

export interface CommandEngineConfig {
  readonly type: 'command';
  /** Executable, e.g. `paddlespeech` */
  readonly command: string;
  /** Argument template with {text} {output} {am} {voc} {spk_id} {lang} placeholders */
  readonly args: readonly string[];
  readonly lang: string;
}

export interface GeminiEngineConfig {
  readonly type: 'gemini';
  readonly model: string;
  /** Name of the environment variable holding the API key */
  readonly apiKeyEnv: string;
}

export type EngineConfig = CommandEngineConfig | GeminiEngineConfig;

export interface ProcessingConfig {
  readonly maxWorkers: number;
  readonly chunkSize: number;
  readonly pauseBetweenSpeakersMs: number;
  readonly cleanupTempFiles: boolean;
  readonly taskTimeoutMs: number;
  readonly tempDir: string;
  readonly reportFile?: string;
}

export interface RunConfig {
  /** Absolute path of the config file the run was loaded from */
  readonly configPath: string;
  readonly inputFile: string;
  readonly outputFile: string;
  readonly characters: readonly Character[];
  readonly narrator: Character | null;
  readonly processing: ProcessingConfig;
  readonly engine: EngineConfig;
}
