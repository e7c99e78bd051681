/**
 * Run Configuration
 *
 * Loads the JSON character configuration, validates it with zod and
 * converts it into an immutable RunConfig. Relative paths are resolved
 * against the directory of the config file.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { EngineConfig, ProcessingConfig, RunConfig } from '../types/config';
import type { Character, VoiceProfile } from '../types/dialogue';
import { ConfigurationError, FileIOError, errorMessage } from './errors';
import { createNarrator } from './voiceRegistry';
import { DEFAULT_COMMAND, DEFAULT_COMMAND_ARGS } from './tts/commandSynthesizer';
import { DEFAULT_GEMINI_MODEL } from './tts/geminiSynthesizer';

export const DEFAULT_ACOUSTIC_MODEL = 'fastspeech2_aishell3';
export const DEFAULT_VOCODER = 'hifigan_aishell3';
export const DEFAULT_TEMP_DIR_NAME = 'temp_segments';

// ============================================================================
// Schemas
// ============================================================================

const VoiceProfileSchema = z
  .object({
    am: z.string().min(1).default(DEFAULT_ACOUSTIC_MODEL).describe('Acoustic model id'),
    voc: z.string().min(1).default(DEFAULT_VOCODER).describe('Vocoder id'),
    spk_id: z.number().int().nonnegative().default(0).describe('Speaker id within a multi-speaker model'),
    voice_name: z.string().min(1).optional().describe('Prebuilt voice for name-based engines'),
  })
  .default({});

const CharacterSchema = z.object({
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).default([]),
  gender: z.string().default('unknown'),
  description: z.string().default(''),
  voice_profile: VoiceProfileSchema,
});

const NarratorSchema = z.object({
  gender: z.string().default('unknown'),
  voice_profile: VoiceProfileSchema,
});

const ProcessingSchema = z
  .object({
    max_workers: z.number().int().positive().optional().describe('Worker pool size (default: CPU count - 1)'),
    chunk_size: z.number().int().positive().default(200).describe('Maximum synthesis chunk length in characters'),
    pause_between_speakers_ms: z.number().nonnegative().default(300),
    cleanup_temp_files: z.boolean().default(true),
    task_timeout_ms: z.number().int().positive().default(120_000).describe('Per-segment synthesis budget'),
    temp_dir: z.string().min(1).optional(),
    report_file: z.string().min(1).optional().describe('Write the processing report as JSON'),
  })
  .default({});

const CommandEngineSchema = z.object({
  type: z.literal('command'),
  command: z.string().min(1).default(DEFAULT_COMMAND),
  args: z.array(z.string()).default([...DEFAULT_COMMAND_ARGS]),
  lang: z.string().min(1).default('zh'),
});

const GeminiEngineSchema = z.object({
  type: z.literal('gemini'),
  model: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  api_key_env: z.string().min(1).default('GEMINI_API_KEY'),
});

export const RunConfigSchema = z
  .object({
    input_file: z.string().min(1).describe('Dialogue script, UTF-8'),
    output_file: z.string().min(1).describe('Combined WAV output'),
    characters: z.array(CharacterSchema).default([]),
    default_narrator: NarratorSchema.nullish(),
    processing: ProcessingSchema,
    engine: z.discriminatedUnion('type', [CommandEngineSchema, GeminiEngineSchema]).default({ type: 'command' }),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.characters.forEach((character, i) => {
      const key = character.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate character name "${character.name}"`,
          path: ['characters', i, 'name'],
        });
      }
      seen.add(key);
    });

    if (config.characters.length === 0 && !config.default_narrator) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one character or a default_narrator is required',
        path: ['characters'],
      });
    }
  });

export type RunConfigInput = z.input<typeof RunConfigSchema>;
type ParsedConfig = z.output<typeof RunConfigSchema>;
type ParsedVoiceProfile = z.output<typeof VoiceProfileSchema>;

// ============================================================================
// Conversion
// ============================================================================

export interface LoadOptions {
  /** Override the CPU-derived worker default */
  cpuCount?: number;
}

function defaultMaxWorkers(cpuCount: number = os.availableParallelism()): number {
  return Math.max(1, cpuCount - 1);
}

function toVoiceProfile(raw: ParsedVoiceProfile, gender: string, description: string): VoiceProfile {
  return {
    acousticModel: raw.am,
    vocoder: raw.voc,
    speakerId: raw.spk_id,
    gender,
    description,
    ...(raw.voice_name ? { voiceName: raw.voice_name } : {}),
  };
}

function toEngine(raw: ParsedConfig['engine']): EngineConfig {
  if (raw.type === 'gemini') {
    return { type: 'gemini', model: raw.model, apiKeyEnv: raw.api_key_env };
  }
  return { type: 'command', command: raw.command, args: raw.args, lang: raw.lang };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/**
 * Validate an already-parsed JSON document.
 *
 * @param configPath - Location the document came from; relative paths resolve against its directory
 * @throws ConfigurationError listing every invalid field
 */
export function parseRunConfig(raw: unknown, configPath: string, options: LoadOptions = {}): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration in ${configPath}:\n  ${issues.join('\n  ')}`, issues);
  }

  const config = parsed.data;
  const absoluteConfigPath = path.resolve(configPath);
  const baseDir = path.dirname(absoluteConfigPath);
  const resolvePath = (p: string) => path.resolve(baseDir, p);

  const outputFile = resolvePath(config.output_file);
  const processing: ProcessingConfig = {
    maxWorkers: config.processing.max_workers ?? defaultMaxWorkers(options.cpuCount),
    chunkSize: config.processing.chunk_size,
    pauseBetweenSpeakersMs: config.processing.pause_between_speakers_ms,
    cleanupTempFiles: config.processing.cleanup_temp_files,
    taskTimeoutMs: config.processing.task_timeout_ms,
    tempDir: config.processing.temp_dir
      ? resolvePath(config.processing.temp_dir)
      : path.join(path.dirname(outputFile), DEFAULT_TEMP_DIR_NAME),
    ...(config.processing.report_file ? { reportFile: resolvePath(config.processing.report_file) } : {}),
  };

  const characters: Character[] = config.characters.map(c => ({
    name: c.name,
    aliases: c.aliases,
    gender: c.gender,
    description: c.description,
    voice: toVoiceProfile(c.voice_profile, c.gender, c.description),
  }));

  const narrator = config.default_narrator
    ? createNarrator(
        config.default_narrator.gender,
        toVoiceProfile(config.default_narrator.voice_profile, config.default_narrator.gender, '')
      )
    : null;

  return deepFreeze({
    configPath: absoluteConfigPath,
    inputFile: resolvePath(config.input_file),
    outputFile,
    characters,
    narrator,
    processing,
    engine: toEngine(config.engine),
  });
}

/**
 * Read and validate a JSON character configuration file.
 *
 * @throws FileIOError when the file cannot be read
 * @throws ConfigurationError when it is not valid JSON or fails validation
 */
export async function loadRunConfig(configPath: string, options: LoadOptions = {}): Promise<RunConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Cannot read configuration ${configPath}: ${errorMessage(error)}`, configPath, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigurationError(`Configuration ${configPath} is not valid JSON: ${errorMessage(error)}`, [], {
      cause: error,
    });
  }

  return parseRunConfig(raw, configPath, options);
}
