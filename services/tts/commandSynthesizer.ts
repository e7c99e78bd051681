/**
 * Command Synthesizer
 *
 * Runs an external TTS command line (paddlespeech by default) once per chunk.
 * The command writes a WAV file that is decoded and, unless temp files are
 * kept, deleted again. Each instance belongs to one worker and writes to
 * worker-unique file names.
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import type { AudioFragment } from '../../types/audio';
import type { CommandEngineConfig } from '../../types/config';
import type { VoiceProfile } from '../../types/dialogue';
import { readWavFile } from '../audio/wav';
import { EngineError, FileIOError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logger';
import type { SpeechSynthesizer, SynthesisCallOptions } from './speechSynthesizer';

export const DEFAULT_COMMAND = 'paddlespeech';

export const DEFAULT_COMMAND_ARGS: readonly string[] = [
  'tts',
  '--input', '{text}',
  '--am', '{am}',
  '--voc', '{voc}',
  '--spk_id', '{spk_id}',
  '--lang', '{lang}',
  '--output', '{output}',
];

/** stderr kept for error messages */
const MAX_STDERR_LENGTH = 2000;

export interface CommandSynthesizerOptions {
  engine: CommandEngineConfig;
  workerId: number;
  tempDir: string;
  /** Leave chunk WAVs in `tempDir` after decoding */
  keepTempFiles?: boolean;
  logger?: Logger;
}

/**
 * Substitute `{placeholder}` tokens; unknown tokens are left as they are.
 *
 * @example
 * expandArgs(['--spk_id', '{spk_id}'], { spk_id: '3' }) // ['--spk_id', '3']
 */
export function expandArgs(template: readonly string[], values: Readonly<Record<string, string>>): string[] {
  return template.map(arg =>
    arg.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match)
  );
}

export class CommandSynthesizer implements SpeechSynthesizer {
  private readonly engine: CommandEngineConfig;
  private readonly workerId: number;
  private readonly tempDir: string;
  private readonly keepTempFiles: boolean;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(options: CommandSynthesizerOptions) {
    this.engine = options.engine;
    this.workerId = options.workerId;
    this.tempDir = options.tempDir;
    this.keepTempFiles = options.keepTempFiles ?? false;
    this.logger = options.logger ?? createLogger(`CommandSynthesizer:worker-${options.workerId}`);
  }

  async synthesize(text: string, voice: VoiceProfile, options: SynthesisCallOptions = {}): Promise<AudioFragment> {
    const { signal } = options;
    signal?.throwIfAborted();

    try {
      await fs.mkdir(this.tempDir, { recursive: true });
    } catch (error) {
      throw new FileIOError(`Cannot create temp directory ${this.tempDir}: ${errorMessage(error)}`, this.tempDir, {
        cause: error,
      });
    }

    const outputPath = this.nextOutputPath(options.taskId);
    const args = expandArgs(this.engine.args, {
      text,
      output: outputPath,
      am: voice.acousticModel,
      voc: voice.vocoder,
      spk_id: String(voice.speakerId),
      lang: this.engine.lang,
    });

    try {
      this.logger.debug(`Running ${this.engine.command} for ${options.taskId ?? 'chunk'} -> ${outputPath}`);
      await this.run(args, signal);
      return await readWavFile(outputPath);
    } finally {
      if (!this.keepTempFiles) {
        await this.removeTempFile(outputPath);
      }
    }
  }

  private nextOutputPath(taskId: string | undefined): string {
    this.sequence++;
    const task = taskId ? `_${taskId.replace(/[^\w-]/g, '_')}` : '';
    return path.join(this.tempDir, `chunk_w${this.workerId}${task}_${this.sequence}.wav`);
  }

  private run(args: string[], signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.engine.command, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      let stderr = '';
      child.stderr?.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-MAX_STDERR_LENGTH);
      });

      const abortHandler = () => {
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', abortHandler, { once: true });

      child.on('error', (err) => {
        signal?.removeEventListener('abort', abortHandler);
        reject(new EngineError(`Failed to start ${this.engine.command}: ${err.message}`, this.engine.command, {
          cause: err,
        }));
      });

      child.on('close', (code) => {
        signal?.removeEventListener('abort', abortHandler);
        if (signal?.aborted) {
          reject(new EngineError(`${this.engine.command} was stopped`, this.engine.command, { cause: signal.reason }));
        } else if (code === 0) {
          resolve();
        } else {
          const detail = stderr.trim();
          reject(new EngineError(
            `${this.engine.command} exited with code ${code}${detail ? `: ${detail}` : ''}`,
            this.engine.command
          ));
        }
      });
    });
  }

  private async removeTempFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      this.logger.warn(`Could not delete temp file ${filePath}: ${errorMessage(error)}`);
    }
  }
}
