/**
 * dialogue-tts command line
 *
 * Exit code 0 when at least one segment was written, 1 otherwise or on a
 * fatal error.
 */

import path from 'path';
import { parseArgs } from 'util';
import type { RunConfig } from '../types/config';
import type { SynthesisProgress } from '../types/dialogue';
import {
  findConfiguredCharacter,
  narrateDocument,
  runDialoguePipeline,
  testVoice,
  type PipelineDeps,
} from '../services/dialoguePipeline';
import { ConfigurationError, errorMessage } from '../services/errors';
import { Logger, createFileSink, parseLogLevel } from '../services/logger';
import { loadRunConfig } from '../services/runConfig';
import type { SynthesizerFactory } from '../services/tts';

export const DEFAULT_LOG_FILE = 'dialogue_tts.log';

export const USAGE = `Usage: dialogue-tts --config <file> [options]

Synthesize a multi-character dialogue script into one WAV file.

Options:
  -c, --config <file>        Character configuration (JSON), required
      --list-characters      Print the configured characters and exit
      --test-voice <name>    Synthesize a sample sentence into test_<name>.wav
      --document <file>      Read a whole document with a single voice
      --voice <name>         Character for --document (default: narrator)
      --log-file <file>      Log file (default: ${DEFAULT_LOG_FILE})
  -h, --help                 Show this help`;

export interface CliOptions {
  config?: string;
  listCharacters: boolean;
  testVoice?: string;
  document?: string;
  voice?: string;
  logFile: string;
  help: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Directory for relative CLI paths and test_<name>.wav */
  cwd?: string;
  /** Line printer for command output */
  print?: (line: string) => void;
  createSynthesizer?: SynthesizerFactory;
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      'list-characters': { type: 'boolean', default: false },
      'test-voice': { type: 'string' },
      document: { type: 'string' },
      voice: { type: 'string' },
      'log-file': { type: 'string', default: DEFAULT_LOG_FILE },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * @throws ConfigurationError for unknown options or a missing --config
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigurationError(errorMessage(error), [], { cause: error });
  }
  const { values } = parsed;

  const options: CliOptions = {
    config: values.config,
    listCharacters: values['list-characters'] ?? false,
    testVoice: values['test-voice'],
    document: values.document,
    voice: values.voice,
    logFile: values['log-file'] ?? DEFAULT_LOG_FILE,
    help: values.help ?? false,
  };

  if (!options.help && !options.config) {
    throw new ConfigurationError('Missing required option --config');
  }
  if (options.voice && !options.document) {
    throw new ConfigurationError('--voice only applies together with --document');
  }
  return options;
}

/**
 * Plain-text table of the configured characters.
 */
export function formatCharacterTable(config: RunConfig): string {
  const rows = config.characters.map(c => [
    c.name,
    c.aliases.join(', '),
    c.gender,
    String(c.voice.speakerId),
    c.description,
  ]);
  if (config.narrator) {
    rows.push([
      `${config.narrator.name} (default)`,
      config.narrator.aliases.join(', '),
      config.narrator.gender,
      String(config.narrator.voice.speakerId),
      config.narrator.description,
    ]);
  }

  const header = ['Name', 'Aliases', 'Gender', 'Speaker', 'Description'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
  const format = (row: string[]) => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [format(header), format(widths.map(w => '-'.repeat(w))), ...rows.map(format)].join('\n');
}

function progressLogger(logger: Logger): (progress: SynthesisProgress) => void {
  let lastDone = -1;
  return (progress) => {
    const done = progress.succeededSegments + progress.failedSegments + progress.timedOutSegments;
    if (done === lastDone) return;
    lastDone = done;
    logger.info(
      `Progress: ${done}/${progress.totalSegments} segments ` +
        `(${progress.completedChunks}/${progress.totalChunks} chunks, ` +
        `${progress.failedSegments} failed, ${progress.timedOutSegments} timed out)`
    );
  };
}

function testVoiceFileName(name: string): string {
  return `test_${name.replace(/[\\/:*?"<>|\s]+/g, '_')}.wav`;
}

/**
 * Run one CLI invocation and return its exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    print(`Error: ${errorMessage(error)}\n`);
    print(USAGE);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  const sink = createFileSink(path.resolve(cwd, options.logFile));
  const logger = new Logger('dialogue-tts', {
    level: parseLogLevel(env.LOG_LEVEL),
    callbacks: [sink.callback],
  });

  const pipelineDeps: PipelineDeps = {
    logger,
    env,
    onProgress: progressLogger(logger.child('Progress')),
    ...(deps.createSynthesizer ? { createSynthesizer: deps.createSynthesizer } : {}),
  };

  try {
    const config = await loadRunConfig(path.resolve(cwd, options.config ?? ''));

    if (options.listCharacters) {
      print(formatCharacterTable(config));
      return 0;
    }

    if (options.testVoice) {
      const character = findConfiguredCharacter(config, options.testVoice, logger.child('VoiceRegistry'));
      const outputFile = path.resolve(cwd, testVoiceFileName(character.name));
      await testVoice(config, character.name, outputFile, pipelineDeps);
      print(`Voice sample written to ${outputFile}`);
      return 0;
    }

    const report = options.document
      ? await narrateDocument(
          config,
          { documentFile: path.resolve(cwd, options.document), voice: options.voice },
          pipelineDeps
        )
      : await runDialoguePipeline(config, pipelineDeps);

    print(report.describe());
    if (report.hasErrors()) {
      print(report.getAggregatedMessage());
    }
    return report.status === 'failed' ? 1 : 0;
  } catch (error) {
    logger.error(`Run aborted: ${errorMessage(error)}`, error);
    print(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    await sink.close();
  }
}
