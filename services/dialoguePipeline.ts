/**
 * Dialogue Pipeline
 *
 * script → parse → bind voices → synthesize → assemble → output WAV.
 *
 * Per-segment failures end up in the returned ProcessingReport. Fatal errors
 * (configuration, IO, format mismatch) are thrown.
 */

import fs from 'fs/promises';
import path from 'path';
import type { RunConfig } from '../types/config';
import type { Character, DialogueSegment, SynthesisProgress, SynthesizedSegment } from '../types/dialogue';
import { assembleDialogue } from './audio/audioAssembler';
import { durationMs } from './audio/pcm';
import { writeWavFile } from './audio/wav';
import { parseDialogue, NARRATOR_LABEL } from './dialogueParser';
import { ConfigurationError, FileIOError, ParseError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { ProcessingReport } from './processingReport';
import { SynthesisOrchestrator } from './synthesis/synthesisOrchestrator';
import { segmentText } from './textSegmenter';
import { createSynthesizerFactory, type SynthesizerFactory } from './tts';
import { VoiceRegistry } from './voiceRegistry';

export const TEST_VOICE_TEMPLATE = '你好，我是{name}，这是我的声音。';

export interface PipelineDeps {
  /** Engine override; defaults to the configured engine */
  createSynthesizer?: SynthesizerFactory;
  logger?: Logger;
  onProgress?: (progress: SynthesisProgress) => void;
  env?: NodeJS.ProcessEnv;
}

interface RunContext {
  config: RunConfig;
  logger: Logger;
  registry: VoiceRegistry;
  report: ProcessingReport;
  createSynthesizer: SynthesizerFactory;
}

// ============================================================================
// Helpers
// ============================================================================

async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}

function createContext(config: RunConfig, deps: PipelineDeps): RunContext {
  const logger = deps.logger ?? createLogger('DialoguePipeline');
  return {
    config,
    logger,
    registry: new VoiceRegistry(config.characters, config.narrator, logger.child('VoiceRegistry')),
    report: new ProcessingReport(logger.child('Report')),
    createSynthesizer:
      deps.createSynthesizer ??
      createSynthesizerFactory(config.engine, {
        tempDir: config.processing.tempDir,
        keepTempFiles: !config.processing.cleanupTempFiles,
        logger: logger.child('Synthesizer'),
        env: deps.env,
      }),
  };
}

function safeFileName(label: string): string {
  return label.replace(/[\\/:*?"<>|\s]+/g, '_') || 'speaker';
}

/**
 * Keep per-segment WAVs for inspection when temp files are retained.
 */
async function writeSegmentFiles(segments: readonly SynthesizedSegment[], tempDir: string): Promise<void> {
  for (const segment of segments) {
    const name = `segment_${String(segment.index).padStart(4, '0')}_${safeFileName(segment.speaker)}.wav`;
    await writeWavFile(path.join(tempDir, name), segment.audio);
  }
}

/**
 * Remove the temp directory if nothing else lives in it.
 */
async function removeEmptyTempDir(tempDir: string, logger: Logger): Promise<void> {
  try {
    await fs.rmdir(tempDir);
  } catch (error) {
    logger.debug(`Temp directory ${tempDir} left in place: ${errorMessage(error)}`);
  }
}

/**
 * Synthesize → assemble → write for already parsed segments.
 */
async function synthesizeAndWrite(
  ctx: RunContext,
  segments: readonly DialogueSegment[],
  deps: PipelineDeps
): Promise<ProcessingReport> {
  const { config, logger, registry, report } = ctx;
  const { processing } = config;

  const voiced = registry.bindVoices(segments);
  const orchestrator = new SynthesisOrchestrator({
    maxWorkers: processing.maxWorkers,
    chunkSize: processing.chunkSize,
    taskTimeoutMs: processing.taskTimeoutMs,
    createSynthesizer: ctx.createSynthesizer,
    logger: logger.child('Orchestrator'),
    onProgress: deps.onProgress,
  });

  const { succeeded, outcomes } = await orchestrator.synthesizeAll(voiced);
  report.recordOutcomes(outcomes);

  if (succeeded.length === 0) {
    logger.error('No segment was synthesized; nothing to assemble');
    return finish(ctx);
  }

  try {
    const combined = assembleDialogue(succeeded, processing.pauseBetweenSpeakersMs, logger.child('AudioAssembler'));
    await writeWavFile(config.outputFile, combined);
    report.setOutput(config.outputFile, durationMs(combined));
    logger.info(`Wrote ${config.outputFile} (${(durationMs(combined) / 1000).toFixed(1)}s)`);
  } catch (error) {
    report.addError(error instanceof FileIOError ? 'output' : 'assembly', error);
    throw error;
  }

  if (processing.cleanupTempFiles) {
    await removeEmptyTempDir(processing.tempDir, logger);
  } else {
    await writeSegmentFiles(succeeded, processing.tempDir);
    logger.info(`Kept per-segment audio in ${processing.tempDir}`);
  }

  return finish(ctx);
}

async function finish(ctx: RunContext): Promise<ProcessingReport> {
  const { report, config, logger } = ctx;
  report.finish();
  if (config.processing.reportFile) {
    await report.writeJson(config.processing.reportFile);
    logger.info(`Report written to ${config.processing.reportFile}`);
  }
  logger.info(report.describe());
  return report;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run the full dialogue pipeline for one configuration.
 *
 * @returns The report; its status is `failed` when no segment was parsed or synthesized
 * @throws ConfigurationError, FileIOError or FormatMismatchError
 */
export async function runDialoguePipeline(config: RunConfig, deps: PipelineDeps = {}): Promise<ProcessingReport> {
  const ctx = createContext(config, deps);
  const script = await readTextFile(config.inputFile);

  const segments = parseDialogue(script);
  ctx.report.setInput(config.inputFile, segments.length);
  ctx.logger.info(`Parsed ${segments.length} dialogue segments from ${config.inputFile}`);

  if (segments.length === 0) {
    ctx.report.addError('parse', new ParseError(`No "speaker: text" lines found in ${config.inputFile}`));
    return finish(ctx);
  }

  return synthesizeAndWrite(ctx, segments, deps);
}

export interface DocumentOptions {
  /** Document to read; defaults to the configured input file */
  documentFile?: string;
  /** Character name or alias; defaults to the narrator */
  voice?: string;
}

/**
 * Single-voice mode: the whole document is read by one character.
 *
 * Each chunk becomes its own segment, so a failed or slow chunk is dropped
 * on its own and the rest of the document is still assembled.
 */
export async function narrateDocument(
  config: RunConfig,
  options: DocumentOptions = {},
  deps: PipelineDeps = {}
): Promise<ProcessingReport> {
  const ctx = createContext(config, deps);
  const documentFile = options.documentFile ?? config.inputFile;
  const text = await readTextFile(documentFile);

  const speaker = options.voice ?? NARRATOR_LABEL;
  const { character, match } = ctx.registry.resolveCharacter(speaker);

  const segments: DialogueSegment[] = segmentText(text, config.processing.chunkSize).map((chunk, index) => ({
    index,
    speaker: character.name,
    text: chunk,
  }));
  ctx.report.setInput(documentFile, segments.length);
  ctx.logger.info(`Narrating ${documentFile} as ${character.name} (${match}) in ${segments.length} chunks`);

  if (segments.length === 0) {
    ctx.report.addError('parse', new ParseError(`Document ${documentFile} is empty`));
    return finish(ctx);
  }

  return synthesizeAndWrite(ctx, segments, deps);
}

/**
 * Find a configured character the way speaker labels are matched (exact
 * name or alias, then alias substring), or the narrator by name.
 *
 * @throws ConfigurationError listing the known names
 */
export function findConfiguredCharacter(config: RunConfig, name: string, logger?: Logger): Character {
  const registry = new VoiceRegistry(config.characters, config.narrator, logger);
  const found = registry.findCharacter(name)?.character;
  if (found) return found;

  const wanted = name.trim().toLowerCase();
  const { narrator } = config;
  if (narrator && [narrator.name, ...narrator.aliases].some(n => n.toLowerCase() === wanted)) {
    return narrator;
  }

  const known = [...config.characters, ...(narrator ? [narrator] : [])].map(c => c.name);
  throw new ConfigurationError(`Unknown character "${name}". Known: ${known.join(', ')}`);
}

/**
 * Synthesize a sample sentence with one character's voice.
 *
 * @returns Path of the written WAV
 */
export async function testVoice(
  config: RunConfig,
  name: string,
  outputFile: string,
  deps: PipelineDeps = {}
): Promise<string> {
  const logger = deps.logger ?? createLogger('VoiceTest');
  const character = findConfiguredCharacter(config, name, logger.child('VoiceRegistry'));
  const factory =
    deps.createSynthesizer ??
    createSynthesizerFactory(config.engine, {
      tempDir: config.processing.tempDir,
      keepTempFiles: !config.processing.cleanupTempFiles,
      logger: logger.child('Synthesizer'),
      env: deps.env,
    });

  const synthesizer = await factory(0);
  try {
    const text = TEST_VOICE_TEMPLATE.replace('{name}', character.name);
    logger.info(`Testing voice of ${character.name} (spk_id: ${character.voice.speakerId})`);
    const audio = await synthesizer.synthesize(text, character.voice, { taskId: 'test' });
    await writeWavFile(outputFile, audio);
    logger.info(`Wrote ${outputFile}`);
    return outputFile;
  } finally {
    await synthesizer.dispose?.();
  }
}
