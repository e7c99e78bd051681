/**
 * Synthesis Orchestrator
 *
 * Fans segment chunks out to a bounded pool of workers and collects the
 * results through a completion channel.
 *
 * - Each segment is chunked up front; chunks are queued in (index, ordinal) order
 * - At most `maxWorkers` synthesis calls run at once
 * - Every worker owns its synthesizer, created lazily through the factory
 * - A segment's timer starts when its first chunk is dispatched
 * - A failed or timed-out segment aborts its in-flight chunks and skips queued ones
 * - Results are re-sorted by index; completion order never leaks out
 */

import type { AudioFragment } from '../../types/audio';
import type {
  ChunkTask,
  SegmentOutcome,
  SegmentState,
  SynthesisProgress,
  SynthesisResult,
  SynthesizedSegment,
  VoicedSegment,
} from '../../types/dialogue';
import { SynthesisFailure, SynthesisTimeout, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logger';
import { concatFragments, durationMs } from '../audio/pcm';
import { segmentText } from '../textSegmenter';
import type { SpeechSynthesizer, SynthesizerFactory } from '../tts/speechSynthesizer';
import { CompletionChannel } from './completionChannel';

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  maxWorkers: number;
  /** Maximum chunk length in characters */
  chunkSize: number;
  /** Per-segment budget, measured from the first dispatched chunk */
  taskTimeoutMs: number;
  createSynthesizer: SynthesizerFactory;
  logger?: Logger;
  onProgress?: (progress: SynthesisProgress) => void;
}

export interface OrchestrationResult {
  /** Succeeded segments in ascending index order */
  succeeded: SynthesizedSegment[];
  /** One entry per input segment, in ascending index order */
  outcomes: SegmentOutcome[];
}

interface SegmentRun {
  segment: VoicedSegment;
  state: SegmentState;
  chunks: ChunkTask[];
  fragments: Array<AudioFragment | undefined>;
  received: number;
  startTime?: number;
  timer?: NodeJS.Timeout;
  abortController: AbortController;
  outcome?: SegmentOutcome;
  audio?: AudioFragment;
}

const TERMINAL_STATES: ReadonlySet<SegmentState> = new Set(['succeeded', 'failed', 'timed_out']);

function isTerminal(run: SegmentRun): boolean {
  return TERMINAL_STATES.has(run.state);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Settles with the call, or rejects with the abort reason as soon as the
 * signal fires. An abandoned call keeps running; its result is dropped.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const abortHandler = () => reject(toError(signal.reason));
    signal.addEventListener('abort', abortHandler, { once: true });

    promise.then(
      (result) => {
        signal.removeEventListener('abort', abortHandler);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abortHandler);
        reject(toError(error));
      }
    );
  });
}

// ============================================================================
// Synthesis Orchestrator
// ============================================================================

export class SynthesisOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;

  private runs: Map<number, SegmentRun> = new Map();
  private queue: ChunkTask[] = [];
  private completedChunks = 0;

  constructor(options: OrchestratorOptions) {
    this.options = {
      ...options,
      maxWorkers: Math.max(1, Math.floor(options.maxWorkers)),
      taskTimeoutMs: Math.max(1, options.taskTimeoutMs),
    };
    this.logger = options.logger ?? createLogger('SynthesisOrchestrator');
  }

  /**
   * Synthesize every segment; never throws for per-segment failures.
   */
  async synthesizeAll(segments: readonly VoicedSegment[]): Promise<OrchestrationResult> {
    this.runs = new Map();
    this.queue = [];
    this.completedChunks = 0;

    const ordered = [...segments].sort((a, b) => a.index - b.index);
    for (const segment of ordered) {
      this.prepare(segment);
    }

    const workerCount = Math.min(this.options.maxWorkers, this.queue.length);
    this.logger.info(
      `Synthesizing ${ordered.length} segments (${this.queue.length} chunks) with ${workerCount} workers`
    );
    this.emitProgress();

    const channel = new CompletionChannel<SynthesisResult>();
    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.worker(i, channel));
    }
    const workersDone = Promise.all(workers).finally(() => channel.close());

    try {
      await Promise.all([this.collect(channel), workersDone]);
    } finally {
      for (const run of this.runs.values()) {
        clearTimeout(run.timer);
      }
    }

    return this.buildResult();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private prepare(segment: VoicedSegment): void {
    const run: SegmentRun = {
      segment,
      state: 'pending',
      chunks: [],
      fragments: [],
      received: 0,
      abortController: new AbortController(),
    };
    this.runs.set(segment.index, run);

    run.state = 'chunking';
    run.chunks = segmentText(segment.text, this.options.chunkSize).map((text, ordinal) => ({
      taskId: `${segment.index}:${ordinal}`,
      segmentIndex: segment.index,
      ordinal,
      text,
      voice: segment.voice,
    }));

    if (run.chunks.length === 0) {
      this.fail(run, new SynthesisFailure(
        `Segment ${segment.index} (${segment.speaker}) has no synthesizable text`,
        segment.index,
        segment.speaker
      ));
      return;
    }

    run.fragments = new Array<AudioFragment | undefined>(run.chunks.length).fill(undefined);
    this.queue.push(...run.chunks);
  }

  /**
   * Worker that processes chunk tasks from the queue
   */
  private async worker(workerId: number, channel: CompletionChannel<SynthesisResult>): Promise<void> {
    const log = this.logger.child(`worker-${workerId}`);
    let synthesizer: SpeechSynthesizer | null = null;

    try {
      for (let task = this.queue.shift(); task; task = this.queue.shift()) {
        const run = this.runs.get(task.segmentIndex);
        if (!run || isTerminal(run) || run.abortController.signal.aborted) {
          log.debug(`Skipping chunk ${task.taskId}: segment ${run?.state ?? 'unknown'}`);
          continue;
        }
        if (run.state !== 'dispatched') {
          this.markDispatched(run);
        }

        const { signal } = run.abortController;
        const startTime = Date.now();
        try {
          synthesizer ??= await this.options.createSynthesizer(workerId);
          const audio = await raceAbort(
            synthesizer.synthesize(task.text, task.voice, { signal, taskId: task.taskId }),
            signal
          );
          channel.send({ task, success: true, audio, durationMs: Date.now() - startTime });
        } catch (error) {
          const abandoned = signal.aborted;
          const failure = toError(error);
          channel.send({ task, success: false, error: failure, durationMs: Date.now() - startTime });
          // Stop sibling chunks now; the collector records the failure
          run.abortController.abort(failure);
          if (abandoned && synthesizer) {
            // The abandoned call may still hold the handle
            await this.disposeSynthesizer(synthesizer, log);
            synthesizer = null;
          }
        }
      }
    } finally {
      if (synthesizer) {
        await this.disposeSynthesizer(synthesizer, log);
      }
    }
  }

  private async disposeSynthesizer(synthesizer: SpeechSynthesizer, log: Logger): Promise<void> {
    try {
      await synthesizer.dispose?.();
    } catch (error) {
      log.warn(`Failed to dispose synthesizer: ${errorMessage(error)}`);
    }
  }

  private async collect(channel: CompletionChannel<SynthesisResult>): Promise<void> {
    for await (const result of channel) {
      this.completedChunks++;
      this.handleResult(result);
      this.emitProgress();
    }
  }

  private handleResult(result: SynthesisResult): void {
    const { task } = result;
    const run = this.runs.get(task.segmentIndex);
    if (!run) return;

    if (isTerminal(run)) {
      this.logger.debug(`Discarding result of ${task.taskId}: segment already ${run.state}`);
      return;
    }

    const { segment } = run;
    if (!result.success) {
      this.fail(run, new SynthesisFailure(
        `Segment ${segment.index} (${segment.speaker}) chunk ${task.ordinal} failed: ${result.error.message}`,
        segment.index,
        segment.speaker,
        { cause: result.error }
      ));
      return;
    }

    this.logger.debug(`Chunk ${task.taskId} done in ${result.durationMs}ms`);
    if (run.fragments[task.ordinal] === undefined) {
      run.received++;
    }
    run.fragments[task.ordinal] = result.audio;
    if (run.received < run.chunks.length) return;

    const fragments = run.fragments.filter((f): f is AudioFragment => f !== undefined);
    try {
      this.succeed(run, concatFragments(fragments));
    } catch (error) {
      this.fail(run, new SynthesisFailure(
        `Segment ${segment.index} (${segment.speaker}) chunks differ in format: ${errorMessage(error)}`,
        segment.index,
        segment.speaker,
        { cause: error }
      ));
    }
  }

  private markDispatched(run: SegmentRun): void {
    run.state = 'dispatched';
    run.startTime = Date.now();
    run.timer = setTimeout(() => this.timeOut(run), this.options.taskTimeoutMs);
    this.emitProgress();
  }

  private elapsed(run: SegmentRun): number {
    return run.startTime === undefined ? 0 : Date.now() - run.startTime;
  }

  private succeed(run: SegmentRun, audio: AudioFragment): void {
    clearTimeout(run.timer);
    run.state = 'succeeded';
    run.audio = audio;
    run.outcome = {
      status: 'succeeded',
      index: run.segment.index,
      speaker: run.segment.speaker,
      chunkCount: run.chunks.length,
      durationMs: this.elapsed(run),
      audioDurationMs: durationMs(audio),
    };
    this.logger.info(`Segment ${run.segment.index} (${run.segment.speaker}) synthesized`);
  }

  private fail(run: SegmentRun, error: SynthesisFailure): void {
    clearTimeout(run.timer);
    run.state = 'failed';
    run.outcome = {
      status: 'failed',
      index: run.segment.index,
      speaker: run.segment.speaker,
      chunkCount: run.chunks.length,
      durationMs: this.elapsed(run),
      error,
    };
    run.abortController.abort(error);
    this.logger.error(error.message);
  }

  private timeOut(run: SegmentRun): void {
    if (isTerminal(run)) return;

    const error = new SynthesisTimeout(run.segment.index, run.segment.speaker, this.options.taskTimeoutMs);
    run.state = 'timed_out';
    run.outcome = {
      status: 'timed_out',
      index: run.segment.index,
      speaker: run.segment.speaker,
      chunkCount: run.chunks.length,
      durationMs: this.elapsed(run),
      error,
    };
    run.abortController.abort(error);
    this.logger.warn(error.message);
    this.emitProgress();
  }

  private calculateProgress(): SynthesisProgress {
    const progress: SynthesisProgress = {
      totalSegments: this.runs.size,
      pendingSegments: 0,
      dispatchedSegments: 0,
      succeededSegments: 0,
      failedSegments: 0,
      timedOutSegments: 0,
      completedChunks: this.completedChunks,
      totalChunks: 0,
    };

    for (const run of this.runs.values()) {
      progress.totalChunks += run.chunks.length;
      switch (run.state) {
        case 'pending':
        case 'chunking':
          progress.pendingSegments++;
          break;
        case 'dispatched':
          progress.dispatchedSegments++;
          break;
        case 'succeeded':
          progress.succeededSegments++;
          break;
        case 'failed':
          progress.failedSegments++;
          break;
        case 'timed_out':
          progress.timedOutSegments++;
          break;
      }
    }
    return progress;
  }

  private emitProgress(): void {
    if (this.options.onProgress) {
      this.options.onProgress(this.calculateProgress());
    }
  }

  private buildResult(): OrchestrationResult {
    const runs = [...this.runs.values()].sort((a, b) => a.segment.index - b.segment.index);
    const succeeded: SynthesizedSegment[] = [];
    const outcomes: SegmentOutcome[] = [];

    for (const run of runs) {
      if (run.outcome) outcomes.push(run.outcome);
      if (run.state === 'succeeded' && run.audio) {
        succeeded.push({ ...run.segment, audio: run.audio, chunkCount: run.chunks.length });
      }
    }
    return { succeeded, outcomes };
  }
}

/**
 * One-shot helper around SynthesisOrchestrator.
 */
export function synthesizeAll(
  segments: readonly VoicedSegment[],
  options: OrchestratorOptions
): Promise<OrchestrationResult> {
  return new SynthesisOrchestrator(options).synthesizeAll(segments);
}
