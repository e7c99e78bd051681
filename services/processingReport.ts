/**
 * Processing Report
 *
 * Collects the per-segment results and the errors of one run, grouped by
 * pipeline phase, and renders them as a single aggregated message or as JSON.
 */

import fs from 'fs/promises';
import path from 'path';
import type { SegmentOutcome } from '../types/dialogue';
import { DialogueTtsError, FileIOError, errorMessage, type ErrorCode } from './errors';
import { createLogger, type Logger } from './logger';

// ============================================================================
// Types
// ============================================================================

export type ReportPhase = 'config' | 'parse' | 'synthesis' | 'assembly' | 'output';

export type RunStatus = 'succeeded' | 'partial' | 'failed';

export interface ReportedError {
  code: ErrorCode | 'UNKNOWN';
  phase: ReportPhase;
  message: string;
  segmentIndex?: number;
  speaker?: string;
}

export interface SegmentReport {
  index: number;
  speaker: string;
  status: SegmentOutcome['status'];
  chunkCount: number;
  durationMs: number;
  audioDurationMs?: number;
  error?: string;
}

export interface ReportSummary {
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  inputFile: string | null;
  outputFile: string | null;
  parsedSegments: number;
  succeededSegments: number;
  failedSegments: number;
  timedOutSegments: number;
  totalChunks: number;
  audioDurationMs: number;
  segments: SegmentReport[];
  errors: ReportedError[];
  message: string;
}

// ============================================================================
// Processing Report
// ============================================================================

export class ProcessingReport {
  private readonly log: Logger;
  private readonly startedAt = new Date();
  private finishedAt: Date | null = null;
  private errors: ReportedError[] = [];
  private segments: SegmentReport[] = [];
  private inputFile: string | null = null;
  private outputFile: string | null = null;
  private parsedSegments = 0;
  private audioDurationMs = 0;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('ProcessingReport');
  }

  setInput(filePath: string, parsedSegments: number): void {
    this.inputFile = filePath;
    this.parsedSegments = parsedSegments;
  }

  setOutput(filePath: string, audioDurationMs: number): void {
    this.outputFile = filePath;
    this.audioDurationMs = audioDurationMs;
  }

  addError(phase: ReportPhase, error: unknown, context: { segmentIndex?: number; speaker?: string } = {}): void {
    const reported: ReportedError = {
      code: error instanceof DialogueTtsError ? error.code : 'UNKNOWN',
      phase,
      message: errorMessage(error),
      ...context,
    };
    this.errors.push(reported);
    this.log.warn(`[${reported.code}] phase="${phase}": ${reported.message}`);
  }

  /**
   * Record the orchestrator's result log; failures and timeouts become errors.
   */
  recordOutcomes(outcomes: readonly SegmentOutcome[]): void {
    for (const outcome of outcomes) {
      const entry: SegmentReport = {
        index: outcome.index,
        speaker: outcome.speaker,
        status: outcome.status,
        chunkCount: outcome.chunkCount,
        durationMs: outcome.durationMs,
      };
      if (outcome.status === 'succeeded') {
        entry.audioDurationMs = outcome.audioDurationMs;
      } else {
        entry.error = outcome.error.message;
        this.addError('synthesis', outcome.error, { segmentIndex: outcome.index, speaker: outcome.speaker });
      }
      this.segments.push(entry);
    }
    this.segments.sort((a, b) => a.index - b.index);
  }

  finish(): void {
    this.finishedAt ??= new Date();
  }

  get status(): RunStatus {
    const succeeded = this.count('succeeded');
    if (this.outputFile === null || succeeded === 0) return 'failed';
    return succeeded < this.segments.length || this.errors.length > 0 ? 'partial' : 'succeeded';
  }

  getErrors(): ReportedError[] {
    return [...this.errors];
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getAggregatedMessage(): string {
    if (this.errors.length === 0) {
      return 'No errors recorded.';
    }

    if (this.errors.length === 1) {
      const e = this.errors[0];
      if (e) return `[${e.code}] ${e.phase}: ${e.message}`;
    }

    const byPhase = new Map<ReportPhase, ReportedError[]>();
    for (const error of this.errors) {
      const list = byPhase.get(error.phase) ?? [];
      list.push(error);
      byPhase.set(error.phase, list);
    }

    const lines: string[] = [`${this.errors.length} errors occurred during processing:`];
    for (const [phase, phaseErrors] of byPhase) {
      lines.push(`  Phase "${phase}":`);
      for (const e of phaseErrors) {
        const segmentSuffix = e.segmentIndex !== undefined ? ` (segment ${e.segmentIndex}, ${e.speaker ?? '?'})` : '';
        lines.push(`    - [${e.code}] ${e.message}${segmentSuffix}`);
      }
    }
    return lines.join('\n');
  }

  toJSON(): ReportSummary {
    return {
      status: this.status,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt?.toISOString() ?? null,
      inputFile: this.inputFile,
      outputFile: this.outputFile,
      parsedSegments: this.parsedSegments,
      succeededSegments: this.count('succeeded'),
      failedSegments: this.count('failed'),
      timedOutSegments: this.count('timed_out'),
      totalChunks: this.segments.reduce((sum, s) => sum + s.chunkCount, 0),
      audioDurationMs: this.audioDurationMs,
      segments: this.segments.map(s => ({ ...s })),
      errors: this.getErrors(),
      message: this.getAggregatedMessage(),
    };
  }

  /** One-line summary for logs and the CLI. */
  describe(): string {
    const summary = this.toJSON();
    return (
      `${summary.status}: ${summary.succeededSegments}/${summary.parsedSegments} segments synthesized` +
      ` (${summary.failedSegments} failed, ${summary.timedOutSegments} timed out),` +
      ` ${(summary.audioDurationMs / 1000).toFixed(1)}s of audio`
    );
  }

  async writeJson(filePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(this.toJSON(), null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new FileIOError(`Cannot write report ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
    }
  }

  private count(status: SegmentOutcome['status']): number {
    return this.segments.filter(s => s.status === status).length;
  }
}
