/**
 * @fileoverview Execution bookkeeping shared by all engines
 *
 * Engines drive cells; the manager owns everything around them: run and cell
 * metadata, output accumulation, echoing to the logger and sink files, the
 * progress bar, and saving the partially executed notebook.
 */

import { appendFile } from 'node:fs/promises';
import type { CellOutput, CellRunMetadata, Notebook, StreamOutput } from '../notebook/types.js';
import type { NotebookIO } from '../notebook/io.js';
import { ensureRunMetadata } from '../notebook/model.js';
import { createProgressBar, formatDuration, type ProgressBarHandle } from '../telemetry/progress.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { PARAMNB_VERSION } from '../version.js';

export interface ExecutionManagerOptions {
  io: NotebookIO;
  /** Save target; null keeps everything in memory until the orchestrator writes */
  outputPath: string | null;
  progressBar?: boolean;
  logOutput?: boolean;
  /** Seconds between autosaves while a cell runs; 0 disables them */
  autosaveCellEvery?: number;
  stdoutFile?: string;
  stderrFile?: string;
  clock?: () => Date;
}

function secondsBetween(start: string | null | undefined, end: Date): number | null {
  if (!start) return null;
  return (end.getTime() - Date.parse(start)) / 1000;
}

export class NotebookExecutionManager {
  private readonly clock: () => Date;
  private progress: ProgressBarHandle | null = null;
  private lastSave = 0;
  private pending: Promise<void> = Promise.resolve();
  private pendingError: unknown = null;

  constructor(
    readonly notebook: Notebook,
    private readonly options: ExecutionManagerOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  private cellMetadata(index: number): CellRunMetadata {
    const cell = this.notebook.cells[index];
    if (!cell) {
      throw new RangeError(`No cell at index ${index}`);
    }
    const existing = cell.metadata.paramnb;
    if (existing) return existing;
    const created: CellRunMetadata = {};
    cell.metadata.paramnb = created;
    return created;
  }

  /** Resets run and per-cell state, clears stale outputs, starts the bar. */
  async notebookStart(): Promise<void> {
    const now = this.clock();
    const run = ensureRunMetadata(this.notebook);
    run.start_time = now.toISOString();
    run.end_time = null;
    run.duration = null;
    run.exception = null;
    run.version = PARAMNB_VERSION;

    let codeCells = 0;
    for (const cell of this.notebook.cells) {
      cell.metadata.paramnb = { exception: null, start_time: null, end_time: null, duration: null, status: 'pending' };
      if (cell.cell_type === 'code') {
        cell.outputs = [];
        cell.execution_count = null;
        codeCells += 1;
      }
    }

    if (this.options.progressBar) {
      this.progress = createProgressBar({ total: codeCells });
    }
    await this.save();
  }

  async cellStart(index: number): Promise<void> {
    const meta = this.cellMetadata(index);
    meta.start_time = this.clock().toISOString();
    meta.status = 'running';
    if (this.options.logOutput) {
      logInfo(`Executing cell ${index + 1}`);
    }
    await this.save();
  }

  /** Streams are merged into the previous output when it is the same stream. */
  appendOutput(index: number, output: CellOutput): void {
    const cell = this.notebook.cells[index];
    if (!cell || cell.cell_type !== 'code') {
      throw new RangeError(`No code cell at index ${index}`);
    }

    const last = cell.outputs.at(-1);
    if (output.output_type === 'stream' && last?.output_type === 'stream' && last.name === output.name) {
      last.text += output.text;
    } else {
      cell.outputs.push(output);
    }

    if (output.output_type === 'stream') {
      this.echoStream(output);
    }
    this.enqueue(() => this.autosave());
  }

  /** Output hooks are synchronous; their file work is chained and awaited at cell end. */
  private enqueue(task: () => Promise<void>): void {
    this.pending = this.pending.then(task).catch((error: unknown) => {
      this.pendingError ??= error;
    });
  }

  private echoStream(output: StreamOutput): void {
    if (this.options.logOutput) {
      const text = output.text.replace(/\n$/, '');
      if (output.name === 'stdout') logInfo(text);
      else logWarning(text);
    }
    const target = output.name === 'stdout' ? this.options.stdoutFile : this.options.stderrFile;
    if (target) {
      const { text } = output;
      this.enqueue(() => appendFile(target, text, 'utf8'));
    }
  }

  cellException(index: number): void {
    const meta = this.cellMetadata(index);
    meta.exception = true;
    meta.status = 'failed';
    ensureRunMetadata(this.notebook).exception = true;
  }

  async cellComplete(index: number): Promise<void> {
    const end = this.clock();
    const meta = this.cellMetadata(index);
    meta.end_time = end.toISOString();
    meta.duration = secondsBetween(meta.start_time, end);
    if (meta.status !== 'failed') {
      meta.status = 'completed';
    }
    this.progress?.increment();
    await this.flushPending();
    await this.save();
  }

  /** Saves only when `autosaveCellEvery` seconds have passed since the last save. */
  async autosave(): Promise<void> {
    const every = this.options.autosaveCellEvery ?? 0;
    if (every <= 0) return;
    if (this.clock().getTime() - this.lastSave >= every * 1000) {
      await this.save();
    }
  }

  async notebookComplete(): Promise<void> {
    const end = this.clock();
    const run = ensureRunMetadata(this.notebook);
    run.end_time = end.toISOString();
    const duration = secondsBetween(run.start_time, end);
    run.duration = duration;
    run.exception = this.notebook.cells.some((cell) => cell.metadata.paramnb?.exception === true);
    if (duration !== null) {
      logDebug(`Notebook finished in ${formatDuration(duration * 1000)}`, { exception: run.exception });
    }
    this.cleanup();
    await this.flushPending();
    await this.save();
  }

  cleanup(): void {
    this.progress?.stop();
    this.progress = null;
  }

  private async flushPending(): Promise<void> {
    await this.pending;
    const error = this.pendingError;
    if (error !== null) {
      this.pendingError = null;
      throw error;
    }
  }

  async save(): Promise<void> {
    const { outputPath } = this.options;
    if (outputPath === null) return;
    logDebug(`Saving notebook to ${outputPath}`);
    await this.options.io.write(this.notebook, outputPath);
    this.lastSave = this.clock().getTime();
  }
}
