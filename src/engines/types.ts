/**
 * @fileoverview Engine capability interface
 *
 * The orchestrator depends only on these types; engines are looked up by
 * name in an `EngineRegistry`.
 */

import type { Notebook } from '../notebook/types.js';
import type { NotebookIO } from '../notebook/io.js';

export interface EngineExecuteOptions {
  inputPath: string | null;
  /** Where to save after each cell; null disables incremental saves */
  outputPath: string | null;
  kernelName: string;
  progressBar: boolean;
  /** Echo stream outputs through the logger */
  logOutput: boolean;
  /** Seconds to wait for the kernel to come up */
  startTimeout: number;
  /** Seconds a single cell may run; undefined means no limit */
  executionTimeout?: number;
  /** Minimum seconds between saves while a cell is still running */
  autosaveCellEvery: number;
  stdoutFile?: string;
  stderrFile?: string;
  io: NotebookIO;
  /** Engine-specific settings passed through untouched */
  engineOptions: Record<string, unknown>;
}

export interface Engine {
  readonly name: string;
  /**
   * @throws EngineError when neither the override nor the notebook names a kernel
   */
  resolveKernelName(notebook: Notebook, kernelName?: string | null): string;
  /**
   * Runs the notebook and returns it with outputs and run metadata filled in.
   * Cell failures are recorded in the notebook; timeouts and kernel failures
   * are thrown as EngineError.
   */
  execute(notebook: Notebook, options: EngineExecuteOptions): Promise<Notebook>;
}
