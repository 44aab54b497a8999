/**
 * @fileoverview Managed engine base
 *
 * Subclasses only run cells; the base class wraps them in a
 * NotebookExecutionManager so metadata, saves and the progress bar behave the
 * same for every engine.
 */

import type { Notebook } from '../notebook/types.js';
import { getKernelName } from '../notebook/model.js';
import { EngineError } from '../core/errors.js';
import { NotebookExecutionManager } from './execution_manager.js';
import type { Engine, EngineExecuteOptions } from './types.js';

export abstract class BaseEngine implements Engine {
  abstract readonly name: string;

  resolveKernelName(notebook: Notebook, kernelName?: string | null): string {
    const resolved = kernelName ?? getKernelName(notebook);
    if (!resolved) {
      throw new EngineError(this.name, 'no_kernel', false, 'No kernel name found in notebook and no override provided');
    }
    return resolved;
  }

  async execute(notebook: Notebook, options: EngineExecuteOptions): Promise<Notebook> {
    const manager = new NotebookExecutionManager(notebook, {
      io: options.io,
      outputPath: options.outputPath,
      progressBar: options.progressBar,
      logOutput: options.logOutput,
      autosaveCellEvery: options.autosaveCellEvery,
      stdoutFile: options.stdoutFile,
      stderrFile: options.stderrFile,
    });

    await manager.notebookStart();
    try {
      await this.executeManaged(manager, options);
    } finally {
      await manager.notebookComplete();
    }
    return manager.notebook;
  }

  /**
   * Runs the code cells of `manager.notebook` in order, reporting each through
   * `cellStart`/`cellComplete`. A failing cell is recorded with
   * `cellException` and ends the run.
   */
  protected abstract executeManaged(manager: NotebookExecutionManager, options: EngineExecuteOptions): Promise<void>;
}
