/**
 * In-process stand-ins shared by the test suites: a notebook store kept in a
 * Map and an engine that replays scripted outputs instead of running code.
 */

import type { Cell, CellOutput, CodeCell, ErrorOutput, Notebook } from '../notebook/types.js';
import { parseNotebook, serializeNotebook, type NotebookIO } from '../notebook/io.js';
import { newCodeCell, newNotebook } from '../notebook/model.js';
import { NotebookIOError } from '../core/errors.js';
import { BaseEngine } from '../engines/base_engine.js';
import type { NotebookExecutionManager } from '../engines/execution_manager.js';
import type { EngineExecuteOptions } from '../engines/types.js';
import { isBenignExit } from '../execute/classify.js';

export class MemoryNotebookIO implements NotebookIO {
  readonly files = new Map<string, string>();
  readonly writes: string[] = [];

  constructor(initial: Record<string, Notebook> = {}) {
    for (const [path, notebook] of Object.entries(initial)) {
      this.files.set(path, serializeNotebook(notebook));
    }
  }

  async read(path: string): Promise<Notebook> {
    const text = this.files.get(path);
    if (text === undefined) {
      throw new NotebookIOError('read', path, false, 'ENOENT: no such file or directory');
    }
    return parseNotebook(text, path);
  }

  async write(notebook: Notebook, path: string): Promise<void> {
    this.files.set(path, serializeNotebook(notebook));
    this.writes.push(path);
  }

  /** The last notebook written to `path`, decoded. */
  saved(path: string): Notebook {
    const text = this.files.get(path);
    if (text === undefined) {
      throw new Error(`Nothing saved at ${path}`);
    }
    return parseNotebook(text, path);
  }
}

export function pythonNotebook(cells: Cell[]): Notebook {
  return newNotebook(cells, {
    kernelspec: { name: 'python3', display_name: 'Python 3', language: 'python' },
    language_info: { name: 'python' },
  });
}

export function parametersCell(source: string): CodeCell {
  return newCodeCell(source, { tags: ['parameters'] });
}

export function errorOutput(ename: string, evalue: string, traceback: string[] = []): ErrorOutput {
  return { output_type: 'error', ename, evalue, traceback };
}

export function stdout(text: string): CellOutput {
  return { output_type: 'stream', name: 'stdout', text };
}

export type CellScript = (cell: CodeCell, index: number) => CellOutput[];

/**
 * Replays `script` for each code cell. Stops after the first cell producing an
 * error output, flagging the cell unless the error is a clean exit.
 */
export class ScriptedEngine extends BaseEngine {
  readonly executed: number[] = [];
  readonly received: EngineExecuteOptions[] = [];

  constructor(
    readonly name: string,
    private readonly script: CellScript = () => [],
  ) {
    super();
  }

  protected async executeManaged(manager: NotebookExecutionManager, options: EngineExecuteOptions): Promise<void> {
    this.received.push(options);
    let executionCount = 0;
    for (const [index, cell] of manager.notebook.cells.entries()) {
      if (cell.cell_type !== 'code') continue;
      await manager.cellStart(index);
      executionCount += 1;
      cell.execution_count = executionCount;
      this.executed.push(index);

      let stop = false;
      for (const output of this.script(cell, index)) {
        manager.appendOutput(index, output);
        if (output.output_type === 'error') {
          stop = true;
          if (!isBenignExit(output)) manager.cellException(index);
        }
      }
      await manager.cellComplete(index);
      if (stop) break;
    }
  }
}

/** Engine options for driving an engine directly, without the orchestrator. */
export function engineOptions(overrides: Partial<EngineExecuteOptions> = {}): EngineExecuteOptions {
  return {
    inputPath: 'in.ipynb',
    outputPath: null,
    kernelName: 'python3',
    progressBar: false,
    logOutput: false,
    startTimeout: 60,
    autosaveCellEvery: 0,
    io: new MemoryNotebookIO(),
    engineOptions: {},
    ...overrides,
  };
}
