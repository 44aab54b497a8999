/**
 * @fileoverview Failure classification
 *
 * Decides whether an executed notebook failed, distinguishing an engine
 * error output, an exception the engine only flagged in cell metadata, and a
 * clean interpreter exit that merely looks like an error.
 */

import type { CodeCell, ErrorOutput, Notebook } from '../notebook/types.js';
import type { NotebookIO } from '../notebook/io.js';
import { NotebookExecutionError } from '../core/errors.js';
import { insertErrorMarkers } from './markers.js';
import { logError } from '../telemetry/logger.js';

export const BENIGN_EXIT_ERROR_NAME = 'SystemExit';
export const CELL_EXECUTION_ERROR_NAME = 'CellExecutionError';

/** `exit()`, `exit(0)` and friends: an early stop, not a failure. */
export function isBenignExit(output: ErrorOutput): boolean {
  return output.ename === BENIGN_EXIT_ERROR_NAME && (output.evalue === '' || output.evalue === '0');
}

function fromOutput(index: number, cell: CodeCell, output: ErrorOutput): NotebookExecutionError {
  return new NotebookExecutionError(index, cell.execution_count, cell.source, output.ename, output.evalue, output.traceback);
}

/**
 * The first failure in document order, or null. Error outputs take
 * precedence within a cell; the metadata exception flag is only consulted
 * when the cell has neither a failing output nor a benign exit.
 */
export function findExecutionError(notebook: Notebook): NotebookExecutionError | null {
  for (const [index, cell] of notebook.cells.entries()) {
    if (cell.cell_type !== 'code') continue;

    let sawBenignExit = false;
    for (const output of cell.outputs) {
      if (output.output_type !== 'error') continue;
      if (isBenignExit(output)) {
        sawBenignExit = true;
        continue;
      }
      return fromOutput(index, cell, output);
    }

    if (!sawBenignExit && cell.metadata.paramnb?.exception === true) {
      return new NotebookExecutionError(index, cell.execution_count, cell.source, CELL_EXECUTION_ERROR_NAME, '', []);
    }
  }
  return null;
}

/**
 * On failure: mark the notebook, persist it to `outputPath` (when set), then
 * throw. On success: return without touching the notebook.
 *
 * @throws NotebookExecutionError
 */
export async function raiseForExecutionErrors(
  notebook: Notebook,
  outputPath: string | null,
  io: NotebookIO,
): Promise<void> {
  const error = findExecutionError(notebook);
  if (!error) return;

  logError(`Notebook failed at cell ${error.cellIndex}`, { ename: error.ename, executionCount: error.executionCount });
  insertErrorMarkers(notebook, error);
  if (outputPath !== null) {
    await io.write(notebook, outputPath);
  }
  throw error;
}
