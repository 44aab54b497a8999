/**
 * @fileoverview Error markers
 *
 * A failed run leaves two tagged markdown cells in the notebook: a banner at
 * the top linking to an anchor placed just before the failing cell. Every run
 * strips markers left by earlier runs before executing, so they never pile up.
 */

import type { Notebook } from '../notebook/types.js';
import { cellIdFor, hasTag, newMarkdownCell } from '../notebook/model.js';
import { ValidationError, formatExecutionCount, type NotebookExecutionError } from '../core/errors.js';

export const ERROR_MARKER_TAG = 'paramnb-error-cell-tag';
export const ERROR_ANCHOR_ID = 'paramnb-error-cell';

const ERROR_STYLE = 'style="color:red; font-family:Helvetica Neue, Helvetica, Arial, sans-serif; font-size:2em;"';

export const ERROR_ANCHOR_MESSAGE =
  `<span id="${ERROR_ANCHOR_ID}" ${ERROR_STYLE}>Execution using paramnb encountered an exception here and stopped:</span>`;

export function formatErrorBanner(executionCount: number | null): string {
  return `<span ${ERROR_STYLE}>An Exception was encountered at '<a href="#${ERROR_ANCHOR_ID}">In [${formatExecutionCount(executionCount)}]</a>'.</span>`;
}

export function isErrorMarker(cell: Notebook['cells'][number]): boolean {
  return hasTag(cell, ERROR_MARKER_TAG);
}

/** Drops every marker cell. A no-op on a notebook without markers. */
export function removeErrorMarkers(notebook: Notebook): Notebook {
  notebook.cells = notebook.cells.filter((cell) => !isErrorMarker(cell));
  return notebook;
}

/**
 * Inserts the anchor before the failing cell, then the banner at the top.
 * Afterwards the banner is cell 0, the anchor is cell `cellIndex + 1` and the
 * failing cell is `cellIndex + 2`.
 */
export function insertErrorMarkers(notebook: Notebook, error: NotebookExecutionError): Notebook {
  const cellCount = notebook.cells.length;
  if (!Number.isInteger(error.cellIndex) || error.cellIndex < 0 || error.cellIndex >= cellCount) {
    throw new ValidationError('cellIndex', `an index in [0, ${cellCount})`, String(error.cellIndex));
  }

  const anchor = newMarkdownCell(ERROR_ANCHOR_MESSAGE, { tags: [ERROR_MARKER_TAG] }, cellIdFor(notebook));
  const banner = newMarkdownCell(formatErrorBanner(error.executionCount), { tags: [ERROR_MARKER_TAG] }, cellIdFor(notebook));

  // Anchor first: its index is relative to the cells before the banner shifts them.
  notebook.cells.splice(error.cellIndex, 0, anchor);
  notebook.cells.splice(0, 0, banner);
  return notebook;
}
