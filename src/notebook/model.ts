/**
 * @fileoverview Structural queries and constructors for notebook documents
 *
 * Pure helpers over the data model; nothing here executes or persists.
 */

import { randomUUID } from 'node:crypto';
import type {
  Cell,
  CellMetadata,
  CellType,
  CodeCell,
  MarkdownCell,
  Notebook,
  NotebookMetadata,
  RunMetadata,
} from './types.js';

export const PARAMETERS_TAG = 'parameters';

/** nbformat 4.5 introduced cell ids. */
const CELL_ID_MIN_MINOR = 5;
const CURRENT_NBFORMAT_MINOR = 5;

export function newCellId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/** A fresh id when the notebook's minor format carries ids, otherwise none. */
export function cellIdFor(notebook: Notebook): string | undefined {
  return notebook.nbformat_minor >= CELL_ID_MIN_MINOR ? newCellId() : undefined;
}

export function newCodeCell(source: string, metadata: CellMetadata = {}, id?: string): CodeCell {
  const cell: CodeCell = {
    cell_type: 'code',
    metadata,
    source,
    execution_count: null,
    outputs: [],
  };
  if (id) cell.id = id;
  return cell;
}

export function newMarkdownCell(source: string, metadata: CellMetadata = {}, id?: string): MarkdownCell {
  const cell: MarkdownCell = {
    cell_type: 'markdown',
    metadata,
    source,
  };
  if (id) cell.id = id;
  return cell;
}

export function newNotebook(cells: Cell[] = [], metadata: NotebookMetadata = {}): Notebook {
  return {
    nbformat: 4,
    nbformat_minor: CURRENT_NBFORMAT_MINOR,
    metadata,
    cells,
  };
}

export function isCodeCell(cell: Cell): cell is CodeCell {
  return cell.cell_type === 'code';
}

export function getCellTags(cell: Cell): readonly string[] {
  return cell.metadata.tags ?? [];
}

export function hasTag(cell: Cell, tag: string): boolean {
  return getCellTags(cell).includes(tag);
}

/**
 * Index of the first cell carrying `tag`, or -1. Restrict to one cell kind
 * with `cellType`.
 */
export function findTaggedCellIndex(notebook: Notebook, tag: string, cellType?: CellType): number {
  return notebook.cells.findIndex(
    (cell) => (cellType === undefined || cell.cell_type === cellType) && hasTag(cell, tag),
  );
}

export function anyTaggedCell(notebook: Notebook, tag: string): boolean {
  return findTaggedCellIndex(notebook, tag) !== -1;
}

/** The document's run metadata namespace, created empty when missing. */
export function ensureRunMetadata(notebook: Notebook): RunMetadata {
  const existing = notebook.metadata.paramnb;
  if (existing) return existing;
  const created: RunMetadata = {};
  notebook.metadata.paramnb = created;
  return created;
}

export function getKernelName(notebook: Notebook): string | undefined {
  return notebook.metadata.kernelspec?.name;
}

export function getLanguage(notebook: Notebook): string | undefined {
  return notebook.metadata.kernelspec?.language ?? notebook.metadata.language_info?.name;
}

/** Report mode: hide the source of every code cell. */
export function hideCodeSources(notebook: Notebook): void {
  for (const cell of notebook.cells) {
    if (cell.cell_type !== 'code') continue;
    cell.metadata.jupyter = { ...(cell.metadata.jupyter ?? {}), source_hidden: true };
  }
}

export function cloneNotebook(notebook: Notebook): Notebook {
  return structuredClone(notebook);
}
