import { describe, expect, it } from 'vitest';
import {
  ERROR_ANCHOR_ID,
  ERROR_ANCHOR_MESSAGE,
  ERROR_MARKER_TAG,
  formatErrorBanner,
  insertErrorMarkers,
  isErrorMarker,
  removeErrorMarkers,
} from '../markers.js';
import { NotebookExecutionError, ValidationError } from '../../core/errors.js';
import { newCodeCell, newMarkdownCell } from '../../notebook/model.js';
import { pythonNotebook } from '../../__tests__/support.js';

function fourCells() {
  return pythonNotebook([
    newMarkdownCell('# Intro'),
    newCodeCell('a = 1'),
    newCodeCell('b = a / 0'),
    newCodeCell('c = 3'),
  ]);
}

function failureAt(cellIndex: number, executionCount: number | null = 2): NotebookExecutionError {
  return new NotebookExecutionError(cellIndex, executionCount, 'b = a / 0', 'ZeroDivisionError', 'division by zero', []);
}

describe('insertErrorMarkers', () => {
  it('adds a banner at the top and an anchor right before the failing cell', () => {
    const notebook = insertErrorMarkers(fourCells(), failureAt(2));

    expect(notebook.cells).toHaveLength(6);
    expect(notebook.cells[0]?.source).toBe(formatErrorBanner(2));
    expect(notebook.cells[3]?.source).toBe(ERROR_ANCHOR_MESSAGE);
    expect(notebook.cells[3]?.metadata.tags).toEqual([ERROR_MARKER_TAG]);
    expect(notebook.cells[0]?.metadata.tags).toEqual([ERROR_MARKER_TAG]);
    expect(notebook.cells[4]?.source).toBe('b = a / 0');
  });

  it('handles a failure in the very first cell', () => {
    const notebook = insertErrorMarkers(fourCells(), failureAt(0));

    expect(notebook.cells.map((cell) => cell.source)).toEqual([
      formatErrorBanner(2),
      ERROR_ANCHOR_MESSAGE,
      '# Intro',
      'a = 1',
      'b = a / 0',
      'c = 3',
    ]);
  });

  it('gives marker cells ids when the format carries them', () => {
    const notebook = insertErrorMarkers(fourCells(), failureAt(1));

    expect(notebook.cells[0]?.id).toMatch(/^[0-9a-f]{8}$/);
    expect(notebook.cells[2]?.id).toMatch(/^[0-9a-f]{8}$/);
  });

  it('omits ids on pre-4.5 notebooks', () => {
    const notebook = fourCells();
    notebook.nbformat_minor = 4;

    insertErrorMarkers(notebook, failureAt(1));

    expect(notebook.cells[0]?.id).toBeUndefined();
  });

  it('rejects an index outside the notebook', () => {
    expect(() => insertErrorMarkers(fourCells(), failureAt(4))).toThrow(ValidationError);
    expect(() => insertErrorMarkers(fourCells(), failureAt(-1))).toThrow(ValidationError);
  });
});

describe('formatErrorBanner', () => {
  it('links to the anchor and names the execution count', () => {
    const banner = formatErrorBanner(7);

    expect(banner).toContain(`href="#${ERROR_ANCHOR_ID}"`);
    expect(banner).toContain("'<a href=\"#paramnb-error-cell\">In [7]</a>'");
  });

  it('renders a missing execution count as a blank', () => {
    expect(formatErrorBanner(null)).toContain('>In [ ]</a>');
  });
});

describe('removeErrorMarkers', () => {
  it('restores the original cell sequence', () => {
    const original = fourCells().cells.map((cell) => cell.source);
    const notebook = insertErrorMarkers(fourCells(), failureAt(2));

    removeErrorMarkers(notebook);

    expect(notebook.cells.map((cell) => cell.source)).toEqual(original);
    expect(notebook.cells.some(isErrorMarker)).toBe(false);
  });

  it('is a no-op the second time', () => {
    const notebook = removeErrorMarkers(insertErrorMarkers(fourCells(), failureAt(3)));
    const once = structuredClone(notebook.cells);

    removeErrorMarkers(notebook);

    expect(notebook.cells).toEqual(once);
  });

  it('keeps cells that merely share other tags', () => {
    const notebook = pythonNotebook([
      newCodeCell('x = 1', { tags: ['parameters'] }),
      newMarkdownCell('stale', { tags: [ERROR_MARKER_TAG, 'other'] }),
    ]);

    removeErrorMarkers(notebook);

    expect(notebook.cells.map((cell) => cell.source)).toEqual(['x = 1']);
  });
});
