import { describe, expect, it } from 'vitest';
import {
  PARAMETERS_TAG,
  anyTaggedCell,
  cellIdFor,
  cloneNotebook,
  ensureRunMetadata,
  findTaggedCellIndex,
  getCellTags,
  getKernelName,
  getLanguage,
  hideCodeSources,
  newCodeCell,
  newMarkdownCell,
  newNotebook,
} from '../model.js';

describe('notebook model', () => {
  it('builds empty code cells', () => {
    expect(newCodeCell('a = 1')).toEqual({
      cell_type: 'code',
      metadata: {},
      source: 'a = 1',
      execution_count: null,
      outputs: [],
    });
    expect(newCodeCell('a = 1', {}, 'id000001').id).toBe('id000001');
  });

  it('finds tagged cells, optionally by kind', () => {
    const notebook = newNotebook([
      newMarkdownCell('about the parameters', { tags: [PARAMETERS_TAG] }),
      newCodeCell('x = 1', { tags: ['setup', PARAMETERS_TAG] }),
    ]);

    expect(findTaggedCellIndex(notebook, PARAMETERS_TAG)).toBe(0);
    expect(findTaggedCellIndex(notebook, PARAMETERS_TAG, 'code')).toBe(1);
    expect(findTaggedCellIndex(notebook, 'missing')).toBe(-1);
    expect(anyTaggedCell(notebook, 'setup')).toBe(true);
    expect(getCellTags(newCodeCell('y'))).toEqual([]);
  });

  it('only issues cell ids from nbformat 4.5 on', () => {
    const current = newNotebook();
    const legacy = { ...newNotebook(), nbformat_minor: 4 };

    expect(cellIdFor(current)).toMatch(/^[0-9a-f]{8}$/);
    expect(cellIdFor(legacy)).toBeUndefined();
  });

  it('prefers the kernelspec language over language_info', () => {
    const notebook = newNotebook([], {
      kernelspec: { name: 'ir', language: 'R' },
      language_info: { name: 'r-lang' },
    });

    expect(getKernelName(notebook)).toBe('ir');
    expect(getLanguage(notebook)).toBe('R');
    expect(getLanguage(newNotebook([], { language_info: { name: 'julia' } }))).toBe('julia');
    expect(getKernelName(newNotebook())).toBeUndefined();
  });

  it('creates the run metadata namespace once', () => {
    const notebook = newNotebook();

    const first = ensureRunMetadata(notebook);
    first.input_path = 'a.ipynb';

    expect(ensureRunMetadata(notebook)).toBe(first);
    expect(notebook.metadata.paramnb).toEqual({ input_path: 'a.ipynb' });
  });

  it('hides only code sources, keeping other jupyter flags', () => {
    const code = newCodeCell('x', { jupyter: { outputs_hidden: true } });
    const notebook = newNotebook([code, newMarkdownCell('text')]);

    hideCodeSources(notebook);

    expect(code.metadata.jupyter).toEqual({ outputs_hidden: true, source_hidden: true });
    expect(notebook.cells[1]?.metadata.jupyter).toBeUndefined();
  });

  it('clones deeply', () => {
    const notebook = newNotebook([newCodeCell('x', { tags: ['a'] })]);
    const copy = cloneNotebook(notebook);

    copy.cells[0]?.metadata.tags?.push('b');

    expect(notebook.cells[0]?.metadata.tags).toEqual(['a']);
  });
});
