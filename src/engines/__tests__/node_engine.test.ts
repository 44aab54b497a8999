import { describe, expect, it } from 'vitest';
import { NodeEngine, toErrorOutput } from '../node_engine.js';
import { EngineError } from '../../core/errors.js';
import { newCodeCell, newMarkdownCell, newNotebook } from '../../notebook/model.js';
import type { Cell, CodeCell, Notebook } from '../../notebook/types.js';
import { engineOptions } from '../../__tests__/support.js';

function jsNotebook(sources: Array<string | Cell>): Notebook {
  return newNotebook(
    sources.map((source) => (typeof source === 'string' ? newCodeCell(source) : source)),
    { kernelspec: { name: 'javascript', language: 'javascript' } },
  );
}

function codeCell(notebook: Notebook, index: number): CodeCell {
  const cell = notebook.cells[index];
  if (!cell || cell.cell_type !== 'code') {
    throw new Error(`cell ${index} is not a code cell`);
  }
  return cell;
}

async function run(sources: Array<string | Cell>, executionTimeout?: number): Promise<Notebook> {
  return new NodeEngine().execute(jsNotebook(sources), engineOptions({ kernelName: 'javascript', executionTimeout }));
}

describe('NodeEngine', () => {
  it('shares state between cells and records results', async () => {
    const notebook = await run([
      'var x = 2;\nconsole.log("x is", x);',
      newMarkdownCell('between'),
      'x * 21',
    ]);

    expect(codeCell(notebook, 0)).toMatchObject({
      execution_count: 1,
      outputs: [{ output_type: 'stream', name: 'stdout', text: 'x is 2\n' }],
    });
    expect(codeCell(notebook, 2)).toMatchObject({
      execution_count: 2,
      outputs: [{ output_type: 'execute_result', execution_count: 2, data: { 'text/plain': '42' }, metadata: {} }],
    });
    expect(notebook.metadata.paramnb?.exception).toBe(false);
  });

  it('routes console levels to the matching stream', async () => {
    const notebook = await run(['console.info("a"); console.log("b"); console.warn("c"); console.error("d");']);

    expect(codeCell(notebook, 0).outputs).toEqual([
      { output_type: 'stream', name: 'stdout', text: 'a\nb\n' },
      { output_type: 'stream', name: 'stderr', text: 'c\nd\n' },
    ]);
  });

  it('awaits promises returned by a cell', async () => {
    const notebook = await run(['(async () => "done")()']);

    expect(codeCell(notebook, 0).outputs).toEqual([
      { output_type: 'execute_result', execution_count: 1, data: { 'text/plain': "'done'" }, metadata: {} },
    ]);
  });

  it('records a thrown error and stops', async () => {
    const notebook = await run(['throw new TypeError("bad input")', 'console.log("never")']);

    const [output] = codeCell(notebook, 0).outputs;
    expect(output).toMatchObject({ output_type: 'error', ename: 'TypeError', evalue: 'bad input' });
    expect(output?.output_type === 'error' ? output.traceback[0] : undefined).toBe('TypeError: bad input');
    expect(codeCell(notebook, 0).metadata.paramnb).toMatchObject({ exception: true, status: 'failed' });
    expect(codeCell(notebook, 1)).toMatchObject({ execution_count: null, outputs: [] });
    expect(notebook.metadata.paramnb?.exception).toBe(true);
  });

  it('records a rejected promise', async () => {
    const notebook = await run(['Promise.reject(new RangeError("late"))']);

    expect(codeCell(notebook, 0).outputs[0]).toMatchObject({ ename: 'RangeError', evalue: 'late' });
  });

  it('stops without failing on a clean exit', async () => {
    const notebook = await run(['console.log("before"); exit();', '1 + 1']);

    expect(codeCell(notebook, 0).outputs).toEqual([
      { output_type: 'stream', name: 'stdout', text: 'before\n' },
      { output_type: 'error', ename: 'SystemExit', evalue: '0', traceback: [] },
    ]);
    expect(codeCell(notebook, 0).metadata.paramnb?.status).toBe('completed');
    expect(codeCell(notebook, 1).execution_count).toBeNull();
    expect(notebook.metadata.paramnb?.exception).toBe(false);
  });

  it('flags a non-zero exit', async () => {
    const notebook = await run(['exit(3)']);

    expect(codeCell(notebook, 0).outputs[0]).toMatchObject({ ename: 'SystemExit', evalue: '3' });
    expect(codeCell(notebook, 0).metadata.paramnb?.exception).toBe(true);
  });

  it('loads modules through require', async () => {
    const notebook = await run(['require("node:path").posix.join("a", "b")']);

    expect(codeCell(notebook, 0).outputs[0]).toMatchObject({ data: { 'text/plain': "'a/b'" } });
  });

  it('turns a synchronous timeout into an engine error', async () => {
    await expect(run(['while (true) {}'], 0.05)).rejects.toMatchObject({
      name: 'EngineError',
      reason: 'timeout',
      engine: 'node',
    });
  });

  it('turns a pending promise past the timeout into an engine error', async () => {
    await expect(run(['new Promise(() => {})'], 0.05)).rejects.toBeInstanceOf(EngineError);
  });
});

describe('toErrorOutput', () => {
  it('handles thrown primitives', () => {
    expect(toErrorOutput('plain')).toEqual({ output_type: 'error', ename: 'Error', evalue: 'plain', traceback: [] });
  });

  it('reads error-like objects without a stack', () => {
    expect(toErrorOutput({ name: 'Custom', message: 'm' })).toEqual({
      output_type: 'error',
      ename: 'Custom',
      evalue: 'm',
      traceback: [],
    });
  });
});
