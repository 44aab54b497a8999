/**
 * @fileoverview In-process JavaScript engine
 *
 * Runs every code cell of a notebook in one shared `node:vm` context, so
 * later cells see what earlier cells defined. Console calls become stream
 * outputs, a cell's completion value becomes an execute result, and a thrown
 * value becomes an error output. Cells can stop the run early with `exit()`.
 */

import { createRequire } from 'node:module';
import { join } from 'node:path';
import { format, inspect } from 'node:util';
import vm from 'node:vm';
import type { ErrorOutput } from '../notebook/types.js';
import { EngineError } from '../core/errors.js';
import { getErrnoCode } from '../utils/errors.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { BENIGN_EXIT_ERROR_NAME } from '../execute/classify.js';
import { BaseEngine } from './base_engine.js';
import type { NotebookExecutionManager } from './execution_manager.js';
import type { EngineExecuteOptions } from './types.js';

export const NODE_ENGINE_NAME = 'node';

const SCRIPT_TIMEOUT_CODE = 'ERR_SCRIPT_EXECUTION_TIMEOUT';

class ExitSignal {
  constructor(readonly code: number | string) {}
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (typeof value === 'object' || typeof value === 'function')
    && value !== null
    && 'then' in value
    && typeof value.then === 'function';
}

function readStringField(value: object, field: string): string | undefined {
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === 'string' ? raw : undefined;
}

/**
 * Errors thrown inside the context come from its own realm, so `instanceof
 * Error` is false for them; read the fields instead.
 */
export function toErrorOutput(thrown: unknown): ErrorOutput {
  if (thrown instanceof ExitSignal) {
    return { output_type: 'error', ename: BENIGN_EXIT_ERROR_NAME, evalue: String(thrown.code), traceback: [] };
  }
  if (typeof thrown === 'object' && thrown !== null) {
    const stack = readStringField(thrown, 'stack');
    return {
      output_type: 'error',
      ename: readStringField(thrown, 'name') ?? 'Error',
      evalue: readStringField(thrown, 'message') ?? inspect(thrown),
      traceback: stack ? stack.split('\n') : [],
    };
  }
  return { output_type: 'error', ename: 'Error', evalue: String(thrown), traceback: [] };
}

function isTimeout(error: unknown): boolean {
  return error instanceof TimeoutError || getErrnoCode(error) === SCRIPT_TIMEOUT_CODE;
}

export class NodeEngine extends BaseEngine {
  readonly name = NODE_ENGINE_NAME;

  protected async executeManaged(manager: NotebookExecutionManager, options: EngineExecuteOptions): Promise<void> {
    const timeoutMs = options.executionTimeout !== undefined ? options.executionTimeout * 1000 : undefined;
    let currentIndex = -1;

    const emit = (name: 'stdout' | 'stderr') => (...args: unknown[]): void => {
      if (currentIndex === -1) return;
      manager.appendOutput(currentIndex, { output_type: 'stream', name, text: `${format(...args)}\n` });
    };

    const context = vm.createContext({
      console: {
        log: emit('stdout'),
        info: emit('stdout'),
        debug: emit('stdout'),
        warn: emit('stderr'),
        error: emit('stderr'),
      },
      require: createRequire(join(process.cwd(), 'notebook.js')),
      exit: (code: number | string = 0): never => {
        throw new ExitSignal(code);
      },
      setTimeout,
      clearTimeout,
      setInterval,
      clearInterval,
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder,
      Buffer,
    });

    let executionCount = 0;
    for (const [index, cell] of manager.notebook.cells.entries()) {
      if (cell.cell_type !== 'code') continue;

      await manager.cellStart(index);
      executionCount += 1;
      cell.execution_count = executionCount;
      currentIndex = index;

      let stop = false;
      try {
        const script = new vm.Script(cell.source, { filename: `cell-${index + 1}.js` });
        let value: unknown = script.runInContext(context, { timeout: timeoutMs, displayErrors: false });
        if (isPromiseLike(value)) {
          value = await withTimeout(Promise.resolve(value), timeoutMs, { context: `cell ${index + 1}` });
        }
        if (value !== undefined) {
          manager.appendOutput(index, {
            output_type: 'execute_result',
            execution_count: executionCount,
            data: { 'text/plain': inspect(value) },
            metadata: {},
          });
        }
      } catch (error) {
        if (isTimeout(error)) {
          throw new EngineError(this.name, 'timeout', true, `Cell ${index + 1} exceeded ${options.executionTimeout}s`);
        }
        const output = toErrorOutput(error);
        manager.appendOutput(index, output);
        stop = true;
        if (!(error instanceof ExitSignal) || (output.evalue !== '' && output.evalue !== '0')) {
          manager.cellException(index);
        }
      } finally {
        currentIndex = -1;
        await manager.cellComplete(index);
      }
      if (stop) break;
    }
  }
}
