/**
 * @fileoverview Subprocess engine
 *
 * Pipes each code cell to a fresh interpreter process chosen by kernel name.
 * Cells share no state; stdout and stderr become stream outputs, and a
 * non-zero exit becomes an error output named after the last
 * `SomeError: message` line on stderr, or `ExitCode` when stderr has none.
 */

import { execa } from 'execa';
import { z } from 'zod';
import type { ErrorOutput } from '../notebook/types.js';
import { EngineError, ValidationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { BaseEngine } from './base_engine.js';
import type { NotebookExecutionManager } from './execution_manager.js';
import type { EngineExecuteOptions } from './types.js';

export const SUBPROCESS_ENGINE_NAME = 'subprocess';

export interface KernelCommand {
  command: string;
  args: string[];
}

export const DEFAULT_KERNEL_COMMANDS: Readonly<Record<string, KernelCommand>> = {
  python: { command: 'python3', args: ['-'] },
  python3: { command: 'python3', args: ['-'] },
  ir: { command: 'Rscript', args: ['-'] },
  julia: { command: 'julia', args: ['-'] },
  bash: { command: 'bash', args: ['-s'] },
  javascript: { command: 'node', args: ['-'] },
  node: { command: 'node', args: ['-'] },
  nodejs: { command: 'node', args: ['-'] },
};

const SubprocessEngineOptionsSchema = z.object({
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
}).passthrough();

const ERROR_LINE = /^([A-Za-z_][\w.]*(?:Error|Exception|Exit|Interrupt)):\s?(.*)$/;

export const EXIT_CODE_ERROR_NAME = 'ExitCode';

/** The last `Name: message` line of stderr, else the bare exit code. */
export function parseErrorOutput(stderr: string, exitCode: number): ErrorOutput {
  const lines = stderr.split(/\r?\n/).filter((line) => line.length > 0);
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = ERROR_LINE.exec(lines[i] ?? '');
    if (match) {
      return { output_type: 'error', ename: match[1] ?? 'Error', evalue: match[2] ?? '', traceback: lines };
    }
  }
  return { output_type: 'error', ename: EXIT_CODE_ERROR_NAME, evalue: String(exitCode), traceback: lines };
}

export class SubprocessEngine extends BaseEngine {
  readonly name = SUBPROCESS_ENGINE_NAME;
  private readonly commands: Record<string, KernelCommand>;

  constructor(commands: Record<string, KernelCommand> = {}) {
    super();
    this.commands = { ...DEFAULT_KERNEL_COMMANDS, ...commands };
  }

  resolveCommand(kernelName: string, engineOptions: Record<string, unknown>): KernelCommand {
    const parsed = SubprocessEngineOptionsSchema.safeParse(engineOptions);
    if (!parsed.success) {
      throw new ValidationError('engineOptions', '{ command?: string, args?: string[] }', JSON.stringify(engineOptions));
    }
    const base = this.commands[kernelName];
    const command = parsed.data.command ?? base?.command;
    if (!command) {
      throw new EngineError(
        this.name,
        'kernel_start',
        false,
        `No command known for kernel '${kernelName}' (known: ${Object.keys(this.commands).join(', ')})`,
      );
    }
    return { command, args: parsed.data.args ?? base?.args ?? [] };
  }

  private async probe(kernel: KernelCommand, startTimeout: number): Promise<void> {
    const result = await execa(kernel.command, ['--version'], { timeout: startTimeout * 1000, reject: false });
    if (result.timedOut) {
      throw new EngineError(this.name, 'timeout', true, `${kernel.command} did not start within ${startTimeout}s`);
    }
    if (result.failed || result.exitCode !== 0) {
      throw new EngineError(
        this.name,
        'kernel_start',
        false,
        `${kernel.command} is not available: ${String(result.stderr || result.stdout || 'unknown error')}`,
      );
    }
    logDebug(`Using ${kernel.command} ${String(result.stdout).trim()}`);
  }

  protected async executeManaged(manager: NotebookExecutionManager, options: EngineExecuteOptions): Promise<void> {
    const kernel = this.resolveCommand(options.kernelName, options.engineOptions);
    await this.probe(kernel, options.startTimeout);

    let executionCount = 0;
    for (const [index, cell] of manager.notebook.cells.entries()) {
      if (cell.cell_type !== 'code') continue;

      await manager.cellStart(index);
      executionCount += 1;
      cell.execution_count = executionCount;

      let failed = false;
      try {
        const result = await execa(kernel.command, kernel.args, {
          input: cell.source,
          reject: false,
          stripFinalNewline: false,
          timeout: options.executionTimeout !== undefined ? options.executionTimeout * 1000 : undefined,
        }).catch((error: unknown) => {
          throw new EngineError(this.name, 'execution_failed', false, getErrorMessage(error));
        });

        if (result.timedOut) {
          throw new EngineError(this.name, 'timeout', true, `Cell ${index + 1} exceeded ${options.executionTimeout}s`);
        }
        const stdout = String(result.stdout);
        const stderr = String(result.stderr);
        if (stdout) manager.appendOutput(index, { output_type: 'stream', name: 'stdout', text: stdout });
        if (stderr) manager.appendOutput(index, { output_type: 'stream', name: 'stderr', text: stderr });

        // A cell that exits cleanly on its own looks like one that ran to the
        // end, so a status 0 exit never stops the run here.
        if (result.exitCode !== 0) {
          manager.appendOutput(index, parseErrorOutput(stderr, result.exitCode ?? 1));
          manager.cellException(index);
          failed = true;
        }
      } finally {
        await manager.cellComplete(index);
      }
      if (failed) break;
    }
  }
}
