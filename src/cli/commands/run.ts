/**
 * @fileoverview Run command - parameterize and execute one notebook
 */

import type { Notebook } from '../../notebook/types.js';
import { executeNotebook } from '../../execute/execute.js';
import type { RuntimeConfig } from '../../config/index.js';
import { collectParameters, type CliArgs, type CollectParametersOptions } from '../args.js';
import { createError } from '../errors.js';

export interface RunCommandOptions extends CollectParametersOptions {
  args: CliArgs;
  execute?: typeof executeNotebook;
  config?: RuntimeConfig;
}

/** `file:` URLs are accepted wherever a path is. */
export function toNotebookReference(value: string): string | URL {
  return value.startsWith('file:') ? new URL(value) : value;
}

export async function runCommand(options: RunCommandOptions): Promise<Notebook> {
  const { args } = options;
  if (args.input === null) {
    throw createError('INVALID_ARGUMENT', 'An input notebook is required. Usage: paramnb <input> [output]');
  }

  const parameters = await collectParameters(args, { readText: options.readText });
  const execute = options.execute ?? executeNotebook;

  return execute(toNotebookReference(args.input), args.output === null ? null : toNotebookReference(args.output), {
    parameters,
    engineName: args.engine,
    kernelName: args.kernel,
    language: args.language,
    cwd: args.cwd,
    prepareOnly: args.prepareOnly,
    reportMode: args.reportMode,
    logOutput: args.logOutput,
    progressBar: args.progressBar,
    startTimeout: args.startTimeout,
    executionTimeout: args.executionTimeout,
    autosaveCellEvery: args.autosaveCellEvery,
    requestSaveOnCellExecute: args.requestSaveOnCellExecute,
    stdoutFile: args.stdoutFile,
    stderrFile: args.stderrFile,
    obfuscateSensitiveParameters: args.obfuscateSensitiveParameters,
    sensitiveParameterPatterns: args.sensitiveParameterPatterns,
    config: options.config,
  });
}
