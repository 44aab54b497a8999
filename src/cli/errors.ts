/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  EngineError,
  NotebookExecutionError,
  NotebookFormatError,
  NotebookIOError,
  ParameterError,
  ValidationError,
  isParamnbError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PARAMETER_ERROR'
  | 'NOTEBOOK_IO_ERROR'
  | 'NOTEBOOK_FORMAT_ERROR'
  | 'ENGINE_ERROR'
  | 'TIMEOUT'
  | 'EXECUTION_FAILED'
  | 'INTERNAL_ERROR';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `paramnb --help` for usage information.',
  PARAMETER_ERROR: 'Check parameter names and values; `paramnb <notebook> --help-notebook` lists what the notebook declares.',
  NOTEBOOK_IO_ERROR: 'Check that the notebook path exists and is readable, and that the output directory is writable.',
  NOTEBOOK_FORMAT_ERROR: 'The input is not an nbformat v4 notebook.',
  ENGINE_ERROR: 'Check the engine name (--engine) and that the kernel interpreter is installed.',
  TIMEOUT: 'Increase --start-timeout or --execution-timeout.',
  EXECUTION_FAILED: 'Open the output notebook; the failing cell is marked at the top.',
  INTERNAL_ERROR: 'Re-run with PARAMNB_LOG_LEVEL=debug for more detail.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  EXECUTION_FAILED: 1,
  INVALID_ARGUMENT: 2,
  PARAMETER_ERROR: 2,
  NOTEBOOK_IO_ERROR: 3,
  NOTEBOOK_FORMAT_ERROR: 3,
  ENGINE_ERROR: 4,
  INTERNAL_ERROR: 70,
  TIMEOUT: 124,
};

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context: Record<string, unknown>;
}

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  options: { retryable?: boolean; recoveryHints?: string[]; context?: Record<string, unknown> } = {},
): ErrorEnvelope {
  return {
    code,
    message,
    retryable: options.retryable ?? false,
    recoveryHints: options.recoveryHints ?? [ERROR_SUGGESTIONS[code]],
    context: options.context ?? {},
  };
}

function codeFor(error: unknown): CliErrorCode {
  if (error instanceof CliError) return error.code;
  if (error instanceof NotebookExecutionError) return 'EXECUTION_FAILED';
  if (error instanceof EngineError) return error.reason === 'timeout' ? 'TIMEOUT' : 'ENGINE_ERROR';
  if (error instanceof NotebookIOError) return 'NOTEBOOK_IO_ERROR';
  if (error instanceof NotebookFormatError) return 'NOTEBOOK_FORMAT_ERROR';
  if (error instanceof ParameterError) return 'PARAMETER_ERROR';
  if (error instanceof ValidationError) return 'INVALID_ARGUMENT';
  return 'INTERNAL_ERROR';
}

/** Maps any thrown value onto an envelope; library errors keep their JSON details. */
export function classifyError(error: unknown): ErrorEnvelope {
  const code = codeFor(error);
  const hints = error instanceof CliError && error.suggestion ? [error.suggestion] : [ERROR_SUGGESTIONS[code]];
  let context: Record<string, unknown> = {};
  if (error instanceof CliError && error.details) {
    context = { ...error.details };
  } else if (isParamnbError(error)) {
    context = { ...(error.toJSON().details ?? {}) };
  }
  return createErrorEnvelope(code, getErrorMessage(error), {
    retryable: isParamnbError(error) ? error.retryable : false,
    recoveryHints: hints,
    context,
  });
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message.trim()}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('');
    for (const hint of envelope.recoveryHints) {
      lines.push(`Suggestion: ${hint}`);
    }
  }
  return lines.join('\n');
}
