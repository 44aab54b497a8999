/**
 * @fileoverview paramnb error hierarchy
 *
 * Every failure raised by the library is a typed, structured error carrying a
 * machine-readable code and a retryability hint. The CLI maps these onto
 * exit codes and JSON envelopes.
 */

import { stripVTControlCharacters } from 'node:util';

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ParamnbError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// NOTEBOOK IO ERRORS
// ============================================================================

export type NotebookIOOperation = 'read' | 'write' | 'parse';

export class NotebookIOError extends ParamnbError {
  readonly code = 'NOTEBOOK_IO_ERROR';

  constructor(
    readonly operation: NotebookIOOperation,
    readonly path: string,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Notebook ${operation} failed for ${path}: ${message}`);
    this.name = 'NotebookIOError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        path: this.path,
        cause: this.cause?.message,
      },
    };
  }
}

export class NotebookFormatError extends ParamnbError {
  readonly code = 'NOTEBOOK_FORMAT_ERROR';
  readonly retryable = false;

  constructor(
    readonly source: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid notebook document ${source}: ${issues.slice(0, 3).join('; ')}${issues.length > 3 ? ` (+${issues.length - 3} more)` : ''}`);
    this.name = 'NotebookFormatError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        issues: [...this.issues],
      },
    };
  }
}

// ============================================================================
// PARAMETER ERRORS
// ============================================================================

export type ParameterErrorReason =
  | 'missing_template_parameter'
  | 'untranslatable'
  | 'invalid_pattern'
  | 'invalid_value'
  | 'no_translator';

export class ParameterError extends ParamnbError {
  readonly code = 'PARAMETER_ERROR';
  readonly retryable = false;

  constructor(
    readonly reason: ParameterErrorReason,
    message: string,
    readonly parameter?: string,
  ) {
    super(message);
    this.name = 'ParameterError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        parameter: this.parameter,
      },
    };
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export type EngineErrorReason =
  | 'unknown_engine'
  | 'no_kernel'
  | 'kernel_start'
  | 'timeout'
  | 'execution_failed';

export class EngineError extends ParamnbError {
  readonly code = 'ENGINE_ERROR';

  constructor(
    readonly engine: string,
    readonly reason: EngineErrorReason,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Engine ${engine} ${reason}: ${message}`);
    this.name = 'EngineError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        engine: this.engine,
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends ParamnbError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// EXECUTION ERRORS
// ============================================================================

const SEPARATOR = '-'.repeat(75);

/**
 * A code cell failed while the notebook ran. Carries enough of the failing
 * cell to render the error markers and to report the failure to the caller.
 */
export class NotebookExecutionError extends ParamnbError {
  readonly code = 'EXECUTION_ERROR';
  readonly retryable = false;
  readonly traceback: readonly string[];

  constructor(
    readonly cellIndex: number,
    readonly executionCount: number | null,
    readonly source: string,
    readonly ename: string,
    readonly evalue: string,
    traceback: readonly string[],
  ) {
    const cleaned = traceback.map((line) => stripVTControlCharacters(line));
    const body = cleaned.length > 0 ? cleaned.join('\n') : `${ename}: ${evalue}`;
    super(`\n${SEPARATOR}\nException encountered at "In [${formatExecutionCount(executionCount)}]":\n${body}\n`);
    this.name = 'NotebookExecutionError';
    this.traceback = Object.freeze([...traceback]);
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        cellIndex: this.cellIndex,
        executionCount: this.executionCount,
        ename: this.ename,
        evalue: this.evalue,
      },
    };
  }
}

export function formatExecutionCount(executionCount: number | null): string {
  return executionCount === null ? ' ' : String(executionCount);
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isParamnbError(error: unknown): error is ParamnbError {
  return error instanceof ParamnbError;
}

export function isExecutionError(error: unknown): error is NotebookExecutionError {
  return error instanceof NotebookExecutionError;
}
