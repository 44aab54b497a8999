/**
 * @fileoverview Notebook load/store
 *
 * `NotebookIO` is the capability the orchestrator persists through. The local
 * implementation reads and writes nbformat JSON files, treating `-` as
 * stdin/stdout.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import { NotebookSchema } from './schema.js';
import type { Notebook } from './types.js';
import { NotebookFormatError, NotebookIOError } from '../core/errors.js';
import { getErrorMessage, isRetryable } from '../utils/errors.js';
import { retry } from '../utils/async.js';
import { logWarning } from '../telemetry/logger.js';

export const STDIO_PATH = '-';

const NOTEBOOK_EXTENSION = '.ipynb';

export interface NotebookIO {
  read(path: string): Promise<Notebook>;
  write(notebook: Notebook, path: string): Promise<void>;
}

export interface LocalNotebookIOOptions {
  /** Attempts for reads that hit transient fs errors (default 3) */
  readAttempts?: number;
  retryDelayMs?: number;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
}

/**
 * Decode notebook JSON text into the typed model.
 *
 * @throws NotebookIOError when the text is not JSON
 * @throws NotebookFormatError when the JSON is not an nbformat v4 notebook
 */
export function parseNotebook(text: string, source: string): Notebook {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new NotebookIOError('parse', source, false, getErrorMessage(error), error instanceof Error ? error : undefined);
  }

  const parsed = NotebookSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new NotebookFormatError(source, issues);
  }
  return parsed.data;
}

export function serializeNotebook(notebook: Notebook): string {
  return `${JSON.stringify(notebook, null, 1)}\n`;
}

/** Display form of a path that may be absent. */
export function formatPath(path: string | null): string {
  return path ?? '<not saved>';
}

function warnOnExtension(path: string): void {
  if (path !== STDIO_PATH && !path.endsWith(NOTEBOOK_EXTENSION)) {
    logWarning(`The notebook path ${path} does not end in ${NOTEBOOK_EXTENSION}`);
  }
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function writeStream(stream: NodeJS.WritableStream, text: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    stream.write(text, (error?: Error | null) => (error ? reject(error) : resolve()));
  });
}

export class LocalNotebookIO implements NotebookIO {
  constructor(private readonly options: LocalNotebookIOOptions = {}) {}

  async read(path: string): Promise<Notebook> {
    warnOnExtension(path);
    let text: string;
    try {
      text = path === STDIO_PATH
        ? await readStream(this.options.stdin ?? process.stdin)
        : await retry(
          this.options.readAttempts ?? 3,
          () => fs.readFile(path, 'utf8'),
          { delayMs: this.options.retryDelayMs ?? 50, shouldRetry: isRetryable },
        );
    } catch (error) {
      throw new NotebookIOError('read', path, isRetryable(error), getErrorMessage(error), error instanceof Error ? error : undefined);
    }
    return parseNotebook(text, path);
  }

  async write(notebook: Notebook, path: string): Promise<void> {
    warnOnExtension(path);
    const text = serializeNotebook(notebook);
    try {
      if (path === STDIO_PATH) {
        await writeStream(this.options.stdout ?? process.stdout, text);
      } else {
        await fs.writeFile(path, text, 'utf8');
      }
    } catch (error) {
      throw new NotebookIOError('write', path, isRetryable(error), getErrorMessage(error), error instanceof Error ? error : undefined);
    }
  }
}
