/**
 * @fileoverview Notebook execution entry point
 *
 * `executeNotebook` runs the whole pipeline: resolve paths, load, inject
 * parameters, record run metadata, clear stale error markers, execute through
 * an engine, classify failures and persist the result.
 */

import { fileURLToPath } from 'node:url';
import type { Notebook, Parameters } from '../notebook/types.js';
import { LocalNotebookIO, STDIO_PATH, formatPath, type NotebookIO } from '../notebook/io.js';
import { cloneNotebook, ensureRunMetadata, hideCodeSources } from '../notebook/model.js';
import { ValidationError } from '../core/errors.js';
import { injectParameters, redactParametersCell } from '../parameterize/inject.js';
import { findUnknownParameters, inferParameters as defaultInferParameters, type InferParametersFn } from '../parameterize/inspect.js';
import { obfuscateParameters } from '../parameterize/obfuscate.js';
import { addBuiltinParameters, parameterizePath, type PathTemplateFn } from '../parameterize/path.js';
import { engineRegistry, type EngineRegistry } from '../engines/registry.js';
import { loadRuntimeConfig, type RuntimeConfig } from '../config/index.js';
import { withWorkingDirectory } from '../utils/chdir.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { raiseForExecutionErrors } from './classify.js';
import { removeErrorMarkers } from './markers.js';

export type NotebookSource = string | URL | Notebook;
export type NotebookTarget = string | URL | null;

export interface ExecuteNotebookOptions {
  parameters?: Parameters | null;
  /** Registry name; defaults to PARAMNB_ENGINE, then the registry default */
  engineName?: string | null;
  /** Save after every cell (default true). Never applies to stdout output. */
  requestSaveOnCellExecute?: boolean;
  /** Seconds between saves while a cell is running */
  autosaveCellEvery?: number;
  /** Parameterize and persist without executing */
  prepareOnly?: boolean;
  kernelName?: string | null;
  language?: string | null;
  progressBar?: boolean;
  logOutput?: boolean;
  stdoutFile?: string;
  stderrFile?: string;
  /** Seconds */
  startTimeout?: number;
  /** Seconds per cell */
  executionTimeout?: number;
  reportMode?: boolean;
  /** Directory to execute in; restored afterwards */
  cwd?: string | null;
  obfuscateSensitiveParameters?: boolean;
  sensitiveParameterPatterns?: readonly string[];
  /** Passed through to the engine untouched */
  engineOptions?: Record<string, unknown>;

  registry?: EngineRegistry;
  io?: NotebookIO;
  resolvePath?: PathTemplateFn;
  inferParameters?: InferParametersFn;
  /** Defaults read from the environment when omitted */
  config?: RuntimeConfig;
}

function toPath(reference: string | URL, field: string): string {
  if (typeof reference === 'string') return reference;
  if (reference.protocol !== 'file:') {
    throw new ValidationError(field, 'a path or file: URL', reference.href);
  }
  return fileURLToPath(reference);
}

/** Redacts the parameters cell of every notebook it writes. */
class RedactingNotebookIO implements NotebookIO {
  constructor(
    private readonly inner: NotebookIO,
    private readonly redactedSource: string,
  ) {}

  read(path: string): Promise<Notebook> {
    return this.inner.read(path);
  }

  write(notebook: Notebook, path: string): Promise<void> {
    return this.inner.write(redactParametersCell(notebook, this.redactedSource), path);
  }
}

function isNotebook(source: NotebookSource): source is Notebook {
  return typeof source === 'object' && !(source instanceof URL);
}

/**
 * Records where the notebook came from and goes to, and hides code sources in
 * report mode.
 */
export function prepareNotebookMetadata(
  notebook: Notebook,
  inputPath: string | null,
  outputPath: string | null,
  reportMode = false,
): Notebook {
  if (reportMode) {
    hideCodeSources(notebook);
  }
  const run = ensureRunMetadata(notebook);
  run.input_path = inputPath;
  run.output_path = outputPath;
  return notebook;
}

/**
 * @throws NotebookExecutionError after persisting the marked notebook, when a cell failed
 * @throws EngineError for unknown engines, missing kernels and timeouts
 * @throws NotebookIOError / NotebookFormatError when loading or saving fails
 * @throws ParameterError for untranslatable parameters or bad path templates
 */
export async function executeNotebook(
  input: NotebookSource,
  output: NotebookTarget,
  options: ExecuteNotebookOptions = {},
): Promise<Notebook> {
  const config = options.config ?? loadRuntimeConfig();
  const registry = options.registry ?? engineRegistry;
  const io = options.io ?? new LocalNotebookIO();
  const resolvePath = options.resolvePath ?? parameterizePath;
  const infer = options.inferParameters ?? defaultInferParameters;
  const parameters = options.parameters ?? null;
  const obfuscate = options.obfuscateSensitiveParameters ?? true;
  const sensitivePatterns = options.sensitiveParameterPatterns ?? config.sensitiveParameterPatterns;

  const pathParameters = addBuiltinParameters(parameters);
  const inputPath = isNotebook(input) ? null : resolvePath(toPath(input, 'input'), pathParameters);
  const outputPath = output === null ? null : resolvePath(toPath(output, 'output'), pathParameters);

  logInfo(`Input Notebook:  ${formatPath(inputPath)}`);
  logInfo(`Output Notebook: ${formatPath(outputPath)}`);
  if (options.cwd) {
    logInfo(`Working directory: ${options.cwd}`);
  }

  let notebook: Notebook;
  let redactedSource: string | null = null;
  if (isNotebook(input)) {
    notebook = cloneNotebook(input);
  } else if (inputPath !== null) {
    notebook = await io.read(inputPath);
  } else {
    throw new ValidationError('input', 'a notebook path', String(input));
  }

  if (parameters && Object.keys(parameters).length > 0) {
    const declared = infer(notebook, { kernelName: options.kernelName, language: options.language });
    for (const name of findUnknownParameters(declared, Object.keys(parameters))) {
      logWarning(`Passed unknown parameter: ${name}`);
    }
    ({ notebook, redactedSource } = injectParameters(notebook, parameters, {
      reportMode: options.reportMode,
      kernelName: options.kernelName,
      language: options.language,
      obfuscateSensitiveParameters: obfuscate,
      sensitiveParameterPatterns: sensitivePatterns,
    }));
    if (declared.length > 0) {
      const defaults: Parameters = Object.fromEntries(declared.map((declaration) => [declaration.name, declaration.default]));
      ensureRunMetadata(notebook).default_parameters = obfuscate ? obfuscateParameters(defaults, sensitivePatterns) : defaults;
    }
  }

  prepareNotebookMetadata(notebook, inputPath, outputPath, options.reportMode);
  removeErrorMarkers(notebook);

  // The engine runs the real values; everything persisted shows the redacted cell.
  const persistIO = redactedSource === null ? io : new RedactingNotebookIO(io, redactedSource);

  if (!options.prepareOnly) {
    const engineName = options.engineName ?? config.engine ?? null;
    const kernelName = registry.resolveKernelName(engineName, notebook, options.kernelName);
    const saveEachCell = (options.requestSaveOnCellExecute ?? true) && outputPath !== STDIO_PATH;
    const toExecute = notebook;

    notebook = await withWorkingDirectory(options.cwd, () => registry.executeNotebookWithEngine(engineName, toExecute, {
      inputPath,
      outputPath: saveEachCell ? outputPath : null,
      kernelName,
      progressBar: options.progressBar ?? true,
      logOutput: options.logOutput ?? false,
      startTimeout: options.startTimeout ?? config.startTimeout,
      executionTimeout: options.executionTimeout ?? config.executionTimeout,
      autosaveCellEvery: options.autosaveCellEvery ?? config.autosaveCellEvery,
      stdoutFile: options.stdoutFile,
      stderrFile: options.stderrFile,
      io: persistIO,
      engineOptions: options.engineOptions ?? {},
    }));

    await raiseForExecutionErrors(notebook, outputPath, persistIO);
  }

  if (outputPath !== null) {
    await persistIO.write(notebook, outputPath);
  }
  return redactedSource === null ? notebook : redactParametersCell(notebook, redactedSource);
}
