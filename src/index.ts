/**
 * @fileoverview paramnb - parameterized notebook execution
 *
 * Injects parameters into a notebook's `parameters` cell, runs it through a
 * pluggable engine, marks the failing cell when something goes wrong, and
 * redacts sensitive parameter values in everything it writes.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { executeNotebook } from 'paramnb';
 *
 * const notebook = await executeNotebook('analysis.ipynb', 'out/analysis-{region}.ipynb', {
 *   parameters: { region: 'emea', year: 2024 },
 * });
 * ```
 *
 * ## Custom engines
 *
 * ```typescript
 * import { BaseEngine, engineRegistry } from 'paramnb';
 *
 * engineRegistry.register(new MyEngine());
 * await executeNotebook('in.ipynb', 'out.ipynb', { engineName: 'my-engine' });
 * ```
 *
 * @packageDocumentation
 */

export { PARAMNB_VERSION } from './version.js';

// Orchestration
export {
  executeNotebook,
  prepareNotebookMetadata,
  type ExecuteNotebookOptions,
  type NotebookSource,
  type NotebookTarget,
} from './execute/execute.js';
export {
  BENIGN_EXIT_ERROR_NAME,
  CELL_EXECUTION_ERROR_NAME,
  findExecutionError,
  isBenignExit,
  raiseForExecutionErrors,
} from './execute/classify.js';
export {
  ERROR_ANCHOR_ID,
  ERROR_MARKER_TAG,
  insertErrorMarkers,
  isErrorMarker,
  removeErrorMarkers,
} from './execute/markers.js';

// Parameters
export {
  injectParameters,
  parameterizeNotebook,
  redactParametersCell,
  type InjectedParameters,
  type ParameterizeOptions,
} from './parameterize/inject.js';
export {
  REDACTION_MARKER,
  SENSITIVE_PARAMETER_PATTERNS,
  isSensitiveParameter,
  obfuscateParameter,
  obfuscateParameters,
} from './parameterize/obfuscate.js';
export {
  findUnknownParameters,
  formatParameterHelp,
  inferParameters,
  type InferParametersFn,
  type InferParametersOptions,
} from './parameterize/inspect.js';
export { addBuiltinParameters, parameterizePath, type PathTemplateFn } from './parameterize/path.js';
export {
  Translator,
  TranslatorRegistry,
  findTranslator,
  translatorRegistry,
  type ParameterDeclaration,
} from './parameterize/translators.js';

// Engines
export { BaseEngine } from './engines/base_engine.js';
export { NotebookExecutionManager, type ExecutionManagerOptions } from './engines/execution_manager.js';
export { NodeEngine, NODE_ENGINE_NAME } from './engines/node_engine.js';
export { SubprocessEngine, SUBPROCESS_ENGINE_NAME, type KernelCommand } from './engines/subprocess_engine.js';
export {
  DEFAULT_ENGINE_NAME,
  EngineRegistry,
  createDefaultEngineRegistry,
  engineRegistry,
} from './engines/registry.js';
export type { Engine, EngineExecuteOptions } from './engines/types.js';

// Notebook model and IO
export * from './notebook/types.js';
export { PARAMETERS_TAG, newCodeCell, newMarkdownCell, newNotebook } from './notebook/model.js';
export { LocalNotebookIO, STDIO_PATH, parseNotebook, serializeNotebook, type NotebookIO } from './notebook/io.js';

// Errors, config, logging
export * from './core/errors.js';
export { loadRuntimeConfig, type RuntimeConfig } from './config/index.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
