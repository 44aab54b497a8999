/**
 * @fileoverview Parameter injection
 *
 * Overwrites the source of the cell tagged `parameters` with literal
 * assignments for the supplied parameters, and records what was injected in
 * the run metadata. The metadata record is always redacted; the cell keeps the
 * real values only while the notebook runs and is redacted whenever it is
 * persisted.
 */

import { toPlainParameters, type CodeCell, type Notebook, type Parameters } from '../notebook/types.js';
import {
  PARAMETERS_TAG,
  cellIdFor,
  cloneNotebook,
  ensureRunMetadata,
  getKernelName,
  getLanguage,
  hasTag,
  hideCodeSources,
  isCodeCell,
  newCodeCell,
} from '../notebook/model.js';
import { obfuscateParameters } from './obfuscate.js';
import { findTranslator } from './translators.js';
import { logWarning } from '../telemetry/logger.js';

export interface ParameterizeOptions {
  /** Hide the source of every code cell */
  reportMode?: boolean;
  kernelName?: string | null;
  language?: string | null;
  /** Defaults to true */
  obfuscateSensitiveParameters?: boolean;
  /** Replaces the default sensitive-name patterns */
  sensitiveParameterPatterns?: readonly string[];
}

export interface InjectedParameters {
  /** Parameters cell rendered with the real values, ready to execute */
  notebook: Notebook;
  /** Parameters cell source to persist instead; null when nothing was redacted */
  redactedSource: string | null;
}

function findParametersCell(notebook: Notebook): CodeCell | undefined {
  return notebook.cells.find(
    (cell): cell is CodeCell => isCodeCell(cell) && hasTag(cell, PARAMETERS_TAG),
  );
}

/**
 * Injects the real parameter values for execution. The run metadata already
 * holds the redacted record; the redacted cell source is returned beside the
 * notebook for `redactParametersCell` to apply before every write.
 *
 * @throws ParameterError when no translator matches the notebook's kernel or
 * language, or a value cannot be expressed in it
 */
export function injectParameters(
  notebook: Notebook,
  parameters: Parameters,
  options: ParameterizeOptions = {},
): InjectedParameters {
  const result = cloneNotebook(notebook);
  const translator = findTranslator(
    options.kernelName ?? getKernelName(result),
    options.language ?? getLanguage(result),
  );

  const persisted = options.obfuscateSensitiveParameters === false
    ? parameters
    : obfuscateParameters(parameters, options.sensitiveParameterPatterns);
  const source = translator.codify(parameters);
  const redacted = translator.codify(persisted);

  const parametersCell = findParametersCell(result);
  if (parametersCell) {
    parametersCell.source = source;
    parametersCell.outputs = [];
    parametersCell.execution_count = null;
  } else {
    logWarning(`Input notebook does not contain a cell tagged '${PARAMETERS_TAG}'; inserting one at the top`);
    result.cells.unshift(newCodeCell(source, { tags: [PARAMETERS_TAG] }, cellIdFor(result)));
  }

  if (options.reportMode) {
    hideCodeSources(result);
  }

  ensureRunMetadata(result).parameters = toPlainParameters(persisted);
  return { notebook: result, redactedSource: redacted === source ? null : redacted };
}

/** A copy of `notebook` whose parameters cell shows `source`. */
export function redactParametersCell(notebook: Notebook, source: string): Notebook {
  const result = cloneNotebook(notebook);
  const parametersCell = findParametersCell(result);
  if (parametersCell) {
    parametersCell.source = source;
  }
  return result;
}

/**
 * Returns a parameterized copy of `notebook` as it would be persisted:
 * sensitive values are redacted in the cell and the metadata. The input is
 * left untouched.
 *
 * @throws ParameterError when no translator matches the notebook's kernel or
 * language, or a value cannot be expressed in it
 */
export function parameterizeNotebook(
  notebook: Notebook,
  parameters: Parameters,
  options: ParameterizeOptions = {},
): Notebook {
  const { notebook: injected, redactedSource } = injectParameters(notebook, parameters, options);
  return redactedSource === null ? injected : redactParametersCell(injected, redactedSource);
}
