/**
 * @fileoverview Declared-parameter inference
 *
 * Reads the parameters cell of a notebook back into declarations, so the
 * orchestrator can flag supplied names the notebook never declared and the
 * CLI can print a notebook's parameter help.
 */

import type { Notebook } from '../notebook/types.js';
import { PARAMETERS_TAG, findTaggedCellIndex, getKernelName, getLanguage } from '../notebook/model.js';
import { findTranslator, type ParameterDeclaration } from './translators.js';
import { logWarning } from '../telemetry/logger.js';

export interface InferParametersOptions {
  kernelName?: string | null;
  language?: string | null;
}

export type InferParametersFn = (notebook: Notebook, options: InferParametersOptions) => ParameterDeclaration[];

export function inferParameters(notebook: Notebook, options: InferParametersOptions = {}): ParameterDeclaration[] {
  const index = findTaggedCellIndex(notebook, PARAMETERS_TAG, 'code');
  const cell = notebook.cells[index];
  if (index === -1 || !cell) {
    logWarning(`No cell tagged '${PARAMETERS_TAG}' found; no declared parameters to infer`);
    return [];
  }

  const kernelName = options.kernelName ?? getKernelName(notebook);
  const language = options.language ?? getLanguage(notebook);
  return findTranslator(kernelName, language).inspect(cell.source);
}

/** Supplied names absent from the declared set, in supplied order. */
export function findUnknownParameters(
  declared: readonly ParameterDeclaration[],
  supplied: Iterable<string>,
): string[] {
  const known = new Set(declared.map((declaration) => declaration.name));
  return [...supplied].filter((name) => !known.has(name));
}

/** Human-readable parameter listing for `--help-notebook`. */
export function formatParameterHelp(declarations: readonly ParameterDeclaration[]): string {
  if (declarations.length === 0) {
    return 'No parameters declared in this notebook.';
  }
  const width = Math.max(...declarations.map((declaration) => declaration.name.length));
  const lines = ['Parameters inferred for notebook:'];
  for (const declaration of declarations) {
    const type = declaration.inferredTypeName ?? 'Unknown type';
    let line = `  ${declaration.name.padEnd(width)}: ${type} (default ${declaration.default})`;
    if (declaration.help) {
      line += `  ${declaration.help}`;
    }
    lines.push(line);
  }
  return lines.join('\n');
}
