/**
 * @fileoverview Sensitive parameter redaction
 *
 * Parameter names are matched case-insensitively against regular expressions.
 * A matching parameter's value is replaced with a fixed marker wherever it
 * would be persisted: the run metadata and the saved parameters cell.
 */

import type { ParameterValue, Parameters } from '../notebook/types.js';
import { ParameterError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export const REDACTION_MARKER = '********';

/** `key` only as a whole `_`-separated word: `api_key` yes, `keyword` no. */
export const SENSITIVE_PARAMETER_PATTERNS: readonly string[] = Object.freeze([
  'password',
  'token',
  '(?:^|_)key(?:_|$)',
]);

const compiledCache = new Map<string, RegExp>();

function compilePattern(pattern: string): RegExp {
  const cached = compiledCache.get(pattern);
  if (cached) return cached;
  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, 'i');
  } catch (error) {
    throw new ParameterError('invalid_pattern', `Invalid sensitive parameter pattern "${pattern}": ${getErrorMessage(error)}`);
  }
  compiledCache.set(pattern, compiled);
  return compiled;
}

/**
 * Whether `name` looks sensitive. A supplied pattern list replaces the
 * defaults entirely.
 */
export function isSensitiveParameter(name: string, patterns?: readonly string[]): boolean {
  const active = patterns ?? SENSITIVE_PARAMETER_PATTERNS;
  return active.some((pattern) => compilePattern(pattern).test(name));
}

export function obfuscateParameter(
  name: string,
  value: ParameterValue,
  patterns?: readonly string[],
): ParameterValue {
  return isSensitiveParameter(name, patterns) ? REDACTION_MARKER : value;
}

/** Redacts a whole parameter set, keeping insertion order. */
export function obfuscateParameters(parameters: Parameters, patterns?: readonly string[]): Parameters {
  const result: Parameters = {};
  for (const [name, value] of Object.entries(parameters)) {
    result[name] = obfuscateParameter(name, value, patterns);
  }
  return result;
}
