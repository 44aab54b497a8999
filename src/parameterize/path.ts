/**
 * @fileoverview Path templating
 *
 * Input and output paths may contain `{name}` tokens filled from the run's
 * parameters, plus builtins under `run` (`{run.uuid}`, `{run.datetime_utc}`,
 * `{run.datetime_local}`). `{{` and `}}` produce literal braces.
 */

import { randomUUID } from 'node:crypto';
import { FloatParameter, type ParameterValue, type Parameters } from '../notebook/types.js';
import { ParameterError } from '../core/errors.js';

export type PathTemplateFn = (path: string | null, parameters: Parameters) => string | null;

const TOKEN_PATTERN = /\{\{|\}\}|\{([^{}]*)\}/g;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** ISO-8601 in local time with the UTC offset, e.g. `2024-05-01T09:30:00.000+02:00`. */
export function formatLocalIso(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
    + `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

/** Builtins first, so a user parameter named `run` wins. */
export function addBuiltinParameters(parameters?: Parameters | null, now: Date = new Date()): Parameters {
  return {
    run: {
      uuid: randomUUID(),
      datetime_utc: now.toISOString(),
      datetime_local: formatLocalIso(now),
    },
    ...(parameters ?? {}),
  };
}

function lookup(parameters: Parameters, expression: string): ParameterValue | undefined {
  if (Object.hasOwn(parameters, expression)) {
    return parameters[expression];
  }
  let current: ParameterValue | undefined = parameters;
  for (const segment of expression.split('.')) {
    if (
      current === null || current === undefined || typeof current !== 'object'
      || Array.isArray(current) || current instanceof FloatParameter
    ) {
      return undefined;
    }
    current = Object.hasOwn(current, segment) ? current[segment] : undefined;
  }
  return current;
}

/**
 * @throws ParameterError when a token names a parameter that is not supplied
 */
export function parameterizePath(path: string | null, parameters: Parameters): string | null {
  if (path === null) return null;
  return path.replace(TOKEN_PATTERN, (match: string, expression: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    const name = (expression ?? '').trim();
    const value = lookup(parameters, name);
    if (value === undefined) {
      throw new ParameterError('missing_template_parameter', `Missing parameter '${name}' in path template ${path}`, name);
    }
    if (typeof value === 'string') return value;
    return value instanceof FloatParameter ? value.toString() : JSON.stringify(value);
  });
}
