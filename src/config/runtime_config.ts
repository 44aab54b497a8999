/**
 * @fileoverview Runtime defaults from the environment
 *
 * Every execution option with an environment override is read here once and
 * validated; `executeNotebook` and the CLI fall back to these values.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { LogLevel } from '../telemetry/logger.js';

const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const RuntimeEnvSchema = z.object({
  PARAMNB_ENGINE: z.preprocess(blankAsUnset, z.string().trim().min(1).optional()),
  PARAMNB_START_TIMEOUT: z.preprocess(blankAsUnset, z.coerce.number().positive().default(60)),
  PARAMNB_EXECUTION_TIMEOUT: z.preprocess(blankAsUnset, z.coerce.number().positive().optional()),
  PARAMNB_AUTOSAVE_SECONDS: z.preprocess(blankAsUnset, z.coerce.number().nonnegative().default(30)),
  PARAMNB_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.trim().toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  ),
  PARAMNB_SENSITIVE_PATTERNS: z.preprocess(
    blankAsUnset,
    z.string()
      .transform((value) => value.split(',').map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0))
      .optional(),
  ),
});

export interface RuntimeConfig {
  /** Engine used when the caller names none */
  engine?: string;
  /** Seconds */
  startTimeout: number;
  /** Seconds; unset means cells may run indefinitely */
  executionTimeout?: number;
  /** Seconds */
  autosaveCellEvery: number;
  logLevel?: LogLevel;
  /** Replaces the built-in sensitive-name patterns when set */
  sensitiveParameterPatterns?: string[];
}

/**
 * @throws ValidationError naming the first offending variable
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? 'environment') : 'environment';
    throw new ValidationError(field, issue?.message ?? 'a valid value', JSON.stringify(env[field] ?? null));
  }
  const data = parsed.data;
  return {
    engine: data.PARAMNB_ENGINE,
    startTimeout: data.PARAMNB_START_TIMEOUT,
    executionTimeout: data.PARAMNB_EXECUTION_TIMEOUT,
    autosaveCellEvery: data.PARAMNB_AUTOSAVE_SECONDS,
    logLevel: data.PARAMNB_LOG_LEVEL,
    sensitiveParameterPatterns: data.PARAMNB_SENSITIVE_PATTERNS,
  };
}
