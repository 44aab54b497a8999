/**
 * @fileoverview Command-line argument parsing
 *
 * `-p name value` and `-r name value` take two values, which `parseArgs`
 * cannot express, so those pairs are pulled out first and everything else
 * goes through `parseArgs` in strict mode.
 */

import { readFile } from 'node:fs/promises';
import { parseArgs, type ParseArgsConfig } from 'node:util';
import YAML from 'yaml';
import { floatParameter, type ParameterValue, type Parameters } from '../notebook/types.js';
import { ParametersSchema } from '../notebook/schema.js';
import { isLogLevel, type LogLevel } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { createError, type CliError } from './errors.js';

export const INPUT_PATH_PARAMETER = 'PARAMNB_INPUT_PATH';
export const OUTPUT_PATH_PARAMETER = 'PARAMNB_OUTPUT_PATH';

const PARAMETER_FLAGS = new Set(['-p', '--parameters']);
const RAW_PARAMETER_FLAGS = new Set(['-r', '--parameters-raw']);

export interface ParameterSource {
  kind: 'typed' | 'raw';
  name: string;
  value: string;
}

export interface CliArgs {
  input: string | null;
  output: string | null;
  pairs: ParameterSource[];
  base64: string[];
  files: string[];
  yaml: string[];
  injectInputPath: boolean;
  injectOutputPath: boolean;
  engine?: string;
  kernel?: string;
  language?: string;
  cwd?: string;
  prepareOnly: boolean;
  reportMode: boolean;
  logOutput: boolean;
  progressBar: boolean;
  startTimeout?: number;
  executionTimeout?: number;
  autosaveCellEvery?: number;
  requestSaveOnCellExecute: boolean;
  stdoutFile?: string;
  stderrFile?: string;
  obfuscateSensitiveParameters: boolean;
  sensitiveParameterPatterns?: string[];
  helpNotebook: boolean;
  logLevel?: LogLevel;
  json: boolean;
  help: boolean;
  version: boolean;
}

function unsafeInteger(text: string): CliError {
  return createError(
    'PARAMETER_ERROR',
    `Integer ${text} is too large to pass exactly; use -r to pass it as a string`,
    { value: text },
  );
}

/**
 * `True`/`False`/`None` (and lowercase), integers and floats; anything else
 * stays a string. Floats keep their floatness even when integral (`1.0`).
 *
 * @throws CliError for integers outside the safe integer range
 */
export function resolveType(value: string): ParameterValue {
  if (value === 'True' || value === 'true') return true;
  if (value === 'False' || value === 'false') return false;
  if (value === 'None' || value === 'null') return null;
  if (isInt(value)) {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isSafeInteger(parsed)) throw unsafeInteger(value.trim());
    return parsed;
  }
  if (isFloat(value)) return floatParameter(Number.parseFloat(value));
  return value;
}

export function isInt(value: string): boolean {
  return /^[+-]?\d+$/.test(value.trim());
}

export function isFloat(value: string): boolean {
  return /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(value.trim());
}

function extractPairs(argv: readonly string[]): { rest: string[]; pairs: ParameterSource[] } {
  const rest: string[] = [];
  const pairs: ParameterSource[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      rest.push(...argv.slice(i));
      break;
    }
    const typed = PARAMETER_FLAGS.has(arg);
    if (typed || RAW_PARAMETER_FLAGS.has(arg)) {
      const name = argv[i + 1];
      const value = argv[i + 2];
      if (name === undefined || value === undefined) {
        throw createError('INVALID_ARGUMENT', `${arg} expects a name and a value`);
      }
      pairs.push({ kind: typed ? 'typed' : 'raw', name, value });
      i += 2;
      continue;
    }
    rest.push(arg);
  }
  return { rest, pairs };
}

const OPTIONS = {
  'parameters-base64': { type: 'string', short: 'b', multiple: true },
  'parameters-file': { type: 'string', short: 'f', multiple: true },
  'parameters-yaml': { type: 'string', short: 'y', multiple: true },
  'inject-input-path': { type: 'boolean', default: false },
  'inject-output-path': { type: 'boolean', default: false },
  'inject-paths': { type: 'boolean', default: false },
  engine: { type: 'string' },
  kernel: { type: 'string', short: 'k' },
  language: { type: 'string' },
  cwd: { type: 'string' },
  'prepare-only': { type: 'boolean', default: false },
  'report-mode': { type: 'boolean', default: false },
  'log-output': { type: 'boolean', default: false },
  'no-progress-bar': { type: 'boolean', default: false },
  'start-timeout': { type: 'string' },
  'execution-timeout': { type: 'string' },
  'autosave-cell-every': { type: 'string' },
  'no-request-save-on-cell-execute': { type: 'boolean', default: false },
  'stdout-file': { type: 'string' },
  'stderr-file': { type: 'string' },
  'no-obfuscate-sensitive-parameters': { type: 'boolean', default: false },
  'sensitive-parameter-pattern': { type: 'string', multiple: true },
  'help-notebook': { type: 'boolean', default: false },
  'log-level': { type: 'string' },
  json: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} satisfies ParseArgsConfig['options'];

function parseOptions(args: string[]) {
  return parseArgs({ args, options: OPTIONS, allowPositionals: true, strict: true });
}

function parseSeconds(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0 || value.trim() === '') {
    throw createError('INVALID_ARGUMENT', `${flag} expects a number of seconds, got '${value}'`);
  }
  return seconds;
}

/**
 * Positional rules: none means stdin to stdout; one means that input to
 * stdout, unless stdin is piped, in which case it is the output.
 */
function resolvePositionals(positionals: string[], stdinIsTTY: boolean): { input: string | null; output: string | null } {
  if (positionals.length > 2) {
    throw createError('INVALID_ARGUMENT', `Unexpected arguments: ${positionals.slice(2).join(' ')}`);
  }
  const [first, second] = positionals;
  if (first === undefined) return { input: '-', output: '-' };
  if (second !== undefined) return { input: first, output: second };
  return stdinIsTTY ? { input: first, output: '-' } : { input: '-', output: first };
}

export function parseCliArgs(argv: readonly string[], stdinIsTTY = Boolean(process.stdin.isTTY)): CliArgs {
  const { rest, pairs } = extractPairs(argv);

  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(rest);
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
  const { values, positionals } = parsed;

  const rawLevel = values['log-level']?.toLowerCase();
  let logLevel: LogLevel | undefined;
  if (rawLevel !== undefined) {
    if (!isLogLevel(rawLevel)) {
      throw createError('INVALID_ARGUMENT', `--log-level must be one of debug, info, warn, error, silent; got '${rawLevel}'`);
    }
    logLevel = rawLevel;
  }

  const { input, output } = values.help === true || values.version === true
    ? { input: null, output: null }
    : resolvePositionals(positionals, stdinIsTTY);

  return {
    input,
    output,
    pairs,
    base64: values['parameters-base64'] ?? [],
    files: values['parameters-file'] ?? [],
    yaml: values['parameters-yaml'] ?? [],
    injectInputPath: values['inject-input-path'] === true || values['inject-paths'] === true,
    injectOutputPath: values['inject-output-path'] === true || values['inject-paths'] === true,
    engine: values.engine,
    kernel: values.kernel,
    language: values.language,
    cwd: values.cwd,
    prepareOnly: values['prepare-only'] === true,
    reportMode: values['report-mode'] === true,
    logOutput: values['log-output'] === true,
    progressBar: values['no-progress-bar'] !== true,
    startTimeout: parseSeconds('--start-timeout', values['start-timeout']),
    executionTimeout: parseSeconds('--execution-timeout', values['execution-timeout']),
    autosaveCellEvery: parseSeconds('--autosave-cell-every', values['autosave-cell-every']),
    requestSaveOnCellExecute: values['no-request-save-on-cell-execute'] !== true,
    stdoutFile: values['stdout-file'],
    stderrFile: values['stderr-file'],
    obfuscateSensitiveParameters: values['no-obfuscate-sensitive-parameters'] !== true,
    sensitiveParameterPatterns: values['sensitive-parameter-pattern'],
    helpNotebook: values['help-notebook'] === true,
    logLevel,
    json: values.json === true,
    help: values.help === true,
    version: values.version === true,
  };
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

// Integers arrive as bigint and floats as number, which keeps the two apart.
function fromYaml(value: unknown): unknown {
  if (typeof value === 'bigint') {
    if (value > MAX_SAFE || value < MIN_SAFE) throw unsafeInteger(value.toString());
    return Number(value);
  }
  if (typeof value === 'number') return floatParameter(value);
  if (Array.isArray(value)) return value.map(fromYaml);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, fromYaml(item)]));
  }
  return value;
}

/** A YAML (or JSON) mapping; an empty document is an empty mapping. */
export function parseParameterYaml(text: string, source: string): Parameters {
  let raw: unknown;
  try {
    raw = YAML.parse(text, { intAsBigInt: true });
  } catch (error) {
    throw createError('PARAMETER_ERROR', `Invalid YAML in ${source}: ${getErrorMessage(error)}`, { source });
  }
  if (raw === null || raw === undefined) return {};
  const parsed = ParametersSchema.safeParse(fromYaml(raw));
  if (!parsed.success) {
    throw createError('PARAMETER_ERROR', `Parameters in ${source} must be a mapping of plain values`, { source });
  }
  return parsed.data;
}

export interface CollectParametersOptions {
  readText?: (path: string) => Promise<string>;
}

/**
 * Merges every parameter source in precedence order: injected paths, base64,
 * files, YAML, `-p`, `-r`. Later sources overwrite earlier keys.
 */
export async function collectParameters(args: CliArgs, options: CollectParametersOptions = {}): Promise<Parameters> {
  const readText = options.readText ?? ((path: string) => readFile(path, 'utf8'));
  const parameters: Parameters = {};

  if (args.injectInputPath && args.input !== null) parameters[INPUT_PATH_PARAMETER] = args.input;
  if (args.injectOutputPath && args.output !== null) parameters[OUTPUT_PATH_PARAMETER] = args.output;

  for (const encoded of args.base64) {
    Object.assign(parameters, parseParameterYaml(Buffer.from(encoded, 'base64').toString('utf8'), '--parameters-base64'));
  }
  for (const file of args.files) {
    let text: string;
    try {
      text = await readText(file);
    } catch (error) {
      throw createError('PARAMETER_ERROR', `Cannot read parameters file ${file}: ${getErrorMessage(error)}`, { file });
    }
    Object.assign(parameters, parseParameterYaml(text, file));
  }
  for (const text of args.yaml) {
    Object.assign(parameters, parseParameterYaml(text, '--parameters-yaml'));
  }
  for (const pair of args.pairs) {
    parameters[pair.name] = pair.kind === 'typed' ? resolveType(pair.value) : pair.value;
  }
  return parameters;
}
