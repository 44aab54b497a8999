import { describe, expect, it } from 'vitest';
import {
  INPUT_PATH_PARAMETER,
  OUTPUT_PATH_PARAMETER,
  collectParameters,
  isFloat,
  isInt,
  parseCliArgs,
  parseParameterYaml,
  resolveType,
} from '../args.js';
import { CliError } from '../errors.js';
import { FloatParameter } from '../../notebook/types.js';
import { PythonTranslator } from '../../parameterize/translators.js';

function expectCliError(run: () => unknown, code: string): void {
  let caught: unknown;
  try {
    run();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(CliError);
  expect(caught).toMatchObject({ code });
}

describe('resolveType', () => {
  it.each([
    ['True', true],
    ['false', false],
    ['None', null],
    ['null', null],
    ['42', 42],
    ['-3', -3],
    ['0.6', 0.6],
    ['.5', 0.5],
    ['1.2.3', '1.2.3'],
    ['hello', 'hello'],
    ['TRUE', 'TRUE'],
  ])('resolves %j', (input, expected) => {
    expect(resolveType(input)).toBe(expected);
  });

  it('keeps integral floats as floats', () => {
    expect(resolveType('1.0')).toStrictEqual(new FloatParameter(1));
    expect(resolveType('1e3')).toStrictEqual(new FloatParameter(1000));
    expect(new PythonTranslator().codify({ x: resolveType('1.0') })).toBe('# Parameters\nx = 1.0\n');
  });

  it('rejects integers it cannot hold exactly', () => {
    expectCliError(() => resolveType('12345678901234567890'), 'PARAMETER_ERROR');
    expectCliError(() => resolveType('-9007199254740993'), 'PARAMETER_ERROR');
    expect(resolveType('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('distinguishes ints from floats', () => {
    expect(isInt('+7')).toBe(true);
    expect(isInt('7.0')).toBe(false);
    expect(isFloat('7.')).toBe(true);
    expect(isFloat('e5')).toBe(false);
  });
});

describe('parseCliArgs', () => {
  it('collects parameter pairs and options', () => {
    const args = parseCliArgs([
      'in.ipynb', 'out.ipynb',
      '-p', 'alpha', '0.6',
      '--parameters-raw', 'version', '1.0',
      '-k', 'python3',
      '--engine', 'node',
      '--cwd', '/work',
      '--execution-timeout', '2.5',
      '-y', 'a: 1',
      '-y', 'b: 2',
    ], true);

    expect(args).toMatchObject({
      input: 'in.ipynb',
      output: 'out.ipynb',
      pairs: [
        { kind: 'typed', name: 'alpha', value: '0.6' },
        { kind: 'raw', name: 'version', value: '1.0' },
      ],
      kernel: 'python3',
      engine: 'node',
      cwd: '/work',
      executionTimeout: 2.5,
      yaml: ['a: 1', 'b: 2'],
    });
  });

  it('defaults every toggle to the library defaults', () => {
    expect(parseCliArgs(['in.ipynb'], true)).toMatchObject({
      progressBar: true,
      requestSaveOnCellExecute: true,
      obfuscateSensitiveParameters: true,
      prepareOnly: false,
      reportMode: false,
      logOutput: false,
      injectInputPath: false,
      injectOutputPath: false,
      json: false,
    });
  });

  it('turns negated flags off', () => {
    const args = parseCliArgs([
      'in.ipynb',
      '--no-progress-bar',
      '--no-request-save-on-cell-execute',
      '--no-obfuscate-sensitive-parameters',
      '--sensitive-parameter-pattern', 'secret',
      '--inject-paths',
    ], true);

    expect(args).toMatchObject({
      progressBar: false,
      requestSaveOnCellExecute: false,
      obfuscateSensitiveParameters: false,
      sensitiveParameterPatterns: ['secret'],
      injectInputPath: true,
      injectOutputPath: true,
    });
  });

  it('reads positionals depending on stdin', () => {
    expect(parseCliArgs([], true)).toMatchObject({ input: '-', output: '-' });
    expect(parseCliArgs(['nb.ipynb'], true)).toMatchObject({ input: 'nb.ipynb', output: '-' });
    expect(parseCliArgs(['nb.ipynb'], false)).toMatchObject({ input: '-', output: 'nb.ipynb' });
  });

  it('treats everything after -- as positional', () => {
    expect(parseCliArgs(['--', '-odd.ipynb'], true)).toMatchObject({ input: '-odd.ipynb', output: '-', pairs: [] });
  });

  it('skips positionals for help and version', () => {
    expect(parseCliArgs(['--help'], true)).toMatchObject({ help: true, input: null, output: null });
    expect(parseCliArgs(['-v'], false)).toMatchObject({ version: true, input: null });
  });

  it('normalises the log level', () => {
    expect(parseCliArgs(['in.ipynb', '--log-level', 'DEBUG'], true).logLevel).toBe('debug');
  });

  it.each([
    [['a', 'b', 'c']],
    [['in.ipynb', '--bogus']],
    [['in.ipynb', '-p', 'only-name']],
    [['in.ipynb', '--log-level', 'loud']],
    [['in.ipynb', '--start-timeout', 'soon']],
    [['in.ipynb', '--autosave-cell-every', '-1']],
    [['in.ipynb', '--execution-timeout', '']],
  ])('rejects %j', (argv) => {
    expectCliError(() => parseCliArgs(argv, true), 'INVALID_ARGUMENT');
  });
});

describe('parseParameterYaml', () => {
  it('parses mappings', () => {
    expect(parseParameterYaml('alpha: 0.5\nnames: [a, b]\nnested: {x: null}\n', 'inline')).toEqual({
      alpha: 0.5,
      names: ['a', 'b'],
      nested: { x: null },
    });
  });

  it('accepts JSON and empty documents', () => {
    expect(parseParameterYaml('{"a": true}', 'json')).toEqual({ a: true });
    expect(parseParameterYaml('', 'empty')).toEqual({});
  });

  it('keeps integers and floats apart', () => {
    expect(parseParameterYaml('a: 1\nb: 1.0\nc: [2.0, 3, 0.5]\n', 'inline')).toStrictEqual({
      a: 1,
      b: new FloatParameter(1),
      c: [new FloatParameter(2), 3, 0.5],
    });
  });

  it('rejects integers it cannot hold exactly', () => {
    expectCliError(() => parseParameterYaml('n: 12345678901234567890\n', 'inline'), 'PARAMETER_ERROR');
  });

  it.each([
    ['- 1\n- 2\n'],
    ['a: [1'],
    ['just a string'],
  ])('rejects %j', (text) => {
    expectCliError(() => parseParameterYaml(text, 'bad'), 'PARAMETER_ERROR');
  });
});

describe('collectParameters', () => {
  it('merges sources in precedence order', async () => {
    const args = parseCliArgs([
      'in.ipynb', 'out.ipynb',
      '--inject-input-path',
      '-b', Buffer.from('a: 1\nb: 1\n').toString('base64'),
      '-f', 'params.yaml',
      '-y', 'c: 3\nd: 3',
      '-p', 'd', '4',
      '-r', 'e', '5',
    ], true);

    const parameters = await collectParameters(args, {
      readText: async (path) => (path === 'params.yaml' ? 'b: 2\nc: 2\n' : ''),
    });

    expect(parameters).toEqual({ [INPUT_PATH_PARAMETER]: 'in.ipynb', a: 1, b: 2, c: 3, d: 4, e: '5' });
  });

  it('lets explicit parameters override injected paths', async () => {
    const args = parseCliArgs(['in.ipynb', 'out.ipynb', '--inject-output-path', '-p', OUTPUT_PATH_PARAMETER, 'custom'], true);

    expect(await collectParameters(args)).toEqual({ [OUTPUT_PATH_PARAMETER]: 'custom' });
  });

  it('reports an unreadable parameters file', async () => {
    const args = parseCliArgs(['in.ipynb', '-f', 'missing.yaml'], true);

    await expect(collectParameters(args, {
      readText: async () => {
        throw new Error('ENOENT: no such file');
      },
    })).rejects.toMatchObject({
      code: 'PARAMETER_ERROR',
      message: 'Cannot read parameters file missing.yaml: ENOENT: no such file',
      details: { file: 'missing.yaml' },
    });
  });
});
