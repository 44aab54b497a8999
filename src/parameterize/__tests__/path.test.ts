import { describe, expect, it } from 'vitest';
import { addBuiltinParameters, formatLocalIso, parameterizePath } from '../path.js';
import { ParameterError } from '../../core/errors.js';

describe('parameterizePath', () => {
  it('fills tokens from parameters', () => {
    expect(parameterizePath('out/{region}-{year}.ipynb', { region: 'emea', year: 2024 })).toBe('out/emea-2024.ipynb');
  });

  it('passes null through', () => {
    expect(parameterizePath(null, { a: 1 })).toBeNull();
  });

  it('resolves dotted names into nested values', () => {
    expect(parameterizePath('{cfg.name}.ipynb', { cfg: { name: 'daily' } })).toBe('daily.ipynb');
  });

  it('prefers an exact key containing a dot', () => {
    expect(parameterizePath('{a.b}', { 'a.b': 'flat', a: { b: 'nested' } })).toBe('flat');
  });

  it('keeps escaped braces literal', () => {
    expect(parameterizePath('{{literal}}-{x}', { x: 'y' })).toBe('{literal}-y');
  });

  it('renders non-string values as JSON', () => {
    expect(parameterizePath('{flag}-{items}', { flag: true, items: [1, 2] })).toBe('true-[1,2]');
  });

  it('fails on a missing parameter', () => {
    try {
      parameterizePath('out-{missing}.ipynb', {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParameterError);
      expect(error).toMatchObject({ reason: 'missing_template_parameter', parameter: 'missing' });
    }
  });
});

describe('addBuiltinParameters', () => {
  const now = new Date('2024-05-01T07:30:00.000Z');

  it('adds run builtins that user parameters can shadow', () => {
    const withBuiltins = addBuiltinParameters({ a: 1 }, now);

    expect(withBuiltins.a).toBe(1);
    expect(withBuiltins.run).toMatchObject({ datetime_utc: '2024-05-01T07:30:00.000Z' });
    expect(parameterizePath('{run.uuid}', withBuiltins)).toMatch(/^[0-9a-f-]{36}$/);
    expect(addBuiltinParameters({ run: 'mine' }, now).run).toBe('mine');
  });

  it('works without parameters', () => {
    expect(Object.keys(addBuiltinParameters(null, now))).toEqual(['run']);
  });
});

describe('formatLocalIso', () => {
  it('ends with a UTC offset', () => {
    expect(formatLocalIso(new Date('2024-05-01T07:30:00.000Z'))).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:00\.000[+-]\d{2}:\d{2}$/);
  });
});
