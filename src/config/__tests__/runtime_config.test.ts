import { describe, expect, it } from 'vitest';
import { loadRuntimeConfig } from '../runtime_config.js';
import { ValidationError } from '../../core/errors.js';

describe('loadRuntimeConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({ startTimeout: 60, autosaveCellEvery: 30 });
  });

  it('reads every variable', () => {
    const config = loadRuntimeConfig({
      PARAMNB_ENGINE: ' node ',
      PARAMNB_START_TIMEOUT: '5',
      PARAMNB_EXECUTION_TIMEOUT: '1.5',
      PARAMNB_AUTOSAVE_SECONDS: '0',
      PARAMNB_LOG_LEVEL: ' WARN ',
      PARAMNB_SENSITIVE_PATTERNS: 'secret, ,api_.*',
    });

    expect(config).toEqual({
      engine: 'node',
      startTimeout: 5,
      executionTimeout: 1.5,
      autosaveCellEvery: 0,
      logLevel: 'warn',
      sensitiveParameterPatterns: ['secret', 'api_.*'],
    });
  });

  it('treats blank values as unset', () => {
    expect(loadRuntimeConfig({ PARAMNB_ENGINE: '  ', PARAMNB_START_TIMEOUT: '', PARAMNB_LOG_LEVEL: ' ' })).toEqual({
      startTimeout: 60,
      autosaveCellEvery: 30,
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadRuntimeConfig({ PATH: '/usr/bin', HOME: '/home/test' }).startTimeout).toBe(60);
  });

  it.each([
    ['PARAMNB_START_TIMEOUT', 'soon'],
    ['PARAMNB_EXECUTION_TIMEOUT', '-1'],
    ['PARAMNB_AUTOSAVE_SECONDS', '-5'],
    ['PARAMNB_LOG_LEVEL', 'loud'],
  ])('rejects an invalid %s', (field, value) => {
    let caught: unknown;
    try {
      loadRuntimeConfig({ [field]: value });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field, received: JSON.stringify(value) });
  });
});
