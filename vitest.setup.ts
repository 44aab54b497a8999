/**
 * Centralized Vitest Setup for paramnb
 *
 * Log lines go to stderr and would bury test output, so the default level is
 * `silent` unless PARAMNB_TEST_VERBOSE=true. Tests that assert on log output
 * set their own level.
 */

import { afterEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

if (process.env.PARAMNB_TEST_VERBOSE !== 'true') {
  process.env.PARAMNB_LOG_LEVEL = 'silent';
}

afterEach(() => {
  setLogLevel(null);
});
