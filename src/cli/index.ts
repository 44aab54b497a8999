#!/usr/bin/env node
/**
 * @fileoverview paramnb CLI
 *
 *   paramnb <input> [output] [-p name value ...] [options]
 *
 * See `paramnb --help` for the full option list.
 *
 * @packageDocumentation
 */

import { main } from './main.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 70;
  });
