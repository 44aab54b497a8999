/**
 * @fileoverview CLI dispatch
 *
 * Parses arguments, picks the action, and turns every failure into an error
 * envelope plus an exit code. Never throws.
 */

import type { NotebookIO } from '../notebook/io.js';
import { loadRuntimeConfig } from '../config/index.js';
import { executeNotebook } from '../execute/execute.js';
import { setLogLevel } from '../telemetry/logger.js';
import { PARAMNB_VERSION } from '../version.js';
import { parseCliArgs } from './args.js';
import { helpNotebookCommand } from './commands/help_notebook.js';
import { runCommand } from './commands/run.js';
import {
  classifyError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

export interface MainDependencies {
  execute?: typeof executeNotebook;
  io?: NotebookIO;
  readText?: (path: string) => Promise<string>;
  stdinIsTTY?: boolean;
  /** Source of PARAMNB_* defaults; process.env when omitted */
  env?: NodeJS.ProcessEnv;
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

/** Resolves to the process exit code. */
export async function main(argv: readonly string[], deps: MainDependencies = {}): Promise<number> {
  const jsonMode = argv.includes('--json');

  try {
    const args = parseCliArgs(argv, deps.stdinIsTTY);
    const config = loadRuntimeConfig(deps.env);
    const logLevel = args.logLevel ?? config.logLevel;
    if (logLevel) {
      setLogLevel(logLevel);
    }

    if (args.version) {
      console.log(`paramnb ${PARAMNB_VERSION}`);
      return 0;
    }
    if (args.help) {
      showHelp();
      return 0;
    }
    if (args.helpNotebook) {
      await helpNotebookCommand({ args, io: deps.io, readText: deps.readText });
      return 0;
    }

    await runCommand({ args, config, execute: deps.execute, readText: deps.readText });
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
}
