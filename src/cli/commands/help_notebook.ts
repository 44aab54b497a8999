/**
 * @fileoverview Help-notebook command - list the parameters a notebook declares
 */

import { fileURLToPath } from 'node:url';
import { LocalNotebookIO, type NotebookIO } from '../../notebook/io.js';
import { formatParameterHelp, inferParameters } from '../../parameterize/inspect.js';
import { addBuiltinParameters, parameterizePath } from '../../parameterize/path.js';
import { collectParameters, type CliArgs, type CollectParametersOptions } from '../args.js';
import { createError } from '../errors.js';

export interface HelpNotebookCommandOptions extends CollectParametersOptions {
  args: CliArgs;
  io?: NotebookIO;
  write?: (text: string) => void;
}

/** Returns the text it printed. */
export async function helpNotebookCommand(options: HelpNotebookCommandOptions): Promise<string> {
  const { args } = options;
  const io = options.io ?? new LocalNotebookIO();
  const write = options.write ?? ((text: string) => console.log(text));

  const parameters = await collectParameters(args, { readText: options.readText });
  const inputPath = parameterizePath(args.input, addBuiltinParameters(parameters));
  if (inputPath === null) {
    throw createError('INVALID_ARGUMENT', '--help-notebook needs an input notebook');
  }

  const notebook = await io.read(inputPath.startsWith('file:') ? fileURLToPath(inputPath) : inputPath);
  const declarations = inferParameters(notebook, { kernelName: args.kernel, language: args.language });
  const text = `Usage: paramnb [OPTIONS] ${inputPath} [OUTPUT_PATH]\n\n${formatParameterHelp(declarations)}`;
  write(text);
  return text;
}
