/**
 * @fileoverview Help text for the paramnb CLI
 */

export const HELP_TEXT = `
paramnb - Parameterize and execute notebooks

USAGE:
    paramnb <input> [output] [options]

    <input> and [output] are paths, file: URLs or '-' for stdin/stdout.
    With no output, the executed notebook is written to stdout. With no
    arguments at all, the notebook is read from stdin and written to stdout.
    Paths may contain {name} tokens filled from the parameters and from
    {run.uuid}, {run.datetime_utc} and {run.datetime_local}.

PARAMETERS (later sources override earlier ones):
    --inject-input-path             Pass the input path as PARAMNB_INPUT_PATH
    --inject-output-path            Pass the output path as PARAMNB_OUTPUT_PATH
    --inject-paths                  Both of the above
    -b, --parameters-base64 <b64>   Base64-encoded YAML mapping (repeatable)
    -f, --parameters-file <path>    YAML or JSON file with a mapping (repeatable)
    -y, --parameters-yaml <yaml>    YAML mapping (repeatable)
    -p, --parameters <name> <value> One parameter; numbers, True/False and
                                    None are converted (repeatable)
    -r, --parameters-raw <name> <value>
                                    One parameter, kept as a string (repeatable)

EXECUTION:
    --engine <name>                 Execution engine (default: subprocess)
    -k, --kernel <name>             Kernel name overriding the notebook's
    --language <name>               Language overriding the notebook's
    --cwd <dir>                     Working directory for execution
    --prepare-only                  Parameterize and save without executing
    --start-timeout <seconds>       Time allowed for the kernel to start
    --execution-timeout <seconds>   Time allowed for each cell
    --autosave-cell-every <seconds> Save interval while a cell runs
    --no-request-save-on-cell-execute
                                    Only save once execution finishes

OUTPUT:
    --report-mode                   Hide code cell sources in the output
    --log-output                    Echo cell output through the log
    --no-progress-bar               Do not render the progress bar
    --stdout-file <path>            Append cell stdout to a file
    --stderr-file <path>            Append cell stderr to a file
    --no-obfuscate-sensitive-parameters
                                    Record sensitive parameter values verbatim
    --sensitive-parameter-pattern <regex>
                                    Names matching this are redacted; replaces
                                    the defaults (repeatable)

OTHER:
    --help-notebook                 List the parameters the input declares
    --log-level <level>             debug, info, warn, error or silent
    --json                          Structured JSON errors on stderr
    -h, --help                      Show this help
    -v, --version                   Show version information

ENVIRONMENT:
    PARAMNB_ENGINE, PARAMNB_START_TIMEOUT, PARAMNB_EXECUTION_TIMEOUT,
    PARAMNB_AUTOSAVE_SECONDS, PARAMNB_LOG_LEVEL, PARAMNB_SENSITIVE_PATTERNS

EXIT CODES:
    0 success, 1 a cell failed, 2 invalid arguments or parameters,
    3 notebook read/write/format error, 4 engine error, 124 timeout,
    70 internal error

EXAMPLES:
    paramnb analysis.ipynb out/analysis-{region}.ipynb -p region emea -p year 2024
    paramnb report.ipynb -f params.yaml --report-mode > report.ipynb
    paramnb etl.ipynb --help-notebook
`;

export function showHelp(): void {
  console.log(HELP_TEXT);
}
