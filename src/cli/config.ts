import { parseArgs } from 'util';

export const DEFAULT_RESULTS_DIR = 'sparse_matrix/sample_results';

/** Environment variable overriding the results directory */
export const RESULTS_DIR_ENV = 'SPARSEMAT_RESULTS_DIR';

export const USAGE = `Usage: sparsemat [options] [first-matrix] [second-matrix]

Options:
  --op <name>       add, subtract or multiply (prompted for when omitted)
  --out-dir <dir>   results directory (default: $${RESULTS_DIR_ENV} or ${DEFAULT_RESULTS_DIR})
  -v, --verbose     log operand dimensions and entry counts
  -h, --help        show this help
`;

/**
 * CLI settings. Missing operation or paths are prompted for.
 */
export interface CliConfig {
  operation?: string;
  firstPath?: string;
  secondPath?: string;
  resultsDir: string;
  verbose: boolean;
  help: boolean;
}

/**
 * Build the CLI configuration from command-line arguments and environment.
 *
 * Precedence for the results directory: `--out-dir`, then the environment, then the default.
 */
export function loadConfig(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): CliConfig {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      op: { type: 'string' },
      'out-dir': { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (positionals.length > 2) {
    throw new Error(`Expected at most two matrix files, got ${positionals.length}`);
  }

  const envDir = env[RESULTS_DIR_ENV];

  return {
    operation: values.op,
    firstPath: positionals[0],
    secondPath: positionals[1],
    resultsDir: values['out-dir'] ?? (envDir !== undefined && envDir !== '' ? envDir : DEFAULT_RESULTS_DIR),
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}
