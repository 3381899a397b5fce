/**
 * Newsdesk — Command-line Arguments
 *
 * Flags only choose collaborators (config path, log level, output
 * directory, whether to write); they never change pipeline semantics.
 */

export interface CliOptions {
  configPath?: string;
  verbose: boolean;
  outputDir?: string;
  dryRun: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: npm run pipeline -- [options]

Options:
  -c, --config <path>   Configuration file (default: $NEWSDESK_CONFIG or config/config.json)
  -v, --verbose         Debug logging
  -o, --output <dir>    Override the report directory from the configuration
      --dry-run         Run everything but do not write the report
  -h, --help            Show this help
`;

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    verbose: false,
    dryRun: false,
    help: false,
  };

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--config' || arg === '-c') {
      options.configPath = valueOf(arg, argv[i + 1]);
      i++;
    } else if (arg === '--output' || arg === '-o') {
      options.outputDir = valueOf(arg, argv[i + 1]);
      i++;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
