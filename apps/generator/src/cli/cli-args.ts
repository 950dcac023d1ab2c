export interface CliArgs {
  dryRun: boolean;
  verbose: boolean;
  showConfig: boolean;
  /** Check store access and the template, then exit */
  check: boolean;
  help: boolean;
  /** Overrides RUN_SUMMARY_PATH */
  summaryPath?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: certgen [options]

Generates a PDF certificate for every pending roster row, uploads it to the
company's folder and marks the row done.

Options:
  --dry-run          Render every pending row without uploading or writing back
  --verbose          Debug logging
  --show-config      Print the resolved configuration (token hidden) and exit
  --check            Check the token, roster, certificates folder and template, then exit
  --summary <path>   Also write the run summary JSON to <path>
  -h, --help         Show this help`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, verbose: false, showConfig: false, check: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--verbose') {
      args.verbose = true;
    } else if (arg === '--show-config') {
      args.showConfig = true;
    } else if (arg === '--check') {
      args.check = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('--summary=')) {
      args.summaryPath = requireValue('--summary', arg.slice('--summary='.length));
    } else if (arg === '--summary') {
      args.summaryPath = requireValue('--summary', argv[i + 1]);
      i += 1;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith('--')) {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
}
