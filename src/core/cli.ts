// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: folder-notify --path <dir> --topic <topic> [options]

Monitor a folder and send ntfy notifications on file changes.

Required:
  --path <dir>            Path to the folder to monitor
  --topic <topic>         ntfy topic for notifications

Options:
  --extensions <list>     Comma-separated list of file extensions to monitor
                          (e.g. .txt,.pdf,.docx)
  --include-directories   Include directory events in notifications
  --recursive             Watch subdirectories recursively
  --help, -h              Show this help message

Environment:
  NTFY_SERVER_URL         ntfy server to publish to (default: https://ntfy.sh)
  LOG_LEVEL               debug | info | warn | error (default: info)

Examples:
  folder-notify --path ./inbox --topic my-inbox
  folder-notify --path ~/Downloads --topic dl --extensions pdf,zip --recursive
`.trim();

// ── Parsing ──────────────────────────────────────────────────────────────────

/** Flags accepted on the command line. */
export interface CliArgs {
  path: string;
  topic: string;
  extensions?: string;
  includeDirectories: boolean;
  recursive: boolean;
}

/** Thrown for a malformed command line; the caller prints usage and exits 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_FLAGS = new Set(['--path', '--topic', '--extensions']);
const BOOLEAN_FLAGS = new Set(['--include-directories', '--recursive']);

/**
 * Parse process arguments (without the node binary and script path).
 * Accepts both `--flag value` and `--flag=value`; the last occurrence wins.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;

    if (VALUE_FLAGS.has(flag)) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[i + 1];
        i++;
      }
      if (value === undefined || (flag === arg && value.startsWith('--'))) {
        throw new CliUsageError(`argument ${flag}: expected one argument`);
      }
      values.set(flag, value);
      continue;
    }

    if (BOOLEAN_FLAGS.has(flag)) {
      if (flag !== arg) {
        throw new CliUsageError(`argument ${flag}: ignored explicit argument '${arg.slice(eq + 1)}'`);
      }
      switches.add(flag);
      continue;
    }

    throw new CliUsageError(`unrecognized arguments: ${arg}`);
  }

  const missing = ['--path', '--topic'].filter((flag) => !values.has(flag));
  if (missing.length > 0) {
    throw new CliUsageError(`the following arguments are required: ${missing.join(', ')}`);
  }

  return {
    path: values.get('--path') ?? '',
    topic: values.get('--topic') ?? '',
    extensions: values.get('--extensions'),
    includeDirectories: switches.has('--include-directories'),
    recursive: switches.has('--recursive'),
  };
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Report a usage error the way the help text reads and set exit code 2.
 */
export function reportUsageError(error: CliUsageError): void {
  console.error(`folder-notify: error: ${error.message}`);
  console.error(`Run 'folder-notify --help' to see available options.`);
  process.exitCode = 2;
}
