/**
 * Command-line argument parsing
 */

export interface CliOptions {
  count?: number;
  output?: string;
  root?: string;
  minMiddle?: number;
  maxMiddle?: number;
  retries?: number;
  fileRetries?: number;
  seed?: number;
  indent?: number;
  format?: string;
  prompt?: boolean;
  dedupe?: boolean;
  verbose?: boolean;
  help?: boolean;
  version?: boolean;
}

export interface ParsedArgs {
  command: string;
  files: string[];
  options: CliOptions;
}

type NumericOption = 'count' | 'minMiddle' | 'maxMiddle' | 'retries' | 'fileRetries' | 'seed' | 'indent';

const NUMERIC_FLAGS: Record<string, NumericOption> = {
  '-n': 'count',
  '--count': 'count',
  '--min': 'minMiddle',
  '--max': 'maxMiddle',
  '--retries': 'retries',
  '--file-retries': 'fileRetries',
  '--seed': 'seed',
  '--indent': 'indent',
};

export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    files: [],
    options: {},
  };

  let i = 0;

  // Flags before the command
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) break;
    if (arg === '-h' || arg === '--help') result.options.help = true;
    if (arg === '-V' || arg === '--version') result.options.version = true;
  }

  const command = args[i];
  if (command !== undefined) {
    result.command = command;
    i++;
  }

  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    const numeric = NUMERIC_FLAGS[arg];
    if (numeric) {
      // NaN is left for config validation to reject
      result.options[numeric] = Number(args[++i]);
    } else if (arg === '-o' || arg === '--output') {
      const val = args[++i];
      if (val) result.options.output = val;
    } else if (arg === '--root') {
      const val = args[++i];
      if (val) result.options.root = val;
    } else if (arg === '-f' || arg === '--format') {
      const val = args[++i];
      if (val) result.options.format = val;
    } else if (arg === '--prompt') {
      result.options.prompt = true;
    } else if (arg === '--no-dedupe') {
      result.options.dedupe = false;
    } else if (arg === '-v' || arg === '--verbose') {
      result.options.verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      result.options.help = true;
    } else if (arg === '-V' || arg === '--version') {
      result.options.version = true;
    } else if (!arg.startsWith('-')) {
      result.files.push(arg);
    }
  }

  return result;
}
