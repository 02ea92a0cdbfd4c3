import path from 'node:path';

export type OutputMode = 'both' | 'comment' | 'wire';

export interface TallyConfig {
  systemPath: string;
  unitPath: string;
  output: OutputMode;
  verbose: boolean;
}

export const USAGE = `Usage: tally-units [options]

Options:
  -s, --system <file>       System definition JSON naming surfaces, cells and universes (required)
  -u, --unit <file>         Tally unit expression JSON (required)
      --comment-only        Print only the human-readable comment
      --wire-only           Print only the wire-format text
      --verbose             Print the configuration and every nesting level
  -h, --help                Show this help message

Example:
  tally-units -s system.json -u unit.json --verbose`;

export function parseArgs(args: string[]): TallyConfig {
  let systemPath = '';
  let unitPath = '';
  let output: OutputMode = 'both';
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        console.log(USAGE);
        process.exit(0);
      case '--system':
      case '-s':
        systemPath = args[++i] ?? '';
        break;
      case '--unit':
      case '-u':
        unitPath = args[++i] ?? '';
        break;
      case '--comment-only':
        if (output === 'wire') throw new Error('--comment-only and --wire-only are mutually exclusive');
        output = 'comment';
        break;
      case '--wire-only':
        if (output === 'comment') throw new Error('--comment-only and --wire-only are mutually exclusive');
        output = 'wire';
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
    }
  }

  if (!systemPath) throw new Error('--system / -s is required');
  if (!unitPath) throw new Error('--unit / -u is required');

  return {
    systemPath: path.resolve(systemPath),
    unitPath: path.resolve(unitPath),
    output,
    verbose,
  };
}

export interface TallyResult {
  comment: string;
  wire: string;
  bins: number;
}
