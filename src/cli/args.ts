import { UsageError } from './errors';

export const PROGRAM_NAME = 'tri-solitaire';

export interface CliOptions {
  /** Print search-tree tracing; disables pacing and screen clearing. */
  debug: boolean;
  /** Clear the screen and pace the solution frames. */
  visual: boolean;
}

export function usage(programName: string = PROGRAM_NAME): string {
  return `usage: ${programName} [-d] [-v]`;
}

/**
 * Parse short flags the way getopt does: flags may be grouped (`-dv`), `--`
 * ends option parsing, and operands are ignored wherever they appear. Any
 * other option character, including a long `--flag`, is a UsageError.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { debug: false, visual: false };

  for (const arg of argv) {
    if (arg === '--') {
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      continue;
    }
    for (const flag of arg.slice(1)) {
      switch (flag) {
        case 'd':
          options.debug = true;
          break;
        case 'v':
          options.visual = true;
          break;
        default:
          throw new UsageError(`-${flag}`, { argument: arg });
      }
    }
  }

  return options;
}
