import { performance } from 'perf_hooks';
import {
  createStartingBoard,
  formatMoveList,
  formatPosition,
  solve,
  type JumpMove,
  type SearchObserver,
} from '../shared/engine';
import { parseArgs, usage } from './args';
import { config as defaultConfig, type AppConfig } from './config';
import { getExitCode, isUsageError, wrapCliError } from './errors';
import { TerminalRenderer, type OutputStream } from './rendering/TerminalRenderer';
import { logger } from './utils/logger';

export interface CliDependencies {
  stdout?: OutputStream;
  stderr?: OutputStream;
  config?: AppConfig;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Run the solver with command-line arguments (without node and script path).
 *
 * Prints `Total boards: <N>` followed by every board of the first winning
 * line found. Resolves to the process exit status.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const config = deps.config ?? defaultConfig;

  try {
    const options = parseArgs(argv);
    const renderer = new TerminalRenderer(stdout, {
      visual: options.visual,
      debug: options.debug,
      frameDelayMs: config.display.frameDelayMs,
      sleep: deps.sleep,
    });

    const startHole = config.search.startHole;
    logger.info('Starting search', { startHole: formatPosition(startHole), ...options });

    const observer: SearchObserver | undefined = options.debug
      ? (visit, tree) => renderer.trace(visit, tree.snapshot(visit.index))
      : undefined;

    renderer.begin();
    const startedAt = performance.now();
    const result = solve(createStartingBoard(startHole), { observer });
    const durationMs = Math.round(performance.now() - startedAt);

    renderer.write(`Total boards: ${result.totalBoards}\n`);

    const moves = result.solution
      .map((board) => board.move)
      .filter((move): move is JumpMove => move !== null);
    logger.info('Search complete', {
      totalBoards: result.totalBoards,
      totalWinningBoards: result.totalWinningBoards,
      solutionLength: result.solution.length,
      durationMs,
    });
    logger.debug('Solution', { moves: formatMoveList(moves) });

    for (const board of result.solution) {
      await renderer.present(board);
    }
    return 0;
  } catch (error) {
    if (isUsageError(error)) {
      stderr.write(`${usage()}\n`);
      return error.exitCode;
    }
    const wrapped = wrapCliError(error);
    logger.error('Solver failed', { error, code: wrapped.code });
    return getExitCode(wrapped);
  }
}

/**
 * Log an error that escaped runCli and return the exit status for it.
 */
export function reportFatalError(error: unknown): number {
  const wrapped = wrapCliError(error);
  logger.error('Fatal error', { error, code: wrapped.code });
  return getExitCode(wrapped);
}
