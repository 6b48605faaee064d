import { setTimeout as delay } from 'timers/promises';
import type { SearchVisit } from '../../shared/engine/searchEngine';
import type { BoardSnapshot } from '../../shared/types/board';
import { ANSI, formatBoard } from './boardFormatter';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RendererOptions {
  visual: boolean;
  debug: boolean;
  /** Pause after each frame in interactive mode. */
  frameDelayMs: number;
  /** Overridable for tests. */
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Writes boards to a terminal.
 *
 * Every frame shows the last-moved peg in inverse video. Interactive mode
 * (visual without debug) also clears the screen once, redraws every frame
 * from the top-left corner and pauses between frames. Debug tracing never
 * clears or pauses.
 */
export class TerminalRenderer {
  private readonly out: OutputStream;
  private readonly options: RendererOptions;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(out: OutputStream, options: RendererOptions) {
    this.out = out;
    this.options = options;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  get interactive(): boolean {
    return this.options.visual && !this.options.debug;
  }

  /** Prepare the screen before the first frame. */
  begin(): void {
    if (this.interactive) {
      this.out.write(ANSI.CLEAR_SCREEN + ANSI.CURSOR_HOME);
    }
  }

  write(text: string): void {
    this.out.write(text);
  }

  renderFrame(board: BoardSnapshot): void {
    if (this.interactive) {
      this.out.write(ANSI.CURSOR_HOME);
    }
    this.out.write(formatBoard(board, { highlightLastMove: true }));
  }

  /** Draw one board of the solution, pausing afterwards in interactive mode. */
  async present(board: BoardSnapshot): Promise<void> {
    this.renderFrame(board);
    if (this.interactive) {
      await this.sleep(this.options.frameDelayMs);
    }
  }

  /** Search-tree tracing for a visited board. */
  trace(visit: SearchVisit, board: BoardSnapshot): void {
    if (visit.isWinner) {
      this.out.write('Board is a winner!\n');
    }
    this.out.write(
      `DEPTH: ${visit.depth} COUNT: ${visit.pegCount} BOARDNUM ${visit.boardNum} PREV ${visit.prevBoardNum}\n`
    );
    this.renderFrame(board);
  }
}
