import { GRID_BORDER, TRIANGLE_ROWS, type BoardSnapshot } from '../../shared/types/board';

export const ANSI = {
  CLEAR_SCREEN: '\x1b[2J',
  CURSOR_HOME: '\x1b[H',
  INVERSE_VIDEO: '\x1b[7m',
  NORMAL_VIDEO: '\x1b[m',
} as const;

export const FRAME_TOP = '+'.repeat(22);
export const FRAME_BOTTOM = '-'.repeat(22);

export interface FormatBoardOptions {
  /** Draw the last-moved peg in inverse video. */
  highlightLastMove?: boolean;
}

/**
 * Draw a board on its padded grid.
 *
 * Each of the nine grid rows is one line; the five triangle rows carry their
 * row number and two spaces in front. Pegs are `X`, everything else a space.
 * The frame ends with a rule and a blank line.
 */
export function formatBoard(
  board: Pick<BoardSnapshot, 'cells' | 'lastMoved'>,
  options: FormatBoardOptions = {}
): string {
  const last = options.highlightLastMove ? board.lastMoved : null;
  let out = `${FRAME_TOP}\n`;

  board.cells.forEach((row, r) => {
    const triangleRow = r - GRID_BORDER + 1;
    if (triangleRow >= 1 && triangleRow <= TRIANGLE_ROWS) {
      out += `${triangleRow}  `;
    }
    row.forEach((cell, c) => {
      if (cell !== 'occupied') {
        out += ' ';
        return;
      }
      const isLast = last !== null && last.row === r && last.col === c;
      out += isLast ? `${ANSI.INVERSE_VIDEO}X${ANSI.NORMAL_VIDEO}` : 'X';
    });
    out += '\n';
  });

  return `${out}${FRAME_BOTTOM}\n\n`;
}
