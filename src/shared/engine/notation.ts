import { CELL_COUNT, TRIANGLE_ROWS, type JumpMove, type PegMask, type TrianglePosition } from '../types/board';
import { assertPegMask } from './boardState';
import { BoardConstraintViolation, EngineErrorCode } from './errors';
import { CELLS, cellIndexOf } from './geometry';

/**
 * Shared notation helpers.
 *
 * Holes are numbered 1..15 row-major from the apex, the usual numbering for
 * this puzzle:
 *
 *         1
 *        2 3
 *       4 5 6
 *      7 8 9 10
 *    11 12 13 14 15
 *
 * A jump is written `from-to` with hole numbers (`4-1` jumps the peg on 4
 * over 2 into 1). Text boards are five lines, one token per hole, `X` for a
 * peg and `O` (or `.`) for an empty hole; spacing is free.
 */

export const PEG_TOKEN = 'X';
export const HOLE_TOKEN = 'O';

export function holeNumber(pos: TrianglePosition): number {
  return cellIndexOf(pos) + 1;
}

export function positionOfHole(hole: number): TrianglePosition {
  if (!Number.isInteger(hole) || hole < 1 || hole > CELL_COUNT) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Hole ${hole} is outside the triangle`,
      { hole },
      'Notation'
    );
  }
  return { ...CELLS[hole - 1].triangle };
}

export function formatPosition(pos: TrianglePosition): string {
  return String(holeNumber(pos));
}

export function formatMove(move: JumpMove): string {
  return `${formatPosition(move.from)}-${formatPosition(move.to)}`;
}

export function formatMoveList(moves: readonly JumpMove[]): string {
  return moves.map(formatMove).join(', ');
}

/**
 * Render a peg mask as a centred five-line text board.
 */
export function formatBoardNotation(pegs: PegMask): string {
  assertPegMask(pegs);
  const lines: string[] = [];
  for (let row = 1; row <= TRIANGLE_ROWS; row++) {
    const tokens: string[] = [];
    for (let position = 1; position <= row; position++) {
      const occupied = (pegs & (1 << cellIndexOf({ row, position }))) !== 0;
      tokens.push(occupied ? PEG_TOKEN : HOLE_TOKEN);
    }
    lines.push(' '.repeat(TRIANGLE_ROWS - row) + tokens.join(' '));
  }
  return lines.join('\n');
}

/**
 * Parse a text board into a peg mask. Blank lines are skipped; each of the
 * five remaining lines must hold exactly as many tokens as its row number.
 */
export function parseBoardNotation(text: string): PegMask {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length !== TRIANGLE_ROWS) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_NOTATION,
      `Expected ${TRIANGLE_ROWS} rows, found ${lines.length}`,
      { rows: lines.length },
      'Notation'
    );
  }

  let pegs: PegMask = 0;
  lines.forEach((line, i) => {
    const row = i + 1;
    const tokens = line.split(/\s+/);
    if (tokens.length !== row) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_NOTATION,
        `Row ${row} must have ${row} holes, found ${tokens.length}`,
        { row, tokens: tokens.length },
        'Notation'
      );
    }
    tokens.forEach((token, j) => {
      const index = cellIndexOf({ row, position: j + 1 });
      switch (token) {
        case 'X':
        case 'x':
          pegs |= 1 << index;
          break;
        case 'O':
        case 'o':
        case '.':
          break;
        default:
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_NOTATION,
            `Unexpected token '${token}' on row ${row}`,
            { row, token },
            'Notation'
          );
      }
    });
  });
  return pegs;
}
