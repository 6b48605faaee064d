import {
  CELL_COUNT,
  GRID_COLS,
  GRID_ROWS,
  type CellState,
  type GridPosition,
  type PegMask,
  type TrianglePosition,
} from '../types/board';
import { CELLS, cellAt, cellIndexOf } from './geometry';
import { EngineErrorCode, InvalidState } from './errors';

/** Every hole holds a peg. */
export const FULL_BOARD_MASK: PegMask = (1 << CELL_COUNT) - 1;

export type StandardStartHole = 'apex' | 'rowTwoLeft' | 'rowThreeLeft' | 'rowThreeCentre';

/**
 * Starting holes worth naming. The centre of row 3 is the board the solver
 * searches by default.
 */
export const STANDARD_START_HOLES: Readonly<Record<StandardStartHole, TrianglePosition>> = {
  apex: { row: 1, position: 1 },
  rowTwoLeft: { row: 2, position: 1 },
  rowThreeLeft: { row: 3, position: 1 },
  rowThreeCentre: { row: 3, position: 2 },
};

export const DEFAULT_START_HOLE: TrianglePosition = STANDARD_START_HOLES.rowThreeCentre;

export function isPegMask(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= FULL_BOARD_MASK;
}

export function assertPegMask(value: number): void {
  if (!isPegMask(value)) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVALID_PEG_MASK,
      `${value} is not a peg mask for a ${CELL_COUNT}-hole board`,
      { value }
    );
  }
}

/** Full triangle with a single empty hole. */
export function createStartingBoard(hole: TrianglePosition): PegMask {
  return FULL_BOARD_MASK & ~(1 << cellIndexOf(hole));
}

/** Board with pegs on exactly the given positions. */
export function createBoardWithPegs(positions: readonly TrianglePosition[]): PegMask {
  return positions.reduce((pegs, pos) => pegs | (1 << cellIndexOf(pos)), 0);
}

export function countPegs(pegs: PegMask): number {
  let v = pegs - ((pegs >>> 1) & 0x5555);
  v = (v & 0x3333) + ((v >>> 2) & 0x3333);
  v = (v + (v >>> 4)) & 0x0f0f;
  return (v + (v >>> 8)) & 0x1f;
}

/** Positions of every peg, row-major. */
export function pegPositions(pegs: PegMask): TrianglePosition[] {
  return CELLS.filter((cell) => (pegs & (1 << cell.index)) !== 0).map((cell) => ({
    ...cell.triangle,
  }));
}

/**
 * Expand a peg mask onto the padded grid. `lastMovedCell` is the landing
 * cell of the jump that produced the board, if any.
 */
export function toCellGrid(
  pegs: PegMask,
  lastMovedCell: number | null = null
): { cells: CellState[][]; lastMoved: GridPosition | null } {
  assertPegMask(pegs);
  const cells = Array.from({ length: GRID_ROWS }, () =>
    new Array<CellState>(GRID_COLS).fill('invalid')
  );
  for (const cell of CELLS) {
    cells[cell.grid.row][cell.grid.col] = (pegs & (1 << cell.index)) !== 0 ? 'occupied' : 'empty';
  }
  const lastMoved =
    lastMovedCell !== null && (pegs & (1 << lastMovedCell)) !== 0
      ? { ...cellAt(lastMovedCell).grid }
      : null;
  return { cells, lastMoved };
}
