// Shared board model for the 15-hole triangular peg solitaire puzzle.
//
// The triangle is drawn on a padded rectangular grid so that the jump rules
// can look two cells away in every direction without leaving the grid:
//
//   row 0   . . . . . . . . . . . . .
//   row 1   . . . . . . . . . . . . .
//   row 2   . . . . . . X . . . . . .      triangle row 1
//   row 3   . . . . . X . X . . . . .      triangle row 2
//   row 4   . . . . X . X . X . . . .      triangle row 3
//   row 5   . . . X . X . X . X . . .      triangle row 4
//   row 6   . . X . X . X . X . X . .      triangle row 5
//   row 7   . . . . . . . . . . . . .
//   row 8   . . . . . . . . . . . . .

export type CellState = 'empty' | 'occupied' | 'invalid';

/** Number of rows in the triangle. */
export const TRIANGLE_ROWS = 5;

/** Number of holes in the triangle. */
export const CELL_COUNT = (TRIANGLE_ROWS * (TRIANGLE_ROWS + 1)) / 2;

/** Width of the invalid border around the triangle on the padded grid. */
export const GRID_BORDER = 2;

export const GRID_ROWS = TRIANGLE_ROWS + 2 * GRID_BORDER;
export const GRID_COLS = 2 * TRIANGLE_ROWS - 1 + 2 * GRID_BORDER;

/**
 * Position on the triangle, both coordinates 1-based.
 * `position` counts from the left edge of the row (1..row).
 */
export interface TrianglePosition {
  row: number;
  position: number;
}

/** Position on the padded rectangular grid, both coordinates 0-based. */
export interface GridPosition {
  row: number;
  col: number;
}

/**
 * Board occupancy as a bit set: bit `hole - 1` is set when that hole holds a
 * peg. Holes are numbered 1..15 row-major from the apex.
 */
export type PegMask = number;

export type JumpDirectionName =
  | 'up_left'
  | 'up_right'
  | 'down_left'
  | 'down_right'
  | 'left'
  | 'right';

/** A single jump: the peg on `from` jumps over `over` and lands on `to`. */
export interface JumpMove {
  from: TrianglePosition;
  over: TrianglePosition;
  to: TrianglePosition;
  direction: JumpDirectionName;
}

/**
 * Read-only view of one board of the search tree, materialised on demand for
 * renderers, logs and tests.
 */
export interface BoardSnapshot {
  /** Arena index of the board. */
  index: number;
  /** Creation sequence number across the whole search; the root is 1. */
  boardNum: number;
  /** Arena index of the predecessor, null for the root. */
  prev: number | null;
  /** Arena index of the next board on the reconstructed winning path. */
  nextWin: number | null;
  /** Number of jumps made from the root to reach this board. */
  depth: number;
  pegs: PegMask;
  pegCount: number;
  /** GRID_ROWS x GRID_COLS cell states. */
  cells: CellState[][];
  /** Landing cell of the jump that produced this board. */
  lastMoved: GridPosition | null;
  move: JumpMove | null;
}
