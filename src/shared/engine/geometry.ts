import {
  CELL_COUNT,
  GRID_BORDER,
  GRID_COLS,
  GRID_ROWS,
  TRIANGLE_ROWS,
  type GridPosition,
  type TrianglePosition,
} from '../types/board';
import { BoardConstraintViolation, EngineErrorCode } from './errors';

/**
 * Triangle geometry on the padded grid.
 *
 * Cells are indexed 0..14 row-major from the apex, which is also the order
 * in which a row-major scan of the padded grid meets them. Hole numbers are
 * the 1-based form of the same index.
 */

export interface CellGeometry {
  index: number;
  hole: number;
  triangle: TrianglePosition;
  grid: GridPosition;
}

export function isValidTrianglePosition(pos: TrianglePosition): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.position) &&
    pos.row >= 1 &&
    pos.row <= TRIANGLE_ROWS &&
    pos.position >= 1 &&
    pos.position <= pos.row
  );
}

function assertTrianglePosition(pos: TrianglePosition): void {
  if (!isValidTrianglePosition(pos)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Position (${pos.row},${pos.position}) is outside the triangle`,
      { row: pos.row, position: pos.position },
      'Geometry'
    );
  }
}

export function triangleToGrid(pos: TrianglePosition): GridPosition {
  assertTrianglePosition(pos);
  return {
    row: pos.row - 1 + GRID_BORDER,
    col: GRID_BORDER + TRIANGLE_ROWS - pos.row + 2 * (pos.position - 1),
  };
}

/** Cell index (0..14) of a triangle position. */
export function cellIndexOf(pos: TrianglePosition): number {
  assertTrianglePosition(pos);
  return (pos.row * (pos.row - 1)) / 2 + pos.position - 1;
}

export const CELLS: readonly CellGeometry[] = (() => {
  const cells: CellGeometry[] = [];
  for (let row = 1; row <= TRIANGLE_ROWS; row++) {
    for (let position = 1; position <= row; position++) {
      const triangle = { row, position };
      const index = cellIndexOf(triangle);
      cells.push({ index, hole: index + 1, triangle, grid: triangleToGrid(triangle) });
    }
  }
  return cells;
})();

/** GRID_ROWS x GRID_COLS map from grid cell to cell index, -1 off the triangle. */
const CELL_INDEX_GRID: readonly (readonly number[])[] = (() => {
  const grid = Array.from({ length: GRID_ROWS }, () => new Array<number>(GRID_COLS).fill(-1));
  for (const cell of CELLS) {
    grid[cell.grid.row][cell.grid.col] = cell.index;
  }
  return grid;
})();

/**
 * Cell index at a grid position, or -1 when the position is on the invalid
 * border or beyond the grid altogether (horizontal jumps reach four columns
 * out, past the two-cell border).
 */
export function cellIndexAt(row: number, col: number): number {
  if (row < 0 || row >= GRID_ROWS || col < 0 || col >= GRID_COLS) {
    return -1;
  }
  return CELL_INDEX_GRID[row][col];
}

export function cellAt(index: number): CellGeometry {
  if (!Number.isInteger(index) || index < 0 || index >= CELL_COUNT) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Cell index ${index} is outside the triangle`,
      { index },
      'Geometry'
    );
  }
  return CELLS[index];
}
