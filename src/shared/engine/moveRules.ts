import { CELL_COUNT, type JumpDirectionName, type JumpMove, type PegMask } from '../types/board';
import { CELLS, cellAt, cellIndexAt } from './geometry';

/**
 * Jump rules for the triangular board.
 *
 * A jump moves a peg over an adjacent peg into the empty cell beyond it,
 * removing the jumped peg. On the padded grid the six neighbours of a cell
 * are the two diagonals above, the two diagonals below and the cells two
 * columns to the left and right.
 */

export interface JumpDirection {
  name: JumpDirectionName;
  rowOffset: number;
  colOffset: number;
}

/** Fixed direction order. The search tries directions in exactly this order. */
export const JUMP_DIRECTIONS: readonly JumpDirection[] = [
  { name: 'up_left', rowOffset: -1, colOffset: -1 },
  { name: 'up_right', rowOffset: -1, colOffset: 1 },
  { name: 'down_left', rowOffset: 1, colOffset: -1 },
  { name: 'down_right', rowOffset: 1, colOffset: 1 },
  { name: 'left', rowOffset: 0, colOffset: -2 },
  { name: 'right', rowOffset: 0, colOffset: 2 },
];

/**
 * A jump that stays on the triangle, as cell indices. `id` packs the mover
 * and direction (`from * 6 + direction`) so the search tree can store the
 * producing jump in a single byte.
 */
export interface JumpLine {
  id: number;
  from: number;
  over: number;
  to: number;
  direction: number;
  /** Bits of the three cells touched by the jump. */
  mask: PegMask;
}

const JUMP_TABLE: readonly (readonly (JumpLine | null)[])[] = CELLS.map((cell) =>
  JUMP_DIRECTIONS.map((dir, direction) => {
    const over = cellIndexAt(cell.grid.row + dir.rowOffset, cell.grid.col + dir.colOffset);
    const to = cellIndexAt(cell.grid.row + 2 * dir.rowOffset, cell.grid.col + 2 * dir.colOffset);
    if (over < 0 || to < 0) {
      return null;
    }
    return {
      id: cell.index * JUMP_DIRECTIONS.length + direction,
      from: cell.index,
      over,
      to,
      direction,
      mask: (1 << cell.index) | (1 << over) | (1 << to),
    };
  })
);

/**
 * Jump line for a cell and direction, or null when the jumped or landing
 * cell lies outside the triangle.
 */
export function getJumpLine(cell: number, direction: number): JumpLine | null {
  cellAt(cell);
  return JUMP_TABLE[cell][direction] ?? null;
}

/** Jump line for a packed id as stored in the search tree. */
export function getJumpLineById(id: number): JumpLine | null {
  const direction = id % JUMP_DIRECTIONS.length;
  return getJumpLine((id - direction) / JUMP_DIRECTIONS.length, direction);
}

export function isOccupied(pegs: PegMask, cell: number): boolean {
  return (pegs & (1 << cell)) !== 0;
}

/** Mover and jumped cells occupied, landing cell empty. */
export function isLegalJump(pegs: PegMask, line: JumpLine): boolean {
  return (pegs & line.mask) === ((1 << line.from) | (1 << line.over));
}

/** Occupancy after the jump. The caller checks legality. */
export function applyJump(pegs: PegMask, line: JumpLine): PegMask {
  return pegs ^ line.mask;
}

/**
 * All legal jumps from a board in search order: cells row-major, then
 * directions in JUMP_DIRECTIONS order.
 */
export function enumerateLegalJumps(pegs: PegMask): JumpLine[] {
  const jumps: JumpLine[] = [];
  for (let cell = 0; cell < CELL_COUNT; cell++) {
    if (!isOccupied(pegs, cell)) {
      continue;
    }
    for (const line of JUMP_TABLE[cell]) {
      if (line !== null && isLegalJump(pegs, line)) {
        jumps.push(line);
      }
    }
  }
  return jumps;
}

export function toJumpMove(line: JumpLine): JumpMove {
  return {
    from: { ...cellAt(line.from).triangle },
    over: { ...cellAt(line.over).triangle },
    to: { ...cellAt(line.to).triangle },
    direction: JUMP_DIRECTIONS[line.direction].name,
  };
}
