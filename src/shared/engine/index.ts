// =============================================================================
// PEG SOLITAIRE SOLVER ENGINE - PUBLIC API
// =============================================================================
// Hosts (the CLI, tests, any other renderer) import from this file only.
//
// The engine never writes to a terminal: it returns board snapshots and
// reports visits through an observer callback.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  CellState,
  TrianglePosition,
  GridPosition,
  PegMask,
  JumpDirectionName,
  JumpMove,
  BoardSnapshot,
} from '../types/board';

export { TRIANGLE_ROWS, CELL_COUNT, GRID_BORDER, GRID_ROWS, GRID_COLS } from '../types/board';

// =============================================================================
// GEOMETRY
// =============================================================================

export {
  CELLS,
  cellAt,
  cellIndexAt,
  cellIndexOf,
  isValidTrianglePosition,
  triangleToGrid,
} from './geometry';
export type { CellGeometry } from './geometry';

// =============================================================================
// BOARDS
// =============================================================================

export {
  FULL_BOARD_MASK,
  STANDARD_START_HOLES,
  DEFAULT_START_HOLE,
  isPegMask,
  assertPegMask,
  createStartingBoard,
  createBoardWithPegs,
  countPegs,
  pegPositions,
  toCellGrid,
} from './boardState';
export type { StandardStartHole } from './boardState';

// =============================================================================
// MOVE RULES
// =============================================================================

export {
  JUMP_DIRECTIONS,
  getJumpLine,
  getJumpLineById,
  isOccupied,
  isLegalJump,
  applyJump,
  enumerateLegalJumps,
  toJumpMove,
} from './moveRules';
export type { JumpDirection, JumpLine } from './moveRules';

// =============================================================================
// SEARCH
// =============================================================================

export { SearchTree } from './searchTree';
export { createSearchContext, explore, solve } from './searchEngine';
export type {
  SearchContext,
  SearchObserver,
  SearchOptions,
  SearchResult,
  SearchVisit,
} from './searchEngine';
export { linkWinningPath, reconstructSolution } from './solutionReconstructor';

// =============================================================================
// NOTATION
// =============================================================================

export {
  PEG_TOKEN,
  HOLE_TOKEN,
  holeNumber,
  positionOfHole,
  formatPosition,
  formatMove,
  formatMoveList,
  formatBoardNotation,
  parseBoardNotation,
} from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  BoardConstraintViolation,
  InvalidState,
  isEngineError,
  isBoardConstraintViolation,
  isInvalidState,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
