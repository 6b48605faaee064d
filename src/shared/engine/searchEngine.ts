import type { BoardSnapshot, PegMask } from '../types/board';
import { assertPegMask, countPegs } from './boardState';
import { applyJump, enumerateLegalJumps } from './moveRules';
import { SearchTree } from './searchTree';
import { reconstructSolution } from './solutionReconstructor';

/**
 * Exhaustive depth-first search over every sequence of jumps.
 *
 * There is no transposition table: two jump orders that reach the same
 * occupancy are two boards. Every jump removes a peg, so the recursion is at
 * most 13 levels deep below the root.
 */

/** Passed to the observer on entry to every board, before its children are generated. */
export interface SearchVisit {
  index: number;
  boardNum: number;
  /** boardNum of the predecessor, 0 for the root. */
  prevBoardNum: number;
  /** Recursion depth at entry; the root is visited at depth 0. */
  depth: number;
  pegCount: number;
  isWinner: boolean;
}

export type SearchObserver = (visit: SearchVisit, tree: SearchTree) => void;

/**
 * Mutable state threaded through the recursion.
 */
export interface SearchContext {
  tree: SearchTree;
  /** Boards created so far, the root included. */
  totalBoards: number;
  /** Boards reached with exactly one peg left. */
  totalWinningBoards: number;
  depth: number;
  /** First winning board reached, in search order. */
  winningBoard: number | null;
  observer?: SearchObserver;
}

export interface SearchOptions {
  observer?: SearchObserver;
  /** Capacity hint for the board arena. */
  expectedBoards?: number;
}

export interface SearchResult {
  tree: SearchTree;
  root: number;
  totalBoards: number;
  totalWinningBoards: number;
  winningBoard: number | null;
  /** Boards from the root to the first winning board; empty when unsolved. */
  solution: BoardSnapshot[];
}

/** Fresh context whose tree holds only the root board (index 0). */
export function createSearchContext(start: PegMask, options: SearchOptions = {}): SearchContext {
  assertPegMask(start);
  const tree = new SearchTree(options.expectedBoards);
  tree.addRoot(start);
  return {
    tree,
    totalBoards: 1,
    totalWinningBoards: 0,
    depth: 0,
    winningBoard: null,
    observer: options.observer,
  };
}

/**
 * Generate every child of `index`, recursing into each child as soon as it
 * is created.
 *
 * @returns whether at least one legal jump existed from the board. A dead
 * end returns false whether or not it is a winning board.
 */
export function explore(context: SearchContext, index: number): boolean {
  const { tree } = context;
  const pegs = tree.pegsOf(index);
  const pegCount = countPegs(pegs);
  const isWinner = pegCount === 1;

  if (context.observer) {
    const parent = tree.parentOf(index);
    context.observer(
      {
        index,
        boardNum: tree.boardNumOf(index),
        prevBoardNum: parent === null ? 0 : tree.boardNumOf(parent),
        depth: context.depth,
        pegCount,
        isWinner,
      },
      tree
    );
  }

  context.depth++;

  if (isWinner) {
    if (context.winningBoard === null) {
      context.winningBoard = index;
    }
    context.totalWinningBoards++;
  }

  // The parent's occupancy never changes while its children are explored,
  // so listing the jumps up front keeps the cell/direction order.
  const jumps = enumerateLegalJumps(pegs);
  for (const line of jumps) {
    const child = tree.addChild(index, applyJump(pegs, line), line.id);
    context.totalBoards++;
    explore(context, child);
  }

  context.depth--;

  return jumps.length > 0;
}

/**
 * Search every jump sequence from `start` and reconstruct the first winning
 * line found.
 */
export function solve(start: PegMask, options: SearchOptions = {}): SearchResult {
  const context = createSearchContext(start, options);
  const root = 0;
  explore(context, root);

  return {
    tree: context.tree,
    root,
    totalBoards: context.totalBoards,
    totalWinningBoards: context.totalWinningBoards,
    winningBoard: context.winningBoard,
    solution: reconstructSolution(context.tree, context.winningBoard),
  };
}
