import type { BoardSnapshot } from '../types/board';
import type { SearchTree } from './searchTree';

/**
 * Link the winning path forward and read it back from the root.
 *
 * Walking `prev` from the winning board to the root, each parent's `nextWin`
 * is pointed at the child the walk came from. The forward walk then follows
 * `nextWin` from the root until a board without one, which is the winning
 * board itself. A winning root yields a one-board path.
 */
export function linkWinningPath(tree: SearchTree, winningBoard: number): number[] {
  tree.setNextWin(winningBoard, null);

  let current = winningBoard;
  let parent = tree.parentOf(current);
  while (parent !== null) {
    tree.setNextWin(parent, current);
    current = parent;
    parent = tree.parentOf(current);
  }

  const path: number[] = [];
  for (let cursor: number | null = current; cursor !== null; cursor = tree.nextWinOf(cursor)) {
    path.push(cursor);
  }
  return path;
}

/**
 * Ordered boards from the root to `winningBoard`, or an empty list when the
 * search found no winning board.
 */
export function reconstructSolution(
  tree: SearchTree,
  winningBoard: number | null
): BoardSnapshot[] {
  if (winningBoard === null) {
    return [];
  }
  return linkWinningPath(tree, winningBoard).map((index) => tree.snapshot(index));
}
