/**
 * Test suite for src/shared/engine/searchEngine.ts
 *
 * Small hand-built boards pin down visit order and counting; the full
 * searches from the standard starting holes pin down the totals and the
 * first winning line.
 */

import {
  createSearchContext,
  explore,
  solve,
  type SearchResult,
  type SearchVisit,
} from '../../../src/shared/engine/searchEngine';
import {
  DEFAULT_START_HOLE,
  STANDARD_START_HOLES,
  countPegs,
  createBoardWithPegs,
  createStartingBoard,
} from '../../../src/shared/engine/boardState';
import { applyJump, getJumpLineById, isLegalJump } from '../../../src/shared/engine/moveRules';
import { formatMove, positionOfHole } from '../../../src/shared/engine/notation';
import type { JumpMove } from '../../../src/shared/types/board';

function solutionMoves(result: SearchResult): string[] {
  return result.solution
    .map((board) => board.move)
    .filter((move): move is JumpMove => move !== null)
    .map(formatMove);
}

describe('searchEngine', () => {
  describe('small boards', () => {
    const twoAndFour = createBoardWithPegs([positionOfHole(2), positionOfHole(4)]);

    it('should explore both jumps from holes 2 and 4', () => {
      const result = solve(twoAndFour);
      expect(result.totalBoards).toBe(3);
      expect(result.totalWinningBoards).toBe(2);
      expect(result.winningBoard).toBe(1);
      expect(result.solution.map((board) => board.pegs)).toEqual([10, 64]);
      expect(solutionMoves(result)).toEqual(['2-7']);
    });

    it('should report every board to the observer in creation order', () => {
      const visits: SearchVisit[] = [];
      solve(twoAndFour, { observer: (visit) => visits.push(visit) });
      expect(visits).toEqual([
        { index: 0, boardNum: 1, prevBoardNum: 0, depth: 0, pegCount: 2, isWinner: false },
        { index: 1, boardNum: 2, prevBoardNum: 1, depth: 1, pegCount: 1, isWinner: true },
        { index: 2, boardNum: 3, prevBoardNum: 1, depth: 1, pegCount: 1, isWinner: true },
      ]);
    });

    it('should hand the observer the live tree', () => {
      const sizes: number[] = [];
      solve(twoAndFour, { observer: (_visit, tree) => sizes.push(tree.size) });
      expect(sizes).toEqual([1, 2, 3]);
    });

    it('should find nothing when no jump is possible', () => {
      const result = solve(createBoardWithPegs([positionOfHole(1), positionOfHole(11)]));
      expect(result.totalBoards).toBe(1);
      expect(result.totalWinningBoards).toBe(0);
      expect(result.winningBoard).toBeNull();
      expect(result.solution).toEqual([]);
    });

    it('should count a lone peg as an immediate win', () => {
      const result = solve(createBoardWithPegs([positionOfHole(5)]));
      expect(result.totalBoards).toBe(1);
      expect(result.totalWinningBoards).toBe(1);
      expect(result.winningBoard).toBe(0);
      expect(result.solution).toHaveLength(1);
      expect(result.solution[0].move).toBeNull();
    });

    it('should reject a start that is not a peg mask', () => {
      expect(() => solve(-3)).toThrow('-3 is not a peg mask for a 15-hole board');
    });
  });

  describe('explore', () => {
    it('should report whether any jump existed', () => {
      const withJumps = createSearchContext(10);
      expect(explore(withJumps, 0)).toBe(true);
      expect(withJumps.depth).toBe(0);
      expect(withJumps.totalBoards).toBe(3);

      expect(explore(createSearchContext(1025), 0)).toBe(false);
      expect(explore(createSearchContext(16), 0)).toBe(false);
    });

    it('should start a context with just the root', () => {
      const context = createSearchContext(32766);
      expect(context.tree.size).toBe(1);
      expect(context.totalBoards).toBe(1);
      expect(context.totalWinningBoards).toBe(0);
      expect(context.winningBoard).toBeNull();
    });
  });

  describe('apex start', () => {
    let result: SearchResult;

    beforeAll(() => {
      result = solve(createStartingBoard(STANDARD_START_HOLES.apex));
    });

    it('should generate every board of the game tree', () => {
      expect(result.totalBoards).toBe(1293179);
      expect(result.tree.size).toBe(1293179);
      expect(result.totalWinningBoards).toBe(29760);
    });

    it('should find the first winning line in search order', () => {
      expect(solutionMoves(result)).toEqual([
        '4-1',
        '6-4',
        '1-6',
        '7-2',
        '10-3',
        '12-5',
        '13-6',
        '2-9',
        '3-10',
        '15-6',
        '6-13',
        '14-12',
        '11-13',
      ]);
      expect(result.solution).toHaveLength(14);
      expect(result.solution[13].pegs).toBe(4096);
    });
  });

  describe('default start (hole 5)', () => {
    let result: SearchResult;

    beforeAll(() => {
      result = solve(createStartingBoard(DEFAULT_START_HOLE));
    });

    it('should generate 323873 boards with 1550 winners', () => {
      expect(result.totalBoards).toBe(323873);
      expect(result.totalWinningBoards).toBe(1550);
    });

    it('should find the first winning line in search order', () => {
      expect(solutionMoves(result)).toEqual([
        '12-5',
        '10-8',
        '2-9',
        '3-10',
        '7-2',
        '1-4',
        '14-12',
        '4-13',
        '12-14',
        '15-6',
        '6-13',
        '14-12',
        '11-13',
      ]);
    });

    it('should make every child one legal jump from its parent', () => {
      const { tree } = result;
      for (let index = 1; index < tree.size; index++) {
        const parent = tree.parentOf(index);
        const jumpId = tree.jumpIdOf(index);
        if (parent === null || jumpId === null) {
          throw new Error(`board ${index} has no parent or jump`);
        }
        const line = getJumpLineById(jumpId);
        if (line === null) {
          throw new Error(`board ${index} has unknown jump ${jumpId}`);
        }
        const parentPegs = tree.pegsOf(parent);
        if (
          !isLegalJump(parentPegs, line) ||
          applyJump(parentPegs, line) !== tree.pegsOf(index) ||
          tree.depthOf(index) !== tree.depthOf(parent) + 1 ||
          parent >= index
        ) {
          throw new Error(`board ${index} does not follow from board ${parent}`);
        }
      }
    });

    it('should give every board one fewer peg than its parent', () => {
      const { tree } = result;
      let mismatches = 0;
      let winners = 0;
      for (let index = 0; index < tree.size; index++) {
        const pegs = countPegs(tree.pegsOf(index));
        if (pegs === 1) winners++;
        if (pegs !== 14 - tree.depthOf(index)) mismatches++;
      }
      expect(mismatches).toBe(0);
      expect(winners).toBe(result.totalWinningBoards);
    });

    it('should account for every board as a child of exactly one parent', () => {
      const { tree } = result;
      let children = 0;
      for (let index = 0; index < tree.size; index++) {
        children += tree.childCount(index);
      }
      expect(children).toBe(tree.size - 1);
    });

    it('should chain the solution from root to winner', () => {
      const { solution } = result;
      expect(solution[0].index).toBe(0);
      expect(solution[0].prev).toBeNull();
      solution.forEach((board, i) => {
        expect(board.depth).toBe(i);
        expect(board.pegCount).toBe(14 - i);
        if (i > 0) {
          expect(board.prev).toBe(solution[i - 1].index);
          expect(solution[i - 1].nextWin).toBe(board.index);
        }
      });
      expect(solution[solution.length - 1].index).toBe(result.winningBoard);
      expect(solution[solution.length - 1].nextWin).toBeNull();
    });

    it('should return the same result on a second run', () => {
      const again = solve(createStartingBoard(DEFAULT_START_HOLE));
      expect(again.totalBoards).toBe(result.totalBoards);
      expect(again.totalWinningBoards).toBe(result.totalWinningBoards);
      expect(again.winningBoard).toBe(result.winningBoard);
      expect(solutionMoves(again)).toEqual(solutionMoves(result));
    });
  });

  it('should visit boards in boardNum order with the entry depth', () => {
    let expected = 1;
    let outOfOrder = 0;
    let depthMismatch = 0;
    const result = solve(createStartingBoard(DEFAULT_START_HOLE), {
      observer: (visit, tree) => {
        if (visit.boardNum !== expected) outOfOrder++;
        if (visit.depth !== tree.depthOf(visit.index)) depthMismatch++;
        expected++;
      },
    });
    expect(outOfOrder).toBe(0);
    expect(depthMismatch).toBe(0);
    expect(expected - 1).toBe(result.totalBoards);
  });

  describe('row 2 starts', () => {
    it('should solve the left hole of row 2 with 7-2 first', () => {
      const result = solve(createStartingBoard(STANDARD_START_HOLES.rowTwoLeft));
      expect(result.totalBoards).toBe(671085);
      expect(result.totalWinningBoards).toBe(14880);
      expect(solutionMoves(result)).toEqual([
        '7-2',
        '1-4',
        '9-2',
        '2-7',
        '11-4',
        '12-5',
        '3-8',
        '10-3',
        '14-12',
        '12-5',
        '4-6',
        '3-10',
        '15-6',
      ]);
    });

    it('should solve the right hole of row 2 with 10-3 first', () => {
      const result = solve(createStartingBoard({ row: 2, position: 2 }));
      expect(result.totalBoards).toBe(671085);
      expect(result.totalWinningBoards).toBe(14880);
      expect(solutionMoves(result)).toEqual([
        '10-3',
        '1-6',
        '8-3',
        '3-10',
        '14-5',
        '2-9',
        '7-2',
        '10-8',
        '12-14',
        '15-13',
        '13-4',
        '2-7',
        '11-4',
      ]);
    });
  });

  describe('every starting hole', () => {
    it.each([
      [1, 1293179, 29760],
      [2, 671085, 14880],
      [3, 671085, 14880],
      [4, 2592133, 85258],
      [5, 323873, 1550],
      [6, 2592133, 85258],
      [7, 671085, 14880],
      [8, 323873, 1550],
      [9, 323873, 1550],
      [10, 671085, 14880],
      [11, 1293179, 29760],
      [12, 671085, 14880],
      [13, 2592133, 85258],
      [14, 671085, 14880],
      [15, 1293179, 29760],
    ])('hole %i: %i boards, %i winners', (hole, boards, winners) => {
      const result = solve(createStartingBoard(positionOfHole(hole)));
      expect(result.totalBoards).toBe(boards);
      expect(result.totalWinningBoards).toBe(winners);
      expect(result.solution).toHaveLength(14);
      expect(result.solution[13].pegCount).toBe(1);
    });
  });
});
