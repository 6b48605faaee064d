import type { BoardSnapshot, PegMask } from '../types/board';
import { assertPegMask, countPegs, toCellGrid } from './boardState';
import { EngineErrorCode, InvalidState } from './errors';
import { getJumpLineById, toJumpMove } from './moveRules';

const NONE = -1;

// Doubles as needed; a full search from the apex hole allocates about
// 1.3 million boards.
const INITIAL_CAPACITY = 1 << 10;

/**
 * Arena holding every board generated by a search.
 *
 * Boards are addressed by index (the root is 0) and stored column-wise in
 * typed arrays. Children of a board form a singly linked sibling list in
 * creation order. `boardNum` is always `index + 1`, matching the creation
 * sequence of the search.
 */
export class SearchTree {
  private length = 0;
  private capacity: number;

  private pegs: Uint16Array;
  private parent: Int32Array;
  private firstChild: Int32Array;
  private lastChild: Int32Array;
  private nextSibling: Int32Array;
  private nextWin: Int32Array;
  // packed JumpLine id, -1 for the root
  private jump: Int8Array;
  private depth: Uint8Array;

  constructor(expectedSize: number = 0) {
    let capacity = INITIAL_CAPACITY;
    while (capacity < expectedSize) {
      capacity <<= 1;
    }
    this.capacity = capacity;
    this.pegs = new Uint16Array(capacity);
    this.parent = new Int32Array(capacity);
    this.firstChild = new Int32Array(capacity);
    this.lastChild = new Int32Array(capacity);
    this.nextSibling = new Int32Array(capacity);
    this.nextWin = new Int32Array(capacity);
    this.jump = new Int8Array(capacity);
    this.depth = new Uint8Array(capacity);
  }

  /** Number of boards in the tree. */
  get size(): number {
    return this.length;
  }

  addRoot(pegs: PegMask): number {
    if (this.length !== 0) {
      throw new InvalidState(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        'Search tree already has a root',
        { size: this.length },
        'SearchTree'
      );
    }
    assertPegMask(pegs);
    return this.append(pegs, NONE, NONE, 0);
  }

  /** Append a board as the last child of `parent`. */
  addChild(parent: number, pegs: PegMask, jumpId: number): number {
    this.assertIndex(parent);
    const index = this.append(pegs, parent, jumpId, this.depth[parent] + 1);
    const last = this.lastChild[parent];
    if (last === NONE) {
      this.firstChild[parent] = index;
    } else {
      this.nextSibling[last] = index;
    }
    this.lastChild[parent] = index;
    return index;
  }

  pegsOf(index: number): PegMask {
    this.assertIndex(index);
    return this.pegs[index];
  }

  parentOf(index: number): number | null {
    this.assertIndex(index);
    return this.optional(this.parent[index]);
  }

  depthOf(index: number): number {
    this.assertIndex(index);
    return this.depth[index];
  }

  boardNumOf(index: number): number {
    this.assertIndex(index);
    return index + 1;
  }

  childrenOf(index: number): number[] {
    this.assertIndex(index);
    const children: number[] = [];
    for (let child = this.firstChild[index]; child !== NONE; child = this.nextSibling[child]) {
      children.push(child);
    }
    return children;
  }

  childCount(index: number): number {
    this.assertIndex(index);
    let count = 0;
    for (let child = this.firstChild[index]; child !== NONE; child = this.nextSibling[child]) {
      count++;
    }
    return count;
  }

  jumpIdOf(index: number): number | null {
    this.assertIndex(index);
    return this.optional(this.jump[index]);
  }

  nextWinOf(index: number): number | null {
    this.assertIndex(index);
    return this.optional(this.nextWin[index]);
  }

  setNextWin(index: number, next: number | null): void {
    this.assertIndex(index);
    if (next !== null) {
      this.assertIndex(next);
    }
    this.nextWin[index] = next ?? NONE;
  }

  snapshot(index: number): BoardSnapshot {
    this.assertIndex(index);
    const pegs = this.pegs[index];
    const jumpId = this.jumpIdOf(index);
    const line = jumpId === null ? null : getJumpLineById(jumpId);
    const { cells, lastMoved } = toCellGrid(pegs, line ? line.to : null);
    return {
      index,
      boardNum: index + 1,
      prev: this.parentOf(index),
      nextWin: this.nextWinOf(index),
      depth: this.depth[index],
      pegs,
      pegCount: countPegs(pegs),
      cells,
      lastMoved,
      move: line ? toJumpMove(line) : null,
    };
  }

  private append(pegs: PegMask, parent: number, jumpId: number, depth: number): number {
    if (this.length === this.capacity) {
      this.grow();
    }
    const index = this.length++;
    this.pegs[index] = pegs;
    this.parent[index] = parent;
    this.firstChild[index] = NONE;
    this.lastChild[index] = NONE;
    this.nextSibling[index] = NONE;
    this.nextWin[index] = NONE;
    this.jump[index] = jumpId;
    this.depth[index] = depth;
    return index;
  }

  private grow(): void {
    const capacity = this.capacity << 1;
    this.pegs = grown(this.pegs, new Uint16Array(capacity));
    this.parent = grown(this.parent, new Int32Array(capacity));
    this.firstChild = grown(this.firstChild, new Int32Array(capacity));
    this.lastChild = grown(this.lastChild, new Int32Array(capacity));
    this.nextSibling = grown(this.nextSibling, new Int32Array(capacity));
    this.nextWin = grown(this.nextWin, new Int32Array(capacity));
    this.jump = grown(this.jump, new Int8Array(capacity));
    this.depth = grown(this.depth, new Uint8Array(capacity));
    this.capacity = capacity;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new InvalidState(
        EngineErrorCode.STATE_BOARD_NOT_FOUND,
        `Board ${index} is not in the search tree`,
        { index, size: this.length },
        'SearchTree'
      );
    }
  }

  private optional(value: number): number | null {
    return value === NONE ? null : value;
  }
}

function grown<T extends { set(array: ArrayLike<number>): void }>(
  current: ArrayLike<number>,
  next: T
): T {
  next.set(current);
  return next;
}
