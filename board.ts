import { Point } from './point.js';
import { Color, Colors, Stone } from './stone.js';

export interface BoardInit {
  width: number;
  // Row-major, (0,0) first.
  stones: readonly Stone[];
  wildColors?: Colors;
  colorLock?: boolean;
  turn?: number;
}

/**
 * Everything needed to reverse one {@link Board.remove}.  Records must be
 * undone in exactly the reverse order they were made.
 */
export interface Undo {
  readonly index: number;
  readonly stone: Stone;
  // Color taken from the wild colors, or Color.WILD if none.
  readonly wildColor: Color;
  // Survivors cleared by the row cascade.
  readonly survivors: readonly number[];
  // Turn on which the removal was played.
  readonly turn: number;
}

/** The state of a board during a particular turn.  Mutated in place. */
export class Board {
  readonly width: number;
  readonly height: number;

  /**
   * Whether two same-colored triplets may be played back to back.  Stored
   * with the puzzle but not consulted by the solver.
   */
  readonly colorLock: boolean;

  private readonly grid: Stone[];
  private turnCount: number;
  private wild: Colors;
  private removable = 0;

  constructor({width, stones, wildColors = Colors.NONE, colorLock = false, turn = 0}: BoardInit) {
    if (!Number.isInteger(width) || width <= 0) throw new Error(`bad width: ${width}`);
    if (!stones.length || stones.length % width) {
      throw new Error(`bad grid: ${stones.length} stones for width ${width}`);
    }
    let wilds = 0;
    for (const s of stones) {
      if (s.kind === 'ordinary' && !Color.isValid(s.color)) {
        throw new Error(`bad color for ${s.glyph}: ${s.color}`);
      }
      if (s.kind === 'wild') wilds++;
      if (Stone.isRemovable(s)) this.removable++;
    }
    if (wilds !== Colors.count(wildColors)) {
      throw new Error(`${wilds} wild stones but ${Colors.count(wildColors)} wild colors`);
    }
    this.width = width;
    this.height = stones.length / width;
    this.grid = [...stones];
    this.wild = wildColors;
    this.colorLock = colorLock;
    this.turnCount = turn;
  }

  get turn(): number {
    return this.turnCount;
  }

  // Colors still available to wild stones.
  get wildColors(): Colors {
    return this.wild;
  }

  removableStones(): number {
    return this.removable;
  }

  isSolved(): boolean {
    return this.removable === 0;
  }

  contains({x, y}: Point): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
        x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /** The stone as it currently behaves (toggles resolved for this turn). */
  stoneAt(p: Point): Stone {
    return Stone.forTurn(this.grid[this.index(p)], this.turnCount);
  }

  /** The stone as stored, toggles at their initial phase. */
  rawStoneAt(p: Point): Stone {
    return this.grid[this.index(p)];
  }

  // Snapshot of the stored grid, row-major.
  stones(): Stone[] {
    return [...this.grid];
  }

  *rows(): IterableIterator<Stone[]> {
    for (let y = 0; y < this.height; y++) {
      const row: Stone[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(this.stoneAt({x, y}));
      }
      yield row;
    }
  }

  /**
   * Removes the stone at `p`, asserting `color` (Color.WILD for no
   * assertion on ordinary stones).  A wild stone must be given one of the
   * remaining wild colors, which it claims.  Throws if the removal is not
   * legal: the solver only ever asks for legal moves.
   */
  remove(p: Point, color: Color): Undo {
    const index = this.index(p);
    const stone = this.grid[index];
    const current = Stone.forTurn(stone, this.turnCount);
    let wildColor = Color.WILD;
    switch (current.kind) {
      case 'ordinary':
        if (color !== Color.WILD && color !== current.color) {
          throw new Error(`color ${color} does not match ${current.glyph} at ${Point.show(p)}`);
        }
        break;
      case 'wild':
        if (!Color.isValid(color) || !Colors.has(this.wild, color)) {
          throw new Error(`color ${color} not available to wild stone at ${Point.show(p)}`);
        }
        wildColor = color;
        this.wild = Colors.remove(this.wild, color);
        break;
      default:
        throw new Error(`cannot remove ${Stone.glyph(current)} at ${Point.show(p)}`);
    }
    const turn = this.turnCount;
    const survivors = this.take(index);
    return {index, stone, wildColor, survivors, turn};
  }

  undo(u: Undo): void {
    if (u.turn !== this.turnCount - 1) {
      throw new Error(`undo out of order: move from turn ${u.turn} on turn ${this.turnCount}`);
    }
    if (this.grid[u.index].kind !== 'empty') {
      throw new Error(`undo onto occupied cell ${u.index}`);
    }
    for (const i of u.survivors) {
      this.grid[i] = Stone.SURVIVOR;
    }
    this.grid[u.index] = u.stone;
    if (u.wildColor !== Color.WILD) this.wild = Colors.add(this.wild, u.wildColor);
    this.removable++;
    this.turnCount--;
  }

  /**
   * Removes the stone at `p` for good, with no undo and no wild color
   * bookkeeping.  For stepping through a finished solution only.
   */
  forceRemove(p: Point): void {
    const index = this.index(p);
    const current = this.stoneAt(p);
    if (!Stone.isRemovable(current)) {
      throw new Error(`cannot remove ${Stone.glyph(current)} at ${Point.show(p)}`);
    }
    this.take(index);
  }

  private index(p: Point): number {
    if (!this.contains(p)) throw new Error(`off board: ${Point.show(p)}`);
    return p.y * this.width + p.x;
  }

  // Empties a removable stone, advances the turn, and runs the cascade.
  private take(index: number): number[] {
    this.grid[index] = Stone.EMPTY;
    this.removable--;
    this.turnCount++;
    return this.cascade(Math.floor(index / this.width));
  }

  // Clears the survivors in a row once nothing removable is left in it.
  private cascade(y: number): number[] {
    const start = y * this.width;
    const end = start + this.width;
    for (let i = start; i < end; i++) {
      if (Stone.isRemovable(this.grid[i])) return [];
    }
    const cleared: number[] = [];
    for (let i = start; i < end; i++) {
      if (this.grid[i].kind !== 'survivor') continue;
      this.grid[i] = Stone.EMPTY;
      cleared.push(i);
    }
    return cleared;
  }
}
