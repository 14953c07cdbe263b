import { Board, Undo } from './board.js';
import { Point } from './point.js';
import { Color, Colors, Stone } from './stone.js';

export interface SolveStats {
  // Positions visited, counting the starting one.
  positions: number;
}

export interface SolveOptions {
  stats?: SolveStats;
}

/**
 * Computes the frontier: the stones that can be reached this turn and that
 * pass the color filter.  At most one per column, in column order.  A wild
 * stone qualifies if `allowWild` and it can still take `color`.
 */
export function frontier(board: Board, color: Color, allowWild: boolean): Point[] {
  const out: Point[] = [];
  for (let x = 0; x < board.width; x++) {
    column: for (let y = board.height - 1; y >= 0; y--) {
      const p = {x, y};
      const stone = board.stoneAt(p);
      switch (stone.kind) {
        case 'empty':
        case 'survivor':
          continue;
        case 'ordinary':
          if (color === Color.WILD || stone.color === color) out.push(p);
          break column;
        case 'wild':
          if (allowWild && (color === Color.WILD || Colors.has(board.wildColors, color))) {
            out.push(p);
          }
          break column;
        case 'toggle':
          if (Stone.isOpen(stone)) continue;
          break column;
      }
    }
  }
  return out;
}

/**
 * Solves the board.  Returns the moves that clear it, or undefined if there
 * is no solution.  The board is left as it was found.
 *
 * A wild stone that opens a triplet commits to one of the board's wild
 * colors, trying each in turn, and the rest of the triplet must match it.
 * So `width: 2\nwild: G\n.R\n*R` has no solution: the wild stone can only
 * be green.
 */
export function solve(board: Board, {stats}: SolveOptions = {}): Point[]|undefined {
  const moves: Point[] = [];
  const undos: Undo[] = [];
  // Every move takes exactly one removable stone.
  if (board.removableStones() % 3) return undefined;
  if (!search(Color.WILD, true)) return undefined;
  if (moves.length % 3) throw new Error(`incomplete triplet: ${moves.length} moves`);
  return moves;

  function search(color: Color, allowWild: boolean): boolean {
    if (stats) stats.positions++;
    // Let the callers restore the board.
    if (board.isSolved()) return moves.length % 3 === 0;
    for (const p of frontier(board, color, allowWild)) {
      const stone = board.stoneAt(p);
      // A wild stone opening a triplet commits to each wild color in turn.
      const choices =
          stone.kind === 'wild' && color === Color.WILD ?
              Colors.split(board.wildColors) : [color];
      for (const choice of choices) {
        undos.push(board.remove(p, choice));
        moves.push(p);
        // A finished triplet frees the next one; otherwise stay on color.
        const done = moves.length % 3 === 0;
        const next = done ? Color.WILD : stone.kind === 'ordinary' ? stone.color : choice;
        const nextWild = done || (stone.kind === 'ordinary' && allowWild);
        const solved = search(next, nextWild);
        board.undo(pop(undos));
        if (solved) return true;
        moves.pop();
      }
    }
    return false;
  }
}

// Splits a solution into its triplets.
export function triplets(moves: readonly Point[]): Point[][] {
  const out: Point[][] = [];
  for (let i = 0; i < moves.length; i += 3) {
    out.push(moves.slice(i, i + 3));
  }
  return out;
}

function pop<T>(stack: T[]): T {
  const top = stack.pop();
  if (top === undefined) throw new Error('undo stack underflow');
  return top;
}
