import { Board } from './board.js';
import { defaultColor } from './parse.js';
import { Point } from './point.js';
import { triplets } from './solve.js';
import { Color, Stone } from './stone.js';

export interface RenderOptions {
  highlight?: Point;
  // ANSI 256-color index by ordinary glyph.
  palette?: ReadonlyMap<string, number>;
  // Set false to drop escape sequences.
  color?: boolean;
}

const WILD_COLOR = 15;
const SURVIVOR_COLOR = 244;
const TOGGLE_COLOR = 8;

function fg(n: number): string {
  return `\x1b[38;5;${n}m`;
}
const REVERSE = '\x1b[7m';
const RESET = '\x1b[m';

function paint(stone: Stone, palette: ReadonlyMap<string, number>): number|undefined {
  switch (stone.kind) {
    case 'ordinary':
      return palette.get(stone.glyph) ?? defaultColor(Color.index(stone.color));
    case 'wild': return WILD_COLOR;
    case 'survivor': return SURVIVOR_COLOR;
    case 'toggle': return TOGGLE_COLOR;
    case 'empty': return undefined;
  }
}

/** Draws the board in a box, with the turn above and the highlight below. */
export function render(
  board: Board,
  {highlight, palette = new Map(), color = true}: RenderOptions = {},
): string {
  const out = [`Turn ${board.turn}${board.colorLock ? ', color lock' : ''}`];
  const rule = '─'.repeat(2 * board.width + 1);
  out.push(`┌${rule}┐`);
  let y = 0;
  for (const row of board.rows()) {
    const cells = row.map((stone, x) => {
      const glyph = stone.kind === 'empty' ? ' ' : Stone.glyph(stone);
      if (!color) return glyph;
      const n = paint(stone, palette);
      const lit = highlight && Point.equals(highlight, {x, y}) ? REVERSE : '';
      return n == null && !lit ? glyph : `${lit}${n != null ? fg(n) : ''}${glyph}${RESET}`;
    });
    out.push(`│ ${cells.join(' ')} │`);
    y++;
  }
  out.push(`└${rule}┘`);
  if (highlight) out.push(`remove ${Point.show(highlight)}`);
  return out.join('\n');
}

// One line per triplet, numbered from 1.
export function renderMoves(moves: readonly Point[]): string {
  return triplets(moves)
      .map((t, i) => `${i + 1}: ${t.map(Point.show).join(' ')}`)
      .join('\n');
}
