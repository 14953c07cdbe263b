import { Board } from './board.js';
import { Color, Colors, Stone } from './stone.js';

// Board files: a legend of `key: value` lines, then the grid.
//
//   ; comment
//   width: 4
//   wild: RG
//   lock: false
//   R: 196
//   R G * .
//   R G X O
//
// Whitespace in the grid is ignored.  `.` is empty, `#` a survivor, `*` wild,
// `O`/`X` a toggle that starts open/closed, and any other letter or digit an
// ordinary stone.

export type ParseErrorKind =
  // malformed legend line
  | 'syntax'
  // unknown property or bad value
  | 'property'
  // unknown stone character
  | 'glyph'
  // more than 32 colors
  | 'colors'
  // wild stones don't match wild colors
  | 'wild'
  // empty or ragged grid
  | 'grid';

export class ParseError extends Error {
  constructor(readonly kind: ParseErrorKind, message: string, readonly line?: number) {
    super(line != null ? `line ${line}: ${message}` : message);
    this.name = 'ParseError';
  }
}

export interface Puzzle {
  readonly board: Board;
  // Glyph for each color, by bit index.
  readonly glyphs: readonly string[];
  // ANSI 256-color index for each glyph.
  readonly palette: ReadonlyMap<string, number>;
}

export const MAX_COLORS = 32;

const DEFAULT_PALETTE = [9, 10, 12, 11, 13, 14, 208, 15, 1, 2, 4, 3, 5, 6, 130, 7];

export function defaultColor(index: number): number {
  return DEFAULT_PALETTE[index % DEFAULT_PALETTE.length];
}

const SPECIAL: ReadonlyMap<string, Stone> = new Map([
  ['.', Stone.EMPTY],
  ['#', Stone.SURVIVOR],
  ['*', Stone.WILD],
  ['O', Stone.OPEN],
  ['X', Stone.CLOSED],
]);

function isOrdinaryGlyph(c: string): boolean {
  return /^[A-Za-z0-9]$/.test(c) && !SPECIAL.has(c);
}

export function parse(text: string): Puzzle {
  const lines = text.split(/\r?\n/);
  let width: number|undefined;
  let wild = '';
  let colorLock = false;
  const overrides = new Map<string, number>();

  let i = 0;
  for (; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith(';')) continue;
    const colon = line.indexOf(':');
    if (colon < 0) break;
    const key = line.substring(0, colon).trim();
    const value = line.substring(colon + 1).trim();
    const n = i + 1;
    if (!key) throw new ParseError('syntax', `missing property name: ${line}`, n);
    if (key === 'width') {
      if (!/^\d+$/.test(value) || !Number(value)) {
        throw new ParseError('property', `bad width: ${value}`, n);
      }
      width = Number(value);
    } else if (key === 'wild') {
      for (const c of value) {
        if (!isOrdinaryGlyph(c) || wild.includes(c)) {
          throw new ParseError('property', `bad wild color: ${c}`, n);
        }
        wild += c;
      }
    } else if (key === 'lock') {
      if (value !== 'true' && value !== 'false') {
        throw new ParseError('property', `bad lock: ${value}`, n);
      }
      colorLock = value === 'true';
    } else if (key.length === 1) {
      if (!isOrdinaryGlyph(key)) throw new ParseError('property', `cannot color ${key}`, n);
      if (!/^\d+$/.test(value) || Number(value) > 255) {
        throw new ParseError('property', `bad color for ${key}: ${value}`, n);
      }
      overrides.set(key, Number(value));
    } else {
      throw new ParseError('property', `unknown property: ${key}`, n);
    }
  }
  if (width == null) throw new ParseError('property', 'missing width');

  const colors = new Map<string, Color>();
  const glyphs: string[] = [];
  function colorFor(glyph: string, line?: number): Color {
    let c = colors.get(glyph);
    if (c == null) {
      if (glyphs.length >= MAX_COLORS) {
        throw new ParseError('colors', `more than ${MAX_COLORS} colors`, line);
      }
      c = Color.of(glyphs.length);
      colors.set(glyph, c);
      glyphs.push(glyph);
    }
    return c;
  }

  const stones: Stone[] = [];
  let wilds = 0;
  for (; i < lines.length; i++) {
    const line = lines[i].trim();
    const n = i + 1;
    if (!line || line.startsWith(';')) continue;
    if (line.includes(':')) throw new ParseError('syntax', `legend line inside grid: ${line}`, n);
    for (const c of line.replace(/\s+/g, '')) {
      const special = SPECIAL.get(c);
      if (special) {
        if (special.kind === 'wild') wilds++;
        stones.push(special);
      } else if (isOrdinaryGlyph(c)) {
        stones.push(Stone.ordinary(c, colorFor(c, n)));
      } else {
        throw new ParseError('glyph', `unknown stone: ${c}`, n);
      }
    }
  }
  if (!stones.length) throw new ParseError('grid', 'empty grid');
  if (stones.length % width) {
    throw new ParseError('grid', `${stones.length} stones do not fill rows of ${width}`);
  }

  let wildColors = Colors.NONE;
  for (const c of wild) {
    wildColors = Colors.add(wildColors, colorFor(c));
  }
  if (wilds !== wild.length) {
    throw new ParseError('wild', `${wilds} wild stones but ${wild.length} wild colors`);
  }

  const palette = new Map<string, number>();
  glyphs.forEach((g, index) => palette.set(g, overrides.get(g) ?? defaultColor(index)));
  const board = new Board({width, stones, wildColors, colorLock});
  return {board, glyphs, palette};
}

/** Writes the board, as it stands this turn, back out as a board file. */
export function format({board, glyphs, palette}: Puzzle): string {
  const out = [`width: ${board.width}`];
  const wild = Colors.split(board.wildColors).map(c => glyphs[Color.index(c)]);
  if (wild.length) out.push(`wild: ${wild.join('')}`);
  if (board.colorLock) out.push('lock: true');
  glyphs.forEach((g, index) => {
    const ansi = palette.get(g);
    if (ansi != null && ansi !== defaultColor(index)) out.push(`${g}: ${ansi}`);
  });
  for (const row of board.rows()) {
    out.push(row.map(Stone.glyph).join(''));
  }
  return out.join('\n') + '\n';
}
