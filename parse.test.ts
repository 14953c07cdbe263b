import { describe, expect, it } from 'vitest';
import { ParseError, ParseErrorKind, format, parse } from './parse.js';
import { Color, Stone } from './stone.js';

function failure(text: string): {kind: ParseErrorKind, line?: number} {
  try {
    parse(text);
  } catch (e) {
    if (e instanceof ParseError) return {kind: e.kind, line: e.line};
    throw e;
  }
  throw new Error('parsed without error');
}

const SAMPLE = `; a small board
width: 3
wild: B
lock: true
G: 28

R G *
R G .
`;

describe('parse', () => {
  it('reads the legend and grid', () => {
    const {board, glyphs, palette} = parse(SAMPLE);
    expect(board.width).toBe(3);
    expect(board.height).toBe(2);
    expect(board.colorLock).toBe(true);
    expect(glyphs).toEqual(['R', 'G', 'B']);
    // B appears only as a wild color, so it takes the next bit.
    expect(board.wildColors).toBe(Color.of(2));
    expect(palette).toEqual(new Map([['R', 9], ['G', 28], ['B', 12]]));
    expect(board.stones()).toEqual([
      Stone.ordinary('R', Color.of(0)), Stone.ordinary('G', Color.of(1)), Stone.WILD,
      Stone.ordinary('R', Color.of(0)), Stone.ordinary('G', Color.of(1)), Stone.EMPTY,
    ]);
  });

  it('reads the special stones', () => {
    const {board} = parse('width: 5\nwild: R\n.#*OX');
    expect(board.stones()).toEqual([Stone.EMPTY, Stone.SURVIVOR, Stone.WILD, Stone.OPEN, Stone.CLOSED]);
    expect(board.colorLock).toBe(false);
  });

  it('reports malformed legend lines', () => {
    expect(failure(': 3\nR')).toEqual({kind: 'syntax', line: 1});
    expect(failure('width: 1\nR\nlock: true')).toEqual({kind: 'syntax', line: 3});
  });

  it('reports bad properties', () => {
    expect(failure('width: 0\nR')).toEqual({kind: 'property', line: 1});
    expect(failure('width: two\nR')).toEqual({kind: 'property', line: 1});
    expect(failure('width: 1\nheight: 3\nR')).toEqual({kind: 'property', line: 2});
    expect(failure('width: 1\nlock: yes\nR')).toEqual({kind: 'property', line: 2});
    expect(failure('width: 1\nwild: RR\nR')).toEqual({kind: 'property', line: 2});
    expect(failure('width: 1\nO: 3\nR')).toEqual({kind: 'property', line: 2});
    expect(failure('width: 1\nR: 300\nR')).toEqual({kind: 'property', line: 2});
    expect(failure('R R R')).toEqual({kind: 'property', line: undefined});
  });

  it('reports unknown stones', () => {
    expect(failure('width: 1\n\nR\n!')).toEqual({kind: 'glyph', line: 4});
  });

  it('reports more than 32 colors', () => {
    const glyphs = 'ABCDEFGHIJKLMNPQRSTUVWYZabcdefghi';
    expect(glyphs.length).toBe(33);
    expect(failure(`width: 33\n${glyphs}`)).toEqual({kind: 'colors', line: 2});
  });

  it('reports wild stones without wild colors', () => {
    expect(failure('width: 2\nwild: R\nRR')).toEqual({kind: 'wild', line: undefined});
    expect(failure('width: 1\n*')).toEqual({kind: 'wild', line: undefined});
  });

  it('reports an incomplete grid', () => {
    expect(failure('width: 2\nRRR')).toEqual({kind: 'grid', line: undefined});
    expect(failure('width: 2\n; nothing here\n')).toEqual({kind: 'grid', line: undefined});
  });

  it('puts the line number in the message', () => {
    expect(() => parse('width: 1\n?')).toThrow('line 2: unknown stone: ?');
  });
});

describe('format', () => {
  it('writes a board back out', () => {
    expect(format(parse(SAMPLE))).toBe('width: 3\nwild: B\nlock: true\nG: 28\nRG*\nRG.\n');
  });

  it('writes toggles as they stand this turn', () => {
    const puzzle = parse('width: 2\nRX');
    puzzle.board.forceRemove({x: 0, y: 0});
    expect(format(puzzle)).toBe('width: 2\n.O\n');
  });
});
