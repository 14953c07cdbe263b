import { Readable, Writable } from 'node:stream';
import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Exit, UsageError, main, parseArgs } from './main.js';
import { format, parse } from './parse.js';
import { encode } from './share.js';

describe('parseArgs', () => {
  it('reads flags and the board file', () => {
    expect(parseArgs(['--stats', 'board.txt']))
        .toEqual({stats: true, share: false, all: false, file: 'board.txt'});
    expect(parseArgs(['--all', '--code', 'abc']))
        .toEqual({stats: false, share: false, all: true, code: 'abc'});
  });

  it('rejects bad usage', () => {
    expect(() => parseArgs([])).toThrow(UsageError);
    expect(() => parseArgs(['--code'])).toThrow('--code needs a value');
    expect(() => parseArgs(['a.txt', 'b.txt'])).toThrow('unexpected argument: b.txt');
    expect(() => parseArgs(['--bogus', 'a.txt'])).toThrow('unknown flag: --bogus');
    expect(() => parseArgs(['a.txt', '--code', 'abc'])).toThrow(UsageError);
  });
});

describe('main', () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits distinctly for each failure', async () => {
    expect(await main([])).toBe(Exit.USAGE);
    expect(await main(['/nonexistent/board.txt'])).toBe(Exit.NOT_FOUND);
    expect(error).toHaveBeenCalledWith('no such file: /nonexistent/board.txt');
    expect(await main(['--code', ''])).toBe(Exit.PARSE);
    expect(await main(['--code', encode('width: 1\n!')])).toBe(Exit.PARSE);
    expect(error).toHaveBeenLastCalledWith('share code: line 2: unknown stone: !');
  });

  it('prints a share code', async () => {
    const text = 'width: 3\n; columns\nRGB\nRGB\nRGB\n';
    expect(await main(['--share', '--code', encode(text)])).toBe(Exit.OK);
    expect(log).toHaveBeenCalledOnce();
    expect(log).toHaveBeenCalledWith(encode(format(parse(text))));
  });

  it('reports an unsolvable board', async () => {
    expect(await main(['--code', encode('width: 2\nRR\nRR\nGR')])).toBe(Exit.OK);
    expect(log).toHaveBeenCalledWith('\x1b[38;5;11mNo solution exists.\x1b[m');
  });

  it('steps through every move', async () => {
    expect(await main(['--all', '--code', encode('width: 3\nRGB\nRGB\nRGB')])).toBe(Exit.OK);
    expect(log).toHaveBeenCalledTimes(11);
    expect(log.mock.calls[0]).toEqual([
      '1: (0, 2) (0, 1) (0, 0)\n2: (1, 2) (1, 1) (1, 0)\n3: (2, 2) (2, 1) (2, 0)\n',
    ]);
    expect(log.mock.calls[10]).toEqual([[
      'Turn 9',
      '┌───────┐',
      '│       │',
      '│       │',
      '│       │',
      '└───────┘',
    ].join('\n')]);
  });

  it('finishes the steps when input ends', async () => {
    const sink = new Writable({write(_chunk, _encoding, done) { done(); }});
    const code = encode('width: 3\nRGB\nRGB\nRGB');
    expect(await main(['--code', code], Readable.from([]), sink)).toBe(Exit.OK);
    expect(log).toHaveBeenCalledTimes(10);
    expect(log.mock.calls[9]).toEqual([[
      'Turn 9',
      '┌───────┐',
      '│       │',
      '│       │',
      '│       │',
      '└───────┘',
    ].join('\n')]);
  });
});
