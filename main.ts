#!/usr/bin/env node

import 'source-map-support/register.js';

import { readFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import * as readline from 'node:readline/promises';
import * as url from 'node:url';
import { ParseError, Puzzle, format, parse } from './parse.js';
import { render, renderMoves } from './render.js';
import { decode, encode } from './share.js';
import { SolveStats, solve } from './solve.js';

const USAGE =
    'usage: tumblesolve [--stats] [--share] [--all] <board-file>\n' +
    '       tumblesolve [--stats] [--share] [--all] --code <share-code>';

export const Exit = {
  OK: 0,
  USAGE: 1,
  NOT_FOUND: 2,
  PARSE: 3,
  INTERNAL: 4,
} as const;
export type Exit = typeof Exit[keyof typeof Exit];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface Args {
  file?: string;
  code?: string;
  // Log search size and time.
  stats: boolean;
  // Print a share code instead of solving.
  share: boolean;
  // Print every step without waiting for Enter.
  all: boolean;
}

export function parseArgs(argv: readonly string[]): Args {
  const args: Args = {stats: false, share: false, all: false};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--stats': args.stats = true; break;
      case '--share': args.share = true; break;
      case '--all': args.all = true; break;
      case '--code':
        if (i + 1 >= argv.length) throw new UsageError('--code needs a value');
        args.code = argv[++i];
        break;
      default:
        if (arg.startsWith('--')) throw new UsageError(`unknown flag: ${arg}`);
        if (args.file != null) throw new UsageError(`unexpected argument: ${arg}`);
        args.file = arg;
    }
  }
  if ((args.file == null) === (args.code == null)) {
    throw new UsageError('need exactly one of a board file or --code');
  }
  return args;
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function yellow(s: string): string {
  return `\x1b[38;5;11m${s}\x1b[m`;
}

export async function main(
    argv: readonly string[],
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout): Promise<Exit> {
  let args: Args;
  try {
    args = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`${e.message}\n${USAGE}`);
    return Exit.USAGE;
  }

  let text: string;
  try {
    text = args.code != null ? decode(args.code) : await readFile(args.file ?? '', 'utf8');
  } catch (e) {
    if (isNotFound(e)) {
      console.error(`no such file: ${args.file}`);
      return Exit.NOT_FOUND;
    }
    if (!(e instanceof ParseError)) throw e;
    console.error(e.message);
    return Exit.PARSE;
  }

  let puzzle: Puzzle;
  try {
    puzzle = parse(text);
  } catch (e) {
    if (!(e instanceof ParseError)) throw e;
    console.error(`${args.file ?? 'share code'}: ${e.message}`);
    return Exit.PARSE;
  }
  const {board, palette} = puzzle;

  if (args.share) {
    console.log(encode(format(puzzle)));
    return Exit.OK;
  }

  const stats: SolveStats = {positions: 0};
  const start = performance.now();
  const moves = solve(board, {stats});
  if (args.stats) {
    const ms = Math.round(performance.now() - start);
    console.error(`searched ${stats.positions} positions in ${ms} ms`);
  }
  if (!moves) {
    console.log(yellow('No solution exists.'));
    return Exit.OK;
  }

  if (args.all) console.log(`${renderMoves(moves)}\n`);
  const rl = args.all ? undefined : readline.createInterface({input, output});
  // Once input ends, the remaining steps print without waiting.
  let closed = false;
  const ended = new Promise<void>((resolve) => {
    rl?.once('close', () => {
      closed = true;
      resolve();
    });
  });
  try {
    for (const m of moves) {
      console.log(render(board, {highlight: m, palette}));
      board.forceRemove(m);
      if (rl && !closed) {
        await Promise.race([rl.question('Press \x1b[38;5;15m[Enter]\x1b[m for next hint.'), ended]);
      }
    }
  } finally {
    if (!closed) rl?.close();
  }
  console.log(render(board, {palette}));
  return Exit.OK;
}

if (import.meta.url.startsWith('file:')) {
  const modulePath = url.fileURLToPath(import.meta.url);
  if (process.argv[1] && realpathSync(process.argv[1]) === modulePath) {
    main(process.argv.slice(2)).then(
        (code) => { process.exitCode = code; },
        (e: unknown) => {
          console.error(e);
          process.exitCode = Exit.INTERNAL;
        });
  }
}
