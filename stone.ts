import { bits32, count32, isSingular } from './util.js';

// A single color: exactly one bit of a 32-bit mask.  0 is the wildcard.
export type Color = number & {__color__: never};

// Any number of colors OR'd together.
export type Colors = number & {__colors__: never};

export namespace Color {
  export const WILD = 0 as Color;

  export function of(index: number): Color {
    if (index < 0 || index > 31) throw new Error(`bad color index: ${index}`);
    return ((1 << index) >>> 0) as Color;
  }

  export function index(c: Color): number {
    const i = isSingular(c);
    if (i == null) throw new Error(`not a single color: ${c}`);
    return i;
  }

  export function isValid(c: number): c is Color {
    return isSingular(c) != null;
  }
}

export namespace Colors {
  export const NONE = 0 as Colors;

  export function add(s: Colors, c: Color): Colors {
    return ((s | c) >>> 0) as Colors;
  }
  export function remove(s: Colors, c: Color): Colors {
    return ((s & ~c) >>> 0) as Colors;
  }
  export function has(s: Colors, c: Color): boolean {
    return Boolean(s & c);
  }
  export function count(s: Colors): number {
    return count32(s);
  }
  export function split(s: Colors): Color[] {
    return bits32(s) as Color[];
  }
}

/**
 * The tiles of a board.  Toggle stones depend on the turn; use
 * {@link Stone.forTurn} to see how one currently behaves.
 */
export type Stone =
  | {readonly kind: 'empty'}
  | {readonly kind: 'ordinary', readonly glyph: string, readonly color: Color}
  // Cleared only when its row runs out of removable stones.
  | {readonly kind: 'survivor'}
  // Colorless; draws its color from the board's wild colors.
  | {readonly kind: 'wild'}
  // Open when phase is even.
  | {readonly kind: 'toggle', readonly phase: number};

export type Toggle = Extract<Stone, {kind: 'toggle'}>;

export namespace Stone {
  export const EMPTY: Stone = {kind: 'empty'};
  export const SURVIVOR: Stone = {kind: 'survivor'};
  export const WILD: Stone = {kind: 'wild'};
  export const OPEN: Stone = {kind: 'toggle', phase: 0};
  export const CLOSED: Stone = {kind: 'toggle', phase: 1};

  export function ordinary(glyph: string, color: Color): Stone {
    return {kind: 'ordinary', glyph, color};
  }

  export function isRemovable(s: Stone): boolean {
    switch (s.kind) {
      case 'ordinary':
      case 'wild':
        return true;
      case 'empty':
      case 'survivor':
      case 'toggle':
        return false;
    }
  }

  // Resolves turn-dependent state.  Only toggles change.
  export function forTurn(s: Stone, turn: number): Stone {
    switch (s.kind) {
      case 'toggle':
        return {kind: 'toggle', phase: (s.phase + turn) & 1};
      case 'empty':
      case 'ordinary':
      case 'survivor':
      case 'wild':
        return s;
    }
  }

  export function isOpen(t: Toggle): boolean {
    return (t.phase & 1) === 0;
  }

  // NOTE: call forTurn first, or toggles show their initial phase.
  export function glyph(s: Stone): string {
    switch (s.kind) {
      case 'empty': return '.';
      case 'ordinary': return s.glyph;
      case 'survivor': return '#';
      case 'wild': return '*';
      case 'toggle': return isOpen(s) ? 'O' : 'X';
    }
  }
}
