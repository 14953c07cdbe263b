// lz-string sets module.exports whole, so under ESM only its default export
// carries the functions.
import lz from 'lz-string';
import { ParseError } from './parse.js';

// Share codes: a board file squeezed into one URI-safe string.

export function encode(text: string): string {
  return lz.compressToEncodedURIComponent(text);
}

export function decode(code: string): string {
  const text = lz.decompressFromEncodedURIComponent(code.trim());
  if (!text) throw new ParseError('syntax', `bad share code: ${code}`);
  return text;
}
