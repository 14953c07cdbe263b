// Bit twiddling over 32-bit masks.  Colors live in the low 32 bits of a
// number, so bit 31 needs `>>> 0` to stay positive.

// Counts bits up to 32, using only number since it's hopefully faster
export function count32(i: number): number {
  let j = i >>> 0;
  j -= (j >>> 1) & 0x55555555;
  j = (j & 0x33333333) + ((j >>> 2) & 0x33333333);
  j = (j + (j >>> 4)) & 0x0f0f0f0f;
  return Math.imul(j, 0x01010101) >>> 24;
}

// Splits a mask into its single-bit components, lowest first.
export function bits32(i: number): number[] {
  const out: number[] = [];
  let s = i >>> 0;
  while (s) {
    const low = (s & -s) >>> 0;
    out.push(low);
    s = (s ^ low) >>> 0;
  }
  return out;
}

// Returns the bit index if exactly one bit is set.
export function isSingular(b: number): number|undefined {
  const s = b >>> 0;
  if (!s || (s & (s - 1))) return undefined;
  return 31 - Math.clz32(s);
}
