// src/alignment/alignment.ts

/**
 * Zero-extends `digits` at the most-significant end to `width`.
 * Always returns a fresh array; a width at or below the current length
 * just copies.
 */
export function zeroExtend(digits: readonly boolean[], width: number): boolean[] {
  const extra = Math.max(0, width - digits.length);
  const out = new Array<boolean>(extra).fill(false);
  for (const d of digits) out.push(d);
  return out;
}

/**
 * Pads the shorter of two digit sequences so both share
 * `max(a.length, b.length)` digits. Neither input is touched.
 */
export function alignLengths(
  a: readonly boolean[],
  b: readonly boolean[]
): [boolean[], boolean[]] {
  const maxLen = Math.max(a.length, b.length);
  return [zeroExtend(a, maxLen), zeroExtend(b, maxLen)];
}

/** Keeps the low `width` digits. */
export function truncate(digits: readonly boolean[], width: number): boolean[] {
  return digits.slice(Math.max(0, digits.length - width));
}

/** Drops leading zeros, keeping a single digit for zero. */
export function trimLeadingZeros(digits: readonly boolean[]): boolean[] {
  const first = digits.indexOf(true);
  return first === -1 ? [false] : digits.slice(first);
}
