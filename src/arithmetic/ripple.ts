// src/arithmetic/ripple.ts

import { alignLengths, trimLeadingZeros } from "../alignment/alignment";

// ---------------- Positional logic ----------------

export type BitOp = (x: boolean, y: boolean) => boolean;

export const AND: BitOp = (x, y) => x && y;
export const OR: BitOp = (x, y) => x || y;
export const XOR: BitOp = (x, y) => x !== y;

/** Digit-wise combination of two sequences of equal length. */
export function combine(a: readonly boolean[], b: readonly boolean[], op: BitOp): boolean[] {
  if (a.length !== b.length) {
    throw new RangeError(`combine: lengths differ (${a.length} vs ${b.length})`);
  }
  return a.map((x, i) => op(x, b[i]));
}

export function complement(digits: readonly boolean[]): boolean[] {
  return digits.map((d) => !d);
}

// ---------------- Ripple-carry addition ----------------

/**
 * Adds two sequences of equal length, tail to head.
 * A carry out of the top digit grows the result by one leading 1.
 */
export function rippleAdd(a: readonly boolean[], b: readonly boolean[]): boolean[] {
  if (a.length !== b.length) {
    throw new RangeError(`rippleAdd: lengths differ (${a.length} vs ${b.length})`);
  }
  const out = new Array<boolean>(a.length);
  let carry = 0;
  for (let i = a.length - 1; i >= 0; i--) {
    const sum = (a[i] ? 1 : 0) + (b[i] ? 1 : 0) + carry;
    out[i] = sum % 2 === 1;
    carry = sum >> 1;
  }
  if (carry > 0) out.unshift(true);
  return out;
}

// ---------------- Shift-and-add multiplication ----------------

/**
 * Exact product of two digit sequences, at minimal width.
 * Each set digit of the multiplier adds the multiplicand shifted by that
 * digit's weight.
 */
export function shiftAddMultiply(
  multiplicand: readonly boolean[],
  multiplier: readonly boolean[]
): boolean[] {
  let acc: boolean[] = [false];
  for (let i = 0; i < multiplier.length; i++) {
    if (!multiplier[multiplier.length - 1 - i]) continue;
    const shifted = [...multiplicand, ...new Array<boolean>(i).fill(false)];
    const [x, y] = alignLengths(acc, shifted);
    acc = rippleAdd(x, y);
  }
  return trimLeadingZeros(acc);
}
