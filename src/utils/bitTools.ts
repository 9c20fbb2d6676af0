// src/utils/bitTools.ts

import type { Bit } from "../types";

/** Largest value the native (int32) conversion path holds. */
export const INT32_MAX = 0x7fffffff;

/**
 * Returns the bit (0 or 1) of an int32 at a given position.
 * Example: getBit(5, 0) -> 1, getBit(5, 1) -> 0, getBit(5, 2) -> 1
 */
export function getBit(value: number, bit: number): Bit {
  // Validate args
  if (!Number.isInteger(value)) {
    throw new RangeError("getBit: value must be an integer");
  }
  if (!Number.isInteger(bit) || bit < 0 || bit > 31) {
    throw new RangeError("getBit: bit index must be an integer between 0 and 31");
  }

  const mask = 1 << bit;
  return (value & mask) !== 0 ? 1 : 0;
}

/**
 * Number of binary digits in the unsigned 32-bit pattern of `value`.
 * 0 needs one digit; any negative int32 needs all 32.
 */
export function bitLength(value: number): number {
  return (value >>> 0).toString(2).length;
}

/** True for integers the native path accepts as unsigned input (0 .. 2^31 - 1). */
export function isNativeUint(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= INT32_MAX;
}

/**
 * Digits of an int32 at its minimal unsigned width, most-significant first.
 * Negative inputs are read as their two's-complement bit pattern.
 */
export function int32ToDigits(value: number): boolean[] {
  const len = bitLength(value);
  const digits = new Array<boolean>(len);
  for (let i = 0; i < len; i++) {
    digits[i] = getBit(value, len - 1 - i) === 1;
  }
  return digits;
}

/** Left fold `acc = (acc << 1) | bit` in int32 arithmetic; wraps past 32 digits. */
export function digitsToInt32(digits: readonly boolean[]): number {
  let acc = 0;
  for (const d of digits) {
    acc = (acc << 1) | (d ? 1 : 0);
  }
  return acc;
}
