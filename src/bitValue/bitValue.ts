// src/bitValue/bitValue.ts

import { alignLengths, truncate, zeroExtend } from "../alignment/alignment";
import {
  AND,
  OR,
  XOR,
  type BitOp,
  combine,
  complement,
  rippleAdd,
  shiftAddMultiply,
} from "../arithmetic/ripple";
import { resolveConfig } from "../config";
import { InvalidArgumentError, OverflowError } from "../errors";
import type { ArithmeticConfig, Bit, DigitInput } from "../types";
import { INT32_MAX, digitsToInt32, int32ToDigits, isNativeUint } from "../utils/bitTools";

const DISPLAY_PREFIX = "0b0";
const LITERAL = /^(?:0b)?([01]+)$/;

/**
 * Unsigned integer stored as an explicit digit sequence, most-significant
 * first. Widths are never normalized except by `mul`, which rebuilds the
 * digits at the product's minimal width.
 *
 * Instance operations mutate the receiver and return it. The argument is
 * only read: alignment widens a private copy, never the caller's value.
 * The static forms clone their first operand and change neither.
 */
export class BitValue {
  private digits: boolean[];

  private constructor(digits: boolean[]) {
    this.digits = digits;
  }

  // ---------------- Construction ----------------

  static fromInt(n: number): BitValue {
    if (n < 0) {
      throw new InvalidArgumentError(`fromInt: negative values cannot be represented (got ${n})`);
    }
    if (!isNativeUint(n)) {
      throw new InvalidArgumentError(
        `fromInt: value must be an integer between 0 and ${INT32_MAX} (got ${n})`
      );
    }
    return new BitValue(int32ToDigits(n));
  }

  static fromBits(bits: DigitInput): BitValue {
    if (bits.length === 0) {
      throw new InvalidArgumentError("fromBits: at least one digit is required");
    }
    return new BitValue(bits.map((b) => b === true || b === 1));
  }

  /** Reads a binary literal, `0b` optional. Leading zeros are kept as digits. */
  static parse(text: string): BitValue {
    const match = LITERAL.exec(text.trim());
    if (!match) {
      throw new InvalidArgumentError(`parse: not a binary literal: "${text}"`);
    }
    return new BitValue(Array.from(match[1], (c) => c === "1"));
  }

  static fromBigInt(n: bigint): BitValue {
    if (n < 0n) {
      throw new InvalidArgumentError(`fromBigInt: negative values cannot be represented (got ${n})`);
    }
    return new BitValue(Array.from(n.toString(2), (c) => c === "1"));
  }

  clone(): BitValue {
    return new BitValue(this.digits.slice());
  }

  static clone(u: BitValue): BitValue {
    return u.clone();
  }

  // ---------------- Accessors ----------------

  get length(): number {
    return this.digits.length;
  }

  /** Copy of the digits, most-significant first. */
  get bits(): boolean[] {
    return this.digits.slice();
  }

  /** Digit of weight 2^index; 0 past the stored width. */
  bit(index: number): Bit {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidArgumentError(`bit: index must be a non-negative integer (got ${index})`);
    }
    const pos = this.digits.length - 1 - index;
    return pos >= 0 && this.digits[pos] ? 1 : 0;
  }

  /** Same represented value, whatever the widths. */
  equals(other: BitValue): boolean {
    return this.toBigInt() === other.toBigInt();
  }

  // ---------------- Conversion ----------------

  /**
   * Int32 fold over the digits. Under "wrap" only the low 32 digits count
   * and bit 31 reads as the sign; under "throw" anything above 2^31 - 1
   * raises OverflowError.
   */
  toInt(options: Partial<ArithmeticConfig> = {}): number {
    return this.toIntWith(resolveConfig(options));
  }

  static toInt(u: BitValue, options?: Partial<ArithmeticConfig>): number {
    return u.toInt(options);
  }

  private toIntWith({ overflow }: ArithmeticConfig): number {
    if (overflow === "throw" && this.significantDigits() > 31) {
      throw new OverflowError(`toInt: ${this.toString()} does not fit in a native integer`);
    }
    return digitsToInt32(this.digits);
  }

  toBigInt(): bigint {
    let acc = 0n;
    for (const d of this.digits) {
      acc = (acc << 1n) | (d ? 1n : 0n);
    }
    return acc;
  }

  /** `0b`, one literal 0, then every stored digit. */
  toString(): string {
    return DISPLAY_PREFIX + this.digits.map((d) => (d ? "1" : "0")).join("");
  }

  static toDisplayString(u: BitValue): string {
    return u.toString();
  }

  // ---------------- Width ----------------

  /** Zero-extends to `width` digits; never shrinks. */
  extendTo(width: number): this {
    if (!Number.isInteger(width) || width < 0) {
      throw new InvalidArgumentError(`extendTo: width must be a non-negative integer (got ${width})`);
    }
    this.digits = zeroExtend(this.digits, width);
    return this;
  }

  /** Prepends `extra` zero digits. */
  extendBits(extra: number): this {
    if (!Number.isInteger(extra) || extra < 0) {
      throw new InvalidArgumentError(`extendBits: count must be a non-negative integer (got ${extra})`);
    }
    return this.extendTo(this.digits.length + extra);
  }

  // ---------------- Bitwise ----------------

  and(u: BitValue): this {
    return this.apply(u, AND);
  }

  static and(a: BitValue, b: BitValue): BitValue {
    return a.clone().and(b);
  }

  or(u: BitValue): this {
    return this.apply(u, OR);
  }

  static or(a: BitValue, b: BitValue): BitValue {
    return a.clone().or(b);
  }

  xor(u: BitValue): this {
    return this.apply(u, XOR);
  }

  static xor(a: BitValue, b: BitValue): BitValue {
    return a.clone().xor(b);
  }

  // ---------------- Additive ----------------

  add(u: BitValue): this {
    const [mine, theirs] = alignLengths(this.digits, u.digits);
    this.digits = rippleAdd(mine, theirs);
    return this;
  }

  static add(a: BitValue, b: BitValue): BitValue {
    return a.clone().add(b);
  }

  /**
   * Two's complement over the current width: flip every digit, then add 1.
   * The +1 may carry out and widen the value (negating zero at width w
   * gives 2^w).
   */
  negate(): this {
    this.digits = complement(this.digits);
    return this.add(BitValue.fromInt(1));
  }

  /**
   * `(this - u) mod 2^w` at width `w = max(len(this), len(u))`.
   * `u` is negated at `w`, not at its own width, and the carry out of the
   * final add is dropped.
   */
  sub(u: BitValue): this {
    const width = Math.max(this.digits.length, u.digits.length);
    const negated = u.clone().extendTo(width).negate();
    this.add(negated);
    this.digits = truncate(this.digits, width);
    return this;
  }

  static sub(a: BitValue, b: BitValue): BitValue {
    return a.clone().sub(b);
  }

  // ---------------- Multiplication ----------------

  /**
   * Shift-and-add product, rebuilt at minimal width.
   * "native" runs on int32 numbers and wraps like them (or throws under
   * the "throw" policy); "bit-serial" adds shifted digit sequences and is
   * exact at any width.
   */
  mul(u: BitValue, options: Partial<ArithmeticConfig> = {}): this {
    const config = resolveConfig(options);
    if (config.multiply === "bit-serial") {
      this.digits = shiftAddMultiply(this.digits, u.digits);
      return this;
    }

    const m = this.toIntWith(config);
    const multiplier = u.toIntWith(config);
    const rounds = Math.max(this.digits.length, u.digits.length);

    let q = multiplier;
    let acc = 0;
    for (let i = 0; i < rounds; i++) {
      if ((q & 1) === 1) {
        acc = (acc + (m << i)) | 0;
      }
      q >>= 1;
    }

    if (config.overflow === "throw" && BigInt(m) * BigInt(multiplier) > BigInt(INT32_MAX)) {
      throw new OverflowError(`mul: ${m} * ${multiplier} does not fit in a native integer`);
    }

    this.digits = int32ToDigits(acc);
    return this;
  }

  static mul(a: BitValue, b: BitValue, options?: Partial<ArithmeticConfig>): BitValue {
    return a.clone().mul(b, options);
  }

  // ---------------- Internals ----------------

  private apply(u: BitValue, op: BitOp): this {
    const [mine, theirs] = alignLengths(this.digits, u.digits);
    this.digits = combine(mine, theirs, op);
    return this;
  }

  private significantDigits(): number {
    const first = this.digits.indexOf(true);
    return first === -1 ? 0 : this.digits.length - first;
  }
}
