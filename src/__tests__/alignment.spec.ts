import { alignLengths, trimLeadingZeros, truncate, zeroExtend } from "../alignment/alignment";
import { AND, XOR, combine, complement, rippleAdd, shiftAddMultiply } from "../arithmetic/ripple";

const T = true;
const F = false;

describe("alignment", () => {
  test("zeroExtend pads at the most-significant end", () => {
    expect(zeroExtend([T], 3)).toEqual([F, F, T]);
  });

  test("zeroExtend copies when no padding is needed", () => {
    const digits = [T, F];
    const out = zeroExtend(digits, 1);
    expect(out).toEqual([T, F]);
    expect(out).not.toBe(digits);
  });

  test("alignLengths pads the shorter side and leaves inputs alone", () => {
    const a = [T];
    const b = [T, F, T];
    expect(alignLengths(a, b)).toEqual([
      [F, F, T],
      [T, F, T],
    ]);
    expect(a).toEqual([T]);
    expect(b).toEqual([T, F, T]);
  });

  test("truncate keeps the low digits", () => {
    expect(truncate([T, F, T, T], 2)).toEqual([T, T]);
    expect(truncate([T], 3)).toEqual([T]);
  });

  test("trimLeadingZeros keeps one digit for zero", () => {
    expect(trimLeadingZeros([F, F, T, F])).toEqual([T, F]);
    expect(trimLeadingZeros([F, F])).toEqual([F]);
  });
});

describe("ripple", () => {
  test("combine applies the operator per position", () => {
    expect(combine([T, T, F], [F, T, T], AND)).toEqual([F, T, F]);
    expect(combine([T, T, F], [F, T, T], XOR)).toEqual([T, F, T]);
    expect(() => combine([T], [T, F], AND)).toThrow(RangeError);
  });

  test("complement flips every digit", () => {
    expect(complement([T, F, F])).toEqual([F, T, T]);
  });

  test("rippleAdd carries into a new leading digit", () => {
    // 11 + 01 = 100
    expect(rippleAdd([T, T], [F, T])).toEqual([T, F, F]);
    // 010 + 001 = 011
    expect(rippleAdd([F, T, F], [F, F, T])).toEqual([F, T, T]);
    expect(() => rippleAdd([T], [T, T])).toThrow(RangeError);
  });

  test("shiftAddMultiply", () => {
    // 110 * 11 = 10010
    expect(shiftAddMultiply([T, T, F], [T, T])).toEqual([T, F, F, T, F]);
    expect(shiftAddMultiply([T], [F])).toEqual([F]);
  });
});
