// src/types.ts

// ---------------------------
//  Digits
// ---------------------------
export type Bit = 0 | 1;

// Accepted by BitValue.fromBits: booleans or 0/1, most-significant first.
export type DigitInput = ReadonlyArray<boolean | Bit>;

// ---------------------------
//  Arithmetic policy
// ---------------------------
export type OverflowPolicy =
  | "wrap"    // int32 wraparound, bit for bit
  | "throw";  // OverflowError past 2^31 - 1

export type MultiplyStrategy =
  | "native"      // shift-and-add on int32 numbers
  | "bit-serial"; // shift-and-add over digit sequences, exact at any width

export interface ArithmeticConfig {
  overflow: OverflowPolicy;
  multiply: MultiplyStrategy;
}
