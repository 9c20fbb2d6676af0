// src/cli/report.ts

import { BitValue } from "../bitValue/bitValue";
import { resolveConfig } from "../config";
import { InvalidArgumentError } from "../errors";
import type { ArithmeticConfig } from "../types";

export interface ReportOptions {
  config?: Partial<ArithmeticConfig>;
  decimal?: boolean;   // append the toInt value to each line
}

export interface ReportEntry {
  label: string;
  value: BitValue;
}

/**
 * Turns raw tokens ("6", " 3") into the two operands.
 * Only the first two tokens are used.
 */
export function parseOperands(tokens: readonly string[]): [number, number] {
  const words = tokens.flatMap((t) => t.split(/\s+/)).filter((w) => w.length > 0);
  if (words.length < 2) {
    throw new InvalidArgumentError(`expected two unsigned integers, got ${words.length}`);
  }
  const [a, b] = words;
  return [toOperand(a), toOperand(b)];
}

function toOperand(word: string): number {
  if (!/^[+-]?\d+$/.test(word)) {
    throw new InvalidArgumentError(`not an integer: "${word}"`);
  }
  return Number(word);
}

/** Operands first, then each result computed through the static (non-mutating) forms. */
export function computeEntries(
  a: BitValue,
  b: BitValue,
  config: Partial<ArithmeticConfig> = {}
): ReportEntry[] {
  return [
    { label: "a", value: a },
    { label: "b", value: b },
    { label: "Sum", value: BitValue.add(a, b) },
    { label: "Difference", value: BitValue.sub(a, b) },
    { label: "Product", value: BitValue.mul(a, b, config) },
    { label: "AND", value: BitValue.and(a, b) },
    { label: "OR", value: BitValue.or(a, b) },
    { label: "XOR", value: BitValue.xor(a, b) },
  ];
}

export function buildReport(a: number, b: number, options: ReportOptions = {}): string[] {
  const config = resolveConfig(options.config);
  return computeEntries(BitValue.fromInt(a), BitValue.fromInt(b), config).map(({ label, value }) =>
    options.decimal
      ? `${label}: ${value.toString()} (${value.toInt(config)})`
      : `${label}: ${value.toString()}`
  );
}
