// src/config.ts

import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import type { ArithmeticConfig } from "./types";

export type { ArithmeticConfig, MultiplyStrategy, OverflowPolicy } from "./types";

// ---- Defaults ----

export const DEFAULT_CONFIG: Readonly<ArithmeticConfig> = Object.freeze({
  overflow: "wrap",
  multiply: "native",
});

// Environment variables read by loadConfigFromEnv
export const ENV_OVERFLOW = "BIT_UINT_OVERFLOW";
export const ENV_MULTIPLY = "BIT_UINT_MULTIPLY";

// ---- Validation ----

const overridesSchema = z
  .object({
    overflow: z.enum(["wrap", "throw"]).optional(),
    multiply: z.enum(["native", "bit-serial"]).optional(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate untyped overrides (CLI flags, env, JSON) and merge them onto `base`.
 * Undefined keys keep the base value.
 */
export function parseConfig(
  input: unknown,
  base: Readonly<ArithmeticConfig> = DEFAULT_CONFIG
): ArithmeticConfig {
  const parsed = overridesSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(`invalid config: ${describeIssues(parsed.error)}`);
  }
  return {
    overflow: parsed.data.overflow ?? base.overflow,
    multiply: parsed.data.multiply ?? base.multiply,
  };
}

/** Per-call options onto the defaults. No overrides skips validation. */
export function resolveConfig(
  overrides: Partial<ArithmeticConfig> = {}
): ArithmeticConfig {
  if (Object.keys(overrides).length === 0) return { ...DEFAULT_CONFIG };
  return parseConfig(overrides);
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ArithmeticConfig {
  return parseConfig({
    overflow: envValue(env, ENV_OVERFLOW),
    multiply: envValue(env, ENV_MULTIPLY),
  });
}
