import {
  DEFAULT_CONFIG,
  ENV_MULTIPLY,
  ENV_OVERFLOW,
  loadConfigFromEnv,
  parseConfig,
  resolveConfig,
} from "../config";
import { BitValueError, InvalidArgumentError, OverflowError } from "../errors";

describe("config", () => {
  test("defaults", () => {
    expect(resolveConfig()).toEqual({ overflow: "wrap", multiply: "native" });
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  test("no overrides returns a copy of the defaults", () => {
    const resolved = resolveConfig({});
    expect(resolved).toEqual(DEFAULT_CONFIG);
    expect(resolved).not.toBe(DEFAULT_CONFIG);
    resolved.overflow = "throw";
    expect(DEFAULT_CONFIG.overflow).toBe("wrap");
  });

  test("overrides merge onto the defaults", () => {
    expect(resolveConfig({ overflow: "throw" })).toEqual({ overflow: "throw", multiply: "native" });
  });

  test("parseConfig merges onto a given base", () => {
    expect(parseConfig({ multiply: "bit-serial" }, { overflow: "throw", multiply: "native" })).toEqual({
      overflow: "throw",
      multiply: "bit-serial",
    });
    expect(parseConfig({ overflow: undefined }, { overflow: "throw", multiply: "native" })).toEqual({
      overflow: "throw",
      multiply: "native",
    });
  });

  test("rejects unknown values and keys", () => {
    expect(() => parseConfig({ overflow: "saturate" })).toThrow(InvalidArgumentError);
    expect(() => parseConfig({ overflow: "saturate" })).toThrow(/^invalid config: overflow: /);
    expect(() => parseConfig({ width: 8 })).toThrow(InvalidArgumentError);
    expect(() => parseConfig("wrap")).toThrow(InvalidArgumentError);
  });

  test("loads from the environment", () => {
    expect(loadConfigFromEnv({ [ENV_OVERFLOW]: "throw", [ENV_MULTIPLY]: "bit-serial" })).toEqual({
      overflow: "throw",
      multiply: "bit-serial",
    });
    expect(loadConfigFromEnv({ [ENV_OVERFLOW]: "  " })).toEqual(DEFAULT_CONFIG);
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
    expect(() => loadConfigFromEnv({ [ENV_MULTIPLY]: "karatsuba" })).toThrow(InvalidArgumentError);
  });
});

describe("errors", () => {
  test("carry a code and their class name", () => {
    const invalid = new InvalidArgumentError("bad");
    expect(invalid).toBeInstanceOf(BitValueError);
    expect(invalid).toBeInstanceOf(Error);
    expect(invalid.code).toBe("INVALID_ARGUMENT");
    expect(invalid.name).toBe("InvalidArgumentError");

    const overflow = new OverflowError("too big");
    expect(overflow.code).toBe("OVERFLOW");
    expect(overflow.name).toBe("OverflowError");
    expect(overflow.message).toBe("too big");
  });
});
