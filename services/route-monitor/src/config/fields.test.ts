import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../observability/logger.js", () => {
  const warn = vi.fn();
  const info = vi.fn();
  return {
    appLogger: {
      warn,
      info,
    },
  };
});

import { appLogger } from "../observability/logger.js";
import { ConfigError } from "./errors.js";
import {
  extractField,
  extractOptionalField,
  MAX_U32,
  parseDnsResolverList,
  parseSignedInteger,
  parseUnsignedInteger,
} from "./fields.js";
import { createRawSettings } from "./settings.js";

const settings = createRawSettings({
  main: {
    depth: "25",
    broken: "abc",
    valueless: undefined,
  },
});

function captureError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("extractOptionalField", () => {
  it("returns the parsed value when present", () => {
    const value = extractField(settings, {
      section: "main",
      key: "depth",
      parse: (raw) => parseUnsignedInteger(raw),
      expected: "a non-negative integer",
      absent: { kind: "default", value: 10 },
    });
    expect(value).toBe(25);
  });

  it("applies the default when the key is absent", () => {
    const value = extractField(settings, {
      section: "main",
      key: "missing",
      parse: (raw) => parseUnsignedInteger(raw),
      expected: "a non-negative integer",
      absent: { kind: "default", value: 10 },
    });
    expect(value).toBe(10);
  });

  it("leaves optional absent keys unset", () => {
    const value = extractOptionalField(settings, {
      section: "main",
      key: "missing",
      parse: (raw) => parseUnsignedInteger(raw),
      expected: "a non-negative integer",
      absent: { kind: "optional" },
    });
    expect(value).toBeUndefined();
  });

  it("names the key when a required field is absent", () => {
    const error = captureError(() =>
      extractField(settings, {
        section: "main",
        key: "missing",
        parse: (raw) => raw,
        expected: "a value",
        absent: { kind: "required" },
      }),
    );
    expect(error.message).toBe("missing was not specified");
    expect(error.section).toBe("main");
    expect(error.key).toBe("missing");
  });

  it("uses a custom message for required fields", () => {
    expect(() =>
      extractField(settings, {
        section: "main",
        key: "missing",
        parse: (raw) => raw,
        expected: "a value",
        absent: { kind: "required", message: "Missing value 'missing'" },
      }),
    ).toThrow("Missing value 'missing'");
  });

  it("fails on unparseable values by default", () => {
    const error = captureError(() =>
      extractField(settings, {
        section: "main",
        key: "broken",
        parse: (raw) => parseUnsignedInteger(raw),
        expected: "a non-negative integer",
        absent: { kind: "default", value: 10 },
      }),
    );
    expect(error.message).toBe("Invalid broken in [main] - 'abc' is not a non-negative integer");
    expect(error.locator).toBe("[main] broken");
  });

  it("substitutes the default for unparseable values when asked to", () => {
    const value = extractField(settings, {
      section: "main",
      key: "broken",
      parse: (raw) => parseUnsignedInteger(raw),
      expected: "a non-negative integer",
      absent: { kind: "default", value: 120 },
      invalid: "default",
    });
    expect(value).toBe(120);
  });

  it("fails on keys without a value unless told to default", () => {
    expect(() =>
      extractField(settings, {
        section: "main",
        key: "valueless",
        parse: (raw) => raw,
        expected: "a path",
        absent: { kind: "default", value: "./contrib" },
      }),
    ).toThrow("invalid valueless was specified");

    const value = extractField(settings, {
      section: "main",
      key: "valueless",
      parse: (raw) => raw,
      expected: "a path",
      absent: { kind: "default", value: "./contrib" },
      empty: "default",
    });
    expect(value).toBe("./contrib");
  });

  it("uses the empty-value message when given", () => {
    expect(() =>
      extractField(settings, {
        section: "main",
        key: "valueless",
        parse: (raw) => raw,
        expected: "a path",
        absent: { kind: "required" },
        emptyMessage: "Invalid valueless",
      }),
    ).toThrow("Invalid valueless");
  });
});

describe("integer parsers", () => {
  it("parses unsigned integers", () => {
    expect(parseUnsignedInteger("42")).toBe(42);
    expect(parseUnsignedInteger("+7")).toBe(7);
    expect(parseUnsignedInteger("0")).toBe(0);
  });

  it("rejects signs, whitespace and exponents for unsigned integers", () => {
    expect(parseUnsignedInteger("-1")).toBeUndefined();
    expect(parseUnsignedInteger(" 5")).toBeUndefined();
    expect(parseUnsignedInteger("1e3")).toBeUndefined();
    expect(parseUnsignedInteger("")).toBeUndefined();
  });

  it("enforces the upper bound", () => {
    expect(parseUnsignedInteger("4294967295", MAX_U32)).toBe(4294967295);
    expect(parseUnsignedInteger("4294967296", MAX_U32)).toBeUndefined();
    expect(parseUnsignedInteger("9007199254740993")).toBeUndefined();
  });

  it("parses signed integers", () => {
    expect(parseSignedInteger("-30")).toBe(-30);
    expect(parseSignedInteger("1800")).toBe(1800);
    expect(parseSignedInteger("1.5")).toBeUndefined();
  });

  it("limits the magnitude of signed integers", () => {
    expect(parseSignedInteger("-1000", 1000)).toBe(-1000);
    expect(parseSignedInteger("1001", 1000)).toBeUndefined();
    expect(parseSignedInteger("-1001", 1000)).toBeUndefined();
  });
});

describe("parseDnsResolverList", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("appends port 53 to bare addresses and drops invalid entries", () => {
    const resolvers = parseDnsResolverList("8.8.8.8, badvalue, 9.9.9.9");

    expect(resolvers).toEqual([
      { address: "8.8.8.8", port: 53, family: "ipv4" },
      { address: "9.9.9.9", port: 53, family: "ipv4" },
    ]);
    expect(appLogger.warn).toHaveBeenCalledTimes(1);
    expect(appLogger.warn).toHaveBeenCalledWith({ entry: "badvalue" }, "Invalid DNS resolver entry dropped");
  });

  it("keeps explicit ports", () => {
    expect(parseDnsResolverList("10.0.0.53:5353,[2001:db8::53]:53")).toEqual([
      { address: "10.0.0.53", port: 5353, family: "ipv4" },
      { address: "2001:db8::53", port: 53, family: "ipv6" },
    ]);
  });

  it("returns an empty list when every entry is invalid", () => {
    expect(parseDnsResolverList("nope, also-nope")).toEqual([]);
    expect(appLogger.warn).toHaveBeenCalledTimes(2);
  });
});
