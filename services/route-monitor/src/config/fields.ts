import { appLogger } from "../observability/logger.js";
import { parseSocketAddress, type SocketAddress } from "./addresses.js";
import { ConfigError } from "./errors.js";
import type { RawSettings } from "./settings.js";

/**
 * What to do when a key is missing from its section.
 */
export type AbsentPolicy<T> =
  | { kind: "required"; message?: string }
  | { kind: "optional" }
  | { kind: "default"; value: T };

export type FieldSpec<T> = {
  section: string;
  key: string;
  /** Returns `undefined` when the text is not a valid value. */
  parse: (raw: string) => T | undefined;
  /** Completes "'<value>' is not ..." in error messages. */
  expected: string;
  absent: AbsentPolicy<T>;
  /** `default` substitutes the fixed default for an unparseable value. */
  invalid?: "fail" | "default";
  /** Handling of a key that is present without a value. */
  empty?: "fail" | "default";
  emptyMessage?: string;
};

export type RequiredFieldSpec<T> = FieldSpec<T> & {
  absent: Exclude<AbsentPolicy<T>, { kind: "optional" }>;
};

function fallbackValue<T>(spec: FieldSpec<T>): T | undefined {
  return spec.absent.kind === "default" ? spec.absent.value : undefined;
}

/**
 * Resolves one key to a typed value:
 * absent keys follow `absent`, valueless keys follow `empty`, and values the
 * parser rejects follow `invalid`.
 */
export function extractOptionalField<T>(settings: RawSettings, spec: FieldSpec<T>): T | undefined {
  const { section, key } = spec;

  if (!settings.has(section, key)) {
    switch (spec.absent.kind) {
      case "default":
        return spec.absent.value;
      case "optional":
        return undefined;
      case "required":
        throw new ConfigError(spec.absent.message ?? `${key} was not specified`, { section, key });
    }
  }

  const raw = settings.get(section, key);
  if (raw === undefined) {
    const fallback = fallbackValue(spec);
    if (spec.empty === "default" && fallback !== undefined) {
      return fallback;
    }
    throw new ConfigError(spec.emptyMessage ?? `invalid ${key} was specified`, { section, key });
  }

  const value = spec.parse(raw);
  if (value !== undefined) {
    return value;
  }

  const fallback = fallbackValue(spec);
  if (spec.invalid === "default" && fallback !== undefined) {
    return fallback;
  }
  throw new ConfigError(`Invalid ${key} in [${section}] - '${raw}' is not ${spec.expected}`, { section, key });
}

export function extractField<T>(settings: RawSettings, spec: RequiredFieldSpec<T>): T {
  const value = extractOptionalField(settings, spec);
  if (value === undefined) {
    throw new ConfigError(`${spec.key} was not specified`, { section: spec.section, key: spec.key });
  }
  return value;
}

// ============================================================================
// Value parsers
// ============================================================================

const UNSIGNED_INTEGER_PATTERN = /^\+?\d+$/;
const SIGNED_INTEGER_PATTERN = /^[+-]?\d+$/;

export const MAX_U32 = 0xffff_ffff;

export function parseUnsignedInteger(raw: string, max: number = Number.MAX_SAFE_INTEGER): number | undefined {
  if (!UNSIGNED_INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) && value <= max ? value : undefined;
}

export function parseSignedInteger(raw: string, limit: number = Number.MAX_SAFE_INTEGER): number | undefined {
  if (!SIGNED_INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) && Math.abs(value) <= limit ? value : undefined;
}

export function parseText(raw: string): string {
  return raw;
}

export const DEFAULT_DNS_PORT = 53;

/**
 * Parses a comma-separated resolver list. Entries are tried as `host:port`,
 * then as a host with port 53 appended; anything else is logged and dropped.
 */
export function parseDnsResolverList(raw: string): SocketAddress[] {
  const resolvers: SocketAddress[] = [];
  for (const part of raw.split(",")) {
    const entry = part.trim();
    const resolver = parseSocketAddress(entry) ?? parseSocketAddress(`${entry}:${DEFAULT_DNS_PORT}`);
    if (resolver) {
      resolvers.push(resolver);
      continue;
    }
    appLogger.warn({ entry }, "Invalid DNS resolver entry dropped");
  }
  return resolvers;
}
