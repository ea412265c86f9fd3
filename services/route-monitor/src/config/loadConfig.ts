import fs from "node:fs";

import {
  formatSocketAddress,
  parseIpv4Address,
  parseSocketAddress,
  parseSocketAddressWithDefaultPort,
  type SocketAddress,
} from "./addresses.js";
import { ConfigError } from "./errors.js";
import {
  DEFAULT_DNS_PORT,
  extractField,
  extractOptionalField,
  MAX_U32,
  parseDnsResolverList,
  parseSignedInteger,
  parseText,
  parseUnsignedInteger,
} from "./fields.js";
import { endpointAbsentPolicy } from "./peerRequirements.js";
import { parseHistoryChangeMode, parsePeerMode, type HistoryChangeMode, type ServiceConfig } from "./schema.js";
import { parseSettings, type RawSettings } from "./settings.js";
import { loadWhoisResolverConfig, type WhoisConfigLoader } from "./whois.js";

export const MAIN_SECTION = "main";

export const DEFAULT_BGP_PORT = 179;
export const DEFAULT_BMP_PORT = 632;

const ANY_IPV4 = "0.0.0.0";

export const DEFAULT_ROUTER_ID = "1.1.1.1";
export const DEFAULT_HTTP_LISTEN: Readonly<SocketAddress> = Object.freeze({
  address: ANY_IPV4,
  port: 8080,
  family: "ipv4",
});
export const DEFAULT_HTTP_ROOT = "./contrib";
export const DEFAULT_HTTP_TIMEOUT_SECONDS = 120;
export const DEFAULT_HISTORY_DEPTH = 10;
export const DEFAULT_WHOIS_DB = "whoiscache.db";
export const DEFAULT_WHOIS_REQUEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_WHOIS_CACHE_SECONDS = 1800;
export const DEFAULT_PURGE_EVERY_SECONDS = 5 * 60;
export const FALLBACK_DNS_RESOLVER: Readonly<SocketAddress> = Object.freeze({
  address: "1.1.1.1",
  port: DEFAULT_DNS_PORT,
  family: "ipv4",
});

const SOCKET_EXPECTATION = "an IP address or ip:port socket address";
const UNSIGNED_EXPECTATION = "a non-negative integer";
const SIGNED_EXPECTATION = "an integer";

// purge_every is held in milliseconds, which must stay a safe integer.
const MAX_PURGE_EVERY_SECONDS = Math.floor(Number.MAX_SAFE_INTEGER / 1000);

export type ServiceConfigOptions = {
  /** Settings file path, quoted in error messages. */
  sourcePath?: string;
  whoisLoader?: WhoisConfigLoader;
};

function freezeAddress(socket: SocketAddress | undefined): Readonly<SocketAddress> | undefined {
  return socket ? Object.freeze({ ...socket }) : undefined;
}

function parseProtoListen(raw: string): SocketAddress {
  return (
    parseSocketAddressWithDefaultPort(raw, DEFAULT_BGP_PORT) ?? {
      address: ANY_IPV4,
      port: DEFAULT_BGP_PORT,
      family: "ipv4",
    }
  );
}

/**
 * Validates parsed settings into a frozen {@link ServiceConfig}. Fields are
 * read in a fixed order and the first failure is thrown as a
 * {@link ConfigError}; nothing partial is returned.
 */
export function buildServiceConfig(settings: RawSettings, options: ServiceConfigOptions = {}): ServiceConfig {
  const inFile = options.sourcePath ? ` ini file ${options.sourcePath}` : " ini file";
  const loadWhois = options.whoisLoader ?? loadWhoisResolverConfig;

  if (!settings.hasSection(MAIN_SECTION)) {
    throw new ConfigError("Missing section 'main' in ini file", { section: MAIN_SECTION });
  }

  const session = extractField(settings, {
    section: MAIN_SECTION,
    key: "session",
    parse: parseText,
    expected: "a section name",
    absent: { kind: "required", message: `Missing value 'session' in [main] section${inFile}` },
    emptyMessage: "No session specified",
  });
  if (!settings.hasSection(session)) {
    throw new ConfigError(`Missing section '${session}' in ini file`, { section: session });
  }

  const peerMode = extractField(settings, {
    section: session,
    key: "mode",
    parse: parsePeerMode,
    expected: "one of bgpactive|bgppassive|bmpactive|bmppassive",
    absent: { kind: "required", message: `Missing value 'mode' in [${session}] section${inFile}` },
    emptyMessage: "No mode (bgpactive|bgppassive|bmpactive|bmppassive) specified",
  });

  const bgpPeer = extractOptionalField(settings, {
    section: session,
    key: "bgppeer",
    parse: (raw) => parseSocketAddressWithDefaultPort(raw, DEFAULT_BGP_PORT),
    expected: SOCKET_EXPECTATION,
    absent: endpointAbsentPolicy(peerMode, "bgppeer"),
  });

  const bmpPeer = extractOptionalField(settings, {
    section: session,
    key: "bmppeer",
    parse: (raw) => parseSocketAddressWithDefaultPort(raw, DEFAULT_BMP_PORT),
    expected: SOCKET_EXPECTATION,
    absent: endpointAbsentPolicy(peerMode, "bmppeer"),
  });

  // an unparseable listener address binds to every interface instead of failing
  const protoListen = extractOptionalField(settings, {
    section: session,
    key: "protolisten",
    parse: parseProtoListen,
    expected: SOCKET_EXPECTATION,
    absent: endpointAbsentPolicy(peerMode, "protolisten"),
  });

  const routerId = extractField(settings, {
    section: session,
    key: "routerid",
    parse: parseIpv4Address,
    expected: "an IPv4 address",
    absent: { kind: "default", value: DEFAULT_ROUTER_ID },
  });

  const peerAs = extractField(settings, {
    section: session,
    key: "peeras",
    parse: (raw) => parseUnsignedInteger(raw, MAX_U32),
    expected: "an AS number between 0 and 4294967295",
    absent: { kind: "default", value: 0 },
  });

  const httpListen = extractField(settings, {
    section: MAIN_SECTION,
    key: "httplisten",
    parse: parseSocketAddress,
    expected: "an ip:port socket address",
    absent: { kind: "default", value: DEFAULT_HTTP_LISTEN },
    empty: "default",
  });

  const httpTimeoutSeconds = extractField(settings, {
    section: MAIN_SECTION,
    key: "httptimeout",
    parse: (raw) => parseUnsignedInteger(raw),
    expected: UNSIGNED_EXPECTATION,
    absent: { kind: "default", value: DEFAULT_HTTP_TIMEOUT_SECONDS },
    invalid: "default",
    empty: "default",
  });

  const httpRoot = extractField(settings, {
    section: MAIN_SECTION,
    key: "httproot",
    parse: parseText,
    expected: "a path",
    absent: { kind: "default", value: DEFAULT_HTTP_ROOT },
    empty: "default",
  });

  const historyDepth = extractField(settings, {
    section: MAIN_SECTION,
    key: "historydepth",
    parse: (raw) => parseUnsignedInteger(raw),
    expected: UNSIGNED_EXPECTATION,
    absent: { kind: "default", value: DEFAULT_HISTORY_DEPTH },
  });

  const historyMode = extractField<HistoryChangeMode>(settings, {
    section: MAIN_SECTION,
    key: "historymode",
    parse: parseHistoryChangeMode,
    expected: "one of every|differ",
    absent: { kind: "default", value: "differ" },
  });

  const purgeAfterWithdraws = extractField(settings, {
    section: MAIN_SECTION,
    key: "purge_after_withdraws",
    parse: (raw) => parseUnsignedInteger(raw),
    expected: UNSIGNED_EXPECTATION,
    absent: { kind: "default", value: 0 },
  });

  const purgeEverySeconds = extractField(settings, {
    section: MAIN_SECTION,
    key: "purge_every",
    parse: (raw) => parseSignedInteger(raw, MAX_PURGE_EVERY_SECONDS),
    expected: `an integer between -${MAX_PURGE_EVERY_SECONDS} and ${MAX_PURGE_EVERY_SECONDS}`,
    absent: { kind: "default", value: DEFAULT_PURGE_EVERY_SECONDS },
  });

  const whoisRequestTimeoutSeconds = extractField(settings, {
    section: MAIN_SECTION,
    key: "whois_request_timeout",
    parse: (raw) => parseUnsignedInteger(raw),
    expected: UNSIGNED_EXPECTATION,
    absent: { kind: "default", value: DEFAULT_WHOIS_REQUEST_TIMEOUT_SECONDS },
    invalid: "default",
    empty: "default",
  });

  const whoisCacheSeconds = extractField(settings, {
    section: MAIN_SECTION,
    key: "whois_cache_seconds",
    parse: (raw) => parseSignedInteger(raw),
    expected: SIGNED_EXPECTATION,
    absent: { kind: "default", value: DEFAULT_WHOIS_CACHE_SECONDS },
    invalid: "default",
    empty: "default",
  });

  const whoisConfigPath = extractField(settings, {
    section: MAIN_SECTION,
    key: "whoisjsonconfig",
    parse: parseText,
    expected: "a path",
    absent: { kind: "required", message: "Invalid whoisjsonconfig" },
    emptyMessage: "Invalid whoisjsonconfig",
  });
  const whoisConfig = loadWhois(whoisConfigPath);

  const whoisDb = extractField(settings, {
    section: MAIN_SECTION,
    key: "whoisdb",
    parse: parseText,
    expected: "a path",
    absent: { kind: "default", value: DEFAULT_WHOIS_DB },
    emptyMessage: "Invalid whoisdb",
  });

  const dnsResolvers = extractField<SocketAddress[]>(settings, {
    section: MAIN_SECTION,
    key: "whoisdns",
    parse: parseDnsResolverList,
    expected: "a comma-separated resolver list",
    absent: { kind: "default", value: [] },
    emptyMessage: "Invalid whoisdns",
  });
  const whoisDnses = dnsResolvers.length > 0 ? dnsResolvers : [FALLBACK_DNS_RESOLVER];

  return Object.freeze({
    routerId,
    peerAs,
    bgpPeer: freezeAddress(bgpPeer),
    bmpPeer: freezeAddress(bmpPeer),
    protoListen: freezeAddress(protoListen),
    httpListen: Object.freeze({ ...httpListen }),
    httpRoot,
    historyDepth,
    httpTimeoutSeconds,
    historyMode,
    whoisConfig,
    whoisDb,
    whoisRequestTimeoutSeconds,
    whoisCacheSeconds,
    whoisDnses: Object.freeze(whoisDnses.map((resolver) => Object.freeze({ ...resolver }))),
    peerMode,
    purgeAfterWithdraws,
    purgeEveryMs: purgeEverySeconds * 1000,
  });
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function loadServiceConfig(
  settingsPath: string,
  options: Omit<ServiceConfigOptions, "sourcePath"> = {},
): ServiceConfig {
  let text: string;
  try {
    text = fs.readFileSync(settingsPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read settings file ${settingsPath}: ${describeCause(error)}`, { cause: error });
  }
  return buildServiceConfig(parseSettings(text), { ...options, sourcePath: settingsPath });
}

export type ServiceConfigResult =
  | { success: true; config: ServiceConfig }
  | { success: false; error: ConfigError };

/**
 * Same as {@link loadServiceConfig} but reports configuration failures as a
 * value. Anything other than a {@link ConfigError} is rethrown.
 */
export function loadServiceConfigSafe(
  settingsPath: string,
  options: Omit<ServiceConfigOptions, "sourcePath"> = {},
): ServiceConfigResult {
  try {
    return { success: true, config: loadServiceConfig(settingsPath, options) };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { success: false, error };
    }
    throw error;
  }
}

function formatOptionalAddress(socket: SocketAddress | undefined): string | undefined {
  return socket ? formatSocketAddress(socket) : undefined;
}

/** Flat, log-friendly view of a loaded configuration. */
export function describeServiceConfig(config: ServiceConfig): Record<string, unknown> {
  return {
    peerMode: config.peerMode,
    routerId: config.routerId,
    peerAs: config.peerAs,
    bgpPeer: formatOptionalAddress(config.bgpPeer),
    bmpPeer: formatOptionalAddress(config.bmpPeer),
    protoListen: formatOptionalAddress(config.protoListen),
    httpListen: formatSocketAddress(config.httpListen),
    httpRoot: config.httpRoot,
    httpTimeoutSeconds: config.httpTimeoutSeconds,
    historyDepth: config.historyDepth,
    historyMode: config.historyMode,
    purgeAfterWithdraws: config.purgeAfterWithdraws,
    purgeEveryMs: config.purgeEveryMs,
    whoisConfig: config.whoisConfig.sourcePath,
    whoisDb: config.whoisDb,
    whoisRequestTimeoutSeconds: config.whoisRequestTimeoutSeconds,
    whoisCacheSeconds: config.whoisCacheSeconds,
    whoisDnses: config.whoisDnses.map((resolver) => formatSocketAddress(resolver)),
  };
}
