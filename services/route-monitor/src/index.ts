export {
  formatSocketAddress,
  parseIpAddress,
  parseIpv4Address,
  parseSocketAddress,
  parseSocketAddressWithDefaultPort,
  type AddressFamily,
  type SocketAddress,
} from "./config/addresses.js";
export { ConfigError, isConfigError, type ConfigErrorLocator, type ConfigErrorOptions } from "./config/errors.js";
export {
  extractField,
  extractOptionalField,
  parseDnsResolverList,
  type AbsentPolicy,
  type FieldSpec,
  type RequiredFieldSpec,
} from "./config/fields.js";
export {
  buildServiceConfig,
  describeServiceConfig,
  loadServiceConfig,
  loadServiceConfigSafe,
  type ServiceConfigOptions,
  type ServiceConfigResult,
} from "./config/loadConfig.js";
export {
  endpointAbsentPolicy,
  isEndpointRequired,
  requiredEndpoints,
  type EndpointRequirements,
  type PeerEndpoint,
} from "./config/peerRequirements.js";
export {
  HistoryChangeModeSchema,
  PeerModeSchema,
  parseHistoryChangeMode,
  parsePeerMode,
  type HistoryChangeMode,
  type PeerMode,
  type ServiceConfig,
} from "./config/schema.js";
export { createRawSettings, parseSettings, RawSettings, type SettingsRecord } from "./config/settings.js";
export { loadWhoisResolverConfig, WhoisResolverConfig, type WhoisConfigLoader, type WhoisServer } from "./config/whois.js";
export { appLogger, createLogger, normalizeError, type AppLogger } from "./observability/logger.js";
export { loadStartupConfig, resolveSettingsPath } from "./startup.js";
