import { appLogger, normalizeError } from "./observability/logger.js";
import { loadStartupConfig, resolveSettingsPath } from "./startup.js";

const settingsPath = resolveSettingsPath();

try {
  loadStartupConfig(settingsPath);
} catch (error) {
  appLogger.error({ err: normalizeError(error), settingsPath }, "route monitor startup failed");
  process.exit(1);
}
