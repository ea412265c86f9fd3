import fs from "node:fs";
import path from "node:path";

import { describeServiceConfig, loadServiceConfig, type ServiceConfigOptions } from "./config/loadConfig.js";
import type { ServiceConfig } from "./config/schema.js";
import { appLogger, normalizeError } from "./observability/logger.js";

export const SETTINGS_PATH_ENV = "ROUTE_MONITOR_CONFIG";
export const SETTINGS_PATH_FILE_ENV = `${SETTINGS_PATH_ENV}_FILE`;
export const DEFAULT_SETTINGS_FILE = "route-monitor.ini";

function readPathFile(file: string): string | undefined {
  try {
    const content = fs.readFileSync(file, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch (error) {
    appLogger.warn({ file, err: normalizeError(error) }, `${SETTINGS_PATH_FILE_ENV} is unreadable, ignoring it`);
    return undefined;
  }
}

/**
 * Settings file location: the path stored in the file named by
 * `ROUTE_MONITOR_CONFIG_FILE`, then `ROUTE_MONITOR_CONFIG`, then
 * `route-monitor.ini` in the working directory.
 */
export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const pathFile = env[SETTINGS_PATH_FILE_ENV]?.trim();
  if (pathFile) {
    const fromFile = readPathFile(pathFile);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = env[SETTINGS_PATH_ENV]?.trim();
  if (direct) {
    return direct;
  }
  return path.join(process.cwd(), DEFAULT_SETTINGS_FILE);
}

/**
 * Loads the service configuration once at process start and logs what was
 * resolved. Failures propagate to the caller.
 */
export function loadStartupConfig(
  settingsPath: string = resolveSettingsPath(),
  options: Omit<ServiceConfigOptions, "sourcePath"> = {},
): ServiceConfig {
  const config = loadServiceConfig(settingsPath, options);
  appLogger.info({ settingsPath, config: describeServiceConfig(config) }, "service configuration loaded");
  return config;
}
