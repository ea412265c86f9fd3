import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  section?: string;
  key?: string;
  cause?: unknown;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
};

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME?.trim();
  return envName && envName.length > 0 ? envName : "route-monitor";
}

function buildLoggerOptions(overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions = buildLoggerOptions(options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  if (options.serviceName) {
    loggerOptions.base = { ...(loggerOptions.base ?? {}), service: options.serviceName };
  }
  const logger = pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "config" } });
export default appLogger;

function readStringField(value: object, field: string): string | undefined {
  const candidate: unknown = Reflect.get(value, field);
  return typeof candidate === "string" ? candidate : undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const section = readStringField(error, "section");
    if (section !== undefined) {
      normalized.section = section;
    }
    const key = readStringField(error, "key");
    if (key !== undefined) {
      normalized.key = key;
    }
    if (error.cause !== undefined) {
      normalized.cause = normalizeError(error.cause);
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
