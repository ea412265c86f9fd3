export type ConfigErrorLocator = {
  section?: string;
  key?: string;
};

export type ConfigErrorOptions = ConfigErrorLocator & {
  cause?: unknown;
};

/**
 * The single failure raised while turning a settings file into a
 * {@link ServiceConfig}. `section` and `key` point at the offending entry when
 * there is one.
 */
export class ConfigError extends Error {
  readonly section?: string;
  readonly key?: string;

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ConfigError";
    this.section = options.section;
    this.key = options.key;
  }

  get locator(): string | undefined {
    if (this.section === undefined) {
      return this.key;
    }
    return this.key === undefined ? `[${this.section}]` : `[${this.section}] ${this.key}`;
  }
}

export function isConfigError(value: unknown): value is ConfigError {
  return value instanceof ConfigError;
}
