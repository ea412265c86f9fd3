import { parse as parseIni } from "ini";

/**
 * A key that is present without a value maps to `undefined`; an absent key is
 * simply missing from its section.
 */
export type SettingsRecord = Record<string, Record<string, string | undefined>>;

type SectionValues = ReadonlyMap<string, string | undefined>;

/**
 * Read-only view over parsed settings. Lookups are exact and case-sensitive.
 */
export class RawSettings {
  private readonly sectionsByName: ReadonlyMap<string, SectionValues>;

  constructor(record: SettingsRecord) {
    const sections = new Map<string, SectionValues>();
    for (const [section, values] of Object.entries(record)) {
      sections.set(section, new Map(Object.entries(values)));
    }
    this.sectionsByName = sections;
    Object.freeze(this);
  }

  hasSection(section: string): boolean {
    return this.sectionsByName.has(section);
  }

  has(section: string, key: string): boolean {
    return this.sectionsByName.get(section)?.has(key) ?? false;
  }

  get(section: string, key: string): string | undefined {
    return this.sectionsByName.get(section)?.get(key);
  }

  sections(): string[] {
    return [...this.sectionsByName.keys()];
  }
}

export function createRawSettings(record: SettingsRecord): RawSettings {
  return new RawSettings(record);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// `ini` turns the texts true, false and null into literals; they are read back
// as the text they came from.
function toSettingValue(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean" || typeof value === "number" || value === null) {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => toSettingValue(item))
      .filter((item): item is string => item !== undefined)
      .join(",");
  }
  return undefined;
}

function collectSections(node: Record<string, unknown>, prefix: string | undefined, out: SettingsRecord): void {
  const values: Record<string, string | undefined> = {};
  let hasValues = false;
  let hasChildren = false;
  for (const [name, value] of Object.entries(node)) {
    if (isRecord(value)) {
      hasChildren = true;
      collectSections(value, prefix === undefined ? name : `${prefix}.${name}`, out);
      continue;
    }
    if (prefix === undefined) {
      // keys outside any section are not part of the settings model
      continue;
    }
    values[name] = toSettingValue(value);
    hasValues = true;
  }
  if (prefix !== undefined && (hasValues || !hasChildren)) {
    out[prefix] = values;
  }
}

// Same line grammar `ini` applies when decoding.
const INI_LINE = /^\[([^\]]*)\]\s*$|^([^=]+)(=(.*))?$/i;
const COMMENT_LINE = /^\s*[;#]/;

function unquote(text: string): string {
  const trimmed = text.trim();
  const quoted =
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) || (trimmed.startsWith("'") && trimmed.endsWith("'")));
  return quoted ? trimmed.slice(1, -1) : trimmed;
}

/**
 * `ini` reads a key written without `=` as `true`, which loses the difference
 * between a key with no value and one set to true. Scanning the lines again
 * recovers which keys of each section were last written bare.
 */
function findValuelessKeys(text: string): Map<string, Set<string>> {
  const valueless = new Map<string, Set<string>>();
  let section: string | undefined;
  for (const line of text.split(/[\r\n]+/)) {
    if (line.trim().length === 0 || COMMENT_LINE.test(line)) {
      continue;
    }
    const match = INI_LINE.exec(line);
    if (!match) {
      continue;
    }
    if (match[1] !== undefined) {
      section = unquote(match[1]).replace(/\\\./g, ".");
      continue;
    }
    const key = unquote(match[2] ?? "");
    if (section === undefined || key.endsWith("[]")) {
      continue;
    }
    let keys = valueless.get(section);
    if (!keys) {
      keys = new Set<string>();
      valueless.set(section, keys);
    }
    if (match[3] === undefined) {
      keys.add(key);
    } else {
      keys.delete(key);
    }
  }
  return valueless;
}

/**
 * Parses INI text with the `ini` package and adapts the result to
 * {@link RawSettings}. Dotted section names, which `ini` nests, are flattened
 * back to their dotted form. A key line without `=` becomes a key with no
 * value.
 */
export function parseSettings(text: string): RawSettings {
  const parsed: Record<string, unknown> = parseIni(text);
  const record: SettingsRecord = {};
  collectSections(parsed, undefined, record);
  for (const [section, keys] of findValuelessKeys(text)) {
    const values = record[section];
    if (!values) {
      continue;
    }
    for (const key of keys) {
      if (Object.hasOwn(values, key)) {
        values[key] = undefined;
      }
    }
  }
  return new RawSettings(record);
}
