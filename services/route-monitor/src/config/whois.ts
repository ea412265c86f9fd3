import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors.js";
import {
  WHOIS_IP_SERVERS_KEY,
  WhoisServersDocumentSchema,
  type WhoisServerEntry,
  type WhoisServersDocument,
} from "./schema.js";

export type WhoisServer = {
  host: string;
  query?: string;
  punycode: boolean;
};

const DEFAULT_SERVER_KEY = "";

function toWhoisServer(entry: WhoisServerEntry): WhoisServer {
  if (typeof entry === "string") {
    return Object.freeze({ host: entry, punycode: true });
  }
  const server: WhoisServer = { host: entry.host, punycode: entry.punycode ?? true };
  if (entry.query !== undefined) {
    server.query = entry.query;
  }
  return Object.freeze(server);
}

/**
 * Whois server table handed to the whois resolver. Domain lookups walk from
 * the full name towards its TLD and end at the `""` default entry.
 */
export class WhoisResolverConfig {
  readonly sourcePath: string;
  readonly servers: ReadonlyMap<string, WhoisServer>;
  readonly ipServer?: WhoisServer;

  constructor(sourcePath: string, document: WhoisServersDocument) {
    const servers = new Map<string, WhoisServer>();
    let ipServer: WhoisServer | undefined;
    for (const [name, entry] of Object.entries(document)) {
      if (typeof entry === "object" && "ip" in entry) {
        if (name === WHOIS_IP_SERVERS_KEY) {
          ipServer = toWhoisServer(entry.ip);
        }
        continue;
      }
      servers.set(name.toLowerCase(), toWhoisServer(entry));
    }
    this.sourcePath = sourcePath;
    this.servers = servers;
    this.ipServer = ipServer;
    Object.freeze(this);
  }

  serverFor(domain: string): WhoisServer | undefined {
    const labels = domain.trim().toLowerCase().replace(/\.+$/, "").split(".");
    for (let index = 0; index < labels.length; index += 1) {
      const suffix = labels.slice(index).join(".");
      const server = this.servers.get(suffix);
      if (server && suffix.length > 0) {
        return server;
      }
    }
    return this.servers.get(DEFAULT_SERVER_KEY);
  }
}

export type WhoisConfigLoader = (configPath: string) => WhoisResolverConfig;

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const loadWhoisResolverConfig: WhoisConfigLoader = (configPath) => {
  const resolved = path.resolve(configPath);
  const locator = { section: "main", key: "whoisjsonconfig" };

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new ConfigError(`Invalid whoisjsonconfig - cannot read ${resolved}: ${describeCause(error)}`, {
      ...locator,
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid whoisjsonconfig - ${resolved} is not valid JSON: ${describeCause(error)}`, {
      ...locator,
      cause: error,
    });
  }

  const result = WhoisServersDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new ConfigError(
      `Invalid whoisjsonconfig - ${resolved}${where}: ${issue?.message ?? "unexpected document shape"}`,
      { ...locator, cause: result.error },
    );
  }

  return new WhoisResolverConfig(resolved, result.data);
};
