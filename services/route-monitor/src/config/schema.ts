/**
 * Vocabularies and value types of the service configuration.
 */

import { z } from "zod";

import type { SocketAddress } from "./addresses.js";
import type { WhoisResolverConfig } from "./whois.js";

// ============================================================================
// Peer Mode
// ============================================================================

export const PeerModeSchema = z.enum(["bgpactive", "bgppassive", "bmppassive", "bmpactive"]);
export type PeerMode = z.infer<typeof PeerModeSchema>;

// ============================================================================
// History Mode
// ============================================================================

/** `every` records each update; `differ` records only attribute changes. */
export const HistoryChangeModeSchema = z.enum(["every", "differ"]);
export type HistoryChangeMode = z.infer<typeof HistoryChangeModeSchema>;

// ============================================================================
// Whois Servers Document
// ============================================================================

export const WhoisServerEntrySchema = z.union([
  z.string().min(1),
  z.object({
    host: z.string().min(1),
    query: z.string().optional(),
    punycode: z.boolean().optional(),
  }),
]);
export type WhoisServerEntry = z.infer<typeof WhoisServerEntrySchema>;

export const WhoisIpServersSchema = z.object({
  ip: WhoisServerEntrySchema,
});

/** Key of the entry naming the address-block whois server. */
export const WHOIS_IP_SERVERS_KEY = "_";

export const WhoisServersDocumentSchema = z
  .record(z.union([WhoisServerEntrySchema, WhoisIpServersSchema]))
  .superRefine((document, ctx) => {
    for (const [name, entry] of Object.entries(document)) {
      const isIpEntry = typeof entry === "object" && "ip" in entry;
      if (isIpEntry === (name === WHOIS_IP_SERVERS_KEY)) {
        continue;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [name],
        message: isIpEntry
          ? `an { ip } entry is only allowed under "${WHOIS_IP_SERVERS_KEY}"`
          : `"${WHOIS_IP_SERVERS_KEY}" must hold an { ip } entry`,
      });
    }
  });
export type WhoisServersDocument = z.infer<typeof WhoisServersDocumentSchema>;

// ============================================================================
// Service Configuration
// ============================================================================

export type ServiceConfig = Readonly<{
  routerId: string;
  peerAs: number;
  bgpPeer?: Readonly<SocketAddress>;
  bmpPeer?: Readonly<SocketAddress>;
  protoListen?: Readonly<SocketAddress>;
  httpListen: Readonly<SocketAddress>;
  httpRoot: string;
  historyDepth: number;
  httpTimeoutSeconds: number;
  historyMode: HistoryChangeMode;
  whoisConfig: WhoisResolverConfig;
  whoisDb: string;
  whoisRequestTimeoutSeconds: number;
  whoisCacheSeconds: number;
  whoisDnses: ReadonlyArray<Readonly<SocketAddress>>;
  peerMode: PeerMode;
  purgeAfterWithdraws: number;
  purgeEveryMs: number;
}>;

/**
 * Returns the first whitespace-separated token, which is all the mode keys
 * look at.
 */
export function firstToken(value: string): string {
  return value.trim().split(/\s+/, 1)[0] ?? "";
}

export function parsePeerMode(value: string): PeerMode | undefined {
  const result = PeerModeSchema.safeParse(firstToken(value));
  return result.success ? result.data : undefined;
}

export function parseHistoryChangeMode(value: string): HistoryChangeMode | undefined {
  const result = HistoryChangeModeSchema.safeParse(firstToken(value));
  return result.success ? result.data : undefined;
}
