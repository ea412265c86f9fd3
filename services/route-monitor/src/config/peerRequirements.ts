import type { PeerMode } from "./schema.js";

export type PeerEndpoint = "bgppeer" | "bmppeer" | "protolisten";

export type EndpointRequirements = Readonly<Record<PeerEndpoint, boolean>>;

export type EndpointAbsentPolicy = { kind: "required"; message: string } | { kind: "optional" };

const PEER_MODE_REQUIREMENTS: Readonly<Record<PeerMode, EndpointRequirements>> = Object.freeze({
  bgpactive: Object.freeze({ bgppeer: true, bmppeer: false, protolisten: false }),
  bgppassive: Object.freeze({ bgppeer: false, bmppeer: false, protolisten: true }),
  bmpactive: Object.freeze({ bgppeer: false, bmppeer: true, protolisten: false }),
  bmppassive: Object.freeze({ bgppeer: false, bmppeer: false, protolisten: true }),
});

/**
 * Active modes dial the remote router, passive modes listen for it.
 */
export function requiredEndpoints(mode: PeerMode): EndpointRequirements {
  return PEER_MODE_REQUIREMENTS[mode];
}

export function isEndpointRequired(mode: PeerMode, endpoint: PeerEndpoint): boolean {
  return PEER_MODE_REQUIREMENTS[mode][endpoint];
}

/**
 * Absence policy for an endpoint key: a hard failure when the mode needs it,
 * otherwise the field stays unset.
 */
export function endpointAbsentPolicy(mode: PeerMode, endpoint: PeerEndpoint): EndpointAbsentPolicy {
  return isEndpointRequired(mode, endpoint)
    ? { kind: "required", message: `${endpoint} was not specified` }
    : { kind: "optional" };
}
