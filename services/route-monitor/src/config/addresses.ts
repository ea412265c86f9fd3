import ipaddr from "ipaddr.js";

export type AddressFamily = "ipv4" | "ipv6";

export type SocketAddress = {
  address: string;
  port: number;
  family: AddressFamily;
};

const DOTTED_QUAD_PATTERN = /^(0|[1-9]\d{0,2})(\.(0|[1-9]\d{0,2})){3}$/;
const PORT_PATTERN = /^\d+$/;
const MAX_PORT = 65535;

export function parseIpv4Address(value: string): string | undefined {
  if (!DOTTED_QUAD_PATTERN.test(value) || !ipaddr.IPv4.isValid(value)) {
    return undefined;
  }
  return ipaddr.IPv4.parse(value).toString();
}

function parseIpv6Address(value: string): string | undefined {
  // zone identifiers are not accepted in settings
  if (value.includes("%") || !ipaddr.IPv6.isValid(value)) {
    return undefined;
  }
  return ipaddr.IPv6.parse(value).toString();
}

function parsePort(value: string): number | undefined {
  if (!PORT_PATTERN.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return port <= MAX_PORT ? port : undefined;
}

/**
 * Parses a bare IPv4 (dotted quad) or IPv6 literal. Host names are rejected.
 */
export function parseIpAddress(value: string): { address: string; family: AddressFamily } | undefined {
  const v4 = parseIpv4Address(value);
  if (v4 !== undefined) {
    return { address: v4, family: "ipv4" };
  }
  const v6 = parseIpv6Address(value);
  if (v6 !== undefined) {
    return { address: v6, family: "ipv6" };
  }
  return undefined;
}

/**
 * Parses `a.b.c.d:port` or `[v6]:port`.
 */
export function parseSocketAddress(value: string): SocketAddress | undefined {
  if (value.startsWith("[")) {
    const closing = value.indexOf("]:");
    if (closing < 0) {
      return undefined;
    }
    const address = parseIpv6Address(value.slice(1, closing));
    const port = parsePort(value.slice(closing + 2));
    if (address === undefined || port === undefined) {
      return undefined;
    }
    return { address, port, family: "ipv6" };
  }

  const separator = value.lastIndexOf(":");
  if (separator <= 0) {
    return undefined;
  }
  const address = parseIpv4Address(value.slice(0, separator));
  const port = parsePort(value.slice(separator + 1));
  if (address === undefined || port === undefined) {
    return undefined;
  }
  return { address, port, family: "ipv4" };
}

/**
 * Parses a full socket address, falling back to a bare IP paired with
 * `defaultPort`.
 */
export function parseSocketAddressWithDefaultPort(value: string, defaultPort: number): SocketAddress | undefined {
  const full = parseSocketAddress(value);
  if (full) {
    return full;
  }
  const ip = parseIpAddress(value);
  return ip ? { ...ip, port: defaultPort } : undefined;
}

export function formatSocketAddress(socket: SocketAddress): string {
  return socket.family === "ipv6" ? `[${socket.address}]:${socket.port}` : `${socket.address}:${socket.port}`;
}
