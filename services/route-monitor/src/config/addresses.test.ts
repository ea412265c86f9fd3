import { describe, expect, it } from "vitest";

import {
  formatSocketAddress,
  parseIpAddress,
  parseIpv4Address,
  parseSocketAddress,
  parseSocketAddressWithDefaultPort,
} from "./addresses.js";

describe("parseIpv4Address", () => {
  it("accepts dotted-quad literals", () => {
    expect(parseIpv4Address("192.0.2.1")).toBe("192.0.2.1");
  });

  it("rejects octets with leading zeros", () => {
    expect(parseIpv4Address("010.0.0.1")).toBeUndefined();
  });

  it("rejects octets above 255", () => {
    expect(parseIpv4Address("256.0.0.1")).toBeUndefined();
  });

  it("rejects short forms and host names", () => {
    expect(parseIpv4Address("10.1")).toBeUndefined();
    expect(parseIpv4Address("router.example")).toBeUndefined();
  });
});

describe("parseIpAddress", () => {
  it("detects the address family", () => {
    expect(parseIpAddress("198.51.100.7")).toEqual({ address: "198.51.100.7", family: "ipv4" });
    expect(parseIpAddress("2001:db8::1")).toEqual({ address: "2001:db8::1", family: "ipv6" });
  });

  it("rejects zone identifiers", () => {
    expect(parseIpAddress("fe80::1%eth0")).toBeUndefined();
  });
});

describe("parseSocketAddress", () => {
  it("parses ipv4 host:port", () => {
    expect(parseSocketAddress("10.0.0.1:179")).toEqual({ address: "10.0.0.1", port: 179, family: "ipv4" });
  });

  it("parses bracketed ipv6 host:port", () => {
    expect(parseSocketAddress("[2001:db8::1]:8080")).toEqual({
      address: "2001:db8::1",
      port: 8080,
      family: "ipv6",
    });
  });

  it("requires a port", () => {
    expect(parseSocketAddress("10.0.0.1")).toBeUndefined();
    expect(parseSocketAddress("10.0.0.1:")).toBeUndefined();
    expect(parseSocketAddress("2001:db8::1")).toBeUndefined();
  });

  it("rejects ports outside the 16-bit range", () => {
    expect(parseSocketAddress("10.0.0.1:65535")?.port).toBe(65535);
    expect(parseSocketAddress("10.0.0.1:65536")).toBeUndefined();
  });

  it("rejects host names", () => {
    expect(parseSocketAddress("dns.example:53")).toBeUndefined();
  });
});

describe("parseSocketAddressWithDefaultPort", () => {
  it("keeps an explicit port", () => {
    expect(parseSocketAddressWithDefaultPort("10.0.0.1:1790", 179)?.port).toBe(1790);
  });

  it("pairs a bare address with the default port", () => {
    expect(parseSocketAddressWithDefaultPort("10.0.0.1", 632)).toEqual({
      address: "10.0.0.1",
      port: 632,
      family: "ipv4",
    });
    expect(parseSocketAddressWithDefaultPort("2001:db8::2", 179)).toEqual({
      address: "2001:db8::2",
      port: 179,
      family: "ipv6",
    });
  });

  it("returns undefined when neither form parses", () => {
    expect(parseSocketAddressWithDefaultPort("peer.example", 179)).toBeUndefined();
  });
});

describe("formatSocketAddress", () => {
  it("brackets ipv6 addresses", () => {
    expect(formatSocketAddress({ address: "10.0.0.1", port: 179, family: "ipv4" })).toBe("10.0.0.1:179");
    expect(formatSocketAddress({ address: "2001:db8::1", port: 632, family: "ipv6" })).toBe("[2001:db8::1]:632");
  });
});
