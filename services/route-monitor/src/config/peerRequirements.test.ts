import { describe, expect, it } from "vitest";

import { endpointAbsentPolicy, isEndpointRequired, requiredEndpoints } from "./peerRequirements.js";

describe("requiredEndpoints", () => {
  it.each([
    ["bgpactive", { bgppeer: true, bmppeer: false, protolisten: false }],
    ["bgppassive", { bgppeer: false, bmppeer: false, protolisten: true }],
    ["bmpactive", { bgppeer: false, bmppeer: true, protolisten: false }],
    ["bmppassive", { bgppeer: false, bmppeer: false, protolisten: true }],
  ] as const)("maps %s to its mandatory endpoints", (mode, expected) => {
    expect(requiredEndpoints(mode)).toEqual(expected);
  });

  it("returns frozen tables", () => {
    expect(Object.isFrozen(requiredEndpoints("bgpactive"))).toBe(true);
  });
});

describe("endpointAbsentPolicy", () => {
  it("requires endpoints the mode depends on", () => {
    expect(isEndpointRequired("bmpactive", "bmppeer")).toBe(true);
    expect(endpointAbsentPolicy("bmpactive", "bmppeer")).toEqual({
      kind: "required",
      message: "bmppeer was not specified",
    });
  });

  it("leaves other endpoints optional", () => {
    expect(endpointAbsentPolicy("bmpactive", "bgppeer")).toEqual({ kind: "optional" });
  });
});
