import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { DeviceNotFoundError, NoDevicesFoundError } from "./errors.js";
import { UNKNOWN_DEVICE_NAME, resolveDevice, selectorFrom, toCandidate, toCandidates } from "./discovery.js";
import { castRecord } from "./testing/fakes.js";
import type { DeviceSelector } from "./types.js";

const candidates = toCandidates([
  castRecord("Living Room TV", "192.168.1.20"),
  castRecord("Bedroom Speaker", "192.168.1.21", 8010),
]);

describe("toCandidate", () => {
  it("prefers the friendly name and the first IPv4 address", () => {
    const candidate = toCandidate({
      name: "Chromecast-abc123",
      host: "chromecast.local",
      port: 8009,
      addresses: ["fe80::1", "192.168.1.40"],
      txt: { fn: "Den" },
    });

    expect(candidate).toEqual({
      device: { address: "192.168.1.40", port: 8009, displayName: "Den" },
      matchName: "Den",
    });
  });

  it("falls back through the alternative fields", () => {
    expect(toCandidate({ friendlyName: "Hall", referer: { address: "10.0.0.7" }, port: "8011" })).toEqual({
      device: { address: "10.0.0.7", port: 8011, displayName: "Hall" },
      matchName: "Hall",
    });
    expect(toCandidate({ name: "Garage", address: "10.0.0.8" })).toEqual({
      device: { address: "10.0.0.8", port: 8009, displayName: "Garage" },
      matchName: "Garage",
    });
  });

  it("uses a placeholder display name without making it matchable", () => {
    const candidate = toCandidate({ address: "10.0.0.9" });

    expect(candidate?.device.displayName).toBe(UNKNOWN_DEVICE_NAME);
    expect(candidate?.matchName).toBeUndefined();
    expect(() => resolveDevice(candidate ? [candidate] : [], { kind: "name", value: "unknown" })).toThrow(
      DeviceNotFoundError,
    );
  });

  it("drops records without an address", () => {
    expect(toCandidate({ txt: { fn: "Ghost" }, port: 8009 })).toBeUndefined();
    expect(toCandidate(null)).toBeUndefined();
    expect(toCandidate("192.168.1.1")).toBeUndefined();
  });
});

describe("toCandidates", () => {
  it("removes duplicates announced twice", () => {
    const record = castRecord("Living Room TV", "192.168.1.20");
    expect(toCandidates([record, record, { name: "no address" }])).toHaveLength(1);
  });
});

describe("selectorFrom", () => {
  it("prefers the address over the name", () => {
    expect(selectorFrom({ device: "tv", ip: "192.168.1.20" })).toEqual({ kind: "address", value: "192.168.1.20" });
    expect(selectorFrom({ device: "tv" })).toEqual({ kind: "name", value: "tv" });
    expect(selectorFrom({})).toEqual({ kind: "first" });
  });
});

describe("resolveDevice", () => {
  it("matches a name substring case-insensitively", () => {
    expect(resolveDevice(candidates, { kind: "name", value: "BEDROOM" })).toEqual({
      address: "192.168.1.21",
      port: 8010,
      displayName: "Bedroom Speaker",
    });
  });

  it("matches an exact address", () => {
    expect(resolveDevice(candidates, { kind: "address", value: "192.168.1.20" }).displayName).toBe("Living Room TV");
    expect(() => resolveDevice(candidates, { kind: "address", value: "192.168.1.2" })).toThrow(DeviceNotFoundError);
  });

  it("returns the first device when nothing is selected", () => {
    expect(resolveDevice(candidates, { kind: "first" }).address).toBe("192.168.1.20");
  });

  it("lists the available devices when nothing matches", () => {
    expect(() => resolveDevice(candidates, { kind: "name", value: "kitchen" })).toThrow(
      'No cast device matches name containing "kitchen". Available: Living Room TV (192.168.1.20), Bedroom Speaker (192.168.1.21)',
    );
  });

  it("fails with NoDevicesFoundError for an empty list whatever the selector", () => {
    const selectors = fc.oneof(
      fc.constant<DeviceSelector>({ kind: "first" }),
      fc.string().map((value): DeviceSelector => ({ kind: "name", value })),
      fc.ipV4().map((value): DeviceSelector => ({ kind: "address", value })),
    );

    fc.assert(
      fc.property(selectors, (selector) => {
        expect(() => resolveDevice([], selector)).toThrow(NoDevicesFoundError);
      }),
    );
  });

  it("only ever returns a device from the candidate list", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 6 }), (needle) => {
        try {
          const device = resolveDevice(candidates, { kind: "name", value: needle });
          expect(candidates.map((candidate) => candidate.device)).toContainEqual(device);
        } catch (error) {
          expect(error).toBeInstanceOf(DeviceNotFoundError);
        }
      }),
    );
  });
});
