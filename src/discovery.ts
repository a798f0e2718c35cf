import { Bonjour } from "bonjour-service";
import { isIPv4 } from "net";
import { DeviceNotFoundError, NoDevicesFoundError } from "./errors.js";
import type { CastDevice, DeviceCandidate, DeviceSelector } from "./types.js";
import { Logger } from "./utils/logger.js";

export const CAST_SERVICE_TYPE = "googlecast";
export const DEFAULT_CAST_PORT = 8009;
export const UNKNOWN_DEVICE_NAME = "Unknown cast device";

type Accessor<T> = (record: unknown) => T | undefined;

const field = (source: unknown, ...path: string[]): unknown => {
  let current = source;
  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
};

const text =
  (...path: string[]): Accessor<string> =>
  (record) => {
    const value = field(record, ...path);
    if (Buffer.isBuffer(value)) {
      return value.toString("utf-8").trim() || undefined;
    }
    return typeof value === "string" && value.trim() ? value.trim() : undefined;
  };

const firstIpv4 =
  (...path: string[]): Accessor<string> =>
  (record) => {
    const value = field(record, ...path);
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.find((entry): entry is string => typeof entry === "string" && isIPv4(entry));
  };

const portNumber =
  (...path: string[]): Accessor<number> =>
  (record) => {
    const value = field(record, ...path);
    const port = typeof value === "string" ? Number(value) : value;
    return typeof port === "number" && Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
  };

// Discovery records differ between mDNS stacks and versions; each list is tried in order.
export const NAME_ACCESSORS: Accessor<string>[] = [text("txt", "fn"), text("friendlyName"), text("name")];
export const ADDRESS_ACCESSORS: Accessor<string>[] = [
  firstIpv4("addresses"),
  text("referer", "address"),
  text("address"),
  text("host"),
];
export const PORT_ACCESSORS: Accessor<number>[] = [portNumber("port")];

export const firstAvailable = <T>(record: unknown, accessors: Accessor<T>[]): T | undefined => {
  for (const accessor of accessors) {
    const value = accessor(record);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
};

export const toCandidate = (record: unknown): DeviceCandidate | undefined => {
  const address = firstAvailable(record, ADDRESS_ACCESSORS);
  if (!address) {
    return undefined;
  }

  const matchName = firstAvailable(record, NAME_ACCESSORS);
  return {
    device: {
      address,
      port: firstAvailable(record, PORT_ACCESSORS) ?? DEFAULT_CAST_PORT,
      displayName: matchName ?? UNKNOWN_DEVICE_NAME,
    },
    matchName,
  };
};

/**
 * Turn raw discovery records into candidates, dropping records without an address and
 * duplicates announced on several interfaces.
 */
export const toCandidates = (records: readonly unknown[]): DeviceCandidate[] => {
  const seen = new Set<string>();
  const candidates: DeviceCandidate[] = [];
  for (const record of records) {
    const candidate = toCandidate(record);
    if (!candidate) {
      continue;
    }
    const key = `${candidate.device.address}:${candidate.device.port}`;
    if (!seen.has(key)) {
      seen.add(key);
      candidates.push(candidate);
    }
  }
  return candidates;
};

export const selectorFrom = (options: { device?: string; ip?: string }): DeviceSelector => {
  if (options.ip) {
    return { kind: "address", value: options.ip };
  }
  if (options.device) {
    return { kind: "name", value: options.device };
  }
  return { kind: "first" };
};

export const resolveDevice = (candidates: readonly DeviceCandidate[], selector: DeviceSelector): CastDevice => {
  if (candidates.length === 0) {
    throw new NoDevicesFoundError();
  }

  let match: DeviceCandidate | undefined;
  switch (selector.kind) {
    case "first":
      match = candidates[0];
      break;
    case "address":
      match = candidates.find((candidate) => candidate.device.address === selector.value);
      break;
    case "name": {
      const needle = selector.value.toLowerCase();
      match = candidates.find((candidate) => candidate.matchName?.toLowerCase().includes(needle) ?? false);
      break;
    }
  }

  if (!match) {
    throw new DeviceNotFoundError(
      selector,
      candidates.map((candidate) => `${candidate.device.displayName} (${candidate.device.address})`),
    );
  }
  return match.device;
};

export interface DiscoveryOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Browse `_googlecast._tcp` for `timeoutMs` and return every service record seen.
 * Resolves early (with what it has) when the signal aborts.
 */
export const discoverCastServices = (options: DiscoveryOptions, logger: Logger): Promise<unknown[]> =>
  new Promise((resolve) => {
    const bonjour = new Bonjour();
    const records: unknown[] = [];

    const browser = bonjour.find({ type: CAST_SERVICE_TYPE }, (service) => {
      logger.verboseLog(`Discovered ${service.name} at ${service.host}:${service.port}`);
      records.push(service);
    });

    const finish = () => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", finish);
      browser.stop();
      bonjour.destroy();
      resolve(records);
    };

    const timer = setTimeout(finish, options.timeoutMs);
    options.signal?.addEventListener("abort", finish, { once: true });
  });
