import type { DeviceSelector } from "./types.js";

export class StreamError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class DiscoveryError extends StreamError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class NoDevicesFoundError extends DiscoveryError {
  constructor() {
    super("No cast devices found on the local network.");
  }
}

export const describeSelector = (selector: DeviceSelector): string => {
  switch (selector.kind) {
    case "name":
      return `name containing "${selector.value}"`;
    case "address":
      return `address ${selector.value}`;
    case "first":
      return "first discovered device";
  }
};

export class DeviceNotFoundError extends DiscoveryError {
  public readonly selector: DeviceSelector;

  constructor(selector: DeviceSelector, available: string[]) {
    const list = available.length > 0 ? ` Available: ${available.join(", ")}` : "";
    super(`No cast device matches ${describeSelector(selector)}.${list}`);
    this.selector = selector;
  }
}

export class CastConnectionError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 3, { cause });
  }
}

export class AudioProvisioningError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 1, { cause });
  }
}

export class VirtualDisplayError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 1, { cause });
  }
}

export class CastRequestTimeoutError extends StreamError {
  constructor(operation: string, timeoutMs: number) {
    super(`Receiver did not answer "${operation}" within ${timeoutMs} ms.`, 3);
  }
}

export class EncoderSpawnError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, 1, { cause });
  }
}

export class EncoderExitedError extends StreamError {
  public readonly code: number | null;

  constructor(code: number | null) {
    super(`Encoder exited unexpectedly (code ${code ?? "none"}).`);
    this.code = code;
  }
}

export class PlaybackTimeoutError extends StreamError {
  constructor(timeoutMs: number) {
    super(`Receiver did not report active playback within ${timeoutMs} ms.`);
  }
}

export class SignalDecodeError extends StreamError {
  public readonly payload: string;

  constructor(payload: string, cause?: unknown) {
    super(`Could not decode receiver message: ${payload.slice(0, 80)}`, 1, { cause });
    this.payload = payload;
  }
}

export class StartSignalTimeoutError extends StreamError {
  constructor(namespace: string, timeoutMs: number) {
    super(`No start signal on ${namespace} within ${timeoutMs / 1000} s.`, 4);
  }
}

export class LanPathError extends StreamError {
  constructor(localAddress: string, deviceAddress: string) {
    super(
      `Stream path is not local: this host is ${localAddress}, receiver is ${deviceAddress}. ` +
        "Drop --lan-only to stream anyway.",
      5,
    );
  }
}

export class SessionInterruptedError extends StreamError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Session interrupted (${reason}).`, 0);
    this.reason = reason;
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
