import { SignalDecodeError, StartSignalTimeoutError, errorMessage } from "./errors.js";
import type { CastController, ReceiverAppStatus } from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { Logger } from "./utils/logger.js";
import { abortable, sleep } from "./utils/timing.js";

export const START_SIGNAL_TYPE = "start";

/**
 * Decode a channel payload. Strings and buffers are parsed as JSON; anything else
 * is taken as already structured.
 */
export const decodeSignalPayload = (payload: unknown): unknown => {
  const raw = Buffer.isBuffer(payload) ? payload.toString("utf-8") : payload;
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SignalDecodeError(raw, error);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isStartSignal = (payload: unknown): boolean => {
  let decoded: unknown;
  try {
    decoded = decodeSignalPayload(payload);
  } catch (error) {
    if (error instanceof SignalDecodeError) {
      return false;
    }
    throw error;
  }
  return isRecord(decoded) && decoded.type === START_SIGNAL_TYPE;
};

const describePayload = (payload: unknown): string => {
  const text = typeof payload === "string" || Buffer.isBuffer(payload) ? payload.toString() : String(JSON.stringify(payload));
  return text.length > 120 ? `${text.slice(0, 120)}...` : text;
};

/**
 * One-shot flag set by the first start signal. Later messages, start or not, are ignored.
 */
export class StartSignalWatcher {
  private readonly started = createDeferred<void>();
  private set = false;

  constructor(private readonly logger: Logger) {}

  get isSet(): boolean {
    return this.set;
  }

  get promise(): Promise<void> {
    return this.started.promise;
  }

  handle(payload: unknown): boolean {
    if (this.set) {
      return false;
    }

    if (!isStartSignal(payload)) {
      this.logger.verboseLog(`Ignoring receiver message: ${describePayload(payload)}`);
      return false;
    }

    this.set = true;
    this.started.resolve();
    return true;
  }
}

const raceAbort = <T>(request: Promise<T>, signal?: AbortSignal): Promise<T> =>
  signal ? abortable(request, signal) : request;

export interface LaunchOptions {
  settleMs: number;
  signal?: AbortSignal;
}

/**
 * Replace whatever runs on the receiver with `appId`. The receiver may refuse an
 * unregistered app and fall back to another one; that is reported, not raised.
 */
export const launchReceiverApp = async (
  cast: CastController,
  appId: string,
  options: LaunchOptions,
  logger: Logger,
): Promise<ReceiverAppStatus> => {
  const { signal } = options;
  try {
    await raceAbort(cast.stopActiveApp(), signal);
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    logger.warn(`Could not stop the running receiver app: ${errorMessage(error)}`);
  }

  logger.info(`Launching receiver app ${appId}...`);
  await raceAbort(cast.launchApp(appId), signal);
  await sleep(options.settleMs, signal);

  const status = await raceAbort(cast.getAppStatus(), signal);
  logger.info(`Running app: ${status.appId ?? "none"} | display name: ${status.displayName ?? "unknown"}`);
  if (status.appId !== appId) {
    logger.warn(`Receiver is running ${status.appId ?? "no app"} instead of ${appId}. Check the app registration.`);
  }
  return status;
};

export interface AwaitStartOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Suspend until the receiver app broadcasts `{"type":"start"}` on `namespace`.
 * Without `timeoutMs` this waits until the signal aborts.
 */
export const awaitStartSignal = async (
  cast: CastController,
  namespace: string,
  options: AwaitStartOptions,
  logger: Logger,
): Promise<void> => {
  const channel = await raceAbort(cast.openChannel(namespace), options.signal);
  const watcher = new StartSignalWatcher(logger);
  const unsubscribe = channel.onMessage((payload) => {
    if (watcher.handle(payload)) {
      logger.success("Receiver sent the start signal.");
    }
  });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    if (options.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => reject(new StartSignalTimeoutError(namespace, timeoutMs)), timeoutMs);
    }
  });

  logger.info(
    `Waiting for the start signal on ${namespace}` +
      (options.timeoutMs !== undefined ? ` (up to ${options.timeoutMs / 1000} s)...` : "..."),
  );

  try {
    await raceAbort(Promise.race([watcher.promise, timeout]), options.signal);
  } finally {
    clearTimeout(timer);
    unsubscribe();
    channel.close();
  }
};
