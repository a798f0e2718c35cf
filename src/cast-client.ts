import castv2 from "castv2-client";
import type { ApplicationSession, Callback, MediaInformation, MediaStatus } from "castv2-client";
import { CastConnectionError, PlaybackTimeoutError, errorMessage } from "./errors.js";
import type { CastController, CastDevice, MediaLoadRequest, ReceiverAppStatus, ReceiverChannel } from "./types.js";
import { Logger } from "./utils/logger.js";

export const MEDIA_NAMESPACE = "urn:x-cast:com.google.cast.media";
const CONNECT_TIMEOUT_MS = 10_000;

const call = <T>(invoke: (callback: Callback<T>) => void): Promise<T> =>
  new Promise((resolve, reject) => {
    invoke((error, result) => (error ? reject(error) : resolve(result)));
  });

export const buildMediaInformation = (request: MediaLoadRequest): MediaInformation => ({
  contentId: request.url,
  contentType: request.contentType,
  streamType: request.streamType,
  metadata: { type: 0, metadataType: 0, title: request.title },
});

export const isPlaybackActive = (status: MediaStatus | undefined): boolean =>
  status?.playerState === "PLAYING" || status?.playerState === "BUFFERING";

export const toAppStatus = (session: ApplicationSession | undefined): ReceiverAppStatus => ({
  appId: session?.appId,
  displayName: session?.displayName,
});

export const exposesMediaChannel = (session: ApplicationSession | undefined): boolean =>
  session?.namespaces?.some((namespace) => namespace.name === MEDIA_NAMESPACE) ?? false;

class Castv2Controller implements CastController {
  private player?: castv2.DefaultMediaReceiver;
  private lastMediaStatus?: MediaStatus;
  private readonly channels = new Set<ReceiverChannel>();

  constructor(
    private readonly client: castv2.Client,
    private readonly device: CastDevice,
    private readonly logger: Logger,
  ) {}

  private async activeSession(): Promise<ApplicationSession | undefined> {
    const sessions = await call<ApplicationSession[]>((cb) => this.client.getSessions(cb));
    return sessions.find((session) => !session.isIdleScreen);
  }

  async stopActiveApp(): Promise<void> {
    const session = await this.activeSession();
    if (!session) {
      this.logger.verboseLog("No receiver application running.");
      return;
    }
    this.logger.verboseLog(`Stopping ${session.displayName ?? session.appId} on ${this.device.displayName}`);
    await call<ApplicationSession[]>((cb) => this.client.receiver.stop(session.sessionId, cb));
    this.player = undefined;
  }

  async launchApp(appId: string): Promise<void> {
    await call<ApplicationSession[]>((cb) => this.client.receiver.launch(appId, cb));
  }

  async getAppStatus(): Promise<ReceiverAppStatus> {
    return toAppStatus(await this.activeSession());
  }

  async openChannel(namespace: string): Promise<ReceiverChannel> {
    const session = await this.activeSession();
    if (!session) {
      throw new CastConnectionError(`No receiver application is running to listen on ${namespace}.`);
    }

    const app = await call<castv2.Application>((cb) => this.client.join(session, castv2.Application, cb));
    // No encoding: payloads arrive as raw strings and are decoded by the handshake.
    const controller = app.createController(castv2.Controller, namespace);

    const channel: ReceiverChannel = {
      onMessage: (listener) => {
        const handler = (data: unknown) => listener(data);
        controller.on("message", handler);
        return () => {
          controller.off("message", handler);
        };
      },
      close: () => {
        this.channels.delete(channel);
        controller.close();
        app.close();
      },
    };
    this.channels.add(channel);
    return channel;
  }

  async loadMedia(request: MediaLoadRequest): Promise<void> {
    const session = await this.activeSession();
    let player: castv2.DefaultMediaReceiver;
    if (session && exposesMediaChannel(session)) {
      this.logger.verboseLog(`Using media channel of running app ${session.displayName ?? session.appId}.`);
      player = await call<castv2.DefaultMediaReceiver>((cb) =>
        this.client.join(session, castv2.DefaultMediaReceiver, cb),
      );
    } else {
      this.logger.verboseLog("Running app has no media channel, launching the default media receiver.");
      player = await call<castv2.DefaultMediaReceiver>((cb) => this.client.launch(castv2.DefaultMediaReceiver, cb));
    }

    player.on("status", (status: MediaStatus) => {
      this.lastMediaStatus = status;
      this.logger.verboseLog(`Media status: ${status.playerState ?? "unknown"}`);
    });
    this.player = player;

    this.lastMediaStatus = await call<MediaStatus>((cb) =>
      player.load(buildMediaInformation(request), { autoplay: true }, cb),
    );
  }

  waitForPlayback(timeoutMs: number): Promise<void> {
    const player = this.player;
    if (!player) {
      return Promise.reject(new Error("No media has been loaded."));
    }
    if (isPlaybackActive(this.lastMediaStatus)) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onStatus = (status: MediaStatus) => {
        if (isPlaybackActive(status)) {
          clearTimeout(timer);
          player.off("status", onStatus);
          resolve();
        }
      };
      const timer = setTimeout(() => {
        player.off("status", onStatus);
        reject(new PlaybackTimeoutError(timeoutMs));
      }, timeoutMs);
      player.on("status", onStatus);
    });
  }

  async stopMedia(): Promise<void> {
    const player = this.player;
    if (!player) {
      return;
    }
    await call<MediaStatus>((cb) => player.stop(cb));
  }

  close(): void {
    for (const channel of [...this.channels]) {
      channel.close();
    }
    try {
      this.player?.close();
    } catch (error) {
      this.logger.verboseLog(`Closing media channel failed: ${errorMessage(error)}`);
    }
    this.player = undefined;
    this.client.close();
  }
}

export const connectCastDevice = (device: CastDevice, logger: Logger): Promise<CastController> =>
  new Promise((resolve, reject) => {
    const client = new castv2.Client();

    const fail = (error: Error) => {
      clearTimeout(timer);
      client.close();
      reject(new CastConnectionError(`Could not connect to ${device.displayName} at ${device.address}:${device.port}: ${error.message}`, error));
    };

    const timer = setTimeout(
      () => fail(new Error(`no response within ${CONNECT_TIMEOUT_MS / 1000} s`)),
      CONNECT_TIMEOUT_MS,
    );

    client.once("error", fail);
    client.connect({ host: device.address, port: device.port }, () => {
      clearTimeout(timer);
      client.off("error", fail);
      client.on("error", (error: Error) => logger.warn(`Cast connection error: ${error.message}`));
      logger.verboseLog(`Connected to ${device.displayName} at ${device.address}:${device.port}`);
      resolve(new Castv2Controller(client, device, logger));
    });
  });
