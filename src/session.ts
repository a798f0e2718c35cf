import {
  CastRequestTimeoutError,
  EncoderExitedError,
  EncoderSpawnError,
  LanPathError,
  PlaybackTimeoutError,
  SessionInterruptedError,
  VirtualDisplayError,
  errorMessage,
} from "./errors.js";
import {
  FFMPEG_BINARY,
  STREAM_CONTENT_TYPE,
  buildEncoderArgs,
  computeGop,
  formatCommand,
  latencyFlags,
  selectEncoderProfile,
} from "./ffmpeg.js";
import { resolveDevice, selectorFrom, toCandidates } from "./discovery.js";
import { awaitStartSignal, launchReceiverApp } from "./handshake.js";
import { buildStreamUrl, isSameSubnet } from "./network.js";
import type { AudioBridge } from "./pulseaudio.js";
import type {
  AudioSinkHandle,
  CastController,
  CastDevice,
  DeviceCandidate,
  EncoderProfile,
  HardwareProbe,
  ManagedProcessHandle,
  SessionState,
  StreamOptions,
  VirtualDisplayInfo,
} from "./types.js";
import { Logger } from "./utils/logger.js";
import { abortable, sleep, withTimeout } from "./utils/timing.js";
import type { VirtualDisplayController, VirtualDisplayOptions } from "./virtual-display.js";

export const ENCODER_STARTUP_GRACE_MS = 1_000;
export const RECEIVER_TEARDOWN_TIMEOUT_MS = 3_000;
const IDLE_TICK_MS = 60_000;

export interface SessionDependencies {
  discoverDevices: (options: { timeoutMs: number; signal: AbortSignal }) => Promise<unknown[]>;
  chooseDevice?: (candidates: DeviceCandidate[]) => Promise<CastDevice>;
  connect: (device: CastDevice) => Promise<CastController>;
  audio: AudioBridge;
  probeHardware: () => Promise<HardwareProbe>;
  terminateStaleEncoders: (port: number) => Promise<void>;
  spawnEncoder: (args: readonly string[], onExit: (code: number | null) => void) => ManagedProcessHandle;
  resolveLocalAddress: (host: string, port: number) => Promise<string>;
  createVirtualDisplay?: (options: VirtualDisplayOptions) => VirtualDisplayController;
  encoderStartupGraceMs?: number;
  // Upper bound on each receiver request made while tearing down.
  receiverTeardownTimeoutMs?: number;
}

export type StateListener = (state: SessionState, previous: SessionState) => void;

/**
 * One streaming session: device → (receiver app) → (start signal) → audio sink →
 * (virtual display) → encoder → playback. The session owns every resource it creates and `cleanup()`
 * is the only place they are released, whichever way the run ends.
 */
export class StreamSession {
  private state: SessionState = "idle";
  private readonly listeners = new Set<StateListener>();
  private readonly abortController = new AbortController();
  private readonly logger: Logger;

  private device?: CastDevice;
  private cast?: CastController;
  private audioHandle?: AudioSinkHandle;
  private encoder?: ManagedProcessHandle;
  private virtualDisplay?: VirtualDisplayController;
  private capture?: VirtualDisplayInfo;
  private profile?: EncoderProfile;
  private streamUrl?: string;
  private mediaLoaded = false;
  private receiverTouched = false;
  private cleanupPromise?: Promise<void>;

  constructor(
    private readonly options: StreamOptions,
    private readonly deps: SessionDependencies,
    logger: Logger,
  ) {
    this.logger = logger.child("session");
  }

  getState(): SessionState {
    return this.state;
  }

  getDevice(): CastDevice | undefined {
    return this.device;
  }

  getProfile(): EncoderProfile | undefined {
    return this.profile;
  }

  getStreamUrl(): string | undefined {
    return this.streamUrl;
  }

  // The display and size actually captured; set once the encoder inputs are known.
  getCapture(): VirtualDisplayInfo | undefined {
    return this.capture;
  }

  hasAudioSink(): boolean {
    return this.audioHandle !== undefined;
  }

  hasEncoder(): boolean {
    return this.encoder !== undefined;
  }

  hasVirtualDisplay(): boolean {
    return this.virtualDisplay !== undefined;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Run until interrupted. Resolves after cleanup when the run ends by interrupt;
   * rejects with the original error, after cleanup, when any phase fails.
   */
  async run(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error("A stream session can only be run once.");
    }

    let failure: unknown;
    try {
      await this.start();
      await this.holdStream();
    } catch (error) {
      if (!(error instanceof SessionInterruptedError)) {
        failure = error;
      }
    } finally {
      await this.cleanup();
    }

    if (failure !== undefined) {
      throw failure;
    }
  }

  /**
   * Route an interrupt into the running phase. Any wait in progress rejects and the
   * run proceeds to cleanup.
   */
  interrupt(reason: string): void {
    if (this.cleanupPromise) {
      this.logger.warn(`Received ${reason} while cleaning up; cleanup is already in progress.`);
      return;
    }
    this.abort(new SessionInterruptedError(reason));
  }

  cleanup(): Promise<void> {
    if (!this.cleanupPromise) {
      this.cleanupPromise = this.teardown();
    }
    return this.cleanupPromise;
  }

  private get signal(): AbortSignal {
    return this.abortController.signal;
  }

  private abort(reason: Error): void {
    if (!this.signal.aborted) {
      this.abortController.abort(reason);
    }
  }

  private setState(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.verboseLog(`${previous} -> ${next}`);
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }

  private enter(next: SessionState): void {
    this.signal.throwIfAborted();
    this.setState(next);
  }

  private async start(): Promise<void> {
    const { options, deps } = this;

    this.enter("resolving");
    const device = await this.resolve();
    this.device = device;
    this.logger.success(`Cast device: ${device.displayName} @ ${device.address}:${device.port}`);

    this.signal.throwIfAborted();
    const cast = await deps.connect(device);
    this.cast = cast;

    if (options.appId) {
      this.enter("launching-receiver");
      this.receiverTouched = true;
      await launchReceiverApp(
        cast,
        options.appId,
        { settleMs: options.settleSeconds * 1000, signal: this.signal },
        this.logger,
      );
    }

    if (options.mode === "wait") {
      this.enter("awaiting-start");
      await awaitStartSignal(
        cast,
        options.namespace,
        {
          timeoutMs: options.startTimeoutSeconds !== undefined ? options.startTimeoutSeconds * 1000 : undefined,
          signal: this.signal,
        },
        this.logger,
      );
    }

    this.enter("provisioning-audio");
    const audioHandle = await deps.audio.provision(options.sinkName);
    this.audioHandle = audioHandle;

    const capture = options.virtual
      ? await this.startVirtualDisplay()
      : { display: options.display, resolution: options.resolution };
    this.capture = capture;

    this.signal.throwIfAborted();
    const profile = await selectEncoderProfile(options.hw, deps.probeHardware);
    this.profile = profile;
    const gop = latencyFlags(options.latency, profile.backend, computeGop(options.fps, options.gopSeconds)).gop;
    this.logger.info(`Encoder: ${profile.backend} (${profile.kind}), GOP ${gop} frames, latency ${options.latency}`);

    this.enter("encoding");
    await this.startEncoder(capture, audioHandle.monitorSource, profile);

    const localAddress = await deps.resolveLocalAddress(device.address, device.port);
    this.streamUrl = buildStreamUrl(localAddress, options.port);
    this.logger.info(`Stream URL: ${this.streamUrl}`);
    this.checkPath(localAddress, device.address);

    this.signal.throwIfAborted();
    this.receiverTouched = true;
    this.mediaLoaded = true;
    await abortable(
      cast.loadMedia({
        url: this.streamUrl,
        contentType: STREAM_CONTENT_TYPE,
        streamType: "LIVE",
        title: `Desktop ${capture.display}`,
      }),
      this.signal,
    );

    try {
      await abortable(cast.waitForPlayback(options.playbackTimeoutSeconds * 1000), this.signal);
    } catch (error) {
      if (!(error instanceof PlaybackTimeoutError)) {
        throw error;
      }
      this.logger.warn(`${error.message} Playback may still be starting.`);
    }

    this.enter("streaming");
    this.logger.success("Streaming. Press Ctrl+C to stop.");
  }

  private async resolve(): Promise<CastDevice> {
    const { options, deps } = this;
    if (options.ip && options.device) {
      this.logger.warn(`Both --ip and --device given; selecting by address ${options.ip}.`);
    }

    this.logger.info("Discovering cast devices...");
    const records = await deps.discoverDevices({
      timeoutMs: options.discoveryTimeoutSeconds * 1000,
      signal: this.signal,
    });
    this.signal.throwIfAborted();

    const candidates = toCandidates(records);
    this.logger.verboseLog(`Found ${candidates.length} device(s).`);

    const selector = selectorFrom(options);
    if (selector.kind === "first" && options.interactive && candidates.length > 1 && deps.chooseDevice) {
      return deps.chooseDevice(candidates);
    }
    return resolveDevice(candidates, selector);
  }

  private async startVirtualDisplay(): Promise<VirtualDisplayInfo> {
    const { options, deps } = this;
    this.enter("starting-display");
    if (!deps.createVirtualDisplay) {
      throw new VirtualDisplayError("Virtual displays are not available in this environment.");
    }

    // Recorded before start() so a display that is still coming up is stopped too.
    const virtualDisplay = deps.createVirtualDisplay({
      resolution: options.virtualResolution,
      display: options.virtualDisplay,
      backend: options.virtualBackend,
      windowManager: options.virtualWm,
    });
    this.virtualDisplay = virtualDisplay;
    return virtualDisplay.start(this.signal);
  }

  private async startEncoder(capture: VirtualDisplayInfo, audioSource: string, profile: EncoderProfile): Promise<void> {
    const { options, deps } = this;
    const args = buildEncoderArgs(
      {
        fps: options.fps,
        resolution: capture.resolution,
        display: capture.display,
        audioSource,
        gopSeconds: options.gopSeconds,
        port: options.port,
        latency: options.latency,
        logLevel: options.ffmpegLogLevel,
      },
      profile,
    );

    await deps.terminateStaleEncoders(options.port);
    this.signal.throwIfAborted();

    this.logger.info("Starting encoder:");
    this.logger.info(formatCommand(FFMPEG_BINARY, args));

    let earlyExit: number | null | undefined;
    let startingUp = true;
    const encoder = deps.spawnEncoder(args, (code) => {
      if (startingUp) {
        earlyExit = code;
        return;
      }
      if (this.state === "encoding" || this.state === "streaming") {
        this.abort(new EncoderExitedError(code));
      }
    });
    this.encoder = encoder;

    await sleep(this.deps.encoderStartupGraceMs ?? ENCODER_STARTUP_GRACE_MS, this.signal);
    startingUp = false;
    if (earlyExit !== undefined) {
      throw new EncoderSpawnError(
        `Encoder exited during startup (code ${earlyExit ?? "none"}). Check the ffmpeg output above.`,
      );
    }
  }

  private checkPath(localAddress: string, deviceAddress: string): void {
    if (isSameSubnet(localAddress, deviceAddress)) {
      this.logger.verboseLog(`Path check: ${localAddress} and ${deviceAddress} share a /24.`);
      return;
    }
    if (this.options.lanOnly) {
      throw new LanPathError(localAddress, deviceAddress);
    }
    this.logger.warn(`Path check: ${localAddress} and ${deviceAddress} are on different subnets (VPN or routed network?).`);
  }

  private async holdStream(): Promise<void> {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      // eslint-disable-next-line no-await-in-loop
      await sleep(IDLE_TICK_MS, this.signal);
    }
  }

  private boundReceiverRequest(operation: string, request: Promise<void>): Promise<void> {
    const timeoutMs = this.deps.receiverTeardownTimeoutMs ?? RECEIVER_TEARDOWN_TIMEOUT_MS;
    return withTimeout(request, timeoutMs, () => new CastRequestTimeoutError(operation, timeoutMs));
  }

  private async teardown(): Promise<void> {
    this.setState("terminating");
    this.abort(new SessionInterruptedError("cleanup"));
    this.logger.info("Cleaning up...");

    const { cast, encoder, virtualDisplay, audioHandle } = this;

    if (cast && this.mediaLoaded) {
      try {
        await this.boundReceiverRequest("stop media", cast.stopMedia());
      } catch (error) {
        this.logger.warn(`Failed to stop playback on the receiver: ${errorMessage(error)}`);
      }
    }

    // The sink must outlive the process recording from it.
    if (encoder) {
      try {
        await encoder.stop();
      } catch (error) {
        this.logger.warn(`Failed to stop the encoder: ${errorMessage(error)}`);
      }
      this.encoder = undefined;
    }

    // The X server must outlive the process capturing it.
    if (virtualDisplay) {
      try {
        await virtualDisplay.stop();
      } catch (error) {
        this.logger.warn(`Failed to stop the virtual display: ${errorMessage(error)}`);
      }
      this.virtualDisplay = undefined;
    }

    if (audioHandle) {
      try {
        await this.deps.audio.release(audioHandle);
      } catch (error) {
        this.logger.warn(`Failed to release the audio sink: ${errorMessage(error)}`);
      }
      this.audioHandle = undefined;
    }

    if (cast) {
      if (this.receiverTouched) {
        try {
          await this.boundReceiverRequest("stop app", cast.stopActiveApp());
        } catch (error) {
          this.logger.warn(`Failed to quit the receiver app: ${errorMessage(error)}`);
        }
      }
      try {
        cast.close();
      } catch (error) {
        this.logger.verboseLog(`Closing the cast connection failed: ${errorMessage(error)}`);
      }
      this.cast = undefined;
    }

    this.setState("stopped");
    this.logger.info("Session stopped.");
  }
}
