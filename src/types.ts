export type StreamMode = "direct" | "wait";

export type HardwareMode = "auto" | "vaapi" | "cuda" | "qsv" | "software";

export type EncoderBackend = "vaapi" | "cuda" | "qsv" | "software";

export type EncoderProfileKind = "hardware-vaapi" | "hardware-cuda" | "hardware-qsv" | "software" | "explicit-override";

export type LatencyPreset = "normal" | "low" | "ultra";

export type FfmpegLogLevel = "quiet" | "error" | "warning" | "info" | "debug";

export type EncoderOutputMode = "inherit" | "log";

export type VirtualBackend = "auto" | "xvfb" | "xephyr";

export interface StreamOptions {
  mode: StreamMode;
  appId?: string;
  namespace: string;
  device?: string;
  ip?: string;
  port: number;
  fps: number;
  resolution: string;
  display: string;
  gopSeconds: number;
  hw: HardwareMode;
  sinkName: string;
  ffmpegLogLevel: FfmpegLogLevel;
  latency: LatencyPreset;
  lanOnly: boolean;
  startTimeoutSeconds?: number;
  discoveryTimeoutSeconds: number;
  playbackTimeoutSeconds: number;
  settleSeconds: number;
  encoderOutput: EncoderOutputMode;
  interactive: boolean;
  virtual: boolean;
  virtualResolution: string;
  virtualDisplay: string;
  virtualWm: boolean;
  virtualBackend: VirtualBackend;
}

export interface RuntimeOptions {
  verbose: boolean;
  config?: string;
  saveConfig: boolean;
}

export interface CastDevice {
  readonly address: string;
  readonly port: number;
  readonly displayName: string;
}

export interface DeviceCandidate {
  device: CastDevice;
  // Absent when no name accessor produced a value; such devices never match by name.
  matchName?: string;
}

export type DeviceSelector =
  | { kind: "name"; value: string }
  | { kind: "address"; value: string }
  | { kind: "first" };

export interface AudioSinkHandle {
  readonly sinkName: string;
  readonly moduleId: string;
  readonly previousDefaultSink: string | null;
  readonly monitorSource: string;
}

export interface EncoderProfile {
  readonly kind: EncoderProfileKind;
  readonly backend: EncoderBackend;
  readonly codecArgs: readonly string[];
}

export interface HardwareProbe {
  accelerators: string[];
  renderNodeAvailable: boolean;
}

export interface EncoderInput {
  fps: number;
  resolution: string;
  display: string;
  audioSource: string;
  gopSeconds: number;
  port: number;
  latency: LatencyPreset;
  logLevel: FfmpegLogLevel;
}

export const SESSION_STATES = [
  "idle",
  "resolving",
  "launching-receiver",
  "awaiting-start",
  "provisioning-audio",
  "starting-display",
  "encoding",
  "streaming",
  "terminating",
  "stopped",
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export interface ManagedProcessHandle {
  readonly pid: number;
  readonly exited: Promise<number | null>;
  stop: () => Promise<void>;
}

export interface VirtualDisplayInfo {
  display: string;
  resolution: string;
}

export interface ReceiverAppStatus {
  appId?: string;
  displayName?: string;
}

export interface MediaLoadRequest {
  url: string;
  contentType: string;
  streamType: "BUFFERED" | "LIVE";
  title: string;
}

export type MessageListener = (payload: unknown) => void;

export interface ReceiverChannel {
  onMessage: (listener: MessageListener) => () => void;
  close: () => void;
}

/**
 * Control surface of a connected cast receiver. The castv2 implementation lives in
 * cast-client.ts; tests substitute an in-memory fake.
 */
export interface CastController {
  stopActiveApp: () => Promise<void>;
  launchApp: (appId: string) => Promise<void>;
  getAppStatus: () => Promise<ReceiverAppStatus>;
  openChannel: (namespace: string) => Promise<ReceiverChannel>;
  loadMedia: (request: MediaLoadRequest) => Promise<void>;
  waitForPlayback: (timeoutMs: number) => Promise<void>;
  stopMedia: () => Promise<void>;
  close: () => void;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}
