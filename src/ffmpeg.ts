import fs from "fs-extra";
import { errorMessage } from "./errors.js";
import type {
  EncoderBackend,
  EncoderInput,
  EncoderProfile,
  EncoderProfileKind,
  HardwareMode,
  HardwareProbe,
  LatencyPreset,
} from "./types.js";
import type { CommandRunner } from "./utils/exec.js";
import { Logger } from "./utils/logger.js";

export const FFMPEG_BINARY = "ffmpeg";
export const RENDER_NODE = "/dev/dri/renderD128";
export const STREAM_CONTENT_TYPE = "video/mp4";

/**
 * Format an argument list as a POSIX shell command that can be pasted into a terminal.
 */
export const formatCommand = (command: string, args: readonly string[]): string => {
  const quote = (arg: string): string => {
    if (/^[\w@%+=:,./-]+$/.test(arg)) {
      return arg;
    }
    return `'${arg.replace(/'/g, `'\\''`)}'`;
  };

  return [command, ...args].map(quote).join(" ");
};

export const parseHwAccels = (output: string): string[] =>
  output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.endsWith(":"));

/**
 * Ask ffmpeg which acceleration methods it was built with. A missing binary or a
 * failing probe means "nothing detected", which resolves to software encoding.
 */
export const probeHardware = async (
  run: CommandRunner,
  logger: Logger,
  renderNodeExists: () => Promise<boolean> = () => fs.pathExists(RENDER_NODE),
): Promise<HardwareProbe> => {
  let accelerators: string[] = [];
  try {
    const { stdout } = await run(FFMPEG_BINARY, ["-hide_banner", "-hwaccels"]);
    accelerators = parseHwAccels(stdout);
  } catch (error) {
    logger.verboseLog(`Hardware probe failed, assuming software encoding: ${errorMessage(error)}`);
  }

  let renderNodeAvailable = false;
  try {
    renderNodeAvailable = await renderNodeExists();
  } catch (error) {
    logger.verboseLog(`Could not check ${RENDER_NODE}: ${errorMessage(error)}`);
  }

  logger.verboseLog(
    `ffmpeg hwaccels: ${accelerators.join(", ") || "none"}; render node: ${renderNodeAvailable ? "yes" : "no"}`,
  );
  return { accelerators, renderNodeAvailable };
};

export const detectBackend = (probe: HardwareProbe): EncoderBackend => {
  const has = (name: string) => probe.accelerators.includes(name);

  if (has("vaapi") && probe.renderNodeAvailable) {
    return "vaapi";
  }
  if (has("cuda") || has("nvenc")) {
    return "cuda";
  }
  if (has("qsv")) {
    return "qsv";
  }
  return "software";
};

const codecArgsFor = (backend: EncoderBackend): string[] => {
  switch (backend) {
    case "vaapi":
      return ["-vaapi_device", RENDER_NODE, "-vf", "format=nv12,hwupload", "-c:v", "h264_vaapi", "-qp", "24"];
    case "cuda":
      return ["-c:v", "h264_nvenc", "-preset", "p1", "-cq", "23"];
    case "qsv":
      return ["-c:v", "h264_qsv", "-global_quality", "24"];
    case "software":
      return ["-c:v", "libx264", "-preset", "veryfast", "-crf", "18", "-pix_fmt", "yuv420p"];
  }
};

const DETECTED_KIND: Record<EncoderBackend, EncoderProfileKind> = {
  vaapi: "hardware-vaapi",
  cuda: "hardware-cuda",
  qsv: "hardware-qsv",
  software: "software",
};

export const profileFor = (backend: EncoderBackend, explicit: boolean): EncoderProfile => {
  const kind = explicit && backend !== "software" ? "explicit-override" : DETECTED_KIND[backend];
  return { kind, backend, codecArgs: codecArgsFor(backend) };
};

/**
 * Pick the encoder profile. Only `auto` runs the probe; an explicit backend is
 * taken as given even when the probe would not have chosen it.
 */
export const selectEncoderProfile = async (
  mode: HardwareMode,
  probe: () => Promise<HardwareProbe>,
): Promise<EncoderProfile> => {
  if (mode === "software") {
    return profileFor("software", true);
  }
  if (mode !== "auto") {
    return profileFor(mode, true);
  }
  return profileFor(detectBackend(await probe()), false);
};

export const computeGop = (fps: number, gopSeconds: number): number => Math.max(1, Math.round(fps * gopSeconds));

interface LatencyFlags {
  globalArgs: string[];
  encoderArgs: string[];
  gop: number;
}

const LOW_DELAY_FLAGS = [
  "-fflags",
  "nobuffer",
  "-flags",
  "+low_delay",
  "-analyzeduration",
  "0",
  "-flush_packets",
  "1",
  "-sc_threshold",
  "0",
  "-use_wallclock_as_timestamps",
  "1",
];

export const latencyFlags = (latency: LatencyPreset, backend: EncoderBackend, gop: number): LatencyFlags => {
  const lowDelay = latency !== "normal";
  const globalArgs =
    latency === "normal"
      ? ["-probesize", "1M", "-analyzeduration", "1M"]
      : ["-probesize", latency === "low" ? "64k" : "32k", ...LOW_DELAY_FLAGS];

  let encoderArgs: string[] = [];
  switch (backend) {
    case "software":
      encoderArgs = ["-tune", lowDelay ? "zerolatency" : "film"];
      break;
    case "cuda":
      if (lowDelay) {
        encoderArgs = ["-tune", latency === "low" ? "ll" : "ull", "-rc-lookahead", "0"];
      }
      break;
    case "vaapi":
      encoderArgs = ["-bf", "0"];
      break;
    case "qsv":
      encoderArgs = ["-look_ahead", "0"];
      break;
  }

  let shortened = gop;
  if (latency === "low") {
    shortened = Math.max(1, Math.floor(gop / 2));
  } else if (latency === "ultra") {
    shortened = Math.max(1, Math.floor(gop / 3));
  }

  return { globalArgs, encoderArgs, gop: shortened };
};

/**
 * Build the ffmpeg argument list: x11grab video, pulse audio from the sink monitor,
 * H.264 with the profile's codec args, AAC audio, fragmented MP4 served over HTTP
 * on `port` (ffmpeg's `-listen 1` mode). Pure; the binary name is not included.
 */
export const buildEncoderArgs = (input: EncoderInput, profile: EncoderProfile): string[] => {
  const latency = latencyFlags(input.latency, profile.backend, computeGop(input.fps, input.gopSeconds));
  const gop = String(latency.gop);

  return [
    "-hide_banner",
    "-loglevel",
    input.logLevel,
    "-thread_queue_size",
    "1024",
    "-f",
    "x11grab",
    "-framerate",
    String(input.fps),
    "-video_size",
    input.resolution,
    "-draw_mouse",
    "1",
    "-i",
    input.display,
    "-thread_queue_size",
    "1024",
    "-f",
    "pulse",
    "-i",
    input.audioSource,
    ...latency.globalArgs,
    ...profile.codecArgs,
    ...latency.encoderArgs,
    "-g",
    gop,
    "-keyint_min",
    gop,
    "-c:a",
    "aac",
    "-b:a",
    "192k",
    "-f",
    "mp4",
    "-movflags",
    "frag_keyframe+empty_moov+default_base_moof",
    "-listen",
    "1",
    `http://0.0.0.0:${input.port}/`,
  ];
};

// Extended regex for `pkill -f`: only our own listen URL on exactly this port.
export const staleEncoderPattern = (port: number): string =>
  `${FFMPEG_BINARY} .*-listen 1 http://0\\.0\\.0\\.0:${port}/`;

/**
 * Kill encoders left over from an earlier run that still hold the listen port.
 * pkill exits with 1 when nothing matched.
 */
export const terminateStaleEncoders = async (run: CommandRunner, port: number, logger: Logger): Promise<void> => {
  try {
    await run("pkill", ["-f", staleEncoderPattern(port)]);
    logger.warn(`Terminated a stale encoder listening on port ${port}.`);
  } catch (error) {
    logger.verboseLog(`No stale encoder on port ${port} (${errorMessage(error)}).`);
  }
};
