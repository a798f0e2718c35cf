#!/usr/bin/env node

import { Command, Option } from "commander";
import chalk from "chalk";
import path from "path";
import fs from "fs-extra";

import { DEFAULT_NAMESPACE, getDefaultConfigPath, loadConfig, mergeOptions, saveConfig } from "./config.js";
import { StreamError, errorMessage } from "./errors.js";
import { runStreamSession } from "./runtime.js";
import type { RuntimeOptions } from "./types.js";
import { Logger } from "./utils/logger.js";

const pkgUrl = new URL("../package.json", import.meta.url);
const pkg: { version: string } = fs.readJSONSync(pkgUrl);

interface CliOptions extends RuntimeOptions {
  mode?: string;
  appId?: string;
  namespace?: string;
  device?: string;
  ip?: string;
  port?: string;
  fps?: string;
  resolution?: string;
  display?: string;
  gopSeconds?: string;
  hw?: string;
  sinkName?: string;
  fflog?: string;
  latency?: string;
  lanOnly?: boolean;
  startTimeout?: string;
  discoveryTimeout?: string;
  playbackTimeout?: string;
  settle?: string;
  encoderOutput?: string;
  interactive?: boolean;
  virtual?: boolean;
  virtualRes?: string;
  virtualDisplay?: string;
  virtualWm?: boolean;
  virtualBackend?: string;
}

const toStreamInput = (options: CliOptions): Record<string, unknown> => ({
  mode: options.mode,
  appId: options.appId,
  namespace: options.namespace,
  device: options.device,
  ip: options.ip,
  port: options.port,
  fps: options.fps,
  resolution: options.resolution,
  display: options.display,
  gopSeconds: options.gopSeconds,
  hw: options.hw,
  sinkName: options.sinkName,
  ffmpegLogLevel: options.fflog,
  latency: options.latency,
  lanOnly: options.lanOnly,
  startTimeoutSeconds: options.startTimeout,
  discoveryTimeoutSeconds: options.discoveryTimeout,
  playbackTimeoutSeconds: options.playbackTimeout,
  settleSeconds: options.settle,
  encoderOutput: options.encoderOutput,
  interactive: options.interactive,
  virtual: options.virtual,
  virtualResolution: options.virtualRes,
  virtualDisplay: options.virtualDisplay,
  virtualWm: options.virtualWm,
  virtualBackend: options.virtualBackend,
});

const createProgram = (): Command => {
  const program = new Command();

  program
    .name("desktop-cast")
    .description("Stream the desktop and system audio to a cast receiver on the local network")
    .version(pkg.version)
    .addOption(new Option("-m, --mode <mode>", "start immediately or wait for the receiver app").choices(["direct", "wait"]))
    .option("--app-id <id>", "receiver application to launch before streaming")
    .option("--namespace <ns>", `message namespace of the start signal (default: ${DEFAULT_NAMESPACE})`)
    .option("-d, --device <name>", "pick the device whose name contains this text")
    .option("--ip <address>", "pick the device with this address")
    .option("-p, --port <port>", "local HTTP port the encoder listens on (default: 8090)")
    .option("--fps <n>", "capture frame rate (default: 30)")
    .option("--resolution <WxH>", "capture size (default: 1920x1080)")
    .option("--display <id>", "X display to capture (default: $DISPLAY or :0)")
    .option("--gop-seconds <s>", "keyframe interval in seconds (default: 2)")
    .addOption(new Option("--hw <backend>", "encoder backend (default: auto)").choices(["auto", "vaapi", "cuda", "qsv", "software"]))
    .option("--sink-name <name>", "name of the virtual audio sink (default: cast_sink)")
    .addOption(new Option("--fflog <level>", "ffmpeg log level (default: info)").choices(["quiet", "error", "warning", "info", "debug"]))
    .addOption(new Option("--latency <preset>", "latency preset (default: normal)").choices(["normal", "low", "ultra"]))
    .option("--lan-only", "refuse to stream when the receiver is not on this host's subnet")
    .option("--start-timeout <s>", "give up waiting for the start signal after this many seconds")
    .option("--discovery-timeout <s>", "how long to browse for devices (default: 5)")
    .option("--playback-timeout <s>", "how long to wait for the receiver to start playing (default: 10)")
    .option("--settle <s>", "pause after launching the receiver app (default: 3)")
    .addOption(new Option("--encoder-output <mode>", "show ffmpeg output as-is or through the logger").choices(["inherit", "log"]))
    .option("-i, --interactive", "ask which device to use when several are found")
    .option("--virtual", "capture a virtual X display started for this session instead of --display")
    .option("--virtual-res <WxH>", "size of the virtual display (default: 3840x2160)")
    .option("--virtual-display <id>", "display number for the virtual display, e.g. :3 (default: auto)")
    .option("--virtual-wm", "run openbox inside the virtual display")
    .addOption(new Option("--virtual-backend <backend>", "X server for the virtual display (default: auto)").choices(["auto", "xvfb", "xephyr"]))
    .option("-c, --config <path>", "Path to configuration file", "")
    .option("--save-config", "write the effective options to the configuration file", false)
    .option("-v, --verbose", "Enable verbose logging", false)
    .action(async (options: CliOptions) => {
      const logger = new Logger(options.verbose);
      const cwd = process.cwd();
      const configPath = options.config ? path.resolve(options.config) : getDefaultConfigPath(cwd);

      logger.verboseLog(`Using configuration file: ${configPath}`);

      const fileConfig = await loadConfig(configPath);
      if (fileConfig) {
        logger.verboseLog(`Loaded configuration (last updated ${fileConfig.lastUpdated ?? "unknown"}).`);
      }

      const streamOptions = mergeOptions(fileConfig, toStreamInput(options));

      if (options.saveConfig) {
        await saveConfig(configPath, streamOptions);
        logger.info(`Configuration saved to ${configPath}`);
      }

      await runStreamSession(streamOptions, logger);
    });

  return program;
};

const program = createProgram();

program.parseAsync(process.argv).then(
  () => process.exit(0),
  (error: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(error instanceof StreamError ? error.exitCode || 1 : 1);
  },
);
