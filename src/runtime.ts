import chalk from "chalk";
import { connectCastDevice } from "./cast-client.js";
import { discoverCastServices } from "./discovery.js";
import { FFMPEG_BINARY, probeHardware, terminateStaleEncoders } from "./ffmpeg.js";
import { resolveLocalAddress } from "./network.js";
import { spawnLongRunning } from "./pipes.js";
import { promptForDevice } from "./prompts.js";
import { PulseAudioBridge } from "./pulseaudio.js";
import { StreamSession, type SessionDependencies } from "./session.js";
import type { StreamOptions } from "./types.js";
import { runCommand } from "./utils/exec.js";
import { Logger } from "./utils/logger.js";
import { VirtualDisplay } from "./virtual-display.js";

export const createSessionDependencies = (options: StreamOptions, logger: Logger): SessionDependencies => {
  const discoveryLogger = logger.child("discovery");
  const castLogger = logger.child("cast");
  const encoderLogger = logger.child("ffmpeg");
  const displayLogger = logger.child("display");

  return {
    discoverDevices: (discovery) => discoverCastServices(discovery, discoveryLogger),
    chooseDevice: options.interactive && process.stdin.isTTY ? promptForDevice : undefined,
    connect: (device) => connectCastDevice(device, castLogger),
    audio: new PulseAudioBridge(runCommand, logger.child("audio")),
    probeHardware: () => probeHardware(runCommand, encoderLogger),
    terminateStaleEncoders: (port) => terminateStaleEncoders(runCommand, port, encoderLogger),
    spawnEncoder: (args, onExit) =>
      spawnLongRunning(
        FFMPEG_BINARY,
        args,
        { output: options.encoderOutput, detached: true },
        encoderLogger,
        "ffmpeg",
        onExit,
      ),
    resolveLocalAddress,
    createVirtualDisplay: (displayOptions) =>
      new VirtualDisplay(
        displayOptions,
        {
          run: runCommand,
          spawn: (command, args, env) =>
            spawnLongRunning(command, args, { output: "log", env, detached: true }, displayLogger, command),
        },
        displayLogger,
      ),
  };
};

/**
 * Run one session until SIGINT/SIGTERM. Signals are routed into the session, which
 * unwinds whatever phase it is in and cleans up before this resolves.
 */
export const runStreamSession = async (
  options: StreamOptions,
  logger: Logger,
  dependencies: SessionDependencies = createSessionDependencies(options, logger),
): Promise<void> => {
  const session = new StreamSession(options, dependencies, logger);

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}. Stopping the stream.`);
    session.interrupt(signal);
  };

  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];
  signals.forEach((signal) => process.on(signal, handleSignal));

  const source = options.virtual
    ? `a virtual display (${options.virtualResolution})`
    : `${options.display} (${options.resolution})`;
  console.log(chalk.green(`Casting ${source} @ ${options.fps} fps in ${options.mode} mode.`));

  try {
    await session.run();
  } finally {
    signals.forEach((signal) => process.off(signal, handleSignal));
  }
};
