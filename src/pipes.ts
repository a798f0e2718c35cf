import { spawn, ChildProcess } from "child_process";
import { EncoderSpawnError, errorMessage } from "./errors.js";
import type { EncoderOutputMode, ManagedProcessHandle } from "./types.js";
import { Logger } from "./utils/logger.js";

export const DEFAULT_STOP_GRACE_MS = 5_000;
const KILL_WAIT_MS = 2_000;

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  output?: EncoderOutputMode;
  stopGraceMs?: number;
  // Own process group: a Ctrl+C in the terminal does not reach the child.
  detached?: boolean;
}

const forwardLines = (stream: NodeJS.ReadableStream, write: (line: string) => void): void => {
  stream.setEncoding("utf-8");
  stream.on("data", (data: string) => {
    // ffmpeg rewrites its progress line with \r
    for (const line of data.split(/[\r\n]+/)) {
      if (line.trim()) {
        write(line.trim());
      }
    }
  });
};

const createProcessHandle = (
  child: ChildProcess,
  pid: number,
  logger: Logger,
  description: string,
  stopGraceMs: number,
  onExit?: (code: number | null) => void,
): ManagedProcessHandle => {
  let exitCode: number | null | undefined;
  let stopRequested = false;

  const exited = new Promise<number | null>((resolve) => {
    child.once("exit", (code, signal) => {
      exitCode = code;
      // ffmpeg answers SIGINT with 255; that is a normal stop.
      if (code !== 0 && code !== null && !stopRequested) {
        logger.error(`${description} exited with code ${code} signal ${signal ?? "none"}`);
      } else {
        logger.verboseLog(`${description} exited with code ${code} signal ${signal ?? "none"}`);
      }
      resolve(code);
      onExit?.(code);
    });
  });

  const waitForExit = (ms: number): Promise<boolean> =>
    new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });

  let stopping: Promise<void> | undefined;

  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        if (exitCode !== undefined) {
          return;
        }
        stopRequested = true;

        logger.verboseLog(`Stopping ${description} (pid: ${pid})`);
        child.kill("SIGINT");
        if (await waitForExit(stopGraceMs)) {
          return;
        }

        logger.warn(`${description} ignored SIGINT for ${stopGraceMs} ms, sending SIGKILL.`);
        child.kill("SIGKILL");
        if (!(await waitForExit(KILL_WAIT_MS))) {
          logger.error(`${description} (pid: ${pid}) did not exit after SIGKILL.`);
        }
      })();
    }
    return stopping;
  };

  return { pid, exited, stop };
};

/**
 * Spawn a process that runs until stopped. `stop()` sends SIGINT, waits up to
 * `stopGraceMs`, then escalates to SIGKILL; it is idempotent.
 */
export const spawnLongRunning = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
  logger: Logger,
  description: string,
  onExit?: (code: number | null) => void,
): ManagedProcessHandle => {
  const { output = "log", stopGraceMs = DEFAULT_STOP_GRACE_MS, ...spawnOptions } = options;
  logger.verboseLog(`Spawning ${description}: ${command} ${args.join(" ")}`);

  const child = spawn(command, [...args], {
    stdio: output === "inherit" ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"],
    ...spawnOptions,
  });

  child.on("error", (error) => {
    logger.verboseLog(`${description} process error: ${errorMessage(error)}`);
  });

  if (!child.pid) {
    throw new EncoderSpawnError(`Failed to start ${description}: is '${command}' installed and on PATH?`);
  }

  if (child.stdout) {
    forwardLines(child.stdout, (line) => logger.verboseLog(`[${description}] ${line}`));
  }
  if (child.stderr) {
    forwardLines(child.stderr, (line) => logger.warn(`[${description}] ${line}`));
  }

  logger.verboseLog(`${description} started with pid ${child.pid}`);

  return createProcessHandle(child, child.pid, logger, description, stopGraceMs, onExit);
};
