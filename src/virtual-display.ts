import fs from "fs-extra";
import path from "path";
import { VirtualDisplayError, errorMessage } from "./errors.js";
import type { ManagedProcessHandle, VirtualBackend, VirtualDisplayInfo } from "./types.js";
import type { CommandRunner } from "./utils/exec.js";
import { Logger } from "./utils/logger.js";
import { sleep } from "./utils/timing.js";

export const X11_SOCKET_DIR = "/tmp/.X11-unix";
const FIRST_DISPLAY = 2;
const LAST_DISPLAY = 97;
const SOCKET_POLL_MS = 20;
export const SOCKET_WAIT_MS = 4_000;

export type ServerBackend = Exclude<VirtualBackend, "auto">;

const SERVER_BINARY: Record<ServerBackend, string> = { xvfb: "Xvfb", xephyr: "Xephyr" };
const SERVER_PACKAGE: Record<ServerBackend, string> = { xvfb: "xvfb", xephyr: "xserver-xephyr" };

export interface VirtualDisplayOptions {
  resolution: string;
  // ":N", or "auto" for the first free display number
  display: string;
  backend: VirtualBackend;
  windowManager: boolean;
}

export interface VirtualDisplayController {
  start: (signal?: AbortSignal) => Promise<VirtualDisplayInfo>;
  stop: () => Promise<void>;
}

export interface VirtualDisplayDependencies {
  run: CommandRunner;
  spawn: (command: string, args: readonly string[], env?: NodeJS.ProcessEnv) => ManagedProcessHandle;
  pathExists?: (target: string) => Promise<boolean>;
  socketWaitMs?: number;
}

export const displaySocketPath = (display: string): string => {
  const number = display.replace(/^[^:]*:/, "").split(".")[0];
  return path.join(X11_SOCKET_DIR, `X${number}`);
};

export const pickFreeDisplay = async (pathExists: (target: string) => Promise<boolean>): Promise<string> => {
  for (let number = FIRST_DISPLAY; number <= LAST_DISPLAY; number += 1) {
    // eslint-disable-next-line no-await-in-loop
    if (!(await pathExists(displaySocketPath(`:${number}`)))) {
      return `:${number}`;
    }
  }
  throw new VirtualDisplayError(`No free X display between :${FIRST_DISPLAY} and :${LAST_DISPLAY}.`);
};

export const parseDisplaySize = (xdpyinfo: string): string | null => {
  const match = /dimensions:\s+(\d+)x(\d+)\s+pixels/.exec(xdpyinfo);
  return match ? `${match[1]}x${match[2]}` : null;
};

export const virtualServerCommand = (
  backend: ServerBackend,
  display: string,
  resolution: string,
): { command: string; args: string[] } => {
  switch (backend) {
    case "xvfb":
      return {
        command: SERVER_BINARY.xvfb,
        args: [display, "-screen", "0", `${resolution}x24`, "-nolisten", "tcp", "-noreset"],
      };
    case "xephyr":
      return {
        command: SERVER_BINARY.xephyr,
        args: [display, "-screen", resolution, "-fullscreen", "-resizeable"],
      };
  }
};

/**
 * An X server of our own (headless Xvfb or windowed Xephyr), optionally with openbox
 * on top. `stop()` may be called at any point after construction, including while
 * `start()` is still waiting for the server.
 */
export class VirtualDisplay implements VirtualDisplayController {
  private server?: ManagedProcessHandle;
  private windowManager?: ManagedProcessHandle;
  private stopping?: Promise<void>;

  constructor(
    private readonly options: VirtualDisplayOptions,
    private readonly deps: VirtualDisplayDependencies,
    private readonly logger: Logger,
  ) {}

  private get pathExists(): (target: string) => Promise<boolean> {
    return this.deps.pathExists ?? ((target) => fs.pathExists(target));
  }

  async start(signal?: AbortSignal): Promise<VirtualDisplayInfo> {
    if (this.server || this.stopping) {
      throw new Error("A virtual display can only be started once.");
    }

    const backend = await this.resolveBackend();
    const display =
      this.options.display === "auto" ? await pickFreeDisplay(this.pathExists) : this.options.display;
    signal?.throwIfAborted();

    const { command, args } = virtualServerCommand(backend, display, this.options.resolution);
    this.logger.info(`Starting ${command} on ${display} (${this.options.resolution})...`);
    this.server = this.deps.spawn(command, args);

    await this.waitForSocket(display, signal);

    const resolution = (await this.readDisplaySize(display)) ?? this.options.resolution;
    if (resolution !== this.options.resolution) {
      this.logger.warn(`Adjusting capture size from ${this.options.resolution} to ${resolution} to fit ${display}.`);
    }

    if (this.options.windowManager) {
      if (await this.hasBinary("openbox")) {
        signal?.throwIfAborted();
        this.windowManager = this.deps.spawn("openbox", [], { ...process.env, DISPLAY: display });
      } else {
        this.logger.warn("openbox not found (install the openbox package); continuing without a window manager.");
      }
    }

    this.logger.success(`Virtual display ${display} ready. Start apps in it with: DISPLAY=${display} <app> &`);
    return { display, resolution };
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stopProcesses();
    }
    return this.stopping;
  }

  private async stopProcesses(): Promise<void> {
    const { windowManager, server } = this;
    this.windowManager = undefined;
    this.server = undefined;

    for (const [name, handle] of [
      ["window manager", windowManager],
      ["X server", server],
    ] as const) {
      if (!handle) {
        continue;
      }
      try {
        // eslint-disable-next-line no-await-in-loop
        await handle.stop();
      } catch (error) {
        this.logger.warn(`Failed to stop the virtual display's ${name}: ${errorMessage(error)}`);
      }
    }
  }

  private async resolveBackend(): Promise<ServerBackend> {
    const requested = this.options.backend;
    if (requested !== "auto") {
      if (!(await this.hasBinary(SERVER_BINARY[requested]))) {
        throw new VirtualDisplayError(
          `${SERVER_BINARY[requested]} not found. Install the ${SERVER_PACKAGE[requested]} package.`,
        );
      }
      return requested;
    }

    if (await this.hasBinary(SERVER_BINARY.xvfb)) {
      return "xvfb";
    }
    if (await this.hasBinary(SERVER_BINARY.xephyr)) {
      return "xephyr";
    }
    throw new VirtualDisplayError("Neither Xvfb nor Xephyr found. Install the xvfb or xserver-xephyr package.");
  }

  private async hasBinary(name: string): Promise<boolean> {
    try {
      await this.deps.run("which", [name]);
      return true;
    } catch (error) {
      this.logger.verboseLog(`${name} not on PATH: ${errorMessage(error)}`);
      return false;
    }
  }

  private async waitForSocket(display: string, signal?: AbortSignal): Promise<void> {
    const socket = displaySocketPath(display);
    const deadline = Date.now() + (this.deps.socketWaitMs ?? SOCKET_WAIT_MS);

    while (Date.now() < deadline) {
      // eslint-disable-next-line no-await-in-loop
      if (await this.pathExists(socket)) {
        return;
      }
      // eslint-disable-next-line no-await-in-loop
      await sleep(SOCKET_POLL_MS, signal);
    }
    this.logger.warn(`${socket} did not appear; capturing ${display} anyway.`);
  }

  private async readDisplaySize(display: string): Promise<string | null> {
    try {
      const { stdout } = await this.deps.run("xdpyinfo", ["-display", display]);
      return parseDisplaySize(stdout);
    } catch (error) {
      this.logger.verboseLog(`Could not read the size of ${display}: ${errorMessage(error)}`);
      return null;
    }
  }
}
