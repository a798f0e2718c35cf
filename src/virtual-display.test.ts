import { describe, it, expect, beforeEach, vi } from "vitest";
import { SessionInterruptedError, VirtualDisplayError } from "./errors.js";
import { silenceConsole, testLogger } from "./testing/fakes.js";
import type { ManagedProcessHandle } from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { ExecError } from "./utils/exec.js";
import type { CommandRunner } from "./utils/exec.js";
import {
  VirtualDisplay,
  displaySocketPath,
  parseDisplaySize,
  pickFreeDisplay,
  virtualServerCommand,
  type VirtualDisplayDependencies,
  type VirtualDisplayOptions,
} from "./virtual-display.js";

const XDPYINFO_4K = "name of display:    :2\nscreen #0:\n  dimensions:    3840x2160 pixels (1016x571 millimeters)\n";

interface SystemSetup {
  binaries?: string[];
  // null: xdpyinfo fails
  xdpyinfo?: string | null;
  socketAppears?: boolean;
  taken?: string[];
}

interface SpawnRecord {
  command: string;
  args: readonly string[];
  env?: NodeJS.ProcessEnv;
}

const createSystem = ({
  binaries = ["Xvfb", "Xephyr", "openbox"],
  xdpyinfo = XDPYINFO_4K,
  socketAppears = true,
  taken = [],
}: SystemSetup = {}) => {
  const events: string[] = [];
  const spawned: SpawnRecord[] = [];
  const sockets = new Set(taken.map(displaySocketPath));

  const run: CommandRunner = async (file, args) => {
    if (file === "which") {
      if (binaries.includes(args[0])) {
        return { stdout: `/usr/bin/${args[0]}`, stderr: "" };
      }
      throw new ExecError(`which ${args[0]}`, 1, "", "");
    }
    if (file === "xdpyinfo") {
      if (xdpyinfo === null) {
        throw new ExecError(`xdpyinfo ${args.join(" ")}`, 1, "", "unable to open display");
      }
      return { stdout: xdpyinfo, stderr: "" };
    }
    throw new Error(`unexpected command: ${file}`);
  };

  const spawn: VirtualDisplayDependencies["spawn"] = (command, args, env) => {
    spawned.push({ command, args, env });
    if (socketAppears && command !== "openbox") {
      sockets.add(displaySocketPath(args[0]));
    }
    const exited = createDeferred<number | null>();
    const handle: ManagedProcessHandle = {
      pid: 100 + spawned.length,
      exited: exited.promise,
      stop: async () => {
        events.push(`stop:${command}`);
        exited.resolve(null);
      },
    };
    return handle;
  };

  const deps: VirtualDisplayDependencies = {
    run,
    spawn,
    pathExists: async (target) => sockets.has(target),
  };

  return { deps, events, spawned };
};

const displayOptions = (overrides: Partial<VirtualDisplayOptions> = {}): VirtualDisplayOptions => ({
  resolution: "3840x2160",
  display: "auto",
  backend: "auto",
  windowManager: false,
  ...overrides,
});

describe("displaySocketPath", () => {
  it("names the X socket of the display number", () => {
    expect(displaySocketPath(":12")).toBe("/tmp/.X11-unix/X12");
    expect(displaySocketPath(":3.0")).toBe("/tmp/.X11-unix/X3");
  });
});

describe("pickFreeDisplay", () => {
  it("skips displays that already have a socket", async () => {
    const taken = new Set(["/tmp/.X11-unix/X2", "/tmp/.X11-unix/X3"]);

    await expect(pickFreeDisplay(async (target) => taken.has(target))).resolves.toBe(":4");
  });

  it("fails when every display is taken", async () => {
    await expect(pickFreeDisplay(async () => true)).rejects.toThrow("No free X display between :2 and :97.");
  });
});

describe("parseDisplaySize", () => {
  it("reads the dimensions line", () => {
    expect(parseDisplaySize(XDPYINFO_4K)).toBe("3840x2160");
  });

  it("returns null without one", () => {
    expect(parseDisplaySize("xdpyinfo:  unable to open display \":9\".")).toBeNull();
  });
});

describe("virtualServerCommand", () => {
  it("runs Xvfb headless at 24-bit depth", () => {
    expect(virtualServerCommand("xvfb", ":5", "1280x720")).toEqual({
      command: "Xvfb",
      args: [":5", "-screen", "0", "1280x720x24", "-nolisten", "tcp", "-noreset"],
    });
  });

  it("runs Xephyr fullscreen", () => {
    expect(virtualServerCommand("xephyr", ":5", "1280x720")).toEqual({
      command: "Xephyr",
      args: [":5", "-screen", "1280x720", "-fullscreen", "-resizeable"],
    });
  });
});

describe("VirtualDisplay", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("starts Xvfb on the first free display", async () => {
    const system = createSystem({ taken: [":2"] });
    const display = new VirtualDisplay(displayOptions(), system.deps, testLogger());

    await expect(display.start()).resolves.toEqual({ display: ":3", resolution: "3840x2160" });
    expect(system.spawned).toEqual([
      {
        command: "Xvfb",
        args: [":3", "-screen", "0", "3840x2160x24", "-nolisten", "tcp", "-noreset"],
        env: undefined,
      },
    ]);
  });

  it("falls back to Xephyr when Xvfb is missing", async () => {
    const system = createSystem({ binaries: ["Xephyr"] });
    const display = new VirtualDisplay(displayOptions({ display: ":9" }), system.deps, testLogger());

    await display.start();

    expect(system.spawned.map(({ command, args }) => [command, args[0]])).toEqual([["Xephyr", ":9"]]);
  });

  it("names the package when the requested server is missing", async () => {
    const system = createSystem({ binaries: ["Xvfb"] });
    const display = new VirtualDisplay(displayOptions({ backend: "xephyr" }), system.deps, testLogger());

    const error = await display.start().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(VirtualDisplayError);
    expect(error).toMatchObject({ message: "Xephyr not found. Install the xserver-xephyr package.", exitCode: 1 });
    expect(system.spawned).toEqual([]);
  });

  it("fails when neither server is installed", async () => {
    const system = createSystem({ binaries: [] });
    const display = new VirtualDisplay(displayOptions(), system.deps, testLogger());

    await expect(display.start()).rejects.toThrow("Neither Xvfb nor Xephyr found.");
  });

  it("reports the size the server actually gave", async () => {
    const system = createSystem({ xdpyinfo: "  dimensions:    1920x1080 pixels (508x285 millimeters)" });
    const display = new VirtualDisplay(displayOptions(), system.deps, testLogger());

    await expect(display.start()).resolves.toEqual({ display: ":2", resolution: "1920x1080" });
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("Adjusting capture size from 3840x2160 to 1920x1080 to fit :2."),
    );
  });

  it("keeps the requested size when xdpyinfo cannot read the display", async () => {
    const system = createSystem({ xdpyinfo: null });
    const display = new VirtualDisplay(displayOptions({ resolution: "2560x1440" }), system.deps, testLogger());

    await expect(display.start()).resolves.toEqual({ display: ":2", resolution: "2560x1440" });
  });

  it("runs openbox inside the display and stops it before the server", async () => {
    const system = createSystem();
    const display = new VirtualDisplay(displayOptions({ windowManager: true }), system.deps, testLogger());

    await display.start();

    expect(system.spawned.map(({ command }) => command)).toEqual(["Xvfb", "openbox"]);
    expect(system.spawned[1].env?.DISPLAY).toBe(":2");

    await display.stop();
    await display.stop();
    expect(system.events).toEqual(["stop:openbox", "stop:Xvfb"]);
  });

  it("continues without a window manager when openbox is missing", async () => {
    const system = createSystem({ binaries: ["Xvfb"] });
    const display = new VirtualDisplay(displayOptions({ windowManager: true }), system.deps, testLogger());

    await display.start();

    expect(system.spawned.map(({ command }) => command)).toEqual(["Xvfb"]);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("openbox not found"));
  });

  it("goes on when the socket never appears", async () => {
    const system = createSystem({ socketAppears: false });
    const display = new VirtualDisplay(displayOptions(), { ...system.deps, socketWaitMs: 50 }, testLogger());

    await expect(display.start()).resolves.toEqual({ display: ":2", resolution: "3840x2160" });
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("/tmp/.X11-unix/X2 did not appear; capturing :2 anyway."),
    );
  });

  it("stops a server that is still coming up when interrupted", async () => {
    const system = createSystem({ socketAppears: false });
    const display = new VirtualDisplay(displayOptions(), system.deps, testLogger());
    const controller = new AbortController();

    const starting = display.start(controller.signal);
    await vi.waitFor(() => expect(system.spawned).toHaveLength(1));
    controller.abort(new SessionInterruptedError("SIGINT"));

    await expect(starting).rejects.toBeInstanceOf(SessionInterruptedError);
    await display.stop();
    expect(system.events).toEqual(["stop:Xvfb"]);
  });
});
