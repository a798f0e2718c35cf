import { describe, it, expect, beforeEach } from "vitest";
import { AudioProvisioningError } from "./errors.js";
import { PulseAudioBridge, parseDefaultSink } from "./pulseaudio.js";
import { silenceConsole, testLogger } from "./testing/fakes.js";
import { ExecError } from "./utils/exec.js";
import type { CommandRunner } from "./utils/exec.js";

const PACTL_INFO = ["Server String: /run/user/1000/pulse/native", "Default Sink: alsa_output.pci.analog-stereo", "Default Source: alsa_input.pci.analog-stereo"].join("\n");

type Responder = (args: readonly string[]) => string | Error;

const fakePactl = (respond: Responder) => {
  const calls: string[] = [];
  const run: CommandRunner = async (file, args) => {
    const command = [file, ...args].join(" ");
    calls.push(command);
    const result = respond(args);
    if (result instanceof Error) {
      throw result;
    }
    return { stdout: result, stderr: "" };
  };
  return { run, calls };
};

const healthy: Responder = (args) => {
  switch (args[0]) {
    case "info":
      return PACTL_INFO;
    case "load-module":
      return "42\n";
    default:
      return "";
  }
};

describe("parseDefaultSink", () => {
  it("reads the default sink line", () => {
    expect(parseDefaultSink(PACTL_INFO)).toBe("alsa_output.pci.analog-stereo");
  });

  it("returns null when the line is missing or empty", () => {
    expect(parseDefaultSink("Server Name: pulseaudio")).toBeNull();
    expect(parseDefaultSink("Default Sink: ")).toBeNull();
  });
});

describe("PulseAudioBridge", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("creates the null sink and makes it the default", async () => {
    const pactl = fakePactl(healthy);
    const bridge = new PulseAudioBridge(pactl.run, testLogger());

    const handle = await bridge.provision("cast_sink");

    expect(handle).toEqual({
      sinkName: "cast_sink",
      moduleId: "42",
      previousDefaultSink: "alsa_output.pci.analog-stereo",
      monitorSource: "cast_sink.monitor",
    });
    expect(pactl.calls).toEqual([
      "pactl info",
      "pactl load-module module-null-sink sink_name=cast_sink sink_properties=device.description=CastSink",
      "pactl set-default-sink cast_sink",
    ]);
  });

  it("tolerates an unreadable default sink", async () => {
    const pactl = fakePactl((args) => (args[0] === "info" ? new ExecError("pactl info", 1, "", "") : healthy(args)));
    const bridge = new PulseAudioBridge(pactl.run, testLogger());

    const handle = await bridge.provision("cast_sink");
    await bridge.release(handle);

    expect(handle.previousDefaultSink).toBeNull();
    expect(pactl.calls.slice(-1)).toEqual(["pactl unload-module 42"]);
  });

  it("fails when the module cannot be loaded", async () => {
    const pactl = fakePactl((args) =>
      args[0] === "load-module" ? new ExecError("pactl load-module", 1, "", "Connection refused") : healthy(args),
    );
    const bridge = new PulseAudioBridge(pactl.run, testLogger());

    await expect(bridge.provision("cast_sink")).rejects.toBeInstanceOf(AudioProvisioningError);
    expect(pactl.calls).toHaveLength(2);
  });

  it("rejects a module id that is not a number", async () => {
    const pactl = fakePactl((args) => (args[0] === "load-module" ? "Failure: Module initialization failed" : healthy(args)));
    const bridge = new PulseAudioBridge(pactl.run, testLogger());

    await expect(bridge.provision("cast_sink")).rejects.toThrow("invalid module id");
  });

  it("unloads the sink again when it cannot become the default", async () => {
    const pactl = fakePactl((args) =>
      args[0] === "set-default-sink" ? new ExecError("pactl set-default-sink", 1, "", "No such entity") : healthy(args),
    );
    const bridge = new PulseAudioBridge(pactl.run, testLogger());

    await expect(bridge.provision("cast_sink")).rejects.toBeInstanceOf(AudioProvisioningError);
    expect(pactl.calls[pactl.calls.length - 1]).toBe("pactl unload-module 42");
  });

  it("restores the previous default before unloading, once", async () => {
    const pactl = fakePactl(healthy);
    const bridge = new PulseAudioBridge(pactl.run, testLogger());
    const handle = await bridge.provision("cast_sink");
    pactl.calls.length = 0;

    await bridge.release(handle);
    await bridge.release(handle);

    expect(pactl.calls).toEqual([
      "pactl set-default-sink alsa_output.pci.analog-stereo",
      "pactl unload-module 42",
    ]);
  });

  it("keeps going when restoring or unloading fails", async () => {
    const pactl = fakePactl(healthy);
    const bridge = new PulseAudioBridge(pactl.run, testLogger());
    const handle = await bridge.provision("cast_sink");
    const broken = new PulseAudioBridge(
      fakePactl(() => new ExecError("pactl", 1, "", "Connection refused")).run,
      testLogger(),
    );

    await expect(broken.release(handle)).resolves.toBeUndefined();
  });
});
