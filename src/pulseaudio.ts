import { AudioProvisioningError, errorMessage } from "./errors.js";
import type { AudioSinkHandle } from "./types.js";
import type { CommandRunner } from "./utils/exec.js";
import { Logger } from "./utils/logger.js";

export const SINK_DESCRIPTION = "CastSink";

export interface AudioBridge {
  provision: (sinkName: string) => Promise<AudioSinkHandle>;
  release: (handle: AudioSinkHandle) => Promise<void>;
}

export const parseDefaultSink = (pactlInfo: string): string | null => {
  for (const line of pactlInfo.split("\n")) {
    if (line.startsWith("Default Sink:")) {
      const sink = line.slice("Default Sink:".length).trim();
      return sink.length > 0 ? sink : null;
    }
  }
  return null;
};

/**
 * Routes all desktop audio into a PulseAudio null sink whose monitor the encoder records.
 * Works against pipewire-pulse as well, since only `pactl` is used.
 */
export class PulseAudioBridge implements AudioBridge {
  private readonly released = new Set<string>();

  constructor(
    private readonly run: CommandRunner,
    private readonly logger: Logger,
  ) {}

  async readDefaultSink(): Promise<string | null> {
    try {
      const { stdout } = await this.run("pactl", ["info"]);
      return parseDefaultSink(stdout);
    } catch (error) {
      this.logger.verboseLog(`Could not read the default sink: ${errorMessage(error)}`);
      return null;
    }
  }

  async provision(sinkName: string): Promise<AudioSinkHandle> {
    const previousDefaultSink = await this.readDefaultSink();
    this.logger.verboseLog(`Current default sink: ${previousDefaultSink ?? "unknown"}`);

    let moduleId: string;
    try {
      const { stdout } = await this.run("pactl", [
        "load-module",
        "module-null-sink",
        `sink_name=${sinkName}`,
        `sink_properties=device.description=${SINK_DESCRIPTION}`,
      ]);
      moduleId = stdout.trim();
    } catch (error) {
      throw new AudioProvisioningError(
        `Could not create null sink '${sinkName}'. Is PulseAudio (or pipewire-pulse) running? ${errorMessage(error)}`,
        error,
      );
    }

    if (!/^\d+$/.test(moduleId)) {
      throw new AudioProvisioningError(`Audio server returned an invalid module id for '${sinkName}': "${moduleId}"`);
    }

    const handle: AudioSinkHandle = {
      sinkName,
      moduleId,
      previousDefaultSink,
      monitorSource: `${sinkName}.monitor`,
    };

    try {
      await this.run("pactl", ["set-default-sink", sinkName]);
    } catch (error) {
      await this.unload(handle);
      throw new AudioProvisioningError(`Could not make '${sinkName}' the default sink: ${errorMessage(error)}`, error);
    }

    this.logger.info(`Null sink '${sinkName}' ready (module ${moduleId}), capturing from ${handle.monitorSource}.`);
    return handle;
  }

  async release(handle: AudioSinkHandle): Promise<void> {
    if (this.released.has(handle.moduleId)) {
      this.logger.verboseLog(`Sink module ${handle.moduleId} already released.`);
      return;
    }

    if (handle.previousDefaultSink) {
      try {
        await this.run("pactl", ["set-default-sink", handle.previousDefaultSink]);
        this.logger.verboseLog(`Restored default sink ${handle.previousDefaultSink}.`);
      } catch (error) {
        this.logger.warn(`Failed to restore default sink ${handle.previousDefaultSink}: ${errorMessage(error)}`);
      }
    }

    await this.unload(handle);
  }

  private async unload(handle: AudioSinkHandle): Promise<void> {
    this.released.add(handle.moduleId);
    try {
      await this.run("pactl", ["unload-module", handle.moduleId]);
      this.logger.info(`Removed null sink '${handle.sinkName}'.`);
    } catch (error) {
      this.logger.warn(`Failed to unload sink module ${handle.moduleId}: ${errorMessage(error)}`);
    }
  }
}
