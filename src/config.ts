import { z } from "zod";
import fs from "fs-extra";
import path from "path";
import { errorMessage } from "./errors.js";
import type { StreamOptions } from "./types.js";

export const CONFIG_FILE_NAME = "desktop-cast.json";
export const DEFAULT_NAMESPACE = "urn:x-cast:desktop.cast.stream";

const resolutionRegex = /^\d{2,5}x\d{2,5}$/;
const sinkNameRegex = /^[A-Za-z0-9_.-]+$/;
const namespaceRegex = /^urn:x-cast:[\w.-]+$/;

const optionsObject = z.object({
  mode: z.enum(["direct", "wait"]).default("direct"),
  appId: z.string().trim().min(1).optional(),
  namespace: z.string().regex(namespaceRegex, "Namespace must look like urn:x-cast:<name>").default(DEFAULT_NAMESPACE),
  device: z.string().trim().min(1).optional(),
  ip: z.string().ip({ version: "v4", message: "Invalid IPv4 address" }).optional(),
  port: z.coerce.number().int().min(1024).max(65535).default(8090),
  fps: z.coerce.number().int().min(1).max(240).default(30),
  resolution: z.string().regex(resolutionRegex, "Resolution must be WIDTHxHEIGHT, e.g. 1920x1080").default("1920x1080"),
  display: z.string().min(1).default(process.env.DISPLAY || ":0"),
  gopSeconds: z.coerce.number().positive().max(60).default(2),
  hw: z.enum(["auto", "vaapi", "cuda", "qsv", "software"]).default("auto"),
  sinkName: z.string().regex(sinkNameRegex, "Sink name may only contain letters, digits, '_', '.' and '-'").default("cast_sink"),
  ffmpegLogLevel: z.enum(["quiet", "error", "warning", "info", "debug"]).default("info"),
  latency: z.enum(["normal", "low", "ultra"]).default("normal"),
  lanOnly: z.boolean().default(false),
  startTimeoutSeconds: z.coerce.number().positive().optional(),
  discoveryTimeoutSeconds: z.coerce.number().positive().max(120).default(5),
  playbackTimeoutSeconds: z.coerce.number().positive().max(300).default(10),
  settleSeconds: z.coerce.number().min(0).max(60).default(3),
  encoderOutput: z.enum(["inherit", "log"]).default("inherit"),
  interactive: z.boolean().default(false),
  virtual: z.boolean().default(false),
  virtualResolution: z
    .string()
    .regex(resolutionRegex, "Virtual resolution must be WIDTHxHEIGHT, e.g. 3840x2160")
    .default("3840x2160"),
  virtualDisplay: z.string().regex(/^(auto|:\d+)$/, "Virtual display must be 'auto' or :N").default("auto"),
  virtualWm: z.boolean().default(false),
  virtualBackend: z.enum(["auto", "xvfb", "xephyr"]).default("auto"),
});

const streamOptionsSchema = optionsObject.superRefine((data, ctx) => {
  if (data.mode === "wait" && !data.appId) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "appId is required in wait mode (the receiver app sends the start signal)",
      path: ["appId"],
    });
  }

  if (data.startTimeoutSeconds !== undefined && data.mode !== "wait") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "startTimeoutSeconds only applies to wait mode",
      path: ["startTimeoutSeconds"],
    });
  }
});

const persistedConfigSchema = optionsObject
  .omit({ interactive: true })
  .partial()
  .extend({ lastUpdated: z.string().optional() });

export type PersistedConfig = z.infer<typeof persistedConfigSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

export const parseStreamOptions = (input: unknown): StreamOptions => {
  const parsed = streamOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

const definedEntries = (source: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));

/**
 * Defaults < config file < command line. Flags the user did not pass are undefined
 * and do not override the file.
 */
export const mergeOptions = (fileConfig: PersistedConfig | null, cliOptions: Record<string, unknown>): StreamOptions => {
  const { lastUpdated: _lastUpdated, ...fromFile }: PersistedConfig = fileConfig ?? {};
  return parseStreamOptions({ ...definedEntries(fromFile), ...definedEntries(cliOptions) });
};

export const loadConfig = async (configPath: string): Promise<PersistedConfig | null> => {
  if (!(await fs.pathExists(configPath))) {
    return null;
  }

  const raw = await fs.readFile(configPath, "utf-8");

  if (!raw.trim()) {
    throw new Error("Configuration file is empty.");
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse configuration JSON: ${errorMessage(error)}`);
  }

  const parsed = persistedConfigSchema.safeParse(data);

  if (!parsed.success) {
    throw new Error(`Invalid configuration file: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
};

export const saveConfig = async (configPath: string, options: StreamOptions): Promise<void> => {
  const { interactive: _interactive, ...persisted } = options;
  const parsed = persistedConfigSchema.safeParse({ ...persisted, lastUpdated: new Date().toISOString() });
  if (!parsed.success) {
    throw new Error(`Failed to save configuration: ${formatIssues(parsed.error)}`);
  }

  await fs.writeJSON(configPath, parsed.data, { spaces: 2 });
};

export const getDefaultConfigPath = (cwd: string): string => {
  return path.join(cwd, CONFIG_FILE_NAME);
};
