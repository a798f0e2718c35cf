import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<ExecResult>;

export class ExecError extends Error {
  public readonly command: string;
  public readonly code: number | string | null;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(command: string, code: number | string | null, stdout: string, stderr: string) {
    super(`Command failed (${command})${stderr ? `: ${stderr}` : ""}`);
    this.name = "ExecError";
    this.command = command;
    this.code = code;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

const readField = (source: unknown, key: string): unknown =>
  typeof source === "object" && source !== null ? Reflect.get(source, key) : undefined;

const asText = (value: unknown): string => {
  if (typeof value === "string") {
    return value.trim();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString("utf-8").trim();
  }
  return "";
};

/**
 * Runs a short-lived command without a shell and resolves with its trimmed output.
 * Non-zero exits and spawn failures (ENOENT) reject with ExecError.
 */
export const runCommand: CommandRunner = async (file, args) => {
  const command = [file, ...args].join(" ");
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], { encoding: "utf-8" });
    return { stdout: stdout.trim(), stderr: stderr.trim() };
  } catch (error) {
    const code = readField(error, "code");
    throw new ExecError(
      command,
      typeof code === "number" || typeof code === "string" ? code : null,
      asText(readField(error, "stdout")),
      asText(readField(error, "stderr")),
    );
  }
};
