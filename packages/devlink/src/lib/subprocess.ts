import { execFileSync } from "node:child_process";

export interface SubprocessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Thin wrapper for subprocess invocation, easily mockable in tests.
 * Default implementation shells out using execFileSync.
 */
export type RunSubprocess = (
  command: string,
  args: string[],
  options?: { cwd?: string },
) => SubprocessResult;

function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return "";
}

export const runSubprocess: RunSubprocess = (command, args, options) => {
  try {
    const stdout = execFileSync(command, args, {
      cwd: options?.cwd,
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
    return { exitCode: 0, stdout, stderr: "" };
  } catch (err: unknown) {
    const status = field(err, "status");
    const stderr = asText(field(err, "stderr"));
    return {
      exitCode: typeof status === "number" ? status : 1,
      stdout: asText(field(err, "stdout")),
      stderr: stderr || (err instanceof Error ? err.message : ""),
    };
  }
};
