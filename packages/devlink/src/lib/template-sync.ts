import { chmodSync, copyFileSync, existsSync, statSync } from "node:fs";
import { dirname } from "node:path";

export type SyncOutcome =
  | "copied"
  | "skipped-newer"
  | "skipped-missing-template"
  | "skipped-disabled";

export interface SyncResult {
  outcome: SyncOutcome;
  message: string;
}

export class MissingParentDirectoryError extends Error {
  readonly directory: string;

  constructor(directory: string) {
    super(`Override directory does not exist: ${directory}`);
    this.name = "MissingParentDirectoryError";
    this.directory = directory;
  }
}

/**
 * Copy the override template into place unless a newer copy is already
 * there.
 *
 * A missing template is a normal state (no custom volumes configured), not
 * an error. The override's parent directory is never created here.
 */
export function syncTemplate(
  templatePath: string,
  overridePath: string,
  enabled: boolean,
): SyncResult {
  if (!enabled) {
    return {
      outcome: "skipped-disabled",
      message: "Custom volumes disabled (skipping override file)",
    };
  }

  if (!existsSync(templatePath)) {
    return {
      outcome: "skipped-missing-template",
      message: `Override template not found at: ${templatePath}. Skipping custom volume setup.`,
    };
  }

  const overrideDir = dirname(overridePath);
  if (!existsSync(overrideDir)) {
    throw new MissingParentDirectoryError(overrideDir);
  }

  const template = statSync(templatePath, { bigint: true });
  if (existsSync(overridePath)) {
    const override = statSync(overridePath, { bigint: true });
    if (override.mtimeNs > template.mtimeNs) {
      return {
        outcome: "skipped-newer",
        message: "Override file is up-to-date (no changes needed)",
      };
    }
  }

  copyFileSync(templatePath, overridePath);
  chmodSync(overridePath, Number(template.mode & 0o7777n));

  return {
    outcome: "copied",
    message: `Copied ${templatePath} to ${overridePath}`,
  };
}
