import type { HookConfig } from "./settings";
import {
  syncTemplate,
  MissingParentDirectoryError,
  type SyncOutcome,
  type SyncResult,
} from "./template-sync";

export interface PreUpOptions {
  config: HookConfig;
}

export interface PreUpResult {
  exitCode: number;
  message: string;
  outcome?: SyncOutcome;
}

/**
 * Host-side hook run before the container starts: refresh the compose
 * override from its template.
 *
 * Every sync outcome exits 0; only a missing override directory is fatal.
 */
export function runPreUp(options: PreUpOptions): PreUpResult {
  const { templatePath, overridePath, enabled } = options.config.customVolumes;

  let result: SyncResult;
  try {
    result = syncTemplate(templatePath, overridePath, enabled);
  } catch (err) {
    if (err instanceof MissingParentDirectoryError) {
      console.error(`Error: ${err.message}`);
      return { exitCode: 1, message: err.message };
    }
    throw err;
  }

  switch (result.outcome) {
    case "skipped-missing-template":
      console.warn(`Warning: ${result.message}`);
      break;
    case "copied":
      console.log(result.message);
      console.log(`Edit ${overridePath} to customize volume mounts`);
      break;
    case "skipped-newer":
    case "skipped-disabled":
      console.log(result.message);
      break;
  }

  return { exitCode: 0, message: result.message, outcome: result.outcome };
}
