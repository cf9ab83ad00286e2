import { defineCommand } from "citty";
import { loadHookConfig, SettingsConfigError } from "@/lib/settings";
import { runContainerStartup } from "@/lib/container-startup";

export const containerStartupCommand = defineCommand({
  meta: {
    name: "container-startup",
    description:
      "Reconcile multi-user symlinks and shared group access (in container, as root)",
  },
  args: {
    "dry-run": {
      type: "boolean",
      description: "Display planned actions without executing",
      default: false,
    },
    settings: {
      type: "string",
      description: "Path to settings.json (overrides discovery)",
      required: false,
    },
  },
  run({ args }) {
    let config;
    try {
      config = loadHookConfig({ settingsPath: args.settings });
    } catch (err) {
      if (err instanceof SettingsConfigError) {
        console.error(`Error: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    const result = runContainerStartup({ config, dryRun: args["dry-run"] });
    process.exitCode = result.exitCode;
  },
});
