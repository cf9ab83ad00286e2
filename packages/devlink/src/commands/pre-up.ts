import { defineCommand } from "citty";
import { loadHookConfig, SettingsConfigError } from "@/lib/settings";
import { runPreUp } from "@/lib/pre-up";

export const preUpCommand = defineCommand({
  meta: {
    name: "pre-up",
    description:
      "Copy the docker-compose override template into the repo (host side, before start)",
  },
  args: {
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

    const result = runPreUp({ config });
    process.exitCode = result.exitCode;
  },
});
