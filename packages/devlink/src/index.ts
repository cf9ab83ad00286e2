#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { containerGidCommand } from "@/commands/container-gid";
import { containerStartupCommand } from "@/commands/container-startup";
import { preUpCommand } from "@/commands/pre-up";

const main = defineCommand({
  meta: {
    name: "devlink",
    version: "0.1.0",
    description: "Dev-container volume override and multi-user link hooks",
  },
  subCommands: {
    "container-gid": containerGidCommand,
    "container-startup": containerStartupCommand,
    "pre-up": preUpCommand,
  },
});

void runMain(main);
