import { defineCommand } from "citty";
import { computeContainerGid, GroupAccessError } from "@/lib/group-access";

function parseId(value: string, flag: string): number | null {
  if (!/^\d+$/.test(value)) {
    console.error(`Error: --${flag} must be a non-negative integer, got "${value}"`);
    return null;
  }
  return Number(value);
}

export const containerGidCommand = defineCommand({
  meta: {
    name: "container-gid",
    description:
      "Print the in-container GID matching a host subordinate GID",
  },
  args: {
    "host-uid": {
      type: "string",
      description: "UID of the host user running the container",
      required: true,
    },
    "host-gid": {
      type: "string",
      description: "Host subordinate GID that owns the shared files",
      required: true,
    },
  },
  run({ args }) {
    const hostUid = parseId(args["host-uid"], "host-uid");
    const hostGid = parseId(args["host-gid"], "host-gid");
    if (hostUid === null || hostGid === null) {
      process.exitCode = 1;
      return;
    }

    try {
      console.log(String(computeContainerGid(hostUid, hostGid)));
    } catch (err) {
      if (err instanceof GroupAccessError) {
        console.error(`Error: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  },
});
