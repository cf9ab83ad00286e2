import { chmodSync, chownSync, lchownSync, statSync } from "node:fs";
import type { RunSubprocess } from "./subprocess";
import { runSubprocess as defaultRunSubprocess } from "./subprocess";
import {
  GidConflictError,
  GroupAccessError,
  PermissionError,
} from "./group-access";

export interface UserEntry {
  name: string;
  uid: number;
  gid: number;
}

export interface GroupEntry {
  name: string;
  gid: number;
  members: string[];
}

/**
 * Operating-system calls that need root inside the container. Everything
 * that reconciles ownership goes through this so tests can substitute it.
 */
export interface SystemAccess {
  lookupUser(name: string): UserEntry | null;
  lookupGroupByGid(gid: number): GroupEntry | null;
  lookupGroupByName(name: string): GroupEntry | null;
  createGroup(name: string, gid: number): void;
  /** chgrp without touching the owner */
  changeGroup(path: string, gid: number): void;
  /** g+rwx, other bits unchanged */
  addGroupPermissions(path: string): void;
  /** chown -h: applies to the link itself */
  changeLinkOwner(path: string, uid: number, gid: number): void;
}

// groupadd(8) exit codes
const GROUPADD_CANT_UPDATE_PASSWD = 1;
const GROUPADD_GID_NOT_UNIQUE = 4;
const GROUPADD_NAME_NOT_UNIQUE = 9;
const GROUPADD_CANT_UPDATE_GROUP = 10;

// getent(1) exit code for "key not found"
const GETENT_NOT_FOUND = 2;

/** Parse one `name:x:gid:member,member` line from getent group. */
export function parseGroupLine(line: string): GroupEntry | null {
  const fields = line.trim().split(":");
  if (fields.length < 4) return null;
  const gid = Number(fields[2]);
  if (!fields[0] || !Number.isInteger(gid)) return null;
  return {
    name: fields[0],
    gid,
    members: fields[3] ? fields[3].split(",") : [],
  };
}

/** Parse one `name:x:uid:gid:gecos:home:shell` line from getent passwd. */
export function parseUserLine(line: string): UserEntry | null {
  const fields = line.trim().split(":");
  if (fields.length < 4) return null;
  const uid = Number(fields[2]);
  const gid = Number(fields[3]);
  if (!fields[0] || !Number.isInteger(uid) || !Number.isInteger(gid)) {
    return null;
  }
  return { name: fields[0], uid, gid };
}

function errnoCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

/**
 * Run an fs call, translating EPERM/EACCES into PermissionError.
 */
export function privileged(what: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    const code = errnoCode(err);
    if (code === "EPERM" || code === "EACCES") {
      throw new PermissionError(`${what}: permission denied (run as root)`);
    }
    throw err;
  }
}

function getent(
  subprocess: RunSubprocess,
  database: "passwd" | "group",
  key: string,
): string | null {
  const result = subprocess("getent", [database, key]);
  if (result.exitCode === GETENT_NOT_FOUND) return null;
  if (result.exitCode !== 0) {
    throw new GroupAccessError(
      `getent ${database} ${key} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`,
    );
  }
  return result.stdout.split("\n")[0] ?? "";
}

/**
 * Default SystemAccess: name-service lookups and groupadd via subprocess,
 * ownership and mode changes via node:fs.
 */
export function createSystemAccess(
  subprocess: RunSubprocess = defaultRunSubprocess,
): SystemAccess {
  return {
    lookupUser(name) {
      const line = getent(subprocess, "passwd", name);
      return line === null ? null : parseUserLine(line);
    },

    lookupGroupByGid(gid) {
      const line = getent(subprocess, "group", String(gid));
      return line === null ? null : parseGroupLine(line);
    },

    lookupGroupByName(name) {
      const line = getent(subprocess, "group", name);
      return line === null ? null : parseGroupLine(line);
    },

    createGroup(name, gid) {
      const result = subprocess("groupadd", ["-g", String(gid), name]);
      if (result.exitCode === 0) return;
      const detail = result.stderr.trim() || `exit ${result.exitCode}`;
      switch (result.exitCode) {
        case GROUPADD_CANT_UPDATE_PASSWD:
        case GROUPADD_CANT_UPDATE_GROUP:
          throw new PermissionError(
            `Cannot create group ${name} (GID ${gid}): ${detail}`,
          );
        case GROUPADD_GID_NOT_UNIQUE:
        case GROUPADD_NAME_NOT_UNIQUE:
          throw new GidConflictError(
            `Cannot create group ${name} (GID ${gid}): ${detail}`,
          );
        default:
          throw new GroupAccessError(
            `Cannot create group ${name} (GID ${gid}): ${detail}`,
          );
      }
    },

    changeGroup(path, gid) {
      // -1 leaves the owner as is
      privileged(`chgrp ${gid} ${path}`, () => chownSync(path, -1, gid));
    },

    addGroupPermissions(path) {
      privileged(`chmod g+rwx ${path}`, () => {
        const mode = statSync(path).mode & 0o7777;
        chmodSync(path, mode | 0o070);
      });
    },

    changeLinkOwner(path, uid, gid) {
      privileged(`chown -h ${uid}:${gid} ${path}`, () =>
        lchownSync(path, uid, gid),
      );
    },
  };
}
