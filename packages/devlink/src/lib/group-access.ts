import { existsSync } from "node:fs";
import type { SystemAccess } from "./system-access";

export class GroupAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GroupAccessError";
  }
}

/** A privileged step ran without sufficient privilege. */
export class PermissionError extends GroupAccessError {
  constructor(message: string) {
    super(message);
    this.name = "PermissionError";
  }
}

/** The GID or group name is already taken by a different group. */
export class GidConflictError extends GroupAccessError {
  constructor(message: string) {
    super(message);
    this.name = "GidConflictError";
  }
}

export interface GroupAccessRequest {
  path: string;
  hostUid: number;
  hostSubordinateGid: number;
  groupName: string;
}

export type GroupAccessResult =
  | { status: "ok"; gid: number; groupCreated: boolean }
  | { status: "skipped-no-path"; gid: number };

/**
 * GID a container process must use to match files the host sees as owned
 * by `hostSubordinateGid`. The user-namespace layer shifts every in-container
 * ID up by the host UID, so the shift is subtracted back out.
 *
 * computeContainerGid(10227, 54556) → 44329
 */
export function computeContainerGid(
  hostUid: number,
  hostSubordinateGid: number,
): number {
  if (!Number.isInteger(hostUid) || hostUid < 0) {
    throw new GroupAccessError(`Invalid host UID: ${hostUid}`);
  }
  if (!Number.isInteger(hostSubordinateGid) || hostSubordinateGid < 0) {
    throw new GroupAccessError(
      `Invalid host subordinate GID: ${hostSubordinateGid}`,
    );
  }
  const gid = hostSubordinateGid - hostUid;
  if (gid < 0) {
    throw new GroupAccessError(
      `Host subordinate GID ${hostSubordinateGid} is below host UID ${hostUid}; ` +
        "no container GID maps to it",
    );
  }
  return gid;
}

/**
 * Make `path` group-owned by `groupName` at the container GID and add
 * group rwx. Creates the group when neither its name nor its GID exist yet.
 */
export function fixGroupAccess(
  request: GroupAccessRequest,
  access: SystemAccess,
): GroupAccessResult {
  const { path, hostUid, hostSubordinateGid, groupName } = request;
  const gid = computeContainerGid(hostUid, hostSubordinateGid);

  if (!existsSync(path)) {
    return { status: "skipped-no-path", gid };
  }

  const byGid = access.lookupGroupByGid(gid);
  if (byGid && byGid.name !== groupName) {
    throw new GidConflictError(
      `GID ${gid} already belongs to group ${byGid.name} (wanted ${groupName})`,
    );
  }

  const byName = access.lookupGroupByName(groupName);
  if (byName && byName.gid !== gid) {
    throw new GidConflictError(
      `Group ${groupName} exists with GID ${byName.gid} (expected ${gid})`,
    );
  }

  let groupCreated = false;
  if (!byGid && !byName) {
    access.createGroup(groupName, gid);
    groupCreated = true;
  }

  access.changeGroup(path, gid);
  access.addGroupPermissions(path);

  return { status: "ok", gid, groupCreated };
}
