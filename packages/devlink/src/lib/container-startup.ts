import type { HookConfig } from "./settings";
import {
  reconcileLinks,
  verifyLinks,
  SymlinkConflictError,
  type LinkAction,
  type ReconcileResult,
  type SymlinkPair,
} from "./link-reconciler";
import {
  computeContainerGid,
  fixGroupAccess,
  GroupAccessError,
  type GroupAccessResult,
} from "./group-access";
import type { SystemAccess, UserEntry } from "./system-access";
import { createSystemAccess } from "./system-access";

export interface ContainerStartupOptions {
  config: HookConfig;
  /** Privileged OS calls; defaults to getent/groupadd and node:fs */
  access?: SystemAccess;
  /** Display planned actions without executing */
  dryRun?: boolean;
}

export interface ContainerStartupResult {
  exitCode: number;
  message: string;
  links?: ReconcileResult;
  groupAccess?: GroupAccessResult;
}

export function formatLinkSummary(links: ReconcileResult): string {
  let summary =
    `Symlinks: ${links.created} created, ${links.skipped} skipped, ` +
    `${links.preserved} preserved, ${links.replaced} replaced`;
  if (links.conflicts > 0) {
    summary += `, ${links.conflicts} conflict(s)`;
  }
  return summary;
}

function describeAction(action: LinkAction): string {
  const { source, target } = action.pair;
  switch (action.state) {
    case "skipped":
      return `  - ${target}: source ${source} missing [skip]`;
    case "created":
      return `  - ${target} → ${source} [create]`;
    case "preserved":
      return `  - ${target} → ${source} [ok]`;
    case "replaced":
      return `  - ${target} → ${source} [replace, was ${action.previous ?? "?"}]`;
    case "conflict":
      return `  - ${target}: exists as a regular file or directory [conflict]`;
  }
}

function skipAll(pairs: SymlinkPair[]): ReconcileResult {
  return {
    created: 0,
    skipped: pairs.length,
    preserved: 0,
    replaced: 0,
    conflicts: 0,
    actions: pairs.map((pair): LinkAction => ({ pair, state: "skipped" })),
  };
}

function fail(
  message: string,
  links?: ReconcileResult,
): ContainerStartupResult {
  console.error(`Error: ${message}`);
  return { exitCode: 1, message, links };
}

function runDryRun(config: HookConfig): ContainerStartupResult {
  const links = reconcileLinks(config.symlinks, {
    onConflict: config.onConflict,
    dryRun: true,
  });
  const lines = [
    `Dry run: Would reconcile ${config.symlinks.length} symlink(s):`,
    ...links.actions.map(describeAction),
  ];
  if (config.groupAccess) {
    const { path, hostUid, hostSubordinateGid, groupName } = config.groupAccess;
    try {
      const gid = computeContainerGid(hostUid, hostSubordinateGid);
      lines.push(`Would grant group ${groupName} (GID ${gid}) rwx on ${path}`);
    } catch (err) {
      if (err instanceof GroupAccessError) {
        return fail(err.message, links);
      }
      throw err;
    }
  }
  const message = lines.join("\n");
  console.log(message);
  return { exitCode: 0, message, links };
}

/**
 * Container-side hook run as root after the bind-mounts exist:
 * 1. Check the link owner exists (count every pair skipped if not)
 * 2. Reconcile symlinks and hand created ones to the link owner
 * 3. Verify the links
 * 4. Fix group access on the shared directory
 */
export function runContainerStartup(
  options: ContainerStartupOptions,
): ContainerStartupResult {
  const { config, dryRun = false } = options;
  const access = options.access ?? createSystemAccess();

  if (dryRun) {
    return runDryRun(config);
  }

  const lines: string[] = [];
  let links: ReconcileResult | undefined;

  let owner: UserEntry | null = null;
  let ownerMissing = false;
  if (config.linkOwner) {
    try {
      owner = access.lookupUser(config.linkOwner);
    } catch (err) {
      if (err instanceof GroupAccessError) return fail(err.message);
      throw err;
    }
    ownerMissing = owner === null;
  }

  if (ownerMissing) {
    console.warn(
      `Warning: user ${config.linkOwner} not found - skipping symlink creation`,
    );
    links = skipAll(config.symlinks);
    const summary = formatLinkSummary(links);
    console.log(summary);
    lines.push(summary);
  } else {
    let reconciled: ReconcileResult;
    try {
      reconciled = reconcileLinks(config.symlinks, {
        onConflict: config.onConflict,
      });
    } catch (err) {
      if (err instanceof SymlinkConflictError) return fail(err.message);
      throw err;
    }
    links = reconciled;

    for (const action of reconciled.actions) {
      if (action.state === "replaced") {
        console.warn(
          `Warning: replaced stale symlink ${action.pair.target} (was → ${action.previous ?? "?"})`,
        );
      } else if (action.state === "conflict") {
        console.warn(
          `Warning: ${action.pair.target} exists as a regular file or directory (manual intervention required)`,
        );
      }

      if (owner && (action.state === "created" || action.state === "replaced")) {
        try {
          access.changeLinkOwner(action.pair.target, owner.uid, owner.gid);
        } catch (err) {
          if (!(err instanceof GroupAccessError)) throw err;
          console.warn(
            `Warning: could not hand ${action.pair.target} to ${owner.name}: ${err.message}`,
          );
        }
      }
    }

    const summary = formatLinkSummary(reconciled);
    console.log(summary);
    lines.push(summary);

    for (const pair of verifyLinks(reconciled.actions)) {
      console.warn(
        `Warning: ${pair.target} does not link to ${pair.source} after reconciliation`,
      );
    }
  }

  let groupAccess: GroupAccessResult | undefined;
  if (config.groupAccess) {
    try {
      groupAccess = fixGroupAccess(config.groupAccess, access);
    } catch (err) {
      if (err instanceof GroupAccessError) return fail(err.message, links);
      throw err;
    }

    const { path, groupName } = config.groupAccess;
    const line =
      groupAccess.status === "ok"
        ? `Granted group ${groupName} (GID ${groupAccess.gid}) rwx on ${path}` +
          (groupAccess.groupCreated ? " (group created)" : "")
        : `Shared path ${path} not found (skipping group access)`;
    console.log(line);
    lines.push(line);
  }

  return { exitCode: 0, message: lines.join("\n"), links, groupAccess };
}
