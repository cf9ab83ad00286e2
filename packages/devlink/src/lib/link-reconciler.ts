import {
  existsSync,
  lstatSync,
  mkdirSync,
  readlinkSync,
  symlinkSync,
  unlinkSync,
} from "node:fs";
import { dirname } from "node:path";

/** A declared (source, target) mapping realized as `target -> source`. */
export interface SymlinkPair {
  /** The real path the link points at */
  source: string;
  /** Where the symlink lives */
  target: string;
}

/**
 * What happens to a pair:
 * - skipped: source absent, nothing to link
 * - created: target absent, link created
 * - preserved: target already links to source
 * - replaced: target links elsewhere, relinked
 * - conflict: target (or one of its parents) is a real file or directory
 */
export type LinkState =
  | "skipped"
  | "created"
  | "preserved"
  | "replaced"
  | "conflict";

/** "fail" aborts before any change; "skip" leaves conflicting entries alone. */
export type ConflictPolicy = "fail" | "skip";

export interface LinkAction {
  pair: SymlinkPair;
  state: LinkState;
  /** Current referent of a stale link (replaced only) */
  previous?: string;
}

export interface ReconcileOptions {
  onConflict?: ConflictPolicy;
  /** Plan only; leave the filesystem untouched */
  dryRun?: boolean;
}

export interface ReconcileResult {
  created: number;
  skipped: number;
  preserved: number;
  replaced: number;
  conflicts: number;
  actions: LinkAction[];
}

export class SymlinkConflictError extends Error {
  readonly targets: string[];

  constructor(targets: string[]) {
    super(
      `Symlink target(s) exist as regular files or directories: ${targets.join(", ")}. ` +
        "Move them aside or set onConflict to \"skip\".",
    );
    this.name = "SymlinkConflictError";
    this.targets = targets;
  }
}

function errnoCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

function isMissing(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}

/**
 * Classify one pair against the current filesystem. No side effects.
 */
export function planLink(pair: SymlinkPair): LinkAction {
  if (!existsSync(pair.source)) {
    return { pair, state: "skipped" };
  }

  let isSymlink: boolean;
  try {
    isSymlink = lstatSync(pair.target).isSymbolicLink();
  } catch (err) {
    if (isMissing(err)) {
      return { pair, state: "created" };
    }
    // a parent of the target is a regular file
    if (errnoCode(err) === "ENOTDIR") {
      return { pair, state: "conflict" };
    }
    throw err;
  }

  if (!isSymlink) {
    return { pair, state: "conflict" };
  }

  const current = readlinkSync(pair.target);
  if (current === pair.source) {
    return { pair, state: "preserved" };
  }
  return { pair, state: "replaced", previous: current };
}

function applyLink(action: LinkAction): void {
  const { source, target } = action.pair;
  switch (action.state) {
    case "created":
      mkdirSync(dirname(target), { recursive: true });
      symlinkSync(source, target);
      break;
    case "replaced":
      unlinkSync(target);
      symlinkSync(source, target);
      break;
    case "skipped":
    case "preserved":
    case "conflict":
      break;
  }
}

/**
 * Bring every pair's target in line with its source.
 *
 * All pairs are planned before anything is touched, so under the "fail"
 * policy a conflict anywhere leaves the filesystem unchanged.
 */
export function reconcileLinks(
  pairs: SymlinkPair[],
  options: ReconcileOptions = {},
): ReconcileResult {
  const { onConflict = "fail", dryRun = false } = options;
  const actions = pairs.map(planLink);

  const conflicting = actions
    .filter((a) => a.state === "conflict")
    .map((a) => a.pair.target);
  if (conflicting.length > 0 && onConflict === "fail" && !dryRun) {
    throw new SymlinkConflictError(conflicting);
  }

  if (!dryRun) {
    for (const action of actions) {
      applyLink(action);
    }
  }

  const count = (state: LinkState) =>
    actions.filter((a) => a.state === state).length;

  return {
    created: count("created"),
    skipped: count("skipped"),
    preserved: count("preserved"),
    replaced: count("replaced"),
    conflicts: count("conflict"),
    actions,
  };
}

/**
 * Targets that should be links to their source after reconciliation but
 * are not. Empty = all good.
 */
export function verifyLinks(actions: LinkAction[]): SymlinkPair[] {
  const failed: SymlinkPair[] = [];
  for (const action of actions) {
    if (
      action.state !== "created" &&
      action.state !== "preserved" &&
      action.state !== "replaced"
    ) {
      continue;
    }
    const { source, target } = action.pair;
    try {
      if (
        !lstatSync(target).isSymbolicLink() ||
        readlinkSync(target) !== source
      ) {
        failed.push(action.pair);
      }
    } catch (err) {
      if (!isMissing(err)) throw err;
      failed.push(action.pair);
    }
  }
  return failed;
}
