import { readFileSync, existsSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { homedir } from "node:os";
import * as jsonc from "jsonc-parser";
import type { SymlinkPair, ConflictPolicy } from "./link-reconciler";

/** Host subordinate GID used when none is configured. */
export const DEFAULT_SHARED_GID = 55556;
export const DEFAULT_SHARED_GROUP = "user-credentials";
export const DEFAULT_LINK_OWNER = "dev";
/** Root-owned mount point that container users share. */
export const DEFAULT_SHARED_PATH = "/root/dev";

const DEFAULT_TEMPLATE = join(
  "templates",
  "docker-compose.override.yml.template",
);
const DEFAULT_OVERRIDE = join(
  "dev-environment",
  "docker-compose.override.yml",
);

export type Env = Record<string, string | undefined>;

/**
 * User-level devlink settings, as written in settings.json.
 */
export interface DevlinkSettings {
  customVolumes?: {
    enabled?: boolean;
    /** Template path, relative to the plugin root unless absolute */
    template?: string;
    /** Override path, relative to the repo root unless absolute */
    override?: string;
  };
  symlinks?: SymlinkPair[];
  /** Container user that owns the symlinks. null disables the user check. */
  linkOwner?: string | null;
  onConflict?: ConflictPolicy;
  groupAccess?: {
    path?: string;
    hostSubordinateGid?: number;
    groupName?: string;
  };
}

export interface GroupAccessConfig {
  path: string;
  hostUid: number;
  hostSubordinateGid: number;
  groupName: string;
}

/**
 * Everything both hook stages need, resolved once per run.
 */
export interface HookConfig {
  pluginRoot: string;
  repoRoot: string;
  customVolumes: {
    enabled: boolean;
    templatePath: string;
    overridePath: string;
  };
  symlinks: SymlinkPair[];
  linkOwner: string | null;
  onConflict: ConflictPolicy;
  /** null when the host UID is unknown */
  groupAccess: GroupAccessConfig | null;
}

export class SettingsConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsConfigError";
  }
}

/**
 * Expand tilde (~) to the user's home directory.
 */
export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path === "~") {
    return homedir();
  }
  return path;
}

/**
 * Expand tilde and resolve to absolute path.
 */
export function resolveSettingsPath(path: string, base?: string): string {
  const expanded = expandPath(path);
  return base ? resolve(base, expanded) : resolve(expanded);
}

/**
 * Find the settings.json file following the discovery order:
 * 1. DEVLINK_SETTINGS environment variable (file path)
 * 2. ~/.config/devlink/settings.json
 *
 * Returns the path if found, null otherwise.
 */
export function findSettingsConfig(env: Env = process.env): string | null {
  const envPath = env.DEVLINK_SETTINGS;
  if (envPath) {
    const resolved = resolveSettingsPath(envPath);
    if (existsSync(resolved)) {
      return resolved;
    }
    throw new SettingsConfigError(
      `DEVLINK_SETTINGS points to non-existent file: ${envPath}`,
    );
  }

  const xdgPath = join(homedir(), ".config", "devlink", "settings.json");
  if (existsSync(xdgPath)) {
    return xdgPath;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  obj: Record<string, unknown>,
  key: string,
  where: string,
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    throw new SettingsConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalInteger(
  obj: Record<string, unknown>,
  key: string,
  where: string,
): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new SettingsConfigError(
      `${where}.${key} must be a non-negative integer`,
    );
  }
  return value;
}

function parseConflictPolicy(value: unknown, where: string): ConflictPolicy {
  if (value === "fail" || value === "skip") return value;
  throw new SettingsConfigError(
    `${where} must be "fail" or "skip", got ${JSON.stringify(value)}`,
  );
}

function parseSymlinks(value: unknown): SymlinkPair[] {
  if (!Array.isArray(value)) {
    throw new SettingsConfigError("symlinks must be an array");
  }
  return value.map((entry, i) => {
    const where = `symlinks[${i}]`;
    if (!isRecord(entry)) {
      throw new SettingsConfigError(`${where} must be an object`);
    }
    const source = optionalString(entry, "source", where);
    const target = optionalString(entry, "target", where);
    if (!source || !target) {
      throw new SettingsConfigError(`${where} needs both source and target`);
    }
    return {
      source: resolveSettingsPath(source),
      target: resolveSettingsPath(target),
    };
  });
}

/**
 * Check the parsed JSON against the settings shape.
 * Symlink paths are expanded; other paths stay relative until resolveHookConfig.
 */
export function validateSettings(raw: unknown): DevlinkSettings {
  if (!isRecord(raw)) {
    throw new SettingsConfigError("settings.json must contain an object");
  }
  const settings: DevlinkSettings = {};

  if (raw.customVolumes !== undefined) {
    const cv = raw.customVolumes;
    if (!isRecord(cv)) {
      throw new SettingsConfigError("customVolumes must be an object");
    }
    const enabled = cv.enabled;
    if (enabled !== undefined && typeof enabled !== "boolean") {
      throw new SettingsConfigError("customVolumes.enabled must be a boolean");
    }
    settings.customVolumes = {
      enabled,
      template: optionalString(cv, "template", "customVolumes"),
      override: optionalString(cv, "override", "customVolumes"),
    };
  }

  if (raw.symlinks !== undefined) {
    settings.symlinks = parseSymlinks(raw.symlinks);
  }

  if (raw.linkOwner === null) {
    settings.linkOwner = null;
  } else {
    settings.linkOwner = optionalString(raw, "linkOwner", "settings");
  }

  if (raw.onConflict !== undefined) {
    settings.onConflict = parseConflictPolicy(raw.onConflict, "onConflict");
  }

  if (raw.groupAccess !== undefined) {
    const ga = raw.groupAccess;
    if (!isRecord(ga)) {
      throw new SettingsConfigError("groupAccess must be an object");
    }
    settings.groupAccess = {
      path: optionalString(ga, "path", "groupAccess"),
      hostSubordinateGid: optionalInteger(
        ga,
        "hostSubordinateGid",
        "groupAccess",
      ),
      groupName: optionalString(ga, "groupName", "groupAccess"),
    };
  }

  return settings;
}

/**
 * Read and parse a settings.json file.
 * Throws SettingsConfigError for unreadable, malformed or ill-typed files.
 */
export function readSettingsConfig(filePath: string): DevlinkSettings {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch {
    throw new SettingsConfigError(`Cannot read settings file: ${filePath}`);
  }

  const errors: jsonc.ParseError[] = [];
  const raw: unknown = jsonc.parse(content, errors, {
    allowTrailingComma: true,
  });

  if (errors.length > 0) {
    const first = errors[0];
    throw new SettingsConfigError(
      `Malformed settings.json at offset ${first.offset}: ${jsonc.printParseErrorCode(first.error)}`,
    );
  }

  return validateSettings(raw);
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === "") return undefined;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new SettingsConfigError(`${name} must be true or false, got "${value}"`);
}

function envInteger(env: Env, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === "") return undefined;
  if (!/^\d+$/.test(value)) {
    throw new SettingsConfigError(
      `${name} must be a non-negative integer, got "${value}"`,
    );
  }
  return Number(value);
}

function envString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Symlinks used when settings.json lists none: the shared mount point is
 * exposed in the link owner's home, and the repo is reachable from it.
 */
export function defaultSymlinks(
  repoRoot: string,
  linkOwner: string | null,
): SymlinkPair[] {
  const pairs: SymlinkPair[] = [];
  if (linkOwner) {
    pairs.push({
      source: DEFAULT_SHARED_PATH,
      target: join("/home", linkOwner, "dev"),
    });
  }
  pairs.push({
    source: repoRoot,
    target: join(DEFAULT_SHARED_PATH, basename(repoRoot)),
  });
  return pairs;
}

/**
 * Merge defaults, settings and environment into a HookConfig.
 * Environment variables win over settings.json.
 */
export function resolveHookConfig(
  settings: DevlinkSettings,
  env: Env,
  cwd: string = process.cwd(),
): HookConfig {
  const pluginRoot = resolveSettingsPath(
    envString(env, "DEVLINK_PLUGIN_ROOT") ?? cwd,
  );
  const repoRoot = resolveSettingsPath(
    envString(env, "DEVLINK_REPO_ROOT") ?? cwd,
  );

  const linkOwner =
    envString(env, "DEVLINK_LINK_OWNER") ??
    (settings.linkOwner === undefined ? DEFAULT_LINK_OWNER : settings.linkOwner);

  const enabled =
    envBoolean(env, "DEVLINK_CUSTOM_VOLUMES") ??
    settings.customVolumes?.enabled ??
    true;

  const hostUid = envInteger(env, "DEVLINK_HOST_UID");
  let groupAccess: GroupAccessConfig | null = null;
  if (hostUid !== undefined) {
    groupAccess = {
      path: resolveSettingsPath(
        settings.groupAccess?.path ?? DEFAULT_SHARED_PATH,
      ),
      hostUid,
      hostSubordinateGid:
        envInteger(env, "DEVLINK_SHARED_GID") ??
        settings.groupAccess?.hostSubordinateGid ??
        DEFAULT_SHARED_GID,
      groupName:
        envString(env, "DEVLINK_SHARED_GROUP") ??
        settings.groupAccess?.groupName ??
        DEFAULT_SHARED_GROUP,
    };
  }

  return {
    pluginRoot,
    repoRoot,
    customVolumes: {
      enabled,
      templatePath: resolveSettingsPath(
        settings.customVolumes?.template ?? DEFAULT_TEMPLATE,
        pluginRoot,
      ),
      overridePath: resolveSettingsPath(
        settings.customVolumes?.override ?? DEFAULT_OVERRIDE,
        repoRoot,
      ),
    },
    symlinks: settings.symlinks ?? defaultSymlinks(repoRoot, linkOwner),
    linkOwner,
    onConflict: settings.onConflict ?? "fail",
    groupAccess,
  };
}

export interface LoadHookConfigOptions {
  env?: Env;
  /** Explicit settings file; skips discovery */
  settingsPath?: string;
  cwd?: string;
}

/**
 * Load settings from the default locations and resolve the hook config.
 * Throws SettingsConfigError for parse errors, bad values or a missing
 * DEVLINK_SETTINGS file.
 */
export function loadHookConfig(options: LoadHookConfigOptions = {}): HookConfig {
  const env = options.env ?? process.env;
  const configPath = options.settingsPath ?? findSettingsConfig(env);
  const settings = configPath ? readSettingsConfig(configPath) : {};
  return resolveHookConfig(settings, env, options.cwd);
}
