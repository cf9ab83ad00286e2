import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  chmodSync,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  utimesSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import {
  syncTemplate,
  MissingParentDirectoryError,
} from "@/lib/template-sync";
import { createTempDir, removeTempDir } from "@/__tests__/helpers/test-env";

const TEMPLATE = [
  "services:",
  "  dev:",
  "    volumes:",
  "      # personal fixtures",
  "      - ${HOME}/test-files:/root/dev/test-files:ro",
  "",
].join("\n");

const PAST = new Date("2020-01-01T00:00:00Z");
const LATER = new Date("2021-01-01T00:00:00Z");

let testDir: string;
let templatePath: string;
let overrideDir: string;
let overridePath: string;

function writeTemplate(content: string = TEMPLATE, mtime: Date = PAST) {
  writeFileSync(templatePath, content, "utf-8");
  utimesSync(templatePath, mtime, mtime);
}

beforeEach(() => {
  testDir = createTempDir("template-sync");
  mkdirSync(join(testDir, "templates"));
  overrideDir = join(testDir, "dev-environment");
  mkdirSync(overrideDir);
  templatePath = join(testDir, "templates", "override.yml.template");
  overridePath = join(overrideDir, "docker-compose.override.yml");
});

afterEach(() => {
  removeTempDir(testDir);
});

describe("syncTemplate: disabled", () => {
  it("never creates the override", () => {
    writeTemplate();
    const result = syncTemplate(templatePath, overridePath, false);
    expect(result.outcome).toBe("skipped-disabled");
    expect(existsSync(overridePath)).toBe(false);
  });

  it("skips even when the parent directory is missing", () => {
    const result = syncTemplate(
      templatePath,
      join(testDir, "missing", "override.yml"),
      false,
    );
    expect(result.outcome).toBe("skipped-disabled");
  });
});

describe("syncTemplate: missing template", () => {
  it("reports the missing template without creating the override", () => {
    const result = syncTemplate(templatePath, overridePath, true);
    expect(result.outcome).toBe("skipped-missing-template");
    expect(result.message).toBe(
      `Override template not found at: ${templatePath}. Skipping custom volume setup.`,
    );
    expect(existsSync(overridePath)).toBe(false);
  });
});

describe("syncTemplate: copy", () => {
  it("creates a byte-identical override with the template's mode", () => {
    writeTemplate();
    chmodSync(templatePath, 0o640);

    const result = syncTemplate(templatePath, overridePath, true);

    expect(result.outcome).toBe("copied");
    expect(readFileSync(overridePath)).toEqual(readFileSync(templatePath));
    expect(statSync(overridePath).mode & 0o777).toBe(0o640);
  });

  it("keeps the compose content verbatim", () => {
    writeTemplate();
    syncTemplate(templatePath, overridePath, true);

    const lines = readFileSync(overridePath, "utf-8").split("\n");
    expect(lines[0]).toBe("services:");
    expect(lines[4]).toBe("      - ${HOME}/test-files:/root/dev/test-files:ro");
    expect(lines[3]).toBe("      # personal fixtures");
  });

  it("overwrites an override older than the template", () => {
    writeFileSync(overridePath, "services: {}\n", "utf-8");
    utimesSync(overridePath, PAST, PAST);
    writeTemplate(TEMPLATE, LATER);

    const result = syncTemplate(templatePath, overridePath, true);

    expect(result.outcome).toBe("copied");
    expect(readFileSync(overridePath, "utf-8")).toBe(TEMPLATE);
  });

  it("overwrites when both files have the same mtime", () => {
    writeFileSync(overridePath, "stale\n", "utf-8");
    utimesSync(overridePath, PAST, PAST);
    writeTemplate(TEMPLATE, PAST);

    expect(syncTemplate(templatePath, overridePath, true).outcome).toBe(
      "copied",
    );
    expect(readFileSync(overridePath, "utf-8")).toBe(TEMPLATE);
  });

  it("truncates a longer existing override", () => {
    writeFileSync(overridePath, "x".repeat(4096), "utf-8");
    utimesSync(overridePath, PAST, PAST);
    writeTemplate("services:\n", LATER);

    syncTemplate(templatePath, overridePath, true);
    expect(readFileSync(overridePath, "utf-8")).toBe("services:\n");
  });
});

describe("syncTemplate: newer override", () => {
  it("leaves a hand-edited override untouched", () => {
    writeTemplate(TEMPLATE, PAST);
    const edited = "services:\n  dev:\n    volumes: []\n";
    writeFileSync(overridePath, edited, "utf-8");
    utimesSync(overridePath, LATER, LATER);

    const result = syncTemplate(templatePath, overridePath, true);

    expect(result.outcome).toBe("skipped-newer");
    expect(readFileSync(overridePath, "utf-8")).toBe(edited);
  });

  it("keeps an override newer by less than a millisecond", () => {
    writeTemplate(TEMPLATE, PAST);
    writeFileSync(overridePath, "services: {}\n", "utf-8");
    const justAfter = PAST.getTime() / 1000 + 0.0005;
    utimesSync(overridePath, justAfter, justAfter);

    expect(syncTemplate(templatePath, overridePath, true).outcome).toBe(
      "skipped-newer",
    );
    expect(readFileSync(overridePath, "utf-8")).toBe("services: {}\n");
  });

  it("is idempotent: the second run changes neither bytes nor mtime", () => {
    writeTemplate(TEMPLATE, PAST);

    expect(syncTemplate(templatePath, overridePath, true).outcome).toBe(
      "copied",
    );
    const firstBytes = readFileSync(overridePath);
    const firstMtime = statSync(overridePath).mtimeMs;

    expect(syncTemplate(templatePath, overridePath, true).outcome).toBe(
      "skipped-newer",
    );
    expect(readFileSync(overridePath)).toEqual(firstBytes);
    expect(statSync(overridePath).mtimeMs).toBe(firstMtime);
  });
});

describe("syncTemplate: missing parent directory", () => {
  it("throws MissingParentDirectoryError and creates nothing", () => {
    writeTemplate();
    const missingDir = join(testDir, "no-such-dir");

    expect(() =>
      syncTemplate(templatePath, join(missingDir, "override.yml"), true),
    ).toThrow(MissingParentDirectoryError);
    expect(existsSync(missingDir)).toBe(false);
  });

  it("names the missing directory", () => {
    writeTemplate();
    const missingDir = join(testDir, "no-such-dir");
    try {
      syncTemplate(templatePath, join(missingDir, "override.yml"), true);
      expect.fail("expected MissingParentDirectoryError");
    } catch (err) {
      if (!(err instanceof MissingParentDirectoryError)) throw err;
      expect(err.directory).toBe(missingDir);
    }
  });
});
