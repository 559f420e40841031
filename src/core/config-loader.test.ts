import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { REPO_CONFIG_FILE, resolveReleaseConfigPath } from "./config-discovery.js";
import { loadReleaseConfig } from "./config-loader.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const tempDirs: string[] = [];

function makeRepo(config?: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);
  fs.mkdirSync(path.join(dir, ".git"));

  if (config !== undefined) {
    fs.writeFileSync(path.join(dir, REPO_CONFIG_FILE), config, "utf8");
  }
  return dir;
}

function loadFrom(cwd: string, explicitPath?: string) {
  return loadReleaseConfig(resolveReleaseConfigPath({ cwd, explicitPath }));
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw.");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadReleaseConfig", () => {
  it("falls back to defaults when the repo has no config file", () => {
    const repo = makeRepo();

    const config = loadFrom(repo);

    expect(config).toEqual({
      release_branch: "master",
      tag_prefix: "",
      tag_message: "Release {tag}",
      version_source: { type: "package-json", path: path.join(repo, "package.json") },
      push_tag: false,
      remote: "origin",
      log_file: undefined,
    });
  });

  it("treats an empty file as all defaults", () => {
    const repo = makeRepo("");

    const config = loadFrom(repo);

    expect(config.release_branch).toBe("master");
    expect(config.tag_prefix).toBe("");
  });

  it("expands environment variables and resolves relative paths against the repo root", () => {
    const original = process.env.RELEASE_BRANCH_UNDER_TEST;
    process.env.RELEASE_BRANCH_UNDER_TEST = "main";

    const repo = makeRepo(
      `
project_name: widgets
release_branch: \${RELEASE_BRANCH_UNDER_TEST}
tag_prefix: v
version_source:
  type: file
  path: VERSION
  pattern: "version = \\"(.+)\\""
log_file: logs/release.jsonl
`,
    );

    try {
      const config = loadFrom(path.join(repo));

      expect(config.project_name).toBe("widgets");
      expect(config.release_branch).toBe("main");
      expect(config.tag_prefix).toBe("v");
      expect(config.version_source).toEqual({
        type: "file",
        path: path.join(repo, "VERSION"),
        pattern: 'version = "(.+)"',
      });
      expect(config.log_file).toBe(path.join(repo, "logs", "release.jsonl"));
    } finally {
      if (original === undefined) {
        delete process.env.RELEASE_BRANCH_UNDER_TEST;
      } else {
        process.env.RELEASE_BRANCH_UNDER_TEST = original;
      }
    }
  });

  it("finds the repo config from a nested directory", () => {
    const repo = makeRepo("release_branch: trunk\n");
    const nested = path.join(repo, "packages", "core");
    fs.mkdirSync(nested, { recursive: true });

    expect(loadFrom(nested).release_branch).toBe("trunk");
  });

  it("keeps command version sources untouched", () => {
    const repo = makeRepo(
      `
version_source:
  type: command
  command: cat VERSION
tag_command: ./scripts/tag.sh
`,
    );

    const config = loadFrom(repo);

    expect(config.version_source).toEqual({ type: "command", command: "cat VERSION" });
    expect(config.tag_command).toBe("./scripts/tag.sh");
  });

  it("reports every schema issue with its key path", () => {
    const repo = makeRepo(
      `
release_branch: 12
push_tag: "yes"
surprise: true
`,
    );

    const error = captureError(() => loadFrom(repo));

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(userError.title).toBe("Release config invalid.");
    expect(userError.cause).toBeInstanceOf(ConfigError);
    expect(userError.message).toBe(
      [
        `Invalid release config at ${path.join(repo, REPO_CONFIG_FILE)}:`,
        "release_branch: Expected string, received number",
        "push_tag: Expected boolean, received string",
        "<root>: Unrecognized keys: surprise",
      ].join("\n"),
    );
  });

  it("rejects unknown version source types", () => {
    const repo = makeRepo("version_source:\n  type: git-describe\n");

    const error = captureError(() => loadFrom(repo)) as UserFacingError;

    expect(error.message).toContain(
      `version_source.type: Expected one of "package-json", "file", "command"`,
    );
  });

  it("reports unset environment variables", () => {
    delete process.env.RELEASE_GATE_MISSING_VAR;
    const repo = makeRepo("release_branch: ${RELEASE_GATE_MISSING_VAR}\n");

    const error = captureError(() => loadFrom(repo)) as UserFacingError;

    expect(error.message).toBe(
      `Environment variable RELEASE_GATE_MISSING_VAR is not set but is referenced in ${path.join(
        repo,
        REPO_CONFIG_FILE,
      )} (release_branch).`,
    );
  });

  it("includes the YAML error location", () => {
    const repo = makeRepo("release_branch: [master\n");

    const error = captureError(() => loadFrom(repo)) as UserFacingError;

    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.message).toMatch(/^Failed to parse YAML config at .+ \(line \d+, column \d+\): /);
  });

  it("fails when an explicit config path does not exist", () => {
    const repo = makeRepo();

    const error = captureError(() => loadFrom(repo, "missing.yaml")) as UserFacingError;

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error.title).toBe("Release config missing.");
    expect(error.message).toBe(`Release config not found at ${path.join(repo, "missing.yaml")}.`);
  });

  it("fails outside a git repository", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-norepo-"));
    tempDirs.push(dir);

    const error = captureError(() => resolveReleaseConfigPath({ cwd: dir })) as UserFacingError;

    expect(error.code).toBe(USER_FACING_ERROR_CODES.git);
    expect(error.title).toBe("Not a git repository.");
  });
});
