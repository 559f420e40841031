import path from "node:path";

import { execa } from "execa";
import { z } from "zod";

import type { VersionSource } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES, VersionError } from "./errors.js";
import { pathExists, readTextFile } from "./utils.js";

// =============================================================================
// CONSTANTS
// =============================================================================

// Characters git accepts in a tag name that versions actually use.
const VERSION_PATTERN = /^[0-9A-Za-z][0-9A-Za-z._+-]*$/;

export const PackageManifestSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
  })
  .passthrough();

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function tagNameForVersion(version: string, prefix: string): string {
  return `${prefix}${version}`;
}

export function normalizeVersion(raw: string, origin: string): string {
  const version = raw.trim();
  if (version.length === 0) {
    throw new VersionError(`No version found in ${origin}.`);
  }
  if (!VERSION_PATTERN.test(version)) {
    throw new VersionError(`Version '${version}' from ${origin} cannot be used as a tag name.`);
  }
  return version;
}

export async function readPackageManifest(manifestPath: string): Promise<PackageManifest> {
  const raw = await readTextFile(manifestPath);

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new VersionError(`Failed to parse ${manifestPath} as JSON.`, err);
  }

  const parsed = PackageManifestSchema.safeParse(doc);
  if (!parsed.success) {
    throw new VersionError(`${manifestPath} is not a package manifest.`, parsed.error);
  }
  return parsed.data;
}

/**
 * Reads the current version from `source` without touching the repository.
 *
 * @throws UserFacingError (VERSION_ERROR) when no usable version can be read.
 */
export async function readCurrentVersion(source: VersionSource, repoRoot: string): Promise<string> {
  try {
    return await readFromSource(source, repoRoot);
  } catch (err) {
    throw createVersionError(source, err);
  }
}

// =============================================================================
// SOURCES
// =============================================================================

async function readFromSource(source: VersionSource, repoRoot: string): Promise<string> {
  switch (source.type) {
    case "package-json":
      return readPackageJsonVersion(path.resolve(repoRoot, source.path));
    case "file":
      return readFileVersion(path.resolve(repoRoot, source.path), source.pattern);
    case "command":
      return readCommandVersion(source.command, repoRoot);
  }
}

async function readPackageJsonVersion(manifestPath: string): Promise<string> {
  if (!(await pathExists(manifestPath))) {
    throw new VersionError(`${manifestPath} does not exist.`);
  }

  const manifest = await readPackageManifest(manifestPath);
  return normalizeVersion(manifest.version ?? "", `the "version" field of ${manifestPath}`);
}

async function readFileVersion(filePath: string, pattern: string | undefined): Promise<string> {
  if (!(await pathExists(filePath))) {
    throw new VersionError(`${filePath} does not exist.`);
  }

  const contents = await readTextFile(filePath);
  if (!pattern) {
    return normalizeVersion(contents, filePath);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(pattern, "m");
  } catch (err) {
    throw new VersionError(`Invalid version pattern ${JSON.stringify(pattern)}.`, err);
  }

  const match = regex.exec(contents);
  if (!match) {
    throw new VersionError(`Pattern ${JSON.stringify(pattern)} did not match ${filePath}.`);
  }
  return normalizeVersion(match[1] ?? match[0], filePath);
}

async function readCommandVersion(command: string, cwd: string): Promise<string> {
  const res = await execa(command, [], { cwd, shell: true, stdio: "pipe", reject: false });
  if (res.exitCode !== 0) {
    const detail = res.stderr.trim() || `exit code ${res.exitCode ?? -1}`;
    throw new VersionError(`Version command \`${command}\` failed: ${detail}`);
  }
  return normalizeVersion(res.stdout, `the output of \`${command}\``);
}

// =============================================================================
// ERRORS
// =============================================================================

function createVersionError(source: VersionSource, cause: unknown): UserFacingError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.version,
    title: "Unable to determine the current version.",
    message,
    hint: `Check version_source (type: ${source.type}) in .release-gate.yaml.`,
    cause,
  });
}
