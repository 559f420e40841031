import fs from "node:fs";
import path from "node:path";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const REPO_CONFIG_FILE = ".release-gate.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "repo";

export type ConfigResolution = {
  repoRoot: string;
  configPath: string;
  source: ConfigSource;
  exists: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveReleaseConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw createMissingRepoError(cwd);
  }

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return { repoRoot, configPath, source: "explicit", exists: fs.existsSync(configPath) };
  }

  const configPath = path.join(repoRoot, REPO_CONFIG_FILE);
  return { repoRoot, configPath, source: "repo", exists: fs.existsSync(configPath) };
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

// =============================================================================
// ERRORS
// =============================================================================

function createMissingRepoError(cwd: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.git,
    title: "Not a git repository.",
    message: `No .git directory found at or above ${cwd}.`,
    hint: "Run release-gate from inside the repository you want to release, or pass --cwd <dir>.",
  });
}
