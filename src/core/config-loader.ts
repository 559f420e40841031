import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import type { ConfigResolution } from "./config-discovery.js";
import { defaultReleaseConfig, ReleaseConfigSchema, type ReleaseConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Check the --config path, or drop --config to use the repo's .release-gate.yaml.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!isRecord(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_union_discriminator") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config missing.",
    message: `Release config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    next: `Edit ${configPath}`,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Loads the release config described by `resolution`.
 *
 * A repo config that does not exist yields the defaults; an explicit `--config`
 * path that does not exist is an error. Relative paths in the config are
 * resolved against the repository root.
 */
export function loadReleaseConfig(resolution: ConfigResolution): ReleaseConfig {
  const { configPath, repoRoot } = resolution;

  if (!resolution.exists) {
    if (resolution.source === "explicit") {
      throw createMissingConfigError(configPath);
    }
    return resolveConfigPaths(defaultReleaseConfig(), repoRoot);
  }

  try {
    return resolveConfigPaths(parseConfigFile(configPath), repoRoot);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(configPath, err);
    }
    throw err;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseConfigFile(configPath: string): ReleaseConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read release config at ${configPath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(
      `Failed to parse YAML config at ${configPath}${locationDetail}: ${detail}`,
      err,
    );
  }

  // An empty file is a valid config with every default.
  const expanded = expandEnv(doc ?? {}, { file: configPath, trail: [] });

  const parsed = ReleaseConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid release config at ${configPath}:\n${details}`, parsed.error);
  }

  return parsed.data;
}

function resolveConfigPaths(config: ReleaseConfig, repoRoot: string): ReleaseConfig {
  const source = config.version_source;
  const versionSource =
    source.type === "command" ? source : { ...source, path: path.resolve(repoRoot, source.path) };

  return {
    ...config,
    version_source: versionSource,
    log_file: config.log_file ? path.resolve(repoRoot, config.log_file) : undefined,
  };
}
