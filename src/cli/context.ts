/**
 * GateContext resolves the repository, config and collaborators for one CLI invocation.
 * Usage: const ctx = loadGateContext({ cwd, explicitConfigPath, debug }).
 */

import { resolveReleaseConfigPath } from "../core/config-discovery.js";
import type { ReleaseConfig } from "../core/config.js";
import { loadReleaseConfig } from "../core/config-loader.js";
import { JsonlLogger, noopLogger, type EventLogger } from "../core/logger.js";
import { resolveProjectName } from "../core/project.js";
import { defaultRunId } from "../core/utils.js";
import { readCurrentVersion } from "../core/version.js";
import { ReleaseGate } from "../gate/release-gate.js";
import { GitReleaseRepository } from "../gate/repository.js";
import { createTagHelper } from "../gate/tag-helper.js";

// =============================================================================
// TYPES
// =============================================================================

export type GateContext = {
  repoRoot: string;
  configPath: string;
  config: ReleaseConfig;
  logger: EventLogger;
};

export type LoadGateContextArgs = {
  cwd?: string;
  explicitConfigPath?: string;
  debug?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadGateContext(args: LoadGateContextArgs): GateContext {
  const resolution = resolveReleaseConfigPath({
    cwd: args.cwd,
    explicitPath: args.explicitConfigPath,
  });
  const config = loadReleaseConfig(resolution);

  const logger = config.log_file
    ? new JsonlLogger(config.log_file, { runId: defaultRunId() }, { debug: args.debug })
    : noopLogger;

  return {
    repoRoot: resolution.repoRoot,
    configPath: resolution.configPath,
    config,
    logger,
  };
}

export function projectNameFor(ctx: GateContext): Promise<string> {
  return resolveProjectName({ repoRoot: ctx.repoRoot, configured: ctx.config.project_name });
}

export function currentVersionFor(ctx: GateContext): Promise<string> {
  return readCurrentVersion(ctx.config.version_source, ctx.repoRoot);
}

export function createReleaseGate(ctx: GateContext, opts: { dryRun?: boolean } = {}): ReleaseGate {
  return new ReleaseGate(
    {
      releaseBranch: ctx.config.release_branch,
      tagPrefix: ctx.config.tag_prefix,
      tagMessage: ctx.config.tag_message,
      repoRoot: ctx.repoRoot,
      dryRun: opts.dryRun,
    },
    {
      repository: new GitReleaseRepository(ctx.repoRoot),
      tagHelper: createTagHelper(ctx.config),
      resolveProjectName: () => projectNameFor(ctx),
      readVersion: () => currentVersionFor(ctx),
      logger: ctx.logger,
    },
  );
}
