/*
Purpose: the release gate. Guard clauses over repository state, then tag the version if needed.
Assumptions: collaborators are injected; every failed check throws a UserFacingError (exit 1).
Usage: const result = await new ReleaseGate(options, deps).run();
*/

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logGateEvent, noopLogger, type EventLogger } from "../core/logger.js";
import { renderTemplate } from "../core/utils.js";
import { tagNameForVersion } from "../core/version.js";

import type { ReleaseRepository } from "./repository.js";
import type { TagHelper } from "./tag-helper.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseGateOptions = {
  releaseBranch: string;
  tagPrefix: string;
  tagMessage: string;
  repoRoot: string;
  dryRun?: boolean;
};

export type GateOutput = {
  info(line: string): void;
};

export type ReleaseGateDeps = {
  repository: ReleaseRepository;
  tagHelper: TagHelper;
  resolveProjectName: () => Promise<string>;
  readVersion: () => Promise<string>;
  output?: GateOutput;
  logger?: EventLogger;
};

export type BranchCheck = {
  ok: boolean;
  current: string;
  expected: string;
};

export type CleanCheck = {
  ok: boolean;
  modified: string[];
};

export type GateStatus = "already_tagged" | "tagged" | "would_tag";

export type GateResult = {
  projectName: string;
  branch: string;
  version: string;
  tag: string;
  status: GateStatus;
};

export const TAGGING_FAILURE_MESSAGE = "Failed to tag a release.";

const consoleOutput: GateOutput = {
  info: (line) => console.log(line),
};

// =============================================================================
// GATE
// =============================================================================

export class ReleaseGate {
  private readonly output: GateOutput;
  private readonly logger: EventLogger;

  constructor(
    private readonly options: ReleaseGateOptions,
    private readonly deps: ReleaseGateDeps,
  ) {
    this.output = deps.output ?? consoleOutput;
    this.logger = deps.logger ?? noopLogger;
  }

  async run(): Promise<GateResult> {
    try {
      return await this.runChecks();
    } catch (err) {
      logGateEvent(this.logger, "failed", {
        code: err instanceof UserFacingError ? err.code : "UNEXPECTED",
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  async checkBranch(): Promise<BranchCheck> {
    const current = await this.deps.repository.currentBranch();
    const expected = this.options.releaseBranch;
    return { ok: current === expected, current, expected };
  }

  async checkClean(): Promise<CleanCheck> {
    const modified = await this.deps.repository.modifiedFiles();
    return { ok: modified.length === 0, modified };
  }

  getCurrentVersion(): Promise<string> {
    return this.deps.readVersion();
  }

  tagNameFor(version: string): string {
    return tagNameForVersion(version, this.options.tagPrefix);
  }

  isVersionTagged(version: string): Promise<boolean> {
    return this.deps.repository.tagExists(this.tagNameFor(version));
  }

  async tagRelease(projectName: string, version: string): Promise<void> {
    const tag = this.tagNameFor(version);
    const message = renderTemplate(this.options.tagMessage, {
      tag,
      version,
      project: projectName,
    });

    try {
      await this.deps.tagHelper.createTag({
        projectName,
        version,
        tag,
        message,
        repoRoot: this.options.repoRoot,
      });
    } catch (err) {
      throw createTaggingError(this.deps.tagHelper.description, err);
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async runChecks(): Promise<GateResult> {
    const projectName = await this.deps.resolveProjectName();
    logGateEvent(this.logger, "start", {
      project: projectName,
      dry_run: this.options.dryRun ?? false,
    });

    const branch = await this.checkBranch();
    logGateEvent(this.logger, "branch", { ...branch });
    if (!branch.ok) {
      throw createWrongBranchError(branch);
    }

    const clean = await this.checkClean();
    logGateEvent(this.logger, "clean", { ...clean });
    if (!clean.ok) {
      throw createDirtyTreeError(clean.modified);
    }

    const version = await this.getCurrentVersion();
    const tag = this.tagNameFor(version);
    logGateEvent(this.logger, "version", { version, tag });

    const result = { projectName, branch: branch.current, version, tag };

    if (await this.isVersionTagged(version)) {
      return this.complete({ ...result, status: "already_tagged" });
    }

    this.output.info(`Current version ${version} isn't tagged.`);

    if (this.options.dryRun) {
      const helper = this.deps.tagHelper.description;
      this.output.info(`Dry run: would create tag ${tag} with ${helper}.`);
      return this.complete({ ...result, status: "would_tag" });
    }

    this.output.info("Attempting to tag...");
    await this.tagRelease(projectName, version);
    logGateEvent(this.logger, "tag", { tag, helper: this.deps.tagHelper.description });
    this.output.info(`Tagged ${projectName} ${version} as ${tag}.`);

    return this.complete({ ...result, status: "tagged" });
  }

  private complete(result: GateResult): GateResult {
    logGateEvent(this.logger, "complete", { status: result.status, tag: result.tag });
    return result;
  }
}

// =============================================================================
// ERRORS
// =============================================================================

function createWrongBranchError(check: BranchCheck): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.precondition,
    title: `Checkout branch '${check.expected}' before generating release.`,
    message: `Current branch is '${check.current}'.`,
  });
}

function createDirtyTreeError(modified: string[]): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.precondition,
    title: "Tree contains uncommitted modifications:",
    // One path per line, nothing after the list.
    message: modified.join("\n"),
  });
}

export function createTaggingError(helper: string, cause: unknown): UserFacingError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.tagging,
    title: TAGGING_FAILURE_MESSAGE,
    message: `${helper}: ${detail}`,
    cause,
  });
}
