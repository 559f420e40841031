import { GitError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { renderTemplate } from "../core/utils.js";
import { tagNameForVersion } from "../core/version.js";
import { createTaggingError } from "../gate/release-gate.js";
import { GitTagHelper } from "../gate/tag-helper.js";

import {
  createReleaseGate,
  currentVersionFor,
  loadGateContext,
  projectNameFor,
  type GateContext,
  type LoadGateContextArgs,
} from "./context.js";

export type ReleaseOptions = LoadGateContextArgs & {
  dryRun?: boolean;
};

export async function releaseCommand(opts: ReleaseOptions): Promise<void> {
  await withGateContext(opts, async (ctx) => {
    const result = await createReleaseGate(ctx, { dryRun: opts.dryRun }).run();
    if (result.status === "already_tagged") {
      console.log(`${result.projectName} ${result.version} is already tagged as ${result.tag}.`);
    }
  });
}

// Standalone built-in tag helper; also usable as another workflow's tag_command.
export async function tagCommand(opts: LoadGateContextArgs): Promise<void> {
  await withGateContext(opts, async (ctx) => {
    const projectName = await projectNameFor(ctx);
    const version = await currentVersionFor(ctx);
    const tag = tagNameForVersion(version, ctx.config.tag_prefix);
    const message = renderTemplate(ctx.config.tag_message, { tag, version, project: projectName });

    const helper = new GitTagHelper({ push: ctx.config.push_tag, remote: ctx.config.remote });
    try {
      await helper.createTag({ projectName, version, tag, message, repoRoot: ctx.repoRoot });
    } catch (err) {
      throw createTaggingError(helper.description, err);
    }

    console.log(`Created tag ${tag}.`);
  });
}

export async function versionCommand(opts: LoadGateContextArgs): Promise<void> {
  await withGateContext(opts, async (ctx) => {
    const version = await currentVersionFor(ctx);
    console.log(`${version} (tag ${tagNameForVersion(version, ctx.config.tag_prefix)})`);
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function withGateContext(
  opts: LoadGateContextArgs,
  fn: (ctx: GateContext) => Promise<void>,
): Promise<void> {
  const ctx = loadGateContext(opts);

  try {
    await fn(ctx);
  } catch (error) {
    throw normalizeCommandError(error);
  } finally {
    ctx.logger.close();
  }
}

function normalizeCommandError(error: unknown): unknown {
  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      hint: "Make sure git is installed and the repository is readable.",
      cause: error,
    });
  }

  return error;
}
