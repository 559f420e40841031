import { execa } from "execa";

import { TagHelperError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { createAnnotatedTag, deleteTag, pushTag, tagExists } from "../git/git.js";

// =============================================================================
// TYPES
// =============================================================================

export type TagRequest = {
  projectName: string;
  version: string;
  tag: string;
  message: string;
  repoRoot: string;
};

/** Creates the tag for a release. Resolves on success, throws on any failure. */
export interface TagHelper {
  readonly description: string;
  createTag(request: TagRequest): Promise<void>;
}

// =============================================================================
// BUILT-IN GIT HELPER
// =============================================================================

export class GitTagHelper implements TagHelper {
  readonly description: string;

  constructor(private readonly opts: { push: boolean; remote: string }) {
    this.description = opts.push ? `git tag + push to ${opts.remote}` : "git tag";
  }

  async createTag(request: TagRequest): Promise<void> {
    // Re-checked right before writing so two concurrent releases create the tag at most once.
    if (await tagExists(request.repoRoot, request.tag)) {
      throw new TagHelperError(`Tag ${request.tag} already exists.`);
    }

    await createAnnotatedTag(request.repoRoot, request.tag, request.message);

    if (this.opts.push) {
      await this.push(request);
    }
  }

  // An unpushed local tag would make the next run report the release as done.
  private async push(request: TagRequest): Promise<void> {
    try {
      await pushTag(request.repoRoot, this.opts.remote, request.tag);
    } catch (pushError) {
      try {
        await deleteTag(request.repoRoot, request.tag);
      } catch (deleteError) {
        throw new TagHelperError(
          `${formatErrorMessage(pushError)}; local tag ${request.tag} was kept: ` +
            formatErrorMessage(deleteError),
          pushError,
        );
      }
      throw pushError;
    }
  }
}

// =============================================================================
// EXTERNAL COMMAND HELPER
// =============================================================================

export class CommandTagHelper implements TagHelper {
  readonly description: string;

  constructor(private readonly command: string) {
    this.description = command;
  }

  async createTag(request: TagRequest): Promise<void> {
    const res = await execa(this.command, [], {
      cwd: request.repoRoot,
      shell: true,
      stdio: "inherit",
      reject: false,
      env: {
        ...process.env,
        RELEASE_PROJECT: request.projectName,
        RELEASE_VERSION: request.version,
        RELEASE_TAG: request.tag,
      },
    });

    if (res.exitCode !== 0) {
      const status =
        res.exitCode === undefined ? "did not exit normally" : `exited with code ${res.exitCode}`;
      throw new TagHelperError(`Tag helper \`${this.command}\` ${status}.`);
    }
  }
}

export function createTagHelper(config: {
  tag_command?: string;
  push_tag: boolean;
  remote: string;
}): TagHelper {
  if (config.tag_command) {
    return new CommandTagHelper(config.tag_command);
  }
  return new GitTagHelper({ push: config.push_tag, remote: config.remote });
}
