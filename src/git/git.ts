import { execa } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type GitRunOptions = {
  // Exit codes that are answers rather than failures (e.g. 1 for "not found").
  allowExitCodes?: number[];
};

export async function git(
  cwd: string,
  args: string[],
  opts: GitRunOptions = {},
): Promise<GitResult> {
  const res = await execa("git", args, {
    cwd,
    stdio: "pipe",
    env: process.env,
    reject: false,
  });

  const result: GitResult = {
    stdout: res.stdout,
    stderr: res.stderr,
    exitCode: res.exitCode ?? -1,
  };

  if (result.exitCode === 0 || opts.allowExitCodes?.includes(result.exitCode)) {
    return result;
  }

  const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
  throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, {
    stdout: result.stdout,
    stderr: result.stderr,
  });
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

/** Tracked files with uncommitted modifications, as listed by `git ls-files -m`. */
export async function listModifiedFiles(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["ls-files", "-m"]);
  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function tagExists(cwd: string, tag: string): Promise<boolean> {
  const res = await git(cwd, ["rev-parse", "-q", "--verify", `refs/tags/${tag}`], {
    allowExitCodes: [1],
  });
  return res.exitCode === 0;
}

export async function createAnnotatedTag(cwd: string, tag: string, message: string): Promise<void> {
  await git(cwd, ["tag", "-a", tag, "-m", message]);
}

export async function pushTag(cwd: string, remote: string, tag: string): Promise<void> {
  await git(cwd, ["push", remote, `refs/tags/${tag}`]);
}

export async function deleteTag(cwd: string, tag: string): Promise<void> {
  await git(cwd, ["tag", "-d", tag]);
}
