import { currentBranch, listModifiedFiles, tagExists } from "../git/git.js";

/** Read-only view of the repository state the gate checks. */
export interface ReleaseRepository {
  currentBranch(): Promise<string>;
  modifiedFiles(): Promise<string[]>;
  tagExists(tag: string): Promise<boolean>;
}

export class GitReleaseRepository implements ReleaseRepository {
  constructor(private readonly repoRoot: string) {}

  currentBranch(): Promise<string> {
    return currentBranch(this.repoRoot);
  }

  modifiedFiles(): Promise<string[]> {
    return listModifiedFiles(this.repoRoot);
  }

  tagExists(tag: string): Promise<boolean> {
    return tagExists(this.repoRoot, tag);
  }
}
