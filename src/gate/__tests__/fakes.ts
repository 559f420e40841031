/**
 * Release gate test fakes.
 * Purpose: in-memory repository, tag helper and output for gate unit tests.
 * Usage: build a FakeRepository, hand it to ReleaseGate with a FakeTagHelper.
 */

import type { EventLogger, LogEventInput } from "../../core/logger.js";
import type { ReleaseRepository } from "../repository.js";
import type { TagHelper, TagRequest } from "../tag-helper.js";

// =============================================================================
// REPOSITORY
// =============================================================================

export class FakeRepository implements ReleaseRepository {
  branch: string;
  modified: string[];
  readonly tags: Set<string>;
  readonly tagLookups: string[] = [];

  constructor(state: { branch?: string; modified?: string[]; tags?: string[] } = {}) {
    this.branch = state.branch ?? "master";
    this.modified = state.modified ?? [];
    this.tags = new Set(state.tags ?? []);
  }

  async currentBranch(): Promise<string> {
    return this.branch;
  }

  async modifiedFiles(): Promise<string[]> {
    return [...this.modified];
  }

  async tagExists(tag: string): Promise<boolean> {
    this.tagLookups.push(tag);
    return this.tags.has(tag);
  }
}

// =============================================================================
// TAG HELPER
// =============================================================================

export class FakeTagHelper implements TagHelper {
  readonly description = "fake tagger";
  readonly requests: TagRequest[] = [];
  private failure: Error | null = null;

  constructor(private readonly repository: FakeRepository) {}

  failWith(error: Error): void {
    this.failure = error;
  }

  async createTag(request: TagRequest): Promise<void> {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    this.repository.tags.add(request.tag);
  }
}

// =============================================================================
// OUTPUT + LOGGING
// =============================================================================

export class RecordingOutput {
  readonly lines: string[] = [];

  info(line: string): void {
    this.lines.push(line);
  }
}

export class RecordingLogger implements EventLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  close(): void {}

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}
