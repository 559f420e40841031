import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };
const ttyStream = { isTTY: true };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Release config invalid.",
    message: "release_branch: Expected string, received number",
    hint: "Fix .release-gate.yaml and rerun.",
    next: "Run release-gate again",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Release config invalid.",
        "release_branch: Expected string, received number",
        "Hint: Fix .release-gate.yaml and rerun.",
        "Next: Run release-gate again",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.tagging,
      title: "Failed to tag a release.",
      message: "Tag helper exited with code 2.",
      cause: new Error("boom"),
    });
    error.stack = "UserFacingError: Tag helper exited with code 2.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Failed to tag a release.",
        "Tag helper exited with code 2.",
        "Code: TAGGING_ERROR",
        "Name: UserFacingError",
        "Cause: boom",
        "Stack:",
        "  UserFacingError: Tag helper exited with code 2.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("renders unexpected errors under a generic title", () => {
    const output = renderCliError(new Error("spawn git ENOENT"), { stream: nonTtyStream });

    expect(output).toBe(["Error: Unexpected error.", "spawn git ENOENT"].join("\n"));
  });

  it("keeps multi-line messages intact", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.precondition,
      title: "Tree contains uncommitted modifications:",
      message: "foo.txt\nsrc/bar.ts",
    });

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe("Error: Tree contains uncommitted modifications:\nfoo.txt\nsrc/bar.ts");
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream, useColor: true });

    expect(output).toContain("Error: Release config invalid.");
    expect(output).not.toContain("\x1b[");
  });

  it("colours the title on a TTY when color is requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Not a git repository.",
      message: "",
    });

    const output = renderCliError(error, { stream: ttyStream, useColor: true });

    expect(output).toBe("\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mNot a git repository.\x1b[22m");
  });
});
