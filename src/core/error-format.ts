/*
Purpose: turn thrown values into ordered, typed lines that callers can render.
Assumptions: UserFacingError carries the user-visible title; anything else is unexpected.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

const UNEXPECTED_ERROR_TITLE = "Unexpected error.";

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines =
    error instanceof UserFacingError ? userFacingLines(error) : unexpectedLines(error);

  if (options.mode === "debug") {
    lines.push(...debugLines(error));
  }

  return lines;
}

export function resolveColorEnabled(options: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;

  const noColor = process.env.NO_COLOR;
  return noColor === undefined || noColor.length === 0;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function userFacingLines(error: UserFacingError): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [{ kind: "title", text: error.title }];

  if (error.message.length > 0) {
    lines.push({ kind: "message", text: error.message });
  }
  if (error.hint) {
    lines.push({ kind: "hint", text: error.hint });
  }
  if (error.next) {
    lines.push({ kind: "next", text: error.next });
  }

  return lines;
}

function unexpectedLines(error: unknown): ErrorFormatLine[] {
  const message = formatErrorMessage(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: UNEXPECTED_ERROR_TITLE }];
  if (message.length > 0) {
    lines.push({ kind: "message", text: message });
  }
  return lines;
}

function debugLines(error: unknown): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });

    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}
