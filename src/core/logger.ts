import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = {
  ts: string;
  type: string;
  run_id: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
};

type LogFailureAction = "open" | "write" | "close";

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Appends one JSON object per line. Open and write failures warn and never throw;
 * a log file that cannot be opened leaves the logger closed.
 */
export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number | null;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    options: { debug?: boolean } = {},
  ) {
    this.isDebugEnabled = options.debug ?? false;
    this.fileDescriptor = this.open();
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed || this.fileDescriptor === null) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private open(): number | null {
    try {
      fse.ensureDirSync(path.dirname(this.filePath));
      return fs.openSync(this.filePath, "a");
    } catch (err) {
      console.warn(formatLogFailureWarning("open", this.filePath, err, this.isDebugEnabled));
      return null;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed || this.fileDescriptor === null) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export const noopLogger: EventLogger = {
  log: () => undefined,
  close: () => undefined,
};

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = { ts, type: event.type, run_id: runId };
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logGateEvent(logger: EventLogger, type: string, payload: JsonObject = {}): void {
  logger.log({ type: `gate.${type}`, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

const LOG_FAILURE_LABELS: Record<LogFailureAction, (filePath: string) => string> = {
  open: (filePath) => `open log file ${filePath}`,
  write: (filePath) => `write log event to ${filePath}`,
  close: (filePath) => `close log file ${filePath}`,
};

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel = LOG_FAILURE_LABELS[action](filePath);
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
