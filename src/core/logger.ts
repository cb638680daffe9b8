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

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  batch_id: string;
  unit_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  batchId?: string;
  unitId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  batchId?: string;
};

export type BatchEventLogger = {
  log(event: LogEventInput): void;
  close(): void;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements BatchEventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    private readonly debug = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    const line = `${JSON.stringify(eventWithTs(event, this.defaults))}\n`;
    try {
      fs.writeSync(this.fileDescriptor, line);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(this.formatFailure(`write log event to ${this.filePath}`, err));
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(this.formatFailure(`close log file ${this.filePath}`, err));
    } finally {
      this.closed = true;
    }
  }

  private formatFailure(action: string, error: unknown): string {
    const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
    if (!this.debug) return message;

    const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
    return stack ? `${message}\n${stack.text}` : message;
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const batchId = event.batchId ?? defaults.batchId;
  if (!batchId) {
    throw new Error("batch_id is required for log events");
  }

  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = { ts, type: event.type, batch_id: batchId };

  if (event.unitId) {
    result.unit_id = event.unitId;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logBatchEvent(
  logger: BatchEventLogger,
  type: string,
  fields: JsonObject & { unitId?: string } = {},
): void {
  const { unitId, ...payload } = fields;
  const event: LogEventInput = { type, payload };
  if (typeof unitId === "string") {
    event.unitId = unitId;
  }
  logger.log(event);
}
