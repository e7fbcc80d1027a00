import path from "node:path";

import fse from "fs-extra";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type JsonlLoggerOptions = {
  runId: string;
  resourceType?: string;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger {
  readonly filePath: string;
  private readonly runId: string;
  private readonly resourceType?: string;

  constructor(filePath: string, options: JsonlLoggerOptions) {
    this.filePath = filePath;
    this.runId = options.runId;
    this.resourceType = options.resourceType;
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: { type: string; payload?: JsonObject }): void {
    const record: JsonObject = {
      ts: isoNow(),
      type: event.type,
      run_id: this.runId,
    };
    if (this.resourceType) {
      record.resource_type = this.resourceType;
    }
    if (event.payload) {
      record.payload = event.payload;
    }

    fse.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }

  // Child loggers share the file so a batch run stays in one log.
  forResource(resourceType: string): JsonlLogger {
    return new JsonlLogger(this.filePath, { runId: this.runId, resourceType });
  }
}

export function logRunEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void {
  logger.log({ type, payload });
}

export function runLogPath(logsDir: string, runId: string): string {
  return path.join(logsDir, `${runId}.jsonl`);
}
