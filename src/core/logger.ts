/*
Purpose: append-only JSONL event log for one pruning run.
Assumptions: one logger per run; events are small and written synchronously so a crash
  never loses the line describing the last completed step.
Usage: const log = new JsonlLogger(path, { runId }); logPrunerEvent(log, "reconcile.tag", { ... }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./clock.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  build_id?: string;
  payload?: JsonObject;
};

export type JsonlLoggerOptions = {
  runId: string;
  // Mirrors every line to this sink (stderr under --debug).
  mirror?: (line: string) => void;
  now?: () => string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly runId: string;
  private readonly mirror?: (line: string) => void;
  private readonly now: () => string;
  private ensuredDir = false;

  constructor(
    readonly filePath: string,
    options: JsonlLoggerOptions,
  ) {
    this.runId = options.runId;
    this.mirror = options.mirror;
    this.now = options.now ?? isoNow;
  }

  log(event: LogEvent): void {
    const line = JSON.stringify({ ts: this.now(), run_id: this.runId, ...event });

    if (!this.ensuredDir) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensuredDir = true;
    }
    fs.appendFileSync(this.filePath, `${line}\n`, "utf8");

    this.mirror?.(line);
  }
}

export function logPrunerEvent(
  logger: JsonlLogger,
  type: string,
  payload?: JsonObject,
): void {
  if (!payload) {
    logger.log({ type });
    return;
  }

  const { buildId, ...rest } = payload;
  logger.log({
    type,
    ...(typeof buildId === "string" ? { build_id: buildId } : {}),
    payload: rest,
  });
}
