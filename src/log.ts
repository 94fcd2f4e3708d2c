import { appendFileSync, writeFileSync } from "fs";
import { PipelineEvent } from "./types";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let _threshold = LOG_LEVELS.indexOf("INFO");
let _file: string | null = null;

/**
 * Initialise the logger. Call once at startup.
 * When a file is given it is cleared and every line is mirrored into it.
 */
export function initLog(level: LogLevel, file?: string): void {
  _threshold = LOG_LEVELS.indexOf(level);
  _file = file || null;
  if (_file) {
    writeFileSync(_file, `--- Log started at ${new Date().toISOString()} ---\n`);
  }
}

/**
 * Get a local human-readable timestamp.
 */
function getTimestamp(): string {
  const now = new Date();
  return now.toLocaleTimeString("en-GB") + "." + now.getMilliseconds().toString().padStart(3, "0");
}

function logToFile(line: string): void {
  if (!_file) return;
  try {
    appendFileSync(_file, `${line}\n`);
  } catch (e) {
    // Fallback if file writing fails
    console.error(`[CRITICAL] Failed to write to ${_file}: ${e}`);
  }
}

function write(level: LogLevel, msg: string, sink: (line: string) => void): string | null {
  if (LOG_LEVELS.indexOf(level) < _threshold) return null;
  const line = `[${getTimestamp()}] [${level}] ${msg}`;
  sink(line);
  logToFile(line);
  return line;
}

export function debug(msg: string): void {
  write("DEBUG", msg, console.log);
}

export function info(msg: string): void {
  write("INFO", msg, console.log);
}

export function warn(msg: string): void {
  write("WARN", msg, console.warn);
}

export function error(msg: string, err?: unknown): void {
  const suffix = err instanceof Error ? ` | Error: ${err.message}` : err !== undefined ? ` | Error: ${String(err)}` : "";
  const line = write("ERROR", `${msg}${suffix}`, console.error);
  if (line && err instanceof Error && err.stack) {
    logToFile(`[${getTimestamp()}] [STACK] ${err.stack}`);
  }
}

/** Turn a pipeline event into a log line at the matching level. */
export function logPipelineEvent(event: PipelineEvent): void {
  switch (event.type) {
    case "page_fetched":
      info(
        `Page ${event.pageIndex}: fetched ${event.fetched} runs; total so far: ${event.totalFetched} ` +
        `(${event.totalUnique} unique); ${event.progress}`
      );
      break;
    case "record_skipped":
      debug(`Skipping record ${event.position} on page ${event.pageIndex}: ${event.reason}`);
      break;
    case "message_skipped":
      debug(`[${event.threadKey}] Skipping message ${event.position}: ${event.reason}`);
      break;
    case "thread_id_unparsed":
      debug(`[${event.threadKey}] Could not parse thread_id '${event.threadId}' - expected format: user-id-lesson-id`);
      break;
    case "duplicate_excluded":
      debug(
        `[${event.threadKey}] Duplicate run excluded, kept ${event.kept} ` +
        `(existing start_time: ${event.existingStartTime}, incoming start_time: ${event.incomingStartTime})`
      );
      break;
    case "debug_limit_reached":
      info(`Debug mode enabled: stopping after ${event.limit} runs.`);
      break;
  }
}
