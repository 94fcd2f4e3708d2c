import { promises as fs } from "fs";
import path from "path";
import { EnrichedRun } from "./types/run";
import { info } from "./log";

export const FILE_PREFIX = "langsmith-runs";

export interface ExportFiles {
  fullPath: string;
  summaryPath: string;
}

export interface WriteRunsOptions {
  now?: Date;
  /** IANA zone used for the timestamp in the file names */
  timeZone?: string;
}

/** `YYYY-MM-DD-HH-mm` in the given zone. */
export function fileTimestamp(date: Date, timeZone = "UTC"): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "00";
  return `${get("year")}-${get("month")}-${get("day")}-${get("hour")}-${get("minute")}`;
}

/** The run without the raw `outputs` payload. */
export function summarizeRun(run: EnrichedRun): EnrichedRun {
  const summary: EnrichedRun = { ...run };
  delete summary.outputs;
  return summary;
}

/**
 * Write the full export and a summary without raw outputs, side by side,
 * as pretty-printed JSON arrays.
 */
export async function writeRunsFiles(
  runs: EnrichedRun[],
  outputDir: string,
  options: WriteRunsOptions = {}
): Promise<ExportFiles> {
  await fs.mkdir(outputDir, { recursive: true });

  const stamp = fileTimestamp(options.now ?? new Date(), options.timeZone);
  const fullPath = path.join(outputDir, `${FILE_PREFIX}-${stamp}.json`);
  const summaryPath = path.join(outputDir, `${FILE_PREFIX}-${stamp}-summary.json`);

  await fs.writeFile(fullPath, JSON.stringify(runs, null, 2), "utf-8");
  await fs.writeFile(summaryPath, JSON.stringify(runs.map(summarizeRun), null, 2), "utf-8");

  info(`Wrote ${runs.length} runs to ${fullPath}`);
  info(`Wrote ${runs.length} run summaries to ${summaryPath}`);
  return { fullPath, summaryPath };
}
