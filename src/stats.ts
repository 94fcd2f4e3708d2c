import { ExportStats } from "./types";
import { EnrichedRun } from "./types/run";
import { info } from "./log";

function distinct(runs: EnrichedRun[], field: "thread_id" | "user_id" | "lesson_id"): number {
  const values = new Set<string>();
  for (const run of runs) {
    const value = run[field];
    if (value !== undefined && value !== null && value !== "") values.add(String(value));
  }
  return values.size;
}

export function calculateExportStats(runs: EnrichedRun[]): ExportStats {
  return {
    totalRuns: runs.length,
    conversations: distinct(runs, "thread_id"),
    uniqueUsers: distinct(runs, "user_id"),
    uniqueLessons: distinct(runs, "lesson_id"),
  };
}

export function logExportStats(stats: ExportStats): void {
  const rule = "=".repeat(48);
  info(rule);
  info("EXPORT STATISTICS");
  info(rule);
  info(`Runs exported: ${stats.totalRuns}`);
  info(`Conversations (unique thread_ids): ${stats.conversations}`);
  info(`Unique users (parsed from thread_ids): ${stats.uniqueUsers}`);
  info(`Unique lessons (parsed from thread_ids): ${stats.uniqueLessons}`);
  info(rule);
}
