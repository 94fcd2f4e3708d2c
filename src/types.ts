import { EnrichedRun, RawRun, RunsQuery } from "./types/run";

/** A single page handed back by the transport. */
export interface RunPage {
  runs: unknown[];
  /** Continuation token; absent once the last page has been served */
  nextCursor?: string;
}

export interface RunPageSource {
  fetchPage(query: RunsQuery, cursor: string, pageIndex: number): Promise<RunPage>;
}

export type Clock = () => Date;

/**
 * Structured events emitted by the pipeline. Nothing in the pipeline logs
 * directly; the CLI turns these into log lines.
 */
export type PipelineEvent =
  | {
    type: "page_fetched";
    pageIndex: number;
    fetched: number;
    totalFetched: number;
    totalUnique: number;
    progress: string;
  }
  | { type: "record_skipped"; pageIndex: number; position: number; reason: string }
  | { type: "message_skipped"; threadKey: string; position: number; reason: string }
  | { type: "thread_id_unparsed"; threadKey: string; threadId: string }
  | {
    type: "duplicate_excluded";
    threadKey: string;
    kept: "existing" | "incoming";
    existingStartTime: string | null;
    incomingStartTime: string | null;
  }
  | { type: "debug_limit_reached"; limit: number };

export type PipelineObserver = (event: PipelineEvent) => void;

export interface ExportSummary {
  runs: EnrichedRun[];
  totalFetched: number;
  totalUnique: number;
  totalExcludedAsDuplicate: number;
  pages: number;
  stoppedAtDebugLimit: boolean;
}

export interface ExportStats {
  totalRuns: number;
  conversations: number;
  uniqueUsers: number;
  uniqueLessons: number;
}

export type { EnrichedRun, RawRun, RunsQuery };
