import { Clock, ExportSummary, PipelineObserver, RunPage, RunPageSource } from "./types";
import { RunsQuery } from "./types/run";
import { RunDeduplicator } from "./RunDeduplicator";
import { estimateProgress, formatProgress } from "./progress";
import { TransportError } from "./errors";

export interface FetchAllRunsOptions {
  /** Stop once this many unique runs are held and return exactly that many */
  debugLimit?: number;
  now?: Clock;
  onEvent?: PipelineObserver;
}

/**
 * Page through the runs query, merging each page into the deduplicator before
 * asking for the next one. Any fetch failure is fatal and surfaces as a
 * TransportError naming the page.
 */
export async function fetchAllRuns(
  source: RunPageSource,
  query: RunsQuery,
  options: FetchAllRunsOptions = {}
): Promise<ExportSummary> {
  const emit: PipelineObserver = options.onEvent ?? (() => undefined);
  const deduplicator = new RunDeduplicator({ now: options.now, onEvent: emit });
  const runsPerPage: number[] = [];
  const { debugLimit } = options;

  let cursor = "";
  let pageIndex = 0;
  let totalFetched = 0;

  while (true) {
    pageIndex++;
    let page: RunPage;
    try {
      page = await source.fetchPage(query, cursor, pageIndex);
    } catch (error) {
      if (error instanceof TransportError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Fetching page ${pageIndex} failed: ${reason}`, pageIndex);
    }

    deduplicator.mergePage(page.runs, pageIndex);
    totalFetched += page.runs.length;
    runsPerPage.push(page.runs.length);

    const progress = estimateProgress(runsPerPage, deduplicator.size, Boolean(page.nextCursor));
    emit({
      type: "page_fetched",
      pageIndex,
      fetched: page.runs.length,
      totalFetched,
      totalUnique: deduplicator.size,
      progress: formatProgress(progress),
    });

    if (debugLimit !== undefined && deduplicator.size >= debugLimit) {
      emit({ type: "debug_limit_reached", limit: debugLimit });
      const runs = deduplicator.sortedRuns().slice(0, debugLimit);
      return {
        runs,
        totalFetched,
        totalUnique: runs.length,
        totalExcludedAsDuplicate: deduplicator.totalExcluded,
        pages: pageIndex,
        stoppedAtDebugLimit: true,
      };
    }

    if (!page.nextCursor) break;
    cursor = page.nextCursor;
  }

  return {
    runs: deduplicator.runs(),
    totalFetched,
    totalUnique: deduplicator.size,
    totalExcludedAsDuplicate: deduplicator.totalExcluded,
    pages: pageIndex,
    stoppedAtDebugLimit: false,
  };
}
