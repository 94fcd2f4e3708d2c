import { Clock, PipelineObserver } from "./types";
import { EnrichedRun, RawRun } from "./types/run";
import { enrichRun } from "./enrichRun";
import { comparableInstant } from "./timestamps";
import { isRecord } from "./utils";

export const NO_THREAD_PREFIX = "_no_thread_";

export interface RunDeduplicatorOptions {
  now?: Clock;
  onEvent?: PipelineObserver;
}

interface ThreadEntry {
  threadKey: string;
  run: EnrichedRun;
}

/**
 * Keeps the latest run per thread while pages stream in. Each accepted run is
 * enriched once, when it enters the map.
 *
 * Runs without a thread id are tracked under a synthetic key. Real and
 * synthetic keys live in separate namespaces internally so that a thread id
 * which happens to look synthetic can never overwrite one.
 */
export class RunDeduplicator {
  private readonly threads = new Map<string, ThreadEntry>();
  private readonly now: Clock;
  private readonly emit: PipelineObserver;
  private syntheticCounter = 0;
  private merged = 0;
  private excluded = 0;

  constructor(options: RunDeduplicatorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.emit = options.onEvent ?? (() => undefined);
  }

  /** Number of distinct threads held. */
  get size(): number {
    return this.threads.size;
  }

  get totalMerged(): number {
    return this.merged;
  }

  get totalExcluded(): number {
    return this.excluded;
  }

  /**
   * Merge one page. Returns how many records this call discarded or
   * superseded. Equal start times keep the run already stored.
   */
  mergePage(records: readonly unknown[], pageIndex = 0): number {
    let excludedThisPage = 0;

    records.forEach((record, position) => {
      if (!isRecord(record)) {
        this.emit({ type: "record_skipped", pageIndex, position, reason: "record is not an object" });
        return;
      }
      this.merged++;

      const { mapKey, threadKey } = this.keyFor(record);
      const existing = this.threads.get(mapKey);

      if (!existing) {
        this.threads.set(mapKey, { threadKey, run: this.enrich(record, threadKey) });
        return;
      }

      excludedThisPage++;
      // compare against the stored run's own start_time, which enrichment keeps verbatim
      if (comparableInstant(record.start_time) > comparableInstant(existing.run.start_time)) {
        this.threads.set(mapKey, { threadKey, run: this.enrich(record, threadKey) });
        this.emitDuplicate(threadKey, "incoming", existing.run, record);
      } else {
        this.emitDuplicate(threadKey, "existing", existing.run, record);
      }
    });

    this.excluded += excludedThisPage;
    return excludedThisPage;
  }

  /** Survivors in the order their threads were first seen. */
  runs(): EnrichedRun[] {
    return Array.from(this.threads.values(), (entry) => entry.run);
  }

  /** Survivors ordered by thread key, for reproducible truncation. */
  sortedRuns(): EnrichedRun[] {
    return Array.from(this.threads.values())
      .sort((a, b) => (a.threadKey < b.threadKey ? -1 : a.threadKey > b.threadKey ? 1 : 0))
      .map((entry) => entry.run);
  }

  threadKeys(): string[] {
    return Array.from(this.threads.values(), (entry) => entry.threadKey);
  }

  private keyFor(record: RawRun): { mapKey: string; threadKey: string } {
    const threadId = record.thread_id;
    if ((typeof threadId === "string" && threadId) || (typeof threadId === "number" && threadId !== 0)) {
      return { mapKey: `thread:${threadId}`, threadKey: String(threadId) };
    }

    const id = record.id;
    const suffix =
      (typeof id === "string" && id) || (typeof id === "number" && id !== 0) ? String(id) : `#${++this.syntheticCounter}`;
    const threadKey = `${NO_THREAD_PREFIX}${suffix}`;
    return { mapKey: `synthetic:${threadKey}`, threadKey };
  }

  private enrich(record: RawRun, threadKey: string): EnrichedRun {
    return enrichRun(record, { now: this.now, threadKey, onEvent: this.emit });
  }

  private emitDuplicate(threadKey: string, kept: "existing" | "incoming", existing: RawRun, incoming: RawRun): void {
    this.emit({
      type: "duplicate_excluded",
      threadKey,
      kept,
      existingStartTime: typeof existing.start_time === "string" ? existing.start_time : null,
      incomingStartTime: typeof incoming.start_time === "string" ? incoming.start_time : null,
    });
  }
}
