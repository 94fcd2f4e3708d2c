import { describe, it, expect } from "vitest";
import { fetchAllRuns } from "../src/fetchAllRuns";
import { TransportError } from "../src/errors";
import { PipelineEvent, RunPage, RunPageSource, RunsQuery } from "../src/types";

const query: RunsQuery = {
  cursor: "",
  limit: 100,
  session: ["session-1"],
  is_root: true,
  start_time: "2024-01-01T00:00:00Z",
  end_time: "2024-01-02T00:00:00Z",
  order_by: "start_time",
  select: ["id"],
  filter: 'eq(name, "tutor")',
};

const now = () => new Date("2024-01-02T00:00:00Z");

class FakeSource implements RunPageSource {
  readonly cursors: string[] = [];

  constructor(private readonly pages: RunPage[]) { }

  async fetchPage(_query: RunsQuery, cursor: string, pageIndex: number): Promise<RunPage> {
    this.cursors.push(cursor);
    const page = this.pages[pageIndex - 1];
    if (!page) throw new Error(`no page ${pageIndex}`);
    return page;
  }
}

describe("fetchAllRuns", () => {
  it("keeps the latest run of a thread seen on two pages", async () => {
    const source = new FakeSource([
      { runs: [{ id: "a", thread_id: "u1-l1", start_time: "2024-01-01T00:00:00Z" }], nextCursor: "c2" },
      { runs: [{ id: "b", thread_id: "u1-l1", start_time: "2024-01-01T01:00:00Z" }] },
    ]);

    const summary = await fetchAllRuns(source, query, { now });

    expect(source.cursors).toEqual(["", "c2"]);
    expect(summary.totalFetched).toBe(2);
    expect(summary.totalUnique).toBe(1);
    expect(summary.totalExcludedAsDuplicate).toBe(1);
    expect(summary.pages).toBe(2);
    expect(summary.stoppedAtDebugLimit).toBe(false);
    expect(summary.runs).toHaveLength(1);
    expect(summary.runs[0].user_id).toBe("u1");
    expect(summary.runs[0].lesson_id).toBe("l1");
    expect(summary.runs[0].start_time).toBe("2024-01-01T01:00:00Z");
  });

  it("keeps a run without a thread id", async () => {
    const source = new FakeSource([
      { runs: [{ id: "r9", start_time: "2024-01-01T00:00:00Z" }, { id: "a", thread_id: "u1-l1" }] },
    ]);

    const summary = await fetchAllRuns(source, query, { now });

    expect(summary.runs.map((run) => run.id)).toEqual(["r9", "a"]);
    expect(summary.runs[0].user_id).toBeNull();
    expect(summary.runs[0].lesson_id).toBeNull();
    expect(summary.totalUnique).toBe(2);
  });

  it("reports each page with its progress", async () => {
    const events: PipelineEvent[] = [];
    const source = new FakeSource([
      { runs: [{ id: "a", thread_id: "u1-l1" }, { id: "b", thread_id: "u2-l1" }], nextCursor: "c2" },
      { runs: [{ id: "c", thread_id: "u3-l1" }] },
    ]);

    await fetchAllRuns(source, query, { now, onEvent: (event) => events.push(event) });

    expect(events.filter((event) => event.type === "page_fetched")).toEqual([
      { type: "page_fetched", pageIndex: 1, fetched: 2, totalFetched: 2, totalUnique: 2, progress: "estimating..." },
      { type: "page_fetched", pageIndex: 2, fetched: 1, totalFetched: 3, totalUnique: 3, progress: "100% completed" },
    ]);
  });

  it("stops at the debug limit with the first threads by key", async () => {
    const events: PipelineEvent[] = [];
    const source = new FakeSource([
      { runs: [{ thread_id: "c-1" }, { thread_id: "a-1" }, { thread_id: "b-1" }], nextCursor: "c2" },
      { runs: [{ thread_id: "d-1" }] },
    ]);

    const summary = await fetchAllRuns(source, query, { now, debugLimit: 2, onEvent: (event) => events.push(event) });

    expect(source.cursors).toEqual([""]);
    expect(summary.runs.map((run) => run.thread_id)).toEqual(["a-1", "b-1"]);
    expect(summary.totalUnique).toBe(2);
    expect(summary.totalFetched).toBe(3);
    expect(summary.stoppedAtDebugLimit).toBe(true);
    expect(events[events.length - 1]).toEqual({ type: "debug_limit_reached", limit: 2 });
  });

  it("does not stop early when the limit is never reached", async () => {
    const source = new FakeSource([{ runs: [{ thread_id: "a-1" }], nextCursor: "c2" }, { runs: [] }]);

    const summary = await fetchAllRuns(source, query, { now, debugLimit: 5 });

    expect(summary.pages).toBe(2);
    expect(summary.stoppedAtDebugLimit).toBe(false);
    expect(summary.totalUnique).toBe(1);
  });

  it("names the failing page when the source throws", async () => {
    const source = new FakeSource([{ runs: [{ thread_id: "a-1" }], nextCursor: "c2" }]);

    const failure = await fetchAllRuns(source, query, { now }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ pageIndex: 2, message: "Fetching page 2 failed: no page 2" });
  });

  it("passes transport errors through untouched", async () => {
    const original = new TransportError("rate limited", 1, 429, "slow down");
    const source: RunPageSource = {
      fetchPage: () => Promise.reject(original),
    };

    await expect(fetchAllRuns(source, query)).rejects.toBe(original);
  });
});
