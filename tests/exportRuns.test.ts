import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import exportRuns from "../src/exportRuns";
import { Config, loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";
import { ConversationStore, UpsertOutcome } from "../src/MongoUploader";
import { ObjectStorage } from "../src/S3Uploader";
import { RunPage, RunPageSource, RunsQuery } from "../src/types";

const now = () => new Date("2024-03-05T14:07:30Z");

class FakeSource implements RunPageSource {
  readonly queries: RunsQuery[] = [];

  constructor(private readonly pages: RunPage[]) { }

  async fetchPage(query: RunsQuery, _cursor: string, pageIndex: number): Promise<RunPage> {
    this.queries.push(query);
    return this.pages[pageIndex - 1] ?? { runs: [] };
  }
}

const pages: RunPage[] = [
  {
    runs: [
      { id: "a", thread_id: "u1-l1", start_time: "2024-03-05T10:00:00Z", outputs: { messages: [] } },
      { id: "r9", start_time: "2024-03-05T10:30:00Z" },
    ],
    nextCursor: "c2",
  },
  { runs: [{ id: "b", thread_id: "u1-l1", start_time: "2024-03-05T11:00:00Z", outputs: { messages: [] } }] },
];

describe("exportRuns", () => {
  let dir: string;
  let config: Config;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "export-runs-"));
    config = loadConfig({
      LANGSMITH_API_KEY: "test-secret",
      LS_SESSION_IDS: "session-1",
      OUTPUT_DIR: dir,
      S3_BUCKET_NAME: "bucket-1",
      S3_PREFIX: "exports",
      MONGO_CONNECTION_STRING: "mongodb://localhost:27017",
      MONGO_DATABASE_NAME: "exports",
      MONGO_COLLECTION_NAME: "conversations",
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("exports the latest run per thread to files", async () => {
    const source = new FakeSource(pages);

    const result = await exportRuns({ config, sinks: new Set(["json"]), hours: 6, now, source, onEvent: () => undefined });

    expect(source.queries[0].start_time).toBe("2024-03-05T08:07:30Z");
    expect(source.queries[0].end_time).toBe("2024-03-05T14:07:30Z");
    expect(result.summary.totalFetched).toBe(3);
    expect(result.summary.totalUnique).toBe(2);
    expect(result.summary.totalExcludedAsDuplicate).toBe(1);
    expect(result.stats).toEqual({ totalRuns: 2, conversations: 1, uniqueUsers: 1, uniqueLessons: 1 });
    expect(result.s3Urls).toBeUndefined();
    expect(result.mongo).toBeUndefined();

    const written = JSON.parse(await fs.readFile(result.files.fullPath, "utf-8"));
    expect(written.map((run: { id: string }) => run.id)).toEqual(["b", "r9"]);
    const summary = JSON.parse(await fs.readFile(result.files.summaryPath, "utf-8"));
    expect("outputs" in summary[0]).toBe(false);
  });

  it("uploads both files and every conversation when asked", async () => {
    const keys: string[] = [];
    const storage: ObjectStorage = {
      async putObject(_bucket, key) {
        keys.push(key);
      },
    };
    const upserted: string[] = [];
    const store: ConversationStore = {
      async upsert(threadId): Promise<UpsertOutcome> {
        upserted.push(threadId);
        return "inserted";
      },
      async close() { },
    };

    const result = await exportRuns({
      config,
      sinks: new Set(["json", "s3", "mongo"]),
      hours: 24,
      now,
      source: new FakeSource(pages),
      s3Storage: storage,
      mongoStore: async () => store,
      onEvent: () => undefined,
    });

    expect(keys).toEqual(["exports/langsmith-runs-2024-03-05-14-07.json", "exports/langsmith-runs-2024-03-05-14-07-summary.json"]);
    expect(result.s3Urls).toEqual([
      "s3://bucket-1/exports/langsmith-runs-2024-03-05-14-07.json",
      "s3://bucket-1/exports/langsmith-runs-2024-03-05-14-07-summary.json",
    ]);
    expect(upserted).toEqual(["u1-l1"]);
    expect(result.mongo).toEqual({ inserted: 1, updated: 0, errors: 1 });
  });

  it("still succeeds when every upload fails", async () => {
    const storage: ObjectStorage = {
      async putObject() {
        throw new Error("access denied");
      },
    };

    const result = await exportRuns({
      config,
      sinks: new Set(["json", "s3", "mongo"]),
      hours: 24,
      now,
      source: new FakeSource(pages),
      s3Storage: storage,
      mongoStore: async () => {
        throw new Error("connection refused");
      },
      onEvent: () => undefined,
    });

    expect(result.s3Urls).toEqual([null, null]);
    expect(result.mongo).toEqual({ inserted: 0, updated: 0, errors: result.summary.runs.length });
    expect(result.summary.runs).toHaveLength(2);
    expect(JSON.parse(await fs.readFile(result.files.fullPath, "utf-8"))).toHaveLength(2);
    expect(JSON.parse(await fs.readFile(result.files.summaryPath, "utf-8"))).toHaveLength(2);
  });

  it("checks sink settings before fetching", async () => {
    const source = new FakeSource(pages);

    await expect(
      exportRuns({ config: { ...config, s3BucketName: "" }, sinks: new Set(["json", "s3"]), hours: 24, now, source })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(source.queries).toEqual([]);
  });
});
