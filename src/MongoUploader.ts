import mongoose, { Schema } from "mongoose";
import { EnrichedRun } from "./types/run";
import { isValidTimestamp, parseTimestamp } from "./timestamps";
import { debug, error, info, warn } from "./log";

export type UpsertOutcome = "inserted" | "updated";

export interface ConversationStore {
  /** Replace the whole document stored under `threadId`, inserting it if absent. */
  upsert(threadId: string, document: Record<string, unknown>): Promise<UpsertOutcome>;
  close(): Promise<void>;
}

export interface MongoSettings {
  connectionString: string;
  databaseName: string;
  collectionName: string;
}

export interface UploadStats {
  inserted: number;
  updated: number;
  errors: number;
}

const DATE_FIELDS = [
  "mongo_updated_at",
  "mongo_created_at",
  "first_msg_time",
  "last_msg_time",
  "start_time",
  "end_time",
] as const;

const conversationSchema = new Schema(
  { thread_id: { type: String, required: true, unique: true } },
  { strict: false, versionKey: false }
);

export async function connectMongoStore(settings: MongoSettings): Promise<ConversationStore> {
  const connection = await mongoose
    .createConnection(settings.connectionString, { dbName: settings.databaseName })
    .asPromise();
  const model = connection.model("ExportedConversation", conversationSchema, settings.collectionName);
  try {
    await model.createIndexes();
  } catch (err) {
    await connection.close();
    throw err;
  }
  info("Connected to MongoDB successfully");

  return {
    async upsert(threadId, document) {
      const result = await model.replaceOne({ thread_id: threadId }, document, { upsert: true });
      return result.upsertedCount > 0 ? "inserted" : "updated";
    },
    async close() {
      await connection.close();
      debug("MongoDB connection closed");
    },
  };
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  // stored dates are UTC; offset-less strings are taken as UTC too
  const parsed = parseTimestamp(value, "utc");
  return isValidTimestamp(parsed) ? new Date(parsed.epochMs) : null;
}

/** Copy of the run with bookkeeping fields and known timestamps as Dates. */
export function prepareDocument(run: EnrichedRun, now: Date): Record<string, unknown> {
  const doc: Record<string, unknown> = { ...run };
  doc.mongo_updated_at = now;
  doc.mongo_created_at = doc.mongo_created_at ?? now;

  for (const field of DATE_FIELDS) {
    if (doc[field] === undefined || doc[field] === null) continue;
    const converted = toDate(doc[field]);
    if (converted) doc[field] = converted;
  }

  doc.thread_id = String(doc.thread_id ?? "");
  return doc;
}

export type StoreFactory = (settings: MongoSettings) => Promise<ConversationStore>;

export class MongoUploader {
  constructor(
    private readonly settings: MongoSettings,
    private readonly connect: StoreFactory = connectMongoStore
  ) { }

  /** Upsert every run keyed by thread_id. Failures are counted and logged, never thrown. */
  async uploadConversations(runs: EnrichedRun[], now: Date = new Date()): Promise<UploadStats> {
    const stats: UploadStats = { inserted: 0, updated: 0, errors: 0 };

    let store: ConversationStore;
    try {
      store = await this.connect(this.settings);
    } catch (err) {
      error("Failed to connect to MongoDB", err);
      stats.errors = runs.length;
      logUploadStats(stats);
      return stats;
    }

    try {
      for (const run of runs) {
        const threadId = run.thread_id;
        if (typeof threadId !== "string" || !threadId) {
          warn("Skipping run without thread_id");
          stats.errors++;
          continue;
        }

        try {
          const outcome = await store.upsert(threadId, prepareDocument(run, now));
          stats[outcome]++;
          debug(`${outcome === "inserted" ? "Inserted new" : "Updated existing"} conversation: ${threadId}`);
        } catch (err) {
          error(`Failed to upload conversation ${threadId}`, err);
          stats.errors++;
        }
      }
    } finally {
      await store.close();
    }

    logUploadStats(stats);
    return stats;
  }
}

function logUploadStats(stats: UploadStats): void {
  info("MongoDB Upload Statistics:");
  info(`  Total conversations processed: ${stats.inserted + stats.updated + stats.errors}`);
  info(`  New conversations inserted: ${stats.inserted}`);
  info(`  Existing conversations updated: ${stats.updated}`);
  info(`  Errors encountered: ${stats.errors}`);
  if (stats.errors > 0) {
    warn("Some conversations failed to upload. Check logs for details.");
  }
}
