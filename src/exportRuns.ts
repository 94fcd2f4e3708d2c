import { Config, Sink, assertSinkConfig } from "./config";
import { Clock, ExportStats, ExportSummary, PipelineObserver, RunPageSource } from "./types";
import { createRunsQuery, LangSmithClient } from "./LangSmithClient";
import { fetchAllRuns } from "./fetchAllRuns";
import { ExportFiles, writeRunsFiles } from "./fileWriter";
import { ObjectStorage, S3Uploader } from "./S3Uploader";
import { MongoUploader, StoreFactory, UploadStats } from "./MongoUploader";
import { calculateExportStats, logExportStats } from "./stats";
import { info, logPipelineEvent, warn } from "./log";

export interface ExportRunsOptions {
  config: Config;
  sinks: ReadonlySet<Sink>;
  /** Length of the window ending now */
  hours: number;
  debugLimit?: number;
  now?: Clock;
  source?: RunPageSource;
  s3Storage?: ObjectStorage;
  mongoStore?: StoreFactory;
  onEvent?: PipelineObserver;
}

export interface ExportRunsResult {
  summary: ExportSummary;
  files: ExportFiles;
  s3Urls?: (string | null)[];
  mongo?: UploadStats;
  stats: ExportStats;
}

export default async function exportRuns(options: ExportRunsOptions): Promise<ExportRunsResult> {
  const { config, sinks } = options;
  assertSinkConfig(config, sinks);

  const now = options.now ?? (() => new Date());
  const endTime = now();
  const startTime = new Date(endTime.getTime() - options.hours * 3_600_000);

  info("Starting LangSmith export");
  info(`Outputs: ${Array.from(sinks).join(", ")}`);

  const query = createRunsQuery(config, startTime, endTime);
  info(
    `Querying LangSmith runs: ${JSON.stringify({
      session_ids: config.sessionIds,
      hours_window: options.hours,
      filter_name: config.filterName,
      start_time: query.start_time,
      end_time: query.end_time,
      debug_limit: options.debugLimit ?? null,
    })}`
  );

  const source =
    options.source ?? new LangSmithClient({ apiKey: config.langsmithApiKey, apiUrl: config.langsmithApiUrl });
  const summary = await fetchAllRuns(source, query, {
    debugLimit: options.debugLimit,
    now,
    onEvent: options.onEvent ?? logPipelineEvent,
  });

  info(`Total runs before deduplication: ${summary.totalFetched}`);
  info(`Total runs after deduplication: ${summary.totalUnique}`);
  info(`Total excluded as older duplicates: ${summary.totalExcludedAsDuplicate}`);

  const files = await writeRunsFiles(summary.runs, config.outputDir, {
    now: now(),
    timeZone: config.exportTimezone,
  });
  const result: ExportRunsResult = { summary, files, stats: calculateExportStats(summary.runs) };

  if (sinks.has("s3")) {
    const uploader = new S3Uploader({
      bucket: config.s3BucketName,
      prefix: config.s3Prefix,
      region: config.awsRegion,
      storage: options.s3Storage,
    });
    const urls = [await uploader.uploadFile(files.fullPath), await uploader.uploadFile(files.summaryPath)];
    const uploaded = urls.filter(Boolean).length;
    if (uploaded === urls.length) {
      info("Both files uploaded to S3 successfully.");
    } else if (uploaded > 0) {
      warn("Only one file uploaded to S3 successfully, but local files saved.");
    } else {
      warn("S3 upload failed for both files, but local files saved.");
    }
    result.s3Urls = urls;
  }

  if (sinks.has("mongo")) {
    const uploader = new MongoUploader(
      {
        connectionString: config.mongoConnectionString,
        databaseName: config.mongoDatabaseName,
        collectionName: config.mongoCollectionName,
      },
      options.mongoStore
    );
    result.mongo = await uploader.uploadConversations(summary.runs, now());
  }

  logExportStats(result.stats);
  info("Export completed successfully.");
  return result;
}
