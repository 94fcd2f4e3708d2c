import dotenv from "dotenv";
import { ConfigError } from "./errors";
import { isLogLevel, LogLevel } from "./log";

export const DEFAULT_API_URL = "https://api.smith.langchain.com";

export interface Config {
  langsmithApiKey: string;
  langsmithApiUrl: string;
  sessionIds: string[];
  hoursWindow: number;
  filterName: string;
  pageLimit: number;

  s3BucketName: string;
  s3Prefix: string;
  awsRegion: string;

  mongoConnectionString: string;
  mongoDatabaseName: string;
  mongoCollectionName: string;

  outputDir: string;
  exportTimezone: string;

  logLevel: LogLevel;
  logFile: string;
}

export type Sink = "json" | "s3" | "mongo";

type Env = Record<string, string | undefined>;

/** Load `.env` (if any) into process.env without overriding what is already set. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

function str(env: Env, name: string, fallback = ""): string {
  return (env[name] ?? fallback).trim();
}

function positiveNumber(env: Env, name: string, fallback: number, { integer = false, max = Infinity } = {}): number {
  const raw = str(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value > max || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`${name} must be a positive ${integer ? "integer" : "number"}${max < Infinity ? ` <= ${max}` : ""}, got '${raw}'`);
  }
  return value;
}

function validTimezone(name: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(env: Env = process.env): Config {
  const langsmithApiKey = str(env, "LANGSMITH_API_KEY");
  if (!langsmithApiKey) {
    throw new ConfigError("LANGSMITH_API_KEY is required");
  }

  const sessionIds = str(env, "LS_SESSION_IDS")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (sessionIds.length === 0) {
    throw new ConfigError("LS_SESSION_IDS is required (comma-separated LangSmith project ids)");
  }

  const logLevel = str(env, "LOG_LEVEL", "INFO").toUpperCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR, got '${logLevel}'`);
  }

  const exportTimezone = str(env, "EXPORT_TIMEZONE", "UTC");
  if (!validTimezone(exportTimezone)) {
    throw new ConfigError(`EXPORT_TIMEZONE '${exportTimezone}' is not a known time zone`);
  }

  return {
    langsmithApiKey,
    langsmithApiUrl: str(env, "LANGSMITH_API_URL", DEFAULT_API_URL).replace(/\/+$/, ""),
    sessionIds,
    hoursWindow: positiveNumber(env, "LS_HOURS_WINDOW", 24),
    filterName: str(env, "LS_FILTER_NAME", "tutor"),
    pageLimit: positiveNumber(env, "LS_PAGE_LIMIT", 100, { integer: true, max: 100 }),
    s3BucketName: str(env, "S3_BUCKET_NAME"),
    s3Prefix: str(env, "S3_PREFIX"),
    awsRegion: str(env, "AWS_REGION", "us-east-1"),
    mongoConnectionString: str(env, "MONGO_CONNECTION_STRING"),
    mongoDatabaseName: str(env, "MONGO_DATABASE_NAME"),
    mongoCollectionName: str(env, "MONGO_COLLECTION_NAME"),
    outputDir: str(env, "OUTPUT_DIR", "langsmith-exports"),
    exportTimezone,
    logLevel,
    logFile: str(env, "LOG_FILE"),
  };
}

/** Settings a sink cannot run without. Checked before the first fetch. */
export function assertSinkConfig(config: Config, sinks: ReadonlySet<Sink>): void {
  const missing: string[] = [];
  if (sinks.has("s3") && !config.s3BucketName) missing.push("S3_BUCKET_NAME");
  if (sinks.has("mongo")) {
    if (!config.mongoConnectionString) missing.push("MONGO_CONNECTION_STRING");
    if (!config.mongoDatabaseName) missing.push("MONGO_DATABASE_NAME");
    if (!config.mongoCollectionName) missing.push("MONGO_COLLECTION_NAME");
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }
}

/**
 * Parse `--output`. JSON files are always written; unknown entries are
 * returned separately so the caller can warn about them.
 */
export function parseOutputOptions(output: string): { sinks: Set<Sink>; unknown: string[] } {
  const sinks = new Set<Sink>(["json"]);
  const unknown: string[] = [];
  for (const option of output.split(",").map((o) => o.trim().toLowerCase()).filter(Boolean)) {
    if (option === "json" || option === "s3" || option === "mongo") {
      sinks.add(option);
    } else {
      unknown.push(option);
    }
  }
  return { sinks, unknown };
}
