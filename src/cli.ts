#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import exportRuns, { ExportRunsOptions } from "./exportRuns";
import { loadConfig, loadDotenv, parseOutputOptions } from "./config";
import { ConfigError, TransportError } from "./errors";
import { error, initLog, isLogLevel, LogLevel, warn } from "./log";

export const EXIT_OK = 0;
export const EXIT_RUNTIME_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;

/** Collaborators the export would otherwise build from the configuration. */
export type CliDependencies = Pick<ExportRunsOptions, "source" | "s3Storage" | "mongoStore" | "now">;

type CliOptions = {
  output: string;
  debug?: number;
  hours?: number;
  logLevel?: LogLevel;
  outputDir?: string;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function positiveFloat(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Expected a positive number.");
  return n;
}

function logLevel(value: string): LogLevel {
  const level = value.toUpperCase();
  if (!isLogLevel(level)) throw new InvalidArgumentError("Expected one of DEBUG, INFO, WARN, ERROR.");
  return level;
}

function buildProgram(): Command {
  return new Command()
    .name("langsmith-export")
    .description("Export LangSmith runs, latest run per thread, to JSON files and optionally S3 / MongoDB")
    .version("1.0.0")
    .option("-o, --output <list>", "Comma-separated outputs: json, s3, mongo (JSON files are always written)", "json")
    .option("--debug <n>", "Debug mode: stop after N unique runs", positiveInt)
    .option("--hours <n>", "Time window in hours to fetch runs (default: LS_HOURS_WINDOW or 24)", positiveFloat)
    .option("--log-level <level>", "Override LOG_LEVEL (DEBUG, INFO, WARN, ERROR)", logLevel)
    .option("--output-dir <directory>", "Override OUTPUT_DIR")
    .exitOverride();
}

/**
 * Run the exporter with the given argv and environment and return the exit
 * code: 0 on success, 2 for configuration errors, 1 for anything else.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  dependencies: CliDependencies = {}
): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_CONFIG_ERROR;
    }
    throw err;
  }
  const options = program.opts<CliOptions>();

  try {
    const config = loadConfig(env);
    initLog(options.logLevel ?? config.logLevel, config.logFile);
    if (options.outputDir) config.outputDir = options.outputDir;

    const { sinks, unknown } = parseOutputOptions(options.output);
    unknown.forEach((option) => warn(`Unknown output option '${option}', ignoring`));

    await exportRuns({
      config,
      sinks,
      hours: options.hours ?? config.hoursWindow,
      debugLimit: options.debug,
      ...dependencies,
    });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      error(`Configuration error: ${err.message}`);
      return EXIT_CONFIG_ERROR;
    }
    if (err instanceof TransportError && err.isRateLimit) {
      error(`LangSmith kept rate limiting page ${err.pageIndex}; try again later or lower LS_PAGE_LIMIT`);
    }
    error("Export failed", err);
    return EXIT_RUNTIME_ERROR;
  }
}

if (require.main === module) {
  loadDotenv();
  runCli(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error("Fatal error:", err);
      process.exit(EXIT_RUNTIME_ERROR);
    });
}
