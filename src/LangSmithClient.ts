import fetch, { RequestInit, Response } from "node-fetch";
import { RunPage, RunPageSource } from "./types";
import { RunsQuery } from "./types/run";
import { TransportError } from "./errors";
import { toIsoSeconds } from "./timestamps";
import { isRecord, lookupPath, sleep, truncate } from "./utils";
import { warn } from "./log";

export const RUNS_QUERY_PATH = "/api/v1/runs/query";
export const MAX_RETRIES = 3;
export const REQUEST_TIMEOUT_MS = 60_000;
const ERROR_BODY_CHARS = 400;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface LangSmithClientOptions {
  apiKey: string;
  apiUrl: string;
  maxRetries?: number;
  timeoutMs?: number;
  /** Base delay between attempts; attempt n waits n times this */
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
}

export interface RunsQueryParams {
  sessionIds: string[];
  filterName: string;
  pageLimit: number;
}

export function createRunsQuery(params: RunsQueryParams, startTime: Date, endTime: Date): RunsQuery {
  return {
    cursor: "",
    limit: params.pageLimit,
    session: params.sessionIds,
    is_root: true,
    start_time: toIsoSeconds(startTime),
    end_time: toIsoSeconds(endTime),
    order_by: "start_time",
    select: ["id", "trace_id", "thread_id", "name", "outputs", "start_time"],
    filter: `eq(name, "${params.filterName}")`,
  };
}

interface FailedAttempt {
  statusCode?: number;
  body?: string;
  reason: string;
}

/**
 * Transport for the runs query endpoint. Each page request is retried a
 * bounded number of times; after that a TransportError is thrown.
 */
export class LangSmithClient implements RunPageSource {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: LangSmithClientOptions) {
    this.url = `${options.apiUrl}${RUNS_QUERY_PATH}`;
    this.headers = {
      "x-api-key": options.apiKey,
      "Content-Type": "application/json",
    };
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPage(query: RunsQuery, cursor: string, pageIndex: number): Promise<RunPage> {
    const body = JSON.stringify({ ...query, cursor });
    let lastFailure: FailedAttempt = { reason: "no attempt made" };

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(this.url, {
          method: "POST",
          headers: this.headers,
          body,
          timeout: this.timeoutMs,
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        warn(`Request error on page ${pageIndex} (attempt ${attempt}/${this.maxRetries}): ${reason}`);
        lastFailure = { reason: `request error: ${reason}` };
        await this.backoff(attempt);
        continue;
      }

      if (response.ok) {
        return this.parsePage(response, pageIndex);
      }

      const text = truncate(await response.text(), ERROR_BODY_CHARS);
      if (response.status === 429) {
        warn(`Rate limit hit on page ${pageIndex} (attempt ${attempt}/${this.maxRetries}), retrying...`);
        lastFailure = { statusCode: 429, body: text, reason: "rate limited" };
      } else {
        warn(`HTTP ${response.status} error on page ${pageIndex} (attempt ${attempt}/${this.maxRetries}): ${truncate(text, 200)}`);
        lastFailure = { statusCode: response.status, body: text, reason: `HTTP ${response.status}` };
      }
      await this.backoff(attempt);
    }

    throw new TransportError(
      `LangSmith query for page ${pageIndex} failed after ${this.maxRetries} attempts (${lastFailure.reason})` +
      (lastFailure.body ? `: ${lastFailure.body}` : ""),
      pageIndex,
      lastFailure.statusCode,
      lastFailure.body
    );
  }

  private async parsePage(response: Response, pageIndex: number): Promise<RunPage> {
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new TransportError(
        `Page ${pageIndex}: response is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        pageIndex,
        response.status
      );
    }

    const runs = isRecord(data) ? data.runs : undefined;
    if (!Array.isArray(runs)) {
      throw new TransportError(`Page ${pageIndex}: unexpected response format, 'runs' is not a list`, pageIndex, response.status);
    }

    const next = lookupPath(data, ["cursors", "next"]);
    return typeof next === "string" && next ? { runs, nextCursor: next } : { runs };
  }

  private async backoff(attempt: number): Promise<void> {
    if (attempt < this.maxRetries && this.retryDelayMs > 0) {
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
