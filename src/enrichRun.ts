import { Clock, PipelineObserver } from "./types";
import { EnrichedRun, RawRun, Sender, SimplifiedMessage } from "./types/run";
import { decodeThreadId } from "./threadId";
import { isValidTimestamp, ParsedTimestamp, parseTimestamp } from "./timestamps";
import { firstPresent, isRecord, JsonRecord, lookupPath, roundTo } from "./utils";
import renderConversation from "./renderConversation";

const TIMESTAMP_PATHS = [
  ["kwargs", "additional_kwargs", "timestamp"],
  ["additional_kwargs", "timestamp"],
] as const;

const CONTENT_PATHS = [["kwargs", "content"], ["content"], ["text"]] as const;

export interface EnrichOptions {
  now?: Clock;
  /** Key the run is tracked under; used to label skip events */
  threadKey?: string;
  onEvent?: PipelineObserver;
}

export function classifySender(message: JsonRecord): Sender {
  const id = message.id;
  const origin = Array.isArray(id) && id.length > 0 ? id[id.length - 1] : undefined;
  if (typeof origin === "string") {
    if (origin.endsWith("SystemMessage")) return "system";
    if (origin.endsWith("HumanMessage")) return "user";
  }
  return "assistant";
}

function contentText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (!Array.isArray(value)) return "";
  // multimodal content: [{ type: "text", text: "..." }, { type: "image_url", ... }]
  return value
    .map((part) => {
      if (typeof part === "string") return part;
      if (isRecord(part) && typeof part.text === "string") return part.text;
      return "";
    })
    .filter((text) => text.trim())
    .join("\n")
    .trim();
}

export function extractContent(message: JsonRecord): string {
  for (const path of CONTENT_PATHS) {
    const text = contentText(lookupPath(message, path));
    if (text) return text;
  }
  return "";
}

export function extractTimestamp(message: JsonRecord): unknown {
  return firstPresent(message, TIMESTAMP_PATHS);
}

interface Bound {
  raw: string;
  parsed: ParsedTimestamp;
}

/**
 * Derive ids, counts, timing and a simplified transcript for one run.
 * Returns a new object; the input run is left untouched.
 */
export function enrichRun(run: RawRun, options: EnrichOptions = {}): EnrichedRun {
  const now = options.now ?? (() => new Date());
  const emit: PipelineObserver = options.onEvent ?? (() => undefined);
  const threadKey =
    options.threadKey ?? (typeof run.thread_id === "string" && run.thread_id ? run.thread_id : `run:${String(run.id ?? "unknown")}`);

  const { userId, lessonId } = decodeThreadId(run.thread_id);
  if (typeof run.thread_id === "string" && run.thread_id && userId === null) {
    emit({ type: "thread_id_unparsed", threadKey, threadId: run.thread_id });
  }

  const rawMessages = lookupPath(run, ["outputs", "messages"]);
  const messages: unknown[] = Array.isArray(rawMessages) ? rawMessages : [];

  const tally: Record<Sender, number> = { user: 0, assistant: 0, system: 0 };
  let earliest: Bound | undefined;
  let latest: Bound | undefined;
  const simplified: SimplifiedMessage[] = [];
  let previousMs: number | undefined;

  for (const [position, message] of messages.entries()) {
    if (!isRecord(message)) {
      emit({ type: "message_skipped", threadKey, position, reason: "message is not an object" });
      continue;
    }

    const sender = classifySender(message);
    tally[sender]++;

    const rawTimestamp = extractTimestamp(message);
    const parsed = parseTimestamp(rawTimestamp);
    const timestamp = isValidTimestamp(parsed) && typeof rawTimestamp === "string" ? { raw: rawTimestamp, parsed } : undefined;

    if (timestamp) {
      if (!earliest || timestamp.parsed.epochMs < earliest.parsed.epochMs) earliest = timestamp;
      if (!latest || timestamp.parsed.epochMs >= latest.parsed.epochMs) latest = timestamp;
    }

    const text = extractContent(message);
    if (!text) {
      emit({ type: "message_skipped", threadKey, position, reason: "no content" });
      continue;
    }
    if (!timestamp) {
      emit({ type: "message_skipped", threadKey, position, reason: "missing or unparseable timestamp" });
      continue;
    }

    const entry: SimplifiedMessage = { timestamp: timestamp.raw, sender, message: text };
    if (previousMs !== undefined) {
      entry.time_since_previous_seconds = roundTo((timestamp.parsed.epochMs - previousMs) / 1000, 3);
    }
    previousMs = timestamp.parsed.epochMs;
    simplified.push(entry);
  }

  const enriched: EnrichedRun = {
    ...run,
    user_id: userId,
    lesson_id: lessonId,
    message_count: tally.user + tally.assistant + tally.system,
    user_messages: tally.user,
    assistant_messages: tally.assistant,
    system_messages: tally.system,
  };

  if (earliest && latest) {
    enriched.first_msg_time = earliest.raw;
    enriched.last_msg_time = latest.raw;
    enriched.total_time_minutes = roundTo((latest.parsed.epochMs - earliest.parsed.epochMs) / 60_000, 2);
    enriched.time_since_last_message_minutes = roundTo((now().getTime() - latest.parsed.epochMs) / 60_000, 2);
  }

  if (simplified.length > 0) {
    enriched.conversation_json = { messages: simplified };
    enriched.conversation_str = renderConversation(
      { threadId: typeof run.thread_id === "string" && run.thread_id ? run.thread_id : null, userId, lessonId },
      simplified
    );
  }

  return enriched;
}
