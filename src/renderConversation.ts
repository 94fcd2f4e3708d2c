import { Sender, SimplifiedMessage } from "./types/run";
import { isValidTimestamp, parseTimestamp } from "./timestamps";

export interface TranscriptHeader {
  threadId: string | null;
  userId: string | null;
  lessonId: string | null;
}

const RULE = "=".repeat(40);
export const TRANSCRIPT_FOOTER = "=== End of conversation ===";

export function emptyConversationSentinel(threadId: string | null): string {
  return `=== Empty conversation (thread: ${threadId ?? "unknown"}) ===`;
}

/**
 * Render simplified messages as a plain-text transcript. Counts and duration
 * are taken from the simplified messages themselves, not the raw run.
 */
export default function renderConversation(
  header: TranscriptHeader,
  messages: SimplifiedMessage[]
): string {
  if (messages.length === 0) {
    return emptyConversationSentinel(header.threadId);
  }

  const counts: Record<Sender, number> = { user: 0, assistant: 0, system: 0 };
  messages.forEach((m) => counts[m.sender]++);

  const items = [
    [
      RULE,
      `Thread: ${header.threadId ?? "unknown"}`,
      `User: ${header.userId ?? "unknown"} | Lesson: ${header.lessonId ?? "unknown"}`,
      `Duration: ${formatDuration(spanMinutes(messages))}`,
      `Messages: ${messages.length} (user: ${counts.user}, assistant: ${counts.assistant}, system: ${counts.system})`,
      RULE,
    ].join("\n"),
  ];

  messages.forEach((message) => {
    const delta =
      message.time_since_previous_seconds === undefined
        ? ""
        : ` (+${formatDelta(message.time_since_previous_seconds)})`;
    items.push(`[${wallClock(message.timestamp)}] ${message.sender.toUpperCase()}${delta}:\n${message.message}`);
  });

  items.push(TRANSCRIPT_FOOTER);
  return items.join("\n\n");
}

function wallClock(timestamp: string): string {
  const parsed = parseTimestamp(timestamp);
  return isValidTimestamp(parsed) ? parsed.wallClock : timestamp;
}

function spanMinutes(messages: SimplifiedMessage[]): number {
  const first = parseTimestamp(messages[0].timestamp);
  const last = parseTimestamp(messages[messages.length - 1].timestamp);
  if (!isValidTimestamp(first) || !isValidTimestamp(last)) return 0;
  return (last.epochMs - first.epochMs) / 60_000;
}

export function formatDuration(minutes: number): string {
  if (minutes < 60) return `${minutes.toFixed(1)} minutes`;
  return `${(minutes / 60).toFixed(1)} hours`;
}

export function formatDelta(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}m`;
  return `${(seconds / 3600).toFixed(1)}h`;
}
