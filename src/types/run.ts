/**
 * A run as returned by the runs query endpoint. The API's shape is not
 * trusted: every field is checked where it is read.
 */
export interface RawRun {
  id?: unknown;
  trace_id?: unknown;
  thread_id?: unknown;
  name?: unknown;
  start_time?: unknown;
  outputs?: unknown;
  [key: string]: unknown;
}

export type Sender = "user" | "assistant" | "system";

export interface SimplifiedMessage {
  timestamp: string;
  sender: Sender;
  message: string;
  time_since_previous_seconds?: number;
}

export interface ConversationJson {
  messages: SimplifiedMessage[];
}

export interface EnrichedRun extends RawRun {
  user_id: string | null;
  lesson_id: string | null;
  message_count: number;
  user_messages: number;
  assistant_messages: number;
  system_messages: number;
  first_msg_time?: string;
  last_msg_time?: string;
  total_time_minutes?: number;
  time_since_last_message_minutes?: number;
  conversation_json?: ConversationJson;
  conversation_str?: string;
}

export interface RunsQuery {
  cursor: string;
  limit: number;
  session: string[];
  is_root: boolean;
  start_time: string;
  end_time: string;
  order_by: string;
  select: string[];
  filter: string;
}

export interface RunsQueryResponse {
  runs: unknown[];
  cursors?: { next?: string | null; [key: string]: unknown } | null;
}
