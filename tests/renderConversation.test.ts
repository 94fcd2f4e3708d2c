import { describe, it, expect } from "vitest";
import renderConversation, { formatDelta, formatDuration } from "../src/renderConversation";

describe("renderConversation", () => {
  it("renders a sentinel for an empty conversation", () => {
    expect(renderConversation({ threadId: "u1-l1", userId: "u1", lessonId: "l1" }, [])).toBe(
      "=== Empty conversation (thread: u1-l1) ==="
    );
    expect(renderConversation({ threadId: null, userId: null, lessonId: null }, [])).toBe(
      "=== Empty conversation (thread: unknown) ==="
    );
  });

  it("switches to hours for long conversations and labels unknown ids", () => {
    const text = renderConversation({ threadId: null, userId: null, lessonId: null }, [
      { timestamp: "2024-01-01T10:00:00Z", sender: "user", message: "start" },
      { timestamp: "2024-01-01T11:30:00Z", sender: "assistant", message: "end", time_since_previous_seconds: 5400 },
    ]);
    expect(text.split("\n").slice(1, 4)).toEqual([
      "Thread: unknown",
      "User: unknown | Lesson: unknown",
      "Duration: 1.5 hours",
    ]);
    expect(text).toContain("[2024-01-01 11:30:00] ASSISTANT (+1.5h):\nend");
  });
});

describe("formatting helpers", () => {
  it("formats durations and deltas", () => {
    expect(formatDuration(0)).toBe("0.0 minutes");
    expect(formatDuration(59.94)).toBe("59.9 minutes");
    expect(formatDuration(120)).toBe("2.0 hours");
    expect(formatDelta(4.25)).toBe("4.3s");
    expect(formatDelta(90)).toBe("1.5m");
    expect(formatDelta(7200)).toBe("2.0h");
  });
});
