import { describe, it, expect } from "vitest";
import { calculateExportStats } from "../src/stats";
import { enrichedRun } from "./helpers/runs";

describe("calculateExportStats", () => {
  it("counts distinct threads, users and lessons", () => {
    const stats = calculateExportStats([
      enrichedRun({ thread_id: "u1-l1", user_id: "u1", lesson_id: "l1" }),
      enrichedRun({ thread_id: "u1-l2", user_id: "u1", lesson_id: "l2" }),
      enrichedRun({ thread_id: "u2-l1", user_id: "u2", lesson_id: "l1" }),
      enrichedRun({ id: "r9" }),
    ]);

    expect(stats).toEqual({ totalRuns: 4, conversations: 3, uniqueUsers: 2, uniqueLessons: 2 });
  });

  it("is all zeros for an empty export", () => {
    expect(calculateExportStats([])).toEqual({ totalRuns: 0, conversations: 0, uniqueUsers: 0, uniqueLessons: 0 });
  });
});
