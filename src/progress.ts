export const ESTIMATION_MIN_PAGES = 2;
export const RECENT_PAGES_SAMPLE = 3;
export const MAX_ESTIMATED_PERCENT = 95;

/** `"estimating"` until enough pages have been seen to project anything. */
export type ProgressEstimate = number | "estimating";

const mean = (values: readonly number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

export function estimateRemainingRuns(runsPerPage: readonly number[]): number {
  const overallAvg = mean(runsPerPage);
  const recentPages = runsPerPage.slice(-RECENT_PAGES_SAMPLE);
  const recentAvg = mean(recentPages);

  // Shrinking pages usually mean the window is nearly exhausted
  if (recentAvg < overallAvg * 0.5 && runsPerPage.length > RECENT_PAGES_SAMPLE) {
    const remainingPages = 1 + recentPages.filter((count) => count > 0).length;
    return Math.floor(recentAvg * remainingPages);
  }
  return Math.floor(overallAvg * 2);
}

export function estimateProgress(
  runsPerPage: readonly number[],
  totalSoFar: number,
  morePagesRemaining: boolean
): ProgressEstimate {
  if (!morePagesRemaining) return 100;
  if (runsPerPage.length < ESTIMATION_MIN_PAGES) return "estimating";

  const estimatedTotal = totalSoFar + estimateRemainingRuns(runsPerPage);
  const percent = estimatedTotal > 0 ? Math.floor((100 * totalSoFar) / estimatedTotal) : 0;
  return Math.min(percent, MAX_ESTIMATED_PERCENT);
}

export function formatProgress(estimate: ProgressEstimate): string {
  if (estimate === "estimating") return "estimating...";
  if (estimate === 100) return "100% completed";
  return `${estimate}% complete`;
}
