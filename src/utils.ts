export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` through nested records. Any missing key or non-record step
 * yields undefined instead of throwing.
 */
export function lookupPath(value: unknown, path: readonly string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** First candidate path whose value is neither undefined nor null. */
export function firstPresent(value: unknown, paths: readonly (readonly string[])[]): unknown {
  for (const path of paths) {
    const found = lookupPath(value, path);
    if (found !== undefined && found !== null) return found;
  }
  return undefined;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
