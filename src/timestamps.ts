export const INVALID_TIMESTAMP = Symbol("invalid-timestamp");

export interface ParsedTimestamp {
  epochMs: number;
  /** Wall-clock reading in the timestamp's own offset, `YYYY-MM-DD HH:MM:SS` */
  wallClock: string;
  /** Minutes east of UTC, or null for an offset-less (local) timestamp */
  offsetMinutes: number | null;
}

export type TimestampResult = ParsedTimestamp | typeof INVALID_TIMESTAMP;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffset(token: string): number | null {
  if (token === "Z" || token === "z") return 0;
  const sign = token.startsWith("-") ? -1 : 1;
  const digits = token.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

const pad = (n: number, width = 2) => n.toString().padStart(width, "0");

/**
 * Parse an ISO-8601 date-time. Accepts a space or `T` separator, up to nine
 * fractional digits (kept to the millisecond) and an optional `Z` / `±HH[:MM]`
 * offset. Without an offset the value is read in the host's local zone, or as
 * UTC when `naiveZone` says so.
 */
export function parseTimestamp(value: unknown, naiveZone: "local" | "utc" = "local"): TimestampResult {
  if (typeof value !== "string") return INVALID_TIMESTAMP;
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return INVALID_TIMESTAMP;

  const [, y, mo, d, h = "0", mi = "0", s = "0", fraction = "", offsetToken] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number((fraction + "000").slice(0, 3));

  if (month < 1 || month > 12) return INVALID_TIMESTAMP;
  if (day < 1 || day > daysInMonth(year, month)) return INVALID_TIMESTAMP;
  if (hour > 23 || minute > 59 || second > 59) return INVALID_TIMESTAMP;

  let epochMs: number;
  let offsetMinutes: number | null = null;
  if (offsetToken) {
    offsetMinutes = parseOffset(offsetToken);
    if (offsetMinutes === null) return INVALID_TIMESTAMP;
    epochMs = Date.UTC(year, month - 1, day, hour, minute, second, millis) - offsetMinutes * 60_000;
  } else if (naiveZone === "utc") {
    epochMs = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  } else {
    epochMs = new Date(year, month - 1, day, hour, minute, second, millis).getTime();
  }
  if (Number.isNaN(epochMs)) return INVALID_TIMESTAMP;

  return {
    epochMs,
    wallClock: `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`,
    offsetMinutes,
  };
}

export function isValidTimestamp(result: TimestampResult): result is ParsedTimestamp {
  return result !== INVALID_TIMESTAMP;
}

/** Instant used for "latest wins" comparisons; unparseable sorts first. */
export function comparableInstant(value: unknown): number {
  const parsed = parseTimestamp(value);
  return isValidTimestamp(parsed) ? parsed.epochMs : Number.NEGATIVE_INFINITY;
}

/** UTC ISO string at second precision, e.g. `2024-01-01T00:00:00Z`. */
export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
