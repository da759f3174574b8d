// All calendar math runs in UTC. Timestamps without a zone ("2025-01-06 08:00")
// are read as UTC wall-clock time so grouping never depends on the machine's timezone.

// 2025-01-06, 2025-01-06 08:00, 2025-01-06T08:00:30, 2025-01-06T08:00:30.250
const NAIVE_TIMESTAMP = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;

// Same thing with an explicit zone: Z, +05:30, -0800
const ZONED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

export type Season = "Winter" | "Spring" | "Summer" | "Autumn";

// Meteorological seasons, in calendar order starting with December-February
export const SEASONS: readonly Season[] = ["Winter", "Spring", "Summer", "Autumn"];

/**
 * Parse a timestamp or date string. Returns undefined for anything that
 * isn't a real calendar instant (2025-02-30 included).
 */
export function parseTimestamp(value: string): Date | undefined {
  const text = value.trim();
  if (!text) return undefined;

  const naive = NAIVE_TIMESTAMP.exec(text);
  if (naive) {
    const [, year, month, day, hour = "0", minute = "0", second = "0", millis = "0"] = naive;
    const parts = [year, month, day, hour, minute, second].map(Number);
    const [y, mo, d, h, mi, s] = parts;
    if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return undefined;

    const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s, Number(millis.padEnd(3, "0"))));
    // Date.UTC rolls 2025-02-30 over to March; reject instead of correcting
    if (date.getUTCDate() !== d || date.getUTCMonth() !== mo - 1) return undefined;
    return date;
  }

  if (ZONED_TIMESTAMP.test(text)) {
    const millis = Date.parse(text);
    return Number.isNaN(millis) ? undefined : new Date(millis);
  }

  return undefined;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// 2025-01-06
export function dayKey(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

// 2025-01
export function monthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}`;
}

// 2025-01-06 08:00
export function hourKey(date: Date): string {
  return `${dayKey(date)} ${pad(date.getUTCHours())}:00`;
}

/**
 * Sunday that ends the week containing `date` (the date itself when it is a Sunday).
 */
export function weekEndingKey(date: Date): string {
  const daysUntilSunday = (7 - date.getUTCDay()) % 7;
  const sunday = new Date(Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate() + daysUntilSunday,
  ));
  return dayKey(sunday);
}

/**
 * Index into SEASONS: 0 Winter (Dec-Feb), 1 Spring (Mar-May), 2 Summer (Jun-Aug), 3 Autumn (Sep-Nov).
 */
export function seasonIndex(date: Date): number {
  return Math.floor(((date.getUTCMonth() + 1) % 12) / 3);
}

export function seasonOf(date: Date): Season {
  return SEASONS[seasonIndex(date)];
}

// 2025-01-06 08:00:00
export function formatDateTime(date: Date): string {
  return `${dayKey(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
