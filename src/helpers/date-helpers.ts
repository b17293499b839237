import pool from "../db/connection.js";
import { getUserId } from "../context/user-context.js";

const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export async function getUserTimezone(): Promise<string> {
  const userId = getUserId();
  const { rows } = await pool.query<{ timezone: string | null }>(
    "SELECT data->>'timezone' as timezone FROM athlete_profiles WHERE user_id = $1 LIMIT 1",
    [userId]
  );
  return rows[0]?.timezone || "UTC";
}

/** Formats `now` as YYYY-MM-DD in the given zone, or in server time without one. */
export function formatDateInZone(now: Date, timezone?: string): string {
  const options: Intl.DateTimeFormatOptions = {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    ...(timezone ? { timeZone: timezone } : {}),
  };
  return new Intl.DateTimeFormat("en-CA", options).format(now); // YYYY-MM-DD
}

export async function getUserCurrentDate(): Promise<string> {
  const timezone = await getUserTimezone();
  const now = new Date();

  try {
    return formatDateInZone(now, timezone);
  } catch (err) {
    console.warn(
      `[getUserCurrentDate] Invalid timezone "${timezone}", falling back to UTC:`,
      err instanceof Error ? err.message : err,
    );
    return formatDateInZone(now, "UTC");
  }
}

function toUtcDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.getUTCMonth() !== Number(m) - 1 || date.getUTCDate() !== Number(d)) return null;
  return date;
}

/** True for a YYYY-MM-DD string naming a real calendar day (not 2024-02-30). */
export function isValidIsoDate(value: string): boolean {
  return toUtcDate(value) !== null;
}

/**
 * Validates a YYYY-MM-DD string and returns it as a UTC-midnight Date.
 * Rejects impossible dates such as 2024-02-30.
 */
export function parseIsoDate(value: string): Date {
  const date = toUtcDate(value);
  if (!date) {
    throw new Error(`Invalid date format: ${value}. Expected format: YYYY-MM-DD`);
  }
  return date;
}

/**
 * Calendar date (UTC) of a date or timestamp string: "2024-03-10T07:15:00Z" → "2024-03-10".
 * Returns null for anything that doesn't parse.
 */
export function toDateKey(value: string | null | undefined): string | null {
  if (!value) return null;
  if (ISO_DATE.test(value)) return value;
  const time = Date.parse(value);
  if (Number.isNaN(time)) return null;
  return new Date(time).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to` (both YYYY-MM-DD); negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / DAY_MS);
}

export function addDays(date: string, days: number): string {
  return new Date(parseIsoDate(date).getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Epoch-second bounds covering whole UTC days: `after` is the start of
 * `startDate`, `before` the last second of `endDate`.
 */
export function dateRangeToEpoch(startDate: string, endDate: string): { after: number; before: number } {
  const start = parseIsoDate(startDate).getTime();
  const end = parseIsoDate(endDate).getTime();
  if (start > end) {
    throw new Error(`Invalid date range: start_date ${startDate} must be on or before end_date ${endDate}`);
  }
  return {
    after: Math.floor(start / 1000),
    before: Math.floor((end + DAY_MS) / 1000) - 1,
  };
}

/** ISO-8601 week-numbering year and week of a timestamp, evaluated in UTC. */
export function isoWeekKey(value: string): { year: number; week: number } | null {
  const key = toDateKey(value);
  if (!key) return null;
  const date = parseIsoDate(key);
  const weekday = (date.getUTCDay() + 6) % 7; // Monday = 0
  // The Thursday of this week decides which year the week belongs to
  const thursday = new Date(date.getTime() + (3 - weekday) * DAY_MS);
  const year = thursday.getUTCFullYear();
  const jan1 = Date.UTC(year, 0, 1);
  const week = Math.floor((thursday.getTime() - jan1) / DAY_MS / 7) + 1;
  return { year, week };
}

/** "2024-03-04 to 2024-03-10" for ISO week 10 of 2024. */
export function getWeekDateRange(year: number, week: number): string {
  const jan4 = new Date(Date.UTC(year, 0, 4));
  const week1Monday = jan4.getTime() - ((jan4.getUTCDay() + 6) % 7) * DAY_MS;
  const monday = new Date(week1Monday + (week - 1) * 7 * DAY_MS);
  const sunday = new Date(monday.getTime() + 6 * DAY_MS);
  return `${monday.toISOString().slice(0, 10)} to ${sunday.toISOString().slice(0, 10)}`;
}
