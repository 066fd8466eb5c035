import { REGEX_POST_TIME } from "../constants.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Formats a date in local time as `YYYY-MM-DD HH:mm:ss`, or `YYYY-MM-DD HH:mm` when `withSeconds` is false.
 */
export function formatLocalDateTime(date: Date, withSeconds = true): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}

/**
 * Parses the forum's `YYYY-MM-DD HH:mm[:ss]` timestamps as local time.
 * @returns The parsed date, or null when the string does not match or names an impossible date.
 */
export function parseForumDateTime(value: string): Date | null {
  const match = REGEX_POST_TIME.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match;
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    seconds ? Number(seconds) : 0
  );

  // Date rolls over out-of-range parts (e.g. month 13); treat that as a parse failure.
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    return null;
  }
  return date;
}
