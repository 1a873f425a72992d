import type { CaptureTime } from "./types";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffset(text: string): number | null {
  if (text === "Z") {
    return 0;
  }
  const sign = text.startsWith("-") ? -1 : 1;
  const digits = text.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 3600 + minutes * 60);
}

/**
 * Parses an ISO-8601 date or date-time, keeping the wall-clock fields
 * exactly as written.
 *
 * Accepts `2023-06-01`, `2023-06-01T10:00`, `2023-06-01 10:00:00.250`
 * and any of these followed by `Z`, `-05:00`, `+0530` or `+02`.
 * Fractional seconds are dropped.
 *
 * @returns The parsed time, or null if the string is not a valid timestamp
 */
export function parseIsoTimestamp(text: string): CaptureTime | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h = "0", mi = "0", s = "0", zone] = match;
  const time: CaptureTime = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: Number(s),
    utcOffsetSeconds: null,
  };

  if (
    time.month < 1 ||
    time.month > 12 ||
    time.day < 1 ||
    time.day > daysInMonth(time.year, time.month) ||
    time.hour > 23 ||
    time.minute > 59 ||
    time.second > 59
  ) {
    return null;
  }

  if (zone !== undefined) {
    const offset = parseOffset(zone);
    if (offset === null) {
      return null;
    }
    time.utcOffsetSeconds = offset;
  }

  return time;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Formats a capture time the way EXIF date fields expect it:
 * `YYYY:MM:DD HH:MM:SS`, with no zone suffix.
 */
export function formatExifTimestamp(time: CaptureTime): string {
  const date = `${pad(time.year, 4)}:${pad(time.month)}:${pad(time.day)}`;
  const clock = `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
  return `${date} ${clock}`;
}
