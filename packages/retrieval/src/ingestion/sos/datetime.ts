/**
 * WaterML timestamp handling.
 *
 * Timestamps arrive as `YYYY-MM-DD`, optionally followed by a time and a
 * UTC offset (`2015-07-02T10:45:00.000-05:00`). The embedded offset always
 * wins when computing the instant; timestamps without one are read as wall
 * time in the requested zone, or UTC when no zone is given.
 */

import { ConfigurationError, DateTimeParseError } from "../../errors.js";

const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

export interface TimestampParts {
  date: string | null;
  time: string | null;
  tzOffset: string | null;
}

/** Normalize "Z", "-05", "-0500" and "-05:00" to "±HH:MM" */
function normalizeOffset(offset: string): string {
  if (offset === "Z") return "+00:00";
  const digits = offset.slice(1).replace(":", "");
  return `${offset[0]}${digits.slice(0, 2)}:${digits.slice(2, 4) || "00"}`;
}

function offsetMinutes(offset: string): number {
  const sign = offset.startsWith("-") ? -1 : 1;
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(4, 6));
  return sign * (hours * 60 + minutes);
}

/**
 * Split a timestamp into its date, time and offset parts without
 * interpreting it. Unrecognized text keeps whatever precedes a "T" as the
 * date.
 */
export function splitTimestamp(raw: string): TimestampParts {
  const text = raw.trim();
  if (text === "") return { date: null, time: null, tzOffset: null };

  const match = TIMESTAMP.exec(text);
  if (!match) {
    const date = text.split("T")[0] ?? text;
    return { date, time: null, tzOffset: null };
  }

  const [, year, month, day, hour, minute, second, , offset] = match;
  return {
    date: `${year}-${month}-${day}`,
    time: hour !== undefined ? `${hour}:${minute}:${second ?? "00"}` : null,
    tzOffset: offset !== undefined ? normalizeOffset(offset) : null,
  };
}

/** Like Date.UTC, but years 0-99 are taken literally rather than as 19xx */
function utcMillis(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcMillis(year, month + 1, 0)).getUTCDate();
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Fail unless `timeZone` is empty or an IANA zone the runtime knows */
export function assertTimeZone(timeZone: string): void {
  if (timeZone === "") return;
  try {
    zoneFormatter(timeZone);
  } catch {
    throw new ConfigurationError(
      `Unknown timezone "${timeZone}". Use an IANA identifier such as "America/Chicago", or "" for UTC.`,
    );
  }
}

/** Offset of `timeZone` from UTC, in minutes, at the given instant */
export function zoneOffsetAt(instant: number, timeZone: string): number {
  const parts: Record<string, number> = {};
  for (const part of zoneFormatter(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  const asUtc = utcMillis(
    parts["year"] ?? 1970,
    parts["month"] ?? 1,
    parts["day"] ?? 1,
    parts["hour"] ?? 0,
    parts["minute"] ?? 0,
    parts["second"] ?? 0,
  );
  const wholeSeconds = instant - (((instant % 1000) + 1000) % 1000);
  return Math.round((asUtc - wholeSeconds) / 60000);
}

/** Instant at which the clocks in `timeZone` read the given wall time */
function instantForWallTime(wall: number, timeZone: string): number {
  const guess = zoneOffsetAt(wall, timeZone);
  const instant = wall - guess * 60000;
  const actual = zoneOffsetAt(instant, timeZone);
  return actual === guess ? instant : wall - actual * 60000;
}

/**
 * Parse a timestamp into a Date.
 *
 * @param raw - Timestamp text from the service
 * @param timeZone - Zone for timestamps without an offset ("" = UTC)
 * @throws DateTimeParseError when the text is not a valid calendar date-time
 */
export function parseTimestamp(raw: string, timeZone: string): Date {
  const match = TIMESTAMP.exec(raw.trim());
  if (!match) throw new DateTimeParseError(raw);

  const [, y, mo, d, h, mi, s, fraction, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h ?? 0);
  const minute = Number(mi ?? 0);
  const second = Number(s ?? 0);
  const millis = Number((fraction ?? "").slice(0, 3).padEnd(3, "0"));

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new DateTimeParseError(raw);
  }

  const wall = utcMillis(year, month, day, hour, minute, second, millis);
  if (offset !== undefined) {
    return new Date(wall - offsetMinutes(normalizeOffset(offset)) * 60000);
  }
  if (timeZone !== "") {
    return new Date(instantForWallTime(wall, timeZone));
  }
  return new Date(wall);
}
