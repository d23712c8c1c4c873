import type { TimeElements } from "@tidetable/contracts";
import { MalformedTimestampError } from "./errors.js";

// 2018-10-17T17:25:00[.fff]
const TIMESTAMP_MIN_LENGTH = 19;
const FIELD_OFFSETS: Array<[keyof TimeElements, number, number]> = [
  ["year", 0, 4],
  ["month", 5, 7],
  ["day", 8, 10],
  ["hour", 11, 13],
  ["minute", 14, 16],
  ["second", 17, 19],
];

const SECS_PER_MINUTE = 60;
const SECS_PER_HOUR = 3600;
const SECS_PER_DAY = 86_400;
// Date covers +/-8.64e15 ms around the epoch.
const MAX_EPOCH_SECONDS = 8_640_000_000_000;

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/**
 * Reads calendar fields from a `YYYY-MM-DDTHH:MM:SS` prefix. Anything after the
 * seconds (fractional part, zone designator) is dropped.
 */
export function convertFromIso8601(text: string): TimeElements {
  if (text.length < TIMESTAMP_MIN_LENGTH) {
    throw new MalformedTimestampError(text, `expected at least ${TIMESTAMP_MIN_LENGTH} characters`);
  }

  const elements: TimeElements = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const [field, start, end] of FIELD_OFFSETS) {
    const slice = text.slice(start, end);
    if (!/^\d+$/.test(slice)) {
      throw new MalformedTimestampError(text, `${field} "${slice}" is not numeric`);
    }
    elements[field] = Number(slice);
  }

  if (elements.month < 1 || elements.month > 12) {
    throw new MalformedTimestampError(text, `month ${elements.month} out of range`);
  }
  if (elements.day < 1 || elements.day > daysInMonth(elements.year, elements.month)) {
    throw new MalformedTimestampError(text, `day ${elements.day} out of range`);
  }
  if (elements.hour > 23 || elements.minute > 59 || elements.second > 59) {
    throw new MalformedTimestampError(text, "time of day out of range");
  }
  return elements;
}

// Proleptic Gregorian day count relative to 1970-01-01, eras of 400 years.
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const shiftedMonth = (month + 9) % 12;
  const dayOfYear = Math.floor((153 * shiftedMonth + 2) / 5) + day - 1;
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * 146_097 + dayOfEra - 719_468;
}

export function makeTime(elements: TimeElements): number {
  return (
    daysFromCivil(elements.year, elements.month, elements.day) * SECS_PER_DAY +
    elements.hour * SECS_PER_HOUR +
    elements.minute * SECS_PER_MINUTE +
    elements.second
  );
}

export function parseTimestamp(text: string): number {
  return makeTime(convertFromIso8601(text));
}

export function formatEpoch(epochTime: number): string {
  return new Date(epochTime * 1000).toISOString().replace(".000Z", "Z");
}

/**
 * Accepts `now`, integer epoch seconds, or the feed's timestamp format.
 */
export function resolveQueryTime(input: string | undefined, nowMs: number = Date.now()): number {
  const value = (input ?? "").trim();
  if (!value || value.toLowerCase() === "now") {
    return Math.floor(nowMs / 1000);
  }
  if (/^-?\d+$/.test(value)) {
    const epochTime = Number(value);
    if (!Number.isSafeInteger(epochTime) || Math.abs(epochTime) > MAX_EPOCH_SECONDS) {
      throw new MalformedTimestampError(value, "epoch seconds out of range");
    }
    return epochTime;
  }
  return parseTimestamp(value);
}
