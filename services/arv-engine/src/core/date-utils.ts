import { DateTime } from "luxon";

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

// Strict yyyy-MM-dd only; partial, week and timestamp forms are not calendar dates
function fromCalendarDate(date: string): DateTime | null {
  if (!CALENDAR_DATE.test(date)) {
    return null;
  }
  const parsed = DateTime.fromFormat(date, "yyyy-MM-dd", { zone: "utc" });
  return parsed.isValid ? parsed : null;
}

// Parse a yyyy-MM-dd date string at the start of the UTC day
export function parseDate(date: string): DateTime {
  if (typeof date !== "string") {
    throw new TypeError("date must be a string");
  }

  const parsed = fromCalendarDate(date);
  if (!parsed) {
    throw new Error(`Invalid calendar date (yyyy-MM-dd): ${date}`);
  }

  return parsed;
}

// Parse without throwing; null when the value is not a calendar date
export function tryParseDate(date: unknown): DateTime | null {
  if (typeof date !== "string") {
    return null;
  }
  return fromCalendarDate(date.trim());
}

export function toIsoDate(date: DateTime): string {
  assertValidDateTime(date, "date");
  const iso = date.toISODate();
  if (iso === null) {
    throw new Error("date could not be formatted");
  }
  return iso;
}

export function coerceDate(date: DateTime | string): DateTime {
  return typeof date === "string" ? parseDate(date) : startOfDay(date);
}

// Fractional calendar months from `from` to `to` (negative when `from` is later)
export function monthsElapsed(from: DateTime, to: DateTime): number {
  assertValidDateTime(from, "from");
  assertValidDateTime(to, "to");
  return to.diff(from, "months").months;
}

export function daysElapsed(from: DateTime, to: DateTime): number {
  assertValidDateTime(from, "from");
  assertValidDateTime(to, "to");
  return Math.round(to.diff(from, "days").days);
}

// Start of the look-back window ending at asOf
export function windowStart(asOf: DateTime, monthsBack: number): DateTime {
  assertValidDateTime(asOf, "asOf");
  if (!Number.isInteger(monthsBack) || monthsBack < 0) {
    throw new RangeError("monthsBack must be a non-negative integer");
  }
  return asOf.minus({ months: monthsBack });
}

function startOfDay(date: DateTime): DateTime {
  assertValidDateTime(date, "date");
  return date.setZone("utc").startOf("day");
}

function assertValidDateTime(value: DateTime, name: string): void {
  if (!(value instanceof DateTime)) {
    throw new TypeError(`${name} must be a DateTime`);
  }
  if (!value.isValid) {
    throw new Error(`${name} must be a valid DateTime`);
  }
}
