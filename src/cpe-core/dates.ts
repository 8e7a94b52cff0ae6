import { DateTime } from 'luxon';
import { DateParseError } from './errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Wall-clock timestamp with whole-second resolution and no time zone. */
export interface CalendarTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/** Export and configuration forms, tried in order. Each must match the whole text. */
export const DATE_FORMATS = [
  'LLL d, yyyy h:mm a',
  'LLL d, yyyy h:mm:ss a',
  'LLLL d, yyyy h:mm a',
  'LLLL d, yyyy h:mm:ss a',
  'LLL d, yyyy H:mm:ss',
  'LLLL d, yyyy H:mm:ss',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
] as const;

// All arithmetic runs in UTC so wall-clock values never meet a DST shift.
const WALL_CLOCK = { zone: 'utc', locale: 'en-US' } as const;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function toDateTime(t: CalendarTime): DateTime {
  return DateTime.fromObject(
    { year: t.year, month: t.month, day: t.day, hour: t.hour, minute: t.minute, second: t.second },
    WALL_CLOCK,
  );
}

function fromDateTime(dt: DateTime): CalendarTime {
  return {
    year: dt.year,
    month: dt.month,
    day: dt.day,
    hour: dt.hour,
    minute: dt.minute,
    second: dt.second,
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parses the date forms found in webinar exports and report configuration:
 *
 * - `Apr 14, 2021 6:58 PM` (seconds optional, full month names too)
 * - `Apr 14, 2021 18:58:23`
 * - `2021-04-14 18:58:23`
 *
 * A full ISO 8601 date-time or an RFC 2822 date is accepted as a last resort,
 * keeping the wall clock the text states. Everything else is a
 * `DateParseError`.
 */
export function parseDate(input: string): CalendarTime {
  const text = input.trim();

  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, WALL_CLOCK);
    if (parsed.isValid) return fromDateTime(parsed);
  }

  // fromISO also takes bare times ("12:30", "45"); require a calendar date
  if (/^\d{4}-\d{2}-\d{2}T/.test(text)) {
    const iso = DateTime.fromISO(text, { setZone: true });
    if (iso.isValid) return fromDateTime(iso);
  }

  const rfc = DateTime.fromRFC2822(text, { setZone: true });
  if (rfc.isValid) return fromDateTime(rfc);

  throw new DateParseError(input);
}

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

export function toEpochSeconds(t: CalendarTime): number {
  return toDateTime(t).toSeconds();
}

export function addMinutes(t: CalendarTime, minutes: number): CalendarTime {
  return fromDateTime(toDateTime(t).plus({ seconds: Math.round(minutes * 60) }));
}

export function addHours(t: CalendarTime, hours: number): CalendarTime {
  return addMinutes(t, hours * 60);
}

/** Signed difference `b - a`, in seconds. */
export function secondsBetween(a: CalendarTime, b: CalendarTime): number {
  return toDateTime(b).diff(toDateTime(a), 'seconds').seconds;
}

export function minutesBetween(a: CalendarTime, b: CalendarTime): number {
  return toDateTime(b).diff(toDateTime(a), 'minutes').minutes;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** `MM/DD/YYYY` */
export function formatActivityDate(t: CalendarTime): string {
  return toDateTime(t).toFormat('MM/dd/yyyy');
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatCalendarTime(t: CalendarTime): string {
  return toDateTime(t).toFormat('yyyy-MM-dd HH:mm:ss');
}
