const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

export function resolveTimeZone(timeZone?: string): string {
  const tz = timeZone || 'UTC';
  if (isValidTimeZone(tz)) return tz;
  console.warn(`Invalid TIMEZONE "${tz}", falling back to UTC`);
  return 'UTC';
}

function lookupParts(formatter: Intl.DateTimeFormat, date: Date): Record<string, string> {
  return Object.fromEntries(formatter.formatToParts(date).map((part) => [part.type, part.value]));
}

export function getDateParts(date: Date, timeZone: string): DateParts {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  const lookup = lookupParts(formatter, date);
  return {
    year: Number(lookup.year),
    month: Number(lookup.month),
    day: Number(lookup.day),
  };
}

export function formatDateParts(parts: DateParts): string {
  const month = String(parts.month).padStart(2, '0');
  const day = String(parts.day).padStart(2, '0');
  return `${parts.year}-${month}-${day}`;
}

function addDays(parts: DateParts, days: number): DateParts {
  const shifted = new Date(Date.UTC(parts.year, parts.month - 1, parts.day) + days * DAY_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/**
 * Calendar date `daysAgo` days before `now` in the given time zone, as YYYY-MM-DD.
 */
export function getPastDateString(now: Date, timeZone: string, daysAgo: number): string {
  return formatDateParts(addDays(getDateParts(now, timeZone), -daysAgo));
}

export function getYesterdayDateString(now: Date, timeZone: string): string {
  return getPastDateString(now, timeZone, 1);
}

export function getDateString(date: Date, timeZone: string): string {
  return formatDateParts(getDateParts(date, timeZone));
}

function getTimeZoneOffsetMs(instant: number, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
  const lookup = lookupParts(formatter, new Date(instant));
  const asUtc = Date.UTC(
    Number(lookup.year),
    Number(lookup.month) - 1,
    Number(lookup.day),
    Number(lookup.hour),
    Number(lookup.minute),
    Number(lookup.second)
  );
  return asUtc - Math.floor(instant / 1000) * 1000;
}

function startOfDayInZone(parts: DateParts, timeZone: string): number {
  const wallClock = Date.UTC(parts.year, parts.month - 1, parts.day);
  const firstGuess = wallClock - getTimeZoneOffsetMs(wallClock, timeZone);
  return wallClock - getTimeZoneOffsetMs(firstGuess, timeZone);
}

/**
 * UTC instants bounding a calendar day (YYYY-MM-DD) in the given time zone.
 * `end` is the last millisecond of the day.
 */
export function getDayBounds(dateStr: string, timeZone: string): { start: Date; end: Date } {
  const [year, month, day] = dateStr.split('-').map(Number);
  const parts = { year, month, day };
  const start = startOfDayInZone(parts, timeZone);
  const next = startOfDayInZone(addDays(parts, 1), timeZone);
  return { start: new Date(start), end: new Date(next - 1) };
}

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

export function getDaysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

export function getDayOfYear(parts: DateParts): number {
  return Math.floor((Date.UTC(parts.year, parts.month - 1, parts.day) - Date.UTC(parts.year, 0, 1)) / DAY_MS) + 1;
}

/**
 * Wall-clock time (HH:MM, 24h) of a unix timestamp in seconds.
 */
export function formatClockTime(epochSeconds: number, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
  });
  const lookup = lookupParts(formatter, new Date(epochSeconds * 1000));
  return `${lookup.hour}:${lookup.minute}`;
}

/**
 * Localized long date with weekday, e.g. "Monday, October 19, 2026".
 */
export function formatLongDate(date: Date, timeZone: string, locale: string): string {
  return date.toLocaleDateString(locale, {
    timeZone,
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: 'numeric',
  });
}
