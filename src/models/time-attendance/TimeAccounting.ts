import { ValidationError } from '../../utils/errors';
import { RuleViolationError } from '../../utils/timesheetErrors';

/**
 * Calendar date in canonical `YYYY-MM-DD` form, interpreted in UTC.
 * Lexicographic order matches chronological order.
 */
export type CalendarDate = string;

export interface DateRange {
  startDate: CalendarDate;
  endDate: CalendarDate;
}

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const HUNDREDTHS_PER_HOUR = 100;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function toUtcMillis(date: CalendarDate): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

function fromUtcMillis(millis: number): CalendarDate {
  return new Date(millis).toISOString().slice(0, 10);
}

export function parseCalendarDate(value: string | Date): CalendarDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError('Invalid date', { value: String(value) });
    }
    return fromUtcMillis(value.getTime());
  }

  const trimmed = value.trim();
  const match = ISO_DATE_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`Invalid calendar date: ${value}`, { value });
  }

  const [, year, month, day] = match;
  const parsed = new Date(toUtcMillis(trimmed));
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.getUTCFullYear() !== Number(year) ||
    parsed.getUTCMonth() + 1 !== Number(month) ||
    parsed.getUTCDate() !== Number(day)
  ) {
    throw new ValidationError(`Invalid calendar date: ${value}`, { value });
  }

  return trimmed;
}

/**
 * Calendar date of an instant as observed in the given IANA time zone.
 */
export function toCalendarDate(instant: Date, timeZone: string = 'UTC'): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(candidate => candidate.type === type)?.value ?? '';

  return parseCalendarDate(`${part('year')}-${part('month')}-${part('day')}`);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMillis(toUtcMillis(date) + days * MS_PER_DAY);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function createDateRange(startDate: string | Date, endDate: string | Date): DateRange {
  const start = parseCalendarDate(startDate);
  const end = parseCalendarDate(endDate);

  if (compareDates(end, start) < 0) {
    throw new RuleViolationError([{ code: 'INVALID_RANGE', startDate: start, endDate: end }]);
  }

  return { startDate: start, endDate: end };
}

export function overlaps(a: DateRange, b: DateRange): boolean {
  return a.startDate <= b.endDate && b.startDate <= a.endDate;
}

export function containsDate(range: DateRange, date: CalendarDate): boolean {
  return range.startDate <= date && date <= range.endDate;
}

export function daysInRange(range: DateRange): number {
  return Math.round((toUtcMillis(range.endDate) - toUtcMillis(range.startDate)) / MS_PER_DAY) + 1;
}

export function eachDateInRange(range: DateRange): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let current = range.startDate; current <= range.endDate; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/**
 * Converts an hour value to integer hundredths. Sums are done on these so
 * repeated addition never drifts.
 */
export function toHundredths(hours: number, subTaskIndex?: number): number {
  if (!Number.isFinite(hours)) {
    throw new RuleViolationError([{ code: 'INVALID_HOURS', hours, reason: 'OUT_OF_RANGE', subTaskIndex }]);
  }
  if (hours < 0) {
    throw new RuleViolationError([{ code: 'INVALID_HOURS', hours, reason: 'NEGATIVE', subTaskIndex }]);
  }

  const scaled = Math.round(hours * HUNDREDTHS_PER_HOUR);
  if (Math.abs(scaled - hours * HUNDREDTHS_PER_HOUR) > 1e-6) {
    throw new RuleViolationError([{ code: 'INVALID_HOURS', hours, reason: 'PRECISION', subTaskIndex }]);
  }

  return scaled;
}

export function fromHundredths(hundredths: number): number {
  return hundredths / HUNDREDTHS_PER_HOUR;
}

export function totalHours(entries: ReadonlyArray<{ hours: number }>): number {
  const hundredths = entries.reduce((sum, entry) => sum + toHundredths(entry.hours), 0);
  return fromHundredths(hundredths);
}

export const DATE_PRESETS = [
  'today',
  'yesterday',
  'this_week',
  'current_week',
  'last_week',
  'this_month',
  'last_month',
  'this_year',
  'last_year'
] as const;

export type DatePreset = typeof DATE_PRESETS[number];

function startOfWeek(date: CalendarDate): CalendarDate {
  // Weeks run Monday to Sunday
  const weekday = new Date(toUtcMillis(date)).getUTCDay();
  return addDays(date, -((weekday + 6) % 7));
}

function startOfMonth(date: CalendarDate): CalendarDate {
  return `${date.slice(0, 7)}-01`;
}

function startOfNextMonth(date: CalendarDate): CalendarDate {
  const year = Number(date.slice(0, 4));
  const month = Number(date.slice(5, 7));
  return month === 12
    ? `${year + 1}-01-01`
    : `${year}-${String(month + 1).padStart(2, '0')}-01`;
}

export function resolveDatePreset(preset: DatePreset, today: CalendarDate): DateRange {
  switch (preset) {
    case 'today':
      return { startDate: today, endDate: today };
    case 'yesterday': {
      const yesterday = addDays(today, -1);
      return { startDate: yesterday, endDate: yesterday };
    }
    case 'this_week':
    case 'current_week': {
      const start = startOfWeek(today);
      return { startDate: start, endDate: addDays(start, 6) };
    }
    case 'last_week': {
      const start = addDays(startOfWeek(today), -7);
      return { startDate: start, endDate: addDays(start, 6) };
    }
    case 'this_month':
      return { startDate: startOfMonth(today), endDate: addDays(startOfNextMonth(today), -1) };
    case 'last_month': {
      const end = addDays(startOfMonth(today), -1);
      return { startDate: startOfMonth(end), endDate: end };
    }
    case 'this_year': {
      const year = today.slice(0, 4);
      return { startDate: `${year}-01-01`, endDate: `${year}-12-31` };
    }
    case 'last_year': {
      const year = Number(today.slice(0, 4)) - 1;
      return { startDate: `${year}-01-01`, endDate: `${year}-12-31` };
    }
    default: {
      const unreachable: never = preset;
      throw new ValidationError(`Unknown date preset: ${String(unreachable)}`);
    }
  }
}
