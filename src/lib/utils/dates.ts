/**
 * Calendar helpers over YYYY-MM-DD date strings and HH:mm:ss time strings.
 *
 * Arithmetic runs on UTC midnight so the host timezone (and DST changes)
 * can never shift a calendar date.
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86_400;

const MS_PER_DAY = SECONDS_PER_DAY * 1000;
const WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

// ============================================================================
// Dates
// ============================================================================

function toUtcDate(date: string): Date {
  const [year = 1970, month = 1, day = 1] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Format a Date object to YYYY-MM-DD using its UTC components
 */
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, '0');
  const month = (date.getUTCMonth() + 1).toString().padStart(2, '0');
  const day = date.getUTCDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function isValidDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  // Rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  return formatDate(toUtcDate(value)) === value;
}

export function addDays(date: string, days: number): string {
  return formatDate(new Date(toUtcDate(date).getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function diffInDays(from: string, to: string): number {
  return Math.round((toUtcDate(to).getTime() - toUtcDate(from).getTime()) / MS_PER_DAY);
}

/** 0 = Sunday … 6 = Saturday */
export function getDayOfWeek(date: string): number {
  return toUtcDate(date).getUTCDay();
}

export function getWeekdayName(date: string): string {
  return WEEKDAY_NAMES[getDayOfWeek(date)] ?? '';
}

/**
 * Monday to Friday
 */
export function isWeekday(date: string): boolean {
  const day = getDayOfWeek(date);
  return day >= 1 && day <= 5;
}

export function isSunday(date: string): boolean {
  return getDayOfWeek(date) === 0;
}

/**
 * Get the Monday of the ISO week containing the given date
 */
export function getWeekStart(date: string): string {
  const day = getDayOfWeek(date);
  return addDays(date, day === 0 ? -6 : 1 - day);
}

export function getWeekEnd(date: string): string {
  return addDays(getWeekStart(date), 6);
}

/**
 * Every date from start to end, both inclusive. Empty when start > end.
 */
export function eachDay(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  for (let current = startDate; current <= endDate; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

export function startOfMonth(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

export function startOfQuarter(date: string): string {
  const month = Number(date.slice(5, 7));
  const quarterMonth = Math.floor((month - 1) / 3) * 3 + 1;
  return `${date.slice(0, 4)}-${quarterMonth.toString().padStart(2, '0')}-01`;
}

export function startOfYear(date: string): string {
  return `${date.slice(0, 4)}-01-01`;
}

export function getMonthDates(year: number, month: number): string[] {
  const first = `${year.toString().padStart(4, '0')}-${month.toString().padStart(2, '0')}-01`;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return eachDay(first, addDays(first, lastDay - 1));
}

/**
 * DD.MM.YYYY for notification texts
 */
export function formatDisplayDate(date: string): string {
  const [year, month, day] = date.split('-');
  return `${day}.${month}.${year}`;
}

// ============================================================================
// Times
// ============================================================================

/**
 * Accepts HH:mm or HH:mm:ss
 */
export function isValidTime(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/**
 * Normalize HH:mm to HH:mm:ss. Returns null for anything else.
 */
export function normalizeTime(value: string): string | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  return `${match[1]}:${match[2]}:${match[3] ?? '00'}`;
}

/**
 * Parse HH:mm or HH:mm:ss into seconds since midnight
 */
export function parseTimeToSeconds(time: string): number {
  const [hours = 0, minutes = 0, seconds = 0] = time.split(':').map(Number);
  return hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds;
}

/**
 * Seconds since midnight to HH:mm:ss
 */
export function formatSecondsAsTime(totalSeconds: number): string {
  const clamped = Math.max(0, Math.min(SECONDS_PER_DAY - 1, Math.floor(totalSeconds)));
  const hours = Math.floor(clamped / SECONDS_PER_HOUR);
  const minutes = Math.floor((clamped % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const seconds = clamped % SECONDS_PER_MINUTE;
  return [hours, minutes, seconds].map(part => part.toString().padStart(2, '0')).join(':');
}

export function secondsToHours(seconds: number): number {
  return seconds / SECONDS_PER_HOUR;
}

export function hoursToSeconds(hours: number): number {
  return Math.round(hours * SECONDS_PER_HOUR);
}

export function roundHours(hours: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(hours * factor) / factor;
}

/**
 * Compare two (date, time) points; negative when a is earlier
 */
export function compareDateTime(a: { date: string; time: string }, b: { date: string; time: string }): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return parseTimeToSeconds(a.time) - parseTimeToSeconds(b.time);
}

// ============================================================================
// Age
// ============================================================================

/**
 * Completed years of age on the given date
 */
export function ageOn(birthDate: string, date: string): number {
  const [birthYear = 0, birthMonth = 0, birthDay = 0] = birthDate.split('-').map(Number);
  const [year = 0, month = 0, day = 0] = date.split('-').map(Number);
  const hadBirthday = month > birthMonth || (month === birthMonth && day >= birthDay);
  return year - birthYear - (hadBirthday ? 0 : 1);
}

export const ADULT_AGE = 18;

export function isMinorOn(birthDate: string, date: string): boolean {
  return ageOn(birthDate, date) < ADULT_AGE;
}
