/**
 * Timezone-aware clocks and time display
 *
 * Stamps are stored as wall-clock date and time in the configured timezone,
 * so "now" is read through Intl in that zone rather than from the host.
 */

import type { Clock, LocalDateTime } from '../../types/services';
import type { TimezoneSettings } from '../../types/models';
import { normalizeTime } from './dates';

export const DEFAULT_TIMEZONE = 'Europe/Berlin';

/** Common timezone list for settings screens */
export const TIMEZONE_OPTIONS = [
  { value: 'Europe/Berlin', label: '(UTC+1) Berlin' },
  { value: 'Europe/Vienna', label: '(UTC+1) Vienna' },
  { value: 'Europe/Zurich', label: '(UTC+1) Zurich' },
  { value: 'Europe/London', label: '(UTC+0) London' },
  { value: 'UTC', label: '(UTC+0) UTC' },
];

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock date and time of an instant in the given timezone
 */
export function toLocalDateTime(instant: Date, timezone: string): LocalDateTime {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  return {
    date: `${parts['year']}-${parts['month']}-${parts['day']}`,
    time: `${parts['hour']}:${parts['minute']}:${parts['second']}`,
  };
}

export function createSystemClock(timezone: string = DEFAULT_TIMEZONE): Clock {
  return {
    now: () => toLocalDateTime(new Date(), timezone),
  };
}

/**
 * Clock frozen at a given date and time (HH:mm or HH:mm:ss)
 */
export function createFixedClock(date: string, time: string): Clock {
  const normalized = normalizeTime(time) ?? '00:00:00';
  return {
    now: () => ({ date, time: normalized }),
  };
}

/**
 * Format a stored HH:mm:ss time for display
 */
export function formatTime(
  time: string | null,
  tzSettings: TimezoneSettings,
  options: { seconds?: boolean } = {}
): string {
  if (!time) return '';
  const normalized = normalizeTime(time);
  if (!normalized) return '';

  const [hh = '00', mm = '00', ss = '00'] = normalized.split(':');
  if (tzSettings.timeFormat === '12h') {
    const h = Number(hh);
    const period = h >= 12 ? 'PM' : 'AM';
    const h12 = h % 12 || 12;
    return options.seconds ? `${h12}:${mm}:${ss} ${period}` : `${h12}:${mm} ${period}`;
  }
  return options.seconds ? normalized : `${hh}:${mm}`;
}
