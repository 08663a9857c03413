/**
 * Interval Calculator
 *
 * Turns two stamps of the same day into a work interval and applies the
 * statutory break deduction and the work-window clipping.
 *
 * Breaks:  minor  >= 6h -> 60 min, >= 4.5h -> 30 min
 *          adult  >= 9h -> 45 min, >= 6h   -> 30 min
 * Window:  06:00-20:00 for minors, 06:00-22:00 for adults
 */

import {
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
  isMinorOn,
  parseTimeToSeconds,
} from '../utils/dates';
import { createLogger } from '../logger';

const log = createLogger('interval-calculator');

export const WORK_WINDOW_START = 6 * SECONDS_PER_HOUR;
export const ADULT_WORK_WINDOW_END = 22 * SECONDS_PER_HOUR;
export const MINOR_WORK_WINDOW_END = 20 * SECONDS_PER_HOUR;

/** Anything with a calendar date and a time-of-day */
export interface StampPoint {
  date: string;
  time: string;
}

export interface IntervalOptions {
  breaks?: boolean;
  window?: boolean;
}

export const FULL_DEDUCTIONS: Required<IntervalOptions> = { breaks: true, window: true };
export const BREAKS_ONLY: Required<IntervalOptions> = { breaks: true, window: false };
export const RAW_DURATION: Required<IntervalOptions> = { breaks: false, window: false };

export interface WorkInterval<S extends StampPoint = StampPoint> {
  date: string;
  start: S;
  end: S;
  minor: boolean;
  grossSeconds: number;
  breakSeconds: number;
  outsideWindowSeconds: number;
  /** Gross minus the requested deductions, never negative */
  netSeconds: number;
}

export interface WorkWindow {
  startSeconds: number;
  endSeconds: number;
}

export function getWorkWindow(minor: boolean): WorkWindow {
  return {
    startSeconds: WORK_WINDOW_START,
    endSeconds: minor ? MINOR_WORK_WINDOW_END : ADULT_WORK_WINDOW_END,
  };
}

/**
 * Statutory break for one continuous interval
 */
export function legalBreakSeconds(grossSeconds: number, minor: boolean): number {
  const hours = grossSeconds / SECONDS_PER_HOUR;
  if (minor) {
    if (hours >= 6) return 60 * SECONDS_PER_MINUTE;
    if (hours >= 4.5) return 30 * SECONDS_PER_MINUTE;
    return 0;
  }
  if (hours >= 9) return 45 * SECONDS_PER_MINUTE;
  if (hours >= 6) return 30 * SECONDS_PER_MINUTE;
  return 0;
}

/**
 * Part of [start, end] that lies in [00:00, 06:00) or [windowEnd, 24:00)
 */
export function outsideWindowSeconds(startSeconds: number, endSeconds: number, minor: boolean): number {
  if (endSeconds <= startSeconds) return 0;
  const window = getWorkWindow(minor);
  const early = Math.max(0, Math.min(endSeconds, window.startSeconds) - startSeconds);
  const late = Math.max(0, Math.min(endSeconds, SECONDS_PER_DAY) - Math.max(startSeconds, window.endSeconds));
  return early + late;
}

/**
 * True when a single stamp lies outside the work window of the employee
 */
export function isOutsideWorkWindow(time: string, minor: boolean): boolean {
  const seconds = parseTimeToSeconds(time);
  const window = getWorkWindow(minor);
  return seconds < window.startSeconds || seconds > window.endSeconds;
}

/**
 * Build the work interval between two stamps.
 * Returns null when the stamps fall on different dates.
 * An end before the start is a data error and yields a zero-length interval.
 */
export function calculateInterval<S extends StampPoint>(
  start: S,
  end: S,
  birthDate: string,
  options: IntervalOptions = FULL_DEDUCTIONS
): WorkInterval<S> | null {
  if (start.date !== end.date) {
    return null;
  }

  const minor = isMinorOn(birthDate, start.date);
  const startSeconds = parseTimeToSeconds(start.time);
  const endSeconds = parseTimeToSeconds(end.time);

  if (endSeconds < startSeconds) {
    log.warn(`Interval on ${start.date} ends before it starts (${start.time} > ${end.time}), counting zero`);
    return {
      date: start.date,
      start,
      end,
      minor,
      grossSeconds: 0,
      breakSeconds: 0,
      outsideWindowSeconds: 0,
      netSeconds: 0,
    };
  }

  const grossSeconds = endSeconds - startSeconds;
  const breakSeconds = options.breaks ? legalBreakSeconds(grossSeconds, minor) : 0;
  const clippedSeconds = options.window ? outsideWindowSeconds(startSeconds, endSeconds, minor) : 0;

  return {
    date: start.date,
    start,
    end,
    minor,
    grossSeconds,
    breakSeconds,
    outsideWindowSeconds: clippedSeconds,
    netSeconds: Math.max(0, grossSeconds - breakSeconds - clippedSeconds),
  };
}
