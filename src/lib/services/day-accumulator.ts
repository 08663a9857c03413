/**
 * Day Accumulator
 * Pairs stamps positionally per date (1st+2nd, 3rd+4th, …) and sums the
 * worked time per date. A stamp without a partner on its date is skipped.
 */

import { compareDateTime } from '../utils/dates';
import { FULL_DEDUCTIONS, calculateInterval } from './interval-calculator';
import type { IntervalOptions, StampPoint, WorkInterval } from './interval-calculator';

export type PairingResult<S extends StampPoint> =
  | { kind: 'pair'; interval: WorkInterval<S> }
  | { kind: 'single'; stamp: S };

export interface DayAccumulation<S extends StampPoint> {
  /** date -> worked seconds, only dates with at least one pair */
  workedByDate: Map<string, number>;
  /** stamps that were part of a successful pair */
  consumed: S[];
  /** stamps left open */
  skipped: S[];
}

export function sortStamps<S extends StampPoint>(stamps: readonly S[]): S[] {
  return [...stamps].sort(compareDateTime);
}

/**
 * Lazily walk stamps in date/time order, yielding pairs and leftover singles
 */
export function* pairStamps<S extends StampPoint>(
  stamps: readonly S[],
  birthDate: string,
  options: IntervalOptions = FULL_DEDUCTIONS
): Generator<PairingResult<S>> {
  const sorted = sortStamps(stamps);
  let index = 0;
  while (index < sorted.length) {
    const first = sorted[index];
    if (first === undefined) break;
    const second = sorted[index + 1];
    if (second !== undefined) {
      const interval = calculateInterval(first, second, birthDate, options);
      if (interval) {
        yield { kind: 'pair', interval };
        index += 2;
        continue;
      }
    }
    yield { kind: 'single', stamp: first };
    index += 1;
  }
}

export function accumulateDays<S extends StampPoint>(
  stamps: readonly S[],
  birthDate: string,
  options: IntervalOptions = FULL_DEDUCTIONS
): DayAccumulation<S> {
  const workedByDate = new Map<string, number>();
  const consumed: S[] = [];
  const skipped: S[] = [];

  for (const result of pairStamps(stamps, birthDate, options)) {
    if (result.kind === 'pair') {
      const { interval } = result;
      workedByDate.set(interval.date, (workedByDate.get(interval.date) ?? 0) + interval.netSeconds);
      consumed.push(interval.start, interval.end);
    } else {
      skipped.push(result.stamp);
    }
  }

  return { workedByDate, consumed, skipped };
}

/**
 * Worked seconds of a single date, zero when nothing pairs
 */
export function workedSecondsOn<S extends StampPoint>(
  stamps: readonly S[],
  date: string,
  birthDate: string,
  options: IntervalOptions = FULL_DEDUCTIONS
): number {
  const sameDay = stamps.filter(stamp => stamp.date === date);
  return accumulateDays(sameDay, birthDate, options).workedByDate.get(date) ?? 0;
}
