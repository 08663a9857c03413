/**
 * Popup Scheduler
 *
 * Pre-computes future-dated popup notifications while an employee is
 * clocked in. An external timer polls duePopups() and dismisses each
 * popup once shown; clocking out clears the day's popups.
 */

import type { Employee, Notification, NotificationCode } from '../../types';
import { NotificationCodes } from '../../types';
import { ErrorCodes } from '../../types/api';
import type { LocalDateTime, NotificationRepository, TimeStampRepository } from '../../types/services';
import { CoreError } from '../errors';
import { createLogger } from '../logger';
import {
  SECONDS_PER_DAY,
  SECONDS_PER_MINUTE,
  formatSecondsAsTime,
  isMinorOn,
  parseTimeToSeconds,
} from '../utils/dates';
import { pairStamps } from './day-accumulator';
import { RAW_DURATION, getWorkWindow, legalBreakSeconds } from './interval-calculator';
import { dailyMaximumSeconds } from './compliance-monitor';

const log = createLogger('popup-scheduler');

export interface PopupSchedulerDeps {
  stamps: TimeStampRepository;
  notifications: NotificationRepository;
  leadMinutes: number;
}

/**
 * Longest stamped span per day: the daily maximum plus the break it requires
 * (9h for minors, 10h45 for adults)
 */
export function maximumRawDailySeconds(minor: boolean): number {
  const maximum = dailyMaximumSeconds(minor);
  return maximum + legalBreakSeconds(maximum, minor);
}

export class PopupScheduler {
  constructor(private readonly deps: PopupSchedulerDeps) {}

  isClockedIn(employeeId: string, date: string): boolean {
    return this.deps.stamps.listStampsForDate(employeeId, date).length % 2 === 1;
  }

  /**
   * Create the window-end and max-hours popups for today. Returns the popups created.
   */
  scheduleWarnings(employee: Employee, now: LocalDateTime): Notification[] {
    const { stamps, notifications, leadMinutes } = this.deps;
    const dayStamps = stamps.listStampsForDate(employee.id, now.date);
    const clockIn = dayStamps.at(-1);
    if (dayStamps.length % 2 === 0 || !clockIn) {
      return [];
    }

    const minor = isMinorOn(employee.birthDate, now.date);
    const nowSeconds = parseTimeToSeconds(now.time);
    const lead = leadMinutes * SECONDS_PER_MINUTE;
    const candidates: { code: NotificationCode; at: number }[] = [];

    candidates.push({
      code: NotificationCodes.WORK_WINDOW_END,
      at: getWorkWindow(minor).endSeconds - lead,
    });

    let workedSeconds = 0;
    for (const result of pairStamps(dayStamps, employee.birthDate, RAW_DURATION)) {
      if (result.kind === 'pair') workedSeconds += result.interval.netSeconds;
    }
    const remaining = maximumRawDailySeconds(minor) - lead - workedSeconds;
    if (remaining > 0) {
      candidates.push({
        code: NotificationCodes.MAX_HOURS_WARNING,
        at: parseTimeToSeconds(clockIn.time) + remaining,
      });
    }

    const created: Notification[] = [];
    for (const candidate of candidates) {
      if (candidate.at <= nowSeconds || candidate.at >= SECONDS_PER_DAY) continue;
      const popupTime = formatSecondsAsTime(candidate.at);
      const added = notifications.addNotification({
        employeeId: employee.id,
        code: candidate.code,
        date: now.date,
        isPopup: true,
        popupTime,
      });
      const popup = added ? notifications.findNotification(employee.id, candidate.code, now.date) : null;
      if (popup) {
        log.debug(`Scheduled popup ${candidate.code} at ${popupTime} for ${employee.id}`);
        created.push(popup);
      }
    }
    return created;
  }

  clearWarnings(employeeId: string, date: string): number {
    return this.deps.notifications.deletePopupsForDate(employeeId, date);
  }

  /**
   * Popups scheduled for later today
   */
  pendingPopups(employeeId: string, now: LocalDateTime): Notification[] {
    return this.deps.notifications
      .listPopupsForDate(employeeId, now.date)
      .filter(popup => popup.popupTime !== null && popup.popupTime > now.time);
  }

  /**
   * Popups whose time has come and that have not been dismissed yet
   */
  duePopups(employeeId: string, now: LocalDateTime): Notification[] {
    return this.deps.notifications
      .listPopupsForDate(employeeId, now.date)
      .filter(popup => popup.popupTime !== null && popup.popupTime <= now.time);
  }

  /**
   * Delete a popup once it has been displayed
   */
  dismissPopup(employeeId: string, notificationId: string): void {
    const popup = this.deps.notifications.getNotification(notificationId);
    if (!popup || !popup.isPopup) {
      throw new CoreError(ErrorCodes.NOT_FOUND, 'Popup not found', { notificationId });
    }
    if (popup.employeeId !== employeeId) {
      throw new CoreError(ErrorCodes.FORBIDDEN, 'The popup belongs to another employee', { notificationId });
    }
    this.deps.notifications.deleteNotification(notificationId);
  }
}
