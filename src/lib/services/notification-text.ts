/**
 * Human-readable texts for notification codes
 */

import { NotificationCodes } from '../../types';
import type { Notification, NotificationCode, RenderedNotification } from '../../types';
import { formatDisplayDate } from '../utils/dates';

const TEMPLATES: Record<NotificationCode, (date: string) => string> = {
  [NotificationCodes.MISSING_WORKDAY]: date =>
    `No time was recorded on ${date}. The daily target has been deducted from your flex-time balance.`,
  [NotificationCodes.ODD_STAMP_COUNT]: date =>
    `A stamp is missing on ${date}. Please add the missing clock-in or clock-out.`,
  [NotificationCodes.REST_PERIOD]: date =>
    `The statutory rest period before ${date} was not observed.`,
  [NotificationCodes.SIX_MONTH_AVERAGE]: () =>
    'Your average daily working time over the last six months exceeds 8 hours.',
  [NotificationCodes.DAILY_MAXIMUM]: date =>
    `The maximum daily working time was exceeded on ${date}.`,
  [NotificationCodes.SUNDAY_HOLIDAY_WORK]: date =>
    `Work was recorded on ${date}, which is a Sunday or public holiday.`,
  [NotificationCodes.MINOR_WEEKLY_HOURS]: date =>
    `In the week starting ${date} the 40-hour weekly limit for minors was exceeded.`,
  [NotificationCodes.MINOR_WORKDAYS]: date =>
    `In the week starting ${date} work was recorded on more than 5 days.`,
  [NotificationCodes.WORK_WINDOW_END]: () =>
    'Your permitted working window ends soon. Please plan to clock out.',
  [NotificationCodes.MAX_HOURS_WARNING]: () =>
    'You will soon reach the maximum daily working time. Please plan to clock out.',
};

export function getNotificationText(code: NotificationCode, date: string): string {
  return TEMPLATES[code](formatDisplayDate(date));
}

export function renderNotification(notification: Notification): RenderedNotification {
  return {
    id: notification.id,
    code: notification.code,
    date: notification.date,
    message: getNotificationText(notification.code, notification.date),
  };
}
