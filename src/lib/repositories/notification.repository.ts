/**
 * Notification Repository
 *
 * At most one row per (employee, code, date). addNotification reports
 * whether a row was written instead of raising on the duplicate.
 */

import type { Database } from '../database';
import { NotificationCodes } from '../../types';
import type { Notification, NotificationCode, CreateNotificationInput } from '../../types';
import type { NotificationRow } from '../../types/api';
import type { NotificationListOptions, NotificationRepository } from '../../types/services';
import { generateId, now, placeholders, toFlag } from './helpers';

const NOTIFICATION_CODES: readonly NotificationCode[] = Object.values(NotificationCodes);

export function isNotificationCode(value: number): value is NotificationCode {
  return NOTIFICATION_CODES.some(code => code === value);
}

function mapRowToNotification(row: NotificationRow): Notification | null {
  if (!isNotificationCode(row.code)) {
    return null;
  }
  return {
    id: row.id,
    employeeId: row.employee_id,
    code: row.code,
    date: row.date,
    isPopup: row.is_popup === 1,
    popupTime: row.popup_time,
    createdAt: row.created_at,
  };
}

function mapRows(rows: NotificationRow[]): Notification[] {
  const notifications: Notification[] = [];
  for (const row of rows) {
    const notification = mapRowToNotification(row);
    if (notification) notifications.push(notification);
  }
  return notifications;
}

export function createNotificationRepository(db: Database): NotificationRepository {
  function addNotification(input: CreateNotificationInput): boolean {
    const result = db.execute(
      `INSERT INTO notifications (id, employee_id, code, date, is_popup, popup_time, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(employee_id, code, date) DO NOTHING`,
      [
        generateId(),
        input.employeeId,
        input.code,
        input.date,
        toFlag(input.isPopup ?? false),
        input.popupTime ?? null,
        now(),
      ]
    );
    return result.rowsAffected > 0;
  }

  function getNotification(id: string): Notification | null {
    const row = db.selectOne<NotificationRow>('SELECT * FROM notifications WHERE id = ?', [id]);
    return row ? mapRowToNotification(row) : null;
  }

  function findNotification(employeeId: string, code: NotificationCode, date: string): Notification | null {
    const row = db.selectOne<NotificationRow>(
      'SELECT * FROM notifications WHERE employee_id = ? AND code = ? AND date = ?',
      [employeeId, code, date]
    );
    return row ? mapRowToNotification(row) : null;
  }

  function listNotifications(employeeId: string, options: NotificationListOptions = {}): Notification[] {
    const includeRegular = options.includeRegular ?? true;
    const includePopups = options.includePopups ?? false;
    if (!includeRegular && !includePopups) return [];

    let query = 'SELECT * FROM notifications WHERE employee_id = ?';
    if (!includePopups) query += ' AND is_popup = 0';
    if (!includeRegular) query += ' AND is_popup = 1';
    query += ' ORDER BY date ASC, code ASC';
    return mapRows(db.select<NotificationRow>(query, [employeeId]));
  }

  function listNotificationsByCodes(employeeId: string, codes: NotificationCode[]): Notification[] {
    if (codes.length === 0) return [];
    return mapRows(
      db.select<NotificationRow>(
        `SELECT * FROM notifications WHERE employee_id = ? AND code IN (${placeholders(codes.length)})
         ORDER BY date ASC, code ASC`,
        [employeeId, ...codes]
      )
    );
  }

  function listPopupsForDate(employeeId: string, date: string): Notification[] {
    return mapRows(
      db.select<NotificationRow>(
        `SELECT * FROM notifications WHERE employee_id = ? AND date = ? AND is_popup = 1
         ORDER BY popup_time ASC`,
        [employeeId, date]
      )
    );
  }

  function deleteNotification(id: string): boolean {
    return db.execute('DELETE FROM notifications WHERE id = ?', [id]).rowsAffected > 0;
  }

  function deleteNotificationFor(employeeId: string, code: NotificationCode, date: string): boolean {
    return db.execute(
      'DELETE FROM notifications WHERE employee_id = ? AND code = ? AND date = ?',
      [employeeId, code, date]
    ).rowsAffected > 0;
  }

  function deletePopupsForDate(employeeId: string, date: string): number {
    return db.execute(
      'DELETE FROM notifications WHERE employee_id = ? AND date = ? AND is_popup = 1',
      [employeeId, date]
    ).rowsAffected;
  }

  return {
    addNotification,
    getNotification,
    findNotification,
    listNotifications,
    listNotificationsByCodes,
    listPopupsForDate,
    deleteNotification,
    deleteNotificationFor,
    deletePopupsForDate,
  };
}
