/**
 * Repository exports
 */

import type { Database } from '../database';
import { createEmployeeRepository } from './employee.repository';
import { createWeeklyHoursRepository } from './weekly-hours.repository';
import { createTimeStampRepository } from './time-stamp.repository';
import { createAbsenceRepository } from './absence.repository';
import { createNotificationRepository } from './notification.repository';
import { createHolidayRepository } from './holiday.repository';
import { createSettingsRepository } from './settings.repository';

export { createEmployeeRepository } from './employee.repository';
export { createWeeklyHoursRepository } from './weekly-hours.repository';
export { createTimeStampRepository } from './time-stamp.repository';
export { createAbsenceRepository, isAbsenceType } from './absence.repository';
export { createNotificationRepository, isNotificationCode } from './notification.repository';
export { createHolidayRepository } from './holiday.repository';
export {
  createSettingsRepository,
  parseComplianceSettings,
  parseTimezoneSettings,
  DEFAULT_APP_SETTINGS,
  DEFAULT_COMPLIANCE_SETTINGS,
  DEFAULT_TIMEZONE_SETTINGS,
} from './settings.repository';

export interface Repositories {
  employees: ReturnType<typeof createEmployeeRepository>;
  weeklyHours: ReturnType<typeof createWeeklyHoursRepository>;
  stamps: ReturnType<typeof createTimeStampRepository>;
  absences: ReturnType<typeof createAbsenceRepository>;
  notifications: ReturnType<typeof createNotificationRepository>;
  holidays: ReturnType<typeof createHolidayRepository>;
  settings: ReturnType<typeof createSettingsRepository>;
}

/**
 * Every repository bound to one persistence context
 */
export function createRepositories(db: Database): Repositories {
  return {
    employees: createEmployeeRepository(db),
    weeklyHours: createWeeklyHoursRepository(db),
    stamps: createTimeStampRepository(db),
    absences: createAbsenceRepository(db),
    notifications: createNotificationRepository(db),
    holidays: createHolidayRepository(db),
    settings: createSettingsRepository(db),
  };
}
