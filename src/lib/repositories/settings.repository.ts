/**
 * Settings Repository
 *
 * Key-value storage for application settings. Values are JSON; stored
 * objects are read field by field so a missing or malformed field falls
 * back to its default.
 */

import type { Database } from '../database';
import type { AppSettings, ComplianceSettings, TimezoneSettings } from '../../types/models';
import type { SettingRow } from '../../types/api';
import type { SettingsRepository } from '../../types/services';
import { createLogger } from '../logger';

const log = createLogger('settings');

export const DEFAULT_COMPLIANCE_SETTINGS: ComplianceSettings = {
  holidayCountry: 'DE',
  holidayState: null,
  popupLeadMinutes: 30,
  averageWindowWeeks: 24,
  requireApprovedAbsence: false,
  minimumRegistrationAge: 16,
  defaultGreenThreshold: -5,
  defaultRedThreshold: -10,
};

export const DEFAULT_TIMEZONE_SETTINGS: TimezoneSettings = {
  timezone: 'Europe/Berlin',
  timeFormat: '24h',
};

export const DEFAULT_APP_SETTINGS: AppSettings = {
  compliance: DEFAULT_COMPLIANCE_SETTINGS,
  timezone: DEFAULT_TIMEZONE_SETTINGS,
};

type FieldReader<T> = (value: unknown, fallback: T) => T;

const readNumber: FieldReader<number> = (value, fallback) =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

const readBoolean: FieldReader<boolean> = (value, fallback) =>
  typeof value === 'boolean' ? value : fallback;

const readString: FieldReader<string> = (value, fallback) =>
  typeof value === 'string' && value.length > 0 ? value : fallback;

const readNullableString: FieldReader<string | null> = (value, fallback) =>
  value === null || (typeof value === 'string' && value.length > 0) ? value : fallback;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseComplianceSettings(raw: unknown): ComplianceSettings {
  const d = DEFAULT_COMPLIANCE_SETTINGS;
  if (!isRecord(raw)) return { ...d };
  return {
    holidayCountry: readString(raw['holidayCountry'], d.holidayCountry),
    holidayState: readNullableString(raw['holidayState'], d.holidayState),
    popupLeadMinutes: readNumber(raw['popupLeadMinutes'], d.popupLeadMinutes),
    averageWindowWeeks: readNumber(raw['averageWindowWeeks'], d.averageWindowWeeks),
    requireApprovedAbsence: readBoolean(raw['requireApprovedAbsence'], d.requireApprovedAbsence),
    minimumRegistrationAge: readNumber(raw['minimumRegistrationAge'], d.minimumRegistrationAge),
    defaultGreenThreshold: readNumber(raw['defaultGreenThreshold'], d.defaultGreenThreshold),
    defaultRedThreshold: readNumber(raw['defaultRedThreshold'], d.defaultRedThreshold),
  };
}

export function parseTimezoneSettings(raw: unknown): TimezoneSettings {
  const d = DEFAULT_TIMEZONE_SETTINGS;
  if (!isRecord(raw)) return { ...d };
  const timeFormat = raw['timeFormat'];
  return {
    timezone: readString(raw['timezone'], d.timezone),
    timeFormat: timeFormat === '12h' || timeFormat === '24h' ? timeFormat : d.timeFormat,
  };
}

export function createSettingsRepository(db: Database): SettingsRepository & {
  deleteSetting(key: string): void;
  getAllSettings(): Record<string, string>;
  getTypedSetting<T>(key: string, parse: (raw: unknown) => T): T;
  setTypedSetting(key: string, value: unknown): void;
} {
  function getSetting(key: string): string | null {
    const row = db.selectOne<Pick<SettingRow, 'value'>>('SELECT value FROM settings WHERE key = ?', [key]);
    return row ? row.value : null;
  }

  function setSetting(key: string, value: string): void {
    db.execute(
      `INSERT INTO settings (key, value, updated_at)
       VALUES (?, ?, datetime('now'))
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      [key, value]
    );
  }

  function deleteSetting(key: string): void {
    db.execute('DELETE FROM settings WHERE key = ?', [key]);
  }

  function getAllSettings(): Record<string, string> {
    const settings: Record<string, string> = {};
    for (const row of db.select<Pick<SettingRow, 'key' | 'value'>>('SELECT key, value FROM settings')) {
      settings[row.key] = row.value;
    }
    return settings;
  }

  /**
   * Read a JSON setting through a parser; unparseable JSON yields the parser's defaults
   */
  function getTypedSetting<T>(key: string, parse: (raw: unknown) => T): T {
    const value = getSetting(key);
    if (value === null) {
      return parse(undefined);
    }
    try {
      return parse(JSON.parse(value));
    } catch (error) {
      log.warn(`Ignoring malformed setting "${key}"`, error);
      return parse(undefined);
    }
  }

  function setTypedSetting(key: string, value: unknown): void {
    setSetting(key, JSON.stringify(value));
  }

  function getAppSettings(): AppSettings {
    return {
      compliance: getTypedSetting('compliance', parseComplianceSettings),
      timezone: getTypedSetting('timezone', parseTimezoneSettings),
    };
  }

  /**
   * Update app settings (partial update)
   */
  function updateAppSettings(settings: Partial<AppSettings>): AppSettings {
    db.transaction(() => {
      if (settings.compliance !== undefined) {
        setTypedSetting('compliance', parseComplianceSettings(settings.compliance));
      }
      if (settings.timezone !== undefined) {
        setTypedSetting('timezone', parseTimezoneSettings(settings.timezone));
      }
    });
    return getAppSettings();
  }

  function resetToDefaults(): AppSettings {
    db.transaction(() => {
      setTypedSetting('compliance', DEFAULT_APP_SETTINGS.compliance);
      setTypedSetting('timezone', DEFAULT_APP_SETTINGS.timezone);
    });
    return getAppSettings();
  }

  return {
    getSetting,
    setSetting,
    deleteSetting,
    getAllSettings,
    getTypedSetting,
    setTypedSetting,
    getAppSettings,
    updateAppSettings,
    resetToDefaults,
  };
}
