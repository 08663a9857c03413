/**
 * Tests for Settings Repository
 * Stored settings survive a reload and malformed values fall back to defaults.
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { initTestDatabase, closeTestDatabase, resetTestDatabase } from '../test-utils';
import {
  createSettingsRepository,
  DEFAULT_APP_SETTINGS,
  DEFAULT_COMPLIANCE_SETTINGS,
  parseComplianceSettings,
} from './settings.repository';

const db = initTestDatabase();
const settings = createSettingsRepository(db);

describe('Settings Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('returns defaults when nothing is stored', () => {
    expect(settings.getAppSettings()).toEqual(DEFAULT_APP_SETTINGS);
  });

  it('stores and overwrites raw values', () => {
    settings.setSetting('theme', 'dark');
    settings.setSetting('theme', 'light');
    expect(settings.getSetting('theme')).toBe('light');
    expect(settings.getAllSettings()).toEqual({ theme: 'light' });

    settings.deleteSetting('theme');
    expect(settings.getSetting('theme')).toBeNull();
  });

  it('applies partial updates', () => {
    const updated = settings.updateAppSettings({
      compliance: { ...DEFAULT_COMPLIANCE_SETTINGS, holidayState: 'BY', popupLeadMinutes: 15 },
    });

    expect(updated.compliance.holidayState).toBe('BY');
    expect(updated.compliance.popupLeadMinutes).toBe(15);
    expect(updated.timezone).toEqual(DEFAULT_APP_SETTINGS.timezone);
  });

  it('falls back to defaults for malformed JSON', () => {
    settings.setSetting('compliance', '{not json');
    expect(settings.getAppSettings().compliance).toEqual(DEFAULT_COMPLIANCE_SETTINGS);
  });

  it('falls back per field for values of the wrong type', () => {
    settings.setSetting('compliance', JSON.stringify({ popupLeadMinutes: 'soon', averageWindowWeeks: 12 }));

    const compliance = settings.getAppSettings().compliance;

    expect(compliance.popupLeadMinutes).toBe(30);
    expect(compliance.averageWindowWeeks).toBe(12);
  });

  it('restores defaults', () => {
    settings.updateAppSettings({ timezone: { timezone: 'UTC', timeFormat: '12h' } });
    expect(settings.resetToDefaults()).toEqual(DEFAULT_APP_SETTINGS);
  });

  it('property: any valid compliance settings round-trip', () => {
    const complianceArb = fc.record({
      holidayCountry: fc.constantFrom('DE', 'AT', 'CH'),
      holidayState: fc.option(fc.constantFrom('BY', 'BE', 'NW'), { nil: null }),
      popupLeadMinutes: fc.integer({ min: 1, max: 120 }),
      averageWindowWeeks: fc.integer({ min: 1, max: 52 }),
      requireApprovedAbsence: fc.boolean(),
      minimumRegistrationAge: fc.integer({ min: 14, max: 18 }),
      defaultGreenThreshold: fc.integer({ min: -5, max: 10 }),
      defaultRedThreshold: fc.integer({ min: -40, max: -6 }),
    });

    fc.assert(
      fc.property(complianceArb, compliance => {
        settings.updateAppSettings({ compliance });
        expect(settings.getAppSettings().compliance).toEqual(compliance);
        expect(parseComplianceSettings(compliance)).toEqual(compliance);
      }),
      { numRuns: 50 }
    );
  });
});
