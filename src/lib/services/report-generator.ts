/**
 * Report Generator
 * Per-day flex-time report for one employee with CSV and Excel export
 */

import ExcelJS from 'exceljs';
import type { Employee, ExportSettings, FlexReport, FlexReportRow, NotificationCode } from '../../types';
import type { AbsenceRepository, NotificationRepository, TimeStampRepository } from '../../types/services';
import { ErrorCodes } from '../../types/api';
import { CoreError } from '../errors';
import { eachDay, getWeekdayName, isValidDate, isWeekday, roundHours, secondsToHours } from '../utils/dates';
import { accumulateDays } from './day-accumulator';
import type { QuotaResolver } from './quota-resolver';

export const DEFAULT_EXPORT_SETTINGS: ExportSettings = {
  colors: {
    positive: '#C6EFCE',
    negative: '#FFC7CE',
    absence: '#FFFFCC',
    weekend: '#D9E1F2',
    header: '#4472C4',
  },
};

export interface ReportGeneratorDeps {
  stamps: TimeStampRepository;
  absences: AbsenceRepository;
  notifications: NotificationRepository;
  quota: QuotaResolver;
}

export class ReportGenerator {
  constructor(private readonly deps: ReportGeneratorDeps) {}

  /**
   * One row per calendar day of [startDate, endDate]
   */
  generateFlexReport(employee: Employee, startDate: string, endDate: string): FlexReport {
    if (!isValidDate(startDate) || !isValidDate(endDate)) {
      throw new CoreError(ErrorCodes.INVALID_DATE, 'Start and end must be dates in YYYY-MM-DD format');
    }
    if (startDate > endDate) {
      throw new CoreError(ErrorCodes.INVALID_DATE_RANGE, 'The start date must not be after the end date');
    }

    const { stamps, absences, notifications, quota } = this.deps;
    const rangeStamps = stamps.listStampsInRange(employee.id, startDate, endDate);
    const { workedByDate } = accumulateDays(rangeStamps, employee.birthDate);

    const absenceByDate = new Map(
      absences.listAbsencesInRange(employee.id, startDate, endDate).map(absence => [absence.date, absence.type])
    );
    const codesByDate = new Map<string, NotificationCode[]>();
    for (const notification of notifications.listNotifications(employee.id)) {
      if (notification.date < startDate || notification.date > endDate) continue;
      codesByDate.set(notification.date, [...(codesByDate.get(notification.date) ?? []), notification.code]);
    }

    const rows: FlexReportRow[] = eachDay(startDate, endDate).map(date => {
      const workedSeconds = workedByDate.get(date) ?? 0;
      const absence = absenceByDate.get(date) ?? null;
      const dayStamps = rangeStamps.filter(stamp => stamp.date === date);
      const targetSeconds = absence === null ? quota.chargedTargetSeconds(employee, date, dayStamps.length > 0) : 0;
      return {
        date,
        weekday: getWeekdayName(date),
        stamps: dayStamps.map(stamp => stamp.time.slice(0, 5)),
        workedHours: roundHours(secondsToHours(workedSeconds)),
        targetHours: roundHours(secondsToHours(targetSeconds)),
        deltaHours: roundHours(secondsToHours(workedSeconds - targetSeconds)),
        absence,
        notificationCodes: codesByDate.get(date) ?? [],
      };
    });

    return {
      employeeId: employee.id,
      employeeName: employee.name,
      startDate,
      endDate,
      rows,
      totals: {
        workedHours: roundHours(rows.reduce((sum, row) => sum + row.workedHours, 0)),
        targetHours: roundHours(rows.reduce((sum, row) => sum + row.targetHours, 0)),
        deltaHours: roundHours(rows.reduce((sum, row) => sum + row.deltaHours, 0)),
        absenceDays: rows.filter(row => row.absence !== null).length,
      },
    };
  }
}

// ============================================================================
// CSV Export
// ============================================================================

const REPORT_HEADERS = ['Date', 'Day', 'Stamps', 'Worked (h)', 'Target (h)', 'Delta (h)', 'Absence', 'Notices'];

/**
 * Escape a value for CSV format
 */
export function escapeCSVValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  // If the value contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function rowValues(row: FlexReportRow): (string | number)[] {
  return [
    row.date,
    row.weekday,
    row.stamps.join(' '),
    row.workedHours.toFixed(2),
    row.targetHours.toFixed(2),
    row.deltaHours.toFixed(2),
    row.absence ?? '',
    row.notificationCodes.join(' '),
  ];
}

export function exportFlexReportToCSV(report: FlexReport): string {
  const lines = [REPORT_HEADERS.map(escapeCSVValue).join(',')];
  for (const row of report.rows) {
    lines.push(rowValues(row).map(escapeCSVValue).join(','));
  }
  lines.push(
    [
      'Total',
      '',
      '',
      report.totals.workedHours.toFixed(2),
      report.totals.targetHours.toFixed(2),
      report.totals.deltaHours.toFixed(2),
      report.totals.absenceDays,
      '',
    ]
      .map(escapeCSVValue)
      .join(',')
  );
  return lines.join('\n');
}

// ============================================================================
// Excel Export (with cell coloring)
// ============================================================================

/** Convert hex color like #C6EFCE to ARGB like FFC6EFCE */
function hexToArgb(hex: string): string {
  return 'FF' + hex.replace('#', '');
}

function makeFill(hex: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: hexToArgb(hex) } };
}

const thinBorder: Partial<ExcelJS.Borders> = {
  top: { style: 'thin', color: { argb: 'FFB0B0B0' } },
  left: { style: 'thin', color: { argb: 'FFB0B0B0' } },
  bottom: { style: 'thin', color: { argb: 'FFB0B0B0' } },
  right: { style: 'thin', color: { argb: 'FFB0B0B0' } },
};

/**
 * Fill for a report row: absences and weekends by kind, otherwise by the sign of the delta
 */
export function getRowFill(row: FlexReportRow, settings: ExportSettings = DEFAULT_EXPORT_SETTINGS): ExcelJS.Fill | undefined {
  const c = settings.colors;
  if (row.absence !== null) return makeFill(c.absence);
  if (!isWeekday(row.date) && row.stamps.length === 0) return makeFill(c.weekend);
  if (row.deltaHours > 0) return makeFill(c.positive);
  if (row.deltaHours < 0) return makeFill(c.negative);
  return undefined;
}

function styleHeaderRow(row: ExcelJS.Row, settings: ExportSettings): void {
  const hFont: Partial<ExcelJS.Font> = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
  row.eachCell(cell => {
    cell.fill = makeFill(settings.colors.header);
    cell.font = hFont;
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = thinBorder;
  });
  row.height = 24;
}

export async function exportFlexReportToExcel(
  report: FlexReport,
  settings: ExportSettings = DEFAULT_EXPORT_SETTINGS
): Promise<Uint8Array> {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet('Flex Time');

  styleHeaderRow(ws.addRow(REPORT_HEADERS), settings);

  for (const row of report.rows) {
    const dataRow = ws.addRow([
      row.date,
      row.weekday,
      row.stamps.join(' '),
      row.workedHours,
      row.targetHours,
      row.deltaHours,
      row.absence ?? '',
      row.notificationCodes.join(' '),
    ]);
    dataRow.eachCell(cell => {
      cell.border = thinBorder;
    });
    const fill = getRowFill(row, settings);
    if (fill) {
      // Delta column
      dataRow.getCell(6).fill = fill;
    }
  }

  const totalRow = ws.addRow([
    'Total',
    '',
    '',
    report.totals.workedHours,
    report.totals.targetHours,
    report.totals.deltaHours,
    report.totals.absenceDays,
    '',
  ]);
  totalRow.font = { bold: true };

  ws.columns.forEach(col => {
    col.width = 12;
  });
  ws.getColumn(3).width = 28;

  return new Uint8Array(await wb.xlsx.writeBuffer());
}
