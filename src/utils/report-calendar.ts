/**
 * Report Calendar
 *
 * Derives the window boundaries of a reporting period from its report date,
 * and the quarter-end policy the run driver applies when no date is given.
 */

import { ConfigurationError } from './errors.js';
import type { ReportPeriod } from '../types/report.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parses a `YYYY-MM-DD` string into a UTC date, rejecting impossible dates
 * such as 2025-02-30.
 */
export function parseIsoDate(value: string, setting = 'REPORT_DATE'): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ConfigurationError(setting, `expected YYYY-MM-DD, got '${value}'`);
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatIsoDate(date) !== value) {
    throw new ConfigurationError(setting, `'${value}' is not a calendar date`);
  }
  return date;
}

function quarterStartOf(date: Date): Date {
  const firstMonth = Math.floor(date.getUTCMonth() / 3) * 3;
  return new Date(Date.UTC(date.getUTCFullYear(), firstMonth, 1));
}

/**
 * Computes the period boundaries once for a run:
 * - yearStart: 1 January of the report date's year
 * - quarterStart: first day of the report date's quarter
 * - previousQuarterEnd: the day before quarterStart
 */
export function resolveReportPeriod(reportDate: string): ReportPeriod {
  const date = parseIsoDate(reportDate);
  const quarterStart = quarterStartOf(date);
  const previousQuarterEnd = new Date(quarterStart.getTime() - DAY_MS);
  const yearStart = new Date(Date.UTC(date.getUTCFullYear(), 0, 1));

  return Object.freeze({
    reportDate,
    yearStart: formatIsoDate(yearStart),
    previousQuarterEnd: formatIsoDate(previousQuarterEnd),
    quarterStart: formatIsoDate(quarterStart)
  });
}

/**
 * The latest calendar quarter end strictly before `today`.
 */
export function latestQuarterEnd(today: Date): string {
  const currentQuarterStart = quarterStartOf(today);
  return formatIsoDate(new Date(currentQuarterStart.getTime() - DAY_MS));
}

/**
 * Whether an ISO date falls in the same year and month as the report date
 */
export function isInReportMonth(isoDate: string, reportDate: string): boolean {
  return isoDate.slice(0, 7) === reportDate.slice(0, 7);
}
