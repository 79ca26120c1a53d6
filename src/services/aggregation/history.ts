/**
 * History view: explicit date-range filtering and totals, no bucketing
 */

import type { CompanyFilter, WorkRecord } from '../../types/index.js';
import { InvalidRangeError } from '../../utils/errors.js';
import { addDays, endOfDay, startOfDay } from './calendar.js';
import { ANY_COMPANY, describeCompanyFilter, filterByCompany } from './company-filter.js';

export interface DateRange {
  startDate: Date;
  endDate: Date;
}

export interface HistoryOptions {
  companyFilter?: CompanyFilter | undefined;
  range?: DateRange | undefined; // all records when absent
}

export interface HistorySummary {
  records: WorkRecord[]; // newest first
  count: number;
  totalHours: number;
  company: string | null;
  range: { start: Date; end: Date } | null;
}

/**
 * Newest first; ties keep their relative order
 */
export function sortByStartDesc(records: readonly WorkRecord[]): WorkRecord[] {
  return [...records].sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
}

/**
 * Keep records that start between the beginning of `startDate`
 * and the end of `endDate`, both days included
 */
export function filterByDateRange(
  records: readonly WorkRecord[],
  startDate: Date,
  endDate: Date
): WorkRecord[] {
  const from = startOfDay(startDate);
  const to = endOfDay(endDate);
  if (to < from) {
    throw new InvalidRangeError(from, to);
  }

  return records.filter((record) => record.startTime >= from && record.startTime <= to);
}

/**
 * Range covering the last `days` days up to `now`
 */
export function lastDaysRange(days: number, now: Date = new Date()): DateRange {
  return { startDate: addDays(now, -days), endDate: now };
}

export function totalHours(records: readonly WorkRecord[]): number {
  return records.reduce((sum, record) => sum + record.totalHours, 0);
}

/**
 * Company filter first, then the date range, then newest-first ordering
 */
export function summarizeHistory(
  records: readonly WorkRecord[],
  options: HistoryOptions = {}
): HistorySummary {
  const companyFilter = options.companyFilter ?? ANY_COMPANY;
  let filtered = filterByCompany(records, companyFilter);

  let range: HistorySummary['range'] = null;
  if (options.range) {
    filtered = filterByDateRange(filtered, options.range.startDate, options.range.endDate);
    range = { start: startOfDay(options.range.startDate), end: endOfDay(options.range.endDate) };
  }

  const sorted = sortByStartDesc(filtered);

  return {
    records: sorted,
    count: sorted.length,
    totalHours: totalHours(sorted),
    company: describeCompanyFilter(companyFilter),
    range,
  };
}
