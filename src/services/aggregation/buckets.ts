/**
 * Period bucketing and summary statistics
 *
 * Records are attributed to exactly one bucket by their start time. A session
 * running past midnight counts entirely toward the day it started.
 */

import type { CompanyFilter, WeekDay, WindowSpec, WorkRecord } from '../../types/index.js';
import {
  WEEKDAY_NAMES,
  addDays,
  calendarDayDiff,
  daysInMonth,
  isSameMonth,
  startOfDay,
  startOfMonth,
  startOfWeek,
  toDateKey,
} from './calendar.js';
import { ANY_COMPANY, describeCompanyFilter, filterByCompany } from './company-filter.js';

export const WINDOW_SPECS = ['weekly', 'biweekly', 'monthly'] as const satisfies readonly WindowSpec[];

export const BIWEEKLY_DAYS = 14;

export interface Bucket {
  index: number;
  label: string;
  date: string; // YYYY-MM-DD of the calendar day the bucket covers
  hours: number;
}

export interface BucketStats {
  total: number;
  workDays: number;
  average: number;
  longest: number;
}

export interface AggregationOptions {
  now?: Date | undefined;
  weekStartsOn?: WeekDay | undefined;
}

export interface AggregationResult {
  window: WindowSpec;
  company: string | null;
  range: {
    start: Date; // inclusive
    end: Date; // exclusive
  };
  buckets: Bucket[];
  stats: BucketStats;
  yAxisMax: number;
  recordCount: number;
}

// Non-positive durations are valid records but add nothing
function contribution(record: WorkRecord): number {
  return record.totalHours > 0 ? record.totalHours : 0;
}

interface Bucketing {
  start: Date;
  end: Date;
  buckets: Bucket[];
  indexOf(record: WorkRecord): number | null;
}

function weeklyBucketing(now: Date, weekStartsOn: WeekDay): Bucketing {
  const start = startOfWeek(now, weekStartsOn);
  const end = addDays(start, 7);

  const buckets = WEEKDAY_NAMES.map((label, weekday) => ({
    index: weekday,
    label,
    date: toDateKey(addDays(start, (weekday - weekStartsOn + 7) % 7)),
    hours: 0,
  }));

  return {
    start,
    end,
    buckets,
    indexOf(record) {
      if (record.startTime < start || record.startTime >= end) return null;
      return record.startTime.getDay();
    },
  };
}

function biweeklyBucketing(now: Date): Bucketing {
  const start = startOfDay(addDays(now, -(BIWEEKLY_DAYS - 1)));
  const end = addDays(start, BIWEEKLY_DAYS);

  const buckets: Bucket[] = [];
  for (let offset = 0; offset < BIWEEKLY_DAYS; offset++) {
    const day = addDays(start, offset);
    buckets.push({
      index: offset,
      label: WEEKDAY_NAMES[day.getDay()] ?? '',
      date: toDateKey(day),
      hours: 0,
    });
  }

  return {
    start,
    end,
    buckets,
    indexOf(record) {
      const offset = calendarDayDiff(start, record.startTime);
      return offset >= 0 && offset < BIWEEKLY_DAYS ? offset : null;
    },
  };
}

function monthlyBucketing(now: Date): Bucketing {
  const start = startOfMonth(now);
  const end = new Date(start.getFullYear(), start.getMonth() + 1, 1);
  const dayCount = daysInMonth(now);

  const buckets: Bucket[] = [];
  for (let day = 1; day <= dayCount; day++) {
    buckets.push({
      index: day - 1,
      label: String(day),
      date: toDateKey(new Date(start.getFullYear(), start.getMonth(), day)),
      hours: 0,
    });
  }

  return {
    start,
    end,
    buckets,
    indexOf(record) {
      if (!isSameMonth(record.startTime, now)) return null;
      return record.startTime.getDate() - 1;
    },
  };
}

function createBucketing(window: WindowSpec, now: Date, weekStartsOn: WeekDay): Bucketing {
  switch (window) {
    case 'weekly':
      return weeklyBucketing(now, weekStartsOn);
    case 'biweekly':
      return biweeklyBucketing(now);
    case 'monthly':
      return monthlyBucketing(now);
  }
}

/**
 * Summary statistics over a bucketed series
 */
export function calculateStats(hours: readonly number[]): BucketStats {
  const total = hours.reduce((sum, h) => sum + h, 0);
  const workDays = hours.filter((h) => h > 0).length;
  const average = workDays > 0 ? total / workDays : 0;
  const longest = hours.length > 0 ? Math.max(...hours) : 0;

  return { total, workDays, average, longest };
}

/**
 * Chart ceiling: at least 12 hours, or 1 hour when the data stays under an hour
 */
export function yAxisMax(maxBucketHours: number): number {
  return Math.max(maxBucketHours, maxBucketHours < 1 ? 1 : 12);
}

/**
 * Bucket records into the calendar window around `options.now`
 */
export function aggregate(
  records: readonly WorkRecord[],
  window: WindowSpec,
  companyFilter: CompanyFilter = ANY_COMPANY,
  options: AggregationOptions = {}
): AggregationResult {
  const now = options.now ?? new Date();
  const weekStartsOn = options.weekStartsOn ?? 0;
  const bucketing = createBucketing(window, now, weekStartsOn);

  let recordCount = 0;
  for (const record of filterByCompany(records, companyFilter)) {
    const index = bucketing.indexOf(record);
    if (index === null) continue;

    const bucket = bucketing.buckets[index];
    if (!bucket) continue;

    bucket.hours += contribution(record);
    recordCount++;
  }

  const hours = bucketing.buckets.map((b) => b.hours);
  const stats = calculateStats(hours);

  return {
    window,
    company: describeCompanyFilter(companyFilter),
    range: { start: bucketing.start, end: bucketing.end },
    buckets: bucketing.buckets,
    stats,
    yAxisMax: yAxisMax(stats.longest),
    recordCount,
  };
}
