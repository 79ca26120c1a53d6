/**
 * Aggregation engine: calendar bucketing, statistics and history filters
 */

export {
  aggregate,
  calculateStats,
  yAxisMax,
  WINDOW_SPECS,
  BIWEEKLY_DAYS,
} from './buckets.js';
export type { Bucket, BucketStats, AggregationOptions, AggregationResult } from './buckets.js';
export {
  filterByDateRange,
  summarizeHistory,
  sortByStartDesc,
  lastDaysRange,
  totalHours,
} from './history.js';
export type { DateRange, HistoryOptions, HistorySummary } from './history.js';
export {
  parseCompanyFilter,
  matchesCompany,
  filterByCompany,
  describeCompanyFilter,
  listCompanyCategories,
  OTHER_COMPANY_LABEL,
  ANY_COMPANY,
} from './company-filter.js';
export {
  startOfDay,
  endOfDay,
  addDays,
  calendarDayDiff,
  startOfWeek,
  startOfMonth,
  daysInMonth,
  isSameMonth,
  toDateKey,
  parseDateKey,
  WEEKDAY_NAMES,
} from './calendar.js';
export { formatHours, roundHours } from './format.js';
