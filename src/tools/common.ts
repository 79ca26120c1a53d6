/**
 * Shared input schemas, result helpers and serializers for tool handlers
 */

import { z } from 'zod';
import type { CompanyFilter, ToolError, WorkRecord } from '../types/index.js';
import { isTimecardError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  formatHours,
  roundHours,
  lastDaysRange,
  parseDateKey,
  toDateKey,
  parseCompanyFilter,
} from '../services/aggregation/index.js';
import type { DateRange } from '../services/aggregation/index.js';

// Date and time with an explicit offset, e.g. 2026-06-17T09:00:00Z or 2026-06-17T09:00:00+02:00
export const isoDateTimeSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO 8601 date-time with a Z or +hh:mm offset' })
  .transform((value) => new Date(value));

export const dateKeySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD')
  .refine((value) => parseDateKey(value) !== null, 'Not a calendar date');

export const latitudeSchema = z.number().min(-90).max(90);
export const longitudeSchema = z.number().min(-180).max(180);

export function coordinatesPaired(input: {
  latitude?: number | undefined;
  longitude?: number | undefined;
}): boolean {
  return (input.latitude === undefined) === (input.longitude === undefined);
}

export const COORDINATES_PAIRED_ISSUE = {
  message: 'latitude and longitude must be given together',
  path: ['longitude'],
};

// Range selectors shared by history and bulk delete
export const rangeInputSchema = z.object({
  start_date: dateKeySchema.optional(),
  end_date: dateKeySchema.optional(),
  last_days: z.number().int().positive().optional(),
});

export type RangeInput = z.infer<typeof rangeInputSchema>;

export const rangeInputProperties = {
  start_date: {
    type: 'string',
    description: 'Range start (YYYY-MM-DD, inclusive). Requires end_date.',
  },
  end_date: {
    type: 'string',
    description: 'Range end (YYYY-MM-DD, inclusive). Requires start_date.',
  },
  last_days: {
    type: 'number',
    description: 'Shortcut for the range [today - N days, today], e.g. 7, 14 or 30',
  },
} as const;

export const companyInputProperty = {
  type: 'string',
  description: 'Company name (exact match), or "Other" for sessions without a company',
} as const;

/**
 * Turn range selectors into a date range; undefined means all records.
 * Throws on a half-specified or conflicting range.
 */
export function resolveRange(input: RangeInput, now: Date): DateRange | undefined {
  const hasExplicit = input.start_date !== undefined || input.end_date !== undefined;

  if (input.last_days !== undefined) {
    if (hasExplicit) {
      throw new RangeSelectionError('Use either last_days or start_date/end_date, not both');
    }
    return lastDaysRange(input.last_days, now);
  }

  if (!hasExplicit) {
    return undefined;
  }

  const startDate = input.start_date ? parseDateKey(input.start_date) : null;
  const endDate = input.end_date ? parseDateKey(input.end_date) : null;
  if (!startDate || !endDate) {
    throw new RangeSelectionError('start_date and end_date must be given together');
  }
  return { startDate, endDate };
}

export class RangeSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RangeSelectionError';
  }
}

export function toCompanyFilter(company: string | undefined): CompanyFilter {
  return parseCompanyFilter(company);
}

/**
 * ToolError for a failed zod parse
 */
export function validationFailure(error: z.ZodError): ToolError {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

/**
 * ToolError for a thrown error; domain errors keep their own code
 */
export function toolFailure(error: unknown, fallbackCode: string): ToolError {
  if (isTimecardError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  if (error instanceof RangeSelectionError) {
    return { success: false, error: error.message, code: 'VALIDATION_ERROR' };
  }
  logger.error(`Unexpected tool failure (${fallbackCode})`, error);
  return { success: false, error: errorMessage(error), code: fallbackCode };
}

export interface RecordView {
  id: string;
  start_time: string;
  end_time: string;
  date: string;
  total_hours: number;
  total_formatted: string;
  location: string;
  latitude: number | null;
  longitude: number | null;
  note: string;
  company: string;
}

export function serializeRecord(record: WorkRecord): RecordView {
  return {
    id: record.id,
    start_time: record.startTime.toISOString(),
    end_time: record.endTime.toISOString(),
    date: toDateKey(record.startTime),
    total_hours: roundHours(record.totalHours),
    total_formatted: formatHours(record.totalHours),
    location: record.locationLabel,
    latitude: record.latitude,
    longitude: record.longitude,
    note: record.note,
    company: record.companyName,
  };
}
