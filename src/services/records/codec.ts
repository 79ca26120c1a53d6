/**
 * JSON encoding of persisted blobs
 *
 * Dates are stored as ISO-8601 strings. Decoding validates the shape with zod
 * and recomputes totalHours from the timestamps.
 */

import { z } from 'zod';
import type { InProgressSession, WorkRecord } from '../../types/index.js';
import { DecodeError } from '../../utils/errors.js';
import { createWorkRecord } from './model.js';

const isoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid ISO date')
  .transform((value) => new Date(value));

const workRecordSchema = z.object({
  id: z.string().min(1),
  startTime: isoDateSchema,
  endTime: isoDateSchema,
  totalHours: z.number().optional(),
  locationLabel: z.string(),
  latitude: z.number().nullable().default(null),
  longitude: z.number().nullable().default(null),
  note: z.string().default(''),
  companyName: z.string().default(''),
});

const recordsSchema = z.array(workRecordSchema);

const inProgressSchema = z.object({
  startTime: isoDateSchema,
  isWorking: z.boolean(),
});

const companyNamesSchema = z.array(z.string());

interface EncodedWorkRecord {
  id: string;
  startTime: string;
  endTime: string;
  totalHours: number;
  locationLabel: string;
  latitude: number | null;
  longitude: number | null;
  note: string;
  companyName: string;
}

function parseJson(raw: string, key: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new DecodeError(
      `Stored value for '${key}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      key
    );
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function encodeRecords(records: readonly WorkRecord[]): string {
  const encoded: EncodedWorkRecord[] = records.map((record) => ({
    id: record.id,
    startTime: record.startTime.toISOString(),
    endTime: record.endTime.toISOString(),
    totalHours: record.totalHours,
    locationLabel: record.locationLabel,
    latitude: record.latitude,
    longitude: record.longitude,
    note: record.note,
    companyName: record.companyName,
  }));
  return JSON.stringify(encoded);
}

export function decodeRecords(raw: string, key: string): WorkRecord[] {
  const result = recordsSchema.safeParse(parseJson(raw, key));
  if (!result.success) {
    throw new DecodeError(`Stored records are invalid: ${describeIssues(result.error)}`, key);
  }

  try {
    return result.data.map((entry) =>
      createWorkRecord(
        {
          startTime: entry.startTime,
          endTime: entry.endTime,
          locationLabel: entry.locationLabel,
          latitude: entry.latitude,
          longitude: entry.longitude,
          note: entry.note,
          companyName: entry.companyName,
        },
        entry.id
      )
    );
  } catch (error) {
    throw new DecodeError(
      `Stored record is inconsistent: ${error instanceof Error ? error.message : String(error)}`,
      key
    );
  }
}

export function encodeInProgress(session: InProgressSession): string {
  return JSON.stringify({
    startTime: session.startTime.toISOString(),
    isWorking: session.isWorking,
  });
}

export function decodeInProgress(raw: string, key: string): InProgressSession {
  const result = inProgressSchema.safeParse(parseJson(raw, key));
  if (!result.success) {
    throw new DecodeError(`Stored session is invalid: ${describeIssues(result.error)}`, key);
  }
  return Object.freeze({ ...result.data });
}

export function encodeCompanyNames(names: readonly string[]): string {
  return JSON.stringify(names);
}

export function decodeCompanyNames(raw: string, key: string): string[] {
  const result = companyNamesSchema.safeParse(parseJson(raw, key));
  if (!result.success) {
    throw new DecodeError(`Stored company names are invalid: ${describeIssues(result.error)}`, key);
  }
  return result.data;
}
