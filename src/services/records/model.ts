/**
 * Work record construction
 *
 * totalHours is always derived from the two timestamps here; a value
 * supplied from outside is never trusted.
 */

import { randomUUID } from 'crypto';
import type { WorkRecord, WorkRecordInput } from '../../types/index.js';
import { InvalidInputError, InvalidRangeError } from '../../utils/errors.js';

export const LOCATION_UNAVAILABLE = 'Location not available';

export const DEFAULT_NOTE_MAX_WORDS = 30;

const MS_PER_HOUR = 3_600_000;

function assertValidDate(value: Date, field: string): void {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidInputError(`${field} is not a valid date`);
  }
}

/**
 * Hours between two instants; throws when the end precedes the start
 */
export function computeTotalHours(startTime: Date, endTime: Date): number {
  assertValidDate(startTime, 'startTime');
  assertValidDate(endTime, 'endTime');
  if (endTime.getTime() < startTime.getTime()) {
    throw new InvalidRangeError(startTime, endTime);
  }
  return (endTime.getTime() - startTime.getTime()) / MS_PER_HOUR;
}

export function createWorkRecord(input: WorkRecordInput, id: string = randomUUID()): WorkRecord {
  const totalHours = computeTotalHours(input.startTime, input.endTime);

  return Object.freeze({
    id,
    startTime: new Date(input.startTime.getTime()),
    endTime: new Date(input.endTime.getTime()),
    totalHours,
    locationLabel: input.locationLabel ?? LOCATION_UNAVAILABLE,
    latitude: input.latitude ?? null,
    longitude: input.longitude ?? null,
    note: input.note ?? '',
    companyName: input.companyName ?? '',
  });
}

/**
 * Keep at most `maxWords` whitespace-separated words
 */
export function truncateNote(note: string, maxWords: number = DEFAULT_NOTE_MAX_WORDS): string {
  const words = note.trim().split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) {
    return note.trim();
  }
  return words.slice(0, maxWords).join(' ');
}
