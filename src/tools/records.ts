/**
 * Record tools - timecard_record_add, timecard_record_update, timecard_record_delete
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import { logger } from '../utils/logger.js';
import { truncateNote } from '../services/records/index.js';
import { summarizeHistory, formatHours } from '../services/aggregation/index.js';
import {
  COORDINATES_PAIRED_ISSUE,
  companyInputProperty,
  coordinatesPaired,
  isoDateTimeSchema,
  latitudeSchema,
  longitudeSchema,
  rangeInputProperties,
  rangeInputSchema,
  resolveRange,
  serializeRecord,
  toCompanyFilter,
  toolFailure,
  validationFailure,
} from './common.js';
import { rememberCompany, resolveLocationLabel } from './session.js';

// ============================================
// timecard_record_add
// ============================================

const addInputSchema = z
  .object({
    start_time: isoDateTimeSchema,
    end_time: isoDateTimeSchema,
    company: z.string().optional(),
    note: z.string().optional(),
    location: z.string().optional(),
    latitude: latitudeSchema.optional(),
    longitude: longitudeSchema.optional(),
  })
  .refine(coordinatesPaired, COORDINATES_PAIRED_ISSUE);

export const recordAddTool: Tool = {
  name: 'timecard_record_add',
  description:
    'Add a finished work session directly, e.g. one that was forgotten. Total hours are computed from the start and end times.',
  inputSchema: {
    type: 'object',
    properties: {
      start_time: { type: 'string', description: 'ISO 8601 start time with offset, e.g. 2026-06-17T09:00:00Z' },
      end_time: { type: 'string', description: 'ISO 8601 end time with offset (not before start_time)' },
      company: { type: 'string', description: 'Company worked for' },
      note: { type: 'string', description: 'Free-text note' },
      location: { type: 'string', description: 'Location label' },
      latitude: { type: 'number', description: 'Latitude of the work location (requires longitude)' },
      longitude: { type: 'number', description: 'Longitude of the work location (requires latitude)' },
    },
    required: ['start_time', 'end_time'],
  },
};

export async function recordAddHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = addInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const company = input.company?.trim() ?? '';
    const record = context.store.add({
      startTime: input.start_time,
      endTime: input.end_time,
      locationLabel: await resolveLocationLabel(context, input),
      latitude: input.latitude ?? null,
      longitude: input.longitude ?? null,
      note: truncateNote(input.note ?? '', context.config.settings.note_max_words),
      companyName: company,
    });
    rememberCompany(context, company);

    return {
      success: true,
      data: { record: serializeRecord(record) },
    };
  } catch (error) {
    return toolFailure(error, 'RECORD_ADD_ERROR');
  }
}

// ============================================
// timecard_record_update
// ============================================

const updateInputSchema = z.object({
  id: z.string().min(1, 'Record id is required'),
  start_time: isoDateTimeSchema,
  end_time: isoDateTimeSchema,
  location: z.string().optional(),
  note: z.string().optional(),
  company: z.string().optional(),
});

export const recordUpdateTool: Tool = {
  name: 'timecard_record_update',
  description:
    'Edit a work record. The record is replaced as a whole and its total hours recomputed; location, note and company keep their current values when omitted.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', description: 'Record id' },
      start_time: { type: 'string', description: 'New ISO 8601 start time with offset' },
      end_time: { type: 'string', description: 'New ISO 8601 end time with offset' },
      location: { type: 'string', description: 'New location label' },
      note: { type: 'string', description: 'New note' },
      company: { type: 'string', description: 'New company ("" for none)' },
    },
    required: ['id', 'start_time', 'end_time'],
  },
};

export async function recordUpdateHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = updateInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const existing = context.store.get(input.id);
    const company = input.company?.trim() ?? existing?.companyName ?? '';

    const record = context.store.update(input.id, {
      startTime: input.start_time,
      endTime: input.end_time,
      locationLabel: input.location ?? existing?.locationLabel ?? '',
      note:
        input.note !== undefined
          ? truncateNote(input.note, context.config.settings.note_max_words)
          : (existing?.note ?? ''),
      companyName: company,
    });
    rememberCompany(context, company);

    return {
      success: true,
      data: { record: serializeRecord(record) },
    };
  } catch (error) {
    return toolFailure(error, 'RECORD_UPDATE_ERROR');
  }
}

// ============================================
// timecard_record_delete
// ============================================

const deleteInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    ids: z.array(z.string().min(1)).optional(),
    matching: rangeInputSchema
      .extend({
        company: z.string().optional(),
      })
      .optional(),
    confirm: z.boolean().optional().default(false),
  })
  .refine(
    (v) => [v.id, v.ids, v.matching].filter((x) => x !== undefined).length === 1,
    'Give exactly one of id, ids or matching'
  );

export const recordDeleteTool: Tool = {
  name: 'timecard_record_delete',
  description:
    'Delete work records by id, by a list of ids, or every record matching a history filter (company and/or date range). Deleting by filter requires confirm: true. Unknown ids are ignored.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', description: 'Single record id' },
      ids: {
        type: 'array',
        items: { type: 'string' },
        description: 'Several record ids',
      },
      matching: {
        type: 'object',
        description: 'Delete every record the history view would show for this filter',
        properties: {
          company: companyInputProperty,
          ...rangeInputProperties,
        },
      },
      confirm: {
        type: 'boolean',
        description: 'Required for deleting by filter (default: false)',
      },
    },
  },
};

export async function recordDeleteHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = deleteInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    if (input.id !== undefined) {
      const deleted = context.store.delete(input.id);
      return {
        success: true,
        data: { requested: 1, deleted: deleted ? 1 : 0 },
      };
    }

    if (input.ids !== undefined) {
      const deleted = context.store.deleteMany(input.ids);
      return {
        success: true,
        data: { requested: input.ids.length, deleted },
      };
    }

    const matching: NonNullable<typeof input.matching> = input.matching ?? {};
    const summary = summarizeHistory(context.store.list(), {
      companyFilter: toCompanyFilter(matching.company),
      range: resolveRange(matching, context.clock()),
    });

    if (!input.confirm) {
      return {
        success: false,
        error: `Deleting by filter would remove ${summary.count} record(s) (${formatHours(summary.totalHours)}). Repeat with confirm: true.`,
        code: 'CONFIRMATION_REQUIRED',
      };
    }

    const deleted = context.store.deleteMany(summary.records.map((r) => r.id));
    logger.info(`Deleted ${deleted} record(s) by filter`);

    return {
      success: true,
      data: { requested: summary.count, deleted },
    };
  } catch (error) {
    return toolFailure(error, 'RECORD_DELETE_ERROR');
  }
}
