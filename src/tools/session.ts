/**
 * Session tools - timecard_session_start, _status, _finish, _abandon
 *
 * A session is started, survives restarts as the persisted in-progress entry,
 * and becomes a work record when finished.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import { logger } from '../utils/logger.js';
import { InvalidRangeError } from '../utils/errors.js';
import { LOCATION_UNAVAILABLE, truncateNote } from '../services/records/index.js';
import { formatHours, roundHours } from '../services/aggregation/index.js';
import {
  COORDINATES_PAIRED_ISSUE,
  coordinatesPaired,
  isoDateTimeSchema,
  latitudeSchema,
  longitudeSchema,
  serializeRecord,
  toolFailure,
  validationFailure,
} from './common.js';

const MS_PER_HOUR = 3_600_000;

// ============================================
// timecard_session_start
// ============================================

const startInputSchema = z.object({
  start_time: isoDateTimeSchema.optional(),
  replace: z.boolean().optional().default(false),
});

export const sessionStartTool: Tool = {
  name: 'timecard_session_start',
  description:
    'Start a work session. The session stays open (even across restarts) until finished or abandoned. Refuses to start while another session is open unless replace is true.',
  inputSchema: {
    type: 'object',
    properties: {
      start_time: {
        type: 'string',
        description: 'ISO 8601 start time with offset, e.g. 2026-06-17T09:00:00Z (defaults to now)',
      },
      replace: {
        type: 'boolean',
        description: 'Discard an already open session and start over (default: false)',
      },
    },
  },
};

export async function sessionStartHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = startInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const existing = context.store.inProgress();
    if (existing && !input.replace) {
      return {
        success: false,
        error: `A session is already in progress since ${existing.startTime.toISOString()}`,
        code: 'SESSION_IN_PROGRESS',
      };
    }

    const session = context.store.saveInProgress(input.start_time ?? context.clock());
    logger.info(`Session started at ${session.startTime.toISOString()}`);

    return {
      success: true,
      data: {
        start_time: session.startTime.toISOString(),
        replaced: existing !== null,
        message: 'Work session started',
      },
    };
  } catch (error) {
    return toolFailure(error, 'SESSION_START_ERROR');
  }
}

// ============================================
// timecard_session_status
// ============================================

export const sessionStatusTool: Tool = {
  name: 'timecard_session_status',
  description: 'Show whether a work session is in progress and how long it has been running.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function sessionStatusHandler(
  _args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const session = context.store.inProgress();
  if (!session) {
    return {
      success: true,
      data: { in_progress: false },
    };
  }

  const elapsedHours = Math.max(
    0,
    (context.clock().getTime() - session.startTime.getTime()) / MS_PER_HOUR
  );

  return {
    success: true,
    data: {
      in_progress: true,
      start_time: session.startTime.toISOString(),
      elapsed_hours: roundHours(elapsedHours),
      elapsed_formatted: formatHours(elapsedHours),
    },
  };
}

// ============================================
// timecard_session_finish
// ============================================

const finishInputSchema = z
  .object({
    end_time: isoDateTimeSchema.optional(),
    company: z.string().optional(),
    note: z.string().optional(),
    location: z.string().optional(),
    latitude: latitudeSchema.optional(),
    longitude: longitudeSchema.optional(),
  })
  .refine(coordinatesPaired, COORDINATES_PAIRED_ISSUE);

export const sessionFinishTool: Tool = {
  name: 'timecard_session_finish',
  description:
    'Finish the open work session and save it as a record. Optionally tag it with a company, a note (trimmed to the configured word limit) and a location. With coordinates but no location text, the address is looked up when geocoding is enabled.',
  inputSchema: {
    type: 'object',
    properties: {
      end_time: {
        type: 'string',
        description: 'ISO 8601 end time with offset (defaults to now)',
      },
      company: {
        type: 'string',
        description: 'Company worked for (added to the company list)',
      },
      note: {
        type: 'string',
        description: 'Free-text note',
      },
      location: {
        type: 'string',
        description: 'Location label',
      },
      latitude: {
        type: 'number',
        description: 'Latitude of the work location (requires longitude)',
      },
      longitude: {
        type: 'number',
        description: 'Longitude of the work location (requires latitude)',
      },
    },
  },
};

/**
 * Location label: explicit text, else a geocoded address, else the placeholder
 */
export async function resolveLocationLabel(
  context: TimecardContext,
  input: { location?: string | undefined; latitude?: number | undefined; longitude?: number | undefined }
): Promise<string> {
  if (input.location !== undefined && input.location.trim() !== '') {
    return input.location.trim();
  }
  if (context.locations && input.latitude !== undefined && input.longitude !== undefined) {
    const address = await context.locations.resolve({
      latitude: input.latitude,
      longitude: input.longitude,
    });
    if (address) return address;
  }
  return LOCATION_UNAVAILABLE;
}

/**
 * Register a record's company so it is offered next time. The record is
 * already saved at this point, so a registry write failure is only logged.
 */
export function rememberCompany(context: TimecardContext, company: string): boolean {
  if (company === '' || context.companies.has(company)) {
    return false;
  }
  try {
    return context.companies.add(company);
  } catch (error) {
    logger.warn(`Could not add company "${company}" to the registry`, error);
    return false;
  }
}

export async function sessionFinishHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = finishInputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  const noSession: ToolResult = {
    success: false,
    error: 'No work session in progress',
    code: 'NO_SESSION',
  };

  try {
    if (!context.store.inProgress()) {
      return noSession;
    }

    // The lookup may take a while; the session is read again once it is done
    const locationLabel = await resolveLocationLabel(context, input);

    const session = context.store.inProgress();
    if (!session) {
      return noSession;
    }

    const endTime = input.end_time ?? context.clock();
    if (endTime < session.startTime) {
      throw new InvalidRangeError(session.startTime, endTime);
    }

    const company = input.company?.trim() ?? '';
    const record = context.store.finishInProgress(
      endTime,
      {
        locationLabel,
        latitude: input.latitude ?? null,
        longitude: input.longitude ?? null,
        note: truncateNote(input.note ?? '', context.config.settings.note_max_words),
        companyName: company,
      },
      session.startTime
    );
    rememberCompany(context, company);

    const view = serializeRecord(record);
    return {
      success: true,
      data: {
        record: view,
        message: `Logged ${view.total_formatted}${company ? ` for "${company}"` : ''}`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'SESSION_FINISH_ERROR');
  }
}

// ============================================
// timecard_session_abandon
// ============================================

export const sessionAbandonTool: Tool = {
  name: 'timecard_session_abandon',
  description: 'Discard the open work session without saving a record.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function sessionAbandonHandler(
  _args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  try {
    const session = context.store.inProgress();
    context.store.clearInProgress();

    return {
      success: true,
      data: {
        abandoned: session !== null,
        start_time: session ? session.startTime.toISOString() : null,
      },
    };
  } catch (error) {
    return toolFailure(error, 'SESSION_ABANDON_ERROR');
  }
}
