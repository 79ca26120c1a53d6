/**
 * timecard_history tool
 *
 * Lists records newest first, optionally narrowed to a company and an
 * inclusive date range, with the total hours of what is shown.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import { logger } from '../utils/logger.js';
import {
  summarizeHistory,
  listCompanyCategories,
  formatHours,
  roundHours,
  toDateKey,
} from '../services/aggregation/index.js';
import {
  companyInputProperty,
  rangeInputProperties,
  rangeInputSchema,
  resolveRange,
  serializeRecord,
  toCompanyFilter,
  toolFailure,
  validationFailure,
} from './common.js';

const inputSchema = rangeInputSchema.extend({
  company: z.string().optional(),
  limit: z.number().int().positive().optional(),
  include_records: z.boolean().optional().default(true),
});

export const historyTool: Tool = {
  name: 'timecard_history',
  description:
    'List work records newest first with their total hours. Filter by company ("Other" = no company) and by an inclusive date range or the last N days; without a range all records are included.',
  inputSchema: {
    type: 'object',
    properties: {
      company: companyInputProperty,
      ...rangeInputProperties,
      limit: {
        type: 'number',
        description: 'Return at most this many records (totals still cover all matches)',
      },
      include_records: {
        type: 'boolean',
        description: 'Include the individual records (default: true)',
      },
    },
  },
};

export async function historyHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const all = context.store.list();
    const summary = summarizeHistory(all, {
      companyFilter: toCompanyFilter(input.company),
      range: resolveRange(input, context.clock()),
    });

    logger.debug(`History: ${summary.count} records, ${formatHours(summary.totalHours)}`);

    const shown =
      input.limit !== undefined ? summary.records.slice(0, input.limit) : summary.records;

    return {
      success: true,
      data: {
        company: summary.company,
        range: summary.range
          ? { start_date: toDateKey(summary.range.start), end_date: toDateKey(summary.range.end) }
          : null,
        count: summary.count,
        total_hours: roundHours(summary.totalHours),
        total_formatted: formatHours(summary.totalHours),
        companies: listCompanyCategories(all),
        ...(input.include_records ? { records: shown.map(serializeRecord) } : {}),
      },
    };
  } catch (error) {
    return toolFailure(error, 'HISTORY_ERROR');
  }
}
