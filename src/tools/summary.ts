/**
 * timecard_summary tool
 *
 * Daily hour buckets for the current week, the last two weeks or the current
 * month, with summary statistics and a chart ceiling.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import { logger } from '../utils/logger.js';
import {
  aggregate,
  WINDOW_SPECS,
  formatHours,
  roundHours,
  toDateKey,
  addDays,
} from '../services/aggregation/index.js';
import { companyInputProperty, toCompanyFilter, toolFailure, validationFailure } from './common.js';

const PERIOD_LABELS = {
  weekly: 'This Week',
  biweekly: 'Last 2 Weeks',
  monthly: 'This Month',
} as const;

const inputSchema = z.object({
  window: z.enum(WINDOW_SPECS).optional().default('weekly'),
  company: z.string().optional(),
});

export const summaryTool: Tool = {
  name: 'timecard_summary',
  description:
    'Summarize worked hours per day for the current week (weekly), the last 14 days (biweekly) or the current month (monthly). Returns daily buckets, total, work days, daily average, longest day and a chart y-axis maximum.',
  inputSchema: {
    type: 'object',
    properties: {
      window: {
        type: 'string',
        description: 'Aggregation window (default: weekly)',
        enum: [...WINDOW_SPECS],
      },
      company: companyInputProperty,
    },
  },
};

export async function summaryHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const result = aggregate(context.store.list(), input.window, toCompanyFilter(input.company), {
      now: context.clock(),
      weekStartsOn: context.config.settings.week_starts_on,
    });

    logger.info(
      `Summary (${input.window}): ${result.recordCount} records, ${formatHours(result.stats.total)}`
    );

    return {
      success: true,
      data: {
        window: result.window,
        period: PERIOD_LABELS[result.window],
        company: result.company,
        range: {
          start_date: toDateKey(result.range.start),
          end_date: toDateKey(addDays(result.range.end, -1)),
        },
        buckets: result.buckets.map((b) => ({
          index: b.index,
          label: b.label,
          date: b.date,
          hours: roundHours(b.hours),
        })),
        stats: {
          total_hours: roundHours(result.stats.total),
          total_formatted: formatHours(result.stats.total),
          work_days: result.stats.workDays,
          average_hours: roundHours(result.stats.average),
          longest_hours: roundHours(result.stats.longest),
        },
        y_axis_max: result.yAxisMax,
        record_count: result.recordCount,
      },
    };
  } catch (error) {
    return toolFailure(error, 'SUMMARY_ERROR');
  }
}
