/**
 * timecard_companies tool - list, add or remove saved company names
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import { listCompanyCategories } from '../services/aggregation/index.js';
import { toolFailure, validationFailure } from './common.js';

const COMPANY_ACTIONS = ['list', 'add', 'remove'] as const;

const inputSchema = z
  .object({
    action: z.enum(COMPANY_ACTIONS).optional().default('list'),
    name: z.string().optional(),
  })
  .refine((v) => v.action === 'list' || (v.name !== undefined && v.name.trim() !== ''), {
    message: 'name is required for add and remove',
    path: ['name'],
  });

export const companiesTool: Tool = {
  name: 'timecard_companies',
  description:
    'Manage saved company names used to tag sessions. Removing a name does not change existing records.',
  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        description: 'What to do (default: list)',
        enum: [...COMPANY_ACTIONS],
      },
      name: {
        type: 'string',
        description: 'Company name for add/remove (case-sensitive)',
      },
    },
  },
};

export async function companiesHandler(
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return validationFailure(parseResult.error);
  }

  const { action } = parseResult.data;
  const name = parseResult.data.name?.trim();

  try {
    let changed = false;
    if (action === 'add' && name !== undefined) {
      changed = context.companies.add(name);
    } else if (action === 'remove' && name !== undefined) {
      changed = context.companies.remove(name);
    }

    return {
      success: true,
      data: {
        action,
        ...(action === 'list' ? {} : { name, changed }),
        companies: context.companies.list(),
        in_use: listCompanyCategories(context.store.list()),
      },
    };
  } catch (error) {
    return toolFailure(error, 'COMPANIES_ERROR');
  }
}
