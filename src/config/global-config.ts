/**
 * Configuration loading and validation
 * Loads from TIMECARD_CONFIG_PATH or ~/.config/timecard/config.yaml, then applies
 * TIMECARD_* environment overrides
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { TimecardConfig } from '../types/index.js';

export const DEFAULT_GEOCODING_ENDPOINT = 'https://nominatim.openstreetmap.org/reverse';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const weekDaySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

const storageSchema = z.object({
  path: z.string().min(1).optional(),
});

const settingsSchema = z.object({
  log_level: logLevelSchema.default('info'),
  week_starts_on: weekDaySchema.default(0),
  note_max_words: z.number().int().positive().default(30),
});

const geocodingSchema = z.object({
  enabled: z.boolean().default(false),
  endpoint: z.string().url().default(DEFAULT_GEOCODING_ENDPOINT),
  user_agent: z.string().min(1).default('timecard-mcp/0.1.0'),
});

const configFileSchema = z.object({
  version: z.number().default(1),
  storage: storageSchema.default({}),
  settings: settingsSchema.default({}),
  geocoding: geocodingSchema.default({}),
});

// Environment overrides, applied on top of the file
const envSchema = z.object({
  TIMECARD_DB_PATH: z.string().min(1).optional(),
  TIMECARD_LOG_LEVEL: logLevelSchema.optional(),
  TIMECARD_WEEK_STARTS_ON: z.coerce.number().int().pipe(weekDaySchema).optional(),
  TIMECARD_GEOCODING_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() === 'true')
    .optional(),
});

function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'timecard', 'config.yaml');
}

function getDefaultStoragePath(): string {
  return join(homedir(), '.local', 'share', 'timecard', 'timecard.sqlite');
}

function resolveStoragePath(path: string | undefined): string {
  if (!path) return getDefaultStoragePath();
  // SQLite's in-memory database name is not a file path
  if (path === ':memory:') return path;
  return expandPath(path);
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return resolve(path);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}, using defaults`);
    return {};
  }

  const content = readFileSync(configPath, 'utf-8');
  try {
    // An empty file parses to null
    return parseYaml(content) ?? {};
  } catch (error) {
    throw new Error(
      `Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load configuration from file and environment
 *
 * Precedence: environment variables, then the config file, then defaults.
 */
export function loadGlobalConfig(): TimecardConfig {
  const configPath = process.env.TIMECARD_CONFIG_PATH || getDefaultConfigPath();

  const fileResult = configFileSchema.safeParse(readConfigFile(configPath));
  if (!fileResult.success) {
    throw new Error(`Invalid config in ${configPath}:\n${formatIssues(fileResult.error)}`);
  }

  const envResult = envSchema.safeParse(process.env);
  if (!envResult.success) {
    throw new Error(`Configuration error:\n${formatIssues(envResult.error)}`);
  }

  const file = fileResult.data;
  const env = envResult.data;

  const storagePath = env.TIMECARD_DB_PATH ?? file.storage.path;

  return {
    version: file.version,
    storage: {
      path: resolveStoragePath(storagePath),
    },
    settings: {
      log_level: env.TIMECARD_LOG_LEVEL ?? file.settings.log_level,
      week_starts_on: env.TIMECARD_WEEK_STARTS_ON ?? file.settings.week_starts_on,
      note_max_words: file.settings.note_max_words,
    },
    geocoding: {
      ...file.geocoding,
      enabled: env.TIMECARD_GEOCODING_ENABLED ?? file.geocoding.enabled,
    },
  };
}

// Export schemas for testing
export const schemas = {
  settings: settingsSchema,
  geocoding: geocodingSchema,
  configFile: configFileSchema,
  env: envSchema,
};
