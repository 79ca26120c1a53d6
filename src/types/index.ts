/**
 * Timecard MCP - Type Definitions
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Day of week, Sunday = 0 ... Saturday = 6 (same numbering as Date#getDay)
export type WeekDay = 0 | 1 | 2 | 3 | 4 | 5 | 6;

// One finished work session
export interface WorkRecord {
  readonly id: string;
  readonly startTime: Date;
  readonly endTime: Date;
  readonly totalHours: number; // always (endTime - startTime) in hours
  readonly locationLabel: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly note: string;
  readonly companyName: string; // '' means "no company"
}

// Fields a caller supplies when creating a record; id and totalHours are derived
export interface WorkRecordInput {
  startTime: Date;
  endTime: Date;
  locationLabel?: string | undefined;
  latitude?: number | null | undefined;
  longitude?: number | null | undefined;
  note?: string | undefined;
  companyName?: string | undefined;
}

// Full replacement used by the edit path (coordinates are kept from the old record)
export interface WorkRecordUpdate {
  startTime: Date;
  endTime: Date;
  locationLabel: string;
  note: string;
  companyName: string;
}

// A started but not yet finished session
export interface InProgressSession {
  readonly startTime: Date;
  readonly isWorking: boolean;
}

// Store change notifications
export type StoreChangeType = 'records' | 'in_progress' | 'companies';

export interface StoreChangeEvent {
  type: StoreChangeType;
  timestamp: string; // ISO date
}

export type StoreListener = (event: StoreChangeEvent) => void;

// Aggregation window selector
export type WindowSpec = 'weekly' | 'biweekly' | 'monthly';

// Company filter applied before bucketing
export type CompanyFilter =
  | { kind: 'any' }
  | { kind: 'named'; name: string }
  | { kind: 'unassigned' };

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// ============================================
// Configuration
// ============================================

export interface GeocodingSettings {
  enabled: boolean;
  endpoint: string;
  user_agent: string;
}

export interface TimecardSettings {
  log_level: LogLevel;
  week_starts_on: WeekDay;
  note_max_words: number;
}

// Resolved configuration (~/.config/timecard/config.yaml + environment)
export interface TimecardConfig {
  version: number;
  storage: {
    path: string;
  };
  settings: TimecardSettings;
  geocoding: GeocodingSettings;
}
