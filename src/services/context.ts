/**
 * Application context
 *
 * One explicitly owned bundle of the store, registry and collaborators, handed
 * to every tool handler and transport instead of module-level singletons.
 */

import type { TimecardConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { SqliteKeyValueStorage } from './storage/index.js';
import type { KeyValueStorage } from './storage/index.js';
import { WorkRecordStore, CompanyRegistry } from './records/index.js';
import { LocationResolver, NominatimGeocoder } from './location/index.js';

export interface TimecardContext {
  config: TimecardConfig;
  store: WorkRecordStore;
  companies: CompanyRegistry;
  locations: LocationResolver | null; // null when geocoding is disabled
  storage: KeyValueStorage;
  clock: () => Date;
}

export interface ContextOverrides {
  storage?: KeyValueStorage | undefined;
  locations?: LocationResolver | null | undefined;
  clock?: (() => Date) | undefined;
}

function createLocationResolver(config: TimecardConfig): LocationResolver | null {
  if (!config.geocoding.enabled) {
    return null;
  }
  return new LocationResolver(
    new NominatimGeocoder({
      endpoint: config.geocoding.endpoint,
      userAgent: config.geocoding.user_agent,
    })
  );
}

/**
 * Open storage and load persisted state
 */
export function createContext(
  config: TimecardConfig,
  overrides: ContextOverrides = {}
): TimecardContext {
  const storage = overrides.storage ?? SqliteKeyValueStorage.open(config.storage.path);
  const store = WorkRecordStore.open(storage);
  const companies = CompanyRegistry.open(storage);

  const locations =
    overrides.locations !== undefined ? overrides.locations : createLocationResolver(config);

  logger.info('Timecard context ready', {
    records: store.size,
    companies: companies.list().length,
    inProgress: store.inProgress() !== null,
    geocoding: locations !== null,
  });

  return {
    config,
    store,
    companies,
    locations,
    storage,
    clock: overrides.clock ?? (() => new Date()),
  };
}

/**
 * Flush everything to storage; called when the process is about to stop
 */
export function flushContext(context: TimecardContext): void {
  context.store.flush();
  context.companies.flush();
}

export function closeContext(context: TimecardContext): void {
  try {
    flushContext(context);
  } finally {
    context.storage.close();
  }
}
