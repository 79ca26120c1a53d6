/**
 * Record model, store and company registry
 */

export { WorkRecordStore } from './store.js';
export type { SessionDetails } from './store.js';
export { CompanyRegistry } from './companies.js';
export {
  createWorkRecord,
  computeTotalHours,
  truncateNote,
  LOCATION_UNAVAILABLE,
  DEFAULT_NOTE_MAX_WORDS,
} from './model.js';
export {
  encodeRecords,
  decodeRecords,
  encodeInProgress,
  decodeInProgress,
  encodeCompanyNames,
  decodeCompanyNames,
} from './codec.js';
export { ChangeNotifier } from './notifier.js';
