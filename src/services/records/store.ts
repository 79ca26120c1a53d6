/**
 * Work record store
 *
 * Owns the canonical record list and the optional in-progress session.
 * Every mutation builds the next state, persists it, and only then swaps it
 * in, so a failed write leaves memory exactly as it was.
 */

import type {
  InProgressSession,
  WorkRecord,
  WorkRecordInput,
  WorkRecordUpdate,
} from '../../types/index.js';
import { NotFoundError, SessionConflictError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { STORAGE_KEYS } from '../storage/kv-storage.js';
import type { KeyValueStorage, StorageChange } from '../storage/kv-storage.js';
import { loadBlob, persist, unreadableKeyError } from '../storage/blob.js';
import { createWorkRecord } from './model.js';
import { decodeInProgress, decodeRecords, encodeInProgress, encodeRecords } from './codec.js';
import { ChangeNotifier } from './notifier.js';

export type SessionDetails = Omit<WorkRecordInput, 'startTime' | 'endTime'>;

export class WorkRecordStore extends ChangeNotifier {
  private records: readonly WorkRecord[] = [];
  private current: InProgressSession | null = null;
  // Keys whose stored value could not be read at load time
  private readonly unreadable = new Set<string>();

  constructor(private readonly storage: KeyValueStorage) {
    super();
  }

  /**
   * Create a store and read its persisted state
   */
  static open(storage: KeyValueStorage): WorkRecordStore {
    const store = new WorkRecordStore(storage);
    store.load();
    return store;
  }

  /**
   * Replace in-memory state with what storage holds
   */
  load(): void {
    this.loadRecords();
    this.loadInProgress();
    logger.debug(`Loaded ${this.records.length} work records`, {
      inProgress: this.current !== null,
    });
  }

  private loadRecords(): void {
    const loaded = loadBlob(this.storage, STORAGE_KEYS.records, decodeRecords, []);
    this.records = loaded.value;
    this.trackRead(STORAGE_KEYS.records, loaded.readFailed);
  }

  private loadInProgress(): void {
    const loaded = loadBlob(this.storage, STORAGE_KEYS.inProgress, decodeInProgress, null);
    this.current = loaded.value;
    this.trackRead(STORAGE_KEYS.inProgress, loaded.readFailed);
  }

  private trackRead(key: string, readFailed: boolean): void {
    if (readFailed) {
      this.unreadable.add(key);
    } else {
      this.unreadable.delete(key);
    }
  }

  /**
   * Retry a failed read of the record list before anything overwrites it
   */
  private ensureRecordsReadable(): void {
    if (!this.unreadable.has(STORAGE_KEYS.records)) return;

    this.loadRecords();
    if (this.unreadable.has(STORAGE_KEYS.records)) {
      throw unreadableKeyError(STORAGE_KEYS.records);
    }
    logger.info(`Recovered ${this.records.length} work records after a failed read`);
  }

  /**
   * Snapshot of all records in storage order
   */
  list(): WorkRecord[] {
    return [...this.records];
  }

  get(id: string): WorkRecord | undefined {
    return this.records.find((record) => record.id === id);
  }

  get size(): number {
    return this.records.length;
  }

  add(input: WorkRecordInput): WorkRecord {
    this.ensureRecordsReadable();
    const record = createWorkRecord(input);
    this.commitRecords([...this.records, record]);
    logger.info(`Added work record ${record.id}`, { hours: record.totalHours });
    return record;
  }

  /**
   * Replace a record in full. Coordinates and id carry over; totalHours is recomputed.
   */
  update(id: string, changes: WorkRecordUpdate): WorkRecord {
    this.ensureRecordsReadable();
    const index = this.records.findIndex((record) => record.id === id);
    const existing = this.records[index];
    if (!existing) {
      throw new NotFoundError(`Work record not found: ${id}`);
    }

    const updated = createWorkRecord(
      {
        startTime: changes.startTime,
        endTime: changes.endTime,
        locationLabel: changes.locationLabel,
        latitude: existing.latitude,
        longitude: existing.longitude,
        note: changes.note,
        companyName: changes.companyName,
      },
      existing.id
    );

    const next = [...this.records];
    next[index] = updated;
    this.commitRecords(next);
    logger.info(`Updated work record ${id}`);
    return updated;
  }

  /**
   * Remove one record. Returns false (and writes nothing) when the id is unknown.
   */
  delete(id: string): boolean {
    return this.deleteMany([id]) > 0;
  }

  /**
   * Remove every record whose id is listed; unknown ids are ignored
   */
  deleteMany(ids: Iterable<string>): number {
    this.ensureRecordsReadable();
    const doomed = new Set(ids);
    const next = this.records.filter((record) => !doomed.has(record.id));
    const removed = this.records.length - next.length;

    if (removed > 0) {
      this.commitRecords(next);
      logger.info(`Deleted ${removed} work record(s)`);
    }
    return removed;
  }

  inProgress(): InProgressSession | null {
    return this.current;
  }

  /**
   * Start (or restart) the single in-progress session
   */
  saveInProgress(startTime: Date): InProgressSession {
    const session: InProgressSession = Object.freeze({
      startTime: new Date(startTime.getTime()),
      isWorking: true,
    });
    persist(this.storage, [{ key: STORAGE_KEYS.inProgress, value: encodeInProgress(session) }]);
    this.current = session;
    this.unreadable.delete(STORAGE_KEYS.inProgress);
    this.emit('in_progress');
    return session;
  }

  clearInProgress(): void {
    persist(this.storage, [{ key: STORAGE_KEYS.inProgress, value: null }]);
    const hadSession = this.current !== null;
    this.current = null;
    this.unreadable.delete(STORAGE_KEYS.inProgress);
    if (hadSession) {
      this.emit('in_progress');
    }
  }

  /**
   * Turn the in-progress session into a record and clear it, in one write.
   *
   * With `expectedStart`, the session must still be the one that started then;
   * a session replaced in the meantime raises SessionConflictError.
   */
  finishInProgress(
    endTime: Date,
    details: SessionDetails = {},
    expectedStart?: Date
  ): WorkRecord {
    const session = this.current;
    if (!session) {
      throw new NotFoundError('No work session in progress');
    }
    if (expectedStart && expectedStart.getTime() !== session.startTime.getTime()) {
      throw new SessionConflictError(expectedStart, session.startTime);
    }
    this.ensureRecordsReadable();

    const record = createWorkRecord({ ...details, startTime: session.startTime, endTime });
    const next = [...this.records, record];

    persist(this.storage, [
      { key: STORAGE_KEYS.records, value: encodeRecords(next) },
      { key: STORAGE_KEYS.inProgress, value: null },
    ]);
    this.records = next;
    this.current = null;

    this.emit('records');
    this.emit('in_progress');
    logger.info(`Finished work session ${record.id}`, { hours: record.totalHours });
    return record;
  }

  /**
   * Rewrite persisted state before the process suspends or exits.
   * Keys that could not be read are left as they are in storage.
   */
  flush(): void {
    const changes: StorageChange[] = [];
    if (!this.unreadable.has(STORAGE_KEYS.records)) {
      changes.push({ key: STORAGE_KEYS.records, value: encodeRecords(this.records) });
    }
    if (!this.unreadable.has(STORAGE_KEYS.inProgress)) {
      changes.push({
        key: STORAGE_KEYS.inProgress,
        value: this.current ? encodeInProgress(this.current) : null,
      });
    }
    for (const key of this.unreadable) {
      logger.warn(`Not flushing '${key}': its stored value was never read`);
    }

    if (changes.length > 0) {
      persist(this.storage, changes);
    }
    logger.debug(`Flushed ${this.records.length} work records`);
  }

  private commitRecords(next: readonly WorkRecord[]): void {
    persist(this.storage, [{ key: STORAGE_KEYS.records, value: encodeRecords(next) }]);
    this.records = next;
    this.emit('records');
  }
}
