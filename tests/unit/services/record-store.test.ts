/**
 * Tests for the work record store
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WorkRecordStore } from '../../../src/services/records/store.js';
import {
  MemoryKeyValueStorage,
  STORAGE_KEYS,
} from '../../../src/services/storage/kv-storage.js';
import type { StorageChange } from '../../../src/services/storage/kv-storage.js';
import { encodeRecords } from '../../../src/services/records/codec.js';
import {
  InvalidRangeError,
  NotFoundError,
  PersistenceError,
  SessionConflictError,
} from '../../../src/utils/errors.js';
import { createContext, flushContext } from '../../../src/services/context.js';
import type { StoreChangeEvent } from '../../../src/types/index.js';
import { recordAt, testConfig } from '../../helpers/context.js';

// Storage whose reads and batch writes can be switched to fail
class FailingStorage extends MemoryKeyValueStorage {
  failReads = false;
  failWrites = false;

  override get(key: string): string | null {
    if (this.failReads) {
      throw new Error('SQLITE_BUSY: database is locked');
    }
    return super.get(key);
  }

  override writeBatch(changes: readonly StorageChange[]): void {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    super.writeBatch(changes);
  }
}

describe('WorkRecordStore', () => {
  let storage: FailingStorage;
  let store: WorkRecordStore;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    storage = new FailingStorage();
    store = WorkRecordStore.open(storage);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('add', () => {
    it('derives totalHours and applies defaults', () => {
      const record = store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 11, 30),
      });

      expect(record.totalHours).toBe(2.5);
      expect(record.locationLabel).toBe('Location not available');
      expect(record.note).toBe('');
      expect(record.companyName).toBe('');
      expect(record.latitude).toBeNull();
      expect(store.size).toBe(1);
    });

    it('persists before returning', () => {
      store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
        companyName: 'Acme',
      });

      const reopened = WorkRecordStore.open(storage);
      expect(reopened.list()).toHaveLength(1);
      expect(reopened.list()[0]?.companyName).toBe('Acme');
    });

    it('rejects an end before the start without changing state', () => {
      expect(() =>
        store.add({
          startTime: new Date(2026, 5, 17, 11, 0),
          endTime: new Date(2026, 5, 17, 9, 0),
        })
      ).toThrow(InvalidRangeError);
      expect(store.size).toBe(0);
      expect(storage.get(STORAGE_KEYS.records)).toBeNull();
    });

    it('leaves memory untouched when the write fails', () => {
      storage.failWrites = true;

      expect(() =>
        store.add({
          startTime: new Date(2026, 5, 17, 9, 0),
          endTime: new Date(2026, 5, 17, 10, 0),
        })
      ).toThrow(PersistenceError);
      expect(store.size).toBe(0);
    });

    it('assigns distinct ids', () => {
      const input = {
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      };
      const a = store.add(input);
      const b = store.add(input);
      expect(a.id).not.toBe(b.id);
    });
  });

  describe('update', () => {
    it('replaces fields, keeps id and coordinates, recomputes hours', () => {
      const original = store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
        latitude: 40.5,
        longitude: -73.25,
        note: 'old',
      });

      const updated = store.update(original.id, {
        startTime: new Date(2026, 5, 17, 8, 0),
        endTime: new Date(2026, 5, 17, 12, 0),
        locationLabel: 'Office',
        note: 'new',
        companyName: 'Acme',
      });

      expect(updated.id).toBe(original.id);
      expect(updated.totalHours).toBe(4);
      expect(updated.latitude).toBe(40.5);
      expect(updated.longitude).toBe(-73.25);
      expect(updated.note).toBe('new');
      expect(store.get(original.id)).toEqual(updated);
      expect(store.size).toBe(1);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() =>
        store.update('missing', {
          startTime: new Date(2026, 5, 17, 8, 0),
          endTime: new Date(2026, 5, 17, 9, 0),
          locationLabel: '',
          note: '',
          companyName: '',
        })
      ).toThrow(NotFoundError);
    });

    it('keeps the old record when the write fails', () => {
      const original = store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      });
      storage.failWrites = true;

      expect(() =>
        store.update(original.id, {
          startTime: new Date(2026, 5, 17, 9, 0),
          endTime: new Date(2026, 5, 17, 15, 0),
          locationLabel: 'Office',
          note: '',
          companyName: '',
        })
      ).toThrow(PersistenceError);
      expect(store.get(original.id)?.totalHours).toBe(1);
    });
  });

  describe('delete', () => {
    it('removes a record by id', () => {
      const record = store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      });
      expect(store.delete(record.id)).toBe(true);
      expect(store.size).toBe(0);
    });

    it('returns false for an unknown id', () => {
      expect(store.delete('missing')).toBe(false);
    });

    it('deletes several records and ignores unknown ids', () => {
      const a = store.add({ startTime: new Date(2026, 5, 1, 9), endTime: new Date(2026, 5, 1, 10) });
      const b = store.add({ startTime: new Date(2026, 5, 2, 9), endTime: new Date(2026, 5, 2, 10) });
      const c = store.add({ startTime: new Date(2026, 5, 3, 9), endTime: new Date(2026, 5, 3, 10) });

      expect(store.deleteMany([a.id, c.id, 'missing'])).toBe(2);
      expect(store.list().map((r) => r.id)).toEqual([b.id]);
    });

    it('does not write when nothing matches', () => {
      const spy = vi.spyOn(storage, 'writeBatch');
      expect(store.deleteMany(['missing'])).toBe(0);
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('in-progress session', () => {
    it('starts, reports and clears a session', () => {
      const start = new Date(2026, 5, 17, 9, 0);
      store.saveInProgress(start);

      expect(store.inProgress()).toEqual({ startTime: start, isWorking: true });
      expect(WorkRecordStore.open(storage).inProgress()?.startTime).toEqual(start);

      store.clearInProgress();
      expect(store.inProgress()).toBeNull();
      expect(storage.get(STORAGE_KEYS.inProgress)).toBeNull();
    });

    it('replaces an existing session on a second start', () => {
      store.saveInProgress(new Date(2026, 5, 17, 9, 0));
      store.saveInProgress(new Date(2026, 5, 17, 10, 0));
      expect(store.inProgress()?.startTime.getHours()).toBe(10);
    });

    it('finishes a session into a record and clears it in one write', () => {
      store.saveInProgress(new Date(2026, 5, 17, 9, 0));
      const spy = vi.spyOn(storage, 'writeBatch');

      const record = store.finishInProgress(new Date(2026, 5, 17, 12, 15), {
        companyName: 'Acme',
        note: 'standup',
      });

      expect(spy).toHaveBeenCalledTimes(1);
      expect(record.totalHours).toBe(3.25);
      expect(record.companyName).toBe('Acme');
      expect(store.inProgress()).toBeNull();
      expect(store.list()).toEqual([record]);
      expect(storage.get(STORAGE_KEYS.inProgress)).toBeNull();
    });

    it('keeps the session when finishing fails to persist', () => {
      store.saveInProgress(new Date(2026, 5, 17, 9, 0));
      storage.failWrites = true;

      expect(() => store.finishInProgress(new Date(2026, 5, 17, 10, 0))).toThrow(PersistenceError);
      expect(store.inProgress()).not.toBeNull();
      expect(store.size).toBe(0);
    });

    it('throws NotFoundError when no session is open', () => {
      expect(() => store.finishInProgress(new Date())).toThrow(NotFoundError);
    });

    it('rejects a finish time before the start', () => {
      store.saveInProgress(new Date(2026, 5, 17, 9, 0));
      expect(() => store.finishInProgress(new Date(2026, 5, 17, 8, 0))).toThrow(InvalidRangeError);
      expect(store.inProgress()).not.toBeNull();
    });

    it('finishes when the session still has the expected start', () => {
      const start = new Date(2026, 5, 17, 9, 0);
      store.saveInProgress(start);

      const record = store.finishInProgress(new Date(2026, 5, 17, 10, 0), {}, new Date(start));
      expect(record.totalHours).toBe(1);
    });

    it('refuses to finish a session that was replaced', () => {
      store.saveInProgress(new Date(2026, 5, 17, 9, 0));
      store.saveInProgress(new Date(2026, 5, 17, 10, 0));

      expect(() =>
        store.finishInProgress(new Date(2026, 5, 17, 11, 0), {}, new Date(2026, 5, 17, 9, 0))
      ).toThrow(SessionConflictError);
      expect(store.size).toBe(0);
      expect(store.inProgress()?.startTime).toEqual(new Date(2026, 5, 17, 10, 0));
    });
  });

  describe('loading', () => {
    it('reads records written earlier', () => {
      const records = [recordAt(2026, 6, 1, 9, 2), recordAt(2026, 6, 2, 9, 3)];
      const seeded = new MemoryKeyValueStorage({
        [STORAGE_KEYS.records]: encodeRecords(records),
      });

      const loaded = WorkRecordStore.open(seeded);
      expect(loaded.list()).toEqual(records);
    });

    it('recomputes totalHours instead of trusting the stored value', () => {
      const seeded = new MemoryKeyValueStorage({
        [STORAGE_KEYS.records]: JSON.stringify([
          {
            id: 'r1',
            startTime: '2026-06-01T09:00:00.000Z',
            endTime: '2026-06-01T11:00:00.000Z',
            totalHours: 99,
            locationLabel: 'Office',
            latitude: null,
            longitude: null,
            note: '',
            companyName: '',
          },
        ]),
      });

      expect(WorkRecordStore.open(seeded).get('r1')?.totalHours).toBe(2);
    });

    it('starts empty when the records blob is corrupt', () => {
      const seeded = new MemoryKeyValueStorage({
        [STORAGE_KEYS.records]: '{not json',
        [STORAGE_KEYS.inProgress]: JSON.stringify({
          startTime: '2026-06-17T09:00:00.000Z',
          isWorking: true,
        }),
      });

      const loaded = WorkRecordStore.open(seeded);
      expect(loaded.size).toBe(0);
      expect(loaded.inProgress()?.isWorking).toBe(true);
      expect(console.error).toHaveBeenCalled();
    });

    it('starts empty when a stored record ends before it starts', () => {
      const seeded = new MemoryKeyValueStorage({
        [STORAGE_KEYS.records]: JSON.stringify([
          {
            id: 'r1',
            startTime: '2026-06-01T11:00:00.000Z',
            endTime: '2026-06-01T09:00:00.000Z',
            locationLabel: 'Office',
          },
        ]),
      });

      expect(WorkRecordStore.open(seeded).size).toBe(0);
    });
  });

  describe('unreadable storage', () => {
    const seededRecords = [recordAt(2026, 6, 1, 9, 2), recordAt(2026, 6, 2, 9, 3)];
    const seededSession = JSON.stringify({
      startTime: '2026-06-17T07:00:00.000Z',
      isWorking: true,
    });

    function openWhileLocked(): { locked: FailingStorage; opened: WorkRecordStore } {
      const locked = new FailingStorage({
        [STORAGE_KEYS.records]: encodeRecords(seededRecords),
        [STORAGE_KEYS.inProgress]: seededSession,
      });
      locked.failReads = true;
      const opened = WorkRecordStore.open(locked);
      locked.failReads = false;
      return { locked, opened };
    }

    it('does not overwrite keys it could not read when flushing', () => {
      const { locked, opened } = openWhileLocked();
      expect(opened.size).toBe(0);

      opened.flush();

      expect(locked.get(STORAGE_KEYS.records)).toBe(encodeRecords(seededRecords));
      expect(locked.get(STORAGE_KEYS.inProgress)).toBe(seededSession);
    });

    it('refuses to add while the records are still unreadable', () => {
      const { locked, opened } = openWhileLocked();
      locked.failReads = true;

      expect(() =>
        opened.add({
          startTime: new Date(2026, 5, 17, 9, 0),
          endTime: new Date(2026, 5, 17, 10, 0),
        })
      ).toThrow("Stored 'records' could not be read; refusing to overwrite it");

      locked.failReads = false;
      expect(locked.get(STORAGE_KEYS.records)).toBe(encodeRecords(seededRecords));
    });

    it('re-reads the records before the first write once storage recovers', () => {
      const { locked, opened } = openWhileLocked();

      opened.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      });

      expect(opened.size).toBe(3);
      expect(WorkRecordStore.open(locked).size).toBe(3);
    });

    it('flushes a session key once a new session has been written', () => {
      const { locked, opened } = openWhileLocked();
      const start = new Date(2026, 5, 17, 11, 0);
      opened.saveInProgress(start);
      locked.remove(STORAGE_KEYS.inProgress);

      opened.flush();

      expect(WorkRecordStore.open(locked).inProgress()?.startTime).toEqual(start);
      expect(locked.get(STORAGE_KEYS.records)).toBe(encodeRecords(seededRecords));
    });

    it('leaves stored data intact when a context opened during a lock is flushed', () => {
      const locked = new FailingStorage({
        [STORAGE_KEYS.records]: encodeRecords(seededRecords),
        [STORAGE_KEYS.companies]: JSON.stringify(['Acme']),
      });
      locked.failReads = true;
      const context = createContext(testConfig(), { storage: locked, locations: null });
      locked.failReads = false;

      flushContext(context);

      expect(locked.get(STORAGE_KEYS.records)).toBe(encodeRecords(seededRecords));
      expect(locked.get(STORAGE_KEYS.companies)).toBe(JSON.stringify(['Acme']));
    });
  });

  describe('change notifications', () => {
    it('notifies subscribers after each committed mutation', () => {
      const events: StoreChangeEvent[] = [];
      const unsubscribe = store.subscribe((event) => events.push(event));

      const record = store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      });
      store.saveInProgress(new Date(2026, 5, 17, 11, 0));
      store.delete(record.id);
      unsubscribe();
      store.clearInProgress();

      expect(events.map((e) => e.type)).toEqual(['records', 'in_progress', 'records']);
    });

    it('does not notify when the write fails', () => {
      const listener = vi.fn();
      store.subscribe(listener);
      storage.failWrites = true;

      expect(() =>
        store.add({
          startTime: new Date(2026, 5, 17, 9, 0),
          endTime: new Date(2026, 5, 17, 10, 0),
        })
      ).toThrow(PersistenceError);
      expect(listener).not.toHaveBeenCalled();
    });

    it('keeps the mutation when a listener throws', () => {
      store.subscribe(() => {
        throw new Error('listener broke');
      });

      store.add({
        startTime: new Date(2026, 5, 17, 9, 0),
        endTime: new Date(2026, 5, 17, 10, 0),
      });
      expect(store.size).toBe(1);
    });
  });

  it('flush rewrites the current state', () => {
    store.add({ startTime: new Date(2026, 5, 17, 9, 0), endTime: new Date(2026, 5, 17, 10, 0) });
    storage.remove(STORAGE_KEYS.records);

    store.flush();
    expect(WorkRecordStore.open(storage).size).toBe(1);
  });
});
