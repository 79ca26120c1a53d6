/**
 * Key-value storage seam
 *
 * The store and company registry persist whole JSON blobs under fixed keys.
 * Production uses the SQLite backend; tests inject the in-memory one.
 */

export const STORAGE_KEYS = {
  records: 'work_records',
  inProgress: 'in_progress_session',
  companies: 'company_names',
} as const;

export type StorageKey = (typeof STORAGE_KEYS)[keyof typeof STORAGE_KEYS];

// A null value removes the key
export interface StorageChange {
  key: string;
  value: string | null;
}

/**
 * Synchronous blob storage. Implementations throw on I/O failure.
 */
export interface KeyValueStorage {
  get(key: string): string | null;
  set(key: string, value: string): void;
  remove(key: string): void;
  /** Apply every change or none of them */
  writeBatch(changes: readonly StorageChange[]): void;
  close(): void;
}

/**
 * Map-backed storage for tests and ephemeral runs
 */
export class MemoryKeyValueStorage implements KeyValueStorage {
  private readonly entries = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.entries.set(key, value);
      }
    }
  }

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  writeBatch(changes: readonly StorageChange[]): void {
    for (const change of changes) {
      if (change.value === null) {
        this.entries.delete(change.key);
      } else {
        this.entries.set(change.key, change.value);
      }
    }
  }

  close(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
