/**
 * Company registry: names offered when tagging a session
 *
 * Independent of the records; removing a name leaves existing records untouched.
 */

import { InvalidInputError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { STORAGE_KEYS } from '../storage/kv-storage.js';
import type { KeyValueStorage } from '../storage/kv-storage.js';
import { loadBlob, persist, unreadableKeyError } from '../storage/blob.js';
import { decodeCompanyNames, encodeCompanyNames } from './codec.js';
import { ChangeNotifier } from './notifier.js';

export class CompanyRegistry extends ChangeNotifier {
  private names: ReadonlySet<string> = new Set();
  private readFailed = false;

  constructor(private readonly storage: KeyValueStorage) {
    super();
  }

  static open(storage: KeyValueStorage): CompanyRegistry {
    const registry = new CompanyRegistry(storage);
    registry.load();
    return registry;
  }

  load(): void {
    const loaded = loadBlob(this.storage, STORAGE_KEYS.companies, decodeCompanyNames, []);
    this.names = new Set(loaded.value);
    this.readFailed = loaded.readFailed;
  }

  /**
   * Sorted for stable display
   */
  list(): string[] {
    return Array.from(this.names).sort();
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Add a name (trimmed, case-sensitive). Returns false when already present.
   */
  add(name: string): boolean {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new InvalidInputError('Company name cannot be empty');
    }
    this.ensureReadable();
    if (this.names.has(trimmed)) {
      return false;
    }

    this.commit(new Set([...this.names, trimmed]));
    logger.info(`Added company: ${trimmed}`);
    return true;
  }

  /**
   * Remove a name. Returns false when it was not registered.
   */
  remove(name: string): boolean {
    this.ensureReadable();
    if (!this.names.has(name)) {
      return false;
    }

    const next = new Set(this.names);
    next.delete(name);
    this.commit(next);
    logger.info(`Removed company: ${name}`);
    return true;
  }

  /**
   * Rewrite the stored list; skipped when it could not be read at load time
   */
  flush(): void {
    if (this.readFailed) {
      logger.warn(`Not flushing '${STORAGE_KEYS.companies}': its stored value was never read`);
      return;
    }
    persist(this.storage, [
      { key: STORAGE_KEYS.companies, value: encodeCompanyNames(Array.from(this.names)) },
    ]);
  }

  /**
   * Retry a failed read before anything overwrites the stored list
   */
  private ensureReadable(): void {
    if (!this.readFailed) return;

    this.load();
    if (this.readFailed) {
      throw unreadableKeyError(STORAGE_KEYS.companies);
    }
  }

  private commit(next: ReadonlySet<string>): void {
    persist(this.storage, [
      { key: STORAGE_KEYS.companies, value: encodeCompanyNames(Array.from(next)) },
    ]);
    this.names = next;
    this.emit('companies');
  }
}
