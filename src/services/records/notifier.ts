/**
 * Observer list for store change events
 */

import type { StoreChangeType, StoreListener } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

export class ChangeNotifier {
  private readonly listeners = new Set<StoreListener>();

  /**
   * Register a listener; the returned function unregisters it
   */
  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected emit(type: StoreChangeType): void {
    const event = { type, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        // A failing observer must not undo a committed mutation
        logger.warn(`Change listener failed for '${type}'`, error);
      }
    }
  }
}
