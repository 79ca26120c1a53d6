/**
 * Configuration access
 */

import type { TimecardConfig } from '../types/index.js';
import { loadGlobalConfig } from './global-config.js';

// Singleton config instance
let configInstance: TimecardConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): TimecardConfig {
  if (!configInstance) {
    configInstance = loadGlobalConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export {
  loadGlobalConfig,
  expandPath,
  schemas,
  DEFAULT_GEOCODING_ENDPOINT,
} from './global-config.js';
