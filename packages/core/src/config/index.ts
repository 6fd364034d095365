/**
 * Configuration loading utilities
 */
export {
  CONFIG_DIR,
  DEFAULT_CONFIG,
  hasConfig,
  loadConfig,
  findConfigRoot,
  resolveEffectiveTimerStrategy,
  validatePatterns,
} from './ConfigLoader.js';
export { ConfigCache, isUnitIncluded } from './ConfigCache.js';
