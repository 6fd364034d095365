/**
 * ConfigCache - memoized configuration lookup keyed by normalized module root
 *
 * Config files do not change during a run, so each module root is resolved at
 * most once. Tests call clear() between cases.
 */

import { resolve } from 'path';
import { minimatch } from 'minimatch';
import type { RewrightConfig } from '@rewright/types';
import { DEFAULT_CONFIG, findConfigRoot, loadConfig } from './ConfigLoader.js';

type ConfigLogger = { warn: (msg: string) => void };

export class ConfigCache {
  private readonly byRoot = new Map<string, RewrightConfig>();
  private readonly byModule = new Map<string, RewrightConfig>();

  constructor(private readonly logger: ConfigLogger = console) {}

  /**
   * Config of one project root, without inheritance.
   */
  load(projectRoot: string): RewrightConfig {
    const root = resolve(projectRoot);
    let config = this.byRoot.get(root);
    if (!config) {
      config = loadConfig(root, this.logger);
      this.byRoot.set(root, config);
    }
    return config;
  }

  /**
   * Effective config of a module: its own, the nearest parent's, or defaults.
   */
  loadWithInheritance(moduleRoot: string): RewrightConfig {
    const root = resolve(moduleRoot);
    const cached = this.byModule.get(root);
    if (cached) {
      return cached;
    }
    const configRoot = findConfigRoot(root);
    const config = configRoot === null ? DEFAULT_CONFIG : this.load(configRoot);
    this.byModule.set(root, config);
    return config;
  }

  /** Number of memoized module lookups */
  get size(): number {
    return this.byModule.size;
  }

  clear(): void {
    this.byRoot.clear();
    this.byModule.clear();
  }
}

/**
 * Apply include/exclude globs to a unit path relative to the project root.
 * Exclude wins over include; no include means every unit.
 */
export function isUnitIncluded(config: RewrightConfig, relativePath: string): boolean {
  const path = relativePath.split('\\').join('/');
  if (config.include && !config.include.some(pattern => minimatch(path, pattern, { dot: true }))) {
    return false;
  }
  if (config.exclude && config.exclude.some(pattern => minimatch(path, pattern, { dot: true }))) {
    return false;
  }
  return true;
}
