import { readFileSync, existsSync, statSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import {
  FAMILY_MODES,
  TIMER_STRATEGIES,
  CLUSTER_MODES,
  type RewrightConfig,
  type TimerFamilyConfig,
  type TimerStrategy,
} from '@rewright/types';
import { ConfigError } from '../errors/RewrightError.js';

/**
 * Project configuration.
 *
 * YAML Location: .rewright/config.yaml (preferred) or .rewright/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * families:
 *   transactions:
 *     mode: rewrite          # rewrite | annotate | off
 *   timers:
 *     mode: annotate
 *     strategy: taskscheduler  # scheduled | taskscheduler | quartz
 *     cluster: none            # none | quartz-jdbc | shedlock
 *
 * modules:
 *   legacy:
 *     - "@legacy/container"
 *   transactions: "@platform/transactions"
 *   scheduling: "@platform/scheduling"
 *
 * markers:
 *   module: "@platform/migration"
 *   name: NeedsReview
 *
 * exclude:
 *   - "**\/*.generated.ts"
 * ```
 *
 * Sub-packages without their own config inherit the nearest one found in a
 * parent package, up to the repository root.
 */
export const CONFIG_DIR = '.rewright';

export const DEFAULT_CONFIG: RewrightConfig = {
  families: {
    transactions: { mode: 'rewrite' },
    timers: { mode: 'rewrite', strategy: 'scheduled', cluster: 'none' },
  },
  modules: {
    legacy: ['@legacy/container'],
    transactions: '@platform/transactions',
    scheduling: '@platform/scheduling',
  },
  markers: {
    module: '@platform/migration',
    name: 'NeedsReview',
  },
};

type ConfigLogger = { warn: (msg: string) => void };

/**
 * True when the directory carries its own config file.
 */
export function hasConfig(projectPath: string): boolean {
  const configDir = join(projectPath, CONFIG_DIR);
  return existsSync(join(configDir, 'config.yaml')) || existsSync(join(configDir, 'config.json'));
}

/**
 * Load config from one project directory (no inheritance).
 *
 * Priority:
 * 1. config.yaml
 * 2. config.json (deprecated)
 * 3. DEFAULT_CONFIG
 *
 * Unparseable files log a warning and fall back to defaults.
 * Parseable files with invalid values throw ConfigError.
 */
export function loadConfig(projectPath: string, logger: ConfigLogger = console): RewrightConfig {
  const configDir = join(projectPath, CONFIG_DIR);
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  if (existsSync(yamlPath)) {
    let parsed: unknown;
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
    // Validation stays outside the try: invalid values must throw
    return buildConfig(parsed, yamlPath, logger);
  }

  if (existsSync(jsonPath)) {
    logger.warn('config.json is deprecated. Move the settings to .rewright/config.yaml');

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
    return buildConfig(parsed, jsonPath, logger);
  }

  return DEFAULT_CONFIG;
}

/**
 * Find the directory whose config applies to moduleRoot.
 *
 * The module's own config wins. Otherwise parents are searched for a config
 * beside a package.json, stopping at the repository root (the directory holding .git)
 * or the filesystem root. Returns null when nothing applies.
 */
export function findConfigRoot(moduleRoot: string): string | null {
  const start = resolve(moduleRoot);
  if (hasConfig(start)) {
    return start;
  }

  let current = start;
  while (!isRepositoryRoot(current)) {
    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
    if (hasConfig(current) && existsSync(join(current, 'package.json'))) {
      return current;
    }
  }
  return null;
}

function isRepositoryRoot(dir: string): boolean {
  const gitPath = join(dir, '.git');
  return existsSync(gitPath) && statSync(gitPath).isDirectory();
}

/**
 * Timer strategy the engine runs with, after checking it against the cluster mode.
 * THROWS ConfigError on conflicting choices.
 *
 * - quartz-jdbc clustering needs the quartz strategy
 * - shedlock locks scheduler methods and cannot guard quartz jobs
 */
export function resolveEffectiveTimerStrategy(timers: TimerFamilyConfig): TimerStrategy {
  if (timers.cluster === 'quartz-jdbc' && timers.strategy !== 'quartz') {
    throw new ConfigError(
      `Config error: cluster "quartz-jdbc" requires strategy "quartz", got "${timers.strategy}"`,
      'ERR_CONFIG_CONFLICT',
      { key: 'families.timers.cluster' },
      'Set families.timers.strategy to "quartz" or choose another cluster mode'
    );
  }
  if (timers.cluster === 'shedlock' && timers.strategy === 'quartz') {
    throw new ConfigError(
      'Config error: cluster "shedlock" cannot be combined with strategy "quartz"',
      'ERR_CONFIG_CONFLICT',
      { key: 'families.timers.cluster' },
      'Use cluster "quartz-jdbc" with the quartz strategy'
    );
  }
  return timers.strategy;
}

/**
 * Validate include/exclude patterns.
 * THROWS on error; warns when include is empty (nothing would be processed).
 */
export function validatePatterns(include: unknown, exclude: unknown, logger: ConfigLogger): void {
  readPatterns(include, 'include', logger);
  readPatterns(exclude, 'exclude', logger);
}

// === Internal ===

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, source: string): ConfigError {
  return new ConfigError(`Config error: ${message}`, 'ERR_CONFIG_INVALID', { filePath: source });
}

function readSection(value: unknown, key: string, source: string): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid(`${key} must be a mapping, got ${Array.isArray(value) ? 'array' : typeof value}`, source);
  }
  return value;
}

function readEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  key: string,
  fallback: T,
  source: string
): T {
  if (value === undefined || value === null) {
    return fallback;
  }
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw invalid(`${key} must be one of ${allowed.join(', ')}, got "${String(value)}"`, source);
  }
  return match;
}

function readString(value: unknown, key: string, fallback: string, source: string): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw invalid(`${key} must be a string, got ${typeof value}`, source);
  }
  if (!value.trim()) {
    throw invalid(`${key} cannot be empty or whitespace-only`, source);
  }
  return value;
}

function readStringList(value: unknown, key: string, source: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw invalid(`${key} must be an array, got ${typeof value}`, source);
  }
  const result: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item !== 'string') {
      throw invalid(`${key}[${i}] must be a string, got ${typeof item}`, source);
    }
    if (!item.trim()) {
      throw invalid(`${key}[${i}] cannot be empty or whitespace-only`, source);
    }
    result.push(item);
  });
  return result;
}

function readPatterns(
  value: unknown,
  key: 'include' | 'exclude',
  logger: ConfigLogger,
  source = 'config'
): string[] | undefined {
  const patterns = readStringList(value, key, source);
  if (key === 'include' && patterns?.length === 0) {
    logger.warn('Warning: include is an empty array - no files will be processed');
  }
  return patterns;
}

/**
 * Merge a parsed document over DEFAULT_CONFIG, validating every value.
 */
function buildConfig(raw: unknown, source: string, logger: ConfigLogger): RewrightConfig {
  // Empty file or comments only
  if (raw === undefined || raw === null) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(raw)) {
    throw invalid('config root must be a mapping', source);
  }

  const families = readSection(raw.families, 'families', source);
  const transactions = readSection(families.transactions, 'families.transactions', source);
  const timers = readSection(families.timers, 'families.timers', source);
  const modules = readSection(raw.modules, 'modules', source);
  const markers = readSection(raw.markers, 'markers', source);
  const defaults = DEFAULT_CONFIG;

  const legacy = readStringList(modules.legacy, 'modules.legacy', source) ?? defaults.modules.legacy;
  if (legacy.length === 0) {
    throw invalid('modules.legacy must name at least one module', source);
  }

  return {
    families: {
      transactions: {
        mode: readEnum(transactions.mode, FAMILY_MODES, 'families.transactions.mode', defaults.families.transactions.mode, source),
      },
      timers: {
        mode: readEnum(timers.mode, FAMILY_MODES, 'families.timers.mode', defaults.families.timers.mode, source),
        strategy: readEnum(timers.strategy, TIMER_STRATEGIES, 'families.timers.strategy', defaults.families.timers.strategy, source),
        cluster: readEnum(timers.cluster, CLUSTER_MODES, 'families.timers.cluster', defaults.families.timers.cluster, source),
      },
    },
    modules: {
      legacy,
      transactions: readString(modules.transactions, 'modules.transactions', defaults.modules.transactions, source),
      scheduling: readString(modules.scheduling, 'modules.scheduling', defaults.modules.scheduling, source),
    },
    markers: {
      module: readString(markers.module, 'markers.module', defaults.markers.module, source),
      name: readString(markers.name, 'markers.name', defaults.markers.name, source),
    },
    // undefined means "no filtering"; YAML null collapses to undefined
    include: readPatterns(raw.include, 'include', logger, source),
    exclude: readPatterns(raw.exclude, 'exclude', logger, source),
  };
}
