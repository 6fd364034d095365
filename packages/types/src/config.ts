/**
 * Configuration Types - resolved project settings threaded through the engine
 */

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 * Pipeline stages log through the engine context instead of console.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

// === FAMILY SETTINGS ===
/**
 * rewrite  - SAFE scopes are rewritten, others marked
 * annotate - every participating scope is marked, nothing is rewritten
 * off      - family is not analyzed
 */
export const FAMILY_MODES = ['rewrite', 'annotate', 'off'] as const;
export type FamilyMode = typeof FAMILY_MODES[number];

export const TIMER_STRATEGIES = ['scheduled', 'taskscheduler', 'quartz'] as const;
export type TimerStrategy = typeof TIMER_STRATEGIES[number];

export const CLUSTER_MODES = ['none', 'quartz-jdbc', 'shedlock'] as const;
export type ClusterMode = typeof CLUSTER_MODES[number];

export interface TransactionFamilyConfig {
  mode: FamilyMode;
}

export interface TimerFamilyConfig {
  mode: FamilyMode;
  strategy: TimerStrategy;
  cluster: ClusterMode;
}

export interface ModuleConfig {
  /** Modules whose exports are the legacy API */
  legacy: string[];
  /** Module exporting TransactionTemplate */
  transactions: string;
  /** Module exporting TaskScheduler */
  scheduling: string;
}

export interface MarkerConfig {
  /** Module exporting the review decorator */
  module: string;
  /** Exported name of the review decorator */
  name: string;
}

export interface RewrightConfig {
  families: {
    transactions: TransactionFamilyConfig;
    timers: TimerFamilyConfig;
  };
  modules: ModuleConfig;
  markers: MarkerConfig;
  /** Glob patterns of units to process (relative to project root) */
  include?: string[];
  /** Glob patterns of units to skip */
  exclude?: string[];
}
