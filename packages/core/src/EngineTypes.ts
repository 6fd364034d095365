/**
 * Types shared by MigrationEngine and the pipeline stages it drives.
 */

import type { Logger, LogLevel, MarkerRecord, RewrightConfig, ScopeReport } from '@rewright/types';
import type { DiagnosticCollector, Diagnostic } from './diagnostics/DiagnosticCollector.js';

/**
 * MigrationEngine options
 */
export interface EngineOptions {
  /** Resolved configuration. Defaults to DEFAULT_CONFIG. */
  config?: RewrightConfig;
  /** Logger instance for structured logging. */
  logger?: Logger;
  /** Log level for the default logger. Ignored if logger is provided. */
  logLevel?: LogLevel;
  /** Also write debug output to this file. Ignored if logger is provided. */
  logFile?: string;
}

/**
 * Read-only context threaded through every stage.
 */
export interface EngineContext {
  readonly config: RewrightConfig;
  readonly logger: Logger;
}

/**
 * Context of one unit; diagnostics never outlive the unit.
 */
export interface UnitContext extends EngineContext {
  readonly file: string;
  readonly diagnostics: DiagnosticCollector;
}

export interface UnitResult {
  file: string;
  /** Rewritten text, or the input text when nothing changed */
  code: string;
  changed: boolean;
  scopes: ScopeReport[];
  /** Marker records keyed by declaration id (`<file>#<ClassName>@<line>`) */
  decorations: Record<string, MarkerRecord[]>;
  diagnostics: Diagnostic[];
}

/**
 * Process-wide counters. Diagnostic only.
 */
export interface EngineStats {
  units: number;
  changedUnits: number;
  failedUnits: number;
  rewrittenScopes: number;
  markedScopes: number;
  preservedScopes: number;
}
