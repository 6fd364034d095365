/**
 * RewrightError - Error hierarchy for the migration engine
 *
 * All errors extend the native JavaScript Error class so callers can keep
 * treating them as plain Errors.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation/conflict errors (fatal)
 * - LanguageError: Unparseable compilation units (warning)
 * - AnalysisError: Internal analyzer failures, overlapping edits, broken invariants (error)
 */

/**
 * Pipeline stage an error or diagnostic originates from
 */
export type PipelinePhase =
  | 'CONFIG'
  | 'PARSE'
  | 'COLLECT'
  | 'MATCH'
  | 'CLASSIFY'
  | 'AGGREGATE'
  | 'REWRITE';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  phase?: PipelinePhase;
  scope?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of RewrightError
 */
export interface RewrightErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all engine errors.
 */
export abstract class RewrightError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for the diagnostics log
   */
  toJSON(): RewrightErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - unparseable values, invalid enums, conflicting choices.
 * Raised before any unit is touched.
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_CONFLICT
 */
export class ConfigError extends RewrightError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, { phase: 'CONFIG', ...context }, suggestion);
    this.code = code;
  }
}

/**
 * Language error - unit could not be parsed
 *
 * Severity: warning (always)
 * Codes: ERR_PARSE_FAILURE
 */
export class LanguageError extends RewrightError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, { phase: 'PARSE', ...context }, suggestion);
    this.code = code;
  }
}

/**
 * Analysis error - internal analyzer failure
 *
 * Severity: error (always)
 * Codes: ERR_ANALYSIS_INTERNAL, ERR_EDIT_OVERLAP, ERR_INVARIANT_VIOLATION
 */
export class AnalysisError extends RewrightError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
