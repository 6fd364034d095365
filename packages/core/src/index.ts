/**
 * @rewright/core - Conservative classify-then-rewrite engine
 */

// Error types
export {
  RewrightError,
  ConfigError,
  LanguageError,
  AnalysisError,
} from './errors/RewrightError.js';
export type { ErrorContext, PipelinePhase, RewrightErrorJSON } from './errors/RewrightError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, formatMessage } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector } from './diagnostics/DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput } from './diagnostics/DiagnosticCollector.js';

// Config
export {
  CONFIG_DIR,
  DEFAULT_CONFIG,
  hasConfig,
  loadConfig,
  findConfigRoot,
  resolveEffectiveTimerStrategy,
  validatePatterns,
  ConfigCache,
  isUnitIncluded,
} from './config/index.js';

// Engine
export { MigrationEngine } from './MigrationEngine.js';
export type { ProjectOptions } from './MigrationEngine.js';
export type { EngineOptions, EngineContext, UnitContext, UnitResult, EngineStats } from './EngineTypes.js';

// Source units
export { parseUnit } from './source/SourceUnit.js';
export type { SourceUnit, UnitInput } from './source/SourceUnit.js';
export { TypeResolver, LEGACY_NAMES } from './source/TypeResolver.js';
export type { LegacyName, ImportBinding } from './source/TypeResolver.js';

// Fact collection
export { FactCollector, isCreateOperation, configArgumentIndex } from './analysis/facts/FactCollector.js';
export { ConstantEvaluator } from './analysis/facts/ConstantEvaluator.js';
export type { ConstantFact } from './analysis/facts/ConstantEvaluator.js';
export { AliasTracer, trackedType, staticMemberName } from './analysis/facts/AliasTracer.js';
export type {
  AliasEntry,
  AliasTrace,
  ClassFacts,
  CollectedOccurrence,
  FieldFact,
  HopFact,
  TrackedType,
  UnitFacts,
} from './analysis/facts/types.js';

// Matching, classification, aggregation
export { PatternMatcher, aliasKey } from './analysis/shapes/PatternMatcher.js';
export type { MatchedShape, ScopeShapes, ShapeAnchor, TimerAnchor, TransactionAnchor } from './analysis/shapes/PatternMatcher.js';
export { Classifier } from './analysis/classify/Classifier.js';
export type { ClassifiedShape } from './analysis/classify/Classifier.js';
export { TRANSACTION_RULES, TIMER_RULES, unitOfWork } from './analysis/classify/rules.js';
export { ScopeAggregator, checkScopeInvariant, sortedReasons } from './analysis/scope/ScopeAggregator.js';
export type { AggregatedScope } from './analysis/scope/ScopeAggregator.js';

// Reporting and rewriting
export { REASON_DESCRIPTIONS, categoryFor, formatRationale, formatSuggestedAction } from './report/RationaleFormatter.js';
export { SourceEditor, lineStart, lineEnd, indentationAt } from './rewrite/SourceEditor.js';
export { ImportPlan } from './rewrite/ImportPlan.js';
export { Rewriter } from './rewrite/Rewriter.js';
export type { RewriteOutcome } from './rewrite/Rewriter.js';
export { TransactionRewriter, TRANSACTION_TEMPLATE } from './rewrite/TransactionRewriter.js';
export { TimerRewriter, TASK_SCHEDULER, scheduleCall } from './rewrite/TimerRewriter.js';
export { MarkerWriter, buildMarkerRecord, renderMarker, quoteString, collapseWhitespace } from './rewrite/MarkerWriter.js';
export type { MarkerOutcome } from './rewrite/MarkerWriter.js';
