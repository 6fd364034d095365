/**
 * MigrationEngine - drives one unit at a time through the pipeline
 *
 * parse -> collect facts -> match shapes -> classify -> aggregate -> rewrite
 *
 * Units are independent: nothing learned from one unit is used for another,
 * and a failure in one unit leaves that unit unchanged without touching the
 * rest of the run. Only the counters in EngineStats outlive a unit.
 */

import type { FamilyMode, IdiomFamily, Logger, RewrightConfig } from '@rewright/types';
import { Classifier } from './analysis/classify/Classifier.js';
import { FactCollector } from './analysis/facts/FactCollector.js';
import { ScopeAggregator, type AggregatedScope } from './analysis/scope/ScopeAggregator.js';
import { PatternMatcher } from './analysis/shapes/PatternMatcher.js';
import { ConfigCache, isUnitIncluded } from './config/ConfigCache.js';
import { DEFAULT_CONFIG, loadConfig, resolveEffectiveTimerStrategy } from './config/ConfigLoader.js';
import { DiagnosticCollector } from './diagnostics/DiagnosticCollector.js';
import type { EngineContext, EngineOptions, EngineStats, UnitContext, UnitResult } from './EngineTypes.js';
import { LanguageError } from './errors/RewrightError.js';
import { createLogger } from './logging/Logger.js';
import { Rewriter } from './rewrite/Rewriter.js';
import { parseUnit, type UnitInput } from './source/SourceUnit.js';

export type { EngineOptions, EngineStats, UnitResult } from './EngineTypes.js';

export interface ProjectOptions extends Omit<EngineOptions, 'config'> {
  /** Shared cache; config is then resolved with inheritance from parent packages */
  cache?: ConfigCache;
}

function unchanged(input: UnitInput, diagnostics: DiagnosticCollector): UnitResult {
  return {
    file: input.file,
    code: input.code,
    changed: false,
    scopes: [],
    decorations: {},
    diagnostics: diagnostics.getAll(),
  };
}

export class MigrationEngine {
  private readonly context: EngineContext;
  private readonly modes: Record<IdiomFamily, FamilyMode>;
  private readonly families: IdiomFamily[];
  private readonly stats: EngineStats = {
    units: 0,
    changedUnits: 0,
    failedUnits: 0,
    rewrittenScopes: 0,
    markedScopes: 0,
    preservedScopes: 0,
  };

  /**
   * @throws ConfigError when the timer strategy and cluster mode conflict
   */
  constructor(options: EngineOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    const logger = options.logger ?? createLogger(options.logLevel ?? 'info', { logFile: options.logFile });
    const strategy = resolveEffectiveTimerStrategy(config.families.timers);

    this.context = { config, logger };
    this.modes = {
      transactions: config.families.transactions.mode,
      // Quartz jobs are out of reach of the scheduler rewrite
      timers: strategy === 'quartz' ? 'off' : config.families.timers.mode,
    };
    this.families = (['transactions', 'timers'] as const).filter(family => this.modes[family] !== 'off');

    logger.debug('Engine configured', { families: this.families.join(','), strategy });
  }

  /**
   * Engine for a project directory, reading `.rewright/config.yaml`.
   */
  static fromProject(root: string, options: ProjectOptions = {}): MigrationEngine {
    const { cache, ...rest } = options;
    const config: RewrightConfig = cache ? cache.loadWithInheritance(root) : loadConfig(root, rest.logger);
    return new MigrationEngine({ ...rest, config });
  }

  get config(): RewrightConfig {
    return this.context.config;
  }

  get logger(): Logger {
    return this.context.logger;
  }

  processUnit(input: UnitInput): UnitResult {
    const { config, logger } = this.context;
    const diagnostics = new DiagnosticCollector();
    this.stats.units++;

    if (!isUnitIncluded(config, input.file)) {
      logger.debug('Unit excluded', { file: input.file });
      return unchanged(input, diagnostics);
    }

    const unitContext: UnitContext = { config, logger, file: input.file, diagnostics };
    try {
      const unit = parseUnit(input);
      const facts = new FactCollector(unitContext).collect(unit);
      const matched = new PatternMatcher().match(facts, this.families);

      const classifier = new Classifier(this.modes);
      const aggregator = new ScopeAggregator();
      const scopes: AggregatedScope[] = matched.map(({ owner, family, shapes }) =>
        aggregator.aggregate(owner, family, classifier.classifyAll(shapes))
      );

      const outcome = new Rewriter(unitContext).rewrite(facts, scopes);
      this.count(outcome.changed, outcome.scopes.map(scope => scope.action));
      logger.info('Unit processed', { file: input.file, scopes: scopes.length, changed: outcome.changed });

      return {
        file: input.file,
        code: outcome.code,
        changed: outcome.changed,
        scopes: outcome.scopes,
        decorations: outcome.decorations,
        diagnostics: diagnostics.getAll(),
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.stats.failedUnits++;
      if (error instanceof LanguageError) {
        logger.warn('Unit skipped', { file: input.file, error: error.message });
        diagnostics.addError(error, 'PARSE');
      } else {
        logger.error('Unit left unchanged', { file: input.file, error: error.message });
        diagnostics.addError(error, 'REWRITE');
      }
      return unchanged(input, diagnostics);
    }
  }

  processUnits(inputs: readonly UnitInput[]): UnitResult[] {
    return inputs.map(input => this.processUnit(input));
  }

  getStats(): EngineStats {
    return { ...this.stats };
  }

  private count(changed: boolean, actions: readonly string[]): void {
    if (changed) this.stats.changedUnits++;
    for (const action of actions) {
      if (action === 'rewrite') this.stats.rewrittenScopes++;
      else if (action === 'marker') this.stats.markedScopes++;
      else this.stats.preservedScopes++;
    }
  }
}
