/**
 * Shared helpers for pipeline tests: silent context, fact collection, scope analysis.
 */

import {
  Classifier,
  DEFAULT_CONFIG,
  DiagnosticCollector,
  FactCollector,
  PatternMatcher,
  ScopeAggregator,
  createLogger,
  parseUnit,
  type AggregatedScope,
  type ClassifiedShape,
  type UnitContext,
  type UnitFacts,
} from '@rewright/core';
import type { IdiomFamily, RewrightConfig } from '@rewright/types';

export const FAMILIES: IdiomFamily[] = ['transactions', 'timers'];

export function unitContext(file = 'src/Subject.ts', config: RewrightConfig = DEFAULT_CONFIG): UnitContext {
  return { config, logger: createLogger('silent'), file, diagnostics: new DiagnosticCollector() };
}

export function collect(code: string, file = 'src/Subject.ts', config: RewrightConfig = DEFAULT_CONFIG): {
  facts: UnitFacts;
  context: UnitContext;
} {
  const context = unitContext(file, config);
  const facts = new FactCollector(context).collect(parseUnit({ file, code }));
  return { facts, context };
}

export function classifyShapes(code: string, family: IdiomFamily): ClassifiedShape[] {
  const { facts } = collect(code);
  const classifier = new Classifier({ transactions: 'rewrite', timers: 'rewrite' });
  return new PatternMatcher()
    .match(facts, [family])
    .flatMap(scope => classifier.classifyAll(scope.shapes));
}

export function analyze(code: string, config: RewrightConfig = DEFAULT_CONFIG): {
  facts: UnitFacts;
  context: UnitContext;
  scopes: AggregatedScope[];
} {
  const { facts, context } = collect(code, 'src/Subject.ts', config);
  const classifier = new Classifier({
    transactions: config.families.transactions.mode,
    timers: config.families.timers.mode,
  });
  const aggregator = new ScopeAggregator();
  const scopes = new PatternMatcher()
    .match(facts, FAMILIES)
    .map(({ owner, family, shapes }) => aggregator.aggregate(owner, family, classifier.classifyAll(shapes)));
  return { facts, context, scopes };
}

/**
 * Join lines with '\n'; keeps expected sources readable in tests.
 */
export function lines(...text: string[]): string {
  return text.join('\n');
}
