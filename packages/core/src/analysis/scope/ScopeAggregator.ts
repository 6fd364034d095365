/**
 * ScopeAggregator - all-or-nothing merge of shape verdicts per class and family
 *
 * One REVIEW anywhere in a class downgrades the whole class: a partially
 * rewritten declaration would leave some call sites on the old idiom.
 * Counts are per method: a method is complex when any of its shapes is.
 */

import type { IdiomFamily, MethodFindings, Reason, ScopeFindings, Verdict } from '@rewright/types';
import { AnalysisError } from '../../errors/RewrightError.js';
import type { ClassFacts } from '../facts/types.js';
import type { ClassifiedShape } from '../classify/Classifier.js';

export interface AggregatedScope {
  owner: ClassFacts;
  findings: ScopeFindings;
  shapes: ClassifiedShape[];
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function sortedReasons(reasons: Iterable<Reason>): Reason[] {
  return [...new Set(reasons)].sort(compareText);
}

function mergeVerdicts(verdicts: readonly Verdict[]): Verdict {
  if (verdicts.includes('REVIEW-COMPLEX')) return 'REVIEW-COMPLEX';
  if (verdicts.every(verdict => verdict === 'SAFE')) return 'SAFE';
  return 'REVIEW-LINEAR';
}

export class ScopeAggregator {
  aggregate(owner: ClassFacts, family: IdiomFamily, shapes: ClassifiedShape[]): AggregatedScope {
    const byMethod = new Map<string, ClassifiedShape[]>();
    for (const shape of shapes) {
      const list = byMethod.get(shape.method) ?? [];
      list.push(shape);
      byMethod.set(shape.method, list);
    }

    const methods: MethodFindings[] = [...byMethod.entries()]
      .map(([method, inMethod]) => ({
        method,
        verdict: mergeVerdicts(inMethod.map(s => s.classification.verdict)),
        reasons: sortedReasons(inMethod.flatMap(s => s.classification.reasons)),
      }))
      .sort((a, b) => compareText(a.method, b.method));

    const complexCount = methods.filter(m => m.verdict === 'REVIEW-COMPLEX').length;
    const findings: ScopeFindings = {
      scope: owner.name,
      family,
      verdict: mergeVerdicts(shapes.map(s => s.classification.verdict)),
      linearCount: methods.length - complexCount,
      complexCount,
      reasons: sortedReasons(shapes.flatMap(s => s.classification.reasons)),
      methods,
      matches: shapes,
    };
    return { owner, findings, shapes };
  }
}

/**
 * A SAFE scope must contain only SAFE matches, and a scope holding only SAFE
 * matches must be SAFE.
 *
 * @throws AnalysisError ERR_INVARIANT_VIOLATION
 */
export function checkScopeInvariant(findings: ScopeFindings): void {
  const allSafe = findings.matches.every(match => match.classification.verdict === 'SAFE');
  const consistent = findings.verdict === 'SAFE' ? allSafe : !allSafe;
  const counted = findings.linearCount + findings.complexCount === findings.methods.length;
  if (consistent && counted) return;

  throw new AnalysisError(
    `Scope ${findings.scope} (${findings.family}) is ${findings.verdict} but its matches disagree`,
    'ERR_INVARIANT_VIOLATION',
    { phase: 'AGGREGATE', scope: findings.scope }
  );
}
