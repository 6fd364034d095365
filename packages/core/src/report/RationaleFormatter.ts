/**
 * RationaleFormatter - renders ScopeFindings into stable one-line text
 *
 * Pure. Reasons and method names are sorted before concatenation, so the
 * same findings always give byte-identical text.
 */

import type { IdiomFamily, MarkerCategory, Reason, ScopeFindings } from '@rewright/types';

interface FamilyText {
  label: string;
  target: string;
  category: MarkerCategory;
  linearAdvice: string;
}

const FAMILY_TEXT: Record<IdiomFamily, FamilyText> = {
  transactions: {
    label: 'Manual transaction',
    target: 'TransactionTemplate',
    category: 'TRANSACTION',
    linearAdvice:
      'LINEAR PATTERNS: Replace try { tx.begin(); ... tx.commit(); } catch { tx.rollback(); } with ' +
      'transactionTemplate.executeWithoutResult(() => { ... }); ' +
      'Inject TransactionTemplate instead of UserTransaction. ',
  },
  timers: {
    label: 'Programmatic timer',
    target: 'TaskScheduler',
    category: 'SCHEDULING',
    linearAdvice:
      'LINEAR PATTERNS: Replace timerService.createTimer(delay, config) with ' +
      'taskScheduler.schedule(() => this.handler(), new Date(Date.now() + delay)); ' +
      'Inject TaskScheduler instead of TimerService. ',
  },
};

export const REASON_DESCRIPTIONS: Record<Reason, string> = {
  'binding-escape': 'Variables declared inside the transaction are used outside it',
  'control-flow-escape': 'Control flow leaves the transaction early',
  'dynamic-configuration': 'Timer configuration is not constant',
  'loop-enclosed': 'Calls inside loop',
  'missing-timeout-handler': 'No single parameterless timeout handler',
  'multiple-blocks': 'Multiple transaction blocks',
  'multiple-sources': 'Multiple resource sources used',
  'nested-callback': 'Calls inside nested callback',
  'no-pairing': 'Unpaired begin/commit calls',
  'no-rollback-handling': 'No explicit rollback handling',
  'persistent-timer': 'Timer is persistent',
  'return-value-used': 'Timer handle is used',
  'unresolved-type': 'Receiver type unresolved',
  'unsupported-operation': 'Unsupported operation on the resource',
};

export function categoryFor(family: IdiomFamily): MarkerCategory {
  return FAMILY_TEXT[family].category;
}

/**
 * `<Label> with N linear pattern(s) - can be converted to <Target>`, the
 * complex and mixed variants, then the sorted reasons in brackets.
 */
export function formatRationale(findings: ScopeFindings): string {
  const { label, target } = FAMILY_TEXT[findings.family];
  const { linearCount, complexCount } = findings;

  let head: string;
  if (complexCount === 0) {
    head = `${label} with ${linearCount} linear pattern(s) - can be converted to ${target}`;
  } else if (linearCount === 0) {
    head = `${label} with ${complexCount} complex pattern(s) - requires manual analysis`;
  } else {
    head = `${label} with mixed patterns (${linearCount} linear, ${complexCount} complex)`;
  }

  const reasons = [...findings.reasons].sort();
  return reasons.length > 0 ? `${head} [${reasons.join(', ')}]` : head;
}

export function formatSuggestedAction(findings: ScopeFindings): string {
  let text = '';
  if (findings.linearCount > 0) {
    text += FAMILY_TEXT[findings.family].linearAdvice;
  }
  if (findings.complexCount > 0) {
    text += 'COMPLEX PATTERNS: Analyze control flow carefully. ';
    const complex = findings.methods
      .filter(m => m.verdict === 'REVIEW-COMPLEX')
      .sort((a, b) => (a.method < b.method ? -1 : a.method > b.method ? 1 : 0));
    for (const method of complex) {
      const descriptions = [...method.reasons].sort().map(reason => REASON_DESCRIPTIONS[reason]);
      text += `${method.method}: ${descriptions.join(', ')}; `;
    }
  }
  return text.trimEnd();
}
