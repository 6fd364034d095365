/**
 * Classifier - applies the family's rule table to each matched shape
 *
 * Every rule is evaluated so the rationale lists all disqualifying reasons;
 * the first applicable rule gives the primary reason. A shape no rule
 * disqualifies is SAFE, or REVIEW-LINEAR when the family only annotates.
 */

import type { Classification, ClassifiedMatch, FamilyMode, IdiomFamily, Reason } from '@rewright/types';
import type { MatchedShape } from '../shapes/PatternMatcher.js';
import { TIMER_RULES, TRANSACTION_RULES, type ClassificationRule } from './rules.js';

export interface ClassifiedShape extends MatchedShape, ClassifiedMatch {}

function rulesFor(family: IdiomFamily): readonly ClassificationRule[] {
  switch (family) {
    case 'transactions':
      return TRANSACTION_RULES;
    case 'timers':
      return TIMER_RULES;
  }
}

export class Classifier {
  constructor(private readonly modes: Record<IdiomFamily, FamilyMode>) {}

  classify(shape: MatchedShape): Classification {
    const reasons: Reason[] = [];
    for (const rule of rulesFor(shape.family)) {
      if (!reasons.includes(rule.reason) && rule.applies(shape)) {
        reasons.push(rule.reason);
      }
    }

    if (reasons.length > 0) {
      return { verdict: 'REVIEW-COMPLEX', reasons, primary: reasons[0] };
    }
    const verdict = this.modes[shape.family] === 'annotate' ? 'REVIEW-LINEAR' : 'SAFE';
    return { verdict, reasons, primary: null };
  }

  classifyAll(shapes: readonly MatchedShape[]): ClassifiedShape[] {
    return shapes.map(shape => ({ ...shape, classification: this.classify(shape) }));
  }
}
