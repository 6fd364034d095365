/**
 * Migration Types - facts, shapes and verdicts produced by the classify-then-rewrite pipeline
 */

// === IDIOM FAMILIES ===
export const IDIOM_FAMILY = {
  TRANSACTIONS: 'transactions',
  TIMERS: 'timers',
} as const;

export type IdiomFamily = typeof IDIOM_FAMILY[keyof typeof IDIOM_FAMILY];

// === OPERATIONS ===
/**
 * Kind of a tracked call site.
 * 'other' covers any use of a tracked resource that is not a recognized operation
 * (unknown method, escaping reference, reassignment).
 */
export type OperationKind =
  | 'begin'
  | 'commit'
  | 'rollback'
  | 'create-timer'
  | 'create-single-action-timer'
  | 'create-interval-timer'
  | 'construct-config'
  | 'configure'
  | 'other';

export type Literalness = 'LITERAL' | 'CONSTANT_FOLDABLE' | 'DYNAMIC';

/**
 * Statement frame an occurrence sits in, innermost first.
 */
export type StatementContext =
  | 'try-body'
  | 'catch-body'
  | 'finally-body'
  | 'loop-body'
  | 'branch'
  | 'nested-function'
  | 'plain';

export type Resolution = 'RESOLVED' | 'UNRESOLVED';

export type ConstantValue = string | number | boolean | null;

export interface SourcePosition {
  line: number;
  column: number;
}

export interface ArgumentFact {
  literalness: Literalness;
  /** Folded value, present unless DYNAMIC */
  value?: ConstantValue;
  /** Source text of the argument */
  text: string;
}

/**
 * One recorded call site (or use) of a tracked resource.
 * Immutable once recorded.
 */
export interface Occurrence {
  id: number;
  family: IdiomFamily;
  op: OperationKind;
  /** Member name as written at the call site ('<reference>' for bare uses) */
  member: string;
  /** Normalized alias identity, null when the receiver could not be traced */
  alias: string | null;
  resolution: Resolution;
  /** Frames from the occurrence outwards to its method, innermost first */
  frames: StatementContext[];
  inLoop: boolean;
  deferred: boolean;
  /** Enclosing class name, null outside any class */
  scope: string | null;
  method: string | null;
  args: ArgumentFact[];
  /** True when the call's result feeds into an expression */
  valueUsed: boolean;
  position: SourcePosition;
  snippet: string;
}

// === SHAPES ===
export type ShapeTag =
  | 'LINEAR'
  | 'LOOP-ENCLOSED'
  | 'MULTI-BLOCK'
  | 'MIXED-SOURCE'
  | 'UNPAIRED'
  | 'DEFERRED';

export interface ShapeMatch {
  family: IdiomFamily;
  scope: string;
  method: string;
  tags: ShapeTag[];
  /** Occurrence ids consumed by this match */
  occurrences: number[];
  position: SourcePosition;
}

// === VERDICTS ===
export type Verdict = 'SAFE' | 'REVIEW-LINEAR' | 'REVIEW-COMPLEX';

export const REASONS = [
  'binding-escape',
  'control-flow-escape',
  'dynamic-configuration',
  'loop-enclosed',
  'missing-timeout-handler',
  'multiple-blocks',
  'multiple-sources',
  'nested-callback',
  'no-pairing',
  'no-rollback-handling',
  'persistent-timer',
  'return-value-used',
  'unresolved-type',
  'unsupported-operation',
] as const;

export type Reason = typeof REASONS[number];

export interface Classification {
  verdict: Verdict;
  /** Ordered by rule table, deduplicated */
  reasons: Reason[];
  primary: Reason | null;
}

export interface ClassifiedMatch extends ShapeMatch {
  classification: Classification;
}

// === SCOPES ===
export interface MethodFindings {
  method: string;
  verdict: Verdict;
  reasons: Reason[];
}

export interface ScopeFindings {
  scope: string;
  family: IdiomFamily;
  verdict: Verdict;
  /** Number of methods whose patterns are all linear */
  linearCount: number;
  /** Number of methods with at least one complex pattern */
  complexCount: number;
  reasons: Reason[];
  methods: MethodFindings[];
  matches: ClassifiedMatch[];
}

// === MARKERS ===
export type MarkerCategory = 'TRANSACTION' | 'SCHEDULING';

export interface MarkerRecord {
  category: MarkerCategory;
  rationale: string;
  originalCode: string;
  suggestedAction: string;
}

export type ScopeAction = 'rewrite' | 'marker' | 'marker-preserved' | 'marker-skipped-legacy';

export interface ScopeReport {
  file: string;
  scope: string;
  family: IdiomFamily;
  verdict: Verdict;
  linearCount: number;
  complexCount: number;
  reasons: Reason[];
  methods: MethodFindings[];
  action: ScopeAction;
  rationale: string;
  suggestedAction: string;
  marker?: MarkerRecord;
}
