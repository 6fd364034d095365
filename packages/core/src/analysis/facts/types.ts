/**
 * Internal fact shapes. They extend the public records in @rewright/types
 * with the AST anchors the matcher and rewriter need.
 */
import type * as t from '@babel/types';
import type { Occurrence } from '@rewright/types';
import type { NodePath, Binding } from '../ast/babelTraverse.js';
import type { LegacyName, TypeResolver } from '../../source/TypeResolver.js';
import type { SourceUnit } from '../../source/SourceUnit.js';
import type { ConstantEvaluator } from './ConstantEvaluator.js';

export type TrackedType = Exclude<LegacyName, 'Timeout'>;

export type AliasKind = 'field' | 'param' | 'factory' | 'local' | 'construct';

/**
 * A local declaration passed through while tracing a receiver back to its source.
 */
export interface HopFact {
  declarator: NodePath<t.VariableDeclarator>;
  /** Assignment statement of a declare-then-assign pair */
  assignment?: NodePath<t.ExpressionStatement>;
  binding: Binding;
}

export interface FieldFact {
  name: string;
  type: LegacyName | null;
  annotated: boolean;
  kind: 'property' | 'parameter';
  path: NodePath<t.ClassProperty> | NodePath<t.TSParameterProperty>;
}

/**
 * Result of tracing a receiver expression. `null` from the tracer means the
 * receiver has a known type that is not tracked.
 */
export type AliasTrace =
  | {
      resolution: 'RESOLVED';
      id: string;
      type: TrackedType;
      kind: AliasKind;
      field?: FieldFact;
      hops: HopFact[];
    }
  | {
      resolution: 'UNRESOLVED';
      id: null;
      type: null;
      hops: HopFact[];
    };

export type ResolvedTrace = Extract<AliasTrace, { resolution: 'RESOLVED' }>;

export interface MethodFact {
  name: string;
  paramCount: number;
  path: NodePath<t.ClassMethod> | NodePath<t.ClassPrivateMethod>;
}

export interface TimeoutHandlerFact {
  method: string;
  paramCount: number;
  decorator: NodePath<t.Decorator>;
}

export interface ExistingMarker {
  /** null for markers written with an older schema */
  category: string | null;
  legacy: boolean;
  decorator: NodePath<t.Decorator>;
}

export interface ClassFacts {
  name: string;
  /** Declaration identity used by the decorations side table */
  declarationId: string;
  path: NodePath<t.ClassDeclaration>;
  /** Statement the class occupies (the export declaration when exported) */
  statement: NodePath<t.Statement>;
  fields: Map<string, FieldFact>;
  methods: MethodFact[];
  timeoutHandlers: TimeoutHandlerFact[];
  markers: ExistingMarker[];
}

export type ConfigArgumentKind = 'traced' | 'absent' | 'not-config' | 'untraceable';

export interface ConfigArgument {
  kind: ConfigArgumentKind;
  alias: string | null;
}

export interface CollectedOccurrence extends Occurrence {
  path: NodePath;
  trace: AliasTrace;
  /** Expression statement holding the call as its whole expression (optionally awaited) */
  statement: NodePath<t.ExpressionStatement> | null;
  awaited: boolean;
  classFacts: ClassFacts | null;
  argPaths: NodePath[];
  /** Timer creation calls only */
  config?: ConfigArgument;
}

export interface AliasEntry {
  id: string;
  type: TrackedType;
  kind: AliasKind;
  field?: FieldFact;
  hops: HopFact[];
  occurrences: number[];
}

export interface UnitFacts {
  unit: SourceUnit;
  program: NodePath<t.Program>;
  resolver: TypeResolver;
  constants: ConstantEvaluator;
  classes: ClassFacts[];
  occurrences: CollectedOccurrence[];
  aliases: Map<string, AliasEntry>;
  /** Local name the review decorator is imported under, if imported */
  markerLocalName: string | null;
}
