/**
 * FactCollector - one traversal per unit, building the alias table and the occurrence list
 *
 * Calls are tracked by the resolved type of their receiver, never by name alone.
 * A receiver whose type cannot be determined is still recorded when the member
 * name is a tracked operation, flagged UNRESOLVED.
 *
 * Uses of a tracked resource that are not tracked calls (passing it along,
 * reassigning it, mutating a configuration object) are recorded too, as
 * 'other' or 'configure', so the classifier sees every escape.
 */

import * as t from '@babel/types';
import traverseModule from '@babel/traverse';
import type { IdiomFamily, OperationKind, ArgumentFact } from '@rewright/types';
import { getTraverseFunction, type NodePath, type Binding } from '../ast/babelTraverse.js';
import { computeFrames, findEnclosing, outerExpression, summarizeFrames } from '../ast/frames.js';
import { formatPosition, getNodeLocation, sliceNode } from '../ast/location.js';
import { TypeResolver } from '../../source/TypeResolver.js';
import type { SourceUnit } from '../../source/SourceUnit.js';
import type { UnitContext } from '../../EngineTypes.js';
import { AnalysisError } from '../../errors/RewrightError.js';
import { ConstantEvaluator } from './ConstantEvaluator.js';
import { ClassFactsCollector } from './ClassFactsCollector.js';
import { AliasTracer, staticMemberName, trackedType, type ObservedBinding } from './AliasTracer.js';
import type {
  AliasEntry,
  AliasTrace,
  ClassFacts,
  CollectedOccurrence,
  ConfigArgument,
  ResolvedTrace,
  TrackedType,
  UnitFacts,
} from './types.js';

const traverse = getTraverseFunction(traverseModule);

const TRANSACTION_OPS = new Map<string, OperationKind>([
  ['begin', 'begin'],
  ['commit', 'commit'],
  ['rollback', 'rollback'],
]);

const TIMER_OPS = new Map<string, OperationKind>([
  ['createTimer', 'create-timer'],
  ['createSingleActionTimer', 'create-single-action-timer'],
  ['createIntervalTimer', 'create-interval-timer'],
]);

const FAMILY_OF: Record<TrackedType, IdiomFamily | null> = {
  UserTransaction: 'transactions',
  TimerService: 'timers',
  TimerConfig: 'timers',
  SessionContext: null,
};

export function isCreateOperation(op: OperationKind): boolean {
  return op === 'create-timer' || op === 'create-single-action-timer' || op === 'create-interval-timer';
}

/** Position of the configuration argument of a creation call */
export function configArgumentIndex(op: OperationKind): number {
  return op === 'create-interval-timer' ? 2 : 1;
}

function operationFor(type: TrackedType, member: string): OperationKind | null {
  switch (type) {
    case 'UserTransaction':
      return TRANSACTION_OPS.get(member) ?? 'other';
    case 'TimerService':
      return TIMER_OPS.get(member) ?? 'other';
    case 'TimerConfig':
      return member.startsWith('set') ? 'configure' : null;
    case 'SessionContext':
      return null;
  }
}

function candidateFamily(member: string): IdiomFamily | null {
  if (TRANSACTION_OPS.has(member)) return 'transactions';
  if (TIMER_OPS.has(member)) return 'timers';
  return null;
}

/**
 * `x` in `x.m(...)`
 */
function isCalleeObject(path: NodePath): boolean {
  const parent = path.parentPath;
  if (!parent?.isMemberExpression() || path.key !== 'object') return false;
  return parent.key === 'callee' && Boolean(parent.parentPath?.isCallExpression());
}

interface PendingOccurrence {
  path: NodePath;
  trace: AliasTrace;
  family: IdiomFamily;
  op: OperationKind;
  member: string;
  argPaths: NodePath[];
  config?: ConfigArgument;
}

interface FieldReference {
  path: NodePath;
  owner: ClassFacts;
}

interface UnitTools {
  program: NodePath<t.Program>;
  resolver: TypeResolver;
  constants: ConstantEvaluator;
  tracer: AliasTracer;
  classCollector: ClassFactsCollector;
  markerLocalName: string | null;
}

export class FactCollector {
  constructor(private readonly context: UnitContext) {}

  collect(unit: SourceUnit): UnitFacts {
    const { config } = this.context;
    const state: { tools: UnitTools | null } = { tools: null };
    const classes: ClassFacts[] = [];
    const byClass = new Map<t.Node, ClassFacts>();
    const pending: PendingOccurrence[] = [];
    const fieldReferences: FieldReference[] = [];
    const destructured: NodePath<t.VariableDeclarator>[] = [];
    const configArguments = new Set<t.Node>();

    const ownerOf = (path: NodePath): { owner: ClassFacts | null; method: string | null } => {
      const enclosing = findEnclosing(path);
      const owner = enclosing.classPath ? byClass.get(enclosing.classPath.node) ?? null : null;
      return { owner, method: enclosing.method };
    };

    traverse(unit.ast, {
      Program: (path: NodePath<t.Program>) => {
        const resolver = new TypeResolver(path.node, config.modules.legacy);
        const markerLocalName = findMarkerImport(path.node, config.markers.module, config.markers.name);
        state.tools = {
          program: path,
          resolver,
          constants: new ConstantEvaluator(path),
          tracer: new AliasTracer(resolver),
          classCollector: new ClassFactsCollector(unit.file, resolver, markerLocalName ?? config.markers.name),
          markerLocalName,
        };
      },

      ClassDeclaration: (path: NodePath<t.ClassDeclaration>) => {
        if (!state.tools) return;
        const facts = state.tools.classCollector.collect(path);
        classes.push(facts);
        byClass.set(path.node, facts);
      },

      CallExpression: (path: NodePath<t.CallExpression>) => {
        if (!state.tools) return;
        const { tracer } = state.tools;
        const callee = path.get('callee');
        if (!callee.isMemberExpression()) return;
        const member = staticMemberName(callee.node);
        if (member === null) return;

        const { owner, method } = ownerOf(path);
        const trace = tracer.trace(callee.get('object'), owner, method);
        if (trace === null) return;

        let family: IdiomFamily | null;
        let op: OperationKind | null;
        if (trace.resolution === 'RESOLVED') {
          family = FAMILY_OF[trace.type];
          op = operationFor(trace.type, member);
        } else {
          family = candidateFamily(member);
          op = TRANSACTION_OPS.get(member) ?? TIMER_OPS.get(member) ?? null;
        }
        if (family === null || op === null) return;

        const argPaths: NodePath[] = path.get('arguments');
        const occurrence: PendingOccurrence = { path, trace, family, op, member, argPaths };
        if (isCreateOperation(op)) {
          const argument = argPaths[configArgumentIndex(op)];
          if (argument) {
            occurrence.config = this.configArgument(argument, tracer, owner, method);
            configArguments.add(argument.node);
          } else {
            occurrence.config = { kind: 'absent', alias: null };
          }
        }
        pending.push(occurrence);
      },

      NewExpression: (path: NodePath<t.NewExpression>) => {
        if (!state.tools) return;
        const { tracer, resolver } = state.tools;
        if (trackedType(resolver.resolveValue(path.node.callee)) !== 'TimerConfig') return;
        const { owner, method } = ownerOf(path);
        const parent = path.parentPath;

        // A configuration stored in a field is known by the field's identity
        let trace: AliasTrace | null = null;
        if (parent.isClassProperty() && path.key === 'value') {
          const name = t.isIdentifier(parent.node.key) ? parent.node.key.name : null;
          const field = name === null ? undefined : owner?.fields.get(name);
          if (field) {
            trace = { resolution: 'RESOLVED', id: `field:${field.name}`, type: 'TimerConfig', kind: 'field', field, hops: [] };
          }
        }
        trace ??= tracer.trace(path, owner, method);
        if (trace === null) return;
        const argPaths: NodePath[] = path.get('arguments');
        pending.push({ path, trace, family: 'timers', op: 'construct-config', member: '<new>', argPaths });
      },

      MemberExpression: (path: NodePath<t.MemberExpression>) => {
        if (!state.tools) return;
        const name = staticMemberName(path.node);
        if (name === null || !state.tools.tracer.isThisReference(path.get('object'))) return;
        const { owner } = ownerOf(path);
        const field = owner?.fields.get(name);
        if (!owner || !field || trackedType(field.type) === null) return;
        fieldReferences.push({ path, owner });
      },

      VariableDeclarator: (path: NodePath<t.VariableDeclarator>) => {
        if (!state.tools) return;
        if (t.isObjectPattern(path.node.id) && state.tools.tracer.isThisReference(path.get('init'))) {
          destructured.push(path);
        }
      },
    });

    const tools = state.tools;
    if (!tools) {
      throw new AnalysisError(`Unit ${unit.file} has no program node`, 'ERR_ANALYSIS_INTERNAL', {
        filePath: unit.file,
        phase: 'COLLECT',
      });
    }
    const { tracer } = tools;
    const escapes = (path: NodePath): boolean => isEscape(path, tracer.observed, configArguments);

    for (const reference of fieldReferences) {
      if (!escapes(reference.path)) continue;
      const trace = tracer.trace(reference.path, reference.owner, ownerOf(reference.path).method);
      if (trace?.resolution !== 'RESOLVED') continue;
      const occurrence = escapeOccurrence(reference.path, trace);
      if (occurrence) pending.push(occurrence);
    }

    for (const declarator of destructured) {
      for (const occurrence of this.destructuredEscapes(declarator, ownerOf(declarator).owner, tracer)) {
        pending.push(occurrence);
      }
    }

    for (const observed of [...tracer.observed.values()]) {
      for (const reference of observed.binding.referencePaths) {
        if (!escapes(reference)) continue;
        const { owner, method } = ownerOf(reference);
        const trace = tracer.trace(reference, owner, method);
        if (trace?.resolution !== 'RESOLVED') continue;
        const occurrence = escapeOccurrence(reference, trace);
        if (occurrence) pending.push(occurrence);
      }
    }

    const occurrences = this.finalize(unit, pending, tools.constants, ownerOf);
    return {
      unit,
      program: tools.program,
      resolver: tools.resolver,
      constants: tools.constants,
      classes,
      occurrences,
      aliases: buildAliasTable(occurrences),
      markerLocalName: tools.markerLocalName,
    };
  }

  /**
   * `const { f } = this` where `f` is a tracked field and the local is never traced.
   */
  private destructuredEscapes(
    declarator: NodePath<t.VariableDeclarator>,
    owner: ClassFacts | null,
    tracer: AliasTracer
  ): PendingOccurrence[] {
    const found: PendingOccurrence[] = [];
    if (!owner || !t.isObjectPattern(declarator.node.id)) return found;
    for (const property of declarator.node.id.properties) {
      if (!t.isObjectProperty(property) || !t.isIdentifier(property.value) || !t.isIdentifier(property.key)) continue;
      const binding = declarator.scope.getBinding(property.value.name);
      if (!binding || tracer.observed.has(binding)) continue;
      const field = owner.fields.get(property.key.name);
      const type = trackedType(field?.type ?? null);
      if (!field || !type) continue;
      const occurrence = escapeOccurrence(declarator, {
        resolution: 'RESOLVED', id: `field:${field.name}`, type, kind: 'field', field, hops: [],
      });
      if (occurrence) found.push(occurrence);
    }
    return found;
  }

  private configArgument(
    argument: NodePath,
    tracer: AliasTracer,
    owner: ClassFacts | null,
    method: string | null
  ): ConfigArgument {
    if (argument.isLiteral() || argument.isObjectExpression() || argument.isArrayExpression()) {
      return { kind: 'not-config', alias: null };
    }
    const trace = tracer.trace(argument, owner, method);
    if (trace === null) return { kind: 'not-config', alias: null };
    if (trace.resolution === 'UNRESOLVED') return { kind: 'untraceable', alias: null };
    return trace.type === 'TimerConfig' ? { kind: 'traced', alias: trace.id } : { kind: 'not-config', alias: null };
  }

  /**
   * Orders occurrences by source position, assigns ids and records frames,
   * arguments and diagnostics.
   */
  private finalize(
    unit: SourceUnit,
    pending: PendingOccurrence[],
    constants: ConstantEvaluator,
    ownerOf: (path: NodePath) => { owner: ClassFacts | null; method: string | null }
  ): CollectedOccurrence[] {
    const { diagnostics, logger } = this.context;
    const seen = new Set<t.Node>();
    const ordered = pending
      .filter(entry => {
        if (seen.has(entry.path.node)) return false;
        seen.add(entry.path.node);
        return true;
      })
      .sort((a, b) => (a.path.node.start ?? 0) - (b.path.node.start ?? 0));

    return ordered.map((entry, id): CollectedOccurrence => {
      const { owner, method } = ownerOf(entry.path);
      const boundary = findEnclosing(entry.path).boundary;
      const frames = computeFrames(entry.path, boundary);
      const { inLoop, deferred } = summarizeFrames(frames);
      const { outer, awaited } = outerExpression(entry.path);
      const statementPath = outer.parentPath;
      const statement = statementPath?.isExpressionStatement() ? statementPath : null;
      const position = getNodeLocation(entry.path.node);

      const args = entry.argPaths.map((arg): ArgumentFact => {
        const text = sliceNode(unit.code, arg.node);
        if (arg.isSpreadElement()) return { literalness: 'DYNAMIC', text };
        return { ...constants.evaluate(arg), text };
      });

      if (!owner) {
        diagnostics.add({
          code: 'WARN_OUTSIDE_SCOPE',
          severity: 'warning',
          message: `Tracked ${entry.member} at ${unit.file}:${formatPosition(position)} is outside any class declaration`,
          file: unit.file,
          line: position.line,
          phase: 'COLLECT',
          suggestion: 'Move the code into a class to make it eligible for rewriting',
        });
      }
      if (entry.trace.resolution === 'UNRESOLVED') {
        diagnostics.add({
          code: 'WARN_UNRESOLVED_RECEIVER',
          severity: 'warning',
          message: `Cannot resolve the receiver type of ${entry.member}() at ${unit.file}:${formatPosition(position)}`,
          file: unit.file,
          line: position.line,
          phase: 'COLLECT',
          suggestion: 'Declare the receiver with a type imported from the legacy module',
        });
      }
      logger.trace('Occurrence', { file: unit.file, op: entry.op, alias: entry.trace.id, line: position.line });

      return {
        id,
        family: entry.family,
        op: entry.op,
        member: entry.member,
        alias: entry.trace.id,
        resolution: entry.trace.resolution,
        frames,
        inLoop,
        deferred,
        scope: owner?.name ?? null,
        method,
        args,
        valueUsed: statement === null,
        position,
        snippet: sliceNode(unit.code, statement?.node ?? outer.node),
        path: entry.path,
        trace: entry.trace,
        statement,
        awaited,
        classFacts: owner,
        argPaths: entry.argPaths,
        config: entry.config,
      };
    });
  }
}

function isEscape(path: NodePath, observed: Map<Binding, ObservedBinding>, configArguments: Set<t.Node>): boolean {
  if (isCalleeObject(path) || configArguments.has(path.node)) return false;
  const parent = path.parentPath;
  if (!parent) return true;

  // Hop into a traced local: `const x = <ref>` or `x = <ref>;`
  if (parent.isVariableDeclarator() && path.key === 'init' && t.isIdentifier(parent.node.id)) {
    const binding = parent.scope.getBinding(parent.node.id.name);
    return !(binding && observed.has(binding));
  }
  if (parent.isAssignmentExpression() && path.key === 'right' && t.isIdentifier(parent.node.left)) {
    const binding = parent.scope.getBinding(parent.node.left.name);
    return !(binding && observed.has(binding) && parent.parentPath.isExpressionStatement());
  }
  return true;
}

/**
 * A use of a tracked resource outside a tracked call. Context objects are not tracked.
 */
function escapeOccurrence(path: NodePath, trace: ResolvedTrace): PendingOccurrence | null {
  const family = FAMILY_OF[trace.type];
  if (family === null) return null;
  if (trace.type !== 'TimerConfig') {
    return { path, trace, family, op: 'other', member: '<reference>', argPaths: [] };
  }
  const parent = path.parentPath;
  let member = '<escape>';
  if (parent?.isMemberExpression() && path.key === 'object' && parent.key === 'left' &&
      parent.parentPath.isAssignmentExpression()) {
    member = staticMemberName(parent.node) ?? '<escape>';
  }
  return { path, trace, family, op: 'configure', member, argPaths: [] };
}

function findMarkerImport(program: t.Program, module: string, name: string): string | null {
  for (const statement of program.body) {
    if (!t.isImportDeclaration(statement) || statement.source.value !== module) continue;
    for (const specifier of statement.specifiers) {
      if (!t.isImportSpecifier(specifier)) continue;
      const imported = t.isIdentifier(specifier.imported) ? specifier.imported.name : specifier.imported.value;
      if (imported === name) return specifier.local.name;
    }
  }
  return null;
}

function buildAliasTable(occurrences: CollectedOccurrence[]): Map<string, AliasEntry> {
  const aliases = new Map<string, AliasEntry>();
  for (const occurrence of occurrences) {
    const { trace } = occurrence;
    if (trace.resolution !== 'RESOLVED') continue;
    let entry = aliases.get(trace.id);
    if (!entry) {
      entry = { id: trace.id, type: trace.type, kind: trace.kind, field: trace.field, hops: [], occurrences: [] };
      aliases.set(trace.id, entry);
    }
    entry.occurrences.push(occurrence.id);
    for (const hop of trace.hops) {
      if (!entry.hops.some(known => known.declarator === hop.declarator)) {
        entry.hops.push(hop);
      }
    }
  }
  return aliases;
}
