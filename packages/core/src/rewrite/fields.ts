/**
 * Field and local-alias edits shared by the family rewriters.
 */

import * as t from '@babel/types';
import type { Binding, NodePath } from '../analysis/ast/babelTraverse.js';
import type { ClassFacts, CollectedOccurrence, FieldFact, HopFact } from '../analysis/facts/types.js';
import { indentationAt, type SourceEditor } from './SourceEditor.js';

export interface InjectedField {
  /** Property name, e.g. transactionTemplate */
  name: string;
  /** Type name, e.g. TransactionTemplate */
  type: string;
}

function rangeOf(node: t.Node): { start: number; end: number } {
  return { start: node.start ?? 0, end: node.end ?? 0 };
}

/**
 * Remove one element of a comma-separated list together with its separator.
 */
function removeListElement(editor: SourceEditor, list: readonly t.Node[], index: number): void {
  const { start, end } = rangeOf(list[index]);
  if (index + 1 < list.length) {
    editor.remove(start, rangeOf(list[index + 1]).start);
  } else if (index > 0) {
    editor.remove(rangeOf(list[index - 1]).end, end);
  } else {
    editor.remove(start, end);
  }
}

function removeField(editor: SourceEditor, field: FieldFact): void {
  const { path } = field;
  if (path.isTSParameterProperty()) {
    const ctor = path.parentPath;
    if (!ctor.isClassMethod()) return;
    const params = ctor.node.params;
    removeListElement(editor, params, params.indexOf(path.node));
    return;
  }
  const decorators = path.node.decorators ?? [];
  const start = decorators.length > 0 ? Math.min(rangeOf(decorators[0]).start, rangeOf(path.node).start) : rangeOf(path.node).start;
  editor.removeLines(start, rangeOf(path.node).end);
}

function renameField(editor: SourceEditor, field: FieldFact, target: InjectedField): void {
  const { path } = field;
  if (path.isTSParameterProperty()) {
    const parameter = path.node.parameter;
    const id = t.isAssignmentPattern(parameter) ? parameter.left : parameter;
    if (!t.isIdentifier(id)) return;
    const idStart = rangeOf(id).start;
    editor.replace(idStart, idStart + id.name.length, target.name);
    const annotation = id.typeAnnotation;
    if (t.isTSTypeAnnotation(annotation)) {
      const type = rangeOf(annotation.typeAnnotation);
      editor.replace(type.start, type.end, target.type);
    }
    return;
  }
  if (path.isClassProperty()) {
    const { node } = path;
    const end = rangeOf(node).end;
    const semicolon = editor.code.charAt(end - 1) === ';' ? ';' : '';
    const optional = node.optional ? '?' : '';
    const definite = node.definite ? '!' : '';
    editor.replace(rangeOf(node.key).start, end, `${target.name}${optional}${definite}: ${target.type}${semicolon}`);
  }
}

/**
 * The first resource field becomes the injected field, the others go.
 * Without a resource field, the injected field is added at the top of the class.
 */
export function rewriteResourceFields(
  editor: SourceEditor,
  owner: ClassFacts,
  fields: readonly FieldFact[],
  target: InjectedField
): void {
  const ordered = [...fields].sort((a, b) => (a.path.node.start ?? 0) - (b.path.node.start ?? 0));
  const keepsExisting = owner.fields.has(target.name);
  const [first, ...rest] = ordered;

  if (first && !keepsExisting) {
    renameField(editor, first, target);
  } else if (first) {
    removeField(editor, first);
  }
  for (const field of rest) {
    removeField(editor, field);
  }

  if (!first && !keepsExisting) {
    const body = owner.path.get('body');
    const members = body.node.body;
    const bodyStart = rangeOf(body.node).start;
    const indent = members.length > 0
      ? indentationAt(editor.code, rangeOf(members[0]).start)
      : `${indentationAt(editor.code, rangeOf(owner.path.node).start)}  `;
    editor.insert(bodyStart + 1, `\n${indent}private readonly ${target.name}!: ${target.type};`);
  }
}

/**
 * Fields the given occurrences reach their resource through.
 */
export function resourceFields(occurrences: readonly CollectedOccurrence[], type: string): FieldFact[] {
  const fields = new Map<string, FieldFact>();
  for (const occurrence of occurrences) {
    const { trace } = occurrence;
    if (trace.resolution === 'RESOLVED' && trace.kind === 'field' && trace.field && trace.type === type) {
      fields.set(trace.field.name, trace.field);
    }
  }
  return [...fields.values()];
}

/**
 * Local hops (`const x = this.f`, `let x; x = ...;`) of the given occurrences.
 */
export function hopsOf(occurrences: readonly CollectedOccurrence[]): HopFact[] {
  const hops = new Map<t.Node, HopFact>();
  for (const occurrence of occurrences) {
    for (const hop of occurrence.trace.hops) {
      hops.set(hop.declarator.node, hop);
    }
  }
  return [...hops.values()];
}

function thisAliasReceiver(path: NodePath): NodePath<t.Identifier> | null {
  if (!path.isCallExpression()) return null;
  const callee = path.get('callee');
  if (!callee.isMemberExpression()) return null;
  const receiver = callee.get('object');
  if (!receiver.isMemberExpression()) return null;
  const object = receiver.get('object');
  return object.isIdentifier() ? object : null;
}

/**
 * `const self = this` declarators referenced only as `self.f` receivers of
 * the given calls, which the rewrite replaces.
 */
export function thisAliasesOf(occurrences: readonly CollectedOccurrence[]): HopFact[] {
  const receivers = new Map<Binding, Set<t.Node>>();
  for (const occurrence of occurrences) {
    const receiver = thisAliasReceiver(occurrence.path);
    if (!receiver) continue;
    const binding = receiver.scope.getBinding(receiver.node.name);
    if (!binding) continue;
    const seen = receivers.get(binding) ?? new Set<t.Node>();
    seen.add(receiver.node);
    receivers.set(binding, seen);
  }

  const hops: HopFact[] = [];
  for (const [binding, seen] of receivers) {
    const declarator = binding.path;
    if (binding.kind !== 'const' || !declarator.isVariableDeclarator()) continue;
    if (!t.isThisExpression(declarator.node.init)) continue;
    if (binding.referencePaths.every(reference => seen.has(reference.node))) {
      hops.push({ declarator, binding });
    }
  }
  return hops;
}

export function removeHop(editor: SourceEditor, hop: HopFact): void {
  const declaration: NodePath | null = hop.declarator.parentPath;
  if (declaration?.isVariableDeclaration()) {
    const { declarations } = declaration.node;
    if (declarations.length === 1) {
      const { start, end } = rangeOf(declaration.node);
      editor.removeLines(start, end);
    } else {
      removeListElement(editor, declarations, declarations.indexOf(hop.declarator.node));
    }
  }
  if (hop.assignment) {
    const { start, end } = rangeOf(hop.assignment.node);
    editor.removeLines(start, end);
  }
}
