/**
 * Statement-frame helpers: where a call sits relative to its enclosing method.
 */
import type * as t from '@babel/types';
import type { StatementContext } from '@rewright/types';
import type { NodePath } from './babelTraverse.js';

export function assertNever(value: never, what = 'value'): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}

export interface Enclosing {
  classPath: NodePath<t.ClassDeclaration> | null;
  /** Method or property name; null outside class members */
  method: string | null;
  /** Function the frames are measured against */
  boundary: NodePath | null;
}

function memberName(node: t.ClassMethod | t.ClassPrivateMethod | t.ClassProperty | t.ClassPrivateProperty): string {
  const key = node.key;
  switch (key.type) {
    case 'Identifier':
      return key.name;
    case 'PrivateName':
      return `#${key.id.name}`;
    case 'StringLiteral':
      return key.value;
    case 'NumericLiteral':
      return String(key.value);
    default:
      return '<computed>';
  }
}

/**
 * Nearest class declaration and the member of that class holding `path`.
 * Occurrences inside class expressions have no enclosing declaration.
 */
export function findEnclosing(path: NodePath): Enclosing {
  let member: NodePath<t.ClassMethod | t.ClassPrivateMethod | t.ClassProperty | t.ClassPrivateProperty> | null = null;
  let current: NodePath | null = path.parentPath;

  while (current) {
    if (!member && (current.isClassMethod() || current.isClassPrivateMethod() ||
        current.isClassProperty() || current.isClassPrivateProperty())) {
      member = current;
    }
    if (current.isClassDeclaration()) {
      return {
        classPath: current,
        method: member ? memberName(member.node) : null,
        boundary: member ? memberBoundary(member) : null,
      };
    }
    if (current.isClassExpression()) {
      return { classPath: null, method: null, boundary: null };
    }
    current = current.parentPath;
  }
  return { classPath: null, method: null, boundary: null };
}

function memberBoundary(
  member: NodePath<t.ClassMethod | t.ClassPrivateMethod | t.ClassProperty | t.ClassPrivateProperty>
): NodePath {
  let value: NodePath<t.Node | null | undefined> | null = null;
  if (member.isClassProperty()) {
    value = member.get('value');
  } else if (member.isClassPrivateProperty()) {
    value = member.get('value');
  }
  return value?.isFunction() ? value : member;
}

function frameOf(parent: NodePath, child: NodePath): StatementContext | null {
  if (parent.isTryStatement()) {
    if (child.key === 'block') return 'try-body';
    if (child.key === 'handler') return 'catch-body';
    if (child.key === 'finalizer') return 'finally-body';
    return null;
  }
  if (parent.isForStatement()) {
    return child.key === 'init' ? null : 'loop-body';
  }
  if (parent.isForInStatement() || parent.isForOfStatement()) {
    return child.key === 'right' ? null : 'loop-body';
  }
  if (parent.isWhileStatement() || parent.isDoWhileStatement()) {
    return 'loop-body';
  }
  if (parent.isIfStatement() || parent.isConditionalExpression()) {
    return child.key === 'test' ? null : 'branch';
  }
  if (parent.isSwitchCase()) {
    return child.listKey === 'consequent' ? 'branch' : null;
  }
  if (parent.isLogicalExpression()) {
    return child.key === 'right' ? 'branch' : null;
  }
  if (parent.isFunction()) {
    return 'nested-function';
  }
  return null;
}

/**
 * Frames between `path` and `boundary`, innermost first. ['plain'] when none.
 */
export function computeFrames(path: NodePath, boundary: NodePath | null): StatementContext[] {
  const frames: StatementContext[] = [];
  let child = path;
  let parent = path.parentPath;

  while (parent && parent.node !== boundary?.node) {
    const frame = frameOf(parent, child);
    if (frame) frames.push(frame);
    if (parent.isProgram()) break;
    child = parent;
    parent = parent.parentPath;
  }
  return frames.length > 0 ? frames : ['plain'];
}

export function summarizeFrames(frames: readonly StatementContext[]): { inLoop: boolean; deferred: boolean } {
  let inLoop = false;
  let deferred = false;
  for (const frame of frames) {
    switch (frame) {
      case 'loop-body':
        inLoop = true;
        break;
      case 'nested-function':
        deferred = true;
        break;
      case 'try-body':
      case 'catch-body':
      case 'finally-body':
      case 'branch':
      case 'plain':
        break;
      default:
        assertNever(frame, 'statement context');
    }
  }
  return { inLoop, deferred };
}

/**
 * Skips transparent wrappers (`await`, `!`, parentheses) above an expression.
 */
export function outerExpression(path: NodePath): { outer: NodePath; awaited: boolean } {
  let outer = path;
  let awaited = false;
  let parent = outer.parentPath;
  while (parent && (parent.isAwaitExpression() || parent.isTSNonNullExpression() || parent.isParenthesizedExpression())) {
    if (parent.isAwaitExpression()) awaited = true;
    outer = parent;
    parent = outer.parentPath;
  }
  return { outer, awaited };
}
