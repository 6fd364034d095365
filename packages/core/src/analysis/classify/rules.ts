/**
 * Rule tables. Order matters: the first applicable rule names the primary reason.
 */

import * as t from '@babel/types';
import type { Reason } from '@rewright/types';
import type { NodePath } from '../ast/babelTraverse.js';
import type { MatchedShape, TimerAnchor, TransactionAnchor } from '../shapes/PatternMatcher.js';
import { configArgumentIndex } from '../facts/FactCollector.js';

export interface ClassificationRule {
  reason: Reason;
  applies(shape: MatchedShape): boolean;
}

function transaction(shape: MatchedShape): TransactionAnchor | null {
  return shape.anchor.kind === 'transaction' ? shape.anchor : null;
}

function timer(shape: MatchedShape): TimerAnchor | null {
  return shape.anchor.kind === 'timer' ? shape.anchor : null;
}

const isUnresolved = (shape: MatchedShape): boolean => shape.members.some(o => o.resolution === 'UNRESOLVED');
const hasTag = (shape: MatchedShape, tag: MatchedShape['tags'][number]): boolean => shape.tags.includes(tag);

/**
 * Statements of the unit of work: strictly between begin and commit.
 */
export function unitOfWork(anchor: TransactionAnchor): NodePath<t.Statement>[] {
  const begin = anchor.begin.statement?.node;
  const commit = anchor.commit.statement?.node;
  const statements = anchor.tryPath.get('block').get('body');
  const from = statements.findIndex(s => s.node === begin);
  const to = statements.findIndex(s => s.node === commit);
  return from < 0 || to < 0 ? [] : statements.slice(from + 1, to);
}

/**
 * Target of a break/continue, or null when it has none in the enclosing function.
 */
function jumpTarget(path: NodePath<t.BreakStatement> | NodePath<t.ContinueStatement>): NodePath | null {
  const label = path.node.label?.name;
  const isBreak = path.isBreakStatement();
  return path.findParent(p => {
    if (label !== undefined) return p.isLabeledStatement() && p.node.label.name === label;
    return p.isLoop() || (isBreak && p.isSwitchStatement());
  });
}

/**
 * return, yield, or a break/continue whose target lies outside the unit of work.
 */
function escapesControlFlow(anchor: TransactionAnchor): boolean {
  for (const statement of unitOfWork(anchor)) {
    if (statement.isReturnStatement() || statement.isBreakStatement() || statement.isContinueStatement()) {
      return true;
    }
    let escapes = false;
    const jumpsOut = (path: NodePath<t.BreakStatement> | NodePath<t.ContinueStatement>): void => {
      const target = jumpTarget(path);
      if (!target || !isWithin(target.node, statement.node)) escapes = true;
    };
    statement.traverse({
      Function(path) {
        path.skip();
      },
      ReturnStatement() {
        escapes = true;
      },
      YieldExpression() {
        escapes = true;
      },
      BreakStatement(path) {
        jumpsOut(path);
      },
      ContinueStatement(path) {
        jumpsOut(path);
      },
    });
    if (escapes) return true;
  }
  return false;
}

function isWithin(inner: t.Node, outer: t.Node): boolean {
  return (inner.start ?? -1) >= (outer.start ?? 0) && (inner.end ?? Infinity) <= (outer.end ?? -1);
}

/**
 * `var` in the unit of work, or a declaration used after commit.
 */
function escapesBinding(anchor: TransactionAnchor): boolean {
  const statements = unitOfWork(anchor);
  if (statements.length === 0) return false;
  const start = statements[0].node.start ?? 0;
  const end = statements[statements.length - 1].node.end ?? 0;
  const inside = (path: NodePath): boolean => (path.node.start ?? -1) >= start && (path.node.end ?? Infinity) <= end;

  for (const statement of statements) {
    if (statement.isVariableDeclaration() && statement.node.kind === 'var') return true;
    let escapes = false;
    statement.traverse({
      Function(path) {
        path.skip();
      },
      VariableDeclaration(path) {
        if (path.node.kind === 'var') escapes = true;
      },
    });
    if (escapes) return true;
    if (!statement.isDeclaration()) continue;

    const names = Object.keys(statement.getBindingIdentifiers());
    for (const name of names) {
      const binding = statement.scope.getBinding(name);
      if (!binding) continue;
      const uses = [...binding.referencePaths, ...binding.constantViolations];
      if (uses.some(use => !inside(use))) return true;
    }
  }
  return false;
}

/** Finite and not negative; the scheduler takes nothing else */
function isDuration(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function hasDynamicConfiguration(anchor: TimerAnchor): boolean {
  const { create, related } = anchor;
  const delays = create.args.slice(0, configArgumentIndex(create.op));
  if (delays.length < configArgumentIndex(create.op)) return true;
  if (delays.some(arg => arg.literalness === 'DYNAMIC' || !isDuration(arg.value))) return true;

  const config = create.config;
  if (!config || config.kind === 'untraceable') return true;
  if (config.kind !== 'traced') return false;

  const constructs = related.filter(o => o.op === 'construct-config');
  if (constructs.length !== 1) return true;
  if (related.some(o => o.op === 'configure')) return true;
  const persistent = constructs[0].args[1];
  return persistent !== undefined && persistent.literalness === 'DYNAMIC';
}

function isPersistent(anchor: TimerAnchor): boolean {
  const config = anchor.create.config;
  if (!config || config.kind !== 'traced') return true;
  const construct = anchor.related.find(o => o.op === 'construct-config');
  const persistent = construct?.args[1];
  return persistent?.value !== false;
}

export const TRANSACTION_RULES: readonly ClassificationRule[] = [
  { reason: 'no-pairing', applies: shape => shape.anchor.kind === 'unpaired' },
  { reason: 'unresolved-type', applies: isUnresolved },
  {
    reason: 'no-rollback-handling',
    applies: shape => {
      const anchor = transaction(shape);
      if (anchor) return anchor.rollback === null;
      return shape.members.some(o => o.op === 'begin') && !shape.members.some(o => o.op === 'rollback');
    },
  },
  { reason: 'loop-enclosed', applies: shape => hasTag(shape, 'LOOP-ENCLOSED') },
  { reason: 'nested-callback', applies: shape => hasTag(shape, 'DEFERRED') },
  { reason: 'multiple-blocks', applies: shape => hasTag(shape, 'MULTI-BLOCK') },
  { reason: 'multiple-sources', applies: shape => hasTag(shape, 'MIXED-SOURCE') },
  { reason: 'unsupported-operation', applies: shape => shape.members.some(o => o.op === 'other') },
  {
    reason: 'control-flow-escape',
    applies: shape => {
      const anchor = transaction(shape);
      return anchor !== null && escapesControlFlow(anchor);
    },
  },
  {
    reason: 'binding-escape',
    applies: shape => {
      const anchor = transaction(shape);
      return anchor !== null && escapesBinding(anchor);
    },
  },
];

export const TIMER_RULES: readonly ClassificationRule[] = [
  {
    reason: 'unsupported-operation',
    applies: shape => shape.anchor.kind === 'unpaired' || shape.members.some(o => o.op === 'other'),
  },
  { reason: 'unresolved-type', applies: isUnresolved },
  {
    reason: 'return-value-used',
    applies: shape => timer(shape)?.create.valueUsed ?? false,
  },
  { reason: 'loop-enclosed', applies: shape => hasTag(shape, 'LOOP-ENCLOSED') },
  { reason: 'nested-callback', applies: shape => hasTag(shape, 'DEFERRED') },
  {
    reason: 'missing-timeout-handler',
    applies: shape => {
      if (!timer(shape)) return false;
      const handlers = shape.owner.timeoutHandlers;
      return handlers.length !== 1 || handlers[0].paramCount > 0;
    },
  },
  {
    reason: 'dynamic-configuration',
    applies: shape => {
      const anchor = timer(shape);
      return anchor !== null && hasDynamicConfiguration(anchor);
    },
  },
  {
    reason: 'persistent-timer',
    applies: shape => {
      const anchor = timer(shape);
      return anchor !== null && isPersistent(anchor);
    },
  },
];
