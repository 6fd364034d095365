/**
 * PatternMatcher - groups occurrences into structural shapes, per enclosing method
 *
 * Transactions: a try block holding exactly one begin statement followed by
 * exactly one commit statement, with the rollback (if any) among the direct
 * statements of the catch body or of a try nested directly in it, is one
 * LINEAR group. Timers: each creation call is one LINEAR group together with
 * the construction and mutation of the configuration it was given.
 *
 * Whatever no group consumed becomes the method's UNPAIRED group.
 */

import type * as t from '@babel/types';
import type { IdiomFamily, ShapeMatch, ShapeTag } from '@rewright/types';
import type { NodePath } from '../ast/babelTraverse.js';
import type { ClassFacts, CollectedOccurrence, UnitFacts } from '../facts/types.js';
import { isCreateOperation } from '../facts/FactCollector.js';

export interface TransactionAnchor {
  kind: 'transaction';
  tryPath: NodePath<t.TryStatement>;
  begin: CollectedOccurrence;
  commit: CollectedOccurrence;
  rollback: CollectedOccurrence | null;
  /** Try statement nested in the catch body that holds the rollback */
  rollbackTry: NodePath<t.TryStatement> | null;
}

export interface TimerAnchor {
  kind: 'timer';
  create: CollectedOccurrence;
  /** Construction and mutation of the configuration passed to the creation call */
  related: CollectedOccurrence[];
}

export interface UnpairedAnchor {
  kind: 'unpaired';
}

export type ShapeAnchor = TransactionAnchor | TimerAnchor | UnpairedAnchor;

export interface MatchedShape extends ShapeMatch {
  owner: ClassFacts;
  anchor: ShapeAnchor;
  members: CollectedOccurrence[];
}

export interface ScopeShapes {
  owner: ClassFacts;
  family: IdiomFamily;
  shapes: MatchedShape[];
}

/** Key used to compare receivers; unresolved receivers never compare equal */
export function aliasKey(occurrence: CollectedOccurrence): string {
  return occurrence.alias ?? `unresolved#${occurrence.id}`;
}

function methodKey(occurrence: CollectedOccurrence): string {
  return occurrence.method ?? '<class>';
}

function groupByMethod(occurrences: CollectedOccurrence[]): Map<string, CollectedOccurrence[]> {
  const byMethod = new Map<string, CollectedOccurrence[]>();
  for (const occurrence of occurrences) {
    const key = methodKey(occurrence);
    const list = byMethod.get(key) ?? [];
    list.push(occurrence);
    byMethod.set(key, list);
  }
  return byMethod;
}

/**
 * Direct statement of the try block the occurrence sits in, with that try.
 */
function enclosingTry(occurrence: CollectedOccurrence): NodePath<t.TryStatement> | null {
  const block = occurrence.statement?.parentPath;
  if (!block?.isBlockStatement() || block.key !== 'block') return null;
  const tryPath = block.parentPath;
  return tryPath.isTryStatement() ? tryPath : null;
}

function isDirectStatementOf(occurrence: CollectedOccurrence, block: NodePath<t.BlockStatement>): boolean {
  return occurrence.statement !== null && occurrence.statement.parent === block.node;
}

export class PatternMatcher {
  match(facts: UnitFacts, families: readonly IdiomFamily[]): ScopeShapes[] {
    const scopes: ScopeShapes[] = [];
    for (const owner of facts.classes) {
      for (const family of families) {
        const occurrences = facts.occurrences.filter(o => o.family === family && o.classFacts === owner);
        if (!occurrences.some(o => o.resolution === 'RESOLVED')) continue;

        const shapes = family === 'transactions'
          ? this.matchTransactions(owner, occurrences)
          : this.matchTimers(owner, occurrences);
        scopes.push({ owner, family, shapes });
      }
    }
    return scopes;
  }

  private matchTransactions(owner: ClassFacts, occurrences: CollectedOccurrence[]): MatchedShape[] {
    const shapes: MatchedShape[] = [];
    for (const [method, inMethod] of groupByMethod(occurrences)) {
      const consumed = new Set<number>();
      const groups: TransactionAnchor[] = [];
      const tries = new Map<t.Node, NodePath<t.TryStatement>>();

      for (const occurrence of inMethod) {
        if (occurrence.op !== 'begin') continue;
        const tryPath = enclosingTry(occurrence);
        if (tryPath) tries.set(tryPath.node, tryPath);
      }

      for (const tryPath of tries.values()) {
        const group = this.pairInTry(tryPath, inMethod);
        if (!group) continue;
        groups.push(group);
        consumed.add(group.begin.id);
        consumed.add(group.commit.id);
        if (group.rollback) consumed.add(group.rollback.id);
      }

      for (const group of groups) {
        const members = [group.begin, group.commit, ...(group.rollback ? [group.rollback] : [])];
        const tags: ShapeTag[] = ['LINEAR'];
        if (group.begin.inLoop || group.commit.inLoop) tags.push('LOOP-ENCLOSED');
        if (groups.length > 1) tags.push('MULTI-BLOCK');
        if (new Set(members.map(aliasKey)).size > 1) tags.push('MIXED-SOURCE');
        if (group.begin.deferred || group.commit.deferred) tags.push('DEFERRED');
        shapes.push(this.shape(owner, 'transactions', method, tags, members, group));
      }

      const residual = inMethod.filter(o => !consumed.has(o.id));
      if (residual.length > 0) {
        shapes.push(this.unpaired(owner, 'transactions', method, residual));
      }
    }
    return shapes;
  }

  /**
   * One begin and one commit among the try block's direct statements, in that order.
   */
  private pairInTry(tryPath: NodePath<t.TryStatement>, inMethod: CollectedOccurrence[]): TransactionAnchor | null {
    const block = tryPath.get('block');
    const direct = inMethod.filter(o => isDirectStatementOf(o, block));
    const begins = direct.filter(o => o.op === 'begin');
    const commits = direct.filter(o => o.op === 'commit');
    if (begins.length !== 1 || commits.length !== 1) return null;

    const [begin] = begins;
    const [commit] = commits;
    if ((begin.path.node.start ?? 0) >= (commit.path.node.start ?? 0)) return null;

    const { rollback, rollbackTry } = this.findRollback(tryPath, inMethod);
    return { kind: 'transaction', tryPath, begin, commit, rollback, rollbackTry };
  }

  private findRollback(
    tryPath: NodePath<t.TryStatement>,
    inMethod: CollectedOccurrence[]
  ): { rollback: CollectedOccurrence | null; rollbackTry: NodePath<t.TryStatement> | null } {
    const handler = tryPath.get('handler');
    if (!handler.isCatchClause()) return { rollback: null, rollbackTry: null };
    const body = handler.get('body');
    const rollbacks = inMethod.filter(o => o.op === 'rollback');

    const direct = rollbacks.find(o => isDirectStatementOf(o, body));
    if (direct) return { rollback: direct, rollbackTry: null };

    for (const statement of body.get('body')) {
      if (!statement.isTryStatement()) continue;
      const nestedBlock = statement.get('block');
      const nested = rollbacks.find(o => isDirectStatementOf(o, nestedBlock));
      if (nested) return { rollback: nested, rollbackTry: statement };
    }
    return { rollback: null, rollbackTry: null };
  }

  private matchTimers(owner: ClassFacts, occurrences: CollectedOccurrence[]): MatchedShape[] {
    const shapes: MatchedShape[] = [];
    const consumed = new Set<number>();
    const linear: MatchedShape[] = [];

    for (const create of occurrences) {
      if (!isCreateOperation(create.op)) continue;
      const configAlias = create.config?.kind === 'traced' ? create.config.alias : null;
      const related = configAlias === null
        ? []
        : occurrences.filter(o => o.alias === configAlias && (o.op === 'construct-config' || o.op === 'configure'));

      consumed.add(create.id);
      for (const o of related) consumed.add(o.id);

      const tags: ShapeTag[] = ['LINEAR'];
      if (create.inLoop) tags.push('LOOP-ENCLOSED');
      if (create.deferred) tags.push('DEFERRED');
      const anchor: TimerAnchor = { kind: 'timer', create, related };
      linear.push(this.shape(owner, 'timers', methodKey(create), tags, [create, ...related], anchor));
    }

    for (const [method, inMethod] of groupByMethod(occurrences)) {
      shapes.push(...linear.filter(shape => shape.method === method));
      const residual = inMethod.filter(o => !consumed.has(o.id));
      if (residual.length > 0) {
        shapes.push(this.unpaired(owner, 'timers', method, residual));
      }
    }
    return shapes;
  }

  private unpaired(owner: ClassFacts, family: IdiomFamily, method: string, residual: CollectedOccurrence[]): MatchedShape {
    const tags: ShapeTag[] = ['UNPAIRED'];
    if (residual.some(o => o.inLoop)) tags.push('LOOP-ENCLOSED');
    if (residual.some(o => o.deferred)) tags.push('DEFERRED');
    return this.shape(owner, family, method, tags, residual, { kind: 'unpaired' });
  }

  private shape(
    owner: ClassFacts,
    family: IdiomFamily,
    method: string,
    tags: ShapeTag[],
    members: CollectedOccurrence[],
    anchor: ShapeAnchor
  ): MatchedShape {
    return {
      family,
      scope: owner.name,
      method,
      tags,
      occurrences: members.map(o => o.id),
      position: members[0].position,
      owner,
      anchor,
      members,
    };
  }
}
