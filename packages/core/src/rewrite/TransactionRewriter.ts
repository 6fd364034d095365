/**
 * TransactionRewriter - turns each paired try block of a SAFE scope into a
 * `transactionTemplate.executeWithoutResult` callback
 *
 * The try/catch itself stays: the begin statement opens the callback, the
 * commit statement closes it, and the rollback goes. Statements in between
 * are re-indented one level. Everything else on those lines is untouched.
 */

import type * as t from '@babel/types';
import type { NodePath } from '../analysis/ast/babelTraverse.js';
import { unitOfWork } from '../analysis/classify/rules.js';
import type { AggregatedScope } from '../analysis/scope/ScopeAggregator.js';
import type { TransactionAnchor } from '../analysis/shapes/PatternMatcher.js';
import { hopsOf, removeHop, resourceFields, rewriteResourceFields, thisAliasesOf, type InjectedField } from './fields.js';
import { indentationAt, lineEnd, lineStart } from './SourceEditor.js';
import type { RewriteContext } from './types.js';

export const TRANSACTION_TEMPLATE: InjectedField = { name: 'transactionTemplate', type: 'TransactionTemplate' };

/**
 * True when the statements await outside nested functions.
 */
function awaitsIn(statements: NodePath<t.Statement>[]): boolean {
  for (const statement of statements) {
    let awaits = false;
    statement.traverse({
      Function(path) {
        path.skip();
      },
      AwaitExpression() {
        awaits = true;
      },
      ForOfStatement(path) {
        if (path.node.await) awaits = true;
      },
    });
    if (awaits || (statement.isExpressionStatement() && statement.get('expression').isAwaitExpression())) {
      return true;
    }
  }
  return false;
}

function templateRanges(statements: NodePath<t.Statement>[]): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const statement of statements) {
    statement.traverse({
      TemplateLiteral(path) {
        ranges.push([path.node.start ?? 0, path.node.end ?? 0]);
      },
    });
  }
  return ranges;
}

export class TransactionRewriter {
  constructor(private readonly context: RewriteContext) {}

  rewrite(scope: AggregatedScope): void {
    const { editor, imports, config } = this.context;
    const anchors: TransactionAnchor[] = [];
    for (const shape of scope.shapes) {
      if (shape.anchor.kind === 'transaction') anchors.push(shape.anchor);
    }
    const members = scope.shapes.flatMap(shape => shape.members);

    // Removals first: indentation skips lines that are already going away
    rewriteResourceFields(editor, scope.owner, resourceFields(members, 'UserTransaction'), TRANSACTION_TEMPLATE);
    for (const hop of [...hopsOf(members), ...thisAliasesOf(members.filter(o => o.statement !== null))]) {
      removeHop(editor, hop);
    }
    for (const anchor of anchors) {
      this.removeRollback(anchor);
    }
    for (const anchor of anchors) {
      this.wrapUnitOfWork(anchor);
    }

    imports.add(config.modules.transactions, TRANSACTION_TEMPLATE.type);
  }

  private removeRollback(anchor: TransactionAnchor): void {
    const { editor } = this.context;
    const statement = anchor.rollback?.statement?.node;
    if (!statement) return;

    // A finally block still runs its statements, so its try stays
    const nested = anchor.rollbackTry?.node;
    const target = nested && nested.block.body.length === 1 && !nested.finalizer ? nested : statement;
    editor.removeLines(target.start ?? 0, target.end ?? 0);
  }

  private wrapUnitOfWork(anchor: TransactionAnchor): void {
    const { editor } = this.context;
    const code = editor.code;
    const begin = anchor.begin.statement?.node;
    const commit = anchor.commit.statement?.node;
    if (!begin || !commit) return;

    const body = unitOfWork(anchor);
    const isAsync = anchor.begin.awaited || anchor.commit.awaited || awaitsIn(body);
    const opener = isAsync
      ? `await this.${TRANSACTION_TEMPLATE.name}.executeWithoutResult(async () => {`
      : `this.${TRANSACTION_TEMPLATE.name}.executeWithoutResult(() => {`;
    editor.replace(begin.start ?? 0, begin.end ?? 0, opener);
    editor.replace(commit.start ?? 0, commit.end ?? 0, '});');

    const beginIndent = indentationAt(code, begin.start ?? 0);
    const tryIndent = indentationAt(code, anchor.tryPath.node.start ?? 0);
    const unit = beginIndent.length > tryIndent.length && beginIndent.startsWith(tryIndent)
      ? beginIndent.slice(tryIndent.length)
      : '  ';

    const templates = templateRanges(body);
    const last = lineStart(code, commit.start ?? 0);
    for (let line = lineEnd(code, begin.end ?? 0) + 1; line < last; line = lineEnd(code, line) + 1) {
      if (code.slice(line, lineEnd(code, line)).trim() === '') continue;
      if (templates.some(([start, end]) => line > start && line < end)) continue;
      if (editor.isCovered(line, line + 1)) continue;
      editor.insert(line, unit);
    }
  }
}
