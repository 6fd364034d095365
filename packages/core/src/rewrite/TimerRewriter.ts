/**
 * TimerRewriter - replaces programmatic timer creation in a SAFE scope with
 * TaskScheduler calls that invoke the class's timeout handler directly
 */

import * as t from '@babel/types';
import type { NodePath } from '../analysis/ast/babelTraverse.js';
import { staticMemberName } from '../analysis/facts/AliasTracer.js';
import { configArgumentIndex } from '../analysis/facts/FactCollector.js';
import type { ClassFacts, CollectedOccurrence } from '../analysis/facts/types.js';
import type { AggregatedScope } from '../analysis/scope/ScopeAggregator.js';
import type { TimerAnchor } from '../analysis/shapes/PatternMatcher.js';
import { resourceFields, rewriteResourceFields, hopsOf, removeHop, thisAliasesOf, type InjectedField } from './fields.js';
import type { RewriteContext } from './types.js';

export const TASK_SCHEDULER: InjectedField = { name: 'taskScheduler', type: 'TaskScheduler' };

/**
 * Delay text usable as the right operand of `Date.now() + ...`.
 */
function operand(path: NodePath, code: string): string {
  const text = code.slice(path.node.start ?? 0, path.node.end ?? 0);
  const simple = path.isIdentifier() || path.isLiteral() || path.isMemberExpression() || path.isCallExpression();
  return simple ? text : `(${text})`;
}

export function scheduleCall(create: CollectedOccurrence, handler: string, code: string): string {
  const task = `() => this.${handler}()`;
  const [first, second] = create.argPaths;
  if (create.op === 'create-interval-timer' && first && second) {
    const interval = code.slice(second.node.start ?? 0, second.node.end ?? 0);
    return `this.${TASK_SCHEDULER.name}.scheduleAtFixedRate(${task}, new Date(Date.now() + ${operand(first, code)}), ${interval})`;
  }
  const delay = first ? operand(first, code) : '0';
  return `this.${TASK_SCHEDULER.name}.schedule(${task}, new Date(Date.now() + ${delay}))`;
}

function thisMemberReferences(owner: ClassFacts, name: string): NodePath<t.MemberExpression>[] {
  const found: NodePath<t.MemberExpression>[] = [];
  owner.path.traverse({
    MemberExpression(path) {
      if (t.isThisExpression(path.node.object) && staticMemberName(path.node) === name) found.push(path);
    },
  });
  return found;
}

export class TimerRewriter {
  constructor(private readonly context: RewriteContext) {}

  rewrite(scope: AggregatedScope): void {
    const { editor, imports, config } = this.context;
    const { owner } = scope;
    const [handler] = owner.timeoutHandlers;
    if (!handler) return;

    const anchors: TimerAnchor[] = [];
    for (const shape of scope.shapes) {
      if (shape.anchor.kind === 'timer') anchors.push(shape.anchor);
    }
    const receivers = anchors.map(anchor => anchor.create);

    rewriteResourceFields(editor, owner, resourceFields(receivers, 'TimerService'), TASK_SCHEDULER);
    for (const hop of [...hopsOf(receivers), ...thisAliasesOf(receivers)]) {
      removeHop(editor, hop);
    }

    for (const anchor of anchors) {
      const { node } = anchor.create.path;
      editor.replace(node.start ?? 0, node.end ?? 0, scheduleCall(anchor.create, handler.method, editor.code));
    }
    // After the calls: configuration is dropped only when every use was inside one
    for (const anchor of anchors) {
      this.removeConfiguration(anchor, owner);
    }

    const decorator = handler.decorator.node;
    editor.removeLines(decorator.start ?? 0, decorator.end ?? 0);

    imports.add(config.modules.scheduling, TASK_SCHEDULER.type);
  }

  private removeConfiguration(anchor: TimerAnchor, owner: ClassFacts): void {
    const { editor } = this.context;
    const covered = (path: NodePath): boolean => editor.isCovered(path.node.start ?? 0, path.node.end ?? 0);
    const argument = anchor.create.argPaths[configArgumentIndex(anchor.create.op)];

    if (argument?.isIdentifier()) {
      const binding = argument.scope.getBinding(argument.node.name);
      const declaration = binding?.path.parentPath;
      if (binding && binding.path.isVariableDeclarator() && declaration?.isVariableDeclaration() &&
          declaration.node.declarations.length === 1 && binding.referencePaths.every(covered)) {
        editor.removeLines(declaration.node.start ?? 0, declaration.node.end ?? 0);
      }
      return;
    }

    const construct = anchor.related.find(o => o.op === 'construct-config');
    const field = construct?.trace.resolution === 'RESOLVED' && construct.trace.kind === 'field' ? construct.trace.field : undefined;
    if (field && field.path.isClassProperty() && thisMemberReferences(owner, field.name).every(covered)) {
      editor.removeLines(field.path.node.start ?? 0, field.path.node.end ?? 0);
    }
  }
}
