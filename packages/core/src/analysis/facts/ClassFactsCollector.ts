/**
 * ClassFactsCollector - per-class facts the matcher, classifier and rewriter read
 *
 * Collects:
 * - Fields with their resolved type (properties and constructor parameter properties)
 * - Methods
 * - `@Timeout()` handlers, resolved through the legacy module
 * - Review markers already on the class, with their schema
 */

import * as t from '@babel/types';
import type { NodePath } from '../ast/babelTraverse.js';
import { getLine } from '../ast/location.js';
import type { TypeResolver, LegacyName } from '../../source/TypeResolver.js';
import type { ClassFacts, ExistingMarker, FieldFact, MethodFact, TimeoutHandlerFact } from './types.js';

function keyName(key: t.Node, computed: boolean): string | null {
  if (computed) return t.isStringLiteral(key) ? key.value : null;
  if (t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  return null;
}

function parameterTarget(param: t.TSParameterProperty): t.Identifier | null {
  const target = t.isAssignmentPattern(param.parameter) ? param.parameter.left : param.parameter;
  return t.isIdentifier(target) ? target : null;
}

/**
 * `get('decorators')` yields a path array, or a single empty path when there are none.
 */
function decoratorPaths(
  result: NodePath<t.Decorator>[] | NodePath<t.Node | null | undefined>
): NodePath<t.Decorator>[] {
  return Array.isArray(result) ? result : [];
}

export class ClassFactsCollector {
  constructor(
    private readonly file: string,
    private readonly resolver: TypeResolver,
    /** Local name the review decorator is called under */
    private readonly markerName: string
  ) {}

  collect(classPath: NodePath<t.ClassDeclaration>): ClassFacts {
    const name = classPath.node.id?.name ?? 'default';
    const parent = classPath.parentPath;
    let statement: NodePath<t.Statement> = classPath;
    if (parent.isExportNamedDeclaration()) {
      statement = parent;
    } else if (parent.isExportDefaultDeclaration()) {
      statement = parent;
    }

    const facts: ClassFacts = {
      name,
      declarationId: `${this.file}#${name}@${getLine(classPath.node)}`,
      path: classPath,
      statement,
      fields: new Map(),
      methods: [],
      timeoutHandlers: [],
      markers: this.collectMarkers(classPath),
    };

    for (const member of classPath.get('body').get('body')) {
      if (member.isClassProperty()) {
        this.addProperty(facts, member);
      } else if (member.isClassMethod()) {
        if (member.node.kind === 'constructor') {
          this.addParameterProperties(facts, member);
        }
        const methodName = keyName(member.node.key, member.node.computed);
        if (methodName !== null && member.node.kind !== 'constructor') {
          this.addMethod(facts, methodName, member, decoratorPaths(member.get('decorators')));
        }
      } else if (member.isClassPrivateMethod()) {
        this.addMethod(facts, `#${member.node.key.id.name}`, member, decoratorPaths(member.get('decorators')));
      }
    }
    return facts;
  }

  private addProperty(facts: ClassFacts, member: NodePath<t.ClassProperty>): void {
    const { node } = member;
    const name = keyName(node.key, node.computed);
    if (name === null || node.static) return;

    let type: LegacyName | null = this.resolver.resolveAnnotation(node.typeAnnotation);
    if (!node.typeAnnotation && t.isNewExpression(node.value)) {
      type = this.resolver.resolveValue(node.value.callee);
    }
    const field: FieldFact = {
      name,
      type,
      annotated: Boolean(node.typeAnnotation) || t.isNewExpression(node.value),
      kind: 'property',
      path: member,
    };
    facts.fields.set(name, field);
  }

  private addParameterProperties(facts: ClassFacts, ctor: NodePath<t.ClassMethod>): void {
    for (const param of ctor.get('params')) {
      if (!param.isTSParameterProperty()) continue;
      const target = parameterTarget(param.node);
      if (!target) continue;
      facts.fields.set(target.name, {
        name: target.name,
        type: this.resolver.resolveAnnotation(target.typeAnnotation),
        annotated: Boolean(target.typeAnnotation),
        kind: 'parameter',
        path: param,
      });
    }
  }

  private addMethod(
    facts: ClassFacts,
    name: string,
    member: NodePath<t.ClassMethod> | NodePath<t.ClassPrivateMethod>,
    decorators: NodePath<t.Decorator>[]
  ): void {
    const method: MethodFact = { name, paramCount: member.node.params.length, path: member };
    facts.methods.push(method);

    for (const decorator of decorators) {
      const expression = decorator.node.expression;
      const callee = t.isCallExpression(expression) ? expression.callee : expression;
      if (this.resolver.resolveValue(callee) === 'Timeout') {
        const handler: TimeoutHandlerFact = { method: name, paramCount: method.paramCount, decorator };
        facts.timeoutHandlers.push(handler);
      }
    }
  }

  private collectMarkers(classPath: NodePath<t.ClassDeclaration>): ExistingMarker[] {
    const markers: ExistingMarker[] = [];
    for (const decorator of decoratorPaths(classPath.get('decorators'))) {
      const expression = decorator.node.expression;
      const callee = t.isCallExpression(expression) ? expression.callee : expression;
      if (!t.isIdentifier(callee, { name: this.markerName })) continue;

      const category = t.isCallExpression(expression) ? categoryOf(expression.arguments[0]) : null;
      markers.push({ category, legacy: category === null, decorator });
    }
    return markers;
  }
}

/**
 * `category` of a `{ category: '...' }` marker argument; null for any other schema.
 */
function categoryOf(argument: t.Node | undefined): string | null {
  if (!t.isObjectExpression(argument)) return null;
  for (const property of argument.properties) {
    if (!t.isObjectProperty(property)) continue;
    if (keyName(property.key, property.computed) !== 'category') continue;
    return t.isStringLiteral(property.value) ? property.value.value : null;
  }
  return null;
}
