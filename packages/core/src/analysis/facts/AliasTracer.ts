/**
 * AliasTracer - reduces a receiver expression to a normalized alias identity
 *
 * Identities:
 *   field:<name>                      this.f, this['f'], self.f (const self = this),
 *                                     const { f } = this, constructor parameter properties
 *   param:<method>:<name>             typed method parameter
 *   factory:<context>#<method>        ctx.getUserTransaction(), ctx.getTimerService()
 *   local:<method>:<name>@<line>:<col> typed local that cannot be traced further
 *   construct:<line>:<col>            new TimerConfig(...)
 *
 * Single-hop chains are followed: `const x = <source>` and the two-statement
 * `let x; x = <source>;` resolve to the identity of <source>.
 */
import * as t from '@babel/types';
import type { NodePath, Binding } from '../ast/babelTraverse.js';
import { getNodeLocation } from '../ast/location.js';
import type { LegacyName, TypeResolver } from '../../source/TypeResolver.js';
import type { AliasTrace, ClassFacts, HopFact, TrackedType } from './types.js';

type AnyPath = NodePath<t.Node | null | undefined>;

const FACTORIES: Record<string, TrackedType> = {
  getUserTransaction: 'UserTransaction',
  getTimerService: 'TimerService',
};

function unresolved(hops: HopFact[]): AliasTrace {
  return { resolution: 'UNRESOLVED', id: null, type: null, hops };
}

export function trackedType(name: LegacyName | null): TrackedType | null {
  return name === null || name === 'Timeout' ? null : name;
}

/**
 * Name accessed by `x.f` or `x['f']`, null for other computed keys.
 */
export function staticMemberName(node: t.MemberExpression | t.OptionalMemberExpression): string | null {
  if (!node.computed && t.isIdentifier(node.property)) return node.property.name;
  if (node.computed && t.isStringLiteral(node.property)) return node.property.value;
  return null;
}

export interface ObservedBinding {
  binding: Binding;
  alias: string;
  type: TrackedType;
}

export class AliasTracer {
  /** Local and parameter bindings that resolved to a tracked resource */
  readonly observed = new Map<Binding, ObservedBinding>();

  constructor(private readonly resolver: TypeResolver) {}

  trace(path: AnyPath, owner: ClassFacts | null, method: string | null): AliasTrace | null {
    const result = this.traceFrom(path, owner, method, [], new Set());
    if (result?.resolution === 'RESOLVED') {
      for (const hop of result.hops) {
        this.observe(hop.binding, result.id, result.type);
      }
    }
    return result;
  }

  /**
   * `this`, or a const binding initialized with `this`.
   */
  isThisReference(path: AnyPath): boolean {
    if (path.isThisExpression()) return true;
    if (!path.isIdentifier()) return false;
    const binding = path.scope.getBinding(path.node.name);
    if (!binding || binding.kind !== 'const' || !binding.path.isVariableDeclarator()) return false;
    return t.isThisExpression(binding.path.node.init);
  }

  private observe(binding: Binding, alias: string, type: TrackedType): void {
    if (!this.observed.has(binding)) {
      this.observed.set(binding, { binding, alias, type });
    }
  }

  private traceFrom(
    path: AnyPath,
    owner: ClassFacts | null,
    method: string | null,
    hops: HopFact[],
    seen: Set<t.Node>
  ): AliasTrace | null {
    const { node } = path;
    if (!node || seen.has(node)) return unresolved(hops);
    seen.add(node);

    if (path.isTSNonNullExpression()) return this.traceFrom(path.get('expression'), owner, method, hops, seen);
    if (path.isParenthesizedExpression()) return this.traceFrom(path.get('expression'), owner, method, hops, seen);
    if (path.isTSAsExpression()) return this.traceFrom(path.get('expression'), owner, method, hops, seen);

    if (path.isMemberExpression()) {
      const name = staticMemberName(path.node);
      if (name !== null && this.isThisReference(path.get('object'))) {
        return this.traceField(name, owner, hops);
      }
      return unresolved(hops);
    }
    if (path.isCallExpression()) {
      return this.traceFactory(path, owner, method, hops, seen);
    }
    if (path.isNewExpression()) {
      if (trackedType(this.resolver.resolveValue(path.node.callee)) !== 'TimerConfig') return null;
      const { line, column } = getNodeLocation(path.node);
      return { resolution: 'RESOLVED', id: `construct:${line}:${column}`, type: 'TimerConfig', kind: 'construct', hops };
    }
    if (path.isIdentifier()) {
      return this.traceIdentifier(path, owner, method, hops, seen);
    }
    if (path.isLiteral() || path.isThisExpression() || path.isObjectExpression() ||
        path.isArrayExpression() || path.isFunction()) {
      return null;
    }
    return unresolved(hops);
  }

  private traceField(name: string, owner: ClassFacts | null, hops: HopFact[]): AliasTrace | null {
    const field = owner?.fields.get(name);
    if (!field) return unresolved(hops);
    const type = trackedType(field.type);
    if (type) {
      return { resolution: 'RESOLVED', id: `field:${name}`, type, kind: 'field', field, hops };
    }
    return field.annotated ? null : unresolved(hops);
  }

  private traceFactory(
    path: NodePath<t.CallExpression>,
    owner: ClassFacts | null,
    method: string | null,
    hops: HopFact[],
    seen: Set<t.Node>
  ): AliasTrace | null {
    const callee = path.get('callee');
    if (!callee.isMemberExpression()) return unresolved(hops);
    const name = staticMemberName(callee.node);
    const produced = name === null ? undefined : FACTORIES[name];
    if (!produced) return unresolved(hops);

    const source = this.traceFrom(callee.get('object'), owner, method, [], seen);
    if (source === null) return null;
    if (source.resolution === 'UNRESOLVED') return unresolved(hops);
    if (source.type !== 'SessionContext') return null;
    return { resolution: 'RESOLVED', id: `factory:${source.id}#${name}`, type: produced, kind: 'factory', hops };
  }

  private traceIdentifier(
    path: NodePath<t.Identifier>,
    owner: ClassFacts | null,
    method: string | null,
    hops: HopFact[],
    seen: Set<t.Node>
  ): AliasTrace | null {
    const name = path.node.name;
    const binding = path.scope.getBinding(name);
    if (!binding || binding.path.isTSParameterProperty() || binding.path.parentPath?.isTSParameterProperty()) {
      return this.isParameterProperty(path, name) ? this.traceField(name, owner, hops) : unresolved(hops);
    }

    if (binding.kind === 'param') {
      return this.traceParameter(binding, name, method, hops);
    }
    if (binding.path.isVariableDeclarator()) {
      return this.traceDeclarator(binding.path, binding, name, owner, method, hops, seen);
    }
    return binding.kind === 'module' ? unresolved(hops) : null;
  }

  /**
   * Bare reference to a constructor parameter property, inside that constructor.
   */
  private isParameterProperty(path: NodePath<t.Identifier>, name: string): boolean {
    const ctor = path.findParent(p => p.isClassMethod({ kind: 'constructor' }));
    if (!ctor?.isClassMethod()) return false;
    return ctor.node.params.some(param => {
      if (!t.isTSParameterProperty(param)) return false;
      const target = t.isAssignmentPattern(param.parameter) ? param.parameter.left : param.parameter;
      return t.isIdentifier(target, { name });
    });
  }

  private traceParameter(binding: Binding, name: string, method: string | null, hops: HopFact[]): AliasTrace | null {
    const param = binding.path.node;
    const target = t.isAssignmentPattern(param) ? param.left : param;
    if (!t.isIdentifier(target)) return unresolved(hops);

    const type = trackedType(this.resolver.resolveAnnotation(target.typeAnnotation));
    if (type) {
      const id = `param:${method ?? '<unit>'}:${name}`;
      this.observe(binding, id, type);
      return { resolution: 'RESOLVED', id, type, kind: 'param', hops };
    }
    return target.typeAnnotation ? null : unresolved(hops);
  }

  private traceDeclarator(
    declarator: NodePath<t.VariableDeclarator>,
    binding: Binding,
    name: string,
    owner: ClassFacts | null,
    method: string | null,
    hops: HopFact[],
    seen: Set<t.Node>
  ): AliasTrace | null {
    const id = declarator.node.id;
    const hop: HopFact = { declarator, binding };

    if (t.isObjectPattern(id)) {
      const key = destructuredKey(id, name);
      if (key !== null && t.isThisExpression(declarator.node.init)) {
        return this.traceField(key, owner, [...hops, hop]);
      }
      return unresolved(hops);
    }
    if (!t.isIdentifier(id)) return unresolved(hops);

    const declared = trackedType(this.resolver.resolveAnnotation(id.typeAnnotation));
    const source = this.singleSource(declarator, binding, name, hop);
    if (source) {
      const inner = this.traceFrom(source, owner, method, [...hops, hop], seen);
      if (inner?.resolution === 'RESOLVED') return inner;
      if (inner === null && !declared) return null;
    }

    if (declared) {
      const { line, column } = getNodeLocation(id);
      return {
        resolution: 'RESOLVED',
        id: `local:${method ?? '<unit>'}:${name}@${line}:${column}`,
        type: declared,
        kind: 'local',
        hops: [...hops, hop],
      };
    }
    return id.typeAnnotation ? null : unresolved([...hops, hop]);
  }

  /**
   * The one expression a binding is ever assigned: its initializer, or the
   * right side of a single `x = <source>;` statement when declared bare.
   */
  private singleSource(
    declarator: NodePath<t.VariableDeclarator>,
    binding: Binding,
    name: string,
    hop: HopFact
  ): AnyPath | null {
    const init = declarator.get('init');
    const violations = binding.constantViolations;
    if (init.node) {
      return violations.length === 0 ? init : null;
    }
    if (violations.length !== 1) return null;

    const [violation] = violations;
    if (!violation.isAssignmentExpression() || violation.node.operator !== '=') return null;
    if (!t.isIdentifier(violation.node.left, { name })) return null;
    const statement = violation.parentPath;
    if (!statement?.isExpressionStatement()) return null;

    hop.assignment = statement;
    return violation.get('right');
  }
}

function destructuredKey(pattern: t.ObjectPattern, localName: string): string | null {
  for (const property of pattern.properties) {
    if (!t.isObjectProperty(property) || property.computed) continue;
    if (!t.isIdentifier(property.value, { name: localName })) continue;
    if (t.isIdentifier(property.key)) return property.key.name;
    if (t.isStringLiteral(property.key)) return property.key.value;
  }
  return null;
}
