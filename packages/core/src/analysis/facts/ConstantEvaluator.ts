/**
 * ConstantEvaluator - classifies expressions as LITERAL, CONSTANT_FOLDABLE or DYNAMIC
 *
 * Folding never leaves the unit: it follows `const` bindings, `static readonly`
 * members of classes declared in the unit (through their same-unit `extends`
 * chain), members of same-unit enums and `as const` object literals.
 */
import * as t from '@babel/types';
import type { ConstantValue, Literalness } from '@rewright/types';
import type { NodePath } from '../ast/babelTraverse.js';

export interface ConstantFact {
  literalness: Literalness;
  /** Present unless DYNAMIC */
  value?: ConstantValue;
}

interface Folded {
  value: ConstantValue;
  /** Written directly in source, no lookup or arithmetic involved */
  literal: boolean;
}

const DYNAMIC: ConstantFact = { literalness: 'DYNAMIC' };

type AnyPath = NodePath<t.Node | null | undefined>;

function memberName(path: NodePath<t.MemberExpression>): string | null {
  const { property, computed } = path.node;
  if (!computed && t.isIdentifier(property)) return property.name;
  if (computed && t.isStringLiteral(property)) return property.value;
  return null;
}

function propertyKeyName(key: t.Node, computed: boolean): string | null {
  if (!computed && t.isIdentifier(key)) return key.name;
  if (t.isStringLiteral(key)) return key.value;
  return null;
}

export class ConstantEvaluator {
  private readonly classes = new Map<string, NodePath<t.ClassDeclaration>>();
  private readonly enums = new Map<string, NodePath<t.TSEnumDeclaration>>();
  private readonly inProgress = new Set<t.Node>();

  constructor(program: NodePath<t.Program>) {
    for (const statement of program.get('body')) {
      let declaration: AnyPath = statement;
      if (statement.isExportNamedDeclaration()) {
        declaration = statement.get('declaration');
      } else if (statement.isExportDefaultDeclaration()) {
        declaration = statement.get('declaration');
      }
      if (declaration.isClassDeclaration() && declaration.node.id) {
        this.classes.set(declaration.node.id.name, declaration);
      } else if (declaration.isTSEnumDeclaration()) {
        this.enums.set(declaration.node.id.name, declaration);
      }
    }
  }

  evaluate(path: AnyPath): ConstantFact {
    const folded = this.fold(path);
    if (!folded) return DYNAMIC;
    return {
      literalness: folded.literal ? 'LITERAL' : 'CONSTANT_FOLDABLE',
      value: folded.value,
    };
  }

  private fold(path: AnyPath): Folded | null {
    const { node } = path;
    if (!node || this.inProgress.has(node)) {
      return null;
    }
    this.inProgress.add(node);
    try {
      return this.foldNode(path);
    } finally {
      this.inProgress.delete(node);
    }
  }

  private foldNode(path: AnyPath): Folded | null {
    if (path.isStringLiteral() || path.isNumericLiteral() || path.isBooleanLiteral()) {
      return { value: path.node.value, literal: true };
    }
    if (path.isNullLiteral()) {
      return { value: null, literal: true };
    }
    if (path.isTemplateLiteral()) {
      return this.foldTemplate(path);
    }
    if (path.isParenthesizedExpression()) return this.fold(path.get('expression'));
    if (path.isTSAsExpression()) return this.fold(path.get('expression'));
    if (path.isTSSatisfiesExpression()) return this.fold(path.get('expression'));
    if (path.isTSNonNullExpression()) return this.fold(path.get('expression'));
    if (path.isTSTypeAssertion()) return this.fold(path.get('expression'));
    if (path.isUnaryExpression()) {
      return this.foldUnary(path);
    }
    if (path.isBinaryExpression()) {
      return this.foldBinary(path);
    }
    if (path.isIdentifier()) {
      return this.foldIdentifier(path);
    }
    if (path.isMemberExpression()) {
      return this.foldMember(path);
    }
    return null;
  }

  private foldTemplate(path: NodePath<t.TemplateLiteral>): Folded | null {
    const { quasis } = path.node;
    const expressions = path.get('expressions');
    if (expressions.length === 0) {
      const cooked = quasis[0]?.value.cooked;
      return cooked === undefined || cooked === null ? null : { value: cooked, literal: true };
    }
    let text = '';
    for (let i = 0; i < quasis.length; i++) {
      const cooked = quasis[i].value.cooked;
      if (cooked === undefined || cooked === null) return null;
      text += cooked;
      if (i < expressions.length) {
        const part = this.fold(expressions[i]);
        if (!part) return null;
        text += String(part.value);
      }
    }
    return { value: text, literal: false };
  }

  private foldUnary(path: NodePath<t.UnaryExpression>): Folded | null {
    const { operator } = path.node;
    if (operator !== '-' && operator !== '+' && operator !== '!') return null;
    const argument = this.fold(path.get('argument'));
    if (!argument) return null;
    if (operator === '!') {
      return typeof argument.value === 'boolean' ? { value: !argument.value, literal: argument.literal } : null;
    }
    if (typeof argument.value !== 'number') return null;
    return { value: operator === '-' ? -argument.value : argument.value, literal: argument.literal };
  }

  private foldBinary(path: NodePath<t.BinaryExpression>): Folded | null {
    const left = path.get('left');
    if (left.isPrivateName()) return null;
    const a = this.fold(left);
    const b = a && this.fold(path.get('right'));
    if (!a || !b) return null;

    const x = a.value;
    const y = b.value;
    const operator = path.node.operator;
    switch (operator) {
      case '+':
        if (typeof x === 'string' || typeof y === 'string') {
          return { value: String(x) + String(y), literal: false };
        }
        return typeof x === 'number' && typeof y === 'number' ? { value: x + y, literal: false } : null;
      case '-':
      case '*':
      case '/':
      case '%':
      case '**':
        if (typeof x !== 'number' || typeof y !== 'number') return null;
        return { value: arithmetic(operator, x, y), literal: false };
      default:
        return null;
    }
  }

  private foldIdentifier(path: NodePath<t.Identifier>): Folded | null {
    const binding = path.scope.getBinding(path.node.name);
    if (!binding || binding.kind !== 'const' || binding.constantViolations.length > 0) {
      return null;
    }
    const declarator = binding.path;
    if (!declarator.isVariableDeclarator() || !t.isIdentifier(declarator.node.id)) {
      return null;
    }
    const init = declarator.get('init');
    if (!init.node) return null;
    const folded = this.fold(init);
    return folded ? { value: folded.value, literal: false } : null;
  }

  private foldMember(path: NodePath<t.MemberExpression>): Folded | null {
    const name = memberName(path);
    const object = path.get('object');
    if (name === null || !object.isIdentifier()) return null;

    const owner = object.node.name;
    const binding = path.scope.getBinding(owner);
    // A local binding shadows the unit-level declaration of the same name
    if (binding && !binding.scope.path.isProgram()) return null;

    const classPath = this.classes.get(owner);
    if (classPath) {
      return this.foldStaticMember(classPath, name, new Set());
    }
    const enumPath = this.enums.get(owner);
    if (enumPath) {
      return this.foldEnumMember(enumPath, name);
    }
    if (binding?.kind === 'const' && binding.constantViolations.length === 0 && binding.path.isVariableDeclarator()) {
      return this.foldFrozenObjectMember(binding.path, name);
    }
    return null;
  }

  private foldStaticMember(classPath: NodePath<t.ClassDeclaration>, name: string, visited: Set<string>): Folded | null {
    const className = classPath.node.id?.name ?? '';
    if (visited.has(className)) return null;
    visited.add(className);

    for (const member of classPath.get('body').get('body')) {
      if (!member.isClassProperty()) continue;
      const { node } = member;
      if (!node.static || propertyKeyName(node.key, node.computed) !== name) continue;
      if (!node.readonly) return null;
      const value = member.get('value');
      if (!value.node) return null;
      const folded = this.fold(value);
      return folded ? { value: folded.value, literal: false } : null;
    }

    const superClass = classPath.node.superClass;
    if (t.isIdentifier(superClass)) {
      const parent = this.classes.get(superClass.name);
      if (parent) return this.foldStaticMember(parent, name, visited);
    }
    return null;
  }

  private foldEnumMember(enumPath: NodePath<t.TSEnumDeclaration>, name: string): Folded | null {
    if (enumPath.node.declare) return null;
    let next: number | null = 0;
    for (const member of enumPath.get('members')) {
      const key = propertyKeyName(member.node.id, false);
      const initializer = member.get('initializer');
      let value: ConstantValue | null = next;
      if (initializer.node) {
        const folded = this.fold(initializer);
        value = folded ? folded.value : null;
      }
      if (key === name) {
        return value === null ? null : { value, literal: false };
      }
      next = typeof value === 'number' ? value + 1 : null;
    }
    return null;
  }

  private foldFrozenObjectMember(declarator: NodePath<t.VariableDeclarator>, name: string): Folded | null {
    const init = declarator.get('init');
    if (!init.isTSAsExpression()) return null;
    const annotation = init.node.typeAnnotation;
    const isConst = t.isTSTypeReference(annotation) && t.isIdentifier(annotation.typeName, { name: 'const' });
    const object = init.get('expression');
    if (!isConst || !object.isObjectExpression()) return null;

    for (const property of object.get('properties')) {
      if (!property.isObjectProperty()) continue;
      if (propertyKeyName(property.node.key, property.node.computed) !== name) continue;
      const folded = this.fold(property.get('value'));
      return folded ? { value: folded.value, literal: false } : null;
    }
    return null;
  }
}

function arithmetic(operator: '-' | '*' | '/' | '%' | '**', x: number, y: number): number {
  switch (operator) {
    case '-':
      return x - y;
    case '*':
      return x * y;
    case '/':
      return x / y;
    case '%':
      return x % y;
    case '**':
      return x ** y;
  }
}
