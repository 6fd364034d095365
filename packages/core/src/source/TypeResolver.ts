/**
 * TypeResolver - resolves type and value references to legacy API exports
 *
 * A reference counts only when it reaches, through the unit's import
 * bindings, a name exported by a configured legacy module. A class declared
 * in the unit under the same name is a look-alike and resolves to nothing.
 */
import * as t from '@babel/types';

export const LEGACY_NAMES = [
  'UserTransaction',
  'SessionContext',
  'TimerService',
  'TimerConfig',
  'Timeout',
] as const;

export type LegacyName = typeof LEGACY_NAMES[number];

export interface ImportBinding {
  local: string;
  /** Exported name, or '*' for namespace imports */
  imported: string;
  module: string;
  declaration: t.ImportDeclaration;
  specifier: t.ImportSpecifier | t.ImportDefaultSpecifier | t.ImportNamespaceSpecifier;
}

function toLegacyName(name: string): LegacyName | null {
  return LEGACY_NAMES.find(candidate => candidate === name) ?? null;
}

function importedName(specifier: t.ImportSpecifier): string {
  return t.isIdentifier(specifier.imported) ? specifier.imported.name : specifier.imported.value;
}

export class TypeResolver {
  private readonly bindings: ImportBinding[] = [];
  private readonly named = new Map<string, LegacyName>();
  private readonly namespaces = new Set<string>();

  constructor(program: t.Program, private readonly legacyModules: readonly string[]) {
    for (const statement of program.body) {
      if (!t.isImportDeclaration(statement)) continue;
      const module = statement.source.value;
      if (!this.isLegacyModule(module)) continue;

      for (const specifier of statement.specifiers) {
        const local = specifier.local.name;
        if (t.isImportNamespaceSpecifier(specifier)) {
          this.namespaces.add(local);
          this.bindings.push({ local, imported: '*', module, declaration: statement, specifier });
        } else if (t.isImportSpecifier(specifier)) {
          const imported = importedName(specifier);
          const legacyName = toLegacyName(imported);
          if (legacyName) {
            this.named.set(local, legacyName);
          }
          this.bindings.push({ local, imported, module, declaration: statement, specifier });
        } else {
          this.bindings.push({ local, imported: 'default', module, declaration: statement, specifier });
        }
      }
    }
  }

  isLegacyModule(module: string): boolean {
    return this.legacyModules.includes(module);
  }

  /** Every import binding taken from a legacy module, in source order. */
  get legacyImports(): readonly ImportBinding[] {
    return this.bindings;
  }

  resolveTypeName(typeName: t.TSEntityName): LegacyName | null {
    if (t.isIdentifier(typeName)) {
      return this.named.get(typeName.name) ?? null;
    }
    if (t.isTSQualifiedName(typeName) && t.isIdentifier(typeName.left) && this.namespaces.has(typeName.left.name)) {
      return toLegacyName(typeName.right.name);
    }
    return null;
  }

  /**
   * Resolve a declared type. `T | undefined` and `T | null` resolve like `T`.
   */
  resolveType(type: t.TSType): LegacyName | null {
    if (t.isTSTypeReference(type)) {
      return this.resolveTypeName(type.typeName);
    }
    if (t.isTSParenthesizedType(type)) {
      return this.resolveType(type.typeAnnotation);
    }
    if (t.isTSUnionType(type)) {
      const members = type.types.filter(member => !t.isTSUndefinedKeyword(member) && !t.isTSNullKeyword(member));
      if (members.length !== 1) return null;
      return this.resolveType(members[0]);
    }
    return null;
  }

  resolveAnnotation(annotation: t.TypeAnnotation | t.TSTypeAnnotation | t.Noop | null | undefined): LegacyName | null {
    if (!annotation || !t.isTSTypeAnnotation(annotation)) {
      return null;
    }
    return this.resolveType(annotation.typeAnnotation);
  }

  /**
   * Resolve a value reference such as a constructor or decorator callee.
   */
  resolveValue(expression: t.Node): LegacyName | null {
    if (t.isIdentifier(expression)) {
      return this.named.get(expression.name) ?? null;
    }
    if (
      t.isMemberExpression(expression) &&
      !expression.computed &&
      t.isIdentifier(expression.object) &&
      t.isIdentifier(expression.property) &&
      this.namespaces.has(expression.object.name)
    ) {
      return toLegacyName(expression.property.name);
    }
    return null;
  }
}
