/**
 * ImportPlan - import edits derived from the rewrite edits of a unit
 *
 * Runs after every scope edit is registered: a legacy specifier is dropped
 * when no reference to its local name survives outside the edited ranges.
 * Target imports are merged into an existing import of the same module, or
 * added after the last import.
 */

import * as t from '@babel/types';
import type { NodePath } from '../analysis/ast/babelTraverse.js';
import type { UnitFacts } from '../analysis/facts/types.js';
import type { SourceEditor } from './SourceEditor.js';

interface ImportParts {
  /** Default and namespace bindings */
  leading: string[];
  named: string[];
}

function partsOf(specifiers: t.ImportDeclaration['specifiers']): ImportParts {
  const parts: ImportParts = { leading: [], named: [] };
  for (const specifier of specifiers) {
    if (t.isImportDefaultSpecifier(specifier)) {
      parts.leading.push(specifier.local.name);
    } else if (t.isImportNamespaceSpecifier(specifier)) {
      parts.leading.push(`* as ${specifier.local.name}`);
    } else {
      const imported = t.isIdentifier(specifier.imported) ? specifier.imported.name : `'${specifier.imported.value}'`;
      const prefix = specifier.importKind === 'type' ? 'type ' : '';
      parts.named.push(imported === specifier.local.name ? `${prefix}${imported}` : `${prefix}${imported} as ${specifier.local.name}`);
    }
  }
  return parts;
}

function renderImport(declaration: t.ImportDeclaration, parts: ImportParts, source: string): string {
  const kind = declaration.importKind === 'type' ? 'type ' : '';
  const bindings = [...parts.leading];
  if (parts.named.length > 0) bindings.push(`{ ${parts.named.join(', ')} }`);
  return `import ${kind}${bindings.join(', ')} from ${source};`;
}

/**
 * Identifier positions that are not references to a binding.
 */
function isNonReference(path: NodePath<t.Identifier>): boolean {
  const parent = path.parent;
  const key = path.key;
  if ((t.isMemberExpression(parent) || t.isOptionalMemberExpression(parent)) && key === 'property') {
    return !parent.computed;
  }
  if ((t.isObjectProperty(parent) || t.isClassProperty(parent) || t.isClassMethod(parent) || t.isObjectMethod(parent)) &&
      key === 'key') {
    return !parent.computed;
  }
  if (t.isTSQualifiedName(parent) && key === 'right') return true;
  if ((t.isTSPropertySignature(parent) || t.isTSMethodSignature(parent)) && key === 'key') return true;
  if (t.isTSEnumMember(parent) && key === 'id') return true;
  return t.isLabeledStatement(parent) || t.isBreakStatement(parent) || t.isContinueStatement(parent);
}

export class ImportPlan {
  private readonly additions = new Map<string, string[]>();

  constructor(
    private readonly facts: UnitFacts,
    private readonly editor: SourceEditor
  ) {}

  add(module: string, name: string): void {
    const names = this.additions.get(module) ?? [];
    if (!names.includes(name)) names.push(name);
    this.additions.set(module, names);
  }

  /**
   * Register the import edits with the editor.
   */
  apply(): void {
    const { program } = this.facts;
    const code = this.editor.code;
    const imports = program.node.body.filter((s): s is t.ImportDeclaration => t.isImportDeclaration(s));
    const used = this.survivingReferences();
    const quote = imports.length > 0 && code.charAt(imports[0].source.start ?? 0) === '"' ? '"' : "'";

    const removed = new Set<t.ImportDeclaration>();
    const rewritten = new Map<t.ImportDeclaration, ImportParts>();

    for (const declaration of imports) {
      if (!this.facts.resolver.isLegacyModule(declaration.source.value)) continue;
      const kept = declaration.specifiers.filter(s => used.has(s.local.name));
      if (kept.length === declaration.specifiers.length) continue;
      if (kept.length === 0) {
        removed.add(declaration);
      } else {
        rewritten.set(declaration, partsOf(kept));
      }
    }

    const newLines: string[] = [];
    for (const [module, names] of this.additions) {
      const existing = imports.find(d =>
        d.source.value === module && d.importKind !== 'type' && !removed.has(d) &&
        !d.specifiers.some(s => t.isImportNamespaceSpecifier(s))
      );
      if (existing) {
        const current = rewritten.get(existing) ?? partsOf(existing.specifiers);
        const missing = names.filter(name => !existing.specifiers.some(s => s.local.name === name));
        if (missing.length > 0) rewritten.set(existing, { leading: current.leading, named: [...current.named, ...missing] });
      } else {
        newLines.push(`import { ${names.join(', ')} } from ${quote}${module}${quote};`);
      }
    }

    for (const [declaration, parts] of rewritten) {
      const source = code.slice(declaration.source.start ?? 0, declaration.source.end ?? 0);
      this.editor.replace(declaration.start ?? 0, declaration.end ?? 0, renderImport(declaration, parts, source));
    }

    const last = imports.length > 0 ? imports[imports.length - 1] : null;
    for (const declaration of removed) {
      if (declaration === last && newLines.length > 0) continue;
      this.editor.removeLines(declaration.start ?? 0, declaration.end ?? 0);
    }

    if (newLines.length === 0) return;
    if (!last) {
      this.editor.insert(program.node.start ?? 0, `${newLines.join('\n')}\n`);
    } else if (removed.has(last)) {
      this.editor.replace(last.start ?? 0, last.end ?? 0, newLines.join('\n'));
    } else {
      this.editor.insert(last.end ?? 0, `\n${newLines.join('\n')}`);
    }
  }

  /**
   * Names still referenced outside edited ranges.
   */
  private survivingReferences(): Set<string> {
    const used = new Set<string>();
    const editor = this.editor;
    this.facts.program.traverse({
      ImportDeclaration(path) {
        path.skip();
      },
      Identifier(path) {
        if (isNonReference(path)) return;
        const { start, end } = path.node;
        if (start == null || end == null || !editor.isCovered(start, end)) {
          used.add(path.node.name);
        }
      },
    });
    return used;
  }
}
