/**
 * Babel traverse helper for ESM/CJS interop
 *
 * Under native ESM the CommonJS build of @babel/traverse arrives as a module
 * object whose `default` holds the function; under CJS it is the function.
 *
 * Usage:
 *   import traverseModule from '@babel/traverse';
 *   import { getTraverseFunction } from './babelTraverse.js';
 *   const traverse = getTraverseFunction(traverseModule);
 */

import type { TraverseOptions, Scope, NodePath, Binding, Node, Visitor } from '@babel/traverse';

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

interface ModuleWithPossibleDefault {
  default?: unknown;
}

function hasDefaultExport(mod: unknown): mod is ModuleWithPossibleDefault {
  return typeof mod === 'object' && mod !== null && 'default' in mod;
}

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === 'function';
}

/**
 * @throws Error if the module exposes no traverse function
 */
export function getTraverseFunction(traverseModule: unknown): TraverseFunction {
  if (hasDefaultExport(traverseModule) && isTraverseFunction(traverseModule.default)) {
    return traverseModule.default;
  }

  if (isTraverseFunction(traverseModule)) {
    return traverseModule;
  }

  throw new Error(
    'Unable to resolve @babel/traverse function. ' +
    'This may indicate an incompatible version or broken installation.'
  );
}

export type { TraverseOptions, Scope, NodePath, Binding, Node, Visitor };
