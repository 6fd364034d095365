/**
 * Location extraction for AST nodes.
 *
 * Convention: 0:0 means "unknown location" (synthetic nodes, recovered parses).
 */
import type { Node } from '@babel/types';
import type { SourcePosition } from '@rewright/types';

export const UNKNOWN_LOCATION: SourcePosition = { line: 0, column: 0 };

/**
 * Start position of a node; line is 1-based, column 0-based.
 */
export function getNodeLocation(node: Node | null | undefined): SourcePosition {
  return {
    line: node?.loc?.start?.line ?? 0,
    column: node?.loc?.start?.column ?? 0,
  };
}

export function getLine(node: Node | null | undefined): number {
  return node?.loc?.start?.line ?? 0;
}

export function getColumn(node: Node | null | undefined): number {
  return node?.loc?.start?.column ?? 0;
}

/**
 * Character range of a node in the unit text. Nodes without offsets yield null.
 */
export function getRange(node: Node | null | undefined): { start: number; end: number } | null {
  if (node?.start == null || node.end == null) {
    return null;
  }
  return { start: node.start, end: node.end };
}

/**
 * Source text of a node, '' when it carries no offsets.
 */
export function sliceNode(code: string, node: Node | null | undefined): string {
  const range = getRange(node);
  return range ? code.slice(range.start, range.end) : '';
}

export function formatPosition(position: SourcePosition): string {
  return `${position.line}:${position.column}`;
}
