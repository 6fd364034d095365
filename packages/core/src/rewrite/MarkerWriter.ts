/**
 * MarkerWriter - attaches a review decorator to scopes that are not rewritten
 *
 * A declaration already carrying a marker of the same category keeps it
 * as is, so a second run over the output adds nothing. Markers written with
 * an older schema (no category) are never touched, and no marker is added
 * next to them.
 */

import type { MarkerRecord, ScopeAction } from '@rewright/types';
import type { AggregatedScope } from '../analysis/scope/ScopeAggregator.js';
import { categoryFor, formatRationale, formatSuggestedAction } from '../report/RationaleFormatter.js';
import { indentationAt, lineStart } from './SourceEditor.js';
import type { RewriteContext } from './types.js';

export interface MarkerOutcome {
  action: Exclude<ScopeAction, 'rewrite'>;
  record: MarkerRecord;
}

export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `'${escaped}'`;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Snippet of the earliest occurrence in a shape that is not SAFE.
 */
function originalCode(scope: AggregatedScope): string {
  const flagged = scope.shapes.filter(shape => shape.classification.verdict !== 'SAFE');
  const candidates = (flagged.length > 0 ? flagged : scope.shapes).flatMap(shape => shape.members);
  const first = [...candidates].sort((a, b) => a.id - b.id)[0];
  return first ? collapseWhitespace(first.snippet) : '';
}

export function buildMarkerRecord(scope: AggregatedScope): MarkerRecord {
  const { findings } = scope;
  return {
    category: categoryFor(findings.family),
    rationale: formatRationale(findings),
    originalCode: originalCode(scope),
    suggestedAction: formatSuggestedAction(findings),
  };
}

export function renderMarker(name: string, record: MarkerRecord): string {
  const fields = [
    `category: ${quoteString(record.category)}`,
    `reason: ${quoteString(record.rationale)}`,
    `originalCode: ${quoteString(record.originalCode)}`,
    `suggestedAction: ${quoteString(record.suggestedAction)}`,
  ];
  return `@${name}({ ${fields.join(', ')} })`;
}

export class MarkerWriter {
  constructor(private readonly context: RewriteContext) {}

  write(scope: AggregatedScope): MarkerOutcome {
    const record = buildMarkerRecord(scope);
    const { owner } = scope;

    if (owner.markers.some(marker => marker.category === record.category)) {
      return { action: 'marker-preserved', record };
    }
    if (owner.markers.some(marker => marker.legacy)) {
      return { action: 'marker-skipped-legacy', record };
    }

    const { editor, facts, imports, config } = this.context;
    const decorators = owner.path.node.decorators ?? [];
    const anchor = Math.min(
      owner.statement.node.start ?? 0,
      owner.path.node.start ?? 0,
      ...decorators.map(decorator => decorator.start ?? 0)
    );
    const name = facts.markerLocalName ?? config.markers.name;
    editor.insert(lineStart(editor.code, anchor), `${indentationAt(editor.code, anchor)}${renderMarker(name, record)}\n`);
    if (facts.markerLocalName === null) {
      imports.add(config.markers.module, config.markers.name);
    }
    return { action: 'marker', record };
  }
}
