/**
 * Rewriter - applies the scope decisions of one unit to its text
 *
 * SAFE scopes are rewritten by their family's writer, every other scope gets
 * a review marker. Import edits are planned last, once every scope edit is
 * known. Nothing reaches the output unless all edits apply cleanly.
 */

import type { IdiomFamily, MarkerRecord, ScopeAction, ScopeReport } from '@rewright/types';
import type { UnitFacts } from '../analysis/facts/types.js';
import type { AggregatedScope } from '../analysis/scope/ScopeAggregator.js';
import type { UnitContext } from '../EngineTypes.js';
import { formatRationale, formatSuggestedAction } from '../report/RationaleFormatter.js';
import { ImportPlan } from './ImportPlan.js';
import { MarkerWriter } from './MarkerWriter.js';
import { SourceEditor } from './SourceEditor.js';
import { TimerRewriter } from './TimerRewriter.js';
import { TransactionRewriter } from './TransactionRewriter.js';
import type { RewriteContext } from './types.js';

export interface RewriteOutcome {
  code: string;
  changed: boolean;
  scopes: ScopeReport[];
  decorations: Record<string, MarkerRecord[]>;
}

interface ScopeWriter {
  rewrite(scope: AggregatedScope): void;
}

export class Rewriter {
  constructor(private readonly context: UnitContext) {}

  /**
   * @throws AnalysisError ERR_EDIT_OVERLAP when two edits collide
   */
  rewrite(facts: UnitFacts, scopes: readonly AggregatedScope[]): RewriteOutcome {
    const { config, logger, file } = this.context;
    const editor = new SourceEditor(facts.unit.code);
    const imports = new ImportPlan(facts, editor);
    const rewriteContext: RewriteContext = { config, facts, editor, imports };
    const writers: Record<IdiomFamily, ScopeWriter> = {
      transactions: new TransactionRewriter(rewriteContext),
      timers: new TimerRewriter(rewriteContext),
    };
    const markers = new MarkerWriter(rewriteContext);

    const reports: ScopeReport[] = [];
    const decorations: Record<string, MarkerRecord[]> = {};

    for (const scope of scopes) {
      const { findings, owner } = scope;
      let action: ScopeAction;
      let marker: MarkerRecord | undefined;

      if (findings.verdict === 'SAFE') {
        writers[findings.family].rewrite(scope);
        action = 'rewrite';
      } else {
        const outcome = markers.write(scope);
        action = outcome.action;
        marker = outcome.record;
        if (action !== 'marker-skipped-legacy') {
          (decorations[owner.declarationId] ??= []).push(outcome.record);
        }
      }

      logger.debug('Scope decided', { file, scope: findings.scope, family: findings.family, verdict: findings.verdict, action });
      reports.push({
        file,
        scope: findings.scope,
        family: findings.family,
        verdict: findings.verdict,
        linearCount: findings.linearCount,
        complexCount: findings.complexCount,
        reasons: findings.reasons,
        methods: findings.methods,
        action,
        rationale: formatRationale(findings),
        suggestedAction: formatSuggestedAction(findings),
        ...(marker ? { marker } : {}),
      });
    }

    if (editor.hasEdits) imports.apply();
    const code = editor.hasEdits ? editor.apply() : facts.unit.code;
    return { code, changed: code !== facts.unit.code, scopes: reports, decorations };
  }
}
