/**
 * DiagnosticCollector - Collects non-fatal findings produced while processing a unit
 *
 * Unresolvable receivers, unparseable units and occurrences outside any scope
 * never abort a run; they are recorded here and surfaced on the UnitResult.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.add({ code: 'WARN_OUTSIDE_SCOPE', severity: 'warning', message, phase: 'COLLECT' });
 *   collector.addError(error);
 *   console.log(collector.toDiagnosticsLog());
 */

import { RewrightError, type PipelinePhase } from '../errors/RewrightError.js';

/**
 * Diagnostic entry - unified format for all errors/warnings
 */
export interface Diagnostic {
  code: string;
  severity: 'fatal' | 'error' | 'warning' | 'info';
  message: string;
  file?: string;
  line?: number;
  phase: PipelinePhase;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (timestamp is generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Record an error. RewrightError carries its own code, severity and context;
   * anything else becomes ERR_UNKNOWN in the given phase.
   */
  addError(error: Error, phase: PipelinePhase = 'COLLECT'): void {
    if (error instanceof RewrightError) {
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        file: error.context.filePath,
        line: error.context.lineNumber,
        phase: error.context.phase ?? phase,
        suggestion: error.suggestion,
      });
      return;
    }
    this.add({
      code: 'ERR_UNKNOWN',
      severity: 'error',
      message: error.message,
      phase,
    });
  }

  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /** Copy of all diagnostics, in insertion order. */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByPhase(phase: PipelinePhase): Diagnostic[] {
    return this.diagnostics.filter(d => d.phase === phase);
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /** True for any error, fatal included. */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * One JSON object per line.
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
