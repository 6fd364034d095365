/**
 * SourceEditor - offset-based splices on the original unit text
 *
 * Untouched code keeps its formatting and comments. Edits are collected
 * first and applied once; overlapping edits are a defect and are refused.
 */

import { AnalysisError } from '../errors/RewrightError.js';

interface Edit {
  start: number;
  end: number;
  text: string;
  order: number;
}

export function lineStart(code: string, offset: number): number {
  return code.lastIndexOf('\n', offset - 1) + 1;
}

/** Offset of the line break ending the line, or the text length */
export function lineEnd(code: string, offset: number): number {
  const index = code.indexOf('\n', offset);
  return index < 0 ? code.length : index;
}

export function indentationAt(code: string, offset: number): string {
  const start = lineStart(code, offset);
  const match = /^[ \t]*/.exec(code.slice(start, lineEnd(code, start)));
  return match ? match[0] : '';
}

export class SourceEditor {
  private readonly edits: Edit[] = [];

  constructor(readonly code: string) {}

  get hasEdits(): boolean {
    return this.edits.length > 0;
  }

  insert(at: number, text: string): void {
    this.push(at, at, text);
  }

  replace(start: number, end: number, text: string): void {
    this.push(start, end, text);
  }

  remove(start: number, end: number): void {
    this.push(start, end, '');
  }

  /**
   * Remove a range; when it is alone on its line(s), the whole lines go,
   * line break included.
   */
  removeLines(start: number, end: number): void {
    const from = lineStart(this.code, start);
    const to = lineEnd(this.code, end);
    const before = this.code.slice(from, start);
    const after = this.code.slice(end, to);
    if (before.trim() === '' && after.trim() === '') {
      this.remove(from, Math.min(to + 1, this.code.length));
    } else {
      this.remove(start, end);
    }
  }

  /** True when a non-empty edit covers the whole range */
  isCovered(start: number, end: number): boolean {
    return this.edits.some(edit => edit.end > edit.start && edit.start <= start && end <= edit.end);
  }

  /**
   * @throws AnalysisError ERR_EDIT_OVERLAP
   */
  apply(): string {
    const edits = this.dedupe().sort((a, b) => a.start - b.start || a.order - b.order);
    this.checkOverlaps(edits);

    let output = '';
    let position = 0;
    for (const edit of edits) {
      output += this.code.slice(position, edit.start) + edit.text;
      position = Math.max(position, edit.end);
    }
    return output + this.code.slice(position);
  }

  private push(start: number, end: number, text: string): void {
    if (start < 0 || end < start || end > this.code.length) {
      throw new AnalysisError(
        `Edit range ${start}..${end} is outside the unit`,
        'ERR_ANALYSIS_INTERNAL',
        { phase: 'REWRITE' }
      );
    }
    this.edits.push({ start, end, text, order: this.edits.length });
  }

  private dedupe(): Edit[] {
    const seen = new Set<string>();
    return this.edits.filter(edit => {
      const key = `${edit.start}:${edit.end}:${edit.text}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  private checkOverlaps(edits: Edit[]): void {
    for (let i = 0; i < edits.length; i++) {
      for (let j = i + 1; j < edits.length; j++) {
        const a = edits[i];
        const b = edits[j];
        if (b.start >= a.end && b.start > a.start) break;
        if (overlaps(a, b)) {
          throw new AnalysisError(
            `Overlapping edits at ${a.start}..${a.end} and ${b.start}..${b.end}`,
            'ERR_EDIT_OVERLAP',
            { phase: 'REWRITE' },
            'The unit is left unchanged'
          );
        }
      }
    }
  }
}

function overlaps(a: Edit, b: Edit): boolean {
  const aEmpty = a.start === a.end;
  const bEmpty = b.start === b.end;
  if (aEmpty && bEmpty) return false;
  if (aEmpty) return a.start > b.start && a.start < b.end;
  if (bEmpty) return b.start > a.start && b.start < a.end;
  return a.start < b.end && b.start < a.end;
}
