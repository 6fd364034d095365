/**
 * SourceUnit - one parsed compilation unit
 *
 * The AST is produced once and never mutated: every later stage reads it,
 * and the rewriter works on the original text through offset-based edits.
 */
import { parse, type ParserPlugin } from '@babel/parser';
import type { File } from '@babel/types';
import { LanguageError } from '../errors/RewrightError.js';

export interface UnitInput {
  /** Path of the unit, relative to the project root */
  file: string;
  code: string;
}

export interface SourceUnit {
  readonly file: string;
  readonly code: string;
  readonly ast: File;
}

const BASE_PLUGINS: ParserPlugin[] = [
  'typescript',
  'decorators-legacy',
  'classProperties',
  'classPrivateProperties',
  'classPrivateMethods',
  'dynamicImport',
  'nullishCoalescingOperator',
  'optionalChaining',
  'optionalCatchBinding',
  'topLevelAwait',
  'importMeta',
];

function pluginsFor(file: string): ParserPlugin[] {
  return file.endsWith('.tsx') ? [...BASE_PLUGINS, 'jsx'] : BASE_PLUGINS;
}

function errorLine(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'loc' in err) {
    const loc = err.loc;
    if (typeof loc === 'object' && loc !== null && 'line' in loc && typeof loc.line === 'number') {
      return loc.line;
    }
  }
  return undefined;
}

/**
 * Parse a unit. Units with syntax errors are never rewritten, so recovered
 * errors are reported the same way as fatal ones.
 *
 * @throws LanguageError ERR_PARSE_FAILURE
 */
export function parseUnit({ file, code }: UnitInput): SourceUnit {
  let ast: ReturnType<typeof parse>;
  try {
    ast = parse(code, {
      sourceType: 'module',
      plugins: pluginsFor(file),
      sourceFilename: file,
      errorRecovery: true,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LanguageError(
      `Failed to parse ${file}: ${message}`,
      'ERR_PARSE_FAILURE',
      { filePath: file, lineNumber: errorLine(err) },
      'Fix the syntax error; the unit is left unchanged'
    );
  }

  if (ast.errors.length > 0) {
    const [first] = ast.errors;
    throw new LanguageError(
      `Failed to parse ${file}: ${first.reasonCode}`,
      'ERR_PARSE_FAILURE',
      { filePath: file, lineNumber: errorLine(first) },
      'Fix the syntax error; the unit is left unchanged'
    );
  }

  return { file, code, ast };
}
