/**
 * Types shared by the scope writers.
 */

import type { RewrightConfig } from '@rewright/types';
import type { UnitFacts } from '../analysis/facts/types.js';
import type { ImportPlan } from './ImportPlan.js';
import type { SourceEditor } from './SourceEditor.js';

export interface RewriteContext {
  readonly config: RewrightConfig;
  readonly facts: UnitFacts;
  readonly editor: SourceEditor;
  readonly imports: ImportPlan;
}
