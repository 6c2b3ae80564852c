/**
 * Observability Types
 *
 * Callbacks a host passes to follow the pipeline. The core never writes
 * to the console; these are its only output besides the result.
 */

import type { SourceLocation } from './source-location.js';

export type PipelineStage = 'tokenize' | 'group' | 'parse' | 'emit';

/** Observability callbacks for monitoring transpilation */
export interface ObservabilityCallbacks {
  /** Called after each pipeline stage finishes */
  onStageComplete?: ((event: StageCompleteEvent) => void) | undefined;
  /** Called after the dispatcher accepts a member or file-level declaration */
  onMemberMatched?: ((event: MemberMatchedEvent) => void) | undefined;
  /** Called when a nested or anonymous type is lowered to module scope */
  onTypeHoisted?: ((event: TypeHoistedEvent) => void) | undefined;
}

/** Event emitted after a stage completes */
export interface StageCompleteEvent {
  stage: PipelineStage;
  /** Elapsed time in milliseconds */
  durationMs: number;
}

/** Event emitted for every accepted construct */
export interface MemberMatchedEvent {
  /** Matcher name, e.g. "field" */
  matcher: string;
  /** Enclosing class; null at file level and inside anonymous classes */
  className: string | null;
  location: SourceLocation;
}

/** Event emitted for every hoisted declaration */
export interface TypeHoistedEvent {
  /** Lowered name, e.g. "A$B" or "A$1" */
  name: string;
  kind: 'nested' | 'anonymous';
  /** Lowered name of the enclosing declaration */
  enclosing: string;
}
