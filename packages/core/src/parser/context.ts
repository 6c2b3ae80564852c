/**
 * Parse Context
 * Per-scope settings threaded through matchers and the dispatcher
 */

import type { MemberNode } from '../ast-nodes.js';
import type { MemberScope } from '../error-classes.js';
import type { ObservabilityCallbacks } from '../observability.js';
import type { ConstructMatcher } from './matchers/types.js';

export interface ParseContext {
  /** Full text of the file; node text is sliced from it by offset */
  readonly source: string;
  /** Enclosing class name; null at file level and in anonymous class bodies */
  readonly className: string | null;
  readonly scope: MemberScope;
  readonly preserveComments: boolean;
  /** Member matchers in priority order */
  readonly memberMatchers: readonly ConstructMatcher<MemberNode>[];
  readonly observability: ObservabilityCallbacks;
}

/** Context for the interior of a class, interface or anonymous class */
export function enterScope(
  ctx: ParseContext,
  className: string | null,
  scope: MemberScope
): ParseContext {
  return { ...ctx, className, scope };
}
