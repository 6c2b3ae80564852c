/**
 * Emitter
 * Lowers a parsed file to module-scoped declarations and renders them as
 * TypeScript
 */

import type { FileNode } from '../ast-nodes.js';
import { hoistOrder, lowerFile } from './lower.js';
import type { LoweredDecl } from './model.js';
import { resolveEmitOptions, type EmitOptions } from './options.js';
import { orderDeclarations } from './order.js';
import { renderDeclaration, renderNestedAliases, type RenderContext } from './render.js';
import { TypeResolver } from './resolver.js';

/**
 * Place each nested-alias namespace after the later of its class and the
 * nested declarations it names, so every alias target already exists.
 */
function aliasAnchors(ordered: readonly LoweredDecl[]): Map<number, LoweredDecl[]> {
  const position = new Map(ordered.map((decl, i) => [decl, i]));
  const anchors = new Map<number, LoweredDecl[]>();

  for (const decl of ordered) {
    if (decl.nested.size === 0) continue;
    let anchor = position.get(decl) ?? 0;
    for (const nested of decl.nested.values()) {
      anchor = Math.max(anchor, position.get(nested) ?? 0);
    }
    const list = anchors.get(anchor) ?? [];
    list.push(decl);
    anchors.set(anchor, list);
  }
  return anchors;
}

function renderHeader(header: string): string {
  return header
    .split('\n')
    .map((line) => (line === '' ? '//' : `// ${line}`))
    .join('\n');
}

/**
 * Render a parsed file as TypeScript.
 *
 * @throws EmissionError on an unresolved type (BREW-E001) or cyclic
 * inheritance (BREW-E002)
 */
export function emit(file: FileNode, options: EmitOptions = {}): string {
  const resolved = resolveEmitOptions(options);
  const lowered = lowerFile(file, resolved);
  const resolver = new TypeResolver(file, lowered, resolved);
  const ordered = orderDeclarations(hoistOrder(lowered.roots), resolver);
  const rc: RenderContext = { options: resolved, resolver, lowered };

  const anchors = resolved.nestedAliases ? aliasAnchors(ordered) : new Map<number, LoweredDecl[]>();
  const parts: string[] = [];
  if (resolved.header !== null) parts.push(renderHeader(resolved.header));

  ordered.forEach((decl, i) => {
    parts.push(renderDeclaration(decl, rc));
    for (const owner of anchors.get(i) ?? []) {
      const aliases = renderNestedAliases(owner, rc);
      if (aliases !== null) parts.push(aliases);
    }
  });

  return parts.length === 0 ? '' : `${parts.join('\n\n')}\n`;
}

export type { EmitOptions, ResolvedEmitOptions } from './options.js';
export { resolveEmitOptions } from './options.js';
export { reindentBlock } from './reindent.js';
