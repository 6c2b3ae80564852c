/**
 * Declaration Order
 *
 * A class must be declared before a class that extends it. Starting from
 * hoisting order, repeatedly take the first declaration whose local
 * superclass is already placed.
 */

import { EmissionError } from '../error-classes.js';
import type { LoweredDecl } from './model.js';
import type { TypeResolver } from './resolver.js';

function cycleFrom(
  start: LoweredDecl,
  targets: ReadonlyMap<LoweredDecl, LoweredDecl | undefined>
): LoweredDecl[] {
  const path: LoweredDecl[] = [];
  let current: LoweredDecl | undefined = start;
  while (current !== undefined && !path.includes(current)) {
    path.push(current);
    current = targets.get(current);
  }
  return current === undefined ? path : path.slice(path.indexOf(current));
}

/**
 * @throws EmissionError (BREW-E002) on cyclic inheritance
 */
export function orderDeclarations(
  hoisted: readonly LoweredDecl[],
  resolver: TypeResolver
): LoweredDecl[] {
  const targets = new Map<LoweredDecl, LoweredDecl | undefined>(
    hoisted.map((decl) => [decl, resolver.extendsTarget(decl)])
  );
  const placed = new Set<LoweredDecl>();
  const remaining = [...hoisted];
  const ordered: LoweredDecl[] = [];

  while (remaining.length > 0) {
    const index = remaining.findIndex((decl) => {
      const target = targets.get(decl);
      return target === undefined || placed.has(target);
    });

    const next = remaining[index];
    if (next === undefined) {
      const blocked = remaining[0];
      const cycle = blocked === undefined ? [] : cycleFrom(blocked, targets);
      const anchor = cycle[0]?.origin.node;
      throw new EmissionError(
        'BREW-E002',
        { names: cycle.map((decl) => decl.name).join(', ') },
        anchor?.span.start,
        cycle[0]?.name
      );
    }

    remaining.splice(index, 1);
    placed.add(next);
    ordered.push(next);
  }

  return ordered;
}
