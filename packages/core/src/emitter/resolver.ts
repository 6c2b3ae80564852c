/**
 * Type Resolution
 *
 * Resolves type names at emission, in order: type parameters in scope,
 * member types along the enclosing class chain (inherited ones included),
 * top-level types of the file, single-type imports, implicit types,
 * configured known types, and with a trusted wildcard import any simple
 * name. A qualified name resolves its first segment; an unresolved
 * lowercase first segment is a package name.
 */

import type { FileNode, TypeRefNode } from '../ast-nodes.js';
import { EmissionError } from '../error-classes.js';
import type { LoweredFile } from './lower.js';
import type { LoweredDecl, Scope } from './model.js';
import { headerScope } from './model.js';
import { IMPLICIT_TYPES } from './builtins.js';
import type { ResolvedEmitOptions } from './options.js';

export type Resolution =
  | { readonly kind: 'typeParameter'; readonly name: string }
  | { readonly kind: 'local'; readonly decl: LoweredDecl }
  | { readonly kind: 'external'; readonly name: string };

function isLowerCase(text: string): boolean {
  const first = text.charAt(0);
  return first !== '' && first === first.toLowerCase() && first !== first.toUpperCase();
}

export class TypeResolver {
  private readonly lowered: LoweredFile;
  private readonly options: ResolvedEmitOptions;
  /** Simple name -> qualified name of single-type imports */
  private readonly imports: ReadonlyMap<string, string>;
  private readonly trustWildcard: boolean;
  private readonly supertypeCache = new Map<LoweredDecl, readonly LoweredDecl[]>();

  constructor(file: FileNode, lowered: LoweredFile, options: ResolvedEmitOptions) {
    this.lowered = lowered;
    this.options = options;

    const imports = new Map<string, string>();
    for (const decl of file.imports) {
      if (decl.isWildcard || decl.isStatic) continue;
      const simple = decl.name.slice(decl.name.lastIndexOf('.') + 1);
      imports.set(simple, decl.name);
    }
    this.imports = imports;
    this.trustWildcard =
      options.trustWildcardImports &&
      file.imports.some((decl) => decl.isWildcard && !decl.isStatic);
  }

  /**
   * Resolve a type reference written in `scope`.
   * @throws EmissionError (BREW-E001) when the name cannot be resolved
   */
  resolve(ref: TypeRefNode, scope: Scope): Resolution {
    const segments = ref.name.split('.');
    const head = segments[0] ?? ref.name;
    const first = this.lookup(head, scope);

    if (first === undefined) {
      if (segments.length > 1 && isLowerCase(head)) {
        return { kind: 'external', name: ref.name };
      }
      throw this.unresolved(head, ref, scope);
    }
    if (segments.length === 1 || first.kind !== 'local') {
      return segments.length === 1 ? first : { kind: 'external', name: ref.name };
    }

    let decl = first.decl;
    let written = head;
    for (const segment of segments.slice(1)) {
      written += `.${segment}`;
      const member = this.lookupMember(decl, segment, new Set());
      if (member === undefined) throw this.unresolved(written, ref, scope);
      decl = member;
    }
    return { kind: 'local', decl };
  }

  /** Non-throwing lookup of a simple name */
  lookup(name: string, scope: Scope): Resolution | undefined {
    for (let s: Scope | null = scope; s !== null; s = s.parent) {
      if (s.typeParameters.has(name)) return { kind: 'typeParameter', name };
      if (s.decl !== null) {
        const member = this.lookupMember(s.decl, name, new Set());
        if (member !== undefined) return { kind: 'local', decl: member };
      }
    }

    const topLevel = this.lowered.topLevel.get(name);
    if (topLevel !== undefined) return { kind: 'local', decl: topLevel };

    if (
      this.imports.has(name) ||
      IMPLICIT_TYPES.has(name) ||
      this.options.knownTypes.has(name) ||
      this.trustWildcard
    ) {
      return { kind: 'external', name };
    }
    return undefined;
  }

  /** Member type declared in `decl` or inherited from a local supertype */
  private lookupMember(
    decl: LoweredDecl,
    name: string,
    visited: Set<LoweredDecl>
  ): LoweredDecl | undefined {
    if (visited.has(decl)) return undefined;
    visited.add(decl);

    const direct = decl.nested.get(name);
    if (direct !== undefined) return direct;
    for (const supertype of this.supertypesOf(decl)) {
      const inherited = this.lookupMember(supertype, name, visited);
      if (inherited !== undefined) return inherited;
    }
    return undefined;
  }

  /** Local declarations this one extends or implements */
  supertypesOf(decl: LoweredDecl): readonly LoweredDecl[] {
    const cached = this.supertypeCache.get(decl);
    if (cached !== undefined) return cached;
    // Guard against re-entry while resolving a cyclic hierarchy
    this.supertypeCache.set(decl, []);

    const refs =
      decl.origin.type === 'class'
        ? [
            ...(decl.origin.node.superclass ? [decl.origin.node.superclass] : []),
            ...decl.origin.node.interfaces,
          ]
        : [decl.origin.node.baseType];
    const scope = decl.origin.type === 'class' ? headerScope(decl) : decl.declaringScope;

    const supertypes: LoweredDecl[] = [];
    for (const ref of refs) {
      const resolved = this.lookupLocal(ref, scope);
      if (resolved !== undefined) supertypes.push(resolved);
    }
    this.supertypeCache.set(decl, supertypes);
    return supertypes;
  }

  /**
   * Local declaration this one `extends` once lowered, or undefined.
   * Anonymous classes extend their base; classes their superclass.
   */
  extendsTarget(decl: LoweredDecl): LoweredDecl | undefined {
    if (decl.origin.type === 'class') {
      const superclass = decl.origin.node.superclass;
      if (decl.origin.node.kind === 'interface' || superclass === null) {
        return undefined;
      }
      return this.lookupLocal(superclass, headerScope(decl));
    }
    return this.lookupLocal(decl.origin.node.baseType, decl.declaringScope);
  }

  private lookupLocal(ref: TypeRefNode, scope: Scope): LoweredDecl | undefined {
    const segments = ref.name.split('.');
    const first = this.lookup(segments[0] ?? ref.name, scope);
    if (first?.kind !== 'local') return undefined;
    let decl: LoweredDecl | undefined = first.decl;
    for (const segment of segments.slice(1)) {
      if (decl === undefined) return undefined;
      decl = this.lookupMember(decl, segment, new Set());
    }
    return decl;
  }

  /** Names visible from a scope, for suggestions */
  visibleNames(scope: Scope): string[] {
    const names = new Set<string>();
    for (let s: Scope | null = scope; s !== null; s = s.parent) {
      s.typeParameters.forEach((name) => names.add(name));
      for (let d = s.decl; d !== null; d = d.enclosing) {
        d.nested.forEach((_, name) => names.add(name));
      }
    }
    this.lowered.topLevel.forEach((_, name) => names.add(name));
    this.imports.forEach((_, name) => names.add(name));
    this.options.knownTypes.forEach((name) => names.add(name));
    return [...names].sort();
  }

  private unresolved(name: string, ref: TypeRefNode, scope: Scope): EmissionError {
    return new EmissionError(
      'BREW-E001',
      { name, candidates: this.visibleNames(scope) },
      ref.span.start,
      ref.name
    );
  }
}
