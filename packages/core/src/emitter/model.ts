/**
 * Lowered Declarations
 *
 * Every class, nested class and anonymous class becomes one module-scoped
 * declaration. Nesting survives only as by-name edges: `enclosing`,
 * `nested` and the scope chain used to resolve type names.
 */

import type {
  AnonymousClassExprNode,
  ClassShape,
  TypeParameterNode,
} from '../ast-nodes.js';

export type DeclOrigin =
  | { readonly type: 'class'; readonly node: ClassShape }
  | { readonly type: 'anonymous'; readonly node: AnonymousClassExprNode };

export interface LoweredDecl {
  /** Module-scoped name, e.g. "A$B" or "A$1" */
  readonly name: string;
  /** Name as declared; null for anonymous classes */
  readonly simpleName: string | null;
  readonly origin: DeclOrigin;
  readonly enclosing: LoweredDecl | null;
  /** Scope at the point of declaration */
  readonly declaringScope: Scope;
  /**
   * Type parameters of enclosing classes and methods that stay in scope
   * once hoisted, outermost first. Declared ahead of the own parameters.
   */
  readonly captured: readonly ScopedTypeParameter[];
  /** Named nested types by simple name */
  readonly nested: Map<string, LoweredDecl>;
  /** Nested and anonymous declarations in source order */
  readonly children: LoweredDecl[];
}

/** Type parameter with the scope its bounds resolve in */
export interface ScopedTypeParameter {
  readonly node: TypeParameterNode;
  readonly scope: Scope;
}

/** Lexical scope for type name lookup */
export interface Scope {
  /** Declaration whose member types are visible here */
  readonly decl: LoweredDecl | null;
  readonly typeParameters: ReadonlySet<string>;
  readonly parent: Scope | null;
}

export const FILE_SCOPE: Scope = {
  decl: null,
  typeParameters: new Set(),
  parent: null,
};

function names(params: readonly TypeParameterNode[]): ReadonlySet<string> {
  return new Set(params.map((p) => p.name));
}

export function ownTypeParameters(decl: LoweredDecl): TypeParameterNode[] {
  return decl.origin.type === 'class' ? decl.origin.node.typeParameters : [];
}

/** Outer parameters followed by inner ones; an inner name shadows an outer one */
export function withTypeParameters(
  outer: readonly ScopedTypeParameter[],
  inner: readonly ScopedTypeParameter[]
): ScopedTypeParameter[] {
  const shadowed = new Set(inner.map((p) => p.node.name));
  return [...outer.filter((p) => !shadowed.has(p.node.name)), ...inner];
}

/** Captured and own type parameters, in declaration order */
export function declaredTypeParameters(decl: LoweredDecl): ScopedTypeParameter[] {
  const scope = headerScope(decl);
  return withTypeParameters(
    decl.captured,
    ownTypeParameters(decl).map((node) => ({ node, scope }))
  );
}

/** Scope inside the declaration's body */
export function bodyScope(decl: LoweredDecl): Scope {
  return {
    decl,
    typeParameters: names(ownTypeParameters(decl)),
    parent: decl.declaringScope,
  };
}

/**
 * Scope of the declaration header: type parameters, extends and
 * implements. The declaration's own member types are not visible.
 */
export function headerScope(decl: LoweredDecl): Scope {
  return {
    decl: null,
    typeParameters: names(ownTypeParameters(decl)),
    parent: decl.declaringScope,
  };
}

/** Scope of a method or constructor with its own type parameters */
export function memberScope(
  parent: Scope,
  typeParameters: readonly TypeParameterNode[]
): Scope {
  if (typeParameters.length === 0) return parent;
  return { decl: null, typeParameters: names(typeParameters), parent };
}
