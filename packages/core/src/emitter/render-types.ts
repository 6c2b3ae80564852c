/**
 * Type Rendering
 */

import type {
  TypeArgumentNode,
  TypeParameterNode,
  TypeRefNode,
} from '../ast-nodes.js';
import { PRIMITIVE_TYPES } from '../lexer/keywords.js';
import { IMPLICIT_PACKAGE, TYPE_MAPPING } from './builtins.js';
import type { LoweredDecl, Scope, ScopedTypeParameter } from './model.js';
import { ownTypeParameters } from './model.js';
import type { TypeResolver } from './resolver.js';

function mapped(name: string): string {
  const key = name.startsWith(IMPLICIT_PACKAGE)
    ? name.slice(IMPLICIT_PACKAGE.length)
    : name;
  return TYPE_MAPPING[key] ?? name;
}

interface RenderedName {
  readonly name: string;
  /** Arguments for the captured type parameters of a hoisted declaration */
  readonly captured: readonly string[];
}

/**
 * Captured parameters are passed under their own names where those are
 * still type parameters in scope, and as unknown elsewhere. A raw
 * reference to a generic declaration stays raw.
 */
function capturedArguments(
  decl: LoweredDecl,
  ref: TypeRefNode,
  scope: Scope,
  resolver: TypeResolver
): string[] {
  if (ref.typeArguments.length === 0 && ownTypeParameters(decl).length > 0) return [];
  return decl.captured.map(({ node }) =>
    resolver.lookup(node.name, scope)?.kind === 'typeParameter' ? node.name : 'unknown'
  );
}

/** Base name of a type reference without its written arguments or dimensions */
function renderTypeName(ref: TypeRefNode, scope: Scope, resolver: TypeResolver): RenderedName {
  if (PRIMITIVE_TYPES.has(ref.name)) return { name: mapped(ref.name), captured: [] };

  const resolution = resolver.resolve(ref, scope);
  switch (resolution.kind) {
    case 'typeParameter':
      return { name: resolution.name, captured: [] };
    case 'local':
      return {
        name: resolution.decl.name,
        captured: capturedArguments(resolution.decl, ref, scope, resolver),
      };
    case 'external':
      return { name: mapped(resolution.name), captured: [] };
  }
}

function renderTypeArgument(
  arg: TypeArgumentNode,
  scope: Scope,
  resolver: TypeResolver
): string {
  if (arg.type === 'TypeRef') return renderType(arg, scope, resolver);
  return arg.bound === null ? 'unknown' : renderType(arg.bound.type, scope, resolver);
}

export function renderType(
  ref: TypeRefNode,
  scope: Scope,
  resolver: TypeResolver,
  extraDimensions = 0
): string {
  const { name, captured } = renderTypeName(ref, scope, resolver);
  const typeArguments = [
    ...captured,
    ...ref.typeArguments.map((a) => renderTypeArgument(a, scope, resolver)),
  ];
  const args = typeArguments.length > 0 ? `<${typeArguments.join(', ')}>` : '';
  return name + args + '[]'.repeat(ref.dimensions + extraDimensions);
}

/** `<T extends A & B, U>`, or empty; each bound resolves in its own scope */
export function renderScopedTypeParameters(
  params: readonly ScopedTypeParameter[],
  resolver: TypeResolver
): string {
  if (params.length === 0) return '';
  const rendered = params.map(({ node, scope }) => {
    if (node.bounds.length === 0) return node.name;
    const bounds = node.bounds.map((b) => renderType(b, scope, resolver));
    return `${node.name} extends ${bounds.join(' & ')}`;
  });
  return `<${rendered.join(', ')}>`;
}

export function renderTypeParameters(
  params: readonly TypeParameterNode[],
  scope: Scope,
  resolver: TypeResolver
): string {
  return renderScopedTypeParameters(
    params.map((node) => ({ node, scope })),
    resolver
  );
}

/** `<T, U>` applying declared parameters by name, or empty */
export function applyTypeParameters(params: readonly ScopedTypeParameter[]): string {
  return params.length === 0 ? '' : `<${params.map((p) => p.node.name).join(', ')}>`;
}
