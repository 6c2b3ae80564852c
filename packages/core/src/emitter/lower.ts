/**
 * Lowering
 * Flattens nested and anonymous classes into named module-scoped
 * declarations.
 */

import type {
  AnonymousClassExprNode,
  ClassShape,
  FileNode,
  MemberNode,
  OpaqueBodyNode,
  TypeParameterNode,
  VariableDeclaratorNode,
} from '../ast-nodes.js';
import type { LoweredDecl, Scope, ScopedTypeParameter } from './model.js';
import {
  FILE_SCOPE,
  bodyScope,
  declaredTypeParameters,
  memberScope,
  withTypeParameters,
} from './model.js';
import type { ResolvedEmitOptions } from './options.js';

export interface LoweredFile {
  /** Top-level declarations in file order */
  readonly roots: LoweredDecl[];
  readonly topLevel: ReadonlyMap<string, LoweredDecl>;
  /** Lowered declaration of every anonymous class expression */
  readonly anonymous: ReadonlyMap<AnonymousClassExprNode, LoweredDecl>;
}

interface LoweringState {
  readonly options: ResolvedEmitOptions;
  readonly anonymous: Map<AnonymousClassExprNode, LoweredDecl>;
}

function createDecl(
  name: string,
  origin: LoweredDecl['origin'],
  enclosing: LoweredDecl | null,
  declaringScope: Scope,
  captured: readonly ScopedTypeParameter[]
): LoweredDecl {
  const own = new Set(
    origin.type === 'class' ? origin.node.typeParameters.map((p) => p.name) : []
  );
  return {
    name,
    simpleName: origin.type === 'class' ? origin.node.name : null,
    origin,
    enclosing,
    declaringScope,
    captured: captured.filter((p) => !own.has(p.node.name)),
    nested: new Map(),
    children: [],
  };
}

/**
 * Walk the members of one declaration, creating child declarations for
 * nested classes and for every anonymous class whose immediately enclosing
 * class is this one.
 */
function lowerMembers(
  decl: LoweredDecl,
  members: readonly MemberNode[],
  state: LoweringState
): void {
  const sep = state.options.nameSeparator;
  const scope = bodyScope(decl);
  const isInterface = decl.origin.type === 'class' && decl.origin.node.kind === 'interface';
  const instance = declaredTypeParameters(decl);
  let anonymousCount = 0;

  // Static contexts see no class type parameters, only those of the method
  const capturedAt = (
    isStatic: boolean,
    at: Scope,
    methodParams: readonly TypeParameterNode[] = []
  ): ScopedTypeParameter[] =>
    withTypeParameters(
      isStatic ? [] : instance,
      methodParams.map((node) => ({ node, scope: at }))
    );

  const hoist = (child: LoweredDecl, kind: 'nested' | 'anonymous'): void => {
    decl.children.push(child);
    state.options.observability.onTypeHoisted?.({
      name: child.name,
      kind,
      enclosing: decl.name,
    });
  };

  const visitAnonymous = (
    node: AnonymousClassExprNode,
    at: Scope,
    captured: ScopedTypeParameter[]
  ): void => {
    anonymousCount++;
    const child = createDecl(
      `${decl.name}${sep}${anonymousCount}`,
      { type: 'anonymous', node },
      decl,
      at,
      captured
    );
    state.anonymous.set(node, child);
    hoist(child, 'anonymous');
    lowerMembers(child, node.members, state);
    // Argument expressions belong to the enclosing class
    visitOpaque(node.arguments, at, captured);
  };

  const visitOpaque = (
    body: OpaqueBodyNode | null,
    at: Scope,
    captured: ScopedTypeParameter[]
  ): void => {
    for (const segment of body?.segments ?? []) {
      if (segment.type === 'AnonymousClassExpr') visitAnonymous(segment, at, captured);
    }
  };

  const visitDeclarator = (declarator: VariableDeclaratorNode, isStatic: boolean): void => {
    const init = declarator.initializer;
    if (init === null) return;
    const captured = capturedAt(isStatic, scope);
    if (init.type === 'AnonymousClassExpr') visitAnonymous(init, scope, captured);
    else visitOpaque(init, scope, captured);
  };

  for (const member of members) {
    switch (member.type) {
      case 'NestedClassDecl': {
        const child = createDecl(
          `${decl.name}${sep}${member.name}`,
          { type: 'class', node: member },
          decl,
          scope,
          capturedAt(
            isInterface || member.kind === 'interface' || member.modifiers.includes('static'),
            scope
          )
        );
        decl.nested.set(member.name, child);
        hoist(child, 'nested');
        lowerMembers(child, member.members, state);
        break;
      }
      case 'FieldDecl': {
        const isStatic = isInterface || member.modifiers.includes('static');
        member.declarators.forEach((d) => visitDeclarator(d, isStatic));
        break;
      }
      case 'MethodDecl': {
        const at = memberScope(scope, member.typeParameters);
        const isStatic = member.modifiers.includes('static');
        visitOpaque(member.body, at, capturedAt(isStatic, at, member.typeParameters));
        break;
      }
      case 'ConstructorDecl': {
        const at = memberScope(scope, member.typeParameters);
        visitOpaque(member.body, at, capturedAt(false, at, member.typeParameters));
        break;
      }
      case 'StaticInitializer':
        visitOpaque(member.body, scope, capturedAt(true, scope));
        break;
      case 'InstanceInitializer':
        visitOpaque(member.body, scope, capturedAt(false, scope));
        break;
    }
  }
}

function lowerTopLevel(node: ClassShape, state: LoweringState): LoweredDecl {
  const decl = createDecl(node.name, { type: 'class', node }, null, FILE_SCOPE, []);
  lowerMembers(decl, node.members, state);
  return decl;
}

export function lowerFile(file: FileNode, options: ResolvedEmitOptions): LoweredFile {
  const state: LoweringState = { options, anonymous: new Map() };
  const roots = file.types.map((type) => lowerTopLevel(type, state));
  return {
    roots,
    topLevel: new Map(roots.map((decl) => [decl.name, decl])),
    anonymous: state.anonymous,
  };
}

/** Each declaration preceded by its nested and anonymous declarations */
export function hoistOrder(roots: readonly LoweredDecl[]): LoweredDecl[] {
  const out: LoweredDecl[] = [];
  const visit = (decl: LoweredDecl): void => {
    decl.children.forEach(visit);
    out.push(decl);
  };
  roots.forEach(visit);
  return out;
}
