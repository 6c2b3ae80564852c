/**
 * Declaration Rendering
 * One template per node variant
 */

import type {
  AnonymousClassExprNode,
  ConstructorDeclNode,
  FieldDeclNode,
  MemberNode,
  MethodDeclNode,
  OpaqueBodyNode,
  ParameterNode,
  VariableDeclaratorNode,
} from '../ast-nodes.js';
import { KNOWN_INTERFACES } from './builtins.js';
import type { LoweredFile } from './lower.js';
import type { LoweredDecl, Scope } from './model.js';
import { bodyScope, declaredTypeParameters, headerScope, memberScope } from './model.js';
import type { ResolvedEmitOptions } from './options.js';
import { reindentBlock, reindentComment } from './reindent.js';
import {
  applyTypeParameters,
  renderScopedTypeParameters,
  renderType,
  renderTypeParameters,
} from './render-types.js';
import type { TypeResolver } from './resolver.js';

export interface RenderContext {
  readonly options: ResolvedEmitOptions;
  readonly resolver: TypeResolver;
  readonly lowered: LoweredFile;
}

/** Per-declaration state while rendering its members */
interface ClassFrame {
  readonly scope: Scope;
  readonly isInterface: boolean;
  readonly isAbstract: boolean;
  readonly hasExtends: boolean;
  /** Local class this one extends, when there is one */
  readonly superclass: LoweredDecl | undefined;
  initializerCount: number;
}

const ACCESS_MODIFIERS = ['public', 'protected', 'private'] as const;

function access(modifiers: readonly string[]): string {
  const found = ACCESS_MODIFIERS.find((m) => modifiers.includes(m));
  return found === undefined ? '' : `${found} `;
}

function hasOverride(member: MethodDeclNode): boolean {
  return member.annotations.some(
    (a) => a.name === 'Override' || a.name === 'java.lang.Override'
  );
}

// ============================================================
// OPAQUE TEXT
// ============================================================

function renderAnonymousInstance(node: AnonymousClassExprNode, rc: RenderContext): string {
  const decl = rc.lowered.anonymous.get(node);
  if (decl === undefined) {
    throw new Error('Anonymous class expression was not lowered');
  }
  const typeArgs = applyTypeParameters(decl.captured);
  return `new ${decl.name}${typeArgs}(${renderInline(node.arguments, rc)})`;
}

/** Segment text with anonymous classes replaced by instantiations */
function renderInline(body: OpaqueBodyNode, rc: RenderContext): string {
  return body.segments
    .map((segment) =>
      segment.type === 'TextSegment'
        ? segment.text
        : renderAnonymousInstance(segment, rc)
    )
    .join('');
}

function renderBody(body: OpaqueBodyNode, rc: RenderContext): string {
  return reindentBlock(renderInline(body, rc), rc.options.indentUnit);
}

function docLines(doc: string | null, rc: RenderContext, target: string): string[] {
  if (doc === null || !rc.options.preserveComments) return [];
  return [reindentComment(doc, target)];
}

// ============================================================
// MEMBERS
// ============================================================

function renderParameter(param: ParameterNode, scope: Scope, rc: RenderContext): string {
  if (param.isVarArgs) {
    return `...${param.name}: ${renderType(param.paramType, scope, rc.resolver, 1)}`;
  }
  return `${param.name}: ${renderType(param.paramType, scope, rc.resolver)}`;
}

function renderParameters(params: readonly ParameterNode[], scope: Scope, rc: RenderContext): string {
  return params.map((p) => renderParameter(p, scope, rc)).join(', ');
}

function renderInitializer(
  init: VariableDeclaratorNode['initializer'],
  rc: RenderContext
): string {
  if (init === null) return '';
  if (init.type === 'AnonymousClassExpr') {
    return ` = ${renderAnonymousInstance(init, rc)}`;
  }
  return ` = ${renderInline(init, rc)}`;
}

function renderField(member: FieldDeclNode, frame: ClassFrame, rc: RenderContext): string {
  const ind = rc.options.indentUnit;
  const prefix = frame.isInterface
    ? 'static readonly '
    : access(member.modifiers) +
      (member.modifiers.includes('static') ? 'static ' : '') +
      (member.modifiers.includes('final') ? 'readonly ' : '');

  const lines = docLines(member.docComment, rc, ind);
  for (const declarator of member.declarators) {
    const type = renderType(member.fieldType, frame.scope, rc.resolver, declarator.dimensions);
    lines.push(
      `${ind}${prefix}${declarator.name}: ${type}${renderInitializer(declarator.initializer, rc)};`
    );
  }
  return lines.join('\n');
}

function renderMethod(member: MethodDeclNode, frame: ClassFrame, rc: RenderContext): string {
  const ind = rc.options.indentUnit;
  const scope = memberScope(frame.scope, member.typeParameters);
  const isAbstract =
    member.body === null &&
    (frame.isInterface || (frame.isAbstract && member.modifiers.includes('abstract')));
  const isOverride =
    frame.hasExtends &&
    hasOverride(member) &&
    (frame.superclass === undefined || superclassDeclares(frame.superclass, member.name, rc));

  const modifiers =
    (frame.isInterface ? '' : access(member.modifiers)) +
    (member.modifiers.includes('static') ? 'static ' : '') +
    (isAbstract ? 'abstract ' : '') +
    (isOverride ? 'override ' : '');

  const typeParams = renderTypeParameters(member.typeParameters, scope, rc.resolver);
  const params = renderParameters(member.parameters, scope, rc);
  const returnType =
    member.returnType === null ? 'void' : renderType(member.returnType, scope, rc.resolver);
  let tail = ';';
  if (member.body !== null) tail = ` ${renderBody(member.body, rc)}`;
  else if (!isAbstract) tail = ` { throw new Error('Native method: ${member.name}'); }`;

  return [
    ...docLines(member.docComment, rc, ind),
    `${ind}${modifiers}${member.name}${typeParams}(${params}): ${returnType}${tail}`,
  ].join('\n');
}

function renderConstructor(
  member: ConstructorDeclNode,
  frame: ClassFrame,
  rc: RenderContext
): string {
  const ind = rc.options.indentUnit;
  const scope = memberScope(frame.scope, member.typeParameters);
  const params = renderParameters(member.parameters, scope, rc);
  return [
    ...docLines(member.docComment, rc, ind),
    `${ind}${access(member.modifiers)}constructor(${params}) ${renderBody(member.body, rc)}`,
  ].join('\n');
}

/** Rendered member, or null for members hoisted out of the class */
function renderMember(member: MemberNode, frame: ClassFrame, rc: RenderContext): string | null {
  const ind = rc.options.indentUnit;
  switch (member.type) {
    case 'FieldDecl':
      return renderField(member, frame, rc);
    case 'MethodDecl':
      return renderMethod(member, frame, rc);
    case 'ConstructorDecl':
      return renderConstructor(member, frame, rc);
    case 'NestedClassDecl':
      return null;
    case 'StaticInitializer':
      return `${ind}static ${renderBody(member.body, rc)}`;
    case 'InstanceInitializer':
      frame.initializerCount++;
      return `${ind}private readonly $init${frame.initializerCount} = (() => ${renderBody(member.body, rc)})();`;
    default: {
      // Exhaustive check: if we reach here, a member type is missing
      const _exhaustive: never = member;
      throw new Error(`Unhandled member type: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

interface Heritage {
  readonly extendsClause: string | null;
  readonly implementsClause: string[];
}

function classHeritage(decl: LoweredDecl, rc: RenderContext): Heritage {
  const origin = decl.origin;
  if (origin.type === 'anonymous') {
    const base = origin.node.baseType;
    const scope = decl.declaringScope;
    const rendered = renderType(base, scope, rc.resolver);
    const simple = base.name.slice(base.name.lastIndexOf('.') + 1);
    const isLocal = rc.resolver.lookup(base.name.split('.')[0] ?? base.name, scope)?.kind === 'local';
    const isInterface =
      !isLocal &&
      (KNOWN_INTERFACES.has(simple) || rc.options.knownInterfaces.has(simple));

    if (rendered === 'unknown') return { extendsClause: null, implementsClause: [] };
    return isInterface
      ? { extendsClause: null, implementsClause: [rendered] }
      : { extendsClause: rendered, implementsClause: [] };
  }

  const scope = headerScope(decl);
  const node = origin.node;
  const superclass = node.superclass === null ? null : renderType(node.superclass, scope, rc.resolver);
  return {
    extendsClause: superclass === 'unknown' ? null : superclass,
    implementsClause: node.interfaces.map((i) => renderType(i, scope, rc.resolver)),
  };
}

/**
 * Whether a method of this name exists on the local superclass chain.
 * A chain that leaves the file may declare anything.
 */
function superclassDeclares(base: LoweredDecl, name: string, rc: RenderContext): boolean {
  const seen = new Set<LoweredDecl>();
  for (let d: LoweredDecl | undefined = base; d !== undefined; d = rc.resolver.extendsTarget(d)) {
    if (seen.has(d)) return false;
    seen.add(d);
    const declares = d.origin.node.members.some(
      (m) => m.type === 'MethodDecl' && m.name === name
    );
    if (declares) return true;
    const extendsOther = classHeritage(d, rc).extendsClause !== null;
    if (extendsOther && rc.resolver.extendsTarget(d) === undefined) return true;
  }
  return false;
}

export function renderDeclaration(decl: LoweredDecl, rc: RenderContext): string {
  const origin = decl.origin;
  const heritage = classHeritage(decl, rc);

  const isInterface = origin.type === 'class' && origin.node.kind === 'interface';
  const isAbstract =
    origin.type === 'class' && origin.node.modifiers.includes('abstract');
  const keyword = isInterface || isAbstract ? 'export abstract class' : 'export class';

  const typeParams = renderScopedTypeParameters(declaredTypeParameters(decl), rc.resolver);
  const extendsPart = heritage.extendsClause === null ? '' : ` extends ${heritage.extendsClause}`;
  const implementsPart =
    heritage.implementsClause.length === 0 ? '' : ` implements ${heritage.implementsClause.join(', ')}`;

  const frame: ClassFrame = {
    scope: bodyScope(decl),
    isInterface,
    isAbstract,
    hasExtends: heritage.extendsClause !== null,
    superclass: rc.resolver.extendsTarget(decl),
    initializerCount: 0,
  };

  const rendered = origin.node.members
    .map((member) => renderMember(member, frame, rc))
    .filter((text): text is string => text !== null);

  const doc = origin.type === 'class' ? docLines(origin.node.docComment, rc, '') : [];
  const head = `${keyword} ${decl.name}${typeParams}${extendsPart}${implementsPart} {`;
  const body = rendered.length === 0 ? `${head}}` : [head, ...rendered, '}'].join('\n');
  return [...doc, body].join('\n');
}

/**
 * `export namespace A { export type B = A$B; export const B = A$B; }`
 * for the named nested types of a declaration, or null when it has none.
 */
export function renderNestedAliases(decl: LoweredDecl, rc: RenderContext): string | null {
  if (decl.nested.size === 0) return null;
  const ind = rc.options.indentUnit;
  const lines = [`export namespace ${decl.name} {`];

  for (const [simpleName, nested] of decl.nested) {
    const params = declaredTypeParameters(nested);
    const declared = renderScopedTypeParameters(params, rc.resolver);
    const applied = applyTypeParameters(params);
    lines.push(`${ind}export type ${simpleName}${declared} = ${nested.name}${applied};`);
    lines.push(`${ind}export const ${simpleName} = ${nested.name};`);
  }

  lines.push('}');
  return lines.join('\n');
}
