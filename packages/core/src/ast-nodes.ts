import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// FILE STRUCTURE
// ============================================================

export interface FileNode extends BaseNode {
  readonly type: 'File';
  readonly package: PackageDeclNode | null;
  readonly imports: ImportDeclNode[];
  readonly types: ClassDeclNode[];
}

/** package a.b.c; */
export interface PackageDeclNode extends BaseNode {
  readonly type: 'PackageDecl';
  readonly name: string;
}

/**
 * Import declaration.
 * - import a.b.C;          name "a.b.C"
 * - import a.b.*;          name "a.b", isWildcard
 * - import static a.b.C.m; name "a.b.C.m", isStatic
 */
export interface ImportDeclNode extends BaseNode {
  readonly type: 'ImportDecl';
  readonly name: string;
  readonly isStatic: boolean;
  readonly isWildcard: boolean;
}

// ============================================================
// TYPE DECLARATIONS
// ============================================================

export type ClassKind = 'class' | 'interface';

/** Fields shared by top-level and nested type declarations */
export interface ClassShape extends BaseNode {
  readonly name: string;
  readonly kind: ClassKind;
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
  readonly typeParameters: TypeParameterNode[];
  /** `extends` clause of a class; null for interfaces */
  readonly superclass: TypeRefNode | null;
  /** `implements` of a class, or `extends` of an interface */
  readonly interfaces: TypeRefNode[];
  readonly members: MemberNode[];
  readonly docComment: string | null;
}

export interface ClassDeclNode extends ClassShape {
  readonly type: 'ClassDecl';
}

export interface NestedClassDeclNode extends ClassShape {
  readonly type: 'NestedClassDecl';
}

export type TypeDeclNode = ClassDeclNode | NestedClassDeclNode;

// ============================================================
// MEMBERS
// ============================================================

export type MemberNode =
  | FieldDeclNode
  | MethodDeclNode
  | ConstructorDeclNode
  | NestedClassDeclNode
  | StaticInitializerNode
  | InstanceInitializerNode;

/** int a, b[] = {1}; one node per declaration statement */
export interface FieldDeclNode extends BaseNode {
  readonly type: 'FieldDecl';
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
  readonly fieldType: TypeRefNode;
  readonly declarators: VariableDeclaratorNode[];
  readonly docComment: string | null;
}

/**
 * One name of a field declaration.
 * When the whole initializer is a single anonymous class expression the
 * initializer is that node; any other initializer is an opaque body.
 */
export interface VariableDeclaratorNode extends BaseNode {
  readonly type: 'VariableDeclarator';
  readonly name: string;
  /** Extra array dimensions written after the name */
  readonly dimensions: number;
  readonly initializer: AnonymousClassExprNode | OpaqueBodyNode | null;
}

export interface MethodDeclNode extends BaseNode {
  readonly type: 'MethodDecl';
  readonly name: string;
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
  readonly typeParameters: TypeParameterNode[];
  /** null for void */
  readonly returnType: TypeRefNode | null;
  readonly parameters: ParameterNode[];
  readonly throws: TypeRefNode[];
  /** null for abstract and interface methods declared with `;` */
  readonly body: OpaqueBodyNode | null;
  readonly docComment: string | null;
}

export interface ConstructorDeclNode extends BaseNode {
  readonly type: 'ConstructorDecl';
  readonly name: string;
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
  readonly typeParameters: TypeParameterNode[];
  readonly parameters: ParameterNode[];
  readonly throws: TypeRefNode[];
  readonly body: OpaqueBodyNode;
  readonly docComment: string | null;
}

/** static { ... } */
export interface StaticInitializerNode extends BaseNode {
  readonly type: 'StaticInitializer';
  readonly body: OpaqueBodyNode;
}

/** { ... } at member level */
export interface InstanceInitializerNode extends BaseNode {
  readonly type: 'InstanceInitializer';
  readonly body: OpaqueBodyNode;
}

export interface ParameterNode extends BaseNode {
  readonly type: 'Parameter';
  readonly name: string;
  readonly paramType: TypeRefNode;
  readonly modifiers: string[];
  readonly annotations: AnnotationNode[];
  /** Type... name */
  readonly isVarArgs: boolean;
}

// ============================================================
// OPAQUE SPANS
// ============================================================

/**
 * Source text that is carried through unparsed, except that anonymous
 * class expressions inside it are lifted out as nodes.
 * For bodies the span includes the surrounding braces; segments cover the
 * interior only.
 */
export interface OpaqueBodyNode extends BaseNode {
  readonly type: 'OpaqueBody';
  readonly segments: OpaqueSegment[];
}

export type OpaqueSegment = TextSegmentNode | AnonymousClassExprNode;

export interface TextSegmentNode extends BaseNode {
  readonly type: 'TextSegment';
  /** Exact source slice */
  readonly text: string;
}

/**
 * new Base(args) { members }
 * The base type is kept by name and resolved at emission.
 */
export interface AnonymousClassExprNode extends BaseNode {
  readonly type: 'AnonymousClassExpr';
  readonly baseType: TypeRefNode;
  /** Interior of the argument parentheses */
  readonly arguments: OpaqueBodyNode;
  readonly members: MemberNode[];
}

// ============================================================
// TYPES
// ============================================================

/**
 * Type reference as written.
 * name is the qualified name (`Map.Entry`, `int`); type arguments apply to
 * the last segment.
 */
export interface TypeRefNode extends BaseNode {
  readonly type: 'TypeRef';
  readonly name: string;
  readonly typeArguments: TypeArgumentNode[];
  readonly dimensions: number;
}

export type TypeArgumentNode = TypeRefNode | WildcardNode;

/** ? / ? extends T / ? super T */
export interface WildcardNode extends BaseNode {
  readonly type: 'Wildcard';
  readonly bound: { readonly kind: 'extends' | 'super'; readonly type: TypeRefNode } | null;
}

/** T extends A & B */
export interface TypeParameterNode extends BaseNode {
  readonly type: 'TypeParameter';
  readonly name: string;
  readonly bounds: TypeRefNode[];
}

/** @Name or @Name(args); arguments kept as raw text */
export interface AnnotationNode extends BaseNode {
  readonly type: 'Annotation';
  readonly name: string;
  readonly arguments: string | null;
}

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode =
  | FileNode
  | PackageDeclNode
  | ImportDeclNode
  | ClassDeclNode
  | NestedClassDeclNode
  | FieldDeclNode
  | VariableDeclaratorNode
  | MethodDeclNode
  | ConstructorDeclNode
  | StaticInitializerNode
  | InstanceInitializerNode
  | ParameterNode
  | OpaqueBodyNode
  | TextSegmentNode
  | AnonymousClassExprNode
  | TypeRefNode
  | WildcardNode
  | TypeParameterNode
  | AnnotationNode;

export type NodeType = ASTNode['type'];
