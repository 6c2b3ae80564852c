/**
 * Declaration parsing tests
 * Fields, methods, constructors, type declarations and malformed lists
 */

import { describe, expect, it } from 'vitest';
import {
  ParseError,
  parse,
  type ClassDeclNode,
  type MemberNode,
} from 'brewport';

function firstClass(source: string): ClassDeclNode {
  const type = parse(source).types[0];
  if (type === undefined) throw new Error('no type declaration');
  return type;
}

function onlyMember(source: string): MemberNode {
  const member = firstClass(source).members[0];
  if (member === undefined) throw new Error('no member');
  return member;
}

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('file structure', () => {
  it('reads package and imports', () => {
    const file = parse(
      'package a.b;\nimport java.util.List;\nimport static x.Y.z;\nimport java.io.*;\nclass A {}'
    );
    expect(file.package?.name).toBe('a.b');
    expect(file.imports.map(({ name, isStatic, isWildcard }) => ({ name, isStatic, isWildcard }))).toEqual([
      { name: 'java.util.List', isStatic: false, isWildcard: false },
      { name: 'x.Y.z', isStatic: true, isWildcard: false },
      { name: 'java.io', isStatic: false, isWildcard: true },
    ]);
    expect(file.types.map((t) => t.name)).toEqual(['A']);
  });

  it('keeps the first package declaration', () => {
    expect(parse('package a; package b; class A {}').package?.name).toBe('a');
  });

  it('parses an empty file', () => {
    expect(parse('')).toEqual({
      type: 'File',
      package: null,
      imports: [],
      types: [],
      span: {
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 1, offset: 0 },
      },
    });
  });
});

describe('type declarations', () => {
  it('reads modifiers, type parameters, superclass and interfaces', () => {
    const a = firstClass('public abstract class Box<T extends Comparable<T> & Cloneable> extends Base<T> implements Iterable<T>, Sized {}');
    expect(a.modifiers).toEqual(['public', 'abstract']);
    expect(a.kind).toBe('class');
    expect(a.typeParameters).toMatchObject([
      {
        name: 'T',
        bounds: [
          { name: 'Comparable', typeArguments: [{ name: 'T' }] },
          { name: 'Cloneable', typeArguments: [] },
        ],
      },
    ]);
    expect(a.superclass).toMatchObject({ name: 'Base', typeArguments: [{ name: 'T' }] });
    expect(a.interfaces.map((i) => i.name)).toEqual(['Iterable', 'Sized']);
  });

  it('stores the extends list of an interface as interfaces', () => {
    const i = firstClass('interface I extends X, Y {}');
    expect(i.kind).toBe('interface');
    expect(i.superclass).toBeNull();
    expect(i.interfaces.map((t) => t.name)).toEqual(['X', 'Y']);
  });

  it('reads annotations with raw arguments', () => {
    const a = firstClass('@SuppressWarnings("unchecked") @Deprecated final class A {}');
    expect(a.annotations.map(({ name, arguments: args }) => ({ name, args }))).toEqual([
      { name: 'SuppressWarnings', args: '"unchecked"' },
      { name: 'Deprecated', args: null },
    ]);
    expect(a.modifiers).toEqual(['final']);
  });

  it('rejects a class with two superclasses', () => {
    const error = parseError('class A extends B, C {}');
    expect(error.errorId).toBe('BREW-P002');
    expect(error.offending).toBe(',');
    expect(error.message).toBe(
      "Malformed class declaration: expected 'implements' or '{', found ',' at 1:18"
    );
  });

  it('rejects an empty type parameter list', () => {
    const error = parseError('class A<> {}');
    expect(error.location).toEqual({ line: 1, column: 9, offset: 8 });
    expect(error.message).toBe(
      "Malformed type parameter list: expected type parameter name, found '>' at 1:9"
    );
  });

  it('keeps the doc comment when comments are preserved', () => {
    const source = '/** The A. */\nclass A {\n  /** Count. */\n  int n;\n}';
    const a = parse(source, { preserveComments: true }).types[0];
    expect(a?.docComment).toBe('/** The A. */');
    expect(a?.members[0]).toMatchObject({ docComment: '/** Count. */' });
    expect(parse(source).types[0]?.docComment).toBeNull();
  });
});

describe('fields', () => {
  it('reads declarators with dimensions and initializers', () => {
    const field = onlyMember('class A { private static final int a, b[] = {1}; }');
    expect(field).toMatchObject({
      type: 'FieldDecl',
      modifiers: ['private', 'static', 'final'],
      fieldType: { name: 'int', dimensions: 0 },
      declarators: [
        { name: 'a', dimensions: 0, initializer: null },
        {
          name: 'b',
          dimensions: 1,
          initializer: { type: 'OpaqueBody', segments: [{ type: 'TextSegment', text: '{1}' }] },
        },
      ],
    });
  });

  it('keeps the initializer text exactly', () => {
    const field = onlyMember('class A { String s = "a" +  "b"; }');
    expect(field).toMatchObject({
      declarators: [{ initializer: { segments: [{ text: '"a" +  "b"' }] } }],
    });
  });

  it('reads generic and qualified types', () => {
    const field = onlyMember('class A { Map.Entry<String, List<int[]>>[] e; }');
    expect(field).toMatchObject({
      fieldType: {
        name: 'Map.Entry',
        dimensions: 1,
        typeArguments: [
          { type: 'TypeRef', name: 'String' },
          {
            type: 'TypeRef',
            name: 'List',
            typeArguments: [{ name: 'int', dimensions: 1 }],
          },
        ],
      },
    });
  });

  it('reads wildcards', () => {
    const field = onlyMember('class A { Map<?, ? super Number> m; }');
    expect(field).toMatchObject({
      fieldType: {
        typeArguments: [
          { type: 'Wildcard', bound: null },
          { type: 'Wildcard', bound: { kind: 'super', type: { name: 'Number' } } },
        ],
      },
    });
  });
});

describe('methods', () => {
  it('reads a full method signature', () => {
    const method = onlyMember(
      'class A { public <T extends Comparable<T>> List<T> sort(List<T> in, int... more) throws IOException, X { return in; } }'
    );
    expect(method).toMatchObject({
      type: 'MethodDecl',
      name: 'sort',
      modifiers: ['public'],
      typeParameters: [{ name: 'T', bounds: [{ name: 'Comparable' }] }],
      returnType: { name: 'List', typeArguments: [{ name: 'T' }] },
      parameters: [
        { name: 'in', paramType: { name: 'List' }, isVarArgs: false },
        { name: 'more', paramType: { name: 'int' }, isVarArgs: true },
      ],
      throws: [{ name: 'IOException' }, { name: 'X' }],
      body: { segments: [{ type: 'TextSegment', text: ' return in; ' }] },
    });
  });

  it('reads an abstract method without body', () => {
    const method = onlyMember('abstract class A { protected abstract void draw(); }');
    expect(method).toMatchObject({ name: 'draw', returnType: null, body: null });
  });

  it('adds dimensions written after the parameter list to the return type', () => {
    const method = onlyMember('class A { int legacy()[] { return null; } }');
    expect(method).toMatchObject({ returnType: { name: 'int', dimensions: 1 } });
  });

  it('reads final and annotated parameters with trailing dimensions', () => {
    const method = onlyMember('class A { void m(final @NonNull String s[], A this) {} }');
    expect(method).toMatchObject({
      parameters: [
        {
          name: 's',
          modifiers: ['final'],
          annotations: [{ name: 'NonNull' }],
          paramType: { name: 'String', dimensions: 1 },
        },
      ],
    });
  });

  it('reports a parameter without a name at the closing parenthesis', () => {
    const error = parseError('class A { void m(int) {} }');
    expect(error.location).toEqual({ line: 1, column: 21, offset: 20 });
    expect(error.offending).toBe(')');
    expect(error.message).toBe(
      "Malformed parameter list: expected parameter name, found ')' at 1:21"
    );
  });

  it('reports a missing comma between parameters', () => {
    const error = parseError('class A { void m(int a int b) {} }');
    expect(error.message).toBe(
      "Malformed parameter list: expected ',' or ')', found 'int' at 1:24"
    );
  });

  it('reports a trailing comma', () => {
    const error = parseError('class A { void m(int a,) {} }');
    expect(error.message).toBe(
      "Malformed parameter list: expected parameter, found ')' at 1:24"
    );
  });
});

describe('constructors and initializers', () => {
  it('reads a constructor named after its class', () => {
    const ctor = onlyMember('class A { public A(int x) throws E { this.x = x; } }');
    expect(ctor).toMatchObject({
      type: 'ConstructorDecl',
      name: 'A',
      modifiers: ['public'],
      parameters: [{ name: 'x' }],
      throws: [{ name: 'E' }],
      body: { segments: [{ text: ' this.x = x; ' }] },
    });
  });

  it('reads static and instance initializers', () => {
    const a = firstClass('class A { static { init(); } { setup(); } }');
    expect(a.members).toMatchObject([
      { type: 'StaticInitializer', body: { segments: [{ text: ' init(); ' }] } },
      { type: 'InstanceInitializer', body: { segments: [{ text: ' setup(); ' }] } },
    ]);
  });

  it('leaves an empty body without segments', () => {
    expect(onlyMember('class A { {} }')).toMatchObject({ body: { segments: [] } });
  });
});
