/**
 * Emitter tests
 * Declaration templates, type mapping, resolution, ordering and options
 */

import { describe, expect, it } from 'vitest';
import { EmissionError, transpile, type EmitOptions } from 'brewport';

function emitError(source: string, options: EmitOptions = {}): EmissionError {
  try {
    transpile(source, options);
  } catch (error) {
    if (error instanceof EmissionError) return error;
    throw error;
  }
  throw new Error('expected an EmissionError');
}

describe('emit', () => {
  describe('declarations', () => {
    it('renders an empty class on one line', () => {
      expect(transpile('class A {}')).toBe('export class A {}\n');
    });

    it('renders an empty file as empty output', () => {
      expect(transpile('package a.b;\nimport java.util.List;')).toBe('');
    });

    it('renders interfaces and abstract classes as abstract classes', () => {
      const source = [
        'interface Shape { double area(); default String name() { return "shape"; } }',
        'abstract class Base implements Shape { protected abstract void draw(); }',
        'class Circle extends Base { @Override public double area() { return 1; } protected void draw() {} }',
      ].join('\n');
      expect(transpile(source)).toBe(
        [
          'export abstract class Shape {',
          '  abstract area(): number;',
          '  name(): string { return "shape"; }',
          '}',
          '',
          'export abstract class Base implements Shape {',
          '  protected abstract draw(): void;',
          '}',
          '',
          'export class Circle extends Base {',
          '  public area(): number { return 1; }',
          '  protected draw(): void {}',
          '}',
          '',
        ].join('\n')
      );
    });

    it('renders interface constants as static readonly fields', () => {
      expect(transpile('interface K { int MAX = 10; }')).toBe(
        'export abstract class K {\n  static readonly MAX: number = 10;\n}\n'
      );
    });

    it('maps final to readonly and keeps access and static', () => {
      expect(transpile('class A { private static final String NAME = "a"; }')).toBe(
        'export class A {\n  private static readonly NAME: string = "a";\n}\n'
      );
    });

    it('renders one property per declarator', () => {
      expect(transpile('class A { int a, b[] = {1}; }')).toBe(
        'export class A {\n  a: number;\n  b: number[] = {1};\n}\n'
      );
    });

    it('renders initializers', () => {
      expect(transpile('class A { static { init(); } { setup(); } { more(); } }')).toBe(
        [
          'export class A {',
          '  static { init(); }',
          '  private readonly $init1 = (() => { setup(); })();',
          '  private readonly $init2 = (() => { more(); })();',
          '}',
          '',
        ].join('\n')
      );
    });

    it('renders constructors, varargs and generic methods', () => {
      const source =
        'class Box<T extends Comparable<T>> { private T value; public Box(T value, String... tags) { this.value = value; } public <R> R map(Fn<T, R> fn) { return fn.apply(value); } }';
      expect(transpile(source, { knownTypes: ['Fn'] })).toBe(
        [
          'export class Box<T extends Comparable<T>> {',
          '  private value: T;',
          '  public constructor(value: T, ...tags: string[]) { this.value = value; }',
          '  public map<R>(fn: Fn<T, R>): R { return fn.apply(value); }',
          '}',
          '',
        ].join('\n')
      );
    });

    it('renders static methods without override when there is no superclass', () => {
      expect(transpile('class A { @Override public static int f() { return 1; } }')).toBe(
        'export class A {\n  public static f(): number { return 1; }\n}\n'
      );
    });

    it('marks override only for methods the local superclass chain declares', () => {
      const source = [
        'interface Named { String name(); }',
        'class Base { void draw() {} }',
        'class Item extends Base implements Named {',
        '  @Override public String name() { return "item"; }',
        '  @Override void draw() {}',
        '}',
      ].join('\n');
      expect(transpile(source)).toBe(
        [
          'export abstract class Named {',
          '  abstract name(): string;',
          '}',
          '',
          'export class Base {',
          '  draw(): void {}',
          '}',
          '',
          'export class Item extends Base implements Named {',
          '  public name(): string { return "item"; }',
          '  override draw(): void {}',
          '}',
          '',
        ].join('\n')
      );
    });

    it('keeps override when the superclass chain leaves the file', () => {
      const output = transpile(
        'class Base extends Thread {}\nclass Worker extends Base { @Override public void run() {} }'
      );
      expect(output).toContain('  public override run(): void {}');
    });

    it('gives bodiless native methods a throwing body', () => {
      expect(transpile('abstract class A { native int hash(); abstract void m(); }')).toBe(
        [
          'export abstract class A {',
          "  hash(): number { throw new Error('Native method: hash'); }",
          '  abstract m(): void;',
          '}',
          '',
        ].join('\n')
      );
    });
  });

  describe('type mapping', () => {
    it('maps primitives, boxes and wildcards', () => {
      const source =
        'import java.util.List;\nimport java.util.Map;\nclass A { List<Integer> a; Map<String, ? extends Number> b; int[][] c; char d; Object e; List<?> f; Boolean g; }';
      expect(transpile(source)).toBe(
        [
          'export class A {',
          '  a: List<number>;',
          '  b: Map<string, number>;',
          '  c: number[][];',
          '  d: string;',
          '  e: unknown;',
          '  f: List<unknown>;',
          '  g: boolean;',
          '}',
          '',
        ].join('\n')
      );
    });

    it('keeps package-qualified external names', () => {
      expect(transpile('class A { java.util.List<String> l; }')).toBe(
        'export class A {\n  l: java.util.List<string>;\n}\n'
      );
    });

    it('keeps member types of imported names qualified', () => {
      expect(transpile('import java.util.Map;\nclass A { Map.Entry<String, Long> e; }')).toBe(
        'export class A {\n  e: Map.Entry<string, number>;\n}\n'
      );
    });
  });

  describe('resolution', () => {
    it('reports a type that is neither local, imported nor known', () => {
      const error = emitError('class A { Foo f; }');
      expect(error.errorId).toBe('BREW-E001');
      expect(error.location).toEqual({ line: 1, column: 11, offset: 10 });
      expect(error.offending).toBe('Foo');
      expect(error.message).toBe('Cannot resolve type Foo at 1:11');
      expect(error.context).toEqual({ name: 'Foo', candidates: ['A'] });
    });

    it('trusts wildcard imports by default', () => {
      expect(transpile('import java.util.*;\nclass A { Foo f; }')).toBe(
        'export class A {\n  f: Foo;\n}\n'
      );
    });

    it('rejects unresolved names under a wildcard import when not trusted', () => {
      const error = emitError('import java.util.*;\nclass A { Foo f; }', {
        trustWildcardImports: false,
      });
      expect(error.errorId).toBe('BREW-E001');
    });

    it('accepts names listed in knownTypes', () => {
      expect(transpile('class A { Foo f; }', { knownTypes: ['Foo'] })).toBe(
        'export class A {\n  f: Foo;\n}\n'
      );
    });

    it('resolves qualified references to nested types', () => {
      const output = transpile('class A { class B { class C {} } A.B.C c; }');
      expect(output).toContain('  c: A$B$C;');
    });

    it('resolves nested types inherited from a superclass', () => {
      const output = transpile('class Base { class Inner {} }\nclass Derived extends Base { Inner i; }');
      expect(output).toContain('export class Derived extends Base {\n  i: Base$Inner;\n}');
    });

    it('declares enclosing type parameters on hoisted inner classes', () => {
      expect(transpile('class Box<T extends Comparable<T>> { class Node { T value; } Node head; }')).toBe(
        [
          'export class Box$Node<T extends Comparable<T>> {',
          '  value: T;',
          '}',
          '',
          'export class Box<T extends Comparable<T>> {',
          '  head: Box$Node<T>;',
          '}',
          '',
          'export namespace Box {',
          '  export type Node<T extends Comparable<T>> = Box$Node<T>;',
          '  export const Node = Box$Node;',
          '}',
          '',
        ].join('\n')
      );
    });

    it('puts enclosing type parameters ahead of the inner ones', () => {
      const output = transpile('class Box<T> { class Pair<U> { T a; U b; } Pair<String> p; }');
      expect(output).toContain('export class Box$Pair<T, U> {\n  a: T;\n  b: U;\n}');
      expect(output).toContain('  p: Box$Pair<T, string>;');
      expect(output).toContain('  export type Pair<T, U> = Box$Pair<T, U>;');
    });

    it('passes unknown for enclosing type parameters out of scope', () => {
      const output = transpile('class Box<T> { class Node {} }\nclass User { Box.Node n; }');
      expect(output).toContain('export class User {\n  n: Box$Node<unknown>;\n}');
    });

    it('lets an inner type parameter shadow an enclosing one', () => {
      const output = transpile('class Box<T> { class Node<T> { T v; } }');
      expect(output).toContain('export class Box$Node<T> {\n  v: T;\n}');
    });

    it('leaves static nested classes without enclosing type parameters', () => {
      const output = transpile('class Box<T> { static class Leaf {} interface Visitor {} }');
      expect(output).toContain('export class Box$Leaf {}');
      expect(output).toContain('export abstract class Box$Visitor {}');
    });

    it('resolves type parameters before types', () => {
      const output = transpile('class T {}\nclass A<T> { T t; }');
      expect(output).toContain('export class A<T> {\n  t: T;\n}');
    });
  });

  describe('ordering', () => {
    it('moves a superclass before its subclasses', () => {
      expect(transpile('class A { class B extends A {} }')).toBe(
        [
          'export class A {}',
          '',
          'export class A$B extends A {}',
          '',
          'export namespace A {',
          '  export type B = A$B;',
          '  export const B = A$B;',
          '}',
          '',
        ].join('\n')
      );
    });

    it('keeps source order otherwise', () => {
      expect(transpile('class B {} class A {}')).toBe('export class B {}\n\nexport class A {}\n');
    });

    it('reports cyclic inheritance', () => {
      const error = emitError('class A extends B {} class B extends A {}');
      expect(error.errorId).toBe('BREW-E002');
      expect(error.location).toEqual({ line: 1, column: 1, offset: 0 });
      expect(error.message).toBe('Cyclic inheritance involving A, B at 1:1');
    });
  });

  describe('options', () => {
    it('uses the name separator and can skip nested aliases', () => {
      expect(
        transpile('class A { class B {} }', { nameSeparator: '_', nestedAliases: false })
      ).toBe('export class A_B {}\n\nexport class A {}\n');
    });

    it('renders generic nested aliases with their parameters', () => {
      expect(transpile('class A { static class Node<T> { T value; } }')).toBe(
        [
          'export class A$Node<T> {',
          '  value: T;',
          '}',
          '',
          'export class A {}',
          '',
          'export namespace A {',
          '  export type Node<T> = A$Node<T>;',
          '  export const Node = A$Node;',
          '}',
          '',
        ].join('\n')
      );
    });

    it('prepends the header as line comments', () => {
      expect(transpile('class A {}', { header: 'Generated file\n\nDo not edit' })).toBe(
        '// Generated file\n//\n// Do not edit\n\nexport class A {}\n'
      );
    });

    it('indents with the configured width', () => {
      expect(transpile('class A { int x; }', { indent: 4 })).toBe(
        'export class A {\n    x: number;\n}\n'
      );
    });

    it('rejects a negative indent', () => {
      expect(() => transpile('class A {}', { indent: -1 })).toThrow(
        'indent must be a non-negative integer, got -1'
      );
    });

    it('re-emits doc comments when comments are preserved', () => {
      const source = '/** The A. */\nclass A {\n  /**\n   * Count.\n   */\n  int n;\n}';
      expect(transpile(source, { preserveComments: true })).toBe(
        '/** The A. */\nexport class A {\n  /**\n   * Count.\n   */\n  n: number;\n}\n'
      );
    });
  });

  describe('bodies', () => {
    it('re-indents multi-line bodies relative to their closing brace', () => {
      const source = [
        'class A {',
        '    void m() {',
        '        if (x) {',
        '            y();',
        '        }',
        '    }',
        '}',
      ].join('\n');
      expect(transpile(source)).toBe(
        [
          'export class A {',
          '  m(): void {',
          '      if (x) {',
          '          y();',
          '      }',
          '  }',
          '}',
          '',
        ].join('\n')
      );
    });
  });
});
