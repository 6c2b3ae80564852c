/**
 * Construct matcher conformance
 * Each matcher recognizes its construct, rejects near misses, and agrees
 * with its own parser on where the construct ends.
 */

import { describe, expect, it } from 'vitest';
import {
  FILE_MATCHERS,
  MEMBER_MATCHERS,
  createParseContext,
  type ConstructMatcher,
  type ParseContext,
} from 'brewport';
import { memberContext, streamOf } from '../helpers.js';

function accepting<T>(
  matchers: readonly ConstructMatcher<T>[],
  source: string,
  ctx: ParseContext
): string[] {
  const stream = streamOf(source);
  return matchers
    .filter((m) => m.isMatch(stream.peekStream(), ctx))
    .map((m) => m.name);
}

const MEMBER_POSITIVES: readonly [string, string][] = [
  ['field', 'int x = 1;'],
  ['field', 'private static final Map<String, List<Integer>> cache = new HashMap<>(), other;'],
  ['field', 'int[] a[], b;'],
  ['field', 'Runnable r = new Runnable() { public void run() {} };'],
  ['method', 'void m() {}'],
  ['method', 'public abstract int size();'],
  ['method', '@Override public <T> List<T> copy(List<? extends T> in) throws IOException { return in; }'],
  ['method', 'int legacy()[] { return null; }'],
  ['nestedClass', 'class B {}'],
  ['nestedClass', 'static final class B<T> extends Base<T> implements X, Y {}'],
  ['nestedClass', 'interface L extends X, Y { void on(); }'],
  ['staticInitializer', 'static {}'],
  ['instanceInitializer', '{ count++; }'],
  ['constructor', 'A() {}'],
  ['constructor', 'public A(int x) throws Exception { this.x = x; }'],
];

const MEMBER_NEGATIVES: readonly [string, string][] = [
  ['field without semicolon', 'int x'],
  ['field with empty initializer', 'int x = ;'],
  ['method without return type', 'm() {}'],
  ['method without parameters', 'void m {}'],
  ['class without name', 'class {}'],
  ['static without block', 'static int;'],
  ['bare parentheses', '( )'],
  ['constructor with another name', 'B() {}'],
  ['dangling annotation', '@Deprecated'],
  ['enum declaration', 'enum E { X }'],
];

describe('member matchers', () => {
  describe('recognize exactly one construct', () => {
    for (const [name, source] of MEMBER_POSITIVES) {
      it(`only ${name} accepts: ${source}`, () => {
        expect(accepting(MEMBER_MATCHERS, source, memberContext(source))).toEqual([name]);
      });
    }
  });

  describe('reject near misses', () => {
    for (const [label, source] of MEMBER_NEGATIVES) {
      it(`no matcher accepts a ${label}`, () => {
        expect(accepting(MEMBER_MATCHERS, source, memberContext(source))).toEqual([]);
      });
    }
  });

  it('does not recognize constructors inside anonymous classes', () => {
    const source = 'A() {}';
    expect(accepting(MEMBER_MATCHERS, source, memberContext(source, null))).toEqual([]);
  });

  describe('parser and recognizer agree on the extent', () => {
    for (const [name, source] of MEMBER_POSITIVES) {
      it(`${name} stops where its recognizer stopped: ${source}`, () => {
        const withTrailer = `${source} int trailing;`;
        const ctx = memberContext(withTrailer);
        const stream = streamOf(withTrailer);
        const matcher = MEMBER_MATCHERS.find((m) => m.name === name);
        if (matcher === undefined) throw new Error(`no matcher ${name}`);

        const peek = stream.peekStream();
        expect(matcher.isMatch(peek, ctx)).toBe(true);
        matcher.parse(stream, ctx);
        expect(stream.position).toBe(peek.position);
        expect(stream.current()).toMatchObject({ text: 'int' });
      });
    }
  });
});

describe('file matchers', () => {
  const positives: readonly [string, string][] = [
    ['package', 'package a.b.c;'],
    ['import', 'import java.util.List;'],
    ['import', 'import static java.util.Collections.emptyList;'],
    ['import', 'import java.util.*;'],
    ['typeDeclaration', 'public class A {}'],
    ['typeDeclaration', 'interface I {}'],
  ];

  for (const [name, source] of positives) {
    it(`only ${name} accepts: ${source}`, () => {
      expect(accepting(FILE_MATCHERS, source, createParseContext(source))).toEqual([name]);
    });
  }

  it('rejects a member at file level', () => {
    const source = 'int x;';
    expect(accepting(FILE_MATCHERS, source, createParseContext(source))).toEqual([]);
  });

  it('rejects an import without a name', () => {
    const source = 'import ;';
    expect(accepting(FILE_MATCHERS, source, createParseContext(source))).toEqual([]);
  });
});
