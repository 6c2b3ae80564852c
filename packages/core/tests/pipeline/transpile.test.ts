/**
 * Pipeline entry point tests
 * transpile, tryTranspile and stage observability
 */

import { describe, expect, it } from 'vitest';
import {
  LexerError,
  VERSION,
  transpile,
  tryTranspile,
  type PipelineStage,
} from 'brewport';

describe('transpile', () => {
  it('throws the first error of any stage', () => {
    expect(() => transpile('class A { int x = #; }')).toThrow(LexerError);
  });

  it('reports an extra opening brace as an unclosed bracket', () => {
    expect(() => transpile('class A { void m() {} {')).toThrow("Unclosed '{' at 1:23");
  });
});

describe('tryTranspile', () => {
  it('returns output and AST on success', () => {
    const result = tryTranspile('class A { int x; }');
    if (!result.ok) throw new Error(result.error.message);
    expect(result.output).toBe('export class A {\n  x: number;\n}\n');
    expect(result.ast.types.map((t) => t.name)).toEqual(['A']);
  });

  it('returns structured data for input errors', () => {
    expect(tryTranspile('class A { m() {} }')).toEqual({
      ok: false,
      error: {
        errorId: 'BREW-P001',
        kind: 'UnrecognizedMemberError',
        message: "Unrecognized class member starting at 'm'",
        location: { line: 1, column: 11, offset: 10 },
        offending: 'm',
        context: { scope: 'class', text: "'m'" },
      },
    });
  });

  it('returns emission errors as data', () => {
    const result = tryTranspile('class A { Foo f; }');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.errorId).toBe('BREW-E001');
    expect(result.error.kind).toBe('EmissionError');
  });

  it('lets errors that are not input errors through', () => {
    expect(() => tryTranspile('class A {}', { indent: 1.5 })).toThrow(RangeError);
  });
});

describe('observability', () => {
  it('reports each stage once, in order', () => {
    const stages: PipelineStage[] = [];
    const durations: number[] = [];
    transpile('class A {}', {
      observability: {
        onStageComplete: ({ stage, durationMs }) => {
          stages.push(stage);
          durations.push(durationMs);
        },
      },
    });
    expect(stages).toEqual(['tokenize', 'group', 'parse', 'emit']);
    expect(durations.every((d) => d >= 0)).toBe(true);
  });

  it('stops reporting at the failing stage', () => {
    const stages: PipelineStage[] = [];
    tryTranspile('class A {', {
      observability: { onStageComplete: ({ stage }) => stages.push(stage) },
    });
    expect(stages).toEqual(['tokenize']);
  });
});

describe('VERSION', () => {
  it('is a semantic version', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
