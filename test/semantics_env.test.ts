import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { ModuleItemNode } from '../src/frontend/ast.js';
import { buildEnv } from '../src/semantics/env.js';
import { at, extern, fn, program, ret, int, struct } from './helpers/ast.js';

const envOf = (...items: ModuleItemNode[]) => {
  const diagnostics: Diagnostic[] = [];
  const env = buildEnv(program(...items), diagnostics);
  return { env, diagnostics };
};

const pair = struct('Pair', [
  ['a', 'i64'],
  ['b', 'u8'],
]);

describe('buildEnv', () => {
  it('collects function and extern signatures', () => {
    const { env, diagnostics } = envOf(
      extern('print_i64', [['x', 'i64']]),
      fn('main', [], 'i64', [ret(int(0))]),
    );
    expect(diagnostics).toEqual([]);
    expect(env.functions.get('print_i64')).toMatchObject({
      storage: 'extern',
      params: [{ name: 'x', type: { kind: 'i64' } }],
      ret: { kind: 'unit' },
    });
    expect(env.functions.get('main')).toMatchObject({ storage: 'function', params: [] });
  });

  it('lets signatures refer to structs declared later', () => {
    const { diagnostics, env } = envOf(fn('first', [['p', '*Pair']], 'unit', []), pair);
    expect(diagnostics).toEqual([]);
    expect(env.functions.get('first')?.params[0]?.type).toEqual({
      kind: 'ptr',
      to: { kind: 'struct', name: 'Pair' },
    });
  });

  it('diagnoses duplicate functions', () => {
    const { diagnostics } = envOf(
      fn('f', [], 'unit', []),
      at(extern('f', []), 4),
    );
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.DuplicateDeclaration,
        severity: 'error',
        message: 'Duplicate function "f" (previously declared at test.ska:1).',
        file: 'test.ska',
        line: 4,
        column: 1,
      },
    ]);
  });

  it('diagnoses duplicate structs, fields and parameters', () => {
    const { diagnostics } = envOf(
      pair,
      pair,
      struct('Twice', [
        ['x', 'i64'],
        ['x', 'u8'],
      ]),
      fn(
        'g',
        [
          ['a', 'i64'],
          ['a', 'i64'],
        ],
        'unit',
        [],
      ),
    );
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.DuplicateDeclaration, 'Duplicate struct "Pair".'],
      [DiagnosticIds.DuplicateDeclaration, 'Duplicate field "x" in struct "Twice".'],
      [DiagnosticIds.DuplicateDeclaration, 'Duplicate parameter "a" in function "g".'],
    ]);
  });

  it('diagnoses unknown type names', () => {
    const { diagnostics } = envOf(fn('f', [['x', '*Nope']], 'unit', []));
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.UndefinedSymbol, 'Unknown type "Nope".'],
    ]);
  });

  it('rejects signatures the register convention cannot pass', () => {
    const seven = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((n): [string, string] => [n, 'i64']);
    const { diagnostics } = envOf(
      pair,
      fn('many', seven, 'unit', []),
      fn('byValue', [['p', 'Pair']], 'unit', []),
      extern('makePair', [], 'Pair'),
      fn('nothing', [['u', 'unit']], 'unit', []),
    );
    expect(diagnostics.every((d) => d.id === DiagnosticIds.UnsupportedAbi)).toBe(true);
    expect(diagnostics.map((d) => d.message)).toEqual([
      'function "many" takes 7 parameters; at most 6 are passed in registers.',
      'Parameter "p" of "byValue" has type Pair, which is not passed in a register.',
      'extern function "makePair" returns struct "Pair" by value; return a pointer instead.',
      'Parameter "u" of "nothing" has type unit, which is not passed in a register.',
    ]);
  });

  it('accepts exactly six parameters', () => {
    const six = ['a', 'b', 'c', 'd', 'e', 'f'].map((n): [string, string] => [n, 'u64']);
    const { diagnostics } = envOf(fn('six', six, 'unit', []));
    expect(diagnostics).toEqual([]);
  });

  it('rejects unit fields and skips layouts after signature errors', () => {
    const { diagnostics, env } = envOf(
      struct('Holder', [['u', 'unit']]),
      pair,
    );
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.UnsupportedAbi, 'Field "u" of struct "Holder" cannot have type unit.'],
    ]);
    expect(env.layouts.size).toBe(0);
  });
});
