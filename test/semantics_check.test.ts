import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { ModuleItemNode } from '../src/frontend/ast.js';
import { checkProgram } from '../src/semantics/check.js';
import { buildEnv } from '../src/semantics/env.js';
import type { TypedProgram } from '../src/semantics/typed.js';
import {
  assign,
  at,
  bin,
  block,
  bool,
  call,
  defer,
  exprStmt,
  extern,
  field,
  fn,
  ifStmt,
  int,
  name,
  nul,
  program,
  ret,
  struct,
  unary,
  varDecl,
  whileStmt,
} from './helpers/ast.js';

const check = (...items: ModuleItemNode[]): { typed: TypedProgram; diagnostics: Diagnostic[] } => {
  const diagnostics: Diagnostic[] = [];
  const p = program(...items);
  const env = buildEnv(p, diagnostics);
  const typed = checkProgram(p, env, diagnostics);
  return { typed, diagnostics };
};

const messages = (diagnostics: Diagnostic[]) => diagnostics.map((d) => [d.id, d.message]);

const pair = struct('Pair', [
  ['a', 'i64'],
  ['b', 'u8'],
]);

describe('checkProgram', () => {
  it('accepts a well-typed program and annotates expression types', () => {
    const { typed, diagnostics } = check(
      fn('f', [['x', 'u8']], 'u8', [varDecl('y', 'u8', int(7)), ret(bin('+', name('x'), name('y')))]),
    );
    expect(diagnostics).toEqual([]);
    const body = typed.functions[0]?.body;
    const decl = body?.stmts[0];
    expect(decl?.kind === 'VarDecl' ? decl.init.type : undefined).toEqual({ kind: 'u8' });
    const r = body?.stmts[1];
    expect(r?.kind === 'Return' ? r.value?.type : undefined).toEqual({ kind: 'u8' });
  });

  it('types a literal on either side of an operator from the other side', () => {
    const { diagnostics } = check(
      fn('f', [['x', 'u64']], 'bool', [ret(bin('<', int(3), name('x')))]),
    );
    expect(diagnostics).toEqual([]);
  });

  it('gives every local a unique id and lists block locals without parameters', () => {
    const { typed } = check(
      fn('f', [['a', 'i64']], 'unit', [
        varDecl('x', 'i64', int(1)),
        block(varDecl('x', 'i64', int(2))),
      ]),
    );
    const f = typed.functions[0];
    expect(f?.params.map((p) => [p.id, p.name, p.storage])).toEqual([[0, 'a', 'param']]);
    expect(f?.body.locals.map((l) => [l.id, l.name])).toEqual([[1, 'x']]);
    const inner = f?.body.stmts[1];
    expect(inner?.kind === 'Block' ? inner.locals.map((l) => l.id) : []).toEqual([2]);
    expect(f?.nextSymbolId).toBe(3);
  });

  it('reports unknown variables and functions', () => {
    const { diagnostics } = check(
      fn('f', [], 'unit', [
        exprStmt(at(name('y'), 2, 5)),
        exprStmt(at(call('g', int(1)), 3, 5)),
      ]),
    );
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UndefinedSymbol,
        severity: 'error',
        message: 'Unknown variable "y".',
        file: 'test.ska',
        line: 2,
        column: 5,
      },
      {
        id: DiagnosticIds.UndefinedSymbol,
        severity: 'error',
        message: 'Unknown function "g".',
        file: 'test.ska',
        line: 3,
        column: 5,
      },
    ]);
  });

  it('reports arity and argument mismatches', () => {
    const { diagnostics } = check(
      extern('add', [
        ['a', 'i64'],
        ['b', 'i64'],
      ], 'i64'),
      extern('neg', [['a', 'i64']], 'i64'),
      fn('f', [], 'unit', [exprStmt(call('add', int(1))), exprStmt(call('neg', bool(true)))]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.ArityMismatch, 'Function "add" expects 2 arguments, got 1.'],
      [DiagnosticIds.TypeMismatch, 'Argument 1 of "neg" expects i64, got bool.'],
    ]);
  });

  it('allows shadowing in an inner block but not redeclaration in the same scope', () => {
    const { diagnostics } = check(
      fn('f', [['p', 'i64']], 'unit', [
        varDecl('x', 'i64', int(1)),
        block(varDecl('x', 'i64', int(2))),
        varDecl('x', 'i64', int(3)),
        varDecl('p', 'i64', int(4)),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.DuplicateDeclaration, '"x" is already declared in this scope.'],
      [DiagnosticIds.DuplicateDeclaration, '"p" is already declared in this scope.'],
    ]);
  });

  it('keeps a variable out of scope in its own initializer', () => {
    const { diagnostics } = check(fn('f', [], 'unit', [varDecl('x', 'i64', name('x'))]));
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.UndefinedSymbol, 'Unknown variable "x".'],
    ]);
  });

  it('rejects mixed integer operands', () => {
    const { diagnostics } = check(
      fn(
        'f',
        [
          ['a', 'i64'],
          ['b', 'u64'],
        ],
        'i64',
        [ret(bin('+', name('a'), name('b')))],
      ),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.TypeMismatch, 'Operator "+" requires matching integer operands, got i64 and u64.'],
    ]);
  });

  it('folds negated literals before range-checking them', () => {
    const { typed, diagnostics } = check(
      fn('f', [], 'unit', [
        varDecl('lo', 'i64', unary('-', int(9223372036854775808n))),
        varDecl('under', 'i64', unary('-', int(9223372036854775809n))),
        varDecl('b', 'u8', unary('-', int(1))),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.TypeMismatch, 'Integer literal -9223372036854775809 does not fit in i64.'],
    ]);
    const lo = typed.functions[0]?.body.stmts[0];
    expect(lo?.kind === 'VarDecl' ? lo.init : undefined).toMatchObject({
      kind: 'IntLiteral',
      value: -9223372036854775808n,
    });
  });

  it('range-checks integer literals against their contextual type', () => {
    const { diagnostics } = check(
      fn('f', [], 'unit', [varDecl('small', 'u8', int(300)), varDecl('ok', 'u8', int(255))]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.TypeMismatch, 'Integer literal 300 does not fit in u8.'],
    ]);
  });

  it('accepts null only against pointer types', () => {
    const { diagnostics } = check(
      fn('f', [['p', '*i64']], 'unit', [
        varDecl('q', '*i64', nul()),
        exprStmt(bin('==', name('p'), nul())),
        exprStmt(bin('!=', nul(), name('p'))),
        varDecl('n', 'i64', nul()),
        exprStmt(nul()),
        varDecl('x', 'i64', unary('*', nul())),
        exprStmt(call('f', unary('*', nul()))),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.InvalidNullContext, 'null cannot be used as i64; only pointer types accept null.'],
      [DiagnosticIds.InvalidNullContext, 'null is only allowed where a pointer type is expected.'],
      [DiagnosticIds.InvalidNullContext, 'null is only allowed where a pointer type is expected.'],
      [DiagnosticIds.InvalidNullContext, 'null is only allowed where a pointer type is expected.'],
    ]);
  });

  it('rejects assignment and address-of on non-places', () => {
    const { diagnostics } = check(
      fn('f', [], 'unit', [
        exprStmt(assign(int(1), int(2))),
        exprStmt(unary('&', int(3))),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.InvalidLValue, 'Assignment target must be a variable, dereference or field access.'],
      [DiagnosticIds.InvalidLValue, 'Address-of requires a variable, dereference or field access.'],
    ]);
  });

  it('resolves fields by value and through pointers', () => {
    const { typed, diagnostics } = check(
      pair,
      fn('f', [['p', '*Pair']], 'u8', [
        varDecl('v', 'Pair', unary('*', name('p'))),
        exprStmt(assign(field(name('v'), 'a'), int(1))),
        ret(field(name('p'), 'b')),
      ]),
    );
    expect(diagnostics).toEqual([]);
    const r = typed.functions[0]?.body.stmts[2];
    const value = r?.kind === 'Return' ? r.value : undefined;
    expect(value).toMatchObject({
      kind: 'Field',
      through: 'pointer',
      structName: 'Pair',
      field: { name: 'b', offset: 8 },
      type: { kind: 'u8' },
    });
  });

  it('reports unknown fields and field access on non-structs', () => {
    const { diagnostics } = check(
      pair,
      fn('f', [['p', '*Pair'], ['n', 'i64']], 'unit', [
        exprStmt(field(name('p'), 'c')),
        exprStmt(field(name('n'), 'a')),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.UnknownField, 'Struct "Pair" has no field "c".'],
      [
        DiagnosticIds.TypeMismatch,
        'Field access ".a" requires a struct or pointer to struct, got i64.',
      ],
    ]);
  });

  it('checks conditions and return values', () => {
    const { diagnostics } = check(
      fn('f', [['n', 'i64']], 'i64', [
        ifStmt(name('n'), []),
        whileStmt(int(1), []),
        ret(),
        ret(bool(true)),
      ]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.TypeMismatch, 'if condition must be bool, got i64.'],
      [DiagnosticIds.TypeMismatch, 'while condition must be bool, got i64.'],
      [DiagnosticIds.TypeMismatch, 'Function "f" must return a value of type i64.'],
      [DiagnosticIds.TypeMismatch, 'Function "f" returns i64, got bool.'],
    ]);
  });

  it('allows returning a unit call from a unit function', () => {
    const { diagnostics } = check(
      extern('done', []),
      fn('f', [], 'unit', [ret(call('done'))]),
    );
    expect(diagnostics).toEqual([]);
  });

  it('rejects unit variables and calling a variable', () => {
    const { diagnostics } = check(
      extern('done', []),
      fn('f', [['g', 'i64']], 'unit', [varDecl('u', 'unit', call('done')), exprStmt(call('g'))]),
    );
    expect(messages(diagnostics)).toEqual([
      [DiagnosticIds.UnsupportedAbi, 'Variable "u" cannot have type unit.'],
      [DiagnosticIds.TypeMismatch, '"g" is a variable, not a function.'],
    ]);
  });

  it('accumulates diagnostics across functions', () => {
    const { diagnostics } = check(
      fn('a', [], 'unit', [exprStmt(name('x'))]),
      fn('b', [], 'unit', [exprStmt(name('y'))]),
    );
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Unknown variable "x".',
      'Unknown variable "y".',
    ]);
  });

  it('records defers in the scope that registered them', () => {
    const { typed, diagnostics } = check(
      extern('g', []),
      fn('f', [], 'unit', [
        at(defer('g'), 2),
        block(at(defer('g'), 3)),
      ]),
    );
    expect(diagnostics).toEqual([]);
    const body = typed.functions[0]?.body;
    expect(body?.defers.map((d) => d.span.start.line)).toEqual([2]);
    const inner = body?.stmts[1];
    expect(inner?.kind === 'Block' ? inner.defers.map((d) => d.span.start.line) : []).toEqual([3]);
  });
});
