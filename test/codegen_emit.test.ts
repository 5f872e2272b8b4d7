import { describe, expect, it } from 'vitest';

import { compile } from '../src/compile.js';
import { DiagnosticIds, InternalCompilerError } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { FormatWriters } from '../src/formats/types.js';
import {
  assign,
  at,
  bin,
  bool,
  call,
  exprStmt,
  extern,
  field,
  fn,
  ifStmt,
  int,
  name,
  program,
  ret,
  struct,
  unary,
  varDecl,
  whileStmt,
} from './helpers/ast.js';
import { compileToAsm, functionLines } from './helpers/compile.js';

const linesOf = (asm: string | undefined, fnName: string): string[] =>
  functionLines(asm ?? '', fnName);

const pair = struct('Pair', [
  ['a', 'i64'],
  ['b', 'u8'],
]);

describe('x86-64 emission', () => {
  it('emits prologue, parameter stores, a spilled binary op and a single exit', () => {
    const { diagnostics, asm } = compileToAsm(
      program(
        fn(
          'add',
          [
            ['a', 'i64'],
            ['b', 'i64'],
          ],
          'i64',
          [ret(bin('+', name('a'), name('b')))],
        ),
      ),
    );
    expect(diagnostics).toEqual([]);
    expect(linesOf(asm, 'add')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 32',
      'mov QWORD PTR [rbp - 8], rdi',
      'mov QWORD PTR [rbp - 16], rsi',
      'mov rax, 0',
      'mov QWORD PTR [rbp - 24], rax',
      'mov rax, QWORD PTR [rbp - 8]',
      'mov QWORD PTR [rbp - 32], rax',
      'mov rax, QWORD PTR [rbp - 16]',
      'mov rcx, rax',
      'mov rax, QWORD PTR [rbp - 32]',
      'add rax, rcx',
      'mov QWORD PTR [rbp - 24], rax',
      'jmp .Ladd.exit',
      '.Ladd.exit:',
      'mov rax, QWORD PTR [rbp - 24]',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
  });

  it('renders a complete assembly file', () => {
    const { asm } = compileToAsm(
      program(
        extern('print_i64', [['v', 'i64']]),
        fn('main', [], 'i64', [exprStmt(call('print_i64', int(42))), ret(int(0))]),
      ),
    );
    expect(asm).toBe(
      [
        '# skac x86-64 output for test.ska',
        '.intel_syntax noprefix',
        '.extern print_i64',
        '.text',
        '',
        '.globl main',
        'main:',
        '    push rbp',
        '    mov rbp, rsp',
        '    sub rsp, 16',
        '    mov rax, 0',
        '    mov QWORD PTR [rbp - 8], rax',
        '    mov rax, 42',
        '    mov rdi, rax',
        '    call print_i64@PLT',
        '    mov rax, 0',
        '    mov QWORD PTR [rbp - 8], rax',
        '    jmp .Lmain.exit',
        '.Lmain.exit:',
        '    mov rax, QWORD PTR [rbp - 8]',
        '    mov rsp, rbp',
        '    pop rbp',
        '    ret',
        '',
        '.section .note.GNU-stack,"",@progbits',
        '',
      ].join('\n'),
    );
  });

  it('uses byte slots and short-circuits &&', () => {
    const { asm } = compileToAsm(
      program(
        fn(
          'f',
          [
            ['a', 'bool'],
            ['b', 'bool'],
          ],
          'bool',
          [ret(bin('&&', name('a'), name('b')))],
        ),
      ),
    );
    expect(linesOf(asm, 'f')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 16',
      'mov BYTE PTR [rbp - 1], dil',
      'mov BYTE PTR [rbp - 2], sil',
      'mov rax, 0',
      'mov BYTE PTR [rbp - 3], al',
      'movzx eax, BYTE PTR [rbp - 1]',
      'test rax, rax',
      'je .Lf.and0',
      'movzx eax, BYTE PTR [rbp - 2]',
      '.Lf.and0:',
      'mov BYTE PTR [rbp - 3], al',
      'jmp .Lf.exit',
      '.Lf.exit:',
      'movzx eax, BYTE PTR [rbp - 3]',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
  });

  it('skips a side-effecting right operand of && and ||', () => {
    const { diagnostics, asm } = compileToAsm(
      program(
        extern('side', [], 'bool'),
        fn('f', [], 'bool', [ret(bin('&&', bool(false), call('side')))]),
        fn('g', [], 'bool', [ret(bin('||', bool(true), call('side')))]),
      ),
    );
    expect(diagnostics).toEqual([]);

    const f = linesOf(asm, 'f');
    const je = f.indexOf('je .Lf.and0');
    expect(f.slice(je - 2, je + 4)).toEqual([
      'mov rax, 0',
      'test rax, rax',
      'je .Lf.and0',
      'call side@PLT',
      'movzx eax, al',
      '.Lf.and0:',
    ]);

    const g = linesOf(asm, 'g');
    const jne = g.indexOf('jne .Lg.or0');
    expect(g.slice(jne - 2, jne + 4)).toEqual([
      'mov rax, 1',
      'test rax, rax',
      'jne .Lg.or0',
      'call side@PLT',
      'movzx eax, al',
      '.Lg.or0:',
    ]);
  });

  it('picks signed or unsigned comparisons and division from the operand type', () => {
    const twoOf = (type: string): [string, string][] => [
      ['a', type],
      ['b', type],
    ];
    const { asm } = compileToAsm(
      program(
        fn('lts', twoOf('i64'), 'bool', [ret(bin('<', name('a'), name('b')))]),
        fn('ltu', twoOf('u64'), 'bool', [ret(bin('<', name('a'), name('b')))]),
        fn('divs', twoOf('i64'), 'i64', [ret(bin('/', name('a'), name('b')))]),
        fn('modu', twoOf('u64'), 'u64', [ret(bin('%', name('a'), name('b')))]),
      ),
    );
    expect(linesOf(asm, 'lts')).toContain('setl al');
    expect(linesOf(asm, 'ltu')).toContain('setb al');

    const divs = linesOf(asm, 'divs');
    const idiv = divs.indexOf('idiv rcx');
    expect(divs.slice(idiv - 1, idiv + 1)).toEqual(['cqo', 'idiv rcx']);

    const modu = linesOf(asm, 'modu');
    const div = modu.indexOf('div rcx');
    expect(modu.slice(div - 1, div + 2)).toEqual(['xor edx, edx', 'div rcx', 'mov rax, rdx']);
  });

  it('null-checks a dereference with its source position', () => {
    const { asm } = compileToAsm(
      program(fn('get', [['p', '*i64']], 'i64', [ret(at(unary('*', name('p')), 3, 12))])),
    );
    expect(linesOf(asm, 'get')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 16',
      'mov QWORD PTR [rbp - 8], rdi',
      'mov rax, 0',
      'mov QWORD PTR [rbp - 16], rax',
      'mov rax, QWORD PTR [rbp - 8]',
      'test rax, rax',
      'jne .Lget.nonnull0',
      'mov edi, 3',
      'mov esi, 12',
      'call __ska_panic_null_deref@PLT',
      '.Lget.nonnull0:',
      'mov rax, QWORD PTR [rax]',
      'mov QWORD PTR [rbp - 16], rax',
      'jmp .Lget.exit',
      '.Lget.exit:',
      'mov rax, QWORD PTR [rbp - 16]',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
    expect(asm?.split('\n')[2]).toBe('.extern __ska_panic_null_deref');
  });

  it('drops null checks when disabled', () => {
    const { asm } = compileToAsm(
      program(fn('get', [['p', '*i64']], 'i64', [ret(unary('*', name('p')))])),
      { nullChecks: false },
    );
    expect(linesOf(asm, 'get').slice(6, 9)).toEqual([
      'mov rax, QWORD PTR [rbp - 8]',
      'mov rax, QWORD PTR [rax]',
      'mov QWORD PTR [rbp - 16], rax',
    ]);
    expect(asm?.split('\n')[2]).toBe('.text');
  });

  it('copies structs by value in quadwords', () => {
    const { asm } = compileToAsm(
      program(
        pair,
        fn('first', [['q', '*Pair']], 'i64', [
          varDecl('p', 'Pair', unary('*', name('q'))),
          ret(field(name('p'), 'a')),
        ]),
      ),
      { nullChecks: false },
    );
    expect(linesOf(asm, 'first')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 32',
      'mov QWORD PTR [rbp - 8], rdi',
      'mov rax, 0',
      'mov QWORD PTR [rbp - 16], rax',
      'mov rax, QWORD PTR [rbp - 8]',
      'lea rcx, [rbp - 32]',
      'mov rdx, QWORD PTR [rax]',
      'mov QWORD PTR [rcx], rdx',
      'mov rdx, QWORD PTR [rax + 8]',
      'mov QWORD PTR [rcx + 8], rdx',
      'lea rax, [rbp - 32]',
      'mov rax, QWORD PTR [rax]',
      'mov QWORD PTR [rbp - 16], rax',
      'jmp .Lfirst.exit',
      '.Lfirst.exit:',
      'mov rax, QWORD PTR [rbp - 16]',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
  });

  it('parks the address of a computed assignment target', () => {
    const { asm } = compileToAsm(
      program(
        fn('set', [['p', '*i64']], 'unit', [exprStmt(assign(unary('*', name('p')), int(5)))]),
      ),
      { nullChecks: false },
    );
    expect(linesOf(asm, 'set')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 16',
      'mov QWORD PTR [rbp - 8], rdi',
      'mov rax, QWORD PTR [rbp - 8]',
      'mov QWORD PTR [rbp - 16], rax',
      'mov rax, 5',
      'mov rcx, QWORD PTR [rbp - 16]',
      'mov QWORD PTR [rcx], rax',
      '.Lset.exit:',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
  });

  it('passes arguments in registers through spill slots', () => {
    const { asm } = compileToAsm(
      program(
        extern(
          'add3',
          [
            ['a', 'i64'],
            ['b', 'i64'],
            ['c', 'i64'],
          ],
          'i64',
        ),
        fn('main', [], 'i64', [ret(call('add3', int(1), int(2), int(3)))]),
      ),
    );
    expect(linesOf(asm, 'main')).toEqual([
      'push rbp',
      'mov rbp, rsp',
      'sub rsp, 32',
      'mov rax, 0',
      'mov QWORD PTR [rbp - 8], rax',
      'mov rax, 1',
      'mov QWORD PTR [rbp - 16], rax',
      'mov rax, 2',
      'mov QWORD PTR [rbp - 24], rax',
      'mov rax, 3',
      'mov rdx, rax',
      'mov rdi, QWORD PTR [rbp - 16]',
      'mov rsi, QWORD PTR [rbp - 24]',
      'call add3@PLT',
      'mov QWORD PTR [rbp - 8], rax',
      'jmp .Lmain.exit',
      '.Lmain.exit:',
      'mov rax, QWORD PTR [rbp - 8]',
      'mov rsp, rbp',
      'pop rbp',
      'ret',
    ]);
  });

  it('calls functions of the same file without the PLT', () => {
    const { asm } = compileToAsm(
      program(
        fn('one', [], 'i64', [ret(int(1))]),
        fn('main', [], 'i64', [ret(call('one'))]),
      ),
    );
    expect(linesOf(asm, 'main')).toContain('call one');
  });

  it('numbers control-flow labels per function', () => {
    const { asm } = compileToAsm(
      program(
        fn('f', [['n', 'i64']], 'i64', [
          whileStmt(bin('>', name('n'), int(0)), [
            ifStmt(
              bin('==', name('n'), int(3)),
              [ret(name('n'))],
              [exprStmt(assign(name('n'), bin('-', name('n'), int(1))))],
            ),
          ]),
          ret(int(0)),
        ]),
      ),
    );
    const lines = linesOf(asm, 'f');
    expect(lines.filter((l) => l.endsWith(':'))).toEqual([
      '.Lf.while0:',
      '.Lf.else1:',
      '.Lf.endif1:',
      '.Lf.endwhile0:',
      '.Lf.exit:',
    ]);
    expect(lines).toContain('je .Lf.endwhile0');
    expect(lines).toContain('je .Lf.else1');
    expect(lines).toContain('jmp .Lf.endif1');
    expect(lines).toContain('jmp .Lf.while0');
  });

  it('zero-extends narrow arithmetic results', () => {
    const { asm } = compileToAsm(
      program(
        fn(
          'f',
          [
            ['a', 'u8'],
            ['b', 'u8'],
          ],
          'u8',
          [ret(bin('+', name('a'), name('b')))],
        ),
      ),
    );
    const lines = linesOf(asm, 'f');
    const add = lines.indexOf('add rax, rcx');
    expect(lines[add + 1]).toBe('movzx eax, al');
  });

  it('annotates statements with their source line', () => {
    const { asm } = compileToAsm(program(fn('main', [], 'i64', [at(ret(int(0)), 2, 3)])), {
      annotateSource: true,
      sources: new Map([['test.ska', 'fn main() i64 {\n  return 0;\n}\n']]),
    });
    expect(linesOf(asm, 'main').filter((l) => l.startsWith('#'))).toEqual([
      '# test.ska:1:1 | fn main() i64 {',
      '# test.ska:2:3 | return 0;',
      '# test.ska:2:3 | return 0;',
    ]);
  });

  it('is deterministic', () => {
    const p = program(
      extern('print_i64', [['v', 'i64']]),
      fn('main', [], 'i64', [exprStmt(call('print_i64', int(1))), ret(int(0))]),
    );
    expect(compileToAsm(p).asm).toBe(compileToAsm(p).asm);
  });

  it('reports a broken invariant as a single internal error', () => {
    const formats: FormatWriters = {
      ...defaultFormatWriters,
      writeAsm: () => {
        throw new InternalCompilerError('boom');
      },
    };
    const res = compile(program(fn('main', [], 'i64', [ret(int(0))])), {}, { formats });
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.InternalError,
        severity: 'error',
        message: 'Internal compiler error: boom',
        file: 'test.ska',
      },
    ]);
    expect(res.artifacts).toEqual([]);
  });
});
