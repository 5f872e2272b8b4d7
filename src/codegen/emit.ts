import { InternalCompilerError } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/ast.js';
import { lineText, makeSourceFile } from '../frontend/source.js';
import type { SourceFile } from '../frontend/source.js';
import type { AsmTraceEntry, EmittedAsm, EmittedFunction } from '../formats/types.js';
import type {
  NormalizedBlock,
  NormalizedFunction,
  NormalizedProgram,
  NormalizedStmt,
} from '../lowering/normalized.js';
import { NULL_DEREF_PANIC } from '../runtime/prelude.js';
import type {
  LocalSymbol,
  TypedBinary,
  TypedCall,
  TypedExpr,
  TypedField,
  TypedPlace,
} from '../semantics/typed.js';
import { isSigned } from '../semantics/types.js';
import type { Type } from '../semantics/types.js';
import { planFrame, slotFor, spillOffset, storageOf } from './frame.js';

export const ARG_REGISTERS = ['rdi', 'rsi', 'rdx', 'rcx', 'r8', 'r9'] as const;

const BYTE_REGISTERS: Record<string, string> = {
  rax: 'al',
  rcx: 'cl',
  rdx: 'dl',
  rdi: 'dil',
  rsi: 'sil',
  r8: 'r8b',
  r9: 'r9b',
};

export interface CodegenOptions {
  /** Test pointers before every dereference and call the runtime's fatal primitive on null. */
  nullChecks: boolean;
  /** Emit a `# file:line:col | text` comment before each statement. */
  annotateSource: boolean;
  /** Source texts by file, for annotation. */
  sources?: ReadonlyMap<string, string>;
}

function argRegister(index: number): string {
  const reg = ARG_REGISTERS[index];
  if (!reg) throw new InternalCompilerError(`No argument register for position ${index}.`);
  return reg;
}

function byteRegister(reg: string): string {
  const b = BYTE_REGISTERS[reg];
  if (!b) throw new InternalCompilerError(`No byte form for register "${reg}".`);
  return b;
}

function mem(base: string, offset: number): string {
  if (offset === 0) return `[${base}]`;
  return offset > 0 ? `[${base} + ${offset}]` : `[${base} - ${-offset}]`;
}

const frameMem = (offset: number): string => mem('rbp', -offset);

/**
 * Lower every function of a normalized program to x86-64 (System V, Intel syntax) trace entries.
 */
export function emitProgram(program: NormalizedProgram, options: CodegenOptions): EmittedAsm {
  const { layouts } = program.env;
  const externNames = new Set(program.externs.map((e) => e.name));
  const usedExterns = new Set<string>();
  const sourceFiles = new Map<string, SourceFile>();

  const sourceFor = (file: string): SourceFile | undefined => {
    const cached = sourceFiles.get(file);
    if (cached) return cached;
    const text = options.sources?.get(file);
    if (text === undefined) return undefined;
    const sf = makeSourceFile(file, text);
    sourceFiles.set(file, sf);
    return sf;
  };

  const annotation = (span: SourceSpan): string => {
    const loc = `${span.file}:${span.start.line}:${span.start.column}`;
    const sf = sourceFor(span.file);
    const text = sf ? lineText(sf, span.start.line)?.trim() : undefined;
    return text ? `${loc} | ${text}` : loc;
  };

  const sizeOf = (type: Type): number => storageOf(type, layouts).size;

  const emitFunction = (fn: NormalizedFunction): EmittedFunction => {
    const trace: AsmTraceEntry[] = [];
    const frame = planFrame(fn, layouts);
    const fnName = fn.symbol.name;
    let labelCounter = 0;

    const emitInstr = (text: string): void => {
      trace.push({ kind: 'instruction', text });
    };
    const emitComment = (text: string): void => {
      trace.push({ kind: 'comment', text });
    };
    const defineCodeLabel = (name: string): void => {
      trace.push({ kind: 'label', name });
    };
    const newHiddenLabel = (kind: string): string => `.L${fnName}.${kind}${labelCounter++}`;
    const emitJumpTo = (label: string): void => emitInstr(`jmp ${label}`);
    const emitJumpIfFalse = (label: string): void => {
      emitInstr('test rax, rax');
      emitInstr(`je ${label}`);
    };

    const emitCall = (name: string): void => {
      if (externNames.has(name) || name === NULL_DEREF_PANIC) {
        usedExterns.add(name);
        emitInstr(`call ${name}@PLT`);
        return;
      }
      emitInstr(`call ${name}`);
    };

    // Values narrower than a register are kept zero-extended in rax.
    const loadFrom = (type: Type, address: string): void => {
      if (sizeOf(type) === 1) {
        emitInstr(`movzx eax, BYTE PTR ${address}`);
      } else {
        emitInstr(`mov rax, QWORD PTR ${address}`);
      }
    };
    const storeTo = (type: Type, address: string, reg = 'rax'): void => {
      if (sizeOf(type) === 1) {
        emitInstr(`mov BYTE PTR ${address}, ${byteRegister(reg)}`);
      } else {
        emitInstr(`mov QWORD PTR ${address}, ${reg}`);
      }
    };

    /** Copy a struct from the address in `rax` to the address in `rcx`. */
    const copyStruct = (type: Type): void => {
      const size = sizeOf(type);
      let offset = 0;
      for (; offset + 8 <= size; offset += 8) {
        emitInstr(`mov rdx, QWORD PTR ${mem('rax', offset)}`);
        emitInstr(`mov QWORD PTR ${mem('rcx', offset)}, rdx`);
      }
      for (; offset < size; offset++) {
        emitInstr(`mov dl, BYTE PTR ${mem('rax', offset)}`);
        emitInstr(`mov BYTE PTR ${mem('rcx', offset)}, dl`);
      }
    };

    const emitNullCheck = (span: SourceSpan): void => {
      if (!options.nullChecks) return;
      const ok = newHiddenLabel('nonnull');
      emitInstr('test rax, rax');
      emitInstr(`jne ${ok}`);
      emitInstr(`mov edi, ${span.start.line}`);
      emitInstr(`mov esi, ${span.start.column}`);
      emitCall(NULL_DEREF_PANIC);
      defineCodeLabel(ok);
    };

    const spill = (depth: number): void => {
      emitInstr(`mov QWORD PTR ${frameMem(spillOffset(frame, depth))}, rax`);
    };
    const reload = (reg: string, depth: number): void => {
      emitInstr(`mov ${reg}, QWORD PTR ${frameMem(spillOffset(frame, depth))}`);
    };

    const localAddress = (symbol: LocalSymbol): string => frameMem(slotFor(frame, symbol).offset);

    /** Base address of a field's struct, null-checked when reached through a pointer. */
    const fieldBase = (field: TypedField, depth: number): void => {
      emitExpr(field.base, depth);
      if (field.through === 'pointer') emitNullCheck(field.span);
    };

    /** Address of a place into `rax`. */
    const emitAddress = (place: TypedPlace, depth: number): void => {
      switch (place.kind) {
        case 'Local':
          emitInstr(`lea rax, ${localAddress(place.symbol)}`);
          return;
        case 'Deref':
          emitExpr(place.pointer, depth);
          emitNullCheck(place.span);
          return;
        case 'Field':
          fieldBase(place, depth);
          if (place.field.offset !== 0) emitInstr(`add rax, ${place.field.offset}`);
          return;
      }
    };

    const emitBinary = (expr: TypedBinary, depth: number): void => {
      emitExpr(expr.left, depth);
      spill(depth);
      emitExpr(expr.right, depth + 1);
      emitInstr('mov rcx, rax');
      reload('rax', depth);

      const signed = isSigned(expr.operandType);
      const setcc = (signedCc: string, unsignedCc: string): void => {
        emitInstr('cmp rax, rcx');
        emitInstr(`set${signed ? signedCc : unsignedCc} al`);
        emitInstr('movzx eax, al');
      };
      switch (expr.op) {
        case '+':
          emitInstr('add rax, rcx');
          break;
        case '-':
          emitInstr('sub rax, rcx');
          break;
        case '*':
          emitInstr('imul rax, rcx');
          break;
        case '/':
        case '%':
          if (signed) {
            emitInstr('cqo');
            emitInstr('idiv rcx');
          } else {
            emitInstr('xor edx, edx');
            emitInstr('div rcx');
          }
          if (expr.op === '%') emitInstr('mov rax, rdx');
          break;
        case '<':
          setcc('l', 'b');
          return;
        case '<=':
          setcc('le', 'be');
          return;
        case '>':
          setcc('g', 'a');
          return;
        case '>=':
          setcc('ge', 'ae');
          return;
        case '==':
          setcc('e', 'e');
          return;
        case '!=':
          setcc('ne', 'ne');
          return;
      }
      if (expr.type.kind === 'u8') emitInstr('movzx eax, al');
    };

    const emitCallExpr = (call: TypedCall, depth: number): void => {
      const { args } = call;
      args.forEach((arg, i) => {
        emitExpr(arg, depth + i);
        if (i < args.length - 1) {
          spill(depth + i);
        } else {
          emitInstr(`mov ${argRegister(i)}, rax`);
        }
      });
      for (let i = 0; i < args.length - 1; i++) reload(argRegister(i), depth + i);
      emitCall(call.callee.name);
      // Only the low byte of a narrow return value is defined.
      if (call.type.kind !== 'unit' && sizeOf(call.type) === 1) emitInstr('movzx eax, al');
    };

    /**
     * Evaluate into `rax`. Struct-typed expressions yield their address. Spill slots below
     * `depth` belong to enclosing expressions.
     */
    const emitExpr = (expr: TypedExpr, depth: number): void => {
      switch (expr.kind) {
        case 'IntLiteral':
          emitInstr(`mov rax, ${expr.value.toString()}`);
          return;
        case 'BoolLiteral':
          emitInstr(`mov rax, ${expr.value ? 1 : 0}`);
          return;
        case 'NullLiteral':
          emitInstr('mov rax, 0');
          return;
        case 'Local':
          if (expr.type.kind === 'struct') {
            emitInstr(`lea rax, ${localAddress(expr.symbol)}`);
          } else {
            loadFrom(expr.type, localAddress(expr.symbol));
          }
          return;
        case 'Unary':
          emitExpr(expr.operand, depth);
          if (expr.op === '!') {
            emitInstr('xor rax, 1');
          } else {
            emitInstr('neg rax');
            if (expr.type.kind === 'u8') emitInstr('movzx eax, al');
          }
          return;
        case 'Deref':
          emitExpr(expr.pointer, depth);
          emitNullCheck(expr.span);
          if (expr.type.kind !== 'struct') loadFrom(expr.type, '[rax]');
          return;
        case 'AddressOf':
          emitAddress(expr.place, depth);
          return;
        case 'Binary':
          emitBinary(expr, depth);
          return;
        case 'Logical': {
          const end = newHiddenLabel(expr.op === '&&' ? 'and' : 'or');
          emitExpr(expr.left, depth);
          emitInstr('test rax, rax');
          // rax already holds the result when the right side is skipped.
          emitInstr(`${expr.op === '&&' ? 'je' : 'jne'} ${end}`);
          emitExpr(expr.right, depth);
          defineCodeLabel(end);
          return;
        }
        case 'Call':
          emitCallExpr(expr, depth);
          return;
        case 'Field': {
          fieldBase(expr, depth);
          const { offset } = expr.field;
          if (expr.type.kind === 'struct') {
            if (offset !== 0) emitInstr(`add rax, ${offset}`);
          } else {
            loadFrom(expr.type, mem('rax', offset));
          }
          return;
        }
        case 'Assign': {
          const { target, value } = expr;
          if (target.kind === 'Local') {
            emitExpr(value, depth);
            if (target.type.kind === 'struct') {
              emitInstr(`lea rcx, ${localAddress(target.symbol)}`);
              copyStruct(target.type);
              emitInstr('mov rax, rcx');
            } else {
              storeTo(target.type, localAddress(target.symbol));
            }
            return;
          }
          emitAddress(target, depth);
          spill(depth);
          emitExpr(value, depth + 1);
          reload('rcx', depth);
          if (target.type.kind === 'struct') {
            copyStruct(target.type);
            emitInstr('mov rax, rcx');
          } else {
            storeTo(target.type, '[rcx]');
          }
          return;
        }
      }
    };

    const storeLocal = (symbol: LocalSymbol, init: TypedExpr): void => {
      emitExpr(init, 0);
      if (symbol.type.kind === 'struct') {
        emitInstr(`lea rcx, ${localAddress(symbol)}`);
        copyStruct(symbol.type);
      } else {
        storeTo(symbol.type, localAddress(symbol));
      }
    };

    const emitBlock = (block: NormalizedBlock): void => {
      block.stmts.forEach(emitStmt);
    };

    const emitStmt = (stmt: NormalizedStmt): void => {
      if (stmt.kind !== 'Block' && options.annotateSource) emitComment(annotation(stmt.span));
      switch (stmt.kind) {
        case 'Block':
          emitBlock(stmt);
          return;
        case 'VarInit':
          storeLocal(stmt.symbol, stmt.init);
          return;
        case 'If': {
          const n = labelCounter++;
          const elseLabel = `.L${fnName}.else${n}`;
          const endLabel = `.L${fnName}.endif${n}`;
          emitExpr(stmt.cond, 0);
          emitJumpIfFalse(stmt.else ? elseLabel : endLabel);
          emitBlock(stmt.then);
          if (stmt.else) {
            emitJumpTo(endLabel);
            defineCodeLabel(elseLabel);
            emitBlock(stmt.else);
          }
          defineCodeLabel(endLabel);
          return;
        }
        case 'While': {
          const n = labelCounter++;
          const condLabel = `.L${fnName}.while${n}`;
          const endLabel = `.L${fnName}.endwhile${n}`;
          defineCodeLabel(condLabel);
          emitExpr(stmt.cond, 0);
          emitJumpIfFalse(endLabel);
          emitBlock(stmt.body);
          emitJumpTo(condLabel);
          defineCodeLabel(endLabel);
          return;
        }
        case 'Eval':
          emitExpr(stmt.expr, 0);
          return;
        case 'StoreReturn':
          storeLocal(stmt.slot, stmt.value);
          return;
        case 'Jump':
          emitJumpTo(stmt.label);
          return;
      }
    };

    emitInstr('push rbp');
    emitInstr('mov rbp, rsp');
    if (frame.size > 0) emitInstr(`sub rsp, ${frame.size}`);
    fn.params.forEach((param, i) => storeTo(param.type, localAddress(param), argRegister(i)));

    emitBlock(fn.body);

    defineCodeLabel(fn.exitLabel);
    if (fn.returnSlot) loadFrom(fn.returnSlot.type, localAddress(fn.returnSlot));
    emitInstr('mov rsp, rbp');
    emitInstr('pop rbp');
    emitInstr('ret');

    return { name: fnName, trace };
  };

  const functions = program.functions.map(emitFunction);
  return {
    entryFile: program.entryFile,
    externs: [...usedExterns].sort(),
    functions,
  };
}
