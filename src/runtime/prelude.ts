import type { ExternFuncNode, ProgramNode, SourceSpan, TypeExprNode } from '../frontend/ast.js';
import { fileStartSpan } from '../frontend/source.js';

/**
 * Runtime fatal primitive called by null checks with the faulting line and column.
 */
export const NULL_DEREF_PANIC = '__ska_panic_null_deref';

/**
 * Signature of a runtime-provided function, with types written as in source (`*u8`).
 */
export interface RuntimeFunction {
  name: string;
  params: readonly (readonly [name: string, type: string])[];
  ret: string;
}

/**
 * User-callable functions of the runtime library.
 */
export const RUNTIME_FUNCTIONS: readonly RuntimeFunction[] = [
  { name: 'print_i64', params: [['x', 'i64']], ret: 'unit' },
  { name: 'print_u64', params: [['x', 'u64']], ret: 'unit' },
  { name: 'print_u8', params: [['x', 'u8']], ret: 'unit' },
  { name: 'print_bool', params: [['x', 'bool']], ret: 'unit' },
  { name: 'read_i64', params: [], ret: 'i64' },
  { name: 'read_u64', params: [], ret: 'u64' },
  { name: 'read_u8', params: [], ret: 'u8' },
  { name: 'read_bool', params: [], ret: 'bool' },
  { name: 'malloc_u64', params: [['size', 'u64']], ret: '*u8' },
  { name: 'free_ptr', params: [['p', '*u8']], ret: 'unit' },
  { name: 'realloc_ptr', params: [['p', '*u8'], ['size', 'u64']], ret: '*u8' },
];

function typeExpr(text: string, span: SourceSpan): TypeExprNode {
  if (text.startsWith('*')) return { kind: 'PointerType', span, to: typeExpr(text.slice(1), span) };
  return { kind: 'TypeName', span, name: text };
}

export function externDecl(fn: RuntimeFunction, span: SourceSpan): ExternFuncNode {
  return {
    kind: 'ExternFunc',
    span,
    name: fn.name,
    params: fn.params.map(([name, type]) => ({
      kind: 'Param',
      span,
      name,
      typeExpr: typeExpr(type, span),
    })),
    returnType: typeExpr(fn.ret, span),
  };
}

/**
 * Prepend `extern` declarations for runtime functions the program does not declare itself.
 */
export function withRuntimePrelude(program: ProgramNode): ProgramNode {
  const declared = new Set(
    program.items.filter((item) => item.kind !== 'StructDecl').map((item) => item.name),
  );
  const span = fileStartSpan(program.entryFile);
  const prelude = RUNTIME_FUNCTIONS.filter((fn) => !declared.has(fn.name)).map((fn) =>
    externDecl(fn, span),
  );
  return { ...program, items: [...prelude, ...program.items] };
}
