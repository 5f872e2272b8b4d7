import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds, hasErrors } from '../diagnostics/types.js';
import type {
  ExternFuncNode,
  FuncDeclNode,
  ParamNode,
  ProgramNode,
  SourceSpan,
  StructDeclNode,
  TypeExprNode,
} from '../frontend/ast.js';
import type { StructLayout, StructShape } from './layout.js';
import { computeLayouts } from './layout.js';
import type { Type } from './types.js';
import { builtinType, ptr, struct, typeName } from './types.js';

/** Integer argument registers available to the calling convention. */
export const MAX_REGISTER_ARGS = 6;

export interface FunctionSymbol {
  name: string;
  params: { name: string; type: Type; span: SourceSpan }[];
  ret: Type;
  storage: 'function' | 'extern';
  span: SourceSpan;
}

/**
 * Global tables of one compilation unit. Built once by {@link buildEnv}, read-only afterwards.
 */
export interface CompileEnv {
  /** Map of struct name -> declaration, in declaration order. */
  structs: ReadonlyMap<string, StructDeclNode>;
  /** Map of struct name -> computed layout. */
  layouts: ReadonlyMap<string, StructLayout>;
  /** Map of function and extern function name -> signature. */
  functions: ReadonlyMap<string, FunctionSymbol>;
}

export function diagAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

/**
 * Resolve a source type expression against builtins and the declared struct names.
 */
export function resolveTypeExpr(
  typeExpr: TypeExprNode,
  structNames: ReadonlySet<string> | ReadonlyMap<string, unknown>,
  diagnostics: Diagnostic[],
): Type | undefined {
  switch (typeExpr.kind) {
    case 'PointerType': {
      const to = resolveTypeExpr(typeExpr.to, structNames, diagnostics);
      return to ? ptr(to) : undefined;
    }
    case 'TypeName': {
      const builtin = builtinType(typeExpr.name);
      if (builtin) return builtin;
      if (structNames.has(typeExpr.name)) return struct(typeExpr.name);
      diagAt(
        diagnostics,
        DiagnosticIds.UndefinedSymbol,
        typeExpr.span,
        `Unknown type "${typeExpr.name}".`,
      );
      return undefined;
    }
  }
}

function resolveSignature(
  fn: FuncDeclNode | ExternFuncNode,
  structNames: ReadonlySet<string>,
  diagnostics: Diagnostic[],
): FunctionSymbol | undefined {
  const what = fn.kind === 'ExternFunc' ? 'extern function' : 'function';
  let ok = true;

  if (fn.params.length > MAX_REGISTER_ARGS) {
    diagAt(
      diagnostics,
      DiagnosticIds.UnsupportedAbi,
      fn.span,
      `${what} "${fn.name}" takes ${fn.params.length} parameters; at most ${MAX_REGISTER_ARGS} are passed in registers.`,
    );
    ok = false;
  }

  const seen = new Set<string>();
  const params: FunctionSymbol['params'] = [];
  for (const p of fn.params) {
    if (seen.has(p.name)) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateDeclaration,
        p.span,
        `Duplicate parameter "${p.name}" in ${what} "${fn.name}".`,
      );
      ok = false;
    }
    seen.add(p.name);
    const type = resolveParamType(p, fn.name, structNames, diagnostics);
    if (!type) {
      ok = false;
      continue;
    }
    params.push({ name: p.name, type, span: p.span });
  }

  const ret = resolveTypeExpr(fn.returnType, structNames, diagnostics);
  if (ret?.kind === 'struct') {
    diagAt(
      diagnostics,
      DiagnosticIds.UnsupportedAbi,
      fn.returnType.span,
      `${what} "${fn.name}" returns struct "${ret.name}" by value; return a pointer instead.`,
    );
    ok = false;
  }
  if (!ret || !ok) return undefined;

  return {
    name: fn.name,
    params,
    ret,
    storage: fn.kind === 'ExternFunc' ? 'extern' : 'function',
    span: fn.span,
  };
}

function resolveParamType(
  p: ParamNode,
  fnName: string,
  structNames: ReadonlySet<string>,
  diagnostics: Diagnostic[],
): Type | undefined {
  const type = resolveTypeExpr(p.typeExpr, structNames, diagnostics);
  if (!type) return undefined;
  if (type.kind === 'struct' || type.kind === 'unit') {
    diagAt(
      diagnostics,
      DiagnosticIds.UnsupportedAbi,
      p.span,
      `Parameter "${p.name}" of "${fnName}" has type ${typeName(type)}, which is not passed in a register.`,
    );
    return undefined;
  }
  return type;
}

/**
 * Build the global tables for a program.
 *
 * Pass 1 collects every struct and function signature (so bodies and pointer fields may refer
 * forward); pass 2 computes struct layouts. Layouts are skipped when pass 1 reported errors.
 */
export function buildEnv(program: ProgramNode, diagnostics: Diagnostic[]): CompileEnv {
  const structs = new Map<string, StructDeclNode>();
  const functions = new Map<string, FunctionSymbol>();
  const empty: CompileEnv = { structs, layouts: new Map(), functions };

  for (const item of program.items) {
    if (item.kind !== 'StructDecl') continue;
    if (structs.has(item.name)) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateDeclaration,
        item.span,
        `Duplicate struct "${item.name}".`,
      );
      continue;
    }
    structs.set(item.name, item);
  }
  const structNames = new Set(structs.keys());

  const shapes: StructShape[] = [];
  for (const decl of structs.values()) {
    const fields: StructShape['fields'] = [];
    const seen = new Set<string>();
    for (const f of decl.fields) {
      if (seen.has(f.name)) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateDeclaration,
          f.span,
          `Duplicate field "${f.name}" in struct "${decl.name}".`,
        );
        continue;
      }
      seen.add(f.name);
      const type = resolveTypeExpr(f.typeExpr, structNames, diagnostics);
      if (!type) continue;
      if (type.kind === 'unit') {
        diagAt(
          diagnostics,
          DiagnosticIds.UnsupportedAbi,
          f.span,
          `Field "${f.name}" of struct "${decl.name}" cannot have type unit.`,
        );
        continue;
      }
      fields.push({ name: f.name, type });
    }
    shapes.push({ name: decl.name, span: decl.span, fields });
  }

  for (const item of program.items) {
    if (item.kind === 'StructDecl') continue;
    const prev = functions.get(item.name);
    if (prev) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateDeclaration,
        item.span,
        `Duplicate function "${item.name}" (previously declared at ${prev.span.file}:${prev.span.start.line}).`,
      );
      continue;
    }
    const sig = resolveSignature(item, structNames, diagnostics);
    if (sig) functions.set(item.name, sig);
  }

  if (hasErrors(diagnostics)) return empty;

  const layouts = computeLayouts(shapes, diagnostics);
  return { structs, layouts, functions };
}
