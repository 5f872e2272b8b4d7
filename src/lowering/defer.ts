import type { SourceSpan } from '../frontend/ast.js';
import { InternalCompilerError } from '../diagnostics/types.js';
import type {
  LocalSymbol,
  TypedBlock,
  TypedCall,
  TypedDefer,
  TypedExpr,
  TypedFunction,
  TypedProgram,
  TypedStmt,
} from '../semantics/typed.js';
import type { Type } from '../semantics/types.js';
import type {
  NormalizedBlock,
  NormalizedFunction,
  NormalizedProgram,
  NormalizedStmt,
} from './normalized.js';

/**
 * Exit label shared by every return of a function.
 */
export function exitLabelFor(fnName: string): string {
  return `.L${fnName}.exit`;
}

function zeroValue(type: Type, span: SourceSpan): TypedExpr {
  switch (type.kind) {
    case 'i64':
    case 'u64':
    case 'u8':
      return { kind: 'IntLiteral', span, type, value: 0n };
    case 'bool':
      return { kind: 'BoolLiteral', span, type, value: false };
    case 'ptr':
      return { kind: 'NullLiteral', span, type };
    default:
      throw new InternalCompilerError(`No zero value for return type "${type.kind}".`);
  }
}

/**
 * A registered defer whose arguments have already been captured into hidden locals.
 */
type PendingCleanup = { span: SourceSpan; call: TypedCall };

/**
 * Rewrite one function into single-exit form.
 *
 * Each `return` stores its value into the hidden slot, runs the cleanups of every active scope
 * (innermost scope first, each scope in reverse registration order, counting only defers
 * registered before the return) and jumps to the exit label. Falling off the end of a block runs
 * that block's own cleanups only. The exit label itself runs nothing.
 */
export function normalizeFunction(fn: TypedFunction): NormalizedFunction {
  const { symbol } = fn;
  let nextSymbolId = fn.nextSymbolId;
  let captureCount = 0;
  const exitLabel = exitLabelFor(symbol.name);
  const active: PendingCleanup[][] = [];

  const hidden = (name: string, type: Type, span: SourceSpan): LocalSymbol => ({
    id: nextSymbolId++,
    name,
    type,
    storage: 'hidden',
    span,
  });

  const returnSlot =
    symbol.ret.kind === 'unit' ? undefined : hidden('ret', symbol.ret, symbol.span);

  const unwind = (pending: readonly PendingCleanup[]): NormalizedStmt[] =>
    [...pending].reverse().map((p): NormalizedStmt => ({ kind: 'Eval', span: p.span, expr: p.call }));

  const register = (stmt: TypedDefer, locals: LocalSymbol[]): NormalizedStmt[] => {
    const scope = active[active.length - 1];
    if (!scope) throw new InternalCompilerError('defer outside of any scope');
    const n = captureCount++;
    const out: NormalizedStmt[] = [];
    const args = stmt.call.args.map((arg, i): TypedExpr => {
      const capture = hidden(`defer.${n}.${i}`, arg.type, arg.span);
      locals.push(capture);
      out.push({ kind: 'VarInit', span: arg.span, symbol: capture, init: arg });
      return { kind: 'Local', span: arg.span, type: arg.type, symbol: capture };
    });
    scope.push({ span: stmt.span, call: { ...stmt.call, args } });
    return out;
  };

  const lowerReturn = (span: SourceSpan, value: TypedExpr | undefined): NormalizedStmt[] => {
    const out: NormalizedStmt[] = [];
    if (value) {
      if (returnSlot) {
        out.push({ kind: 'StoreReturn', span, slot: returnSlot, value });
      } else {
        out.push({ kind: 'Eval', span, expr: value });
      }
    }
    for (let i = active.length - 1; i >= 0; i--) {
      out.push(...unwind(active[i] ?? []));
    }
    out.push({ kind: 'Jump', span, label: exitLabel });
    return out;
  };

  type Lowered = { stmts: NormalizedStmt[]; terminates: boolean };

  const lowerStmt = (stmt: TypedStmt, locals: LocalSymbol[]): Lowered => {
    switch (stmt.kind) {
      case 'Block': {
        const inner = lowerBlock(stmt);
        return { stmts: [inner.block], terminates: inner.terminates };
      }
      case 'VarDecl':
        return {
          stmts: [{ kind: 'VarInit', span: stmt.span, symbol: stmt.symbol, init: stmt.init }],
          terminates: false,
        };
      case 'If': {
        const then = lowerBlock(stmt.then);
        const otherwise = stmt.else ? lowerBlock(stmt.else) : undefined;
        return {
          stmts: [
            {
              kind: 'If',
              span: stmt.span,
              cond: stmt.cond,
              then: then.block,
              ...(otherwise ? { else: otherwise.block } : {}),
            },
          ],
          terminates: then.terminates && (otherwise?.terminates ?? false),
        };
      }
      case 'While':
        return {
          stmts: [
            { kind: 'While', span: stmt.span, cond: stmt.cond, body: lowerBlock(stmt.body).block },
          ],
          terminates: false,
        };
      case 'Return':
        return { stmts: lowerReturn(stmt.span, stmt.value), terminates: true };
      case 'Defer':
        return { stmts: register(stmt, locals), terminates: false };
      case 'ExprStmt':
        return { stmts: [{ kind: 'Eval', span: stmt.span, expr: stmt.expr }], terminates: false };
    }
  };

  const lowerStmts = (block: TypedBlock): { block: NormalizedBlock; terminates: boolean } => {
    const locals = [...block.locals];
    const stmts: NormalizedStmt[] = [];
    let terminates = false;
    for (const stmt of block.stmts) {
      const lowered = lowerStmt(stmt, locals);
      stmts.push(...lowered.stmts);
      if (lowered.terminates) {
        // Anything after an unconditional return is unreachable.
        terminates = true;
        break;
      }
    }
    if (!terminates) stmts.push(...unwind(active[active.length - 1] ?? []));
    return { block: { kind: 'Block', span: block.span, stmts, locals }, terminates };
  };

  const lowerBlock = (block: TypedBlock): { block: NormalizedBlock; terminates: boolean } => {
    active.push([]);
    try {
      return lowerStmts(block);
    } finally {
      active.pop();
    }
  };

  const lowered = lowerBlock(fn.body);
  const body = lowered.block;
  if (returnSlot) {
    body.locals.unshift(returnSlot);
    body.stmts.unshift({
      kind: 'VarInit',
      span: symbol.span,
      symbol: returnSlot,
      init: zeroValue(returnSlot.type, symbol.span),
    });
  }

  return {
    symbol,
    params: fn.params,
    ...(returnSlot ? { returnSlot } : {}),
    exitLabel,
    body,
  };
}

export function normalizeProgram(program: TypedProgram): NormalizedProgram {
  return {
    entryFile: program.entryFile,
    env: program.env,
    functions: program.functions.map(normalizeFunction),
    externs: program.externs,
  };
}
