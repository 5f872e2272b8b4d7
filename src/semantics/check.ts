import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  ArithmeticOp,
  BinaryNode,
  BinaryOp,
  BlockNode,
  CallNode,
  ExprNode,
  FieldNode,
  FuncDeclNode,
  ProgramNode,
  StmtNode,
  UnaryNode,
} from '../frontend/ast.js';
import type { CompileEnv, FunctionSymbol } from './env.js';
import { diagAt, resolveTypeExpr } from './env.js';
import { findField } from './layout.js';
import type { Scope } from './scope.js';
import { ScopeStack } from './scope.js';
import type {
  LocalSymbol,
  TypedBlock,
  TypedCall,
  TypedExpr,
  TypedFunction,
  TypedPlace,
  TypedProgram,
  TypedStmt,
} from './typed.js';
import type { IntegerType, Type } from './types.js';
import {
  BOOL,
  integerRange,
  isInteger,
  isScalar,
  isSigned,
  ptr,
  typeName,
  typesEqual,
} from './types.js';

const arithmeticOps = new Set<BinaryOp>(['+', '-', '*', '/', '%']);
const relationalOps = new Set<BinaryOp>(['<', '<=', '>', '>=']);

function isArithmetic(op: BinaryOp): op is ArithmeticOp {
  return arithmeticOps.has(op);
}

/**
 * Expressions whose type comes from context: integer literals and `null`.
 */
function isContextual(expr: ExprNode): boolean {
  if (expr.kind === 'IntLiteral' || expr.kind === 'NullLiteral') return true;
  return expr.kind === 'Unary' && expr.op === '-' && isContextual(expr.expr);
}

function isLvalueShape(expr: ExprNode): boolean {
  return expr.kind === 'Name' || expr.kind === 'Field' || (expr.kind === 'Unary' && expr.op === '*');
}

function isPlace(expr: TypedExpr): expr is TypedPlace {
  return expr.kind === 'Local' || expr.kind === 'Deref' || expr.kind === 'Field';
}

/**
 * Type-check every function body of a program against its global tables.
 *
 * Diagnostics accumulate across functions; an expression that failed to check yields `undefined`
 * and its enclosing constructs skip their own checks instead of reporting follow-on errors.
 */
export function checkProgram(
  program: ProgramNode,
  env: CompileEnv,
  diagnostics: Diagnostic[],
): TypedProgram {
  const functions: TypedFunction[] = [];
  const externs: FunctionSymbol[] = [];

  for (const item of program.items) {
    if (item.kind === 'StructDecl') continue;
    const sig = env.functions.get(item.name);
    if (!sig) continue;
    if (item.kind === 'ExternFunc') {
      externs.push(sig);
      continue;
    }
    functions.push(checkFunction(item, sig, env, diagnostics));
  }

  return { entryFile: program.entryFile, env, functions, externs };
}

function checkFunction(
  fn: FuncDeclNode,
  sig: FunctionSymbol,
  env: CompileEnv,
  diagnostics: Diagnostic[],
): TypedFunction {
  const scopes = new ScopeStack();
  let nextSymbolId = 0;

  const declare = (
    name: string,
    type: Type,
    storage: LocalSymbol['storage'],
    span: LocalSymbol['span'],
  ): LocalSymbol | undefined => {
    const symbol: LocalSymbol = { id: nextSymbolId++, name, type, storage, span };
    if (!scopes.current.define(symbol)) {
      diagAt(
        diagnostics,
        DiagnosticIds.DuplicateDeclaration,
        span,
        `"${name}" is already declared in this scope.`,
      );
      return undefined;
    }
    return symbol;
  };

  const mismatch = (span: LocalSymbol['span'], message: string): undefined => {
    diagAt(diagnostics, DiagnosticIds.TypeMismatch, span, message);
    return undefined;
  };

  const closeBlock = (block: BlockNode, scope: Scope, stmts: TypedStmt[]): TypedBlock => ({
    kind: 'Block',
    span: block.span,
    stmts,
    locals: scope.locals.filter((s) => s.storage !== 'param'),
    defers: [...scope.defers],
  });

  const checkStmts = (block: BlockNode): TypedStmt[] => {
    const out: TypedStmt[] = [];
    for (const stmt of block.stmts) {
      const typed = checkStmt(stmt);
      if (typed) out.push(typed);
    }
    return out;
  };

  const checkBlock = (block: BlockNode): TypedBlock => {
    const scope = scopes.push();
    const stmts = checkStmts(block);
    scopes.pop();
    return closeBlock(block, scope, stmts);
  };

  const checkCondition = (expr: ExprNode, what: string): TypedExpr | undefined => {
    const cond = checkExpr(expr, BOOL);
    if (!cond) return undefined;
    if (cond.type.kind !== 'bool') {
      return mismatch(expr.span, `${what} condition must be bool, got ${typeName(cond.type)}.`);
    }
    return cond;
  };

  const checkStmt = (stmt: StmtNode): TypedStmt | undefined => {
    switch (stmt.kind) {
      case 'Block':
        return checkBlock(stmt);
      case 'VarDecl': {
        const declared = resolveTypeExpr(stmt.typeExpr, env.structs, diagnostics);
        if (declared?.kind === 'unit') {
          diagAt(
            diagnostics,
            DiagnosticIds.UnsupportedAbi,
            stmt.typeExpr.span,
            `Variable "${stmt.name}" cannot have type unit.`,
          );
          return undefined;
        }
        const init = checkExpr(stmt.init, declared);
        if (!declared || !init) return undefined;
        if (!typesEqual(init.type, declared)) {
          return mismatch(
            stmt.init.span,
            `Cannot initialize "${stmt.name}" of type ${typeName(declared)} with ${typeName(init.type)}.`,
          );
        }
        const symbol = declare(stmt.name, declared, 'local', stmt.span);
        if (!symbol) return undefined;
        return { kind: 'VarDecl', span: stmt.span, symbol, init };
      }
      case 'If': {
        const cond = checkCondition(stmt.cond, 'if');
        const then = checkBlock(stmt.then);
        const otherwise = stmt.else ? checkBlock(stmt.else) : undefined;
        if (!cond) return undefined;
        return {
          kind: 'If',
          span: stmt.span,
          cond,
          then,
          ...(otherwise ? { else: otherwise } : {}),
        };
      }
      case 'While': {
        const cond = checkCondition(stmt.cond, 'while');
        const body = checkBlock(stmt.body);
        if (!cond) return undefined;
        return { kind: 'While', span: stmt.span, cond, body };
      }
      case 'Return': {
        if (!stmt.value) {
          if (sig.ret.kind !== 'unit') {
            return mismatch(
              stmt.span,
              `Function "${sig.name}" must return a value of type ${typeName(sig.ret)}.`,
            );
          }
          return { kind: 'Return', span: stmt.span };
        }
        const value = checkExpr(stmt.value, sig.ret);
        if (!value) return undefined;
        if (!typesEqual(value.type, sig.ret)) {
          return mismatch(
            stmt.value.span,
            `Function "${sig.name}" returns ${typeName(sig.ret)}, got ${typeName(value.type)}.`,
          );
        }
        return { kind: 'Return', span: stmt.span, value };
      }
      case 'Defer': {
        const call = checkCall(stmt.call);
        if (!call) return undefined;
        const typed = { kind: 'Defer' as const, span: stmt.span, call };
        scopes.current.defers.push(typed);
        return typed;
      }
      case 'ExprStmt': {
        const expr = checkExpr(stmt.expr);
        return expr ? { kind: 'ExprStmt', span: stmt.span, expr } : undefined;
      }
    }
  };

  const checkCall = (call: CallNode): TypedCall | undefined => {
    if (scopes.lookup(call.callee)) {
      return mismatch(call.span, `"${call.callee}" is a variable, not a function.`);
    }
    const callee = env.functions.get(call.callee);
    if (!callee) {
      diagAt(
        diagnostics,
        DiagnosticIds.UndefinedSymbol,
        call.span,
        `Unknown function "${call.callee}".`,
      );
      for (const arg of call.args) checkExpr(arg);
      return undefined;
    }

    let ok = true;
    if (call.args.length !== callee.params.length) {
      diagAt(
        diagnostics,
        DiagnosticIds.ArityMismatch,
        call.span,
        `Function "${callee.name}" expects ${callee.params.length} argument${
          callee.params.length === 1 ? '' : 's'
        }, got ${call.args.length}.`,
      );
      ok = false;
    }

    const args: TypedExpr[] = [];
    call.args.forEach((argNode, index) => {
      const param = callee.params[index];
      const arg = checkExpr(argNode, param?.type);
      if (!arg) {
        ok = false;
        return;
      }
      if (param && !typesEqual(arg.type, param.type)) {
        mismatch(
          argNode.span,
          `Argument ${index + 1} of "${callee.name}" expects ${typeName(param.type)}, got ${typeName(arg.type)}.`,
        );
        ok = false;
        return;
      }
      args.push(arg);
    });
    if (!ok) return undefined;
    return { kind: 'Call', span: call.span, type: callee.ret, callee, args };
  };

  const checkUnary = (expr: UnaryNode, expected: Type | undefined): TypedExpr | undefined => {
    switch (expr.op) {
      case '-': {
        const literalType = expected && isInteger(expected) ? expected : undefined;
        if (expr.expr.kind === 'IntLiteral' && (!literalType || isSigned(literalType))) {
          // A negated literal is range-checked as one value.
          return checkExpr({ ...expr.expr, span: expr.span, value: -expr.expr.value }, literalType);
        }
        const operand = checkExpr(expr.expr, literalType);
        if (!operand) return undefined;
        if (!isInteger(operand.type)) {
          return mismatch(expr.span, `Unary "-" expects an integer, got ${typeName(operand.type)}.`);
        }
        return { kind: 'Unary', span: expr.span, type: operand.type, op: '-', operand };
      }
      case '!': {
        const operand = checkExpr(expr.expr, BOOL);
        if (!operand) return undefined;
        if (operand.type.kind !== 'bool') {
          return mismatch(expr.span, `Unary "!" expects bool, got ${typeName(operand.type)}.`);
        }
        return { kind: 'Unary', span: expr.span, type: BOOL, op: '!', operand };
      }
      case '*': {
        const pointer = checkExpr(expr.expr);
        if (!pointer) return undefined;
        if (pointer.type.kind !== 'ptr') {
          return mismatch(expr.span, `Cannot dereference non-pointer type ${typeName(pointer.type)}.`);
        }
        if (pointer.type.to.kind === 'unit') {
          return mismatch(expr.span, `Cannot dereference ${typeName(pointer.type)}.`);
        }
        return { kind: 'Deref', span: expr.span, type: pointer.type.to, pointer };
      }
      case '&': {
        if (!isLvalueShape(expr.expr)) {
          diagAt(
            diagnostics,
            DiagnosticIds.InvalidLValue,
            expr.expr.span,
            'Address-of requires a variable, dereference or field access.',
          );
          return undefined;
        }
        const place = checkExpr(expr.expr);
        if (!place) return undefined;
        if (!isPlace(place)) {
          diagAt(
            diagnostics,
            DiagnosticIds.InvalidLValue,
            expr.expr.span,
            'Address-of requires a variable, dereference or field access.',
          );
          return undefined;
        }
        return { kind: 'AddressOf', span: expr.span, type: ptr(place.type), place };
      }
    }
  };

  const checkBinary = (expr: BinaryNode, expected: Type | undefined): TypedExpr | undefined => {
    const { op } = expr;
    if (op === '&&' || op === '||') {
      const left = checkExpr(expr.left, BOOL);
      const right = checkExpr(expr.right, BOOL);
      if (!left || !right) return undefined;
      if (left.type.kind !== 'bool' || right.type.kind !== 'bool') {
        return mismatch(
          expr.span,
          `Operator "${op}" requires bool operands, got ${typeName(left.type)} and ${typeName(right.type)}.`,
        );
      }
      return { kind: 'Logical', span: expr.span, type: BOOL, op, left, right };
    }

    // Literals and null take their type from the other operand.
    const hint = isArithmetic(op) && expected && isInteger(expected) ? expected : undefined;
    let left: TypedExpr | undefined;
    let right: TypedExpr | undefined;
    if (isContextual(expr.left) && !isContextual(expr.right)) {
      right = checkExpr(expr.right);
      left = checkExpr(expr.left, right?.type);
    } else {
      left = checkExpr(expr.left, isContextual(expr.left) ? hint : undefined);
      right = checkExpr(expr.right, left?.type ?? hint);
    }
    if (!left || !right) return undefined;

    const operands = `${typeName(left.type)} and ${typeName(right.type)}`;
    if (isArithmetic(op) || relationalOps.has(op)) {
      if (!isInteger(left.type) || !typesEqual(left.type, right.type)) {
        return mismatch(
          expr.span,
          `Operator "${op}" requires matching integer operands, got ${operands}.`,
        );
      }
    } else if (!isScalar(left.type) || !typesEqual(left.type, right.type)) {
      return mismatch(
        expr.span,
        `Operator "${op}" requires operands of the same scalar type, got ${operands}.`,
      );
    }

    const type = isArithmetic(op) ? left.type : BOOL;
    return { kind: 'Binary', span: expr.span, type, op, operandType: left.type, left, right };
  };

  const checkField = (expr: FieldNode): TypedExpr | undefined => {
    const base = checkExpr(expr.base);
    if (!base) return undefined;
    const through = base.type.kind === 'ptr' ? 'pointer' : 'value';
    const target = base.type.kind === 'ptr' ? base.type.to : base.type;
    if (target.kind !== 'struct') {
      return mismatch(
        expr.span,
        `Field access ".${expr.name}" requires a struct or pointer to struct, got ${typeName(base.type)}.`,
      );
    }
    const layout = env.layouts.get(target.name);
    const field = layout ? findField(layout, expr.name) : undefined;
    if (!field) {
      diagAt(
        diagnostics,
        DiagnosticIds.UnknownField,
        expr.span,
        `Struct "${target.name}" has no field "${expr.name}".`,
      );
      return undefined;
    }
    return {
      kind: 'Field',
      span: expr.span,
      type: field.type,
      base,
      through,
      structName: target.name,
      field,
    };
  };

  const checkExpr = (expr: ExprNode, expected?: Type): TypedExpr | undefined => {
    switch (expr.kind) {
      case 'IntLiteral': {
        const type: IntegerType = expected && isInteger(expected) ? expected : { kind: 'i64' };
        const range = integerRange(type);
        if (expr.value < range.min || expr.value > range.max) {
          return mismatch(
            expr.span,
            `Integer literal ${expr.value} does not fit in ${typeName(type)}.`,
          );
        }
        return { kind: 'IntLiteral', span: expr.span, type, value: expr.value };
      }
      case 'BoolLiteral':
        return { kind: 'BoolLiteral', span: expr.span, type: BOOL, value: expr.value };
      case 'NullLiteral':
        if (expected && expected.kind === 'ptr') {
          return { kind: 'NullLiteral', span: expr.span, type: expected };
        }
        diagAt(
          diagnostics,
          DiagnosticIds.InvalidNullContext,
          expr.span,
          expected
            ? `null cannot be used as ${typeName(expected)}; only pointer types accept null.`
            : 'null is only allowed where a pointer type is expected.',
        );
        return undefined;
      case 'Name': {
        const symbol = scopes.lookup(expr.name);
        if (symbol) return { kind: 'Local', span: expr.span, type: symbol.type, symbol };
        if (env.functions.has(expr.name)) {
          return mismatch(expr.span, `Function "${expr.name}" cannot be used as a value.`);
        }
        diagAt(
          diagnostics,
          DiagnosticIds.UndefinedSymbol,
          expr.span,
          `Unknown variable "${expr.name}".`,
        );
        return undefined;
      }
      case 'Unary':
        return checkUnary(expr, expected);
      case 'Binary':
        return checkBinary(expr, expected);
      case 'Call':
        return checkCall(expr);
      case 'Field':
        return checkField(expr);
      case 'Assign': {
        if (!isLvalueShape(expr.target)) {
          diagAt(
            diagnostics,
            DiagnosticIds.InvalidLValue,
            expr.target.span,
            'Assignment target must be a variable, dereference or field access.',
          );
          checkExpr(expr.value);
          return undefined;
        }
        const target = checkExpr(expr.target);
        const value = checkExpr(expr.value, target?.type);
        if (!target || !value) return undefined;
        if (!isPlace(target)) {
          diagAt(
            diagnostics,
            DiagnosticIds.InvalidLValue,
            expr.target.span,
            'Assignment target must be a variable, dereference or field access.',
          );
          return undefined;
        }
        if (!typesEqual(target.type, value.type)) {
          return mismatch(
            expr.value.span,
            `Cannot assign ${typeName(value.type)} to ${typeName(target.type)}.`,
          );
        }
        return { kind: 'Assign', span: expr.span, type: target.type, target, value };
      }
    }
  };

  const outer = scopes.push();
  const params: LocalSymbol[] = [];
  for (const p of sig.params) {
    const symbol = declare(p.name, p.type, 'param', p.span);
    if (symbol) params.push(symbol);
  }
  const stmts = checkStmts(fn.body);
  scopes.pop();

  return {
    symbol: sig,
    params,
    body: closeBlock(fn.body, outer, stmts),
    nextSymbolId,
  };
}
