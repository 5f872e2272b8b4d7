/**
 * Annotated tree produced by the analyzer.
 *
 * Every expression carries its resolved `type`, computed once during checking; later stages read
 * it and never re-derive it. Names are already resolved: locals point at their {@link LocalSymbol}
 * and calls at their {@link FunctionSymbol}.
 */
import type {
  ArithmeticOp,
  EqualityOp,
  LogicalOp,
  RelationalOp,
  SourceSpan,
} from '../frontend/ast.js';
import type { CompileEnv, FunctionSymbol } from './env.js';
import type { FieldLayout } from './layout.js';
import type { Type } from './types.js';

export type LocalStorage = 'param' | 'local' | 'hidden';

/**
 * A parameter, a declared local, or a compiler-introduced local.
 *
 * `id` is unique within its function; later stages key storage by id, never by name.
 */
export interface LocalSymbol {
  id: number;
  name: string;
  type: Type;
  storage: LocalStorage;
  span: SourceSpan;
}

interface TypedBase {
  type: Type;
  span: SourceSpan;
}

export interface TypedIntLiteral extends TypedBase {
  kind: 'IntLiteral';
  value: bigint;
}

export interface TypedBoolLiteral extends TypedBase {
  kind: 'BoolLiteral';
  value: boolean;
}

/** `null`, typed as the pointer type its context expects. */
export interface TypedNullLiteral extends TypedBase {
  kind: 'NullLiteral';
}

export interface TypedLocal extends TypedBase {
  kind: 'Local';
  symbol: LocalSymbol;
}

/** Arithmetic negation or logical not. */
export interface TypedUnary extends TypedBase {
  kind: 'Unary';
  op: '-' | '!';
  operand: TypedExpr;
}

export interface TypedDeref extends TypedBase {
  kind: 'Deref';
  pointer: TypedExpr;
}

export interface TypedAddressOf extends TypedBase {
  kind: 'AddressOf';
  place: TypedPlace;
}

export interface TypedBinary extends TypedBase {
  kind: 'Binary';
  op: ArithmeticOp | RelationalOp | EqualityOp;
  /** Type of both operands (the result of a comparison is `bool`). */
  operandType: Type;
  left: TypedExpr;
  right: TypedExpr;
}

/** Short-circuit `&&` / `||`. */
export interface TypedLogical extends TypedBase {
  kind: 'Logical';
  op: LogicalOp;
  left: TypedExpr;
  right: TypedExpr;
}

export interface TypedCall extends TypedBase {
  kind: 'Call';
  callee: FunctionSymbol;
  args: TypedExpr[];
}

export interface TypedField extends TypedBase {
  kind: 'Field';
  /** Struct-typed place (`through: 'value'`) or pointer to struct (`through: 'pointer'`). */
  base: TypedExpr;
  through: 'value' | 'pointer';
  structName: string;
  field: FieldLayout;
}

export interface TypedAssign extends TypedBase {
  kind: 'Assign';
  target: TypedPlace;
  value: TypedExpr;
}

/**
 * Expressions that denote storage: valid assignment targets and `&` operands.
 */
export type TypedPlace = TypedLocal | TypedDeref | TypedField;

export type TypedExpr =
  | TypedIntLiteral
  | TypedBoolLiteral
  | TypedNullLiteral
  | TypedLocal
  | TypedUnary
  | TypedDeref
  | TypedAddressOf
  | TypedBinary
  | TypedLogical
  | TypedCall
  | TypedField
  | TypedAssign;

/**
 * A lexical block. `locals` and `defers` are the block's scope, in declaration/registration order.
 */
export interface TypedBlock {
  kind: 'Block';
  span: SourceSpan;
  stmts: TypedStmt[];
  locals: LocalSymbol[];
  defers: TypedDefer[];
}

export interface TypedVarDecl {
  kind: 'VarDecl';
  span: SourceSpan;
  symbol: LocalSymbol;
  init: TypedExpr;
}

export interface TypedIf {
  kind: 'If';
  span: SourceSpan;
  cond: TypedExpr;
  then: TypedBlock;
  else?: TypedBlock;
}

export interface TypedWhile {
  kind: 'While';
  span: SourceSpan;
  cond: TypedExpr;
  body: TypedBlock;
}

export interface TypedReturn {
  kind: 'Return';
  span: SourceSpan;
  value?: TypedExpr;
}

/**
 * Registration point of a deferred call. Also listed in its block's `defers`.
 */
export interface TypedDefer {
  kind: 'Defer';
  span: SourceSpan;
  call: TypedCall;
}

export interface TypedExprStmt {
  kind: 'ExprStmt';
  span: SourceSpan;
  expr: TypedExpr;
}

export type TypedStmt =
  | TypedBlock
  | TypedVarDecl
  | TypedIf
  | TypedWhile
  | TypedReturn
  | TypedDefer
  | TypedExprStmt;

export interface TypedFunction {
  symbol: FunctionSymbol;
  params: LocalSymbol[];
  /** Outermost scope; it also owns the parameters. */
  body: TypedBlock;
  /** First symbol id not used by the analyzer, for later stages that add hidden locals. */
  nextSymbolId: number;
}

export interface TypedProgram {
  entryFile: string;
  env: CompileEnv;
  functions: TypedFunction[];
  /** Extern functions in declaration order. */
  externs: FunctionSymbol[];
}
