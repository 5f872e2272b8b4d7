/**
 * Single-exit form produced by the defer normalizer.
 *
 * No `Return` or `Defer` statements remain: returns became a store into the hidden return slot,
 * the inline cleanup calls and a `Jump` to the function's exit label; defers became hidden capture
 * locals at their registration point plus ordinary calls at every scope exit.
 */
import type { SourceSpan } from '../frontend/ast.js';
import type { CompileEnv, FunctionSymbol } from '../semantics/env.js';
import type { LocalSymbol, TypedExpr } from '../semantics/typed.js';

export interface NormalizedBlock {
  kind: 'Block';
  span: SourceSpan;
  stmts: NormalizedStmt[];
  /** Locals of this scope, including hidden defer captures. */
  locals: LocalSymbol[];
}

export interface NormalizedVarInit {
  kind: 'VarInit';
  span: SourceSpan;
  symbol: LocalSymbol;
  init: TypedExpr;
}

export interface NormalizedIf {
  kind: 'If';
  span: SourceSpan;
  cond: TypedExpr;
  then: NormalizedBlock;
  else?: NormalizedBlock;
}

export interface NormalizedWhile {
  kind: 'While';
  span: SourceSpan;
  cond: TypedExpr;
  body: NormalizedBlock;
}

/** Evaluate for side effects; the value is discarded. */
export interface NormalizedEval {
  kind: 'Eval';
  span: SourceSpan;
  expr: TypedExpr;
}

export interface NormalizedStoreReturn {
  kind: 'StoreReturn';
  span: SourceSpan;
  slot: LocalSymbol;
  value: TypedExpr;
}

export interface NormalizedJump {
  kind: 'Jump';
  span: SourceSpan;
  label: string;
}

export type NormalizedStmt =
  | NormalizedBlock
  | NormalizedVarInit
  | NormalizedIf
  | NormalizedWhile
  | NormalizedEval
  | NormalizedStoreReturn
  | NormalizedJump;

export interface NormalizedFunction {
  symbol: FunctionSymbol;
  params: LocalSymbol[];
  /** Hidden return-value slot; present iff the return type is not `unit`. */
  returnSlot?: LocalSymbol;
  /** The one label every return jumps to. */
  exitLabel: string;
  body: NormalizedBlock;
}

export interface NormalizedProgram {
  entryFile: string;
  env: CompileEnv;
  functions: NormalizedFunction[];
  externs: FunctionSymbol[];
}
