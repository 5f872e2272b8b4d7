/**
 * Frontend AST contracts for Ska.
 *
 * This module defines types only. The tree is produced by an external parser and handed to the
 * analyzer already syntactically valid; nothing here resolves names or types.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based byte offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Parsed compilation unit.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  entryFile: string;
  items: ModuleItemNode[];
}

/**
 * Top-level items permitted in a compilation unit.
 */
export type ModuleItemNode = StructDeclNode | FuncDeclNode | ExternFuncNode;

export interface StructDeclNode extends BaseNode {
  kind: 'StructDecl';
  name: string;
  fields: StructFieldNode[];
}

export interface StructFieldNode extends BaseNode {
  kind: 'StructField';
  name: string;
  typeExpr: TypeExprNode;
}

export interface ParamNode extends BaseNode {
  kind: 'Param';
  name: string;
  typeExpr: TypeExprNode;
}

/**
 * Function with a body (`fn name(params) ret { ... }`).
 */
export interface FuncDeclNode extends BaseNode {
  kind: 'FuncDecl';
  name: string;
  params: ParamNode[];
  returnType: TypeExprNode;
  body: BlockNode;
}

/**
 * Function implemented outside the unit (`extern fn name(params) ret;`), typically by the runtime.
 */
export interface ExternFuncNode extends BaseNode {
  kind: 'ExternFunc';
  name: string;
  params: ParamNode[];
  returnType: TypeExprNode;
}

/**
 * Type expressions as written in source.
 */
export type TypeExprNode = TypeNameNode | PointerTypeNode;

/**
 * Builtin scalar (`i64`, `u64`, `u8`, `bool`, `unit`) or struct name.
 */
export interface TypeNameNode extends BaseNode {
  kind: 'TypeName';
  name: string;
}

export interface PointerTypeNode extends BaseNode {
  kind: 'PointerType';
  to: TypeExprNode;
}

export type StmtNode =
  | BlockNode
  | VarDeclNode
  | IfNode
  | WhileNode
  | ReturnNode
  | DeferNode
  | ExprStmtNode;

export interface BlockNode extends BaseNode {
  kind: 'Block';
  stmts: StmtNode[];
}

/**
 * `var name: T = init;`
 */
export interface VarDeclNode extends BaseNode {
  kind: 'VarDecl';
  name: string;
  typeExpr: TypeExprNode;
  init: ExprNode;
}

export interface IfNode extends BaseNode {
  kind: 'If';
  cond: ExprNode;
  then: BlockNode;
  else?: BlockNode;
}

export interface WhileNode extends BaseNode {
  kind: 'While';
  cond: ExprNode;
  body: BlockNode;
}

export interface ReturnNode extends BaseNode {
  kind: 'Return';
  value?: ExprNode;
}

/**
 * `defer f(args);` runs `f` with the argument values of this point when the enclosing block exits.
 */
export interface DeferNode extends BaseNode {
  kind: 'Defer';
  call: CallNode;
}

export interface ExprStmtNode extends BaseNode {
  kind: 'ExprStmt';
  expr: ExprNode;
}

export type ExprNode =
  | IntLiteralNode
  | BoolLiteralNode
  | NullLiteralNode
  | NameNode
  | UnaryNode
  | BinaryNode
  | CallNode
  | FieldNode
  | AssignNode;

export interface IntLiteralNode extends BaseNode {
  kind: 'IntLiteral';
  value: bigint;
}

export interface BoolLiteralNode extends BaseNode {
  kind: 'BoolLiteral';
  value: boolean;
}

export interface NullLiteralNode extends BaseNode {
  kind: 'NullLiteral';
}

export interface NameNode extends BaseNode {
  kind: 'Name';
  name: string;
}

export type UnaryOp = '-' | '!' | '*' | '&';

export interface UnaryNode extends BaseNode {
  kind: 'Unary';
  op: UnaryOp;
  expr: ExprNode;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type RelationalOp = '<' | '<=' | '>' | '>=';
export type EqualityOp = '==' | '!=';
export type LogicalOp = '&&' | '||';
export type BinaryOp = ArithmeticOp | RelationalOp | EqualityOp | LogicalOp;

export interface BinaryNode extends BaseNode {
  kind: 'Binary';
  op: BinaryOp;
  left: ExprNode;
  right: ExprNode;
}

export interface CallNode extends BaseNode {
  kind: 'Call';
  callee: string;
  args: ExprNode[];
}

/**
 * `base.name`; `base` may be a struct or a pointer to a struct.
 */
export interface FieldNode extends BaseNode {
  kind: 'Field';
  base: ExprNode;
  name: string;
}

export interface AssignNode extends BaseNode {
  kind: 'Assign';
  target: ExprNode;
  value: ExprNode;
}
