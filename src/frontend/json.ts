import { z } from 'zod';

import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  ExprNode,
  ModuleItemNode,
  ProgramNode,
  SourceSpan,
  StmtNode,
  TypeExprNode,
} from './ast.js';
import { fileStartSpan } from './source.js';

// Node interfaces live in ast.ts; recursive schemas are annotated with them because the
// inferred types of lazily referenced unions collapse otherwise.
type NodeSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const issueMessage: z.ZodErrorMap = (issue, ctx) => {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return { message: `expected ${issue.expected}, got ${issue.received}` };
    case z.ZodIssueCode.invalid_literal:
      return { message: `expected ${String(issue.expected)}` };
    case z.ZodIssueCode.invalid_union_discriminator:
      return { message: `expected one of ${issue.options.map(String).join(', ')}` };
    case z.ZodIssueCode.invalid_enum_value:
      return { message: `expected one of ${issue.options.join(', ')}` };
    default:
      return { message: ctx.defaultError };
  }
};

function pathText(path: (string | number)[]): string {
  return path.reduce<string>(
    (acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : `${acc}.${key}`),
    '$',
  );
}

/**
 * Schema for the JSON form of a program read from `file`.
 *
 * `span` is optional everywhere (missing spans point at line 1 of `file`), `IntLiteral.value`
 * may be a safe integer or a decimal string, and a missing `returnType` means `unit`.
 */
function programSchema(file: string): NodeSchema<ProgramNode> {
  const position = z.object({
    line: z.number().int().nonnegative(),
    column: z.number().int().nonnegative(),
    offset: z.number().int().nonnegative().default(0),
  });

  const span = z
    .object({
      file: z.string().default(file),
      start: position,
      end: position.optional(),
    })
    .optional()
    .transform((s): SourceSpan =>
      s ? { file: s.file, start: s.start, end: s.end ?? s.start } : fileStartSpan(file),
    );

  const typeExpr: NodeSchema<TypeExprNode> = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('TypeName'), span, name: z.string() }),
    z.object({ kind: z.literal('PointerType'), span, to: z.lazy(() => typeExpr) }),
  ]);

  const intValue = z.unknown().transform((value, ctx) => {
    if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
    if (typeof value === 'string' && /^-?[0-9]+$/.test(value)) return BigInt(value);
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected an integer or a decimal string',
    });
    return z.NEVER;
  });

  const call = z.object({
    kind: z.literal('Call'),
    span,
    callee: z.string(),
    args: z.array(z.lazy(() => expr)).default(() => []),
  });

  const expr: NodeSchema<ExprNode> = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('IntLiteral'), span, value: intValue }),
    z.object({ kind: z.literal('BoolLiteral'), span, value: z.boolean() }),
    z.object({ kind: z.literal('NullLiteral'), span }),
    z.object({ kind: z.literal('Name'), span, name: z.string() }),
    z.object({
      kind: z.literal('Unary'),
      span,
      op: z.enum(['-', '!', '*', '&']),
      expr: z.lazy(() => expr),
    }),
    z.object({
      kind: z.literal('Binary'),
      span,
      op: z.enum(['+', '-', '*', '/', '%', '<', '<=', '>', '>=', '==', '!=', '&&', '||']),
      left: z.lazy(() => expr),
      right: z.lazy(() => expr),
    }),
    call,
    z.object({ kind: z.literal('Field'), span, base: z.lazy(() => expr), name: z.string() }),
    z.object({
      kind: z.literal('Assign'),
      span,
      target: z.lazy(() => expr),
      value: z.lazy(() => expr),
    }),
  ]);

  const block = z.object({
    kind: z.literal('Block'),
    span,
    stmts: z.array(z.lazy(() => stmt)),
  });

  const stmt: NodeSchema<StmtNode> = z.discriminatedUnion('kind', [
    block,
    z.object({ kind: z.literal('VarDecl'), span, name: z.string(), typeExpr, init: expr }),
    z.object({ kind: z.literal('If'), span, cond: expr, then: block, else: block.optional() }),
    z.object({ kind: z.literal('While'), span, cond: expr, body: block }),
    z.object({ kind: z.literal('Return'), span, value: expr.optional() }),
    z.object({ kind: z.literal('Defer'), span, call }),
    z.object({ kind: z.literal('ExprStmt'), span, expr }),
  ]);

  const param = z.object({
    kind: z.literal('Param').default('Param'),
    span,
    name: z.string(),
    typeExpr,
  });
  const params = z.array(param).default(() => []);

  const item: NodeSchema<ModuleItemNode> = z
    .discriminatedUnion('kind', [
      z.object({
        kind: z.literal('StructDecl'),
        span,
        name: z.string(),
        fields: z.array(
          z.object({
            kind: z.literal('StructField').default('StructField'),
            span,
            name: z.string(),
            typeExpr,
          }),
        ),
      }),
      z.object({
        kind: z.literal('FuncDecl'),
        span,
        name: z.string(),
        params,
        returnType: typeExpr.optional(),
        body: block,
      }),
      z.object({
        kind: z.literal('ExternFunc'),
        span,
        name: z.string(),
        params,
        returnType: typeExpr.optional(),
      }),
    ])
    .transform((node): ModuleItemNode => {
      if (node.kind === 'StructDecl') return node;
      const unit: TypeExprNode = { kind: 'TypeName', span: node.span, name: 'unit' };
      return { ...node, returnType: node.returnType ?? unit };
    });

  return z.object({
    kind: z.literal('Program'),
    span,
    entryFile: z.string().default(file),
    items: z.array(item),
  });
}

/**
 * Decode the JSON form of a parsed program.
 *
 * Returns `undefined` after reporting one `MalformedAst` diagnostic per schema issue.
 */
export function decodeProgram(
  text: string,
  file: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.MalformedAst,
      severity: 'error',
      message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      file,
    });
    return undefined;
  }

  const result = programSchema(file).safeParse(raw, { errorMap: issueMessage });
  if (result.success) return result.data;
  for (const issue of result.error.issues) {
    diagnostics.push({
      id: DiagnosticIds.MalformedAst,
      severity: 'error',
      message: `Malformed AST at ${pathText(issue.path)}: ${issue.message}.`,
      file,
    });
  }
  return undefined;
}
