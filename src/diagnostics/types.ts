/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `SKA103`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs, keyed by diagnostic kind.
 *
 * `SKA1xx` are user-facing compile errors; `SKA9xx` are input and internal failures.
 */
export const DiagnosticIds = {
  /** A name does not resolve to a local, parameter, function, extern or struct. */
  UndefinedSymbol: 'SKA101',

  /** A name is declared twice in the same scope (or twice at module scope). */
  DuplicateDeclaration: 'SKA102',

  /** Operand, initializer, argument, return or condition type does not match. */
  TypeMismatch: 'SKA103',

  /** Assignment target or `&` operand is not a local, a dereference or a field access. */
  InvalidLValue: 'SKA104',

  /** Call argument count differs from the callee's parameter count. */
  ArityMismatch: 'SKA105',

  /** Field access names a field the struct does not declare. */
  UnknownField: 'SKA106',

  /** `null` used where no pointer type is expected. */
  InvalidNullContext: 'SKA107',

  /** A struct contains itself by value, directly or through other structs. */
  CyclicValueLayout: 'SKA108',

  /** Signature or storage the register calling convention cannot express. */
  UnsupportedAbi: 'SKA109',

  /** Input AST is not shaped like a Ska program. */
  MalformedAst: 'SKA900',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'SKA901',

  /**
   * Normalizer or code generator hit a broken invariant.
   *
   * This signals a defect in the analyzer, never a problem in the input program.
   */
  InternalError: 'SKA999',
} as const;

/**
 * Diagnostic kind names (`'TypeMismatch'`, ...).
 */
export type DiagnosticKind = keyof typeof DiagnosticIds;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[DiagnosticKind];

/**
 * Thrown by post-analysis stages when their input violates an invariant the analyzer guarantees.
 */
export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalCompilerError';
  }
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
