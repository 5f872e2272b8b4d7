export { compile, withDefaults } from './compile.js';
export type { CompileFn, CompileResult, CompilerOptions, PipelineDeps } from './pipeline.js';
export { DiagnosticIds, InternalCompilerError, hasErrors } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticKind, DiagnosticSeverity } from './diagnostics/types.js';
export type * from './frontend/ast.js';
export { decodeProgram } from './frontend/json.js';
export { defaultFormatWriters } from './formats/index.js';
export { writeAsm } from './formats/writeAsm.js';
export type {
  Artifact,
  AsmArtifact,
  AsmTraceEntry,
  EmittedAsm,
  FormatWriters,
  WriteAsmOptions,
} from './formats/types.js';
export { RUNTIME_FUNCTIONS, NULL_DEREF_PANIC, withRuntimePrelude } from './runtime/prelude.js';
