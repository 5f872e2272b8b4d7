import type { Diagnostic } from './diagnostics/types.js';
import type { ProgramNode } from './frontend/ast.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Emit the GNU assembler source (`.s`). Defaults to `true`. */
  emitAsm?: boolean;
  /** Test every dereferenced pointer and call the runtime's fatal primitive on null. Defaults to `true`. */
  nullChecks?: boolean;
  /** Declare the runtime library's functions the program does not declare itself. */
  runtimePrelude?: boolean;
  /** Emit a source-location comment before each statement. */
  annotateSource?: boolean;
  /** Source texts by file, used by `annotateSource`. */
  sources?: ReadonlyMap<string, string>;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  program: ProgramNode,
  options: CompilerOptions,
  deps: PipelineDeps,
) => CompileResult;
