import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, InternalCompilerError, hasErrors } from './diagnostics/types.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

import type { ProgramNode } from './frontend/ast.js';
import { emitProgram } from './codegen/emit.js';
import type { Artifact } from './formats/types.js';
import { normalizeProgram } from './lowering/defer.js';
import { withRuntimePrelude } from './runtime/prelude.js';
import { checkProgram } from './semantics/check.js';
import { buildEnv } from './semantics/env.js';

type ResolvedOptions = Required<
  Pick<CompilerOptions, 'emitAsm' | 'nullChecks' | 'runtimePrelude' | 'annotateSource'>
> &
  Pick<CompilerOptions, 'sources'>;

export function withDefaults(options: CompilerOptions): ResolvedOptions {
  return {
    emitAsm: options.emitAsm ?? true,
    nullChecks: options.nullChecks ?? true,
    runtimePrelude: options.runtimePrelude ?? false,
    annotateSource: options.annotateSource ?? false,
    ...(options.sources ? { sources: options.sources } : {}),
  };
}

/**
 * Compile a Ska program to x86-64 assembly.
 *
 * Stages run in order (environment, checking, defer normalization, code generation); each runs
 * only while no error has been reported. A broken invariant after checking becomes a single
 * `InternalError` diagnostic. Artifacts are produced in-memory via `deps.formats`.
 */
export const compile: CompileFn = (
  input: ProgramNode,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult => {
  const diagnostics: Diagnostic[] = [];
  const opts = withDefaults(options);
  const program = opts.runtimePrelude ? withRuntimePrelude(input) : input;

  const env = buildEnv(program, diagnostics);
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const typed = checkProgram(program, env, diagnostics);
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  let artifacts: Artifact[];
  try {
    const emitted = emitProgram(normalizeProgram(typed), {
      nullChecks: opts.nullChecks,
      annotateSource: opts.annotateSource,
      ...(opts.sources ? { sources: opts.sources } : {}),
    });
    artifacts = opts.emitAsm ? [deps.formats.writeAsm(emitted)] : [];
  } catch (err) {
    if (!(err instanceof InternalCompilerError)) throw err;
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal compiler error: ${err.message}`,
      file: program.entryFile,
    });
    return { diagnostics, artifacts: [] };
  }

  return { diagnostics, artifacts };
};
