/**
 * Code generator trace entry for one function body.
 *
 * The function's own `.globl` directive and label are not part of the trace; the writer adds them.
 */
export type AsmTraceEntry =
  | { kind: 'comment'; text: string }
  | { kind: 'label'; name: string }
  | { kind: 'instruction'; text: string };

export interface EmittedFunction {
  name: string;
  trace: AsmTraceEntry[];
}

/**
 * Everything the code generator produced for one program, in emission order.
 */
export interface EmittedAsm {
  entryFile: string;
  /** External symbols the code calls, sorted. */
  externs: string[];
  functions: EmittedFunction[];
}

/**
 * Options for `.s` source emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory GNU assembler artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact;

/**
 * Format writers used by the pipeline to turn emitted code into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: EmittedAsm, opts?: WriteAsmOptions): AsmArtifact;
}
