import type { AsmArtifact, AsmTraceEntry, EmittedAsm, WriteAsmOptions } from './types.js';

const INDENT = '    ';

function renderEntry(entry: AsmTraceEntry): string {
  switch (entry.kind) {
    case 'comment':
      return `${INDENT}# ${entry.text}`;
    case 'label':
      return `${entry.name}:`;
    case 'instruction':
      return `${INDENT}${entry.text}`;
  }
}

/**
 * Create a deterministic GNU assembler (Intel syntax) artifact from code generator output.
 */
export function writeAsm(program: EmittedAsm, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push(`# skac x86-64 output for ${program.entryFile}`);
  lines.push('.intel_syntax noprefix');
  for (const name of program.externs) lines.push(`.extern ${name}`);
  lines.push('.text');

  for (const fn of program.functions) {
    lines.push('');
    lines.push(`.globl ${fn.name}`);
    lines.push(`${fn.name}:`);
    for (const entry of fn.trace) lines.push(renderEntry(entry));
  }

  lines.push('');
  lines.push('.section .note.GNU-stack,"",@progbits');

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
