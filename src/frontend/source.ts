import type { SourceSpan } from './ast.js';

/**
 * Source file + precomputed line-start offsets, used to map spans back to source text.
 */
export interface SourceFile {
  path: string;
  text: string;
  /**
   * 0-based byte offsets for the start of each line. The first entry is always 0.
   */
  lineStarts: number[];
}

/**
 * Build a {@link SourceFile} from a path and UTF-8 source text.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { path, text, lineStarts };
}

/**
 * Text of a 1-based line without its line terminator, or `undefined` when out of range.
 */
export function lineText(file: SourceFile, line: number): string | undefined {
  if (line < 1 || line > file.lineStarts.length) return undefined;
  const start = file.lineStarts[line - 1] ?? 0;
  const next = file.lineStarts[line];
  const end = next === undefined ? file.text.length : next - 1;
  return file.text.slice(start, end).replace(/\r$/, '');
}

/**
 * Span pointing at line 1, column 1 of `file`; used for synthesized nodes.
 */
export function fileStartSpan(file: string): SourceSpan {
  const start = { line: 1, column: 1, offset: 0 };
  return { file, start, end: start };
}
