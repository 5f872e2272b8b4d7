import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { SourceSpan } from '../frontend/ast.js';
import type { Type } from './types.js';

export interface FieldLayout {
  name: string;
  type: Type;
  offset: number;
  size: number;
  align: number;
}

/**
 * Concrete field-offset table of a struct. Computed once per struct and frozen.
 */
export interface StructLayout {
  name: string;
  fields: readonly FieldLayout[];
  size: number;
  align: number;
}

/**
 * A struct declaration after its field types have been resolved.
 */
export interface StructShape {
  name: string;
  span: SourceSpan;
  fields: { name: string; type: Type }[];
}

export function alignUp(value: number, align: number): number {
  if (align <= 1) return value;
  return Math.ceil(value / align) * align;
}

export function findField(layout: StructLayout, name: string): FieldLayout | undefined {
  return layout.fields.find((f) => f.name === name);
}

/**
 * Size and alignment of a type. Struct types must already have a layout.
 */
export function sizeAlignOf(
  type: Type,
  layouts: ReadonlyMap<string, StructLayout>,
): { size: number; align: number } | undefined {
  switch (type.kind) {
    case 'i64':
    case 'u64':
    case 'ptr':
      return { size: 8, align: 8 };
    case 'u8':
    case 'bool':
      return { size: 1, align: 1 };
    case 'unit':
      return { size: 0, align: 1 };
    case 'struct': {
      const layout = layouts.get(type.name);
      return layout ? { size: layout.size, align: layout.align } : undefined;
    }
  }
}

/**
 * Directed graph of value containment: struct name -> names of structs it holds by value.
 *
 * Pointer fields contribute no edge, so pointer recursion is never a cycle.
 */
export function containmentGraph(shapes: readonly StructShape[]): Map<string, string[]> {
  const graph = new Map<string, string[]>();
  for (const shape of shapes) {
    const targets: string[] = [];
    for (const f of shape.fields) {
      if (f.type.kind === 'struct' && !targets.includes(f.type.name)) targets.push(f.type.name);
    }
    graph.set(shape.name, targets);
  }
  return graph;
}

/**
 * Every distinct cycle of the graph, each as a closed path (`A -> B -> A` is `['A', 'B', 'A']`).
 *
 * Traversal follows map insertion order, so results are deterministic.
 */
export function findCycles(graph: ReadonlyMap<string, readonly string[]>): string[][] {
  const done = new Set<string>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const seenKeys = new Set<string>();
  const cycles: string[][] = [];

  const visit = (node: string): void => {
    if (done.has(node)) return;
    onStack.add(node);
    stack.push(node);
    for (const next of graph.get(node) ?? []) {
      if (onStack.has(next)) {
        const cycle = stack.slice(stack.indexOf(next));
        const key = [...cycle].sort().join('\n');
        if (!seenKeys.has(key)) {
          seenKeys.add(key);
          cycles.push([...cycle, next]);
        }
        continue;
      }
      visit(next);
    }
    stack.pop();
    onStack.delete(node);
    done.add(node);
  };

  for (const node of graph.keys()) visit(node);
  return cycles;
}

/**
 * Compute every struct layout.
 *
 * Reports `CyclicValueLayout` for value-containment cycles and returns no layouts in that case.
 * Fields are placed in declaration order at the next offset aligned to the field's alignment;
 * the struct's alignment is the largest field alignment (at least 1) and its size is rounded up
 * to that alignment.
 */
export function computeLayouts(
  shapes: readonly StructShape[],
  diagnostics: Diagnostic[],
): Map<string, StructLayout> {
  const byName = new Map(shapes.map((s) => [s.name, s] as const));
  const cycles = findCycles(containmentGraph(shapes));
  for (const cycle of cycles) {
    const head = byName.get(cycle[0] ?? '');
    const where = head?.span;
    diagnostics.push({
      id: DiagnosticIds.CyclicValueLayout,
      severity: 'error',
      message: `Struct "${cycle[0]}" contains itself by value: ${cycle.join(' -> ')}.`,
      file: where?.file ?? '',
      ...(where ? { line: where.start.line, column: where.start.column } : {}),
    });
  }

  const layouts = new Map<string, StructLayout>();
  if (cycles.length > 0) return layouts;

  const layoutOf = (shape: StructShape): StructLayout => {
    const cached = layouts.get(shape.name);
    if (cached) return cached;

    let offset = 0;
    let align = 1;
    const fields: FieldLayout[] = [];
    for (const f of shape.fields) {
      if (f.type.kind === 'struct') {
        const inner = byName.get(f.type.name);
        if (inner) layoutOf(inner);
      }
      const info = sizeAlignOf(f.type, layouts) ?? { size: 0, align: 1 };
      offset = alignUp(offset, info.align);
      fields.push(Object.freeze({ name: f.name, type: f.type, offset, ...info }));
      offset += info.size;
      if (info.align > align) align = info.align;
    }

    const layout: StructLayout = Object.freeze({
      name: shape.name,
      fields: Object.freeze(fields),
      size: alignUp(offset, align),
      align,
    });
    layouts.set(shape.name, layout);
    return layout;
  };

  for (const shape of shapes) layoutOf(shape);

  // Re-insert in declaration order; dependencies may have been laid out first.
  return new Map(shapes.map((s) => [s.name, layoutOf(s)] as const));
}
