import { InternalCompilerError } from '../diagnostics/types.js';
import type { NormalizedBlock, NormalizedFunction, NormalizedStmt } from '../lowering/normalized.js';
import { alignUp, sizeAlignOf } from '../semantics/layout.js';
import type { StructLayout } from '../semantics/layout.js';
import type { LocalSymbol, TypedExpr, TypedPlace } from '../semantics/typed.js';
import type { Type } from '../semantics/types.js';

/** Bytes per spill slot. */
export const SPILL_SLOT_SIZE = 8;

/**
 * A fixed location in the frame, addressed as `[rbp - offset]`.
 */
export interface FrameSlot {
  offset: number;
  size: number;
}

export interface FramePlan {
  /** Storage for every parameter and local, keyed by symbol id. */
  slots: ReadonlyMap<number, FrameSlot>;
  /** Offset of spill slot 0; slot `d` lives at `spillBase + 8 * d`. */
  spillBase: number;
  spillSlots: number;
  /** Bytes reserved below `rbp`; a multiple of 16. */
  size: number;
}

export function storageOf(
  type: Type,
  layouts: ReadonlyMap<string, StructLayout>,
): { size: number; align: number } {
  const sa = sizeAlignOf(type, layouts);
  if (!sa || sa.size === 0) {
    throw new InternalCompilerError(`Type "${type.kind}" has no frame storage.`);
  }
  // Struct slots are 8-aligned so copies can move whole quadwords.
  return type.kind === 'struct' ? { size: sa.size, align: Math.max(sa.align, 8) } : sa;
}

/**
 * Number of spill slots an expression needs when evaluated into `rax`.
 *
 * Mirrors the emitter: a binary operator parks its left value in one slot while the right operand
 * is evaluated; a call parks every argument but the last; an assignment through a computed address
 * parks the address while the value is evaluated.
 */
export function spillDepth(expr: TypedExpr): number {
  switch (expr.kind) {
    case 'IntLiteral':
    case 'BoolLiteral':
    case 'NullLiteral':
    case 'Local':
      return 0;
    case 'Unary':
      return spillDepth(expr.operand);
    case 'Deref':
      return spillDepth(expr.pointer);
    case 'AddressOf':
      return placeSpillDepth(expr.place);
    case 'Binary':
      return Math.max(spillDepth(expr.left), 1 + spillDepth(expr.right));
    case 'Logical':
      return Math.max(spillDepth(expr.left), spillDepth(expr.right));
    case 'Call': {
      const parked = Math.max(0, expr.args.length - 1);
      return expr.args.reduce((depth, arg, i) => Math.max(depth, i + spillDepth(arg)), parked);
    }
    case 'Field':
      return spillDepth(expr.base);
    case 'Assign':
      if (expr.target.kind === 'Local') return spillDepth(expr.value);
      return Math.max(placeSpillDepth(expr.target), 1 + spillDepth(expr.value));
  }
}

export function placeSpillDepth(place: TypedPlace): number {
  switch (place.kind) {
    case 'Local':
      return 0;
    case 'Deref':
      return spillDepth(place.pointer);
    case 'Field':
      return spillDepth(place.base);
  }
}

function stmtExprs(stmt: NormalizedStmt): TypedExpr[] {
  switch (stmt.kind) {
    case 'Block':
    case 'Jump':
      return [];
    case 'VarInit':
      return [stmt.init];
    case 'If':
    case 'While':
      return [stmt.cond];
    case 'Eval':
      return [stmt.expr];
    case 'StoreReturn':
      return [stmt.value];
  }
}

/**
 * Lay out one function's frame.
 *
 * Parameters come first, then every block's locals in tree order (the hidden return slot and defer
 * captures included), each aligned to its own alignment; spill slots follow. The total is rounded
 * to 16 so `rsp` stays aligned at every call site.
 */
export function planFrame(
  fn: NormalizedFunction,
  layouts: ReadonlyMap<string, StructLayout>,
): FramePlan {
  const slots = new Map<number, FrameSlot>();
  let cursor = 0;
  let spillSlots = 0;

  const allocate = (symbol: LocalSymbol): void => {
    if (slots.has(symbol.id)) {
      throw new InternalCompilerError(`Symbol "${symbol.name}" (#${symbol.id}) allocated twice.`);
    }
    const { size, align } = storageOf(symbol.type, layouts);
    cursor = alignUp(cursor + size, align);
    slots.set(symbol.id, { offset: cursor, size });
  };

  const visitBlock = (block: NormalizedBlock): void => {
    block.locals.forEach(allocate);
    for (const stmt of block.stmts) {
      for (const expr of stmtExprs(stmt)) spillSlots = Math.max(spillSlots, spillDepth(expr));
      switch (stmt.kind) {
        case 'Block':
          visitBlock(stmt);
          break;
        case 'If':
          visitBlock(stmt.then);
          if (stmt.else) visitBlock(stmt.else);
          break;
        case 'While':
          visitBlock(stmt.body);
          break;
        default:
          break;
      }
    }
  };

  fn.params.forEach(allocate);
  visitBlock(fn.body);

  const spillBase = alignUp(cursor, SPILL_SLOT_SIZE) + SPILL_SLOT_SIZE;
  const end = spillSlots > 0 ? spillBase + SPILL_SLOT_SIZE * (spillSlots - 1) : cursor;
  return { slots, spillBase, spillSlots, size: alignUp(end, 16) };
}

export function slotFor(frame: FramePlan, symbol: LocalSymbol): FrameSlot {
  const slot = frame.slots.get(symbol.id);
  if (!slot) throw new InternalCompilerError(`No frame slot for "${symbol.name}" (#${symbol.id}).`);
  return slot;
}

export function spillOffset(frame: FramePlan, depth: number): number {
  if (depth < 0 || depth >= frame.spillSlots) {
    throw new InternalCompilerError(
      `Spill slot ${depth} out of range (frame has ${frame.spillSlots}).`,
    );
  }
  return frame.spillBase + SPILL_SLOT_SIZE * depth;
}
