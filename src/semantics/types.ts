/**
 * Semantic types.
 *
 * `ptr` and `struct` are the only referential cases; a struct type names an entry of the global
 * struct table and never embeds its fields. A `null` literal takes the pointer type its context
 * expects.
 */
export type ScalarKind = 'i64' | 'u64' | 'u8' | 'bool' | 'unit';

export type Type =
  | { kind: ScalarKind }
  | { kind: 'ptr'; to: Type }
  | { kind: 'struct'; name: string };

export type IntegerType = { kind: 'i64' | 'u64' | 'u8' };
export type PointerType = { kind: 'ptr'; to: Type };
export type StructType = { kind: 'struct'; name: string };

export const I64: Type = { kind: 'i64' };
export const U64: Type = { kind: 'u64' };
export const U8: Type = { kind: 'u8' };
export const BOOL: Type = { kind: 'bool' };
export const UNIT: Type = { kind: 'unit' };

const builtinTypes = new Map<string, Type>([
  ['i64', I64],
  ['u64', U64],
  ['u8', U8],
  ['bool', BOOL],
  ['unit', UNIT],
]);

export function builtinType(name: string): Type | undefined {
  return builtinTypes.get(name);
}

export const ptr = (to: Type): PointerType => ({ kind: 'ptr', to });
export const struct = (name: string): StructType => ({ kind: 'struct', name });

export function isInteger(t: Type): t is IntegerType {
  return t.kind === 'i64' || t.kind === 'u64' || t.kind === 'u8';
}

export function isSigned(t: Type): boolean {
  return t.kind === 'i64';
}

/**
 * Types that fit in one integer register: integers, `bool` and pointers.
 */
export function isScalar(t: Type): boolean {
  return isInteger(t) || t.kind === 'bool' || t.kind === 'ptr';
}

/**
 * Structural equality; structs compare by name.
 */
export function typesEqual(a: Type, b: Type): boolean {
  if (a.kind === 'ptr') return b.kind === 'ptr' && typesEqual(a.to, b.to);
  if (a.kind === 'struct') return b.kind === 'struct' && a.name === b.name;
  return a.kind === b.kind;
}

export function typeName(t: Type): string {
  switch (t.kind) {
    case 'ptr':
      return `*${typeName(t.to)}`;
    case 'struct':
      return t.name;
    default:
      return t.kind;
  }
}

/**
 * Inclusive value range of an integer type.
 */
export function integerRange(t: IntegerType): { min: bigint; max: bigint } {
  switch (t.kind) {
    case 'i64':
      return { min: -(1n << 63n), max: (1n << 63n) - 1n };
    case 'u64':
      return { min: 0n, max: (1n << 64n) - 1n };
    case 'u8':
      return { min: 0n, max: 255n };
  }
}
