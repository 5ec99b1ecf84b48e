/**
 * Semantic type representations.
 *
 * Every instance is owned by a `TypeRegistry` and interned there, so two
 * types are equal exactly when they are the same object. Nothing outside
 * the registry should build these objects.
 */

import type { TypeKind } from "./kinds.ts";

// ─── Type Definitions ───────────────────────────────────────────────────────

/** 32-bit two's-complement integer. */
export interface IntType {
  readonly kind: typeof TypeKind.Int;
}

export interface BoolType {
  readonly kind: typeof TypeKind.Bool;
}

/** IEEE 754 double. */
export interface FloatType {
  readonly kind: typeof TypeKind.Float;
}

/** Immutable text. */
export interface StringType {
  readonly kind: typeof TypeKind.String;
}

/** The type of a statement or return that yields no value. */
export interface UnitType {
  readonly kind: typeof TypeKind.Unit;
}

export interface FunctionType {
  readonly kind: typeof TypeKind.Function;
  readonly params: readonly Type[];
  readonly returnType: Type;
}

/** Union of all semantic type representations. */
export type Type = IntType | BoolType | FloatType | StringType | UnitType | FunctionType;
