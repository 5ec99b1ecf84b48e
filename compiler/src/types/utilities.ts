// ─── Type Utilities ─────────────────────────────────────────────────────────

import type { FunctionType, Type } from "./definitions.ts";
import { TypeKind } from "./kinds.ts";

export function isFunctionType(type: Type): type is FunctionType {
  return type.kind === TypeKind.Function;
}

/**
 * Whether `params` accepts exactly `args`: same length and every pair is
 * the same interned type. No coercion of any kind.
 */
export function paramsMatch(params: readonly Type[], args: readonly Type[]): boolean {
  if (params.length !== args.length) return false;
  for (let i = 0; i < params.length; i++) {
    if (params[i] !== args[i]) return false;
  }
  return true;
}

export function typeToString(type: Type): string {
  switch (type.kind) {
    case TypeKind.Int:
    case TypeKind.Bool:
    case TypeKind.Float:
    case TypeKind.String:
    case TypeKind.Unit:
      return type.kind;
    case TypeKind.Function:
      return `${typeListToString(type.params)} -> ${typeToString(type.returnType)}`;
  }
}

/** Render an argument list, e.g. `(int, float)`. */
export function typeListToString(types: readonly Type[]): string {
  return `(${types.map(typeToString).join(", ")})`;
}
