/**
 * Type resolution helpers for FunctionLowerer.
 */

import type { TypeNode } from "../ast/nodes.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import { type Type, TypeKind } from "../types/index.ts";
import { UNIT, type Value } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

export function resolveTypeNode(this: FunctionLowerer, node: TypeNode): Type {
  const type = this.ctx.types.resolveName(node.name);
  if (!type) {
    throw new CompileError(ErrorKind.UnresolvedType, node.span, `unknown type '${node.name}'`);
  }
  return type;
}

/** Initial value of a declaration without initializer; `null` if the type has none. */
export function zeroValue(this: FunctionLowerer, type: Type): Value | null {
  switch (type.kind) {
    case TypeKind.Int:
    case TypeKind.Float:
      return 0;
    case TypeKind.Bool:
      return false;
    case TypeKind.String:
      return "";
    case TypeKind.Unit:
      return UNIT;
    case TypeKind.Function:
      return null;
  }
}
