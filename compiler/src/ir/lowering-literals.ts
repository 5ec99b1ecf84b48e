/**
 * Literal expression lowering for FunctionLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type { FloatLiteral, IntLiteral, StringLiteral } from "../ast/nodes.ts";
import type { LoweredExpr } from "./lowering-expr.ts";
import type { FunctionLowerer } from "./lowering.ts";

export function lowerIntLiteral(this: FunctionLowerer, expr: IntLiteral): LoweredExpr {
  return { type: this.ctx.types.getInt(), ir: { kind: "imm", value: expr.value } };
}

export function lowerFloatLiteral(this: FunctionLowerer, expr: FloatLiteral): LoweredExpr {
  return { type: this.ctx.types.getFloat(), ir: { kind: "imm", value: expr.value } };
}

export function lowerStringLiteral(this: FunctionLowerer, expr: StringLiteral): LoweredExpr {
  return { type: this.ctx.types.getString(), ir: { kind: "imm", value: expr.value } };
}
