/**
 * Expression lowering methods for FunctionLowerer.
 * Extracted from lowering.ts for modularity.
 *
 * Additional expression categories are split into:
 *   - lowering-literals.ts   (literals)
 *   - lowering-call.ts       (callee resolution given argument types)
 *   - lowering-operators.ts  (assignment and increment/decrement)
 */

import type { CallExpr, Expression, Identifier } from "../ast/nodes.ts";
import { isMutatingOperator, operatorName } from "../ast/operators.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import type { Type } from "../types/index.ts";
import type { IrExpr } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

/** A lowered expression: its static type and the IR computing it. */
export interface LoweredExpr {
  type: Type;
  ir: IrExpr;
}

// ─── Expressions ─────────────────────────────────────────────────────────

export function lowerExpr(this: FunctionLowerer, expr: Expression): LoweredExpr {
  switch (expr.kind) {
    case "IntLiteral":
      return this.lowerIntLiteral(expr);
    case "FloatLiteral":
      return this.lowerFloatLiteral(expr);
    case "StringLiteral":
      return this.lowerStringLiteral(expr);
    case "Identifier":
      return this.lowerIdentifier(expr);
    case "CallExpr":
      return this.lowerCallExpr(expr);
    case "OperatorExpr":
      throw new CompileError(
        ErrorKind.OperatorNotValue,
        expr.span,
        `operator '${operatorName(expr.operator)}' is not a value; it can only be called`,
        { callee: operatorName(expr.operator) }
      );
  }
}

/**
 * A local binding loads its slot. Otherwise the name may denote a function,
 * which is a value only when it has exactly one overload.
 */
export function lowerIdentifier(this: FunctionLowerer, expr: Identifier): LoweredExpr {
  const binding = this.ctx.scopes.lookup(expr.name);
  if (binding) {
    return { type: binding.type, ir: { kind: "load", slot: binding.slot } };
  }

  const overloads = this.ctx.functions.lookup(expr.name);
  if (!overloads) {
    throw new CompileError(
      ErrorKind.UnresolvedIdentifier,
      expr.span,
      `unresolved identifier '${expr.name}'`,
      { callee: expr.name }
    );
  }
  const [only, ...rest] = overloads.all;
  if (!only || rest.length > 0) {
    throw new CompileError(
      ErrorKind.AmbiguousFunction,
      expr.span,
      `'${expr.name}' names ${overloads.size} overloads; call it to select one`,
      { callee: expr.name }
    );
  }
  return { type: only.type, ir: { kind: "imm", value: only.impl } };
}

/**
 * Two-phase call lowering: every argument is lowered first, left to right,
 * and only then is the callee resolved against the argument types. The
 * order arguments are evaluated in never depends on the overload chosen.
 */
export function lowerCallExpr(this: FunctionLowerer, expr: CallExpr): LoweredExpr {
  const callee = expr.callee;
  if (callee.kind === "OperatorExpr" && isMutatingOperator(callee.operator)) {
    return this.lowerMutation(callee.operator, expr);
  }

  const args = expr.args.map((arg) => this.lowerExpr(arg));

  const argTypes = args.map((a) => a.type);
  const resolved = this.resolveCallable(callee, argTypes);
  return {
    type: resolved.type.returnType,
    ir: { kind: "call", callee: resolved.ir, args: args.map((a) => a.ir) },
  };
}
