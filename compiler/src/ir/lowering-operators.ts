/**
 * Assignment-family operator lowering for FunctionLowerer.
 *
 * `Assign`, the compound `XAssign` operators and increment/decrement write
 * to their first operand, so they are not looked up in the operator table.
 * Their first argument must name a local; the value they yield is the
 * stored value (the old value for postfix increment/decrement).
 */

import type { CallExpr } from "../ast/nodes.ts";
import {
  assignBaseOperator,
  Operator,
  operatorName,
  stepOperatorInfo,
} from "../ast/operators.ts";
import type { LocalBinding } from "../context/scope-stack.ts";
import { nativeFunction } from "../context/builtins.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import { type Type, TypeKind, typeToString } from "../types/index.ts";
import type { IrExpr } from "./ir-types.ts";
import { noMatchingOverload } from "./lowering-call.ts";
import type { LoweredExpr } from "./lowering-expr.ts";
import type { FunctionLowerer } from "./lowering.ts";

export function lowerMutation(
  this: FunctionLowerer,
  op: Operator,
  expr: CallExpr
): LoweredExpr {
  // The target is a slot, not a value: check it before lowering the operands
  const target = this.assignTarget(expr);
  const args = expr.args.map((arg) => this.lowerExpr(arg));
  if (op === Operator.Assign) {
    return this.lowerAssign(expr, target, args);
  }
  const base = assignBaseOperator(op);
  if (base) {
    return this.lowerCompoundAssign(op, base, expr, target, args);
  }
  return this.lowerStep(op, expr, target, args);
}

/** The local written by an assignment-family call. */
export function assignTarget(this: FunctionLowerer, expr: CallExpr): LocalBinding {
  const first = expr.args[0];
  if (!first) {
    throw new CompileError(
      ErrorKind.InvalidAssignTarget,
      expr.span,
      "assignment needs a target"
    );
  }
  if (first.kind === "Identifier") {
    const binding = this.ctx.scopes.lookup(first.name);
    if (binding) return binding;
  }
  throw new CompileError(
    ErrorKind.InvalidAssignTarget,
    first.span,
    first.kind === "Identifier"
      ? `'${first.name}' is not a local and cannot be assigned`
      : "only a local can be assigned"
  );
}

/** `x = v`: operand types must be identical; yields the stored value. */
export function lowerAssign(
  this: FunctionLowerer,
  expr: CallExpr,
  target: LocalBinding,
  args: readonly LoweredExpr[]
): LoweredExpr {
  const rhs = args[1];
  if (args.length !== 2 || !rhs) {
    const name = operatorName(Operator.Assign);
    throw noMatchingOverload(expr.span, `operator '${name}'`, name, args.map((a) => a.type));
  }
  if (rhs.type !== target.type) {
    throw mismatch(expr, target, rhs.type);
  }
  return { type: target.type, ir: { kind: "store", slot: target.slot, value: rhs.ir } };
}

/** `x op= v`: applies the binary operator, whose result must keep the local's type. */
export function lowerCompoundAssign(
  this: FunctionLowerer,
  op: Operator,
  base: Operator,
  expr: CallExpr,
  target: LocalBinding,
  args: readonly LoweredExpr[]
): LoweredExpr {
  const rhs = args[1];
  const argTypes = args.map((a) => a.type);
  if (args.length !== 2 || !rhs) {
    const name = operatorName(op);
    throw noMatchingOverload(expr.span, `operator '${name}'`, name, argTypes);
  }
  const entry = this.ctx.operators.resolve(base, [target.type, rhs.type]);
  if (!entry) {
    const name = operatorName(op);
    throw noMatchingOverload(expr.span, `operator '${name}'`, name, argTypes);
  }
  if (entry.type.returnType !== target.type) {
    throw mismatch(expr, target, entry.type.returnType);
  }
  const value: IrExpr = {
    kind: "call",
    callee: { kind: "imm", value: entry.impl },
    args: [{ kind: "load", slot: target.slot }, rhs.ir],
  };
  return { type: target.type, ir: { kind: "store", slot: target.slot, value } };
}

/**
 * Increment/decrement: `Add`/`Sub` with a one of the local's own numeric
 * type. Prefix forms yield the new value; postfix forms read the old value
 * first and pass both through the `first` native, so evaluation stays
 * left to right.
 */
export function lowerStep(
  this: FunctionLowerer,
  op: Operator,
  expr: CallExpr,
  target: LocalBinding,
  args: readonly LoweredExpr[]
): LoweredExpr {
  const info = stepOperatorInfo(op);
  const argTypes = args.map((a) => a.type);
  const name = operatorName(op);
  const numeric = target.type.kind === TypeKind.Int || target.type.kind === TypeKind.Float;
  if (!info || args.length !== 1 || !numeric) {
    throw noMatchingOverload(expr.span, `operator '${name}'`, name, argTypes);
  }

  const entry = this.ctx.operators.resolve(info.apply, [target.type, target.type]);
  if (!entry) {
    throw noMatchingOverload(expr.span, `operator '${name}'`, name, argTypes);
  }
  if (entry.type.returnType !== target.type) {
    throw mismatch(expr, target, entry.type.returnType);
  }

  const load: IrExpr = { kind: "load", slot: target.slot };
  const updated: IrExpr = {
    kind: "store",
    slot: target.slot,
    value: {
      kind: "call",
      callee: { kind: "imm", value: entry.impl },
      args: [load, { kind: "imm", value: 1 }],
    },
  };
  if (!info.yieldsOld) {
    return { type: target.type, ir: updated };
  }

  const firstType = this.ctx.types.getFunc([target.type, target.type], target.type);
  return {
    type: target.type,
    ir: {
      kind: "call",
      callee: { kind: "imm", value: nativeFunction("first", firstType) },
      args: [{ kind: "load", slot: target.slot }, updated],
    },
  };
}

function mismatch(expr: CallExpr, target: LocalBinding, actual: Type): CompileError {
  return new CompileError(
    ErrorKind.AssignTypeMismatch,
    expr.span,
    `cannot assign ${typeToString(actual)} to '${target.name}' of type ${typeToString(target.type)}`,
    { expected: typeToString(target.type), actual: typeToString(actual) }
  );
}
