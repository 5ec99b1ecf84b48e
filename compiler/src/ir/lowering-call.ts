/**
 * Callee resolution for FunctionLowerer.
 *
 * A callee is resolved *given* the already-lowered argument types, never
 * lowered on its own first: overload selection needs those types. Each
 * callee shape resolves differently.
 *   - OperatorExpr: the operator's overload set
 *   - Identifier:   a function-typed local, else the named overload set
 *   - anything else: lowered as a value of function type
 *
 * Matching is exact: same arity and identical (interned) parameter types,
 * first registered match wins.
 */

import type { Expression, Identifier, OperatorExpr } from "../ast/nodes.ts";
import { operatorName } from "../ast/operators.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import type { Span } from "../utils/source.ts";
import {
  type FunctionType,
  isFunctionType,
  paramsMatch,
  type Type,
  typeListToString,
  typeToString,
} from "../types/index.ts";
import type { IrExpr } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

/** A resolved callee: the selected signature and the IR yielding the callable. */
export interface ResolvedCallable {
  type: FunctionType;
  ir: IrExpr;
}

export function resolveCallable(
  this: FunctionLowerer,
  callee: Expression,
  argTypes: readonly Type[]
): ResolvedCallable {
  switch (callee.kind) {
    case "OperatorExpr":
      return this.resolveOperatorCallable(callee, argTypes);
    case "Identifier":
      return this.resolveNamedCallable(callee, argTypes);
    default:
      return this.resolveValueCallable(callee, argTypes);
  }
}

export function resolveOperatorCallable(
  this: FunctionLowerer,
  callee: OperatorExpr,
  argTypes: readonly Type[]
): ResolvedCallable {
  const entry = this.ctx.operators.resolve(callee.operator, argTypes);
  if (!entry) {
    const name = operatorName(callee.operator);
    throw noMatchingOverload(callee.span, `operator '${name}'`, name, argTypes);
  }
  return { type: entry.type, ir: { kind: "imm", value: entry.impl } };
}

export function resolveNamedCallable(
  this: FunctionLowerer,
  callee: Identifier,
  argTypes: readonly Type[]
): ResolvedCallable {
  const binding = this.ctx.scopes.lookup(callee.name);
  if (binding) {
    return checkFunctionValue(callee.span, callee.name, binding.type, argTypes, {
      kind: "load",
      slot: binding.slot,
    });
  }

  const overloads = this.ctx.functions.lookup(callee.name);
  if (!overloads) {
    throw new CompileError(
      ErrorKind.UnresolvedIdentifier,
      callee.span,
      `unresolved identifier '${callee.name}'`,
      { callee: callee.name }
    );
  }
  const entry = overloads.resolve(argTypes);
  if (!entry) {
    throw noMatchingOverload(callee.span, `function '${callee.name}'`, callee.name, argTypes);
  }
  return { type: entry.type, ir: { kind: "imm", value: entry.impl } };
}

/** Callee computed by an arbitrary expression, e.g. a call returning a function. */
export function resolveValueCallable(
  this: FunctionLowerer,
  callee: Expression,
  argTypes: readonly Type[]
): ResolvedCallable {
  const lowered = this.lowerExpr(callee);
  return checkFunctionValue(callee.span, "expression", lowered.type, argTypes, lowered.ir);
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function checkFunctionValue(
  span: Span,
  label: string,
  type: Type,
  argTypes: readonly Type[],
  ir: IrExpr
): ResolvedCallable {
  if (!isFunctionType(type)) {
    throw new CompileError(
      ErrorKind.NotCallable,
      span,
      `'${label}' has type ${typeToString(type)} and cannot be called`,
      { callee: label, actual: typeToString(type) }
    );
  }
  if (!paramsMatch(type.params, argTypes)) {
    throw new CompileError(
      ErrorKind.NoMatchingOverload,
      span,
      `'${label}' of type ${typeToString(type)} cannot be called with ${typeListToString(argTypes)}`,
      {
        callee: label,
        argTypes: argTypes.map(typeToString),
        expected: typeListToString(type.params),
        actual: typeListToString(argTypes),
      }
    );
  }
  return { type, ir };
}

export function noMatchingOverload(
  span: Span,
  subject: string,
  callee: string,
  argTypes: readonly Type[]
): CompileError {
  return new CompileError(
    ErrorKind.NoMatchingOverload,
    span,
    `no overload of ${subject} accepts ${typeListToString(argTypes)}`,
    { callee, argTypes: argTypes.map(typeToString) }
  );
}
