/**
 * Built-in operator and function overloads.
 *
 * Registration order matters: resolution is first-match, so the order
 * below is the order in which overloads are tried.
 */

import { Operator } from "../ast/operators.ts";
import type { NativeFunction } from "../ir/ir-types.ts";
import { NATIVE_OPS, type NativeOpName } from "../ir/native-ops.ts";
import type { FunctionType, Type, TypeRegistry } from "../types/index.ts";
import type { FunctionTable } from "./function-table.ts";
import type { OperatorTable } from "./operator-table.ts";

export function nativeFunction(name: NativeOpName, type: FunctionType): NativeFunction {
  return { kind: "native", name, type, apply: NATIVE_OPS[name] };
}

type Seed = [Operator, readonly Type[], Type, NativeOpName];

export function seedBuiltins(
  types: TypeRegistry,
  operators: OperatorTable,
  functions: FunctionTable
): void {
  const int = types.getInt();
  const bool = types.getBool();
  const float = types.getFloat();
  const string = types.getString();
  const unit = types.getUnit();

  const seeds: Seed[] = [
    // ─── Arithmetic ─────────────────────────────────────────────────────
    [Operator.Add, [int, int], int, "integer-add"],
    [Operator.Add, [float, float], float, "float-add"],
    [Operator.Add, [string, string], string, "string-concat"],
    [Operator.Sub, [int, int], int, "integer-sub"],
    [Operator.Sub, [float, float], float, "float-sub"],
    [Operator.Mul, [int, int], int, "integer-mul"],
    [Operator.Mul, [float, float], float, "float-mul"],
    [Operator.Div, [int, int], int, "integer-div"],
    [Operator.Div, [float, float], float, "float-div"],
    [Operator.Rem, [int, int], int, "integer-rem"],
    [Operator.Rem, [float, float], float, "float-rem"],

    // ─── Equality ───────────────────────────────────────────────────────
    [Operator.Equal, [int, int], bool, "integer-equal"],
    [Operator.Equal, [float, float], bool, "float-equal"],
    [Operator.Equal, [bool, bool], bool, "bool-equal"],
    [Operator.Equal, [string, string], bool, "string-equal"],
    [Operator.NotEqual, [int, int], bool, "integer-not-equal"],
    [Operator.NotEqual, [float, float], bool, "float-not-equal"],
    [Operator.NotEqual, [bool, bool], bool, "bool-not-equal"],
    [Operator.NotEqual, [string, string], bool, "string-not-equal"],

    // ─── Ordering ───────────────────────────────────────────────────────
    [Operator.Less, [int, int], bool, "integer-less"],
    [Operator.Less, [float, float], bool, "float-less"],
    [Operator.LessEqual, [int, int], bool, "integer-less-equal"],
    [Operator.LessEqual, [float, float], bool, "float-less-equal"],
    [Operator.Greater, [int, int], bool, "integer-greater"],
    [Operator.Greater, [float, float], bool, "float-greater"],
    [Operator.GreaterEqual, [int, int], bool, "integer-greater-equal"],
    [Operator.GreaterEqual, [float, float], bool, "float-greater-equal"],

    // ─── Logic and bits ─────────────────────────────────────────────────
    [Operator.LogicalAnd, [bool, bool], bool, "bool-and"],
    [Operator.LogicalOr, [bool, bool], bool, "bool-or"],
    [Operator.BitAnd, [int, int], int, "integer-and"],
    [Operator.BitOr, [int, int], int, "integer-or"],
    [Operator.BitXor, [int, int], int, "integer-xor"],
    [Operator.LeftShift, [int, int], int, "integer-shl"],
    [Operator.RightShift, [int, int], int, "integer-shr"],

    // ─── Unary ──────────────────────────────────────────────────────────
    [Operator.Plus, [int], int, "integer-identity"],
    [Operator.Plus, [float], float, "float-identity"],
    [Operator.Minus, [int], int, "integer-neg"],
    [Operator.Minus, [float], float, "float-neg"],
    [Operator.Recip, [float], float, "float-recip"],
    [Operator.LogicalNot, [bool], bool, "bool-not"],
    [Operator.BitNot, [int], int, "integer-not"],
  ];

  for (const [op, params, ret, name] of seeds) {
    const type = types.getFunc(params, ret);
    operators.define(op, type, nativeFunction(name, type));
  }

  const prints: [Type, NativeOpName][] = [
    [int, "print-int"],
    [float, "print-float"],
    [bool, "print-bool"],
    [string, "print-string"],
  ];
  for (const [param, name] of prints) {
    const type = types.getFunc([param], unit);
    functions.define("print", type, nativeFunction(name, type));
  }
}
