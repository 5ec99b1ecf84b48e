import type { FunctionType } from "../../types/index.ts";
import type { Environment } from "../environment.ts";
import type { IrFunction } from "./function.ts";

// ─── Runtime Values ──────────────────────────────────────────────────────────

/** The single value of type `unit`. */
export interface UnitValue {
  readonly kind: "unit";
}

export const UNIT: UnitValue = Object.freeze({ kind: "unit" });

/** Host implementation of a built-in operation. */
export type NativeImpl = (args: readonly Value[], env: Environment) => Value;

/** A built-in operation bound to its signature in one compilation context. */
export interface NativeFunction {
  readonly kind: "native";
  /** e.g. `"integer-add"`. */
  readonly name: string;
  readonly type: FunctionType;
  readonly apply: NativeImpl;
}

export type Callable = NativeFunction | IrFunction;

/**
 * Runtime value. `int` and `float` share the `number` representation; the
 * static type decides which operations apply.
 */
export type Value = number | boolean | string | UnitValue | Callable;

export function isCallable(value: Value): value is Callable {
  return typeof value === "object" && value.kind !== "unit";
}
