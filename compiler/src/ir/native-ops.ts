/**
 * Host implementations of the built-in operations.
 *
 * Integer operations wrap to 32-bit two's complement. Integer division
 * truncates toward zero; a zero divisor raises `DivisionByZero`. Float
 * operations follow IEEE 754 (a float division by zero yields an infinity).
 */

import { RuntimeError, RuntimeErrorKind } from "../errors/runtime-error.ts";
import { formatFloat } from "../utils/format.ts";
import { UNIT, type NativeImpl, type Value } from "./ir-types.ts";

function fault(expected: string, value: Value | undefined): RuntimeError {
  const got = value === undefined ? "nothing" : typeof value;
  return new RuntimeError(RuntimeErrorKind.TypeFault, `expected ${expected}, got ${got}`);
}

function num(args: readonly Value[], index: number): number {
  const value = args[index];
  if (typeof value !== "number") throw fault("a number", value);
  return value;
}

function bool(args: readonly Value[], index: number): boolean {
  const value = args[index];
  if (typeof value !== "boolean") throw fault("a bool", value);
  return value;
}

function text(args: readonly Value[], index: number): string {
  const value = args[index];
  if (typeof value !== "string") throw fault("a string", value);
  return value;
}

function nonZeroDivisor(args: readonly Value[]): number {
  const divisor = num(args, 1);
  if (divisor === 0) {
    throw new RuntimeError(RuntimeErrorKind.DivisionByZero, "integer division by zero");
  }
  return divisor;
}

const NATIVE_TABLE = {
  // Integer arithmetic
  "integer-add": (args) => (num(args, 0) + num(args, 1)) | 0,
  "integer-sub": (args) => (num(args, 0) - num(args, 1)) | 0,
  "integer-mul": (args) => Math.imul(num(args, 0), num(args, 1)),
  "integer-div": (args) => {
    const divisor = nonZeroDivisor(args);
    return Math.trunc(num(args, 0) / divisor) | 0;
  },
  "integer-rem": (args) => {
    const divisor = nonZeroDivisor(args);
    return (num(args, 0) % divisor) | 0;
  },
  "integer-neg": (args) => -num(args, 0) | 0,
  "integer-identity": (args) => num(args, 0),

  // Integer bitwise
  "integer-and": (args) => num(args, 0) & num(args, 1),
  "integer-or": (args) => num(args, 0) | num(args, 1),
  "integer-xor": (args) => num(args, 0) ^ num(args, 1),
  "integer-not": (args) => ~num(args, 0),
  "integer-shl": (args) => num(args, 0) << (num(args, 1) & 31),
  "integer-shr": (args) => num(args, 0) >> (num(args, 1) & 31),

  // Float arithmetic
  "float-add": (args) => num(args, 0) + num(args, 1),
  "float-sub": (args) => num(args, 0) - num(args, 1),
  "float-mul": (args) => num(args, 0) * num(args, 1),
  "float-div": (args) => num(args, 0) / num(args, 1),
  "float-rem": (args) => num(args, 0) % num(args, 1),
  "float-neg": (args) => -num(args, 0),
  "float-identity": (args) => num(args, 0),
  "float-recip": (args) => 1 / num(args, 0),

  // Comparison
  "integer-equal": (args) => num(args, 0) === num(args, 1),
  "integer-not-equal": (args) => num(args, 0) !== num(args, 1),
  "integer-less": (args) => num(args, 0) < num(args, 1),
  "integer-less-equal": (args) => num(args, 0) <= num(args, 1),
  "integer-greater": (args) => num(args, 0) > num(args, 1),
  "integer-greater-equal": (args) => num(args, 0) >= num(args, 1),
  "float-equal": (args) => num(args, 0) === num(args, 1),
  "float-not-equal": (args) => num(args, 0) !== num(args, 1),
  "float-less": (args) => num(args, 0) < num(args, 1),
  "float-less-equal": (args) => num(args, 0) <= num(args, 1),
  "float-greater": (args) => num(args, 0) > num(args, 1),
  "float-greater-equal": (args) => num(args, 0) >= num(args, 1),
  "bool-equal": (args) => bool(args, 0) === bool(args, 1),
  "bool-not-equal": (args) => bool(args, 0) !== bool(args, 1),
  "string-equal": (args) => text(args, 0) === text(args, 1),
  "string-not-equal": (args) => text(args, 0) !== text(args, 1),

  // Logic (both operands are already evaluated)
  "bool-and": (args) => bool(args, 0) && bool(args, 1),
  "bool-or": (args) => bool(args, 0) || bool(args, 1),
  "bool-not": (args) => !bool(args, 0),

  // Strings
  "string-concat": (args) => text(args, 0) + text(args, 1),

  // Output
  "print-int": (args, env) => {
    env.out(String(num(args, 0)));
    return UNIT;
  },
  "print-float": (args, env) => {
    env.out(formatFloat(num(args, 0)));
    return UNIT;
  },
  "print-bool": (args, env) => {
    env.out(String(bool(args, 0)));
    return UNIT;
  },
  "print-string": (args, env) => {
    env.out(text(args, 0));
    return UNIT;
  },

  /** Yields its first argument; postfix increment/decrement use it to return the old value. */
  first: (args) => {
    const value = args[0];
    if (value === undefined) throw fault("an argument", value);
    return value;
  },
} satisfies Record<string, NativeImpl>;

export type NativeOpName = keyof typeof NATIVE_TABLE;

export const NATIVE_OPS: Record<NativeOpName, NativeImpl> = NATIVE_TABLE;
