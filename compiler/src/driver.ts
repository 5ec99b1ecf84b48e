/**
 * Driver: lowers top-level units and runs them.
 *
 * A unit is one item: a statement (lowered as the body of an ad hoc
 * zero-argument function and invoked at once) or a function definition
 * (lowered and registered, nothing runs). Lowering fails fast within a
 * unit; `runProgram` hoists definitions, reports each failure, and carries
 * on with the next unit.
 */

import type { Item } from "./ast/nodes.ts";
import type { CompilationContext } from "./context/context.ts";
import { type Diagnostic, type DiagnosticSink, toDiagnostic } from "./errors/index.ts";
import type { Environment } from "./ir/environment.ts";
import { invoke } from "./ir/interpreter.ts";
import { type IrFunction, UNIT, type Value } from "./ir/ir-types.ts";
import {
  type DeclaredFunction,
  declareFunction,
  defineFunction,
  lowerFunctionDef,
  lowerStatementAsFunction,
} from "./ir/lowering.ts";
import { type Type, TypeKind, typeToString } from "./types/index.ts";
import { formatFloat } from "./utils/format.ts";
import { SourceFile } from "./utils/source.ts";

export interface RunResult {
  type: Type;
  value: Value;
}

/** A lowered unit. `definition` is true for function definitions, which are not run. */
export interface CompiledUnit {
  fn: IrFunction;
  definition: boolean;
}

export type UnitOutcome =
  | { ok: true; item: Item; unit: CompiledUnit; result: RunResult | null }
  | { ok: false; item: Item; diagnostic: Diagnostic };

export interface ProgramOrigin {
  file: string;
  source: string | null;
}

// ─── Single units ────────────────────────────────────────────────────────────

/** Lower one item without running it. Function definitions stay registered in `ctx`. */
export function compileItem(ctx: CompilationContext, item: Item): CompiledUnit {
  if (item.kind === "FuncDef") {
    return { fn: lowerFunctionDef(ctx, item), definition: true };
  }
  return { fn: lowerStatementAsFunction(ctx, item), definition: false };
}

/**
 * Lower and run one item. Statements yield the value of the `return` they
 * took, typed by the statement's return type, or unit when they fell off
 * their end. Definitions yield unit.
 */
export function run(ctx: CompilationContext, env: Environment, item: Item): RunResult {
  return execute(ctx, env, compileItem(ctx, item));
}

function execute(ctx: CompilationContext, env: Environment, unit: CompiledUnit): RunResult {
  if (unit.definition) {
    return { type: ctx.types.getUnit(), value: UNIT };
  }
  const value = invoke(unit.fn, [], env);
  return { type: value === UNIT ? ctx.types.getUnit() : unit.fn.type.returnType, value };
}

// ─── Programs ────────────────────────────────────────────────────────────────

export interface RunProgramOptions {
  /** Lower every unit but run none (type-check only). */
  checkOnly?: boolean;
  /** Called once per unit, in item order, after that unit settled. */
  onOutcome?: (outcome: UnitOutcome) => void;
}

/**
 * Run `items` in order. Every function definition is registered before any
 * body or statement is lowered, so calls may precede the definition they
 * reach and definitions may call each other. A lowering or runtime failure
 * is reported to `sink` in item order and the remaining items still run.
 * Returns one outcome per item.
 */
export function runProgram(
  ctx: CompilationContext,
  env: Environment,
  items: readonly Item[],
  sink: DiagnosticSink,
  origin: ProgramOrigin = { file: "<input>", source: null },
  options: RunProgramOptions = {}
): UnitOutcome[] {
  const source = origin.source === null ? null : new SourceFile(origin.file, origin.source);
  const failed = (item: Item, err: unknown): UnitOutcome => ({
    ok: false,
    item,
    diagnostic: toDiagnostic(err, item.span, origin.file, source),
  });

  const settled = new Map<Item, UnitOutcome>();
  const declared: DeclaredFunction[] = [];

  // Pass 1: Register every function signature
  for (const item of items) {
    if (item.kind !== "FuncDef") continue;
    try {
      declared.push(declareFunction(ctx, item));
    } catch (err) {
      settled.set(item, failed(item, err));
    }
  }

  // Pass 2: Lower every definition body
  for (const decl of declared) {
    try {
      const unit: CompiledUnit = { fn: defineFunction(ctx, decl), definition: true };
      const result = options.checkOnly ? null : execute(ctx, env, unit);
      settled.set(decl.def, { ok: true, item: decl.def, unit, result });
    } catch (err) {
      settled.set(decl.def, failed(decl.def, err));
    }
  }

  // Pass 3: Run statements, delivering every outcome in item order
  const outcomes: UnitOutcome[] = [];
  for (const item of items) {
    let outcome = settled.get(item);
    if (!outcome) {
      try {
        const unit = compileItem(ctx, item);
        const result = options.checkOnly ? null : execute(ctx, env, unit);
        outcome = { ok: true, item, unit, result };
      } catch (err) {
        outcome = failed(item, err);
      }
    }
    if (!outcome.ok) sink.report(outcome.diagnostic);
    outcomes.push(outcome);
    options.onOutcome?.(outcome);
  }
  return outcomes;
}

// ─── Presentation ────────────────────────────────────────────────────────────

/** Render a value of static type `type` the way the driver displays results. */
export function formatValue(value: Value, type: Type): string {
  if (typeof value === "number") {
    return type.kind === TypeKind.Float ? formatFloat(value) : String(value);
  }
  if (typeof value === "boolean" || typeof value === "string") {
    return String(value);
  }
  if (value.kind === "unit") return "()";
  return `<fn ${value.name}: ${typeToString(value.type)}>`;
}
