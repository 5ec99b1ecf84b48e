/**
 * Test utilities for lowering and running statements.
 */

import { expect } from "vitest";
import type { Item, Statement } from "../../src/ast/nodes.ts";
import { CompilationContext } from "../../src/context/context.ts";
import { type RunResult, run } from "../../src/driver.ts";
import { CompileError, type ErrorKind } from "../../src/errors/index.ts";
import { reachableNodes } from "../../src/ir/cfg.ts";
import { Environment } from "../../src/ir/environment.ts";
import { type IrFunction, type IrStmt, UNIT } from "../../src/ir/ir-types.ts";
import { lowerStatementAsFunction } from "../../src/ir/lowering.ts";

/** An environment whose `print` output is collected in `lines`. */
export function captureEnv(maxCallDepth?: number): { env: Environment; lines: string[] } {
  const lines: string[] = [];
  const env = new Environment({ out: (line) => lines.push(line), maxCallDepth });
  return { env, lines };
}

/** Lower a statement as an ad hoc function in a fresh (or the given) context. */
export function lowerStmt(stmt: Statement, ctx = new CompilationContext()): IrFunction {
  return lowerStatementAsFunction(ctx, stmt);
}

/** Run items in order in one context; returns the last result and the printed lines. */
export function runItems(items: Item[], ctx = new CompilationContext()): {
  result: RunResult;
  lines: string[];
  ctx: CompilationContext;
} {
  const { env, lines } = captureEnv();
  let result: RunResult = { type: ctx.types.getUnit(), value: UNIT };
  for (const item of items) {
    result = run(ctx, env, item);
  }
  return { result, lines, ctx };
}

/** Reachable nodes of `fn`, in depth-first order from the entry. */
export function reachable(fn: IrFunction): IrStmt[] {
  const nodes: IrStmt[] = [];
  for (const id of reachableNodes(fn.nodes, fn.entry)) {
    const node = fn.nodes.get(id);
    if (node) nodes.push(node);
  }
  return nodes;
}

export function nodeAt(fn: IrFunction, id: string): IrStmt {
  const node = fn.nodes.get(id);
  if (!node) throw new Error(`no node '${id}' in '${fn.name}'`);
  return node;
}

/** Assert that `action` throws a CompileError of `kind`, and return it. */
export function expectCompileError(action: () => unknown, kind: ErrorKind): CompileError {
  let caught: unknown;
  try {
    action();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(CompileError);
  if (!(caught instanceof CompileError)) {
    throw new Error("expected a CompileError");
  }
  expect(caught.errorKind).toBe(kind);
  return caught;
}
