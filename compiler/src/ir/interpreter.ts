/**
 * Execution core: invokes lowered functions against fresh frames.
 *
 * Statement nodes are walked iteratively; a nested call re-enters
 * `invoke`, so recursion depth is bounded by `Environment.maxCallDepth`
 * and, below that, by the host stack.
 */

import { RuntimeError, RuntimeErrorKind } from "../errors/runtime-error.ts";
import type { Environment } from "./environment.ts";
import {
  type Callable,
  type IrExpr,
  type IrFunction,
  isCallable,
  UNIT,
  type Value,
} from "./ir-types.ts";

/** Per-invocation storage: one slot per local, never shared. */
export class Frame {
  readonly slots: Value[];

  constructor(numLocals: number, args: readonly Value[]) {
    this.slots = new Array<Value>(numLocals).fill(UNIT);
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg !== undefined) this.slots[i] = arg;
    }
  }

  read(slot: number): Value {
    const value = this.slots[slot];
    if (value === undefined) {
      throw new RuntimeError(RuntimeErrorKind.TypeFault, `slot ${slot} is outside the frame`);
    }
    return value;
  }

  write(slot: number, value: Value): void {
    if (slot < 0 || slot >= this.slots.length) {
      throw new RuntimeError(RuntimeErrorKind.TypeFault, `slot ${slot} is outside the frame`);
    }
    this.slots[slot] = value;
  }
}

export function invoke(callee: Callable, args: readonly Value[], env: Environment): Value {
  if (callee.kind === "native") {
    return callee.apply(args, env);
  }
  if (env.callDepth >= env.maxCallDepth) {
    throw new RuntimeError(
      RuntimeErrorKind.StackOverflow,
      `call depth exceeded ${env.maxCallDepth} while calling '${callee.name}'`
    );
  }
  env.callDepth++;
  try {
    return runGraph(callee, new Frame(callee.numLocals, args), env);
  } catch (err) {
    // The host stack can run out before maxCallDepth is reached
    if (err instanceof RangeError && /call stack/i.test(err.message)) {
      throw new RuntimeError(
        RuntimeErrorKind.StackOverflow,
        `host stack exhausted at call depth ${env.callDepth} while calling '${callee.name}'`
      );
    }
    throw err;
  } finally {
    env.callDepth--;
  }
}

function runGraph(fn: IrFunction, frame: Frame, env: Environment): Value {
  let current = fn.entry;
  for (;;) {
    const node = fn.nodes.get(current);
    if (!node) {
      throw new RuntimeError(
        RuntimeErrorKind.TypeFault,
        `function '${fn.name}' has no node '${current}'`
      );
    }
    switch (node.kind) {
      case "nop":
        current = node.next;
        break;
      case "eval":
        evaluate(node.expr, frame, env);
        current = node.next;
        break;
      case "assign":
        frame.write(node.slot, evaluate(node.value, frame, env));
        current = node.next;
        break;
      case "branch": {
        const cond = evaluate(node.cond, frame, env);
        if (typeof cond !== "boolean") {
          throw new RuntimeError(RuntimeErrorKind.TypeFault, "branch condition is not a bool");
        }
        current = cond ? node.thenNode : node.elseNode;
        break;
      }
      case "return":
        return node.value ? evaluate(node.value, frame, env) : UNIT;
    }
  }
}

export function evaluate(expr: IrExpr, frame: Frame, env: Environment): Value {
  switch (expr.kind) {
    case "imm":
      return expr.value;
    case "load":
      return frame.read(expr.slot);
    case "store": {
      const value = evaluate(expr.value, frame, env);
      frame.write(expr.slot, value);
      return value;
    }
    case "call": {
      const callee = evaluate(expr.callee, frame, env);
      if (!isCallable(callee)) {
        throw new RuntimeError(RuntimeErrorKind.TypeFault, "callee is not a function");
      }
      const args = expr.args.map((arg) => evaluate(arg, frame, env));
      return invoke(callee, args, env);
    }
  }
}
