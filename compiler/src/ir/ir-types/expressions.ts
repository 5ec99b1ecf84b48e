import type { SlotId } from "./identifiers.ts";
import type { Value } from "./values.ts";

// ─── Expressions ─────────────────────────────────────────────────────────────

/**
 * Union of all IR expressions. Expressions form trees: every node owns its
 * operands exclusively, and evaluation never transfers control.
 */
export type IrExpr = IrImm | IrLoad | IrStore | IrCall;

/** Constant: int, float, bool, string, unit or a callable reference. */
export interface IrImm {
  kind: "imm";
  value: Value;
}

/** Read a local slot of the current frame. */
export interface IrLoad {
  kind: "load";
  slot: SlotId;
}

/** Write a local slot; yields the stored value. */
export interface IrStore {
  kind: "store";
  slot: SlotId;
  value: IrExpr;
}

/** Evaluate `callee`, then `args` left to right, then invoke. */
export interface IrCall {
  kind: "call";
  callee: IrExpr;
  args: IrExpr[];
}
