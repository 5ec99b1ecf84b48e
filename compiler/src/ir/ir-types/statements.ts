import type { IrExpr } from "./expressions.ts";
import type { NodeId, SlotId } from "./identifiers.ts";

// ─── Statement Nodes ─────────────────────────────────────────────────────────

/**
 * Union of all statement nodes. Statement nodes form a control-flow graph:
 * each names its successor(s) by id, so shared successors (loop exits,
 * continue targets) and loop back-edges are ordinary references.
 */
export type IrStmt = IrNop | IrEval | IrAssign | IrBranch | IrReturn;

/** No effect; continue to `next`. */
export interface IrNop {
  kind: "nop";
  next: NodeId;
}

/** Evaluate `expr`, discard the value. */
export interface IrEval {
  kind: "eval";
  expr: IrExpr;
  next: NodeId;
}

/** Initialise a declared local. */
export interface IrAssign {
  kind: "assign";
  slot: SlotId;
  value: IrExpr;
  next: NodeId;
}

/** Continue to `thenNode` if `cond` is true, else to `elseNode`. */
export interface IrBranch {
  kind: "branch";
  cond: IrExpr;
  thenNode: NodeId;
  elseNode: NodeId;
}

/** End the invocation with `value` (unit when `null`). */
export interface IrReturn {
  kind: "return";
  value: IrExpr | null;
}
