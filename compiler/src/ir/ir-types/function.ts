import type { FunctionType } from "../../types/index.ts";
import type { NodeId } from "./identifiers.ts";
import type { IrStmt } from "./statements.ts";

// ─── Function ────────────────────────────────────────────────────────────────

/**
 * A lowered function: a statement graph plus the frame layout.
 *
 * The object is created before its body is lowered (so recursive calls can
 * reference it) and filled in once when lowering finishes; after that the
 * graph is never modified and may be invoked any number of times,
 * including recursively.
 */
export interface IrFunction {
  readonly kind: "function";
  readonly name: string;
  readonly type: FunctionType;
  /** Arguments are bound to slots `0..numParams-1`. */
  readonly numParams: number;
  numLocals: number;
  entry: NodeId;
  nodes: ReadonlyMap<NodeId, IrStmt>;
}

/** Id of the terminal return node every function owns. */
export const EXIT_NODE: NodeId = "exit";
