import type { BaseNode } from "./base.ts";
import type { Identifier, OperatorExpr } from "./expressions.ts";
import type { Pattern } from "./patterns.ts";
import type { BlockStmt, Statement } from "./statements.ts";
import type { TypeNode } from "./types.ts";

/** Function parameter `pat: T`. */
export interface Param extends BaseNode {
  kind: "Param";
  pattern: Pattern;
  type: TypeNode;
}

/**
 * Function definition. An `Identifier` target adds an overload to the named
 * function; an `OperatorExpr` target adds a user overload of that operator.
 */
export interface FuncDef extends BaseNode {
  kind: "FuncDef";
  target: Identifier | OperatorExpr;
  params: Param[];
  /** `null` means the function returns `unit`. */
  returnType: TypeNode | null;
  body: BlockStmt;
}

/** A top-level unit handed to the driver. */
export type Item = Statement | FuncDef;
