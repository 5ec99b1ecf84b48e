import type { Operator } from "../operators.ts";
import type { BaseNode } from "./base.ts";

/** Name reference: a local, a function, or a function overload set. */
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

/** Integer literal (32-bit). */
export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: number;
}

/** Floating-point literal. */
export interface FloatLiteral extends BaseNode {
  kind: "FloatLiteral";
  value: number;
}

/** String literal; `value` holds the unescaped text. */
export interface StringLiteral extends BaseNode {
  kind: "StringLiteral";
  value: string;
}

/**
 * Call of `callee` with positional arguments. Operator applications are
 * calls too: `1 + 2` is a call whose callee is `OperatorExpr(Add)`.
 */
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: Expression;
  args: Expression[];
}

/** An operator in callee position. */
export interface OperatorExpr extends BaseNode {
  kind: "OperatorExpr";
  operator: Operator;
}

/** Union of all expression nodes. */
export type Expression =
  | Identifier
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | CallExpr
  | OperatorExpr;
