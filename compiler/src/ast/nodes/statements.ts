import type { BaseNode } from "./base.ts";
import type { Expression } from "./expressions.ts";
import type { Pattern } from "./patterns.ts";
import type { TypeNode } from "./types.ts";

/** Expression evaluated for its effect. `expression` is `null` for an empty statement (`;`). */
export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expression: Expression | null;
}

/** Braced block of statements `{ ... }`; opens a scope. */
export interface BlockStmt extends BaseNode {
  kind: "BlockStmt";
  statements: Statement[];
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  condition: Expression;
  thenBranch: Statement;
  elseBranch: Statement | null;
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  condition: Expression;
  body: Statement;
}

/** Break out of the enclosing loop. */
export interface BreakStmt extends BaseNode {
  kind: "BreakStmt";
}

/** Re-check the enclosing loop's condition. */
export interface ContinueStmt extends BaseNode {
  kind: "ContinueStmt";
}

/** Return from the enclosing function, optionally with a value. */
export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value: Expression | null;
}

/**
 * Local declaration `let pat: T = init`.
 * At least one of `typeAnnotation` and `initializer` is present.
 */
export interface DeclStmt extends BaseNode {
  kind: "DeclStmt";
  pattern: Pattern;
  typeAnnotation: TypeNode | null;
  initializer: Expression | null;
}

/** Union of all statement nodes. */
export type Statement =
  | ExprStmt
  | BlockStmt
  | IfStmt
  | WhileStmt
  | BreakStmt
  | ContinueStmt
  | ReturnStmt
  | DeclStmt;
