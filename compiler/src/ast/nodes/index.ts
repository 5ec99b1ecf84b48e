export type { BaseNode } from "./base.ts";

export type { TypeName, TypeNode } from "./types.ts";

export type { IdPat, Pattern } from "./patterns.ts";

export type {
  Identifier,
  IntLiteral,
  FloatLiteral,
  StringLiteral,
  CallExpr,
  OperatorExpr,
  Expression,
} from "./expressions.ts";

export type {
  ExprStmt,
  BlockStmt,
  IfStmt,
  WhileStmt,
  BreakStmt,
  ContinueStmt,
  ReturnStmt,
  DeclStmt,
  Statement,
} from "./statements.ts";

export type { Param, FuncDef, Item } from "./items.ts";

export type { Program } from "./program.ts";
