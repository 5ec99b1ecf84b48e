/**
 * Builders for AST nodes.
 *
 * Parsing is not part of this package: a front end (or a test) assembles
 * trees with these helpers, or hands over a JSON-encoded `Program`. Every
 * builder takes an optional span; it defaults to the empty span at 0.
 */

import type { Span } from "../utils/source.ts";
import type {
  BlockStmt,
  BreakStmt,
  CallExpr,
  ContinueStmt,
  DeclStmt,
  Expression,
  ExprStmt,
  FloatLiteral,
  FuncDef,
  Identifier,
  IdPat,
  IfStmt,
  IntLiteral,
  Item,
  OperatorExpr,
  Param,
  Program,
  ReturnStmt,
  Statement,
  StringLiteral,
  TypeName,
  WhileStmt,
} from "./nodes.ts";
import type { Operator } from "./operators.ts";

export const NO_SPAN: Span = Object.freeze({ start: 0, end: 0 });

// ─── Expressions ─────────────────────────────────────────────────────────────

export function ident(name: string, span: Span = NO_SPAN): Identifier {
  return { kind: "Identifier", span, name };
}

export function intLit(value: number, span: Span = NO_SPAN): IntLiteral {
  return { kind: "IntLiteral", span, value };
}

export function floatLit(value: number, span: Span = NO_SPAN): FloatLiteral {
  return { kind: "FloatLiteral", span, value };
}

export function stringLit(value: string, span: Span = NO_SPAN): StringLiteral {
  return { kind: "StringLiteral", span, value };
}

export function op(operator: Operator, span: Span = NO_SPAN): OperatorExpr {
  return { kind: "OperatorExpr", span, operator };
}

export function call(callee: Expression, args: Expression[], span: Span = NO_SPAN): CallExpr {
  return { kind: "CallExpr", span, callee, args };
}

/** `operator(args...)`, e.g. `apply(Operator.Add, a, b)` for `a + b`. */
export function apply(operator: Operator, ...args: Expression[]): CallExpr {
  return call(op(operator), args);
}

// ─── Types and patterns ──────────────────────────────────────────────────────

export function typeName(name: string, span: Span = NO_SPAN): TypeName {
  return { kind: "TypeName", span, name };
}

export function idPat(name: string, span: Span = NO_SPAN): IdPat {
  return { kind: "IdPat", span, name };
}

// ─── Statements ──────────────────────────────────────────────────────────────

export function exprStmt(expression: Expression | null, span: Span = NO_SPAN): ExprStmt {
  return { kind: "ExprStmt", span, expression };
}

export function block(statements: Statement[], span: Span = NO_SPAN): BlockStmt {
  return { kind: "BlockStmt", span, statements };
}

export function ifStmt(
  condition: Expression,
  thenBranch: Statement,
  elseBranch: Statement | null = null,
  span: Span = NO_SPAN
): IfStmt {
  return { kind: "IfStmt", span, condition, thenBranch, elseBranch };
}

export function whileStmt(condition: Expression, body: Statement, span: Span = NO_SPAN): WhileStmt {
  return { kind: "WhileStmt", span, condition, body };
}

export function breakStmt(span: Span = NO_SPAN): BreakStmt {
  return { kind: "BreakStmt", span };
}

export function continueStmt(span: Span = NO_SPAN): ContinueStmt {
  return { kind: "ContinueStmt", span };
}

export function returnStmt(value: Expression | null = null, span: Span = NO_SPAN): ReturnStmt {
  return { kind: "ReturnStmt", span, value };
}

/** `let name: type = init`; pass `null` for an absent annotation or initializer. */
export function decl(
  name: string,
  type: string | null,
  initializer: Expression | null,
  span: Span = NO_SPAN
): DeclStmt {
  return {
    kind: "DeclStmt",
    span,
    pattern: idPat(name),
    typeAnnotation: type === null ? null : typeName(type),
    initializer,
  };
}

// ─── Items ───────────────────────────────────────────────────────────────────

export function param(name: string, type: string, span: Span = NO_SPAN): Param {
  return { kind: "Param", span, pattern: idPat(name), type: typeName(type) };
}

export function funcDef(
  target: Identifier | OperatorExpr,
  params: Param[],
  returnType: string | null,
  body: BlockStmt,
  span: Span = NO_SPAN
): FuncDef {
  return {
    kind: "FuncDef",
    span,
    target,
    params,
    returnType: returnType === null ? null : typeName(returnType),
    body,
  };
}

export function program(items: Item[], file = "<input>", source: string | null = null): Program {
  return { kind: "Program", span: { start: 0, end: source?.length ?? 0 }, file, source, items };
}
