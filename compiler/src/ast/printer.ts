/**
 * AST debug dump: one line per node, two spaces per depth level.
 *
 * Node lines start with the node's span (`start-end`). Structural keyword
 * lines (`then`, `else`, `end if`, `args(n):`, ...) carry no span.
 */

import { formatFloat } from "../utils/format.ts";
import type {
  Expression,
  FuncDef,
  Param,
  Pattern,
  Program,
  Statement,
  TypeNode,
} from "./nodes.ts";
import { operatorName } from "./operators.ts";

export type AstNode = Expression | Statement | FuncDef | Param | Pattern | TypeNode | Program;

export function printAst(node: AstNode, depth = 0): string {
  const lines: string[] = [];
  dump(node, depth, lines);
  return lines.join("\n");
}

function dump(node: AstNode, depth: number, out: string[]): void {
  const pad = "  ".repeat(depth);
  const line = (label: string) => out.push(`${pad}${node.span.start}-${node.span.end} ${label}`);
  const keyword = (label: string) => out.push(`${pad}${label}`);
  const child = (n: AstNode) => dump(n, depth + 1, out);

  switch (node.kind) {
    // ─── Expressions ─────────────────────────────────────────────────────
    case "Identifier":
      line(`identifier(${node.name})`);
      break;
    case "IntLiteral":
      line(`integer(${node.value})`);
      break;
    case "FloatLiteral":
      line(`float(${formatFloat(node.value)})`);
      break;
    case "StringLiteral":
      line(`string(${node.value})`);
      break;
    case "CallExpr":
      line("call");
      child(node.callee);
      keyword(`args(${node.args.length}):`);
      for (const arg of node.args) child(arg);
      break;
    case "OperatorExpr":
      line(`operator(${operatorName(node.operator)})`);
      break;

    // ─── Types and patterns ──────────────────────────────────────────────
    case "TypeName":
      line(`type name(${node.name})`);
      break;
    case "IdPat":
      line(`identifier pattern(${node.name})`);
      break;

    // ─── Statements ──────────────────────────────────────────────────────
    case "ExprStmt":
      if (node.expression) {
        line("expression statement");
        child(node.expression);
      } else {
        line("expression statement (empty)");
      }
      break;
    case "BlockStmt":
      line("block");
      for (const stmt of node.statements) child(stmt);
      keyword("end block");
      break;
    case "IfStmt":
      line("if");
      child(node.condition);
      keyword("then");
      child(node.thenBranch);
      if (node.elseBranch) {
        keyword("else");
        child(node.elseBranch);
      }
      keyword("end if");
      break;
    case "WhileStmt":
      line("while");
      child(node.condition);
      keyword("do");
      child(node.body);
      keyword("end while");
      break;
    case "BreakStmt":
      line("break");
      break;
    case "ContinueStmt":
      line("continue");
      break;
    case "ReturnStmt":
      line("return");
      if (node.value) child(node.value);
      break;
    case "DeclStmt":
      line("decl");
      child(node.pattern);
      if (node.typeAnnotation) child(node.typeAnnotation);
      if (node.initializer) child(node.initializer);
      break;

    // ─── Items ───────────────────────────────────────────────────────────
    case "Param":
      line("param");
      child(node.pattern);
      child(node.type);
      break;
    case "FuncDef":
      line("function");
      child(node.target);
      keyword(`params(${node.params.length}):`);
      for (const param of node.params) child(param);
      if (node.returnType) {
        keyword("returns");
        child(node.returnType);
      }
      keyword("body");
      child(node.body);
      keyword("end function");
      break;
    case "Program":
      line(`program(${node.file})`);
      for (const item of node.items) child(item);
      break;
  }
}
