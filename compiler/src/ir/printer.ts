/**
 * IR text format printer: human-readable debug output.
 *
 * One header line per function, then one line per node reachable from the
 * entry, in depth-first order.
 */

import { typeToString } from "../types/index.ts";
import { reachableNodes } from "./cfg.ts";
import type { IrExpr, IrFunction, IrStmt, NodeId, Value } from "./ir-types.ts";

export function printIrFunction(fn: IrFunction): string {
  const lines: string[] = [
    `function ${fn.name}: ${typeToString(fn.type)} locals=${fn.numLocals} entry=${fn.entry}`,
  ];
  for (const id of reachableNodes(fn.nodes, fn.entry)) {
    const node = fn.nodes.get(id);
    if (node) lines.push(`  ${printStmt(id, node)}`);
  }
  return lines.join("\n");
}

function printStmt(id: NodeId, node: IrStmt): string {
  switch (node.kind) {
    case "nop":
      return `${id}: nop -> ${node.next}`;
    case "eval":
      return `${id}: eval ${printExpr(node.expr)} -> ${node.next}`;
    case "assign":
      return `${id}: assign %${node.slot} = ${printExpr(node.value)} -> ${node.next}`;
    case "branch":
      return `${id}: branch ${printExpr(node.cond)} ? ${node.thenNode} : ${node.elseNode}`;
    case "return":
      return node.value ? `${id}: return ${printExpr(node.value)}` : `${id}: return`;
  }
}

export function printExpr(expr: IrExpr): string {
  switch (expr.kind) {
    case "imm":
      return printImmediate(expr.value);
    case "load":
      return `%${expr.slot}`;
    case "store":
      return `(%${expr.slot} = ${printExpr(expr.value)})`;
    case "call":
      return `${printExpr(expr.callee)}(${expr.args.map(printExpr).join(", ")})`;
  }
}

function printImmediate(value: Value): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value.kind === "unit") return "()";
  return `@${value.name}`;
}
