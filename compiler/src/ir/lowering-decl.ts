/**
 * Function-level lowering steps for FunctionLowerer: parameter binding
 * and body lowering with the fall-through check.
 */

import type { Param, Statement } from "../ast/nodes.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import { type Type, typeToString } from "../types/index.ts";
import type { Span } from "../utils/source.ts";
import { canReach } from "./cfg.ts";
import { EXIT_NODE, type NodeId } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

/** Bind parameters to slots `0..n-1`, in order, in the current scope. */
export function bindParams(
  this: FunctionLowerer,
  params: readonly Param[],
  types: readonly Type[]
): void {
  params.forEach((param, index) => {
    const type = types[index];
    if (!type) throw new Error(`no type for parameter ${index} of '${this.name}'`);
    const slot = this.allocSlot();
    this.ctx.scopes.declare(param.pattern.name, slot, type);
  });
}

/**
 * Lower `body` with the function's `exit` node as its continuation and
 * return the resolved entry id.
 *
 * Falling off the end reaches `exit`, which returns unit; that is an error
 * when a defined function returns anything else.
 */
export function lowerBody(this: FunctionLowerer, body: Statement, span: Span): NodeId {
  this.nodes.set(EXIT_NODE, { kind: "return", value: null });
  const entry = this.resolveLinks(this.lowerStatement(body, EXIT_NODE));

  const returnType = this.returnType;
  if (
    !this.adHoc &&
    returnType !== null &&
    returnType !== this.ctx.types.getUnit() &&
    canReach(this.nodes, entry, EXIT_NODE)
  ) {
    throw new CompileError(
      ErrorKind.MissingReturn,
      span,
      `'${this.name}' can reach its end without returning ${typeToString(returnType)}`,
      { expected: typeToString(returnType), actual: "unit" }
    );
  }
  return entry;
}
