/**
 * IR node types.
 * Uses discriminated unions with a `kind` field, matching AST conventions.
 *
 * Expressions are trees evaluated for a value; statements are nodes of an
 * explicit control-flow graph, one graph per function.
 */

export * from "./identifiers.ts";
export * from "./values.ts";
export * from "./expressions.ts";
export * from "./statements.ts";
export * from "./function.ts";
