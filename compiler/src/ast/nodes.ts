/**
 * AST node types.
 * Uses discriminated unions with a `kind` field.
 */

export * from "./nodes/index.ts";
