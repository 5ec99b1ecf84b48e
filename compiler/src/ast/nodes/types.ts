import type { BaseNode } from "./base.ts";

/** A type written by name, e.g. `int`. Resolved against the type registry during lowering. */
export interface TypeName extends BaseNode {
  kind: "TypeName";
  name: string;
}

/** Any type annotation in surface syntax. */
export type TypeNode = TypeName;
