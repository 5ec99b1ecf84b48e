import type { BaseNode } from "./base.ts";

/** Pattern binding a single name. */
export interface IdPat extends BaseNode {
  kind: "IdPat";
  name: string;
}

export type Pattern = IdPat;
