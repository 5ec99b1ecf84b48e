import type { BaseNode } from "./base.ts";
import type { Item } from "./items.ts";

/** Root of a serialized input: the items of one file, in order. */
export interface Program extends BaseNode {
  kind: "Program";
  file: string;
  /** Original source text, when the producer kept it (used for diagnostics). */
  source: string | null;
  items: Item[];
}
