// ─── Identifiers ─────────────────────────────────────────────────────────────

/** Statement node label within one function, e.g. `"exit"`, `"if.3"`, `"while.head.5"`. */
export type NodeId = string;

/** Index of a local slot in a call frame. */
export type SlotId = number;
