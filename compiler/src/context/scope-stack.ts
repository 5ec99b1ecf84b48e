/**
 * Lexical scope stack used during lowering.
 *
 * Each frame maps names to local slots and their static types. Blocks push
 * a frame on entry and pop it on exit; lookup walks from the innermost
 * frame outwards, so an inner declaration hides an outer one only until
 * its block ends.
 */

import type { SlotId } from "../ir/ir-types.ts";
import type { Type } from "../types/index.ts";

export interface LocalBinding {
  name: string;
  slot: SlotId;
  type: Type;
}

export class ScopeStack {
  private readonly frames: Map<string, LocalBinding>[] = [];

  push(): void {
    this.frames.push(new Map());
  }

  pop(): void {
    if (this.frames.pop() === undefined) {
      throw new Error("ScopeStack.pop() called with no open scope");
    }
  }

  /** Pop frames until only `depth` remain (restores the stack after an aborted unit). */
  truncate(depth: number): void {
    while (this.frames.length > depth) this.frames.pop();
  }

  /**
   * Bind `name` in the innermost frame. Re-declaring a name in the same
   * frame rebinds it to the new slot.
   */
  declare(name: string, slot: SlotId, type: Type): LocalBinding {
    const top = this.frames[this.frames.length - 1];
    if (!top) {
      throw new Error(`ScopeStack.declare('${name}') called with no open scope`);
    }
    const binding: LocalBinding = { name, slot, type };
    top.set(name, binding);
    return binding;
  }

  lookup(name: string): LocalBinding | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const binding = this.frames[i]?.get(name);
      if (binding) return binding;
    }
    return undefined;
  }

  get depth(): number {
    return this.frames.length;
  }
}
