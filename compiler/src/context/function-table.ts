/**
 * Named functions: one ordered overload set per name. Holds the built-in
 * `print` overloads and every function definition lowered in the context.
 */

import type { Callable } from "../ir/ir-types.ts";
import type { FunctionType } from "../types/index.ts";
import { type OverloadEntry, OverloadSet } from "./overload-set.ts";

export class FunctionTable {
  private readonly sets = new Map<string, OverloadSet>();

  /** Register an overload. Returns the entry, or `null` if the signature is already taken. */
  define(name: string, type: FunctionType, impl: Callable): OverloadEntry | null {
    let set = this.sets.get(name);
    if (!set) {
      set = new OverloadSet();
      this.sets.set(name, set);
    }
    const entry: OverloadEntry = { type, impl };
    return set.add(entry) ? entry : null;
  }

  withdraw(name: string, entry: OverloadEntry): void {
    const set = this.sets.get(name);
    if (!set) return;
    set.remove(entry);
    if (set.size === 0) this.sets.delete(name);
  }

  lookup(name: string): OverloadSet | undefined {
    return this.sets.get(name);
  }
}
