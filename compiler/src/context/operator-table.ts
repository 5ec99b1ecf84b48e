/**
 * Operator table: one ordered overload set per operator.
 *
 * Seeded with the built-in overloads when a compilation context is created;
 * user operator definitions are appended after them. Lookup happens only
 * through call resolution, once argument types are known.
 */

import type { Operator } from "../ast/operators.ts";
import type { Callable } from "../ir/ir-types.ts";
import type { FunctionType, Type } from "../types/index.ts";
import { type OverloadEntry, OverloadSet } from "./overload-set.ts";

export class OperatorTable {
  private readonly sets = new Map<Operator, OverloadSet>();

  /** Register an overload. Returns the entry, or `null` if the signature is already taken. */
  define(op: Operator, type: FunctionType, impl: Callable): OverloadEntry | null {
    let set = this.sets.get(op);
    if (!set) {
      set = new OverloadSet();
      this.sets.set(op, set);
    }
    const entry: OverloadEntry = { type, impl };
    return set.add(entry) ? entry : null;
  }

  withdraw(op: Operator, entry: OverloadEntry): void {
    this.sets.get(op)?.remove(entry);
  }

  resolve(op: Operator, argTypes: readonly Type[]): OverloadEntry | undefined {
    return this.sets.get(op)?.resolve(argTypes);
  }

  overloads(op: Operator): readonly OverloadEntry[] {
    return this.sets.get(op)?.all ?? [];
  }
}
