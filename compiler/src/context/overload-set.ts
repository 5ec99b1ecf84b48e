import type { Callable } from "../ir/ir-types.ts";
import type { FunctionType, Type } from "../types/index.ts";
import { paramsMatch } from "../types/index.ts";

/** One signature of an operator or function, with the callable that implements it. */
export interface OverloadEntry {
  type: FunctionType;
  impl: Callable;
}

/**
 * Ordered overload list. Order is significant: resolution returns the first
 * entry whose parameter types are identical to the argument types. There is
 * no ambiguity detection and no coercion.
 */
export class OverloadSet {
  private readonly entries: OverloadEntry[] = [];

  /**
   * Append an overload. Returns `false` (and adds nothing) if an entry with
   * identical parameter types already exists; the return type is not part
   * of the signature.
   */
  add(entry: OverloadEntry): boolean {
    if (this.entries.some((e) => paramsMatch(e.type.params, entry.type.params))) {
      return false;
    }
    this.entries.push(entry);
    return true;
  }

  /** Withdraw a previously added entry (used when its definition fails to lower). */
  remove(entry: OverloadEntry): void {
    const index = this.entries.indexOf(entry);
    if (index >= 0) this.entries.splice(index, 1);
  }

  resolve(argTypes: readonly Type[]): OverloadEntry | undefined {
    return this.entries.find((e) => paramsMatch(e.type.params, argTypes));
  }

  get all(): readonly OverloadEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
