/**
 * Type registry: the single owner of every type in a compilation context.
 *
 * Primitive types are created once per registry. Function types are
 * interned structurally: requests with the same parameter types (compared
 * by identity) and the same return type yield the same object. Overload
 * resolution relies on this to compare types with `===`.
 *
 * Types from different registries must never be mixed.
 */

import type {
  BoolType,
  FloatType,
  FunctionType,
  IntType,
  StringType,
  Type,
  UnitType,
} from "./definitions.ts";
import { TypeKind } from "./kinds.ts";

export class TypeRegistry {
  private readonly intType: IntType = Object.freeze({ kind: TypeKind.Int });
  private readonly boolType: BoolType = Object.freeze({ kind: TypeKind.Bool });
  private readonly floatType: FloatType = Object.freeze({ kind: TypeKind.Float });
  private readonly stringType: StringType = Object.freeze({ kind: TypeKind.String });
  private readonly unitType: UnitType = Object.freeze({ kind: TypeKind.Unit });

  /** Interning key component per type; assigned on first use. */
  private readonly ids = new Map<Type, number>();
  private readonly functionTypes = new Map<string, FunctionType>();

  getInt(): IntType {
    return this.intType;
  }

  getBool(): BoolType {
    return this.boolType;
  }

  getFloat(): FloatType {
    return this.floatType;
  }

  getString(): StringType {
    return this.stringType;
  }

  getUnit(): UnitType {
    return this.unitType;
  }

  getFunc(params: readonly Type[], returnType: Type): FunctionType {
    const key = `${params.map((p) => this.idOf(p)).join(",")}->${this.idOf(returnType)}`;
    const existing = this.functionTypes.get(key);
    if (existing) return existing;

    const created: FunctionType = Object.freeze({
      kind: TypeKind.Function,
      params: Object.freeze([...params]),
      returnType,
    });
    this.functionTypes.set(key, created);
    return created;
  }

  /**
   * Resolve a built-in type name (`int`, `bool`, `float`, `string`, `unit`).
   * Returns `undefined` for anything else.
   */
  resolveName(name: string): Type | undefined {
    switch (name) {
      case "int":
        return this.intType;
      case "bool":
        return this.boolType;
      case "float":
        return this.floatType;
      case "string":
        return this.stringType;
      case "unit":
        return this.unitType;
      default:
        return undefined;
    }
  }

  private idOf(type: Type): number {
    const known = this.ids.get(type);
    if (known !== undefined) return known;
    const id = this.ids.size;
    this.ids.set(type, id);
    return id;
  }
}
