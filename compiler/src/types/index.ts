export { TypeKind } from "./kinds.ts";
export type {
  BoolType,
  FloatType,
  FunctionType,
  IntType,
  StringType,
  Type,
  UnitType,
} from "./definitions.ts";
export { TypeRegistry } from "./registry.ts";
export { isFunctionType, paramsMatch, typeListToString, typeToString } from "./utilities.ts";
