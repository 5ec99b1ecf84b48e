// ─── Type Kind Constants ────────────────────────────────────────────────────

export const TypeKind = {
  Int: "int",
  Bool: "bool",
  Float: "float",
  String: "string",
  Unit: "unit",
  Function: "function",
} as const;
