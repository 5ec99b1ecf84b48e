export { nativeFunction, seedBuiltins } from "./builtins.ts";
export { CompilationContext } from "./context.ts";
export { FunctionTable } from "./function-table.ts";
export { OperatorTable } from "./operator-table.ts";
export { OverloadSet } from "./overload-set.ts";
export type { OverloadEntry } from "./overload-set.ts";
export { ScopeStack } from "./scope-stack.ts";
export type { LocalBinding } from "./scope-stack.ts";
