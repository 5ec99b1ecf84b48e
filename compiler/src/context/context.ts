import { TypeRegistry } from "../types/index.ts";
import { seedBuiltins } from "./builtins.ts";
import { FunctionTable } from "./function-table.ts";
import { OperatorTable } from "./operator-table.ts";
import { ScopeStack } from "./scope-stack.ts";

/**
 * Everything lowering needs that outlives a single unit: the type registry,
 * the operator and function tables, and the scope stack.
 *
 * One context per compilation. Contexts never share types, since overload
 * resolution compares types by identity.
 */
export class CompilationContext {
  readonly types = new TypeRegistry();
  readonly operators = new OperatorTable();
  readonly functions = new FunctionTable();
  readonly scopes = new ScopeStack();

  constructor() {
    seedBuiltins(this.types, this.operators, this.functions);
  }
}
