/**
 * AST → IR lowering.
 *
 * One `FunctionLowerer` per function body. Statements are lowered with an
 * explicit continuation (the id of the node that runs next), so the result
 * is a control-flow graph built in a single descent, with no separate
 * CFG construction pass.
 *
 * Method implementations are split across:
 *   - lowering-decl.ts       (function definitions and ad hoc top-level functions)
 *   - lowering-stmt.ts       (statement lowering)
 *   - lowering-expr.ts       (expression lowering)
 *   - lowering-call.ts       (two-phase call resolution)
 *   - lowering-literals.ts   (literal expression lowering)
 *   - lowering-operators.ts  (assignment, compound assignment, increment/decrement)
 *   - lowering-types.ts      (type name resolution, zero values)
 *   - lowering-utils.ts      (node arena and slot helpers)
 */

import type { FuncDef, Statement } from "../ast/nodes.ts";
import { isMutatingOperator, operatorName } from "../ast/operators.ts";
import type { CompilationContext } from "../context/context.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import { type Type, typeToString } from "../types/index.ts";
import { EXIT_NODE, type IrFunction, type IrStmt, type NodeId } from "./ir-types.ts";

import * as callMethods from "./lowering-call.ts";
import * as declMethods from "./lowering-decl.ts";
import * as exprMethods from "./lowering-expr.ts";
import * as literalMethods from "./lowering-literals.ts";
import * as operatorMethods from "./lowering-operators.ts";
import * as stmtMethods from "./lowering-stmt.ts";
import * as typeMethods from "./lowering-types.ts";
import * as utilMethods from "./lowering-utils.ts";

// ─── Loop targets ────────────────────────────────────────────────────────────

export interface LoopTargets {
  /** Where `break` goes: the loop's own continuation. */
  exit: NodeId;
  /** Where `continue` goes: the loop head, which re-tests the condition. */
  continue: NodeId;
}

// ─── Lowerer ─────────────────────────────────────────────────────────────────

export class FunctionLowerer {
  ctx: CompilationContext;
  name: string;

  // Node arena for the function being lowered
  nodes: Map<NodeId, IrStmt> = new Map();
  nodeCounter = 0;

  /**
   * Placeholder ids standing for "whatever the next statement of this block
   * lowers to". Bound once that statement is lowered; resolved away by
   * `resolveLinks()`.
   */
  links: Map<NodeId, NodeId | null> = new Map();

  numLocals = 0;

  // Innermost enclosing loop, or null outside loops
  loop: LoopTargets | null = null;

  /**
   * Declared return type. `null` only for ad hoc top-level functions before
   * their first `return` fixes it.
   */
  returnType: Type | null;

  // Ad hoc top-level functions may fall off their end whatever they return
  readonly adHoc: boolean;

  constructor(ctx: CompilationContext, name: string, returnType: Type | null, adHoc = false) {
    this.ctx = ctx;
    this.name = name;
    this.returnType = returnType;
    this.adHoc = adHoc;
  }

  // ─── Declaration methods (from lowering-decl.ts) ────────────────────────
  declare bindParams: typeof declMethods.bindParams;
  declare lowerBody: typeof declMethods.lowerBody;

  // ─── Statement methods (from lowering-stmt.ts) ─────────────────────────
  declare lowerStatement: typeof stmtMethods.lowerStatement;
  declare lowerScopedStatement: typeof stmtMethods.lowerScopedStatement;
  declare lowerExprStmt: typeof stmtMethods.lowerExprStmt;
  declare lowerBlock: typeof stmtMethods.lowerBlock;
  declare lowerIfStmt: typeof stmtMethods.lowerIfStmt;
  declare lowerWhileStmt: typeof stmtMethods.lowerWhileStmt;
  declare lowerBreakStmt: typeof stmtMethods.lowerBreakStmt;
  declare lowerContinueStmt: typeof stmtMethods.lowerContinueStmt;
  declare lowerReturnStmt: typeof stmtMethods.lowerReturnStmt;
  declare lowerDeclStmt: typeof stmtMethods.lowerDeclStmt;
  declare lowerCondition: typeof stmtMethods.lowerCondition;

  // ─── Expression methods (from lowering-expr.ts) ────────────────────────
  declare lowerExpr: typeof exprMethods.lowerExpr;
  declare lowerIdentifier: typeof exprMethods.lowerIdentifier;
  declare lowerCallExpr: typeof exprMethods.lowerCallExpr;

  // ─── Call resolution methods (from lowering-call.ts) ───────────────────
  declare resolveCallable: typeof callMethods.resolveCallable;
  declare resolveOperatorCallable: typeof callMethods.resolveOperatorCallable;
  declare resolveNamedCallable: typeof callMethods.resolveNamedCallable;
  declare resolveValueCallable: typeof callMethods.resolveValueCallable;

  // ─── Literal methods (from lowering-literals.ts) ────────────────────────
  declare lowerIntLiteral: typeof literalMethods.lowerIntLiteral;
  declare lowerFloatLiteral: typeof literalMethods.lowerFloatLiteral;
  declare lowerStringLiteral: typeof literalMethods.lowerStringLiteral;

  // ─── Operator methods (from lowering-operators.ts) ──────────────────────
  declare lowerMutation: typeof operatorMethods.lowerMutation;
  declare lowerAssign: typeof operatorMethods.lowerAssign;
  declare lowerCompoundAssign: typeof operatorMethods.lowerCompoundAssign;
  declare lowerStep: typeof operatorMethods.lowerStep;
  declare assignTarget: typeof operatorMethods.assignTarget;

  // ─── Type methods (from lowering-types.ts) ──────────────────────────────
  declare resolveTypeNode: typeof typeMethods.resolveTypeNode;
  declare zeroValue: typeof typeMethods.zeroValue;

  // ─── Utility methods (from lowering-utils.ts) ──────────────────────────
  declare freshNodeId: typeof utilMethods.freshNodeId;
  declare addNode: typeof utilMethods.addNode;
  declare reserveNode: typeof utilMethods.reserveNode;
  declare fillNode: typeof utilMethods.fillNode;
  declare reserveLink: typeof utilMethods.reserveLink;
  declare bindLink: typeof utilMethods.bindLink;
  declare resolveLink: typeof utilMethods.resolveLink;
  declare allocSlot: typeof utilMethods.allocSlot;
  declare resolveLinks: typeof utilMethods.resolveLinks;
}

// ─── Attach extracted methods to FunctionLowerer prototype ─────────────────

// Declaration methods
FunctionLowerer.prototype.bindParams = declMethods.bindParams;
FunctionLowerer.prototype.lowerBody = declMethods.lowerBody;

// Statement methods
FunctionLowerer.prototype.lowerStatement = stmtMethods.lowerStatement;
FunctionLowerer.prototype.lowerScopedStatement = stmtMethods.lowerScopedStatement;
FunctionLowerer.prototype.lowerExprStmt = stmtMethods.lowerExprStmt;
FunctionLowerer.prototype.lowerBlock = stmtMethods.lowerBlock;
FunctionLowerer.prototype.lowerIfStmt = stmtMethods.lowerIfStmt;
FunctionLowerer.prototype.lowerWhileStmt = stmtMethods.lowerWhileStmt;
FunctionLowerer.prototype.lowerBreakStmt = stmtMethods.lowerBreakStmt;
FunctionLowerer.prototype.lowerContinueStmt = stmtMethods.lowerContinueStmt;
FunctionLowerer.prototype.lowerReturnStmt = stmtMethods.lowerReturnStmt;
FunctionLowerer.prototype.lowerDeclStmt = stmtMethods.lowerDeclStmt;
FunctionLowerer.prototype.lowerCondition = stmtMethods.lowerCondition;

// Expression methods
FunctionLowerer.prototype.lowerExpr = exprMethods.lowerExpr;
FunctionLowerer.prototype.lowerIdentifier = exprMethods.lowerIdentifier;
FunctionLowerer.prototype.lowerCallExpr = exprMethods.lowerCallExpr;

// Call resolution methods
FunctionLowerer.prototype.resolveCallable = callMethods.resolveCallable;
FunctionLowerer.prototype.resolveOperatorCallable = callMethods.resolveOperatorCallable;
FunctionLowerer.prototype.resolveNamedCallable = callMethods.resolveNamedCallable;
FunctionLowerer.prototype.resolveValueCallable = callMethods.resolveValueCallable;

// Literal methods
FunctionLowerer.prototype.lowerIntLiteral = literalMethods.lowerIntLiteral;
FunctionLowerer.prototype.lowerFloatLiteral = literalMethods.lowerFloatLiteral;
FunctionLowerer.prototype.lowerStringLiteral = literalMethods.lowerStringLiteral;

// Operator methods
FunctionLowerer.prototype.lowerMutation = operatorMethods.lowerMutation;
FunctionLowerer.prototype.lowerAssign = operatorMethods.lowerAssign;
FunctionLowerer.prototype.lowerCompoundAssign = operatorMethods.lowerCompoundAssign;
FunctionLowerer.prototype.lowerStep = operatorMethods.lowerStep;
FunctionLowerer.prototype.assignTarget = operatorMethods.assignTarget;

// Type methods
FunctionLowerer.prototype.resolveTypeNode = typeMethods.resolveTypeNode;
FunctionLowerer.prototype.zeroValue = typeMethods.zeroValue;

// Utility methods
FunctionLowerer.prototype.freshNodeId = utilMethods.freshNodeId;
FunctionLowerer.prototype.addNode = utilMethods.addNode;
FunctionLowerer.prototype.reserveNode = utilMethods.reserveNode;
FunctionLowerer.prototype.fillNode = utilMethods.fillNode;
FunctionLowerer.prototype.reserveLink = utilMethods.reserveLink;
FunctionLowerer.prototype.bindLink = utilMethods.bindLink;
FunctionLowerer.prototype.resolveLink = utilMethods.resolveLink;
FunctionLowerer.prototype.allocSlot = utilMethods.allocSlot;
FunctionLowerer.prototype.resolveLinks = utilMethods.resolveLinks;

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Lower one top-level statement as the body of an ad hoc zero-argument
 * function. The statement runs in a scope of its own, popped afterwards
 * (also on failure).
 *
 * The function has no declared return type: its first `return` fixes it,
 * and it is `unit` when no `return` is lowered. Unlike a definition it may
 * also fall off its end, in which case the call yields unit.
 */
export function lowerStatementAsFunction(
  ctx: CompilationContext,
  stmt: Statement,
  name = "<top>"
): IrFunction {
  const lowerer = new FunctionLowerer(ctx, name, null, true);
  const entry = inFunctionScope(ctx, () => lowerer.lowerBody(stmt, stmt.span));
  const returnType = lowerer.returnType ?? ctx.types.getUnit();
  return {
    kind: "function",
    name,
    type: ctx.types.getFunc([], returnType),
    numParams: 0,
    numLocals: lowerer.numLocals,
    entry,
    nodes: lowerer.nodes,
  };
}

/** A definition whose signature is registered but whose body is not lowered yet. */
export interface DeclaredFunction {
  def: FuncDef;
  fn: IrFunction;
  lowerer: FunctionLowerer;
  params: Type[];
  withdraw: () => void;
}

/**
 * Resolve the signature of `def`, build its function shell, and register
 * it in the function table (named target) or the operator table (operator
 * target). The shell is callable by identity from here on, so bodies
 * lowered later, including its own, can call it.
 */
export function declareFunction(ctx: CompilationContext, def: FuncDef): DeclaredFunction {
  const target = def.target;
  const name = target.kind === "Identifier" ? target.name : operatorName(target.operator);
  const lowerer = new FunctionLowerer(ctx, name, null);
  const params = def.params.map((p) => lowerer.resolveTypeNode(p.type));
  const returnType = def.returnType ? lowerer.resolveTypeNode(def.returnType) : ctx.types.getUnit();
  lowerer.returnType = returnType;

  const fn: IrFunction = {
    kind: "function",
    name,
    type: ctx.types.getFunc(params, returnType),
    numParams: params.length,
    numLocals: params.length,
    entry: EXIT_NODE,
    nodes: new Map(),
  };
  return { def, fn, lowerer, params, withdraw: register(ctx, def, fn) };
}

/** Lower the body of a declared function into its shell. Withdraws the registration on failure. */
export function defineFunction(ctx: CompilationContext, declared: DeclaredFunction): IrFunction {
  const { def, fn, lowerer, params } = declared;
  try {
    fn.entry = inFunctionScope(ctx, () => {
      lowerer.bindParams(def.params, params);
      return lowerer.lowerBody(def.body, def.span);
    });
  } catch (err) {
    declared.withdraw();
    throw err;
  }
  fn.numLocals = lowerer.numLocals;
  fn.nodes = lowerer.nodes;
  return fn;
}

/** Declare and define `def` in one step. */
export function lowerFunctionDef(ctx: CompilationContext, def: FuncDef): IrFunction {
  return defineFunction(ctx, declareFunction(ctx, def));
}

/** Run `body` with one extra scope frame, restoring the stack depth afterwards. */
function inFunctionScope<T>(ctx: CompilationContext, body: () => T): T {
  const depth = ctx.scopes.depth;
  ctx.scopes.push();
  try {
    return body();
  } finally {
    ctx.scopes.truncate(depth);
  }
}

/** Add `fn` to the table its target names. Returns the undo action. */
function register(ctx: CompilationContext, def: FuncDef, fn: IrFunction): () => void {
  const target = def.target;
  if (target.kind === "Identifier") {
    const entry = ctx.functions.define(target.name, fn.type, fn);
    if (!entry) {
      throw new CompileError(
        ErrorKind.DuplicateOverload,
        target.span,
        `function '${target.name}' already has an overload ${typeToString(fn.type)}`,
        { callee: target.name, argTypes: fn.type.params.map(typeToString) }
      );
    }
    return () => ctx.functions.withdraw(target.name, entry);
  }

  const op = target.operator;
  if (isMutatingOperator(op)) {
    throw new CompileError(
      ErrorKind.InvalidOverloadTarget,
      target.span,
      `operator '${operatorName(op)}' cannot be overloaded`,
      { callee: operatorName(op) }
    );
  }
  const entry = ctx.operators.define(op, fn.type, fn);
  if (!entry) {
    throw new CompileError(
      ErrorKind.DuplicateOverload,
      target.span,
      `operator '${operatorName(op)}' already has an overload ${typeToString(fn.type)}`,
      { callee: operatorName(op), argTypes: fn.type.params.map(typeToString) }
    );
  }
  return () => ctx.operators.withdraw(op, entry);
}
