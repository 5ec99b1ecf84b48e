/**
 * Statement lowering methods for FunctionLowerer.
 * Extracted from lowering.ts for modularity.
 *
 * Every method takes the continuation `next` (the node control reaches
 * when the statement completes normally) and returns the id of the
 * statement's first node. `break`, `continue` and `return` ignore `next`.
 */

import type {
  BlockStmt,
  BreakStmt,
  ContinueStmt,
  DeclStmt,
  Expression,
  ExprStmt,
  IfStmt,
  ReturnStmt,
  Statement,
  WhileStmt,
} from "../ast/nodes.ts";
import { CompileError, ErrorKind } from "../errors/index.ts";
import { type Type, typeToString } from "../types/index.ts";
import type { IrExpr, NodeId } from "./ir-types.ts";
import type { FunctionLowerer } from "./lowering.ts";

// ─── Statements ──────────────────────────────────────────────────────────

export function lowerStatement(this: FunctionLowerer, stmt: Statement, next: NodeId): NodeId {
  switch (stmt.kind) {
    case "ExprStmt":
      return this.lowerExprStmt(stmt, next);
    case "BlockStmt":
      return this.lowerBlock(stmt, next);
    case "IfStmt":
      return this.lowerIfStmt(stmt, next);
    case "WhileStmt":
      return this.lowerWhileStmt(stmt, next);
    case "BreakStmt":
      return this.lowerBreakStmt(stmt);
    case "ContinueStmt":
      return this.lowerContinueStmt(stmt);
    case "ReturnStmt":
      return this.lowerReturnStmt(stmt);
    case "DeclStmt":
      return this.lowerDeclStmt(stmt, next);
  }
}

/** Lower a branch or loop body in a scope of its own, so a bare `Decl` there does not leak. */
export function lowerScopedStatement(this: FunctionLowerer, stmt: Statement, next: NodeId): NodeId {
  this.ctx.scopes.push();
  const entry = this.lowerStatement(stmt, next);
  this.ctx.scopes.pop();
  return entry;
}

export function lowerExprStmt(this: FunctionLowerer, stmt: ExprStmt, next: NodeId): NodeId {
  if (!stmt.expression) {
    return this.addNode("nop", { kind: "nop", next });
  }
  const lowered = this.lowerExpr(stmt.expression);
  return this.addNode("eval", { kind: "eval", expr: lowered.ir, next });
}

/**
 * Statements are lowered in source order so each sees the declarations
 * before it, but each one's continuation is a link bound to the entry of
 * the statement after it. Once links are resolved the graph is the same as
 * folding the block from the right.
 */
export function lowerBlock(this: FunctionLowerer, block: BlockStmt, next: NodeId): NodeId {
  const count = block.statements.length;
  if (count === 0) return next;

  this.ctx.scopes.push();
  let entry = next;
  let pending: NodeId | null = null;
  for (const [i, stmt] of block.statements.entries()) {
    const isLast = i === count - 1;
    const continuation = isLast ? next : this.reserveLink();
    const id = this.lowerStatement(stmt, continuation);
    if (pending === null) {
      entry = id;
    } else {
      this.bindLink(pending, id);
    }
    pending = isLast ? null : continuation;
  }
  this.ctx.scopes.pop();
  return entry;
}

export function lowerIfStmt(this: FunctionLowerer, stmt: IfStmt, next: NodeId): NodeId {
  const cond = this.lowerCondition(stmt.condition);
  const thenNode = this.lowerScopedStatement(stmt.thenBranch, next);
  const elseNode = stmt.elseBranch ? this.lowerScopedStatement(stmt.elseBranch, next) : next;
  return this.addNode("if", { kind: "branch", cond, thenNode, elseNode });
}

/**
 * The loop head tests the condition. Its id is reserved first because the
 * body continues to it (and `continue` targets it); it is filled once the
 * body exists. `next` is both the normal exit and the `break` target.
 */
export function lowerWhileStmt(this: FunctionLowerer, stmt: WhileStmt, next: NodeId): NodeId {
  const head = this.reserveNode("while.head");
  const cond = this.lowerCondition(stmt.condition);

  const outer = this.loop;
  this.loop = { exit: next, continue: head };
  const body = this.lowerScopedStatement(stmt.body, head);
  this.loop = outer;

  this.fillNode(head, { kind: "branch", cond, thenNode: body, elseNode: next });
  return head;
}

export function lowerBreakStmt(this: FunctionLowerer, stmt: BreakStmt): NodeId {
  if (!this.loop) {
    throw new CompileError(ErrorKind.BreakOutsideLoop, stmt.span, "'break' outside of a loop");
  }
  return this.loop.exit;
}

export function lowerContinueStmt(this: FunctionLowerer, stmt: ContinueStmt): NodeId {
  if (!this.loop) {
    throw new CompileError(
      ErrorKind.ContinueOutsideLoop,
      stmt.span,
      "'continue' outside of a loop"
    );
  }
  return this.loop.continue;
}

export function lowerReturnStmt(this: FunctionLowerer, stmt: ReturnStmt): NodeId {
  const lowered = stmt.value ? this.lowerExpr(stmt.value) : null;
  const actual: Type = lowered ? lowered.type : this.ctx.types.getUnit();

  if (this.returnType === null) {
    this.returnType = actual;
  } else if (actual !== this.returnType) {
    throw new CompileError(
      ErrorKind.ReturnTypeMismatch,
      stmt.value?.span ?? stmt.span,
      `'${this.name}' returns ${typeToString(this.returnType)}, not ${typeToString(actual)}`,
      { expected: typeToString(this.returnType), actual: typeToString(actual) }
    );
  }
  return this.addNode("return", { kind: "return", value: lowered ? lowered.ir : null });
}

/**
 * The initializer is lowered before the name is bound, so `let x = x + 1`
 * reads an outer `x`. A declaration without initializer stores the type's
 * zero value; slots are reused across loop iterations.
 */
export function lowerDeclStmt(this: FunctionLowerer, stmt: DeclStmt, next: NodeId): NodeId {
  const name = stmt.pattern.name;
  const declared = stmt.typeAnnotation ? this.resolveTypeNode(stmt.typeAnnotation) : null;
  const init = stmt.initializer ? this.lowerExpr(stmt.initializer) : null;

  let type: Type;
  let value: IrExpr;
  if (init) {
    if (declared && init.type !== declared) {
      throw new CompileError(
        ErrorKind.DeclTypeMismatch,
        stmt.initializer?.span ?? stmt.span,
        `'${name}' is declared ${typeToString(declared)} but initialized with ${typeToString(init.type)}`,
        { expected: typeToString(declared), actual: typeToString(init.type) }
      );
    }
    type = init.type;
    value = init.ir;
  } else if (declared) {
    const zero = this.zeroValue(declared);
    if (zero === null) {
      throw new CompileError(
        ErrorKind.InvalidDecl,
        stmt.span,
        `'${name}' of type ${typeToString(declared)} needs an initializer`
      );
    }
    type = declared;
    value = { kind: "imm", value: zero };
  } else {
    throw new CompileError(
      ErrorKind.InvalidDecl,
      stmt.span,
      `declaration of '${name}' needs a type or an initializer`
    );
  }

  const slot = this.allocSlot();
  this.ctx.scopes.declare(name, slot, type);
  return this.addNode("decl", { kind: "assign", slot, value, next });
}

/** Lower an `if`/`while` condition, which must be `bool`. */
export function lowerCondition(this: FunctionLowerer, expr: Expression): IrExpr {
  const lowered = this.lowerExpr(expr);
  if (lowered.type !== this.ctx.types.getBool()) {
    throw new CompileError(
      ErrorKind.ConditionNotBool,
      expr.span,
      `condition must be bool, found ${typeToString(lowered.type)}`,
      { expected: "bool", actual: typeToString(lowered.type) }
    );
  }
  return lowered.ir;
}
