import { describe, expect, test } from "vitest";
import {
  apply,
  block,
  decl,
  exprStmt,
  ident,
  intLit,
  returnStmt,
  stringLit,
  whileStmt,
} from "../../src/ast/factory.ts";
import { Operator } from "../../src/ast/operators.ts";
import { printExpr, printIrFunction } from "../../src/ir/printer.ts";
import { UNIT } from "../../src/ir/ir-types.ts";
import { lowerStmt } from "../lowering/helpers.ts";

describe("printIrFunction", () => {
  test("a loop", () => {
    const i = ident("i");
    const fn = lowerStmt(
      block([
        decl("i", null, intLit(0)),
        whileStmt(
          apply(Operator.Less, i, intLit(3)),
          exprStmt(apply(Operator.AddAssign, i, intLit(1)))
        ),
      ])
    );
    expect(printIrFunction(fn).split("\n")).toEqual([
      "function <top>: () -> unit locals=1 entry=decl.1",
      "  decl.1: assign %0 = 0 -> while.head.2",
      "  while.head.2: branch @integer-less(%0, 3) ? eval.3 : exit",
      "  eval.3: eval (%0 = @integer-add(%0, 1)) -> while.head.2",
      "  exit: return",
    ]);
  });

  test("postfix increment reads before it stores", () => {
    const fn = lowerStmt(
      block([decl("i", null, intLit(0)), returnStmt(apply(Operator.PostInc, ident("i")))])
    );
    expect(printIrFunction(fn).split("\n")).toEqual([
      "function <top>: () -> int locals=1 entry=decl.1",
      "  decl.1: assign %0 = 0 -> return.2",
      "  return.2: return @first(%0, (%0 = @integer-add(%0, 1)))",
    ]);
  });

  test("only reachable nodes are listed", () => {
    const fn = lowerStmt(block([returnStmt(stringLit("a\"b")), exprStmt(null)]));
    expect(printIrFunction(fn).split("\n")).toEqual([
      "function <top>: () -> string locals=0 entry=return.1",
      '  return.1: return "a\\"b"',
    ]);
  });
});

describe("printExpr", () => {
  test("immediates", () => {
    expect(printExpr({ kind: "imm", value: true })).toBe("true");
    expect(printExpr({ kind: "imm", value: -4 })).toBe("-4");
    expect(printExpr({ kind: "imm", value: UNIT })).toBe("()");
  });
});
