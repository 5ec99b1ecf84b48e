import { describe, expect, test } from "vitest";
import {
  apply,
  block,
  breakStmt,
  decl,
  exprStmt,
  floatLit,
  funcDef,
  ident,
  ifStmt,
  intLit,
  param,
  program,
  returnStmt,
  stringLit,
  whileStmt,
} from "../../src/ast/factory.ts";
import { Operator } from "../../src/ast/operators.ts";
import { printAst } from "../../src/ast/printer.ts";

describe("printAst", () => {
  test("leaves", () => {
    expect(printAst(ident("x", { start: 3, end: 4 }))).toBe("3-4 identifier(x)");
    expect(printAst(floatLit(2))).toBe("0-0 float(2.0)");
    expect(printAst(stringLit("hi there"))).toBe("0-0 string(hi there)");
    expect(printAst(exprStmt(null))).toBe("0-0 expression statement (empty)");
    expect(printAst(breakStmt())).toBe("0-0 break");
  });

  test("call arguments sit at the call's own depth", () => {
    expect(printAst(apply(Operator.Add, intLit(1), intLit(2))).split("\n")).toEqual([
      "0-0 call",
      "  0-0 operator(add)",
      "args(2):",
      "  0-0 integer(1)",
      "  0-0 integer(2)",
    ]);
  });

  test("a loop with a compound assignment", () => {
    const loop = whileStmt(
      apply(Operator.Less, ident("i"), intLit(3)),
      block([exprStmt(apply(Operator.AddAssign, ident("i"), intLit(1)))])
    );
    expect(printAst(loop).split("\n")).toEqual([
      "0-0 while",
      "  0-0 call",
      "    0-0 operator(less than)",
      "  args(2):",
      "    0-0 identifier(i)",
      "    0-0 integer(3)",
      "do",
      "  0-0 block",
      "    0-0 expression statement",
      "      0-0 call",
      "        0-0 operator(add assign)",
      "      args(2):",
      "        0-0 identifier(i)",
      "        0-0 integer(1)",
      "  end block",
      "end while",
    ]);
  });

  test("if with else, declarations and returns", () => {
    const stmt = ifStmt(
      ident("c"),
      decl("x", "int", intLit(1)),
      returnStmt(),
      { start: 0, end: 30 }
    );
    expect(printAst(stmt).split("\n")).toEqual([
      "0-30 if",
      "  0-0 identifier(c)",
      "then",
      "  0-0 decl",
      "    0-0 identifier pattern(x)",
      "    0-0 type name(int)",
      "    0-0 integer(1)",
      "else",
      "  0-0 return",
      "end if",
    ]);
  });

  test("a function definition", () => {
    const def = funcDef(
      ident("add1", { start: 3, end: 7 }),
      [param("x", "int")],
      "int",
      block([returnStmt(apply(Operator.Add, ident("x"), intLit(1)))]),
      { start: 0, end: 40 }
    );
    expect(printAst(def).split("\n")).toEqual([
      "0-40 function",
      "  3-7 identifier(add1)",
      "params(1):",
      "  0-0 param",
      "    0-0 identifier pattern(x)",
      "    0-0 type name(int)",
      "returns",
      "  0-0 type name(int)",
      "body",
      "  0-0 block",
      "    0-0 return",
      "      0-0 call",
      "        0-0 operator(add)",
      "      args(2):",
      "        0-0 identifier(x)",
      "        0-0 integer(1)",
      "  end block",
      "end function",
    ]);
  });

  test("a program lists its items", () => {
    const prog = program([exprStmt(null)], "demo.kn", "; ");
    expect(printAst(prog)).toBe("0-2 program(demo.kn)\n  0-0 expression statement (empty)");
  });
});
