import { describe, expect, test } from "vitest";
import {
  apply,
  block,
  decl,
  exprStmt,
  floatLit,
  funcDef,
  ident,
  intLit,
  op,
  param,
  returnStmt,
  stringLit,
} from "../../src/ast/factory.ts";
import { Operator } from "../../src/ast/operators.ts";
import { ErrorKind } from "../../src/errors/index.ts";
import { expectCompileError, lowerStmt, runItems } from "./helpers.ts";

const x = ident("x");
const i = ident("i");

describe("lowering: assignment", () => {
  test("assigns a local", () => {
    const { result } = runItems([
      block([
        decl("x", null, intLit(1)),
        exprStmt(apply(Operator.Assign, x, intLit(5))),
        returnStmt(x),
      ]),
    ]);
    expect(result.value).toBe(5);
  });

  test("an assignment yields the stored value", () => {
    const { result } = runItems([
      block([decl("x", null, intLit(1)), returnStmt(apply(Operator.Assign, x, intLit(7)))]),
    ]);
    expect(result.value).toBe(7);
  });

  test("operand types must be identical", () => {
    const err = expectCompileError(
      () =>
        lowerStmt(
          block([decl("x", null, intLit(1)), exprStmt(apply(Operator.Assign, x, floatLit(1.5)))])
        ),
      ErrorKind.AssignTypeMismatch
    );
    expect(err.message).toBe("cannot assign float to 'x' of type int");
  });

  test("the target must be a local", () => {
    const literal = expectCompileError(
      () => lowerStmt(exprStmt(apply(Operator.Assign, intLit(1), intLit(2)))),
      ErrorKind.InvalidAssignTarget
    );
    expect(literal.message).toBe("only a local can be assigned");

    const fn = expectCompileError(
      () => lowerStmt(exprStmt(apply(Operator.Assign, ident("print"), intLit(1)))),
      ErrorKind.InvalidAssignTarget
    );
    expect(fn.message).toBe("'print' is not a local and cannot be assigned");
  });

  test("an assignment without a value has no overload", () => {
    const err = expectCompileError(
      () => lowerStmt(block([decl("x", null, intLit(1)), exprStmt(apply(Operator.Assign, x))])),
      ErrorKind.NoMatchingOverload
    );
    expect(err.message).toBe("no overload of operator 'assign' accepts (int)");
  });
});

describe("lowering: compound assignment", () => {
  test("applies the base operator and stores the result", () => {
    const { result } = runItems([
      block([
        decl("x", null, intLit(10)),
        exprStmt(apply(Operator.SubAssign, x, intLit(3))),
        exprStmt(apply(Operator.MulAssign, x, intLit(2))),
        returnStmt(x),
      ]),
    ]);
    expect(result.value).toBe(14);
  });

  test("yields the stored value", () => {
    const { result } = runItems([
      block([decl("x", null, intLit(2)), returnStmt(apply(Operator.AddAssign, x, intLit(3)))]),
    ]);
    expect(result.value).toBe(5);
  });

  test("bitwise compound operators", () => {
    const { result } = runItems([
      block([
        decl("x", null, intLit(6)),
        exprStmt(apply(Operator.BitAndAssign, x, intLit(3))),
        exprStmt(apply(Operator.LeftShiftAssign, x, intLit(4))),
        returnStmt(x),
      ]),
    ]);
    expect(result.value).toBe(32);
  });

  test("a missing base overload is reported under the compound name", () => {
    const err = expectCompileError(
      () =>
        lowerStmt(
          block([
            decl("b", null, apply(Operator.Equal, intLit(1), intLit(1))),
            exprStmt(apply(Operator.AddAssign, ident("b"), intLit(1))),
          ])
        ),
      ErrorKind.NoMatchingOverload
    );
    expect(err.message).toBe("no overload of operator 'add assign' accepts (bool, int)");
  });

  test("operators without built-ins have no compound form", () => {
    const err = expectCompileError(
      () =>
        lowerStmt(
          block([
            decl("x", null, intLit(1)),
            exprStmt(apply(Operator.ForwardShiftAssign, x, intLit(1))),
          ])
        ),
      ErrorKind.NoMatchingOverload
    );
    expect(err.details.callee).toBe("forward shift assign");
  });

  test("the result must keep the local's type", () => {
    const intResult = funcDef(
      op(Operator.Add),
      [param("a", "string"), param("b", "int")],
      "int",
      block([returnStmt(ident("b"))])
    );
    const { ctx } = runItems([intResult]);
    const err = expectCompileError(
      () =>
        lowerStmt(
          block([
            decl("s", null, stringLit("a")),
            exprStmt(apply(Operator.AddAssign, ident("s"), intLit(1))),
          ]),
          ctx
        ),
      ErrorKind.AssignTypeMismatch
    );
    expect(err.message).toBe("cannot assign int to 's' of type string");
  });
});

describe("lowering: increment and decrement", () => {
  test("postfix increment yields the old value", () => {
    const { result } = runItems([
      block([decl("i", null, intLit(5)), returnStmt(apply(Operator.PostInc, i))]),
    ]);
    expect(result.value).toBe(5);
  });

  test("postfix increment stores the new value", () => {
    const { result } = runItems([
      block([
        decl("i", null, intLit(5)),
        decl("old", null, apply(Operator.PostInc, i)),
        returnStmt(apply(Operator.Add, apply(Operator.Mul, ident("old"), intLit(10)), i)),
      ]),
    ]);
    expect(result.value).toBe(56);
  });

  test("prefix increment yields the new value", () => {
    const { result } = runItems([
      block([
        decl("i", null, intLit(5)),
        decl("n", null, apply(Operator.PreInc, i)),
        returnStmt(apply(Operator.Add, apply(Operator.Mul, ident("n"), intLit(10)), i)),
      ]),
    ]);
    expect(result.value).toBe(66);
  });

  test("decrements", () => {
    const { result } = runItems([
      block([
        decl("i", null, intLit(5)),
        exprStmt(apply(Operator.PostDec, i)),
        exprStmt(apply(Operator.PreDec, i)),
        returnStmt(i),
      ]),
    ]);
    expect(result.value).toBe(3);
  });

  test("float locals step by one", () => {
    const { result, ctx } = runItems([
      block([
        decl("f", null, floatLit(1.5)),
        exprStmt(apply(Operator.PostInc, ident("f"))),
        returnStmt(ident("f")),
      ]),
    ]);
    expect(result.value).toBe(2.5);
    expect(result.type).toBe(ctx.types.getFloat());
  });

  test("other types cannot be stepped", () => {
    const err = expectCompileError(
      () =>
        lowerStmt(
          block([decl("s", null, stringLit("a")), exprStmt(apply(Operator.PostInc, ident("s")))])
        ),
      ErrorKind.NoMatchingOverload
    );
    expect(err.message).toBe("no overload of operator 'postfix increment' accepts (string)");
  });

  test("a step takes exactly one operand", () => {
    expectCompileError(
      () =>
        lowerStmt(block([decl("i", null, intLit(1)), exprStmt(apply(Operator.PreInc, i, intLit(2)))])),
      ErrorKind.NoMatchingOverload
    );
  });
});
