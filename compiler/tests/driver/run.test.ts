import { describe, expect, test } from "vitest";
import {
  apply,
  block,
  call,
  exprStmt,
  funcDef,
  ident,
  ifStmt,
  intLit,
  param,
  returnStmt,
  stringLit,
} from "../../src/ast/factory.ts";
import { Operator } from "../../src/ast/operators.ts";
import { nativeFunction } from "../../src/context/builtins.ts";
import { CompilationContext } from "../../src/context/context.ts";
import { formatValue, run, runProgram, type UnitOutcome } from "../../src/driver.ts";
import { DiagnosticCollector, ErrorKind, RuntimeErrorKind, Severity } from "../../src/errors/index.ts";
import { UNIT } from "../../src/ir/ir-types.ts";
import { lowerFunctionDef } from "../../src/ir/lowering.ts";
import { captureEnv } from "../lowering/helpers.ts";

const printInt = (value: number) => exprStmt(call(ident("print"), [intLit(value)]));

const doubleDef = funcDef(
  ident("double"),
  [param("n", "int")],
  "int",
  block([returnStmt(apply(Operator.Mul, ident("n"), intLit(2)))])
);

describe("run", () => {
  test("a definition yields unit and stays registered", () => {
    const ctx = new CompilationContext();
    const { env } = captureEnv();
    const defined = run(ctx, env, doubleDef);
    expect(defined.value).toBe(UNIT);
    expect(run(ctx, env, returnStmt(call(ident("double"), [intLit(21)]))).value).toBe(42);
  });

  test("a statement yields its returned value and type", () => {
    const ctx = new CompilationContext();
    const { env } = captureEnv();
    const result = run(ctx, env, returnStmt(stringLit("done")));
    expect(result).toEqual({ type: ctx.types.getString(), value: "done" });
  });

  test("each unit is lowered in a fresh scope", () => {
    const ctx = new CompilationContext();
    const { env } = captureEnv();
    run(ctx, env, block([printInt(1)]));
    expect(ctx.scopes.depth).toBe(0);
  });
});

describe("runProgram", () => {
  const source = "print(1);\nnope;\nprint(2);\n";

  test("reports a failing unit and carries on", () => {
    const ctx = new CompilationContext();
    const { env, lines } = captureEnv();
    const sink = new DiagnosticCollector();
    const items = [
      printInt(1),
      exprStmt(ident("nope", { start: 10, end: 14 }), { start: 10, end: 15 }),
      printInt(2),
    ];
    const outcomes = runProgram(ctx, env, items, sink, { file: "demo.kn", source });

    expect(lines).toEqual(["1", "2"]);
    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    expect(sink.errorCount).toBe(1);
    expect(sink.diagnostics[0]).toEqual({
      severity: Severity.Error,
      kind: ErrorKind.UnresolvedIdentifier,
      message: "unresolved identifier 'nope'",
      span: { start: 10, end: 14 },
      location: { file: "demo.kn", line: 2, column: 1, offset: 10 },
    });
  });

  test("runtime errors are reported at the unit", () => {
    const ctx = new CompilationContext();
    const { env } = captureEnv();
    const sink = new DiagnosticCollector();
    const divide = returnStmt(apply(Operator.Div, intLit(1), intLit(0)), { start: 16, end: 25 });
    runProgram(ctx, env, [divide], sink, { file: "demo.kn", source });

    const [diagnostic] = sink.diagnostics;
    expect(diagnostic?.kind).toBe(RuntimeErrorKind.DivisionByZero);
    expect(diagnostic?.message).toBe("integer division by zero");
    expect(diagnostic?.location).toEqual({ file: "demo.kn", line: 3, column: 1, offset: 16 });
  });

  test("a unit that exhausts the host stack fails alone", () => {
    const { env } = captureEnv(1_000_000);
    const sink = new DiagnosticCollector();
    const forever = funcDef(
      ident("forever"),
      [param("n", "int")],
      "int",
      block([returnStmt(call(ident("forever"), [apply(Operator.Add, ident("n"), intLit(1))]))])
    );
    const outcomes = runProgram(
      new CompilationContext(),
      env,
      [forever, returnStmt(call(ident("forever"), [intLit(0)])), returnStmt(intLit(7))],
      sink
    );
    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    expect(sink.diagnostics[0]?.kind).toBe(RuntimeErrorKind.StackOverflow);
    const last = outcomes[2];
    expect(last?.ok && last.result?.value).toBe(7);
    expect(env.callDepth).toBe(0);
  });

  test("without source text locations have no line", () => {
    const sink = new DiagnosticCollector();
    const { env } = captureEnv();
    runProgram(new CompilationContext(), env, [exprStmt(ident("nope", { start: 3, end: 7 }))], sink);
    expect(sink.diagnostics[0]?.location).toEqual({
      file: "<input>",
      line: 0,
      column: 0,
      offset: 3,
    });
  });

  test("check-only lowers every unit without running any", () => {
    const ctx = new CompilationContext();
    const { env, lines } = captureEnv();
    const sink = new DiagnosticCollector();
    const outcomes = runProgram(
      ctx,
      env,
      [doubleDef, exprStmt(call(ident("print"), [call(ident("double"), [intLit(2)])]))],
      sink,
      undefined,
      { checkOnly: true }
    );
    expect(lines).toEqual([]);
    expect(sink.errorCount).toBe(0);
    expect(outcomes.map((o) => (o.ok ? o.result : "failed"))).toEqual([null, null]);
    expect(ctx.functions.lookup("double")).toBeDefined();
  });

  test("outcomes are delivered as each unit finishes", () => {
    const { env, lines } = captureEnv();
    const seen: string[] = [];
    const onOutcome = (outcome: UnitOutcome) => {
      seen.push(`${outcome.ok ? "ok" : "failed"} after ${lines.length} line(s)`);
    };
    runProgram(
      new CompilationContext(),
      env,
      [printInt(1), exprStmt(ident("nope")), printInt(2)],
      new DiagnosticCollector(),
      undefined,
      { onOutcome }
    );
    expect(seen).toEqual(["ok after 1 line(s)", "failed after 1 line(s)", "ok after 2 line(s)"]);
  });
});

describe("runProgram: definitions", () => {
  const isZero = (name: string) => apply(Operator.Equal, ident(name), intLit(0));
  const parity = (name: string, base: number, other: string) =>
    funcDef(
      ident(name),
      [param("n", "int")],
      "int",
      block([
        ifStmt(isZero("n"), returnStmt(intLit(base))),
        returnStmt(call(ident(other), [apply(Operator.Sub, ident("n"), intLit(1))])),
      ])
    );
  const printCall = (name: string, arg: number) =>
    exprStmt(call(ident("print"), [call(ident(name), [intLit(arg)])]));

  test("a statement may call a function defined after it", () => {
    const { env, lines } = captureEnv();
    const sink = new DiagnosticCollector();
    const outcomes = runProgram(new CompilationContext(), env, [printCall("double", 5), doubleDef], sink);
    expect(sink.errorCount).toBe(0);
    expect(outcomes.map((o) => o.ok)).toEqual([true, true]);
    expect(lines).toEqual(["10"]);
  });

  test("definitions may call each other", () => {
    const { env, lines } = captureEnv();
    const sink = new DiagnosticCollector();
    const items = [
      parity("even", 1, "odd"),
      parity("odd", 0, "even"),
      printCall("even", 4),
      printCall("odd", 4),
      printCall("even", 7),
    ];
    runProgram(new CompilationContext(), env, items, sink);
    expect(sink.errorCount).toBe(0);
    expect(lines).toEqual(["1", "0", "0"]);
  });

  test("a definition with a bad signature is reported in item order", () => {
    const ctx = new CompilationContext();
    const { env, lines } = captureEnv();
    const sink = new DiagnosticCollector();
    const seen: string[] = [];
    const bad = funcDef(ident("bad"), [param("x", "nosuch")], null, block([]));
    runProgram(ctx, env, [printInt(1), bad, printInt(2)], sink, undefined, {
      onOutcome: (outcome) => seen.push(outcome.ok ? "ok" : "failed"),
    });
    expect(seen).toEqual(["ok", "failed", "ok"]);
    expect(lines).toEqual(["1", "2"]);
    expect(sink.diagnostics.map((d) => d.message)).toEqual(["unknown type 'nosuch'"]);
    expect(ctx.functions.lookup("bad")).toBeUndefined();
  });

  test("a definition whose body fails is withdrawn before statements lower", () => {
    const ctx = new CompilationContext();
    const { env } = captureEnv();
    const sink = new DiagnosticCollector();
    const broken = funcDef(ident("broken"), [], "int", block([returnStmt(stringLit("s"))]));
    const outcomes = runProgram(ctx, env, [printCall("broken", 1), broken], sink);
    expect(outcomes.map((o) => o.ok)).toEqual([false, false]);
    expect(sink.diagnostics.map((d) => d.kind)).toEqual([
      ErrorKind.UnresolvedIdentifier,
      ErrorKind.ReturnTypeMismatch,
    ]);
  });
});

describe("formatValue", () => {
  const ctx = new CompilationContext();
  const { types } = ctx;

  test("scalars", () => {
    expect(formatValue(3, types.getInt())).toBe("3");
    expect(formatValue(2, types.getFloat())).toBe("2.0");
    expect(formatValue(1.5, types.getFloat())).toBe("1.5");
    expect(formatValue(true, types.getBool())).toBe("true");
    expect(formatValue("hi", types.getString())).toBe("hi");
    expect(formatValue(UNIT, types.getUnit())).toBe("()");
  });

  test("functions show their name and type", () => {
    const fn = lowerFunctionDef(ctx, doubleDef);
    expect(formatValue(fn, fn.type)).toBe("<fn double: (int) -> int>");
    const float = types.getFloat();
    const native = nativeFunction("float-add", types.getFunc([float, float], float));
    expect(formatValue(native, native.type)).toBe("<fn float-add: (float, float) -> float>");
  });
});
