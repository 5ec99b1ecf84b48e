import { describe, expect, test } from "vitest";
import { type CliIO, runCli } from "../../src/cli.ts";

interface FakeIO extends CliIO {
  out: string[];
  err: string[];
}

function fakeIO(files: Record<string, string> = {}): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: ${path}`);
      return content;
    },
  };
}

const id = (name: string, span?: { start: number; end: number }) => ({
  kind: "Identifier",
  name,
  ...(span ? { span } : {}),
});
const int = (value: number) => ({ kind: "IntLiteral", value });
const callOf = (callee: object, args: object[]) => ({ kind: "CallExpr", callee, args });
const addOf = (a: object, b: object) =>
  callOf({ kind: "OperatorExpr", operator: "Add" }, [a, b]);

const demo = JSON.stringify({
  kind: "Program",
  file: "demo.kn",
  items: [
    { kind: "ExprStmt", expression: callOf(id("print"), [int(1)]) },
    { kind: "ReturnStmt", value: addOf(int(1), int(2)) },
  ],
});

describe("runCli: options", () => {
  test("--version", async () => {
    const io = fakeIO();
    expect(await runCli(["--version"], io)).toBe(0);
    expect(io.out).toEqual(["knot 0.1.0"]);
  });

  test("-h prints the help", async () => {
    const io = fakeIO();
    expect(await runCli(["-h"], io)).toBe(0);
    expect(io.out[0]?.split("\n")[0]).toBe("knot 0.1.0: lower and run JSON-encoded programs");
  });

  test("a missing input file", async () => {
    const io = fakeIO();
    expect(await runCli([], io)).toBe(1);
    expect(io.err).toEqual(["error: no input file provided\n"]);
  });

  test("unknown flags", async () => {
    const io = fakeIO();
    expect(await runCli(["--bogus", "demo.json"], io)).toBe(1);
    expect(io.err).toEqual([
      "error: unknown flag '--bogus'",
      "Run with --help to see available options.\n",
    ]);
  });

  test("--max-depth needs a positive integer", async () => {
    const io = fakeIO();
    expect(await runCli(["demo.json", "--max-depth", "0"], io)).toBe(1);
    expect(io.err[0]).toBe("error: --max-depth expects a positive integer");
  });

  test("a second positional argument", async () => {
    const io = fakeIO();
    expect(await runCli(["a.json", "b.json"], io)).toBe(1);
    expect(io.err[0]).toBe("error: unexpected argument 'b.json'");
  });

  test("an unreadable file", async () => {
    const io = fakeIO();
    expect(await runCli(["missing.json"], io)).toBe(1);
    expect(io.err).toEqual(["error: could not read file 'missing.json'"]);
  });
});

describe("runCli: programs", () => {
  test("runs each unit and prints non-unit results", async () => {
    const io = fakeIO({ "demo.json": demo });
    expect(await runCli(["demo.json"], io)).toBe(0);
    expect(io.out).toEqual(["1", "3"]);
    expect(io.err).toEqual([]);
  });

  test("--check lowers without running", async () => {
    const io = fakeIO({ "demo.json": demo });
    expect(await runCli(["demo.json", "--check"], io)).toBe(0);
    expect(io.out).toEqual(["Check passed: no errors."]);
  });

  test("--ir prints each lowered unit", async () => {
    const io = fakeIO({ "demo.json": demo });
    expect(await runCli(["--ir", "demo.json"], io)).toBe(0);
    expect(io.out).toEqual([
      "function <top>: () -> unit locals=0 entry=eval.0\n  eval.0: eval @print-int(1) -> exit\n  exit: return",
      "function <top>: () -> int locals=0 entry=return.0\n  return.0: return @integer-add(1, 2)",
    ]);
  });

  test("--ast prints the decoded tree", async () => {
    const io = fakeIO({ "demo.json": demo });
    expect(await runCli(["demo.json", "--ast"], io)).toBe(0);
    expect(io.out[0]?.split("\n").slice(0, 2)).toEqual([
      "0-0 program(demo.kn)",
      "  0-0 expression statement",
    ]);
  });

  test("diagnostics point into the source", async () => {
    const text = JSON.stringify({
      kind: "Program",
      file: "demo.kn",
      source: "nope;",
      items: [
        {
          kind: "ExprStmt",
          span: { start: 0, end: 5 },
          expression: id("nope", { start: 0, end: 4 }),
        },
      ],
    });
    const io = fakeIO({ "demo.json": text });
    expect(await runCli(["demo.json"], io)).toBe(1);
    expect(io.err).toEqual([
      "demo.kn:1:1: error: unresolved identifier 'nope'\n  nope;\n  ^",
      "\n1 error emitted",
    ]);
  });

  test("the path names programs without a file", async () => {
    const text = JSON.stringify({
      kind: "Program",
      items: [
        { kind: "ExprStmt", expression: id("nope") },
        { kind: "ExprStmt", expression: id("gone") },
      ],
    });
    const io = fakeIO({ "prog.json": text });
    expect(await runCli(["prog.json"], io)).toBe(1);
    expect(io.err).toEqual([
      "prog.json: error: unresolved identifier 'nope'",
      "prog.json: error: unresolved identifier 'gone'",
      "\n2 errors emitted",
    ]);
  });

  test("--max-depth bounds recursion", async () => {
    const spin = {
      kind: "FuncDef",
      target: id("spin"),
      params: [],
      returnType: { kind: "TypeName", name: "int" },
      body: {
        kind: "BlockStmt",
        statements: [{ kind: "ReturnStmt", value: callOf(id("spin"), []) }],
      },
    };
    const text = JSON.stringify({
      kind: "Program",
      file: "demo.kn",
      items: [spin, { kind: "ExprStmt", expression: callOf(id("spin"), []) }],
    });
    const io = fakeIO({ "demo.json": text });
    expect(await runCli(["demo.json", "--max-depth", "5"], io)).toBe(1);
    expect(io.err[0]).toBe("demo.kn: error: call depth exceeded 5 while calling 'spin'");
  });

  test("undecodable input", async () => {
    const io = fakeIO({ "prog.json": "{" });
    expect(await runCli(["prog.json"], io)).toBe(1);
    expect(io.err[0]?.startsWith("prog.json: error: invalid JSON: ")).toBe(true);
  });
});
