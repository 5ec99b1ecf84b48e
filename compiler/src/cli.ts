import { readFile } from "node:fs/promises";
import { decodeProgram } from "./ast/json.ts";
import type { Program } from "./ast/nodes.ts";
import { printAst } from "./ast/printer.ts";
import { CompilationContext } from "./context/context.ts";
import { formatValue, runProgram, type UnitOutcome } from "./driver.ts";
import { type Diagnostic, DiagnosticCollector, toDiagnostic } from "./errors/index.ts";
import { Environment } from "./ir/environment.ts";
import { printIrFunction } from "./ir/printer.ts";
import { SourceFile } from "./utils/source.ts";

export const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set(["--ast", "--ir", "--check", "--help", "--version"]);

/** Where the CLI writes and how it reads input; replaced in tests. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  readFile(path: string): Promise<string>;
}

export const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (path) => readFile(path, "utf8"),
};

interface CliOptions {
  filePath: string | null;
  flags: Set<string>;
  maxDepth: number | undefined;
}

class UsageError extends Error {}

// ─── Argument parsing ────────────────────────────────────────────────────────

function parseArgs(args: readonly string[]): CliOptions {
  const flags = new Set<string>();
  let filePath: string | null = null;
  let maxDepth: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "-h") {
      flags.add("--help");
    } else if (arg === "-V") {
      flags.add("--version");
    } else if (arg === "--max-depth") {
      const value = args[++i];
      if (value === undefined || !/^[1-9]\d*$/.test(value)) {
        throw new UsageError("--max-depth expects a positive integer");
      }
      maxDepth = Number(value);
    } else if (arg.startsWith("-")) {
      if (!KNOWN_FLAGS.has(arg)) {
        throw new UsageError(`unknown flag '${arg}'`);
      }
      flags.add(arg);
    } else if (filePath === null) {
      filePath = arg;
    } else {
      throw new UsageError(`unexpected argument '${arg}'`);
    }
  }
  return { filePath, flags, maxDepth };
}

// ─── Formatting helpers ──────────────────────────────────────────────────────

/** Format a diagnostic with source context: file:line:col, message, source line, caret. */
export function formatDiagnostic(diag: Diagnostic, source: SourceFile | null): string {
  const loc = diag.location;
  const file = loc.file || "<unknown>";
  if (loc.line === 0) {
    return `${file}: ${diag.severity}: ${diag.message}`;
  }
  const header = `${file}:${loc.line}:${loc.column}: ${diag.severity}: ${diag.message}`;
  if (!source) return header;

  const srcLine = source.lineText(loc.line);
  const caret = `${" ".repeat(loc.column - 1)}^`;
  return `${header}\n  ${srcLine}\n  ${caret}`;
}

function printHelp(io: CliIO): void {
  io.stdout(`knot ${VERSION}: lower and run JSON-encoded programs

Usage: knot <program.json> [options]

Options:
  --ast              Print the AST in tree form
  --ir               Print the lowered IR of every unit
  --check            Lower every unit without running anything
  --max-depth <n>    Limit nested calls at run time (default 1000)
  --help, -h         Show this help message
  --version, -V      Show the version

With no option, every unit is lowered and run in order; the value of a
statement that returns one is printed.`);
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

/** Run the command line `args` (without the node and script paths). Returns the exit code. */
export async function runCli(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`error: ${err.message}`);
    io.stderr("Run with --help to see available options.\n");
    return 1;
  }

  if (options.flags.has("--help")) {
    printHelp(io);
    return 0;
  }
  if (options.flags.has("--version")) {
    io.stdout(`knot ${VERSION}`);
    return 0;
  }
  if (options.filePath === null) {
    io.stderr("error: no input file provided\n");
    printHelp(io);
    return 1;
  }

  const filePath = options.filePath;
  let content: string;
  try {
    content = await io.readFile(filePath);
  } catch {
    io.stderr(`error: could not read file '${filePath}'`);
    return 1;
  }

  let program: Program;
  try {
    program = decodeProgram(content);
  } catch (err) {
    const diag = toDiagnostic(err, { start: 0, end: 0 }, filePath, null);
    io.stderr(formatDiagnostic(diag, null));
    return 1;
  }

  if (options.flags.has("--ast")) {
    io.stdout(printAst(program));
    return 0;
  }

  const file = program.file === "<input>" ? filePath : program.file;
  const source = program.source === null ? null : new SourceFile(file, program.source);
  const ctx = new CompilationContext();
  const env = new Environment({ out: io.stdout, maxCallDepth: options.maxDepth });
  const collector = new DiagnosticCollector();
  const checkOnly = options.flags.has("--check") || options.flags.has("--ir");

  const report = (outcome: UnitOutcome): void => {
    if (!outcome.ok) {
      io.stderr(formatDiagnostic(outcome.diagnostic, source));
    } else if (options.flags.has("--ir")) {
      io.stdout(printIrFunction(outcome.unit.fn));
    } else if (outcome.result && outcome.result.type !== ctx.types.getUnit()) {
      io.stdout(formatValue(outcome.result.value, outcome.result.type));
    }
  };
  runProgram(ctx, env, program.items, collector, { file, source: program.source }, {
    checkOnly,
    onOutcome: report,
  });

  const errorCount = collector.errorCount;
  if (errorCount > 0) {
    io.stderr(`\n${errorCount} error${errorCount !== 1 ? "s" : ""} emitted`);
    return 1;
  }
  if (options.flags.has("--check")) {
    io.stdout("Check passed: no errors.");
  }
  return 0;
}
