/**
 * JSON input format: a serialized `Program`, decoded with validation.
 *
 * Schemas mirror the node interfaces one to one. Recursive schemas are
 * annotated with the node type they produce (`z.ZodType<T>`) and refer to
 * each other through getters. `span` may be omitted and then defaults to
 * the empty span at 0.
 */

import { z } from "zod/v4";
import { CompileError, ErrorKind } from "../errors/index.ts";
import type {
  BlockStmt,
  CallExpr,
  DeclStmt,
  Expression,
  ExprStmt,
  FuncDef,
  IfStmt,
  Item,
  Param,
  Program,
  ReturnStmt,
  Statement,
  WhileStmt,
} from "./nodes.ts";
import { Operator } from "./operators.ts";

// ─── Leaves ──────────────────────────────────────────────────────────────────

const SpanSchema = z
  .object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() })
  .default({ start: 0, end: 0 });

export const IdentifierSchema = z.object({
  kind: z.literal("Identifier"),
  span: SpanSchema,
  name: z.string().min(1),
});

export const IntLiteralSchema = z.object({
  kind: z.literal("IntLiteral"),
  span: SpanSchema,
  value: z.number().int().min(-2147483648).max(2147483647),
});

export const FloatLiteralSchema = z.object({
  kind: z.literal("FloatLiteral"),
  span: SpanSchema,
  value: z.number(),
});

export const StringLiteralSchema = z.object({
  kind: z.literal("StringLiteral"),
  span: SpanSchema,
  value: z.string(),
});

export const OperatorExprSchema = z.object({
  kind: z.literal("OperatorExpr"),
  span: SpanSchema,
  operator: z.enum(Operator),
});

export const TypeNameSchema = z.object({
  kind: z.literal("TypeName"),
  span: SpanSchema,
  name: z.string().min(1),
});

export const IdPatSchema = z.object({
  kind: z.literal("IdPat"),
  span: SpanSchema,
  name: z.string().min(1),
});

// ─── Expressions ─────────────────────────────────────────────────────────────

export const CallExprSchema: z.ZodType<CallExpr> = z.object({
  kind: z.literal("CallExpr"),
  span: SpanSchema,
  get callee() {
    return ExpressionSchema;
  },
  get args() {
    return z.array(ExpressionSchema);
  },
});

export const ExpressionSchema: z.ZodType<Expression> = z.union([
  IdentifierSchema,
  IntLiteralSchema,
  FloatLiteralSchema,
  StringLiteralSchema,
  OperatorExprSchema,
  CallExprSchema,
]);

// ─── Statements ──────────────────────────────────────────────────────────────

export const ExprStmtSchema: z.ZodType<ExprStmt> = z.object({
  kind: z.literal("ExprStmt"),
  span: SpanSchema,
  expression: ExpressionSchema.nullable().default(null),
});

export const BlockStmtSchema: z.ZodType<BlockStmt> = z.object({
  kind: z.literal("BlockStmt"),
  span: SpanSchema,
  get statements() {
    return z.array(StatementSchema);
  },
});

export const IfStmtSchema: z.ZodType<IfStmt> = z.object({
  kind: z.literal("IfStmt"),
  span: SpanSchema,
  condition: ExpressionSchema,
  get thenBranch() {
    return StatementSchema;
  },
  get elseBranch() {
    return StatementSchema.nullable().default(null);
  },
});

export const WhileStmtSchema: z.ZodType<WhileStmt> = z.object({
  kind: z.literal("WhileStmt"),
  span: SpanSchema,
  condition: ExpressionSchema,
  get body() {
    return StatementSchema;
  },
});

export const BreakStmtSchema = z.object({ kind: z.literal("BreakStmt"), span: SpanSchema });

export const ContinueStmtSchema = z.object({ kind: z.literal("ContinueStmt"), span: SpanSchema });

export const ReturnStmtSchema: z.ZodType<ReturnStmt> = z.object({
  kind: z.literal("ReturnStmt"),
  span: SpanSchema,
  value: ExpressionSchema.nullable().default(null),
});

export const DeclStmtSchema: z.ZodType<DeclStmt> = z.object({
  kind: z.literal("DeclStmt"),
  span: SpanSchema,
  pattern: IdPatSchema,
  typeAnnotation: TypeNameSchema.nullable().default(null),
  initializer: ExpressionSchema.nullable().default(null),
});

export const StatementSchema: z.ZodType<Statement> = z.union([
  ExprStmtSchema,
  BlockStmtSchema,
  IfStmtSchema,
  WhileStmtSchema,
  BreakStmtSchema,
  ContinueStmtSchema,
  ReturnStmtSchema,
  DeclStmtSchema,
]);

// ─── Items ───────────────────────────────────────────────────────────────────

export const ParamSchema: z.ZodType<Param> = z.object({
  kind: z.literal("Param"),
  span: SpanSchema,
  pattern: IdPatSchema,
  type: TypeNameSchema,
});

export const FuncDefSchema: z.ZodType<FuncDef> = z.object({
  kind: z.literal("FuncDef"),
  span: SpanSchema,
  target: z.union([IdentifierSchema, OperatorExprSchema]),
  params: z.array(ParamSchema),
  returnType: TypeNameSchema.nullable().default(null),
  body: BlockStmtSchema,
});

export const ItemSchema: z.ZodType<Item> = z.union([FuncDefSchema, StatementSchema]);

export const ProgramSchema: z.ZodType<Program> = z.object({
  kind: z.literal("Program"),
  span: SpanSchema,
  file: z.string().default("<input>"),
  source: z.string().nullable().default(null),
  items: z.array(ItemSchema),
});

// ─── Decoding ────────────────────────────────────────────────────────────────

/**
 * Parse and validate a JSON-encoded program. Malformed JSON and schema
 * violations both surface as a `ParseError` naming the offending path.
 */
export function decodeProgram(text: string): Program {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CompileError(ErrorKind.ParseError, { start: 0, end: 0 }, `invalid JSON: ${reason}`);
  }

  const result = ProgramSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : "<root>";
    const message = issue ? issue.message : "invalid program";
    throw new CompileError(
      ErrorKind.ParseError,
      { start: 0, end: 0 },
      `invalid program at ${path}: ${message}`
    );
  }
  return result.data;
}
