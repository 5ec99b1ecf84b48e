/**
 * Errors raised while turning an AST into IR.
 *
 * Lowering is fail-fast within one unit (a top-level statement or function
 * definition): the first problem throws a `CompileError`, and the driver
 * turns it into a diagnostic before moving on to the next unit.
 */

import type { Span } from "../utils/source.ts";

export enum ErrorKind {
  /** Raised by the input decoder, before lowering starts. */
  ParseError = "ParseError",
  UnresolvedIdentifier = "UnresolvedIdentifier",
  UnresolvedType = "UnresolvedType",
  AmbiguousFunction = "AmbiguousFunction",
  NoMatchingOverload = "NoMatchingOverload",
  NotCallable = "NotCallable",
  OperatorNotValue = "OperatorNotValue",
  InvalidAssignTarget = "InvalidAssignTarget",
  AssignTypeMismatch = "AssignTypeMismatch",
  InvalidDecl = "InvalidDecl",
  DeclTypeMismatch = "DeclTypeMismatch",
  ConditionNotBool = "ConditionNotBool",
  ReturnTypeMismatch = "ReturnTypeMismatch",
  MissingReturn = "MissingReturn",
  BreakOutsideLoop = "BreakOutsideLoop",
  ContinueOutsideLoop = "ContinueOutsideLoop",
  DuplicateOverload = "DuplicateOverload",
  InvalidOverloadTarget = "InvalidOverloadTarget",
}

/** Structured payload for the kinds that name a callee or compare types. */
export interface CompileErrorDetails {
  /** Operator display name or function name. */
  callee?: string;
  argTypes?: string[];
  expected?: string;
  actual?: string;
}

export class CompileError extends Error {
  readonly errorKind: ErrorKind;
  readonly span: Span;
  readonly details: CompileErrorDetails;

  constructor(errorKind: ErrorKind, span: Span, message: string, details: CompileErrorDetails = {}) {
    super(message);
    this.name = "CompileError";
    this.errorKind = errorKind;
    this.span = span;
    this.details = details;
  }
}
