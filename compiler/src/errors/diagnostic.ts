import type { SourceFile, Span } from "../utils/source.ts";
import { CompileError, type ErrorKind } from "./compile-error.ts";
import { RuntimeError, type RuntimeErrorKind } from "./runtime-error.ts";

export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface SourceLocation {
  file: string;
  /** 1-based; 0 when no source text is available. */
  line: number;
  /** 1-based; 0 when no source text is available. */
  column: number;
  offset: number;
}

export interface Diagnostic {
  severity: Severity;
  kind: ErrorKind | RuntimeErrorKind;
  message: string;
  span: Span;
  location: SourceLocation;
}

/** Receiver of diagnostics produced while driving a program. */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/** Sink that records everything for batch reporting. */
export class DiagnosticCollector implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  get errorCount(): number {
    return this.diagnostics.filter((d) => d.severity === Severity.Error).length;
  }
}

/** Where a span starts, as a location in `file` (line/column resolved when `source` is given). */
export function locate(span: Span, file: string, source: SourceFile | null): SourceLocation {
  if (!source) return { file, line: 0, column: 0, offset: span.start };
  const { line, column } = source.lineCol(span.start);
  return { file, line, column, offset: span.start };
}

/**
 * Convert a thrown compile or runtime error into a diagnostic.
 * Runtime errors carry no span of their own; `fallbackSpan` (the unit being
 * run) is used for them. Anything else is rethrown.
 */
export function toDiagnostic(
  error: unknown,
  fallbackSpan: Span,
  file: string,
  source: SourceFile | null
): Diagnostic {
  if (error instanceof CompileError) {
    return {
      severity: Severity.Error,
      kind: error.errorKind,
      message: error.message,
      span: error.span,
      location: locate(error.span, file, source),
    };
  }
  if (error instanceof RuntimeError) {
    return {
      severity: Severity.Error,
      kind: error.errorKind,
      message: error.message,
      span: fallbackSpan,
      location: locate(fallbackSpan, file, source),
    };
  }
  throw error;
}
