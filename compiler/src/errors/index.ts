export { CompileError, ErrorKind } from "./compile-error.ts";
export type { CompileErrorDetails } from "./compile-error.ts";
export { RuntimeError, RuntimeErrorKind } from "./runtime-error.ts";
export { DiagnosticCollector, locate, Severity, toDiagnostic } from "./diagnostic.ts";
export type { Diagnostic, DiagnosticSink, SourceLocation } from "./diagnostic.ts";
