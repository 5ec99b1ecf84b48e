export enum RuntimeErrorKind {
  DivisionByZero = "DivisionByZero",
  StackOverflow = "StackOverflow",
  /** A value of the wrong shape reached an operation; only malformed IR can cause it. */
  TypeFault = "TypeFault",
}

/** Failure while invoking lowered IR. Aborts the running invocation. */
export class RuntimeError extends Error {
  readonly errorKind: RuntimeErrorKind;

  constructor(errorKind: RuntimeErrorKind, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.errorKind = errorKind;
  }
}
