/**
 * Runtime environment shared by every invocation of one driver session.
 *
 * Frames are never stored here: each invocation allocates its own. The
 * environment only carries what outlives a single call: the output sink
 * used by the built-in `print` overloads and the call-depth guard.
 */

export interface EnvironmentOptions {
  /** Receives one line per `print` call. Defaults to `console.log`. */
  out?: (line: string) => void;
  /** Deepest allowed nesting of IR function invocations. */
  maxCallDepth?: number;
}

export const DEFAULT_MAX_CALL_DEPTH = 1000;

export class Environment {
  readonly out: (line: string) => void;
  readonly maxCallDepth: number;
  /** Number of IR invocations currently on the host stack. */
  callDepth = 0;

  constructor(options: EnvironmentOptions = {}) {
    this.out = options.out ?? ((line) => console.log(line));
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }
}
