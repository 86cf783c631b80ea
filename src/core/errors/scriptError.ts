// src/core/errors/scriptError.ts
// Host-level error types: definition errors and carriers of script exceptions

import type { Pos } from "../pos/source";
import type { Obj } from "../obj/obj";

/**
 * Raised synchronously while declaring classes and members, or when a
 * lookup fails before any script exception can be built.
 */
export class ScriptError extends Error {
  constructor(
    public readonly pos: Pos,
    public readonly errorMessage: string,
    options?: { cause?: unknown }
  ) {
    super(`${pos}: ${errorMessage}`, options);
    this.name = "ScriptError";
  }
}

/**
 * Carries a script-level exception value through host unwinding.
 * `errorObject` is what a script `catch` receives.
 */
export class ExecutionError extends ScriptError {
  constructor(
    public readonly errorObject: Obj,
    pos: Pos,
    message: string
  ) {
    super(pos, message);
    this.name = "ExecutionError";
  }
}

export function isExecutionError(e: unknown): e is ExecutionError {
  return e instanceof ExecutionError;
}
