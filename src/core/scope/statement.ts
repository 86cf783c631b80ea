// src/core/scope/statement.ts
// Executable bodies: method/constructor/initializer code and lambdas

import { Pos } from "../pos/source";
import type { Obj } from "../obj/obj";
import type { Scope } from "./scope";

export interface Statement {
  readonly pos: Pos;
  execute(scope: Scope): Promise<Obj>;
}

/**
 * Wrap a host function as a statement. Running it moves the executing
 * scope to the statement's position first, so errors raised inside
 * report it.
 */
export function statement(body: (scope: Scope) => Promise<Obj>, pos: Pos = Pos.builtIn): Statement {
  return {
    pos,
    execute: (scope) => {
      if (pos !== Pos.builtIn) scope.pos = pos;
      return body(scope);
    },
  };
}
