// src/core/scope/arguments.ts
// Call arguments: positional values plus named ones

import type { Obj } from "../obj/obj";
import type { Scope } from "./scope";
import type { Statement } from "./statement";

export class Arguments {
  constructor(
    readonly list: readonly Obj[] = [],
    readonly named: ReadonlyMap<string, Obj> = new Map()
  ) {}

  get size(): number {
    return this.list.length + this.named.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  at(index: number): Obj | undefined {
    return this.list[index];
  }

  /** The first `count` positional values and the named values whose names pass `keep`. */
  slice(count: number, keep: (name: string) => boolean): Arguments {
    const named = new Map<string, Obj>();
    for (const [name, value] of this.named) {
      if (keep(name)) named.set(name, value);
    }
    return new Arguments(this.list.slice(0, count), named);
  }

  static readonly EMPTY = new Arguments();

  static of(...values: Obj[]): Arguments {
    return new Arguments(values);
  }
}

/**
 * Evaluate argument expressions left to right.
 */
export async function evaluateArguments(scope: Scope, exprs: readonly Statement[]): Promise<Arguments> {
  const values: Obj[] = [];
  for (const expr of exprs) {
    values.push(await expr.execute(scope));
  }
  return new Arguments(values);
}
