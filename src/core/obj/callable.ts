// src/core/obj/callable.ts
// Host-implemented functions

import { Obj } from "./obj";
import { ObjClass } from "./class";
import type { Scope } from "../scope/scope";

/**
 * Body of a native function. The scope is the call scope: receiver in
 * `scope.thisObj`, arguments in `scope.args`.
 */
export type NativeFn = (scope: Scope) => Promise<Obj>;

export class ObjNativeFunction extends Obj {
  constructor(
    readonly name: string,
    readonly fn: NativeFn
  ) {
    super();
  }

  get objClass(): ObjClass {
    return ObjNativeFunction.type;
  }

  async callOn(scope: Scope): Promise<Obj> {
    return this.fn(scope);
  }

  async defaultToString(_scope: Scope): Promise<string> {
    return `fn ${this.name}`;
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjNativeFunction._type ??= new ObjClass("Callable"));
  }
}
