// src/core/obj/property.ts
// Accessor properties: reading the member runs a zero-argument getter

import { Obj } from "./obj";
import { ObjClass } from "./class";
import { Arguments } from "../scope/arguments";
import type { NativeFn } from "./callable";
import type { Scope } from "../scope/scope";

export class ObjProperty extends Obj {
  constructor(
    readonly name: string,
    readonly getter: NativeFn,
    readonly setter: NativeFn | null = null
  ) {
    super();
  }

  get objClass(): ObjClass {
    return ObjProperty.type;
  }

  async resolveAsMember(scope: Scope, receiver: Obj, declaringClass: ObjClass | null): Promise<Obj> {
    return this.getter(
      scope.createChildScope({ thisObj: receiver, currentClassCtx: declaringClass ?? scope.currentClassCtx })
    );
  }

  async assignAsMember(scope: Scope, receiver: Obj, value: Obj, declaringClass: ObjClass | null): Promise<boolean> {
    if (!this.setter) scope.raiseIllegalAssignment(`property ${this.name} is read-only`);
    await this.setter(
      scope.createChildScope({
        thisObj: receiver,
        args: Arguments.of(value),
        currentClassCtx: declaringClass ?? scope.currentClassCtx,
      })
    );
    return true;
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjProperty._type ??= new ObjClass("Property"));
  }
}
