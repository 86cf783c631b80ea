// src/core/obj/argsDecl.ts
// Constructor and function parameter lists

import { ObjRecord, type Visibility } from "./record";
import { ObjList } from "./primitives";
import { ScriptError } from "../errors/scriptError";
import { Pos } from "../pos/source";
import type { Obj } from "./obj";
import type { ObjClass } from "./class";
import type { Arguments } from "../scope/arguments";
import type { Scope } from "../scope/scope";
import type { Statement } from "../scope/statement";

export type ArgParam = {
  name: string;
  /** Evaluated when the argument is missing; earlier parameters are visible to it */
  defaultValue?: Statement;
  isMutable?: boolean;
  visibility?: Visibility;
  /** Left out of serialization */
  isTransient?: boolean;
  /** Collects the positional arguments not taken by the other parameters */
  isEllipsis?: boolean;
};

export type BoundArgument = {
  param: ArgParam;
  value: Obj;
};

export class ArgsDeclaration {
  readonly params: readonly ArgParam[];
  private readonly ellipsisIndex: number;

  constructor(params: readonly ArgParam[], readonly pos: Pos = Pos.builtIn) {
    const seen = new Set<string>();
    for (const p of params) {
      if (seen.has(p.name)) throw new ScriptError(pos, `duplicate parameter ${p.name}`);
      seen.add(p.name);
    }
    if (params.filter((p) => p.isEllipsis).length > 1) {
      throw new ScriptError(pos, "only one ellipsis parameter is allowed");
    }
    this.params = params;
    this.ellipsisIndex = params.findIndex((p) => p.isEllipsis);
  }

  /** How many positional arguments this list can take. */
  get positionalLimit(): number {
    return this.ellipsisIndex >= 0 ? Number.POSITIVE_INFINITY : this.params.length;
  }

  hasParam(name: string): boolean {
    return this.params.some((p) => p.name === name);
  }

  get persistentParams(): ArgParam[] {
    return this.params.filter((p) => !p.isTransient);
  }

  /**
   * Match `args` against the parameters. Positional values fill the head,
   * the tail is taken from the end, and an ellipsis gets what remains.
   * Missing values come from named arguments, then defaults.
   */
  async resolve(scope: Scope, args: Arguments): Promise<BoundArgument[]> {
    for (const name of args.named.keys()) {
      if (!this.hasParam(name)) scope.raiseIllegalArgument(`unknown argument name: ${name}`);
    }

    const slots: (Obj | undefined)[] = this.params.map(() => undefined);
    const positional = args.list;

    if (this.ellipsisIndex < 0) {
      if (positional.length > this.params.length) {
        scope.raiseIllegalArgument("too many arguments for the call");
      }
      positional.forEach((value, i) => {
        slots[i] = value;
      });
    } else {
      const head = this.ellipsisIndex;
      const tail = this.params.length - head - 1;
      const headCount = Math.min(head, positional.length);
      for (let i = 0; i < headCount; i++) slots[i] = positional[i];
      const rest = positional.slice(headCount);
      const tailCount = Math.min(tail, rest.length);
      const middle = rest.slice(0, rest.length - tailCount);
      rest.slice(rest.length - tailCount).forEach((value, j) => {
        slots[head + 1 + (tail - tailCount) + j] = value;
      });
      const ellipsisName = this.params[head].name;
      if (middle.length > 0 || !args.named.has(ellipsisName)) slots[head] = new ObjList(middle);
    }

    const local = scope.createChildScope();
    const bound: BoundArgument[] = [];
    for (let i = 0; i < this.params.length; i++) {
      const param = this.params[i];
      const named = args.named.get(param.name);
      let value = slots[i];
      if (value !== undefined && named !== undefined) {
        scope.raiseIllegalArgument(`argument ${param.name} is already set`);
      }
      value ??= named;
      if (value === undefined) {
        if (!param.defaultValue) scope.raiseIllegalArgument("too few arguments for the call");
        value = await param.defaultValue.execute(local);
      }
      local.addItem(param.name, false, value);
      bound.push({ param, value });
    }
    return bound;
  }

  /**
   * Resolve into member records owned by `declaringClass`, classified as
   * constructor fields.
   */
  async resolveRecords(scope: Scope, args: Arguments, declaringClass: ObjClass): Promise<[string, ObjRecord][]> {
    const bound = await this.resolve(scope, args);
    return bound.map(({ param, value }) => [
      param.name,
      new ObjRecord(value.byValueCopy(), {
        isMutable: param.isMutable ?? false,
        visibility: param.visibility ?? "public",
        declaringClass,
        type: "ConstructorField",
        isTransient: param.isTransient ?? false,
      }),
    ]);
  }
}
