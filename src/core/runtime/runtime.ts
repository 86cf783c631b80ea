// src/core/runtime/runtime.ts
// Runtime context: a root scope with built-in types, constants and the
// exception catalogue, plus the host-facing helpers around it.
//
// Usage:
//   const rt = createRuntime({ config: { log: { level: "info" } } });
//   const Point = rt.defineClass("Point", [], (cls) => { ... });
//   const p = await rt.instantiate(Point, new ObjInt(1), new ObjInt(2));
//   console.log(await rt.stringify(p));

import { mergeConfigs, validateConfig, type MarlConfig, type PartialMarlConfig } from "../config/config";
import { createLogger, type RuntimeLogger } from "../log/logger";
import type { EventHook } from "../log/events";
import { createServices, type RuntimeServices } from "./services";
import { Scope } from "../scope/scope";
import { Arguments } from "../scope/arguments";
import { statement } from "../scope/statement";
import { Pos } from "../pos/source";
import type { Obj } from "../obj/obj";
import { ObjClass } from "../obj/class";
import { ObjNativeFunction } from "../obj/callable";
import { ObjProperty } from "../obj/property";
import { ObjBool, ObjInt, ObjList, ObjNull, ObjString, ObjVoid, nullType, voidType } from "../obj/primitives";
import { ObjListIterator, iterableType, iteratorType, toList } from "../iter/iterator";
import { ObjFlow, ObjFlowBuilder, ObjFlowIterator } from "../flow/flow";
import { ObjStackTraceEntry, type ExceptionClass } from "../errors/exception";
import {
  EXCEPTION_ALIASES,
  EXCEPTION_CATALOGUE,
  ROOT_EXCEPTION,
  getOrCreateExceptionClass,
  getRootExceptionClass,
} from "../errors/registry";
import { decodeFromTape, encodeToTape, type TapeCell } from "../codec/tape";

export type RuntimeOptions = {
  /** Merged over the defaults */
  config?: PartialMarlConfig;
  /** Defaults to a console logger at `config.log.level` */
  logger?: RuntimeLogger;
  onEvent?: EventHook;
};

export class RuntimeConfigError extends Error {
  constructor(readonly errors: readonly string[]) {
    super(`invalid runtime configuration: ${errors.join("; ")}`);
    this.name = "RuntimeConfigError";
  }
}

/** Producer body of a host-defined flow; `builder.emit` hands values out. */
export type FlowProducer = (builder: ObjFlowBuilder, scope: Scope) => Promise<void>;

export class Runtime {
  readonly config: MarlConfig;
  readonly logger: RuntimeLogger;
  readonly services: RuntimeServices;
  readonly rootScope: Scope;

  constructor(options: RuntimeOptions = {}) {
    const config = mergeConfigs(options.config ?? {});
    const validation = validateConfig(config);
    if (!validation.valid) throw new RuntimeConfigError(validation.errors);

    this.config = config;
    this.logger = options.logger ?? createLogger(config.log.level);
    for (const warning of validation.warnings) this.logger.warn(warning);

    this.services = createServices({ config, logger: this.logger, onEvent: options.onEvent });
    this.rootScope = Scope.root(this.services);
    this.registerBuiltins();
  }

  // ─────────────────────────────────────────────────────────────────
  // Built-ins
  // ─────────────────────────────────────────────────────────────────

  private registerBuiltins(): void {
    const root = this.rootScope;
    const types = [
      ObjClass.rootType,
      ObjClass.metaclass,
      nullType(),
      voidType(),
      ObjBool.type,
      ObjInt.type,
      ObjString.type,
      ObjList.type,
      iterableType(),
      iteratorType(),
      ObjListIterator.type,
      ObjNativeFunction.type,
      ObjProperty.type,
      ObjStackTraceEntry.type,
      ObjFlow.type,
      ObjFlowIterator.type,
      ObjFlowBuilder.type,
    ];
    for (const type of types) root.addConst(type.className, type);

    root.addConst("null", ObjNull);
    root.addConst("void", ObjVoid);
    root.addConst("true", ObjBool.TRUE);
    root.addConst("false", ObjBool.FALSE);

    const onEvent = this.services.onEvent;
    root.addConst(ROOT_EXCEPTION, getRootExceptionClass());
    for (const name of EXCEPTION_CATALOGUE) root.addConst(name, getOrCreateExceptionClass(name, onEvent));
    for (const [alias, target] of Object.entries(EXCEPTION_ALIASES)) {
      const record = target ? root.getLocalRecord(target) : null;
      if (record) root.bindRecord(alias, record);
    }

    root.addConst(
      "flow",
      new ObjNativeFunction("flow", async (s) => {
        const body = s.requireOnlyArg();
        return new ObjFlow(
          statement((ps) => body.invoke(ps, ps.thisObj, Arguments.EMPTY)),
          s
        );
      })
    );
  }

  // ─────────────────────────────────────────────────────────────────
  // Host API
  // ─────────────────────────────────────────────────────────────────

  /**
   * Declare a class visible by name from the root scope. `build` adds its
   * members before anything can instantiate it.
   */
  defineClass(
    name: string,
    parents: readonly ObjClass[] = [],
    build?: (cls: ObjClass) => void,
    pos: Pos = Pos.builtIn
  ): ObjClass {
    const cls = new ObjClass(name, parents, { pos, onEvent: this.services.onEvent });
    build?.(cls);
    this.rootScope.addConst(name, cls);
    return cls;
  }

  /** A registered exception class, created on first use. */
  exceptionClass(name: string): ExceptionClass {
    return name === ROOT_EXCEPTION ? getRootExceptionClass() : getOrCreateExceptionClass(name, this.services.onEvent);
  }

  /** A class bound in the root scope. */
  findClass(name: string): ObjClass | null {
    return this.rootScope.resolveClass(name);
  }

  async instantiate(cls: ObjClass, ...args: Obj[]): Promise<Obj> {
    return cls.invoke(this.rootScope, cls, Arguments.of(...args));
  }

  /** Construct with named arguments. */
  async instantiateNamed(cls: ObjClass, positional: readonly Obj[], named: Record<string, Obj>): Promise<Obj> {
    return cls.invoke(this.rootScope, cls, new Arguments(positional, new Map(Object.entries(named))));
  }

  async call(callable: Obj, ...args: Obj[]): Promise<Obj> {
    return callable.invoke(this.rootScope, ObjVoid, Arguments.of(...args));
  }

  /**
   * A cold flow running `producer` on every iteration. The producer's
   * scope sees `scope` (the root by default) as its captured environment.
   */
  flow(producer: FlowProducer, scope: Scope = this.rootScope): ObjFlow {
    return new ObjFlow(
      statement(async (s) => {
        await producer(s.thisAs(ObjFlowBuilder), s);
        return ObjVoid;
      }),
      scope
    );
  }

  async toList(iterable: Obj): Promise<ObjList> {
    return toList(this.rootScope, iterable);
  }

  async stringify(value: Obj): Promise<string> {
    return value.asString(this.rootScope);
  }

  async serialize(value: Obj): Promise<TapeCell[]> {
    return encodeToTape(this.rootScope, value);
  }

  async deserialize(cells: readonly TapeCell[]): Promise<Obj> {
    return decodeFromTape(this.rootScope, cells);
  }

  /** Read a field of an instance as host code outside any class. */
  async field(value: Obj, name: string): Promise<Obj> {
    return value.readField(this.rootScope, name);
  }
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  return new Runtime(options);
}
