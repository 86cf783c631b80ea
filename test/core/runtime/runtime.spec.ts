// test/core/runtime/runtime.spec.ts
// Runtime context: built-ins, catalogue, configuration, host helpers

import { describe, it, expect } from "vitest";
import { Runtime, RuntimeConfigError, createRuntime } from "../../../src/core/runtime/runtime";
import { ObjClass } from "../../../src/core/obj/class";
import { ObjNativeFunction } from "../../../src/core/obj/callable";
import { ObjBool, ObjInt, ObjList, ObjNull, ObjVoid } from "../../../src/core/obj/primitives";
import { EXCEPTION_CATALOGUE } from "../../../src/core/errors/registry";
import { createLogger } from "../../../src/core/log/logger";
import { createEventLedger, eventsOfTag } from "../../../src/core/log/events";
import { asInt, captureSink, createTestRuntime, int } from "../../helpers/runtime";

describe("root scope", () => {
  it("binds the built-in types by class name", () => {
    const rt = createTestRuntime();
    for (const name of ["Obj", "Class", "Null", "Void", "Bool", "Int", "String", "List", "Iterable", "Iterator"]) {
      expect(rt.findClass(name)?.className).toBe(name);
    }
    for (const name of ["ListIterator", "Callable", "Property", "StackTraceEntry", "Flow", "FlowIterator", "FlowBuilder"]) {
      expect(rt.findClass(name)?.className).toBe(name);
    }
    expect(rt.findClass("Obj")).toBe(ObjClass.rootType);
    expect(rt.findClass("Int")).toBe(ObjInt.type);
  });

  it("binds the constants", () => {
    const rt = createTestRuntime();
    expect(rt.rootScope.get("null")?.value).toBe(ObjNull);
    expect(rt.rootScope.get("void")?.value).toBe(ObjVoid);
    expect(rt.rootScope.get("true")?.value).toBe(ObjBool.TRUE);
    expect(rt.rootScope.get("false")?.value).toBe(ObjBool.FALSE);
  });

  it("binds the root exception and the whole catalogue", () => {
    const rt = createTestRuntime();
    expect(rt.findClass("Exception")).toBe(rt.exceptionClass("Exception"));
    for (const name of EXCEPTION_CATALOGUE) {
      expect(rt.findClass(name)).toBe(rt.exceptionClass(name));
    }
    expect(rt.findClass("SymbolNotFound")).toBe(rt.exceptionClass("SymbolNotDefinedException"));
  });

  it("is shared by the runtime's services", () => {
    const rt = createTestRuntime({ config: { runtime: { dispatchCacheSize: 16 } } });
    expect(rt.rootScope.services).toBe(rt.services);
    expect(rt.services.dispatchCache.capacity).toBe(16);
  });
});

describe("configuration", () => {
  it("merges the given settings over the defaults", () => {
    const rt = createTestRuntime({ config: { flow: { producerErrorPolicy: "log" } } });
    expect(rt.config.flow.producerErrorPolicy).toBe("log");
    expect(rt.config.log.level).toBe("warn");
    expect(rt.config.runtime.scopeDepthLimit).toBe(4096);
  });

  it("refuses invalid settings", () => {
    let caught: unknown;
    try {
      createTestRuntime({ config: { runtime: { dispatchCacheSize: 0, scopeDepthLimit: 0 } } });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(RuntimeConfigError);
    if (caught instanceof RuntimeConfigError) {
      expect(caught.errors).toEqual(["dispatchCacheSize must be at least 1", "scopeDepthLimit must be at least 1"]);
      expect(caught.message).toBe(
        "invalid runtime configuration: dispatchCacheSize must be at least 1; scopeDepthLimit must be at least 1"
      );
    }
  });

  it("logs warnings about questionable settings", () => {
    const { lines, sink } = captureSink();
    createRuntime({ config: { runtime: { maxStackTraceDepth: 4 } }, logger: createLogger("warn", sink) });
    expect(lines).toEqual([
      { level: "warn", args: ["[marl] maxStackTraceDepth is very low, stack traces will be truncated"] },
    ]);
  });
});

describe("host helpers", () => {
  it("defines classes visible from the root and announces them", () => {
    const ledger = createEventLedger();
    const rt = createTestRuntime({ onEvent: ledger.record });
    const shape = rt.defineClass("Shape");
    rt.defineClass("Circle", [shape]);
    expect(rt.findClass("Circle")?.mro.map((c) => c.className)).toEqual(["Circle", "Shape"]);
    expect(eventsOfTag(ledger.events, "classDefined").map((e) => [e.className, e.parents])).toEqual([
      ["Shape", []],
      ["Circle", ["Shape"]],
    ]);
  });

  it("announces each instance", async () => {
    const ledger = createEventLedger();
    const rt = createTestRuntime({ onEvent: ledger.record });
    await rt.instantiate(rt.defineClass("Thing"));
    expect(eventsOfTag(ledger.events, "instanceCreated").map((e) => e.className)).toEqual(["Thing"]);
  });

  it("calls callables without a receiver", async () => {
    const rt = createTestRuntime();
    const sum = new ObjNativeFunction("sum", async (s) => {
      let total = 0;
      for (const arg of s.args.list) total += asInt(arg);
      expect(s.thisObj).toBe(ObjVoid);
      return int(total);
    });
    expect(asInt(await rt.call(sum, int(1), int(2), int(3)))).toBe(6);
  });

  it("collects iterables and stringifies values", async () => {
    const rt = createTestRuntime();
    const list = await rt.toList(new ObjList([int(1), int(2)]));
    expect(await rt.stringify(list)).toBe("[1,2]");
  });

  it("keeps runtimes independent", () => {
    const a = createTestRuntime();
    const b = new Runtime({ logger: a.logger });
    a.defineClass("OnlyInA");
    expect(b.findClass("OnlyInA")).toBeNull();
    expect(b.logger).toBe(a.logger);
  });
});
