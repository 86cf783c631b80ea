// test/core/obj/class.spec.ts
// Class descriptors: member declaration, layout versions, construction

import { describe, it, expect, beforeEach } from "vitest";
import { ObjClass } from "../../../src/core/obj/class";
import { ArgsDeclaration } from "../../../src/core/obj/argsDecl";
import { ObjInstance } from "../../../src/core/obj/instance";
import { ObjString, ObjVoid } from "../../../src/core/obj/primitives";
import { Arguments } from "../../../src/core/scope/arguments";
import { statement } from "../../../src/core/scope/statement";
import { ScriptError } from "../../../src/core/errors/scriptError";
import { createEventLedger, eventsOfTag } from "../../../src/core/log/events";
import type { Runtime } from "../../../src/core/runtime/runtime";
import { asInt, createTestRuntime, expectScriptError, int, str } from "../../helpers/runtime";

let rt: Runtime;

beforeEach(() => {
  rt = createTestRuntime();
});

function definitionError(action: () => unknown): ScriptError {
  try {
    action();
  } catch (e) {
    if (e instanceof ScriptError) return e;
    throw e;
  }
  throw new Error("no definition error was raised");
}

describe("member declaration", () => {
  it("refuses to redeclare an immutable member", () => {
    const base = new ObjClass("Base");
    base.createField("count", int(0));
    const error = definitionError(() => base.createField("count", int(1), { isMutable: true }));
    expect(error.errorMessage).toBe("count is already defined in Base and can't be redeclared in Base");
  });

  it("lets a subclass override an overridable member", () => {
    const base = new ObjClass("Base");
    base.createField("count", int(0), { isMutable: true });
    const derived = new ObjClass("Derived", [base]);
    derived.createField("count", int(5));
    expect(asInt(derived.getInstanceMember("count").value)).toBe(5);
    expect(derived.findDeclaringClassOf("count")).toBe(derived);
    expect(base.findDeclaringClassOf("count")).toBe(base);
  });

  it("refuses to override an immutable ancestor member", () => {
    const base = new ObjClass("Base");
    base.addFn("id", async () => int(1));
    const derived = new ObjClass("Derived", [base]);
    const error = definitionError(() => derived.addFn("id", async () => int(2)));
    expect(error.errorMessage).toBe("id is already defined in Base and can't be redeclared in Derived");
  });

  it("refuses any static name collision", () => {
    const cls = new ObjClass("Registry");
    cls.createClassField("instances", int(0), { isMutable: true });
    const error = definitionError(() => cls.createClassField("instances", int(1), { isMutable: true }));
    expect(error.errorMessage).toBe("static member instances is already defined in Registry");
  });

  it("bumps the layout version here and in every subclass", () => {
    const base = new ObjClass("Base");
    const derived = new ObjClass("Derived", [base]);
    expect(base.layoutVersion).toBe(0);

    base.addFn("a", async () => ObjVoid);
    base.createClassField("s", int(0));
    expect(base.layoutVersion).toBe(2);
    expect(derived.layoutVersion).toBe(2);

    derived.addFn("b", async () => ObjVoid);
    expect(base.layoutVersion).toBe(2);
    expect(derived.layoutVersion).toBe(3);
  });

  it("reports definitions and declarations as events", () => {
    const ledger = createEventLedger();
    const events = createTestRuntime({ onEvent: ledger.record });
    const base = events.defineClass("Shape");
    events.defineClass("Circle", [base], (cls) => {
      cls.addFn("area", async () => int(3));
    });

    expect(eventsOfTag(ledger.events, "classDefined").map((e) => [e.className, e.parents])).toEqual([
      ["Shape", []],
      ["Circle", ["Shape"]],
    ]);
    const declared = eventsOfTag(ledger.events, "memberDeclared");
    expect(declared.map((e) => [e.className, e.name, e.isStatic, e.layoutVersion])).toEqual([
      ["Circle", "area", false, 1],
    ]);
  });
});

describe("member resolution", () => {
  it("checks members, then statics, along the linearization, then the root type", () => {
    const a = new ObjClass("A");
    a.createClassField("shared", int(1));
    const b = new ObjClass("B", [a]);
    b.createField("shared", int(2));
    const c = new ObjClass("C", [b]);

    expect(asInt(c.getInstanceMember("shared").value)).toBe(2);
    expect(c.getInstanceMemberOrNull("toString")?.declaringClass).toBe(ObjClass.rootType);
    expect(c.getInstanceMemberOrNull("missing")).toBeNull();
  });

  it("names the lookup order when a member is missing", () => {
    const a = new ObjClass("A");
    const b = new ObjClass("B", [a]);
    const error = definitionError(() => b.getInstanceMember("fly"));
    expect(error.errorMessage).toBe("no such member: fly (lookup order: B, A)");
  });

  it("starts ancestor lookups at the ancestor's position", () => {
    const a = new ObjClass("A");
    a.addFn("who", async () => str("A"), { isOpen: true });
    const b = new ObjClass("B", [a]);
    b.addFn("who", async () => str("B"));
    expect(b.getInstanceMemberFromAncestor(a, "who")?.declaringClass).toBe(a);
    expect(b.getInstanceMemberFromAncestor(b, "who")?.declaringClass).toBe(b);
    expect(a.getInstanceMemberFromAncestor(b, "who")).toBeNull();
  });
});

describe("construction", () => {
  it("initializes each ancestor of a diamond exactly once", async () => {
    const runs: string[] = [];
    const track = (cls: ObjClass): void => {
      cls.instanceInitializers.push(
        statement(async () => {
          runs.push(cls.className);
          return ObjVoid;
        })
      );
    };
    const a = rt.defineClass("A", [], (cls) => {
      cls.addInstanceField("x", async () => int(1));
      track(cls);
    });
    const b = rt.defineClass("B", [a], (cls) => {
      cls.addInstanceField("y", async () => int(2));
      track(cls);
    });
    const c = rt.defineClass("C", [a], (cls) => {
      cls.addInstanceField("z", async () => int(3));
      track(cls);
    });
    const d = rt.defineClass("D", [b, c], track);

    const instance = await rt.instantiate(d);
    expect(runs).toEqual(["A", "B", "C", "D"]);
    expect(asInt(await rt.field(instance, "x"))).toBe(1);
    expect(asInt(await rt.field(instance, "y"))).toBe(2);
    expect(asInt(await rt.field(instance, "z"))).toBe(3);
  });

  it("initializes parents in declared order, not reversed linearization", async () => {
    const runs: string[] = [];
    const track = (cls: ObjClass): void => {
      cls.instanceInitializers.push(
        statement(async () => {
          runs.push(cls.className);
          return ObjVoid;
        })
      );
    };
    const a = rt.defineClass("A", [], track);
    const b = rt.defineClass("B", [a], track);
    const c = rt.defineClass("C", [a], track);
    const e = rt.defineClass("E", [c, b], track);

    await rt.instantiate(e);
    expect(e.mro.map((cls) => cls.className)).toEqual(["E", "C", "B", "A"]);
    expect(runs).toEqual(["A", "C", "B", "E"]);
  });

  it("runs initializers before the constructor body", async () => {
    const runs: string[] = [];
    const cls = rt.defineClass("Ordered", [], (c) => {
      c.instanceInitializers.push(
        statement(async () => {
          runs.push("init");
          return ObjVoid;
        })
      );
      c.instanceConstructor = statement(async () => {
        runs.push("constructor");
        return ObjVoid;
      });
    });
    await rt.instantiate(cls);
    expect(runs).toEqual(["init", "constructor"]);
  });

  it("binds constructor parameters under plain and qualified names", async () => {
    const point = rt.defineClass("Point", [], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([
        { name: "x" },
        { name: "y", defaultValue: statement(async () => int(0)) },
      ]);
    });
    const p = await rt.instantiate(point, int(3));
    expect(p).toBeInstanceOf(ObjInstance);
    if (!(p instanceof ObjInstance)) return;
    expect(asInt(await rt.field(p, "x"))).toBe(3);
    expect(asInt(await rt.field(p, "y"))).toBe(0);
    expect(p.instanceScope.getLocalRecord("Point::x")).toBe(p.instanceScope.getLocalRecord("x"));
  });

  it("accepts named constructor arguments", async () => {
    const point = rt.defineClass("Point", [], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([{ name: "x" }, { name: "y" }]);
    });
    const p = await rt.instantiateNamed(point, [], { y: int(5), x: int(1) });
    expect(await rt.stringify(p)).toBe("Point(x=1,y=5)");
  });

  it("passes each parent the slice of arguments its constructor takes", async () => {
    const point = rt.defineClass("Point", [], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([{ name: "x" }, { name: "y" }]);
    });
    const colored = rt.defineClass("ColoredPoint", [point], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([{ name: "x" }, { name: "y" }, { name: "color" }]);
    });
    const p = await rt.instantiate(colored, int(1), int(2), str("red"));
    expect(await rt.stringify(p)).toBe("ColoredPoint(x=1,y=2,color=red)");
    if (!(p instanceof ObjInstance)) throw new Error("expected an instance");
    expect(asInt(p.instanceScope.getLocalRecord("Point::y")?.value ?? ObjVoid)).toBe(2);
  });

  it("evaluates explicit parent arguments in the child's body scope", async () => {
    const base = rt.defineClass("Base", [], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([{ name: "m" }]);
    });
    const child = rt.defineClass("Child", [base], (cls) => {
      cls.constructorMeta = new ArgsDeclaration([{ name: "n" }]);
      cls.setParentArguments(base, [
        statement(async (s) => {
          const n = s.get("n");
          if (!n) return s.raiseSymbolNotFound("n");
          return n.value.mul(s, int(10));
        }),
      ]);
    });
    const instance = await rt.instantiate(child, int(7));
    expect(asInt(await rt.field(instance, "m"))).toBe(70);
    expect(asInt(await rt.field(instance, "n"))).toBe(7);
  });

  it("rejects parent arguments for a class that is not a direct parent", () => {
    const a = new ObjClass("A");
    const b = new ObjClass("B");
    const error = definitionError(() => b.setParentArguments(a, []));
    expect(error.errorMessage).toBe("A is not a direct parent of B");
  });

  it("gives every instance its own copy of mutable fields", async () => {
    const counter = rt.defineClass("Counter", [], (cls) => {
      cls.createField("hits", int(0), { isMutable: true });
    });
    const first = await rt.instantiate(counter);
    const second = await rt.instantiate(counter);
    await first.writeField(rt.rootScope, "hits", int(4));
    expect(asInt(await rt.field(first, "hits"))).toBe(4);
    expect(asInt(await rt.field(second, "hits"))).toBe(0);
  });

  it("shares static members between the class, its subclasses and instances", async () => {
    const base = rt.defineClass("Base", [], (cls) => {
      cls.createClassField("created", int(0), { isMutable: true });
    });
    const derived = rt.defineClass("Derived", [base]);
    const instance = await rt.instantiate(derived);

    await base.writeField(rt.rootScope, "created", int(2));
    expect(asInt(await derived.readField(rt.rootScope, "created"))).toBe(2);
    expect(asInt(await rt.field(instance, "created"))).toBe(2);
  });

  it("calls static functions with the class as receiver", async () => {
    const factory = rt.defineClass("Factory", [], (cls) => {
      cls.addClassFn("describe", async (s) => new ObjString(`made by ${await s.thisObj.asString(s)}`));
    });
    const result = await factory.invokeInstanceMethod(rt.rootScope, "describe");
    expect(result.asPlainString()).toBe("made by Factory");
    expect((await factory.readField(rt.rootScope, "className")).asPlainString()).toBe("Factory");
  });

  it("reports an unknown member with the lookup order", async () => {
    const point = rt.defineClass("Point");
    const p = await rt.instantiate(point);
    await expectScriptError(
      p.invokeInstanceMethod(rt.rootScope, "fly", Arguments.EMPTY),
      "SymbolNotDefinedException",
      "no such member: fly in Point (lookup order: Point)"
    );
  });
});
