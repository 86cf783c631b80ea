// test/core/iter/iterator.spec.ts
// The iteration protocol as drivers see it

import { describe, it, expect, beforeEach } from "vitest";
import {
  ObjListIterator,
  collectIterator,
  enumerate,
  enumerateIterator,
  iteratorType,
} from "../../../src/core/iter/iterator";
import { ArgsDeclaration } from "../../../src/core/obj/argsDecl";
import { ObjBool, ObjList, ObjVoid } from "../../../src/core/obj/primitives";
import { IterationFinished } from "../../../src/core/errors/signals";
import type { ObjClass } from "../../../src/core/obj/class";
import type { Obj } from "../../../src/core/obj/obj";
import type { Runtime } from "../../../src/core/runtime/runtime";
import { asInt, asInts, createTestRuntime, expectScriptError, int } from "../../helpers/runtime";

let rt: Runtime;

beforeEach(() => {
  rt = createTestRuntime();
});

/** Counts down from its constructor argument to 1. */
function countdownClass(): ObjClass {
  return rt.defineClass("Countdown", [iteratorType()], (cls) => {
    cls.constructorMeta = new ArgsDeclaration([{ name: "n", isMutable: true }]);
    cls.addFn("hasNext", async (s) => ObjBool.of(asInt(await s.thisObj.readField(s, "n")) > 0));
    cls.addFn("next", async (s) => {
      const n = await s.thisObj.readField(s, "n");
      await s.thisObj.writeField(s, "n", await n.minus(s, int(1)));
      return n;
    });
  });
}

/** Never ends; counts cancellations. */
async function endless(): Promise<{ iterator: Obj; cancels: () => number }> {
  let cancels = 0;
  const cls = rt.defineClass("Endless", [iteratorType()], (c) => {
    c.addFn("hasNext", async () => ObjBool.TRUE);
    c.addFn("next", async () => int(0));
    c.addFn("cancelIteration", async () => {
      cancels++;
      return ObjVoid;
    });
  });
  return { iterator: await rt.instantiate(cls), cancels: () => cancels };
}

describe("script-defined iterators", () => {
  it("are driven through hasNext and next", async () => {
    const countdown = await rt.instantiate(countdownClass(), int(3));
    expect(asInts(await collectIterator(rt.rootScope, countdown))).toEqual([3, 2, 1]);
  });

  it("inherit toList from the iterator root", async () => {
    const countdown = await rt.instantiate(countdownClass(), int(2));
    expect(asInts(await countdown.invokeInstanceMethod(rt.rootScope, "toList"))).toEqual([2, 1]);
  });

  it("must return Bool from hasNext", async () => {
    const odd = rt.defineClass("Odd", [iteratorType()], (cls) => {
      cls.addFn("hasNext", async () => int(1));
    });
    await expectScriptError(
      collectIterator(rt.rootScope, await rt.instantiate(odd)),
      "ClassCastException",
      "hasNext must return Bool, got Int"
    );
  });

  it("fail when the protocol is not implemented", async () => {
    const bare = rt.defineClass("Bare", [iteratorType()]);
    await expectScriptError(
      collectIterator(rt.rootScope, await rt.instantiate(bare)),
      "NotImplementedException",
      "hasNext is not implemented"
    );
  });
});

describe("enumerateIterator", () => {
  it("cancels an iterator the callback stops early", async () => {
    const { iterator, cancels } = await endless();
    let seen = 0;
    await enumerateIterator(rt.rootScope, iterator, async () => ++seen < 2);
    expect(seen).toBe(2);
    expect(cancels()).toBe(1);
  });

  it("treats IterationFinished as a normal early stop", async () => {
    const { iterator, cancels } = await endless();
    await enumerateIterator(rt.rootScope, iterator, async () => {
      throw new IterationFinished();
    });
    expect(cancels()).toBe(1);
  });

  it("cancels, then rethrows other errors", async () => {
    const { iterator, cancels } = await endless();
    const failure = new Error("callback failed");
    await expect(
      enumerateIterator(rt.rootScope, iterator, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(cancels()).toBe(1);
  });

  it("does not cancel an exhausted iterator", async () => {
    let left = 1;
    let cancelled = false;
    const once = rt.defineClass("Once", [iteratorType()], (cls) => {
      cls.addFn("hasNext", async () => ObjBool.of(left > 0));
      cls.addFn("next", async () => {
        left--;
        return int(1);
      });
      cls.addFn("cancelIteration", async () => {
        cancelled = true;
        return ObjVoid;
      });
    });
    await enumerateIterator(rt.rootScope, await rt.instantiate(once), async () => true);
    expect(left).toBe(0);
    expect(cancelled).toBe(false);
  });
});

describe("lists", () => {
  it("enumerate their items", async () => {
    const seen: number[] = [];
    await enumerate(rt.rootScope, new ObjList([int(4), int(5)]), async (item) => {
      seen.push(asInt(item));
      return true;
    });
    expect(seen).toEqual([4, 5]);
    expect(asInts(await rt.toList(new ObjList([int(6)])))).toEqual([6]);
  });

  it("raise past the end", async () => {
    const it = new ObjListIterator([int(1)]);
    expect(asInt(await it.next(rt.rootScope))).toBe(1);
    expect(await it.hasNext()).toBe(false);
    await expectScriptError(it.next(rt.rootScope), "NoSuchElementException", "iteration is done");
  });
});
