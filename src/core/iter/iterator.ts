// src/core/iter/iterator.ts
// The iterator contract: hasNext / next / cancelIteration

import { Obj } from "../obj/obj";
import { ObjClass } from "../obj/class";
import { ObjBool, ObjList, ObjVoid } from "../obj/primitives";
import { IterationFinished } from "../errors/signals";
import type { Scope } from "../scope/scope";

// ─────────────────────────────────────────────────────────────────
// Root classes
// ─────────────────────────────────────────────────────────────────

let iteratorClass: ObjClass | undefined;
let iterableClass: ObjClass | undefined;

/**
 * Root of all iterators. `cancelIteration` is a no-op here; iterators that
 * own resources override it.
 */
export function iteratorType(): ObjClass {
  if (!iteratorClass) {
    const type = new ObjClass("Iterator");
    type.addFn("hasNext", async (s) => s.raiseNotImplemented("hasNext is not implemented"), { isOpen: true });
    type.addFn("next", async (s) => s.raiseNotImplemented("next is not implemented"), { isOpen: true });
    type.addFn("cancelIteration", async () => ObjVoid, { isOpen: true });
    type.addFn("toList", async (s) => collectIterator(s, s.thisObj), { isOpen: true });
    iteratorClass = type;
  }
  return iteratorClass;
}

/** Root of everything that can produce an iterator. */
export function iterableType(): ObjClass {
  if (!iterableClass) {
    const type = new ObjClass("Iterable");
    type.addFn("iterator", async (s) => s.raiseNotImplemented("iterator is not implemented"), { isOpen: true });
    type.addFn("toList", async (s) => toList(s, s.thisObj), { isOpen: true });
    iterableClass = type;
  }
  return iterableClass;
}

/**
 * Base for iterators implemented on the host side.
 */
export abstract class ObjIterator extends Obj {
  abstract hasNext(scope: Scope): Promise<boolean>;
  abstract next(scope: Scope): Promise<Obj>;
}

// ─────────────────────────────────────────────────────────────────
// Iteration drivers
// ─────────────────────────────────────────────────────────────────

async function hasNextOf(scope: Scope, iterator: Obj): Promise<boolean> {
  const result = await iterator.invokeInstanceMethod(scope, "hasNext");
  const flag = result.toBool();
  if (flag === undefined) {
    return scope.raiseClassCastError(`hasNext must return Bool, got ${result.objClass.className}`);
  }
  return flag;
}

async function cancelIterator(scope: Scope, iterator: Obj): Promise<void> {
  await iterator.invokeInstanceMethod(scope, "cancelIteration", undefined, () => ObjVoid);
}

/**
 * Drive an iterator, passing each item to `callback` until it returns
 * false. When the loop stops before the iterator is exhausted, whether by
 * the callback or by an error, the iterator's `cancelIteration` runs.
 */
export async function enumerateIterator(
  scope: Scope,
  iterator: Obj,
  callback: (item: Obj) => Promise<boolean>
): Promise<void> {
  let stoppedEarly = false;
  try {
    while (await hasNextOf(scope, iterator)) {
      const item = await iterator.invokeInstanceMethod(scope, "next");
      if (!(await callback(item))) {
        stoppedEarly = true;
        break;
      }
    }
  } catch (e) {
    await cancelIterator(scope, iterator);
    if (e instanceof IterationFinished) return;
    throw e;
  }
  if (stoppedEarly) await cancelIterator(scope, iterator);
}

/**
 * Enumerate an iterable: obtains its iterator and drives it.
 */
export async function enumerate(
  scope: Scope,
  iterable: Obj,
  callback: (item: Obj) => Promise<boolean>
): Promise<void> {
  const iterator = await iterable.invokeInstanceMethod(scope, "iterator");
  await enumerateIterator(scope, iterator, callback);
}

export async function collectIterator(scope: Scope, iterator: Obj): Promise<ObjList> {
  const items: Obj[] = [];
  await enumerateIterator(scope, iterator, async (item) => {
    items.push(item);
    return true;
  });
  return new ObjList(items);
}

export async function toList(scope: Scope, iterable: Obj): Promise<ObjList> {
  const iterator = await iterable.invokeInstanceMethod(scope, "iterator");
  return collectIterator(scope, iterator);
}

// ─────────────────────────────────────────────────────────────────
// List iterator
// ─────────────────────────────────────────────────────────────────

export class ObjListIterator extends ObjIterator {
  private index = 0;

  constructor(private readonly items: readonly Obj[]) {
    super();
  }

  get objClass(): ObjClass {
    return ObjListIterator.type;
  }

  async hasNext(): Promise<boolean> {
    return this.index < this.items.length;
  }

  async next(scope: Scope): Promise<Obj> {
    if (this.index >= this.items.length) return scope.raiseNoSuchElement("iteration is done");
    return this.items[this.index++];
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjListIterator._type) {
      const type = new ObjClass("ListIterator", [iteratorType()]);
      type.addFn("hasNext", async (s) => ObjBool.of(await s.thisAs(ObjListIterator).hasNext()));
      type.addFn("next", async (s) => s.thisAs(ObjListIterator).next(s));
      ObjListIterator._type = type;
    }
    return ObjListIterator._type;
  }
}
