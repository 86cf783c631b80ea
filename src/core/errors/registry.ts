// src/core/errors/registry.ts
// Process-wide registry of exception classes, keyed by name

import { ExceptionClass, ObjException, captureStackTrace } from "./exception";
import { ObjInstance } from "../obj/instance";
import { ObjList, ObjVoid } from "../obj/primitives";
import { statement } from "../scope/statement";
import type { Obj } from "../obj/obj";
import type { Scope } from "../scope/scope";
import type { Encoder, Decoder } from "../codec/codec";
import type { EventHook } from "../log/events";

export const ROOT_EXCEPTION = "Exception";

/** Registered in every fresh runtime context. */
export const EXCEPTION_CATALOGUE = [
  "NullReferenceException",
  "AssertionFailedException",
  "ClassCastException",
  "IndexOutOfBoundsException",
  "IllegalArgumentException",
  "IllegalStateException",
  "NoSuchElementException",
  "IllegalAssignmentException",
  "SymbolNotDefinedException",
  "IterationEndException",
  "IllegalAccessException",
  "UnknownException",
  "NotFoundException",
  "IllegalOperationException",
  "UnsetException",
  "NotImplementedException",
  "SyntaxError",
] as const;

export type CatalogueName = (typeof EXCEPTION_CATALOGUE)[number] | typeof ROOT_EXCEPTION;

/** Alternative names resolving to catalogue classes. */
export const EXCEPTION_ALIASES: Readonly<Partial<Record<string, CatalogueName>>> = {
  SymbolNotFound: "SymbolNotDefinedException",
};

// ─────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────

let rootClass: ExceptionClass | undefined;
const registry = new Map<string, ExceptionClass>();

const TRACE_SLOT = `${ROOT_EXCEPTION}::stackTrace`;

/**
 * The shared root. Script classes extending it get `Exception::message`
 * bound by its constructor and `Exception::stackTrace` from its initializer.
 * The trace travels with a serialized instance and is restored as written.
 */
class RootExceptionClass extends ExceptionClass {
  constructor() {
    super(ROOT_EXCEPTION);
    this.instanceInitializers.push(
      statement(async (scope) => {
        const self = scope.thisObj;
        if (self instanceof ObjInstance) {
          const trace = self.isDeserializing
            ? new ObjList([])
            : captureStackTrace(scope, scope.services.config.runtime.maxStackTraceDepth);
          self.instanceScope.addItem(TRACE_SLOT, false, trace);
        }
        return ObjVoid;
      })
    );
  }

  async writeInstanceExtras(scope: Scope, instance: ObjInstance, encoder: Encoder): Promise<void> {
    const trace = instance.instanceScope.getLocalRecord(TRACE_SLOT)?.value;
    await encoder.encodeAnyList(scope, trace instanceof ObjList ? trace.items : []);
  }

  async readInstanceExtras(scope: Scope, instance: ObjInstance, decoder: Decoder): Promise<void> {
    const trace = await decoder.decodeAnyList(scope);
    instance.instanceScope.addItem(TRACE_SLOT, false, new ObjList(trace));
  }
}

export function getRootExceptionClass(): ExceptionClass {
  if (!rootClass) {
    const root = new RootExceptionClass();
    rootClass = root;
    registry.set(ROOT_EXCEPTION, root);
  }
  return rootClass;
}

/**
 * Find or create the exception class `name`, a direct child of the root.
 * The whole lookup-or-insert runs without yielding, so concurrent tasks
 * always observe one class per name.
 */
export function getOrCreateExceptionClass(name: string, onEvent?: EventHook): ExceptionClass {
  const canonical = EXCEPTION_ALIASES[name] ?? name;
  const root = getRootExceptionClass();
  const existing = registry.get(canonical);
  if (existing) return existing;
  const created = new ExceptionClass(canonical, [root]);
  registry.set(canonical, created);
  onEvent?.({ tag: "exceptionClassRegistered", className: canonical, timestamp: Date.now() });
  return created;
}

/** A catalogue class by name. */
export function getErrorClass(name: CatalogueName): ExceptionClass {
  return getOrCreateExceptionClass(name);
}

export function findExceptionClass(name: string): ExceptionClass | null {
  return registry.get(EXCEPTION_ALIASES[name] ?? name) ?? null;
}

export function registeredExceptionNames(): string[] {
  return [...registry.keys()];
}

/**
 * Reset the exception registry (for testing).
 */
export function resetExceptionRegistry(): void {
  registry.clear();
  rootClass = undefined;
}

// ─────────────────────────────────────────────────────────────────
// Helpers over exception values
// ─────────────────────────────────────────────────────────────────

/** An ObjException, or an instance of a script class extending the root. */
export function isScriptException(obj: Obj): boolean {
  return obj instanceof ObjException || (rootClass !== undefined && obj.isInstanceOf(rootClass));
}
