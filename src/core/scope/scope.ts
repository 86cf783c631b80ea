// src/core/scope/scope.ts
// Lexical environments: parent-chain lookup, receivers, bound arguments

import { ObjRecord, type RecordOptions } from "../obj/record";
import { ObjClass } from "../obj/class";
import { ObjVoid } from "../obj/primitives";
import { Arguments } from "./arguments";
import { Pos } from "../pos/source";
import { ExecutionError, ScriptError } from "../errors/scriptError";
import { ObjException } from "../errors/exception";
import { getErrorClass, type CatalogueName } from "../errors/registry";
import { describeException } from "../errors/format";
import { defaultServices, type RuntimeServices } from "../runtime/services";
import type { Obj } from "../obj/obj";

export type ChildScopeOptions = {
  pos?: Pos;
  args?: Arguments;
  thisObj?: Obj;
  /** Class whose code runs in the scope; null for top-level code */
  currentClassCtx?: ObjClass | null;
};

type Constructor<T> = new (...args: never[]) => T;

/**
 * One frame of lexical environment. Lookup checks the frame's own records,
 * then the receiver's, then the parent. Frames are never reused, so a
 * captured scope stays valid after the call that made it returns.
 */
export class Scope {
  readonly parent: Scope | null;
  readonly args: Arguments;
  /** Moves as statements run; stack traces read it. */
  pos: Pos;
  readonly thisObj: Obj;
  readonly currentClassCtx: ObjClass | null;
  readonly services: RuntimeServices;
  private readonly objects = new Map<string, ObjRecord>();

  constructor(parent: Scope | null, options: ChildScopeOptions = {}, services?: RuntimeServices) {
    this.parent = parent;
    this.args = options.args ?? Arguments.EMPTY;
    this.pos = options.pos ?? parent?.pos ?? Pos.builtIn;
    this.thisObj = options.thisObj ?? parent?.thisObj ?? ObjVoid;
    this.currentClassCtx =
      options.currentClassCtx !== undefined ? options.currentClassCtx : (parent?.currentClassCtx ?? null);
    this.services = services ?? parent?.services ?? defaultServices();
  }

  static root(services?: RuntimeServices): Scope {
    return new Scope(null, {}, services);
  }

  createChildScope(options: ChildScopeOptions = {}): Scope {
    return new Scope(this, options);
  }

  // ─────────────────────────────────────────────────────────────────
  // Records
  // ─────────────────────────────────────────────────────────────────

  getLocalRecord(name: string): ObjRecord | null {
    return this.objects.get(name) ?? null;
  }

  hasLocal(name: string): boolean {
    return this.objects.has(name);
  }

  localEntries(): IterableIterator<[string, ObjRecord]> {
    return this.objects.entries();
  }

  /** Bind an existing record; several names may share one. */
  bindRecord(name: string, record: ObjRecord): void {
    this.objects.set(name, record);
  }

  /** Declare a variable. The value is stored as its by-value copy. */
  addItem(name: string, isMutable: boolean, value: Obj, options: Omit<RecordOptions, "isMutable"> = {}): ObjRecord {
    const record = new ObjRecord(value.byValueCopy(), { ...options, isMutable });
    this.objects.set(name, record);
    return record;
  }

  addConst(name: string, value: Obj): ObjRecord {
    return this.addItem(name, false, value);
  }

  protected lookupHere(name: string): ObjRecord | null {
    return this.objects.get(name) ?? this.thisObj.lookupOwnRecord(name);
  }

  get(name: string): ObjRecord | null {
    const limit = this.services.config.runtime.scopeDepthLimit;
    let current: Scope | null = this;
    let hops = 0;
    while (current) {
      if (hops++ >= limit) {
        throw new ScriptError(this.pos, `scope chain is deeper than ${limit} frames while resolving ${name}`);
      }
      const record = current.lookupHere(name);
      if (record) return record;
      current = current.parent;
    }
    return null;
  }

  /** A class visible under `name`. */
  resolveClass(name: string): ObjClass | null {
    const value = this.get(name)?.value;
    return value instanceof ObjClass ? value : null;
  }

  // ─────────────────────────────────────────────────────────────────
  // Arguments and receiver
  // ─────────────────────────────────────────────────────────────────

  requireOnlyArg(): Obj {
    if (this.args.list.length !== 1 || this.args.named.size > 0) {
      this.raiseIllegalArgument(`expected exactly one argument, got ${this.args.size}`);
    }
    return this.args.list[0];
  }

  requireArg(index: number): Obj {
    const value = this.args.at(index);
    if (!value) return this.raiseIllegalArgument(`missing argument #${index + 1}`);
    return value;
  }

  thisAs<T extends Obj>(type: Constructor<T>): T {
    const self = this.thisObj;
    if (self instanceof type) return self;
    return this.raiseClassCastError(`receiver is ${self.objClass.className}, expected ${type.name}`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Raising
  // ─────────────────────────────────────────────────────────────────

  /** Build an exception of a catalogue class at this scope. */
  createException(className: CatalogueName, message: string, extraData?: Obj): ObjException {
    return new ObjException(getErrorClass(className), this, message, extraData);
  }

  /** Throw any exception value, built-in or an instance of a script class. */
  raiseErrorObject(errorObject: Obj, message?: string): never {
    const text = message ?? describeException(errorObject);
    throw new ExecutionError(errorObject, this.pos, text);
  }

  private raiseNamed(className: CatalogueName, message: string): never {
    return this.raiseErrorObject(this.createException(className, message));
  }

  raiseError(message: string): never {
    return this.raiseNamed("Exception", message);
  }

  raiseIllegalArgument(message = "Illegal argument"): never {
    return this.raiseNamed("IllegalArgumentException", message);
  }

  raiseIllegalState(message = "Illegal state"): never {
    return this.raiseNamed("IllegalStateException", message);
  }

  raiseIndexOutOfBounds(message = "Index out of bounds"): never {
    return this.raiseNamed("IndexOutOfBoundsException", message);
  }

  raiseNotImplemented(message = "not implemented"): never {
    return this.raiseNamed("NotImplementedException", message);
  }

  raiseSymbolNotFound(message: string): never {
    return this.raiseNamed("SymbolNotDefinedException", message);
  }

  raiseNPE(): never {
    return this.raiseNamed("NullReferenceException", "object is null");
  }

  raiseNoSuchElement(message = "No such element"): never {
    return this.raiseNamed("NoSuchElementException", message);
  }

  raiseClassCastError(message: string): never {
    return this.raiseNamed("ClassCastException", message);
  }

  raiseIllegalAssignment(message: string): never {
    return this.raiseNamed("IllegalAssignmentException", message);
  }

  raiseIllegalAccess(message: string): never {
    return this.raiseNamed("IllegalAccessException", message);
  }
}

/**
 * A call scope with a captured environment behind it. Receiver and
 * arguments come from the call; names missing along the call chain are
 * looked up in the closure.
 */
export class ClosureScope extends Scope {
  constructor(
    readonly callScope: Scope,
    readonly closureScope: Scope
  ) {
    super(callScope, { args: callScope.args, thisObj: callScope.thisObj });
  }

  get(name: string): ObjRecord | null {
    return super.get(name) ?? this.closureScope.get(name);
  }
}
