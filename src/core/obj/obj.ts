// src/core/obj/obj.ts
// The value contract every runtime datum implements

import { ObjRecord, canAccessMember } from "./record";
import { Arguments } from "../scope/arguments";
import { ExecutionError } from "../errors/scriptError";
import type { ObjClass } from "./class";
import type { Scope } from "../scope/scope";
import type { Encoder } from "../codec/codec";

/** Result of `compareTo` when the operands cannot be ordered at all. */
export const INCOMPARABLE = 2;

export type BinaryOperator =
  | "plus"
  | "minus"
  | "mul"
  | "div"
  | "mod"
  | "logicalAnd"
  | "logicalOr"
  | "bitAnd"
  | "bitOr"
  | "bitXor"
  | "shl"
  | "shr";

/**
 * Base of all runtime values.
 *
 * Every operation takes the scope it runs in: errors are raised through it
 * (so they carry its position and stack) and member lookups go through its
 * dispatch cache. Defaults fail with NotImplementedException.
 */
export abstract class Obj {
  abstract get objClass(): ObjClass;

  /** null, void and unset values. */
  get isNullish(): boolean {
    return false;
  }

  /**
   * The value to store in a new variable binding. By-reference types return
   * `this`; by-value types return a fresh copy.
   */
  byValueCopy(): Obj {
    return this;
  }

  /** Host boolean for Bool values, undefined otherwise. */
  toBool(): boolean | undefined {
    return undefined;
  }

  /** Host string for String values, undefined otherwise. */
  asPlainString(): string | undefined {
    return undefined;
  }

  /**
   * A record this value contributes to name lookup when it is the receiver
   * of a scope.
   */
  lookupOwnRecord(name: string): ObjRecord | null {
    return this.objClass.getInstanceMemberOrNull(name);
  }

  isInstanceOf(cls: ObjClass): boolean {
    return cls.isRootType || this.objClass.mro.includes(cls);
  }

  // ─────────────────────────────────────────────────────────────────
  // Comparison
  // ─────────────────────────────────────────────────────────────────

  /**
   * Negative, zero or positive for ordered values; {@link INCOMPARABLE}
   * when either side is null or void.
   */
  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other === this) return 0;
    if (this.isNullish || other.isNullish) return INCOMPARABLE;
    return scope.raiseNotImplemented(
      `can't compare ${this.objClass.className} with ${other.objClass.className}`
    );
  }

  async equals(scope: Scope, other: Obj): Promise<boolean> {
    if (other === this) return true;
    try {
      return (await this.compareTo(scope, other)) === 0;
    } catch (e) {
      if (e instanceof ExecutionError) return false;
      throw e;
    }
  }

  async contains(scope: Scope, _element: Obj): Promise<boolean> {
    return scope.raiseNotImplemented(`${this.objClass.className} does not support 'in'`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Operators
  // ─────────────────────────────────────────────────────────────────

  async binaryOp(scope: Scope, op: BinaryOperator, _other: Obj): Promise<Obj> {
    return scope.raiseNotImplemented(`operator ${op} is not defined for ${this.objClass.className}`);
  }

  plus(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "plus", other);
  }

  minus(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "minus", other);
  }

  mul(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "mul", other);
  }

  div(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "div", other);
  }

  mod(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "mod", other);
  }

  logicalAnd(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "logicalAnd", other);
  }

  logicalOr(scope: Scope, other: Obj): Promise<Obj> {
    return this.binaryOp(scope, "logicalOr", other);
  }

  async negate(scope: Scope): Promise<Obj> {
    return scope.raiseNotImplemented(`unary minus is not defined for ${this.objClass.className}`);
  }

  async logicalNot(scope: Scope): Promise<Obj> {
    return scope.raiseNotImplemented(`'!' is not defined for ${this.objClass.className}`);
  }

  async bitNot(scope: Scope): Promise<Obj> {
    return scope.raiseNotImplemented(`'~' is not defined for ${this.objClass.className}`);
  }

  // ─────────────────────────────────────────────────────────────────
  // Indexing and invocation
  // ─────────────────────────────────────────────────────────────────

  async getAt(scope: Scope, _index: Obj): Promise<Obj> {
    return scope.raiseNotImplemented(`indexing is not supported by ${this.objClass.className}`);
  }

  async putAt(scope: Scope, _index: Obj, _value: Obj): Promise<void> {
    scope.raiseNotImplemented(`indexed assignment is not supported by ${this.objClass.className}`);
  }

  /** Run this value as a callable in an already prepared call scope. */
  async callOn(scope: Scope): Promise<Obj> {
    return scope.raiseNotImplemented(`${this.objClass.className} is not callable`);
  }

  /**
   * Call with a receiver. The call scope is a child of `scope`; when the
   * callable is a member, `declaringClass` becomes the access context.
   */
  invoke(scope: Scope, thisObj: Obj, args: Arguments, declaringClass: ObjClass | null = null): Promise<Obj> {
    return this.callOn(
      scope.createChildScope({
        args,
        thisObj,
        currentClassCtx: declaringClass ?? scope.currentClassCtx,
      })
    );
  }

  /**
   * What reading this value out of a member record yields. Accessor
   * properties override it to run their getter.
   */
  async resolveAsMember(_scope: Scope, _receiver: Obj, _declaringClass: ObjClass | null): Promise<Obj> {
    return this;
  }

  /** True when the write was handled (accessor setter). */
  async assignAsMember(_scope: Scope, _receiver: Obj, _value: Obj, _declaringClass: ObjClass | null): Promise<boolean> {
    return false;
  }

  // ─────────────────────────────────────────────────────────────────
  // Members
  // ─────────────────────────────────────────────────────────────────

  protected lookupMember(scope: Scope, name: string): ObjRecord | null {
    return scope.services.dispatchCache.lookup(this.objClass, name);
  }

  protected checkAccess(scope: Scope, record: ObjRecord, name: string): void {
    if (!canAccessMember(record.visibility, record.declaringClass, scope.currentClassCtx)) {
      scope.raiseIllegalAccess(
        `can't access ${record.visibility} member ${name} of ${this.objClass.className}`
      );
    }
  }

  async readField(scope: Scope, name: string): Promise<Obj> {
    const record = this.lookupMember(scope, name);
    if (!record) return scope.raiseSymbolNotFound(`no such field: ${name} in ${this.objClass.className}`);
    this.checkAccess(scope, record, name);
    return record.value.resolveAsMember(scope, this, record.declaringClass);
  }

  async writeField(scope: Scope, name: string, value: Obj): Promise<void> {
    const record = this.lookupMember(scope, name);
    if (!record) {
      scope.raiseSymbolNotFound(`no such field: ${name} in ${this.objClass.className}`);
    }
    this.checkAccess(scope, record, name);
    if (await record.value.assignAsMember(scope, this, value, record.declaringClass)) return;
    if (!record.isMutable) scope.raiseIllegalAssignment(`can't reassign val ${name}`);
    record.value = value.byValueCopy();
  }

  async invokeInstanceMethod(
    scope: Scope,
    name: string,
    args: Arguments = Arguments.EMPTY,
    onNotFound?: () => Obj | Promise<Obj>
  ): Promise<Obj> {
    const record = this.lookupMember(scope, name);
    if (!record) {
      if (onNotFound) return onNotFound();
      return scope.raiseSymbolNotFound(this.noSuchMember(name));
    }
    this.checkAccess(scope, record, name);
    return record.value.invoke(scope, this, args, record.declaringClass);
  }

  protected noSuchMember(name: string): string {
    return `no such member: ${name} in ${this.objClass.className} (lookup order: ${this.objClass.renderLinearization(true)})`;
  }

  // ─────────────────────────────────────────────────────────────────
  // Conversion and serialization
  // ─────────────────────────────────────────────────────────────────

  /**
   * Script-level string conversion: runs the `toString` member, which the
   * root type implements with {@link defaultToString}.
   */
  async asString(scope: Scope): Promise<string> {
    const result = await this.invokeInstanceMethod(scope, "toString");
    return result.asPlainString() ?? result.defaultToString(scope);
  }

  async defaultToString(_scope: Scope): Promise<string> {
    return this.objClass.className;
  }

  /**
   * Write this value's payload. The encoder has already written the class
   * name that selects the decoder.
   */
  async serialize(scope: Scope, _encoder: Encoder): Promise<void> {
    scope.raiseNotImplemented(`${this.objClass.className} is not serializable`);
  }

  toString(): string {
    return this.objClass.className;
  }
}
