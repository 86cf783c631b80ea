// src/core/obj/instance.ts
// Instances of script classes and qualified views onto them

import { Obj, INCOMPARABLE } from "./obj";
import { ObjRecord, canAccessMember, type RecordType, type Visibility } from "./record";
import { Arguments } from "../scope/arguments";
import type { ObjClass } from "./class";
import type { Scope } from "../scope/scope";
import type { Encoder } from "../codec/codec";

export type InstanceFieldOptions = {
  isMutable?: boolean;
  visibility?: Visibility;
  type?: RecordType;
  isTransient?: boolean;
};

const QUALIFIER = "::";

export function qualifiedName(cls: ObjClass, name: string): string {
  return `${cls.className}${QUALIFIER}${name}`;
}

/**
 * A class-bound value. Its environment is one flat map: inherited members
 * under their plain names, constructor parameters and fields under both
 * their plain name and `ClassName::name`.
 */
export class ObjInstance extends Obj {
  readonly instanceScope: Scope;
  /** True while initializers run for a value being read back from a codec. */
  isDeserializing = false;

  constructor(
    readonly instanceClass: ObjClass,
    makeScope: (self: ObjInstance) => Scope
  ) {
    super();
    this.instanceScope = makeScope(this);
  }

  get objClass(): ObjClass {
    return this.instanceClass;
  }

  lookupOwnRecord(name: string): ObjRecord | null {
    return this.instanceScope.getLocalRecord(name);
  }

  declareField(cls: ObjClass, name: string, value: Obj, options: InstanceFieldOptions = {}): ObjRecord {
    const record = new ObjRecord(value.byValueCopy(), {
      isMutable: options.isMutable ?? false,
      visibility: options.visibility ?? "public",
      declaringClass: cls,
      type: options.type ?? "Field",
      isTransient: options.isTransient ?? false,
    });
    this.instanceScope.bindRecord(name, record);
    this.instanceScope.bindRecord(qualifiedName(cls, name), record);
    return record;
  }

  /** Entries under plain names, in insertion order. */
  *plainRecords(): Generator<[string, ObjRecord]> {
    for (const entry of this.instanceScope.localEntries()) {
      if (!entry[0].includes(QUALIFIER)) yield entry;
    }
  }

  /**
   * Plain name first, then `Class::name` along the linearization. A record
   * that exists but is not visible to the caller raises an access error
   * when nothing visible is found.
   */
  private resolveRecord(scope: Scope, name: string): ObjRecord | null {
    const caller = scope.currentClassCtx;
    const plain = this.instanceScope.getLocalRecord(name);
    if (plain && canAccessMember(plain.visibility, plain.declaringClass, caller)) return plain;

    let denied = plain;
    for (const cls of this.instanceClass.mro) {
      const record = this.instanceScope.getLocalRecord(qualifiedName(cls, name));
      if (!record) continue;
      if (canAccessMember(record.visibility, record.declaringClass, caller)) return record;
      denied ??= record;
    }
    if (denied) {
      scope.raiseIllegalAccess(`can't access ${denied.visibility} member ${name} of ${this.instanceClass.className}`);
    }
    return null;
  }

  async readField(scope: Scope, name: string): Promise<Obj> {
    const record = this.resolveRecord(scope, name);
    if (!record) return super.readField(scope, name);
    return record.value.resolveAsMember(scope, this, record.declaringClass);
  }

  async writeField(scope: Scope, name: string, value: Obj): Promise<void> {
    const record = this.resolveRecord(scope, name);
    if (!record) return super.writeField(scope, name, value);
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
    const record = this.resolveRecord(scope, name);
    if (!record) return super.invokeInstanceMethod(scope, name, args, onNotFound);
    return record.value.invoke(scope, this, args, record.declaringClass);
  }

  /** View this instance as one of its ancestors. */
  qualifiedAs(scope: Scope, cls: ObjClass): ObjQualifiedView {
    if (!this.instanceClass.mro.includes(cls)) {
      scope.raiseClassCastError(`${this.instanceClass.className} is not a ${cls.className}`);
    }
    return new ObjQualifiedView(this, cls);
  }

  // ─────────────────────────────────────────────────────────────────
  // Comparison, strings, serialization
  // ─────────────────────────────────────────────────────────────────

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other === this) return 0;
    if (other.isNullish) return INCOMPARABLE;
    if (!(other instanceof ObjInstance) || other.instanceClass !== this.instanceClass) return -1;
    for (const [name, record] of this.plainRecords()) {
      if (!record.traits.comparable || record.isTransient) continue;
      const theirs = other.instanceScope.getLocalRecord(name);
      if (!theirs) return -1;
      const d = await record.value.compareTo(scope, theirs.value);
      if (d !== 0) return d;
    }
    return 0;
  }

  async defaultToString(scope: Scope): Promise<string> {
    const parts: string[] = [];
    for (const [name, record] of this.plainRecords()) {
      if (!record.traits.serializable || record.isTransient || record.visibility !== "public") continue;
      parts.push(`${name}=${await record.value.asString(scope)}`);
    }
    return `${this.instanceClass.className}(${parts.join(",")})`;
  }

  /** Mutable, non-transient fields restored after construction on deserialization. */
  serializingVars(): ObjRecord[] {
    const vars: ObjRecord[] = [];
    for (const [, record] of this.plainRecords()) {
      if (record.type === "Field" && record.isMutable && !record.isTransient) vars.push(record);
    }
    return vars;
  }

  /**
   * Persistent constructor arguments of every class in the linearization,
   * then mutable state, then whatever each class keeps beside it.
   */
  async serialize(scope: Scope, encoder: Encoder): Promise<void> {
    const values: Obj[] = [];
    for (const cls of this.instanceClass.mro) {
      for (const p of cls.constructorMeta?.persistentParams ?? []) {
        const record = this.instanceScope.getLocalRecord(qualifiedName(cls, p.name));
        if (!record) return scope.raiseIllegalState(`constructor parameter ${qualifiedName(cls, p.name)} is not bound`);
        values.push(record.value);
      }
    }
    await encoder.encodeAnyList(scope, values);
    await encoder.encodeAnyList(
      scope,
      this.serializingVars().map((r) => r.value)
    );
    for (const cls of this.instanceClass.mro) await cls.writeInstanceExtras(scope, this, encoder);
  }
}

/**
 * An instance seen from one of its ancestors: fields resolve through that
 * class's qualified names, methods from its position in the linearization.
 */
export class ObjQualifiedView extends Obj {
  constructor(
    readonly instance: ObjInstance,
    readonly startClass: ObjClass
  ) {
    super();
  }

  get objClass(): ObjClass {
    return this.startClass;
  }

  private resolveRecord(scope: Scope, name: string): ObjRecord | null {
    const record =
      this.instance.instanceScope.getLocalRecord(qualifiedName(this.startClass, name)) ??
      this.instance.instanceClass.getInstanceMemberFromAncestor(this.startClass, name);
    if (!record) return null;
    this.checkAccess(scope, record, name);
    return record;
  }

  async readField(scope: Scope, name: string): Promise<Obj> {
    const record = this.resolveRecord(scope, name);
    if (!record) return scope.raiseSymbolNotFound(`no such field: ${name} in ${this.startClass.className}`);
    return record.value.resolveAsMember(scope, this.instance, record.declaringClass);
  }

  async writeField(scope: Scope, name: string, value: Obj): Promise<void> {
    const record = this.resolveRecord(scope, name);
    if (!record) return scope.raiseSymbolNotFound(`no such field: ${name} in ${this.startClass.className}`);
    if (await record.value.assignAsMember(scope, this.instance, value, record.declaringClass)) return;
    if (!record.isMutable) scope.raiseIllegalAssignment(`can't reassign val ${name}`);
    record.value = value.byValueCopy();
  }

  async invokeInstanceMethod(
    scope: Scope,
    name: string,
    args: Arguments = Arguments.EMPTY,
    onNotFound?: () => Obj | Promise<Obj>
  ): Promise<Obj> {
    const record = this.instance.instanceClass.getInstanceMemberFromAncestor(this.startClass, name);
    if (!record) {
      if (onNotFound) return onNotFound();
      return scope.raiseSymbolNotFound(
        `no such member: ${name} in ${this.startClass.className} (lookup order: ${this.startClass.renderLinearization(true)})`
      );
    }
    this.checkAccess(scope, record, name);
    return record.value.invoke(scope, this.instance, args, record.declaringClass);
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    return this.instance.compareTo(scope, other instanceof ObjQualifiedView ? other.instance : other);
  }

  async defaultToString(scope: Scope): Promise<string> {
    return this.instance.defaultToString(scope);
  }
}
