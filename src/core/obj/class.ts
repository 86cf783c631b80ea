// src/core/obj/class.ts
// Class descriptors: linearization, member tables, construction protocol

import { Obj } from "./obj";
import { ObjRecord, type RecordType, type Visibility } from "./record";
import { c3Linearize } from "./linearize";
import { ObjInstance } from "./instance";
import { ObjNull, ObjString, ObjVoid } from "./primitives";
import { ObjNativeFunction, type NativeFn } from "./callable";
import { ObjProperty } from "./property";
import { Arguments, evaluateArguments } from "../scope/arguments";
import { statement, type Statement } from "../scope/statement";
import { ScriptError } from "../errors/scriptError";
import { Pos } from "../pos/source";
import type { ArgsDeclaration } from "./argsDecl";
import type { Scope } from "../scope/scope";
import type { Decoder, Encoder } from "../codec/codec";
import type { EventHook } from "../log/events";

// ─────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────

export type ClassOptions = {
  /** Where the class is declared; definition errors report it */
  pos?: Pos;
  /** Receives classDefined and memberDeclared events */
  onEvent?: EventHook;
  /** Replaces the instance protocol when reading a serialized value of this class */
  deserialize?: (scope: Scope, decoder: Decoder) => Promise<Obj>;
};

export type MemberOptions = {
  /** Mutable members can be reassigned and redeclared by subclasses */
  isMutable?: boolean;
  visibility?: Visibility;
  type?: RecordType;
  isTransient?: boolean;
  pos?: Pos;
};

export type FnOptions = {
  /** Lets subclasses override the function */
  isOpen?: boolean;
  visibility?: Visibility;
  pos?: Pos;
};

let nextClassId = 1;

// ─────────────────────────────────────────────────────────────────
// ObjClass
// ─────────────────────────────────────────────────────────────────

export class ObjClass extends Obj {
  readonly classId: number;
  readonly className: string;
  readonly directParents: readonly ObjClass[];
  /** Linearized ancestor order, starting with this class. Fixed at creation. */
  readonly mro: readonly ObjClass[];
  readonly pos: Pos;

  /** Instance members, in declaration order. */
  readonly members = new Map<string, ObjRecord>();
  /** Static members, shared by the class and all its subclasses. */
  readonly classScope = new Map<string, ObjRecord>();

  constructorMeta: ArgsDeclaration | null = null;
  instanceConstructor: Statement | null = null;
  readonly instanceInitializers: Statement[] = [];

  private readonly parentArgs = new Map<ObjClass, readonly Statement[]>();
  private readonly directSubclasses = new Set<ObjClass>();
  private readonly onEvent: EventHook | undefined;
  private readonly deserializer: ClassOptions["deserialize"];
  private version = 0;

  constructor(className: string, parents: readonly ObjClass[] = [], options: ClassOptions = {}) {
    super();
    this.classId = nextClassId++;
    this.className = className;
    this.directParents = [...parents];
    this.pos = options.pos ?? Pos.builtIn;
    this.onEvent = options.onEvent;
    this.deserializer = options.deserialize;

    const order = c3Linearize<ObjClass>(this, this.directParents, (p) => p.mro);
    if (!order) {
      throw new ScriptError(
        this.pos,
        `can't build class ${className}: inconsistent hierarchy, no linearization of ${parents.map((p) => p.className).join(", ")}`
      );
    }
    this.mro = order;

    for (const parent of this.directParents) parent.directSubclasses.add(this);

    this.onEvent?.({
      tag: "classDefined",
      className,
      classId: this.classId,
      parents: this.directParents.map((p) => p.className),
      timestamp: Date.now(),
    });
  }

  get objClass(): ObjClass {
    return ObjClass.metaclass;
  }

  /** Ancestors without this class. */
  get mroParents(): readonly ObjClass[] {
    return this.mro.slice(1);
  }

  /** Bumped on every member declaration here or in an ancestor. */
  get layoutVersion(): number {
    return this.version;
  }

  get isRootType(): boolean {
    return this === ObjClass.rootClass;
  }

  private bumpLayoutVersion(): void {
    this.version++;
    for (const sub of this.directSubclasses) sub.bumpLayoutVersion();
  }

  // ─────────────────────────────────────────────────────────────────
  // Declaring members
  // ─────────────────────────────────────────────────────────────────

  /**
   * Declare an instance member. Fails when this class or an ancestor
   * already has an immutable member of that name.
   */
  createField(name: string, value: Obj, options: MemberOptions = {}): ObjRecord {
    const existing = this.members.get(name) ?? this.findInAncestors(name);
    if (existing && !existing.isMutable) {
      const owner = existing.declaringClass?.className ?? this.className;
      throw new ScriptError(
        options.pos ?? this.pos,
        `${name} is already defined in ${owner} and can't be redeclared in ${this.className}`
      );
    }
    const record = new ObjRecord(value, {
      isMutable: options.isMutable ?? false,
      visibility: options.visibility ?? "public",
      declaringClass: this,
      type: options.type ?? "Field",
      isTransient: options.isTransient ?? false,
    });
    this.members.set(name, record);
    this.memberDeclared(name, false);
    return record;
  }

  /** Declare a static member. Any existing static of that name is an error. */
  createClassField(name: string, value: Obj, options: MemberOptions = {}): ObjRecord {
    if (this.classScope.has(name)) {
      throw new ScriptError(options.pos ?? this.pos, `static member ${name} is already defined in ${this.className}`);
    }
    const record = new ObjRecord(value, {
      isMutable: options.isMutable ?? false,
      visibility: options.visibility ?? "public",
      declaringClass: this,
      type: options.type ?? "Field",
      isTransient: options.isTransient ?? false,
    });
    this.classScope.set(name, record);
    this.memberDeclared(name, true);
    return record;
  }

  private memberDeclared(name: string, isStatic: boolean): void {
    this.bumpLayoutVersion();
    this.onEvent?.({
      tag: "memberDeclared",
      className: this.className,
      name,
      isStatic,
      layoutVersion: this.version,
      timestamp: Date.now(),
    });
  }

  private findInAncestors(name: string): ObjRecord | undefined {
    for (const cls of this.mroParents) {
      const record = cls.members.get(name);
      if (record) return record;
    }
    return undefined;
  }

  addFn(name: string, fn: NativeFn, options: FnOptions = {}): ObjRecord {
    return this.createField(name, new ObjNativeFunction(name, fn), {
      isMutable: options.isOpen ?? false,
      visibility: options.visibility,
      type: "Fun",
      pos: options.pos,
    });
  }

  addClassFn(name: string, fn: NativeFn, options: FnOptions = {}): ObjRecord {
    return this.createClassField(name, new ObjNativeFunction(name, fn), {
      visibility: options.visibility,
      type: "Fun",
      pos: options.pos,
    });
  }

  addProperty(name: string, getter: NativeFn, setter: NativeFn | null = null, options: FnOptions = {}): ObjRecord {
    return this.createField(name, new ObjProperty(name, getter, setter), {
      isMutable: options.isOpen ?? false,
      visibility: options.visibility,
      type: "Other",
      pos: options.pos,
    });
  }

  addConst(name: string, value: Obj, visibility: Visibility = "public"): ObjRecord {
    return this.createField(name, value, { visibility, type: "Other" });
  }

  /**
   * Add an initializer declaring an instance field, stored under its plain
   * name and as `ClassName::name`.
   */
  addInstanceField(
    name: string,
    init: (scope: Scope) => Promise<Obj>,
    options: MemberOptions = {}
  ): void {
    this.instanceInitializers.push(
      statement(async (scope) => {
        const instance = scope.thisObj;
        if (!(instance instanceof ObjInstance)) {
          return scope.raiseIllegalState(`field ${name} of ${this.className} initialized outside an instance`);
        }
        instance.declareField(this, name, await init(scope), options);
        return ObjVoid;
      }, options.pos ?? this.pos)
    );
  }

  /** Argument expressions for a direct parent's constructor. */
  setParentArguments(parent: ObjClass, exprs: readonly Statement[]): void {
    if (!this.directParents.includes(parent)) {
      throw new ScriptError(this.pos, `${parent.className} is not a direct parent of ${this.className}`);
    }
    this.parentArgs.set(parent, exprs);
  }

  // ─────────────────────────────────────────────────────────────────
  // Lookup
  // ─────────────────────────────────────────────────────────────────

  /**
   * Walk the linearization checking each class's members, then its statics;
   * fall back to the root type.
   */
  getInstanceMemberOrNull(name: string): ObjRecord | null {
    for (const cls of this.mro) {
      const record = cls.members.get(name) ?? cls.classScope.get(name);
      if (record) return record;
    }
    const root = ObjClass.rootType;
    return root === this ? null : (root.members.get(name) ?? null);
  }

  getInstanceMember(name: string): ObjRecord {
    const record = this.getInstanceMemberOrNull(name);
    if (!record) {
      throw new ScriptError(this.pos, `no such member: ${name} (lookup order: ${this.renderLinearization(true)})`);
    }
    return record;
  }

  findDeclaringClassOf(name: string): ObjClass | null {
    for (const cls of this.mro) {
      if (cls.members.has(name) || cls.classScope.has(name)) return cls;
    }
    return ObjClass.rootType.members.has(name) ? ObjClass.rootType : null;
  }

  /** Lookup starting at `ancestor`'s position in this class's linearization. */
  getInstanceMemberFromAncestor(ancestor: ObjClass, name: string): ObjRecord | null {
    const start = this.mro.indexOf(ancestor);
    if (start < 0) return null;
    for (const cls of this.mro.slice(start)) {
      const record = cls.members.get(name) ?? cls.classScope.get(name);
      if (record) return record;
    }
    return null;
  }

  renderLinearization(includeSelf = true): string {
    return (includeSelf ? this.mro : this.mroParents).map((c) => c.className).join(", ");
  }

  // ─────────────────────────────────────────────────────────────────
  // Construction
  // ─────────────────────────────────────────────────────────────────

  async callOn(scope: Scope): Promise<Obj> {
    return this.createInstance(scope, scope.args, true);
  }

  /**
   * Build an instance: seed its environment with inherited members, then
   * initialize every class of the hierarchy exactly once.
   */
  async createInstance(
    scope: Scope,
    args: Arguments,
    runConstructors: boolean,
    restoredArgs: ReadonlyMap<ObjClass, Arguments> | null = null
  ): Promise<ObjInstance> {
    const instance = new ObjInstance(this, (self) =>
      scope.createChildScope({ thisObj: self, args, currentClassCtx: this })
    );
    this.seedInstance(instance);
    instance.isDeserializing = restoredArgs !== null;
    try {
      await this.initClass(instance, args, new Set(), runConstructors, restoredArgs);
    } finally {
      instance.isDeserializing = false;
    }
    scope.services.onEvent?.({ tag: "instanceCreated", className: this.className, timestamp: Date.now() });
    return instance;
  }

  private seedInstance(instance: ObjInstance): void {
    const env = instance.instanceScope;
    for (const cls of this.mro) {
      for (const [name, record] of cls.members) {
        if (env.hasLocal(name)) continue;
        const isField = record.type === "Field" || record.type === "ConstructorField";
        env.bindRecord(name, isField && record.isMutable ? record.copy() : record);
      }
    }
    for (const cls of this.mro) {
      for (const [name, record] of cls.classScope) {
        if (!env.hasLocal(name)) env.bindRecord(name, record);
      }
    }
  }

  private async initClass(
    instance: ObjInstance,
    args: Arguments,
    visited: Set<ObjClass>,
    runConstructors: boolean,
    restoredArgs: ReadonlyMap<ObjClass, Arguments> | null
  ): Promise<void> {
    if (visited.has(this)) return;
    visited.add(this);

    const env = instance.instanceScope;
    const body = env.createChildScope({ thisObj: instance, currentClassCtx: this, pos: this.pos });
    const bound = this.constructorMeta ? await this.constructorMeta.resolveRecords(body, args, this) : [];
    const bind = (): void => {
      for (const [name, record] of bound) {
        env.bindRecord(name, record);
        env.bindRecord(`${this.className}::${name}`, record);
      }
    };

    bind();
    for (const parent of this.directParents) {
      await parent.initClass(
        instance,
        await this.argumentsForParent(body, parent, args, restoredArgs),
        visited,
        runConstructors,
        restoredArgs
      );
    }
    bind();

    for (const init of this.instanceInitializers) await init.execute(body);
    if (runConstructors && this.instanceConstructor) await this.instanceConstructor.execute(body);
  }

  /**
   * Restored arguments when deserializing, otherwise the parent's argument
   * expressions or, without them, the part of this class's arguments the
   * parent declares.
   */
  private async argumentsForParent(
    body: Scope,
    parent: ObjClass,
    args: Arguments,
    restoredArgs: ReadonlyMap<ObjClass, Arguments> | null
  ): Promise<Arguments> {
    if (restoredArgs) return restoredArgs.get(parent) ?? Arguments.EMPTY;
    const exprs = this.parentArgs.get(parent);
    return exprs ? evaluateArguments(body, exprs) : ObjClass.argumentsFor(parent, args);
  }

  /** The part of a child's arguments a parent without explicit arguments receives. */
  private static argumentsFor(parent: ObjClass, args: Arguments): Arguments {
    const meta = parent.constructorMeta;
    if (!meta) return Arguments.EMPTY;
    return args.slice(meta.positionalLimit, (name) => meta.hasParam(name));
  }

  // ─────────────────────────────────────────────────────────────────
  // Deserialization
  // ─────────────────────────────────────────────────────────────────

  /**
   * Read a value of this class written by `serialize`. Instances get the
   * persistent constructor arguments of every class in the linearization,
   * are initialized without running constructor bodies, then have their
   * state restored.
   */
  async deserialize(scope: Scope, decoder: Decoder): Promise<Obj> {
    if (this.deserializer) return this.deserializer(scope, decoder);

    const values = await decoder.decodeAnyList(scope);
    const expected = this.mro.reduce((n, cls) => n + (cls.constructorMeta?.persistentParams.length ?? 0), 0);
    if (values.length !== expected) {
      scope.raiseIllegalArgument(
        `${this.className}: expected ${expected} serialized constructor arguments, got ${values.length}`
      );
    }

    const restored = new Map<ObjClass, Arguments>();
    let next = 0;
    for (const cls of this.mro) {
      const meta = cls.constructorMeta;
      if (!meta) continue;
      const named = new Map<string, Obj>();
      for (const p of meta.params) {
        if (!p.isTransient) named.set(p.name, values[next++]);
        else if (!p.defaultValue) named.set(p.name, ObjNull);
      }
      restored.set(cls, new Arguments([], named));
    }

    const instance = await this.createInstance(scope, restored.get(this) ?? Arguments.EMPTY, false, restored);

    const state = await decoder.decodeAnyList(scope);
    const targets = instance.serializingVars();
    if (state.length > targets.length) {
      scope.raiseIllegalArgument(
        `${this.className}: serialized state has ${state.length} fields, instance has ${targets.length}`
      );
    }
    state.forEach((value, i) => {
      targets[i].value = value;
    });
    for (const cls of this.mro) await cls.readInstanceExtras(scope, instance, decoder);

    await instance.invokeInstanceMethod(scope, "onDeserialized", Arguments.EMPTY, () => ObjVoid);
    return instance;
  }

  /**
   * Extra per-class data written after an instance's state. Classes that
   * keep hidden slots on their instances override both sides.
   */
  async writeInstanceExtras(_scope: Scope, _instance: ObjInstance, _encoder: Encoder): Promise<void> {}

  async readInstanceExtras(_scope: Scope, _instance: ObjInstance, _decoder: Decoder): Promise<void> {}

  // ─────────────────────────────────────────────────────────────────
  // The class as a value
  // ─────────────────────────────────────────────────────────────────

  async readField(scope: Scope, name: string): Promise<Obj> {
    const record = this.classScope.get(name) ?? this.findStatic(name);
    if (record) {
      this.checkAccess(scope, record, name);
      return record.value.resolveAsMember(scope, this, record.declaringClass);
    }
    if (name === "className") return new ObjString(this.className);
    return super.readField(scope, name);
  }

  async writeField(scope: Scope, name: string, value: Obj): Promise<void> {
    const record = this.classScope.get(name) ?? this.findStatic(name);
    if (!record) return super.writeField(scope, name, value);
    this.checkAccess(scope, record, name);
    if (!record.isMutable) scope.raiseIllegalAssignment(`can't reassign val ${name}`);
    record.value = value.byValueCopy();
  }

  async invokeInstanceMethod(
    scope: Scope,
    name: string,
    args: Arguments = Arguments.EMPTY,
    onNotFound?: () => Obj | Promise<Obj>
  ): Promise<Obj> {
    const record = this.classScope.get(name) ?? this.findStatic(name);
    if (!record) return super.invokeInstanceMethod(scope, name, args, onNotFound);
    this.checkAccess(scope, record, name);
    return record.value.invoke(scope, this, args, record.declaringClass);
  }

  private findStatic(name: string): ObjRecord | undefined {
    for (const cls of this.mroParents) {
      const record = cls.classScope.get(name);
      if (record) return record;
    }
    return undefined;
  }

  async defaultToString(): Promise<string> {
    return this.className;
  }

  toString(): string {
    return this.className;
  }

  // ─────────────────────────────────────────────────────────────────
  // Root type and metaclass
  // ─────────────────────────────────────────────────────────────────

  private static rootClass: ObjClass | undefined;
  private static metaClass: ObjClass | undefined;

  /** Members every value has, consulted after the linearization. */
  static get rootType(): ObjClass {
    if (!ObjClass.rootClass) {
      const root = new ObjClass("Obj");
      ObjClass.rootClass = root;
      root.addFn("toString", async (s) => new ObjString(await s.thisObj.defaultToString(s)), { isOpen: true });
    }
    return ObjClass.rootClass;
  }

  static get metaclass(): ObjClass {
    return (ObjClass.metaClass ??= new ObjClass("Class"));
  }
}
