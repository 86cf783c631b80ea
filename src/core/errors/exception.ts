// src/core/errors/exception.ts
// Script exceptions: values of named exception classes carrying a
// stack trace captured once, when the exception is built.

import { Obj } from "../obj/obj";
import { ObjClass, type ClassOptions } from "../obj/class";
import { ArgsDeclaration } from "../obj/argsDecl";
import { ObjInt, ObjList, ObjNull, ObjString } from "../obj/primitives";
import { statement } from "../scope/statement";
import { Source, type Pos } from "../pos/source";
import type { Scope } from "../scope/scope";
import type { Encoder, Decoder } from "../codec/codec";

// ─────────────────────────────────────────────────────────────────
// Stack trace entries
// ─────────────────────────────────────────────────────────────────

/**
 * One frame of a stack trace. Holds copies of the position data, never
 * the scope it came from.
 */
export class ObjStackTraceEntry extends Obj {
  constructor(
    readonly sourceName: string,
    readonly line: number,
    readonly column: number,
    readonly sourceString: string
  ) {
    super();
  }

  static fromPos(pos: Pos): ObjStackTraceEntry {
    return new ObjStackTraceEntry(pos.source.fileName, pos.line, pos.column, pos.currentLine);
  }

  get objClass(): ObjClass {
    return ObjStackTraceEntry.type;
  }

  /** `file:line:column`, 1-based. */
  get at(): string {
    return `${this.sourceName}:${this.line + 1}:${this.column + 1}`;
  }

  render(): string {
    return `${this.at}: ${this.sourceString.trim()}`;
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (!(other instanceof ObjStackTraceEntry)) return super.compareTo(scope, other);
    if (this.sourceName !== other.sourceName) return this.sourceName < other.sourceName ? -1 : 1;
    if (this.line !== other.line) return Math.sign(this.line - other.line);
    if (this.column !== other.column) return Math.sign(this.column - other.column);
    if (this.sourceString !== other.sourceString) return this.sourceString < other.sourceString ? -1 : 1;
    return 0;
  }

  async defaultToString(): Promise<string> {
    return this.render();
  }

  async serialize(_scope: Scope, encoder: Encoder): Promise<void> {
    encoder.encodeString(this.sourceName);
    encoder.encodeInt(this.line);
    encoder.encodeInt(this.column);
    encoder.encodeString(this.sourceString);
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjStackTraceEntry._type) {
      const type = new ObjClass("StackTraceEntry", [], {
        deserialize: async (_scope: Scope, decoder: Decoder) =>
          new ObjStackTraceEntry(decoder.decodeString(), decoder.decodeInt(), decoder.decodeInt(), decoder.decodeString()),
      });
      type.addProperty("sourceName", async (s) => new ObjString(s.thisAs(ObjStackTraceEntry).sourceName));
      type.addProperty("line", async (s) => new ObjInt(s.thisAs(ObjStackTraceEntry).line + 1));
      type.addProperty("column", async (s) => new ObjInt(s.thisAs(ObjStackTraceEntry).column + 1));
      type.addProperty("sourceString", async (s) => new ObjString(s.thisAs(ObjStackTraceEntry).sourceString));
      type.addProperty("at", async (s) => new ObjString(s.thisAs(ObjStackTraceEntry).at));
      ObjStackTraceEntry._type = type;
    }
    return ObjStackTraceEntry._type;
  }
}

/**
 * Walk the scope chain outward from `scope`, one entry per change of
 * (source, line). Scopes positioned in built-in code are skipped.
 */
export function captureStackTrace(scope: Scope, maxDepth: number): ObjList {
  const entries: Obj[] = [];
  let last: Pos | null = null;
  let current: Scope | null = scope;
  let depth = 0;
  while (current && depth < maxDepth) {
    const pos = current.pos;
    if (pos !== last && pos.source !== Source.builtIn) {
      if (!last || !last.sameLine(pos)) entries.push(ObjStackTraceEntry.fromPos(pos));
      last = pos;
    }
    current = current.parent;
    depth++;
  }
  return new ObjList(entries);
}

// ─────────────────────────────────────────────────────────────────
// Exception values
// ─────────────────────────────────────────────────────────────────

export class ObjException extends Obj {
  private readonly stackTrace: ObjList;

  /**
   * @param scope where the exception is raised; null only when
   *   `useStackTrace` supplies a trace (deserialization)
   */
  constructor(
    readonly exceptionClass: ExceptionClass,
    scope: Scope | null,
    readonly message: string,
    readonly extraData: Obj = ObjNull,
    useStackTrace: ObjList | null = null
  ) {
    super();
    this.stackTrace =
      useStackTrace ??
      (scope ? captureStackTrace(scope, scope.services.config.runtime.maxStackTraceDepth) : new ObjList([]));
  }

  get objClass(): ObjClass {
    return this.exceptionClass;
  }

  /** The trace captured at construction; the same list on every call. */
  getStackTrace(): ObjList {
    return this.stackTrace;
  }

  get firstEntry(): ObjStackTraceEntry | null {
    const first = this.stackTrace.items[0];
    return first instanceof ObjStackTraceEntry ? first : null;
  }

  /** `ClassName: message` */
  describe(): string {
    return `${this.exceptionClass.className}: ${this.message}`;
  }

  async defaultToString(): Promise<string> {
    return `${this.describe()} at ${this.firstEntry?.at ?? "(unknown)"}`;
  }

  toStringWithStackTrace(): string {
    const lines = [this.describe()];
    for (const entry of this.stackTrace.items) {
      if (entry instanceof ObjStackTraceEntry) lines.push(`\tat ${entry.render()}`);
    }
    return lines.join("\n");
  }

  async readField(scope: Scope, name: string): Promise<Obj> {
    switch (name) {
      case "message":
        return new ObjString(this.message);
      case "extraData":
        return this.extraData;
      case "stackTrace":
        return this.stackTrace;
      default:
        return super.readField(scope, name);
    }
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other === this) return 0;
    if (!(other instanceof ObjException)) return super.compareTo(scope, other);
    if (other.exceptionClass !== this.exceptionClass) return -1;
    if (this.message !== other.message) return this.message < other.message ? -1 : 1;
    const extra = await this.extraData.compareTo(scope, other.extraData);
    if (extra !== 0) return extra;
    return this.stackTrace.compareTo(scope, other.stackTrace);
  }

  async serialize(scope: Scope, encoder: Encoder): Promise<void> {
    encoder.encodeString(this.message);
    await encoder.encodeAny(scope, this.extraData);
    await encoder.encodeAnyList(scope, this.stackTrace.items);
  }
}

// ─────────────────────────────────────────────────────────────────
// Exception classes
// ─────────────────────────────────────────────────────────────────

/**
 * A named exception class. Calling it builds an {@link ObjException}
 * (first argument is the message, second the extra data); subclassing it
 * from script code goes through the ordinary instance protocol.
 */
export class ExceptionClass extends ObjClass {
  constructor(name: string, parents: readonly ObjClass[] = [], options: ClassOptions = {}) {
    super(name, parents, options);
    this.constructorMeta = new ArgsDeclaration([
      { name: "message", defaultValue: statement(async () => new ObjString(name)) },
    ]);
  }

  async callOn(scope: Scope): Promise<Obj> {
    const first = scope.args.at(0);
    const message = first ? await first.asString(scope) : this.className;
    return new ObjException(this, scope, message, scope.args.at(1) ?? ObjNull);
  }

  /** The trace is read back as written, never recaptured. */
  async deserialize(scope: Scope, decoder: Decoder): Promise<Obj> {
    const message = decoder.decodeString();
    const extraData = await decoder.decodeAny(scope);
    const trace = await decoder.decodeAnyList(scope);
    return new ObjException(this, null, message, extraData, new ObjList(trace));
  }
}
