// src/core/obj/primitives.ts
// Built-in values used by the object protocol: null, void, Bool, Int, String, List

import { Obj, INCOMPARABLE, type BinaryOperator } from "./obj";
import { ObjClass } from "./class";
import { ObjListIterator, iterableType } from "../iter/iterator";
import type { Scope } from "../scope/scope";
import type { Encoder, Decoder } from "../codec/codec";

// ─────────────────────────────────────────────────────────────────
// null and void
// ─────────────────────────────────────────────────────────────────

class ObjNullValue extends Obj {
  get objClass(): ObjClass {
    return ObjNullValue.type;
  }

  get isNullish(): boolean {
    return true;
  }

  async compareTo(_scope: Scope, other: Obj): Promise<number> {
    return other === this ? 0 : INCOMPARABLE;
  }

  async defaultToString(): Promise<string> {
    return "null";
  }

  async serialize(): Promise<void> {}

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjNullValue._type ??= new ObjClass("Null", [], { deserialize: async () => ObjNull }));
  }
}

class ObjVoidValue extends Obj {
  get objClass(): ObjClass {
    return ObjVoidValue.type;
  }

  get isNullish(): boolean {
    return true;
  }

  async compareTo(_scope: Scope, other: Obj): Promise<number> {
    return other === this ? 0 : INCOMPARABLE;
  }

  async defaultToString(): Promise<string> {
    return "void";
  }

  async serialize(): Promise<void> {}

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjVoidValue._type ??= new ObjClass("Void", [], { deserialize: async () => ObjVoid }));
  }
}

export const ObjNull: Obj = new ObjNullValue();
export const ObjVoid: Obj = new ObjVoidValue();

export function nullType(): ObjClass {
  return ObjNullValue.type;
}

export function voidType(): ObjClass {
  return ObjVoidValue.type;
}

// ─────────────────────────────────────────────────────────────────
// Bool
// ─────────────────────────────────────────────────────────────────

export class ObjBool extends Obj {
  private constructor(readonly value: boolean) {
    super();
  }

  static readonly TRUE = new ObjBool(true);
  static readonly FALSE = new ObjBool(false);

  static of(value: boolean): ObjBool {
    return value ? ObjBool.TRUE : ObjBool.FALSE;
  }

  get objClass(): ObjClass {
    return ObjBool.type;
  }

  toBool(): boolean {
    return this.value;
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other instanceof ObjBool) return Number(this.value) - Number(other.value);
    return super.compareTo(scope, other);
  }

  async logicalNot(): Promise<Obj> {
    return ObjBool.of(!this.value);
  }

  async binaryOp(scope: Scope, op: BinaryOperator, other: Obj): Promise<Obj> {
    const rhs = other.toBool();
    if (rhs !== undefined) {
      if (op === "logicalAnd") return ObjBool.of(this.value && rhs);
      if (op === "logicalOr") return ObjBool.of(this.value || rhs);
    }
    return super.binaryOp(scope, op, other);
  }

  async defaultToString(): Promise<string> {
    return String(this.value);
  }

  async serialize(_scope: Scope, encoder: Encoder): Promise<void> {
    encoder.encodeInt(this.value ? 1 : 0);
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjBool._type ??= new ObjClass("Bool", [], {
      deserialize: async (_scope: Scope, decoder: Decoder) => ObjBool.of(decoder.decodeInt() !== 0),
    }));
  }
}

// ─────────────────────────────────────────────────────────────────
// Int (by value)
// ─────────────────────────────────────────────────────────────────

const MIN_INT = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_INT = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * An integer in the safe range of a JS number. Arithmetic runs on bigint;
 * bitwise operations and shifts see 64-bit two's complement values. A
 * result outside the safe range raises instead of losing precision.
 */
export class ObjInt extends Obj {
  constructor(public value: number) {
    super();
    if (!Number.isSafeInteger(value)) throw new RangeError(`not a safe integer: ${value}`);
  }

  get objClass(): ObjClass {
    return ObjInt.type;
  }

  byValueCopy(): Obj {
    return new ObjInt(this.value);
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other instanceof ObjInt) return Math.sign(this.value - other.value);
    return super.compareTo(scope, other);
  }

  private static checked(scope: Scope, result: bigint): ObjInt {
    if (result < MIN_INT || result > MAX_INT) {
      return scope.raiseIllegalArgument(`integer overflow: ${result} is out of Int range`);
    }
    return new ObjInt(Number(result));
  }

  async binaryOp(scope: Scope, op: BinaryOperator, other: Obj): Promise<Obj> {
    if (!(other instanceof ObjInt)) return super.binaryOp(scope, op, other);
    const a = BigInt(this.value);
    const b = BigInt(other.value);
    // shift counts wrap like 64-bit ones
    const shift = BigInt(other.value & 63);
    switch (op) {
      case "plus":
        return ObjInt.checked(scope, a + b);
      case "minus":
        return ObjInt.checked(scope, a - b);
      case "mul":
        return ObjInt.checked(scope, a * b);
      case "div":
        if (b === 0n) scope.raiseIllegalArgument("division by zero");
        return ObjInt.checked(scope, a / b);
      case "mod":
        if (b === 0n) scope.raiseIllegalArgument("division by zero");
        return ObjInt.checked(scope, a % b);
      case "bitAnd":
        return ObjInt.checked(scope, BigInt.asIntN(64, a & b));
      case "bitOr":
        return ObjInt.checked(scope, BigInt.asIntN(64, a | b));
      case "bitXor":
        return ObjInt.checked(scope, BigInt.asIntN(64, a ^ b));
      case "shl":
        return ObjInt.checked(scope, BigInt.asIntN(64, a << shift));
      case "shr":
        return ObjInt.checked(scope, a >> shift);
      default:
        return super.binaryOp(scope, op, other);
    }
  }

  async negate(): Promise<Obj> {
    return new ObjInt(0 - this.value);
  }

  async bitNot(): Promise<Obj> {
    return new ObjInt(-this.value - 1);
  }

  async defaultToString(): Promise<string> {
    return String(this.value);
  }

  async serialize(_scope: Scope, encoder: Encoder): Promise<void> {
    encoder.encodeInt(this.value);
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjInt._type ??= new ObjClass("Int", [], {
      deserialize: async (_scope: Scope, decoder: Decoder) => new ObjInt(decoder.decodeInt()),
    }));
  }
}

// ─────────────────────────────────────────────────────────────────
// String
// ─────────────────────────────────────────────────────────────────

export class ObjString extends Obj {
  constructor(readonly value: string) {
    super();
  }

  get objClass(): ObjClass {
    return ObjString.type;
  }

  asPlainString(): string {
    return this.value;
  }

  async asString(): Promise<string> {
    return this.value;
  }

  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (other instanceof ObjString) {
      if (this.value === other.value) return 0;
      return this.value < other.value ? -1 : 1;
    }
    return super.compareTo(scope, other);
  }

  async binaryOp(scope: Scope, op: BinaryOperator, other: Obj): Promise<Obj> {
    if (op === "plus") return new ObjString(this.value + (await other.asString(scope)));
    return super.binaryOp(scope, op, other);
  }

  async contains(scope: Scope, element: Obj): Promise<boolean> {
    return this.value.includes(await element.asString(scope));
  }

  async getAt(scope: Scope, index: Obj): Promise<Obj> {
    if (!(index instanceof ObjInt)) return scope.raiseIllegalArgument("string index must be an Int");
    const i = index.value;
    if (i < 0 || i >= this.value.length) {
      scope.raiseIndexOutOfBounds(`index ${i} is out of bounds 0..<${this.value.length}`);
    }
    return new ObjString(this.value.charAt(i));
  }

  async defaultToString(): Promise<string> {
    return this.value;
  }

  async serialize(_scope: Scope, encoder: Encoder): Promise<void> {
    encoder.encodeString(this.value);
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    return (ObjString._type ??= new ObjClass("String", [], {
      deserialize: async (_scope: Scope, decoder: Decoder) => new ObjString(decoder.decodeString()),
    }));
  }
}

// ─────────────────────────────────────────────────────────────────
// List
// ─────────────────────────────────────────────────────────────────

export class ObjList extends Obj {
  constructor(readonly items: Obj[] = []) {
    super();
  }

  get objClass(): ObjClass {
    return ObjList.type;
  }

  get size(): number {
    return this.items.length;
  }

  private index(scope: Scope, index: Obj): number {
    if (!(index instanceof ObjInt)) return scope.raiseIllegalArgument("list index must be an Int");
    const i = index.value;
    if (i < 0 || i >= this.items.length) {
      scope.raiseIndexOutOfBounds(`index ${i} is out of bounds 0..<${this.items.length}`);
    }
    return i;
  }

  async getAt(scope: Scope, index: Obj): Promise<Obj> {
    return this.items[this.index(scope, index)];
  }

  async putAt(scope: Scope, index: Obj, value: Obj): Promise<void> {
    this.items[this.index(scope, index)] = value.byValueCopy();
  }

  async contains(scope: Scope, element: Obj): Promise<boolean> {
    for (const item of this.items) {
      if (await item.equals(scope, element)) return true;
    }
    return false;
  }

  async binaryOp(scope: Scope, op: BinaryOperator, other: Obj): Promise<Obj> {
    if (op === "plus") {
      return new ObjList(other instanceof ObjList ? [...this.items, ...other.items] : [...this.items, other]);
    }
    return super.binaryOp(scope, op, other);
  }

  /** Element-wise, then by length. */
  async compareTo(scope: Scope, other: Obj): Promise<number> {
    if (!(other instanceof ObjList)) return super.compareTo(scope, other);
    const n = Math.min(this.items.length, other.items.length);
    for (let i = 0; i < n; i++) {
      const d = await this.items[i].compareTo(scope, other.items[i]);
      if (d !== 0) return d;
    }
    return Math.sign(this.items.length - other.items.length);
  }

  async defaultToString(scope: Scope): Promise<string> {
    const parts: string[] = [];
    for (const item of this.items) parts.push(await item.asString(scope));
    return `[${parts.join(",")}]`;
  }

  async serialize(scope: Scope, encoder: Encoder): Promise<void> {
    await encoder.encodeAnyList(scope, this.items);
  }

  private static _type: ObjClass | undefined;

  static get type(): ObjClass {
    if (!ObjList._type) {
      const type = new ObjClass("List", [iterableType()], {
        deserialize: async (scope: Scope, decoder: Decoder) => new ObjList(await decoder.decodeAnyList(scope)),
      });
      type.addFn("iterator", async (s) => new ObjListIterator(s.thisAs(ObjList).items));
      type.addFn("size", async (s) => new ObjInt(s.thisAs(ObjList).size));
      type.addFn("add", async (s) => {
        const list = s.thisAs(ObjList);
        for (const item of s.args.list) list.items.push(item.byValueCopy());
        return list;
      });
      ObjList._type = type;
    }
    return ObjList._type;
  }
}

export function toObj(value: boolean | number | string | null): Obj {
  if (value === null) return ObjNull;
  if (typeof value === "boolean") return ObjBool.of(value);
  if (typeof value === "number") return new ObjInt(value);
  return new ObjString(value);
}
