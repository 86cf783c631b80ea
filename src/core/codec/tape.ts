// src/core/codec/tape.ts
// In-memory codec: values become a flat list of cells

import { CodecError, type Decoder, type Encoder } from "./codec";
import { findExceptionClass } from "../errors/registry";
import type { Obj } from "../obj/obj";
import type { Scope } from "../scope/scope";

export type TapeCell =
  | { tag: "int"; value: number }
  | { tag: "str"; value: string }
  /** Header of an encoded value; its class's payload follows. */
  | { tag: "obj"; className: string }
  /** A value already written, by completion order. */
  | { tag: "ref"; index: number }
  | { tag: "list"; size: number };

/**
 * Values are numbered when their encoding completes. Writing the same
 * value again emits a `ref`; a value reached again while it is still
 * being written is a cycle and fails.
 */
export class TapeEncoder implements Encoder {
  readonly cells: TapeCell[] = [];
  private readonly written = new Map<Obj, number>();
  private readonly inProgress = new Set<Obj>();

  encodeInt(value: number): void {
    if (!Number.isSafeInteger(value)) throw new CodecError(`not an integer: ${value}`);
    this.cells.push({ tag: "int", value });
  }

  encodeString(value: string): void {
    this.cells.push({ tag: "str", value });
  }

  async encodeAny(scope: Scope, value: Obj): Promise<void> {
    const index = this.written.get(value);
    if (index !== undefined) {
      this.cells.push({ tag: "ref", index });
      return;
    }
    if (this.inProgress.has(value)) {
      throw new CodecError(`cyclic reference to a ${value.objClass.className} value`);
    }
    this.inProgress.add(value);
    this.cells.push({ tag: "obj", className: value.objClass.className });
    await value.serialize(scope, this);
    this.inProgress.delete(value);
    this.written.set(value, this.written.size);
  }

  async encodeAnyList(scope: Scope, values: readonly Obj[]): Promise<void> {
    this.cells.push({ tag: "list", size: values.length });
    for (const value of values) await this.encodeAny(scope, value);
  }
}

export class TapeDecoder implements Decoder {
  private position = 0;
  private readonly decoded: Obj[] = [];

  constructor(private readonly cells: readonly TapeCell[]) {}

  get isExhausted(): boolean {
    return this.position >= this.cells.length;
  }

  private take(): TapeCell {
    const cell = this.cells[this.position];
    if (!cell) throw new CodecError(`unexpected end of tape at ${this.position}`);
    this.position++;
    return cell;
  }

  private mismatch(expected: string, cell: TapeCell): CodecError {
    return new CodecError(`expected ${expected} cell at ${this.position - 1}, found ${cell.tag}`);
  }

  decodeInt(): number {
    const cell = this.take();
    if (cell.tag !== "int") throw this.mismatch("int", cell);
    return cell.value;
  }

  decodeString(): string {
    const cell = this.take();
    if (cell.tag !== "str") throw this.mismatch("str", cell);
    return cell.value;
  }

  async decodeAny(scope: Scope): Promise<Obj> {
    const cell = this.take();
    if (cell.tag === "ref") {
      const value = this.decoded[cell.index];
      if (!value) throw new CodecError(`dangling reference #${cell.index}`);
      return value;
    }
    if (cell.tag !== "obj") throw this.mismatch("obj", cell);
    const cls = scope.resolveClass(cell.className) ?? findExceptionClass(cell.className);
    if (!cls) return scope.raiseSymbolNotFound(`unknown class ${cell.className} in serialized data`);
    const value = await cls.deserialize(scope, this);
    this.decoded.push(value);
    return value;
  }

  async decodeAnyList(scope: Scope): Promise<Obj[]> {
    const cell = this.take();
    if (cell.tag !== "list") throw this.mismatch("list", cell);
    const values: Obj[] = [];
    for (let i = 0; i < cell.size; i++) values.push(await this.decodeAny(scope));
    return values;
  }
}

/** Encode one value onto a fresh tape. */
export async function encodeToTape(scope: Scope, value: Obj): Promise<TapeCell[]> {
  const encoder = new TapeEncoder();
  await encoder.encodeAny(scope, value);
  return encoder.cells;
}

/** Decode a tape holding exactly one value. */
export async function decodeFromTape(scope: Scope, cells: readonly TapeCell[]): Promise<Obj> {
  const decoder = new TapeDecoder(cells);
  const value = await decoder.decodeAny(scope);
  if (!decoder.isExhausted) throw new CodecError("trailing cells after the decoded value");
  return value;
}
