// src/core/codec/codec.ts
// Serialization boundary: what values may ask of an encoder or decoder

import type { Obj } from "../obj/obj";
import type { Scope } from "../scope/scope";

/**
 * Write side. Primitive cells are written synchronously; `encodeAny`
 * records the value's class name so the decoder can pick the class whose
 * `deserialize` reads it back.
 */
export interface Encoder {
  encodeInt(value: number): void;
  encodeString(value: string): void;
  encodeAny(scope: Scope, value: Obj): Promise<void>;
  encodeAnyList(scope: Scope, values: readonly Obj[]): Promise<void>;
}

export interface Decoder {
  decodeInt(): number;
  decodeString(): string;
  decodeAny(scope: Scope): Promise<Obj>;
  decodeAnyList(scope: Scope): Promise<Obj[]>;
}

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}
