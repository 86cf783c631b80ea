// src/core/obj/record.ts
// Member records: named, access-controlled storage cells

import type { Obj } from "./obj";
import type { ObjClass } from "./class";

// ─────────────────────────────────────────────────────────────────
// Classification and visibility
// ─────────────────────────────────────────────────────────────────

export type RecordType = "Field" | "ConstructorField" | "Fun" | "Class" | "Enum" | "Other";

export type RecordTraits = {
  /** Takes part in structural comparison of instances */
  comparable: boolean;
  /** Written by default serialization */
  serializable: boolean;
};

export const RECORD_TRAITS: Readonly<Record<RecordType, RecordTraits>> = {
  Field: { comparable: true, serializable: true },
  ConstructorField: { comparable: true, serializable: true },
  Fun: { comparable: false, serializable: false },
  Class: { comparable: false, serializable: false },
  Enum: { comparable: false, serializable: false },
  Other: { comparable: false, serializable: false },
};

export type Visibility = "public" | "protected" | "private";

/**
 * Whether code running in `callerClass` may touch a member declared in
 * `declaringClass` with the given visibility. A null caller is top-level code.
 */
export function canAccessMember(
  visibility: Visibility,
  declaringClass: ObjClass | null,
  callerClass: ObjClass | null
): boolean {
  switch (visibility) {
    case "public":
      return true;
    case "private":
      return declaringClass !== null && callerClass === declaringClass;
    case "protected":
      if (declaringClass === null || callerClass === null) return false;
      return callerClass === declaringClass || callerClass.mro.includes(declaringClass);
  }
}

// ─────────────────────────────────────────────────────────────────
// ObjRecord
// ─────────────────────────────────────────────────────────────────

export type RecordOptions = {
  isMutable?: boolean;
  visibility?: Visibility;
  declaringClass?: ObjClass | null;
  type?: RecordType;
  isTransient?: boolean;
};

export class ObjRecord {
  value: Obj;
  readonly isMutable: boolean;
  readonly visibility: Visibility;
  readonly declaringClass: ObjClass | null;
  readonly type: RecordType;
  readonly isTransient: boolean;

  constructor(value: Obj, options: RecordOptions = {}) {
    this.value = value;
    this.isMutable = options.isMutable ?? false;
    this.visibility = options.visibility ?? "public";
    this.declaringClass = options.declaringClass ?? null;
    this.type = options.type ?? "Other";
    this.isTransient = options.isTransient ?? false;
  }

  get traits(): RecordTraits {
    return RECORD_TRAITS[this.type];
  }

  /** A fresh record with the same flags holding a by-value copy. */
  copy(): ObjRecord {
    return new ObjRecord(this.value.byValueCopy(), this);
  }

  toString(): string {
    return `${this.isMutable ? "var" : "val"} ${this.visibility} ${this.type}`;
  }
}
