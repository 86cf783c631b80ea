// src/core/obj/index.ts
export { Obj, INCOMPARABLE, type BinaryOperator } from "./obj";
export {
  ObjRecord,
  RECORD_TRAITS,
  canAccessMember,
  type RecordType,
  type RecordTraits,
  type RecordOptions,
  type Visibility,
} from "./record";
export { ObjClass, type ClassOptions, type MemberOptions, type FnOptions } from "./class";
export { ObjInstance, ObjQualifiedView, qualifiedName, type InstanceFieldOptions } from "./instance";
export { ArgsDeclaration, type ArgParam, type BoundArgument } from "./argsDecl";
export { ObjNativeFunction, type NativeFn } from "./callable";
export { ObjProperty } from "./property";
export { ObjNull, ObjVoid, ObjBool, ObjInt, ObjString, ObjList, nullType, voidType, toObj } from "./primitives";
export { c3Merge, c3Linearize } from "./linearize";
export { DispatchCache, type DispatchCacheStats } from "./dispatchCache";
