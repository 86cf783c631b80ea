// src/core/iter/index.ts
export {
  ObjIterator,
  ObjListIterator,
  iteratorType,
  iterableType,
  enumerate,
  enumerateIterator,
  collectIterator,
  toList,
} from "./iterator";
