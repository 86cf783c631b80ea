// src/core/errors/index.ts
export { ScriptError, ExecutionError, isExecutionError } from "./scriptError";
export { FlowNoLongerCollected, IterationFinished, isControlSignal } from "./signals";
export { ObjException, ObjStackTraceEntry, ExceptionClass, captureStackTrace } from "./exception";
export {
  ROOT_EXCEPTION,
  EXCEPTION_CATALOGUE,
  EXCEPTION_ALIASES,
  type CatalogueName,
  getRootExceptionClass,
  getOrCreateExceptionClass,
  getErrorClass,
  findExceptionClass,
  registeredExceptionNames,
  resetExceptionRegistry,
  isScriptException,
} from "./registry";
export {
  getExceptionMessage,
  getExceptionStackTrace,
  getExceptionExtraData,
  describeException,
  formatException,
  formatExceptionWithStackTrace,
} from "./format";
