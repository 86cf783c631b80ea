// src/core/errors/format.ts
// Reading and rendering script exceptions, whether built-in or script-defined

import { ObjException, ObjStackTraceEntry } from "./exception";
import { ROOT_EXCEPTION } from "./registry";
import { ObjInstance } from "../obj/instance";
import { ObjList, ObjNull, ObjString } from "../obj/primitives";
import type { Obj } from "../obj/obj";
import type { Scope } from "../scope/scope";

function messageRecordValue(obj: Obj): Obj | null {
  if (!(obj instanceof ObjInstance)) return null;
  return obj.instanceScope.getLocalRecord(`${ROOT_EXCEPTION}::message`)?.value ?? null;
}

export async function getExceptionMessage(scope: Scope, obj: Obj): Promise<string> {
  if (obj instanceof ObjException) return obj.message;
  const message = messageRecordValue(obj);
  return (message ?? obj).asString(scope);
}

/**
 * `ClassName: message` for code that cannot wait on a user `toString`.
 * A script-defined message that is not a string leaves just the class name.
 */
export function describeException(obj: Obj): string {
  if (obj instanceof ObjException) return obj.describe();
  const message = messageRecordValue(obj);
  return message instanceof ObjString ? `${obj.objClass.className}: ${message.value}` : obj.objClass.className;
}

export function getExceptionStackTrace(obj: Obj): ObjList {
  if (obj instanceof ObjException) return obj.getStackTrace();
  if (obj instanceof ObjInstance) {
    const trace = obj.instanceScope.getLocalRecord(`${ROOT_EXCEPTION}::stackTrace`)?.value;
    if (trace instanceof ObjList) return trace;
  }
  return new ObjList([]);
}

export function getExceptionExtraData(obj: Obj): Obj {
  return obj instanceof ObjException ? obj.extraData : ObjNull;
}

function firstFrame(trace: ObjList): ObjStackTraceEntry | null {
  const first = trace.items[0];
  return first instanceof ObjStackTraceEntry ? first : null;
}

/**
 * `ClassName: message at file:line:column`, or `at (unknown)` without a trace.
 */
export async function formatException(scope: Scope, obj: Obj): Promise<string> {
  const message = await getExceptionMessage(scope, obj);
  const at = firstFrame(getExceptionStackTrace(obj))?.at ?? "(unknown)";
  return `${obj.objClass.className}: ${message} at ${at}`;
}

/**
 * Class name and message, then one `\tat ...` line per frame.
 */
export async function formatExceptionWithStackTrace(scope: Scope, obj: Obj): Promise<string> {
  const lines = [`${obj.objClass.className}: ${await getExceptionMessage(scope, obj)}`];
  for (const entry of getExceptionStackTrace(obj).items) {
    if (entry instanceof ObjStackTraceEntry) lines.push(`\tat ${entry.render()}`);
  }
  return lines.join("\n");
}
