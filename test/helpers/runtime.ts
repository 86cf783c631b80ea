// test/helpers/runtime.ts
// Shared fixtures for runtime tests

import { expect } from "vitest";
import { createRuntime, type Runtime, type RuntimeOptions } from "../../src/core/runtime/runtime";
import { silentLogger, type LogFn, type LogSink } from "../../src/core/log/logger";
import { ExecutionError } from "../../src/core/errors/scriptError";
import { ObjException } from "../../src/core/errors/exception";
import { ObjInt, ObjList, ObjString } from "../../src/core/obj/primitives";
import { Pos, Source } from "../../src/core/pos/source";
import type { Obj } from "../../src/core/obj/obj";

/**
 * A runtime that logs nowhere unless a logger is given.
 */
export function createTestRuntime(options: RuntimeOptions = {}): Runtime {
  return createRuntime({ logger: silentLogger, ...options });
}

export const int = (value: number): ObjInt => new ObjInt(value);
export const str = (value: string): ObjString => new ObjString(value);

export function asInt(value: Obj): number {
  if (!(value instanceof ObjInt)) throw new Error(`expected Int, got ${value.objClass.className}`);
  return value.value;
}

export function asInts(value: Obj): number[] {
  if (!(value instanceof ObjList)) throw new Error(`expected List, got ${value.objClass.className}`);
  return value.items.map(asInt);
}

/** A position in a one-off source text. */
export function posIn(text: string, line: number, column: number, fileName = "main.marl"): Pos {
  return new Pos(new Source(fileName, text), line, column);
}

/**
 * Await `action` and check that it raised a script exception of
 * `className`, with `message` when given.
 */
export async function expectScriptError(
  action: Promise<unknown>,
  className: string,
  message?: string
): Promise<ExecutionError> {
  let caught: unknown;
  try {
    await action;
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(ExecutionError);
  if (!(caught instanceof ExecutionError)) throw new Error("no script exception was raised");
  expect(caught.errorObject.objClass.className).toBe(className);
  if (message !== undefined) {
    const errorObject = caught.errorObject;
    expect(errorObject).toBeInstanceOf(ObjException);
    if (errorObject instanceof ObjException) expect(errorObject.message).toBe(message);
  }
  return caught;
}

export type CapturedLine = { level: keyof LogSink; args: unknown[] };

/** A log sink that keeps every call. */
export function captureSink(): { lines: CapturedLine[]; sink: LogSink } {
  const lines: CapturedLine[] = [];
  const at =
    (level: keyof LogSink): LogFn =>
    (...args: unknown[]) => {
      lines.push({ level, args });
    };
  return { lines, sink: { error: at("error"), warn: at("warn"), info: at("info"), debug: at("debug") } };
}
