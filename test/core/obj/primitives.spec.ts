// test/core/obj/primitives.spec.ts

import { describe, it, expect, beforeEach } from "vitest";
import { ObjBool, ObjInt, ObjList, ObjNull, ObjString, ObjVoid, toObj } from "../../../src/core/obj/primitives";
import { Arguments } from "../../../src/core/scope/arguments";
import { INCOMPARABLE } from "../../../src/core/obj/obj";
import type { Runtime } from "../../../src/core/runtime/runtime";
import { asInt, asInts, createTestRuntime, expectScriptError, int, str } from "../../helpers/runtime";

let rt: Runtime;

beforeEach(() => {
  rt = createTestRuntime();
});

describe("Int", () => {
  it("implements arithmetic with truncating division", async () => {
    const s = rt.rootScope;
    expect(asInt(await int(7).plus(s, int(3)))).toBe(10);
    expect(asInt(await int(7).minus(s, int(3)))).toBe(4);
    expect(asInt(await int(7).mul(s, int(3)))).toBe(21);
    expect(asInt(await int(-7).div(s, int(2)))).toBe(-3);
    expect(asInt(await int(7).mod(s, int(3)))).toBe(1);
    expect(asInt(await int(6).binaryOp(s, "bitXor", int(3)))).toBe(5);
    expect(asInt(await int(1).binaryOp(s, "shl", int(4)))).toBe(16);
    expect(asInt(await int(5).negate())).toBe(-5);
  });

  it("raises on division by zero", async () => {
    await expectScriptError(int(1).div(rt.rootScope, int(0)), "IllegalArgumentException", "division by zero");
    await expectScriptError(int(1).mod(rt.rootScope, int(0)), "IllegalArgumentException", "division by zero");
  });

  it("does bitwise math on 64-bit values", async () => {
    const s = rt.rootScope;
    const big = 2 ** 40;
    expect(asInt(await int(big).binaryOp(s, "bitAnd", int(big)))).toBe(big);
    expect(asInt(await int(big).binaryOp(s, "bitOr", int(1)))).toBe(big + 1);
    expect(asInt(await int(1).binaryOp(s, "shl", int(40)))).toBe(big);
    expect(asInt(await int(big).binaryOp(s, "shr", int(38)))).toBe(4);
    expect(asInt(await int(-8).binaryOp(s, "shr", int(1)))).toBe(-4);
    expect(asInt(await int(big).bitNot())).toBe(-big - 1);
  });

  it("raises when a result leaves the safe integer range", async () => {
    const s = rt.rootScope;
    const factor = 2 ** 31 + 1;
    await expectScriptError(
      int(factor).mul(s, int(factor)),
      "IllegalArgumentException",
      "integer overflow: 4611686022722355201 is out of Int range"
    );
    await expectScriptError(
      int(Number.MAX_SAFE_INTEGER).plus(s, int(1)),
      "IllegalArgumentException",
      "integer overflow: 9007199254740992 is out of Int range"
    );
    expect(asInt(await int(Number.MAX_SAFE_INTEGER).minus(s, int(1)))).toBe(Number.MAX_SAFE_INTEGER - 1);
  });

  it("accepts only safe integers", () => {
    expect(() => new ObjInt(1.5)).toThrow(RangeError);
    expect(() => toObj(2 ** 53)).toThrow("not a safe integer: 9007199254740992");
  });

  it("is copied into each new binding", () => {
    const original = int(1);
    const copy = original.byValueCopy();
    expect(copy).not.toBe(original);
    expect(copy).toEqual(original);
  });
});

describe("String", () => {
  it("concatenates the string form of any operand", async () => {
    const joined = await str("n=").plus(rt.rootScope, int(4));
    expect(joined.asPlainString()).toBe("n=4");
  });

  it("indexes characters and checks bounds", async () => {
    expect((await str("abc").getAt(rt.rootScope, int(1))).asPlainString()).toBe("b");
    await expectScriptError(
      str("abc").getAt(rt.rootScope, int(3)),
      "IndexOutOfBoundsException",
      "index 3 is out of bounds 0..<3"
    );
  });

  it("does not support subtraction", async () => {
    await expectScriptError(
      str("a").minus(rt.rootScope, str("b")),
      "NotImplementedException",
      "operator minus is not defined for String"
    );
  });

  it("is shared, not copied, into new bindings", () => {
    const s = str("x");
    expect(s.byValueCopy()).toBe(s);
  });
});

describe("Bool, null and void", () => {
  it("combines booleans", async () => {
    expect(await ObjBool.TRUE.logicalAnd(rt.rootScope, ObjBool.FALSE)).toBe(ObjBool.FALSE);
    expect(await ObjBool.FALSE.logicalOr(rt.rootScope, ObjBool.TRUE)).toBe(ObjBool.TRUE);
    expect(await ObjBool.TRUE.logicalNot()).toBe(ObjBool.FALSE);
  });

  it("renders null and void by name", async () => {
    expect(await rt.stringify(ObjNull)).toBe("null");
    expect(await rt.stringify(ObjVoid)).toBe("void");
    expect(ObjNull.isNullish).toBe(true);
  });

  it("maps host values with toObj", () => {
    expect(toObj(null)).toBe(ObjNull);
    expect(toObj(true)).toBe(ObjBool.TRUE);
    expect(toObj(3)).toBeInstanceOf(ObjInt);
    expect(toObj("s")).toBeInstanceOf(ObjString);
  });
});

describe("comparison", () => {
  it("orders values of one type", async () => {
    const s = rt.rootScope;
    expect(await int(1).compareTo(s, int(2))).toBe(-1);
    expect(await str("b").compareTo(s, str("a"))).toBe(1);
    expect(await ObjBool.TRUE.compareTo(s, ObjBool.FALSE)).toBe(1);
  });

  it("reports null operands as incomparable", async () => {
    expect(await int(1).compareTo(rt.rootScope, ObjNull)).toBe(INCOMPARABLE);
    expect(await ObjNull.compareTo(rt.rootScope, ObjNull)).toBe(0);
  });

  it("raises for unrelated types but equals stays false", async () => {
    await expectScriptError(
      int(1).compareTo(rt.rootScope, str("1")),
      "NotImplementedException",
      "can't compare Int with String"
    );
    expect(await int(1).equals(rt.rootScope, str("1"))).toBe(false);
  });
});

describe("List", () => {
  it("compares element-wise, then by length", async () => {
    const s = rt.rootScope;
    const a = new ObjList([int(1), int(2)]);
    expect(await a.compareTo(s, new ObjList([int(1), int(3)]))).toBe(-1);
    expect(await a.compareTo(s, new ObjList([int(1)]))).toBe(1);
    expect(await a.equals(s, new ObjList([int(1), int(2)]))).toBe(true);
  });

  it("stores copies of by-value items", async () => {
    const list = new ObjList([int(0)]);
    const value = int(5);
    await list.putAt(rt.rootScope, int(0), value);
    value.value = 6;
    expect(asInts(list)).toEqual([5]);
  });

  it("checks indexes", async () => {
    await expectScriptError(
      new ObjList([int(1)]).getAt(rt.rootScope, int(2)),
      "IndexOutOfBoundsException",
      "index 2 is out of bounds 0..<1"
    );
  });

  it("exposes size and add to scripts", async () => {
    const list = new ObjList([int(1)]);
    await list.invokeInstanceMethod(rt.rootScope, "add", Arguments.of(int(2), int(3)));
    expect(asInt(await list.invokeInstanceMethod(rt.rootScope, "size"))).toBe(3);
    expect(await list.contains(rt.rootScope, int(3))).toBe(true);
    expect(await rt.stringify(new ObjList([int(1), str("a")]))).toBe("[1,a]");
  });
});
