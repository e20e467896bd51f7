// test/core/natives/natives.spec.ts
// Core natives installed as program globals

import { describe, it, expect } from "vitest";
import type { Val } from "../../../src/core/values/values";
import { VFalse, VNone, VTrue, fast, list, map, num, some, str } from "../../../src/core/values/values";
import { NATIVE_NAMES, coreNatives } from "../../../src/core/natives/core";
import { isLangError } from "../../../src/core/errors/errors";
import { thrownKind } from "../../helpers/engine";

const globals = coreNatives();

function native(name: string, ...args: Val[]): Val {
  const f = globals.get(name);
  if (f?.tag !== "Native") throw new Error(`${name} is not a native`);
  return f.fn(args);
}

function messageOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (isLangError(e)) return e.message;
    throw e;
  }
  throw new Error("expected a language error");
}

describe("globals", () => {
  it("installs every native plus None", () => {
    expect(globals.get("None")).toBe(VNone);
    expect(NATIVE_NAMES).toContain("Unwrap");
    expect(NATIVE_NAMES).toContain("None");
    expect([...globals.keys()].sort()).toEqual([...NATIVE_NAMES].sort());
  });

  it("checks arity", () => {
    expect(messageOf(() => native("Some"))).toBe("Type mismatch: Some takes 1 argument(s), got 0");
    expect(messageOf(() => native("Channel", num(1), num(2)))).toBe("Type mismatch: Channel takes 0-1 argument(s), got 2");
  });
});

describe("options", () => {
  it("wraps and unwraps", () => {
    expect(native("Some", num(1))).toEqual(some(num(1)));
    expect(native("Unwrap", some(str("x")))).toEqual(str("x"));
    expect(native("UnwrapOr", VNone, str("d"))).toEqual(str("d"));
    expect(native("IsSome", some(VTrue))).toBe(VTrue);
    expect(native("IsNone", VNone)).toBe(VTrue);
  });

  it("Unwrap of None fails", () => {
    expect(thrownKind(() => native("Unwrap", VNone))).toBe("UnwrapOnNone");
  });

  it("rejects non-options", () => {
    expect(messageOf(() => native("Unwrap", num(1)))).toBe("Type mismatch: Unwrap expects an Option, got Number");
  });
});

describe("containers", () => {
  it("Length counts clusters, items and entries", () => {
    expect(native("Length", str("hello"))).toEqual(num(5));
    expect(native("Length", list([num(1)]))).toEqual(num(1));
    expect(native("Length", map([["a", num(1)]]))).toEqual(num(1));
  });

  it("Append and Put mutate in place and return the container", () => {
    const l = list([num(1)]);
    expect(native("Append", l, num(2))).toBe(l);
    expect(l.items).toEqual([num(1), num(2)]);

    const m = map();
    expect(native("Put", m, str("k"), VTrue)).toBe(m);
    expect(m.entries.get("k")).toBe(VTrue);
  });

  it("RemoveAt returns the removed element", () => {
    const l = list([str("a"), str("b")]);
    expect(native("RemoveAt", l, num(2))).toEqual(str("b"));
    expect(l.items).toEqual([str("a")]);
  });

  it("Keys lists keys in insertion order", () => {
    expect(native("Keys", map([["z", num(1)], ["a", num(2)]]))).toEqual(list([str("z"), str("a")]));
  });

  it("Text renders any value", () => {
    expect(native("Text", list([num(1), str("a")]))).toEqual(str('[1, "a"]'));
    expect(native("Text", VFalse)).toEqual(str("False"));
  });
});

describe("numbers", () => {
  it("Fast converts to a FastNumber", () => {
    expect(native("Fast", num("0.5"))).toEqual(fast(0.5));
    expect(native("Fast", fast(2))).toEqual(fast(2));
    expect(thrownKind(() => native("Fast", str("1")))).toBe("TypeMismatch");
  });
});

describe("weak references", () => {
  it("upgrades to the same target while it is alive", () => {
    const target = list([num(1)]);
    const ref = native("WeakRef", target);
    expect(native("IsAlive", ref)).toBe(VTrue);

    const up = native("Upgrade", ref);
    expect(up.tag === "Option" && up.some && up.value).toBe(target);
  });

  it("only Instances, Lists and Maps can be weakly referenced", () => {
    expect(messageOf(() => native("WeakRef", num(1)))).toBe("Cannot create a weak reference to Number");
  });
});

describe("channels and errors", () => {
  it("rejects a capacity below 1", () => {
    expect(thrownKind(() => native("Channel", num(0)))).toBe("TypeMismatch");
  });

  it("Send requires a channel", () => {
    expect(messageOf(() => native("Send", num(1), num(2)))).toBe("Type mismatch: Send expects a Channel, got Number");
  });

  it("reads ErrorObject fields", () => {
    const err: Val = { tag: "Error", kind: "DivisionByZero", code: "E0206", category: "Logic", message: "Division by zero" };
    expect(native("IsError", err)).toBe(VTrue);
    expect(native("IsError", num(1))).toBe(VFalse);
    expect(native("ErrorKind", err)).toEqual(str("DivisionByZero"));
    expect(native("ErrorMessage", err)).toEqual(str("Division by zero"));
    expect(thrownKind(() => native("ErrorKind", num(1)))).toBe("TypeMismatch");
  });
});
