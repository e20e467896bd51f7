// test/core/reactive/graph.spec.ts
// Observer propagation: FIFO cascade, dynamic dependencies, recursion guard

import { describe, it, expect } from "vitest";
import type { FieldNode } from "../../../src/core/ast";
import {
  assign,
  bin,
  call,
  concept,
  create,
  field,
  fn,
  id,
  member,
  method,
  n,
  print,
  program,
  receive,
  ret,
  self,
  setField,
  setMember,
  when,
} from "../../../src/core/ast";
import { display } from "../../../src/core/values/display";
import { num, str } from "../../../src/core/values/values";
import { loadRuntime, thrownKind } from "../../helpers/engine";

const numberField = (name: string): FieldNode => ({ name, type: "Number" });

const order = concept("Order", {
  fields: [numberField("price"), numberField("tax"), numberField("total")],
  observers: [
    when("price", [setField("tax", bin("*", field("price"), n("0.1")))]),
    when("tax", [setField("total", bin("+", field("price"), field("tax")))]),
  ],
});

describe("propagation", () => {
  it("cascades price → tax → total with each observer running once", () => {
    const rt = loadRuntime(program({ concepts: [order] }));
    const o = rt.construct("Order");

    rt.writeField(o, "price", num(100));

    expect(display(rt.readField(o, "tax"))).toBe("10");
    expect(display(rt.readField(o, "total"))).toBe("110");
    expect(rt.observerRuns(o, "price")).toBe(1);
    expect(rt.observerRuns(o, "tax")).toBe(1);
    expect(rt.graphStats().pending).toBe(0);
  });

  it("re-derives edges from the reads of the last run", () => {
    const rt = loadRuntime(program({ concepts: [order] }));
    const o = rt.construct("Order");
    rt.writeField(o, "price", num(100));

    const fields = rt.graph.dependencies(o.id).map((d) => d.field);
    // price observer: price; tax observer: tax plus its read of price
    expect(fields.sort()).toEqual(["price", "price", "tax"]);

    rt.writeField(o, "price", num(200));
    expect(display(rt.readField(o, "total"))).toBe("220");
    expect(rt.observerRuns(o, "price")).toBe(2);
    expect(rt.observerRuns(o, "tax")).toBe(2);
  });

  it("does not run observers when the value is unchanged", () => {
    const rt = loadRuntime(program({ concepts: [order] }));
    const o = rt.construct("Order");
    rt.writeField(o, "price", num(100));
    rt.writeField(o, "price", num("100.0"));
    expect(rt.observerRuns(o, "price")).toBe(1);
  });

  it("does not run observers on construction", () => {
    const rt = loadRuntime(program({ concepts: [order] }));
    const o = rt.construct("Order", { price: num(50) });
    expect(display(rt.readField(o, "tax"))).toBe("0");
    expect(rt.observerRuns(o, "price")).toBe(0);
  });

  it("records reads made inside called methods", () => {
    const line = concept("Line", {
      fields: [numberField("unit"), numberField("qty"), numberField("amount")],
      methods: [method("subtotal", [], [ret(bin("*", field("unit"), field("qty")))])],
      observers: [when("qty", [setField("amount", call(self, "subtotal"))])],
    });
    const rt = loadRuntime(program({ concepts: [line] }));
    const l = rt.construct("Line", { unit: num(3) });

    rt.writeField(l, "qty", num(2));
    expect(display(rt.readField(l, "amount"))).toBe("6");

    rt.writeField(l, "unit", num(5));
    expect(display(rt.readField(l, "amount"))).toBe("10");
    expect(rt.observerRuns(l, "qty")).toBe(2);
  });

  it("tracks fields of other instances", () => {
    const settings = concept("Settings", { fields: [numberField("rate")] });
    const invoice = concept("Invoice", {
      fields: [numberField("price"), numberField("tax")],
      observers: [when("price", [setField("tax", bin("*", field("price"), member(id("config"), "rate")))])],
    });
    const rt = loadRuntime(
      program({
        concepts: [settings, invoice],
        story: [
          create("Settings", "config", { rate: n("0.1") }),
          create("Invoice", "inv"),
          setMember(id("inv"), "price", n(100)),
          print(member(id("inv"), "tax")),
          setMember(id("config"), "rate", n("0.2")),
          print(member(id("inv"), "tax")),
        ],
      }),
    );
    rt.run();
    expect(rt.output).toEqual(["10", "20"]);
  });

  it("drops edges onto a forgotten instance", () => {
    const settings = concept("Settings", { fields: [numberField("rate")] });
    const invoice = concept("Invoice", {
      fields: [numberField("price"), numberField("tax")],
      observers: [when("price", [setField("tax", bin("*", field("price"), member(id("config"), "rate")))])],
    });
    const rt = loadRuntime(
      program({
        concepts: [settings, invoice],
        story: [create("Settings", "config", { rate: n(1) }), create("Invoice", "inv"), setMember(id("inv"), "price", n(5))],
      }),
    );
    rt.run();
    const config = rt.globals.get("config");
    const inv = rt.globals.get("inv");
    if (config?.tag !== "Instance" || inv?.tag !== "Instance") throw new Error("story did not create instances");

    expect(rt.graph.hasDependents(config.id, "rate")).toBe(true);
    rt.graph.forgetInstance(config.id);
    expect(rt.graph.hasDependents(config.id, "rate")).toBe(false);
    expect(rt.graph.dependencies(inv.id)).toEqual([{ instanceId: inv.id, field: "price" }]);
  });
});

describe("recursion guard", () => {
  const pingPong = concept("Pair", {
    fields: [numberField("a"), numberField("b")],
    observers: [
      when("a", [setField("b", bin("+", field("a"), n(1)))]),
      when("b", [setField("a", bin("+", field("b"), n(1)))]),
    ],
  });

  it("aborts a mutual cycle with RecursionGuardExceeded", () => {
    const rt = loadRuntime(program({ concepts: [pingPong] }), { reactive: { maxObserverInvocations: 50 } });
    const p = rt.construct("Pair");

    expect(thrownKind(() => rt.writeField(p, "a", num(1)))).toBe("RecursionGuardExceeded");
    expect(rt.graphStats().pending).toBe(0);
    expect(rt.graphStats().lockedInstances).toBe(0);
    expect(rt.logLines).toContain("[test:reactive] observer cascade aborted limit=50");
    expect(rt.observerRuns(p, "a") + rt.observerRuns(p, "b")).toBe(50);
  });

  it("leaves the graph usable after an aborted pass", () => {
    const rt = loadRuntime(program({ concepts: [pingPong, order] }), { reactive: { maxObserverInvocations: 10 } });
    const p = rt.construct("Pair");
    const o = rt.construct("Order");
    expect(thrownKind(() => rt.writeField(p, "a", num(1)))).toBe("RecursionGuardExceeded");

    rt.writeField(o, "price", num(10));
    expect(display(rt.readField(o, "total"))).toBe("11");
  });
});

describe("writes", () => {
  it("type-checks against the declared field type", () => {
    const rt = loadRuntime(program({ concepts: [order] }));
    const o = rt.construct("Order");
    expect(thrownKind(() => rt.writeField(o, "price", str("cheap")))).toBe("TypeMismatch");
    expect(thrownKind(() => rt.writeField(o, "discount", num(1)))).toBe("UnknownField");
    expect(rt.graphStats().lockedInstances).toBe(0);
  });

  it("refuses to suspend inside an observer", () => {
    const thing = concept("Thing", {
      fields: [numberField("x")],
      observers: [when("x", [assign("m", receive(id("inbox")))])],
    });
    const rt = loadRuntime(
      program({
        concepts: [thing],
        story: [assign("inbox", fn("Channel")), create("Thing", "t"), setMember(id("t"), "x", n(1))],
      }),
    );
    const result = rt.execute();
    expect(result.ok).toBe(false);
    expect(result.error?.kind).toBe("SuspensionNotAllowed");
    expect(result.error?.message).toBe("Receive cannot suspend inside an observer");
  });
});
