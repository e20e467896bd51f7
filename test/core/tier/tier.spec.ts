// test/core/tier/tier.spec.ts
// Tier manager: promotion, entry guards, traps and deoptimization

import { describe, it, expect } from "vitest";
import type { FieldNode, Program } from "../../../src/core/ast";
import type { Val } from "../../../src/core/values/values";
import type { PartialEngineConfig } from "../../../src/core/config/config";
import type { CodegenBackend } from "../../../src/core/tier/backend";
import {
  assign,
  b,
  bin,
  brk,
  call,
  concept,
  exprStmt,
  fastLit,
  field,
  fn,
  forEach,
  id,
  ifThen,
  listOf,
  member,
  method,
  n,
  print,
  proceed,
  program,
  repeat,
  ret,
  s,
  self,
  setField,
  setMember,
  setVar,
  situation,
  switchOn,
  when,
} from "../../../src/core/ast";
import { display } from "../../../src/core/values/display";
import { VTrue, fast, list, num, str } from "../../../src/core/values/values";
import { formatIR } from "../../../src/core/tier/ir";
import { generateSource } from "../../../src/core/tier/backend";
import { lowerMethod } from "../../../src/core/tier/lower";
import { Runtime } from "../../../src/runtime";
import { createLogger } from "../../../src/core/log/logger";
import { loadRuntime, memorySink } from "../../helpers/engine";

const numberField = (name: string): FieldNode => ({ name, type: "Number" });

const counter = concept("Counter", {
  fields: [numberField("total")],
  methods: [
    method("add", ["x"], [setField("total", bin("+", field("total"), id("x"))), ret(field("total"))]),
    method("peek", [], [ret(field("total"))]),
  ],
});

const doubling = situation("Doubling", {
  Counter: [method("add", ["x"], [ret(bin("*", proceed(), n(2)))])],
});

const ADD = "host:Counter.add";

/** Same program under the interpreter only and with eager promotion. */
function pair(prog: Program, tier: PartialEngineConfig["tier"] = {}) {
  return {
    interpreted: loadRuntime(prog, { tier: { enabled: false } }),
    tiered: loadRuntime(prog, { tier: { promotionThreshold: 3, ...tier } }),
  };
}

describe("promotion", () => {
  it("compiles a site once it is warm and then takes the compiled entry", () => {
    const rt = loadRuntime(program({ concepts: [counter] }), { tier: { promotionThreshold: 3 } });
    const c = rt.construct("Counter");

    const results = Array.from({ length: 10 }, () => display(rt.call(c, "add", [num(1)])));

    expect(results).toEqual(["1", "2", "3", "4", "5", "6", "7", "8", "9", "10"]);
    const stats = rt.siteStats(ADD);
    expect(stats?.state).toBe("compiled");
    expect(stats?.calls).toBe(10);
    expect(stats?.interpretedCalls).toBe(3);
    expect(stats?.compiledCalls).toBe(7);
    expect(stats?.promotions).toBe(1);
    expect(stats?.signatures).toEqual(["Counter(Number)"]);
    expect(rt.logLines).toContain("[test:tier] promoted site=host:Counter.add signature=Counter(Number) backend=js instructions=8");
  });

  it("never promotes with the tier disabled", () => {
    const rt = loadRuntime(program({ concepts: [counter] }), { tier: { enabled: false, promotionThreshold: 1 } });
    const c = rt.construct("Counter");
    for (let i = 0; i < 5; i++) rt.call(c, "add", [num(1)]);
    expect(rt.siteStats(ADD)?.state).toBe("cold");
    expect(rt.siteStats(ADD)?.compiledCalls).toBe(0);
  });

  it("keeps the lowered IR for inspection", () => {
    const rt = loadRuntime(program({ concepts: [counter] }), { tier: { promotionThreshold: 1 } });
    rt.call(rt.construct("Counter"), "add", [num(1)]);

    const ir = rt.tiers.compiledIR(ADD);
    if (!ir) throw new Error("add was not promoted");
    const listing = formatIR(ir).split("\n");
    expect(listing[0]).toBe("Counter.add params=1 regs=7");
    expect(listing[1]).toBe("   0  LOAD_FIELD dst=2 obj=0 field=total expect=Unknown");
    expect(ir.writtenFields).toEqual(["total"]);
    expect(generateSource(ir)).toContain("exports.entry = function* (ctx, self, args) {");
  });

  it("never promotes natives", () => {
    const rt = loadRuntime(
      program({
        story: [assign("items", listOf(n(1), n(2))), repeat(n(5), [exprStmt(fn("Length", [id("items")], "len"))])],
      }),
      { tier: { promotionThreshold: 2 } },
    );
    rt.run();
    const stats = rt.siteStats("len");
    expect(stats?.state).toBe("native");
    expect(stats?.target).toBe("native Length");
    expect(stats?.calls).toBe(5);
    expect(stats?.compiledCalls).toBe(0);
  });

  it("records a signature that cannot be lowered and does not retry it", () => {
    const noisy = concept("Noisy", { methods: [method("shout", [], [print(s("hey")), ret(b(true))])] });
    const rt = loadRuntime(program({ concepts: [noisy] }), { tier: { promotionThreshold: 2 } });
    const x = rt.construct("Noisy");
    for (let i = 0; i < 4; i++) rt.call(x, "shout");

    expect(rt.output).toEqual(["hey", "hey", "hey", "hey"]);
    const stats = rt.siteStats("host:Noisy.shout");
    expect(stats?.state).toBe("cold");
    expect(stats?.failedSignatures).toEqual(["Noisy()"]);
    const failures = rt.logLines.filter((l) => l.startsWith("[test:tier] compile failed"));
    expect(failures).toEqual(["[test:tier] compile failed site=host:Noisy.shout signature=Noisy() reason=unsupported: Print"]);
  });

  it("treats a backend failure like any other compile failure", () => {
    const offline: CodegenBackend = { name: "offline", compile: () => ({ ok: false, reason: "backend: offline" }) };
    const rt = new Runtime({
      config: { tier: { promotionThreshold: 1 } },
      env: {},
      logger: createLogger("test", "silent", memorySink()),
      backend: offline,
    });
    rt.load(program({ concepts: [counter] }));
    const c = rt.construct("Counter");
    rt.call(c, "add", [num(2)]);
    expect(display(rt.call(c, "add", [num(3)]))).toBe("5");
    expect(rt.siteStats(ADD)?.failedSignatures).toEqual(["Counter(Number)"]);
  });

  it("leaves a site with too many signatures to the interpreter", () => {
    const echo = concept("Echo", { methods: [method("echo", ["x"], [ret(id("x"))])] });
    const rt = loadRuntime(program({ concepts: [echo] }), { tier: { promotionThreshold: 3, maxShapesPerSite: 2 } });
    const e = rt.construct("Echo");
    rt.call(e, "echo", [num(1)]);
    rt.call(e, "echo", [str("a")]);
    rt.call(e, "echo", [VTrue]);

    const stats = rt.siteStats("host:Echo.echo");
    expect(stats?.state).toBe("megamorphic");
    expect(stats?.signatures).toEqual(["Echo(Number)", "Echo(String)", "Echo(Boolean)"]);
    expect(stats?.promotions).toBe(0);
  });

  it("does not compile a method whose written field is observed", () => {
    const tally = concept("Tally", {
      fields: [numberField("count"), numberField("doubled")],
      methods: [method("inc", [], [setField("count", bin("+", field("count"), n(1))), ret(field("count"))])],
      observers: [when("count", [setField("doubled", bin("*", field("count"), n(2)))])],
    });
    const rt = loadRuntime(program({ concepts: [tally] }), { tier: { promotionThreshold: 2 } });
    const t = rt.construct("Tally");
    for (let i = 0; i < 5; i++) rt.call(t, "inc");

    expect(display(rt.readField(t, "doubled"))).toBe("10");
    expect(rt.observerRuns(t, "count")).toBe(5);
    expect(rt.siteStats("host:Tally.inc")?.promotions).toBe(0);
  });
});

describe("transparency", () => {
  it("loops, breaks and locals give the same results in both tiers", () => {
    const maths = concept("Maths", {
      methods: [
        method(
          "sumTo",
          ["k"],
          [
            assign("acc", n(0)),
            repeat(id("k"), [ifThen(bin(">", id("i"), n(5)), [brk]), setVar("acc", bin("+", id("acc"), id("i")))], "i"),
            ret(id("acc")),
          ],
        ),
        method(
          "sumList",
          ["xs"],
          [assign("acc", fastLit(0)), forEach("x", id("xs"), [setVar("acc", bin("+", id("acc"), id("x")))]), ret(id("acc"))],
        ),
      ],
    });
    const { interpreted, tiered } = pair(program({ concepts: [maths] }));
    const script = (rt: Runtime): string[] => {
      const m = rt.construct("Maths");
      const out: string[] = [];
      for (let k = 1; k <= 8; k++) out.push(display(rt.call(m, "sumTo", [num(k)])));
      for (let k = 1; k <= 5; k++) out.push(display(rt.call(m, "sumList", [list([fast(0.1), fast(k)])])));
      return out;
    };

    const expected = script(interpreted);
    expect(expected.slice(0, 8)).toEqual(["1", "3", "6", "10", "15", "15", "15", "15"]);
    expect(script(tiered)).toEqual(expected);
    expect(tiered.siteStats("host:Maths.sumTo")?.compiledCalls).toBe(5);
    expect(tiered.siteStats("host:Maths.sumList")?.compiledCalls).toBe(2);
  });

  it("a situation switched on after compilation takes effect at once", () => {
    const prog = program({ concepts: [counter], situations: [doubling] });
    const { interpreted, tiered } = pair(prog, { deoptAfterGuardFailures: 2 });
    const script = (rt: Runtime): string[] => {
      const c = rt.construct("Counter");
      const out: string[] = [];
      const add = () => out.push(display(rt.call(c, "add", [num(1)])));
      add(); add(); add();
      rt.switchOn("Doubling");
      add(); add(); add(); add();
      rt.switchOff("Doubling");
      add(); add();
      return out;
    };

    const expected = script(interpreted);
    expect(expected).toEqual(["1", "2", "3", "8", "10", "12", "14", "8", "9"]);
    expect(script(tiered)).toEqual(expected);

    const stats = tiered.siteStats(ADD);
    expect(stats?.deopts).toBe(1);
    expect(stats?.promotions).toBe(2);
    expect(stats?.state).toBe("compiled");
  });

  it("a situation switched on in the middle of a compiled method applies to its later calls", () => {
    const stepper = concept("Stepper", {
      methods: [
        method("step", ["x"], [ret(id("x"))]),
        method("arm", [], [switchOn("Boost")]),
        method(
          "run",
          ["k"],
          [
            assign("acc", n(0)),
            repeat(
              id("k"),
              [
                ifThen(bin("=", id("i"), n(3)), [exprStmt(call(self, "arm"))]),
                setVar("acc", bin("+", id("acc"), call(self, "step", [id("i")]))),
              ],
              "i",
            ),
            ret(id("acc")),
          ],
        ),
      ],
    });
    const boost = situation("Boost", { Stepper: [method("step", ["x"], [ret(bin("*", proceed(), n(100)))])] });
    const { interpreted, tiered } = pair(program({ concepts: [stepper], situations: [boost] }));
    const script = (rt: Runtime): string[] => {
      const st = rt.construct("Stepper");
      const out: string[] = [];
      for (let i = 0; i < 6; i++) {
        out.push(display(rt.call(st, "run", [num(5)])));
        rt.switchOff("Boost");
      }
      return out;
    };

    // 1 + 2, then 300 + 400 + 500 once Boost is on
    const expected = script(interpreted);
    expect(expected).toEqual(["1203", "1203", "1203", "1203", "1203", "1203"]);
    expect(script(tiered)).toEqual(expected);
    expect(tiered.siteStats("host:Stepper.run")?.compiledCalls).toBe(3);
    expect(tiered.activeSituations()).toEqual([]);
  });

  it("compiled writes still reach observers that start depending on the field later", () => {
    const mirror = concept("Mirror", {
      fields: [{ name: "src", type: "Any", initial: n(0) }, numberField("copy")],
      observers: [when("src", [setField("copy", member(field("src"), "total"))])],
    });
    const rt = loadRuntime(program({ concepts: [counter, mirror] }), { tier: { promotionThreshold: 2 } });
    const c = rt.construct("Counter");
    rt.call(c, "add", [num(1)]);
    rt.call(c, "add", [num(1)]);
    expect(rt.siteStats(ADD)?.state).toBe("compiled");

    const m = rt.construct("Mirror");
    rt.writeField(m, "src", c);
    expect(display(rt.readField(m, "copy"))).toBe("2");

    expect(display(rt.call(c, "add", [num(5)]))).toBe("7");
    expect(display(rt.readField(m, "copy"))).toBe("7");
    expect(rt.siteStats(ADD)?.guardFailures).toBe(1);
  });
});

describe("traps", () => {
  const box = concept("Box", {
    fields: [{ name: "v", type: "Any", initial: fastLit(0) }],
    methods: [method("bump", [], [ret(bin("+", field("v"), fastLit(1)))])],
  });

  it("resumes in the IR VM when a speculated field kind changes", () => {
    const rt = loadRuntime(program({ concepts: [box] }), { tier: { promotionThreshold: 3 } });
    const x = rt.construct("Box", { v: fast(1) });
    const bump = (): Val => rt.call(x, "bump");

    for (let i = 0; i < 4; i++) expect(bump()).toEqual(fast(2));

    rt.writeField(x, "v", str("a"));
    expect(bump()).toEqual(str("a1"));

    rt.writeField(x, "v", fast(10));
    expect(bump()).toEqual(fast(11));

    const stats = rt.siteStats("host:Box.bump");
    expect(stats?.traps).toBe(1);
    expect(stats?.compiledCalls).toBe(3);
    expect(stats?.state).toBe("compiled");
    expect(rt.logLines).toContain("[test:tier] trap site=host:Box.bump pc=0 op=LOAD_FIELD");
  });
});

describe("store traps", () => {
  it("a compiled write to a field that gained an observer finishes in the IR VM", () => {
    const target = concept("Target", { fields: [numberField("x")] });
    const watcher = concept("Watcher", {
      fields: [{ name: "t", type: "Any", initial: n(0) }, numberField("seen")],
      observers: [when("t", [setField("seen", member(field("t"), "x"))])],
    });
    const writer = concept("Writer", {
      methods: [method("put", ["o", "v"], [setMember(id("o"), "x", id("v")), ret(id("v"))])],
    });
    const { interpreted, tiered } = pair(program({ concepts: [target, watcher, writer] }));
    const script = (rt: Runtime): string[] => {
      const tgt = rt.construct("Target");
      const w = rt.construct("Writer");
      const out: string[] = [];
      const put = (v: number) => out.push(display(rt.call(w, "put", [tgt, num(v)])));
      put(1); put(2); put(3); put(4);

      const watch = rt.construct("Watcher");
      rt.writeField(watch, "t", tgt);
      out.push(display(rt.readField(watch, "seen")));
      put(5);
      out.push(display(rt.readField(watch, "seen")));
      put(6);
      out.push(display(rt.readField(watch, "seen")));
      return out;
    };

    const expected = script(interpreted);
    expect(expected).toEqual(["1", "2", "3", "4", "4", "5", "5", "6", "6"]);
    expect(script(tiered)).toEqual(expected);

    const stats = tiered.siteStats("host:Writer.put");
    expect(stats?.compiledCalls).toBe(3);
    expect(stats?.traps).toBe(2);
    const traps = tiered.logLines.filter((l) => l.startsWith("[test:tier] trap site=host:Writer.put"));
    expect(traps).toHaveLength(2);
    expect(traps.every((l) => l.endsWith("op=STORE_FIELD"))).toBe(true);
  });
});

describe("lowerMethod", () => {
  it("refuses constructs the IR cannot express", () => {
    const rt = loadRuntime(program({ concepts: [counter], situations: [doubling] }));
    const def = rt.concepts.get("Counter");
    if (!def) throw new Error("Counter not loaded");

    const shadowing = { concept: "Counter", name: "shadow", params: [], body: [assign("total", n(1))] };
    expect(lowerMethod(def, shadowing, { argKinds: [], anyFieldKinds: new Map() })).toEqual({
      ok: false,
      reason: "unsupported: local total shadows a field",
    });

    const proceeding = { concept: "Counter", name: "p", params: [], body: [ret(proceed())] };
    expect(lowerMethod(def, proceeding, { argKinds: [], anyFieldKinds: new Map() })).toEqual({
      ok: false,
      reason: "unsupported: Proceed",
    });
  });
});

describe("profile report", () => {
  it("lists the busiest sites first", () => {
    const rt = loadRuntime(program({ concepts: [counter] }), { tier: { promotionThreshold: 50 } });
    const c = rt.construct("Counter");
    rt.call(c, "peek");
    for (let i = 0; i < 3; i++) rt.call(c, "add", [num(1)]);

    expect(rt.hotSites().map((st) => st.site)).toEqual([ADD, "host:Counter.peek"]);
    expect(rt.hotSites(1)).toHaveLength(1);

    const report = rt.profileReport().split("\n");
    expect(report).toHaveLength(3);
    expect(report[1].startsWith("host:Counter.add")).toBe(true);
    expect(report[1].endsWith("cold")).toBe(true);
  });
});
