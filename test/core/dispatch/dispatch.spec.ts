// test/core/dispatch/dispatch.spec.ts
// Situation dispatch: chain order, Proceed, switching

import { describe, it, expect } from "vitest";
import {
  bin,
  call,
  concept,
  create,
  id,
  method,
  print,
  proceed,
  program,
  ret,
  s,
  situation,
  switchOff,
  switchOn,
} from "../../../src/core/ast";
import { str } from "../../../src/core/values/values";
import { SituationStack } from "../../../src/core/dispatch/situations";
import { loadRuntime, thrownKind } from "../../helpers/engine";

const greeter = concept("Greeter", {
  methods: [
    method("greet", [], [ret(s("hello"))]),
    method("echo", ["x"], [ret(id("x"))]),
    method("broken", [], [ret(proceed())]),
  ],
});

const situations = [
  situation("Polite", { Greeter: [method("greet", [], [ret(bin("+", s("please, "), proceed()))])] }),
  situation("Excited", { Greeter: [method("greet", [], [ret(bin("+", proceed(), s("!")))])] }),
  situation("Rude", { Greeter: [method("greet", [], [ret(s("go away"))])] }),
  situation("Loud", { Greeter: [method("echo", ["x"], [ret(proceed([bin("+", id("x"), s("!"))]))])] }),
  situation("Quiet", { Greeter: [method("echo", ["x"], [ret(bin("+", s("("), bin("+", proceed(), s(")"))))])] }),
  situation("Waving", { Greeter: [method("wave", [], [ret(s("o/"))])] }),
];

function setup() {
  const rt = loadRuntime(program({ concepts: [greeter], situations }));
  return { rt, g: rt.construct("Greeter") };
}

describe("DispatchResolver.resolve", () => {
  it("has one link per adjusting situation plus the base, newest first", () => {
    const { rt } = setup();
    const def = rt.concepts.get("Greeter");
    if (!def) throw new Error("Greeter not loaded");

    const stack = new SituationStack();
    expect(rt.resolver.resolve(stack, def, "greet").links).toHaveLength(1);

    stack.push("Polite");
    stack.push("Loud"); // adjusts echo only
    stack.push("Excited");
    const chain = rt.resolver.resolve(stack, def, "greet");
    expect(chain.links).toHaveLength(3);
    expect(chain.links.map((l) => l.situation ?? "base")).toEqual(["Excited", "Polite", "base"]);
  });

  it("does not change the stack", () => {
    const { rt } = setup();
    const def = rt.concepts.get("Greeter");
    if (!def) throw new Error("Greeter not loaded");
    const stack = new SituationStack(["Polite"]);
    rt.resolver.resolve(stack, def, "greet");
    expect(stack.active()).toEqual(["Polite"]);
  });

  it("fails with UnknownMethod when there is no base method, even if adjusted", () => {
    const { rt, g } = setup();
    rt.switchOn("Waving");
    expect(thrownKind(() => rt.call(g, "wave"))).toBe("UnknownMethod");
  });
});

describe("Proceed", () => {
  it("composes adjustments newest first", () => {
    const { rt, g } = setup();
    rt.switchOn("Polite");
    rt.switchOn("Excited");
    expect(rt.call(g, "greet")).toEqual(str("please, hello!"));
  });

  it("order of switching decides the order of the chain", () => {
    const { rt, g } = setup();
    rt.switchOn("Loud");
    rt.switchOn("Quiet");
    // Quiet runs first and proceeds with the original argument; Loud appends "!".
    expect(rt.call(g, "echo", [str("hi")])).toEqual(str("(hi!)"));
  });

  it("passes replacement arguments down the chain", () => {
    const { rt, g } = setup();
    rt.switchOn("Loud");
    expect(rt.call(g, "echo", [str("hi")])).toEqual(str("hi!"));
  });

  it("an adjustment that never proceeds ends the chain", () => {
    const { rt, g } = setup();
    rt.switchOn("Polite");
    rt.switchOn("Rude");
    expect(rt.call(g, "greet")).toEqual(str("go away"));
  });

  it("fails with ProceedAtBase from the base method", () => {
    const { rt, g } = setup();
    expect(thrownKind(() => rt.call(g, "broken"))).toBe("ProceedAtBase");
  });
});

describe("switching situations", () => {
  it("rejects unknown, duplicate and inactive situations", () => {
    const { rt } = setup();
    expect(thrownKind(() => rt.switchOn("Grumpy"))).toBe("UnknownSituation");
    expect(thrownKind(() => rt.switchOff("Grumpy"))).toBe("UnknownSituation");
    rt.switchOn("Polite");
    expect(thrownKind(() => rt.switchOn("Polite"))).toBe("AlreadyActive");
    expect(thrownKind(() => rt.switchOff("Rude"))).toBe("NotActive");
  });

  it("lists active situations most recent first", () => {
    const { rt } = setup();
    rt.switchOn("Polite");
    rt.switchOn("Rude");
    rt.switchOn("Loud");
    rt.switchOff("Rude");
    expect(rt.activeSituations()).toEqual(["Loud", "Polite"]);
  });

  it("takes effect from the story", () => {
    const rt = loadRuntime(
      program({
        concepts: [greeter],
        situations,
        story: [
          create("Greeter", "g"),
          switchOn("Polite"),
          print(call(id("g"), "greet")),
          switchOff("Polite"),
          print(call(id("g"), "greet")),
        ],
      }),
    );
    rt.run();
    expect(rt.output).toEqual(["please, hello", "hello"]);
  });

  it("checks method arity", () => {
    const { rt, g } = setup();
    expect(thrownKind(() => rt.call(g, "echo"))).toBe("TypeMismatch");
  });
});
