// src/core/natives/core.ts
// Core natives: options, containers, weak references, channels, errors

import type { ChannelState } from "../concurrency/types";
import type { ErrorVal, ListVal, MapVal, NativeFn, NativeVal, OptionVal, Val, WeakRefVal } from "../values/values";
import { VNone, VTrue, bool, fast, list, num, some, str } from "../values/values";
import { display } from "../values/display";
import { promote } from "../values/numeric";
import { lengthOf, listAppend, listRemoveAt, mapPut, toIndex } from "../values/collections";
import { closeChannel, createChannel, sendChannel, tryReceive } from "../concurrency/channel";
import { langError, typeMismatch } from "../errors/errors";

// ─────────────────────────────────────────────────────────────────
// Argument checks
// ─────────────────────────────────────────────────────────────────

function arity(name: string, args: readonly Val[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min}-${max}`;
    throw typeMismatch(`${name} takes ${expected} argument(s), got ${args.length}`);
  }
}

function wrongKind(name: string, expected: string, got: Val): never {
  throw typeMismatch(`${name} expects ${expected}, got ${got.tag}`);
}

function option(name: string, v: Val): OptionVal {
  return v.tag === "Option" ? v : wrongKind(name, "an Option", v);
}

function listArg(name: string, v: Val): ListVal {
  return v.tag === "List" ? v : wrongKind(name, "a List", v);
}

function mapArg(name: string, v: Val): MapVal {
  return v.tag === "Map" ? v : wrongKind(name, "a Map", v);
}

function weakArg(name: string, v: Val): WeakRefVal {
  return v.tag === "WeakRef" ? v : wrongKind(name, "a WeakRef", v);
}

function channelArg(name: string, v: Val): ChannelState {
  return v.tag === "Channel" ? v.channel : wrongKind(name, "a Channel", v);
}

function errorArg(name: string, v: Val): ErrorVal {
  return v.tag === "Error" ? v : wrongKind(name, "an Error", v);
}

// ─────────────────────────────────────────────────────────────────
// Table
// ─────────────────────────────────────────────────────────────────

const NATIVES: Record<string, NativeFn> = {
  Some: (args) => {
    arity("Some", args, 1);
    return some(args[0]);
  },

  Unwrap: (args) => {
    arity("Unwrap", args, 1);
    const opt = option("Unwrap", args[0]);
    if (!opt.some) throw langError("UnwrapOnNone");
    return opt.value;
  },

  UnwrapOr: (args) => {
    arity("UnwrapOr", args, 2);
    const opt = option("UnwrapOr", args[0]);
    return opt.some ? opt.value : args[1];
  },

  IsSome: (args) => {
    arity("IsSome", args, 1);
    return bool(option("IsSome", args[0]).some);
  },

  IsNone: (args) => {
    arity("IsNone", args, 1);
    return bool(!option("IsNone", args[0]).some);
  },

  Length: (args) => {
    arity("Length", args, 1);
    return num(lengthOf(args[0]));
  },

  /** Appends in place and returns the list. */
  Append: (args) => {
    arity("Append", args, 2);
    const l = listArg("Append", args[0]);
    listAppend(l, args[1]);
    return l;
  },

  /** Stores in place and returns the map. */
  Put: (args) => {
    arity("Put", args, 3);
    const m = mapArg("Put", args[0]);
    mapPut(m, args[1], args[2]);
    return m;
  },

  RemoveAt: (args) => {
    arity("RemoveAt", args, 2);
    return listRemoveAt(listArg("RemoveAt", args[0]), args[1]);
  },

  Keys: (args) => {
    arity("Keys", args, 1);
    return list([...mapArg("Keys", args[0]).entries.keys()].map(str));
  },

  Fast: (args) => {
    arity("Fast", args, 1);
    const v = args[0];
    if (v.tag !== "Number" && v.tag !== "FastNumber") wrongKind("Fast", "a number", v);
    return fast(promote(v));
  },

  WeakRef: (args) => {
    arity("WeakRef", args, 1);
    const target = args[0];
    if (target.tag !== "Instance" && target.tag !== "List" && target.tag !== "Map") {
      throw langError("WeakRefInvalid", { kind: target.tag });
    }
    return { tag: "WeakRef", ref: new WeakRef(target), targetKind: target.tag };
  },

  IsAlive: (args) => {
    arity("IsAlive", args, 1);
    return bool(weakArg("IsAlive", args[0]).ref.deref() !== undefined);
  },

  /** Some(target) while it is alive, None after it has been reclaimed. */
  Upgrade: (args) => {
    arity("Upgrade", args, 1);
    const target = weakArg("Upgrade", args[0]).ref.deref();
    return target ? some(target) : VNone;
  },

  Channel: (args) => {
    arity("Channel", args, 0, 1);
    if (args.length === 0) return { tag: "Channel", channel: createChannel() };
    const capacity = toIndex(args[0]);
    if (capacity < 1) throw typeMismatch(`channel capacity must be at least 1, got ${capacity}`);
    return { tag: "Channel", channel: createChannel(capacity) };
  },

  Send: (args) => {
    arity("Send", args, 2);
    return sendChannel(channelArg("Send", args[0]), args[1]);
  },

  TryReceive: (args) => {
    arity("TryReceive", args, 1);
    return tryReceive(channelArg("TryReceive", args[0]));
  },

  Close: (args) => {
    arity("Close", args, 1);
    closeChannel(channelArg("Close", args[0]));
    return VTrue;
  },

  IsError: (args) => {
    arity("IsError", args, 1);
    return bool(args[0].tag === "Error");
  },

  ErrorKind: (args) => {
    arity("ErrorKind", args, 1);
    return str(errorArg("ErrorKind", args[0]).kind);
  },

  ErrorMessage: (args) => {
    arity("ErrorMessage", args, 1);
    return str(errorArg("ErrorMessage", args[0]).message);
  },

  Text: (args) => {
    arity("Text", args, 1);
    return str(display(args[0]));
  },
};

/**
 * Globals installed for every program: one Native per table entry, plus
 * the `None` value.
 */
export function coreNatives(): Map<string, Val> {
  const globals = new Map<string, Val>();
  for (const [name, fn] of Object.entries(NATIVES)) {
    const native: NativeVal = { tag: "Native", name, fn };
    globals.set(name, native);
  }
  globals.set("None", VNone);
  return globals;
}

export const NATIVE_NAMES: readonly string[] = [...Object.keys(NATIVES), "None"];
