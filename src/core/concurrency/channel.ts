// src/core/concurrency/channel.ts
// FIFO message channels. Send never blocks; Receive suspends the fiber.

import type { Val } from "../values/values";
import type { ChannelState, Resumption } from "./types";
import { VFalse, VNone, VTrue, some } from "../values/values";
import { langError } from "../errors/errors";

let nextChannelId = 1;

export function createChannel(capacity: number | null = null): ChannelState {
  return { id: nextChannelId++, capacity, buffer: [], closed: false, receivers: [] };
}

/**
 * Deliver a message. A waiting receiver takes it directly; otherwise it
 * is buffered. Returns False when a bounded channel is full.
 */
export function sendChannel(channel: ChannelState, value: Val): Val {
  if (channel.closed) throw langError("ChannelClosed");

  for (let wake = channel.receivers.shift(); wake; wake = channel.receivers.shift()) {
    if (wake({ tag: "value", value })) return VTrue;
  }

  if (channel.capacity !== null && channel.buffer.length >= channel.capacity) {
    return VFalse;
  }
  channel.buffer.push(value);
  return VTrue;
}

/**
 * Non-suspending receive attempt.
 * - `message`: a buffered value was taken
 * - `closed`: closed and drained
 * - `empty`: the caller has to wait
 */
export type ReceiveAttempt = { tag: "message"; value: Val } | { tag: "closed" } | { tag: "empty" };

export function pollChannel(channel: ChannelState): ReceiveAttempt {
  const value = channel.buffer.shift();
  if (value !== undefined) return { tag: "message", value };
  return channel.closed ? { tag: "closed" } : { tag: "empty" };
}

/** `TryReceive`: Some(message), or None when nothing is buffered. Never suspends. */
export function tryReceive(channel: ChannelState): Val {
  const attempt = pollChannel(channel);
  return attempt.tag === "message" ? some(attempt.value) : VNone;
}

/** Close the channel and fail every waiting receiver with ChannelClosed. */
export function closeChannel(channel: ChannelState): void {
  if (channel.closed) return;
  channel.closed = true;
  const waiting = channel.receivers.splice(0);
  const closed: Resumption = { tag: "error", error: langError("ChannelClosed") };
  for (const wake of waiting) wake(closed);
}
