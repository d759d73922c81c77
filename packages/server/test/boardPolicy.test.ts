import { describe, expect, it } from "vitest";
import { MessageIdSchema, type Message } from "@lan-board/protocol";
import {
  appendHistory,
  createMessage,
  nextFixedWindowRateLimit,
  removeFromHistory,
  truncateText,
} from "../src/policy/boardPolicy.js";

function makeMessage(id: string): Message {
  return createMessage({
    id: MessageIdSchema.parse(id),
    ts: 1_700_000_000_000,
    sender: "PC",
    text: "hello",
    attachments: [],
  });
}

describe("boardPolicy", () => {
  it("enforces fixed window rate limits deterministically", () => {
    const opts = { windowMs: 1000, maxCount: 2 };

    const r1 = nextFixedWindowRateLimit(undefined, 0, opts);
    expect(r1.allowed).toBe(true);
    expect(r1.nextWindow).toEqual({ windowStartMs: 0, count: 1 });

    const r2 = nextFixedWindowRateLimit(r1.nextWindow, 500, opts);
    expect(r2.allowed).toBe(true);
    expect(r2.nextWindow).toEqual({ windowStartMs: 0, count: 2 });

    const r3 = nextFixedWindowRateLimit(r2.nextWindow, 900, opts);
    expect(r3.allowed).toBe(false);
    if (!r3.allowed) expect(r3.retryAfterMs).toBe(100);
    expect(r3.nextWindow).toEqual({ windowStartMs: 0, count: 2 });

    const r4 = nextFixedWindowRateLimit(r3.nextWindow, 1000, opts);
    expect(r4.allowed).toBe(true);
    expect(r4.nextWindow).toEqual({ windowStartMs: 1000, count: 1 });
  });

  it("appends history and evicts the oldest past the limit", () => {
    const m1 = makeMessage("m1");
    const m2 = makeMessage("m2");
    const m3 = makeMessage("m3");

    const h1 = appendHistory([], m1, 2);
    const h2 = appendHistory(h1, m2, 2);
    const h3 = appendHistory(h2, m3, 2);

    expect(h1).toEqual([m1]);
    expect(h2).toEqual([m1, m2]);
    expect(h3).toEqual([m2, m3]);
  });

  it("never grows past the limit over many appends", () => {
    let history: Message[] = [];
    for (let i = 0; i < 25; i += 1) {
      history = appendHistory(history, makeMessage(`m${i}`), 7);
      expect(history.length).toBeLessThanOrEqual(7);
    }
    expect(history.map((m) => m.id)).toEqual(["m18", "m19", "m20", "m21", "m22", "m23", "m24"]);
  });

  it("removes a message by id", () => {
    const m1 = makeMessage("m1");
    const m2 = makeMessage("m2");

    const removed = removeFromHistory([m1, m2], MessageIdSchema.parse("m1"));
    expect(removed).toEqual({ history: [m2], removed: m1 });

    const missing = removeFromHistory([m2], MessageIdSchema.parse("m1"));
    expect(missing.removed).toBeUndefined();
    expect(missing.history).toEqual([m2]);
  });

  it("truncates without splitting a surrogate pair", () => {
    expect(truncateText("abcdef", 3)).toBe("abc");
    expect(truncateText("ab", 3)).toBe("ab");
    expect(truncateText("ab\u{1F600}", 3)).toBe("ab");
  });

  it("creates messages with capped sender and text", () => {
    const message = createMessage({
      id: MessageIdSchema.parse("m1"),
      ts: 5,
      sender: "x".repeat(40),
      text: undefined,
      attachments: [],
    });

    expect(message).toEqual({ id: "m1", ts: 5, sender: "x".repeat(30), text: "", attachments: [] });
  });
});
