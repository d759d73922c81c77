import { describe, expect, it } from "vitest";
import { BoardRateLimits } from "../src/board/rateLimits.js";

function limits(clock: { now: number }) {
  return new BoardRateLimits(
    {
      messageRate: { windowMs: 1000, maxCount: 2 },
      connectRate: { windowMs: 10_000, maxCount: 1 },
      uploadRate: { windowMs: 5000, maxCount: 1 },
    },
    () => clock.now,
  );
}

describe("BoardRateLimits", () => {
  it("limits messages per connection within a window", () => {
    const clock = { now: 0 };
    const rateLimits = limits(clock);

    expect(rateLimits.checkMessageRateLimit("c1")).toEqual({ allowed: true });
    expect(rateLimits.checkMessageRateLimit("c1")).toEqual({ allowed: true });
    clock.now = 400;
    expect(rateLimits.checkMessageRateLimit("c1")).toEqual({ allowed: false, retryAfterMs: 600 });
    expect(rateLimits.checkMessageRateLimit("c2")).toEqual({ allowed: true });

    clock.now = 1000;
    expect(rateLimits.checkMessageRateLimit("c1")).toEqual({ allowed: true });
  });

  it("starts a fresh window for a forgotten connection", () => {
    const clock = { now: 0 };
    const rateLimits = limits(clock);
    rateLimits.checkMessageRateLimit("c1");
    rateLimits.checkMessageRateLimit("c1");

    rateLimits.forgetConnection("c1");

    expect(rateLimits.checkMessageRateLimit("c1")).toEqual({ allowed: true });
  });

  it("keeps connect and upload budgets separate per address", () => {
    const clock = { now: 0 };
    const rateLimits = limits(clock);

    expect(rateLimits.checkConnectRateLimit("10.0.0.7")).toEqual({ allowed: true });
    expect(rateLimits.checkUploadRateLimit("10.0.0.7")).toEqual({ allowed: true });
    clock.now = 2500;
    expect(rateLimits.checkConnectRateLimit("10.0.0.7")).toEqual({ allowed: false, retryAfterMs: 7500 });
    expect(rateLimits.checkUploadRateLimit("10.0.0.7")).toEqual({ allowed: false, retryAfterMs: 2500 });
    expect(rateLimits.checkConnectRateLimit("10.0.0.8")).toEqual({ allowed: true });
  });
});
