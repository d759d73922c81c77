import { createHash, timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

export type RateWindow = {
  windowStartMs: number;
  count: number;
};

export type RateLimitCheck = { allowed: true } | { allowed: false; retryAfterMs: number };

export function touchRateLimitKey<K extends string>(
  store: Map<K, RateWindow>,
  key: K,
  value: RateWindow,
): void {
  // Invariant: Map iteration order is treated as LRU (oldest-first) for pruning/eviction.
  // Touching a key MUST move it to the end so expired windows cluster at the front.
  store.delete(key);
  store.set(key, value);
}

export function pruneExpiredFixedWindowEntries<K extends string>(
  store: Map<K, RateWindow>,
  nowMs: number,
  windowMs: number,
): void {
  for (const [key, window] of store) {
    if (nowMs - window.windowStartMs < windowMs) return;
    store.delete(key);
  }
}

export function evictOldestEntries<K extends string>(
  store: Map<K, RateWindow>,
  maxTrackedKeys: number,
): void {
  if (maxTrackedKeys <= 0) {
    store.clear();
    return;
  }

  const overflow = store.size - maxTrackedKeys;
  if (overflow <= 0) return;

  let evicted = 0;
  const keysToDelete: K[] = [];
  for (const key of store.keys()) {
    keysToDelete.push(key);
    evicted += 1;
    if (evicted >= overflow) break;
  }
  for (const key of keysToDelete) store.delete(key);
}

export function boundFixedWindowRateLimitStore<K extends string>(
  store: Map<K, RateWindow>,
  nowMs: number,
  options: { windowMs: number; maxTrackedKeys: number },
): void {
  pruneExpiredFixedWindowEntries(store, nowMs, options.windowMs);
  evictOldestEntries(store, options.maxTrackedKeys);
}

export function getClientIp(request: {
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string | undefined };
}): string | undefined {
  const forwardedFor = request.headers["x-forwarded-for"];
  const forwarded = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }

  return request.socket.remoteAddress || undefined;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

// Both sides are hashed first so the comparison time does not depend on the candidate length.
export function passphraseMatches(expected: string, candidate: string | null | undefined): boolean {
  if (typeof candidate !== "string") return false;
  return timingSafeEqual(digest(expected), digest(candidate));
}
