import type { Attachment, Message, MessageId } from "@lan-board/protocol";
import { SENDER_MAX_LEN, TEXT_MAX_LEN } from "@lan-board/protocol";
import type { RateWindow } from "../util.js";

export type RateLimitDecision =
  | { allowed: true; nextWindow: RateWindow }
  | { allowed: false; retryAfterMs: number; nextWindow: RateWindow };

export function nextFixedWindowRateLimit(
  previous: RateWindow | undefined,
  nowMs: number,
  options: { windowMs: number; maxCount: number },
): RateLimitDecision {
  const window = previous;

  if (!window || nowMs - window.windowStartMs >= options.windowMs) {
    return { allowed: true, nextWindow: { windowStartMs: nowMs, count: 1 } };
  }

  if (window.count >= options.maxCount) {
    const retryAfterMs = Math.max(0, options.windowMs - (nowMs - window.windowStartMs));
    return { allowed: false, retryAfterMs, nextWindow: window };
  }

  return {
    allowed: true,
    nextWindow: { windowStartMs: window.windowStartMs, count: window.count + 1 },
  };
}

export function appendHistory(history: Message[], message: Message, limit: number): Message[] {
  return [...history, message].slice(-limit);
}

export function removeFromHistory(
  history: Message[],
  id: MessageId,
): { history: Message[]; removed: Message | undefined } {
  const index = history.findIndex((m) => m.id === id);
  if (index < 0) return { history, removed: undefined };
  return { history: [...history.slice(0, index), ...history.slice(index + 1)], removed: history[index] };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

// Truncates to `maxLen` UTF-16 code units without leaving half of a surrogate pair behind.
export function truncateText(value: string, maxLen: number): string {
  if (value.length <= maxLen) return value;
  const cut = value.slice(0, maxLen);
  return isHighSurrogate(cut.charCodeAt(cut.length - 1)) ? cut.slice(0, -1) : cut;
}

export function createMessage(options: {
  id: MessageId;
  ts: number;
  sender: string | undefined;
  text: string | undefined;
  attachments: Attachment[];
}): Message {
  return {
    id: options.id,
    ts: options.ts,
    sender: truncateText(options.sender ?? "", SENDER_MAX_LEN),
    text: truncateText(options.text ?? "", TEXT_MAX_LEN),
    attachments: options.attachments,
  };
}
