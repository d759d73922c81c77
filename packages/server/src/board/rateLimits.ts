import type { BoardGuardrails, FixedWindowRateLimit } from "../config.js";
import { nextFixedWindowRateLimit } from "../policy/boardPolicy.js";
import {
  boundFixedWindowRateLimitStore,
  touchRateLimitKey,
  type RateLimitCheck,
  type RateWindow,
} from "../util.js";
import { BOARD_RATE_LIMIT_MAX_TRACKED_KEYS } from "./constants.js";

export class BoardRateLimits {
  private readonly messageRateByConnection = new Map<string, RateWindow>();
  private readonly connectRateByIp = new Map<string, RateWindow>();
  private readonly uploadRateByIp = new Map<string, RateWindow>();

  constructor(
    private readonly config: Pick<BoardGuardrails, "messageRate" | "connectRate" | "uploadRate">,
    private readonly nowMs: () => number = () => Date.now(),
  ) {}

  checkMessageRateLimit(connectionId: string): RateLimitCheck {
    return this.check(this.messageRateByConnection, connectionId, this.config.messageRate);
  }

  checkConnectRateLimit(clientIp: string): RateLimitCheck {
    return this.check(this.connectRateByIp, clientIp, this.config.connectRate);
  }

  checkUploadRateLimit(clientIp: string): RateLimitCheck {
    return this.check(this.uploadRateByIp, clientIp, this.config.uploadRate);
  }

  forgetConnection(connectionId: string): void {
    this.messageRateByConnection.delete(connectionId);
  }

  private check(
    store: Map<string, RateWindow>,
    key: string,
    limit: FixedWindowRateLimit,
  ): RateLimitCheck {
    const nowMs = this.nowMs();
    boundFixedWindowRateLimitStore(store, nowMs, {
      windowMs: limit.windowMs,
      maxTrackedKeys: BOARD_RATE_LIMIT_MAX_TRACKED_KEYS,
    });
    const decision = nextFixedWindowRateLimit(store.get(key), nowMs, limit);

    touchRateLimitKey(store, key, decision.nextWindow);
    return decision.allowed
      ? { allowed: true }
      : { allowed: false, retryAfterMs: decision.retryAfterMs };
  }
}
