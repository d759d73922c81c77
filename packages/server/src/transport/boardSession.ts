import { z } from "zod";
import { ClientEventSchema, type ClientEvent } from "@lan-board/protocol";
import type { BoardRateLimits } from "../board/rateLimits.js";
import type { BoardService } from "../board/boardService.js";
import type { BoardClient } from "../board/connectionRegistry.js";
import { WS_MAX_CONSECUTIVE_INVALID_PAYLOADS } from "../board/constants.js";
import type { Log } from "../log.js";

export type SessionClient = BoardClient & {
  close(code: number, reason: string): void;
};

export type BoardSessionOptions<C extends SessionClient> = Readonly<{
  board: BoardService<C>;
  client: C;
  connectionId: string;
  rateLimits: BoardRateLimits;
  log: Log;
}>;

export const SESSION_ERROR_MESSAGES = {
  invalidJson: "Invalid JSON",
  invalidMessage: "Invalid message",
  forbidden: "Forbidden",
  rateLimited: "Too many messages",
  notSaved: "Message was sent but could not be saved",
} as const;

const EventTypeSchema = z.object({ type: z.unknown() });

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function assertNever(_value: never): never {
  throw new Error("unreachable");
}

/**
 * Inbound side of one WebSocket connection.
 *
 * Events with an unknown `type` are ignored. Malformed frames get an `error` reply and count as
 * a strike; enough consecutive strikes close the socket with 1008.
 */
export class BoardSession<C extends SessionClient> {
  private invalidPayloadStrikes = 0;

  constructor(private readonly options: BoardSessionOptions<C>) {}

  async handleMessage(text: string): Promise<void> {
    const json = parseJson(text);
    if (!json.ok) {
      await this.handleInvalidPayload(SESSION_ERROR_MESSAGES.invalidJson);
      return;
    }

    const typed = EventTypeSchema.safeParse(json.value);
    if (!typed.success || typed.data.type !== "msg") return;

    const parsed = ClientEventSchema.safeParse(json.value);
    if (!parsed.success) {
      await this.handleInvalidPayload(SESSION_ERROR_MESSAGES.invalidMessage);
      return;
    }

    this.invalidPayloadStrikes = 0;
    await this.dispatch(parsed.data);
  }

  private async dispatch(event: ClientEvent): Promise<void> {
    switch (event.type) {
      case "msg": {
        const rateCheck = this.options.rateLimits.checkMessageRateLimit(this.options.connectionId);
        if (!rateCheck.allowed) {
          this.options.log({ type: "board_rate_limited", retryAfterMs: rateCheck.retryAfterMs });
          await this.sendError(SESSION_ERROR_MESSAGES.rateLimited);
          return;
        }

        const result = await this.options.board.admitMessage(event);
        if (!result.ok) {
          this.options.log({ type: "message_forbidden" });
          await this.sendError(SESSION_ERROR_MESSAGES.forbidden);
          return;
        }
        if (!result.durable) await this.sendError(SESSION_ERROR_MESSAGES.notSaved);
        return;
      }
      default: {
        return assertNever(event.type);
      }
    }
  }

  private async sendError(message: string): Promise<void> {
    await this.options.board.reply(this.options.client, { type: "error", message });
  }

  private async handleInvalidPayload(message: string): Promise<void> {
    this.invalidPayloadStrikes += 1;
    await this.sendError(message);

    if (this.invalidPayloadStrikes >= WS_MAX_CONSECUTIVE_INVALID_PAYLOADS) {
      this.options.log({ type: "ws_invalid_payload_close", strikes: this.invalidPayloadStrikes });
      this.options.client.close(1008, "invalid_payload");
    }
  }
}
