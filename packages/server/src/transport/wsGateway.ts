import { randomUUID } from "node:crypto";
import { STATUS_CODES, type IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { WsHandshakeRejection } from "@lan-board/protocol";
import type { BoardRateLimits } from "../board/rateLimits.js";
import type { BoardService } from "../board/boardService.js";
import { WS_MAX_INBOUND_MESSAGE_BYTES } from "../board/constants.js";
import type { TransportConfig } from "../config.js";
import { describeError, type Log } from "../log.js";
import { getClientIp } from "../util.js";
import { BoardSession } from "./boardSession.js";
import { HeartbeatMonitor } from "./wsHeartbeat.js";

export const WS_PASS_QUERY_PARAM = "pass_";

export type WsGatewayOptions = Readonly<{
  board: BoardService<WebSocket>;
  rateLimits: BoardRateLimits;
  transport: Pick<TransportConfig, "pingIntervalMs" | "pongTimeoutMs">;
  log: Log;
}>;

export type WsGateway = Readonly<{
  handleUpgrade: (request: IncomingMessage, socket: Duplex, head: Buffer) => void;
  close: () => Promise<void>;
}>;

export function rawDataToUtf8(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");

  // NOTE: ws@8 raw data is a discriminated union. This is kept as a safeguard
  // in case future versions widen the type.
  const unreachable: never = data;
  throw new Error(`Unexpected ws message payload: ${String(unreachable)}`);
}

function rejectUpgrade(
  socket: Duplex,
  status: number,
  body: string,
  headers: Record<string, string> = {},
): void {
  const lines = [
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ""}`,
    "Connection: close",
    `Content-Length: ${Buffer.byteLength(body)}`,
    ...Object.entries(headers).map(([name, value]) => `${name}: ${value}`),
  ];
  socket.end(`${lines.join("\r\n")}\r\n\r\n${body}`);
}

function rejectUpgradeJson(
  socket: Duplex,
  payload: WsHandshakeRejection,
  init: { status: number; headers?: Record<string, string> },
): void {
  rejectUpgrade(socket, init.status, JSON.stringify(payload), {
    "Content-Type": "application/json; charset=utf-8",
    ...(init.headers ?? {}),
  });
}

/**
 * Accepts `/ws?pass_=<passphrase>` upgrades and wires each socket to the board.
 *
 * Handshake order: connect rate limit (429), then passphrase (403). Accepted sockets are
 * bootstrapped with the history before they can take part in anything else.
 */
export function createWsGateway(options: WsGatewayOptions): WsGateway {
  const { board, rateLimits, log } = options;
  const wss = new WebSocketServer({ noServer: true, maxPayload: WS_MAX_INBOUND_MESSAGE_BYTES });
  const heartbeat = new HeartbeatMonitor<WebSocket>({
    pingIntervalMs: options.transport.pingIntervalMs,
    pongTimeoutMs: options.transport.pongTimeoutMs,
    onUnresponsive: ({ socket, connectionId, reason, silentMs }) => {
      log({ type: "ws_unresponsive", connectionId, reason, silentMs });
      board.evictClient(socket, reason);
    },
  });

  const onConnection = (ws: WebSocket, pass: string, clientIp: string | undefined) => {
    const connectionId = randomUUID();
    const session = new BoardSession({ board, client: ws, connectionId, rateLimits, log });
    heartbeat.track(ws, connectionId);

    ws.on("message", (data) => {
      void session.handleMessage(rawDataToUtf8(data)).catch((err: unknown) => {
        log({ type: "ws_message_failed", connectionId, error: describeError(err) });
      });
    });
    ws.on("close", (code) => {
      heartbeat.untrack(ws);
      board.disconnectClient(ws);
      rateLimits.forgetConnection(connectionId);
      log({ type: "ws_disconnected", connectionId, code });
    });
    ws.on("error", (err) => {
      log({ type: "ws_error", connectionId, error: describeError(err) });
    });

    void board
      .bootstrapClient(pass, ws)
      .then((result) => {
        if (!result.ok) {
          ws.close(1008, "forbidden");
          return;
        }
        log({ type: "ws_connected", connectionId, clientIp, delivered: result.delivered });
      })
      .catch((err: unknown) => {
        log({ type: "ws_bootstrap_failed", connectionId, error: describeError(err) });
        ws.terminate();
      });
  };

  const handleUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const clientIp = getClientIp(request);
    if (clientIp) {
      const rateCheck = rateLimits.checkConnectRateLimit(clientIp);
      if (!rateCheck.allowed) {
        log({ type: "ws_connect_rate_limited", retryAfterMs: rateCheck.retryAfterMs });
        rejectUpgradeJson(
          socket,
          {
            code: "rate_limited",
            message: "Too many connection attempts",
            retryAfterMs: rateCheck.retryAfterMs,
          } satisfies WsHandshakeRejection,
          {
            status: 429,
            headers: { "Retry-After": String(Math.ceil(rateCheck.retryAfterMs / 1000)) },
          },
        );
        return;
      }
    }

    const url = new URL(request.url ?? "/", "http://localhost");
    const pass = url.searchParams.get(WS_PASS_QUERY_PARAM);
    if (!board.authorize(pass)) {
      log({ type: "ws_connect_forbidden" });
      rejectUpgrade(socket, 403, "Forbidden");
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => onConnection(ws, pass ?? "", clientIp));
  };

  const close = () =>
    new Promise<void>((resolve, reject) => {
      heartbeat.stop();
      for (const client of wss.clients) client.terminate();
      wss.close((err) => (err ? reject(err) : resolve()));
    });

  return { handleUpgrade, close };
}
