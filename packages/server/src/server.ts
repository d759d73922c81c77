import { createServer, type IncomingHttpHeaders, type IncomingMessage, type Server } from "node:http";
import type { Readable } from "node:stream";
import { UPLOADS_PUBLIC_PATH } from "@lan-board/protocol";
import type { BoardClient } from "./board/connectionRegistry.js";
import type { BoardRateLimits } from "./board/rateLimits.js";
import type { BoardService } from "./board/boardService.js";
import { WS_PATH } from "./board/constants.js";
import { json, text, writeRouteResult, type RouteResult } from "./http.js";
import { describeError, type Log } from "./log.js";
import { handleClearBoard, handleDeleteMessage } from "./routes/control.js";
import { handleUpload } from "./routes/upload.js";
import { handleUploadDownload } from "./routes/uploads.js";
import type { AttachmentStore } from "./storage/attachmentStore.js";
import type { WsGateway } from "./transport/wsGateway.js";
import { getClientIp } from "./util.js";

export type HttpRequest = Readonly<{
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: Readable;
  clientIp: string | undefined;
}>;

export type BoardHttpDeps<C extends BoardClient> = Readonly<{
  board: BoardService<C>;
  attachments: AttachmentStore;
  rateLimits: BoardRateLimits;
  uploadRoot: string;
  maxAttachmentBytes?: number | undefined;
  /** Used by the `GET /` hint when the request carries no Host header. */
  publicAddress: string;
  log: Log;
}>;

const NOT_FOUND = json({ error: "not_found" }, 404);

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function pathSegments(pathname: string): string[] | undefined {
  const segments: string[] = [];
  for (const raw of pathname.split("/")) {
    if (raw.length === 0) continue;
    const decoded = decodeSegment(raw);
    if (decoded === undefined) return undefined;
    segments.push(decoded);
  }
  return segments;
}

/**
 * Maps one HTTP request to its route.
 *
 * Every board route carries the passphrase as its first path segment.
 */
export async function routeRequest<C extends BoardClient>(
  request: HttpRequest,
  deps: BoardHttpDeps<C>,
): Promise<RouteResult> {
  const url = new URL(request.url, "http://localhost");
  const method = request.method.toUpperCase();

  if (url.pathname === "/health") return text("ok");

  if (url.pathname === "/" && method === "GET") {
    const address = request.headers.host ?? deps.publicAddress;
    return text(`Open http://${address}/<passphrase>`);
  }

  if (url.pathname.startsWith(`${UPLOADS_PUBLIC_PATH}/`)) {
    if (method !== "GET") return json({ error: "method_not_allowed" }, 405);
    return handleUploadDownload(deps.uploadRoot, url.pathname);
  }

  const segments = pathSegments(url.pathname);
  if (!segments) return json({ error: "invalid_path" }, 400);

  const [pass, first, second, third, ...rest] = segments;
  if (pass === undefined || rest.length > 0) return NOT_FOUND;

  if (first === "upload" && second === undefined && method === "POST") {
    return handleUpload(
      { pass, headers: request.headers, body: request.body, clientIp: request.clientIp },
      {
        authorize: (candidate) => deps.board.authorize(candidate),
        attachments: deps.attachments,
        rateLimits: deps.rateLimits,
        maxAttachmentBytes: deps.maxAttachmentBytes,
        log: deps.log,
      },
    );
  }

  if (first === "api" && second === "msg" && third !== undefined && method === "DELETE") {
    return handleDeleteMessage(deps.board, pass, third);
  }

  if (first === "api" && second === "clear" && third === undefined && method === "POST") {
    return handleClearBoard(deps.board, pass);
  }

  return NOT_FOUND;
}

export type CreateBoardServerOptions<C extends BoardClient> = BoardHttpDeps<C> &
  Readonly<{ gateway: WsGateway }>;

export function createBoardServer<C extends BoardClient>(options: CreateBoardServerOptions<C>): Server {
  const { gateway, log } = options;

  const handle = async (req: IncomingMessage): Promise<RouteResult> =>
    routeRequest(
      {
        method: req.method ?? "GET",
        url: req.url ?? "/",
        headers: req.headers,
        body: req,
        clientIp: getClientIp(req),
      },
      options,
    );

  const server = createServer((req, res) => {
    void handle(req)
      .then((result) => writeRouteResult(res, result))
      .catch((err: unknown) => {
        log({ type: "http_request_failed", method: req.method, error: describeError(err) });
        if (res.headersSent) {
          res.destroy();
          return;
        }
        return writeRouteResult(res, json({ error: "server_error" }, 500));
      })
      .catch((err: unknown) => {
        log({ type: "http_response_failed", error: describeError(err) });
        res.destroy();
      });
  });

  server.on("upgrade", (req: IncomingMessage, socket, head: Buffer) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== WS_PATH) {
      socket.destroy();
      return;
    }
    gateway.handleUpgrade(req, socket, head);
  });

  return server;
}
