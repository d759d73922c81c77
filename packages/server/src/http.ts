import type { ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

export type RouteResult =
  | { kind: "body"; status: number; headers: Record<string, string>; body: string }
  | { kind: "stream"; status: number; headers: Record<string, string>; stream: Readable };

export function json(data: unknown, status = 200, headers?: Record<string, string>): RouteResult {
  return {
    kind: "body",
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
      ...headers,
    },
    body: JSON.stringify(data),
  };
}

export function text(body: string, status = 200): RouteResult {
  return { kind: "body", status, headers: { "content-type": "text/plain; charset=utf-8" }, body };
}

export async function writeRouteResult(res: ServerResponse, result: RouteResult): Promise<void> {
  if (result.kind === "body") {
    res.writeHead(result.status, {
      ...result.headers,
      "content-length": String(Buffer.byteLength(result.body)),
    });
    res.end(result.body);
    return;
  }

  res.writeHead(result.status, result.headers);
  await pipeline(result.stream, res);
}
