import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { extname } from "node:path";
import { errorCode } from "../log.js";
import { json, type RouteResult } from "../http.js";
import { resolveUploadPath } from "../storage/pathGuard.js";

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".txt": "text/plain; charset=utf-8",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".mp4": "video/mp4",
  ".mp3": "audio/mpeg",
};

const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

const NOT_FOUND = json({ error: "not_found" }, 404);

/** `GET /uploads/<day>/<file>` */
export async function handleUploadDownload(uploadRoot: string, pathname: string): Promise<RouteResult> {
  const local = resolveUploadPath(uploadRoot, pathname);
  if (!local) return NOT_FOUND;

  let size: number;
  try {
    const info = await stat(local);
    if (!info.isFile()) return NOT_FOUND;
    size = info.size;
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return NOT_FOUND;
    throw err;
  }

  return {
    kind: "stream",
    status: 200,
    headers: {
      "content-type": contentTypeFor(local),
      "content-length": String(size),
      "cache-control": "private, max-age=3600",
    },
    stream: createReadStream(local),
  };
}
