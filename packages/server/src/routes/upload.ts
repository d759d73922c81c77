import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import busboy from "busboy";
import type { BoardRateLimits } from "../board/rateLimits.js";
import { describeError, type Log } from "../log.js";
import { json, type RouteResult } from "../http.js";
import type { AttachmentStore } from "../storage/attachmentStore.js";

export type UploadRouteDeps = Readonly<{
  authorize: (pass: string) => boolean;
  attachments: AttachmentStore;
  rateLimits: BoardRateLimits;
  /** Undefined means no size cap. */
  maxAttachmentBytes?: number | undefined;
  log: Log;
}>;

export type UploadRequest = Readonly<{
  pass: string;
  headers: IncomingHttpHeaders;
  body: Readable;
  clientIp: string | undefined;
}>;

type SaveOutcome = { ok: true; result: RouteResult } | { ok: false; cause: unknown };

/**
 * `POST /:pass/upload`: stores the first file part of a multipart body.
 *
 * Only the stored file's metadata comes back; a message that references it is a separate step.
 */
export async function handleUpload(request: UploadRequest, deps: UploadRouteDeps): Promise<RouteResult> {
  if (request.clientIp) {
    const rateCheck = deps.rateLimits.checkUploadRateLimit(request.clientIp);
    if (!rateCheck.allowed) {
      deps.log({ type: "upload_rate_limited", retryAfterMs: rateCheck.retryAfterMs });
      return json({ error: "rate_limited", retryAfterMs: rateCheck.retryAfterMs }, 429, {
        "retry-after": String(Math.ceil(rateCheck.retryAfterMs / 1000)),
      });
    }
  }

  if (!deps.authorize(request.pass)) return json({ error: "forbidden" }, 403);

  const maxBytes = deps.maxAttachmentBytes;
  let parser: busboy.Busboy;
  try {
    parser = busboy({
      headers: request.headers,
      defParamCharset: "utf8",
      limits: { files: 1, ...(maxBytes ? { fileSize: maxBytes } : {}) },
    });
  } catch (err: unknown) {
    deps.log({ type: "upload_rejected", reason: "not_multipart", error: describeError(err) });
    return json({ error: "not_multipart" }, 400);
  }

  // `limits.files` is 1, so busboy emits at most one file part.
  const firstFile: { saving?: Promise<SaveOutcome>; abortedBySave?: boolean } = {};

  const storeFile = async (
    name: string,
    file: Readable,
    wasTruncated: () => boolean,
  ): Promise<SaveOutcome> => {
    try {
      const attachment = await deps.attachments.save(name, file);
      if (!wasTruncated()) return { ok: true, result: json(attachment) };

      await deps.attachments.deleteByUrl(attachment.url);
      deps.log({ type: "upload_rejected", reason: "too_large", maxBytes });
      return { ok: true, result: json({ error: "file_too_large", maxBytes }, 413) };
    } catch (cause: unknown) {
      // busboy finishes only once every file stream has ended.
      if (!file.destroyed) {
        file.resume();
      } else if (!parser.destroyed) {
        firstFile.abortedBySave = true;
        parser.destroy(cause instanceof Error ? cause : new Error(String(cause)));
      }
      return { ok: false, cause };
    }
  };

  parser.on("file", (_field, file, info) => {
    let truncated = false;
    file.on("limit", () => {
      truncated = true;
    });
    // Undefined for an octet-stream part without a filename; the store names it "file".
    firstFile.saving = storeFile(info.filename ?? "", file, () => truncated);
  });

  try {
    await pipeline(request.body, parser);
  } catch (err: unknown) {
    // Wait for the store to remove whatever it had written so far.
    if (firstFile.saving) {
      const outcome = await firstFile.saving;
      if (!outcome.ok && firstFile.abortedBySave) throw outcome.cause;
    }
    deps.log({ type: "upload_rejected", reason: "malformed_body", error: describeError(err) });
    return json({ error: "malformed_body" }, 400);
  }

  if (!firstFile.saving) return json({ error: "missing_file" }, 400);

  const outcome = await firstFile.saving;
  if (!outcome.ok) throw outcome.cause;
  return outcome.result;
}
