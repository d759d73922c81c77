import { extname } from "node:path";
import {
  ATTACHMENT_NAME_MAX_LEN,
  AttachmentInputSchema,
  IMAGE_EXTENSIONS,
  type Attachment,
  type AttachmentKind,
} from "@lan-board/protocol";
import { isStoreRootedUrl, normalizeUploadUrl } from "../storage/pathGuard.js";
import { truncateText } from "./boardPolicy.js";

const SAFE_EXTENSION_RE = /^\.[a-z0-9]{1,10}$/;
const IMAGE_EXTENSION_SET: ReadonlySet<string> = new Set(IMAGE_EXTENSIONS);
const DEFAULT_ATTACHMENT_NAME = "file";

/** Lower-cased extension of `filename` when it passes the allow-pattern, else "". */
export function safeExtension(filename: string): string {
  const ext = extname(filename).toLowerCase();
  return SAFE_EXTENSION_RE.test(ext) ? ext : "";
}

export function attachmentKindForName(filename: string): AttachmentKind {
  return IMAGE_EXTENSION_SET.has(extname(filename).toLowerCase()) ? "image" : "file";
}

function attachmentName(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (raw === undefined || raw === null) return DEFAULT_ATTACHMENT_NAME;
  return String(raw);
}

export type AttachmentAdmissionPolicy = Readonly<{
  /** Undefined or 0 admits any size. */
  maxAttachmentBytes?: number | undefined;
}>;

export type AttachmentRejection = "invalid_shape" | "not_store_rooted" | "negative_size" | "too_large";

export function admitAttachment(
  raw: unknown,
  policy: AttachmentAdmissionPolicy,
): { ok: true; attachment: Attachment } | { ok: false; reason: AttachmentRejection } {
  const parsed = AttachmentInputSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, reason: "invalid_shape" };

  const url = normalizeUploadUrl(parsed.data.url);
  if (!isStoreRootedUrl(url)) return { ok: false, reason: "not_store_rooted" };

  const size = parsed.data.size ?? 0;
  if (size < 0) return { ok: false, reason: "negative_size" };

  const maxBytes = policy.maxAttachmentBytes;
  if (maxBytes && size > maxBytes) return { ok: false, reason: "too_large" };

  const kind: AttachmentKind = parsed.data.kind === "image" ? "image" : "file";
  const name = truncateText(attachmentName(parsed.data.name), ATTACHMENT_NAME_MAX_LEN);

  return { ok: true, attachment: { url, name, size, kind } };
}

/**
 * Re-validates client-declared attachments at admission time.
 *
 * Failing items are dropped; the rest keep their order.
 */
export function admitAttachments(
  items: ReadonlyArray<unknown> | null | undefined,
  policy: AttachmentAdmissionPolicy,
): { admitted: Attachment[]; dropped: AttachmentRejection[] } {
  const admitted: Attachment[] = [];
  const dropped: AttachmentRejection[] = [];
  for (const item of items ?? []) {
    const result = admitAttachment(item, policy);
    if (result.ok) admitted.push(result.attachment);
    else dropped.push(result.reason);
  }
  return { admitted, dropped };
}
