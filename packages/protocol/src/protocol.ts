import { z } from "zod";
import { MessageIdSchema } from "./identifiers.js";

// Invariant: these caps are the single source of truth for admission truncation.
// Server admission and any client UI MUST stay consistent with these values.
export const SENDER_MAX_LEN = 30 as const;
export const TEXT_MAX_LEN = 5000 as const;
export const ATTACHMENT_NAME_MAX_LEN = 120 as const;

export const UPLOADS_PUBLIC_PATH = "/uploads" as const;

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".webp", ".bmp"] as const;

export const AttachmentKindSchema = z.enum(["image", "file"]);
export type AttachmentKind = z.infer<typeof AttachmentKindSchema>;

export const AttachmentSchema = z.object({
  url: z.string().startsWith(`${UPLOADS_PUBLIC_PATH}/`),
  name: z.string().max(ATTACHMENT_NAME_MAX_LEN),
  size: z.number().int().nonnegative(),
  kind: AttachmentKindSchema,
});
export type Attachment = z.infer<typeof AttachmentSchema>;

export const MessageSchema = z.object({
  id: MessageIdSchema,
  ts: z.number().int().nonnegative(),
  sender: z.string().max(SENDER_MAX_LEN),
  text: z.string().max(TEXT_MAX_LEN),
  attachments: z.array(AttachmentSchema),
});
export type Message = z.infer<typeof MessageSchema>;

function numberishPreprocess(value: unknown): unknown {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    return Number(trimmed);
  }
  return value;
}

/**
 * Attachment metadata as declared by a client when it submits a message.
 *
 * Nothing here is trusted: admission normalizes the url, re-checks the size against the
 * configured maximum and coerces an unknown kind to `file`.
 */
export const AttachmentInputSchema = z.object({
  url: z.string(),
  name: z.unknown().optional(),
  size: z.preprocess(numberishPreprocess, z.number().int()).optional(),
  kind: z.unknown().optional(),
});

export const ClientMessageSendSchema = z.object({
  type: z.literal("msg"),
  pass: z.string(),
  sender: z.string().optional(),
  text: z.string().optional(),
  // Items are validated one by one at admission so a bad attachment drops alone.
  attachments: z.array(z.unknown()).nullish(),
});
export type ClientMessageSend = z.infer<typeof ClientMessageSendSchema>;

export const ClientEventSchema = z.discriminatedUnion("type", [ClientMessageSendSchema]);
export type ClientEvent = z.infer<typeof ClientEventSchema>;

export const ServerHistorySchema = z.object({
  type: z.literal("history"),
  items: z.array(MessageSchema),
});

export const ServerMessageNewSchema = z.object({
  type: z.literal("msg"),
  item: MessageSchema,
});

export const ServerMessageDeletedSchema = z.object({
  type: z.literal("delete"),
  id: MessageIdSchema,
});

export const ServerBoardClearedSchema = z.object({
  type: z.literal("clear"),
});

export const ServerErrorSchema = z.object({
  type: z.literal("error"),
  message: z.string().min(1),
});

export const ServerEventSchema = z.discriminatedUnion("type", [
  ServerHistorySchema,
  ServerMessageNewSchema,
  ServerMessageDeletedSchema,
  ServerBoardClearedSchema,
  ServerErrorSchema,
]);
export type ServerEvent = z.infer<typeof ServerEventSchema>;

export const UploadResponseSchema = AttachmentSchema;

export const WsHandshakeRejectionSchema = z.object({
  code: z.enum(["rate_limited"]),
  message: z.string().min(1).optional(),
  retryAfterMs: z.number().int().nonnegative().optional(),
});
export type WsHandshakeRejection = z.infer<typeof WsHandshakeRejectionSchema>;
