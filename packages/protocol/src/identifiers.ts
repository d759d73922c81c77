import { z } from "zod";

const MESSAGE_ID_RE = /^[A-Za-z0-9_-]+$/;
const UPLOAD_DAY_RE = /^[0-9]{4}-[0-9]{2}-[0-9]{2}$/;

// Invariant: message ids are assigned by the server and are opaque to clients.
// Ids are branded so a raw path segment cannot be passed where an id is expected without parsing.
export const MessageIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(MESSAGE_ID_RE, { message: "Expected message id token" })
  .brand<"MessageId">();
export type MessageId = z.infer<typeof MessageIdSchema>;

export function messageIdFromUuid(uuid: string): MessageId {
  return MessageIdSchema.parse(uuid.replace(/-/g, "").toLowerCase());
}

// Upload buckets are calendar days: YYYY-MM-DD.
export const UploadDaySchema = z
  .string()
  .regex(UPLOAD_DAY_RE, { message: "Expected YYYY-MM-DD" })
  .brand<"UploadDay">();
export type UploadDay = z.infer<typeof UploadDaySchema>;

export function uploadDayOf(date: Date): UploadDay {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return UploadDaySchema.parse(`${year}-${month}-${day}`);
}
