import { randomUUID } from "node:crypto";
import { relative, sep } from "node:path";
import type { Readable } from "node:stream";
import {
  ATTACHMENT_NAME_MAX_LEN,
  uploadDayOf,
  type Attachment,
} from "@lan-board/protocol";
import { describeError, type Log } from "../log.js";
import { attachmentKindForName, safeExtension } from "../policy/attachmentPolicy.js";
import { truncateText } from "../policy/boardPolicy.js";
import { resolveUploadPath, uploadUrlFor } from "./pathGuard.js";
import type { StoredFile, UploadStorage } from "./uploadStorage.js";

const DEFAULT_UPLOAD_NAME = "file";

export type AttachmentStoreOptions = Readonly<{
  storage: UploadStorage;
  log: Log;
  now?: () => Date;
  createFileId?: () => string;
}>;

/**
 * Owns the physical files behind attachments.
 *
 * Layout: `<root>/<YYYY-MM-DD>/<file id><ext>`, published as `/uploads/<YYYY-MM-DD>/<file id><ext>`.
 * Files are removed only by `deleteByUrl` (message delete), `purgeAll` (clear) and
 * `sweepExpired` (retention).
 */
export class AttachmentStore {
  private readonly storage: UploadStorage;
  private readonly log: Log;
  private readonly now: () => Date;
  private readonly createFileId: () => string;

  constructor(options: AttachmentStoreOptions) {
    this.storage = options.storage;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.createFileId = options.createFileId ?? (() => randomUUID().replace(/-/g, ""));
  }

  async save(originalName: string, source: Readable): Promise<Attachment> {
    const name = originalName.trim() || DEFAULT_UPLOAD_NAME;
    const relativePath = `${uploadDayOf(this.now())}/${this.createFileId()}${safeExtension(name)}`;

    const { size } = await this.storage.write(relativePath, source);

    return {
      url: uploadUrlFor(relativePath),
      name: truncateText(name, ATTACHMENT_NAME_MAX_LEN),
      size,
      kind: attachmentKindForName(name),
    };
  }

  async deleteByUrl(url: string): Promise<boolean> {
    const local = resolveUploadPath(this.storage.root, url);
    if (!local) return false;
    return this.storage.remove(relative(this.storage.root, local).split(sep).join("/"));
  }

  async purgeAll(): Promise<number> {
    const files = await this.storage.list();
    const removed = await this.removeAll(files, "purge");
    await this.storage.pruneEmptyDirectories();
    return removed;
  }

  async sweepExpired(maxAgeSeconds: number, nowMs: number = this.now().getTime()): Promise<number> {
    const maxAgeMs = maxAgeSeconds * 1000;
    const files = await this.storage.list();
    const expired = files.filter((file) => nowMs - file.mtimeMs > maxAgeMs);
    const removed = await this.removeAll(expired, "sweep");
    await this.storage.pruneEmptyDirectories();
    return removed;
  }

  private async removeAll(files: ReadonlyArray<StoredFile>, reason: "purge" | "sweep"): Promise<number> {
    let removed = 0;
    for (const file of files) {
      try {
        if (await this.storage.remove(file.relativePath)) removed += 1;
      } catch (err: unknown) {
        this.log({
          type: "upload_remove_failed",
          reason,
          path: file.relativePath,
          error: describeError(err),
        });
      }
    }
    return removed;
  }
}
