import { randomUUID } from "node:crypto";
import {
  MessageIdSchema,
  messageIdFromUuid,
  type Attachment,
  type ClientMessageSend,
  type Message,
  type MessageId,
  type ServerEvent,
} from "@lan-board/protocol";
import { describeError, type Log } from "../log.js";
import { admitAttachments, type AttachmentAdmissionPolicy } from "../policy/attachmentPolicy.js";
import { createMessage } from "../policy/boardPolicy.js";
import type { AttachmentStore } from "../storage/attachmentStore.js";
import { passphraseMatches } from "../util.js";
import type {
  BoardClient,
  BroadcastReport,
  ConnectionRegistry,
  DeliveryOutcome,
  LivenessFailure,
} from "./connectionRegistry.js";
import type { HistoryLog, JournalWrite } from "./historyLog.js";
import { SerialQueue } from "./serialQueue.js";

export type Forbidden = { ok: false; error: "forbidden" };

export type AdmitResult = { ok: true; message: Message; durable: boolean } | Forbidden;

export type DeleteResult =
  | { ok: true; deleted: 0 | 1; filesDeleted: number; durable: boolean }
  | Forbidden;

export type ClearResult = { ok: true; filesDeleted: number; durable: boolean } | Forbidden;

export type BootstrapResult = { ok: true; delivered: boolean } | Forbidden;

export type BoardServiceOptions<C extends BoardClient> = Readonly<{
  passphrase: string;
  history: HistoryLog;
  attachments: AttachmentStore;
  registry: ConnectionRegistry<C>;
  attachmentPolicy: AttachmentAdmissionPolicy;
  log: Log;
  nowMs?: () => number;
  createMessageId?: () => MessageId;
}>;

const FORBIDDEN: Forbidden = { ok: false, error: "forbidden" };

/**
 * Owns the board: history, attachment files and live clients.
 *
 * Every mutation and every bootstrap runs on one serial queue, so a snapshot never sees a
 * half-applied change and a bootstrapping client gets its history before any live event.
 * Broadcasts are started inside the queue and awaited after leaving it, so a slow client
 * never holds the queue.
 */
export class BoardService<C extends BoardClient = BoardClient> {
  private readonly queue = new SerialQueue();
  private readonly passphrase: string;
  private readonly history: HistoryLog;
  private readonly attachments: AttachmentStore;
  private readonly registry: ConnectionRegistry<C>;
  private readonly attachmentPolicy: AttachmentAdmissionPolicy;
  private readonly log: Log;
  private readonly nowMs: () => number;
  private readonly createMessageId: () => MessageId;

  constructor(options: BoardServiceOptions<C>) {
    this.passphrase = options.passphrase;
    this.history = options.history;
    this.attachments = options.attachments;
    this.registry = options.registry;
    this.attachmentPolicy = options.attachmentPolicy;
    this.log = options.log;
    this.nowMs = options.nowMs ?? (() => Date.now());
    this.createMessageId = options.createMessageId ?? (() => messageIdFromUuid(randomUUID()));
  }

  authorize(pass: string | null | undefined): boolean {
    return passphraseMatches(this.passphrase, pass);
  }

  async admitMessage(event: ClientMessageSend): Promise<AdmitResult> {
    if (!this.authorize(event.pass)) return FORBIDDEN;

    const { admitted, dropped } = admitAttachments(event.attachments, this.attachmentPolicy);
    if (dropped.length > 0) {
      this.log({ type: "attachments_dropped", count: dropped.length, reasons: dropped });
    }

    const { message, journal, broadcast } = await this.queue.run(async () => {
      const message = createMessage({
        id: this.createMessageId(),
        ts: this.nowMs(),
        sender: event.sender,
        text: event.text,
        attachments: admitted,
      });
      const journal = await this.history.append(message);
      return { message, journal, broadcast: this.broadcast({ type: "msg", item: message }) };
    });

    this.reportJournal("append", journal);
    await broadcast;
    return { ok: true, message, durable: journal.ok };
  }

  /** Deleting an id that is not in the history is a zero-effect success. */
  async deleteMessage(pass: string, rawId: string): Promise<DeleteResult> {
    if (!this.authorize(pass)) return FORBIDDEN;

    const id = MessageIdSchema.safeParse(rawId);
    if (!id.success) return { ok: true, deleted: 0, filesDeleted: 0, durable: true };

    const outcome = await this.queue.run(async () => {
      const { removed, journal } = await this.history.remove(id.data);
      if (!removed) return undefined;

      const filesDeleted = await this.deleteAttachmentFiles(removed.attachments);
      return { journal, filesDeleted, broadcast: this.broadcast({ type: "delete", id: removed.id }) };
    });
    if (!outcome) return { ok: true, deleted: 0, filesDeleted: 0, durable: true };

    this.reportJournal("remove", outcome.journal);
    await outcome.broadcast;
    return { ok: true, deleted: 1, filesDeleted: outcome.filesDeleted, durable: outcome.journal.ok };
  }

  /** Empties the history and every file in the upload store, referenced or not. */
  async clearBoard(pass: string): Promise<ClearResult> {
    if (!this.authorize(pass)) return FORBIDDEN;

    const outcome = await this.queue.run(async () => {
      const journal = await this.history.clear();
      const filesDeleted = await this.attachments.purgeAll().catch((err: unknown) => {
        this.log({ type: "upload_purge_failed", error: describeError(err) });
        return 0;
      });
      return { journal, filesDeleted, broadcast: this.broadcast({ type: "clear" }) };
    });

    this.reportJournal("clear", outcome.journal);
    await outcome.broadcast;
    return { ok: true, filesDeleted: outcome.filesDeleted, durable: outcome.journal.ok };
  }

  /**
   * Registers `client` and sends it the current history.
   *
   * Both happen inside the queue: any broadcast queued after this call reaches the client after
   * its snapshot, and none queued before it reaches the client at all.
   */
  async bootstrapClient(pass: string | null | undefined, client: C): Promise<BootstrapResult> {
    if (!this.authorize(pass)) return FORBIDDEN;

    const delivery = await this.queue.run(async () => {
      this.registry.register(client);
      return { sent: this.registry.send(client, { type: "history", items: this.history.snapshot() }) };
    });

    const outcome = await delivery.sent;
    return { ok: true, delivered: outcome.ok };
  }

  disconnectClient(client: C): void {
    this.registry.unregister(client);
  }

  /** Unregisters and terminates a client that no longer answers. */
  evictClient(client: C, reason: LivenessFailure): void {
    this.registry.evict(client, reason);
  }

  /** Sends one event to a single client. Used for error replies. */
  reply(client: C, event: ServerEvent): Promise<DeliveryOutcome> {
    return this.registry.send(client, event);
  }

  snapshot(): Promise<Message[]> {
    return this.queue.run(async () => this.history.snapshot());
  }

  private broadcast(event: ServerEvent): Promise<BroadcastReport> {
    return this.registry.broadcast(event);
  }

  private async deleteAttachmentFiles(attachments: ReadonlyArray<Attachment>): Promise<number> {
    let deleted = 0;
    for (const attachment of attachments) {
      try {
        if (await this.attachments.deleteByUrl(attachment.url)) deleted += 1;
      } catch (err: unknown) {
        this.log({ type: "attachment_delete_failed", url: attachment.url, error: describeError(err) });
      }
    }
    return deleted;
  }

  private reportJournal(op: "append" | "remove" | "clear", journal: JournalWrite): void {
    if (journal.ok) return;
    this.log({ type: "history_write_failed", op, error: describeError(journal.cause) });
  }
}
