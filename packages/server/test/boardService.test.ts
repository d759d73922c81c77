import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MessageIdSchema, uploadDayOf, type ClientMessageSend } from "@lan-board/protocol";
import { BoardService } from "../src/board/boardService.js";
import { ConnectionRegistry } from "../src/board/connectionRegistry.js";
import { HistoryLog } from "../src/board/historyLog.js";
import type { LogEvent } from "../src/log.js";
import { AttachmentStore } from "../src/storage/attachmentStore.js";
import { LocalDiskStorage } from "../src/storage/localDiskStorage.js";
import { FakeClient } from "./support/fakeClient.js";

const PASS = "test-secret";
const MB = 1024 * 1024;
const NOW = 1_767_787_200_000;

function msg(fields: Partial<ClientMessageSend> = {}): ClientMessageSend {
  return { type: "msg", pass: PASS, sender: "PC", text: "hello", attachments: [], ...fields };
}

describe("BoardService", () => {
  let dir: string;
  let uploadRoot: string;
  let events: LogEvent[];
  let attachments: AttachmentStore;

  async function makeBoard(options: { journalPath?: string; sendTimeoutMs?: number } = {}) {
    const history = new HistoryLog(options.journalPath ?? join(dir, "data", "history.jsonl"), {
      limit: 100,
    });
    await history.load();
    let nextId = 0;
    const registry = new ConnectionRegistry<FakeClient>({
      sendTimeoutMs: options.sendTimeoutMs ?? 1000,
      maxBufferedBytes: MB,
      log: (event) => events.push(event),
    });
    const board = new BoardService<FakeClient>({
      passphrase: PASS,
      history,
      attachments,
      registry,
      attachmentPolicy: { maxAttachmentBytes: 30 * MB },
      log: (event) => events.push(event),
      nowMs: () => NOW,
      createMessageId: () => MessageIdSchema.parse(`m${(nextId += 1)}`),
    });
    return { board, registry, history };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lan-board-service-"));
    uploadRoot = join(dir, "uploads");
    events = [];
    let nextFile = 0;
    const storage = new LocalDiskStorage(uploadRoot);
    await storage.ensureRoot();
    attachments = new AttachmentStore({
      storage,
      log: (event) => events.push(event),
      now: () => new Date(NOW),
      createFileId: () => `f${(nextFile += 1)}`,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("broadcasts an admitted message and replays it to later clients", async () => {
    const { board } = await makeBoard();
    const sender = new FakeClient("sender");
    const other = new FakeClient("other");
    await expect(board.bootstrapClient(PASS, sender)).resolves.toEqual({ ok: true, delivered: true });
    await board.bootstrapClient(PASS, other);

    const result = await board.admitMessage(msg());

    const item = { id: "m1", ts: NOW, sender: "PC", text: "hello", attachments: [] };
    expect(result).toEqual({ ok: true, message: item, durable: true });
    expect(other.events()).toEqual([
      { type: "history", items: [] },
      { type: "msg", item },
    ]);
    expect(sender.events()).toEqual(other.events());

    const late = new FakeClient("late");
    await board.bootstrapClient(PASS, late);
    expect(late.events()).toEqual([{ type: "history", items: [item] }]);
  });

  it("rejects a wrong passphrase without any effect", async () => {
    const { board, history } = await makeBoard();
    const watcher = new FakeClient("watcher");
    await board.bootstrapClient(PASS, watcher);

    await expect(board.admitMessage(msg({ pass: "wrong" }))).resolves.toEqual({
      ok: false,
      error: "forbidden",
    });
    await expect(board.deleteMessage("wrong", "m1")).resolves.toEqual({ ok: false, error: "forbidden" });
    await expect(board.clearBoard("wrong")).resolves.toEqual({ ok: false, error: "forbidden" });

    expect(history.size).toBe(0);
    expect(watcher.sent).toHaveLength(1);
  });

  it("does not register a client with a wrong passphrase", async () => {
    const { board, registry } = await makeBoard();
    const intruder = new FakeClient("intruder");

    await expect(board.bootstrapClient("wrong", intruder)).resolves.toEqual({
      ok: false,
      error: "forbidden",
    });
    expect(registry.has(intruder)).toBe(false);
    expect(intruder.sent).toEqual([]);
  });

  it("keeps attachments under the size cap and drops the rest", async () => {
    const { board } = await makeBoard();

    const result = await board.admitMessage(
      msg({
        attachments: [
          { url: "/uploads/2026-01-07/a.bin", name: "a.bin", size: 29 * MB, kind: "file" },
          { url: "/uploads/2026-01-07/b.bin", name: "b.bin", size: 31 * MB, kind: "file" },
        ],
      }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.message.attachments).toEqual([
      { url: "/uploads/2026-01-07/a.bin", name: "a.bin", size: 29 * MB, kind: "file" },
    ]);
    expect(events).toContainEqual({ type: "attachments_dropped", count: 1, reasons: ["too_large"] });
  });

  it("deletes a message once, with its files", async () => {
    const { board, history } = await makeBoard();
    const watcher = new FakeClient("watcher");
    await board.bootstrapClient(PASS, watcher);
    const attachment = await attachments.save("note.txt", Readable.from([Buffer.from("hi")]));
    await board.admitMessage(msg({ attachments: [attachment] }));
    await board.admitMessage(msg({ text: "second" }));

    const first = await board.deleteMessage(PASS, "m1");
    const second = await board.deleteMessage(PASS, "m1");

    expect(first).toEqual({ ok: true, deleted: 1, filesDeleted: 1, durable: true });
    expect(second).toEqual({ ok: true, deleted: 0, filesDeleted: 0, durable: true });
    expect(history.snapshot().map((m) => m.id)).toEqual(["m2"]);
    expect(watcher.events().at(-1)).toEqual({ type: "delete", id: "m1" });
    expect(watcher.events().filter((e) => e.type === "delete")).toHaveLength(1);
    await expect(readdir(join(uploadRoot, uploadDayOf(new Date(NOW))))).resolves.toEqual([]);
  });

  it("treats an id that is not a token as unknown", async () => {
    const { board } = await makeBoard();

    await expect(board.deleteMessage(PASS, "../etc")).resolves.toEqual({
      ok: true,
      deleted: 0,
      filesDeleted: 0,
      durable: true,
    });
  });

  it("clears the history and every stored file", async () => {
    const { board } = await makeBoard();
    const watcher = new FakeClient("watcher");
    await board.bootstrapClient(PASS, watcher);
    const referenced = await attachments.save("a.png", Readable.from([Buffer.from("a")]));
    await attachments.save("unreferenced.txt", Readable.from([Buffer.from("b")]));
    await board.admitMessage(msg({ attachments: [referenced] }));
    await board.admitMessage(msg());

    const result = await board.clearBoard(PASS);

    expect(result).toEqual({ ok: true, filesDeleted: 2, durable: true });
    await expect(board.snapshot()).resolves.toEqual([]);
    await expect(readdir(uploadRoot)).resolves.toEqual([]);
    expect(watcher.events().at(-1)).toEqual({ type: "clear" });
  });

  it("still broadcasts when the journal cannot be written", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const { board } = await makeBoard({ journalPath: join(blocker, "history.jsonl") });
    const watcher = new FakeClient("watcher");
    await board.bootstrapClient(PASS, watcher);

    const result = await board.admitMessage(msg());

    expect(result).toMatchObject({ ok: true, durable: false });
    expect(watcher.events().at(-1)).toMatchObject({ type: "msg", item: { id: "m1" } });
    expect(events).toContainEqual(
      expect.objectContaining({ type: "history_write_failed", op: "append" }),
    );
  });

  it("sends the snapshot before any later broadcast", async () => {
    const { board } = await makeBoard();

    const client = new FakeClient("client");
    const bootstrapping = board.bootstrapClient(PASS, client);
    const admitting = board.admitMessage(msg());
    await Promise.all([bootstrapping, admitting]);

    expect(client.events().map((e) => e.type)).toEqual(["history", "msg"]);
    expect(client.events()[0]).toEqual({ type: "history", items: [] });
  });

  it("does not hold the queue while a slow client acknowledges", async () => {
    const { board } = await makeBoard({ sendTimeoutMs: 200 });
    const slow = new FakeClient("slow", "hang");
    const bootstrapping = board.bootstrapClient(PASS, slow);

    const first = board.admitMessage(msg({ text: "one" }));
    const second = board.admitMessage(msg({ text: "two" }));
    const snapshot = await board.snapshot();

    expect(snapshot.map((m) => m.text)).toEqual(["one", "two"]);
    expect(slow.sent).toHaveLength(3);

    await expect(bootstrapping).resolves.toEqual({ ok: true, delivered: false });
    await Promise.all([first, second]);
    expect(slow.terminated).toBe(true);
  });
});
