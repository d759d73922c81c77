import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { MessageSchema, type Message, type MessageId } from "@lan-board/protocol";
import { errorCode } from "../log.js";
import { appendHistory, removeFromHistory } from "../policy/boardPolicy.js";
import { boundedTail, parseZodJsonLines } from "../zodUtil.js";
import { JOURNAL_COMPACT_FACTOR } from "./constants.js";

export type HistoryLogConfig = Readonly<{
  limit: number;
}>;

/** Outcome of a journal write. The in-memory change has already happened either way. */
export type JournalWrite = { ok: true } | { ok: false; cause: unknown };

export type HistoryLoadResult = Readonly<{
  loaded: number;
  skipped: number;
  trimmed: number;
  /** Set when the journal exists but could not be read; the log then starts empty. */
  readError?: unknown;
}>;

const JOURNAL_OK: JournalWrite = { ok: true };

function toLine(message: Message): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * Append-only, size-bounded message log backed by a JSON-lines journal.
 *
 * Invariants:
 * - `load()` MUST complete before any other method is called.
 * - Memory holds at most `limit` messages, oldest evicted first. Eviction is memory-only; the
 *   journal catches up on the next full rewrite (remove, clear or compaction).
 * - Callers serialize mutations; this class does no locking of its own.
 */
export class HistoryLog {
  private history: Message[] = [];
  private journalLines = 0;

  constructor(
    private readonly journalPath: string,
    private readonly config: HistoryLogConfig,
  ) {}

  async load(): Promise<HistoryLoadResult> {
    let text: string;
    try {
      text = await readFile(this.journalPath, "utf8");
    } catch (err: unknown) {
      this.history = [];
      this.journalLines = 0;
      if (errorCode(err) === "ENOENT") return { loaded: 0, skipped: 0, trimmed: 0 };
      return { loaded: 0, skipped: 0, trimmed: 0, readError: err };
    }

    const parsed = parseZodJsonLines(text, MessageSchema);
    this.history = boundedTail(parsed.items, this.config.limit);
    this.journalLines = parsed.lineCount;

    return {
      loaded: this.history.length,
      skipped: parsed.skipped,
      trimmed: parsed.items.length - this.history.length,
    };
  }

  snapshot(): Message[] {
    return this.history.slice();
  }

  async append(message: Message): Promise<JournalWrite> {
    this.history = appendHistory(this.history, message, this.config.limit);

    if (this.journalLines + 1 > this.config.limit * JOURNAL_COMPACT_FACTOR) {
      return this.rewrite();
    }

    try {
      await mkdir(dirname(this.journalPath), { recursive: true });
      await appendFile(this.journalPath, toLine(message), "utf8");
      this.journalLines += 1;
      return JOURNAL_OK;
    } catch (cause: unknown) {
      return { ok: false, cause };
    }
  }

  async remove(id: MessageId): Promise<{ removed: Message | undefined; journal: JournalWrite }> {
    const next = removeFromHistory(this.history, id);
    if (!next.removed) return { removed: undefined, journal: JOURNAL_OK };

    this.history = next.history;
    return { removed: next.removed, journal: await this.rewrite() };
  }

  async clear(): Promise<JournalWrite> {
    this.history = [];
    return this.rewrite();
  }

  private async rewrite(): Promise<JournalWrite> {
    const records = this.history.slice();
    const tempPath = `${this.journalPath}.tmp`;
    try {
      await mkdir(dirname(this.journalPath), { recursive: true });
      await writeFile(tempPath, records.map(toLine).join(""), "utf8");
      await rename(tempPath, this.journalPath);
      this.journalLines = records.length;
      return JOURNAL_OK;
    } catch (cause: unknown) {
      return { ok: false, cause };
    }
  }
}
