import { createWriteStream, type Dirent } from "node:fs";
import { lstat, mkdir, readdir, rmdir, stat, unlink } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { errorCode } from "../log.js";
import type { StoredFile, UploadStorage } from "./uploadStorage.js";

const DIRECTORY_BUSY_CODES: ReadonlySet<string> = new Set(["ENOTEMPTY", "EEXIST", "ENOENT"]);

async function readDirOrEmpty(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") return [];
    throw err;
  }
}

export class LocalDiskStorage implements UploadStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async ensureRoot(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  async write(relativePath: string, source: Readable): Promise<{ size: number }> {
    const target = this.toLocalPath(relativePath);
    await mkdir(dirname(target), { recursive: true });

    let size = 0;
    try {
      await pipeline(
        source,
        async function* countBytes(chunks: AsyncIterable<Buffer | string>) {
          for await (const chunk of chunks) {
            size += typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength;
            yield chunk;
          }
        },
        createWriteStream(target, { flags: "wx" }),
      );
    } catch (err: unknown) {
      await this.remove(relativePath).catch(() => false);
      throw err;
    }
    return { size };
  }

  async list(): Promise<StoredFile[]> {
    const files: StoredFile[] = [];
    await this.walkFiles(this.root, "", files);
    return files;
  }

  async remove(relativePath: string): Promise<boolean> {
    const target = this.toLocalPath(relativePath);
    try {
      const info = await lstat(target);
      if (!info.isFile()) return false;
      await unlink(target);
      return true;
    } catch (err: unknown) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async pruneEmptyDirectories(): Promise<number> {
    return this.pruneBelow(this.root);
  }

  private toLocalPath(relativePath: string): string {
    return join(this.root, ...relativePath.split("/"));
  }

  private async walkFiles(dir: string, prefix: string, out: StoredFile[]): Promise<void> {
    for (const entry of await readDirOrEmpty(dir)) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walkFiles(full, relativePath, out);
        continue;
      }
      if (!entry.isFile()) continue;

      try {
        const info = await stat(full);
        out.push({ relativePath, size: info.size, mtimeMs: info.mtimeMs });
      } catch (err: unknown) {
        // Removed between readdir and stat.
        if (errorCode(err) !== "ENOENT") throw err;
      }
    }
  }

  private async pruneBelow(dir: string): Promise<number> {
    let removed = 0;
    for (const entry of await readDirOrEmpty(dir)) {
      if (!entry.isDirectory()) continue;
      const child = join(dir, entry.name);
      removed += await this.pruneBelow(child);
      try {
        await rmdir(child);
        removed += 1;
      } catch (err: unknown) {
        const code = errorCode(err);
        if (code === undefined || !DIRECTORY_BUSY_CODES.has(code)) throw err;
      }
    }
    return removed;
  }
}
