import type { Readable } from "node:stream";

export type StoredFile = Readonly<{
  /** Path below the storage root, `/`-separated. */
  relativePath: string;
  size: number;
  mtimeMs: number;
}>;

/**
 * Store-level operations the attachment lifecycle needs.
 *
 * Invariants:
 * - Every `relativePath` has already passed the path guard; implementations never resolve
 *   outside their root.
 * - `remove` reports `false` for entries that are missing or are not regular files and only
 *   throws for other failures.
 */
export interface UploadStorage {
  readonly root: string;
  write(relativePath: string, source: Readable): Promise<{ size: number }>;
  list(): Promise<StoredFile[]>;
  remove(relativePath: string): Promise<boolean>;
  /** Removes every directory below the root that has become empty. Returns how many went. */
  pruneEmptyDirectories(): Promise<number>;
}
