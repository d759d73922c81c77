import { isAbsolute, relative, resolve, sep } from "node:path";
import { UPLOADS_PUBLIC_PATH } from "@lan-board/protocol";

const ABSOLUTE_HTTP_URL_RE = /^https?:\/\//i;
const UPLOADS_PREFIX = `${UPLOADS_PUBLIC_PATH}/`;

/**
 * Brings an attachment URL to the `/uploads/<day>/<file>` form.
 *
 * Accepts absolute `http(s)://host/uploads/...` URLs (their path is kept) and Windows-style
 * backslashes. The result is not guaranteed to be store-rooted; callers check the prefix.
 */
export function normalizeUploadUrl(url: string): string {
  let normalized = url.trim().replace(/\\/g, "/");
  if (ABSOLUTE_HTTP_URL_RE.test(normalized)) {
    try {
      normalized = new URL(normalized).pathname || normalized;
    } catch {
      // Keep the raw value; it fails the prefix check below.
    }
  }
  return normalized;
}

export function isStoreRootedUrl(url: string): boolean {
  if (!url.startsWith(UPLOADS_PREFIX)) return false;
  return !url
    .slice(UPLOADS_PREFIX.length)
    .split("/")
    .some((segment) => segment === ".." || segment === ".");
}

/**
 * Resolves an upload URL to a path strictly inside `root`.
 *
 * Invariant: returns undefined for anything that is not store-rooted or that would resolve to
 * the root itself or outside it. Callers MUST NOT touch the file system when this is undefined.
 */
export function resolveUploadPath(root: string, url: string): string | undefined {
  const normalized = normalizeUploadUrl(url);
  if (!isStoreRootedUrl(normalized)) return undefined;

  const rel = normalized.slice(UPLOADS_PREFIX.length).replace(/^\/+/, "");
  if (rel.length === 0) return undefined;

  const base = resolve(root);
  const local = resolve(base, rel);
  const fromBase = relative(base, local);
  if (fromBase.length === 0) return undefined;
  if (fromBase === ".." || fromBase.startsWith(`..${sep}`) || isAbsolute(fromBase)) {
    return undefined;
  }
  return local;
}

/** Builds the public URL of a file stored at `<root>/<relativePath>`. */
export function uploadUrlFor(relativePath: string): string {
  return `${UPLOADS_PREFIX}${relativePath.split(sep).join("/")}`;
}
