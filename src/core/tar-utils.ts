/**
 * Tarball utilities.
 *
 * Bundle content and local archives are stored as gzip-compressed tarballs.
 * Archives are written reproducibly: entries sorted by path, zeroed owner
 * and timestamps, so identical file trees always produce identical bytes
 * (and therefore identical digests).
 */

import { posix } from "path";
import { gunzipSync, gzipSync } from "zlib";
import type { PassThrough } from "stream";
import * as tar from "tar-stream";

const EPOCH = new Date(0);
const DEFAULT_FILE_MODE = 0o644;
const DEFAULT_DIR_MODE = 0o755;

export interface TarFile {
  /** Slash-separated path relative to the archive root */
  path: string;
  content: Buffer;
  mode?: number;
}

export interface TarEntry {
  path: string;
  type: "file" | "directory" | "symlink" | "other";
  mode: number;
  size: number;
  linkTarget?: string;
  content: Buffer;
}

export interface TarValidationResult {
  safe: boolean;
  violations: string[];
}

/**
 * Create a gzip tarball from a list of files.
 * Parent directories are emitted as their own entries ahead of their children.
 */
export async function createTarball(files: TarFile[]): Promise<Buffer> {
  const pack = tar.pack();
  const chunks: Buffer[] = [];
  const finished = new Promise<void>((resolve, reject) => {
    pack.on("data", (chunk: Buffer) => chunks.push(chunk));
    pack.on("end", () => resolve());
    pack.on("error", reject);
  });

  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const writtenDirs = new Set<string>();

  for (const file of sorted) {
    const normalized = posix.normalize(file.path);
    for (const dir of parentDirs(normalized)) {
      if (writtenDirs.has(dir)) continue;
      writtenDirs.add(dir);
      pack.entry({ ...ownerless(), name: `${dir}/`, type: "directory", mode: DEFAULT_DIR_MODE });
    }
    pack.entry(
      {
        ...ownerless(),
        name: normalized,
        type: "file",
        mode: file.mode ?? DEFAULT_FILE_MODE,
        size: file.content.length,
      },
      file.content
    );
  }
  pack.finalize();

  await finished;
  return gzipSync(Buffer.concat(chunks));
}

/**
 * Read every entry of a tarball, in archive order. Gzip-compressed unless
 * `gzip: false` is passed.
 */
export async function readTarball(data: Buffer, options: { gzip?: boolean } = {}): Promise<TarEntry[]> {
  let raw = data;
  if (options.gzip ?? true) {
    try {
      raw = gunzipSync(data);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`read gzip: ${message}`);
    }
  }

  const extract = tar.extract();
  const entries: TarEntry[] = [];

  return new Promise<TarEntry[]>((resolve, reject) => {
    extract.on("entry", (header: tar.Headers, stream: PassThrough, next: () => void) => {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("end", () => {
        entries.push({
          path: header.name.replace(/\/$/, ""),
          type: entryType(header.type),
          mode: header.mode ?? 0,
          size: header.size ?? 0,
          linkTarget: header.linkname ?? undefined,
          content: Buffer.concat(chunks),
        });
        next();
      });
      stream.on("error", reject);
      stream.resume();
    });
    extract.on("finish", () => resolve(entries));
    extract.on("error", (err: Error) => reject(new Error(`read tar: ${err.message}`)));
    extract.end(raw);
  });
}

/**
 * List the regular files of a tarball (path, mode, size), sorted by path.
 */
export async function listTarball(
  data: Buffer,
  options: { gzip?: boolean } = {}
): Promise<Array<Omit<TarEntry, "content">>> {
  const entries = await readTarball(data, options);
  return entries
    .filter((entry) => entry.type === "file")
    .map(({ content: _content, ...rest }) => rest)
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Validate tarball entries before anything is materialized from them.
 * Checks for:
 * - Absolute paths
 * - Path traversal (entries containing ".." that escape the archive root)
 * - Symlinks pointing outside the archive root
 */
export function validateTarEntries(entries: Array<Pick<TarEntry, "path" | "type" | "linkTarget">>): TarValidationResult {
  const violations: string[] = [];

  for (const entry of entries) {
    if (!entry.path) continue;

    if (posix.isAbsolute(entry.path)) {
      violations.push(`Absolute path in tarball: ${entry.path}`);
      continue;
    }

    const normalized = posix.normalize(entry.path);
    if (escapesRoot(normalized)) {
      violations.push(`Path traversal in tarball: ${entry.path}`);
      continue;
    }

    if (entry.type === "symlink" && entry.linkTarget) {
      const resolvedTarget = posix.isAbsolute(entry.linkTarget)
        ? entry.linkTarget
        : posix.normalize(posix.join(posix.dirname(normalized), entry.linkTarget));
      if (posix.isAbsolute(resolvedTarget) || escapesRoot(resolvedTarget)) {
        violations.push(`Symlink escapes archive root: ${entry.path} -> ${entry.linkTarget}`);
      }
    }
  }

  return {
    safe: violations.length === 0,
    violations,
  };
}

function escapesRoot(normalized: string): boolean {
  return normalized === ".." || normalized.startsWith("../");
}

function parentDirs(path: string): string[] {
  const parts = path.split("/").slice(0, -1);
  return parts.map((_, i) => parts.slice(0, i + 1).join("/"));
}

function ownerless() {
  return { mtime: EPOCH, uid: 0, gid: 0, uname: "", gname: "" };
}

function entryType(type: string | null | undefined): TarEntry["type"] {
  switch (type) {
    case "file":
    case "contiguous-file":
    case undefined:
    case null:
      return "file";
    case "directory":
      return "directory";
    case "symlink":
      return "symlink";
    default:
      return "other";
  }
}
