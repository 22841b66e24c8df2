/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { Writable } from "stream";
import winston from "winston";
import type { FileSystem, HttpClient } from "#/core";
import { MemoryStore, type ContentStore, type Descriptor } from "#/content";
import type { ArtifactNode, Blob } from "#/graph";
import type { LogEntry } from "#/logging";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
  mode: number;
}

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry> } {
  const files = new Map<string, MockFileEntry>();

  // Initialize with provided files
  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false, mode: 0o644 });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = path.endsWith("/") ? path : `${path}/`;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  return {
    files,

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false, mode: 0o644 });
    },

    writeFileBinary(path: string, content: Buffer): void {
      files.set(path, { content, isDirectory: false, mode: 0o644 });
    },

    exists(path: string): boolean {
      return files.has(path) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      if (!files.has(path)) {
        files.set(path, { content: "", isDirectory: true, mode: 0o755 });
      }
    },

    readdir(path: string): string[] {
      const normalizedPath = path.endsWith("/") ? path.slice(0, -1) : path;
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results).sort();
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number; mode: number } {
      const entry = files.get(path);
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0, mode: 0o755 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0, mode: entry.mode };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length, mode: entry.mode };
    },

    unlink(path: string): void {
      files.delete(path);
    },
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export type MockRoute = Response | ((request: RecordedRequest) => Response);

/**
 * Create a mock HttpClient with predefined responses. Routes are keyed by
 * `"<METHOD> <url>"` or, for any method, by the bare URL. Unmatched
 * requests get a 404.
 */
export function createMockHttpClient(
  responses: Map<string, MockRoute> = new Map()
): HttpClient & { responses: Map<string, MockRoute>; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const method = options?.method ?? "GET";
      const request: RecordedRequest = {
        method,
        url,
        headers: headerRecord(options?.headers),
        body: bodyBuffer(options?.body),
      };
      requests.push(request);

      const route = responses.get(`${method} ${url}`) ?? responses.get(url);
      if (!route) {
        return new Response(null, { status: 404, statusText: "Not Found" });
      }
      return typeof route === "function" ? route(request) : route;
    },
  };
}

function headerRecord(headers: RequestInit["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

function bodyBuffer(body: RequestInit["body"]): Buffer | undefined {
  if (body instanceof Uint8Array) return Buffer.from(body);
  if (typeof body === "string") return Buffer.from(body);
  return undefined;
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, statusText, headers });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Buffer, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(new Uint8Array(data), {
    status,
    headers: { "Content-Type": "application/octet-stream", ...headers },
  });
}

export interface StoreCalls {
  exists: string[];
  fetch: string[];
  push: string[];
  tag: Array<{ digest: string; reference: string }>;
}

/**
 * Wrap a store and record every call by digest.
 */
export function createRecordingStore(
  inner: ContentStore = new MemoryStore()
): ContentStore & { calls: StoreCalls; inner: ContentStore } {
  const calls: StoreCalls = { exists: [], fetch: [], push: [], tag: [] };

  return {
    calls,
    inner,

    exists(desc: Descriptor): Promise<boolean> {
      calls.exists.push(desc.digest);
      return inner.exists(desc);
    },

    fetch(desc: Descriptor): Promise<Buffer> {
      calls.fetch.push(desc.digest);
      return inner.fetch(desc);
    },

    push(desc: Descriptor, content: Buffer): Promise<void> {
      calls.push.push(desc.digest);
      return inner.push(desc, content);
    },

    tag(desc: Descriptor, reference: string): Promise<void> {
      calls.tag.push({ digest: desc.digest, reference });
      return inner.tag(desc, reference);
    },
  };
}

/**
 * A winston transport that keeps every entry in memory. Entries are
 * written asynchronously: await a tick before asserting on them.
 */
export function createMemoryLogTransport(): { transport: winston.transport; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const stream = new Writable({
    objectMode: true,
    write(chunk: unknown, _encoding, callback) {
      if (isLogEntry(chunk)) entries.push(chunk);
      callback();
    },
  });
  return { transport: new winston.transports.Stream({ stream }), entries };
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "level") === "string" &&
    typeof Reflect.get(value, "message") === "string"
  );
}

/**
 * Resolve after pending stream writes have been flushed.
 */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface TestBlobOptions {
  /** Milliseconds before data() resolves */
  delay?: number;
  /** Reject data() with this error */
  error?: Error;
  /** Incremented on every data() call */
  reads?: { count: number };
}

/**
 * Create a Blob over fixed bytes.
 */
export function createTestBlob(mediaType: string, content: string | Buffer, options: TestBlobOptions = {}): Blob {
  return {
    mediaType: () => mediaType,
    async data(): Promise<Buffer> {
      if (options.reads) options.reads.count++;
      if (options.delay !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, options.delay));
      }
      if (options.error) throw options.error;
      return typeof content === "string" ? Buffer.from(content) : content;
    },
  };
}

/**
 * Create an ArtifactNode from plain parts.
 */
export function createTestNode(
  artifactType: string,
  parts: { blobs?: Blob[]; children?: ArtifactNode[]; annotations?: Record<string, string> } = {}
): ArtifactNode {
  return {
    artifactType: () => artifactType,
    annotations: () => parts.annotations ?? {},
    subArtifacts: () => parts.children ?? [],
    blobs: () => parts.blobs ?? [],
  };
}
