import { createHash } from "crypto";
import { StoreError } from "#/errors";
import type { Descriptor } from "./content.types";

const DIGEST_REGEX = /^(?<algorithm>[a-z0-9]+(?:[+._-][a-z0-9]+)*):(?<encoded>[a-zA-Z0-9=_-]+)$/;

const SUPPORTED_ALGORITHMS = new Set(["sha256", "sha512"]);

export interface ParsedDigest {
  algorithm: string;
  encoded: string;
}

export function parseDigest(digest: string): ParsedDigest {
  const match = DIGEST_REGEX.exec(digest);
  const algorithm = match?.groups?.["algorithm"];
  const encoded = match?.groups?.["encoded"];
  if (!algorithm || !encoded) {
    throw new StoreError(`invalid digest ${JSON.stringify(digest)}`, { digest });
  }
  if (!SUPPORTED_ALGORITHMS.has(algorithm)) {
    throw new StoreError(`unsupported digest algorithm ${algorithm}`, { digest });
  }
  return { algorithm, encoded };
}

export function digestOf(content: Buffer | string, algorithm = "sha256"): string {
  return `${algorithm}:${createHash(algorithm).update(content).digest("hex")}`;
}

export function descriptorFromBytes(
  mediaType: string,
  content: Buffer,
  annotations?: Record<string, string>
): Descriptor {
  return {
    mediaType,
    digest: digestOf(content),
    size: content.length,
    ...(annotations && Object.keys(annotations).length > 0 && { annotations }),
  };
}

export function compareByDigest(a: Descriptor, b: Descriptor): number {
  return a.digest < b.digest ? -1 : a.digest > b.digest ? 1 : 0;
}

/**
 * Throw unless `content` has exactly the size and digest `desc` claims.
 */
export function verifyContent(desc: Descriptor, content: Buffer): void {
  if (content.length !== desc.size) {
    throw new StoreError(
      `size mismatch for ${desc.digest}: expected ${desc.size}, got ${content.length}`,
      { mediaType: desc.mediaType, digest: desc.digest }
    );
  }
  const { algorithm } = parseDigest(desc.digest);
  const actual = digestOf(content, algorithm);
  if (actual !== desc.digest) {
    throw new StoreError(`digest mismatch: expected ${desc.digest}, got ${actual}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
    });
  }
}

/**
 * Short form for log lines: `sha256:0123456789ab`
 */
export function shortDigest(digest: string): string {
  const colon = digest.indexOf(":");
  return colon === -1 ? digest.slice(0, 12) : digest.slice(0, colon + 13);
}
