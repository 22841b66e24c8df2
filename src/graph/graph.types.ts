import type { Descriptor } from "#/content";
import type { LineWriter } from "#/core";
import type { Logger } from "#/logging";

/**
 * A leaf of an artifact: typed bytes, read once per push attempt.
 */
export interface Blob {
  mediaType(): string;
  data(): Promise<Buffer>;
}

/**
 * Anything that can be built into an artifact manifest. Children are
 * either nested artifacts or blobs.
 */
export interface ArtifactNode {
  artifactType(): string;
  annotations(): Record<string, string>;
  subArtifacts(): ArtifactNode[];
  blobs(): Blob[];
}

export interface BuildOptions {
  /** Bound on concurrent blob reads and pushes across the whole tree */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface CopyOptions {
  /** Tag written at the destination for the root */
  tag?: string;
  /** Sibling subtrees copied at once; 1 copies strictly depth-first */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
  registry?: SuccessorRegistry;
  onSkipped?: (desc: Descriptor) => void;
  onCopied?: (desc: Descriptor) => void;
}

export interface PushOptions extends BuildOptions {
  tag?: string;
  logger?: Logger;
  onSkipped?: (desc: Descriptor) => void;
  onCopied?: (desc: Descriptor) => void;
}

export interface PushResult {
  descriptor: Descriptor;
  bytesTransferred: number;
}

/**
 * What the copier needs from a media-type registry.
 */
export interface SuccessorRegistry {
  successors(desc: Descriptor, content: Buffer): Descriptor[];
}

export interface InspectContext {
  desc: Descriptor;
  content: Buffer;
  indent: string;
  write: LineWriter;
  /** Inspect a child at the given indent */
  visit(child: Descriptor, indent: string): Promise<void>;
}

export type InspectDecoder = (ctx: InspectContext) => Promise<void> | void;

export interface InspectOptions {
  signal?: AbortSignal;
  write?: LineWriter;
  /** Extra or replacement decoders, keyed by media type */
  decoders?: Map<string, InspectDecoder>;
}
