/**
 * In-memory content store.
 *
 * Used as the staging area of a build and for digest-only dry pushes.
 * One instance per operation; nothing is shared.
 */

import { StoreError } from "#/errors";
import type { ContentStore, Descriptor } from "./content.types";
import { verifyContent } from "./descriptor";

export class MemoryStore implements ContentStore {
  private readonly blobs = new Map<string, Buffer>();
  private readonly tags = new Map<string, Descriptor>();

  async exists(desc: Descriptor): Promise<boolean> {
    return this.blobs.has(desc.digest);
  }

  async fetch(desc: Descriptor): Promise<Buffer> {
    const content = this.blobs.get(desc.digest);
    if (!content) {
      throw new StoreError(`${desc.digest}: not found`, { mediaType: desc.mediaType, digest: desc.digest });
    }
    return content;
  }

  async push(desc: Descriptor, content: Buffer): Promise<void> {
    if (this.blobs.has(desc.digest)) return;
    verifyContent(desc, content);
    this.blobs.set(desc.digest, Buffer.from(content));
  }

  async tag(desc: Descriptor, reference: string): Promise<void> {
    if (!this.blobs.has(desc.digest)) {
      throw new StoreError(`cannot tag ${reference}: ${desc.digest} not found`, {
        mediaType: desc.mediaType,
        digest: desc.digest,
      });
    }
    this.tags.set(reference, desc);
  }

  async resolve(reference: string): Promise<Descriptor> {
    const desc = this.tags.get(reference);
    if (!desc) {
      throw new StoreError(`${reference}: not found`);
    }
    return desc;
  }

  /** Number of objects held */
  get size(): number {
    return this.blobs.size;
  }

  digests(): string[] {
    return [...this.blobs.keys()].sort();
  }
}
