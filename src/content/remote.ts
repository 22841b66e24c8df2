/**
 * Remote registry store
 *
 * ContentStore over one repository of an OCI registry. Manifests and
 * blobs live behind different endpoints, so every call is routed by the
 * descriptor's media type.
 */

import { StoreError } from "#/errors";
import { MANIFEST_MEDIA_TYPES, type OciClient } from "#/oci";
import type { ContentStore, Descriptor } from "./content.types";
import { verifyContent } from "./descriptor";

export class RemoteStore implements ContentStore {
  constructor(
    private readonly client: OciClient,
    readonly repository: string
  ) {}

  async exists(desc: Descriptor): Promise<boolean> {
    const result = isManifest(desc)
      ? await this.client.headManifest(this.repository, desc.digest)
      : await this.client.headBlob(this.repository, desc.digest);
    if (!result.success) {
      throw storeError(desc, result.error, result.status);
    }
    return result.exists === true;
  }

  async fetch(desc: Descriptor): Promise<Buffer> {
    const result = isManifest(desc)
      ? await this.client.pullManifest(this.repository, desc.digest)
      : await this.client.pullBlob(this.repository, desc.digest);
    if (!result.success || !result.data) {
      throw storeError(desc, result.error, result.status);
    }
    verifyContent(desc, result.data);
    return result.data;
  }

  async push(desc: Descriptor, content: Buffer): Promise<void> {
    verifyContent(desc, content);
    const result = isManifest(desc)
      ? await this.client.pushManifest(this.repository, desc.digest, content, desc.mediaType)
      : await this.client.pushBlob(this.repository, desc.digest, content);
    if (!result.success) {
      throw storeError(desc, result.error, result.status);
    }
  }

  /**
   * Re-put the manifest bytes under the tag.
   */
  async tag(desc: Descriptor, reference: string): Promise<void> {
    if (!isManifest(desc)) {
      throw new StoreError(`cannot tag ${desc.mediaType}: only manifests can be tagged`, {
        mediaType: desc.mediaType,
        digest: desc.digest,
      });
    }
    const content = await this.fetch(desc);
    await this.pushReference(desc, content, reference);
  }

  async pushReference(desc: Descriptor, content: Buffer, reference: string): Promise<void> {
    if (!isManifest(desc)) {
      await this.push(desc, content);
      return;
    }
    verifyContent(desc, content);
    const result = await this.client.pushManifest(this.repository, reference, content, desc.mediaType);
    if (!result.success) {
      throw storeError(desc, result.error, result.status);
    }
  }

  async resolve(reference: string): Promise<Descriptor> {
    const result = await this.client.resolve(this.repository, reference);
    if (!result.success || !result.descriptor) {
      throw new StoreError(result.error ?? `${reference}: not found`, { status: result.status });
    }
    return result.descriptor;
  }
}

function isManifest(desc: Descriptor): boolean {
  return MANIFEST_MEDIA_TYPES.includes(desc.mediaType);
}

function storeError(desc: Descriptor, message: string | undefined, status: number | undefined): StoreError {
  return new StoreError(message ?? `request for ${desc.digest} failed`, {
    mediaType: desc.mediaType,
    digest: desc.digest,
    status,
  });
}
