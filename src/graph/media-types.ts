/**
 * Media-type dispatch for graph traversal.
 *
 * A registry maps each manifest-like media type to a function extracting
 * the child descriptors it embeds, and lists the media types known to be
 * leaves. Anything else is rejected rather than treated as a leaf.
 */

import type { ContentStore, Descriptor } from "#/content";
import { CATALOG_MEDIA_TYPES, OCI_MEDIA_TYPES, PLAIN_MEDIA_TYPES } from "#/constants";
import { UnsupportedMediaTypeError } from "#/errors";
import { decodeArtifactManifest, decodeImageIndex, decodeImageManifest } from "./decode";
import type { SuccessorRegistry } from "./graph.types";

export type SuccessorExtractor = (desc: Descriptor, content: Buffer) => Descriptor[];

export type MediaTypeClass = "manifest" | "leaf" | "unknown";

export class MediaTypeRegistry implements SuccessorRegistry {
  private readonly extractors = new Map<string, SuccessorExtractor>();
  private readonly leaves = new Set<string>();

  register(mediaType: string, extractor: SuccessorExtractor): this {
    this.leaves.delete(mediaType);
    this.extractors.set(mediaType, extractor);
    return this;
  }

  registerLeaf(...mediaTypes: string[]): this {
    for (const mediaType of mediaTypes) {
      this.extractors.delete(mediaType);
      this.leaves.add(mediaType);
    }
    return this;
  }

  classify(mediaType: string): MediaTypeClass {
    if (this.extractors.has(mediaType)) return "manifest";
    if (this.leaves.has(mediaType)) return "leaf";
    return "unknown";
  }

  /**
   * Children embedded in `content`, in manifest order. Leaves have none
   * and are never decoded.
   */
  successors(desc: Descriptor, content: Buffer): Descriptor[] {
    const extractor = this.extractors.get(desc.mediaType);
    if (extractor) return extractor(desc, content);
    if (this.leaves.has(desc.mediaType)) return [];
    throw new UnsupportedMediaTypeError(desc.mediaType, desc.digest);
  }

  clone(): MediaTypeRegistry {
    const copy = new MediaTypeRegistry();
    for (const [mediaType, extractor] of this.extractors) copy.register(mediaType, extractor);
    copy.registerLeaf(...this.leaves);
    return copy;
  }
}

const artifactSuccessors: SuccessorExtractor = (desc, content) => decodeArtifactManifest(desc, content).blobs;

const indexSuccessors: SuccessorExtractor = (desc, content) => decodeImageIndex(desc, content).manifests;

const manifestSuccessors: SuccessorExtractor = (desc, content) => {
  const manifest = decodeImageManifest(desc, content);
  return [manifest.config, ...manifest.layers];
};

export function createDefaultMediaTypeRegistry(): MediaTypeRegistry {
  return new MediaTypeRegistry()
    .register(OCI_MEDIA_TYPES.artifactManifest, artifactSuccessors)
    .register(OCI_MEDIA_TYPES.imageIndex, indexSuccessors)
    .register(OCI_MEDIA_TYPES.dockerManifestList, indexSuccessors)
    .register(OCI_MEDIA_TYPES.imageManifest, manifestSuccessors)
    .register(OCI_MEDIA_TYPES.dockerManifest, manifestSuccessors)
    .registerLeaf(
      OCI_MEDIA_TYPES.imageConfig,
      OCI_MEDIA_TYPES.imageLayer,
      OCI_MEDIA_TYPES.imageLayerGzip,
      OCI_MEDIA_TYPES.imageLayerNonDistributableGzip,
      OCI_MEDIA_TYPES.dockerConfig,
      OCI_MEDIA_TYPES.dockerLayer,
      OCI_MEDIA_TYPES.dockerForeignLayer,
      OCI_MEDIA_TYPES.dockerForeignLayerGzip,
      CATALOG_MEDIA_TYPES.packageMetadata,
      CATALOG_MEDIA_TYPES.upgradeEdges,
      CATALOG_MEDIA_TYPES.channelMetadata,
      CATALOG_MEDIA_TYPES.bundleMetadata,
      CATALOG_MEDIA_TYPES.relatedImages,
      CATALOG_MEDIA_TYPES.bundleContent,
      CATALOG_MEDIA_TYPES.properties,
      CATALOG_MEDIA_TYPES.constraints,
      PLAIN_MEDIA_TYPES.markdown,
      PLAIN_MEDIA_TYPES.svg,
      PLAIN_MEDIA_TYPES.png
    );
}

export const defaultMediaTypeRegistry = createDefaultMediaTypeRegistry();

/**
 * Fetch `desc` and return its children. Leaves are not fetched.
 */
export async function successorsOf(
  store: Pick<ContentStore, "fetch">,
  desc: Descriptor,
  registry: MediaTypeRegistry = defaultMediaTypeRegistry
): Promise<Descriptor[]> {
  switch (registry.classify(desc.mediaType)) {
    case "leaf":
      return [];
    case "unknown":
      throw new UnsupportedMediaTypeError(desc.mediaType, desc.digest);
    case "manifest":
      return registry.successors(desc, await store.fetch(desc));
  }
}
