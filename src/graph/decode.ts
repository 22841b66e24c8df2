/**
 * Typed decoders for the content of each recognized media type.
 *
 * Every failure surfaces as a ContentDecodeError naming the descriptor.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Descriptor } from "#/content";
import { listTarball, type TarEntry } from "#/core";
import { ContentDecodeError, errorMessage } from "#/errors";
import { formatFriendlyError, safeParseJson, safeParseYaml } from "#/friendly-errors";
import {
  ArtifactManifestSchema,
  BundleMetadataSchema,
  ChannelMetadataSchema,
  ImageConfigSchema,
  ImageIndexSchema,
  ImageManifestSchema,
  PackageMetadataSchema,
  RelatedImagesSchema,
  TypeValuesSchema,
  UpgradeEdgesSchema,
  type ArtifactManifest,
  type BundleMetadata,
  type ChannelMetadata,
  type ImageConfig,
  type ImageIndex,
  type ImageManifest,
  type PackageMetadata,
  type RelatedImage,
  type TypeValue,
  type UpgradeEdges,
} from "#/schemas";

export type BundleContentEntry = Omit<TarEntry, "content">;

export function decodeJson<Output, Input>(
  desc: Descriptor,
  content: Buffer,
  schema: ZodType<Output, ZodTypeDef, Input>
): Output {
  const result = safeParseJson(content.toString("utf-8"), schema, desc.mediaType);
  if (!result.success) {
    throw new ContentDecodeError(`decode ${desc.digest}: ${formatFriendlyError(result.error)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
    });
  }
  return result.data;
}

export function decodeYaml<Output, Input>(
  desc: Descriptor,
  content: Buffer,
  schema: ZodType<Output, ZodTypeDef, Input>
): Output {
  const result = safeParseYaml(content.toString("utf-8"), schema, desc.mediaType);
  if (!result.success) {
    throw new ContentDecodeError(`decode ${desc.digest}: ${formatFriendlyError(result.error)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
    });
  }
  return result.data;
}

export function decodeArtifactManifest(desc: Descriptor, content: Buffer): ArtifactManifest {
  return decodeJson(desc, content, ArtifactManifestSchema);
}

export function decodeImageIndex(desc: Descriptor, content: Buffer): ImageIndex {
  return decodeJson(desc, content, ImageIndexSchema);
}

export function decodeImageManifest(desc: Descriptor, content: Buffer): ImageManifest {
  return decodeJson(desc, content, ImageManifestSchema);
}

export function decodeImageConfig(desc: Descriptor, content: Buffer): ImageConfig {
  return decodeJson(desc, content, ImageConfigSchema);
}

export function decodePackageMetadata(desc: Descriptor, content: Buffer): PackageMetadata {
  return decodeYaml(desc, content, PackageMetadataSchema);
}

export function decodeChannelMetadata(desc: Descriptor, content: Buffer): ChannelMetadata {
  return decodeYaml(desc, content, ChannelMetadataSchema);
}

export function decodeBundleMetadata(desc: Descriptor, content: Buffer): BundleMetadata {
  return decodeYaml(desc, content, BundleMetadataSchema);
}

export function decodeUpgradeEdges(desc: Descriptor, content: Buffer): UpgradeEdges {
  return decodeYaml(desc, content, UpgradeEdgesSchema.nullable()) ?? {};
}

export function decodeRelatedImages(desc: Descriptor, content: Buffer): RelatedImage[] {
  return decodeYaml(desc, content, RelatedImagesSchema.nullable()) ?? [];
}

export function decodeTypeValues(desc: Descriptor, content: Buffer): TypeValue[] {
  return decodeYaml(desc, content, TypeValuesSchema.nullable()) ?? [];
}

/**
 * Regular files inside a tar payload, sorted by path.
 */
export async function decodeTarEntries(
  desc: Descriptor,
  content: Buffer,
  options: { gzip?: boolean } = {}
): Promise<BundleContentEntry[]> {
  try {
    return await listTarball(content, options);
  } catch (err) {
    throw new ContentDecodeError(`decode ${desc.digest}: ${errorMessage(err)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
      cause: err,
    });
  }
}
