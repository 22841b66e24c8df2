/**
 * Catalog domain model
 *
 * A fixed four-level artifact tree: Catalog > Package > Channel > Bundle.
 * Each level is an ArtifactNode, so the graph builder can push any of them
 * on its own.
 */

import { CATALOG_ANNOTATIONS, CATALOG_MEDIA_TYPES } from "#/constants";
import type { ArtifactNode, Blob } from "#/graph";
import type {
  BundleMetadata,
  ChannelMetadata,
  PackageMetadata,
  RelatedImage,
  TypeValue,
  UpgradeEdges,
} from "#/schemas";
import type { TarFile } from "#/core";
import { BundleContentBlob, DescriptionBlob, IconBlob, YamlBlob } from "./blobs";
import type { BundleInit, ChannelInit, Icon, PackageInit } from "./catalog.types";

export class Catalog implements ArtifactNode {
  readonly packages: Package[];

  constructor(packages: Package[] = []) {
    this.packages = packages;
  }

  artifactType(): string {
    return CATALOG_MEDIA_TYPES.catalog;
  }

  annotations(): Record<string, string> {
    return {};
  }

  subArtifacts(): ArtifactNode[] {
    return this.packages;
  }

  blobs(): Blob[] {
    return [];
  }
}

export class Package implements ArtifactNode {
  readonly metadata: PackageMetadata;
  readonly description: string;
  readonly icon?: Icon;
  readonly upgradeEdges: UpgradeEdges;
  readonly properties: TypeValue[];
  readonly channels: Channel[];

  constructor(init: PackageInit) {
    this.metadata = init.metadata;
    this.description = init.description ?? "";
    this.icon = init.icon;
    this.upgradeEdges = init.upgradeEdges ?? {};
    this.properties = init.properties ?? [];
    this.channels = init.channels ?? [];
  }

  artifactType(): string {
    return CATALOG_MEDIA_TYPES.package;
  }

  annotations(): Record<string, string> {
    return { [CATALOG_ANNOTATIONS.name]: this.metadata.name };
  }

  subArtifacts(): ArtifactNode[] {
    return this.channels;
  }

  blobs(): Blob[] {
    const blobs: Blob[] = [new YamlBlob(CATALOG_MEDIA_TYPES.packageMetadata, this.metadata)];
    if (this.description !== "") blobs.push(new DescriptionBlob(this.description));
    if (this.icon) blobs.push(new IconBlob(this.icon));
    if (Object.keys(this.upgradeEdges).length > 0) {
      blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.upgradeEdges, this.upgradeEdges));
    }
    if (this.properties.length > 0) blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.properties, this.properties));
    return blobs;
  }
}

export class Channel implements ArtifactNode {
  readonly metadata: ChannelMetadata;
  readonly properties: TypeValue[];
  readonly bundles: Bundle[];

  constructor(init: ChannelInit) {
    this.metadata = init.metadata;
    this.properties = init.properties ?? [];
    this.bundles = init.bundles ?? [];
  }

  artifactType(): string {
    return CATALOG_MEDIA_TYPES.channel;
  }

  annotations(): Record<string, string> {
    return { [CATALOG_ANNOTATIONS.name]: this.metadata.name };
  }

  subArtifacts(): ArtifactNode[] {
    return this.bundles;
  }

  blobs(): Blob[] {
    const blobs: Blob[] = [new YamlBlob(CATALOG_MEDIA_TYPES.channelMetadata, this.metadata)];
    if (this.properties.length > 0) blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.properties, this.properties));
    return blobs;
  }
}

export class Bundle implements ArtifactNode {
  readonly metadata: BundleMetadata;
  readonly properties: TypeValue[];
  readonly constraints: TypeValue[];
  readonly relatedImages: RelatedImage[];
  readonly contentMediaType: string;
  readonly content?: TarFile[];
  readonly digest?: string;

  constructor(init: BundleInit) {
    this.metadata = init.metadata;
    this.properties = init.properties ?? [];
    this.constraints = init.constraints ?? [];
    this.relatedImages = init.relatedImages ?? [];
    this.contentMediaType = init.contentMediaType;
    this.content = init.content;
    this.digest = init.digest;
  }

  /** "<version>-<release>", the key used by upgrade edges */
  get fullVersion(): string {
    return fullVersion(this.metadata);
  }

  /** Fetched without its content: only the digest can be trusted */
  get sparse(): boolean {
    return this.content === undefined;
  }

  artifactType(): string {
    return CATALOG_MEDIA_TYPES.bundle;
  }

  annotations(): Record<string, string> {
    return {
      [CATALOG_ANNOTATIONS.bundleVersion]: this.metadata.version,
      [CATALOG_ANNOTATIONS.bundleRelease]: String(this.metadata.release),
      [CATALOG_ANNOTATIONS.bundleContentMediaType]: this.contentMediaType,
    };
  }

  subArtifacts(): ArtifactNode[] {
    return [];
  }

  blobs(): Blob[] {
    const blobs: Blob[] = [new YamlBlob(CATALOG_MEDIA_TYPES.bundleMetadata, this.metadata)];
    if (this.properties.length > 0) blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.properties, this.properties));
    if (this.constraints.length > 0) blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.constraints, this.constraints));
    if (this.relatedImages.length > 0) {
      blobs.push(new YamlBlob(CATALOG_MEDIA_TYPES.relatedImages, this.relatedImages));
    }
    blobs.push(new BundleContentBlob(this.content));
    return blobs;
  }
}

export function fullVersion(metadata: Pick<BundleMetadata, "version" | "release">): string {
  return `${metadata.version}-${metadata.release}`;
}
