/**
 * Rebuild domain objects from a store, starting at an artifact manifest.
 *
 * Blobs whose media type is listed in `skipMediaTypes` are never fetched.
 * Skipping the bundle content yields sparse bundles that keep only their
 * manifest digest.
 */

import type { ContentStore, Descriptor } from "#/content";
import { readTarball, type TarFile } from "#/core";
import { CATALOG_ANNOTATIONS, CATALOG_MEDIA_TYPES, OCI_MEDIA_TYPES, PLAIN_MEDIA_TYPES } from "#/constants";
import { GraphError, StoreError, errorMessage, throwIfCancelled } from "#/errors";
import {
  decodeArtifactManifest,
  decodeBundleMetadata,
  decodeChannelMetadata,
  decodePackageMetadata,
  decodeRelatedImages,
  decodeTypeValues,
  decodeUpgradeEdges,
} from "#/graph";
import type { ArtifactManifest, BundleMetadata, ChannelMetadata, PackageMetadata } from "#/schemas";
import { Bundle, Channel, Package } from "./catalog";
import type { BundleInit, ChannelInit, FetchOptions, PackageInit } from "./catalog.types";
import { CatalogError } from "./errors";

type Fetcher = Pick<ContentStore, "fetch">;

export async function fetchArtifactManifest(
  store: Fetcher,
  desc: Descriptor,
  options: Pick<FetchOptions, "signal"> = {}
): Promise<ArtifactManifest> {
  if (desc.mediaType !== OCI_MEDIA_TYPES.artifactManifest) {
    throw new CatalogError(`expected artifact manifest, got ${JSON.stringify(desc.mediaType)}`);
  }
  return decodeArtifactManifest(desc, await fetchBytes(store, desc, options.signal));
}

export async function fetchPackage(
  store: Fetcher,
  manifest: ArtifactManifest,
  options: FetchOptions = {}
): Promise<Package> {
  expectArtifactType(manifest, CATALOG_MEDIA_TYPES.package);
  const skips = new Set(options.skipMediaTypes);

  let metadata: PackageMetadata | undefined;
  const init: Omit<PackageInit, "metadata"> = {};
  const channels: Channel[] = [];

  for (const blob of manifest.blobs) {
    if (skips.has(blob.mediaType)) continue;

    if (blob.mediaType === OCI_MEDIA_TYPES.artifactManifest) {
      const child = await fetchArtifactManifest(store, blob, options);
      if (child.artifactType !== CATALOG_MEDIA_TYPES.channel) {
        throw unexpectedArtifact(CATALOG_MEDIA_TYPES.channel, child.artifactType);
      }
      channels.push(await fetchChannel(store, child, options));
      continue;
    }

    const content = await fetchBytes(store, blob, options.signal);
    switch (blob.mediaType) {
      case CATALOG_MEDIA_TYPES.packageMetadata:
        metadata = decodePackageMetadata(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.upgradeEdges:
        init.upgradeEdges = decodeUpgradeEdges(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.properties:
        init.properties = decodeTypeValues(blob, content);
        break;
      case PLAIN_MEDIA_TYPES.svg:
      case PLAIN_MEDIA_TYPES.png:
        init.icon = { data: content, mediaType: blob.mediaType };
        break;
      case PLAIN_MEDIA_TYPES.markdown:
        init.description = content.toString("utf-8");
        break;
      default:
        throw new CatalogError(`unsupported package blob media type ${JSON.stringify(blob.mediaType)}`);
    }
  }

  return new Package({ ...init, metadata: required(metadata, "package"), channels });
}

export async function fetchChannel(
  store: Fetcher,
  manifest: ArtifactManifest,
  options: FetchOptions = {}
): Promise<Channel> {
  expectArtifactType(manifest, CATALOG_MEDIA_TYPES.channel);
  const skips = new Set(options.skipMediaTypes);

  let metadata: ChannelMetadata | undefined;
  const init: Omit<ChannelInit, "metadata"> = {};
  const bundles: Bundle[] = [];

  for (const blob of manifest.blobs) {
    if (skips.has(blob.mediaType)) continue;

    if (blob.mediaType === OCI_MEDIA_TYPES.artifactManifest) {
      const child = await fetchArtifactManifest(store, blob, options);
      if (child.artifactType !== CATALOG_MEDIA_TYPES.bundle) {
        throw unexpectedArtifact(CATALOG_MEDIA_TYPES.bundle, child.artifactType);
      }
      bundles.push(await fetchBundle(store, child, { ...options, digest: blob.digest }));
      continue;
    }

    const content = await fetchBytes(store, blob, options.signal);
    switch (blob.mediaType) {
      case CATALOG_MEDIA_TYPES.channelMetadata:
        metadata = decodeChannelMetadata(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.properties:
        init.properties = decodeTypeValues(blob, content);
        break;
      default:
        throw new CatalogError(`unsupported channel blob media type ${JSON.stringify(blob.mediaType)}`);
    }
  }

  return new Channel({ ...init, metadata: required(metadata, "channel"), bundles });
}

export async function fetchBundle(
  store: Fetcher,
  manifest: ArtifactManifest,
  options: FetchOptions & { digest?: string } = {}
): Promise<Bundle> {
  expectArtifactType(manifest, CATALOG_MEDIA_TYPES.bundle);
  const skips = new Set(options.skipMediaTypes);

  let metadata: BundleMetadata | undefined;
  const init: Omit<BundleInit, "metadata" | "contentMediaType"> = { digest: options.digest };

  for (const blob of manifest.blobs) {
    if (skips.has(blob.mediaType)) continue;

    const content = await fetchBytes(store, blob, options.signal);
    switch (blob.mediaType) {
      case CATALOG_MEDIA_TYPES.bundleMetadata:
        metadata = decodeBundleMetadata(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.properties:
        init.properties = decodeTypeValues(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.constraints:
        init.constraints = decodeTypeValues(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.relatedImages:
        init.relatedImages = decodeRelatedImages(blob, content);
        break;
      case CATALOG_MEDIA_TYPES.bundleContent:
        init.content = await decodeBundleFiles(blob, content);
        break;
      default:
        throw new CatalogError(`unsupported bundle blob media type ${JSON.stringify(blob.mediaType)}`);
    }
  }

  return new Bundle({
    ...init,
    metadata: required(metadata, "bundle"),
    contentMediaType: manifest.annotations?.[CATALOG_ANNOTATIONS.bundleContentMediaType] ?? "",
  });
}

async function decodeBundleFiles(desc: Descriptor, content: Buffer): Promise<TarFile[]> {
  try {
    const entries = await readTarball(content);
    return entries
      .filter((entry) => entry.type === "file")
      .map((entry) => ({ path: entry.path, content: entry.content, mode: entry.mode }));
  } catch (err) {
    throw new CatalogError(`decode bundle content ${desc.digest}: ${errorMessage(err)}`, { cause: err });
  }
}

async function fetchBytes(store: Fetcher, desc: Descriptor, signal?: AbortSignal): Promise<Buffer> {
  throwIfCancelled(signal);
  try {
    return await store.fetch(desc);
  } catch (err) {
    if (err instanceof GraphError) throw err;
    throw new StoreError(`fetch ${desc.digest}: ${errorMessage(err)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
      cause: err,
    });
  }
}

function expectArtifactType(manifest: ArtifactManifest, expected: string): void {
  if (manifest.artifactType !== expected) {
    throw unexpectedArtifact(expected, manifest.artifactType);
  }
}

function unexpectedArtifact(expected: string, actual: string | undefined): CatalogError {
  return new CatalogError(`expected artifact type ${JSON.stringify(expected)}, got ${JSON.stringify(actual ?? "")}`);
}

function required<T>(value: T | undefined, kind: string): T {
  if (value === undefined) {
    throw new CatalogError(`${kind} artifact has no ${kind} metadata blob`);
  }
  return value;
}
