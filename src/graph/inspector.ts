/**
 * Graph inspector
 *
 * Depth-first, read-only rendering of a graph. Each node is fetched once,
 * when the walk reaches it, and rendered by the decoder registered for its
 * media type. Children are visited in manifest order.
 */

import type { ContentStore, Descriptor } from "#/content";
import { CATALOG_MEDIA_TYPES, OCI_MEDIA_TYPES } from "#/constants";
import { GraphError, StoreError, errorMessage, throwIfCancelled } from "#/errors";
import { formatList, formatMap, formatMode } from "#/formatters";
import {
  decodeArtifactManifest,
  decodeBundleMetadata,
  decodeChannelMetadata,
  decodeImageConfig,
  decodeImageIndex,
  decodeImageManifest,
  decodePackageMetadata,
  decodeRelatedImages,
  decodeTarEntries,
  decodeTypeValues,
  decodeUpgradeEdges,
  type BundleContentEntry,
} from "./decode";
import type { InspectContext, InspectDecoder, InspectOptions } from "./graph.types";

const CHILD_INDENT = "    ";

/**
 * Render the graph under `root`. Rejects with OperationCancelledError when
 * the signal fires, checked before every node.
 */
export async function inspectGraph(
  store: Pick<ContentStore, "fetch">,
  root: Descriptor,
  options: InspectOptions = {}
): Promise<void> {
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const decoders = new Map(defaultDecoders);
  for (const [mediaType, decoder] of options.decoders ?? []) {
    decoders.set(mediaType, decoder);
  }

  const visit = async (desc: Descriptor, indent: string): Promise<void> => {
    throwIfCancelled(options.signal);

    write(`${indent}- Media Type: ${desc.mediaType}`);
    write(`${indent}  Digest: ${desc.digest}`);
    write(`${indent}  Size: ${desc.size}`);

    let content: Buffer;
    try {
      content = await store.fetch(desc);
    } catch (err) {
      if (err instanceof GraphError) throw err;
      throw new StoreError(`fetch ${desc.digest}: ${errorMessage(err)}`, {
        mediaType: desc.mediaType,
        digest: desc.digest,
        cause: err,
      });
    }

    const decoder = decoders.get(desc.mediaType);
    if (decoder) {
      await decoder({ desc, content, indent, write, visit });
    }
  };

  await visit(root, "");
}

async function visitAll(ctx: InspectContext, children: Descriptor[]): Promise<void> {
  for (const child of children) {
    await ctx.visit(child, `${ctx.indent}${CHILD_INDENT}`);
  }
}

function writeFiles(ctx: InspectContext, entries: BundleContentEntry[]): void {
  const { indent, write } = ctx;
  for (const entry of entries) {
    write(`${indent}    - Path: ${entry.path}`);
    write(`${indent}      Mode: ${formatMode(entry.mode)}`);
    write(`${indent}      Size: ${entry.size}`);
  }
}

const artifactDecoder: InspectDecoder = async (ctx) => {
  const { indent, write } = ctx;
  const manifest = decodeArtifactManifest(ctx.desc, ctx.content);
  write(`${indent}  Artifact Type: ${manifest.artifactType}`);
  write(`${indent}  Artifact Annotations: ${formatMap(manifest.annotations)}`);
  write(`${indent}  Artifact Blobs:`);
  await visitAll(ctx, manifest.blobs);
};

const imageIndexDecoder: InspectDecoder = async (ctx) => {
  const { indent, write } = ctx;
  const index = decodeImageIndex(ctx.desc, ctx.content);
  write(`${indent}  Image Index Annotations: ${formatMap(index.annotations)}`);
  write(`${indent}  Image Index Manifests:`);
  await visitAll(ctx, index.manifests);
};

const manifestListDecoder: InspectDecoder = async (ctx) => {
  const list = decodeImageIndex(ctx.desc, ctx.content);
  ctx.write(`${ctx.indent}  Manifest List Manifests:`);
  await visitAll(ctx, list.manifests);
};

const imageManifestDecoder: InspectDecoder = async (ctx) => {
  const { indent, write } = ctx;
  const manifest = decodeImageManifest(ctx.desc, ctx.content);
  write(`${indent}  Image Config:`);
  await visitAll(ctx, [manifest.config]);
  write(`${indent}  Image Manifest Layers:`);
  await visitAll(ctx, manifest.layers);
};

const imageConfigDecoder: InspectDecoder = (ctx) => {
  const { indent, write } = ctx;
  const image = decodeImageConfig(ctx.desc, ctx.content);
  write(`${indent}  Author: ${image.author}`);
  if (image.created) write(`${indent}  Created: ${image.created}`);
  write(`${indent}  OS: ${image.os}`);
  const osVersion = image["os.version"];
  if (osVersion) write(`${indent}  OS Version: ${osVersion}`);
  const osFeatures = image["os.features"];
  if (osFeatures && osFeatures.length > 0) write(`${indent}  OS Features: ${formatList(osFeatures)}`);
  write(`${indent}  Architecture: ${image.architecture}`);
  write(`${indent}  RootFS:`);
  write(`${indent}      Type: ${image.rootfs.type}`);
  write(`${indent}      DiffIDs:`);
  for (const id of image.rootfs.diff_ids) write(`${indent}          ${id}`);

  const config = image.config;
  write(`${indent}  Config:`);
  if (config.Labels && Object.keys(config.Labels).length > 0) write(`${indent}      Labels: ${formatMap(config.Labels)}`);
  write(`${indent}      User: ${config.User}`);
  if (config.Cmd && config.Cmd.length > 0) write(`${indent}      Cmd: ${formatList(config.Cmd)}`);
  write(`${indent}      Env:`);
  for (const env of config.Env) write(`${indent}          ${env}`);
  write(`${indent}      Entrypoint: ${formatList(config.Entrypoint)}`);
  if (config.ExposedPorts && Object.keys(config.ExposedPorts).length > 0) {
    write(`${indent}      ExposedPorts: ${formatList(Object.keys(config.ExposedPorts).sort())}`);
  }
  write(`${indent}      WorkingDir: ${config.WorkingDir}`);
  if (config.Volumes && Object.keys(config.Volumes).length > 0) {
    write(`${indent}      Volumes: ${formatList(Object.keys(config.Volumes).sort())}`);
  }
  if (config.StopSignal) write(`${indent}      StopSignal: ${config.StopSignal}`);
};

const layerDecoder =
  (gzip: boolean): InspectDecoder =>
  async (ctx) => {
    const entries = await decodeTarEntries(ctx.desc, ctx.content, { gzip });
    ctx.write(`${ctx.indent}  File Content:`);
    writeFiles(ctx, entries);
  };

const packageMetadataDecoder: InspectDecoder = (ctx) => {
  const { indent, write } = ctx;
  const metadata = decodePackageMetadata(ctx.desc, ctx.content);
  write(`${indent}  Package Metadata:`);
  write(`${indent}    Name: ${metadata.name}`);
  if (metadata.displayName) write(`${indent}    DisplayName: ${metadata.displayName}`);
  if (metadata.keywords && metadata.keywords.length > 0) write(`${indent}    Keywords: ${formatList(metadata.keywords)}`);
  if (metadata.urls && metadata.urls.length > 0) write(`${indent}    URLs: ${formatList(metadata.urls)}`);
  if (metadata.maintainers && metadata.maintainers.length > 0) {
    const maintainers = metadata.maintainers.map((m) => (m.name ? `${m.name} <${m.email}>` : m.email));
    write(`${indent}    Maintainers: ${formatList(maintainers)}`);
  }
};

const channelMetadataDecoder: InspectDecoder = (ctx) => {
  const metadata = decodeChannelMetadata(ctx.desc, ctx.content);
  ctx.write(`${ctx.indent}  Channel Metadata:`);
  ctx.write(`${ctx.indent}    Name: ${metadata.name}`);
};

const bundleMetadataDecoder: InspectDecoder = (ctx) => {
  const { indent, write } = ctx;
  const metadata = decodeBundleMetadata(ctx.desc, ctx.content);
  write(`${indent}  Bundle Metadata:`);
  write(`${indent}    Package: ${metadata.package}`);
  write(`${indent}    Version: ${metadata.version}`);
  write(`${indent}    Release: ${metadata.release}`);
};

const upgradeEdgesDecoder: InspectDecoder = (ctx) => {
  const { indent, write } = ctx;
  const edges = decodeUpgradeEdges(ctx.desc, ctx.content);
  write(`${indent}  Upgrade Edges:`);
  for (const from of Object.keys(edges).sort()) {
    write(`${indent}    - From: ${from}`);
    write(`${indent}      To: ${(edges[from] ?? []).join(", ")}`);
  }
};

const relatedImagesDecoder: InspectDecoder = (ctx) => {
  const { indent, write } = ctx;
  const images = decodeRelatedImages(ctx.desc, ctx.content);
  write(`${indent}  Related Images:`);
  for (const image of images) {
    write(`${indent}    - Image: ${image.image}`);
    if (image.name) write(`${indent}      Name: ${image.name}`);
  }
};

const bundleContentDecoder: InspectDecoder = async (ctx) => {
  const entries = await decodeTarEntries(ctx.desc, ctx.content);
  ctx.write(`${ctx.indent}  Bundle Content:`);
  writeFiles(ctx, entries);
};

const typeValuesDecoder =
  (heading: string): InspectDecoder =>
  (ctx) => {
    const { indent, write } = ctx;
    const values = decodeTypeValues(ctx.desc, ctx.content);
    if (values.length === 0) return;
    write(`${indent}  ${heading}:`);
    for (const value of values) {
      write(`${indent}    Type: ${value.type}`);
      write(`${indent}    Value: ${JSON.stringify(value.value ?? null)}`);
    }
  };

const defaultDecoders: ReadonlyMap<string, InspectDecoder> = new Map<string, InspectDecoder>([
  [OCI_MEDIA_TYPES.artifactManifest, artifactDecoder],
  [OCI_MEDIA_TYPES.imageIndex, imageIndexDecoder],
  [OCI_MEDIA_TYPES.dockerManifestList, manifestListDecoder],
  [OCI_MEDIA_TYPES.imageManifest, imageManifestDecoder],
  [OCI_MEDIA_TYPES.dockerManifest, imageManifestDecoder],
  [OCI_MEDIA_TYPES.imageConfig, imageConfigDecoder],
  [OCI_MEDIA_TYPES.dockerConfig, imageConfigDecoder],
  [OCI_MEDIA_TYPES.imageLayer, layerDecoder(false)],
  [OCI_MEDIA_TYPES.imageLayerGzip, layerDecoder(true)],
  [OCI_MEDIA_TYPES.dockerLayer, layerDecoder(true)],
  [CATALOG_MEDIA_TYPES.packageMetadata, packageMetadataDecoder],
  [CATALOG_MEDIA_TYPES.channelMetadata, channelMetadataDecoder],
  [CATALOG_MEDIA_TYPES.bundleMetadata, bundleMetadataDecoder],
  [CATALOG_MEDIA_TYPES.upgradeEdges, upgradeEdgesDecoder],
  [CATALOG_MEDIA_TYPES.relatedImages, relatedImagesDecoder],
  [CATALOG_MEDIA_TYPES.bundleContent, bundleContentDecoder],
  [CATALOG_MEDIA_TYPES.properties, typeValuesDecoder("Properties")],
  [CATALOG_MEDIA_TYPES.constraints, typeValuesDecoder("Constraints")],
]);
