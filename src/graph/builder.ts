/**
 * Graph builder
 *
 * Turns an ArtifactNode tree into content-addressed artifact manifests,
 * bottom-up. Children of a node are built concurrently; once all of them
 * are in the store their descriptors are sorted by digest and the node's
 * manifest is encoded and pushed.
 *
 * `pushArtifact` builds into a private MemoryStore first, then copies only
 * what the target lacks. A failed build therefore never writes to the target.
 */

import { defaultConcurrency } from "#/config";
import {
  compareByDigest,
  descriptorFromBytes,
  MemoryStore,
  type ContentStore,
  type Descriptor,
} from "#/content";
import { OCI_MEDIA_TYPES } from "#/constants";
import { ArtifactBuildError, GraphError, errorMessage, throwIfCancelled } from "#/errors";
import { copyGraph } from "./copier";
import type { ArtifactNode, Blob, BuildOptions, PushOptions, PushResult } from "./graph.types";
import { encodeManifest } from "./manifest";
import { TaskGroup } from "./task-group";

/**
 * Build `node` into `store` and return the root manifest descriptor.
 * Against a throwaway MemoryStore this is a dry push: the digest without
 * any transfer.
 */
export async function buildGraph(
  node: ArtifactNode,
  store: ContentStore,
  options: BuildOptions = {}
): Promise<Descriptor> {
  const group = new TaskGroup({
    concurrency: options.concurrency ?? defaultConcurrency(),
    signal: options.signal,
  });
  try {
    return await group.run(() => buildNode(node, store, group));
  } finally {
    group.dispose();
  }
}

/**
 * Build `node` in a staging store, then copy the graph to `target`.
 */
export async function pushArtifact(
  node: ArtifactNode,
  target: ContentStore,
  options: PushOptions = {}
): Promise<PushResult> {
  const staging = new MemoryStore();
  const descriptor = await buildGraph(node, staging, options);
  const bytesTransferred = await copyGraph(staging, target, descriptor, {
    tag: options.tag,
    concurrency: options.concurrency,
    signal: options.signal,
    logger: options.logger,
    onSkipped: options.onSkipped,
    onCopied: options.onCopied,
  });
  return { descriptor, bytesTransferred };
}

async function buildNode(node: ArtifactNode, store: ContentStore, group: TaskGroup): Promise<Descriptor> {
  const tasks: Array<() => Promise<Descriptor>> = [
    ...node.subArtifacts().map((sub) => () => buildNode(sub, store, group)),
    ...node.blobs().map((blob) => () => group.limited(() => pushBlob(blob, store, group.signal))),
  ];
  const children = await group.all(tasks);
  children.sort(compareByDigest);

  const artifactType = node.artifactType();
  const data = encodeManifest({ artifactType, blobs: children, annotations: node.annotations() });
  const desc = descriptorFromBytes(OCI_MEDIA_TYPES.artifactManifest, data);

  await group.limited(async () => {
    try {
      await pushIfAbsent(store, desc, data, group.signal);
    } catch (err) {
      throw wrapPushError(err, `push artifact ${JSON.stringify(artifactType)} with digest ${desc.digest} failed`, desc);
    }
  });
  return desc;
}

async function pushBlob(blob: Blob, store: ContentStore, signal: AbortSignal): Promise<Descriptor> {
  const mediaType = blob.mediaType();
  let data: Buffer;
  try {
    data = await blob.data();
  } catch (err) {
    throw new ArtifactBuildError(`read blob ${JSON.stringify(mediaType)}: ${errorMessage(err)}`, {
      mediaType,
      cause: err,
    });
  }

  // A sibling may have failed while this blob was being read
  throwIfCancelled(signal);

  const desc = descriptorFromBytes(mediaType, data);
  try {
    await pushIfAbsent(store, desc, data, signal);
  } catch (err) {
    throw wrapPushError(err, `push blob ${JSON.stringify(mediaType)} with digest ${desc.digest} failed`, desc);
  }
  return desc;
}

async function pushIfAbsent(
  store: ContentStore,
  desc: Descriptor,
  data: Buffer,
  signal: AbortSignal
): Promise<void> {
  if (await store.exists(desc)) return;
  throwIfCancelled(signal);
  await store.push(desc, data);
}

function wrapPushError(err: unknown, message: string, desc: Descriptor): GraphError {
  if (err instanceof GraphError && err.code === "CANCELLED") return err;
  return new ArtifactBuildError(`${message}: ${errorMessage(err)}`, {
    mediaType: desc.mediaType,
    digest: desc.digest,
    cause: err,
  });
}
