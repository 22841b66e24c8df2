/**
 * Graph copier
 *
 * Replicates the graph under a root descriptor from one store to another
 * by media-type dispatch alone. A node already present at the destination
 * is skipped together with its whole subtree: it can only have got there
 * by a complete earlier copy. Children always land before their parent.
 *
 * Nothing is rolled back on failure. Objects are content-addressed and
 * inert until tagged, and a rerun resumes from what already arrived.
 */

import { shortDigest, type ContentStore, type Descriptor } from "#/content";
import { CopyError, GraphError, StoreError, errorMessage } from "#/errors";
import { formatBytes } from "#/formatters";
import { getLogger } from "#/logging";
import type { CopyOptions } from "./graph.types";
import { defaultMediaTypeRegistry } from "./media-types";
import { TaskGroup } from "./task-group";

/**
 * Copy the graph rooted at `root` and return the bytes pushed to `dest`.
 * Throws CopyError carrying the byte count reached before the failure.
 */
export async function copyGraph(
  src: Pick<ContentStore, "fetch">,
  dest: ContentStore,
  root: Descriptor,
  options: CopyOptions = {}
): Promise<number> {
  const registry = options.registry ?? defaultMediaTypeRegistry;
  const logger = options.logger ?? getLogger("graph").child("copy");
  const concurrency = options.concurrency ?? 1;
  const group = new TaskGroup({ concurrency, signal: options.signal });
  const inflight = new Map<string, Promise<void>>();
  let bytesTransferred = 0;

  const copyOnce = (desc: Descriptor): Promise<void> => {
    const existing = inflight.get(desc.digest);
    if (existing) return existing;
    const started = copyNode(desc);
    inflight.set(desc.digest, started);
    return started;
  };

  const copyNode = async (desc: Descriptor, tag?: string): Promise<void> => {
    const type = typeForDescriptor(desc);

    const exists = await group.limited(() => storeCall(desc, "check", () => dest.exists(desc)));
    if (exists) {
      logger.info(`skipped ${JSON.stringify(type)} with digest ${JSON.stringify(desc.digest)}: already exists`, {
        mediaType: desc.mediaType,
        digest: desc.digest,
      });
      options.onSkipped?.(desc);
      if (tag !== undefined) {
        await group.limited(() => storeCall(desc, "tag", () => dest.tag(desc, tag)));
      }
      return;
    }

    const content = await group.limited(() => storeCall(desc, "fetch", () => src.fetch(desc)));
    const children = registry.successors(desc, content);

    if (concurrency > 1) {
      await group.all(children.map((child) => () => copyOnce(child)));
    } else {
      for (const child of children) {
        await group.run(() => copyOnce(child));
      }
    }

    await group.limited(async () => {
      try {
        if (tag !== undefined && dest.pushReference) {
          await dest.pushReference(desc, content, tag);
        } else {
          await dest.push(desc, content);
          if (tag !== undefined) await dest.tag(desc, tag);
        }
      } catch (err) {
        if (err instanceof GraphError && err.code === "CANCELLED") throw err;
        throw new StoreError(
          `failed pushing ${JSON.stringify(type)} with digest ${JSON.stringify(desc.digest)}: ${errorMessage(err)}`,
          { mediaType: desc.mediaType, digest: desc.digest, cause: err }
        );
      }
    });

    bytesTransferred += desc.size;
    logger.info(`pushed ${JSON.stringify(type)} with digest ${JSON.stringify(desc.digest)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
      size: desc.size,
    });
    options.onCopied?.(desc);
  };

  try {
    await group.run(() => copyNode(root, options.tag));
  } catch (err) {
    throw new CopyError(err, bytesTransferred);
  } finally {
    group.dispose();
  }
  logger.info(`copied ${shortDigest(root.digest)}: ${formatBytes(bytesTransferred)} transferred`, {
    digest: root.digest,
    bytesTransferred,
  });
  return bytesTransferred;
}

/**
 * Artifact type when the descriptor carries one, else its media type.
 */
export function typeForDescriptor(desc: Descriptor): string {
  return desc.artifactType || desc.mediaType;
}

async function storeCall<T>(desc: Descriptor, action: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof GraphError) throw err;
    throw new StoreError(`${action} ${desc.digest}: ${errorMessage(err)}`, {
      mediaType: desc.mediaType,
      digest: desc.digest,
      cause: err,
    });
  }
}
