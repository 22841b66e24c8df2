/**
 * Local archive store
 *
 * An OCI image layout on disk:
 *
 *   <root>/oci-layout
 *   <root>/index.json          tags, via the ref.name annotation
 *   <root>/blobs/<alg>/<hex>   one file per object
 *
 * The whole layout can be serialized to (and restored from) a gzip tarball.
 *
 * @see https://github.com/opencontainers/image-spec/blob/main/image-layout.md
 */

import { posix } from "path";
import { createTarball, readTarball, validateTarEntries, type FileSystem, type TarFile } from "#/core";
import { ANNOTATION_REF_NAME, OCI_MEDIA_TYPES } from "#/constants";
import { StoreError } from "#/errors";
import { formatFriendlyError, safeParseJson } from "#/friendly-errors";
import { ImageIndexSchema, type ImageIndex } from "#/schemas";
import type { ContentStore, Descriptor } from "./content.types";
import { parseDigest, verifyContent } from "./descriptor";

const LAYOUT_FILE = "oci-layout";
const INDEX_FILE = "index.json";
const IMAGE_LAYOUT_VERSION = "1.0.0";

export class ArchiveStore implements ContentStore {
  constructor(
    private readonly fs: FileSystem,
    readonly root: string
  ) {}

  async exists(desc: Descriptor): Promise<boolean> {
    return this.fs.exists(this.blobPath(desc.digest));
  }

  async fetch(desc: Descriptor): Promise<Buffer> {
    const path = this.blobPath(desc.digest);
    if (!this.fs.exists(path)) {
      throw new StoreError(`${desc.digest}: not found`, { mediaType: desc.mediaType, digest: desc.digest });
    }
    return this.fs.readFileBinary(path);
  }

  async push(desc: Descriptor, content: Buffer): Promise<void> {
    const path = this.blobPath(desc.digest);
    if (this.fs.exists(path)) return;
    verifyContent(desc, content);
    this.ensureLayout();
    this.fs.mkdir(posix.dirname(path), { recursive: true });
    this.fs.writeFileBinary(path, content);
  }

  async tag(desc: Descriptor, reference: string): Promise<void> {
    if (!(await this.exists(desc))) {
      throw new StoreError(`cannot tag ${reference}: ${desc.digest} not found`, {
        mediaType: desc.mediaType,
        digest: desc.digest,
      });
    }
    const index = this.readIndex();
    const manifests = index.manifests.filter((m) => m.annotations?.[ANNOTATION_REF_NAME] !== reference);
    manifests.push({
      ...desc,
      annotations: { ...desc.annotations, [ANNOTATION_REF_NAME]: reference },
    });
    this.writeIndex({ ...index, manifests });
  }

  async pushReference(desc: Descriptor, content: Buffer, reference: string): Promise<void> {
    await this.push(desc, content);
    await this.tag(desc, reference);
  }

  async resolve(reference: string): Promise<Descriptor> {
    const entry = this.readIndex().manifests.find((m) => m.annotations?.[ANNOTATION_REF_NAME] === reference);
    if (!entry) {
      throw new StoreError(`${reference}: not found`);
    }
    const { [ANNOTATION_REF_NAME]: _refName, ...annotations } = entry.annotations ?? {};
    const { annotations: _annotations, ...rest } = entry;
    return Object.keys(annotations).length > 0 ? { ...rest, annotations } : rest;
  }

  listTags(): string[] {
    return this.readIndex()
      .manifests.map((m) => m.annotations?.[ANNOTATION_REF_NAME])
      .filter((ref): ref is string => ref !== undefined)
      .sort();
  }

  /**
   * Serialize the layout as a reproducible gzip tarball.
   */
  async toTarball(): Promise<Buffer> {
    this.ensureLayout();
    const files: TarFile[] = [];
    const walk = (dir: string): void => {
      for (const entry of this.fs.readdir(dir)) {
        const fullPath = posix.join(dir, entry);
        const stat = this.fs.stat(fullPath);
        if (stat.isDirectory) {
          walk(fullPath);
        } else if (stat.isFile) {
          files.push({ path: posix.relative(this.root, fullPath), content: this.fs.readFileBinary(fullPath) });
        }
      }
    };
    walk(this.root);
    return createTarball(files);
  }

  /**
   * Restore a layout written by `toTarball` into `root`.
   */
  static async fromTarball(fs: FileSystem, root: string, data: Buffer): Promise<ArchiveStore> {
    const entries = await readTarball(data);
    const validation = validateTarEntries(entries);
    if (!validation.safe) {
      throw new StoreError(`unsafe archive: ${validation.violations.join("; ")}`);
    }
    for (const entry of entries) {
      if (entry.type !== "file") continue;
      const path = posix.join(root, entry.path);
      fs.mkdir(posix.dirname(path), { recursive: true });
      fs.writeFileBinary(path, entry.content);
    }
    const store = new ArchiveStore(fs, root);
    store.readIndex();
    return store;
  }

  private blobPath(digest: string): string {
    const { algorithm, encoded } = parseDigest(digest);
    return posix.join(this.root, "blobs", algorithm, encoded);
  }

  private ensureLayout(): void {
    const layoutPath = posix.join(this.root, LAYOUT_FILE);
    if (!this.fs.exists(layoutPath)) {
      this.fs.mkdir(this.root, { recursive: true });
      this.fs.writeFile(layoutPath, JSON.stringify({ imageLayoutVersion: IMAGE_LAYOUT_VERSION }));
    }
    if (!this.fs.exists(posix.join(this.root, INDEX_FILE))) {
      this.writeIndex({ schemaVersion: 2, mediaType: OCI_MEDIA_TYPES.imageIndex, manifests: [] });
    }
  }

  private readIndex(): ImageIndex {
    const path = posix.join(this.root, INDEX_FILE);
    if (!this.fs.exists(path)) {
      return { schemaVersion: 2, mediaType: OCI_MEDIA_TYPES.imageIndex, manifests: [] };
    }
    const result = safeParseJson(this.fs.readFile(path), ImageIndexSchema, path);
    if (!result.success) {
      throw new StoreError(formatFriendlyError(result.error));
    }
    return result.data;
  }

  private writeIndex(index: ImageIndex): void {
    this.fs.mkdir(this.root, { recursive: true });
    this.fs.writeFile(posix.join(this.root, INDEX_FILE), JSON.stringify(index));
  }
}
