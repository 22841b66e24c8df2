/**
 * Blob kinds carried by catalog artifacts.
 */

import { stringify } from "yaml";
import { createTarball, type TarFile } from "#/core";
import { PLAIN_MEDIA_TYPES, CATALOG_MEDIA_TYPES } from "#/constants";
import type { Blob } from "#/graph";
import type { Icon } from "./catalog.types";

/**
 * Structured metadata serialized as YAML with sorted keys, so equal values
 * always produce equal bytes.
 */
export class YamlBlob implements Blob {
  constructor(
    private readonly type: string,
    private readonly value: unknown
  ) {}

  mediaType(): string {
    return this.type;
  }

  async data(): Promise<Buffer> {
    return Buffer.from(stringify(this.value, { sortMapEntries: true }), "utf-8");
  }
}

export class DescriptionBlob implements Blob {
  constructor(private readonly markdown: string) {}

  mediaType(): string {
    return PLAIN_MEDIA_TYPES.markdown;
  }

  async data(): Promise<Buffer> {
    return Buffer.from(this.markdown, "utf-8");
  }
}

export class IconBlob implements Blob {
  constructor(private readonly icon: Icon) {}

  mediaType(): string {
    return this.icon.mediaType;
  }

  async data(): Promise<Buffer> {
    return this.icon.data;
  }
}

/**
 * The bundle's file tree as a reproducible gzip tarball.
 */
export class BundleContentBlob implements Blob {
  constructor(private readonly files: TarFile[] | undefined) {}

  mediaType(): string {
    return CATALOG_MEDIA_TYPES.bundleContent;
  }

  async data(): Promise<Buffer> {
    if (!this.files) {
      throw new Error("bundle content was not loaded");
    }
    return createTarball(this.files);
  }
}
