import type { TarFile } from "#/core";
import type {
  BundleMetadata,
  ChannelMetadata,
  PackageMetadata,
  RelatedImage,
  TypeValue,
  UpgradeEdges,
} from "#/schemas";
import type { Bundle, Channel } from "./catalog";

export interface Icon {
  data: Buffer;
  /** image/svg+xml or image/png */
  mediaType: string;
}

export interface PackageInit {
  metadata: PackageMetadata;
  description?: string;
  icon?: Icon;
  /** Expanded edges keyed by "<version>-<release>" */
  upgradeEdges?: UpgradeEdges;
  properties?: TypeValue[];
  channels?: Channel[];
}

export interface ChannelInit {
  metadata: ChannelMetadata;
  properties?: TypeValue[];
  bundles?: Bundle[];
}

export interface BundleInit {
  metadata: BundleMetadata;
  properties?: TypeValue[];
  constraints?: TypeValue[];
  relatedImages?: RelatedImage[];
  /** Packaging convention of the content tree, e.g. registry+v1 */
  contentMediaType: string;
  /** Absent for a sparse bundle fetched without its content */
  content?: TarFile[];
  /** Manifest digest, known when the bundle was fetched from a store */
  digest?: string;
}

// File-based catalog entries produced by toDeclarativeConfig

export interface DeclarativeProperty {
  type: string;
  value: unknown;
}

export interface DeclarativePackage {
  schema: "olm.package";
  name: string;
  description?: string;
  icon?: { base64data: string; mediatype: string };
  properties: DeclarativeProperty[];
}

export interface DeclarativeChannelEntry {
  name: string;
  replaces?: string;
}

export interface DeclarativeChannel {
  schema: "olm.channel";
  package: string;
  name: string;
  entries: DeclarativeChannelEntry[];
  properties: DeclarativeProperty[];
}

export interface DeclarativeBundle {
  schema: "olm.bundle";
  package: string;
  name: string;
  image: string;
  properties: DeclarativeProperty[];
}

export interface DeclarativeConfig {
  packages: DeclarativePackage[];
  channels: DeclarativeChannel[];
  bundles: DeclarativeBundle[];
}

export interface FetchOptions {
  /** Blob media types left unfetched, e.g. bundle content for sparse bundles */
  skipMediaTypes?: string[];
  signal?: AbortSignal;
}
