/**
 * Catalog domain model: load, build, project and reconstruct
 * Catalog > Package > Channel > Bundle trees.
 */

export { Catalog, Package, Channel, Bundle, fullVersion } from "./catalog";
export { YamlBlob, DescriptionBlob, IconBlob, BundleContentBlob } from "./blobs";
export { CatalogError } from "./errors";
export { expandUpgradeEdges, hasUpgradeEdges } from "./upgrade-edges";
export { toDeclarativeConfig, bundleDigest, PROPERTY_TYPES } from "./declarative";
export { loadCatalog, loadPackage, loadChannel, loadBundle } from "./loader";
export { fetchArtifactManifest, fetchPackage, fetchChannel, fetchBundle } from "./fetch";
export type {
  Icon,
  PackageInit,
  ChannelInit,
  BundleInit,
  FetchOptions,
  DeclarativeConfig,
  DeclarativePackage,
  DeclarativeChannel,
  DeclarativeChannelEntry,
  DeclarativeBundle,
  DeclarativeProperty,
} from "./catalog.types";
