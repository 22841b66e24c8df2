/**
 * Global constants for the catalog engine
 */

export const DEFAULT_REGISTRY_HOST = "docker.io";
export const DEFAULT_REGISTRY_API_HOST = "registry-1.docker.io";
export const USER_AGENT = "oci-catalog-engine";

// Upper bound on concurrent blob/manifest pushes within one build
export const MAX_DEFAULT_CONCURRENCY = 8;

// Annotation written into an OCI layout index.json to name a tagged manifest
export const ANNOTATION_REF_NAME = "org.opencontainers.image.ref.name";

/**
 * Standard OCI and Docker media types the graph engine understands.
 */
export const OCI_MEDIA_TYPES = {
  artifactManifest: "application/vnd.oci.artifact.manifest.v1+json",
  imageIndex: "application/vnd.oci.image.index.v1+json",
  imageManifest: "application/vnd.oci.image.manifest.v1+json",
  imageConfig: "application/vnd.oci.image.config.v1+json",
  imageLayer: "application/vnd.oci.image.layer.v1.tar",
  imageLayerGzip: "application/vnd.oci.image.layer.v1.tar+gzip",
  imageLayerNonDistributableGzip: "application/vnd.oci.image.layer.nondistributable.v1.tar+gzip",
  dockerManifestList: "application/vnd.docker.distribution.manifest.list.v2+json",
  dockerManifest: "application/vnd.docker.distribution.manifest.v2+json",
  dockerConfig: "application/vnd.docker.container.image.v1+json",
  dockerLayer: "application/vnd.docker.image.rootfs.diff.tar.gzip",
  dockerForeignLayer: "application/vnd.docker.image.rootfs.foreign.diff.tar",
  dockerForeignLayerGzip: "application/vnd.docker.image.rootfs.foreign.diff.tar.gzip",
} as const;

/**
 * Catalog-domain media types (artifact types and blob media types).
 */
export const CATALOG_MEDIA_TYPES = {
  catalog: "application/vnd.cncf.operatorframework.olm.catalog.v1",
  package: "application/vnd.cncf.operatorframework.olm.package.v1",
  packageMetadata: "application/vnd.cncf.operatorframework.olm.package.metadata.v1+yaml",
  upgradeEdges: "application/vnd.cncf.operatorframework.olm.upgrade-edges.v1+yaml",
  channel: "application/vnd.cncf.operatorframework.olm.channel.v1",
  channelMetadata: "application/vnd.cncf.operatorframework.olm.channel.metadata.v1+yaml",
  bundle: "application/vnd.cncf.operatorframework.olm.bundle.v1",
  bundleMetadata: "application/vnd.cncf.operatorframework.olm.bundle.metadata.v1+yaml",
  relatedImages: "application/vnd.cncf.operatorframework.olm.bundle.related-images.v1+yaml",
  bundleContent: "application/vnd.cncf.operatorframework.olm.bundle.content.v1.tar+gzip",
  properties: "application/vnd.cncf.operatorframework.olm.properties.v1+yaml",
  constraints: "application/vnd.cncf.operatorframework.olm.constraints.v1+yaml",
} as const;

// Packaging conventions a bundle's content blob can follow
export const BUNDLE_FORMATS = {
  registryV1: "registry+v1",
  plainV0: "plain+v0",
} as const;

export const PLAIN_MEDIA_TYPES = {
  markdown: "text/markdown",
  svg: "image/svg+xml",
  png: "image/png",
} as const;

export const CATALOG_ANNOTATIONS = {
  name: "io.operatorframework.name",
  bundlePackage: "io.operatorframework.bundle.package",
  bundleVersion: "io.operatorframework.bundle.version",
  bundleRelease: "io.operatorframework.bundle.release",
  bundleContentMediaType: "io.operatorframework.bundle.content.mediatype",
} as const;

// Keys found in a registry+v1 bundle's metadata/annotations.yaml
export const LEGACY_BUNDLE_ANNOTATIONS = {
  package: "operators.operatorframework.io.bundle.package.v1",
  mediaType: "operators.operatorframework.io.bundle.mediatype.v1",
  dropped: [
    "operators.operatorframework.io.bundle.channel.default.v1",
    "operators.operatorframework.io.bundle.channels.v1",
    "operators.operatorframework.io.bundle.manifests.v1",
    "operators.operatorframework.io.bundle.metadata.v1",
  ],
} as const;

// Regex to parse the repository part of an OCI reference: repository[:tag][@digest]
// The registry host is split off before matching.
export const REPOSITORY_REFERENCE_REGEX =
  /^(?<repository>[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*(?:\/[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*)*)(?::(?<tag>\w[\w.-]{0,127}))?(?:@(?<digest>[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-zA-Z0-9=_-]+))?$/;
