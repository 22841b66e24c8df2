/**
 * Artifact graph engine: build, copy and inspect content-addressed graphs.
 */

export type {
  ArtifactNode,
  Blob,
  BuildOptions,
  CopyOptions,
  PushOptions,
  PushResult,
  SuccessorRegistry,
  InspectContext,
  InspectDecoder,
  InspectOptions,
} from "./graph.types";
export { buildGraph, pushArtifact } from "./builder";
export { copyGraph, typeForDescriptor } from "./copier";
export { inspectGraph } from "./inspector";
export {
  MediaTypeRegistry,
  createDefaultMediaTypeRegistry,
  defaultMediaTypeRegistry,
  successorsOf,
  type MediaTypeClass,
  type SuccessorExtractor,
} from "./media-types";
export { encodeManifest, encodeDescriptor, type ArtifactManifestInput } from "./manifest";
export { TaskGroup, type TaskGroupOptions } from "./task-group";
export {
  decodeJson,
  decodeYaml,
  decodeArtifactManifest,
  decodeImageIndex,
  decodeImageManifest,
  decodeImageConfig,
  decodePackageMetadata,
  decodeChannelMetadata,
  decodeBundleMetadata,
  decodeUpgradeEdges,
  decodeRelatedImages,
  decodeTypeValues,
  decodeTarEntries,
  type BundleContentEntry,
} from "./decode";
