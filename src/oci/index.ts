/**
 * OCI Distribution Spec module
 *
 * Native registry client and image reference parsing. RemoteStore in
 * #/content adapts the client to a ContentStore.
 */

export { OciClient, MANIFEST_MEDIA_TYPES } from "./oci-client";
export { parseReference, formatReference, tagOrDigest } from "./reference";
export type {
  OciRegistryConfig,
  OciReference,
  HeadResult,
  ResolveResult,
  PullManifestResult,
  PullBlobResult,
  UploadResult,
  ListTagsResult,
} from "./oci.types";
