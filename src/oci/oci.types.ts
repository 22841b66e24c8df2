/**
 * OCI Distribution Spec types
 *
 * Types for talking to OCI-compliant registries (GHCR, Docker Hub, Quay, ...).
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import type { Descriptor } from "#/content";

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** Registry host (e.g., ghcr.io, localhost:5000) */
  host: string;
  /** Personal access token or bearer token */
  token?: string;
  username?: string;
  password?: string;
  /** Talk http:// instead of https:// (local test registries) */
  plainHttp?: boolean;
  userAgent?: string;
}

/**
 * Parsed `[host/]repository[:tag][@digest]`
 */
export interface OciReference {
  host: string;
  repository: string;
  tag?: string;
  digest?: string;
}

interface OciResult {
  success: boolean;
  /** HTTP status of the failing response, when there was one */
  status?: number;
  error?: string;
}

export interface HeadResult extends OciResult {
  exists?: boolean;
}

export interface ResolveResult extends OciResult {
  descriptor?: Descriptor;
}

export interface PullManifestResult extends OciResult {
  data?: Buffer;
  mediaType?: string;
  digest?: string;
}

export interface PullBlobResult extends OciResult {
  data?: Buffer;
}

export interface UploadResult extends OciResult {
  digest?: string;
}

export interface ListTagsResult extends OciResult {
  tags?: string[];
}
