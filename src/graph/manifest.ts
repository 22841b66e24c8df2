/**
 * Canonical artifact manifest encoding.
 *
 * Field order is fixed and annotation keys are sorted, so a logically
 * identical node always serializes to the same bytes.
 */

import type { Descriptor } from "#/content";
import { OCI_MEDIA_TYPES } from "#/constants";

export interface ArtifactManifestInput {
  artifactType: string;
  /** Already sorted by the caller */
  blobs: Descriptor[];
  annotations?: Record<string, string>;
}

export function encodeManifest(input: ArtifactManifestInput): Buffer {
  const fields = [
    `"mediaType":${JSON.stringify(OCI_MEDIA_TYPES.artifactManifest)}`,
    `"artifactType":${JSON.stringify(input.artifactType)}`,
    `"blobs":[${input.blobs.map(encodeDescriptor).join(",")}]`,
  ];
  const annotations = encodeAnnotations(input.annotations);
  if (annotations !== undefined) fields.push(`"annotations":${annotations}`);
  return Buffer.from(`{${fields.join(",")}}`, "utf-8");
}

/**
 * Descriptor JSON with keys in OCI order: mediaType, digest, size, urls,
 * annotations, platform, artifactType. Empty optional fields are dropped.
 */
export function encodeDescriptor(desc: Descriptor): string {
  const fields = [
    `"mediaType":${JSON.stringify(desc.mediaType)}`,
    `"digest":${JSON.stringify(desc.digest)}`,
    `"size":${JSON.stringify(desc.size)}`,
  ];
  if (desc.urls && desc.urls.length > 0) fields.push(`"urls":${JSON.stringify(desc.urls)}`);
  const annotations = encodeAnnotations(desc.annotations);
  if (annotations !== undefined) fields.push(`"annotations":${annotations}`);
  if (desc.platform) fields.push(`"platform":${JSON.stringify(desc.platform)}`);
  if (desc.artifactType !== undefined && desc.artifactType !== "") {
    fields.push(`"artifactType":${JSON.stringify(desc.artifactType)}`);
  }
  return `{${fields.join(",")}}`;
}

// Written from the sorted entry list: a plain object would move
// integer-like keys to the front.
function encodeAnnotations(annotations: Record<string, string> | undefined): string | undefined {
  if (!annotations) return undefined;
  const entries = Object.entries(annotations).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return undefined;
  return `{${entries.map(([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`).join(",")}}`;
}
