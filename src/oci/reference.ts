import { DEFAULT_REGISTRY_HOST, REPOSITORY_REFERENCE_REGEX } from "#/constants";
import type { OciReference } from "./oci.types";

/**
 * Parse an image reference such as `quay.io/org/catalog:latest`,
 * `localhost:5000/pkg@sha256:...` or `busybox`.
 *
 * The first path segment is a registry host when it contains a dot or a
 * port, or is `localhost`; otherwise the reference is on Docker Hub, where
 * single-segment names live under `library/`.
 */
export function parseReference(reference: string): OciReference {
  const slash = reference.indexOf("/");
  const first = slash === -1 ? "" : reference.slice(0, slash);
  const hasHost = first !== "" && (first.includes(".") || first.includes(":") || first === "localhost");

  const host = hasHost ? first : DEFAULT_REGISTRY_HOST;
  const remainder = hasHost ? reference.slice(slash + 1) : reference;

  const groups = REPOSITORY_REFERENCE_REGEX.exec(remainder)?.groups;
  const repository = groups?.["repository"];
  if (!repository) {
    throw new Error(`Invalid reference: ${reference}`);
  }

  return {
    host,
    repository: host === DEFAULT_REGISTRY_HOST && !repository.includes("/") ? `library/${repository}` : repository,
    tag: groups?.["tag"],
    digest: groups?.["digest"],
  };
}

export function formatReference(ref: OciReference): string {
  let out = `${ref.host}/${ref.repository}`;
  if (ref.tag) out += `:${ref.tag}`;
  if (ref.digest) out += `@${ref.digest}`;
  return out;
}

/**
 * The tag or digest to address a manifest by; digest wins.
 */
export function tagOrDigest(ref: OciReference): string {
  const value = ref.digest ?? ref.tag;
  if (!value) {
    throw new Error(`Reference ${formatReference(ref)} has neither a tag nor a digest`);
  }
  return value;
}
