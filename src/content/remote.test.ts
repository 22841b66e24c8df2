import { describe, test, expect } from "vitest";
import { OCI_MEDIA_TYPES } from "#/constants";
import { StoreError } from "#/errors";
import { OciClient } from "#/oci";
import { binaryResponse, createMockHttpClient, errorResponse, type MockRoute } from "#/test-utils/mocks";
import { descriptorFromBytes } from "./descriptor";
import { RemoteStore } from "./remote";

const BASE = "https://registry.example.com/v2/demo/catalog";

const blobBytes = Buffer.from("blob");
const blob = descriptorFromBytes("text/markdown", blobBytes);
const manifestBytes = Buffer.from('{"mediaType":"application/vnd.oci.artifact.manifest.v1+json"}');
const manifest = descriptorFromBytes(OCI_MEDIA_TYPES.artifactManifest, manifestBytes);

function createStore(routes: Array<[string, MockRoute]> = []) {
  const http = createMockHttpClient(new Map(routes));
  const client = new OciClient({ host: "registry.example.com" }, http);
  return { store: new RemoteStore(client, "demo/catalog"), http };
}

describe("RemoteStore", () => {
  test("checks manifests and blobs at their own endpoints", async () => {
    const { store, http } = createStore([
      [`HEAD ${BASE}/manifests/${manifest.digest}`, () => new Response(null, { status: 200 })],
    ]);

    expect(await store.exists(manifest)).toBe(true);
    expect(await store.exists(blob)).toBe(false);
    expect(http.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `HEAD ${BASE}/manifests/${manifest.digest}`,
      `HEAD ${BASE}/blobs/${blob.digest}`,
    ]);
  });

  test("verifies fetched bytes against the descriptor", async () => {
    const { store } = createStore([
      [`GET ${BASE}/blobs/${blob.digest}`, () => binaryResponse(Buffer.from("tampered"))],
    ]);

    await expect(store.fetch(blob)).rejects.toThrow(`size mismatch for ${blob.digest}: expected 4, got 8`);
  });

  test("carries the HTTP status of a failed request", async () => {
    const { store } = createStore([
      [`HEAD ${BASE}/blobs/${blob.digest}`, () => errorResponse(503, "Service Unavailable")],
    ]);

    const err = await store.exists(blob).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    expect(err).toMatchObject({ status: 503, digest: blob.digest, message: "Failed to check blob: 503 Service Unavailable" });
  });

  test("pushes manifests by digest with their media type", async () => {
    const { store, http } = createStore([
      [`PUT ${BASE}/manifests/${manifest.digest}`, () => new Response(null, { status: 201 })],
    ]);

    await store.push(manifest, manifestBytes);

    expect(http.requests[0]?.headers["content-type"]).toBe(OCI_MEDIA_TYPES.artifactManifest);
    expect(http.requests[0]?.body).toEqual(manifestBytes);
  });

  test("tags a manifest by pushing it under the tag", async () => {
    const { store, http } = createStore([
      [`GET ${BASE}/manifests/${manifest.digest}`, () => binaryResponse(manifestBytes)],
      [`PUT ${BASE}/manifests/v1`, () => new Response(null, { status: 201 })],
    ]);

    await store.tag(manifest, "v1");

    expect(http.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `GET ${BASE}/manifests/${manifest.digest}`,
      `PUT ${BASE}/manifests/v1`,
    ]);
  });

  test("refuses to tag a blob", async () => {
    const { store } = createStore();

    await expect(store.tag(blob, "v1")).rejects.toThrow("cannot tag text/markdown: only manifests can be tagged");
  });
});
