import { describe, test, expect } from "vitest";
import { encodeDescriptor, encodeManifest } from "./manifest";

describe("encodeManifest", () => {
  test("writes fields in fixed order with sorted annotation keys", () => {
    const data = encodeManifest({
      artifactType: "application/x-test",
      blobs: [
        {
          mediaType: "text/markdown",
          digest: "sha256:aa",
          size: 2,
          annotations: { b: "2", a: "1" },
        },
      ],
      annotations: { z: "1", a: "2" },
    });

    expect(data.toString("utf-8")).toBe(
      '{"mediaType":"application/vnd.oci.artifact.manifest.v1+json",' +
        '"artifactType":"application/x-test",' +
        '"blobs":[{"mediaType":"text/markdown","digest":"sha256:aa","size":2,"annotations":{"a":"1","b":"2"}}],' +
        '"annotations":{"a":"2","z":"1"}}'
    );
  });

  test("omits empty annotations but always writes blobs", () => {
    const data = encodeManifest({ artifactType: "application/x-empty", blobs: [], annotations: {} });

    expect(data.toString("utf-8")).toBe(
      '{"mediaType":"application/vnd.oci.artifact.manifest.v1+json","artifactType":"application/x-empty","blobs":[]}'
    );
  });

  test("sorts integer-like annotation keys as strings", () => {
    const data = encodeManifest({
      artifactType: "t",
      blobs: [{ mediaType: "text/markdown", digest: "sha256:aa", size: 1, annotations: { "9": "b", "10": "a" } }],
      annotations: { "9": "nine", "10": "ten", a: "x" },
    });

    expect(data.toString("utf-8")).toBe(
      '{"mediaType":"application/vnd.oci.artifact.manifest.v1+json","artifactType":"t",' +
        '"blobs":[{"mediaType":"text/markdown","digest":"sha256:aa","size":1,"annotations":{"10":"a","9":"b"}}],' +
        '"annotations":{"10":"ten","9":"nine","a":"x"}}'
    );
  });

  test("does not escape HTML characters", () => {
    const data = encodeManifest({ artifactType: "t", blobs: [], annotations: { note: "<a&b>" } });

    expect(data.toString("utf-8")).toContain('"note":"<a&b>"');
  });
});

describe("encodeDescriptor", () => {
  test("reorders keys and drops empty optional fields", () => {
    const json = encodeDescriptor({
      artifactType: "",
      annotations: {},
      size: 3,
      urls: [],
      digest: "sha256:bb",
      mediaType: "image/png",
    });

    expect(json).toBe('{"mediaType":"image/png","digest":"sha256:bb","size":3}');
  });

  test("keeps platform and artifact type after annotations", () => {
    const json = encodeDescriptor({
      artifactType: "application/x-child",
      platform: { architecture: "amd64", os: "linux" },
      annotations: { k: "v" },
      size: 1,
      digest: "sha256:cc",
      mediaType: "application/vnd.oci.image.manifest.v1+json",
      urls: ["https://example.com/blob"],
    });

    expect(json).toBe(
      '{"mediaType":"application/vnd.oci.image.manifest.v1+json","digest":"sha256:cc","size":1,' +
        '"urls":["https://example.com/blob"],"annotations":{"k":"v"},' +
        '"platform":{"architecture":"amd64","os":"linux"},"artifactType":"application/x-child"}'
    );
  });
});
