import { describe, test, expect } from "vitest";
import { descriptorFromBytes, type Descriptor } from "#/content";
import { CATALOG_MEDIA_TYPES, OCI_MEDIA_TYPES, PLAIN_MEDIA_TYPES } from "#/constants";
import { ContentDecodeError, UnsupportedMediaTypeError } from "#/errors";
import { createRecordingStore } from "#/test-utils/mocks";
import { createDefaultMediaTypeRegistry, successorsOf } from "./media-types";

const config: Descriptor = { mediaType: OCI_MEDIA_TYPES.imageConfig, digest: "sha256:c0", size: 10 };
const layer: Descriptor = { mediaType: OCI_MEDIA_TYPES.imageLayerGzip, digest: "sha256:l1", size: 20 };

function json(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value));
}

describe("MediaTypeRegistry", () => {
  test("classifies manifests, leaves and unknown types", () => {
    const registry = createDefaultMediaTypeRegistry();

    expect(registry.classify(OCI_MEDIA_TYPES.artifactManifest)).toBe("manifest");
    expect(registry.classify(OCI_MEDIA_TYPES.dockerManifestList)).toBe("manifest");
    expect(registry.classify(CATALOG_MEDIA_TYPES.bundleContent)).toBe("leaf");
    expect(registry.classify(PLAIN_MEDIA_TYPES.markdown)).toBe("leaf");
    expect(registry.classify("application/x-mystery")).toBe("unknown");
  });

  test("image manifest successors are config then layers", () => {
    const content = json({ schemaVersion: 2, mediaType: OCI_MEDIA_TYPES.imageManifest, config, layers: [layer] });
    const desc = descriptorFromBytes(OCI_MEDIA_TYPES.imageManifest, content);

    expect(createDefaultMediaTypeRegistry().successors(desc, content)).toEqual([config, layer]);
  });

  test("image index successors are its manifests in order", () => {
    const second: Descriptor = { mediaType: OCI_MEDIA_TYPES.imageManifest, digest: "sha256:01", size: 5 };
    const first: Descriptor = { mediaType: OCI_MEDIA_TYPES.imageManifest, digest: "sha256:ff", size: 5 };
    const content = json({ schemaVersion: 2, manifests: [first, second] });
    const desc = descriptorFromBytes(OCI_MEDIA_TYPES.imageIndex, content);

    expect(createDefaultMediaTypeRegistry().successors(desc, content)).toEqual([first, second]);
  });

  test("leaves have no successors and are never decoded", () => {
    const content = Buffer.from("not json at all");
    const desc = descriptorFromBytes(PLAIN_MEDIA_TYPES.markdown, content);

    expect(createDefaultMediaTypeRegistry().successors(desc, content)).toEqual([]);
  });

  test("an unknown media type is an error", () => {
    const content = Buffer.from("{}");
    const desc = descriptorFromBytes("application/x-mystery", content);

    expect(() => createDefaultMediaTypeRegistry().successors(desc, content)).toThrow(UnsupportedMediaTypeError);
  });

  test("a malformed manifest is a decode error", () => {
    const content = Buffer.from("{");
    const desc = descriptorFromBytes(OCI_MEDIA_TYPES.artifactManifest, content);

    expect(() => createDefaultMediaTypeRegistry().successors(desc, content)).toThrow(ContentDecodeError);
  });

  test("registered extractors replace leaf entries and clones are independent", () => {
    const registry = createDefaultMediaTypeRegistry();
    const copy = registry.clone();
    copy.register(PLAIN_MEDIA_TYPES.markdown, () => [layer]);
    copy.registerLeaf("application/x-mystery");

    const desc = descriptorFromBytes(PLAIN_MEDIA_TYPES.markdown, Buffer.from("# hi"));
    expect(copy.successors(desc, Buffer.from("# hi"))).toEqual([layer]);
    expect(copy.classify("application/x-mystery")).toBe("leaf");
    expect(registry.classify(PLAIN_MEDIA_TYPES.markdown)).toBe("leaf");
    expect(registry.classify("application/x-mystery")).toBe("unknown");
  });
});

describe("successorsOf", () => {
  test("does not fetch leaves", async () => {
    const store = createRecordingStore();

    const children = await successorsOf(store, { mediaType: PLAIN_MEDIA_TYPES.svg, digest: "sha256:aa", size: 1 });

    expect(children).toEqual([]);
    expect(store.calls.fetch).toEqual([]);
  });

  test("fetches and decodes manifests", async () => {
    const store = createRecordingStore();
    const content = json({ mediaType: OCI_MEDIA_TYPES.artifactManifest, artifactType: "t", blobs: [layer] });
    const desc = descriptorFromBytes(OCI_MEDIA_TYPES.artifactManifest, content);
    await store.push(desc, content);

    expect(await successorsOf(store, desc)).toEqual([layer]);
    expect(store.calls.fetch).toEqual([desc.digest]);
  });
});
