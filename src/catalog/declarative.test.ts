import { describe, test, expect } from "vitest";
import { Bundle, Catalog, Channel, Package } from "./catalog";
import { bundleDigest, toDeclarativeConfig } from "./declarative";
import { CatalogError } from "./errors";

const REPO = "quay.io/demo/catalog";

function bundle(version: string, release = 0, extra: Partial<ConstructorParameters<typeof Bundle>[0]> = {}): Bundle {
  return new Bundle({
    metadata: { package: "demo", version, release },
    contentMediaType: "plain+v0",
    content: [{ path: "manifests/demo.yaml", content: Buffer.from(`version: ${version}-${release}\n`) }],
    ...extra,
  });
}

describe("toDeclarativeConfig", () => {
  test("lists every bundle as a plain entry when there are no upgrade edges", async () => {
    const pkg = new Package({
      metadata: { name: "demo" },
      upgradeEdges: { "1.0.0-0": [], "1.1.0-0": [] },
      channels: [new Channel({ metadata: { name: "stable" }, bundles: [bundle("1.0.0"), bundle("1.1.0")] })],
    });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.packages).toEqual([{ schema: "olm.package", name: "demo", properties: [] }]);
    expect(fbc.channels).toEqual([
      {
        schema: "olm.channel",
        package: "demo",
        name: "stable",
        entries: [{ name: "demo.v1.0.0-0" }, { name: "demo.v1.1.0-0" }],
        properties: [],
      },
    ]);
  });

  test("writes replaces entries for edges inside each channel", async () => {
    const pkg = new Package({
      metadata: { name: "demo" },
      upgradeEdges: { "1.0.0-0": ["2.0.0-0", "1.0.0-1"], "1.0.0-1": ["2.0.0-0"], "2.0.0-0": [] },
      channels: [
        new Channel({ metadata: { name: "stable" }, bundles: [bundle("1.0.0", 0), bundle("1.0.0", 1), bundle("2.0.0", 0)] }),
        new Channel({ metadata: { name: "candidate" }, bundles: [bundle("1.0.0", 0), bundle("2.0.0", 0)] }),
      ],
    });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.channels.map((channel) => channel.entries)).toEqual([
      [
        { name: "demo.v2.0.0-0", replaces: "demo.v1.0.0-0" },
        { name: "demo.v1.0.0-1", replaces: "demo.v1.0.0-0" },
        { name: "demo.v2.0.0-0", replaces: "demo.v1.0.0-1" },
      ],
      [{ name: "demo.v2.0.0-0", replaces: "demo.v1.0.0-0" }],
    ]);
    expect(fbc.bundles.map((b) => b.name)).toEqual(["demo.v1.0.0-0", "demo.v1.0.0-1", "demo.v2.0.0-0"]);
  });

  test("points bundle images at the built artifact digest", async () => {
    const b = bundle("1.0.0");
    const pkg = new Package({ metadata: { name: "demo" }, channels: [new Channel({ metadata: { name: "stable" }, bundles: [b] })] });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.bundles[0]?.image).toBe(`oci://${REPO}@${await bundleDigest(b)}`);
  });

  test("emits bundle properties, then media type and package, then constraints", async () => {
    const b = bundle("1.0.0", 2, {
      properties: [{ type: "example.gvk", value: { group: "demo.io", kind: "Demo" } }],
      constraints: [{ type: "example.requires", value: { group: "other.io" } }],
    });
    const pkg = new Package({ metadata: { name: "demo" }, channels: [new Channel({ metadata: { name: "stable" }, bundles: [b] })] });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.bundles[0]?.properties).toEqual([
      { type: "example.gvk", value: { group: "demo.io", kind: "Demo" } },
      { type: "olm.bundle.mediatype", value: "plain+v0" },
      { type: "olm.package", value: { packageName: "demo", version: "1.0.0", release: 2 } },
      { type: "example.requires", value: { group: "other.io" } },
    ]);
  });

  test("projects description, icon and properties of the package", async () => {
    const pkg = new Package({
      metadata: { name: "demo" },
      description: "# Demo\n",
      icon: { data: Buffer.from("<svg/>"), mediaType: "image/svg+xml" },
      properties: [{ type: "example.tier" }],
    });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.packages).toEqual([
      {
        schema: "olm.package",
        name: "demo",
        description: "# Demo\n",
        icon: { base64data: "PHN2Zy8+", mediatype: "image/svg+xml" },
        properties: [{ type: "example.tier", value: null }],
      },
    ]);
  });

  test("uses the recorded digest of a sparse bundle", async () => {
    const digest = `sha256:${"b".repeat(64)}`;
    const sparse = new Bundle({ metadata: { package: "demo", version: "1.0.0", release: 0 }, contentMediaType: "plain+v0", digest });
    const pkg = new Package({ metadata: { name: "demo" }, channels: [new Channel({ metadata: { name: "stable" }, bundles: [sparse] })] });

    const fbc = await toDeclarativeConfig(pkg, REPO);

    expect(fbc.bundles[0]?.image).toBe(`oci://${REPO}@${digest}`);
  });

  test("concatenates the packages of a catalog", async () => {
    const catalog = new Catalog([
      new Package({ metadata: { name: "alpha" }, channels: [new Channel({ metadata: { name: "stable" } })] }),
      new Package({ metadata: { name: "beta" } }),
    ]);

    const fbc = await toDeclarativeConfig(catalog, REPO);

    expect(fbc.packages.map((p) => p.name)).toEqual(["alpha", "beta"]);
    expect(fbc.channels.map((c) => `${c.package}/${c.name}`)).toEqual(["alpha/stable"]);
    expect(fbc.bundles).toEqual([]);
  });
});

describe("bundleDigest", () => {
  test("rejects a sparse bundle without a digest", async () => {
    const sparse = new Bundle({ metadata: { package: "demo", version: "1.0.0", release: 0 }, contentMediaType: "plain+v0" });

    await expect(bundleDigest(sparse)).rejects.toBeInstanceOf(CatalogError);
    await expect(bundleDigest(sparse)).rejects.toThrow("cannot compute digest for sparse bundle 1.0.0-0");
  });

  test("does not depend on concurrency", async () => {
    const b = bundle("1.0.0");

    expect(await bundleDigest(b, { concurrency: 1 })).toBe(await bundleDigest(b, { concurrency: 8 }));
  });
});
