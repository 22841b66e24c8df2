import { describe, test, expect } from "vitest";
import { createMockFileSystem } from "#/test-utils/mocks";
import { CatalogError } from "./errors";
import { loadBundle, loadCatalog, loadPackage } from "./loader";

function plainBundleAnnotations(version: string, extra = ""): string {
  return [
    "annotations:",
    "  io.operatorframework.bundle.package: demo",
    `  io.operatorframework.bundle.version: "${version}"`,
    "  io.operatorframework.bundle.content.mediatype: plain+v0",
    extra,
  ].join("\n");
}

function demoPackageFiles(entries = ["1.0.0", "1.1.0"]): Record<string, string> {
  return {
    "/cat/demo/package.yaml": "name: demo\ndisplayName: Demo\n",
    "/cat/demo/README.md": "# Demo\n",
    "/cat/demo/icon.svg": "<svg/>",
    "/cat/demo/upgrade-edges.yaml": 'upgradeEdges:\n  "1.0.0": ["1.1.0"]\n',
    "/cat/demo/bundles/a/metadata/annotations.yaml": plainBundleAnnotations("1.0.0"),
    "/cat/demo/bundles/a/manifests/demo.yaml": "kind: Demo\n",
    "/cat/demo/bundles/b/metadata/annotations.yaml": plainBundleAnnotations("1.1.0"),
    "/cat/demo/bundles/b/manifests/demo.yaml": "kind: Demo\nspec: {}\n",
    "/cat/demo/channels/stable/channel.yaml": "name: stable\n",
    "/cat/demo/channels/stable/entries.yaml": `entries:\n${entries.map((e) => `  - "${e}"`).join("\n")}\n`,
  };
}

describe("loadPackage", () => {
  test("reads metadata, description, icon, edges and channels", () => {
    const fs = createMockFileSystem(demoPackageFiles());

    const pkg = loadPackage(fs, "/cat/demo");

    expect(pkg.metadata).toEqual({ name: "demo", displayName: "Demo" });
    expect(pkg.description).toBe("# Demo\n");
    expect(pkg.icon?.mediaType).toBe("image/svg+xml");
    expect(pkg.icon?.data.toString("utf-8")).toBe("<svg/>");
    expect(pkg.upgradeEdges).toEqual({ "1.0.0-0": ["1.1.0-0"], "1.1.0-0": [] });
    expect(pkg.properties).toEqual([]);
    expect(pkg.channels.map((channel) => channel.metadata.name)).toEqual(["stable"]);
    expect(pkg.channels[0]?.bundles.map((bundle) => bundle.fullVersion)).toEqual(["1.0.0-0", "1.1.0-0"]);
  });

  test("rejects channel entries without a matching bundle", () => {
    const fs = createMockFileSystem(demoPackageFiles(["1.0.0", "9.9.9"]));

    const load = () => loadPackage(fs, "/cat/demo");

    expect(load).toThrow(CatalogError);
    expect(load).toThrow(
      'load channels: load channel /cat/demo/channels/stable: load entries: no bundles found with version "9.9.9"'
    );
  });

  test("rejects upgrade edges to versions without bundles", () => {
    const files = demoPackageFiles(["1.0.0"]);
    files["/cat/demo/upgrade-edges.yaml"] = 'upgradeEdges:\n  "1.0.0": ["2.0.0"]\n';
    const fs = createMockFileSystem(files);

    expect(() => loadPackage(fs, "/cat/demo")).toThrow(
      'load upgrade edges: upgrade edge 1.0.0 -> 2.0.0: no bundles found with version "2.0.0"'
    );
  });

  test("requires package.yaml", () => {
    const files = demoPackageFiles();
    delete files["/cat/demo/package.yaml"];
    const fs = createMockFileSystem(files);

    expect(() => loadPackage(fs, "/cat/demo")).toThrow("load metadata: file not found: /cat/demo/package.yaml");
  });
});

describe("loadCatalog", () => {
  test("loads one package per directory", () => {
    const fs = createMockFileSystem(demoPackageFiles());

    const catalog = loadCatalog(fs, "/cat");

    expect(catalog.packages.map((pkg) => pkg.metadata.name)).toEqual(["demo"]);
  });

  test("names the package that failed", () => {
    const files = demoPackageFiles();
    files["/cat/demo/package.yaml"] = "displayName: Demo\n";
    const fs = createMockFileSystem(files);

    expect(() => loadCatalog(fs, "/cat")).toThrow(/^load package demo: load metadata: /);
  });

  test("rejects a missing catalog directory", () => {
    const fs = createMockFileSystem();

    expect(() => loadCatalog(fs, "/nope")).toThrow("directory not found: /nope");
  });
});

describe("loadBundle", () => {
  test("packs the whole directory as content", () => {
    const fs = createMockFileSystem({
      "/b/metadata/annotations.yaml": plainBundleAnnotations("1.0.0", "  io.operatorframework.bundle.release: \"2\""),
      "/b/metadata/properties.yaml": "properties:\n  - type: example.tier\n    value: gold\n",
      "/b/metadata/constraints.yaml": "constraints:\n  - type: example.requires\n    value: other\n",
      "/b/manifests/demo.yaml": "kind: Demo\n",
    });

    const bundle = loadBundle(fs, "/b");

    expect(bundle.metadata).toEqual({ package: "demo", version: "1.0.0", release: 2 });
    expect(bundle.contentMediaType).toBe("plain+v0");
    expect(bundle.properties).toEqual([{ type: "example.tier", value: "gold" }]);
    expect(bundle.constraints).toEqual([{ type: "example.requires", value: "other" }]);
    expect(bundle.relatedImages).toEqual([]);
    expect(bundle.content?.map((file) => file.path)).toEqual([
      "manifests/demo.yaml",
      "metadata/annotations.yaml",
      "metadata/constraints.yaml",
      "metadata/properties.yaml",
    ]);
    expect(bundle.content?.[0]).toEqual({ path: "manifests/demo.yaml", content: Buffer.from("kind: Demo\n"), mode: 0o644 });
  });

  test("reads registry+v1 metadata from the ClusterServiceVersion", () => {
    const fs = createMockFileSystem({
      "/b/metadata/annotations.yaml": [
        "annotations:",
        "  operators.operatorframework.io.bundle.package.v1: demo",
        "  operators.operatorframework.io.bundle.mediatype.v1: registry+v1",
        "  operators.operatorframework.io.bundle.channels.v1: stable",
      ].join("\n"),
      "/b/manifests/crd.yaml": "kind: CustomResourceDefinition\n",
      "/b/manifests/demo.clusterserviceversion.yaml": [
        "apiVersion: operators.coreos.com/v1alpha1",
        "kind: ClusterServiceVersion",
        "spec:",
        "  version: 0.3.0",
        "  relatedImages:",
        "    - name: operator",
        "      image: quay.io/demo/operator:0.3.0",
        "  install:",
        "    strategy: deployment",
        "    spec:",
        "      deployments:",
        "        - name: demo",
        "          spec:",
        "            template:",
        "              spec:",
        "                containers:",
        "                  - image: quay.io/demo/proxy:1.0",
        "                  - image: quay.io/demo/operator:0.3.0",
      ].join("\n"),
    });

    const bundle = loadBundle(fs, "/b");

    expect(bundle.contentMediaType).toBe("registry+v1");
    expect(bundle.metadata).toEqual({ package: "demo", version: "0.3.0", release: 0 });
    expect(bundle.relatedImages).toEqual([
      { name: "operator", image: "quay.io/demo/operator:0.3.0" },
      { image: "quay.io/demo/proxy:1.0" },
    ]);
  });

  test("requires a content media type", () => {
    const fs = createMockFileSystem({
      "/b/metadata/annotations.yaml": "annotations:\n  io.operatorframework.bundle.package: demo\n",
    });

    expect(() => loadBundle(fs, "/b")).toThrow("load bundle /b: could not detect bundle content media type");
  });

  test("rejects a non-numeric release", () => {
    const fs = createMockFileSystem({
      "/b/metadata/annotations.yaml": plainBundleAnnotations("1.0.0", "  io.operatorframework.bundle.release: abc"),
    });

    expect(() => loadBundle(fs, "/b")).toThrow('load bundle /b: load metadata: invalid bundle release "abc"');
  });

  test("rejects an invalid version", () => {
    const fs = createMockFileSystem({
      "/b/metadata/annotations.yaml": plainBundleAnnotations("one"),
    });

    expect(() => loadBundle(fs, "/b")).toThrow('load bundle /b: load metadata: invalid bundle version "one"');
  });
});
