import { describe, test, expect } from "vitest";
import { createTarball, listTarball, readTarball, validateTarEntries } from "./tar-utils";

describe("createTarball", () => {
  test("produces identical bytes regardless of input order", async () => {
    const a = { path: "manifests/a.yaml", content: Buffer.from("a\n") };
    const b = { path: "metadata/b.yaml", content: Buffer.from("b\n") };

    expect(await createTarball([a, b])).toEqual(await createTarball([b, a]));
  });

  test("emits parent directories before their files", async () => {
    const tarball = await createTarball([{ path: "manifests/nested/a.yaml", content: Buffer.from("a\n") }]);

    const entries = await readTarball(tarball);

    expect(entries.map((entry) => [entry.type, entry.path])).toEqual([
      ["directory", "manifests"],
      ["directory", "manifests/nested"],
      ["file", "manifests/nested/a.yaml"],
    ]);
    expect(entries[2]?.content.toString("utf-8")).toBe("a\n");
  });
});

describe("listTarball", () => {
  test("lists files with mode and size, sorted by path", async () => {
    const tarball = await createTarball([
      { path: "run.sh", content: Buffer.from("#!/bin/sh\n"), mode: 0o755 },
      { path: "README.md", content: Buffer.from("# hi\n") },
    ]);

    expect(await listTarball(tarball)).toEqual([
      { path: "README.md", type: "file", mode: 0o644, size: 5, linkTarget: undefined },
      { path: "run.sh", type: "file", mode: 0o755, size: 10, linkTarget: undefined },
    ]);
  });
});

describe("readTarball", () => {
  test("rejects data that is not gzip", async () => {
    await expect(readTarball(Buffer.from("plain text"))).rejects.toThrow(/^read gzip: /);
  });
});

describe("validateTarEntries", () => {
  test("accepts relative paths inside the root", () => {
    expect(
      validateTarEntries([
        { path: "manifests/a.yaml", type: "file" },
        { path: "link", type: "symlink", linkTarget: "manifests/a.yaml" },
      ])
    ).toEqual({ safe: true, violations: [] });
  });

  test("flags absolute paths, traversal and escaping symlinks", () => {
    const result = validateTarEntries([
      { path: "/etc/passwd", type: "file" },
      { path: "a/../../b", type: "file" },
      { path: "a/link", type: "symlink", linkTarget: "../../outside" },
    ]);

    expect(result.safe).toBe(false);
    expect(result.violations).toEqual([
      "Absolute path in tarball: /etc/passwd",
      "Path traversal in tarball: a/../../b",
      "Symlink escapes archive root: a/link -> ../../outside",
    ]);
  });
});
