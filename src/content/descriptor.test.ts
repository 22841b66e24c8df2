import { describe, test, expect } from "vitest";
import { StoreError } from "#/errors";
import { compareByDigest, descriptorFromBytes, digestOf, parseDigest, shortDigest } from "./descriptor";

// sha256 of the empty string
const EMPTY_SHA256 = "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

describe("digestOf", () => {
  test("hashes with sha256 by default", () => {
    expect(digestOf("")).toBe(EMPTY_SHA256);
  });
});

describe("descriptorFromBytes", () => {
  test("records size and digest", () => {
    expect(descriptorFromBytes("text/plain", Buffer.alloc(0))).toEqual({
      mediaType: "text/plain",
      digest: EMPTY_SHA256,
      size: 0,
    });
  });

  test("omits empty annotations", () => {
    expect(descriptorFromBytes("text/plain", Buffer.alloc(0), {})).not.toHaveProperty("annotations");
    expect(descriptorFromBytes("text/plain", Buffer.alloc(0), { a: "1" }).annotations).toEqual({ a: "1" });
  });
});

describe("parseDigest", () => {
  test("splits algorithm and encoded part", () => {
    expect(parseDigest(EMPTY_SHA256)).toEqual({
      algorithm: "sha256",
      encoded: "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    });
  });

  test("rejects malformed and unsupported digests", () => {
    expect(() => parseDigest("not-a-digest")).toThrow(StoreError);
    expect(() => parseDigest("md5:abc")).toThrow("unsupported digest algorithm md5");
  });
});

describe("compareByDigest", () => {
  test("orders descriptors by digest", () => {
    const descs = [
      { mediaType: "a", digest: "sha256:bb", size: 1 },
      { mediaType: "b", digest: "sha256:aa", size: 1 },
    ];

    expect(descs.sort(compareByDigest).map((d) => d.digest)).toEqual(["sha256:aa", "sha256:bb"]);
  });
});

describe("shortDigest", () => {
  test("keeps the algorithm and twelve hex characters", () => {
    expect(shortDigest(EMPTY_SHA256)).toBe("sha256:e3b0c44298fc");
  });
});
