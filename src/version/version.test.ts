import { describe, test, expect } from "vitest";
import { isValidSemver } from "./version";

describe("version", () => {
  describe("isValidSemver", () => {
    test("accepts valid semver versions", () => {
      expect(isValidSemver("1.0.0")).toBe(true);
      expect(isValidSemver("0.0.1")).toBe(true);
      expect(isValidSemver("10.20.30")).toBe(true);
    });

    test("accepts prerelease versions", () => {
      expect(isValidSemver("1.0.0-alpha")).toBe(true);
      expect(isValidSemver("1.0.0-beta.1")).toBe(true);
      expect(isValidSemver("2.0.0-alpha.1.beta.2")).toBe(true);
    });

    test("accepts build metadata", () => {
      expect(isValidSemver("1.0.0+build.123")).toBe(true);
      expect(isValidSemver("1.0.0-beta+build")).toBe(true);
    });

    test("rejects v prefix", () => {
      expect(isValidSemver("v1.0.0")).toBe(false);
      expect(isValidSemver("V1.0.0")).toBe(false);
    });

    test("rejects incomplete versions", () => {
      expect(isValidSemver("1.0")).toBe(false);
      expect(isValidSemver("1")).toBe(false);
    });

    test("rejects non-version strings", () => {
      expect(isValidSemver("")).toBe(false);
      expect(isValidSemver("latest")).toBe(false);
      expect(isValidSemver("1.0.0.0")).toBe(false);
    });
  });
});
