import { describe, test, expect } from "vitest";
import {
  ArtifactBuildError,
  CopyError,
  GraphError,
  OperationCancelledError,
  StoreError,
  UnsupportedMediaTypeError,
  errorMessage,
  isCancellation,
  throwIfCancelled,
} from "./errors";

describe("GraphError", () => {
  test("subclasses carry their code, name and location", () => {
    const err = new StoreError("push failed", { mediaType: "text/markdown", digest: "sha256:abc", status: 500 });

    expect(err).toBeInstanceOf(GraphError);
    expect(err.name).toBe("StoreError");
    expect(err.code).toBe("STORE");
    expect(err.mediaType).toBe("text/markdown");
    expect(err.digest).toBe("sha256:abc");
    expect(err.status).toBe(500);
  });

  test("unsupported media types are named in the message", () => {
    const err = new UnsupportedMediaTypeError("application/x-mystery", "sha256:abc");

    expect(err.message).toBe('unsupported media type "application/x-mystery"');
    expect(err.code).toBe("UNSUPPORTED_MEDIA_TYPE");
  });
});

describe("CopyError", () => {
  test("reports bytes transferred and the location of its cause", () => {
    const cause = new ArtifactBuildError("disk gone", { mediaType: "text/markdown", digest: "sha256:abc" });
    const err = new CopyError(cause, 42);

    expect(err.message).toBe("copy failed after 42 bytes: disk gone");
    expect(err.bytesTransferred).toBe(42);
    expect(err.digest).toBe("sha256:abc");
    expect(err.cause).toBe(cause);
  });
});

describe("isCancellation", () => {
  test("sees through CopyError", () => {
    expect(isCancellation(new OperationCancelledError())).toBe(true);
    expect(isCancellation(new CopyError(new OperationCancelledError(), 0))).toBe(true);
    expect(isCancellation(new CopyError(new Error("boom"), 0))).toBe(false);
    expect(isCancellation(new Error("boom"))).toBe(false);
  });
});

describe("throwIfCancelled", () => {
  test("throws only once the signal has fired", () => {
    const controller = new AbortController();

    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    expect(() => throwIfCancelled(undefined)).not.toThrow();
    controller.abort(new Error("user quit"));
    expect(() => throwIfCancelled(controller.signal)).toThrow("operation cancelled: user quit");
  });
});

describe("errorMessage", () => {
  test("handles non-Error values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
