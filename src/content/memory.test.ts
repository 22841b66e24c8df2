import { describe, test, expect } from "vitest";
import { StoreError } from "#/errors";
import { descriptorFromBytes } from "./descriptor";
import { MemoryStore } from "./memory";

describe("MemoryStore", () => {
  const content = Buffer.from("hello");
  const desc = descriptorFromBytes("text/plain", content);

  test("stores and returns content by digest", async () => {
    const store = new MemoryStore();

    expect(await store.exists(desc)).toBe(false);
    await store.push(desc, content);

    expect(await store.exists(desc)).toBe(true);
    expect((await store.fetch(desc)).toString("utf-8")).toBe("hello");
    expect(store.size).toBe(1);
    expect(store.digests()).toEqual([desc.digest]);
  });

  test("pushing present content again is a no-op", async () => {
    const store = new MemoryStore();
    await store.push(desc, content);
    await store.push(desc, content);

    expect(store.size).toBe(1);
  });

  test("rejects content that does not match its descriptor", async () => {
    const store = new MemoryStore();

    await expect(store.push(desc, Buffer.from("HELLO"))).rejects.toThrow(/^digest mismatch/);
    await expect(store.push(desc, Buffer.from("hi"))).rejects.toThrow(
      `size mismatch for ${desc.digest}: expected 5, got 2`
    );
  });

  test("keeps its own copy of pushed bytes", async () => {
    const store = new MemoryStore();
    const bytes = Buffer.from("hello");
    await store.push(desc, bytes);
    bytes.write("jello");

    expect((await store.fetch(desc)).toString("utf-8")).toBe("hello");
  });

  test("tags only content it holds", async () => {
    const store = new MemoryStore();

    await expect(store.tag(desc, "latest")).rejects.toBeInstanceOf(StoreError);
    await store.push(desc, content);
    await store.tag(desc, "latest");

    expect(await store.resolve("latest")).toEqual(desc);
    await expect(store.resolve("missing")).rejects.toThrow("missing: not found");
  });

  test("fetching unknown content fails with a store error", async () => {
    await expect(new MemoryStore().fetch(desc)).rejects.toThrow(`${desc.digest}: not found`);
  });
});
