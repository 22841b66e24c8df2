import { getEventListeners } from "node:events";
import { describe, test, expect } from "vitest";
import { OperationCancelledError } from "#/errors";
import { TaskGroup } from "./task-group";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("TaskGroup", () => {
  test("all returns results in task order", async () => {
    const group = new TaskGroup({ concurrency: 4 });

    const results = await group.all([
      async () => {
        await sleep(15);
        return "slow";
      },
      async () => "fast",
    ]);

    expect(results).toEqual(["slow", "fast"]);
  });

  test("first failure aborts the group and is rethrown", async () => {
    const group = new TaskGroup({ concurrency: 4 });
    const first = new Error("first");
    let siblingSawAbort = false;

    const run = group.all([
      async () => {
        throw first;
      },
      async () => {
        await sleep(10);
        siblingSawAbort = group.signal.aborted;
        throw new Error("second");
      },
    ]);

    await expect(run).rejects.toBe(first);
    expect(siblingSawAbort).toBe(true);
  });

  test("nested groups rethrow the first error, not their own", async () => {
    const group = new TaskGroup({ concurrency: 2 });
    const root = new Error("root cause");

    const run = group.all([
      () =>
        group.all([
          async () => {
            await sleep(5);
            throw new Error("later");
          },
        ]),
      async () => {
        throw root;
      },
    ]);

    await expect(run).rejects.toBe(root);
  });

  test("limited never runs more than the bound at once", async () => {
    const group = new TaskGroup({ concurrency: 2 });
    let active = 0;
    let peak = 0;

    await group.all(
      Array.from({ length: 6 }, () => () =>
        group.limited(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
        })
      )
    );

    expect(peak).toBe(2);
  });

  test("queued limited work does not start after the group fails", async () => {
    const group = new TaskGroup({ concurrency: 1 });
    let queuedRan = false;

    const run = group.all([
      () => group.limited(() => sleep(20)),
      () =>
        group.limited(async () => {
          queuedRan = true;
        }),
      async () => {
        throw new Error("boom");
      },
    ]);

    await expect(run).rejects.toThrow("boom");
    expect(queuedRan).toBe(false);
  });

  test("an aborted parent signal cancels before any task runs", async () => {
    const controller = new AbortController();
    controller.abort();
    const group = new TaskGroup({ concurrency: 1, signal: controller.signal });
    let ran = false;

    await expect(
      group.run(async () => {
        ran = true;
      })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(ran).toBe(false);
  });

  test("a parent abort during a run reaches the group signal", async () => {
    const controller = new AbortController();
    const group = new TaskGroup({ concurrency: 1, signal: controller.signal });

    const run = group.run(async () => {
      controller.abort();
      return group.limited(async () => "unreachable");
    });

    await expect(run).rejects.toBeInstanceOf(OperationCancelledError);
  });

  test("dispose stops following the parent signal", async () => {
    const controller = new AbortController();
    const group = new TaskGroup({ concurrency: 1, signal: controller.signal });
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(1);

    group.dispose();
    controller.abort();

    expect(getEventListeners(controller.signal, "abort")).toEqual([]);
    expect(group.signal.aborted).toBe(false);
  });
});
