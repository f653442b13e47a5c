import { describe, it, expect, vi, afterEach } from "vitest";
import type { UpdateSummary } from "@feedsieve/worker";
import { startScheduler, type SchedulerHandle } from "../scheduler.js";
import type { AppInstance } from "../server.js";
import { createTestApp } from "./helpers.js";

const SUMMARY: UpdateSummary = {
  feeds: 0,
  skipped: 0,
  updated: 0,
  notModified: 0,
  failed: 0,
  cancelled: 0,
  entriesInserted: 0,
  entriesFiltered: 0,
  concurrency: 4,
  durationMs: 1,
};

/** A valid expression that never fires (February 31st); tests tick by hand. */
const NEVER = "0 0 31 2 *";

describe("startScheduler", () => {
  let instance: AppInstance | undefined;
  let handle: SchedulerHandle | undefined;
  let clock = 0;

  function setup(env: Record<string, string> = {}) {
    const app = createTestApp(
      {},
      { CRON_ENABLED: "true", UPDATE_ON_START: "true", CRON_TICK: NEVER, ...env },
    );
    instance = app.instance;
    const updateFeeds = vi
      .spyOn(app.instance.deps.pipeline.updater, "updateFeeds")
      .mockResolvedValue(SUMMARY);
    clock = 1_000_000;
    handle = startScheduler(app.instance.deps, { now: () => clock });
    return { handle, updateFeeds, store: app.store, updater: app.instance.deps.pipeline.updater };
  }

  afterEach(async () => {
    handle?.stop();
    await instance?.shutdown();
    handle = undefined;
    instance = undefined;
  });

  it("should run a cycle on the first tick and then every update_interval", async () => {
    const { handle, updateFeeds } = setup();

    await handle.tick();
    clock += 899_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(1);

    clock += 1_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(2);
  });

  it("should re-read update_interval on every tick", async () => {
    const { handle, updateFeeds, store } = setup();
    await handle.tick();

    await store.setSetting("update_interval", "120");
    clock += 119_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(1);

    clock += 1_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(2);
  });

  it("should not go below the minimum interval", async () => {
    const { handle, updateFeeds, store } = setup();
    await store.setSetting("update_interval", "5");
    await handle.tick();

    clock += 30_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(1);

    clock += 30_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(2);
  });

  it("should wait a full interval when not updating on start", async () => {
    const { handle, updateFeeds } = setup({ UPDATE_ON_START: "false" });

    await handle.tick();
    expect(updateFeeds).not.toHaveBeenCalled();

    clock += 900_000;
    await handle.tick();
    expect(updateFeeds).toHaveBeenCalledTimes(1);
  });

  it("should skip ticks while a cycle is running", async () => {
    const { handle, updateFeeds, updater } = setup();
    vi.spyOn(updater, "running", "get").mockReturnValue(true);

    await handle.tick();

    expect(updateFeeds).not.toHaveBeenCalled();
  });

  it("should keep ticking after a failed cycle", async () => {
    const { handle, updateFeeds } = setup();
    updateFeeds.mockRejectedValueOnce(new Error("storage down"));

    await handle.tick();
    clock += 900_000;
    await handle.tick();

    expect(updateFeeds).toHaveBeenCalledTimes(2);
  });

  it("should abort the running cycle on stop", async () => {
    const { handle, updateFeeds } = setup();
    let cycleSignal: AbortSignal | undefined;
    updateFeeds.mockImplementation(
      (signal) =>
        new Promise<UpdateSummary>((resolve) => {
          cycleSignal = signal;
          signal?.addEventListener("abort", () => resolve(SUMMARY));
        }),
    );

    const running = handle.tick();
    await vi.waitFor(() => expect(cycleSignal).toBeDefined());
    handle.stop();
    await running;

    expect(cycleSignal?.aborted).toBe(true);
  });

  it("should cancel updates started outside the timer on stop", async () => {
    const { handle, updater } = setup();
    const cancel = vi.spyOn(updater, "cancel");

    handle.stop();

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("should do nothing when disabled", async () => {
    const { handle, updateFeeds } = setup({ CRON_ENABLED: "false" });

    await handle.tick();

    expect(updateFeeds).not.toHaveBeenCalled();
  });
});
