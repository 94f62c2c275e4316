import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../src/logger.js";
import { ProbeFailed } from "../src/proxy/errors.js";
import { Scheduler, type JobContext } from "../src/watcher/scheduler.js";
import { intervalTrigger } from "../src/watcher/trigger.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function newScheduler(concurrency = 3): Scheduler {
  return new Scheduler({ concurrency, logger: silentLogger(), now: () => Date.now() });
}

describe("Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 10, 0, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires an interval job and re-arms it", async () => {
    const scheduler = newScheduler();
    const run = vi.fn(async () => undefined);
    const handle = scheduler.schedule({ name: "tick", run }, intervalTrigger(1_000));

    await vi.advanceTimersByTimeAsync(999);
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(2_000);
    expect(run).toHaveBeenCalledTimes(3);
    expect(scheduler.status(handle)).toMatchObject({ runs: 3, failures: 0, state: "idle", trigger: "every 1000ms" });
    await scheduler.stop(100);
  });

  it("skips a firing while the previous run is still in flight", async () => {
    const scheduler = newScheduler();
    const gate = deferred();
    const run = vi.fn(async () => {
      await gate.promise;
    });
    const handle = scheduler.schedule({ name: "slow", run }, intervalTrigger(1_000));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(scheduler.status(handle)?.state).toBe("running");
    await vi.advanceTimersByTimeAsync(1_000);
    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.status(handle)?.skipped).toBe(1);
    expect(scheduler.inFlight()).toEqual(["slow"]);

    gate.resolve();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.status(handle)).toMatchObject({ state: "idle", runs: 1, skipped: 1 });
    expect(scheduler.inFlight()).toEqual([]);
    await scheduler.stop(100);
  });

  it("keeps a failed job armed", async () => {
    const scheduler = newScheduler();
    const run = vi
      .fn<(ctx: JobContext) => Promise<void>>()
      .mockRejectedValueOnce(new ProbeFailed("HK-01", "status 503"))
      .mockResolvedValue(undefined);
    const handle = scheduler.schedule({ name: "flaky", run }, intervalTrigger(1_000));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(scheduler.status(handle)).toMatchObject({
      state: "failed",
      failures: 1,
      lastError: "delay probe failed: HK-01 (status 503)",
    });
    expect(scheduler.status(handle)?.nextFireAt).toEqual(new Date(2024, 0, 15, 10, 0, 2));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(scheduler.status(handle)).toMatchObject({ state: "idle", runs: 2, failures: 1, lastError: null });
    await scheduler.stop(100);
  });

  it("runs immediately when asked to run on start", async () => {
    const scheduler = newScheduler();
    const run = vi.fn(async () => undefined);
    scheduler.schedule({ name: "boot", run }, intervalTrigger(60_000), { runOnStart: true });
    await vi.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);
    await scheduler.stop(100);
  });

  it("reports a skipped manual run", async () => {
    const scheduler = newScheduler();
    const gate = deferred();
    const handle = scheduler.schedule({ name: "manual", run: () => gate.promise }, intervalTrigger(60_000));
    const first = scheduler.runNow(handle);
    await expect(scheduler.runNow(handle)).resolves.toBe(false);
    gate.resolve();
    await expect(first).resolves.toBe(true);
    await scheduler.stop(100);
  });

  it("limits how many runs execute at once", async () => {
    const scheduler = newScheduler(1);
    const gate = deferred();
    const order: string[] = [];
    scheduler.schedule(
      {
        name: "a",
        run: async () => {
          order.push("a:start");
          await gate.promise;
          order.push("a:end");
        },
      },
      intervalTrigger(1_000),
    );
    scheduler.schedule({ name: "b", run: async () => void order.push("b") }, intervalTrigger(1_000));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(order).toEqual(["a:start"]);
    gate.resolve();
    await vi.advanceTimersByTimeAsync(0);
    expect(order).toEqual(["a:start", "a:end", "b"]);
    await scheduler.stop(100);
  });

  it("fires a job whose period exceeds the longest single timer", async () => {
    const scheduler = newScheduler();
    const run = vi.fn(async () => undefined);
    const thirtyDays = 30 * 86_400_000;
    scheduler.schedule({ name: "monthly", run }, intervalTrigger(thirtyDays));

    await vi.advanceTimersByTimeAsync(2_147_483_647);
    expect(run).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(thirtyDays - 2_147_483_647);
    expect(run).toHaveBeenCalledTimes(1);
    await scheduler.stop(100);
  });

  describe("stop", () => {
    it("waits for in-flight runs to finish", async () => {
      const scheduler = newScheduler();
      const finished = vi.fn();
      scheduler.schedule(
        {
          name: "work",
          run: async () => {
            await new Promise((resolve) => setTimeout(resolve, 500));
            finished();
          },
        },
        intervalTrigger(1_000),
      );
      await vi.advanceTimersByTimeAsync(1_000);

      const stopping = scheduler.stop(5_000);
      await vi.advanceTimersByTimeAsync(500);
      await expect(stopping).resolves.toEqual({ drained: true, abandoned: [] });
      expect(finished).toHaveBeenCalledTimes(1);
    });

    it("abandons runs past the deadline and aborts their signal", async () => {
      const scheduler = newScheduler();
      let seen: AbortSignal | undefined;
      scheduler.schedule(
        {
          name: "stuck",
          run: (ctx) =>
            new Promise<void>((resolve) => {
              seen = ctx.signal;
              ctx.signal.addEventListener("abort", () => resolve());
            }),
        },
        intervalTrigger(1_000),
      );
      await vi.advanceTimersByTimeAsync(1_000);

      const stopping = scheduler.stop(200);
      await vi.advanceTimersByTimeAsync(200);
      await expect(stopping).resolves.toEqual({ drained: false, abandoned: ["stuck"] });
      expect(seen?.aborted).toBe(true);
    });

    it("prevents any further firing", async () => {
      const scheduler = newScheduler();
      const run = vi.fn(async () => undefined);
      const handle = scheduler.schedule({ name: "tick", run }, intervalTrigger(1_000));
      await vi.advanceTimersByTimeAsync(1_000);

      await expect(scheduler.stop(100)).resolves.toEqual({ drained: true, abandoned: [] });
      await vi.advanceTimersByTimeAsync(10_000);
      expect(run).toHaveBeenCalledTimes(1);
      expect(scheduler.status(handle)?.nextFireAt).toBeNull();
      await expect(scheduler.runNow(handle)).resolves.toBe(false);
      expect(() => scheduler.schedule({ name: "late", run }, intervalTrigger(1_000))).toThrow(
        "cannot schedule late: scheduler stopped",
      );
    });
  });
});
