import { describe, it, expect } from "vitest";
import {
  CancellationObserved,
  ManualClock,
  cancelAfter,
  createRuntime,
  withTimeout,
  yieldNow,
} from "isolane";
import { deferred } from "./deferred.js";

describe("cancelAfter", () => {
  it("sets the flag with a timeout reason once the deadline passes", async () => {
    const clock = new ManualClock();
    const runtime = createRuntime({ clock });
    const gate = deferred<void>();
    const task = runtime.spawn(async () => {
      await gate.promise;
      return "late";
    });
    cancelAfter(task, 100, clock);
    expect(clock.sleepers).toBe(1);
    clock.advance(99);
    await yieldNow();
    expect(task.isCancelled).toBe(false);
    clock.advance(1);
    await yieldNow();
    expect(task.cancelReason).toEqual({ type: "timeout", ms: 100 });
    gate.resolve();
    await expect(task.value()).resolves.toBe("late");
    expect(task.status).toBe("canceled");
  });

  it("clears its timer when the task settles first", async () => {
    const clock = new ManualClock();
    const runtime = createRuntime({ clock });
    const task = runtime.spawn(() => "fast");
    cancelAfter(task, 100, clock);
    await task;
    await yieldNow();
    expect(clock.sleepers).toBe(0);
    clock.advance(100);
    await yieldNow();
    expect(task.isCancelled).toBe(false);
  });

  it("can be cleared by the caller", async () => {
    const clock = new ManualClock();
    const runtime = createRuntime({ clock });
    const gate = deferred<void>();
    const task = runtime.spawn(() => gate.promise);
    const clear = cancelAfter(task, 50, clock);
    clear();
    expect(clock.sleepers).toBe(0);
    gate.resolve();
    await task;
    expect(task.status).toBe("completed");
  });
});

describe("withTimeout", () => {
  it("rejects with CancellationObserved when the work honors the timeout", async () => {
    const clock = new ManualClock();
    const runtime = createRuntime({ clock });
    const task = runtime.spawn(async (ctx) => {
      await ctx.sleep(500);
      return "slow";
    });
    const result = withTimeout(task, 100, clock);
    await yieldNow();
    expect(clock.sleepers).toBe(2);
    clock.advance(100);
    await expect(result).rejects.toBeInstanceOf(CancellationObserved);
    expect(task.cancelReason).toEqual({ type: "timeout", ms: 100 });
  });

  it("resolves with the value when the work finishes in time", async () => {
    const clock = new ManualClock();
    const runtime = createRuntime({ clock });
    const task = runtime.spawn(() => "quick");
    await expect(withTimeout(task, 100, clock)).resolves.toBe("quick");
    expect(clock.sleepers).toBe(0);
  });
});
