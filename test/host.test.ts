import { describe, it, expect } from "vitest";
import {
  ManualScheduler,
  createRuntime,
  createViewHost,
  domainOf,
  mainDomain,
  nonisolated,
  yieldNow,
} from "isolane";
import { deferred } from "./deferred.js";

describe("ViewHost structured mode", () => {
  it("cancels appear tasks when the view disappears", async () => {
    const runtime = createRuntime();
    const ui = runtime.createDomain("ui");
    const host = createViewHost({ mode: "structured", isolation: ui.isolation, runtime, name: "profile" });
    const gate = deferred<void>();
    const task = host.onViewAppear(async (ctx) => {
      await gate.promise;
      return ui.isCurrent() && ctx.isCancelled();
    });
    expect(task.name).toBe("profile:appear");
    expect(task.edge).toBe("structured");
    expect(task.parent?.name).toBe("profile:lifetime");
    expect(host.active.size).toBe(1);

    host.onViewDisappear();
    expect(task.cancelReason).toEqual({ type: "host-disappeared" });
    gate.resolve();
    await expect(task.value()).resolves.toBe(true);
    await yieldNow();
    expect(host.active.size).toBe(0);
    host.dispose();
  });

  it("dispose cancels whatever still runs under the host", async () => {
    const runtime = createRuntime();
    const host = createViewHost({ mode: "structured", isolation: nonisolated, runtime });
    const gate = deferred<void>();
    const task = host.onViewAppear(() => gate.promise);
    host.dispose();
    expect(task.cancelReason?.type).toBe("parent-canceled");
    gate.resolve();
    await task.finished();
    expect(task.status).toBe("canceled");
  });
});

describe("ViewHost detached mode", () => {
  it("leaves appear tasks alone when the view disappears", async () => {
    const runtime = createRuntime();
    const host = createViewHost({ mode: "detached", isolation: nonisolated, runtime });
    const gate = deferred<void>();
    const task = host.onViewAppear(async () => {
      await gate.promise;
      return "kept";
    });
    expect(task.edge).toBe("detached");
    expect(task.parent).toBeNull();
    host.onViewDisappear();
    expect(task.isCancelled).toBe(false);
    gate.resolve();
    await expect(task.value()).resolves.toBe("kept");
    expect(task.status).toBe("completed");
  });
});

describe("ViewHost default isolation", () => {
  it("runs appear tasks on the runtime's own main domain and scheduler", async () => {
    const scheduler = new ManualScheduler();
    const runtime = createRuntime({ scheduler });
    const host = createViewHost({ mode: "structured", runtime });
    const task = host.onViewAppear(() => runtime.mainDomain.isCurrent());
    expect(runtime.mainDomain).not.toBe(mainDomain);
    expect(runtime.mainDomain.scheduler).toBe(scheduler);
    expect(domainOf(task.isolation)).toBe(runtime.mainDomain);
    expect(scheduler.pendingDomains()).toEqual([0, runtime.mainDomain.id]);
    await yieldNow();
    expect(task.status).toBe("pending");
    host.dispose();
    await runtime.runLoop();
    await expect(task.value()).resolves.toBe(true);
  });

  it("uses the process-wide main domain on the default scheduler", () => {
    expect(createRuntime().mainDomain).toBe(mainDomain);
  });
});
