import { describe, it, expect } from "vitest";
import {
  IsolationConflict,
  IsolationDomain,
  IsolationViolation,
  callFor,
  closure,
  currentIsolation,
  defer,
  defineBehavior,
  detachable,
  domainOf,
  nonisolated,
  sleep,
  type IsolationProvider,
  type Isolated,
} from "isolane";

describe("static behaviors", () => {
  it("throws before the body runs when a bound sync behavior is called off its domain", async () => {
    const ui = new IsolationDomain("ui");
    const worker = new IsolationDomain("worker");
    let runs = 0;
    const render = defineBehavior({
      name: "render",
      mode: "sync",
      isolation: ui.isolation,
      body: () => {
        runs++;
        return "rendered";
      },
    });
    expect(() => render.call()).toThrow(IsolationViolation);
    expect(() => render.call()).toThrow(
      'Synchronous call to "render" crosses into another domain without a suspension point',
    );
    await expect(worker.enter(() => render.call())).rejects.toBeInstanceOf(IsolationViolation);
    expect(runs).toBe(0);
    await expect(ui.enter(() => render.call())).resolves.toBe("rendered");
    expect(runs).toBe(1);
  });

  it("runs a nonisolated sync behavior inline and context-free", async () => {
    const domain = new IsolationDomain("caller");
    const locate = defineBehavior({ name: "locate", mode: "sync", body: () => currentIsolation() });
    await expect(domain.enter(() => locate.call())).resolves.toBe(nonisolated);
  });

  it("hops to the bound domain for async behaviors", async () => {
    const domain = new IsolationDomain("store");
    const where = defineBehavior({
      name: "where",
      mode: "async",
      isolation: domain.isolation,
      body: () => domain.isCurrent(),
    });
    await expect(where.call()).resolves.toBe(true);
  });

  it("fails at definition when a bound isolation is combined with a dynamic one", () => {
    const domain = new IsolationDomain("static");
    expect(() =>
      defineBehavior({
        name: "both",
        mode: "async",
        isolation: domain.isolation,
        dynamic: true,
        body: () => 1,
      }),
    ).toThrow(IsolationConflict);
    expect(() =>
      defineBehavior({
        name: "both",
        mode: "sync",
        isolation: domain.isolation,
        dynamic: true,
        body: () => 1,
      }),
    ).toThrow(`Behavior "both": declares domain "static"#${domain.id} and also accepts a dynamic isolation parameter`);
  });
});

describe("dynamic behaviors", () => {
  it("binds each call to the isolation it is given", async () => {
    const domain = new IsolationDomain("dyn");
    const where = defineBehavior({
      name: "where",
      mode: "async",
      dynamic: true,
      body: () => currentIsolation(),
    });
    expect(domainOf(await where.call(domain.isolation))).toBe(domain);
    await expect(where.call(nonisolated)).resolves.toBe(nonisolated);
  });

  it("does not queue behind the caller when it already holds the domain", async () => {
    const domain = new IsolationDomain("inline");
    const read = defineBehavior({
      name: "read",
      mode: "async",
      dynamic: true,
      body: (n: number) => n + 1,
    });
    await expect(domain.enter(() => read.call(domain.isolation, 1))).resolves.toBe(2);
  });

  it("sync form throws when asked to cross domains", async () => {
    const domain = new IsolationDomain("dynsync");
    const double = defineBehavior({
      name: "double",
      mode: "sync",
      dynamic: true,
      body: (n: number) => n * 2,
    });
    expect(double.call(nonisolated, 2)).toBe(4);
    expect(() => double.call(domain.isolation, 2)).toThrow(IsolationViolation);
    await expect(domain.enter(() => double.call(domain.isolation, 5))).resolves.toBe(10);
  });

  it("callHere runs wherever the caller is", async () => {
    const domain = new IsolationDomain("here");
    const double = defineBehavior({
      name: "double",
      mode: "sync",
      dynamic: true,
      body: (n: number) => n * 2,
    });
    const locate = defineBehavior({
      name: "locate",
      mode: "async",
      dynamic: true,
      body: () => domain.isCurrent(),
    });
    expect(double.callHere(3)).toBe(6);
    await expect(domain.enter(() => double.callHere(4))).resolves.toBe(8);
    await expect(domain.enter(() => locate.callHere())).resolves.toBe(true);
    await expect(locate.callHere()).resolves.toBe(false);
  });

  it("callFor uses the provider's isolation", async () => {
    const domain = new IsolationDomain("provider");
    const provider: IsolationProvider = { isolation: domain.isolation };
    const locate = defineBehavior({
      name: "locate",
      mode: "async",
      dynamic: true,
      body: () => domain.isCurrent(),
    });
    await expect(callFor(provider, locate)).resolves.toBe(true);
    await expect(callFor(domain, locate)).resolves.toBe(true);
  });
});

describe("closures", () => {
  it("inheriting closures run on the domain they were created on", async () => {
    const home = new IsolationDomain("home");
    const away = new IsolationDomain("away");
    const captured = await home.enter(() => closure(() => home.isCurrent()));
    expect(domainOf(captured.isolation)).toBe(home);
    await expect(captured.call()).resolves.toBe(true);
    await expect(away.enter(() => captured.call())).resolves.toBe(true);
    expect(closure(() => 1).isolation).toBe(nonisolated);
  });

  it("detachable closures run context-free unless given an isolation", async () => {
    const domain = new IsolationDomain("origin");
    const work = detachable(() => currentIsolation());
    await expect(domain.enter(() => work.call())).resolves.toBe(nonisolated);
    expect(domainOf(await work.callWith(domain.isolation))).toBe(domain);
  });

  it("defer does not carry the caller's isolation into detachable work", async () => {
    const domain = new IsolationDomain("deferring");
    await expect(domain.enter(() => defer(detachable(() => currentIsolation())))).resolves.toBe(
      nonisolated,
    );
    await expect(domain.enter(() => defer(() => currentIsolation()))).resolves.toBe(nonisolated);
    const { later } = await domain.enter(() => ({ later: defer(closure(() => domain.isCurrent())) }));
    await expect(later).resolves.toBe(true);
  });

  it("defer runs an inheriting closure exclusively on its domain", async () => {
    const domain = new IsolationDomain("deferred-closure");
    const log: string[] = [];
    const { later } = await domain.enter(() => ({
      later: defer(
        closure(async () => {
          log.push("a:start");
          await sleep(20);
          log.push("a:end");
          return domain.isCurrent();
        }),
      ),
    }));
    const other = domain.enter(async () => {
      log.push("b:start");
      await sleep(5);
      log.push("b:end");
    });
    await Promise.all([later, other]);
    await expect(later).resolves.toBe(true);
    expect([
      ["a:start", "a:end", "b:start", "b:end"],
      ["b:start", "b:end", "a:start", "a:end"],
    ]).toContainEqual(log);
  });
});

describe("derived behaviors", () => {
  it("sync derivations inherit the base isolation and chain", async () => {
    const domain = new IsolationDomain("base");
    const base = defineBehavior({
      name: "base",
      mode: "sync",
      isolation: domain.isolation,
      body: (n: number) => n + 1,
    });
    const derived = base.derive({ name: "derived", body: (b, n) => b.call(n) * 10 });
    const twice = derived.derive({ name: "twice", body: (b, n) => b.call(n) + 1 });
    expect(domainOf(derived.isolation)).toBe(domain);
    await expect(domain.enter(() => derived.call(1))).resolves.toBe(20);
    await expect(domain.enter(() => twice.call(1))).resolves.toBe(21);
    expect(() => twice.call(1)).toThrow(IsolationViolation);
  });

  it("sync derivations cannot move to another isolation", () => {
    const domain = new IsolationDomain("pinned");
    const other = new IsolationDomain("elsewhere");
    const base = defineBehavior({
      name: "base",
      mode: "sync",
      isolation: domain.isolation,
      body: (n: number) => n,
    });
    expect(() =>
      base.derive({ name: "moved", isolation: other.isolation, body: (b, n) => b.call(n) }),
    ).toThrow(IsolationConflict);
    expect(() =>
      base.derive({ name: "freed", isolation: nonisolated, body: (b, n) => b.call(n) }),
    ).toThrow(
      `Behavior "freed": a synchronous override cannot move from domain "pinned"#${domain.id} to nonisolated`,
    );
    expect(
      base.derive({ name: "same", isolation: domain.isolation, body: (b, n) => b.call(n) }).name,
    ).toBe("same");
  });

  it("async derivations may rebind and still delegate to the base domain", async () => {
    const domain = new IsolationDomain("profiles");
    const fetchName = defineBehavior({
      name: "fetchName",
      mode: "async",
      isolation: domain.isolation,
      body: async (id: number) => `user-${id}@${domain.isCurrent()}`,
    });
    const relay = fetchName.derive({
      name: "relay",
      isolation: nonisolated,
      body: async (b, id) => {
        const inner = await b.call(id);
        return `${inner}|${currentIsolation().kind}`;
      },
    });
    expect(relay.isolation).toBe(nonisolated);
    await expect(relay.call(7)).resolves.toBe("user-7@true|none");
    expect(domainOf(fetchName.derive({ name: "kept", body: (b, id) => b.call(id) }).isolation)).toBe(
      domain,
    );
  });
});

describe("state transfer", () => {
  it("refuses to pass owned state into another domain unless it is shareable", async () => {
    const owner = new IsolationDomain("ui");
    const other = new IsolationDomain("worker");
    const report = defineBehavior({
      name: "report",
      mode: "async",
      isolation: other.isolation,
      body: (_cell: Isolated<{ count: number }>) => "seen",
    });
    const cell = owner.own({ count: 0 });
    await expect(report.call(cell)).rejects.toThrow(
      `State owned by domain "ui" cannot cross into domain "worker"#${other.id}`,
    );
    await expect(report.call(owner.own({ count: 0 }, { shareable: true }))).resolves.toBe("seen");
  });

  it("lets owned state reach a behavior bound to its owner", async () => {
    const owner = new IsolationDomain("owner");
    const increment = defineBehavior({
      name: "increment",
      mode: "async",
      isolation: owner.isolation,
      body: (cell: Isolated<number>) => cell.update((n) => n + 1),
    });
    await expect(increment.call(owner.own(1))).resolves.toBe(2);
  });

  it("sync calls throw on a non-shareable crossing", () => {
    const owner = new IsolationDomain("source");
    const inspect = defineBehavior({
      name: "inspect",
      mode: "sync",
      body: (_cell: Isolated<string>) => "inspected",
    });
    expect(() => inspect.call(owner.own("secret"))).toThrow(IsolationViolation);
    expect(inspect.call(owner.own("public", { shareable: true }))).toBe("inspected");
  });
});
