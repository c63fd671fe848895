/**
 * Scheduler and clock: the external collaborators that actually execute
 * queued domain work and measure time. Domains serialize their own work; a
 * scheduler only decides when a ready item starts.
 */

/** A unit of work handed to a scheduler; settles when the work does. */
export type WorkItem<T> = () => Promise<T>;

export interface Scheduler {
  /** Starts `work` for the given domain at the scheduler's discretion. */
  enqueue<T>(domainId: number, work: WorkItem<T>): Promise<T>;
  /** Drains ready work; resolves once nothing is queued or running. */
  runLoop(): Promise<void>;
}

export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects with `signal.reason` if the signal aborts first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Dispatches each item on the microtask queue as soon as it is enqueued.
 * The default for {@link createRuntime}.
 */
export class MicrotaskScheduler implements Scheduler {
  readonly #inFlight = new Set<Promise<unknown>>();

  enqueue<T>(_domainId: number, work: WorkItem<T>): Promise<T> {
    const run = Promise.resolve().then(work);
    const tracked = run.then(
      () => undefined,
      () => undefined,
    );
    this.#inFlight.add(tracked);
    void tracked.then(() => this.#inFlight.delete(tracked));
    return run;
  }

  async runLoop(): Promise<void> {
    while (this.#inFlight.size > 0) {
      await Promise.all(this.#inFlight);
    }
  }
}

type ManualItem = {
  domainId: number;
  start: () => Promise<void>;
};

/**
 * Holds enqueued work until the test drives it with {@link runNext} or
 * {@link runLoop}. Items start in enqueue order.
 */
export class ManualScheduler implements Scheduler {
  readonly #queue: ManualItem[] = [];
  readonly #running = new Set<Promise<void>>();
  #wake: (() => void) | undefined;

  enqueue<T>(domainId: number, work: WorkItem<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.#queue.push({
        domainId,
        start: () => work().then(resolve, reject),
      });
      this.#wake?.();
    });
  }

  /** Number of items waiting to start. */
  get pending(): number {
    return this.#queue.length;
  }

  /** Domain ids of the waiting items, in start order. */
  pendingDomains(): number[] {
    return this.#queue.map((item) => item.domainId);
  }

  /** Starts the oldest waiting item and resolves when it settles. Returns false when idle. */
  async runNext(): Promise<boolean> {
    const item = this.#queue.shift();
    if (!item) return false;
    await this.#start(item);
    return true;
  }

  async runLoop(): Promise<void> {
    for (;;) {
      let item = this.#queue.shift();
      while (item) {
        void this.#start(item);
        item = this.#queue.shift();
      }
      if (this.#running.size === 0) return;
      const woken = new Promise<void>((resolve) => {
        this.#wake = resolve;
      });
      await Promise.race([woken, ...this.#running]);
      this.#wake = undefined;
    }
  }

  #start(item: ManualItem): Promise<void> {
    const running = item.start();
    this.#running.add(running);
    return running.finally(() => {
      this.#running.delete(running);
    });
  }
}

/**
 * Resolves after `ms` or rejects if the signal aborts first. The timer is
 * cleared on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise((resolve, reject) => {
    const id = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);
    const cleanup = (): void => {
      clearTimeout(id);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = (): void => {
      cleanup();
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort);
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

type Sleeper = {
  wakeAt: number;
  resolve: () => void;
};

/** Virtual time for tests: sleepers wake only when {@link advance} passes their deadline. */
export class ManualClock implements Clock {
  #now: number;
  #sleepers: Sleeper[] = [];

  constructor(start = 0) {
    this.#now = start;
  }

  now(): number {
    return this.#now;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    return new Promise((resolve, reject) => {
      const sleeper: Sleeper = {
        wakeAt: this.#now + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        this.#sleepers = this.#sleepers.filter((s) => s !== sleeper);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.#sleepers.push(sleeper);
    });
  }

  /** Moves time forward and wakes every sleeper whose deadline has passed, earliest first. */
  advance(ms: number): void {
    this.#now += ms;
    const due = this.#sleepers
      .filter((s) => s.wakeAt <= this.#now)
      .sort((a, b) => a.wakeAt - b.wakeAt);
    this.#sleepers = this.#sleepers.filter((s) => s.wakeAt > this.#now);
    for (const s of due) s.resolve();
  }

  get sleepers(): number {
    return this.#sleepers.length;
  }
}

/** Process-wide scheduler used by domains created without one. */
export const defaultScheduler: Scheduler = new MicrotaskScheduler();
