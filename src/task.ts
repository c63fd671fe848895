/**
 * Task: a unit of asynchronous work bound to zero or one isolation domain,
 * with a monotonic, advisory cancellation flag. Awaitable but not a Promise.
 */

import { err, ok, type Result } from "neverthrow";
import { updateTask, noteTaskCancel } from "./debug.js";
import { suspendCurrent } from "./domain.js";
import { CancellationObserved, IsolationViolation, TaskFailure, type TaskError } from "./errors.js";
import { currentIsolation, domainOf, type IsolationContext } from "./isolation.js";

/**
 * Discriminated union for why a task was canceled. Handlers can narrow on `reason.type`.
 * User-provided reasons are wrapped as `user`.
 *
 * @see {@link Task.onCancel}
 */
export type CancelReason =
  | { type: "user"; detail?: unknown }
  | { type: "timeout"; ms: number }
  | { type: "parent-canceled"; parent: Task<unknown> }
  | { type: "host-disappeared" };

/** Lifecycle state of a Task. `pending` until its scheduler starts it. */
export type TaskStatus = "pending" | "running" | "completed" | "failed" | "canceled";

/** How a task hangs off the task that spawned it. Fixed at spawn. */
export type TaskEdge = "structured" | "detached";

/**
 * Terminal outcome. A canceled task that never looked at its flag still
 * carries the value it produced (`observed: false`).
 */
export type TaskOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "failed"; error: unknown }
  | { status: "canceled"; observed: false; value: T; reason: CancelReason }
  | { status: "canceled"; observed: true; error: CancellationObserved; reason: CancelReason };

/**
 * Optional callbacks invoked at task lifecycle points. Used for observability
 * (e.g. metrics). Hook errors are swallowed and do not affect task outcome.
 */
export type TaskLifecycleHook = {
  /** Called once when the task begins running (before work runs). */
  onTaskStart?(task: Task): void;
  /** Called once when the task completes. Duration is in milliseconds since task start. */
  onTaskComplete?(task: Task, duration: number): void;
  /** Called once when the task fails. Duration is in milliseconds since task start. */
  onTaskFail?(task: Task, error: unknown, duration: number): void;
  /** Called once when cancellation is requested. */
  onTaskCancel?(task: Task, reason: CancelReason): void;
};

/** @internal */
export type TaskInit = {
  id: number;
  name?: string;
  isolation: IsolationContext;
  parent: Task<unknown> | null;
  edge: TaskEdge;
  hooks: TaskLifecycleHook[];
  now: () => number;
  /** Called after this task's flag is set, to reach its structured descendants. */
  propagate: (task: Task<unknown>) => void;
};

function invokeHooks(hooks: TaskLifecycleHook[], fn: (h: TaskLifecycleHook) => void): void {
  for (const h of hooks) {
    try {
      fn(h);
    } catch {
      // Hook errors do not affect task outcome
    }
  }
}

/**
 * Handle to spawned work. `await task` is the same as `await task.value()`.
 *
 * Because a Task is thenable, returning one from an async function, from a
 * `then` callback or from `IsolationDomain.enter` adopts the task's value
 * instead of passing the handle along: the caller ends up waiting for the
 * task to finish. To hand the handle itself across such a boundary, wrap it,
 * e.g. `return { task }`.
 */
export class Task<T = unknown> implements PromiseLike<T> {
  readonly id: number;
  readonly name: string | undefined;
  readonly isolation: IsolationContext;
  /** Structured parent, or null for roots and detached tasks. */
  readonly parent: Task<unknown> | null;
  readonly edge: TaskEdge;

  #status: TaskStatus = "pending";
  #cancelReason: CancelReason | undefined;
  #outcome: TaskOutcome<T> | undefined;
  #startTime = 0;
  readonly #controller = new AbortController();
  readonly #cancelHandlers: Array<(reason: CancelReason) => void> = [];
  readonly #hooks: TaskLifecycleHook[];
  readonly #now: () => number;
  readonly #propagate: (task: Task<unknown>) => void;
  readonly #settled: Promise<TaskOutcome<T>>;
  readonly #settledWith: { resolve(outcome: TaskOutcome<T>): void };

  constructor(init: TaskInit) {
    this.id = init.id;
    this.name = init.name;
    this.isolation = init.isolation;
    this.parent = init.parent;
    this.edge = init.edge;
    this.#hooks = init.hooks;
    this.#now = init.now;
    this.#propagate = init.propagate;
    let resolveSettled!: (outcome: TaskOutcome<T>) => void;
    this.#settled = new Promise((resolve) => {
      resolveSettled = resolve;
    });
    this.#settledWith = { resolve: resolveSettled };
  }

  get status(): TaskStatus {
    return this.#status;
  }

  /** Monotonic: once true, never false again. */
  get isCancelled(): boolean {
    return this.#cancelReason !== undefined;
  }

  get cancelReason(): CancelReason | undefined {
    return this.#cancelReason;
  }

  /** Aborted when the task is canceled; hand it to fetch or other signal-aware I/O. */
  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  /** Terminal outcome, or undefined while pending or running. */
  get outcome(): TaskOutcome<T> | undefined {
    return this.#outcome;
  }

  get isTerminal(): boolean {
    return this.#outcome !== undefined;
  }

  /**
   * Requests cancellation. Sets the flag, aborts {@link signal}, runs onCancel
   * handlers and reaches structured descendants. Never interrupts running
   * work. Returns false when the task is already terminal or canceled.
   */
  cancel(reason?: CancelReason): boolean {
    if (this.isTerminal || this.isCancelled) return false;
    const cancelReason: CancelReason = reason ?? { type: "user" };
    this.#cancelReason = cancelReason;
    noteTaskCancel(this.id, cancelReason.type);
    invokeHooks(this.#hooks, (h) => h.onTaskCancel?.(this, cancelReason));
    this.#controller.abort(cancelReason);
    for (const h of this.#cancelHandlers) {
      try {
        h(cancelReason);
      } catch {
        // One throwing handler does not stop the others
      }
    }
    this.#propagate(this);
    return true;
  }

  /** Registers a handler for cancellation; runs immediately if the flag is already set. */
  onCancel(handler: (reason: CancelReason) => void): void {
    if (this.#cancelReason) {
      try {
        handler(this.#cancelReason);
      } catch {
        // Invoke handler once; ignore errors per onCancel semantics
      }
      return;
    }
    this.#cancelHandlers.push(handler);
  }

  /** Throws {@link CancellationObserved} when the flag is set. */
  checkCancellation(): void {
    if (this.#cancelReason) {
      throw new CancellationObserved(this.id, this.#cancelReason);
    }
  }

  /**
   * Waits for the task to finish. Resolves with the produced value (also when
   * the task was canceled but ran to completion anyway) and rejects with the
   * work's error verbatim or with {@link CancellationObserved}. Awaiting never
   * cancels the task.
   *
   * Awaiting from the only unit holding a domain releases that domain until
   * the task settles, so a task queued on the same domain can run. When the
   * task is still queued on a domain the caller keeps holding, it can never
   * start and the promise rejects with {@link IsolationViolation}.
   */
  value(): Promise<T> {
    const domain = domainOf(this.isolation);
    const here = domainOf(currentIsolation());
    if (
      this.#status === "pending" &&
      domain?.isHeld() &&
      (domain !== here || !domain.canSuspend())
    ) {
      return Promise.reject(
        new IsolationViolation(
          `Task #${this.id} is queued behind the work awaiting it on domain "${domain.name}" and can never start`,
          this.isolation,
          currentIsolation(),
        ),
      );
    }
    return suspendCurrent(this.#settled).then((outcome) => {
      switch (outcome.status) {
        case "completed":
          return outcome.value;
        case "failed":
          throw outcome.error;
        case "canceled":
          if (outcome.observed) throw outcome.error;
          return outcome.value;
      }
    });
  }

  /** Like {@link value}, but never rejects: failures arrive as a `TaskError`. */
  async settle(): Promise<Result<T, TaskError>> {
    const outcome = await this.#settled;
    switch (outcome.status) {
      case "completed":
        return ok(outcome.value);
      case "failed":
        return err(new TaskFailure(this.id, outcome.error));
      case "canceled":
        return outcome.observed ? err(outcome.error) : ok(outcome.value);
    }
  }

  /** Resolves with the terminal outcome once the task settles. */
  finished(): Promise<TaskOutcome<T>> {
    return this.#settled;
  }

  then<TResult1 = T, TResult2 = never>(
    onFulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): PromiseLike<TResult1 | TResult2> {
    return this.value().then(onFulfilled, onRejected);
  }

  /**
   * Runs the work once; the caller has already placed execution on the task's
   * domain. Records the outcome and never rejects.
   * @internal
   */
  async run(work: () => T | Promise<T>): Promise<void> {
    if (this.#status !== "pending") return;
    this.#status = "running";
    this.#startTime = this.#now();
    updateTask(this.id, "running");
    invokeHooks(this.#hooks, (h) => h.onTaskStart?.(this));
    try {
      const value = await work();
      const reason = this.#cancelReason;
      this.#finish(
        reason
          ? { status: "canceled", observed: false, value, reason }
          : { status: "completed", value },
      );
    } catch (e) {
      const reason = this.#cancelReason;
      if (reason && e instanceof CancellationObserved) {
        this.#finish({ status: "canceled", observed: true, error: e, reason });
      } else {
        this.#finish({ status: "failed", error: e });
      }
    }
  }

  #finish(outcome: TaskOutcome<T>): void {
    const duration = this.#now() - this.#startTime;
    this.#status = outcome.status;
    this.#outcome = outcome;
    if (outcome.status === "completed") {
      invokeHooks(this.#hooks, (h) => h.onTaskComplete?.(this, duration));
    } else if (outcome.status === "failed") {
      invokeHooks(this.#hooks, (h) => h.onTaskFail?.(this, outcome.error, duration));
    }
    updateTask(this.id, outcome.status);
    this.#settledWith.resolve(outcome);
  }
}
