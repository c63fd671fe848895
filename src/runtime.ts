/**
 * Runtime: spawns tasks onto domains and keeps the task hierarchy.
 * Structured children are reached by their parent's cancellation; detached
 * tasks have an independent lifecycle from the moment they are spawned.
 */

import { currentExecution, emptyHeld, runWithExecution } from "./async-context.js";
import { registerTask, type Logger } from "./debug.js";
import { IsolationDomain, mainDomain, suspendCurrent } from "./domain.js";
import { CancellationObserved, IsolationConflict, IsolationViolation } from "./errors.js";
import { yieldNow } from "./helpers.js";
import { TaskTree } from "./hierarchy.js";
import {
  currentIsolation,
  describeIsolation,
  nonisolated,
  sameIsolation,
  type IsolationContext,
} from "./isolation.js";
import type { Closure } from "./resolver.js";
import { defaultScheduler, systemClock, type Clock, type Scheduler } from "./scheduler.js";
import { Task, type TaskEdge, type TaskLifecycleHook } from "./task.js";

/** `"inherit"` takes the isolation of the spawn site. */
export type SpawnIsolation = "inherit" | IsolationContext;

/**
 * Context handed to task work. Check `isCancelled()` (or call
 * `checkCancellation()`) around suspension points; nothing stops the work for you.
 */
export type TaskContext = {
  readonly task: Task<unknown>;
  readonly signal: AbortSignal;
  isCancelled(): boolean;
  /** Throws {@link CancellationObserved} when the flag is set. */
  checkCancellation(): void;
  /**
   * Sleeps on the runtime clock; rejects with {@link CancellationObserved} once
   * canceled. The task's domain is free for other work meanwhile.
   */
  sleep(ms: number): Promise<void>;
  /** Lets other ready work run, including work queued on this task's domain. */
  yield(): Promise<void>;
  /** Spawns a structured child of this task. */
  spawn<U>(work: SpawnWork<U>, options?: SpawnOptions): Task<U>;
  /** Spawns a detached task; this task's cancellation never reaches it. */
  detach<U>(work: SpawnWork<U>, options?: SpawnOptions): Task<U>;
};

export type TaskWork<T> = (ctx: TaskContext) => T | Promise<T>;

/**
 * Work accepted by the spawn primitives. A detachable closure given here
 * inherits the spawn site's isolation; an inheriting closure keeps its own.
 */
export type SpawnWork<T> = TaskWork<T> | Closure<[TaskContext], T> | Closure<[], T>;

export type SpawnOptions = {
  name?: string;
  isolation?: SpawnIsolation;
};

export type RuntimeOptions = {
  scheduler?: Scheduler;
  clock?: Clock;
  /**
   * Receives isolation violations that fail a task (error), tasks that ignored
   * their cancellation (warn) and other task failures (debug).
   */
  logger?: Logger;
  lifecycleHooks?: TaskLifecycleHook | TaskLifecycleHook[];
};

let nextTaskId = 0;

function normalizeLifecycleHooks(
  hooksOpt?: TaskLifecycleHook | TaskLifecycleHook[],
): TaskLifecycleHook[] {
  if (!hooksOpt) return [];
  return Array.isArray(hooksOpt) ? hooksOpt : [hooksOpt];
}

export class Runtime {
  readonly scheduler: Scheduler;
  readonly clock: Clock;
  readonly tree = new TaskTree();
  /**
   * Default domain for hosts on this runtime. The process-wide
   * {@link mainDomain} when the runtime uses the default scheduler, otherwise
   * a domain of its own driven by the runtime's scheduler.
   */
  readonly mainDomain: IsolationDomain;
  readonly #logger: Logger | undefined;
  readonly #hooks: TaskLifecycleHook[];

  constructor(options?: RuntimeOptions) {
    this.scheduler = options?.scheduler ?? defaultScheduler;
    this.clock = options?.clock ?? systemClock;
    this.#logger = options?.logger;
    this.#hooks = normalizeLifecycleHooks(options?.lifecycleHooks);
    this.mainDomain =
      this.scheduler === defaultScheduler ? mainDomain : this.createDomain("main");
  }

  /** Creates a domain whose work runs on this runtime's scheduler. */
  createDomain(name: string): IsolationDomain {
    return new IsolationDomain(name, { scheduler: this.scheduler });
  }

  /**
   * Registers a structured child of `parent`. A child spawned under an
   * already-canceled parent starts canceled.
   */
  spawnStructured<T>(
    parent: Task<unknown>,
    isolation: SpawnIsolation,
    work: SpawnWork<T>,
    options?: { name?: string },
  ): Task<T> {
    return this.#spawn(work, isolation, "structured", parent, options?.name);
  }

  /** Registers a root task with no structured parent. */
  spawnDetached<T>(
    isolation: SpawnIsolation,
    work: SpawnWork<T>,
    options?: { name?: string },
  ): Task<T> {
    return this.#spawn(work, isolation, "detached", null, options?.name);
  }

  /**
   * Spawns a structured child of the task that is running now, or a root
   * task when called outside any task.
   */
  spawn<T>(work: SpawnWork<T>, options?: SpawnOptions): Task<T> {
    const parent = currentExecution()?.task;
    const isolation = options?.isolation ?? "inherit";
    return parent
      ? this.spawnStructured(parent, isolation, work, options)
      : this.spawnDetached(isolation, work, options);
  }

  /** Spawns an unstructured task. Defaults to the spawn site's isolation. */
  detach<T>(work: SpawnWork<T>, options?: SpawnOptions): Task<T> {
    return this.spawnDetached(options?.isolation ?? "inherit", work, options);
  }

  /** Sets the flag on every structured descendant of `task`. */
  propagateCancel(task: Task<unknown>): void {
    this.tree.propagateCancel(task);
  }

  /** Drains the scheduler. */
  runLoop(): Promise<void> {
    return this.scheduler.runLoop();
  }

  #spawn<T>(
    work: SpawnWork<T>,
    requested: SpawnIsolation,
    edge: TaskEdge,
    parent: Task<unknown> | null,
    name: string | undefined,
  ): Task<T> {
    const isolation = this.#resolveIsolation(work, requested, name);
    const spawner = parent ?? currentExecution()?.task;
    const task = new Task<T>({
      id: ++nextTaskId,
      name,
      isolation,
      parent,
      edge,
      hooks: this.#hooks,
      now: () => this.clock.now(),
      propagate: (t) => this.tree.propagateCancel(t),
    });
    this.tree.register(task, spawner);
    registerTask({
      taskId: task.id,
      name,
      edge,
      spawnerId: spawner?.id,
      domain: isolation.kind === "bound" ? isolation.domain.name : "nonisolated",
    });
    if (parent?.isCancelled) {
      task.cancel({ type: "parent-canceled", parent });
    }

    const body = typeof work === "function" ? work : work.body;
    const ctx = this.#context(task);
    const run = (): Promise<void> => task.run(() => body(ctx));
    const started =
      isolation.kind === "bound"
        ? isolation.domain.schedule(run, task)
        : this.scheduler.enqueue(0, () =>
            runWithExecution({ isolation: nonisolated, held: emptyHeld(), task }, run),
          );
    void started.finally(() => {
      this.tree.settle(task);
      this.#report(task);
    });
    return task;
  }

  #resolveIsolation<T>(
    work: SpawnWork<T>,
    requested: SpawnIsolation,
    name: string | undefined,
  ): IsolationContext {
    if (typeof work !== "function" && work.kind === "inheriting") {
      if (requested !== "inherit" && !sameIsolation(requested, work.isolation)) {
        throw new IsolationConflict(
          name ?? "task",
          `closure captured ${describeIsolation(work.isolation)} but was spawned on ${describeIsolation(requested)}`,
        );
      }
      return work.isolation;
    }
    return requested === "inherit" ? currentIsolation() : requested;
  }

  #context(task: Task<unknown>): TaskContext {
    return {
      task,
      signal: task.signal,
      isCancelled: () => task.isCancelled,
      checkCancellation: () => task.checkCancellation(),
      sleep: (ms) =>
        suspendCurrent(this.clock.sleep(ms, task.signal)).catch((reason: unknown): never => {
          throw new CancellationObserved(task.id, reason);
        }),
      yield: () => suspendCurrent(yieldNow()),
      spawn: (work, options) =>
        this.spawnStructured(task, options?.isolation ?? "inherit", work, options),
      detach: (work, options) => this.detach(work, options),
    };
  }

  #report(task: Task<unknown>): void {
    const logger = this.#logger;
    const outcome = task.outcome;
    if (!logger || !outcome) return;
    if (outcome.status === "canceled" && !outcome.observed) {
      logger.warn(`Task #${task.id} ran to completion after cancellation was requested`, {
        taskId: task.id,
        name: task.name,
        reason: outcome.reason.type,
      });
      return;
    }
    if (outcome.status !== "failed") return;
    const meta = { taskId: task.id, name: task.name, error: outcome.error };
    if (outcome.error instanceof IsolationViolation) {
      logger.error(`Task #${task.id} failed with an isolation violation`, meta);
    } else {
      logger.debug(`Task #${task.id} failed`, meta);
    }
  }
}

export function createRuntime(options?: RuntimeOptions): Runtime {
  return new Runtime(options);
}

/** Runtime behind the top-level spawn functions. */
export const defaultRuntime = new Runtime();

export function spawn<T>(work: SpawnWork<T>, options?: SpawnOptions): Task<T> {
  return defaultRuntime.spawn(work, options);
}

export function detach<T>(work: SpawnWork<T>, options?: SpawnOptions): Task<T> {
  return defaultRuntime.detach(work, options);
}

export function spawnStructured<T>(
  parent: Task<unknown>,
  isolation: SpawnIsolation,
  work: SpawnWork<T>,
  options?: { name?: string },
): Task<T> {
  return defaultRuntime.spawnStructured(parent, isolation, work, options);
}

export function spawnDetached<T>(
  isolation: SpawnIsolation,
  work: SpawnWork<T>,
  options?: { name?: string },
): Task<T> {
  return defaultRuntime.spawnDetached(isolation, work, options);
}
