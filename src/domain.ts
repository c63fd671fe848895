/**
 * IsolationDomain: a single-threaded execution context with its own FIFO
 * run-queue. Work entered on a domain runs exclusively: the next item starts
 * only after the current one settles or parks its hold at one of the
 * runtime's suspension points.
 */

import {
  currentExecution,
  currentHeld,
  emptyHeld,
  runWithExecution,
  type ExecutionContext,
} from "./async-context.js";
import { IsolationViolation } from "./errors.js";
import {
  bound,
  currentIsolation,
  describeIsolation,
  domainOf,
  type IsolationContext,
  type IsolationProvider,
} from "./isolation.js";
import { defaultScheduler, type Scheduler } from "./scheduler.js";
import { isStrictModeEnabled, strictModeWarn } from "./strict-mode.js";
import type { Task } from "./task.js";

/**
 * One acquisition of a domain by a queued unit of work. The token travels in
 * the unit's execution context; only the domain's active hold lets a call
 * chain re-enter inline. `units` counts the job plus inline entries still
 * running under it.
 * @internal
 */
export class DomainHold {
  units = 1;
}

type Job = {
  run: () => Promise<void>;
  held: ReadonlySet<DomainHold>;
  task: Task<unknown> | undefined;
};

type Resume = {
  resume: DomainHold;
  wake: () => void;
};

export type DomainOptions = {
  /** Scheduler that starts this domain's work. Defaults to the process-wide microtask scheduler. */
  scheduler?: Scheduler;
};

let nextDomainId = 0;

export class IsolationDomain implements IsolationProvider {
  readonly id: number;
  readonly name: string;
  readonly isolation: IsolationContext;
  readonly scheduler: Scheduler;
  readonly #queue: Array<Job | Resume> = [];
  #holder: DomainHold | undefined;

  constructor(name: string, options?: DomainOptions) {
    this.id = ++nextDomainId;
    this.name = name;
    this.isolation = bound(this);
    this.scheduler = options?.scheduler ?? defaultScheduler;
  }

  /** Items waiting for the domain, including suspended units waiting to resume. */
  get queued(): number {
    return this.#queue.length;
  }

  /** Whether a unit of work currently holds the domain. */
  get busy(): boolean {
    return this.#holder !== undefined;
  }

  /**
   * Whether the running code is on this domain: either under the domain's
   * active hold or inside {@link tryAssumeCurrent}. Code that captured the
   * domain's context but outlived its unit of work is not current.
   */
  isCurrent(): boolean {
    if (domainOf(currentIsolation()) !== this) return false;
    return this.isHeld() || currentExecution()?.assumed === this;
  }

  /** Whether the running call chain carries the domain's active hold (so entering it would not need to wait). */
  isHeld(): boolean {
    const hold = this.#holder;
    return hold !== undefined && currentHeld().has(hold);
  }

  /**
   * Runs `work` exclusively on this domain. Resolves or rejects with the
   * work's outcome. When the current chain carries the active hold the work
   * runs inline and keeps the hold until it settles; otherwise it is queued
   * behind earlier submissions.
   */
  enter<T>(work: () => T | Promise<T>): Promise<T> {
    const hold = this.#holder;
    if (hold && currentHeld().has(hold)) {
      hold.units++;
      return new Promise<T>((resolve) => {
        resolve(runWithExecution({ isolation: this.isolation }, work));
      }).finally(() => this.#leave(hold));
    }
    return this.#submit(work, currentHeld(), currentExecution()?.task);
  }

  /**
   * Queues task work on a fresh call chain: the task never inherits the
   * spawner's hold on any domain.
   * @internal
   */
  schedule<T>(work: () => T | Promise<T>, task: Task<unknown>): Promise<T> {
    return this.#submit(work, emptyHeld(), task);
  }

  /**
   * Releases the domain while `pending` settles, then queues the caller to
   * resume behind whatever was submitted in the meantime. Only the sole unit
   * under the active hold can release it; anything else waits holding the
   * domain.
   * @internal
   */
  suspend<T>(pending: Promise<T>): Promise<T> {
    if (!this.canSuspend()) return pending;
    const hold = this.#holder;
    if (!hold) return pending;
    this.#holder = undefined;
    this.#drain();
    return pending.then(
      async (value) => {
        await this.#resume(hold);
        return value;
      },
      async (error: unknown) => {
        await this.#resume(hold);
        throw error;
      },
    );
  }

  /** @internal */
  canSuspend(): boolean {
    return this.isHeld() && this.#holder?.units === 1;
  }

  /** Throws {@link IsolationViolation} unless the running code is on this domain. */
  assertCurrent(message?: string): void {
    if (this.isCurrent()) return;
    throw new IsolationViolation(
      message ?? `Expected to run on domain "${this.name}"`,
      this.isolation,
      currentIsolation(),
    );
  }

  /**
   * Runs `work` synchronously as if this domain were current, trusting the
   * caller's claim. Nothing re-verifies the claim except `assertCurrent`
   * calls inside `work`; a wrong claim is a silent data race, so this is
   * unsound if misused. The claim grants no hold: `enter` from inside still
   * queues unless the chain really holds the domain. With strict mode on the
   * claim is checked and a false one throws {@link IsolationViolation}.
   */
  tryAssumeCurrent<T>(work: () => T): T {
    if (isStrictModeEnabled() && !this.isCurrent()) {
      const violation = new IsolationViolation(
        `tryAssumeCurrent on domain "${this.name}" from another context`,
        this.isolation,
        currentIsolation(),
      );
      strictModeWarn(violation.message);
      throw violation;
    }
    return runWithExecution({ isolation: this.isolation, assumed: this }, work);
  }

  /** Creates a state cell owned by this domain. */
  own<T>(value: T, options?: { shareable?: boolean }): Isolated<T> {
    return new Isolated(this, value, options?.shareable ?? false);
  }

  toString(): string {
    return describeIsolation(this.isolation);
  }

  #submit<T>(
    work: () => T | Promise<T>,
    held: ReadonlySet<DomainHold>,
    task: Task<unknown> | undefined,
  ): Promise<T> {
    const call = async (): Promise<T> => work();
    return new Promise<T>((resolve, reject) => {
      this.#queue.push({
        run: () => call().then(resolve, reject),
        held,
        task,
      });
      this.#drain();
    });
  }

  #resume(hold: DomainHold): Promise<void> {
    return new Promise<void>((resolve) => {
      this.#queue.push({ resume: hold, wake: resolve });
      this.#drain();
    });
  }

  #drain(): void {
    if (this.#holder) return;
    const item = this.#queue.shift();
    if (!item) return;
    if ("resume" in item) {
      // The job behind this hold already returned; its stray continuation runs unowned.
      if (item.resume.units === 0) {
        item.wake();
        this.#drain();
        return;
      }
      this.#holder = item.resume;
      void this.scheduler.enqueue(this.id, async () => item.wake());
      return;
    }
    const hold = new DomainHold();
    this.#holder = hold;
    const context: ExecutionContext = {
      isolation: this.isolation,
      held: new Set([...item.held, hold]),
      task: item.task,
    };
    void this.scheduler
      .enqueue(this.id, () => runWithExecution(context, item.run))
      .finally(() => this.#leave(hold));
  }

  #leave(hold: DomainHold): void {
    hold.units--;
    if (hold.units > 0) return;
    if (this.#holder === hold) this.#holder = undefined;
    this.#drain();
  }
}

/**
 * Releases the current domain while `pending` settles, when the running unit
 * is the only one under its hold. Used at the runtime's own suspension
 * points: awaiting a task, `TaskContext.sleep` and `TaskContext.yield`.
 * @internal
 */
export function suspendCurrent<T>(pending: Promise<T>): Promise<T> {
  const domain = domainOf(currentIsolation());
  return domain ? domain.suspend(pending) : pending;
}

/**
 * Mutable state owned by one domain. Every access asserts the owner is
 * current. Cells marked shareable may also be passed across domains.
 */
export class Isolated<T> {
  readonly owner: IsolationDomain;
  readonly shareable: boolean;
  #value: T;

  constructor(owner: IsolationDomain, value: T, shareable: boolean) {
    this.owner = owner;
    this.shareable = shareable;
    this.#value = value;
  }

  get value(): T {
    this.owner.assertCurrent(`Read of state owned by domain "${this.owner.name}"`);
    return this.#value;
  }

  set value(next: T) {
    this.owner.assertCurrent(`Write of state owned by domain "${this.owner.name}"`);
    this.#value = next;
  }

  update(fn: (current: T) => T): T {
    this.value = fn(this.value);
    return this.#value;
  }
}

/**
 * Fails with {@link IsolationViolation} when `value` is domain-owned state that
 * would cross into `target` without being shareable.
 */
export function assertTransferable(value: unknown, target: IsolationContext): void {
  if (!(value instanceof Isolated) || value.shareable) return;
  if (domainOf(target) === value.owner) return;
  throw new IsolationViolation(
    `State owned by domain "${value.owner.name}" cannot cross into ${describeIsolation(target)}`,
    value.owner.isolation,
    target,
  );
}

/** The process-wide default domain. */
export const mainDomain = new IsolationDomain("main");
