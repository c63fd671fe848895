/**
 * Execution-context storage. Tracks which isolation the running code is on,
 * which domain holds its causal chain has acquired, and which task it
 * belongs to, across awaits.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { DomainHold, IsolationDomain } from "./domain.js";
import type { IsolationContext } from "./isolation.js";
import type { Task } from "./task.js";

/** @internal */
export type ExecutionContext = {
  readonly isolation: IsolationContext;
  /** Holds acquired by this call chain; re-entering a domain whose active hold is here runs inline. */
  readonly held: ReadonlySet<DomainHold>;
  readonly task?: Task<unknown>;
  /** Domain claimed by `tryAssumeCurrent` for this synchronous call only. Not inherited. */
  readonly assumed?: IsolationDomain;
};

export type AsyncContextStorage<T> = {
  run<R>(store: T, fn: () => R): R;
  getStore(): T | undefined;
};

function createNodeStorage<T>(): AsyncContextStorage<T> {
  const als = new AsyncLocalStorage<T>();
  return {
    run<R>(store: T, fn: () => R): R {
      return als.run(store, fn);
    },
    getStore(): T | undefined {
      return als.getStore();
    },
  };
}

/** @internal */
export const storage: AsyncContextStorage<ExecutionContext> = createNodeStorage();

const NO_HOLDS: ReadonlySet<DomainHold> = new Set();

/** @internal */
export function currentExecution(): ExecutionContext | undefined {
  return storage.getStore();
}

/** Holds carried by the current chain, or an empty set outside any domain. @internal */
export function currentHeld(): ReadonlySet<DomainHold> {
  return storage.getStore()?.held ?? NO_HOLDS;
}

/**
 * Runs fn with a derived context: the given fields replace the current ones.
 * `assumed` is never carried over from the parent.
 * @internal
 */
export function runWithExecution<R>(
  patch: Partial<ExecutionContext> & { isolation: IsolationContext },
  fn: () => R,
): R {
  const parent = storage.getStore();
  const next: ExecutionContext = {
    isolation: patch.isolation,
    held: patch.held ?? parent?.held ?? NO_HOLDS,
    task: "task" in patch ? patch.task : parent?.task,
    assumed: patch.assumed,
  };
  return storage.run(next, fn);
}

/** @internal */
export function emptyHeld(): ReadonlySet<DomainHold> {
  return NO_HOLDS;
}
