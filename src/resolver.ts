/**
 * Isolation context resolution at call boundaries: closures that capture (or
 * refuse) their lexical domain, behaviors with static or dynamic isolation,
 * and derived behaviors that delegate to a base.
 */

import { emptyHeld, runWithExecution } from "./async-context.js";
import { assertTransferable } from "./domain.js";
import { IsolationConflict, IsolationViolation } from "./errors.js";
import {
  currentIsolation,
  describeIsolation,
  nonisolated,
  sameIsolation,
  type IsolationContext,
  type IsolationProvider,
} from "./isolation.js";

function checkArguments(args: readonly unknown[], target: IsolationContext): void {
  for (const arg of args) assertTransferable(arg, target);
}

/**
 * Runs `fn` under `ctx` across a suspension point: enters the bound domain
 * (inline when the chain already holds it) or runs context-free.
 */
export function runIsolated<R>(ctx: IsolationContext, fn: () => R | Promise<R>): Promise<R> {
  if (ctx.kind === "bound") return ctx.domain.enter(fn);
  return new Promise<R>((resolve) => {
    resolve(runWithExecution({ isolation: nonisolated }, fn));
  });
}

/**
 * Runs `fn` under `ctx` with no suspension point. A bound context must
 * already be current: there is nowhere to switch domains.
 */
export function runIsolatedSync<R>(ctx: IsolationContext, fn: () => R, label: string): R {
  if (ctx.kind === "bound") {
    if (!ctx.domain.isCurrent()) {
      throw new IsolationViolation(
        `Synchronous call to ${label} crosses into another domain without a suspension point`,
        ctx,
        currentIsolation(),
      );
    }
    return fn();
  }
  return runWithExecution({ isolation: nonisolated }, fn);
}

// Closures

/** A closure that runs on the isolation it was created under, wherever it is invoked from. */
export interface InheritingClosure<A extends unknown[], R> {
  readonly kind: "inheriting";
  readonly isolation: IsolationContext;
  readonly body: (...args: A) => R | Promise<R>;
  call(...args: A): Promise<R>;
}

/**
 * A closure with no inherited isolation. It runs context-free unless given
 * one with `callWith`, or handed directly to a spawn primitive, which binds it
 * to the spawn site.
 */
export interface DetachableClosure<A extends unknown[], R> {
  readonly kind: "detachable";
  readonly body: (...args: A) => R | Promise<R>;
  call(...args: A): Promise<R>;
  callWith(isolation: IsolationContext, ...args: A): Promise<R>;
}

export type Closure<A extends unknown[], R> = InheritingClosure<A, R> | DetachableClosure<A, R>;

/** Captures the current isolation; the body always runs there. */
export function closure<A extends unknown[], R>(
  body: (...args: A) => R | Promise<R>,
): InheritingClosure<A, R> {
  const isolation = currentIsolation();
  return {
    kind: "inheriting",
    isolation,
    body,
    call(...args: A): Promise<R> {
      try {
        checkArguments(args, isolation);
      } catch (e) {
        return Promise.reject(e);
      }
      return runIsolated(isolation, () => body(...args));
    },
  };
}

/** Marks a body independently executable: it captures no isolation. */
export function detachable<A extends unknown[], R>(
  body: (...args: A) => R | Promise<R>,
): DetachableClosure<A, R> {
  const callWith = (isolation: IsolationContext, ...args: A): Promise<R> => {
    try {
      checkArguments(args, isolation);
    } catch (e) {
      return Promise.reject(e);
    }
    return runIsolated(isolation, () => body(...args));
  };
  return {
    kind: "detachable",
    body,
    call: (...args: A) => callWith(nonisolated, ...args),
    callWith,
  };
}

/**
 * Launches work on a later turn without the spawn-site exception: a
 * detachable closure or plain function runs context-free, an inheriting
 * closure runs on its captured isolation. The work starts on a fresh call
 * chain that holds no domain, so an inheriting closure queues behind whatever
 * its domain is running.
 */
export function defer<R>(work: Closure<[], R> | (() => R | Promise<R>)): Promise<R> {
  return Promise.resolve().then(() =>
    runWithExecution({ isolation: nonisolated, held: emptyHeld(), task: undefined }, () =>
      typeof work === "function" ? runIsolated(nonisolated, work) : work.call(),
    ),
  );
}

// Behaviors

type BehaviorBase = {
  /** Used in error messages. */
  name: string;
};

type SyncBehaviorOptions<A extends unknown[], R> = BehaviorBase & {
  mode: "sync";
  /** Static isolation. Omitted means nonisolated. */
  isolation?: IsolationContext;
  body: (...args: A) => R;
};

type AsyncBehaviorOptions<A extends unknown[], R> = BehaviorBase & {
  mode: "async";
  /** Static isolation. Omitted means nonisolated. */
  isolation?: IsolationContext;
  body: (...args: A) => R | Promise<R>;
};

/**
 * With `dynamic: true` the first call argument is the isolation to run on;
 * a bound static `isolation` then conflicts with it.
 */
export type BehaviorOptions<A extends unknown[], R> = (
  | SyncBehaviorOptions<A, R>
  | AsyncBehaviorOptions<A, R>
) & { dynamic?: boolean };

/** Bound (or nonisolated) synchronous behavior. Calling it off its domain throws. */
export class SyncBehavior<A extends unknown[], R> {
  readonly name: string;
  readonly isolation: IsolationContext;
  readonly #body: (...args: A) => R;

  constructor(name: string, isolation: IsolationContext, body: (...args: A) => R) {
    this.name = name;
    this.isolation = isolation;
    this.#body = body;
  }

  call(...args: A): R {
    checkArguments(args, this.isolation);
    return runIsolatedSync(this.isolation, () => this.#body(...args), `"${this.name}"`);
  }

  /**
   * Derives a behavior that delegates to this one. A synchronous derivation
   * cannot change isolation; declaring a different one fails here.
   */
  derive(options: {
    name: string;
    isolation?: IsolationContext;
    body: (base: SyncBehavior<A, R>, ...args: A) => R;
  }): SyncBehavior<A, R> {
    if (options.isolation && !sameIsolation(options.isolation, this.isolation)) {
      throw new IsolationConflict(
        options.name,
        `a synchronous override cannot move from ${describeIsolation(this.isolation)} to ${describeIsolation(options.isolation)}`,
      );
    }
    return new SyncBehavior(options.name, this.isolation, (...args: A) => options.body(this, ...args));
  }
}

/** Bound (or nonisolated) asynchronous behavior. Calls hop to its domain. */
export class AsyncBehavior<A extends unknown[], R> {
  readonly name: string;
  readonly isolation: IsolationContext;
  readonly #body: (...args: A) => R | Promise<R>;

  constructor(name: string, isolation: IsolationContext, body: (...args: A) => R | Promise<R>) {
    this.name = name;
    this.isolation = isolation;
    this.#body = body;
  }

  call(...args: A): Promise<R> {
    try {
      checkArguments(args, this.isolation);
    } catch (e) {
      return Promise.reject(e);
    }
    return runIsolated(this.isolation, () => this.#body(...args));
  }

  /**
   * Derives a behavior that delegates to this one. The suspension point lets
   * it rebind: omitted isolation is inherited, anything else replaces it.
   */
  derive(options: {
    name: string;
    isolation?: IsolationContext;
    body: (base: AsyncBehavior<A, R>, ...args: A) => R | Promise<R>;
  }): AsyncBehavior<A, R> {
    return new AsyncBehavior(options.name, options.isolation ?? this.isolation, (...args: A) =>
      options.body(this, ...args),
    );
  }
}

/** Synchronous behavior whose isolation is the caller's first argument. */
export class DynamicSyncBehavior<A extends unknown[], R> {
  readonly name: string;
  readonly #body: (...args: A) => R;

  constructor(name: string, body: (...args: A) => R) {
    this.name = name;
    this.#body = body;
  }

  call(isolation: IsolationContext, ...args: A): R {
    checkArguments(args, isolation);
    return runIsolatedSync(isolation, () => this.#body(...args), `"${this.name}"`);
  }

  /**
   * Passes the caller's own isolation. Never needs to switch, so it never
   * throws for crossing; the body runs wherever the caller happens to be.
   */
  callHere(...args: A): R {
    return this.call(currentIsolation(), ...args);
  }
}

/** Asynchronous behavior whose isolation is the caller's first argument. */
export class DynamicAsyncBehavior<A extends unknown[], R> {
  readonly name: string;
  readonly #body: (...args: A) => R | Promise<R>;

  constructor(name: string, body: (...args: A) => R | Promise<R>) {
    this.name = name;
    this.#body = body;
  }

  call(isolation: IsolationContext, ...args: A): Promise<R> {
    try {
      checkArguments(args, isolation);
    } catch (e) {
      return Promise.reject(e);
    }
    return runIsolated(isolation, () => this.#body(...args));
  }

  callHere(...args: A): Promise<R> {
    return this.call(currentIsolation(), ...args);
  }
}

export type Behavior<A extends unknown[], R> =
  | SyncBehavior<A, R>
  | AsyncBehavior<A, R>
  | DynamicSyncBehavior<A, R>
  | DynamicAsyncBehavior<A, R>;

export function defineBehavior<A extends unknown[], R>(
  options: SyncBehaviorOptions<A, R> & { dynamic: true },
): DynamicSyncBehavior<A, R>;
export function defineBehavior<A extends unknown[], R>(
  options: AsyncBehaviorOptions<A, R> & { dynamic: true },
): DynamicAsyncBehavior<A, R>;
export function defineBehavior<A extends unknown[], R>(
  options: SyncBehaviorOptions<A, R> & { dynamic?: false },
): SyncBehavior<A, R>;
export function defineBehavior<A extends unknown[], R>(
  options: AsyncBehaviorOptions<A, R> & { dynamic?: false },
): AsyncBehavior<A, R>;
/**
 * Defines a behavior with static or dynamic isolation. A bound static domain
 * together with `dynamic: true` is contradictory and fails here with
 * {@link IsolationConflict}, never at call time.
 */
export function defineBehavior<A extends unknown[], R>(
  options: BehaviorOptions<A, R>,
): Behavior<A, R> {
  const isolation = options.isolation ?? nonisolated;
  if (options.dynamic === true) {
    if (isolation.kind === "bound") {
      throw new IsolationConflict(
        options.name,
        `declares ${describeIsolation(isolation)} and also accepts a dynamic isolation parameter`,
      );
    }
    if (options.mode === "sync") {
      return new DynamicSyncBehavior(options.name, options.body);
    }
    return new DynamicAsyncBehavior(options.name, options.body);
  }
  if (options.mode === "sync") {
    return new SyncBehavior(options.name, isolation, options.body);
  }
  return new AsyncBehavior(options.name, isolation, options.body);
}

/** Calls a dynamic behavior with the isolation its provider declares. */
export function callFor<A extends unknown[], R>(
  provider: IsolationProvider,
  behavior: DynamicAsyncBehavior<A, R>,
  ...args: A
): Promise<R> {
  return behavior.call(provider.isolation, ...args);
}
