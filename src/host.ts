/**
 * View host adapter: the one hook a UI layer needs. Each appear event starts
 * one root task; in structured mode the tasks hang off the host's lifetime and
 * are canceled when the view disappears.
 */

import { nonisolated, type IsolationContext } from "./isolation.js";
import { defaultRuntime, type Runtime, type SpawnWork } from "./runtime.js";
import type { Task } from "./task.js";

export type ViewHostOptions = {
  mode: "structured" | "detached";
  /** Isolation of the appear tasks. Defaults to the runtime's main domain. */
  isolation?: IsolationContext;
  runtime?: Runtime;
  name?: string;
};

export class ViewHost {
  readonly mode: "structured" | "detached";
  readonly #isolation: IsolationContext;
  readonly #runtime: Runtime;
  readonly #name: string;
  readonly #active = new Set<Task<unknown>>();
  readonly #lifetime: Task<void> | undefined;
  #endLifetime: (() => void) | undefined;

  constructor(options: ViewHostOptions) {
    this.mode = options.mode;
    this.#runtime = options.runtime ?? defaultRuntime;
    this.#isolation = options.isolation ?? this.#runtime.mainDomain.isolation;
    this.#name = options.name ?? "view";
    if (this.mode === "structured") {
      const ended = new Promise<void>((resolve) => {
        this.#endLifetime = resolve;
      });
      this.#lifetime = this.#runtime.spawnDetached(
        nonisolated,
        async (ctx) => {
          await ended;
          ctx.checkCancellation();
        },
        { name: `${this.#name}:lifetime` },
      );
    }
  }

  /** Starts one task for this appear event. */
  onViewAppear<T>(entry: SpawnWork<T>): Task<T> {
    const name = `${this.#name}:appear`;
    const task = this.#lifetime
      ? this.#runtime.spawnStructured(this.#lifetime, this.#isolation, entry, { name })
      : this.#runtime.spawnDetached(this.#isolation, entry, { name });
    this.#active.add(task);
    void task.finished().then(() => this.#active.delete(task));
    return task;
  }

  /**
   * Cancels the tasks started by appear events in structured mode. Detached
   * tasks are left alone: nothing reaches them.
   */
  onViewDisappear(): void {
    if (this.mode !== "structured") return;
    for (const task of this.#active) {
      task.cancel({ type: "host-disappeared" });
    }
  }

  /** Tasks started by appear events that have not settled yet. */
  get active(): ReadonlySet<Task<unknown>> {
    return this.#active;
  }

  /** Ends the host. In structured mode this cancels everything still running under it. */
  dispose(): void {
    this.#lifetime?.cancel({ type: "host-disappeared" });
    this.#endLifetime?.();
    this.#endLifetime = undefined;
  }
}

export function createViewHost(options: ViewHostOptions): ViewHost {
  return new ViewHost(options);
}
