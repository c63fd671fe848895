/**
 * TaskTree: parent/child bookkeeping for cancellation propagation.
 * Holds weak references to tasks; the spawner's handle keeps a task alive.
 */

import type { CancelReason, Task, TaskEdge } from "./task.js";

type TaskNode = {
  readonly id: number;
  readonly task: WeakRef<Task<unknown>>;
  /** Edge to the task that was running when this one was spawned, if any. */
  readonly spawner: TaskNode | undefined;
  readonly edge: TaskEdge;
  readonly children: Set<TaskNode>;
  settled: boolean;
};

export class TaskTree {
  readonly #nodes = new Map<number, TaskNode>();

  /** Number of tracked nodes (unsettled tasks plus settled ones with live descendants). */
  get size(): number {
    return this.#nodes.size;
  }

  /**
   * Records `task` as spawned while `spawner` was running. The edge kind is
   * taken from the task and never changes afterwards.
   */
  register(task: Task<unknown>, spawner: Task<unknown> | undefined): void {
    const parentNode = spawner ? this.#nodes.get(spawner.id) : undefined;
    const node: TaskNode = {
      id: task.id,
      task: new WeakRef(task),
      spawner: parentNode,
      edge: task.edge,
      children: new Set(),
      settled: false,
    };
    parentNode?.children.add(node);
    this.#nodes.set(task.id, node);
  }

  /** Marks a task settled and prunes nodes whose whole subtree has settled. */
  settle(task: Task<unknown>): void {
    const node = this.#nodes.get(task.id);
    if (!node) return;
    node.settled = true;
    this.#prune(node);
  }

  /**
   * Sets the cancellation flag on every structured descendant of `task`.
   * Settled intermediate nodes are traversed; detached edges are not.
   */
  propagateCancel(task: Task<unknown>): void {
    const node = this.#nodes.get(task.id);
    if (!node) return;
    this.#propagateFrom(node, task);
  }

  /** Tasks spawned while `task` ran, with the edge kind of each. */
  children(task: Task<unknown>): Array<{ task: Task<unknown>; edge: TaskEdge }> {
    const node = this.#nodes.get(task.id);
    if (!node) return [];
    const result: Array<{ task: Task<unknown>; edge: TaskEdge }> = [];
    for (const child of node.children) {
      const childTask = child.task.deref();
      if (childTask) result.push({ task: childTask, edge: child.edge });
    }
    return result;
  }

  /** Live structured descendants of `task`, depth first. */
  structuredDescendants(task: Task<unknown>): Task<unknown>[] {
    const node = this.#nodes.get(task.id);
    const result: Task<unknown>[] = [];
    const visit = (n: TaskNode): void => {
      for (const child of n.children) {
        if (child.edge !== "structured") continue;
        const childTask = child.task.deref();
        if (childTask) result.push(childTask);
        visit(child);
      }
    };
    if (node) visit(node);
    return result;
  }

  /** Spawner of a tracked task, structured or not. */
  spawnerOf(task: Task<unknown>): Task<unknown> | undefined {
    return this.#nodes.get(task.id)?.spawner?.task.deref();
  }

  has(task: Task<unknown>): boolean {
    return this.#nodes.has(task.id);
  }

  // A child whose cancel() succeeds propagates on its own; settled or
  // collected children are walked through here.
  #propagateFrom(node: TaskNode, origin: Task<unknown>): void {
    const reason: CancelReason = { type: "parent-canceled", parent: origin };
    for (const child of [...node.children]) {
      if (child.edge !== "structured") continue;
      const childTask = child.task.deref();
      if (childTask?.cancel(reason)) continue;
      if (childTask?.isCancelled) continue;
      this.#propagateFrom(child, origin);
    }
  }

  #prune(node: TaskNode): void {
    let current: TaskNode | undefined = node;
    while (current && current.settled && current.children.size === 0) {
      this.#nodes.delete(current.id);
      current.spawner?.children.delete(current);
      current = current.spawner;
    }
  }
}
