/**
 * Task-tree tracing. Records spawn edges, domains and statuses while enabled
 * and renders each root's tree once everything under it has settled.
 * Every entry point returns before allocating when tracing is off.
 */

import type { TaskEdge, TaskStatus } from "./task.js";

/**
 * Destination for runtime diagnostics: rendered task trees, task failures and
 * ignored cancellations. Accepted by `enableTaskDebug` and `createRuntime`;
 * `meta` carries structured fields for loggers that index them.
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
}

/** Emitted to subscribers as tasks are spawned, canceled and move between states. */
export type TaskDebugEvent =
  | {
      kind: "taskSpawned";
      taskId: number;
      name?: string;
      edge: TaskEdge;
      spawnerId?: number;
      domain: string;
    }
  | {
      kind: "taskUpdated";
      taskId: number;
      status: TaskStatus;
      timing?: { startTime?: number; endTime?: number };
    }
  | { kind: "cancelRequested"; taskId: number; reason: string };

type TaskDebugSubscriber = (event: TaskDebugEvent) => void;

type TaskNode = {
  id: number;
  name?: string;
  edge: TaskEdge;
  domain: string;
  status: TaskStatus;
  cancelRequested: boolean;
  startTime: number;
  endTime?: number;
  parent?: TaskNode;
  children: TaskNode[];
};

const TERMINAL: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "canceled"]);

/** Holds the tracing state. The module-level functions drive one shared instance. */
export class TaskDebugger {
  #debugEnabled = false;
  #logger: Logger | null = null;
  #subscribers: TaskDebugSubscriber[] | null = null;
  readonly #nodes = new Map<number, TaskNode>();

  #sink(level: "debug" | "warn" | "error", msg: string, meta?: object): void {
    const logger = this.#logger;
    if (logger) {
      try {
        logger[level](msg, meta);
        return;
      } catch {
        // Logger failed; use console
      }
    }
    if (level === "debug") {
      // eslint-disable-next-line no-console
      console.log(msg);
    } else if (level === "warn") {
      // eslint-disable-next-line no-console
      console.warn(msg);
    } else {
      // eslint-disable-next-line no-console
      console.error(msg);
    }
  }

  #emit(event: TaskDebugEvent): void {
    if (this.#subscribers === null || this.#subscribers.length === 0) return;
    for (const fn of this.#subscribers) {
      try {
        fn(event);
      } catch (err) {
        this.#sink("error", "[isolane] subscribeTaskDebug subscriber threw:", { error: err });
      }
    }
  }

  #formatNode(node: TaskNode, isRoot: boolean): string {
    const namePart = node.name ? ` ${node.name}` : "";
    const edgePart = isRoot ? "" : ` [${node.edge}]`;
    const cancelPart = node.cancelRequested && node.status !== "canceled" ? ", cancel requested" : "";
    const duration = node.endTime !== undefined ? ` in ${node.endTime - node.startTime}ms` : "";
    return `task#${node.id}${namePart}${edgePart} @${node.domain} (${node.status}${cancelPart}${duration})`;
  }

  #formatTree(node: TaskNode, prefix = "", isRoot = true): string {
    let lines: string[] = [this.#formatNode(node, isRoot)];
    for (let i = 0; i < node.children.length; i++) {
      const child = node.children[i];
      const isLast = i === node.children.length - 1;
      const branch = isLast ? "└─ " : "├─ ";
      const subPrefix = prefix + (isLast ? "   " : "│  ");
      const childLines = this.#formatTree(child, subPrefix, false).split("\n");
      lines = lines.concat([prefix + branch + childLines[0]], childLines.slice(1));
    }
    return lines.join("\n");
  }

  #subtreeSettled(node: TaskNode): boolean {
    if (!TERMINAL.has(node.status)) return false;
    return node.children.every((child) => this.#subtreeSettled(child));
  }

  #root(node: TaskNode): TaskNode {
    let current = node;
    while (current.parent) current = current.parent;
    return current;
  }

  #forget(node: TaskNode): void {
    this.#nodes.delete(node.id);
    for (const child of node.children) this.#forget(child);
  }

  enable(logger?: Logger): void {
    this.#logger = logger ?? null;
    this.#debugEnabled = true;
  }

  disable(): void {
    this.#debugEnabled = false;
    this.#logger = null;
    this.#subscribers = null;
    this.#nodes.clear();
  }

  isEnabled(): boolean {
    return this.#debugEnabled;
  }

  subscribe(callback: TaskDebugSubscriber): () => void {
    if (!this.#debugEnabled) return () => {};
    this.#subscribers ??= [];
    this.#subscribers.push(callback);
    return () => {
      if (this.#subscribers === null) return;
      const i = this.#subscribers.indexOf(callback);
      if (i !== -1) this.#subscribers.splice(i, 1);
    };
  }

  registerTask(info: {
    taskId: number;
    name?: string;
    edge: TaskEdge;
    spawnerId?: number;
    domain: string;
  }): void {
    if (!this.#debugEnabled) return;
    const parent = info.spawnerId !== undefined ? this.#nodes.get(info.spawnerId) : undefined;
    const node: TaskNode = {
      id: info.taskId,
      name: info.name,
      edge: info.edge,
      domain: info.domain,
      status: "pending",
      cancelRequested: false,
      startTime: Date.now(),
      parent,
      children: [],
    };
    parent?.children.push(node);
    this.#nodes.set(node.id, node);
    if (this.#subscribers?.length) {
      this.#emit({ kind: "taskSpawned", ...info });
    }
  }

  noteCancel(taskId: number, reason: string): void {
    if (!this.#debugEnabled) return;
    const node = this.#nodes.get(taskId);
    if (node) node.cancelRequested = true;
    if (this.#subscribers?.length) {
      this.#emit({ kind: "cancelRequested", taskId, reason });
    }
  }

  updateTask(taskId: number, status: TaskStatus): void {
    if (!this.#debugEnabled) return;
    const node = this.#nodes.get(taskId);
    const now = Date.now();
    if (node) {
      node.status = status;
      if (status === "running") node.startTime = now;
      if (TERMINAL.has(status)) node.endTime = now;
    }
    if (this.#subscribers?.length) {
      this.#emit({
        kind: "taskUpdated",
        taskId,
        status,
        timing: node ? { startTime: node.startTime, endTime: node.endTime } : { endTime: now },
      });
    }
    if (node && TERMINAL.has(status)) {
      const root = this.#root(node);
      if (this.#subtreeSettled(root)) {
        this.#sink("debug", this.#formatTree(root));
        this.#forget(root);
      }
    }
  }
}

const defaultDebugger = new TaskDebugger();

/**
 * Default singleton debugger used by the public API. Advanced use only;
 * prefer enableTaskDebug(), subscribeTaskDebug(), etc.
 */
export const taskDebugger = defaultDebugger;

/**
 * Enables task-tree introspection. When a root task and everything spawned
 * under it have settled, the rendered tree is written at debug level, to
 * console unless a logger is supplied.
 */
export function enableTaskDebug(logger?: Logger): void {
  defaultDebugger.enable(logger);
}

/** Internal use for tests only; not part of public API. */
export function disableTaskDebug(): void {
  defaultDebugger.disable();
}

export function subscribeTaskDebug(callback: (event: TaskDebugEvent) => void): () => void {
  return defaultDebugger.subscribe(callback);
}

export function isTaskDebugEnabled(): boolean {
  return defaultDebugger.isEnabled();
}

/** @internal */
export function registerTask(info: {
  taskId: number;
  name?: string;
  edge: TaskEdge;
  spawnerId?: number;
  domain: string;
}): void {
  defaultDebugger.registerTask(info);
}

/** @internal */
export function noteTaskCancel(taskId: number, reason: string): void {
  defaultDebugger.noteCancel(taskId, reason);
}

/** @internal */
export function updateTask(taskId: number, status: TaskStatus): void {
  defaultDebugger.updateTask(taskId, status);
}
