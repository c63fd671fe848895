/**
 * isolane: isolation domains and structured task cancellation for Node.js
 * @module
 */
export {
  IsolationDomain,
  Isolated,
  assertTransferable,
  mainDomain,
  type DomainOptions,
} from "./domain.js";
export {
  bound,
  currentIsolation,
  describeIsolation,
  domainOf,
  nonisolated,
  sameIsolation,
  type IsolationContext,
  type IsolationProvider,
} from "./isolation.js";
export {
  AsyncBehavior,
  DynamicAsyncBehavior,
  DynamicSyncBehavior,
  SyncBehavior,
  callFor,
  closure,
  defer,
  defineBehavior,
  detachable,
  runIsolated,
  runIsolatedSync,
  type Behavior,
  type BehaviorOptions,
  type Closure,
  type DetachableClosure,
  type InheritingClosure,
} from "./resolver.js";
export {
  Task,
  type CancelReason,
  type TaskEdge,
  type TaskLifecycleHook,
  type TaskOutcome,
  type TaskStatus,
} from "./task.js";
export { TaskTree } from "./hierarchy.js";
export {
  Runtime,
  createRuntime,
  defaultRuntime,
  detach,
  spawn,
  spawnDetached,
  spawnStructured,
  type RuntimeOptions,
  type SpawnIsolation,
  type SpawnOptions,
  type SpawnWork,
  type TaskContext,
  type TaskWork,
} from "./runtime.js";
export {
  ManualClock,
  ManualScheduler,
  MicrotaskScheduler,
  defaultScheduler,
  sleep,
  systemClock,
  type Clock,
  type Scheduler,
  type WorkItem,
} from "./scheduler.js";
export { cancelAfter, withTimeout, yieldNow } from "./helpers.js";
export { ViewHost, createViewHost, type ViewHostOptions } from "./host.js";
export {
  CancellationObserved,
  IsolationConflict,
  IsolationViolation,
  TaskFailure,
  type TaskError,
} from "./errors.js";
export {
  enableTaskDebug,
  isTaskDebugEnabled,
  subscribeTaskDebug,
  TaskDebugger,
  taskDebugger,
  type Logger,
  type TaskDebugEvent,
} from "./debug.js";
export { enableStrictMode, type StrictModeOptions } from "./strict-mode.js";
