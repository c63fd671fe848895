/**
 * Runtime error taxonomy. Each class fixes its prototype so `instanceof`
 * holds after transpilation.
 */

import type { IsolationContext } from "./isolation.js";
import { describeIsolation } from "./isolation.js";

/**
 * Exclusive-access assumption broken: code touched a domain's state, or ran a
 * domain-bound synchronous body, outside that domain. Fatal for the unit of
 * work that detects it; surfaced to the caller as a failure.
 */
export class IsolationViolation extends Error {
  readonly expected: IsolationContext;
  readonly actual: IsolationContext;

  constructor(message: string, expected: IsolationContext, actual: IsolationContext) {
    super(
      `${message} (expected ${describeIsolation(expected)}, running on ${describeIsolation(actual)})`,
    );
    this.name = "IsolationViolation";
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, IsolationViolation.prototype);
  }
}

/** Contradictory static and dynamic isolation. Raised when a behavior is defined, never when it is called. */
export class IsolationConflict extends Error {
  readonly behavior: string;

  constructor(behavior: string, message: string) {
    super(`Behavior "${behavior}": ${message}`);
    this.name = "IsolationConflict";
    this.behavior = behavior;
    Object.setPrototypeOf(this, IsolationConflict.prototype);
  }
}

/**
 * Cancellation observed by work that checked its flag. An outcome tag, not an
 * unwind the runtime forces on anyone.
 */
export class CancellationObserved extends Error {
  readonly taskId: number | undefined;
  readonly reason: unknown;

  constructor(taskId?: number, reason?: unknown) {
    super(taskId === undefined ? "Cancellation observed" : `Task #${taskId} observed cancellation`);
    this.name = "CancellationObserved";
    this.taskId = taskId;
    this.reason = reason;
    Object.setPrototypeOf(this, CancellationObserved.prototype);
  }
}

/** Wraps an error thrown by task work. `cause` is the original error, unchanged. */
export class TaskFailure extends Error {
  readonly taskId: number;

  constructor(taskId: number, cause: unknown) {
    super(`Task #${taskId} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "TaskFailure";
    this.taskId = taskId;
    Object.setPrototypeOf(this, TaskFailure.prototype);
  }
}

/** Error union carried by {@link Task.settle}. */
export type TaskError = TaskFailure | CancellationObserved;
