import { EXIT_CODE_RUNTIME_FAILURE } from "../exit-codes";
import { SitePulseError } from "./base";

export class ExecutorClosedError extends SitePulseError {
  constructor(message = "Executor is closed") {
    super(message, {
      exitCode: EXIT_CODE_RUNTIME_FAILURE,
      context: { component: "executor" },
      name: "ExecutorClosedError",
    });
  }
}

export interface WorkerLostErrorOptions {
  worker?: string;
  targetId?: string;
  cause?: unknown;
}

/**
 * A remote worker disappeared, answered with garbage, or no worker was reachable.
 */
export class WorkerLostError extends SitePulseError {
  readonly worker?: string;

  constructor(message: string, options: WorkerLostErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_RUNTIME_FAILURE,
      context: { component: "executor", targetId: options.targetId, url: options.worker },
      cause: options.cause,
      name: "WorkerLostError",
    });
    this.worker = options.worker;
  }
}

/**
 * Every worker that was tried answered 503, so the task never ran and may be submitted again.
 */
export class WorkerBusyError extends SitePulseError {
  constructor(message: string, targetId?: string) {
    super(message, {
      exitCode: EXIT_CODE_RUNTIME_FAILURE,
      context: { component: "executor", targetId },
      name: "WorkerBusyError",
    });
  }
}

/**
 * A task or result payload that does not match the wire schema.
 */
export class WireFormatError extends SitePulseError {
  constructor(message: string) {
    super(message, {
      exitCode: EXIT_CODE_RUNTIME_FAILURE,
      context: { component: "wire" },
      name: "WireFormatError",
    });
  }
}
