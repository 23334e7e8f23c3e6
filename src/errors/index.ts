export {
  formatErrorMessageWithContext,
  InternalError,
  SitePulseError,
  StorageError,
  UsageError,
} from "./base";
export type {
  ErrorContext,
  InternalErrorOptions,
  SitePulseErrorOptions,
  UsageErrorOptions,
} from "./base";
export { PatternMismatchError, ProbeError } from "./probe";
export type { ProbeErrorContext, ProbeErrorOptions } from "./probe";
export { ExecutorClosedError, WireFormatError, WorkerBusyError, WorkerLostError } from "./executor";
export type { WorkerLostErrorOptions } from "./executor";
