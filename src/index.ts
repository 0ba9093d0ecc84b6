export { pollUntilTrue, pollInvariantHolds, defaultIsFatal } from './poller.js';
export type { PollOutcome, InvariantOutcome, PollUntilTrueOptions, PollInvariantOptions } from './poller.js';
export { findUniqueByIndex, trailingIndex } from './lookup.js';
export type { LookupOptions, LookupResult } from './lookup.js';
export { runConcurrently } from './supervisor.js';
export type { VerificationTask, RunOptions, TaskReport, SupervisorResult } from './supervisor.js';
export { DeadlineContext } from './deadline.js';
export type { CancelCause } from './deadline.js';
export { systemClock, createManualClock, abortableSleep, anySignal } from './clock.js';
export type { Clock, ManualClock, CombinedSignal } from './clock.js';
export {
  VerificationError, AmbiguousIndexError, NotFoundError, TimeoutError, TaskFailedError, PredicateEvaluationError
} from './errors.js';
export type { VerificationErrorCode } from './errors.js';
export {
  entityForIndex, eventuallyEntityForIndex, updateEntityAtIndex, describeResult, assertVerified, VerificationFailedError
} from './scenario.js';
export type { IndexLookupOptions, PollTiming } from './scenario.js';
export { createMemorySource, createSource, matchesSelector } from './source.js';
export type { CollectionSource, ClosableSource, MemorySource, UpdateResult, Selector } from './source.js';
export { loadProfiles, getProfiles, reloadProfiles, resolveTiming } from './profiles.js';
export { getConfig, loadConfig } from './config.js';
export type { Config } from './config.js';
export { audit, exportAudit } from './log.js';
export { serializePrometheus, resetAllMetrics } from './metrics.js';
export { initTracing, shutdownTracing } from './tracing.js';
export type { Entity, Predicate, Timing, TaskKind, TaskState } from './types.js';
