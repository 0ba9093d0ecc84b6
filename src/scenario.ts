import type { Clock } from './clock.js';
import { AmbiguousIndexError, TaskFailedError, VerificationError } from './errors.js';
import { findUniqueByIndex, trailingIndex, type LookupResult } from './lookup.js';
import { pollUntilTrue, type PollOutcome } from './poller.js';
import type { CollectionSource, Selector } from './source.js';
import type { SupervisorResult } from './supervisor.js';
import type { Entity } from './types.js';

/**
 * Scenario helpers: compose source reads/writes with the lookup and poller.
 * Helpers throw on failure; they are the assertion layer over the result values below them.
 */

export interface IndexLookupOptions {
  selector?: Selector;
  /** Defaults to the `<name>-<index>` suffix rule. */
  indexOf?: (identifier: string) => number | undefined;
  reportAllDuplicates?: boolean;
}

export interface PollTiming {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
  clock?: Clock;
}

export async function entityForIndex(source: CollectionSource, collection: string, index: number, opts: IndexLookupOptions = {}): Promise<LookupResult<Entity>> {
  const entities = await source.list(collection, opts.selector);
  return findUniqueByIndex(entities, index, {
    identify: e => e.name,
    indexOf: opts.indexOf ?? trailingIndex(),
    reportAllDuplicates: opts.reportAllDuplicates
  });
}

function pollFailure(outcome: Exclude<PollOutcome, { status: 'success' }>, label: string): Error {
  switch (outcome.status) {
    case 'failed':
    case 'timed_out':
      return outcome.error;
    case 'cancelled':
      return new TaskFailedError(label, `cancelled after ${Math.round(outcome.elapsedMs)}ms`);
  }
}

/** Waits for the index to be occupied; a duplicate ends the wait immediately. */
export async function eventuallyEntityForIndex(source: CollectionSource, collection: string, index: number, timing: PollTiming, opts: IndexLookupOptions = {}): Promise<Entity> {
  const label = `${collection}[${index}]`;
  const hit: { entity?: Entity } = {};
  const outcome = await pollUntilTrue(async () => {
    const res = await entityForIndex(source, collection, index, opts);
    if (res.status === 'ambiguous') throw res.error;
    if (res.status === 'not_found') return false;
    hit.entity = res.entity;
    return true;
  }, { ...timing, label, isFatal: e => e instanceof AmbiguousIndexError });
  if (outcome.status === 'success' && hit.entity) return hit.entity;
  if (outcome.status === 'success') throw new TaskFailedError(label, 'succeeded without an entity');
  throw pollFailure(outcome, label);
}

/**
 * Eventually applies `mutate` to the unique entity in `index`.
 * Returns the snapshot taken before the successful update so callers can restore it.
 */
export async function updateEntityAtIndex(source: CollectionSource, collection: string, index: number, mutate: (draft: Entity) => void, timing: PollTiming, opts: IndexLookupOptions = {}): Promise<Entity> {
  const label = `update ${collection}[${index}]`;
  const hit: { before?: Entity } = {};
  const outcome = await pollUntilTrue(async () => {
    const res = await entityForIndex(source, collection, index, opts);
    if (res.status === 'ambiguous') throw res.error;
    if (res.status === 'not_found') return false;
    const updated = await source.update(collection, res.entity.name, mutate);
    if (!updated.ok && updated.reason === 'not_found') return false;
    // Retried like any failed read; the last rejection becomes the timeout's cause.
    if (!updated.ok) throw new Error(updated.message);
    hit.before = res.entity;
    return true;
  }, { ...timing, label, isFatal: e => e instanceof AmbiguousIndexError });
  if (outcome.status === 'success' && hit.before) return hit.before;
  if (outcome.status === 'success') throw new TaskFailedError(label, 'succeeded without a snapshot');
  throw pollFailure(outcome, label);
}

function headline(result: SupervisorResult): string {
  const ms = Math.round(result.elapsedMs);
  switch (result.status) {
    case 'all_succeeded': return `verification succeeded in ${ms}ms`;
    case 'failed_early': return `verification failed after ${ms}ms: ${result.error.message}`;
    case 'timed_out': return `verification timed out after ${ms}ms; pending: ${result.pending.join(', ')}`;
    case 'cancelled': return `verification cancelled after ${ms}ms: ${String(result.reason)}`;
  }
}

/** One headline plus a line per task: label, kind, state, elapsed time, attempts and error. */
export function describeResult(result: SupervisorResult): string {
  const lines = result.tasks.map(t => {
    const detail = t.error ? `: ${t.error.message}` : '';
    return `  - ${t.label} [${t.kind}] ${t.state} after ${Math.round(t.elapsedMs)}ms (${t.attempts} attempts)${detail}`;
  });
  return [headline(result), ...lines].join('\n');
}

export class VerificationFailedError extends VerificationError {
  constructor(readonly result: SupervisorResult) {
    super('verification_failed', describeResult(result), {
      cause: result.status === 'failed_early' || result.status === 'timed_out' ? result.error : undefined
    });
  }
}

export function assertVerified(result: SupervisorResult): asserts result is Extract<SupervisorResult, { status: 'all_succeeded' }> {
  if (result.status !== 'all_succeeded') throw new VerificationFailedError(result);
}
