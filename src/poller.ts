import { anySignal, systemClock, type Clock } from './clock.js';
import { PredicateEvaluationError, TaskFailedError, TimeoutError } from './errors.js';
import { incCounter } from './metrics.js';
import { InvariantTimingSchema, PollTimingSchema, type PollMode, type Predicate } from './types.js';

/**
 * Bounded poller: re-evaluates a caller-supplied predicate on a fixed cadence against a clock.
 * Two modes: until-true (convergence) and invariant-holds (non-regression).
 * Non-goals: retrying the external operations a predicate performs; only the evaluation is repeated.
 */

interface BaseOptions {
  intervalMs: number;
  signal?: AbortSignal;
  clock?: Clock;
  /** Errors classified fatal end the poll with `failed`; anything else is a transient "not yet". */
  isFatal?: (err: unknown) => boolean;
  label?: string;
}

export interface PollUntilTrueOptions extends BaseOptions {
  timeoutMs: number;
}

export interface PollInvariantOptions extends BaseOptions {
  durationMs: number;
  /** Ends the observation window early with `holds`. */
  settled?: AbortSignal;
}

interface Progress { attempts: number; elapsedMs: number; }

export type PollOutcome =
  | ({ status: 'success' } & Progress)
  | ({ status: 'timed_out'; error: TimeoutError; lastError?: PredicateEvaluationError } & Progress)
  | ({ status: 'cancelled' } & Progress)
  | ({ status: 'failed'; error: Error } & Progress);

export type InvariantOutcome =
  | ({ status: 'holds' } & Progress)
  | ({ status: 'violated'; atMs: number } & Progress)
  | ({ status: 'cancelled' } & Progress)
  | ({ status: 'failed'; error: Error } & Progress);

export function defaultIsFatal(err: unknown): boolean {
  return err instanceof TaskFailedError;
}

type Evaluation = { ok: boolean } | { ok: false; error: PredicateEvaluationError; fatal: boolean };

async function evaluate(predicate: Predicate, signal: AbortSignal, label: string, isFatal: (err: unknown) => boolean): Promise<Evaluation> {
  try {
    return { ok: await predicate(signal) };
  } catch (err) {
    return { ok: false, error: new PredicateEvaluationError(label, err), fatal: isFatal(err) };
  }
}

function fatalError(e: PredicateEvaluationError): Error {
  return e.cause instanceof Error ? e.cause : e;
}

function count(mode: PollMode, status: string) { incCounter('polls_total', { mode, outcome: status }); }

function record(outcome: PollOutcome): PollOutcome {
  count('until_true', outcome.status);
  return outcome;
}

function recordInvariant(outcome: InvariantOutcome): InvariantOutcome {
  count('invariant', outcome.status);
  return outcome;
}

// Predicates always receive a signal; a poll without one gets a signal that never aborts.
const NEVER = new AbortController().signal;

export async function pollUntilTrue(predicate: Predicate, opts: PollUntilTrueOptions): Promise<PollOutcome> {
  const { timeoutMs, intervalMs } = PollTimingSchema.parse({ timeoutMs: opts.timeoutMs, intervalMs: opts.intervalMs });
  const clock = opts.clock ?? systemClock;
  const signal = opts.signal ?? NEVER;
  const isFatal = opts.isFatal ?? defaultIsFatal;
  const label = opts.label ?? 'poll';
  const start = clock.now();
  let attempts = 0;
  let lastError: PredicateEvaluationError | undefined;

  while (true) {
    if (signal.aborted) return record({ status: 'cancelled', attempts, elapsedMs: clock.now() - start });
    attempts++;
    const res = await evaluate(predicate, signal, label, isFatal);
    const elapsedMs = clock.now() - start;
    if (res.ok) return record({ status: 'success', attempts, elapsedMs });
    if ('error' in res) {
      if (res.fatal) return record({ status: 'failed', error: fatalError(res.error), attempts, elapsedMs });
      lastError = res.error;
    }
    if (elapsedMs >= timeoutMs) {
      const error = new TimeoutError(elapsedMs, [label], lastError ? { cause: lastError } : undefined);
      return record({ status: 'timed_out', error, lastError, attempts, elapsedMs });
    }
    await clock.sleep(Math.min(intervalMs, timeoutMs - elapsedMs), signal);
  }
}

export async function pollInvariantHolds(predicate: Predicate, opts: PollInvariantOptions): Promise<InvariantOutcome> {
  const { durationMs, intervalMs } = InvariantTimingSchema.parse({ durationMs: opts.durationMs, intervalMs: opts.intervalMs });
  const clock = opts.clock ?? systemClock;
  const signal = opts.signal ?? NEVER;
  const isFatal = opts.isFatal ?? defaultIsFatal;
  const label = opts.label ?? 'invariant';
  const start = clock.now();
  let attempts = 0;

  // Wake the sleep on either cancellation or settlement.
  const wake = opts.settled ? anySignal(signal, opts.settled) : undefined;
  try {
    while (true) {
      if (signal.aborted) return recordInvariant({ status: 'cancelled', attempts, elapsedMs: clock.now() - start });
      attempts++;
      const res = await evaluate(predicate, signal, label, isFatal);
      const elapsedMs = clock.now() - start;
      if ('error' in res) {
        if (res.fatal) return recordInvariant({ status: 'failed', error: fatalError(res.error), attempts, elapsedMs });
      } else if (!res.ok) {
        return recordInvariant({ status: 'violated', atMs: elapsedMs, attempts, elapsedMs });
      }
      if (elapsedMs >= durationMs || opts.settled?.aborted) return recordInvariant({ status: 'holds', attempts, elapsedMs });
      await clock.sleep(Math.min(intervalMs, durationMs - elapsedMs), wake?.signal ?? signal);
    }
  } finally {
    wake?.dispose();
  }
}
